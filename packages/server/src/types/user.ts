import type { App } from './app.js';

/**
 * User account record
 */
export interface User {
  id: number;
  email: string;
  username: string;
  passwordHash: string;
  isVerified: boolean;
  createdAt: Date;
}

/**
 * Input for creating a user (the password is already hashed)
 */
export interface CreateUserInput {
  email: string;
  username: string;
  passwordHash: string;
}

/**
 * Result of a verification-state lookup
 */
export interface UserVerificationState {
  userId: number;
  isVerified: boolean;
}

/**
 * The user and app an access token was verified for
 */
export interface Principal {
  user: User;
  app: App;
}
