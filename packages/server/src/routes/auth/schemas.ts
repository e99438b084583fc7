import { z } from 'zod';

const email = z.string().trim().email('A valid email address is required').max(254);

export const registerSchema = z.object({
  email,
  username: z
    .string()
    .trim()
    .min(3, 'Username must be at least 3 characters')
    .max(32, 'Username must be at most 32 characters')
    .regex(/^[A-Za-z0-9_.-]+$/, 'Username may only contain letters, digits, "_", "." and "-"'),
  password: z
    .string()
    .min(8, 'Password must be at least 8 characters')
    .max(128, 'Password must be at most 128 characters'),
});

export const loginSchema = z.object({
  email,
  password: z.string().min(1, 'Password is required'),
  app_id: z.number().int().positive(),
});

export const refreshTokenSchema = z.object({
  refresh_token: z.string().min(1, 'refresh_token is required').max(512),
});

export const verifyQuerySchema = z.object({
  token: z.string().min(1, 'token is required'),
});

export const resendVerificationSchema = z.object({
  email,
});
