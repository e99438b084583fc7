export { AuthService, normalizeEmail, type AuthServiceOptions } from './auth-service.js';
export {
  EmailVerificationService,
  type EmailVerificationServiceOptions,
} from './email-verification-service.js';
export {
  TwoFactorService,
  type TwoFactorServiceOptions,
  type SendMagicLinkInput,
  type MagicLinkIssued,
} from './two-factor-service.js';
export { withDeadline, ensureActive } from './deadline.js';
export type { Commit } from './deadline.js';
