/**
 * authgate constants
 */

// Token purposes
export const PURPOSE_ACCESS = 'access' as const;
export const PURPOSE_EMAIL_VERIFICATION = 'email_verification' as const;
export const PURPOSE_TWO_FACTOR = '2fa' as const;

// Signing algorithm (symmetric)
export const SIGNING_ALGORITHM_HS256 = 'HS256' as const;

// Token types
export const TOKEN_TYPE_BEARER = 'Bearer' as const;

// Default TTLs (in seconds)
export const DEFAULT_ACCESS_TOKEN_TTL = 900; // 15 minutes
export const DEFAULT_REFRESH_TOKEN_TTL = 2592000; // 30 days
export const DEFAULT_VERIFICATION_TOKEN_TTL = 86400; // 24 hours
export const DEFAULT_MAGIC_LINK_TTL = 600; // 10 minutes

// Magic links
export const DEFAULT_MAX_ACTIVE_MAGIC_LINKS = 3;
export const DEFAULT_MAGIC_LINK_CLEANUP_GRACE = 86400; // 1 day past expiry
export const MAGIC_LINK_VERIFY_PATH = '/auth/2fa/verify-link';
export const EMAIL_VERIFY_PATH = '/auth/verify';

// Ephemeral store key prefixes
export const MAGIC_LINK_PENDING_PREFIX = '2fa:pending:';
export const MAGIC_LINK_USED_PREFIX = '2fa:used:';
export const MAGIC_LINK_MARKER_USED = 'used';
export const MAGIC_LINK_MARKER_INVALIDATED = 'invalidated';

// Token/secret lengths
export const REFRESH_TOKEN_LENGTH = 32; // bytes
export const SESSION_ID_SUFFIX_LENGTH = 4; // bytes

// scrypt parameters for passwords and refresh tokens
export const DEFAULT_SCRYPT_COST = 16384; // N
export const SCRYPT_BLOCK_SIZE = 8; // r
export const SCRYPT_PARALLELIZATION = 1; // p
export const SCRYPT_KEY_LENGTH = 64;

// Refresh token candidate scan page size
export const REFRESH_TOKEN_SCAN_BATCH = 100;

// Request deadline
export const DEFAULT_REQUEST_TIMEOUT_MS = 4000;

// Email subjects
export const SUBJECT_EMAIL_VERIFICATION = 'Confirm your email address';
export const SUBJECT_TWO_FACTOR = 'Your sign-in link';

// Message broker
export const DEFAULT_EMAIL_QUEUE = 'email_messages';

// Per-endpoint limits: [maxRequests, windowMs]
export const RATE_LIMIT_LOGIN = [10, 5 * 60_000] as const;
export const RATE_LIMIT_REGISTER = [5, 60 * 60_000] as const;
export const RATE_LIMIT_REFRESH = [30, 10 * 60_000] as const;
export const RATE_LIMIT_LOGOUT = [20, 10 * 60_000] as const;
export const RATE_LIMIT_VERIFY = [10, 10 * 60_000] as const;
export const RATE_LIMIT_RESEND_VERIFICATION = [3, 60 * 60_000] as const;
export const RATE_LIMIT_MAGIC_LINK_SEND = [5, 10 * 60_000] as const;
export const RATE_LIMIT_MAGIC_LINK_VERIFY = [10, 10 * 60_000] as const;

// PostgreSQL error codes
export const PG_UNIQUE_VIOLATION = '23505';

// HTTP headers
export const HEADER_CACHE_CONTROL = 'Cache-Control';
export const HEADER_PRAGMA = 'Pragma';
export const HEADER_USER_AGENT = 'User-Agent';
export const HEADER_AUTHORIZATION = 'Authorization';
export const HEADER_WWW_AUTHENTICATE = 'WWW-Authenticate';

// Realm named in WWW-Authenticate challenges
export const BEARER_REALM = 'authgate';

// Cache control for token responses
export const TOKEN_CACHE_CONTROL = 'no-store';
export const TOKEN_PRAGMA = 'no-cache';
