/**
 * Centralized error messages
 * All error messages should be defined here for consistency and maintainability
 */

export const ERROR_MESSAGES = {
  // Credential related errors
  CREDENTIALS: {
    NOT_CONFIGURED:
      "No API credentials configured. Run 'tgsend config --api-id ID --api-hash HASH' first",
    INVALID: 'API credentials are invalid',
    INCOMPLETE: 'Both --api-id and --api-hash are required to save credentials',
    REJECTED: 'API credentials were rejected by Telegram',
  },

  // Authentication related errors
  AUTH: {
    NOT_AUTHENTICATED: "Not authenticated. Run 'tgsend auth' first",
    SESSION_REVOKED: 'Session expired or was revoked. Please re-authenticate',
    PHONE_REQUIRED: 'Phone number is required',
    PHONE_INVALID: 'Phone number was rejected by Telegram',
    PHONE_MISMATCH: 'Phone number does not match the pending login',
    CODE_REQUIRED: 'Login code is required',
    CODE_INVALID: 'Invalid code',
    CODE_EXPIRED: 'Login code expired. Request a new one',
    CODE_HASH_MISMATCH: 'Phone code hash does not match the pending login',
    PASSWORD_REQUIRED: '2FA password is required',
    PASSWORD_INVALID: 'Invalid 2FA password',
    ALREADY_AUTHORIZED: "Already authorized. Run 'tgsend logout' to switch accounts",
    NO_PENDING_CODE: "No login code was requested. Run 'tgsend auth --phone' first",
    NO_PENDING_PASSWORD: 'No 2FA password is pending for this login',
  },

  // Contact related errors
  CONTACT: {
    NOT_FOUND: 'Contact not found',
    NO_GOOD_MATCH: 'No good match found',
    AMBIGUOUS: 'Several contacts match equally well',
    RECIPIENT_REQUIRED:
      'Specify recipient with --to (name) or --to-id (Telegram ID)',
  },

  // File related errors
  FILE: {
    NOT_FOUND: 'File not found',
    NOT_A_FILE: 'Not a file',
  },

  // Local storage errors
  STORAGE: {
    LOCKED: 'Another tgsend instance is using',
    CORRUPT: 'Stored record is corrupt',
  },

  // Transport errors
  TRANSPORT: {
    FAILED: 'Telegram request failed',
    TIMEOUT: 'Telegram request timed out',
    RATE_LIMITED: 'Rate limited by Telegram',
    NOT_CONNECTED: 'Telegram client is not connected',
  },

  // Generic errors
  GENERIC: {
    INTERNAL_ERROR: 'An unexpected error occurred',
  },
} as const;
