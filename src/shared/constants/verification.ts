export const OTP_LENGTH = 6;
export const OTP_EXPIRY_MINUTES = 10;
export const MAX_OTP_ATTEMPTS = 3;
export const OTP_RATE_LIMIT_MS = 60 * 1000;

export const VERIFICATION_TYPES = ['registration', 'voting', 'password_reset'] as const;
export type VerificationType = (typeof VERIFICATION_TYPES)[number];

/** E.164 with at least 9 subscriber digits */
export const PHONE_NUMBER_PATTERN = /^\+[1-9]\d{8,14}$/;
