import { registerAs } from '@nestjs/config';

/**
 * Credential and anti-forgery configuration
 *
 * The API has a single account. Its password is given either as a bcrypt
 * hash (AUTH_PASSWORD_HASH) or as plain text (AUTH_PASSWORD) that is hashed
 * once at startup. The hash wins when both are set.
 */
export default registerAs('auth', () => ({
  /** Account name accepted by HTTP Basic authentication */
  username: process.env.AUTH_USERNAME || 'admin',

  /** Precomputed bcrypt hash of the account password */
  passwordHash: process.env.AUTH_PASSWORD_HASH || undefined,

  /** Plain account password, used only when no hash is configured */
  password: process.env.AUTH_PASSWORD || 'password123',

  /** Signing secret for anti-forgery tokens */
  csrfSecret: process.env.CSRF_SECRET || 'change-me',
}));
