import { registerAs } from '@nestjs/config';

/**
 * Application-level configuration
 *
 * Environment variables take precedence over the defaults below.
 */
export default registerAs('app', () => ({
  /** HTTP listener port */
  port: parseInt(process.env.PORT || '3000', 10),

  /** Application environment (development, test, production) */
  environment: process.env.NODE_ENV || 'development',
}));
