import { INestApplication, RequestMethod } from '@nestjs/common';

/** Prefix of every API route */
export const API_PREFIX = 'api';

/**
 * Applies the HTTP settings shared by main.ts and the end-to-end tests
 *
 * Everything lives under /api except the health endpoints, which probes
 * call without credentials.
 */
export function configureApp(app: INestApplication): INestApplication {
  app.setGlobalPrefix(API_PREFIX, {
    exclude: [
      { path: 'health', method: RequestMethod.GET },
      { path: 'health/live', method: RequestMethod.GET },
    ],
  });
  return app;
}
