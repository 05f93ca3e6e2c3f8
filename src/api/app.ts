/**
 * Form Inspector API
 *
 * Hono app exposing the analyzer over HTTP. Built by a factory so tests and
 * the server can inject limits and an optional page renderer.
 */

import { Hono } from 'hono';
import { secureHeaders } from 'hono/secure-headers';
import { HTTPException } from 'hono/http-exception';
import { buildStructuredError, classifyErrorCode } from '../types/errors.js';
import { logger } from '../utils/logger.js';
import { createRequestLoggerMiddleware, type RequestLoggerConfig } from './middleware/request-logger.js';
import { createFormRoutes } from './routes/forms.js';
import { health } from './routes/health.js';
import type { ApiDependencies, ApiEnv } from './types.js';

const log = logger.server;

export interface AppOptions extends ApiDependencies {
  requestLogging?: RequestLoggerConfig;
}

export function createApp(options: AppOptions): Hono<ApiEnv> {
  const app = new Hono<ApiEnv>();

  app.use('*', createRequestLoggerMiddleware(options.requestLogging));
  app.use(
    '*',
    secureHeaders({
      xContentTypeOptions: 'nosniff',
      xFrameOptions: 'DENY',
      referrerPolicy: 'no-referrer',
    })
  );

  app.route('/health', health);
  app.route('/v1/forms', createFormRoutes(options));

  app.get('/', (c) => {
    return c.json({
      name: 'pdf-form-inspector',
      version: '0.1.0',
      endpoints: {
        health: '/health',
        analyze: '/v1/forms/analyze',
        overlay: '/v1/forms/overlay',
        info: '/v1/forms/info',
      },
    });
  });

  app.notFound((c) => {
    const error = buildStructuredError(`Route ${c.req.method} ${c.req.path} not found`, classifyErrorCode('NOT_FOUND'));
    return c.json({ success: false as const, error }, 404);
  });

  app.onError((err, c) => {
    if (err instanceof HTTPException) {
      const error = buildStructuredError(err.message || 'Bad request', classifyErrorCode('INVALID_INPUT'));
      return c.json({ success: false as const, error }, err.status);
    }

    log.error('Unhandled error', { requestId: c.get('requestId'), path: c.req.path, error: err });

    const isDev = process.env.NODE_ENV === 'development';
    const error = buildStructuredError(
      isDev ? err.message : 'An internal error occurred',
      classifyErrorCode('INTERNAL_ERROR')
    );
    return c.json({ success: false as const, error }, 500);
  });

  return app;
}
