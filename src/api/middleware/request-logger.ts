/**
 * Request Logger Middleware
 *
 * Structured logging for API requests with:
 * - Unique request IDs
 * - Timing and duration tracking
 * - Sensitive data redaction
 */

import { createMiddleware } from 'hono/factory';
import { z } from 'zod';
import { logger, type LogContext, type Logger } from '../../utils/logger.js';
import type { ApiEnv } from '../types.js';

export function generateRequestId(): string {
  return `req_${Date.now().toString(36)}_${Math.random().toString(36).substring(2, 9)}`;
}

const SENSITIVE_HEADERS = ['authorization', 'cookie', 'x-api-key', 'api-key', 'x-auth-token'];

const SENSITIVE_PARAMS = ['api_key', 'apikey', 'token', 'secret', 'password', 'key'];

/**
 * Redact sensitive values from headers, keeping a short prefix
 */
export function redactHeaders(headers: Record<string, string>): Record<string, string> {
  const redacted: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (SENSITIVE_HEADERS.includes(key.toLowerCase())) {
      redacted[key] = value.length > 8 ? `${value.substring(0, 8)}...REDACTED` : 'REDACTED';
    } else {
      redacted[key] = value;
    }
  }
  return redacted;
}

export function redactQuery(query: Record<string, string>): Record<string, string> {
  const redacted: Record<string, string> = {};
  for (const [key, value] of Object.entries(query)) {
    redacted[key] = SENSITIVE_PARAMS.includes(key.toLowerCase()) ? 'REDACTED' : value;
  }
  return redacted;
}

const errorBodySchema = z.object({
  error: z.object({
    code: z.string().optional(),
    message: z.string().optional(),
  }),
});

export interface RequestLoggerConfig {
  /** Skip logging for certain paths (e.g., health checks) */
  skipPaths?: string[];
  /** Include request headers in logs (default: false) */
  includeHeaders?: boolean;
  /** Logger each request is written to (default: the server logger) */
  log?: Logger;
  /** Include stack traces for errors (default: true in dev) */
  includeStacks?: boolean;
}

function parseLength(value: string | null | undefined): number | undefined {
  const parsed = parseInt(value ?? '', 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

export function createRequestLoggerMiddleware(config: RequestLoggerConfig = {}) {
  const {
    skipPaths = ['/health'],
    includeHeaders = false,
    log = logger.server,
    includeStacks = process.env.NODE_ENV === 'development',
  } = config;

  return createMiddleware<ApiEnv>(async (c, next) => {
    const path = c.req.path;

    if (skipPaths.some((p) => path === p || path.startsWith(p + '/'))) {
      return next();
    }

    const requestId = generateRequestId();
    const startTime = Date.now();

    c.set('requestId', requestId);
    c.header('X-Request-Id', requestId);

    const query: Record<string, string> = {};
    new URL(c.req.url).searchParams.forEach((value, key) => {
      query[key] = value;
    });

    let error: { code: string; message: string; stack?: string } | undefined;

    try {
      await next();
    } catch (err) {
      error = {
        code: 'UNHANDLED_ERROR',
        message: err instanceof Error ? err.message : String(err),
        ...(includeStacks && err instanceof Error && { stack: err.stack }),
      };
      throw err;
    } finally {
      const durationMs = Date.now() - startTime;
      const status = c.res.status;

      if (!error && status >= 400) {
        const contentType = c.res.headers.get('content-type') ?? '';
        if (contentType.includes('application/json')) {
          const raw: unknown = await c.res
            .clone()
            .json()
            .catch((parseError: unknown) => {
              log.debug('Error response body is not JSON', { requestId, error: String(parseError) });
              return undefined;
            });
          const body = errorBodySchema.safeParse(raw);
          if (body.success) {
            error = {
              code: body.data.error.code ?? 'ERROR',
              message: body.data.error.message ?? 'Unknown error',
            };
          }
        }
      }

      const context: LogContext = {
        requestId,
        method: c.req.method,
        path,
        query: redactQuery(query),
        ...(includeHeaders && { headers: redactHeaders(c.req.header()) }),
        status,
        durationMs,
        userAgent: c.req.header('user-agent'),
        contentLength: parseLength(c.req.header('content-length')),
        ...(error && { errorCode: error.code, errorMessage: error.message }),
        ...(error?.stack !== undefined && { stack: error.stack }),
      };

      if (status >= 500) {
        log.error('Request failed', context);
      } else if (status >= 400) {
        log.warn('Request rejected', context);
      } else {
        log.info('Request completed', context);
      }
    }
  });
}
