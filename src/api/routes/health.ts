/**
 * Health Check Routes
 *
 * Endpoints:
 * - GET /health - Health status with registered checks
 * - GET /health/live - Liveness probe
 */

import { Hono } from 'hono';
import { PDFDocument } from 'pdf-lib';
import type { ApiEnv } from '../types.js';

export interface HealthCheckResult {
  status: 'healthy' | 'unhealthy' | 'degraded';
  message?: string;
  latencyMs?: number;
}

type HealthCheckFn = () => Promise<HealthCheckResult>;

const healthChecks: Map<string, HealthCheckFn> = new Map();

export function registerHealthCheck(name: string, fn: HealthCheckFn): void {
  healthChecks.set(name, fn);
}

export function unregisterHealthCheck(name: string): void {
  healthChecks.delete(name);
}

/**
 * The PDF engine can build and serialize a document
 */
registerHealthCheck('pdf-engine', async () => {
  const start = Date.now();
  const doc = await PDFDocument.create();
  doc.addPage();
  await doc.save();
  return { status: 'healthy', latencyMs: Date.now() - start };
});

async function runHealthChecks(): Promise<{
  status: HealthCheckResult['status'];
  checks: Record<string, HealthCheckResult>;
}> {
  const entries = await Promise.all(
    Array.from(healthChecks.entries()).map(async ([name, fn]): Promise<[string, HealthCheckResult]> => {
      try {
        return [name, await fn()];
      } catch (error) {
        return [name, { status: 'unhealthy', message: error instanceof Error ? error.message : 'Check failed' }];
      }
    })
  );

  const statuses = entries.map(([, result]) => result.status);
  const status = statuses.includes('unhealthy') ? 'unhealthy' : statuses.includes('degraded') ? 'degraded' : 'healthy';
  return { status, checks: Object.fromEntries(entries) };
}

const health = new Hono<ApiEnv>();

/**
 * GET /health
 */
health.get('/', async (c) => {
  const { status, checks } = await runHealthChecks();
  const mem = process.memoryUsage();

  return c.json(
    {
      status,
      version: process.env.npm_package_version ?? '0.1.0',
      uptime: Math.floor(process.uptime()),
      checks,
      memory: {
        heapUsed: Math.round(mem.heapUsed / 1024 / 1024),
        rss: Math.round(mem.rss / 1024 / 1024),
      },
    },
    status === 'unhealthy' ? 503 : 200
  );
});

/**
 * GET /health/live
 */
health.get('/live', (c) => {
  return c.json({ alive: true });
});

export { health };
