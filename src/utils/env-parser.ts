/**
 * Environment Variable Parser
 *
 * Type-safe parsing of the few environment variables the HTTP server reads.
 * The analysis core never reads the environment; it is configured only
 * through the options passed to analyzeForm().
 */

import {
  logConfigSchema,
  serverConfigSchema,
  ConfigValidationError,
  type LogConfig,
  type ServerConfig,
} from './config-schemas.js';

type Env = Record<string, string | undefined>;

// ============================================
// ENVIRONMENT VARIABLE MAPPING
// ============================================

function mapEnvToLogConfig(env: Env) {
  return {
    level: env.LOG_LEVEL,
    prettyPrint: env.LOG_PRETTY,
  };
}

function mapEnvToServerConfig(env: Env) {
  return {
    port: env.PORT,
    host: env.HOST,
    maxUploadBytes: env.MAX_UPLOAD_BYTES,
  };
}

// ============================================
// CONFIG PARSERS
// ============================================

/**
 * Parse and validate logging configuration from environment.
 */
export function parseLogConfig(env: Env = process.env): LogConfig {
  const result = logConfigSchema.safeParse(mapEnvToLogConfig(env));
  if (!result.success) {
    throw new ConfigValidationError('logging', result.error);
  }
  return result.data;
}

/**
 * Parse and validate HTTP server configuration from environment.
 */
export function parseServerConfig(env: Env = process.env): ServerConfig {
  const result = serverConfigSchema.safeParse(mapEnvToServerConfig(env));
  if (!result.success) {
    throw new ConfigValidationError('server', result.error);
  }
  return result.data;
}
