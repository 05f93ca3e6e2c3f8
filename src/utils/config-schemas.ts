/**
 * Configuration Schemas
 *
 * Centralized Zod schemas for runtime validation of analysis options and of
 * the server/log settings read from the environment.
 */

import { z } from 'zod';

// ============================================
// HELPER SCHEMAS
// ============================================

/**
 * Schema for parsing a string as a boolean.
 * Recognizes 'true', '1', 'yes' as true; everything else as false.
 */
export const booleanStringSchema = z
  .string()
  .optional()
  .transform((val) => {
    if (!val) return false;
    return ['true', '1', 'yes'].includes(val.toLowerCase());
  });

/**
 * Schema for parsing a string as an integer with bounds.
 */
export function integerStringSchema(options: { min?: number; max?: number; default: number }) {
  const { min, max } = options;
  let schema = z.coerce.number().int();

  if (min !== undefined) schema = schema.min(min);
  if (max !== undefined) schema = schema.max(max);

  return schema.default(options.default);
}

/**
 * Schema for a float between 0 and 1 (ratio/confidence).
 */
export function rateSchema(defaultVal: number) {
  return z.number().min(0).max(1).default(defaultVal);
}

const positive = () => z.number().positive();

// ============================================
// LOG LEVEL SCHEMA
// ============================================

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);
export type LogLevel = z.infer<typeof logLevelSchema>;

export const logConfigSchema = z.object({
  level: logLevelSchema.default('info'),
  prettyPrint: booleanStringSchema,
});

export type LogConfig = z.infer<typeof logConfigSchema>;

// ============================================
// LAYOUT INFERENCE THRESHOLDS
// ============================================

/**
 * Geometry and scoring thresholds for layout inference. Units are PDF points
 * unless stated otherwise. The defaults were tuned on typical government and
 * brokerage forms; treat them as starting points.
 */
export const inferenceThresholdsSchema = z
  .object({
    /** Smallest rectangle area considered a field */
    minBoxArea: positive().default(25),
    /** Largest rectangle area considered a field (excludes page frames) */
    maxBoxArea: positive().default(50000),
    /** Tallest rectangle considered a single field */
    maxBoxHeight: positive().default(100),
    /** Narrowest non-square box that still reads as a text input */
    minTextBoxWidth: positive().default(20),
    /** Shortest non-square box that still reads as a text input */
    minTextBoxHeight: positive().default(8),
    /** Width / height bounds for any box */
    minAspectRatio: positive().default(0.5),
    maxAspectRatio: positive().default(40),
    /** Side bounds for checkbox squares */
    checkboxMinSide: positive().default(5),
    checkboxMaxSide: positive().default(25),
    /** How far width / height may stray from 1 for a square */
    checkboxAspectTolerance: z.number().min(0).max(1).default(0.3),
    /** Rectangles thinner than this are rules, not boxes */
    maxLineThickness: positive().default(3),
    /** Length bounds for fill-in-the-blank lines */
    minLineLength: positive().default(30),
    maxLineLength: positive().default(400),
    /** Allowed vertical drift for a "horizontal" line */
    maxLineTilt: z.number().min(0).default(1.5),
    /** Maximum distance between a field and its label */
    labelGap: positive().default(40),
    /** Height of the writing area above a blank line */
    blankHeight: positive().default(14),
  })
  .superRefine((t, ctx) => {
    if (t.minBoxArea > t.maxBoxArea) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['minBoxArea'], message: 'must not exceed maxBoxArea' });
    }
    if (t.minAspectRatio > t.maxAspectRatio) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['minAspectRatio'], message: 'must not exceed maxAspectRatio' });
    }
    if (t.checkboxMinSide > t.checkboxMaxSide) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['checkboxMinSide'], message: 'must not exceed checkboxMaxSide' });
    }
    if (t.minLineLength > t.maxLineLength) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['minLineLength'], message: 'must not exceed maxLineLength' });
    }
  });

export type InferenceThresholds = z.output<typeof inferenceThresholdsSchema>;

// ============================================
// ANALYSIS OPTIONS
// ============================================

export const analysisOptionsSchema = z
  .object({
    enableLayoutInference: z.boolean().default(true),
    iouMergeThreshold: rateSchema(0.5),
    minInferenceConfidence: rateSchema(0.4),
    /** Bytes a page's content may reach once its Form XObjects are inlined */
    maxPageContentBytes: z.number().int().positive().default(8 * 1024 * 1024),
    inference: inferenceThresholdsSchema.default({}),
  })
  .strict();

/** Options as accepted from callers (everything optional) */
export type AnalysisOptionsInput = z.input<typeof analysisOptionsSchema>;
/** Options after defaults are applied */
export type AnalysisOptions = z.output<typeof analysisOptionsSchema>;

// ============================================
// API SERVER CONFIGURATION
// ============================================

export const serverConfigSchema = z.object({
  port: integerStringSchema({ min: 1, max: 65535, default: 3001 }),
  host: z.string().min(1).default('0.0.0.0'),
  maxUploadBytes: integerStringSchema({ min: 1024, default: 20 * 1024 * 1024 }),
});

export type ServerConfig = z.infer<typeof serverConfigSchema>;

// ============================================
// ERROR FORMATTING
// ============================================

/**
 * Format Zod validation errors into readable messages.
 */
export function formatConfigErrors(error: z.ZodError<unknown>): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      return `  - ${path}: ${issue.message}`;
    })
    .join('\n');
}

/**
 * Create a configuration validation error with helpful messages.
 */
export class ConfigValidationError extends Error {
  constructor(
    public readonly section: string,
    public readonly zodError: z.ZodError
  ) {
    const formatted = formatConfigErrors(zodError);
    super(`Configuration validation failed for ${section}:\n${formatted}`);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Raised when the options passed to the analyzer are out of range.
 */
export class AnalysisOptionsError extends ConfigValidationError {
  constructor(zodError: z.ZodError) {
    super('analysis options', zodError);
    this.name = 'AnalysisOptionsError';
  }
}

/**
 * Apply defaults to caller options, throwing AnalysisOptionsError when invalid.
 */
export function parseAnalysisOptions(input: AnalysisOptionsInput = {}): AnalysisOptions {
  const result = analysisOptionsSchema.safeParse(input);
  if (!result.success) {
    throw new AnalysisOptionsError(result.error);
  }
  return result.data;
}
