/**
 * Error Taxonomy Types and Classification
 *
 * Provides structured error responses with:
 * - Error categories for high-level classification
 * - Error codes for programmatic handling
 * - HTTP status mapping for the API surface
 * - Retryability indicators
 */

import type { LoadError, LoadErrorReason } from './form-fields.js';

/**
 * High-level error categories for classification
 */
export type ErrorCategory =
  | 'input'     // Malformed request payloads
  | 'document'  // The uploaded bytes are not an analyzable PDF
  | 'config'    // Invalid analysis options
  | 'internal'; // Server-side internal errors

/**
 * Machine-readable error codes for programmatic handling
 */
export type ErrorCode =
  // Input errors
  | 'INVALID_INPUT'
  | 'INVALID_BASE64'
  | 'PAYLOAD_TOO_LARGE'
  | 'NOT_FOUND'
  // Document errors
  | 'PDF_NOT_A_PDF'
  | 'PDF_ENCRYPTED'
  | 'PDF_CORRUPT'
  // Config errors
  | 'CONFIG_INVALID_OPTION'
  // Internal errors
  | 'INTERNAL_ERROR';

/**
 * HTTP statuses the API answers errors with
 */
export type ErrorHttpStatus = 400 | 404 | 413 | 422 | 500;

/**
 * Structured error response
 */
export interface StructuredError {
  /** Human-readable error message */
  message: string;

  category: ErrorCategory;

  code: ErrorCode;

  httpStatus: ErrorHttpStatus;

  /** Whether retrying the same request can succeed */
  retryable: boolean;

  /** Load failure reason, for document errors */
  reason?: LoadErrorReason;

  /** Individual validation problems, for input and config errors */
  details?: string[];
}

export interface ErrorClassification {
  category: ErrorCategory;
  code: ErrorCode;
  httpStatus: ErrorHttpStatus;
}

/**
 * Thrown by the document loader; converted to a LoadError at the pipeline
 * boundary so callers receive a value rather than an exception.
 */
export class DocumentLoadError extends Error {
  constructor(
    public readonly reason: LoadErrorReason,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'DocumentLoadError';
  }

  toLoadError(): LoadError {
    return { reason: this.reason, message: this.message };
  }
}

/**
 * Thrown when one page's content cannot be read: a Form XObject that draws
 * itself, content past the page budget, or a stream that cannot be decoded.
 * The page is reported with a page-scan diagnostic and skipped.
 */
export class PageContentError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PageContentError';
  }
}

/**
 * Classify a load failure reason
 */
export function classifyLoadError(reason: LoadErrorReason): ErrorClassification {
  switch (reason) {
    case 'not-a-pdf':
      return { category: 'document', code: 'PDF_NOT_A_PDF', httpStatus: 422 };
    case 'encrypted':
      return { category: 'document', code: 'PDF_ENCRYPTED', httpStatus: 422 };
    case 'corrupt':
      return { category: 'document', code: 'PDF_CORRUPT', httpStatus: 422 };
  }
}

/**
 * Classify an error code that does not come from a load failure
 */
export function classifyErrorCode(code: Exclude<ErrorCode, 'PDF_NOT_A_PDF' | 'PDF_ENCRYPTED' | 'PDF_CORRUPT'>): ErrorClassification {
  switch (code) {
    case 'INVALID_INPUT':
    case 'INVALID_BASE64':
      return { category: 'input', code, httpStatus: 400 };
    case 'PAYLOAD_TOO_LARGE':
      return { category: 'input', code, httpStatus: 413 };
    case 'NOT_FOUND':
      return { category: 'input', code, httpStatus: 404 };
    case 'CONFIG_INVALID_OPTION':
      return { category: 'config', code, httpStatus: 400 };
    case 'INTERNAL_ERROR':
      return { category: 'internal', code, httpStatus: 500 };
  }
}

/**
 * Only internal errors are worth retrying; everything else depends on the
 * request itself.
 */
export function isRetryable(category: ErrorCategory): boolean {
  return category === 'internal';
}

/**
 * Build a structured error from a classification
 */
export function buildStructuredError(
  message: string,
  classification: ErrorClassification,
  extras: { reason?: LoadErrorReason; details?: string[] } = {}
): StructuredError {
  return {
    message,
    category: classification.category,
    code: classification.code,
    httpStatus: classification.httpStatus,
    retryable: isRetryable(classification.category),
    ...(extras.reason && { reason: extras.reason }),
    ...(extras.details && extras.details.length > 0 && { details: extras.details }),
  };
}

/**
 * Structured error for a LoadError returned by the analyzer
 */
export function structuredLoadError(error: LoadError): StructuredError {
  return buildStructuredError(error.message, classifyLoadError(error.reason), {
    reason: error.reason,
  });
}
