/**
 * pdf-form-inspector
 *
 * Finds the form fields of a PDF: interactive AcroForm widgets, plus fields
 * that are only drawn on the page (boxes, blank lines, underscore runs,
 * ballot boxes), classified into six field types and merged into one report.
 *
 * @example
 * ```ts
 * import { analyzeForm } from 'pdf-form-inspector';
 *
 * const outcome = await analyzeForm(pdfBytes, { minInferenceConfidence: 0.5 });
 * if (outcome.success) {
 *   console.log(outcome.report.countsByType);
 * } else {
 *   console.error(outcome.error.reason);
 * }
 * ```
 */

export { analyzeForm, FormFieldAnalyzer, createFormFieldAnalyzer } from './core/form-analyzer.js';

// Pipeline stages
export { loadDocument, type LoadedDocument } from './core/document-loader.js';
export { scanWidgets, synthesizedWidgetName, type WidgetScanResult } from './core/widget-scanner.js';
export {
  inferLayoutCandidates,
  PATTERN_CONFIDENCE,
  type LayoutInferenceOptions,
  type LayoutInferenceResult,
} from './core/layout-inferencer.js';
export {
  classifyWidget,
  classifyPattern,
  isResolved,
  PATTERN_KINDS,
  WIDGET_TYPE_CODES,
} from './core/type-classifier.js';
export {
  mergeFields,
  compareFieldRecords,
  inferredFieldName,
  type ClassifiedCandidate,
  type ClassifiedWidget,
  type MergeOptions,
} from './core/field-merger.js';
export {
  buildReport,
  buildPageOverlay,
  detectFormNumber,
  fieldsOnPage,
  FIELD_TYPE_COLORS,
  SOURCE_METHOD_STYLES,
  type OverlayOptions,
  type OverlayShape,
  type PageOverlay,
  type PageRenderer,
  type PixelBox,
  type RasterImage,
  type ReportDocumentInfo,
} from './core/report-builder.js';
export {
  PageContentReader,
  DEFAULT_CONTENT_LIMITS,
  measurePageContent,
  type ContentLimits,
  type LineSegment,
  type PagePrimitives,
  type TextRun,
} from './core/page-content.js';

// Types
export * from './types/form-fields.js';
export {
  DocumentLoadError,
  PageContentError,
  buildStructuredError,
  classifyErrorCode,
  classifyLoadError,
  structuredLoadError,
  type ErrorCategory,
  type ErrorCode,
  type ErrorHttpStatus,
  type StructuredError,
} from './types/errors.js';

// Configuration
export {
  AnalysisOptionsError,
  ConfigValidationError,
  analysisOptionsSchema,
  inferenceThresholdsSchema,
  parseAnalysisOptions,
  type AnalysisOptions,
  type AnalysisOptionsInput,
  type InferenceThresholds,
} from './utils/config-schemas.js';
export { configureLogger, Logger, logger } from './utils/logger.js';

// HTTP API
export { createApp, type AppOptions } from './api/app.js';
