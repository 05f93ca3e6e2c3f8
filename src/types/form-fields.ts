/**
 * Form Field Types
 *
 * Data model shared by the detection pipeline: raw widgets read from the
 * AcroForm, candidates inferred from page layout, and the merged field
 * records and report handed back to callers.
 */

/**
 * Public field-type labels. Every field in a report has one of these.
 */
export const FIELD_TYPES = [
  'Text',
  'Checkbox',
  'Radio Button',
  'Dropdown',
  'Signature',
  'Button',
] as const;

export type FieldType = (typeof FIELD_TYPES)[number];

/**
 * Internal marker for detections that cannot be mapped to a FieldType.
 * Never appears in a FieldRecord.
 */
export const UNRESOLVED = 'Unresolved';
export type Unresolved = typeof UNRESOLVED;

export type ClassifiedType = FieldType | Unresolved;

/**
 * How a field was found
 * - widget: interactive AcroForm widget annotation
 * - layout: vector geometry on the page (boxes, lines)
 * - visual: text glyphs on the page (underscore runs, ballot boxes)
 */
export type FieldSourceMethod = 'widget' | 'layout' | 'visual';

export const SOURCE_METHOD_ORDER: readonly FieldSourceMethod[] = ['widget', 'layout', 'visual'];

/**
 * Axis-aligned box in PDF user space (origin bottom-left, points).
 * Always normalized: x0 <= x1 and y0 <= y1.
 */
export interface BoundingBox {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

/**
 * AcroForm field type codes this system understands
 */
export type WidgetTypeCode = '/Tx' | '/Btn' | '/Ch' | '/Sig';

/**
 * A widget annotation as read from the document
 */
export interface RawWidget {
  /** Field type code as found in the file (e.g. "/Tx"); empty when absent */
  readonly typeCode: string;
  /** Fully qualified field name, or a synthesized positional name */
  readonly name: string;
  /** True when the file carries no name and `name` was synthesized */
  readonly nameSynthesized: boolean;
  /** 0-based page index */
  readonly pageIndex: number;
  readonly bbox: BoundingBox;
  /** Field flags (/Ff), inherited through the parent chain */
  readonly flags: number;
  readonly required: boolean;
  readonly readOnly: boolean;
  /** Alternate field name (/TU) */
  readonly tooltip?: string;
  /** Choice options (/Opt) */
  readonly options?: readonly string[];
  /** Current value (/V), falling back to the default value (/DV) */
  readonly value?: string;
}

/**
 * Visual pattern that produced an inferred candidate
 */
export type PatternKind =
  | 'text-box'
  | 'square-box'
  | 'choice-square'
  | 'underline'
  | 'signature-line'
  | 'underscore-run'
  | 'date-mask'
  | 'dot-leader'
  | 'checkbox-glyph'
  | 'choice-glyph';

export type InferenceMethod = Exclude<FieldSourceMethod, 'widget'>;

/**
 * A field location recovered from page layout
 */
export interface InferredCandidate {
  readonly pageIndex: number;
  readonly bbox: BoundingBox;
  readonly patternKind: PatternKind;
  /** Heuristic confidence in [0, 1] */
  readonly confidence: number;
  readonly method: InferenceMethod;
  /** Nearby text that reads as the field's label */
  readonly label?: string;
}

/**
 * A detected form field, final unit of the report
 */
export interface FieldRecord {
  fieldType: FieldType;
  name: string;
  pageIndex: number;
  bbox: BoundingBox;
  /** Non-empty, duplicate-free, in SOURCE_METHOD_ORDER */
  sourceMethods: FieldSourceMethod[];
  /** 1 for widget-backed fields, otherwise the best inference confidence */
  confidence: number;
  label?: string;
  required: boolean;
  readOnly: boolean;
  tooltip?: string;
  options?: string[];
  value?: string;
}

/**
 * Kinds of recoverable problems collected during analysis
 * - page-scan: a page's annotations or content could not be read
 * - unresolved-type: a detection could not be classified and was dropped
 * - unplaced-widget: a form widget is not attached to any page
 */
export type DiagnosticKind = 'page-scan' | 'unresolved-type' | 'unplaced-widget';

export interface AnalysisDiagnostic {
  kind: DiagnosticKind;
  message: string;
  pageIndex?: number;
  bbox?: BoundingBox;
}

/**
 * Size and field count of one page
 */
export interface PageSummary {
  pageIndex: number;
  width: number;
  height: number;
  fieldCount: number;
}

/**
 * Document-level facts gathered while loading
 */
export interface DocumentSummary {
  pageCount: number;
  /** Whether the catalog carries an AcroForm dictionary */
  hasAcroForm: boolean;
  title?: string;
  author?: string;
  /** Form number found in the title or first-page text (e.g. "W-9") */
  formNumber?: string;
}

/**
 * Result of analyzing one document. Read-only once built.
 */
export interface AnalysisReport {
  totalFields: number;
  countsByType: Record<FieldType, number>;
  /** Page index -> number of fields; pages without fields are absent */
  countsByPage: Record<number, number>;
  fields: FieldRecord[];
  /** Human-readable messages of `diagnostics`, in the same order */
  warnings: string[];
  diagnostics: AnalysisDiagnostic[];
  pages: PageSummary[];
  document: DocumentSummary;
}

export type LoadErrorReason = 'not-a-pdf' | 'encrypted' | 'corrupt';

/**
 * Fatal failure to open a document. No partial report accompanies it.
 */
export interface LoadError {
  reason: LoadErrorReason;
  message: string;
}

export type AnalysisOutcome =
  | { success: true; report: AnalysisReport }
  | { success: false; error: LoadError };
