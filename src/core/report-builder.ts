/**
 * Report Builder
 *
 * Aggregates merged field records into the analysis report, and turns a
 * page's fields into overlay shapes for an external renderer.
 */

import type {
  AnalysisDiagnostic,
  AnalysisReport,
  DocumentSummary,
  FieldRecord,
  FieldSourceMethod,
  FieldType,
  PageSummary,
} from '../types/form-fields.js';

/**
 * Document facts the report needs from the loaded document
 */
export interface ReportDocumentInfo {
  pageSizes: ReadonlyArray<{ width: number; height: number }>;
  hasAcroForm: boolean;
  title?: string;
  author?: string;
  formNumber?: string;
}

// ============================================
// FORM NUMBER DETECTION
// ============================================

const FORM_NUMBER_PATTERNS = [
  // US: Form W-9, Form 1040, Form I-94
  /\bform\s+([A-Z]{0,2}-?\d+[A-Z]?(?:-[A-Z]+)?)\b/i,
  // UK: Form FLR(M), Form SET(O)
  /\bform\s+([A-Z]{2,4}\s*\([A-Z]\))/i,
  // Spanish: Modelo 790
  /\b(?:modelo|formulario)\s*(\d+[A-Z]?)\b/i,
  // French: Cerfa n°12345
  /\bcerfa\s*(?:n[°o]?\s*)?(\d+\*?\d*)/i,
  // German: Formular 123, Antrag 456
  /\b(?:formular|antrag)\s*(?:nr\.?\s*)?(\d+[A-Z]?)\b/i,
];

/**
 * First form number mentioned in the given texts, in order
 */
export function detectFormNumber(texts: ReadonlyArray<string | undefined>): string | undefined {
  for (const text of texts) {
    if (!text) continue;
    for (const pattern of FORM_NUMBER_PATTERNS) {
      const match = pattern.exec(text);
      if (match?.[1]) return match[1].toUpperCase();
    }
  }
  return undefined;
}

// ============================================
// REPORT
// ============================================

function emptyTypeCounts(): Record<FieldType, number> {
  return {
    Text: 0,
    Checkbox: 0,
    'Radio Button': 0,
    Dropdown: 0,
    Signature: 0,
    Button: 0,
  };
}

/**
 * Build the report. Fields are copied as given, in the given order.
 */
export function buildReport(
  fields: readonly FieldRecord[],
  diagnostics: readonly AnalysisDiagnostic[],
  document: ReportDocumentInfo
): AnalysisReport {
  const countsByType = emptyTypeCounts();
  const countsByPage: Record<number, number> = {};

  for (const field of fields) {
    countsByType[field.fieldType]++;
    countsByPage[field.pageIndex] = (countsByPage[field.pageIndex] ?? 0) + 1;
  }

  const pages: PageSummary[] = document.pageSizes.map((size, pageIndex) => ({
    pageIndex,
    width: size.width,
    height: size.height,
    fieldCount: countsByPage[pageIndex] ?? 0,
  }));

  const summary: DocumentSummary = {
    pageCount: document.pageSizes.length,
    hasAcroForm: document.hasAcroForm,
    ...(document.title !== undefined && { title: document.title }),
    ...(document.author !== undefined && { author: document.author }),
    ...(document.formNumber !== undefined && { formNumber: document.formNumber }),
  };

  return {
    totalFields: fields.length,
    countsByType,
    countsByPage,
    fields: fields.map((field) => ({ ...field })),
    warnings: diagnostics.map((diagnostic) => diagnostic.message),
    diagnostics: diagnostics.map((diagnostic) => ({ ...diagnostic })),
    pages,
    document: summary,
  };
}

export function fieldsOnPage(report: AnalysisReport, pageIndex: number): FieldRecord[] {
  return report.fields.filter((field) => field.pageIndex === pageIndex);
}

// ============================================
// OVERLAY
// ============================================

export const FIELD_TYPE_COLORS: Record<FieldType, string> = {
  Text: '#FF6B6B',
  Checkbox: '#4ECDC4',
  'Radio Button': '#45B7D1',
  Dropdown: '#96CEB4',
  Signature: '#FFEAA7',
  Button: '#DDA0DD',
};

export const SOURCE_METHOD_STYLES: Record<FieldSourceMethod, { strokeWidth: number; opacity: number }> = {
  widget: { strokeWidth: 3, opacity: 0.8 },
  layout: { strokeWidth: 2, opacity: 0.6 },
  visual: { strokeWidth: 1, opacity: 0.5 },
};

/**
 * Rectangle in raster space: origin top-left, y grows downwards, pixels
 */
export interface PixelBox {
  left: number;
  top: number;
  width: number;
  height: number;
}

export interface OverlayShape {
  name: string;
  fieldType: FieldType;
  box: PixelBox;
  strokeColor: string;
  strokeWidth: number;
  /** Outline opacity, scaled by confidence */
  strokeOpacity: number;
  fillOpacity: number;
  confidence: number;
}

export interface PageOverlay {
  pageIndex: number;
  zoom: number;
  /** Raster size of the page at this zoom */
  width: number;
  height: number;
  shapes: OverlayShape[];
}

export interface OverlayOptions {
  /** Pixels per PDF point */
  zoom?: number;
}

export const DEFAULT_OVERLAY_ZOOM = 1.5;

const round2 = (n: number) => Math.round(n * 100) / 100;

/**
 * Shapes to draw over a rendering of one page.
 *
 * @throws RangeError when the page does not exist
 */
export function buildPageOverlay(report: AnalysisReport, pageIndex: number, options: OverlayOptions = {}): PageOverlay {
  const zoom = options.zoom ?? DEFAULT_OVERLAY_ZOOM;
  const page = report.pages[pageIndex];
  if (!page) {
    throw new RangeError(`Page ${pageIndex} does not exist (document has ${report.pages.length} pages)`);
  }

  const shapes = fieldsOnPage(report, pageIndex).map((field): OverlayShape => {
    const style = SOURCE_METHOD_STYLES[field.sourceMethods[0] ?? 'visual'];
    const strokeOpacity = round2(style.opacity * field.confidence);
    return {
      name: field.name,
      fieldType: field.fieldType,
      box: {
        left: round2(field.bbox.x0 * zoom),
        top: round2((page.height - field.bbox.y1) * zoom),
        width: round2((field.bbox.x1 - field.bbox.x0) * zoom),
        height: round2((field.bbox.y1 - field.bbox.y0) * zoom),
      },
      strokeColor: FIELD_TYPE_COLORS[field.fieldType],
      strokeWidth: style.strokeWidth,
      strokeOpacity,
      fillOpacity: round2(strokeOpacity / 4),
      confidence: field.confidence,
    };
  });

  return {
    pageIndex,
    zoom,
    width: round2(page.width * zoom),
    height: round2(page.height * zoom),
    shapes,
  };
}

// ============================================
// RENDERER COLLABORATOR
// ============================================

export interface RasterImage {
  mimeType: string;
  width: number;
  height: number;
  data: Uint8Array;
}

/**
 * Rasterizes a page. Implemented outside this package (e.g. by a pdf.js or
 * MuPDF service); the analyzer itself never renders.
 */
export interface PageRenderer {
  renderPage(pdfBytes: Uint8Array, pageIndex: number, zoom: number): Promise<RasterImage>;
}
