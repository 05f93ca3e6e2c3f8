/**
 * Form Analyzer
 *
 * Entry point of the detection pipeline:
 *
 *   bytes → load → { widget scan, layout inference } → classify → merge → report
 *
 * Loading and page content reads are asynchronous. The pdf-lib document and
 * the pdf.js view of it live for one call.
 */

import type {
  AnalysisDiagnostic,
  AnalysisOutcome,
  RawWidget,
} from '../types/form-fields.js';
import { DocumentLoadError } from '../types/errors.js';
import {
  parseAnalysisOptions,
  type AnalysisOptions,
  type AnalysisOptionsInput,
} from '../utils/config-schemas.js';
import { formatBox } from '../utils/geometry.js';
import { logger, type Logger } from '../utils/logger.js';
import { loadDocument, type LoadedDocument } from './document-loader.js';
import { mergeFields, type ClassifiedCandidate, type ClassifiedWidget } from './field-merger.js';
import { inferLayoutCandidates } from './layout-inferencer.js';
import { PageContentReader } from './page-content.js';
import { buildReport, detectFormNumber } from './report-builder.js';
import { classifyPattern, classifyWidget, isResolved } from './type-classifier.js';
import { scanWidgets } from './widget-scanner.js';

function classifyWidgets(widgets: readonly RawWidget[], diagnostics: AnalysisDiagnostic[], log: Logger): ClassifiedWidget[] {
  const classified: ClassifiedWidget[] = [];
  for (const widget of widgets) {
    const fieldType = classifyWidget(widget.typeCode, widget.flags);
    if (isResolved(fieldType)) {
      classified.push({ widget, fieldType });
      continue;
    }
    const code = widget.typeCode === '' ? 'none' : widget.typeCode;
    const message = `Page ${widget.pageIndex}: widget ${widget.name} at ${formatBox(widget.bbox)} has unsupported field type ${code}; dropped`;
    diagnostics.push({ kind: 'unresolved-type', message, pageIndex: widget.pageIndex, bbox: widget.bbox });
    log.warn(message, { pageIndex: widget.pageIndex });
  }
  return classified;
}

async function readFirstPageText(doc: LoadedDocument, content: PageContentReader, log: Logger): Promise<string[]> {
  if (doc.pageCount === 0) return [];
  try {
    return (await content.readText(0)).map((run) => run.text);
  } catch (error) {
    log.debug('First page text unavailable for form number detection', {
      error: error instanceof Error ? error.message : String(error),
    });
    return [];
  }
}

async function runAnalysis(pdfBytes: Uint8Array, options: AnalysisOptions, log: Logger): Promise<AnalysisOutcome> {
  const startTime = Date.now();

  let doc: LoadedDocument;
  try {
    doc = await loadDocument(pdfBytes);
  } catch (error) {
    if (error instanceof DocumentLoadError) {
      log.info('Document rejected', { reason: error.reason, message: error.message });
      return { success: false, error: error.toLoadError() };
    }
    throw error;
  }

  const diagnostics: AnalysisDiagnostic[] = [];

  const scan = scanWidgets(doc);
  diagnostics.push(...scan.diagnostics);

  const content = await PageContentReader.open(doc, { maxPageContentBytes: options.maxPageContentBytes });
  const candidates: ClassifiedCandidate[] = [];
  let firstPageText: string[];
  try {
    if (options.enableLayoutInference) {
      const inference = await inferLayoutCandidates(doc, {
        thresholds: options.inference,
        minConfidence: options.minInferenceConfidence,
        content,
      });
      diagnostics.push(...inference.diagnostics);
      for (const candidate of inference.candidates) {
        candidates.push({ candidate, fieldType: classifyPattern(candidate.patternKind) });
      }
    }
    firstPageText = await readFirstPageText(doc, content, log);
  } finally {
    await content.close();
  }

  const widgets = classifyWidgets(scan.widgets, diagnostics, log);
  const fields = mergeFields(widgets, candidates, { iouThreshold: options.iouMergeThreshold });

  const report = buildReport(fields, diagnostics, {
    pageSizes: doc.pageSizes,
    hasAcroForm: doc.acroForm !== undefined,
    title: doc.title,
    author: doc.author,
    formNumber: detectFormNumber([doc.title, ...firstPageText]),
  });

  log.timed('Analysis complete', startTime, {
    pageCount: doc.pageCount,
    totalFields: report.totalFields,
    warnings: report.warnings.length,
  });

  return { success: true, report };
}

/**
 * Analyze a PDF's form fields.
 *
 * A document that cannot be opened resolves to `{ success: false, error }`.
 * Invalid options reject with AnalysisOptionsError.
 */
export async function analyzeForm(pdfBytes: Uint8Array, options: AnalysisOptionsInput = {}): Promise<AnalysisOutcome> {
  return runAnalysis(pdfBytes, parseAnalysisOptions(options), logger.analyzer);
}

/**
 * Analyzer bound to one set of options, validated up front
 */
export class FormFieldAnalyzer {
  readonly options: AnalysisOptions;
  private readonly log: Logger;

  /**
   * @throws AnalysisOptionsError
   */
  constructor(options: AnalysisOptionsInput = {}, log: Logger = logger.analyzer) {
    this.options = parseAnalysisOptions(options);
    this.log = log;
  }

  analyze(pdfBytes: Uint8Array): Promise<AnalysisOutcome> {
    return runAnalysis(pdfBytes, this.options, this.log);
  }
}

export function createFormFieldAnalyzer(options?: AnalysisOptionsInput, log?: Logger): FormFieldAnalyzer {
  return new FormFieldAnalyzer(options, log);
}
