/**
 * Widget Scanner
 *
 * Reads interactive widget annotations from each page's /Annots array and
 * resolves their inherited field attributes (/FT, /Ff) and fully qualified
 * names through the /Parent chain. Widgets listed in the AcroForm /Fields
 * tree but missing from every page's /Annots are placed through their /P
 * page reference.
 */

import {
  PDFArray,
  PDFDict,
  PDFHexString,
  PDFName,
  PDFNumber,
  PDFString,
  type PDFObject,
} from 'pdf-lib';
import type { AnalysisDiagnostic, BoundingBox, RawWidget } from '../types/form-fields.js';
import { formatBox, normalizeBox } from '../utils/geometry.js';
import { logger } from '../utils/logger.js';
import type { LoadedDocument } from './document-loader.js';

const log = logger.widgetScanner;

/** Ff bit 1 */
export const FLAG_READ_ONLY = 1 << 0;
/** Ff bit 2 */
export const FLAG_REQUIRED = 1 << 1;
/** Ff bit 16 */
export const FLAG_RADIO = 1 << 15;
/** Ff bit 17 */
export const FLAG_PUSHBUTTON = 1 << 16;

/** Guards against malformed trees that nest forever */
const MAX_FIELD_TREE_DEPTH = 32;

export interface WidgetScanResult {
  widgets: RawWidget[];
  diagnostics: AnalysisDiagnostic[];
}

// ============================================
// VALUE READERS
// ============================================

const name = (key: string) => PDFName.of(key);

function readText(value: PDFObject | undefined): string | undefined {
  if (value instanceof PDFString || value instanceof PDFHexString) {
    return value.decodeText();
  }
  return undefined;
}

/**
 * /V and /DV hold a name for buttons, a string for text, and an array for
 * multi-select choices.
 */
function readValue(value: PDFObject | undefined): string | undefined {
  if (value instanceof PDFName) {
    const text = value.decodeText();
    return text === 'Off' ? undefined : text;
  }
  if (value instanceof PDFArray) {
    const parts: string[] = [];
    for (let i = 0; i < value.size(); i++) {
      const part = readText(value.lookup(i));
      if (part !== undefined) parts.push(part);
    }
    return parts.length > 0 ? parts.join(', ') : undefined;
  }
  const text = readText(value);
  return text === '' ? undefined : text;
}

/**
 * /Opt entries are either display strings or [export, display] pairs.
 */
function readOptions(value: PDFObject | undefined): string[] | undefined {
  if (!(value instanceof PDFArray)) return undefined;
  const options: string[] = [];
  for (let i = 0; i < value.size(); i++) {
    const entry = value.lookup(i);
    if (entry instanceof PDFArray) {
      const display = readText(entry.lookup(1)) ?? readText(entry.lookup(0));
      if (display !== undefined) options.push(display);
    } else {
      const display = readText(entry);
      if (display !== undefined) options.push(display);
    }
  }
  return options.length > 0 ? options : undefined;
}

function readRect(widget: PDFDict): BoundingBox | undefined {
  const rect = widget.lookup(name('Rect'));
  if (!(rect instanceof PDFArray) || rect.size() !== 4) return undefined;
  const values: number[] = [];
  for (let i = 0; i < 4; i++) {
    const value = rect.lookup(i);
    if (!(value instanceof PDFNumber) || !Number.isFinite(value.asNumber())) return undefined;
    values.push(value.asNumber());
  }
  return normalizeBox(values[0], values[1], values[2], values[3]);
}

function isWidget(dict: PDFDict): boolean {
  return dict.lookup(name('Subtype')) === name('Widget');
}

// ============================================
// INHERITANCE
// ============================================

interface FieldAttributes {
  typeCode: string;
  qualifiedName: string;
  flags: number;
  tooltip?: string;
  options?: string[];
  value?: string;
}

/**
 * Walk from the widget up through /Parent. Inheritable attributes take the
 * nearest definition; name parts are joined root first.
 */
function resolveFieldAttributes(widget: PDFDict): FieldAttributes {
  const nameParts: string[] = [];
  const visited = new Set<PDFDict>();
  let typeCode: string | undefined;
  let flags: number | undefined;
  let tooltip: string | undefined;
  let options: string[] | undefined;
  let value: string | undefined;

  let node: PDFDict | undefined = widget;
  while (node && !visited.has(node) && visited.size < MAX_FIELD_TREE_DEPTH) {
    visited.add(node);

    const partialName = readText(node.lookup(name('T')));
    if (partialName !== undefined && partialName !== '') nameParts.unshift(partialName);

    if (typeCode === undefined) {
      const ft = node.lookup(name('FT'));
      if (ft instanceof PDFName) typeCode = ft.asString();
    }
    if (flags === undefined) {
      const ff = node.lookup(name('Ff'));
      if (ff instanceof PDFNumber) flags = ff.asNumber();
    }
    tooltip ??= readText(node.lookup(name('TU')));
    options ??= readOptions(node.lookup(name('Opt')));
    value ??= readValue(node.lookup(name('V'))) ?? readValue(node.lookup(name('DV')));

    const parent: PDFObject | undefined = node.lookup(name('Parent'));
    node = parent instanceof PDFDict ? parent : undefined;
  }

  return {
    typeCode: typeCode ?? '',
    qualifiedName: nameParts.join('.'),
    flags: flags ?? 0,
    tooltip,
    options,
    value,
  };
}

export function synthesizedWidgetName(pageIndex: number, widgetIndex: number): string {
  return `field_${pageIndex}_${widgetIndex}`;
}

function buildWidget(dict: PDFDict, pageIndex: number, widgetIndex: number, bbox: BoundingBox): RawWidget {
  const attributes = resolveFieldAttributes(dict);
  const nameSynthesized = attributes.qualifiedName === '';
  const flags = attributes.flags;

  return {
    typeCode: attributes.typeCode,
    name: nameSynthesized ? synthesizedWidgetName(pageIndex, widgetIndex) : attributes.qualifiedName,
    nameSynthesized,
    pageIndex,
    bbox,
    flags,
    required: (flags & FLAG_REQUIRED) !== 0,
    readOnly: (flags & FLAG_READ_ONLY) !== 0,
    ...(attributes.tooltip !== undefined && { tooltip: attributes.tooltip }),
    ...(attributes.options !== undefined && { options: attributes.options }),
    ...(attributes.value !== undefined && { value: attributes.value }),
  };
}

// ============================================
// SCANNER
// ============================================

class WidgetCollector {
  readonly widgets: RawWidget[] = [];
  readonly diagnostics: AnalysisDiagnostic[] = [];
  readonly seen = new Set<PDFDict>();
  private readonly widgetCountByPage = new Map<number, number>();

  nextWidgetIndex(pageIndex: number): number {
    const index = this.widgetCountByPage.get(pageIndex) ?? 0;
    this.widgetCountByPage.set(pageIndex, index + 1);
    return index;
  }

  addWidget(dict: PDFDict, pageIndex: number): void {
    this.seen.add(dict);
    const widgetIndex = this.nextWidgetIndex(pageIndex);
    const bbox = readRect(dict);
    if (!bbox) {
      this.warn({
        kind: 'page-scan',
        pageIndex,
        message: `Page ${pageIndex}: widget ${widgetIndex} has no valid /Rect; skipped`,
      });
      return;
    }
    this.widgets.push(buildWidget(dict, pageIndex, widgetIndex, bbox));
  }

  warn(diagnostic: AnalysisDiagnostic): void {
    this.diagnostics.push(diagnostic);
    log.warn(diagnostic.message, { kind: diagnostic.kind, pageIndex: diagnostic.pageIndex });
  }
}

function scanPage(collector: WidgetCollector, page: PDFDict, pageIndex: number): void {
  const annots = page.lookup(name('Annots'));
  if (annots === undefined) return;
  if (!(annots instanceof PDFArray)) {
    collector.warn({
      kind: 'page-scan',
      pageIndex,
      message: `Page ${pageIndex}: /Annots is not an array; page skipped`,
    });
    return;
  }

  for (let i = 0; i < annots.size(); i++) {
    const annot = annots.lookup(i);
    if (annot instanceof PDFDict && isWidget(annot) && !collector.seen.has(annot)) {
      collector.addWidget(annot, pageIndex);
    }
  }
}

/**
 * Terminal nodes of the /Fields tree that are (or carry) widget annotations
 */
function collectFieldTreeWidgets(acroForm: PDFDict): PDFDict[] {
  const found: PDFDict[] = [];
  const visited = new Set<PDFDict>();

  const visit = (node: PDFDict, depth: number) => {
    if (visited.has(node) || depth > MAX_FIELD_TREE_DEPTH) return;
    visited.add(node);

    const kids = node.lookup(name('Kids'));
    if (kids instanceof PDFArray && kids.size() > 0) {
      for (let i = 0; i < kids.size(); i++) {
        const kid = kids.lookup(i);
        if (kid instanceof PDFDict) visit(kid, depth + 1);
      }
      return;
    }
    if (isWidget(node) || node.lookup(name('Rect')) !== undefined) {
      found.push(node);
    }
  };

  const fields = acroForm.lookup(name('Fields'));
  if (fields instanceof PDFArray) {
    for (let i = 0; i < fields.size(); i++) {
      const field = fields.lookup(i);
      if (field instanceof PDFDict) visit(field, 0);
    }
  }
  return found;
}

function recoverOrphans(collector: WidgetCollector, doc: LoadedDocument): void {
  if (!doc.acroForm) return;

  const pageIndexByNode = new Map<PDFDict, number>();
  doc.pages.forEach((page, index) => pageIndexByNode.set(page.node, index));

  for (const widget of collectFieldTreeWidgets(doc.acroForm)) {
    if (collector.seen.has(widget)) continue;

    const pageRef = widget.lookup(name('P'));
    const pageIndex = pageRef instanceof PDFDict ? pageIndexByNode.get(pageRef) : undefined;
    if (pageIndex === undefined) {
      collector.seen.add(widget);
      const fieldName = resolveFieldAttributes(widget).qualifiedName || '(unnamed)';
      const bbox = readRect(widget);
      collector.warn({
        kind: 'unplaced-widget',
        message: `Widget ${fieldName} is not attached to any page${bbox ? ` at ${formatBox(bbox)}` : ''}; skipped`,
        ...(bbox && { bbox }),
      });
      continue;
    }

    log.debug('Recovered widget missing from page /Annots', { pageIndex });
    collector.addWidget(widget, pageIndex);
  }
}

/**
 * Enumerate every widget in the document, page by page in /Annots order.
 */
export function scanWidgets(doc: LoadedDocument): WidgetScanResult {
  const collector = new WidgetCollector();

  doc.pages.forEach((page, pageIndex) => {
    const widgetsBefore = collector.widgets.length;
    try {
      scanPage(collector, page.node, pageIndex);
    } catch (error) {
      collector.widgets.length = widgetsBefore;
      collector.warn({
        kind: 'page-scan',
        pageIndex,
        message: `Page ${pageIndex}: annotations could not be read (${error instanceof Error ? error.message : String(error)})`,
      });
    }
  });

  try {
    recoverOrphans(collector, doc);
  } catch (error) {
    collector.warn({
      kind: 'page-scan',
      message: `Form field tree could not be read (${error instanceof Error ? error.message : String(error)})`,
    });
  }

  log.debug('Scanned widgets', { widgetCount: collector.widgets.length, pageCount: doc.pageCount });

  return { widgets: collector.widgets, diagnostics: collector.diagnostics };
}
