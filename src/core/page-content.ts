/**
 * Page Content Reader
 *
 * Produces the drawing primitives layout inference works from: axis-aligned
 * rectangles, straight line segments and positioned text runs, all in page
 * user space. pdf.js parses the content. Its operator list gives the painted
 * paths; its text content gives text measured with the font's own widths and
 * mapped to Unicode through the font's ToUnicode CMap.
 *
 * pdf.js inlines Form XObjects as it builds the operator list, so each page's
 * XObject graph is checked with pdf-lib first. A form that draws itself, or
 * content that would expand past the page budget, fails the page with a
 * PageContentError before pdf.js sees it.
 */

import { createRequire } from 'node:module';
import path from 'node:path';
import {
  PDFArray,
  PDFContentStream,
  PDFDict,
  PDFName,
  PDFRawStream,
  PDFStream,
  decodePDFRawStream,
  type PDFPage,
} from 'pdf-lib';
import {
  AnnotationMode,
  OPS,
  VerbosityLevel,
  getDocument,
  type PDFDocumentProxy,
  type PDFPageProxy,
} from 'pdfjs-dist/legacy/build/pdf.mjs';
import type { BoundingBox } from '../types/form-fields.js';
import { PageContentError } from '../types/errors.js';
import {
  IDENTITY_MATRIX,
  boxFromPoints,
  multiplyMatrices,
  transformPoint,
  type Matrix,
} from '../utils/geometry.js';
import { logger } from '../utils/logger.js';
import type { LoadedDocument } from './document-loader.js';

const log = logger.pageContent;

const require = createRequire(import.meta.url);

/** pdf.js loads the standard 14 font programs from its own package */
const STANDARD_FONT_DATA_PATH = `${path.join(path.dirname(require.resolve('pdfjs-dist/package.json')), 'standard_fonts')}${path.sep}`;

// ============================================
// PRIMITIVES
// ============================================

export interface LineSegment {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

export interface TextRun {
  text: string;
  bbox: BoundingBox;
  /** Baseline y of the run's origin */
  baseline: number;
  /** Font size in user space */
  fontSize: number;
}

export interface PagePrimitives {
  rectangles: BoundingBox[];
  segments: LineSegment[];
  textRuns: TextRun[];
}

export function emptyPrimitives(): PagePrimitives {
  return { rectangles: [], segments: [], textRuns: [] };
}

export interface ContentLimits {
  /** Bytes of content a page may reach once its Form XObjects are inlined */
  maxPageContentBytes: number;
}

export const DEFAULT_CONTENT_LIMITS: ContentLimits = {
  maxPageContentBytes: 8 * 1024 * 1024,
};

// ============================================
// FORM XOBJECT BUDGET
// ============================================

/**
 * Decoded bytes of a stream object.
 *
 * @throws when the stream uses a filter pdf-lib cannot decode
 */
function decodeStream(stream: PDFStream): Uint8Array {
  if (stream instanceof PDFRawStream) {
    return decodePDFRawStream(stream).decode();
  }
  if (stream instanceof PDFContentStream) {
    return stream.getUnencodedContents();
  }
  return stream.getContents();
}

function readPageContent(page: PDFPage): Uint8Array[] {
  const contents = page.node.lookup(PDFName.of('Contents'));
  if (contents instanceof PDFStream) return [decodeStream(contents)];
  if (!(contents instanceof PDFArray)) return [];

  const chunks: Uint8Array[] = [];
  for (let i = 0; i < contents.size(); i++) {
    const part = contents.lookup(i);
    if (part instanceof PDFStream) chunks.push(decodeStream(part));
  }
  return chunks;
}

const DRAW_XOBJECT = /\/([^\s/()<>[\]{}%]+)\s+Do(?=[\s/()<>[\]{}%]|$)/g;

function decodeName(raw: string): string {
  return raw.replace(/#([0-9A-Fa-f]{2})/g, (_, hex: string) => String.fromCharCode(parseInt(hex, 16)));
}

/**
 * Names passed to `Do` in a content stream
 */
export function drawnXObjectNames(content: Uint8Array): string[] {
  const source = Buffer.from(content.buffer, content.byteOffset, content.byteLength).toString('latin1');
  return [...source.matchAll(DRAW_XOBJECT)].map((match) => decodeName(match[1]));
}

function lookupForm(resources: PDFDict | undefined, name: string): PDFStream | undefined {
  const xObjects = resources?.lookup(PDFName.of('XObject'));
  if (!(xObjects instanceof PDFDict)) return undefined;
  const stream = xObjects.lookup(PDFName.of(name));
  if (!(stream instanceof PDFStream)) return undefined;
  return stream.dict.lookup(PDFName.of('Subtype')) === PDFName.of('Form') ? stream : undefined;
}

/**
 * Measures a page's content with every Form XObject inlined, the way pdf.js
 * will expand it. Sizes are memoized per form, so a form drawn many times is
 * decoded once.
 */
class FormExpansion {
  private readonly sizes = new Map<PDFStream, number>();
  private readonly drawing = new Set<PDFStream>();

  constructor(private readonly limit: number) {}

  measure(content: Uint8Array, resources: PDFDict | undefined): number {
    let total = content.length;
    for (const name of drawnXObjectNames(content)) {
      const form = lookupForm(resources, name);
      if (!form) continue;
      total += this.measureForm(name, form, resources);
      if (total > this.limit) {
        throw new PageContentError(`content expands past ${this.limit} bytes`);
      }
    }
    return total;
  }

  private measureForm(name: string, form: PDFStream, inherited: PDFDict | undefined): number {
    const known = this.sizes.get(form);
    if (known !== undefined) return known;
    if (this.drawing.has(form)) {
      throw new PageContentError(`Form XObject /${name} draws itself`);
    }

    this.drawing.add(form);
    try {
      const own = form.dict.lookup(PDFName.of('Resources'));
      const size = this.measure(decodeStream(form), own instanceof PDFDict ? own : inherited);
      this.sizes.set(form, size);
      return size;
    } finally {
      this.drawing.delete(form);
    }
  }
}

/**
 * Bytes of page content once its Form XObjects are inlined.
 *
 * @throws PageContentError for a self-drawing form, content past the limit,
 * or a stream that cannot be decoded
 */
export function measurePageContent(page: PDFPage, limits: ContentLimits): number {
  const expansion = new FormExpansion(limits.maxPageContentBytes);
  const resources = page.node.Resources();
  try {
    return readPageContent(page).reduce((total, chunk) => total + expansion.measure(chunk, resources), 0);
  } catch (error) {
    if (error instanceof PageContentError) throw error;
    throw new PageContentError(error instanceof Error ? error.message : String(error), { cause: error });
  }
}

// ============================================
// OPERATOR LIST
// ============================================

interface Subpath {
  points: Array<[number, number]>;
  closed: boolean;
  hasCurve: boolean;
  fromRectangle: boolean;
}

const AXIS_EPSILON = 0.5;
const DESCENT_RATIO = 0.2;
const ASCENT_RATIO = 0.8;

function argumentList(args: unknown): readonly unknown[] {
  return Array.isArray(args) ? args : [];
}

function numbersOf(value: unknown): number[] | undefined {
  const items: readonly unknown[] | undefined =
    value instanceof Float32Array ? Array.from(value) : Array.isArray(value) ? value : undefined;
  if (!items) return undefined;
  const numbers: number[] = [];
  for (const item of items) {
    if (typeof item !== 'number') return undefined;
    numbers.push(item);
  }
  return numbers;
}

function matrixOf(value: unknown): Matrix | undefined {
  const numbers = numbersOf(value);
  if (!numbers || numbers.length !== 6) return undefined;
  const [a, b, c, d, e, f] = numbers;
  return [a, b, c, d, e, f];
}

function samePoint(a: readonly [number, number], b: readonly [number, number]): boolean {
  return Math.abs(a[0] - b[0]) <= AXIS_EPSILON && Math.abs(a[1] - b[1]) <= AXIS_EPSILON;
}

function isAxisAligned(a: readonly [number, number], b: readonly [number, number]): boolean {
  return Math.abs(a[0] - b[0]) <= AXIS_EPSILON || Math.abs(a[1] - b[1]) <= AXIS_EPSILON;
}

/**
 * Walks a pdf.js operator list, tracking the CTM through save/restore,
 * transforms and Form XObjects, and keeps the straight-edged paths that are
 * painted. Paths ended with `n` (clips) and curved subpaths are dropped.
 */
class PathCollector {
  readonly rectangles: BoundingBox[] = [];
  readonly segments: LineSegment[] = [];

  private ctm: Matrix = IDENTITY_MATRIX;
  private readonly ctmStack: Matrix[] = [];
  private subpaths: Subpath[] = [];
  private current: Subpath | null = null;

  replay(fnArray: readonly number[], argsArray: readonly unknown[]): this {
    fnArray.forEach((fn, i) => this.apply(fn, argsArray[i]));
    return this;
  }

  private apply(fn: number, args: unknown): void {
    switch (fn) {
      case OPS.save:
        this.ctmStack.push(this.ctm);
        break;
      case OPS.restore:
        this.ctm = this.ctmStack.pop() ?? this.ctm;
        break;
      case OPS.transform: {
        const matrix = matrixOf(args);
        if (matrix) this.ctm = multiplyMatrices(matrix, this.ctm);
        break;
      }
      case OPS.paintFormXObjectBegin: {
        this.ctmStack.push(this.ctm);
        const matrix = matrixOf(argumentList(args)[0]) ?? IDENTITY_MATRIX;
        this.ctm = multiplyMatrices(matrix, this.ctm);
        this.discardPath();
        break;
      }
      case OPS.paintFormXObjectEnd:
        this.ctm = this.ctmStack.pop() ?? this.ctm;
        this.discardPath();
        break;
      case OPS.constructPath:
        this.constructPath(args);
        break;
      case OPS.endPath:
        this.discardPath();
        break;
      case OPS.closeStroke:
      case OPS.closeFillStroke:
      case OPS.closeEOFillStroke:
        if (this.current) this.current.closed = true;
        this.paintPath();
        break;
      case OPS.stroke:
      case OPS.fill:
      case OPS.eoFill:
      case OPS.fillStroke:
      case OPS.eoFillStroke:
        this.paintPath();
        break;
    }
  }

  private constructPath(args: unknown): void {
    const [opsArg, coordsArg] = argumentList(args);
    const ops = numbersOf(opsArg);
    const coords = numbersOf(coordsArg);
    if (!ops || !coords) return;

    const at = (index: number) => coords[index] ?? 0;
    let j = 0;
    for (const op of ops) {
      switch (op) {
        case OPS.moveTo:
          this.moveTo(at(j), at(j + 1));
          j += 2;
          break;
        case OPS.lineTo:
          this.lineTo(at(j), at(j + 1));
          j += 2;
          break;
        case OPS.curveTo:
          this.curveTo(at(j + 4), at(j + 5));
          j += 6;
          break;
        case OPS.curveTo2:
        case OPS.curveTo3:
          this.curveTo(at(j + 2), at(j + 3));
          j += 4;
          break;
        case OPS.rectangle:
          this.rectangle(at(j), at(j + 1), at(j + 2), at(j + 3));
          j += 4;
          break;
        case OPS.closePath:
          if (this.current) this.current.closed = true;
          break;
      }
    }
  }

  private moveTo(x: number, y: number): void {
    this.current = {
      points: [transformPoint(this.ctm, x, y)],
      closed: false,
      hasCurve: false,
      fromRectangle: false,
    };
    this.subpaths.push(this.current);
  }

  private lineTo(x: number, y: number): void {
    if (!this.current) {
      this.moveTo(x, y);
      return;
    }
    this.current.points.push(transformPoint(this.ctm, x, y));
  }

  private curveTo(x: number, y: number): void {
    if (!this.current) this.moveTo(x, y);
    if (this.current) {
      this.current.hasCurve = true;
      this.current.points.push(transformPoint(this.ctm, x, y));
    }
  }

  private rectangle(x: number, y: number, width: number, height: number): void {
    this.subpaths.push({
      points: [
        transformPoint(this.ctm, x, y),
        transformPoint(this.ctm, x + width, y),
        transformPoint(this.ctm, x + width, y + height),
        transformPoint(this.ctm, x, y + height),
      ],
      closed: true,
      hasCurve: false,
      fromRectangle: true,
    });
    this.current = null;
  }

  private discardPath(): void {
    this.subpaths = [];
    this.current = null;
  }

  private paintPath(): void {
    for (const subpath of this.subpaths) {
      this.emitSubpath(subpath);
    }
    this.discardPath();
  }

  private emitSubpath(subpath: Subpath): void {
    if (subpath.hasCurve || subpath.points.length < 2) return;

    const points = [...subpath.points];
    let closed = subpath.closed;
    if (points.length > 2 && samePoint(points[0], points[points.length - 1])) {
      points.pop();
      closed = true;
    }

    const edgesAxisAligned = points.every((point, i) => isAxisAligned(point, points[(i + 1) % points.length]));
    if (closed && points.length === 4 && edgesAxisAligned) {
      this.rectangles.push(boxFromPoints(points));
      return;
    }

    for (let i = 0; i + 1 < points.length; i++) {
      this.pushSegment(points[i], points[i + 1]);
    }
    if (closed && points.length > 2 && !subpath.fromRectangle) {
      this.pushSegment(points[points.length - 1], points[0]);
    }
  }

  private pushSegment(a: readonly [number, number], b: readonly [number, number]): void {
    if (samePoint(a, b)) return;
    this.segments.push({ x0: a[0], y0: a[1], x1: b[0], y1: b[1] });
  }
}

// ============================================
// TEXT CONTENT
// ============================================

interface PositionedText {
  str: string;
  transform: unknown;
  width: number;
}

/**
 * Text run from a pdf.js text item. The item's width is its measured
 * advance; the box extends below and above the baseline by a fixed share of
 * the font size.
 */
export function toTextRun(item: PositionedText): TextRun | undefined {
  if (item.str.trim() === '') return undefined;
  const matrix = matrixOf(item.transform);
  if (!matrix) return undefined;

  const [a, b, c, d, x, y] = matrix;
  const fontSize = Math.hypot(c, d);
  const scale = Math.hypot(a, b);
  if (fontSize === 0 || scale === 0) return undefined;

  // Unit vectors along and across the baseline
  const along: [number, number] = [a / scale, b / scale];
  const up: [number, number] = [c / fontSize, d / fontSize];
  const corner = (advance: number, rise: number): [number, number] => [
    x + along[0] * advance + up[0] * rise,
    y + along[1] * advance + up[1] * rise,
  ];

  return {
    text: item.str,
    bbox: boxFromPoints([
      corner(0, -fontSize * DESCENT_RATIO),
      corner(item.width, -fontSize * DESCENT_RATIO),
      corner(item.width, fontSize * ASCENT_RATIO),
      corner(0, fontSize * ASCENT_RATIO),
    ]),
    baseline: y,
    fontSize,
  };
}

async function readTextRuns(page: PDFPageProxy): Promise<TextRun[]> {
  const content = await page.getTextContent();
  const runs: TextRun[] = [];
  for (const item of content.items) {
    if (!('str' in item)) continue;
    const run = toTextRun(item);
    if (run) runs.push(run);
  }
  return runs;
}

// ============================================
// READER
// ============================================

/**
 * pdf.js view of one loaded document. Open one per analysis and close it
 * when done.
 */
export class PageContentReader {
  private readonly checkedPages = new Set<number>();

  private constructor(
    private readonly doc: LoadedDocument,
    private readonly source: PDFDocumentProxy | Error,
    private readonly limits: ContentLimits
  ) {}

  /**
   * Opens the document in pdf.js. A document pdf.js cannot open still yields
   * a reader; each page read then fails with that error.
   */
  static async open(doc: LoadedDocument, limits: ContentLimits = DEFAULT_CONTENT_LIMITS): Promise<PageContentReader> {
    // pdf.js takes ownership of the buffer it is given
    const task = getDocument({
      data: new Uint8Array(doc.bytes),
      standardFontDataUrl: STANDARD_FONT_DATA_PATH,
      useSystemFonts: false,
      isEvalSupported: false,
      verbosity: VerbosityLevel.ERRORS,
    });
    try {
      return new PageContentReader(doc, await task.promise, limits);
    } catch (error) {
      log.warn('pdf.js could not open the document; page content is unavailable', {
        error: error instanceof Error ? error.message : String(error),
      });
      await task.destroy();
      return new PageContentReader(
        doc,
        error instanceof Error ? error : new Error(String(error)),
        limits
      );
    }
  }

  /**
   * Rectangles, line segments and text runs drawn by the page content.
   *
   * @throws PageContentError
   */
  async readPrimitives(pageIndex: number): Promise<PagePrimitives> {
    const page = await this.openPage(pageIndex);
    try {
      const [operatorList, textRuns] = await Promise.all([
        page.getOperatorList({ annotationMode: AnnotationMode.DISABLE }),
        readTextRuns(page),
      ]);
      const paths = new PathCollector().replay(operatorList.fnArray, operatorList.argsArray);
      return { rectangles: paths.rectangles, segments: paths.segments, textRuns };
    } catch (error) {
      throw new PageContentError(error instanceof Error ? error.message : String(error), { cause: error });
    }
  }

  /**
   * Text runs of the page content, in content order.
   *
   * @throws PageContentError
   */
  async readText(pageIndex: number): Promise<TextRun[]> {
    const page = await this.openPage(pageIndex);
    try {
      return await readTextRuns(page);
    } catch (error) {
      throw new PageContentError(error instanceof Error ? error.message : String(error), { cause: error });
    }
  }

  async close(): Promise<void> {
    if (!(this.source instanceof Error)) {
      await this.source.destroy();
    }
  }

  private async openPage(pageIndex: number): Promise<PDFPageProxy> {
    if (this.source instanceof Error) {
      throw new PageContentError(`document could not be parsed: ${this.source.message}`, { cause: this.source });
    }
    const page = this.doc.pages[pageIndex];
    if (!page) {
      throw new PageContentError(`no page at index ${pageIndex}`);
    }
    if (!this.checkedPages.has(pageIndex)) {
      const bytes = measurePageContent(page, this.limits);
      this.checkedPages.add(pageIndex);
      log.debug('Page content within budget', { pageIndex, bytes });
    }
    try {
      return await this.source.getPage(pageIndex + 1);
    } catch (error) {
      throw new PageContentError(error instanceof Error ? error.message : String(error), { cause: error });
    }
  }
}
