/**
 * Layout Inferencer
 *
 * Recovers fields that have no interactive widget from what is drawn on the
 * page. Vector geometry (boxes and blank lines) yields `layout` candidates;
 * text glyphs (underscore runs, bracket pairs, ballot boxes) yield `visual`
 * candidates. Every candidate carries a heuristic confidence and, when one
 * is found, the nearby text that labels it.
 *
 * Text positions come from pdf.js, which measures whole text items. A
 * pattern inside an item is placed by its share of the item's characters.
 */

import { PDFArray, PDFDict, PDFHexString, PDFName, PDFNumber, PDFString, type PDFPage } from 'pdf-lib';
import type {
  AnalysisDiagnostic,
  BoundingBox,
  InferenceMethod,
  InferredCandidate,
  PatternKind,
} from '../types/form-fields.js';
import type { InferenceThresholds } from '../utils/config-schemas.js';
import { boxArea, boxHeight, boxWidth, intersectionArea, normalizeBox } from '../utils/geometry.js';
import { logger } from '../utils/logger.js';
import type { LoadedDocument } from './document-loader.js';
import {
  PageContentReader,
  emptyPrimitives,
  type LineSegment,
  type PagePrimitives,
  type TextRun,
} from './page-content.js';

const log = logger.layoutInferencer;

// ============================================
// CONFIDENCE SCORES
// ============================================

export const PATTERN_CONFIDENCE = {
  textBox: 0.7,
  labelledSquare: 0.75,
  unlabelledSquare: 0.6,
  choiceSquare: 0.8,
  labelledUnderline: 0.65,
  unlabelledUnderline: 0.35,
  signatureLine: 0.7,
  underscoreRun: 0.6,
  dateMask: 0.65,
  dotLeader: 0.5,
  checkboxGlyph: 0.7,
  choiceGlyph: 0.75,
} as const;

/**
 * Words that label one of several mutually exclusive answers. A box labelled
 * with one of these reads as a radio button rather than a checkbox.
 */
const EXCLUSIVE_CHOICE_WORDS = new Set([
  'yes',
  'no',
  'n/a',
  'na',
  'true',
  'false',
  'male',
  'female',
  'single',
  'married',
  'divorced',
  'widowed',
  'agree',
  'disagree',
  'oui',
  'non',
  'si',
  'ja',
  'nein',
]);

const SIGNATURE_LABEL = /\bsign(ature|ed|ing)?\b/i;
const UNDERSCORE_RUN = /_{3,}/g;
const DATE_MASK = /(?:_{1,4}|[md]{2})\s?\/\s?(?:_{1,4}|[md]{2})\s?\/\s?(?:_{2,4}|y{2,4})/gi;
const DOT_LEADER = /\.(?:\s?\.){2,}/g;
interface TextBlank {
  kind: Extract<PatternKind, 'date-mask' | 'underscore-run' | 'dot-leader'>;
  pattern: RegExp;
  confidence: number;
  /** Only a blank when nothing follows it; a leader to text points at a value */
  endsRun: boolean;
}

const TEXT_BLANKS: readonly TextBlank[] = [
  { kind: 'date-mask', pattern: DATE_MASK, confidence: PATTERN_CONFIDENCE.dateMask, endsRun: false },
  { kind: 'underscore-run', pattern: UNDERSCORE_RUN, confidence: PATTERN_CONFIDENCE.underscoreRun, endsRun: false },
  { kind: 'dot-leader', pattern: DOT_LEADER, confidence: PATTERN_CONFIDENCE.dotLeader, endsRun: true },
];

const CHECKBOX_GLYPH = /\[\s?\]|\(\s?\)|[☐□❏❑]/g;

/** Label text may overlap the field it labels by this much */
const LABEL_OVERLAP_TOLERANCE = 2;
const MAX_LABEL_LENGTH = 80;

export interface LayoutInferenceOptions {
  thresholds: InferenceThresholds;
  /** Candidates scoring below this are dropped */
  minConfidence: number;
  /** Open reader to share; one is opened for the call otherwise */
  content?: PageContentReader;
}

export interface LayoutInferenceResult {
  candidates: InferredCandidate[];
  diagnostics: AnalysisDiagnostic[];
}

// ============================================
// LABEL HELPERS
// ============================================

export function cleanLabel(text: string): string {
  return text
    .replace(/_+/g, ' ')
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/[:.]+$/, '')
    .trim()
    .slice(0, MAX_LABEL_LENGTH);
}

export function isExclusiveChoice(label: string | undefined): boolean {
  if (!label) return false;
  const firstWord = label.trim().split(/\s+/)[0]?.toLowerCase().replace(/[^a-z/]/g, '');
  return firstWord !== undefined && EXCLUSIVE_CHOICE_WORDS.has(firstWord);
}

function verticallyOverlaps(a: BoundingBox, b: BoundingBox): boolean {
  return Math.min(a.y1, b.y1) > Math.max(a.y0, b.y0);
}

function horizontallyOverlaps(a: BoundingBox, b: BoundingBox): boolean {
  return Math.min(a.x1, b.x1) > Math.max(a.x0, b.x0);
}

function labelRightOf(box: BoundingBox, runs: readonly TextRun[], gap: number): TextRun | undefined {
  let best: TextRun | undefined;
  for (const run of runs) {
    const distance = run.bbox.x0 - box.x1;
    if (distance < -LABEL_OVERLAP_TOLERANCE || distance > gap || !verticallyOverlaps(run.bbox, box)) continue;
    if (!best || run.bbox.x0 < best.bbox.x0) best = run;
  }
  return best;
}

function labelLeftOf(box: BoundingBox, runs: readonly TextRun[], gap: number): TextRun | undefined {
  let best: TextRun | undefined;
  for (const run of runs) {
    const distance = box.x0 - run.bbox.x1;
    if (distance < -LABEL_OVERLAP_TOLERANCE || distance > gap || !verticallyOverlaps(run.bbox, box)) continue;
    if (!best || run.bbox.x1 > best.bbox.x1) best = run;
  }
  return best;
}

function labelAbove(box: BoundingBox, runs: readonly TextRun[], gap: number): TextRun | undefined {
  let best: TextRun | undefined;
  for (const run of runs) {
    const distance = run.bbox.y0 - box.y1;
    if (distance < -LABEL_OVERLAP_TOLERANCE || distance > gap || !horizontallyOverlaps(run.bbox, box)) continue;
    if (!best || run.bbox.y0 < best.bbox.y0) best = run;
  }
  return best;
}

function labelBelow(box: BoundingBox, runs: readonly TextRun[], gap: number): TextRun | undefined {
  let best: TextRun | undefined;
  for (const run of runs) {
    const distance = box.y0 - run.bbox.y1;
    if (distance < -LABEL_OVERLAP_TOLERANCE || distance > gap || !horizontallyOverlaps(run.bbox, box)) continue;
    if (!best || run.bbox.y1 > best.bbox.y1) best = run;
  }
  return best;
}

function labelText(run: TextRun | undefined): string | undefined {
  if (!run) return undefined;
  const label = cleanLabel(run.text);
  return label === '' ? undefined : label;
}

/**
 * Box spanning characters [start, end) of a run, by character share of its
 * measured width
 */
function sliceRun(run: TextRun, start: number, end: number): BoundingBox {
  const perChar = boxWidth(run.bbox) / run.text.length;
  return {
    x0: run.bbox.x0 + perChar * start,
    y0: run.bbox.y0,
    x1: run.bbox.x0 + perChar * end,
    y1: run.bbox.y1,
  };
}

// ============================================
// ANNOTATION PRIMITIVES
// ============================================

function readNumbers(value: unknown, count: number): number[] | undefined {
  if (!(value instanceof PDFArray) || value.size() !== count) return undefined;
  const numbers: number[] = [];
  for (let i = 0; i < count; i++) {
    const item = value.lookup(i);
    if (!(item instanceof PDFNumber)) return undefined;
    numbers.push(item.asNumber());
  }
  return numbers;
}

/**
 * Square, Line and FreeText annotations draw boxes, rules and labels
 * outside the page content stream.
 */
function readAnnotationPrimitives(page: PDFPage): PagePrimitives {
  const primitives = emptyPrimitives();
  const annots = page.node.lookup(PDFName.of('Annots'));
  if (!(annots instanceof PDFArray)) return primitives;

  for (let i = 0; i < annots.size(); i++) {
    const annot = annots.lookup(i);
    if (!(annot instanceof PDFDict)) continue;
    const subtype = annot.lookup(PDFName.of('Subtype'));
    const rect = readNumbers(annot.lookup(PDFName.of('Rect')), 4);

    if (subtype === PDFName.of('Square') && rect) {
      primitives.rectangles.push(normalizeBox(rect[0], rect[1], rect[2], rect[3]));
    } else if (subtype === PDFName.of('Line')) {
      const line = readNumbers(annot.lookup(PDFName.of('L')), 4);
      if (line) primitives.segments.push({ x0: line[0], y0: line[1], x1: line[2], y1: line[3] });
    } else if (subtype === PDFName.of('FreeText') && rect) {
      const contents = annot.lookup(PDFName.of('Contents'));
      if (contents instanceof PDFString || contents instanceof PDFHexString) {
        const text = contents.decodeText();
        const bbox = normalizeBox(rect[0], rect[1], rect[2], rect[3]);
        if (text.trim()) {
          primitives.textRuns.push({ text, bbox, baseline: bbox.y0, fontSize: boxHeight(bbox) });
        }
      }
    }
  }
  return primitives;
}

// ============================================
// RULES
// ============================================

class PageInference {
  readonly candidates: InferredCandidate[] = [];
  private readonly boxes: BoundingBox[] = [];
  private readonly lines: LineSegment[] = [];

  constructor(
    private readonly pageIndex: number,
    private readonly primitives: PagePrimitives,
    private readonly thresholds: InferenceThresholds
  ) {
    for (const rect of primitives.rectangles) {
      if (Math.min(boxWidth(rect), boxHeight(rect)) < thresholds.maxLineThickness) {
        const y = (rect.y0 + rect.y1) / 2;
        this.lines.push({ x0: rect.x0, y0: y, x1: rect.x1, y1: y });
      } else {
        this.boxes.push(rect);
      }
    }
    this.lines.push(...primitives.segments);
  }

  private add(
    bbox: BoundingBox,
    patternKind: PatternKind,
    confidence: number,
    method: InferenceMethod,
    label?: string
  ): void {
    this.candidates.push({
      pageIndex: this.pageIndex,
      bbox,
      patternKind,
      confidence,
      method,
      ...(label !== undefined && { label }),
    });
  }

  run(): InferredCandidate[] {
    this.inferBoxes();
    this.inferBlankLines();
    this.inferTextBlanks();
    this.inferCheckboxGlyphs();
    return this.candidates;
  }

  /**
   * Rectangle and square-plus-label rules
   */
  private inferBoxes(): void {
    const t = this.thresholds;
    const runs = this.primitives.textRuns;

    for (const box of this.boxes) {
      const width = boxWidth(box);
      const height = boxHeight(box);
      const area = width * height;
      const aspect = width / height;

      if (area < t.minBoxArea || area > t.maxBoxArea || height > t.maxBoxHeight) continue;
      if (aspect < t.minAspectRatio || aspect > t.maxAspectRatio) continue;

      const isSquare =
        Math.abs(aspect - 1) <= t.checkboxAspectTolerance &&
        Math.max(width, height) <= t.checkboxMaxSide &&
        Math.min(width, height) >= t.checkboxMinSide;

      if (isSquare) {
        const label = labelText(labelRightOf(box, runs, t.labelGap) ?? labelLeftOf(box, runs, t.labelGap));
        if (label === undefined) {
          this.add(box, 'square-box', PATTERN_CONFIDENCE.unlabelledSquare, 'layout');
        } else if (isExclusiveChoice(label)) {
          this.add(box, 'choice-square', PATTERN_CONFIDENCE.choiceSquare, 'layout', label);
        } else {
          this.add(box, 'square-box', PATTERN_CONFIDENCE.labelledSquare, 'layout', label);
        }
        continue;
      }

      if (width < t.minTextBoxWidth || height < t.minTextBoxHeight) continue;

      // A box mostly filled with text is a table cell, not an input
      const textInside = runs
        .filter((run) => intersectionArea(run.bbox, box) > boxArea(run.bbox) / 2)
        .reduce((sum, run) => sum + boxWidth(run.bbox), 0);
      if (textInside > width / 2) continue;

      const label = labelText(labelLeftOf(box, runs, t.labelGap) ?? labelAbove(box, runs, t.labelGap));
      this.add(box, 'text-box', PATTERN_CONFIDENCE.textBox, 'layout', label);
    }
  }

  /**
   * Fill-in-the-blank rule for horizontal rules
   */
  private inferBlankLines(): void {
    const t = this.thresholds;
    const runs = this.primitives.textRuns;
    const seen = new Set<string>();

    for (const line of this.lines) {
      if (Math.abs(line.y1 - line.y0) > t.maxLineTilt) continue;
      const length = Math.abs(line.x1 - line.x0);
      if (length < t.minLineLength || length > t.maxLineLength) continue;

      const y = Math.min(line.y0, line.y1);
      const blank = normalizeBox(line.x0, y, line.x1, y + t.blankHeight);

      const key = `${Math.round(blank.x0)}:${Math.round(blank.y0)}:${Math.round(blank.x1)}`;
      if (seen.has(key)) continue;
      seen.add(key);

      // Underlined text, not a blank
      if (runs.some((run) => intersectionArea(run.bbox, blank) > boxArea(run.bbox) / 2)) continue;

      const label = labelText(labelLeftOf(blank, runs, t.labelGap) ?? labelBelow(blank, runs, t.labelGap));
      if (label === undefined) {
        this.add(blank, 'underline', PATTERN_CONFIDENCE.unlabelledUnderline, 'layout');
      } else if (SIGNATURE_LABEL.test(label)) {
        this.add(blank, 'signature-line', PATTERN_CONFIDENCE.signatureLine, 'layout', label);
      } else {
        this.add(blank, 'underline', PATTERN_CONFIDENCE.labelledUnderline, 'layout', label);
      }
    }
  }

  /**
   * Blanks typed as text. Where patterns overlap, the earlier entry of
   * TEXT_BLANKS wins, so a date mask is not also read as an underscore run.
   */
  private inferTextBlanks(): void {
    const t = this.thresholds;
    const runs = this.primitives.textRuns;

    for (const run of runs) {
      const found: Array<{ start: number; end: number; blank: TextBlank }> = [];
      for (const blank of TEXT_BLANKS) {
        for (const match of run.text.matchAll(blank.pattern)) {
          const start = match.index ?? 0;
          const end = start + match[0].length;
          if (blank.endsRun && run.text.slice(end).trim() !== '') continue;
          if (found.some((other) => start < other.end && other.start < end)) continue;
          found.push({ start, end, blank });
        }
      }
      found.sort((a, b) => a.start - b.start);

      let previousEnd = 0;
      for (const { start, end, blank } of found) {
        const slice = sliceRun(run, start, end);
        const box = normalizeBox(slice.x0, run.baseline, slice.x1, run.baseline + t.blankHeight);

        const preceding = cleanLabel(run.text.slice(previousEnd, start));
        previousEnd = end;
        const label =
          preceding !== ''
            ? preceding
            : labelText(labelLeftOf(box, runs.filter((other) => other !== run), t.labelGap));

        if (label !== undefined && SIGNATURE_LABEL.test(label)) {
          this.add(box, 'signature-line', PATTERN_CONFIDENCE.signatureLine, 'visual', label);
        } else {
          this.add(box, blank.kind, blank.confidence, 'visual', label);
        }
      }
    }
  }

  /**
   * Bracket pairs and ballot-box characters, labelled by the text after them
   */
  private inferCheckboxGlyphs(): void {
    const t = this.thresholds;
    const runs = this.primitives.textRuns;

    for (const run of runs) {
      const matches = [...run.text.matchAll(CHECKBOX_GLYPH)];
      matches.forEach((match, i) => {
        const start = match.index ?? 0;
        const end = start + match[0].length;
        const box = sliceRun(run, start, end);
        const nextStart = matches[i + 1]?.index ?? run.text.length;

        const following = cleanLabel(run.text.slice(end, nextStart));
        const label =
          following !== ''
            ? following
            : labelText(labelRightOf(box, runs.filter((other) => other !== run), t.labelGap));

        if (isExclusiveChoice(label)) {
          this.add(box, 'choice-glyph', PATTERN_CONFIDENCE.choiceGlyph, 'visual', label);
        } else {
          this.add(box, 'checkbox-glyph', PATTERN_CONFIDENCE.checkboxGlyph, 'visual', label);
        }
      });
    }
  }
}

function mergePrimitives(a: PagePrimitives, b: PagePrimitives): PagePrimitives {
  return {
    rectangles: [...a.rectangles, ...b.rectangles],
    segments: [...a.segments, ...b.segments],
    textRuns: [...a.textRuns, ...b.textRuns],
  };
}

/**
 * Infer field candidates from each page's drawn content and markup
 * annotations. A page that cannot be read is reported and skipped.
 */
export async function inferLayoutCandidates(
  doc: LoadedDocument,
  options: LayoutInferenceOptions
): Promise<LayoutInferenceResult> {
  const { thresholds, minConfidence } = options;
  const content = options.content ?? (await PageContentReader.open(doc));
  const candidates: InferredCandidate[] = [];
  const diagnostics: AnalysisDiagnostic[] = [];

  try {
    for (const [pageIndex, page] of doc.pages.entries()) {
      let primitives: PagePrimitives;
      try {
        primitives = mergePrimitives(await content.readPrimitives(pageIndex), readAnnotationPrimitives(page));
      } catch (error) {
        const message = `Page ${pageIndex}: content could not be read (${error instanceof Error ? error.message : String(error)})`;
        diagnostics.push({ kind: 'page-scan', pageIndex, message });
        log.warn(message, { pageIndex });
        continue;
      }

      const found = new PageInference(pageIndex, primitives, thresholds).run();
      const kept = found.filter((candidate) => candidate.confidence >= minConfidence);
      candidates.push(...kept);

      log.debug('Inferred page candidates', {
        pageIndex,
        rectangles: primitives.rectangles.length,
        segments: primitives.segments.length,
        textRuns: primitives.textRuns.length,
        found: found.length,
        kept: kept.length,
      });
    }
  } finally {
    if (!options.content) await content.close();
  }

  return { candidates, diagnostics };
}
