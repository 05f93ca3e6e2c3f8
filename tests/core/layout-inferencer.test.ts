/**
 * Tests for layout inference rules
 *
 * Labels are drawn in 10pt Helvetica. pdf.js measures each text item with
 * the font widths and its box runs from 2pt below the baseline to 8pt above.
 * Patterns inside an item are placed by character share of that width.
 */

import { describe, it, expect } from 'vitest';
import { PDFName } from 'pdf-lib';
import {
  PATTERN_CONFIDENCE,
  cleanLabel,
  inferLayoutCandidates,
  isExclusiveChoice,
  type LayoutInferenceOptions,
} from '../../src/core/layout-inferencer.js';
import { PageContentReader } from '../../src/core/page-content.js';
import type { LoadedDocument } from '../../src/core/document-loader.js';
import type { BoundingBox } from '../../src/types/form-fields.js';
import { parseAnalysisOptions } from '../../src/utils/config-schemas.js';
import {
  addMarkupAnnotation,
  addPageContent,
  createDocument,
  drawBox,
  drawCompositeText,
  drawLabel,
  drawRule,
  registerFormXObject,
  registerSelfDrawingForm,
  reload,
} from '../helpers/pdf-fixtures.js';

const defaults = parseAnalysisOptions();

function infer(doc: LoadedDocument, overrides: Partial<LayoutInferenceOptions> = {}) {
  return inferLayoutCandidates(doc, {
    thresholds: defaults.inference,
    minConfidence: defaults.minInferenceConfidence,
    ...overrides,
  });
}

/** Glyph boxes come from measured widths; compare to two decimals */
function expectBox(actual: BoundingBox, expected: BoundingBox): void {
  expect(actual.x0).toBeCloseTo(expected.x0, 2);
  expect(actual.y0).toBeCloseTo(expected.y0, 2);
  expect(actual.x1).toBeCloseTo(expected.x1, 2);
  expect(actual.y1).toBeCloseTo(expected.y1, 2);
}

describe('cleanLabel', () => {
  it('should strip trailing colons and collapse whitespace', () => {
    expect(cleanLabel('  Full   name: ')).toBe('Full name');
  });

  it('should turn underscores into spaces', () => {
    expect(cleanLabel('Date___of birth.')).toBe('Date of birth');
  });

  it('should cap label length', () => {
    expect(cleanLabel('x'.repeat(100))).toHaveLength(80);
  });
});

describe('isExclusiveChoice', () => {
  it('should recognize mutually exclusive answers by their first word', () => {
    expect(isExclusiveChoice('Yes')).toBe(true);
    expect(isExclusiveChoice('no, thanks')).toBe(true);
    expect(isExclusiveChoice('N/A')).toBe(true);
    expect(isExclusiveChoice('Married filing jointly')).toBe(true);
  });

  it('should not treat other labels as exclusive', () => {
    expect(isExclusiveChoice('I agree to the terms')).toBe(false);
    expect(isExclusiveChoice('Newsletter')).toBe(false);
    expect(isExclusiveChoice(undefined)).toBe(false);
  });
});

describe('inferLayoutCandidates', () => {
  describe('boxes', () => {
    it('should infer a labelled text box', async () => {
      const { doc, pages } = await createDocument();
      drawLabel(pages[0], 'Name', 50, 703);
      drawBox(pages[0], 80, 698, 200, 18);

      const { candidates, diagnostics } = await infer(await reload(doc));

      expect(diagnostics).toEqual([]);
      expect(candidates).toEqual([
        {
          pageIndex: 0,
          bbox: { x0: 80, y0: 698, x1: 280, y1: 716 },
          patternKind: 'text-box',
          confidence: PATTERN_CONFIDENCE.textBox,
          method: 'layout',
          label: 'Name',
        },
      ]);
    });

    it('should take the label from above when nothing is to the left', async () => {
      const { doc, pages } = await createDocument();
      drawLabel(pages[0], 'Street address', 80, 722);
      drawBox(pages[0], 80, 698, 200, 18);

      const { candidates } = await infer(await reload(doc));

      expect(candidates.map((c) => [c.patternKind, c.label])).toEqual([['text-box', 'Street address']]);
    });

    it('should skip boxes filled with text', async () => {
      const { doc, pages } = await createDocument();
      drawBox(pages[0], 80, 698, 100, 18);
      drawLabel(pages[0], 'Total amount due', 82, 703);

      const { candidates } = await infer(await reload(doc));

      expect(candidates).toEqual([]);
    });

    it('should skip rectangles outside the size bounds', async () => {
      const { doc, pages } = await createDocument();
      drawBox(pages[0], 20, 20, 572, 752);
      drawBox(pages[0], 300, 300, 4, 4);

      const { candidates } = await infer(await reload(doc));

      expect(candidates).toEqual([]);
    });

    it('should read squares labelled with exclusive answers as radio choices', async () => {
      const { doc, pages } = await createDocument();
      drawBox(pages[0], 50, 600, 10, 10);
      drawLabel(pages[0], 'Yes', 64, 601);
      drawBox(pages[0], 120, 600, 10, 10);
      drawLabel(pages[0], 'No', 134, 601);

      const { candidates } = await infer(await reload(doc));

      expect(candidates).toEqual([
        {
          pageIndex: 0,
          bbox: { x0: 50, y0: 600, x1: 60, y1: 610 },
          patternKind: 'choice-square',
          confidence: PATTERN_CONFIDENCE.choiceSquare,
          method: 'layout',
          label: 'Yes',
        },
        {
          pageIndex: 0,
          bbox: { x0: 120, y0: 600, x1: 130, y1: 610 },
          patternKind: 'choice-square',
          confidence: PATTERN_CONFIDENCE.choiceSquare,
          method: 'layout',
          label: 'No',
        },
      ]);
    });

    it('should read a square with another label as a checkbox', async () => {
      const { doc, pages } = await createDocument();
      drawBox(pages[0], 50, 600, 10, 10);
      drawLabel(pages[0], 'Newsletter', 64, 601);

      const { candidates } = await infer(await reload(doc));

      expect(candidates.map((c) => [c.patternKind, c.confidence, c.label])).toEqual([
        ['square-box', PATTERN_CONFIDENCE.labelledSquare, 'Newsletter'],
      ]);
    });

    it('should still report an unlabelled square', async () => {
      const { doc, pages } = await createDocument();
      drawBox(pages[0], 50, 600, 10, 10);

      const { candidates } = await infer(await reload(doc));

      expect(candidates).toEqual([
        {
          pageIndex: 0,
          bbox: { x0: 50, y0: 600, x1: 60, y1: 610 },
          patternKind: 'square-box',
          confidence: PATTERN_CONFIDENCE.unlabelledSquare,
          method: 'layout',
        },
      ]);
    });
  });

  describe('blank lines', () => {
    it('should read a rule labelled as a signature as a signature line', async () => {
      const { doc, pages } = await createDocument();
      drawLabel(pages[0], 'Signature', 50, 500);
      drawRule(pages[0], 100, 300, 500);

      const { candidates } = await infer(await reload(doc));

      expect(candidates).toEqual([
        {
          pageIndex: 0,
          bbox: { x0: 100, y0: 500, x1: 300, y1: 514 },
          patternKind: 'signature-line',
          confidence: PATTERN_CONFIDENCE.signatureLine,
          method: 'layout',
          label: 'Signature',
        },
      ]);
    });

    it('should read a rule with another label as a text blank', async () => {
      const { doc, pages } = await createDocument();
      drawLabel(pages[0], 'City', 70, 500);
      drawRule(pages[0], 100, 300, 500);

      const { candidates } = await infer(await reload(doc));

      expect(candidates.map((c) => [c.patternKind, c.confidence, c.label])).toEqual([
        ['underline', PATTERN_CONFIDENCE.labelledUnderline, 'City'],
      ]);
    });

    it('should drop unlabelled rules below the confidence floor', async () => {
      const { doc, pages } = await createDocument();
      drawRule(pages[0], 100, 300, 200);
      const loaded = await reload(doc);

      expect((await infer(loaded)).candidates).toEqual([]);
      expect((await infer(loaded, { minConfidence: 0.3 })).candidates).toEqual([
        {
          pageIndex: 0,
          bbox: { x0: 100, y0: 200, x1: 300, y1: 214 },
          patternKind: 'underline',
          confidence: PATTERN_CONFIDENCE.unlabelledUnderline,
          method: 'layout',
        },
      ]);
    });

    it('should not read underlined text as a blank', async () => {
      const { doc, pages } = await createDocument();
      drawLabel(pages[0], 'Instructions for completing', 100, 502);
      drawRule(pages[0], 100, 235, 500);

      const { candidates } = await infer(await reload(doc));

      expect(candidates).toEqual([]);
    });

    it('should skip rules that are too short or sloped', async () => {
      const { doc, pages } = await createDocument();
      drawRule(pages[0], 100, 120, 400);
      pages[0].drawLine({ start: { x: 100, y: 300 }, end: { x: 300, y: 320 }, thickness: 1 });

      const { candidates } = await infer(await reload(doc), { minConfidence: 0 });

      expect(candidates).toEqual([]);
    });
  });

  describe('text glyphs', () => {
    it('should read an underscore run with its preceding text as label', async () => {
      const { doc, pages } = await createDocument();
      drawLabel(pages[0], 'Date: __________', 50, 400);

      const { candidates } = await infer(await reload(doc));

      // 82.28pt over 16 characters; the run starts after "Date: "
      expect(candidates).toHaveLength(1);
      expect(candidates[0]).toMatchObject({
        pageIndex: 0,
        patternKind: 'underscore-run',
        confidence: PATTERN_CONFIDENCE.underscoreRun,
        method: 'visual',
        label: 'Date',
      });
      expectBox(candidates[0].bbox, { x0: 80.855, y0: 400, x1: 132.28, y1: 414 });
    });

    it('should read a signature underscore run as a signature line', async () => {
      const { doc, pages } = await createDocument();
      drawLabel(pages[0], 'Signed ______', 50, 400);

      const { candidates } = await infer(await reload(doc));

      expect(candidates.map((c) => [c.patternKind, c.method, c.label])).toEqual([
        ['signature-line', 'visual', 'Signed'],
      ]);
    });

    it('should read bracket pairs as checkboxes labelled by the following text', async () => {
      const { doc, pages } = await createDocument();
      drawLabel(pages[0], '[ ] I agree to the terms', 50, 300);

      const { candidates } = await infer(await reload(doc));

      // 97.83pt over 24 characters
      expect(candidates).toHaveLength(1);
      expect(candidates[0]).toMatchObject({
        pageIndex: 0,
        patternKind: 'checkbox-glyph',
        confidence: PATTERN_CONFIDENCE.checkboxGlyph,
        method: 'visual',
        label: 'I agree to the terms',
      });
      expectBox(candidates[0].bbox, { x0: 50, y0: 298, x1: 62.229, y1: 308 });
    });

    it('should split several bracket choices on one line', async () => {
      const { doc, pages } = await createDocument();
      drawLabel(pages[0], '[ ] Yes [ ] No', 50, 300);

      const { candidates } = await infer(await reload(doc));

      // 55.03pt over 14 characters
      expect(candidates.map((c) => [c.patternKind, c.label])).toEqual([
        ['choice-glyph', 'Yes'],
        ['choice-glyph', 'No'],
      ]);
      expectBox(candidates[0].bbox, { x0: 50, y0: 298, x1: 61.792, y1: 308 });
      expectBox(candidates[1].bbox, { x0: 81.446, y0: 298, x1: 93.238, y1: 308 });
    });

    it('should read a date mask as one blank labelled by the text before it', async () => {
      const { doc, pages } = await createDocument();
      drawLabel(pages[0], 'Date: __/__/____', 50, 400);

      const { candidates } = await infer(await reload(doc));

      // 76.72pt over 16 characters; the mask is characters 6 to 16
      expect(candidates).toHaveLength(1);
      expect(candidates[0]).toMatchObject({
        pageIndex: 0,
        patternKind: 'date-mask',
        confidence: PATTERN_CONFIDENCE.dateMask,
        method: 'visual',
        label: 'Date',
      });
      expectBox(candidates[0].bbox, { x0: 78.77, y0: 400, x1: 126.72, y1: 414 });
    });

    it('should read a lettered date mask', async () => {
      const { doc, pages } = await createDocument();
      drawLabel(pages[0], 'Date of birth mm/dd/yyyy', 50, 400);

      const { candidates } = await infer(await reload(doc));

      expect(candidates.map((c) => [c.patternKind, c.label])).toEqual([['date-mask', 'Date of birth']]);
    });

    it('should read a trailing dot leader as a blank', async () => {
      const { doc, pages } = await createDocument();
      drawLabel(pages[0], 'Name..........', 50, 400);

      const { candidates } = await infer(await reload(doc));

      expect(candidates.map((c) => [c.patternKind, c.confidence, c.method, c.label])).toEqual([
        ['dot-leader', PATTERN_CONFIDENCE.dotLeader, 'visual', 'Name'],
      ]);
    });

    it('should not read a dot leader that leads to text as a blank', async () => {
      const { doc, pages } = await createDocument();
      drawLabel(pages[0], 'Chapter 1 .......... 5', 50, 400);

      const { candidates } = await infer(await reload(doc));

      expect(candidates).toEqual([]);
    });

    it('should read a label drawn in a composite font through its ToUnicode map', async () => {
      const { doc, pages } = await createDocument();
      drawBox(pages[0], 50, 600, 10, 10);
      drawCompositeText(doc, pages[0], 'Yes', 64, 601);

      const { candidates } = await infer(await reload(doc));

      expect(candidates).toEqual([
        {
          pageIndex: 0,
          bbox: { x0: 50, y0: 600, x1: 60, y1: 610 },
          patternKind: 'choice-square',
          confidence: PATTERN_CONFIDENCE.choiceSquare,
          method: 'layout',
          label: 'Yes',
        },
      ]);
    });
  });

  describe('annotations', () => {
    it('should use Square and FreeText annotations as boxes and labels', async () => {
      const { doc, pages } = await createDocument();
      addMarkupAnnotation(doc, pages[0], 'FreeText', [250, 300, 295, 312], 'Email');
      addMarkupAnnotation(doc, pages[0], 'Square', [300, 300, 312, 312]);

      const { candidates } = await infer(await reload(doc));

      expect(candidates.map((c) => [c.patternKind, c.bbox, c.label])).toEqual([
        ['square-box', { x0: 300, y0: 300, x1: 312, y1: 312 }, 'Email'],
      ]);
    });
  });

  describe('failures', () => {
    it('should report a page whose content cannot be decoded and keep going', async () => {
      const { doc, pages } = await createDocument(2);
      const broken = doc.context.stream('0 0 10 10 re S', { Filter: 'JBIG2Decode' });
      pages[0].node.set(PDFName.of('Contents'), doc.context.register(broken));
      drawBox(pages[1], 50, 600, 10, 10);

      const { candidates, diagnostics } = await infer(await reload(doc));

      expect(diagnostics).toHaveLength(1);
      expect(diagnostics[0].kind).toBe('page-scan');
      expect(diagnostics[0].pageIndex).toBe(0);
      expect(diagnostics[0].message).toMatch(/^Page 0: content could not be read \(/);
      expect(candidates.map((c) => c.pageIndex)).toEqual([1]);
    });

    it('should report a page whose Form XObject draws itself and keep going', async () => {
      const { doc, pages } = await createDocument(2);
      const form = registerSelfDrawingForm(doc, 'Fm0', '0 0 10 10 re S /Fm0 Do /Fm0 Do /Fm0 Do');
      addPageContent(doc, pages[0], '/Fm0 Do', { Fm0: form });
      drawBox(pages[1], 50, 600, 10, 10);

      const { candidates, diagnostics } = await infer(await reload(doc));

      expect(diagnostics).toEqual([
        { kind: 'page-scan', pageIndex: 0, message: 'Page 0: content could not be read (Form XObject /Fm0 draws itself)' },
      ]);
      expect(candidates.map((c) => c.pageIndex)).toEqual([1]);
    });

    it('should report a page past the content budget', async () => {
      const { doc, pages } = await createDocument();
      const leaf = registerFormXObject(doc, '0 0 1 1 re S\n');
      const branch = registerFormXObject(doc, '/Leaf Do\n'.repeat(20), { Leaf: leaf });
      addPageContent(doc, pages[0], '/Branch Do\n'.repeat(20), { Branch: branch });
      const loaded = await reload(doc);
      const content = await PageContentReader.open(loaded, { maxPageContentBytes: 1000 });

      try {
        const { candidates, diagnostics } = await infer(loaded, { content });

        expect(candidates).toEqual([]);
        expect(diagnostics).toEqual([
          { kind: 'page-scan', pageIndex: 0, message: 'Page 0: content could not be read (content expands past 1000 bytes)' },
        ]);
      } finally {
        await content.close();
      }
    });
  });
});
