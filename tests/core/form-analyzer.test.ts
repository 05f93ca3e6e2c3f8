/**
 * End-to-end tests for form analysis
 *
 * Tests cover:
 * - Widget-only documents
 * - Fields found only in the page layout
 * - Merging widgets with layout detections
 * - Ordering, warnings and load failures
 */

import { describe, it, expect } from 'vitest';
import { PDFName } from 'pdf-lib';
import {
  FormFieldAnalyzer,
  analyzeForm,
  createFormFieldAnalyzer,
} from '../../src/core/form-analyzer.js';
import type { AnalysisOutcome, AnalysisReport } from '../../src/types/form-fields.js';
import { AnalysisOptionsError } from '../../src/utils/config-schemas.js';
import {
  addPageContent,
  addRawWidget,
  buildWidgetForm,
  createDocument,
  drawBox,
  drawCompositeText,
  drawLabel,
  registerFormXObject,
  registerSelfDrawingForm,
  toBytes,
} from '../helpers/pdf-fixtures.js';

const RAW = { updateFieldAppearances: false };

function expectReport(outcome: AnalysisOutcome): AnalysisReport {
  if (!outcome.success) {
    throw new Error(`Expected a report, got ${outcome.error.reason}: ${outcome.error.message}`);
  }
  return outcome.report;
}

describe('analyzeForm', () => {
  describe('widget forms', () => {
    it('should report one record per widget when layout inference is off', async () => {
      const bytes = await toBytes(await buildWidgetForm());

      const report = expectReport(await analyzeForm(bytes, { enableLayoutInference: false }));

      expect(report.totalFields).toBe(5);
      expect(report.fields.map((f) => [f.name, f.fieldType])).toEqual([
        ['full_name', 'Text'],
        ['subscribe', 'Checkbox'],
        ['country', 'Dropdown'],
        ['payment', 'Radio Button'],
        ['payment', 'Radio Button'],
      ]);
      for (const field of report.fields) {
        expect(field.sourceMethods).toEqual(['widget']);
        expect(field.confidence).toBe(1);
      }
      expect(report.countsByType).toEqual({
        Text: 1,
        Checkbox: 1,
        'Radio Button': 2,
        Dropdown: 1,
        Signature: 0,
        Button: 0,
      });
      expect(report.document.hasAcroForm).toBe(true);
      expect(report.warnings).toEqual([]);
    });

    it('should carry widget attributes into the records', async () => {
      const bytes = await toBytes(await buildWidgetForm());

      const report = expectReport(await analyzeForm(bytes));
      const fullName = report.fields.find((f) => f.name === 'full_name');
      const country = report.fields.find((f) => f.name === 'country');

      expect(fullName).toEqual({
        fieldType: 'Text',
        name: 'full_name',
        pageIndex: 0,
        bbox: { x0: 50, y0: 700, x1: 250, y1: 720 },
        sourceMethods: ['widget'],
        confidence: 1,
        required: true,
        readOnly: false,
        value: 'Ada',
      });
      expect(country?.options).toEqual(['France', 'Germany']);
      expect(country?.value).toBe('Germany');
    });

    it('should classify signature and push-button widgets', async () => {
      const { doc, pages } = await createDocument();
      addRawWidget(doc, pages[0], { rect: [100, 100, 300, 140], fieldType: 'Sig', name: 'signer' });
      addRawWidget(doc, pages[0], { rect: [400, 100, 480, 130], fieldType: 'Btn', name: 'reset', flags: 1 << 16 });

      const report = expectReport(await analyzeForm(await toBytes(doc, RAW)));

      expect(report.fields.map((f) => [f.name, f.fieldType])).toEqual([
        ['signer', 'Signature'],
        ['reset', 'Button'],
      ]);
    });

    it('should order fields top to bottom within a page', async () => {
      const { doc, pages } = await createDocument(3);
      const form = doc.getForm();
      form.createTextField('bottom').addToPage(pages[2], { x: 50, y: 300, width: 200, height: 20 });
      form.createTextField('top').addToPage(pages[2], { x: 50, y: 700, width: 200, height: 20 });
      form.createTextField('middle').addToPage(pages[2], { x: 50, y: 500, width: 200, height: 20 });

      const report = expectReport(await analyzeForm(await toBytes(doc)));

      expect(report.fields.map((f) => [f.name, f.pageIndex])).toEqual([
        ['top', 2],
        ['middle', 2],
        ['bottom', 2],
      ]);
      expect(report.countsByPage).toEqual({ 2: 3 });
    });
  });

  describe('layout detections', () => {
    it('should merge a drawn box into the widget placed over it', async () => {
      const { doc, pages } = await createDocument();
      drawLabel(pages[0], 'Name', 50, 703);
      drawBox(pages[0], 80, 698, 200, 18);
      doc.getForm().createTextField('full_name').addToPage(pages[0], { x: 80, y: 698, width: 200, height: 18 });

      const report = expectReport(await analyzeForm(await toBytes(doc)));

      expect(report.fields).toEqual([
        {
          fieldType: 'Text',
          name: 'full_name',
          pageIndex: 0,
          bbox: { x0: 80, y0: 698, x1: 280, y1: 716 },
          sourceMethods: ['widget', 'layout'],
          confidence: 1,
          label: 'Name',
          required: false,
          readOnly: false,
        },
      ]);
    });

    it('should report fields that exist only in the layout', async () => {
      const { doc, pages } = await createDocument();
      drawBox(pages[0], 50, 600, 10, 10);
      drawLabel(pages[0], 'Yes', 64, 601);
      drawBox(pages[0], 120, 600, 10, 10);
      drawLabel(pages[0], 'No', 134, 601);

      const report = expectReport(await analyzeForm(await toBytes(doc)));

      expect(report.fields.map((f) => [f.name, f.fieldType, f.label, f.sourceMethods])).toEqual([
        ['inferred_0_0', 'Radio Button', 'Yes', ['layout']],
        ['inferred_0_1', 'Radio Button', 'No', ['layout']],
      ]);
      expect(report.fields[0].confidence).toBe(0.8);
      expect(report.document.hasAcroForm).toBe(false);
    });

    it('should label layout fields drawn in a composite font', async () => {
      const { doc, pages } = await createDocument();
      drawBox(pages[0], 50, 600, 10, 10);
      drawCompositeText(doc, pages[0], 'Yes', 64, 601);

      const report = expectReport(await analyzeForm(await toBytes(doc)));

      expect(report.fields.map((f) => [f.fieldType, f.label])).toEqual([['Radio Button', 'Yes']]);
    });

    it('should skip layout detections when inference is disabled', async () => {
      const { doc, pages } = await createDocument();
      drawBox(pages[0], 50, 600, 10, 10);

      const report = expectReport(await analyzeForm(await toBytes(doc), { enableLayoutInference: false }));

      expect(report.totalFields).toBe(0);
    });

    it('should respect the confidence floor', async () => {
      const { doc, pages } = await createDocument();
      drawBox(pages[0], 50, 600, 10, 10);
      const bytes = await toBytes(doc);

      expect(expectReport(await analyzeForm(bytes, { minInferenceConfidence: 0.6 })).totalFields).toBe(1);
      expect(expectReport(await analyzeForm(bytes, { minInferenceConfidence: 0.61 })).totalFields).toBe(0);
    });

    it('should give the same report on every run', async () => {
      const { doc, pages } = await createDocument();
      drawLabel(pages[0], 'Name', 50, 703);
      drawBox(pages[0], 80, 698, 200, 18);
      drawLabel(pages[0], 'Date: __________', 50, 400);
      doc.getForm().createTextField('full_name').addToPage(pages[0], { x: 80, y: 698, width: 200, height: 18 });
      const bytes = await toBytes(doc);

      const first = expectReport(await analyzeForm(bytes));
      const second = expectReport(await analyzeForm(bytes));

      expect(second).toEqual(first);
    });
  });

  describe('document summary', () => {
    it('should report an empty page with no fields and no warnings', async () => {
      const { doc } = await createDocument();

      const report = expectReport(await analyzeForm(await toBytes(doc)));

      expect(report.totalFields).toBe(0);
      expect(report.fields).toEqual([]);
      expect(report.warnings).toEqual([]);
      expect(report.pages).toEqual([{ pageIndex: 0, width: 612, height: 792, fieldCount: 0 }]);
      expect(report.document).toEqual({ pageCount: 1, hasAcroForm: false });
    });

    it('should detect the form number from the first page text', async () => {
      const { doc, pages } = await createDocument();
      drawLabel(pages[0], 'Form 1040 U.S. Individual Income Tax Return', 50, 750);

      const report = expectReport(await analyzeForm(await toBytes(doc)));

      expect(report.document.formNumber).toBe('1040');
    });

    it('should prefer a form number in the title', async () => {
      const { doc, pages } = await createDocument();
      doc.setTitle('Form W-9');
      drawLabel(pages[0], 'Form 1040', 50, 750);

      const report = expectReport(await analyzeForm(await toBytes(doc)));

      expect(report.document.title).toBe('Form W-9');
      expect(report.document.formNumber).toBe('W-9');
    });
  });

  describe('warnings', () => {
    it('should drop widgets of unknown type with a warning', async () => {
      const { doc, pages } = await createDocument();
      addRawWidget(doc, pages[0], { rect: [100, 100, 150, 120], name: 'mystery' });
      addRawWidget(doc, pages[0], { rect: [100, 200, 150, 220], fieldType: 'Xx', name: 'exotic' });

      const report = expectReport(await analyzeForm(await toBytes(doc, RAW)));

      expect(report.fields).toEqual([]);
      expect(report.warnings).toEqual([
        'Page 0: widget mystery at (100, 100, 150, 120) has unsupported field type none; dropped',
        'Page 0: widget exotic at (100, 200, 150, 220) has unsupported field type /Xx; dropped',
      ]);
      expect(report.diagnostics.map((d) => d.kind)).toEqual(['unresolved-type', 'unresolved-type']);
    });

    it('should keep analyzing the other pages when one cannot be read', async () => {
      const { doc, pages } = await createDocument(2);
      const broken = doc.context.stream('0 0 10 10 re S', { Filter: 'JBIG2Decode' });
      pages[0].node.set(PDFName.of('Contents'), doc.context.register(broken));
      drawBox(pages[1], 50, 600, 10, 10);

      const report = expectReport(await analyzeForm(await toBytes(doc)));

      expect(report.warnings).toHaveLength(1);
      expect(report.warnings[0]).toMatch(/^Page 0: content could not be read/);
      expect(report.fields.map((f) => [f.pageIndex, f.fieldType])).toEqual([[1, 'Checkbox']]);
    });

    it('should report a page whose Form XObject draws itself', async () => {
      const { doc, pages } = await createDocument();
      const form = registerSelfDrawingForm(doc, 'Fm0', '0 0 10 10 re S /Fm0 Do /Fm0 Do /Fm0 Do');
      addPageContent(doc, pages[0], '/Fm0 Do', { Fm0: form });
      const bytes = await toBytes(doc);

      const inferred = expectReport(await analyzeForm(bytes));
      const widgetsOnly = expectReport(await analyzeForm(bytes, { enableLayoutInference: false }));

      expect(inferred.warnings).toEqual(['Page 0: content could not be read (Form XObject /Fm0 draws itself)']);
      expect(inferred.fields).toEqual([]);
      expect(widgetsOnly.warnings).toEqual([]);
      expect(widgetsOnly.document).toEqual({ pageCount: 1, hasAcroForm: false });
    });

    it('should hold pages to the configured content budget', async () => {
      const { doc, pages } = await createDocument();
      const leaf = registerFormXObject(doc, '0 0 1 1 re S\n');
      const branch = registerFormXObject(doc, '/Leaf Do\n'.repeat(20), { Leaf: leaf });
      addPageContent(doc, pages[0], '/Branch Do\n'.repeat(20), { Branch: branch });

      const report = expectReport(await analyzeForm(await toBytes(doc), { maxPageContentBytes: 1000 }));

      expect(report.warnings).toEqual(['Page 0: content could not be read (content expands past 1000 bytes)']);
    });
  });

  describe('failures', () => {
    it('should return a corrupt load error for a truncated header', async () => {
      const outcome = await analyzeForm(Buffer.from('%PD'));

      expect(outcome).toEqual({
        success: false,
        error: { reason: 'corrupt', message: 'PDF header is truncated' },
      });
    });

    it('should return a not-a-pdf load error for other bytes', async () => {
      const outcome = await analyzeForm(Buffer.from('hello world'));

      expect(outcome.success).toBe(false);
      if (!outcome.success) {
        expect(outcome.error.reason).toBe('not-a-pdf');
      }
    });

    it('should reject invalid options', async () => {
      const { doc } = await createDocument();
      const bytes = await toBytes(doc);

      await expect(analyzeForm(bytes, { iouMergeThreshold: 2 })).rejects.toThrow(AnalysisOptionsError);
    });
  });
});

describe('FormFieldAnalyzer', () => {
  it('should apply defaults to the options it is given', () => {
    const analyzer = new FormFieldAnalyzer({ enableLayoutInference: false });

    expect(analyzer.options.enableLayoutInference).toBe(false);
    expect(analyzer.options.iouMergeThreshold).toBe(0.5);
    expect(analyzer.options.minInferenceConfidence).toBe(0.4);
    expect(analyzer.options.inference.labelGap).toBe(40);
  });

  it('should validate options when constructed', () => {
    expect(() => new FormFieldAnalyzer({ minInferenceConfidence: -1 })).toThrow(AnalysisOptionsError);
    expect(() => createFormFieldAnalyzer({ inference: { minBoxArea: 500, maxBoxArea: 100 } })).toThrow(
      AnalysisOptionsError
    );
  });

  it('should analyze documents with its bound options', async () => {
    const analyzer = createFormFieldAnalyzer({ enableLayoutInference: false });
    const bytes = await toBytes(await buildWidgetForm());

    const report = expectReport(await analyzer.analyze(bytes));

    expect(report.totalFields).toBe(5);
  });
});
