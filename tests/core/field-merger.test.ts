/**
 * Tests for merging widget and inferred detections
 */

import { describe, it, expect } from 'vitest';
import {
  compareFieldRecords,
  inferredFieldName,
  mergeFields,
  type ClassifiedCandidate,
  type ClassifiedWidget,
} from '../../src/core/field-merger.js';
import type { BoundingBox, FieldType, InferredCandidate, RawWidget } from '../../src/types/form-fields.js';

const options = { iouThreshold: 0.5 };

function box(x0: number, y0: number, x1: number, y1: number): BoundingBox {
  return { x0, y0, x1, y1 };
}

function widget(name: string, bbox: BoundingBox, fieldType: FieldType = 'Text', pageIndex = 0): ClassifiedWidget {
  const raw: RawWidget = {
    typeCode: '/Tx',
    name,
    nameSynthesized: false,
    pageIndex,
    bbox,
    flags: 0,
    required: false,
    readOnly: false,
  };
  return { widget: raw, fieldType };
}

function candidate(
  bbox: BoundingBox,
  overrides: Partial<InferredCandidate> = {},
  fieldType: FieldType = 'Text'
): ClassifiedCandidate {
  return {
    candidate: {
      pageIndex: 0,
      bbox,
      patternKind: 'text-box',
      confidence: 0.7,
      method: 'layout',
      ...overrides,
    },
    fieldType,
  };
}

describe('mergeFields', () => {
  it('should produce one record per widget when there are no candidates', () => {
    const widgets = [
      widget('a', box(50, 700, 250, 720)),
      widget('b', box(50, 650, 62, 662), 'Checkbox'),
      widget('c', box(50, 600, 200, 620), 'Dropdown'),
    ];

    const records = mergeFields(widgets, [], options);

    expect(records).toHaveLength(3);
    for (const record of records) {
      expect(record.sourceMethods).toEqual(['widget']);
      expect(record.confidence).toBe(1);
    }
  });

  it('should merge a candidate that overlaps a widget by more than the threshold', () => {
    const records = mergeFields(
      [widget('full_name', box(0, 0, 100, 10))],
      [candidate(box(0, 0, 90, 10), { label: 'Full name' })],
      options
    );

    expect(records).toEqual([
      {
        fieldType: 'Text',
        name: 'full_name',
        pageIndex: 0,
        bbox: { x0: 0, y0: 0, x1: 100, y1: 10 },
        sourceMethods: ['widget', 'layout'],
        confidence: 1,
        label: 'Full name',
        required: false,
        readOnly: false,
      },
    ]);
  });

  it('should keep the widget type when the candidate disagrees', () => {
    const records = mergeFields(
      [widget('opt_in', box(0, 0, 10, 10), 'Checkbox')],
      [candidate(box(0, 0, 10, 10), { patternKind: 'choice-square' }, 'Radio Button')],
      options
    );

    expect(records.map((r) => [r.fieldType, r.sourceMethods])).toEqual([['Checkbox', ['widget', 'layout']]]);
  });

  it('should not merge at exactly the threshold', () => {
    const records = mergeFields(
      [widget('a', box(0, 0, 100, 10))],
      [candidate(box(0, 0, 50, 10))],
      options
    );

    expect(records.map((r) => [r.name, r.sourceMethods])).toEqual([
      ['a', ['widget']],
      ['inferred_0_0', ['layout']],
    ]);
  });

  it('should never merge two widgets', () => {
    const records = mergeFields(
      [widget('first', box(0, 0, 100, 10)), widget('second', box(0, 0, 100, 10))],
      [],
      options
    );

    expect(records.map((r) => r.name)).toEqual(['first', 'second']);
  });

  it('should not merge across pages', () => {
    const records = mergeFields(
      [widget('a', box(0, 0, 100, 10))],
      [candidate(box(0, 0, 100, 10), { pageIndex: 1 })],
      options
    );

    expect(records.map((r) => [r.name, r.pageIndex])).toEqual([
      ['a', 0],
      ['inferred_1_0', 1],
    ]);
  });

  it('should group overlapping candidates under the most confident one', () => {
    const records = mergeFields(
      [],
      [
        candidate(box(100, 500, 300, 514), { patternKind: 'underscore-run', method: 'visual', confidence: 0.6, label: 'Date' }),
        candidate(box(100, 500, 300, 516), { patternKind: 'underline', confidence: 0.65 }),
      ],
      options
    );

    expect(records).toEqual([
      {
        fieldType: 'Text',
        name: 'inferred_0_0',
        pageIndex: 0,
        bbox: { x0: 100, y0: 500, x1: 300, y1: 516 },
        sourceMethods: ['layout', 'visual'],
        confidence: 0.65,
        label: 'Date',
        required: false,
        readOnly: false,
      },
    ]);
  });

  it('should join the group with the highest overlap', () => {
    const records = mergeFields(
      [widget('left', box(0, 0, 100, 10)), widget('right', box(10, 0, 110, 10))],
      [candidate(box(8, 0, 108, 10))],
      options
    );

    expect(records.map((r) => [r.name, r.sourceMethods])).toEqual([
      ['left', ['widget']],
      ['right', ['widget', 'layout']],
    ]);
  });

  it('should order records by page, then top to bottom, then left to right', () => {
    const records = mergeFields(
      [
        widget('low', box(50, 300, 250, 320), 'Text', 2),
        widget('high', box(50, 700, 250, 720), 'Text', 2),
        widget('middle', box(50, 500, 250, 520), 'Text', 2),
        widget('right', box(300, 500, 400, 520), 'Text', 2),
        widget('first_page', box(50, 100, 250, 120), 'Text', 0),
      ],
      [],
      options
    );

    expect(records.map((r) => r.name)).toEqual(['first_page', 'high', 'middle', 'right', 'low']);
  });

  it('should number inferred records per page in output order', () => {
    const records = mergeFields(
      [],
      [
        candidate(box(50, 300, 250, 320), { pageIndex: 1 }),
        candidate(box(50, 700, 250, 720), { pageIndex: 1 }),
        candidate(box(50, 500, 250, 520), { pageIndex: 0 }),
      ],
      options
    );

    expect(records.map((r) => [r.name, r.pageIndex, r.bbox.y0])).toEqual([
      ['inferred_0_0', 0, 500],
      ['inferred_1_0', 1, 700],
      ['inferred_1_1', 1, 300],
    ]);
    expect(inferredFieldName(1, 1)).toBe('inferred_1_1');
  });

  it('should not depend on input order', () => {
    const widgets = [widget('a', box(0, 0, 100, 10)), widget('b', box(0, 50, 100, 60))];
    const candidates = [
      candidate(box(0, 0, 95, 10), { confidence: 0.7 }),
      candidate(box(0, 0, 92, 10), { method: 'visual', patternKind: 'underscore-run', confidence: 0.6 }),
      candidate(box(200, 200, 300, 214), { patternKind: 'underline', confidence: 0.65, label: 'City' }),
      candidate(box(200, 200, 300, 215), { confidence: 0.65, label: 'Town' }),
    ];

    const forward = mergeFields(widgets, candidates, options);
    const reversed = mergeFields([...widgets].reverse(), [...candidates].reverse(), options);

    expect(reversed).toEqual(forward);
  });

  it('should give the same result when run twice on the same input', () => {
    const widgets = [widget('a', box(0, 0, 100, 10))];
    const candidates = [candidate(box(0, 0, 95, 10)), candidate(box(300, 300, 400, 320))];

    expect(mergeFields(widgets, candidates, options)).toEqual(mergeFields(widgets, candidates, options));
  });

  it('should copy widget attributes onto the record', () => {
    const raw: RawWidget = {
      typeCode: '/Ch',
      name: 'country',
      nameSynthesized: false,
      pageIndex: 0,
      bbox: box(0, 0, 100, 20),
      flags: 3,
      required: true,
      readOnly: true,
      tooltip: 'Country of residence',
      options: ['France', 'Germany'],
      value: 'France',
    };

    const [record] = mergeFields([{ widget: raw, fieldType: 'Dropdown' }], [], options);

    expect(record).toEqual({
      fieldType: 'Dropdown',
      name: 'country',
      pageIndex: 0,
      bbox: { x0: 0, y0: 0, x1: 100, y1: 20 },
      sourceMethods: ['widget'],
      confidence: 1,
      required: true,
      readOnly: true,
      tooltip: 'Country of residence',
      options: ['France', 'Germany'],
      value: 'France',
    });
    expect(record.options).not.toBe(raw.options);
  });
});

describe('compareFieldRecords', () => {
  it('should break position ties by name', () => {
    const base = {
      fieldType: 'Text' as const,
      pageIndex: 0,
      bbox: box(0, 0, 10, 10),
      sourceMethods: ['widget' as const],
      confidence: 1,
      required: false,
      readOnly: false,
    };

    expect(compareFieldRecords({ ...base, name: 'a' }, { ...base, name: 'b' })).toBeLessThan(0);
    expect(compareFieldRecords({ ...base, name: 'b' }, { ...base, name: 'a' })).toBeGreaterThan(0);
  });
});
