/**
 * Field Merger
 *
 * Combines classified widgets and inferred candidates into one deduplicated,
 * ordered list of field records. A candidate that overlaps an existing group
 * (widget or earlier candidate) on the same page by more than the IoU
 * threshold joins it instead of producing a second record.
 *
 * Inputs are sorted into a canonical order before grouping, so the output
 * depends only on the set of detections, never on the order they arrive in.
 */

import {
  SOURCE_METHOD_ORDER,
  type BoundingBox,
  type FieldRecord,
  type FieldSourceMethod,
  type FieldType,
  type InferredCandidate,
  type RawWidget,
} from '../types/form-fields.js';
import { intersectionOverUnion } from '../utils/geometry.js';
import { logger } from '../utils/logger.js';

const log = logger.merger;

export interface ClassifiedWidget {
  widget: RawWidget;
  fieldType: FieldType;
}

export interface ClassifiedCandidate {
  candidate: InferredCandidate;
  fieldType: FieldType;
}

export interface MergeOptions {
  /** Candidates join a group only when IoU is strictly above this */
  iouThreshold: number;
}

interface FieldGroup {
  pageIndex: number;
  bbox: BoundingBox;
  widget?: ClassifiedWidget;
  /** Highest confidence first */
  members: ClassifiedCandidate[];
}

// ============================================
// CANONICAL ORDER
// ============================================

function compareNumbers(a: number, b: number): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Page ascending, then top to bottom, then left to right
 */
function comparePosition(pageA: number, a: BoundingBox, pageB: number, b: BoundingBox): number {
  return (
    compareNumbers(pageA, pageB) ||
    compareNumbers(b.y0, a.y0) ||
    compareNumbers(a.x0, b.x0) ||
    compareNumbers(b.y1, a.y1) ||
    compareNumbers(a.x1, b.x1)
  );
}

function compareWidgets(a: ClassifiedWidget, b: ClassifiedWidget): number {
  return (
    comparePosition(a.widget.pageIndex, a.widget.bbox, b.widget.pageIndex, b.widget.bbox) ||
    compareStrings(a.widget.name, b.widget.name) ||
    compareStrings(a.fieldType, b.fieldType)
  );
}

function compareCandidates(a: ClassifiedCandidate, b: ClassifiedCandidate): number {
  const ca = a.candidate;
  const cb = b.candidate;
  return (
    compareNumbers(ca.pageIndex, cb.pageIndex) ||
    compareNumbers(cb.confidence, ca.confidence) ||
    comparePosition(ca.pageIndex, ca.bbox, cb.pageIndex, cb.bbox) ||
    compareStrings(ca.method, cb.method) ||
    compareStrings(ca.patternKind, cb.patternKind) ||
    compareStrings(a.fieldType, b.fieldType) ||
    compareStrings(ca.label ?? '', cb.label ?? '')
  );
}

/**
 * Output order: page ascending, bbox.y0 descending (top of the page first in
 * PDF user space), bbox.x0 ascending, then name.
 */
export function compareFieldRecords(a: FieldRecord, b: FieldRecord): number {
  return (
    compareNumbers(a.pageIndex, b.pageIndex) ||
    compareNumbers(b.bbox.y0, a.bbox.y0) ||
    compareNumbers(a.bbox.x0, b.bbox.x0) ||
    compareStrings(a.name, b.name)
  );
}

export function inferredFieldName(pageIndex: number, index: number): string {
  return `inferred_${pageIndex}_${index}`;
}

// ============================================
// GROUPING
// ============================================

function sortMethods(methods: Iterable<FieldSourceMethod>): FieldSourceMethod[] {
  const present = new Set(methods);
  return SOURCE_METHOD_ORDER.filter((method) => present.has(method));
}

function findBestGroup(groups: readonly FieldGroup[], candidate: InferredCandidate, threshold: number): FieldGroup | undefined {
  let best: FieldGroup | undefined;
  let bestIoU = threshold;
  for (const group of groups) {
    if (group.pageIndex !== candidate.pageIndex) continue;
    const iou = intersectionOverUnion(group.bbox, candidate.bbox);
    if (iou > bestIoU) {
      best = group;
      bestIoU = iou;
    }
  }
  return best;
}

function groupToRecord(group: FieldGroup): FieldRecord {
  const methods = [
    ...(group.widget ? (['widget'] as const) : []),
    ...group.members.map((member) => member.candidate.method),
  ];
  const label = group.members.find((member) => member.candidate.label !== undefined)?.candidate.label;

  if (group.widget) {
    const { widget, fieldType } = group.widget;
    return {
      fieldType,
      name: widget.name,
      pageIndex: widget.pageIndex,
      bbox: { ...widget.bbox },
      sourceMethods: sortMethods(methods),
      confidence: 1,
      ...(label !== undefined && { label }),
      required: widget.required,
      readOnly: widget.readOnly,
      ...(widget.tooltip !== undefined && { tooltip: widget.tooltip }),
      ...(widget.options !== undefined && { options: [...widget.options] }),
      ...(widget.value !== undefined && { value: widget.value }),
    };
  }

  const [best] = group.members;
  return {
    fieldType: best.fieldType,
    name: '',
    pageIndex: best.candidate.pageIndex,
    bbox: { ...best.candidate.bbox },
    sourceMethods: sortMethods(methods),
    confidence: best.candidate.confidence,
    ...(label !== undefined && { label }),
    required: false,
    readOnly: false,
  };
}

/**
 * Merge both detection passes into ordered field records.
 */
export function mergeFields(
  widgets: readonly ClassifiedWidget[],
  candidates: readonly ClassifiedCandidate[],
  options: MergeOptions
): FieldRecord[] {
  const groups: FieldGroup[] = [...widgets].sort(compareWidgets).map((widget) => ({
    pageIndex: widget.widget.pageIndex,
    bbox: widget.widget.bbox,
    widget,
    members: [],
  }));

  let joined = 0;
  for (const entry of [...candidates].sort(compareCandidates)) {
    const group = findBestGroup(groups, entry.candidate, options.iouThreshold);
    if (group) {
      group.members.push(entry);
      joined++;
    } else {
      groups.push({ pageIndex: entry.candidate.pageIndex, bbox: entry.candidate.bbox, members: [entry] });
    }
  }

  const records = groups.map(groupToRecord).sort(compareFieldRecords);

  const inferredCountByPage = new Map<number, number>();
  for (const record of records) {
    if (record.name !== '') continue;
    const index = inferredCountByPage.get(record.pageIndex) ?? 0;
    inferredCountByPage.set(record.pageIndex, index + 1);
    record.name = inferredFieldName(record.pageIndex, index);
  }

  log.debug('Merged detections', {
    widgets: widgets.length,
    candidates: candidates.length,
    joined,
    fields: records.length,
  });

  return records;
}
