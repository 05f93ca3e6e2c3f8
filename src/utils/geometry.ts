/**
 * Bounding-box and transformation-matrix helpers
 */

import type { BoundingBox } from '../types/form-fields.js';

/**
 * PDF transformation matrix [a b c d e f]
 */
export type Matrix = readonly [number, number, number, number, number, number];

export const IDENTITY_MATRIX: Matrix = [1, 0, 0, 1, 0, 0];

/**
 * m1 × m2: apply m1 first, then m2 (PDF `cm` concatenates as newCTM = m × CTM)
 */
export function multiplyMatrices(m1: Matrix, m2: Matrix): Matrix {
  const [a1, b1, c1, d1, e1, f1] = m1;
  const [a2, b2, c2, d2, e2, f2] = m2;
  return [
    a1 * a2 + b1 * c2,
    a1 * b2 + b1 * d2,
    c1 * a2 + d1 * c2,
    c1 * b2 + d1 * d2,
    e1 * a2 + f1 * c2 + e2,
    e1 * b2 + f1 * d2 + f2,
  ];
}

export function transformPoint(m: Matrix, x: number, y: number): [number, number] {
  return [m[0] * x + m[2] * y + m[4], m[1] * x + m[3] * y + m[5]];
}

/**
 * Box from two opposite corners, in any order
 */
export function normalizeBox(xa: number, ya: number, xb: number, yb: number): BoundingBox {
  return {
    x0: Math.min(xa, xb),
    y0: Math.min(ya, yb),
    x1: Math.max(xa, xb),
    y1: Math.max(ya, yb),
  };
}

/**
 * Smallest box containing all the given points
 */
export function boxFromPoints(points: ReadonlyArray<readonly [number, number]>): BoundingBox {
  const xs = points.map((p) => p[0]);
  const ys = points.map((p) => p[1]);
  return {
    x0: Math.min(...xs),
    y0: Math.min(...ys),
    x1: Math.max(...xs),
    y1: Math.max(...ys),
  };
}

export function boxWidth(box: BoundingBox): number {
  return box.x1 - box.x0;
}

export function boxHeight(box: BoundingBox): number {
  return box.y1 - box.y0;
}

export function boxArea(box: BoundingBox): number {
  return boxWidth(box) * boxHeight(box);
}

export function intersectionArea(a: BoundingBox, b: BoundingBox): number {
  const width = Math.min(a.x1, b.x1) - Math.max(a.x0, b.x0);
  const height = Math.min(a.y1, b.y1) - Math.max(a.y0, b.y0);
  if (width <= 0 || height <= 0) return 0;
  return width * height;
}

/**
 * Intersection over union; 0 for disjoint or degenerate boxes
 */
export function intersectionOverUnion(a: BoundingBox, b: BoundingBox): number {
  const intersection = intersectionArea(a, b);
  if (intersection === 0) return 0;
  const union = boxArea(a) + boxArea(b) - intersection;
  return union > 0 ? intersection / union : 0;
}

/**
 * Compact representation for log and warning messages
 */
export function formatBox(box: BoundingBox): string {
  const round = (n: number) => Math.round(n * 10) / 10;
  return `(${round(box.x0)}, ${round(box.y0)}, ${round(box.x1)}, ${round(box.y1)})`;
}
