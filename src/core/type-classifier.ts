/**
 * Type Classifier
 *
 * Maps AcroForm type codes and inferred pattern kinds onto the public field
 * taxonomy. Both tables are closed Records, so adding a code or a pattern
 * kind without a mapping fails to compile.
 */

import {
  UNRESOLVED,
  type ClassifiedType,
  type FieldType,
  type PatternKind,
  type WidgetTypeCode,
} from '../types/form-fields.js';
import { FLAG_PUSHBUTTON, FLAG_RADIO } from './widget-scanner.js';

type WidgetClassifier = (flags: number) => FieldType;

const WIDGET_TYPES: Record<WidgetTypeCode, WidgetClassifier> = {
  '/Tx': () => 'Text',
  '/Btn': (flags) => {
    if (flags & FLAG_RADIO) return 'Radio Button';
    if (flags & FLAG_PUSHBUTTON) return 'Button';
    return 'Checkbox';
  },
  '/Ch': () => 'Dropdown',
  '/Sig': () => 'Signature',
};

export const WIDGET_TYPE_CODES = Object.keys(WIDGET_TYPES).filter(isWidgetTypeCode);

const PATTERN_TYPES: Record<PatternKind, FieldType> = {
  'text-box': 'Text',
  'square-box': 'Checkbox',
  'choice-square': 'Radio Button',
  underline: 'Text',
  'signature-line': 'Signature',
  'underscore-run': 'Text',
  'date-mask': 'Text',
  'dot-leader': 'Text',
  'checkbox-glyph': 'Checkbox',
  'choice-glyph': 'Radio Button',
};

export const PATTERN_KINDS = Object.keys(PATTERN_TYPES).filter(isPatternKind);

function isWidgetTypeCode(code: string): code is WidgetTypeCode {
  return Object.prototype.hasOwnProperty.call(WIDGET_TYPES, code);
}

function isPatternKind(kind: string): kind is PatternKind {
  return Object.prototype.hasOwnProperty.call(PATTERN_TYPES, kind);
}

/**
 * Classify a widget from its /FT code and /Ff flags
 */
export function classifyWidget(typeCode: string, flags: number): ClassifiedType {
  return isWidgetTypeCode(typeCode) ? WIDGET_TYPES[typeCode](flags) : UNRESOLVED;
}

export function classifyPattern(kind: PatternKind): FieldType {
  return PATTERN_TYPES[kind];
}

export function isResolved(type: ClassifiedType): type is FieldType {
  return type !== UNRESOLVED;
}
