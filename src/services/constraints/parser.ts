// Annotation parser: "key:value;key:value" -> constraints

import { Constraint, IntConstraint, TextConstraint } from '../../models/constraint.js';
import { ScalarKind } from '../../models/types.js';
import { assertFieldKind, InvalidAnnotationError } from '../../core/errors.js';
import {
  createIntConstraint,
  createTextConstraint,
  findIntConstraintKind,
  findTextConstraintKind
} from './constraint-set.js';

const CLAUSE_SEPARATOR = ';';
const KEY_VALUE_SEPARATOR = ':';

interface Clause {
  key: string;
  value: string;
}

function splitClause(annotation: string, clause: string): Clause {
  const parts = clause.split(KEY_VALUE_SEPARATOR);
  if (parts.length !== 2) {
    throw new InvalidAnnotationError(annotation, `clause "${clause}" must contain exactly one "${KEY_VALUE_SEPARATOR}"`);
  }
  const [key, value] = parts;
  if (key.length === 0 || value.length === 0) {
    throw new InvalidAnnotationError(annotation, `clause "${clause}" needs both a key and a value`);
  }
  return { key, value };
}

function createConstraint(kind: ScalarKind, annotation: string, { key, value }: Clause): Constraint {
  switch (kind) {
    case 'int': {
      const constraintKind = findIntConstraintKind(key);
      if (!constraintKind) {
        throw new InvalidAnnotationError(annotation, `unknown int constraint "${key}"`);
      }
      return createIntConstraint(constraintKind, value);
    }
    case 'string': {
      const constraintKind = findTextConstraintKind(key);
      if (!constraintKind) {
        throw new InvalidAnnotationError(annotation, `unknown string constraint "${key}"`);
      }
      return createTextConstraint(constraintKind, value);
    }
    default:
      return assertFieldKind(kind);
  }
}

/**
 * Parses a field annotation into constraints, in clause order.
 * Any bad clause rejects the whole annotation with InvalidAnnotationError.
 * Throws UnsupportedFieldKindDefect for kinds other than int and string.
 */
export function parseConstraints(kind: 'int', annotation: string): IntConstraint[];
export function parseConstraints(kind: 'string', annotation: string): TextConstraint[];
export function parseConstraints(kind: ScalarKind, annotation: string): Constraint[];
export function parseConstraints(kind: ScalarKind, annotation: string): Constraint[] {
  return annotation.split(CLAUSE_SEPARATOR).map(clause => {
    const parsed = splitClause(annotation, clause);
    try {
      return createConstraint(kind, annotation, parsed);
    } catch (error) {
      if (error instanceof InvalidAnnotationError && error.annotation !== annotation) {
        // Parameter errors carry only the raw value; report against the whole annotation
        throw new InvalidAnnotationError(annotation, error.reason);
      }
      throw error;
    }
  });
}
