// Built-in constraint kinds for integer and text fields

import {
  IntConstraint,
  IntConstraintKind,
  TextConstraint,
  TextConstraintKind
} from '../../models/constraint.js';
import { assertNever, ConstraintViolationError, InvalidAnnotationError } from '../../core/errors.js';

export const INT_CONSTRAINT_KINDS: readonly IntConstraintKind[] = ['min', 'max', 'in'];
export const TEXT_CONSTRAINT_KINDS: readonly TextConstraintKind[] = ['min', 'max', 'len', 'in'];

const INTEGER_PATTERN = /^-?\d+$/;

export function findIntConstraintKind(key: string): IntConstraintKind | undefined {
  return INT_CONSTRAINT_KINDS.find(kind => kind === key);
}

export function findTextConstraintKind(key: string): TextConstraintKind | undefined {
  return TEXT_CONSTRAINT_KINDS.find(kind => kind === key);
}

/**
 * Parses a decimal integer with an optional leading minus sign.
 * Values outside Number.MIN_SAFE_INTEGER..Number.MAX_SAFE_INTEGER are rejected as malformed.
 */
export function parseInteger(raw: string): number {
  if (!INTEGER_PATTERN.test(raw)) {
    throw new InvalidAnnotationError(raw, `"${raw}" is not an integer`);
  }
  const value = Number(raw);
  if (!Number.isSafeInteger(value)) {
    throw new InvalidAnnotationError(raw, `"${raw}" is out of integer range`);
  }
  return value;
}

export function parseIntegerList(raw: string): number[] {
  return raw.split(',').map(parseInteger);
}

/**
 * Length in code points, so astral characters count once
 */
export function textLength(value: string): number {
  return Array.from(value).length;
}

function formatMembers(members: ReadonlyArray<number | string>): string {
  return `[${members.join(', ')}]`;
}

export function createIntConstraint(kind: IntConstraintKind, raw: string): IntConstraint {
  switch (kind) {
    case 'min':
      return { target: 'int', kind, bound: parseInteger(raw) };
    case 'max':
      return { target: 'int', kind, bound: parseInteger(raw) };
    case 'in':
      return { target: 'int', kind, members: parseIntegerList(raw) };
    default:
      return assertNever(kind, 'int constraint');
  }
}

export function createTextConstraint(kind: TextConstraintKind, raw: string): TextConstraint {
  switch (kind) {
    case 'min':
      return { target: 'string', kind, bound: parseInteger(raw) };
    case 'max':
      return { target: 'string', kind, bound: parseInteger(raw) };
    case 'len':
      return { target: 'string', kind, length: parseInteger(raw) };
    case 'in':
      // Members are taken as-is, empty strings included
      return { target: 'string', kind, members: raw.split(',') };
    default:
      return assertNever(kind, 'string constraint');
  }
}

/**
 * Returns the violation for an integer value, or null when it satisfies the constraint
 */
export function evaluateIntConstraint(constraint: IntConstraint, value: number): ConstraintViolationError | null {
  switch (constraint.kind) {
    case 'min':
      return value < constraint.bound
        ? new ConstraintViolationError(`${value} is less than min allowed ${constraint.bound}`, {
            constraint: 'int.min', value, bound: constraint.bound
          })
        : null;
    case 'max':
      return value > constraint.bound
        ? new ConstraintViolationError(`${value} is higher than max allowed ${constraint.bound}`, {
            constraint: 'int.max', value, bound: constraint.bound
          })
        : null;
    case 'in':
      return constraint.members.includes(value)
        ? null
        : new ConstraintViolationError(`${value} is not in ${formatMembers(constraint.members)}`, {
            constraint: 'int.in', value, members: constraint.members
          });
    default:
      return assertNever(constraint, 'int constraint');
  }
}

/**
 * Returns the violation for a text value, or null when it satisfies the constraint
 */
export function evaluateTextConstraint(constraint: TextConstraint, value: string): ConstraintViolationError | null {
  const length = textLength(value);

  switch (constraint.kind) {
    case 'min':
      return length < constraint.bound
        ? new ConstraintViolationError(`len of ${value} is less than min allowed ${constraint.bound}`, {
            constraint: 'string.min', value, length, bound: constraint.bound
          })
        : null;
    case 'max':
      return length > constraint.bound
        ? new ConstraintViolationError(`len of ${value} is higher than max allowed ${constraint.bound}`, {
            constraint: 'string.max', value, length, bound: constraint.bound
          })
        : null;
    case 'len':
      return length !== constraint.length
        ? new ConstraintViolationError(`len of ${value} is not equal to ${constraint.length}`, {
            constraint: 'string.len', value, length, expected: constraint.length
          })
        : null;
    case 'in':
      return constraint.members.includes(value)
        ? null
        : new ConstraintViolationError(`${value} is not in ${formatMembers(constraint.members)}`, {
            constraint: 'string.in', value, members: constraint.members
          });
    default:
      return assertNever(constraint, 'string constraint');
  }
}
