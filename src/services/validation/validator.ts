// Record validator: walks registered shapes and collects field errors

import { FieldDescriptor, RecordShape, ScalarKind } from '../../models/types.js';
import {
  assertFieldKind,
  ConstraintViolationError,
  FieldError,
  FieldTypeMismatchError,
  InvalidAnnotationError,
  NotRecordError,
  UnexportedFieldError,
  UnregisteredRecordError,
  ValidationErrors,
  ValidatorError
} from '../../core/errors.js';
import { Logger } from '../../core/logger.js';
import { validateValidatorConfig } from '../../core/schemas.js';
import { evaluateIntConstraint, evaluateTextConstraint } from '../constraints/constraint-set.js';
import { parseConstraints } from '../constraints/parser.js';
import { defaultRegistry, ShapeRegistry } from '../registry/shape-registry.js';

/**
 * Outcome of a validate call: null when every constraint holds
 */
export type ValidationOutcome = ValidationErrors | NotRecordError | null;

export interface ValidatorOptions {
  /** Where record shapes are looked up (defaults to the shared registry) */
  registry?: ShapeRegistry;
  /** Tag key holding the annotation (defaults to "validate") */
  tagName?: string;
  logger?: Logger;
}

/**
 * Per-call traversal state
 */
interface Traversal {
  log: Logger;
  /** Records on the current path, so cyclic object graphs terminate */
  active: Set<object>;
}

function isSafeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value);
}

function describeValue(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  if (typeof value === 'number' && !Number.isSafeInteger(value)) {
    return Number.isNaN(value) ? 'NaN' : `non-integer number ${value}`;
  }
  if (typeof value === 'object') {
    return value.constructor?.name ? `object (${value.constructor.name})` : 'object';
  }
  return typeof value;
}

function tryParse<T>(parse: () => T[]): T[] | InvalidAnnotationError {
  try {
    return parse();
  } catch (error) {
    if (error instanceof InvalidAnnotationError) {
      return error;
    }
    throw error;
  }
}

export class Validator {
  private readonly registry: ShapeRegistry;
  private readonly tagName: string;
  private readonly logger?: Logger;

  constructor(options: ValidatorOptions = {}) {
    const config = validateValidatorConfig({ tagName: options.tagName });
    this.registry = options.registry ?? defaultRegistry;
    this.tagName = config.tagName;
    this.logger = options.logger;
  }

  /**
   * Validate a record against its registered shape.
   *
   * Returns NotRecordError when the value is not an instance of a registered class,
   * ValidationErrors when any field fails, and null otherwise.
   */
  validate(value: unknown): ValidationOutcome {
    const traversal: Traversal = {
      log: (this.logger ?? Logger.getInstance()).child('validator'),
      active: new Set()
    };

    const shape = this.registry.shapeOf(value);
    if (!shape) {
      traversal.log.debug('Value is not a registered record', { received: describeValue(value) });
      return new NotRecordError({ received: describeValue(value) });
    }

    const result = this.validateRecord(value, shape, traversal);
    if (result instanceof NotRecordError) {
      return result;
    }
    if (result.length === 0) {
      return null;
    }

    traversal.log.debug('Validation failed', { record: shape.name, errors: result.length });
    return new ValidationErrors(result);
  }

  /**
   * Throws whatever validate would return
   */
  assertValid(value: unknown): void {
    const outcome = this.validate(value);
    if (outcome !== null) {
      throw outcome;
    }
  }

  private validateRecord(value: unknown, shape: RecordShape, traversal: Traversal): FieldError[] | NotRecordError {
    if (typeof value !== 'object' || value === null) {
      return new NotRecordError({ record: shape.name, received: describeValue(value) });
    }

    const errors: FieldError[] = [];
    if (traversal.active.has(value)) {
      return errors;
    }
    traversal.active.add(value);

    for (const field of shape.fields) {
      if (!this.needsValidation(field, new Set())) {
        continue;
      }

      if (!field.exported) {
        errors.push(new FieldError(field.name, new UnexportedFieldError()));
        continue;
      }

      const fieldValue: unknown = Reflect.get(value, field.name);
      const { type } = field;

      switch (type.kind) {
        case 'record': {
          const nestedShape = this.registry.get(type.of);
          if (!nestedShape) {
            traversal.log.warn('Nested record class is not registered', { field: field.name, record: type.of.name });
            errors.push(new FieldError(field.name, new UnregisteredRecordError(type.of.name)));
            break;
          }
          const nested = this.validateRecord(fieldValue, nestedShape, traversal);
          if (nested instanceof NotRecordError) {
            errors.push(new FieldError(field.name, nested));
          } else {
            errors.push(...nested.map(error => new FieldError(field.name, error)));
          }
          break;
        }
        case 'int':
        case 'string':
          errors.push(...this.validateLeaf(field, type.kind, fieldValue, traversal)
            .map(cause => new FieldError(field.name, cause)));
          break;
        case 'float':
        case 'bool':
        case 'list':
        case 'map':
        case 'ref':
          break;
        default:
          assertFieldKind(type);
      }
    }

    traversal.active.delete(value);
    return errors;
  }

  /**
   * Leaf fields need validation when tagged; nested records when any field inside them does,
   * or when their class was never registered
   */
  private needsValidation(field: FieldDescriptor, visiting: Set<RecordShape>): boolean {
    const { type } = field;

    switch (type.kind) {
      case 'int':
      case 'string':
        return Object.hasOwn(field.tags, this.tagName);
      case 'record': {
        const nestedShape = this.registry.get(type.of);
        if (!nestedShape) {
          // Reported when the field is visited
          return true;
        }
        if (visiting.has(nestedShape)) {
          return false;
        }
        visiting.add(nestedShape);
        const needed = nestedShape.fields.some(nested => this.needsValidation(nested, visiting));
        visiting.delete(nestedShape);
        return needed;
      }
      case 'float':
      case 'bool':
      case 'list':
      case 'map':
      case 'ref':
        return false;
      default:
        return assertFieldKind(type);
    }
  }

  private validateLeaf(
    field: FieldDescriptor,
    kind: ScalarKind,
    fieldValue: unknown,
    traversal: Traversal
  ): ValidatorError[] {
    const annotation = field.tags[this.tagName];

    switch (kind) {
      case 'int': {
        const constraints = tryParse(() => parseConstraints('int', annotation));
        if (constraints instanceof InvalidAnnotationError) {
          traversal.log.debug('Rejected annotation', { field: field.name, annotation, reason: constraints.reason });
          return [constraints];
        }
        if (!isSafeInteger(fieldValue)) {
          return [new FieldTypeMismatchError('int', describeValue(fieldValue))];
        }
        const value = fieldValue;
        return constraints
          .map(constraint => evaluateIntConstraint(constraint, value))
          .filter((violation): violation is ConstraintViolationError => violation !== null);
      }
      case 'string': {
        const constraints = tryParse(() => parseConstraints('string', annotation));
        if (constraints instanceof InvalidAnnotationError) {
          traversal.log.debug('Rejected annotation', { field: field.name, annotation, reason: constraints.reason });
          return [constraints];
        }
        if (typeof fieldValue !== 'string') {
          return [new FieldTypeMismatchError('string', describeValue(fieldValue))];
        }
        const value = fieldValue;
        return constraints
          .map(constraint => evaluateTextConstraint(constraint, value))
          .filter((violation): violation is ConstraintViolationError => violation !== null);
      }
      default:
        return assertFieldKind(kind);
    }
  }
}

const defaultValidator = new Validator();

/**
 * Validate a record using the default registry
 */
export function validate(value: unknown): ValidationOutcome {
  return defaultValidator.validate(value);
}

/**
 * Throw the NotRecordError or ValidationErrors that validate would return
 */
export function assertValid(value: unknown): void {
  defaultValidator.assertValid(value);
}
