// Error types for record validation

/**
 * Base error class for all user-facing validation errors
 */
export abstract class ValidatorError extends Error {
  abstract readonly code: string;

  constructor(message: string, public readonly context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context
    };
  }
}

/**
 * The value handed to validate is not a record
 */
export class NotRecordError extends ValidatorError {
  readonly code = 'NOT_RECORD';

  constructor(context?: Record<string, unknown>) {
    super('wrong argument given, should be a record', context);
  }
}

/**
 * An annotated field is not exported and cannot be read
 */
export class UnexportedFieldError extends ValidatorError {
  readonly code = 'UNEXPORTED_FIELD';

  constructor() {
    super('validation for unexported field is not allowed');
  }
}

/**
 * Annotation text does not follow the key:value grammar, or a parameter is invalid
 */
export class InvalidAnnotationError extends ValidatorError {
  readonly code = 'INVALID_ANNOTATION';

  constructor(public readonly annotation: string, public readonly reason?: string) {
    super('invalid validator syntax', { annotation, reason });
  }
}

/**
 * Runtime value does not match the field's declared kind
 */
export class FieldTypeMismatchError extends ValidatorError {
  readonly code = 'FIELD_TYPE_MISMATCH';

  constructor(public readonly expected: string, public readonly actual: string) {
    super(`expected ${expected} value, got ${actual}`, { expected, actual });
  }
}

/**
 * A constraint's predicate failed against the field value
 */
export class ConstraintViolationError extends ValidatorError {
  readonly code = 'CONSTRAINT_VIOLATION';
}

/**
 * A field declares a nested record class that was never registered
 */
export class UnregisteredRecordError extends ValidatorError {
  readonly code = 'UNREGISTERED_RECORD';

  constructor(public readonly record: string) {
    super(`record class ${record} is not registered`, { record });
  }
}

/**
 * Error qualified by the name of the field it belongs to.
 * Nested records produce chains: outer -> inner -> cause.
 */
export class FieldError extends ValidatorError {
  readonly code = 'FIELD_ERROR';

  constructor(public readonly field: string, public readonly cause: ValidatorError) {
    super(`${field}: ${cause.message}`, { field });
  }

  /**
   * Innermost cause, past every level of field wrapping
   */
  rootCause(): ValidatorError {
    let current: ValidatorError = this.cause;
    while (current instanceof FieldError) {
      current = current.cause;
    }
    return current;
  }

  /**
   * Field names from the outermost record down to the failing field
   */
  path(): string[] {
    const names = [this.field];
    let current: ValidatorError = this.cause;
    while (current instanceof FieldError) {
      names.push(current.field);
      current = current.cause;
    }
    return names;
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), field: this.field, cause: this.cause.toJSON() };
  }
}

/**
 * Every field error produced by one validate call, in field order.
 * A single error renders as its bare cause message.
 */
export class ValidationErrors extends ValidatorError {
  readonly code = 'VALIDATION_FAILED';

  constructor(public readonly errors: readonly FieldError[]) {
    super(ValidationErrors.render(errors), { count: errors.length });
  }

  private static render(errors: readonly FieldError[]): string {
    if (errors.length === 1) {
      return errors[0].cause.message;
    }
    return errors.map(error => error.message).join('\n');
  }

  get length(): number {
    return this.errors.length;
  }

  [Symbol.iterator](): Iterator<FieldError> {
    return this.errors[Symbol.iterator]();
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), errors: this.errors.map(error => error.toJSON()) };
  }
}

/**
 * A record declaration was rejected at registration
 */
export class ShapeDeclarationError extends ValidatorError {
  readonly code = 'SHAPE_DECLARATION_ERROR';
}

/**
 * Validator options failed their schema
 */
export class ConfigurationError extends ValidatorError {
  readonly code = 'CONFIGURATION_ERROR';
}

/**
 * Internal defect: a switch over a tagged variant met a tag it does not handle.
 * Thrown, never aggregated.
 */
export class UnhandledVariantDefect extends Error {
  constructor(public readonly variant: string, public readonly tag: string, message = `unhandled ${variant}: ${tag}`) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * A non-scalar kind reached the constraint parser, or an unknown field kind reached the engine
 */
export class UnsupportedFieldKindDefect extends UnhandledVariantDefect {
  constructor(public readonly kind: string) {
    super('field kind', kind, `unsupported field kind: ${kind}`);
  }
}

/**
 * Format any thrown or returned error for display
 */
export function formatError(error: unknown): string {
  if (error instanceof ValidationErrors) {
    const count = error.length === 1 ? '1 error' : `${error.length} errors`;
    return `Validation failed (${count}):\n${error.errors.map(e => `  - ${e.message}`).join('\n')}`;
  }

  if (error instanceof FieldError) {
    return `Field Error (field: ${error.field}): ${error.cause.message}`;
  }

  if (error instanceof ValidatorError) {
    return `Error [${error.code}]: ${error.message}`;
  }

  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }

  return `Unknown error: ${String(error)}`;
}

function tagOf(value: unknown): string {
  return String(typeof value === 'object' && value !== null ? Reflect.get(value, 'kind') : value);
}

/**
 * Exhaustiveness guard for switches over tagged variants
 */
export function assertNever(value: never, variant: string): never {
  throw new UnhandledVariantDefect(variant, tagOf(value));
}

/**
 * Exhaustiveness guard for switches over field kinds
 */
export function assertFieldKind(value: never): never {
  throw new UnsupportedFieldKindDefect(tagOf(value));
}
