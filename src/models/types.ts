// Core type definitions for record shapes

/**
 * Any class whose instances can be registered as records
 */
export type RecordClass<T extends object = object> = abstract new (...args: never[]) => T;

// Field kinds
export type ScalarKind = 'int' | 'string';
export type OpaqueKind = 'float' | 'bool' | 'list' | 'map' | 'ref';
export type FieldKindName = ScalarKind | OpaqueKind;

export const SCALAR_KINDS: readonly ScalarKind[] = ['int', 'string'];

export interface ScalarFieldType {
  kind: ScalarKind;
}

export interface OpaqueFieldType {
  kind: OpaqueKind;
}

export interface RecordFieldType {
  kind: 'record';
  of: RecordClass;
}

export type FieldType = ScalarFieldType | OpaqueFieldType | RecordFieldType;

/**
 * Field as written by callers when registering a record class
 */
export interface FieldDeclaration {
  name: string;
  type: FieldKindName | RecordClass;
  /** Defaults to true */
  exported?: boolean;
  tags?: Record<string, string>;
}

/**
 * Normalized field, derived from the declaration and never from a value
 */
export interface FieldDescriptor {
  readonly name: string;
  readonly type: FieldType;
  readonly exported: boolean;
  readonly tags: Readonly<Record<string, string>>;
}

export interface RecordDeclaration {
  /** Defaults to the class name */
  name?: string;
  fields: FieldDeclaration[];
}

export interface RecordShape {
  readonly name: string;
  readonly fields: readonly FieldDescriptor[];
}

export function isScalarKind(kind: FieldKindName): kind is ScalarKind {
  return SCALAR_KINDS.some(scalar => scalar === kind);
}
