/**
 * Shape Registry
 *
 * Static table mapping each record class to its declared fields.
 * The validator reads shapes from here instead of inspecting values,
 * so a record's shape never depends on what an instance happens to hold.
 *
 * @module services/registry
 */

import {
  FieldDescriptor,
  FieldKindName,
  FieldType,
  isScalarKind,
  OpaqueKind,
  RecordClass,
  RecordDeclaration,
  RecordShape
} from '../../models/types.js';
import { ShapeDeclarationError } from '../../core/errors.js';
import { Logger } from '../../core/logger.js';
import { validateRecordDeclaration } from '../../core/schemas.js';

function toFieldType(type: FieldKindName | RecordClass): FieldType {
  if (typeof type !== 'string') {
    return { kind: 'record', of: type };
  }
  if (isScalarKind(type)) {
    return { kind: type };
  }
  const opaque: OpaqueKind = type;
  return { kind: opaque };
}

export interface ShapeRegistryOptions {
  logger?: Logger;
}

export class ShapeRegistry {
  private readonly shapes = new Map<Function, RecordShape>();
  private readonly logger?: Logger;

  constructor(options: ShapeRegistryOptions = {}) {
    this.logger = options.logger;
  }

  private get log(): Logger {
    return (this.logger ?? Logger.getInstance()).child('registry');
  }

  /**
   * Register a class as a record with the given fields.
   * Throws ShapeDeclarationError for malformed declarations or a class registered twice.
   */
  register<T extends object>(recordClass: RecordClass<T>, declaration: RecordDeclaration): RecordShape {
    if (this.shapes.has(recordClass)) {
      throw new ShapeDeclarationError(`Record already registered: ${recordClass.name}`, {
        record: recordClass.name
      });
    }

    const validated = validateRecordDeclaration(declaration);
    const fields: FieldDescriptor[] = validated.fields.map(field => Object.freeze({
      name: field.name,
      type: toFieldType(field.type),
      exported: field.exported,
      tags: Object.freeze({ ...field.tags })
    }));

    const shape: RecordShape = Object.freeze({
      name: validated.name ?? recordClass.name,
      fields: Object.freeze(fields)
    });

    this.shapes.set(recordClass, shape);
    this.log.debug('Registered record', { record: shape.name, fields: fields.length });
    return shape;
  }

  has(recordClass: RecordClass): boolean {
    return this.shapes.has(recordClass);
  }

  get(recordClass: RecordClass): RecordShape | undefined {
    return this.shapes.get(recordClass);
  }

  /**
   * Shape of the value's own class, or undefined when the value is not a registered record.
   * The class is read from the prototype; an own `constructor` property does not count.
   */
  shapeOf(value: unknown): RecordShape | undefined {
    if (typeof value !== 'object' || value === null) {
      return undefined;
    }
    const prototype: unknown = Object.getPrototypeOf(value);
    if (typeof prototype !== 'object' || prototype === null) {
      return undefined;
    }
    const recordClass: unknown = Reflect.get(prototype, 'constructor');
    return typeof recordClass === 'function' ? this.shapes.get(recordClass) : undefined;
  }

  unregister(recordClass: RecordClass): boolean {
    return this.shapes.delete(recordClass);
  }

  clear(): void {
    this.shapes.clear();
  }

  get size(): number {
    return this.shapes.size;
  }
}

export const defaultRegistry = new ShapeRegistry();

/**
 * Register a record class in the default registry
 */
export function registerRecord<T extends object>(
  recordClass: RecordClass<T>,
  declaration: RecordDeclaration
): RecordShape {
  return defaultRegistry.register(recordClass, declaration);
}
