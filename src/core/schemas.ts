// Zod schemas for record declarations and validator configuration

import { z } from 'zod';
import { RecordClass } from '../models/types.js';
import { ConfigurationError, ShapeDeclarationError } from './errors.js';

/**
 * Field kind names accepted in a declaration
 */
export const FieldKindNameSchema = z.enum(['int', 'string', 'float', 'bool', 'list', 'map', 'ref']);

/**
 * Nested record reference (a class constructor)
 */
export const RecordClassSchema = z.custom<RecordClass>(
  value => typeof value === 'function',
  { message: 'Nested record type must be a class' }
);

/**
 * Single field declaration
 */
export const FieldDeclarationSchema = z.object({
  name: z.string().min(1, 'Field name is required').regex(/^\S+$/, 'Field name cannot contain whitespace'),
  type: z.union([FieldKindNameSchema, RecordClassSchema]),
  exported: z.boolean().default(true),
  tags: z.record(z.string()).default({})
});

/**
 * Record declaration with unique field names
 */
export const RecordDeclarationSchema = z.object({
  name: z.string().min(1).optional(),
  fields: z.array(FieldDeclarationSchema)
}).superRefine((declaration, ctx) => {
  const seen = new Set<string>();
  declaration.fields.forEach((field, index) => {
    if (seen.has(field.name)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Duplicate field name: ${field.name}`,
        path: ['fields', index, 'name']
      });
    }
    seen.add(field.name);
  });
});

/**
 * Validator configuration
 */
export const ValidatorConfigSchema = z.object({
  tagName: z.string().trim().min(1, 'Tag name cannot be empty').default('validate')
});

/**
 * Type exports
 */
export type ValidatedFieldDeclaration = z.infer<typeof FieldDeclarationSchema>;
export type ValidatedRecordDeclaration = z.infer<typeof RecordDeclarationSchema>;
export type ValidatorConfig = z.infer<typeof ValidatorConfigSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Validation helper functions
 */
export function validateRecordDeclaration(data: unknown): ValidatedRecordDeclaration {
  const result = RecordDeclarationSchema.safeParse(data);
  if (!result.success) {
    throw new ShapeDeclarationError(
      `Invalid record declaration: ${describeIssues(result.error)}`,
      { issues: result.error.issues }
    );
  }
  return result.data;
}

export function validateValidatorConfig(data: unknown): ValidatorConfig {
  const result = ValidatorConfigSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid validator options: ${describeIssues(result.error)}`,
      { issues: result.error.issues }
    );
  }
  return result.data;
}
