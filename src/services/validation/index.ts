/**
 * Validation Module
 *
 * Record traversal, constraint evaluation and error aggregation.
 *
 * @module services/validation
 */

export {
  Validator,
  validate,
  assertValid,
  type ValidatorOptions,
  type ValidationOutcome
} from './validator.js';
