/**
 * Shape Registry Module
 *
 * @module services/registry
 */

export {
  ShapeRegistry,
  defaultRegistry,
  registerRecord,
  type ShapeRegistryOptions
} from './shape-registry.js';
