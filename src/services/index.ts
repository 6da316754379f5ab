// Export all services

export * from './constraints/index.js';
export * from './registry/index.js';
export * from './validation/index.js';
