// Export all domain models

export * from './types.js';
export * from './constraint.js';
