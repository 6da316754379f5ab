export * from './constraint-set.js';
export * from './parser.js';
