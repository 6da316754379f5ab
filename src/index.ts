// Public API

export * from './models/index.js';
export * from './services/index.js';
export * from './core/errors.js';
export { Logger, LogLevel, logger, type LogSink, type LoggerConfig } from './core/logger.js';
export {
  FieldDeclarationSchema,
  RecordDeclarationSchema,
  ValidatorConfigSchema,
  validateRecordDeclaration,
  validateValidatorConfig,
  type ValidatorConfig
} from './core/schemas.js';
