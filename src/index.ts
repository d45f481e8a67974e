export { ConfigError, FormatError } from './errors.js';
export {
  DEFAULT_COMMIT_TYPES,
  TypeRegistry,
  buildRegistry,
  defineCommitType,
  formatTypeSpec,
  parseTypeSpec
} from './registry.js';
export { formatConfigError, formatSummary, formatViolation, report } from './reporter.js';
export type { Report } from './reporter.js';
export { parseHeader, tokenize } from './tokenizer.js';
export { isFieldSatisfied, lint, validate } from './validator.js';
export type { LintOutcome } from './validator.js';
export { FIELD_NAMES, isFieldName } from './types.js';
export type {
  CommitType,
  FieldName,
  ParsedMessage,
  RegistryOptions,
  ReporterOptions,
  Result,
  ValidationResult,
  Violation,
  ViolationKind
} from './types.js';
