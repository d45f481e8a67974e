import type { TypeRegistry } from './registry.js';
import { tokenize } from './tokenizer.js';
import type { FieldName, ParsedMessage, ValidationResult, Violation } from './types.js';

export interface LintOutcome {
  /** Present when the header could be tokenized */
  message?: ParsedMessage;
  result: ValidationResult;
}

function hasText(value: string | undefined): boolean {
  return value !== undefined && value.trim().length > 0;
}

export function isFieldSatisfied(message: ParsedMessage, field: FieldName): boolean {
  switch (field) {
    case 'scope':
      return hasText(message.scope);
    case 'description':
      return hasText(message.description);
    case 'body':
      return hasText(message.body);
    case 'footer':
      return hasText(message.footer);
  }
}

function toResult(violations: Violation[]): ValidationResult {
  return violations.length === 0 ? { status: 'valid' } : { status: 'invalid', violations };
}

/**
 * Checks a tokenized message against the registry. An unknown type yields a
 * single violation and no field checks; otherwise every unmet required field is
 * reported in the order the type declares them.
 */
export function validate(message: ParsedMessage, registry: TypeRegistry, ignoreCase: boolean): ValidationResult {
  const commitType = registry.resolve(message.type, ignoreCase);
  if (!commitType) {
    return toResult([{ kind: 'UnknownType', type: message.type, allowed: registry.names() }]);
  }

  const violations: Violation[] = commitType.required
    .filter((field) => !isFieldSatisfied(message, field))
    .map((field): Violation => ({ kind: 'MissingField', type: commitType.name, field }));

  return toResult(violations);
}

export function lint(raw: string, registry: TypeRegistry, ignoreCase: boolean): LintOutcome {
  const tokenized = tokenize(raw);
  if (!tokenized.ok) {
    const { header, reason } = tokenized.error;
    return { result: toResult([{ kind: 'MalformedHeader', header, reason }]) };
  }

  return {
    message: tokenized.value,
    result: validate(tokenized.value, registry, ignoreCase)
  };
}
