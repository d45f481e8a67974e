import type { ParsedMessage, ReporterOptions, ValidationResult, Violation } from './types.js';

export interface Report {
  lines: string[];
  /** `false` only for an invalid result when continue-on-error is off */
  success: boolean;
}

export function formatViolation(violation: Violation): string {
  switch (violation.kind) {
    case 'UnknownType':
      return `[unknown-type] commit type "${violation.type}" is not allowed (allowed: ${violation.allowed.join(', ')})`;
    case 'MissingField':
      return `[missing-field] commit type "${violation.type}" requires a non-empty ${violation.field}`;
    case 'MalformedHeader':
      return `[malformed-header] ${violation.reason}: "${violation.header}"`;
  }
}

export function formatConfigError(error: Error): string {
  return `[config] ${error.message}`;
}

export function report(result: ValidationResult, options: ReporterOptions): Report {
  if (result.status === 'valid') {
    return { lines: [], success: true };
  }

  return {
    lines: result.violations.map(formatViolation),
    success: options.continueOnError
  };
}

function display(value: string | undefined): string {
  if (value === undefined) {
    return '-';
  }
  if (value === '') {
    return '""';
  }

  const [first, ...rest] = value.split('\n');
  if (rest.length === 0) {
    return first;
  }
  return `${first} (+${rest.length} more ${rest.length === 1 ? 'line' : 'lines'})`;
}

/**
 * Renders the parsed fields as an aligned two-column table.
 */
export function formatSummary(message: ParsedMessage | undefined, result: ValidationResult): string[] {
  const rows: Array<[string, string]> = [
    ['Type', display(message?.type)],
    ['Scope', display(message?.scope)],
    ['Description', display(message?.description)],
    ['Body', display(message?.body)],
    ['Footer', display(message?.footer)],
    ['Valid', result.status === 'valid' ? 'yes' : 'no']
  ];

  const width = Math.max(...rows.map(([label]) => label.length)) + 2;
  return rows.map(([label, value]) => `${label.padEnd(width)}${value}`);
}
