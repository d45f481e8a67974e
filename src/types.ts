export type FieldName = 'scope' | 'description' | 'body' | 'footer';

export const FIELD_NAMES: readonly FieldName[] = ['scope', 'description', 'body', 'footer'];

export interface CommitType {
  readonly name: string;
  /** Always contains `description`; order decides the order of reported violations. */
  readonly required: readonly FieldName[];
}

export interface ParsedMessage {
  header: string;
  type: string;
  /** `undefined` when the header has no `(...)` group, `''` when the group is empty */
  scope?: string;
  description: string;
  body?: string;
  footer?: string;
}

export type Violation =
  | { kind: 'UnknownType'; type: string; allowed: readonly string[] }
  | { kind: 'MissingField'; type: string; field: FieldName }
  | { kind: 'MalformedHeader'; header: string; reason: string };

export type ViolationKind = Violation['kind'];

export type ValidationResult =
  | { status: 'valid' }
  | { status: 'invalid'; violations: Violation[] };

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export interface RegistryOptions {
  ignoreCase?: boolean;
}

export interface ReporterOptions {
  continueOnError: boolean;
}

export function isFieldName(value: string): value is FieldName {
  return FIELD_NAMES.some((field) => field === value);
}
