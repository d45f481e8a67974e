import { ConfigError } from './errors.js';
import type { CommitType, FieldName, RegistryOptions, Result } from './types.js';
import { FIELD_NAMES, isFieldName } from './types.js';

const DEFAULT_TYPE_NAMES = [
  'fix', 'feat', 'docs', 'style',
  'refactor', 'perf', 'test', 'chore'
];

// A header type token never contains these, so such a name could never match.
const INVALID_TYPE_NAME = /[\s():]/;

export function defineCommitType(name: string, required: readonly FieldName[]): CommitType {
  return Object.freeze({ name, required: Object.freeze([...required]) });
}

export const DEFAULT_COMMIT_TYPES: readonly CommitType[] = DEFAULT_TYPE_NAMES.map((name) =>
  defineCommitType(name, ['description'])
);

function foldCase(name: string): string {
  return name.toLowerCase();
}

function fail(error: ConfigError): Result<never, ConfigError> {
  return { ok: false, error };
}

export class TypeRegistry {
  private readonly exact = new Map<string, CommitType>();
  // `null` marks a lower-cased name shared by several registered types
  private readonly folded = new Map<string, CommitType | null>();

  constructor(types: readonly CommitType[]) {
    for (const type of types) {
      this.exact.set(type.name, type);
      const key = foldCase(type.name);
      this.folded.set(key, this.folded.has(key) ? null : type);
    }
  }

  /**
   * Looks up a header type token. With `ignoreCase`, both the token and the
   * registered names are compared lower-cased; the returned type keeps the
   * spelling it was registered with. An exact match always wins, and a token
   * that folds onto several registered names without matching one of them
   * exactly does not resolve.
   */
  resolve(token: string, ignoreCase: boolean): CommitType | undefined {
    const match = this.exact.get(token);
    if (match || !ignoreCase) {
      return match;
    }
    return this.folded.get(foldCase(token)) ?? undefined;
  }

  types(): CommitType[] {
    return [...this.exact.values()];
  }

  names(): string[] {
    return [...this.exact.keys()];
  }
}

/**
 * Parses an override spec such as `feat=scope,description;docs=`.
 *
 * Entries are `;`-separated and blank entries are skipped. `description` is
 * always required: it is put first unless the entry lists it explicitly.
 */
export function parseTypeSpec(spec: string): Result<CommitType[], ConfigError> {
  const types: CommitType[] = [];

  for (const rawEntry of spec.split(';')) {
    const entry = rawEntry.trim();
    if (!entry) {
      continue;
    }

    const separator = entry.indexOf('=');
    if (separator === -1) {
      return fail(new ConfigError('Missing "="', entry));
    }

    const name = entry.slice(0, separator).trim();
    if (!name) {
      return fail(new ConfigError('Empty type name', entry));
    }
    if (INVALID_TYPE_NAME.test(name)) {
      return fail(new ConfigError(`Type name "${name}" cannot contain whitespace, "(", ")" or ":"`, entry));
    }

    const required: FieldName[] = [];
    const fields = entry
      .slice(separator + 1)
      .split(',')
      .map((field) => field.trim())
      .filter((field) => field.length > 0);

    for (const field of fields) {
      if (!isFieldName(field)) {
        return fail(
          new ConfigError(`Unknown field "${field}" (expected one of: ${FIELD_NAMES.join(', ')})`, entry)
        );
      }
      if (!required.includes(field)) {
        required.push(field);
      }
    }

    if (!required.includes('description')) {
      required.unshift('description');
    }

    types.push(defineCommitType(name, required));
  }

  if (types.length === 0) {
    return fail(new ConfigError('Type spec contains no entries'));
  }

  return { ok: true, value: types };
}

/**
 * Serializes commit types back into the override spec grammar.
 */
export function formatTypeSpec(types: readonly CommitType[]): string {
  return types.map((type) => `${type.name}=${type.required.join(',')}`).join(';');
}

export function buildRegistry(
  overrideSpec?: string,
  options: RegistryOptions = {}
): Result<TypeRegistry, ConfigError> {
  let types: readonly CommitType[] = DEFAULT_COMMIT_TYPES;

  if (overrideSpec !== undefined) {
    const parsed = parseTypeSpec(overrideSpec);
    if (!parsed.ok) {
      return parsed;
    }
    types = parsed.value;
  }

  const seen = new Set<string>();
  for (const type of types) {
    const key = options.ignoreCase ? foldCase(type.name) : type.name;
    if (seen.has(key)) {
      return fail(new ConfigError(`Duplicate commit type "${type.name}"`));
    }
    seen.add(key);
  }

  return { ok: true, value: new TypeRegistry(types) };
}
