import { FormatError } from './errors.js';
import type { ParsedMessage, Result } from './types.js';

/**
 * `<type>(<scope>)?:<description>`. Only the first colon after the optional
 * scope group is structural, later ones belong to the description, which may
 * hold any character (U+2028 and U+2029 included). Whitespace before the colon
 * is allowed after the type and after the scope group alike.
 */
const HEADER_PATTERN = /^([^():]*)(?:\(([^():]*)\)\s*)?:([\s\S]*)$/;

const TRAILER_PATTERN = /^(?:BREAKING[ -]CHANGE|[A-Za-z][A-Za-z0-9-]*)(?:: | #)\S/;
const CONTINUATION_PATTERN = /^\s+\S/;

const EXPECTED_FORMAT = 'expected "type(scope): description"';

function isBlank(line: string): boolean {
  return line.trim() === '';
}

function isFooterBlock(lines: string[]): boolean {
  if (lines.length === 0 || !TRAILER_PATTERN.test(lines[0])) {
    return false;
  }
  return lines.every((line) => TRAILER_PATTERN.test(line) || CONTINUATION_PATTERN.test(line));
}

function textOrUndefined(lines: string[]): string | undefined {
  const text = lines.join('\n').trim();
  return text === '' ? undefined : text;
}

/**
 * Splits the lines following the header into body and footer. The footer is the
 * last paragraph, provided a blank line separates it from whatever precedes it
 * and all of its lines are trailers (or indented continuations of one).
 */
function splitBodyAndFooter(lines: string[]): { body?: string; footer?: string } {
  let end = lines.length;
  while (end > 0 && isBlank(lines[end - 1])) {
    end--;
  }
  let start = end;
  while (start > 0 && !isBlank(lines[start - 1])) {
    start--;
  }

  const lastParagraph = lines.slice(start, end);
  if (start > 0 && isFooterBlock(lastParagraph)) {
    return {
      body: textOrUndefined(lines.slice(0, start)),
      footer: textOrUndefined(lastParagraph)
    };
  }

  return { body: textOrUndefined(lines) };
}

export function parseHeader(header: string): Result<Pick<ParsedMessage, 'type' | 'scope' | 'description'>, FormatError> {
  const match = header.match(HEADER_PATTERN);
  if (!match) {
    const reason = header.includes(':')
      ? `Malformed scope group, ${EXPECTED_FORMAT}`
      : `Missing ":" separator, ${EXPECTED_FORMAT}`;
    return { ok: false, error: new FormatError(reason, header) };
  }

  const [, rawType, rawScope, rawDescription] = match;
  const type = rawType.trim();
  if (!type) {
    return { ok: false, error: new FormatError(`Missing commit type, ${EXPECTED_FORMAT}`, header) };
  }

  return {
    ok: true,
    value: {
      type,
      scope: rawScope === undefined ? undefined : rawScope.trim(),
      description: rawDescription.trim()
    }
  };
}

export function tokenize(raw: string): Result<ParsedMessage, FormatError> {
  const lines = raw.replace(/\r\n?/g, '\n').split('\n');

  const first = lines.findIndex((line) => !isBlank(line));
  if (first === -1) {
    return { ok: false, error: new FormatError(`Empty commit message, ${EXPECTED_FORMAT}`, '') };
  }

  const header = lines[first].trim();
  const parsedHeader = parseHeader(header);
  if (!parsedHeader.ok) {
    return parsedHeader;
  }

  const { body, footer } = splitBodyAndFooter(lines.slice(first + 1));
  const message: ParsedMessage = { header, ...parsedHeader.value };
  if (body !== undefined) {
    message.body = body;
  }
  if (footer !== undefined) {
    message.footer = footer;
  }

  return { ok: true, value: message };
}
