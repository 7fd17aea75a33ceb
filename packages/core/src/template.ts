import { CompileError, errorMessage } from './errors';

export const DEFAULT_START_DELIMITER = '<';
export const DEFAULT_END_DELIMITER = '>';

export type CompileResult =
  | { ok: true; pattern: string; regex: RegExp }
  | { ok: false; error: CompileError };

// Escapes the characters that are special in both JavaScript and
// PostgreSQL (ARE) patterns, so compiled output can be matched by either.
const META_CHARS = /[\\.+*?()|[\]{}^$]/g;

export function escapeLiteral(text: string): string {
  return text.replace(META_CHARS, '\\$&');
}

/**
 * Number of code points, so astral-plane characters count once.
 */
export function codePointLength(text: string): number {
  return [...text].length;
}

/**
 * Finds the outermost delimiter pairs in a template, scanning by code point.
 * Returns [start, endExclusive] offsets in UTF-16 units, or an error reason.
 */
function findFragments(
  template: string,
  start: string,
  end: string
): { spans: Array<[number, number]> } | { reason: string } {
  const spans: Array<[number, number]> = [];
  let level = 0;
  let open = 0;
  let offset = 0;

  for (const ch of template) {
    if (ch === start) {
      level++;
      if (level === 1) open = offset;
    } else if (ch === end) {
      level--;
      if (level === 0) {
        spans.push([open, offset + ch.length]);
      } else if (level < 0) {
        return { reason: `unexpected "${end}" at offset ${offset}` };
      }
    }
    offset += ch.length;
  }

  if (level !== 0) {
    return { reason: `unterminated "${start}" at offset ${open}` };
  }
  return { spans };
}

// Letter escapes that mean the same in JavaScript and PostgreSQL patterns.
const PORTABLE_ESCAPES = new Set(['d', 'D', 'w', 'W', 's', 'S', 't', 'r', 'n', 'v', 'f', 'c', 'x', 'u']);

/**
 * Compiled patterns run in JavaScript and in PostgreSQL. Rejects fragment
 * syntax only one of them accepts (named groups, `\k`, `\p`) or reads
 * differently (`\b` is a word boundary in one and a backspace in the other).
 */
function findUnportableSyntax(fragment: string): string | undefined {
  for (let i = 0; i < fragment.length; i++) {
    const ch = fragment[i];
    if (ch === '\\') {
      const next = fragment[i + 1] ?? '';
      if (/^[a-zA-Z]$/.test(next) && !PORTABLE_ESCAPES.has(next)) {
        return `unsupported escape "\\${next}"`;
      }
      i++;
    } else if (fragment.startsWith('(?<', i) && fragment[i + 3] !== '=' && fragment[i + 3] !== '!') {
      return 'named groups are not supported';
    }
  }
  return undefined;
}

function tryRegExp(source: string): RegExp | Error {
  try {
    return new RegExp(source);
  } catch (err) {
    return err instanceof Error ? err : new Error(String(err));
  }
}

/**
 * Compiles a template such as `users:<[0-9]+>:profile` into an anchored
 * pattern. Text outside the delimiters matches literally; the text between
 * them is a regular expression fragment.
 *
 * A delimiter character cannot be escaped: every occurrence of the start
 * delimiter opens a fragment. Pick delimiters that never appear in the
 * literal parts of your subjects. Fragments are inserted verbatim, so a
 * pathological fragment can backtrack badly; validate templates before
 * storing them. Fragments are limited to syntax that JavaScript and
 * PostgreSQL read the same way.
 */
export function compileTemplate(
  template: string,
  startDelimiter: string = DEFAULT_START_DELIMITER,
  endDelimiter: string = DEFAULT_END_DELIMITER
): CompileResult {
  if (codePointLength(startDelimiter) !== 1 || codePointLength(endDelimiter) !== 1) {
    return { ok: false, error: new CompileError(template, 'delimiters must be single characters') };
  }
  if (startDelimiter === endDelimiter) {
    return { ok: false, error: new CompileError(template, 'start and end delimiters must differ') };
  }

  const found = findFragments(template, startDelimiter, endDelimiter);
  if ('reason' in found) {
    return { ok: false, error: new CompileError(template, found.reason) };
  }

  let pattern = '^';
  let cursor = 0;
  for (const [open, close] of found.spans) {
    const fragment = template.slice(open + startDelimiter.length, close - endDelimiter.length);
    const unportable = findUnportableSyntax(fragment);
    if (unportable) {
      return { ok: false, error: new CompileError(template, `invalid fragment "${fragment}": ${unportable}`) };
    }
    const checked = tryRegExp(`^${fragment}$`);
    if (checked instanceof Error) {
      return {
        ok: false,
        error: new CompileError(template, `invalid fragment "${fragment}": ${checked.message}`, { cause: checked }),
      };
    }
    pattern += `${escapeLiteral(template.slice(cursor, open))}(${fragment})`;
    cursor = close;
  }
  pattern += `${escapeLiteral(template.slice(cursor))}$`;

  const regex = tryRegExp(pattern);
  if (regex instanceof Error) {
    return { ok: false, error: new CompileError(template, errorMessage(regex), { cause: regex }) };
  }
  return { ok: true, pattern, regex };
}

export function compileTemplateOrThrow(
  template: string,
  startDelimiter: string = DEFAULT_START_DELIMITER,
  endDelimiter: string = DEFAULT_END_DELIMITER
): string {
  const result = compileTemplate(template, startDelimiter, endDelimiter);
  if (!result.ok) throw result.error;
  return result.pattern;
}

/**
 * Tests a compiled (already anchored) pattern against a candidate.
 */
export function matchesPattern(pattern: string | RegExp, candidate: string): boolean {
  const regex = typeof pattern === 'string' ? new RegExp(pattern) : pattern;
  return regex.test(candidate);
}
