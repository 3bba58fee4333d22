import { DEFAULT_VALUE_PATTERN, LINE_TERMINATOR } from './constants.js';
import { SubtreeError } from './errors.js';
import { span } from './span.js';
import type { Span } from './span.js';

/**
 * Line scanner.
 *
 * Splits the buffer into lines and, per line, finds where the node's value
 * begins. The value always runs to the end of the line content (terminator
 * excluded); only its start is decided by the matcher.
 */
export interface ValueMatcher {
  /** Marks the value start of each line. */
  pattern: RegExp;
  /** Use the last match on the line instead of the first. */
  useLastMatch?: boolean;
  /** Start the value where the match ends instead of where it starts. */
  startAfterMatch?: boolean;
}

export interface ScannedLine {
  /** The whole line, terminator included. */
  line: Span;
  /** The node's value within the line. */
  value: Span;
}

export const DEFAULT_MATCHER: ValueMatcher = { pattern: DEFAULT_VALUE_PATTERN };

export interface MatcherSource {
  /** Pattern source text; the default pattern when omitted. */
  pattern?: string;
  last?: boolean;
  after?: boolean;
}

/**
 * Compile caller-supplied matcher options.
 *
 * Throws `INVALID_PATTERN` when the pattern does not compile.
 */
export function compileMatcher(source: MatcherSource): ValueMatcher {
  let pattern = DEFAULT_VALUE_PATTERN;
  if (source.pattern !== undefined) {
    try {
      pattern = new RegExp(source.pattern);
    } catch (error) {
      throw new SubtreeError(
        'INVALID_PATTERN',
        `Invalid pattern ${JSON.stringify(source.pattern)}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }
  return {
    pattern,
    useLastMatch: source.last ?? false,
    startAfterMatch: source.after ?? false,
  };
}

/**
 * Copy `pattern` with the global flag set so it can drive `matchAll`.
 */
function toGlobalPattern(pattern: RegExp): RegExp {
  const flags = pattern.flags.replace('y', '');
  return new RegExp(pattern.source, flags.includes('g') ? flags : `${flags}g`);
}

/**
 * Length of the terminator at the end of `[lineStart, lineStop)`: 0, 1 (`\n`) or
 * 2 (`\r\n`).
 */
function terminatorLength(text: string, lineStart: number, lineStop: number): number {
  if (lineStop === lineStart || text[lineStop - 1] !== LINE_TERMINATOR) return 0;
  if (lineStop - 2 >= lineStart && text[lineStop - 2] === '\r') return 2;
  return 1;
}

/**
 * Column where the value starts within `content`, or 0 when nothing matches.
 */
function valueColumn(content: string, pattern: RegExp, matcher: ValueMatcher): number {
  let found: RegExpMatchArray | undefined;
  for (const match of content.matchAll(pattern)) {
    found = match;
    if (!matcher.useLastMatch) break;
  }
  if (!found) return 0;

  const index = found.index ?? 0;
  const column = matcher.startAfterMatch ? index + found[0].length : index;
  return Math.min(column, content.length);
}

/**
 * Lazily yield `(line, value)` spans for every line of `text`.
 *
 * Empty input yields nothing, and a trailing terminator does not produce an
 * extra empty line.
 */
export function* scanLines(
  text: string,
  matcher: ValueMatcher = DEFAULT_MATCHER
): Generator<ScannedLine, void, undefined> {
  const pattern = toGlobalPattern(matcher.pattern);
  let cursor = 0;

  while (cursor < text.length) {
    const newline = text.indexOf(LINE_TERMINATOR, cursor);
    const stop = newline === -1 ? text.length : newline + 1;
    const contentStop = stop - terminatorLength(text, cursor, stop);
    const column = valueColumn(text.slice(cursor, contentStop), pattern, matcher);

    yield { line: span(cursor, stop), value: span(cursor + column, contentStop) };
    cursor = stop;
  }
}
