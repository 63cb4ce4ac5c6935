/**
 * Patterns
 * What `stepUntil` searches for in the remaining text
 */

import { PatternError } from './error-classes.js';
import { codePointAt, isBoundary } from './unicode.js';

/** Open extension point: locate the first match in `text` */
export interface Matcher {
  /**
   * Unit offset of the first match, or undefined for no match.
   * Never -1: `stepUntil` rejects it as an invalid offset.
   */
  find(text: string): number | undefined;
}

export type CodePointPredicate = (codePoint: string) => boolean;

/**
 * Anything `stepUntil` can search for:
 * - `string`: literal text (one code point or more)
 * - `number`: a single code point, by value (PatternError if out of range)
 * - `readonly string[]` / `ReadonlySet<string>`: any of these code points
 * - function: first code point the predicate accepts
 * - `RegExp`: first match that does not cut a surrogate pair
 * - `Matcher`: custom search
 */
export type Pattern =
  | string
  | number
  | readonly string[]
  | ReadonlySet<string>
  | CodePointPredicate
  | RegExp
  | Matcher;

function isCodePointList(pattern: Pattern): pattern is readonly string[] {
  return Array.isArray(pattern);
}

function isCodePointSet(pattern: Pattern): pattern is ReadonlySet<string> {
  return pattern instanceof Set;
}

function findCodePoint(
  text: string,
  accept: CodePointPredicate
): number | undefined {
  let i = 0;
  while (i < text.length) {
    const ch = codePointAt(text, i);
    if (ch === undefined) break;
    if (accept(ch)) return i;
    i += ch.length;
  }
  return undefined;
}

/** True when `text[start, end)` does not cut a surrogate pair */
function isWholeMatch(text: string, start: number, end: number): boolean {
  return isBoundary(text, start) && isBoundary(text, end);
}

function findLiteral(text: string, literal: string): number | undefined {
  let index = text.indexOf(literal);
  while (index !== -1) {
    if (isWholeMatch(text, index, index + literal.length)) return index;
    index = text.indexOf(literal, index + 1);
  }
  return undefined;
}

function toCodePoint(value: number): string {
  if (!Number.isInteger(value) || value < 0 || value > 0x10ffff) {
    throw new PatternError('SCAN-P002', { value });
  }
  return String.fromCodePoint(value);
}

function findRegExp(text: string, regexp: RegExp): number | undefined {
  // Sticky patterns only ever match at offset 0
  if (regexp.sticky) {
    const index = text.search(regexp);
    return index === -1 ? undefined : index;
  }

  // Without the u flag a match may start or end inside a surrogate pair
  const scan = new RegExp(regexp.source, regexp.flags.replace('g', '') + 'g');
  let match = scan.exec(text);
  while (match !== null) {
    const end = match.index + (match[0] ?? '').length;
    if (isWholeMatch(text, match.index, end)) {
      return match.index;
    }
    scan.lastIndex = match.index + 1;
    match = scan.exec(text);
  }
  return undefined;
}

/**
 * Offset of the first match of `pattern` in `text`, in UTF-16 code units,
 * or undefined when nothing matches.
 *
 * @example
 * findPattern(' ', 'hello world')  // 5
 * findPattern(['x', 'y'], 'abc')   // undefined
 */
export function findPattern(
  pattern: Pattern,
  text: string
): number | undefined {
  if (typeof pattern === 'string') {
    return findLiteral(text, pattern);
  }
  if (typeof pattern === 'number') {
    return findLiteral(text, toCodePoint(pattern));
  }
  if (typeof pattern === 'function') {
    return findCodePoint(text, pattern);
  }
  if (pattern instanceof RegExp) {
    return findRegExp(text, pattern);
  }
  if (isCodePointSet(pattern)) {
    const set = pattern;
    return findCodePoint(text, (ch) => set.has(ch));
  }
  if (isCodePointList(pattern)) {
    const list = pattern;
    return findCodePoint(text, (ch) => list.includes(ch));
  }
  return pattern.find(text);
}
