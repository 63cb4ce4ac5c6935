/**
 * Unicode Helpers
 * Code-point access and measurement over UTF-16 strings
 */

// Offsets are UTF-16 code units. A lone surrogate counts as one code point.

function isHighSurrogate(unit: number): boolean {
  return unit >= 0xd800 && unit <= 0xdbff;
}

function isLowSurrogate(unit: number): boolean {
  return unit >= 0xdc00 && unit <= 0xdfff;
}

/** Code point starting at `index`, or undefined at the end of `text` */
export function codePointAt(text: string, index: number): string | undefined {
  const cp = text.codePointAt(index);
  if (cp === undefined) return undefined;
  return String.fromCodePoint(cp);
}

/** Code point ending at `end`, or undefined when `end` is at the start */
export function codePointBefore(
  text: string,
  end: number
): string | undefined {
  if (end <= 0) return undefined;
  const last = text.charCodeAt(end - 1);
  if (isLowSurrogate(last) && end >= 2) {
    const first = text.charCodeAt(end - 2);
    if (isHighSurrogate(first)) return text.slice(end - 2, end);
  }
  return text.slice(end - 1, end);
}

/** Number of bytes the code point takes in UTF-8 */
export function utf8Width(codePoint: string): number {
  const cp = codePoint.codePointAt(0) ?? 0;
  if (cp < 0x80) return 1;
  if (cp < 0x800) return 2;
  if (cp < 0x10000) return 3;
  return 4;
}

export function utf8Length(text: string): number {
  let bytes = 0;
  for (const ch of text) bytes += utf8Width(ch);
  return bytes;
}

export function codePointCount(text: string): number {
  let count = text.length;
  for (let i = 1; i < text.length; i++) {
    // Trailing half of a pair
    if (
      isLowSurrogate(text.charCodeAt(i)) &&
      isHighSurrogate(text.charCodeAt(i - 1))
    ) {
      count--;
    }
  }
  return count;
}

const CONTROL = /^\p{Cc}$/u;

/** True for code points in the Unicode `Cc` (control) category */
export function isControl(codePoint: string): boolean {
  return CONTROL.test(codePoint);
}

/**
 * True when `index` is a valid cut point in `text`: an integer within
 * `[0, text.length]` that does not separate a surrogate pair.
 */
export function isBoundary(text: string, index: number): boolean {
  if (!Number.isInteger(index) || index < 0 || index > text.length) {
    return false;
  }
  if (index === 0 || index === text.length) return true;
  return !(
    isHighSurrogate(text.charCodeAt(index - 1)) &&
    isLowSurrogate(text.charCodeAt(index))
  );
}
