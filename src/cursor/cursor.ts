/**
 * String Cursor
 *
 * A cursor over an immutable string with two pointers, `tail` and `head`,
 * delimiting the highlight `[tail, head)`. Head moves forward by stepping
 * or searching and back by unstepping; tail only moves by jumping to head
 * on validate(). Once tail has moved, nothing before it is reachable again.
 *
 * Offsets are UTF-16 code units and always fall on code point boundaries.
 */

import { PatternError } from '../error-classes.js';
import { findPattern, type Pattern } from '../pattern.js';
import type { Result } from '../result.js';
import { NoOpTracker } from '../tracker/counters.js';
import type { PositionTracker } from '../tracker/types.js';
import { codePointAt, codePointBefore, isBoundary } from '../unicode.js';
import {
  resolveCursorOptions,
  type CursorOptions,
  type ResolvedCursorOptions,
} from './types.js';

export class StrCursor<T extends PositionTracker<T>> {
  /** The whole buffer, including any committed prefix */
  readonly source: string;
  // Start of the uncommitted view (the tail offset)
  private base: number;
  private highlightEnd: number;
  private tail: T;
  private head: T;
  private readonly options: ResolvedCursorOptions;

  constructor(source: string, tracker: T, options?: CursorOptions) {
    this.source = source;
    this.base = 0;
    this.highlightEnd = 0;
    this.head = tracker.clone();
    this.tail = tracker;
    this.options = resolveCursorOptions(options);
  }

  /** Tracker value at tail, as of the last commit */
  get tailPosition(): T {
    return this.tail;
  }

  /** Tracker value at head */
  get headPosition(): T {
    return this.head;
  }

  get tailOffset(): number {
    return this.base;
  }

  get headOffset(): number {
    return this.base + this.highlightEnd;
  }

  /** Highlight length in code units */
  get highlightLength(): number {
    return this.highlightEnd;
  }

  highlightIsEmpty(): boolean {
    return this.highlightEnd === 0;
  }

  /** True when head is at the end of the buffer */
  postIsEmpty(): boolean {
    return this.headOffset === this.source.length;
  }

  highlight(): string {
    return this.source.slice(this.base, this.headOffset);
  }

  /** Text after head */
  post(): string {
    return this.source.slice(this.headOffset);
  }

  /**
   * Advances head by one code point.
   *
   * @returns the consumed code point, or undefined if head is at the end
   */
  step(): string | undefined {
    const ch = codePointAt(this.source, this.headOffset);
    if (ch === undefined) return undefined;

    this.highlightEnd += ch.length;
    this.head.forward(ch);
    this.options.observability.onStep?.({
      codePoint: ch,
      headOffset: this.headOffset,
    });
    return ch;
  }

  /**
   * Moves head back by one code point. This is the only way back, and it
   * stops at tail.
   *
   * @returns the code point given back, or undefined if the highlight is empty
   */
  unstep(): string | undefined {
    const ch = codePointBefore(this.highlight(), this.highlightEnd);
    if (ch === undefined) return undefined;

    // Tracker first: if it rejects the move, the window is untouched
    this.head.backward(ch);
    this.highlightEnd -= ch.length;
    this.options.observability.onUnstep?.({
      codePoint: ch,
      headOffset: this.headOffset,
    });
    return ch;
  }

  /**
   * Advances head up to the first match of `pattern` in the post.
   *
   * The returned text is empty when the pattern matches at head. When
   * nothing matches, the whole post is consumed.
   *
   * @throws PatternError if a Matcher returns an offset that is outside the
   * post or splits a surrogate pair
   */
  stepUntil(pattern: Pattern): string {
    const rest = this.post();
    const found = findPattern(pattern, rest);
    if (found !== undefined && !isBoundary(rest, found)) {
      throw new PatternError('SCAN-P001', {
        offset: found,
        length: rest.length,
      });
    }

    const offset = found ?? rest.length;
    const consumed = rest.slice(0, offset);
    this.highlightEnd += offset;
    this.head.forwardStr(consumed);
    this.options.observability.onStepUntil?.({
      consumed,
      matched: found !== undefined,
      headOffset: this.headOffset,
    });
    return consumed;
  }

  /** Commits the highlight by bringing tail to head */
  validate(): void {
    const committed = this.highlight();
    this.base += this.highlightEnd;
    this.highlightEnd = 0;
    this.head.validate();
    this.tail = this.head.clone();
    this.options.observability.onValidate?.({
      committed,
      tailOffset: this.base,
    });
  }

  /**
   * Runs `f` on the highlight and validates only if it succeeds.
   *
   * On failure the cursor is left exactly as it was. An exception thrown by
   * `f` propagates with the cursor equally untouched.
   */
  thenValidate<U, E>(f: (highlight: string) => Result<U, E>): Result<U, E> {
    const highlight = this.highlight();
    const result = f(highlight);
    if (result.ok) {
      this.validate();
    } else {
      this.options.observability.onValidateRejected?.({
        highlight,
        error: result.error,
      });
    }
    return result;
  }

  /** Independent copy, for scanning ahead speculatively */
  clone(): StrCursor<T> {
    const copy = new StrCursor(this.source, this.tail.clone(), this.options);
    copy.base = this.base;
    copy.highlightEnd = this.highlightEnd;
    copy.head = this.head.clone();
    return copy;
  }
}

/** Creates a cursor that tracks no position */
export function createCursor(
  source: string,
  options?: CursorOptions
): StrCursor<NoOpTracker> {
  return new StrCursor(source, new NoOpTracker(), options);
}

/** Creates a cursor whose tail and head start from `tracker` */
export function createCursorWithTracker<T extends PositionTracker<T>>(
  source: string,
  tracker: T,
  options?: CursorOptions
): StrCursor<T> {
  return new StrCursor(source, tracker, options);
}
