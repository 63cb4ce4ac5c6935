/**
 * Position Tracker Types
 * Capability a cursor drives to keep track of where it is in the text
 */

/**
 * Accumulates a position as code points are consumed and un-consumed.
 *
 * `T` is the implementing type, so `clone()` returns the concrete tracker.
 * Calls arrive well-formed from the cursor: every `backward(c)` undoes the
 * latest `forward(c)` not yet undone, and none cross a `validate()`.
 */
export interface PositionTracker<T> {
  /** Independent copy that evolves separately */
  clone(): T;
  /** Record one consumed code point */
  forward(codePoint: string): void;
  /** Undo `forward(codePoint)` exactly */
  backward(codePoint: string): void;
  /** Same result as `forward` on each code point of `text`, in order */
  forwardStr(text: string): void;
  /** Tail caught up with head; backtracking data can be dropped */
  validate(): void;
}

/**
 * Base class with the per-code-point `forwardStr`.
 * Trackers with a cheaper bulk update override it.
 */
export abstract class BaseTracker<T> implements PositionTracker<T> {
  abstract clone(): T;
  abstract forward(codePoint: string): void;
  abstract backward(codePoint: string): void;

  forwardStr(text: string): void {
    for (const ch of text) {
      this.forward(ch);
    }
  }

  validate(): void {}
}
