/**
 * Counting Trackers
 * Trackers whose whole state is at most one counter
 */

import { TrackerError } from '../error-classes.js';
import { codePointCount, utf8Length, utf8Width } from '../unicode.js';
import { BaseTracker } from './types.js';

function retreat(counter: string, value: number, amount: number): number {
  if (amount > value) {
    throw new TrackerError('SCAN-T002', { counter, amount, value });
  }
  return value - amount;
}

/** Tracks nothing; every operation is a no-op */
export class NoOpTracker extends BaseTracker<NoOpTracker> {
  clone(): NoOpTracker {
    return this;
  }

  forward(_codePoint: string): void {}

  backward(_codePoint: string): void {}

  override forwardStr(_text: string): void {}
}

/** Counts UTF-8 bytes */
export class ByteTracker extends BaseTracker<ByteTracker> {
  private count: number;

  constructor(bytes = 0) {
    super();
    this.count = bytes;
  }

  get bytes(): number {
    return this.count;
  }

  clone(): ByteTracker {
    return new ByteTracker(this.count);
  }

  forward(codePoint: string): void {
    this.count += utf8Width(codePoint);
  }

  backward(codePoint: string): void {
    this.count = retreat('bytes', this.count, utf8Width(codePoint));
  }

  override forwardStr(text: string): void {
    this.count += utf8Length(text);
  }
}

/** Counts UTF-16 code units, the offsets `String.prototype.slice` takes */
export class UnitTracker extends BaseTracker<UnitTracker> {
  private count: number;

  constructor(units = 0) {
    super();
    this.count = units;
  }

  get units(): number {
    return this.count;
  }

  clone(): UnitTracker {
    return new UnitTracker(this.count);
  }

  forward(codePoint: string): void {
    this.count += codePoint.length;
  }

  backward(codePoint: string): void {
    this.count = retreat('units', this.count, codePoint.length);
  }

  override forwardStr(text: string): void {
    this.count += text.length;
  }
}

/** Counts code points */
export class CodePointTracker extends BaseTracker<CodePointTracker> {
  private count: number;

  constructor(codePoints = 0) {
    super();
    this.count = codePoints;
  }

  get codePoints(): number {
    return this.count;
  }

  clone(): CodePointTracker {
    return new CodePointTracker(this.count);
  }

  forward(_codePoint: string): void {
    this.count++;
  }

  backward(_codePoint: string): void {
    this.count = retreat('codePoints', this.count, 1);
  }

  override forwardStr(text: string): void {
    this.count += codePointCount(text);
  }
}
