/**
 * Scan Cursor Tests: Row/Column Tracker
 * Tests for newline handling and the saved-column stack
 */

import { describe, expect, it } from 'vitest';

import { RowColTracker, TrackerError } from '../src/index.js';

function position(tracker: RowColTracker): [number, number] {
  return [tracker.row, tracker.col];
}

describe('RowColTracker', () => {
  it('starts at 0:0 by default', () => {
    expect(position(new RowColTracker())).toEqual([0, 0]);
  });

  it('starts at the given row and column', () => {
    expect(position(new RowColTracker(3, 4))).toEqual([3, 4]);
  });

  it('counts printing code points as columns', () => {
    const tracker = new RowColTracker();
    tracker.forwardStr('ab😀');
    expect(position(tracker)).toEqual([0, 3]);
  });

  it('moves to the next row on a newline', () => {
    const tracker = new RowColTracker();
    tracker.forwardStr('abc\n');
    expect(position(tracker)).toEqual([1, 0]);
    expect(tracker.pending).toBe(1);
  });

  it('ignores control code points', () => {
    const tracker = new RowColTracker();
    tracker.forwardStr('a\tb\r');
    expect(position(tracker)).toEqual([0, 2]);
  });

  it('counts a combining mark as its own column', () => {
    const tracker = new RowColTracker();
    tracker.forwardStr('e\u0301');
    expect(position(tracker)).toEqual([0, 2]);
  });

  it('restores the column saved at each newline', () => {
    const tracker = new RowColTracker();
    tracker.forwardStr('abc\nd\n');
    expect(position(tracker)).toEqual([2, 0]);

    tracker.backward('\n');
    expect(position(tracker)).toEqual([1, 1]);
    tracker.backward('d');
    tracker.backward('\n');
    expect(position(tracker)).toEqual([0, 3]);
    expect(tracker.pending).toBe(0);
  });

  it('clears saved columns on validate', () => {
    const tracker = new RowColTracker();
    tracker.forwardStr('a\nb\n');
    tracker.validate();
    expect(tracker.pending).toBe(0);
    expect(position(tracker)).toEqual([2, 0]);
  });

  it('throws when moving back over a newline it did not record', () => {
    const tracker = new RowColTracker();
    tracker.forward('\n');
    tracker.validate();

    expect(() => tracker.backward('\n')).toThrow(TrackerError);
    expect(() => tracker.backward('\n')).toThrow(
      'Cannot move back over a newline at row 1: no saved column'
    );
    expect(position(tracker)).toEqual([1, 0]);
  });

  it('throws when moving back past column 0', () => {
    const tracker = new RowColTracker();
    try {
      tracker.backward('a');
      expect.fail('Should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(TrackerError);
      const trackerErr = err as TrackerError;
      expect(trackerErr.errorId).toBe('SCAN-T002');
      expect(trackerErr.context).toEqual({
        counter: 'col',
        amount: 1,
        value: 0,
      });
    }
  });

  it('copies saved columns when cloned', () => {
    const tracker = new RowColTracker();
    tracker.forwardStr('ab\n');
    const copy = tracker.clone();
    tracker.validate();

    copy.backward('\n');
    expect(position(copy)).toEqual([0, 2]);
    expect(tracker.pending).toBe(0);
  });
});
