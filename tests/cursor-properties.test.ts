/**
 * Scan Cursor Tests: Properties
 * Reversibility and consistency checks over a set of sample texts
 */

import { describe, expect, it } from 'vitest';

import {
  ByteTracker,
  codePointCount,
  CodePointTracker,
  createCursorWithTracker,
  RowColTracker,
  UnitTracker,
  type PositionTracker,
} from '../src/index.js';

import { snapshot } from './helpers/cursor.js';

const SAMPLES = [
  '',
  'abc',
  'ab\ncd',
  'x😀\n\ty',
  'é\r\n€\n\n',
  '\n\n\n',
  'á😀😀',
];

interface AnyTracker extends PositionTracker<AnyTracker> {}

const TRACKERS: [string, () => AnyTracker][] = [
  ['ByteTracker', () => new ByteTracker()],
  ['UnitTracker', () => new UnitTracker()],
  ['CodePointTracker', () => new CodePointTracker()],
  ['RowColTracker', () => new RowColTracker()],
];

/** Number of code points in each prefix length to try */
function prefixLengths(text: string): number[] {
  const lengths: number[] = [];
  for (let i = 0; i <= codePointCount(text); i++) lengths.push(i);
  return lengths;
}

describe.each(TRACKERS)('Cursor properties with %s', (_name, make) => {
  it.each(SAMPLES)('unstepping every step restores the cursor: %j', (text) => {
    for (const n of prefixLengths(text)) {
      const cursor = createCursorWithTracker(text, make());
      const before = snapshot(cursor);

      for (let i = 0; i < n; i++) cursor.step();
      for (let i = 0; i < n; i++) cursor.unstep();

      expect(snapshot(cursor)).toEqual(before);
    }
  });

  it.each(SAMPLES)(
    'unstepping after a commit restores the committed state: %j',
    (text) => {
      const cursor = createCursorWithTracker(text, make());
      cursor.step();
      cursor.validate();
      const before = snapshot(cursor);

      let steps = 0;
      while (cursor.step() !== undefined) steps++;
      for (let i = 0; i < steps; i++) cursor.unstep();

      expect(cursor.unstep()).toBeUndefined();
      expect(snapshot(cursor)).toEqual(before);
    }
  );

  it.each(SAMPLES)('stepUntil matches stepping one by one: %j', (text) => {
    const searched = createCursorWithTracker(text, make());
    const stepped = createCursorWithTracker(text, make());

    const lengthBefore = searched.highlightLength;
    const consumed = searched.stepUntil('\n');
    for (let i = 0; i < codePointCount(consumed); i++) stepped.step();

    expect(lengthBefore + consumed.length).toBe(searched.highlightLength);
    expect(snapshot(searched)).toEqual(snapshot(stepped));
  });

  it.each(SAMPLES)('highlight and post always rebuild the text: %j', (text) => {
    const cursor = createCursorWithTracker(text, make());
    let committed = '';
    while (!cursor.postIsEmpty()) {
      expect(committed + cursor.highlight() + cursor.post()).toBe(text);
      cursor.step();
      if (cursor.highlightLength > 2) {
        committed += cursor.highlight();
        cursor.validate();
      }
    }
    expect(committed + cursor.highlight()).toBe(text);
  });
});
