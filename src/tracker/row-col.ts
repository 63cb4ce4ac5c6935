/**
 * Row/Column Tracker
 *
 * Rows and columns are 0-based. A column counts non-control code points
 * since the last newline; it is not a display width, so a tab or a
 * combining mark is not expanded or merged.
 */

import { TrackerError } from '../error-classes.js';
import { isControl } from '../unicode.js';
import { BaseTracker } from './types.js';

export class RowColTracker extends BaseTracker<RowColTracker> {
  private currentRow: number;
  private currentCol: number;
  // Column at each newline consumed since the last validate()
  private savedCols: number[];

  constructor(row = 0, col = 0) {
    super();
    this.currentRow = row;
    this.currentCol = col;
    this.savedCols = [];
  }

  get row(): number {
    return this.currentRow;
  }

  get col(): number {
    return this.currentCol;
  }

  /** Newlines that can still be stepped back over */
  get pending(): number {
    return this.savedCols.length;
  }

  clone(): RowColTracker {
    const copy = new RowColTracker(this.currentRow, this.currentCol);
    copy.savedCols = [...this.savedCols];
    return copy;
  }

  forward(codePoint: string): void {
    if (codePoint === '\n') {
      this.savedCols.push(this.currentCol);
      this.currentRow++;
      this.currentCol = 0;
    } else if (!isControl(codePoint)) {
      this.currentCol++;
    }
  }

  backward(codePoint: string): void {
    if (codePoint === '\n') {
      const col = this.savedCols.pop();
      if (col === undefined) {
        throw new TrackerError('SCAN-T001', { row: this.currentRow });
      }
      this.currentRow--;
      this.currentCol = col;
    } else if (!isControl(codePoint)) {
      if (this.currentCol === 0) {
        throw new TrackerError('SCAN-T002', {
          counter: 'col',
          amount: 1,
          value: 0,
        });
      }
      this.currentCol--;
    }
  }

  override validate(): void {
    this.savedCols = [];
  }
}
