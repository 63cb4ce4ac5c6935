/**
 * Position Trackers
 * Interchangeable strategies for tracking a cursor's position
 */

export { BaseTracker, type PositionTracker } from './types.js';
export {
  ByteTracker,
  CodePointTracker,
  NoOpTracker,
  UnitTracker,
} from './counters.js';
export { RowColTracker } from './row-col.js';
