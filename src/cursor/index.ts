export {
  createCursor,
  createCursorWithTracker,
  StrCursor,
} from './cursor.js';
export {
  resolveCursorOptions,
  type CursorObservability,
  type CursorOptions,
  type ResolvedCursorOptions,
  type StepEvent,
  type StepUntilEvent,
  type ValidateEvent,
  type ValidateRejectedEvent,
} from './types.js';
