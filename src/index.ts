/**
 * scan-cursor
 * A highlight cursor over strings with pluggable position tracking
 */

export {
  createCursor,
  createCursorWithTracker,
  resolveCursorOptions,
  StrCursor,
  type CursorObservability,
  type CursorOptions,
  type ResolvedCursorOptions,
  type StepEvent,
  type StepUntilEvent,
  type ValidateEvent,
  type ValidateRejectedEvent,
} from './cursor/index.js';
export {
  BaseTracker,
  ByteTracker,
  CodePointTracker,
  NoOpTracker,
  RowColTracker,
  UnitTracker,
  type PositionTracker,
} from './tracker/index.js';
export {
  findPattern,
  type CodePointPredicate,
  type Matcher,
  type Pattern,
} from './pattern.js';
export { err, ok, type Result } from './result.js';
export {
  createError,
  PatternError,
  ScanError,
  TrackerError,
  type ScanErrorData,
} from './error-classes.js';
export {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorRegistry,
} from './error-registry.js';
export {
  codePointAt,
  codePointBefore,
  codePointCount,
  isBoundary,
  isControl,
  utf8Length,
  utf8Width,
} from './unicode.js';
