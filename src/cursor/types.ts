/**
 * Cursor Types
 *
 * Options and observability callbacks accepted when creating a cursor.
 */

/** Observability callbacks for monitoring a cursor */
export interface CursorObservability {
  /** Called after step() consumed a code point */
  onStep?: (event: StepEvent) => void;
  /** Called after unstep() gave back a code point */
  onUnstep?: (event: StepEvent) => void;
  /** Called after stepUntil() advanced head */
  onStepUntil?: (event: StepUntilEvent) => void;
  /** Called after validate(), including the one thenValidate() performs */
  onValidate?: (event: ValidateEvent) => void;
  /** Called when a thenValidate() closure returned a failure */
  onValidateRejected?: (event: ValidateRejectedEvent) => void;
}

/** Event emitted when head moves by one code point */
export interface StepEvent {
  /** Code point consumed or given back */
  codePoint: string;
  /** Head offset in the source after the move */
  headOffset: number;
}

/** Event emitted after a pattern search */
export interface StepUntilEvent {
  /** Text added to the highlight (may be empty) */
  consumed: string;
  /** False when the pattern was not found and the remainder was consumed */
  matched: boolean;
  /** Head offset in the source after the move */
  headOffset: number;
}

/** Event emitted on commit */
export interface ValidateEvent {
  /** The highlight that was committed (may be empty) */
  committed: string;
  /** Tail offset in the source after the commit */
  tailOffset: number;
}

/** Event emitted when a thenValidate() closure fails */
export interface ValidateRejectedEvent {
  /** The highlight the closure was given; it stays uncommitted */
  highlight: string;
  /** Error value the closure returned */
  error: unknown;
}

/** Options for creating a cursor */
export interface CursorOptions {
  /** Observability callbacks for monitoring the cursor */
  observability?: CursorObservability;
}

/** Options after defaults are applied */
export interface ResolvedCursorOptions {
  readonly observability: CursorObservability;
}

export function resolveCursorOptions(
  options: CursorOptions = {}
): ResolvedCursorOptions {
  return {
    observability: options.observability ?? {},
  };
}
