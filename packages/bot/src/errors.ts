// ---------------------------------------------------------------------------
// Engine error taxonomy
//
// Every error the engine raises on purpose extends EngineError. `status` is
// the HTTP status the API's errorHandler responds with; `code` is the stable
// name API clients and the dashboard switch on.
//
//   ResolveFailure   NotFound, PlatformUnavailable: surfaced to the requester
//   PipelineFailure  Stalled, Errored: surfaced as TrackErrored events
//   InvalidState     operation attempted in the wrong lifecycle state
//   ResourceBusy     conflicting operation already in progress
//   InvalidParameter value outside its allowed range
// ---------------------------------------------------------------------------

export type EngineErrorCode =
  | 'NotFound'
  | 'PlatformUnavailable'
  | 'Stalled'
  | 'Errored'
  | 'InvalidState'
  | 'ResourceBusy'
  | 'InvalidParameter'
  | 'VoiceUnavailable';

export abstract class EngineError extends Error {
  abstract readonly code: EngineErrorCode;
  abstract readonly status: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// ---------------------------------------------------------------------------
// ResolveFailure
// ---------------------------------------------------------------------------
export class TrackNotFoundError extends EngineError {
  readonly code = 'NotFound';
  readonly status = 404;
}

export class PlatformUnavailableError extends EngineError {
  readonly code = 'PlatformUnavailable';
  readonly status = 503;
}

// ---------------------------------------------------------------------------
// PipelineFailure
// ---------------------------------------------------------------------------
export class StreamStalledError extends EngineError {
  readonly code = 'Stalled';
  readonly status = 502;
}

export class PlaybackFailedError extends EngineError {
  readonly code = 'Errored';
  readonly status = 502;
}

export type PipelineFailure = StreamStalledError | PlaybackFailedError;

// ---------------------------------------------------------------------------
// Synchronous rejections
// ---------------------------------------------------------------------------
export class InvalidStateError extends EngineError {
  readonly code = 'InvalidState';
  readonly status = 409;
}

export class ResourceBusyError extends EngineError {
  readonly code = 'ResourceBusy';
  readonly status = 409;
}

export class InvalidParameterError extends EngineError {
  readonly code = 'InvalidParameter';
  readonly status = 400;
}

export class VoiceConnectionError extends EngineError {
  readonly code = 'VoiceUnavailable';
  readonly status = 503;
}

/**
 * Renders anything thrown into a one-line reason for logs and events.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * True for the rejection an AbortSignal produces (DOMException or Node's
 * AbortError), regardless of which API raised it.
 */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}
