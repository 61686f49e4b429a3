export type ChannelErrorCode = 'timed_out' | 'transport_error';
export type DataErrorCode = 'unreachable' | 'timeout';
export type ProtocolErrorCode = 'missing_action' | 'unknown_control' | 'malformed_message' | 'out_of_order_exchange';
export type SampleErrorCode = 'provider_rejected' | 'sampling_failed';

type ErrorExtras = { details?: unknown; cause?: unknown };

/**
 * Failure of a single send or receive on a channel. Non-fatal by itself: the caller
 * decides whether the session can go on.
 */
export class ChannelError extends Error {
  readonly details?: unknown;

  constructor(public readonly code: ChannelErrorCode, message: string, extras: ErrorExtras = {}) {
    super(message, { cause: extras.cause });
    this.name = 'ChannelError';
    this.details = extras.details;
  }

  static timedOut(channel: string, op: 'send' | 'receive', timeoutMs: number): ChannelError {
    return new ChannelError('timed_out', `${channel}: ${op} timed out after ${timeoutMs}ms`, { details: { channel, op, timeoutMs } });
  }

  static transport(channel: string, message: string, cause?: unknown): ChannelError {
    return new ChannelError('transport_error', `${channel}: ${message}`, { details: { channel }, cause });
  }
}

/** The data provider could not supply a trial. Always session-fatal. */
export class DataError extends Error {
  readonly details?: unknown;

  constructor(public readonly code: DataErrorCode, message: string, extras: ErrorExtras = {}) {
    super(message, { cause: extras.cause });
    this.name = 'DataError';
    this.details = extras.details;
  }

  static unreachable(status: string, cause?: unknown): DataError {
    return new DataError('unreachable', `data provider unreachable with status <${status}>`, { details: { status }, cause });
  }

  static timeout(waitedMs: number, budgetMs: number): DataError {
    return new DataError('timeout', `dataset not ready after ${Math.round(waitedMs)}ms (budget ${budgetMs}ms)`, { details: { waitedMs, budgetMs } });
  }
}

/**
 * The provider was reachable but no sample could be drawn with the requested settings.
 * Ends the episode setup; the session goes back to control mode.
 */
export class SampleError extends Error {
  readonly details?: unknown;

  constructor(public readonly code: SampleErrorCode, message: string, extras: ErrorExtras = {}) {
    super(message, { cause: extras.cause });
    this.name = 'SampleError';
    this.details = extras.details;
  }

  static providerRejected(error: string, message: string): SampleError {
    return new SampleError('provider_rejected', `data provider rejected the request: ${error}: ${message}`, { details: { error, message } });
  }

  static samplingFailed(cause: unknown): SampleError {
    return new SampleError('sampling_failed', `episode sampling failed: ${errorMessage(cause)}`, { cause });
  }
}

/** The peer broke the request/reply contract. Not recoverable by retry. */
export class ProtocolError extends Error {
  readonly details?: unknown;

  constructor(public readonly code: ProtocolErrorCode, message: string, extras: ErrorExtras = {}) {
    super(message, { cause: extras.cause });
    this.name = 'ProtocolError';
    this.details = extras.details;
  }

  static missingAction(received: unknown): ProtocolError {
    return new ProtocolError('missing_action', `no <action> key received: ${JSON.stringify(received)}`, { details: { received } });
  }

  static unknownControl(ctrl: string): ProtocolError {
    return new ProtocolError('unknown_control', `control <${ctrl}> is not accepted within an episode`, { details: { ctrl } });
  }

  static malformed(received: unknown, issues: string): ProtocolError {
    return new ProtocolError('malformed_message', `malformed message: ${issues}`, { details: { received } });
  }

  static outOfOrder(channel: string, op: 'send' | 'receive'): ProtocolError {
    return new ProtocolError('out_of_order_exchange', `${channel}: ${op} out of request/reply order`, { details: { channel, op } });
  }
}

export function isChannelError(err: unknown): err is ChannelError {
  return err instanceof ChannelError;
}

export function isDataError(err: unknown): err is DataError {
  return err instanceof DataError;
}

export function isProtocolError(err: unknown): err is ProtocolError {
  return err instanceof ProtocolError;
}

export function isSampleError(err: unknown): err is SampleError {
  return err instanceof SampleError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
