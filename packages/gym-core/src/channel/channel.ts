import { ChannelError, ProtocolError } from '../errors';

/** Sentinel receive timeout: wait as long as the peer takes. */
export const UNBOUNDED = -1;

export type ChannelRole = 'request' | 'reply';

export interface ChannelTimeouts {
  /** Strictly positive, or {@link UNBOUNDED}. */
  receiveTimeoutMs: number;
  /** Strictly positive. */
  sendTimeoutMs: number;
}

/**
 * Duplex request/reply connection. A `request` channel sends first, a `reply` channel
 * receives first; after that the two operations must strictly alternate.
 */
export interface Channel {
  readonly name: string;
  readonly role: ChannelRole;
  send(message: unknown): Promise<void>;
  receive(): Promise<unknown>;
  close(): Promise<void>;
  isClosed(): boolean;
  /** True when a received request still waits for its reply. */
  awaitingReply(): boolean;
}

export function validateTimeouts(name: string, timeouts: ChannelTimeouts): ChannelTimeouts {
  const { receiveTimeoutMs, sendTimeoutMs } = timeouts;
  if (!(receiveTimeoutMs === UNBOUNDED || (Number.isFinite(receiveTimeoutMs) && receiveTimeoutMs > 0))) {
    throw new RangeError(`${name}: receive timeout must be > 0 or UNBOUNDED, got ${receiveTimeoutMs}`);
  }
  if (!(Number.isFinite(sendTimeoutMs) && sendTimeoutMs > 0)) {
    throw new RangeError(`${name}: send timeout must be > 0, got ${sendTimeoutMs}`);
  }
  return { receiveTimeoutMs, sendTimeoutMs };
}

/**
 * Runs `op` with an abort signal that fires after `timeoutMs`. The operation must reject
 * once the signal aborts; that rejection is reported as a `timed_out` ChannelError.
 */
export async function withDeadline<T>(
  channel: string,
  op: 'send' | 'receive',
  timeoutMs: number,
  run: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  if (timeoutMs === UNBOUNDED) return run(controller.signal);
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  try {
    return await run(controller.signal);
  } catch (err) {
    if (controller.signal.aborted) throw ChannelError.timedOut(channel, op, timeoutMs);
    throw err;
  } finally {
    clearTimeout(timer);
  }
}

export function abortError(): Error {
  const err = new Error('aborted');
  err.name = 'AbortError';
  return err;
}

/**
 * Shared ordering and timeout discipline. Subclasses only move bytes.
 */
export abstract class BaseChannel implements Channel {
  protected readonly timeouts: ChannelTimeouts;
  protected closed = false;
  private turn: 'send' | 'receive';

  constructor(public readonly name: string, public readonly role: ChannelRole, timeouts: ChannelTimeouts) {
    this.timeouts = validateTimeouts(name, timeouts);
    this.turn = role === 'request' ? 'send' : 'receive';
  }

  protected abstract transmit(message: unknown, signal: AbortSignal): Promise<void>;
  protected abstract collect(signal: AbortSignal): Promise<unknown>;
  protected abstract shutdown(): Promise<void>;

  async send(message: unknown): Promise<void> {
    if (this.closed) throw ChannelError.transport(this.name, 'send on closed channel');
    if (this.turn !== 'send') throw ProtocolError.outOfOrder(this.name, 'send');
    try {
      await withDeadline(this.name, 'send', this.timeouts.sendTimeoutMs, (signal) => this.transmit(message, signal));
    } catch (err) {
      // An undeliverable reply abandons its request; the next request may still be served.
      if (this.role === 'reply') this.turn = 'receive';
      throw err;
    }
    this.turn = 'receive';
  }

  async receive(): Promise<unknown> {
    if (this.closed) throw ChannelError.transport(this.name, 'receive on closed channel');
    if (this.turn !== 'receive') throw ProtocolError.outOfOrder(this.name, 'receive');
    let message: unknown;
    try {
      message = await withDeadline(this.name, 'receive', this.timeouts.receiveTimeoutMs, (signal) => this.collect(signal));
    } catch (err) {
      // A request whose reply never came is abandoned; the next request may be sent.
      if (this.role === 'request') {
        this.turn = 'send';
        this.abandonReply();
      }
      throw err;
    }
    this.turn = 'send';
    return message;
  }

  /** Called when a request's reply is given up on; transports drop it if it still arrives. */
  protected abandonReply(): void {}

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.shutdown();
  }

  isClosed(): boolean {
    return this.closed;
  }

  awaitingReply(): boolean {
    return this.role === 'reply' && this.turn === 'send' && !this.closed;
  }
}
