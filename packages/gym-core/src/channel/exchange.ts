import { isChannelError } from '../errors';
import type { Channel } from './channel';

export type ExchangeStatus =
  | 'ok'
  | 'send_failed_timeout'
  | 'send_failed_other'
  | 'receive_failed_timeout'
  | 'receive_failed_other';

export type ExchangeOutcome =
  | { status: 'ok'; message: unknown; elapsedMs: number }
  | { status: Exclude<ExchangeStatus, 'ok'>; error: Error };

/**
 * Send then receive, reporting channel faults as a status instead of throwing.
 * Ordering violations (ProtocolError) and other programming errors still throw.
 */
export async function exchange(channel: Channel, message: unknown): Promise<ExchangeOutcome> {
  try {
    await channel.send(message);
  } catch (err) {
    if (!isChannelError(err)) throw err;
    return { status: err.code === 'timed_out' ? 'send_failed_timeout' : 'send_failed_other', error: err };
  }
  const start = Date.now();
  try {
    const reply = await channel.receive();
    return { status: 'ok', message: reply, elapsedMs: Date.now() - start };
  } catch (err) {
    if (!isChannelError(err)) throw err;
    return { status: err.code === 'timed_out' ? 'receive_failed_timeout' : 'receive_failed_other', error: err };
  }
}
