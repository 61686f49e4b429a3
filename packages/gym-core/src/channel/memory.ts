import { ChannelError } from '../errors';
import { BaseChannel, UNBOUNDED, type ChannelRole, type ChannelTimeouts } from './channel';
import { Mailbox } from './mailbox';

export type MemoryPairOptions = {
  requester?: Partial<ChannelTimeouts>;
  replier?: Partial<ChannelTimeouts>;
  names?: [string, string];
};

const DEFAULT_TIMEOUTS: ChannelTimeouts = { receiveTimeoutMs: UNBOUNDED, sendTimeoutMs: 60_000 };

/**
 * In-process channel end. Messages are JSON-copied on send so a memory pair behaves like
 * the HTTP transport: no shared references cross the channel.
 *
 * @example
 * ```typescript
 * const [client, server] = MemoryChannel.createPair();
 * await client.send({ ctrl: 'ping' });
 * await server.receive();   // { ctrl: 'ping' }
 * await server.send('pong');
 * await client.receive();   // 'pong'
 * ```
 */
export class MemoryChannel extends BaseChannel {
  private readonly inbox: Mailbox<unknown>;
  private peer: MemoryChannel | null = null;
  private stale = 0;

  constructor(name: string, role: ChannelRole, timeouts: ChannelTimeouts) {
    super(name, role, timeouts);
    this.inbox = new Mailbox<unknown>(name);
  }

  /** @returns `[requester, replier]` */
  static createPair(options: MemoryPairOptions = {}): [MemoryChannel, MemoryChannel] {
    const [reqName, repName] = options.names ?? ['memory-req', 'memory-rep'];
    const requester = new MemoryChannel(reqName, 'request', { ...DEFAULT_TIMEOUTS, ...options.requester });
    const replier = new MemoryChannel(repName, 'reply', { ...DEFAULT_TIMEOUTS, ...options.replier });
    requester.peer = replier;
    replier.peer = requester;
    return [requester, replier];
  }

  /** Messages delivered to this end and not yet received. */
  pending(): number {
    return this.inbox.size();
  }

  protected async transmit(message: unknown): Promise<void> {
    if (!this.peer) throw ChannelError.transport(this.name, 'no peer connected');
    const copy: unknown = message === undefined ? null : JSON.parse(JSON.stringify(message));
    this.peer.inbox.push(copy);
  }

  protected async collect(signal: AbortSignal): Promise<unknown> {
    let message = await this.inbox.take(signal);
    while (this.stale > 0) {
      this.stale -= 1;
      message = await this.inbox.take(signal);
    }
    return message;
  }

  // Late replies to abandoned requests still to be skipped.
  protected abandonReply(): void {
    this.stale += 1;
  }

  protected async shutdown(): Promise<void> {
    this.inbox.close('channel closed');
    this.peer?.inbox.close('peer closed');
  }
}
