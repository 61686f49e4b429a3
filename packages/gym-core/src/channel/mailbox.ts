import { ChannelError } from '../errors';
import { abortError } from './channel';

type Waiter<T> = { resolve: (item: T) => void; reject: (err: Error) => void };

/**
 * FIFO inbox. A cancelled take leaves the queue untouched, so a receive that times out
 * never swallows a message.
 */
export class Mailbox<T> {
  private items: T[] = [];
  private waiters: Array<Waiter<T>> = [];
  private closedReason: string | null = null;

  constructor(private readonly owner: string) {}

  push(item: T): void {
    if (this.closedReason) throw ChannelError.transport(this.owner, `peer inbox closed (${this.closedReason})`);
    const waiter = this.waiters.shift();
    if (waiter) waiter.resolve(item);
    else this.items.push(item);
  }

  take(signal: AbortSignal): Promise<T> {
    const head = this.items.shift();
    if (head !== undefined) return Promise.resolve(head);
    if (this.closedReason) return Promise.reject(ChannelError.transport(this.owner, this.closedReason));
    return new Promise<T>((resolve, reject) => {
      const waiter: Waiter<T> = {
        resolve: (item) => { signal.removeEventListener('abort', onAbort); resolve(item); },
        reject: (err) => { signal.removeEventListener('abort', onAbort); reject(err); }
      };
      const onAbort = () => {
        this.waiters = this.waiters.filter((w) => w !== waiter);
        reject(abortError());
      };
      signal.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  close(reason: string): void {
    if (this.closedReason) return;
    this.closedReason = reason;
    const waiters = this.waiters;
    this.waiters = [];
    for (const w of waiters) w.reject(ChannelError.transport(this.owner, reason));
  }

  /** Removes and returns everything still queued. */
  drain(): T[] {
    const items = this.items;
    this.items = [];
    return items;
  }

  size(): number {
    return this.items.length;
  }
}
