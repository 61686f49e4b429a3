import type { Logger } from 'pino';
import type { Counter } from 'prom-client';
import { Ctrl, Message, SampleConfig, type DataReply, type DescribeStats, type ErrorReply, type PingReply } from '@tradegym/schemas';
import { errorMessage, isChannelError, type Channel } from '@tradegym/core';
import type { OhlcvDataset } from '@tradegym/datafeed';

export const FAREWELL = 'Exiting.';
export const USAGE_HINT = { ctrl: 'send control keys: <get_data>, <ping>, <stop>.' } as const;

export type DataServerOptions = {
  /** Reply role; one request per gym-server exchange. */
  channel: Channel;
  dataset: OhlcvDataset;
  log: Logger;
  /** Time the dataset becomes available, in epoch ms. */
  readyAt?: number;
  now?: () => number;
  requests?: Counter<'ctrl'>;
};

/** Serves trial samples to gym servers until told to stop. */
export class DataServer {
  private readonly log: Logger;
  private readonly now: () => number;
  private readonly readyAt: number;
  private datasetStat: DescribeStats | null = null;

  constructor(private readonly options: DataServerOptions) {
    this.log = options.log.child({ component: 'data-server' });
    this.now = options.now ?? Date.now;
    this.readyAt = options.readyAt ?? this.now();
  }

  ready(): boolean {
    return this.now() >= this.readyAt;
  }

  async run(): Promise<void> {
    const { channel } = this.options;
    for (;;) {
      let raw: unknown;
      try {
        raw = await channel.receive();
      } catch (err) {
        if (!isChannelError(err) || err.code !== 'timed_out') throw err;
        this.log.warn({ err: errorMessage(err) }, 'receive timed out');
        continue;
      }
      this.log.debug({ message: raw }, 'received');
      const { reply, stop } = this.dispatch(raw);
      try {
        await channel.send(reply);
      } catch (err) {
        if (!isChannelError(err) || channel.isClosed()) throw err;
        this.log.warn({ err: errorMessage(err) }, 'reply undeliverable');
      }
      if (stop) break;
    }
    this.log.info('stopped');
    await channel.close();
  }

  dispatch(raw: unknown): { reply: unknown; stop: boolean } {
    const parsed = Message.safeParse(raw);
    const ctrl = parsed.success ? parsed.data.ctrl : undefined;
    const known = Ctrl.safeParse(ctrl);
    this.options.requests?.inc({ ctrl: known.success ? known.data : 'other' });

    switch (ctrl) {
      case 'ping': {
        const reply: PingReply = { ctrl: 'pong', ready: this.ready() };
        return { reply, stop: false };
      }
      case 'get_data':
        return { reply: this.getData(parsed.success ? parsed.data.kwargs : undefined), stop: false };
      case 'stop':
        return { reply: FAREWELL, stop: true };
      default:
        return { reply: USAGE_HINT, stop: false };
    }
  }

  private getData(kwargs: Record<string, unknown> | undefined): DataReply | ErrorReply {
    if (!this.ready()) {
      return { status: 'not_ready', message: `Dataset not ready, ${Math.max(0, this.readyAt - this.now())}ms left.` };
    }
    const config = SampleConfig.safeParse(kwargs ?? {});
    if (!config.success) return { error: 'invalid_kwargs', message: config.error.message };
    try {
      const trial = this.options.dataset.sampleTrial(config.data);
      this.datasetStat ??= this.options.dataset.describe();
      this.log.info({ trial: trial.name, firstRow: trial.metadata.first_row }, 'trial sampled');
      return { status: 'ready', sample: trial.toWire(), stat: this.datasetStat };
    } catch (err) {
      if (!(err instanceof RangeError)) throw err;
      return { error: 'sampling_failed', message: err.message };
    }
  }
}
