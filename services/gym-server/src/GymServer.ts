import type { Logger } from 'pino';
import { Ctrl, Message, describeIssues, type EpisodeStat, type ErrorReply } from '@tradegym/schemas';
import { errorMessage, isChannelError, type Channel } from '@tradegym/core';
import type { RandomSource } from '@tradegym/datafeed';
import type { IRenderer, ISimEngine, ObserverSpec } from '@tradegym/interfaces';
import { DataAcquisition, type Sleep } from './dataAcquisition';
import { EpisodeRunner, parseEpisodeConfigs, type EpisodeConfigs } from './episodeRunner';
import type { GymMetrics } from './metrics';
import type { InfoMode } from './stepExchange';

export type SessionState = 'control' | 'episode' | 'terminated';

export const FAREWELL = 'Exiting.';
export const CONTROL_HINT = { ctrl: 'send control keys: <reset>, <getstat>, <render>, <stop>.' } as const;

export type GymServerOptions = {
  /** Controller channel, reply role. */
  channel: Channel;
  /** Data provider channel, request role. */
  dataChannel: Channel;
  engine: ISimEngine;
  renderer: IRenderer;
  log: Logger;
  auxObservers: readonly ObserverSpec[];
  skipFrame: number;
  infoMode: InfoMode;
  waitForDataMs: number;
  backoffMaxMs: number;
  metrics?: GymMetrics;
  sleep?: Sleep;
  random?: RandomSource;
};

type ControlOutcome = { reply: unknown; next?: { state: 'episode'; configs: EpisodeConfigs } | { state: 'terminated' } };

/**
 * One controller session: answers control requests until `reset`, runs the episode, and
 * returns to control mode, until `stop` or a fatal error.
 */
export class GymServer {
  private readonly log: Logger;
  private readonly data: DataAcquisition;
  private readonly runner: EpisodeRunner;
  private _state: SessionState = 'control';
  private episodeNumber = 0;
  private lastResult: EpisodeStat = {};

  constructor(private readonly options: GymServerOptions) {
    this.log = options.log.child({ component: 'control' });
    this.data = new DataAcquisition({
      channel: options.dataChannel,
      log: options.log,
      waitBudgetMs: options.waitForDataMs,
      backoffMaxMs: options.backoffMaxMs,
      sleep: options.sleep,
      random: options.random,
      metrics: options.metrics
    });
    this.runner = new EpisodeRunner({
      template: options.engine,
      channel: options.channel,
      data: this.data,
      renderer: options.renderer,
      log: options.log,
      auxObservers: options.auxObservers,
      skipFrame: options.skipFrame,
      infoMode: options.infoMode,
      metrics: options.metrics
    });
  }

  get state(): SessionState {
    return this._state;
  }

  /** Episodes completed so far. */
  get episodes(): number {
    return this.episodeNumber;
  }

  /** Resolves after `stop`; rejects with the fatal error after releasing both channels. */
  async run(): Promise<void> {
    try {
      const pong = await this.data.ping();
      this.log.debug({ pong }, 'data provider reachable');
      this.options.renderer.initialize();

      for (;;) {
        const configs = await this.controlMode();
        if (configs === null) break;
        this._state = 'episode';
        const result = await this.runner.run(configs, this.episodeNumber, () => this.lastResult);
        this._state = 'control';
        if (result === null) continue;
        this.lastResult = result;
        this.episodeNumber += 1;
        this.options.metrics?.episodes.inc();
      }
    } catch (err) {
      this.log.error({ err, state: this._state }, 'session failed');
      try {
        await this.shutdown();
      } catch (closeErr) {
        this.log.warn({ err: closeErr }, 'shutdown after failure incomplete');
      }
      throw err;
    }
    await this.shutdown();
  }

  /** Blocks until `reset` (returns the sample configs) or `stop` (returns null). */
  private async controlMode(): Promise<EpisodeConfigs | null> {
    const { channel } = this.options;
    for (;;) {
      let raw: unknown;
      try {
        raw = await channel.receive();
      } catch (err) {
        // A receive that fails other than by timing out means the controller is gone.
        if (!isChannelError(err) || err.code !== 'timed_out') throw err;
        this.log.warn({ err: errorMessage(err) }, 'control mode: receive timed out');
        continue;
      }
      this.log.debug({ message: raw }, 'control mode: received');
      const { reply, next } = this.dispatch(raw);
      try {
        await channel.send(reply);
      } catch (err) {
        if (!isChannelError(err) || channel.isClosed()) throw err;
        this.log.warn({ err: errorMessage(err) }, 'control mode: reply undeliverable');
        if (next?.state === 'terminated') return null;
        continue;
      }
      if (next?.state === 'terminated') return null;
      if (next?.state === 'episode') return next.configs;
    }
  }

  private dispatch(raw: unknown): ControlOutcome {
    const parsed = Message.safeParse(raw);
    if (!parsed.success) {
      const reply: ErrorReply = { error: 'malformed_message', message: describeIssues(parsed.error) };
      return { reply };
    }
    const message = parsed.data;
    const { ctrl } = message;
    if (ctrl === undefined) {
      return { reply: `No <ctrl> key received: ${JSON.stringify(raw)}\nHint: forgot to call reset()?` };
    }
    const known = Ctrl.safeParse(ctrl);
    this.options.metrics?.controlMessages.inc({ ctrl: known.success ? known.data : 'other' });

    switch (ctrl) {
      case 'stop':
        this.log.info('stop received');
        return { reply: FAREWELL, next: { state: 'terminated' } };
      case 'reset': {
        let configs: EpisodeConfigs;
        try {
          configs = parseEpisodeConfigs(message.kwargs, this.log);
        } catch (err) {
          const reply: ErrorReply = { error: 'invalid_kwargs', message: errorMessage(err) };
          return { reply };
        }
        return { reply: `Preparing new episode with kwargs: ${JSON.stringify(message.kwargs ?? {})}`, next: { state: 'episode', configs } };
      }
      case 'getstat':
        return { reply: this.lastResult };
      case 'render':
        if (message.mode !== undefined) {
          this.options.metrics?.renderRequests.inc({ state: 'control' });
          return { reply: this.options.renderer.render(message.mode) };
        }
        return { reply: CONTROL_HINT };
      default:
        return { reply: CONTROL_HINT };
    }
  }

  private async shutdown(): Promise<void> {
    this._state = 'terminated';
    await this.data.stop();
    await Promise.all([this.options.channel.close(), this.options.dataChannel.close()]);
    this.log.info({ episodes: this.episodeNumber }, 'session closed');
  }
}
