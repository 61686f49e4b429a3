import type { Logger } from 'pino';
import { Message, describeIssues, type EpisodeStat, type ErrorReply, type StepInfo, type StepReply } from '@tradegym/schemas';
import { ProtocolError, errorMessage, isChannelError, type Channel } from '@tradegym/core';
import type { IRenderer, IStrategy, StepSnapshot, TickContext, TickHook } from '@tradegym/interfaces';
import type { GymMetrics } from './metrics';

export type InfoMode = 'last' | 'all';

export const DONE_ACK = 'Done signal received.';
export const RENDER_HINT = 'render requires a <mode> key.';

export type StepExchangeOptions = {
  channel: Channel;
  log: Logger;
  renderer: IRenderer;
  /** Talk to the controller on every n-th tick (and on the terminal one). */
  skipFrame: number;
  infoMode: InfoMode;
  /** Answers `getstat` while the episode runs. */
  lastResult: () => EpisodeStat;
  metrics?: GymMetrics;
};

/**
 * Per-tick hook that synchronises the engine with the controller. On communicating ticks
 * it blocks until an `action` arrives, serving `render` and `getstat` in between; `done`
 * ends the episode.
 */
export class StepExchange implements TickHook {
  readonly name = '_env_step';
  private readonly log: Logger;
  private readonly renderAtStop: string[];
  private infoBatch: StepInfo[] = [];
  private stepToRender: StepSnapshot | null = null;
  private finished = false;

  constructor(private readonly options: StepExchangeOptions) {
    if (!Number.isInteger(options.skipFrame) || options.skipFrame < 1) throw new RangeError(`skip frame must be a positive integer, got ${options.skipFrame}`);
    this.log = options.log.child({ component: 'step' });
    this.renderAtStop = options.renderer.renderModes.filter((m) => m !== 'episode');
  }

  /** Last communicated step, kept for rendering. */
  get snapshot(): StepSnapshot | null {
    return this.stepToRender;
  }

  get isFinished(): boolean {
    return this.finished;
  }

  async onTick(ctx: TickContext): Promise<void> {
    if (this.finished) return;
    const { strategy, iteration } = ctx;
    const isDone = strategy.getDone();
    this.infoBatch.push(strategy.getInfo());
    strategy.action = 'hold';

    if (iteration % this.options.skipFrame === 0 || isDone) {
      const raw = strategy.getRawState();
      const state = strategy.getState();
      const reward = strategy.getReward();

      const action = await this.awaitAction(strategy);
      if (action === null) {
        this.earlyStop(ctx);
        return;
      }
      strategy.action = action;
      strategy.lastAction = action;

      const info = this.options.infoMode === 'last' ? [this.infoBatch[this.infoBatch.length - 1]] : this.infoBatch;
      const reply: StepReply = [state, reward, isDone, info];
      await this.options.channel.send(reply);
      this.options.metrics?.stepExchanges.inc();
      this.stepToRender = { raw, state, reward, done: isDone, info: this.infoBatch };
      this.infoBatch = [];
    }

    if (isDone) this.earlyStop(ctx);
    strategy.brokerMessage = '-';
  }

  /** Serves control requests until an action arrives; null once `done` was acknowledged. */
  private async awaitAction(strategy: IStrategy): Promise<string | null> {
    const { channel, renderer, metrics } = this.options;
    for (;;) {
      const raw = await channel.receive();
      this.log.debug({ message: raw }, 'received');
      const parsed = Message.safeParse(raw);
      if (!parsed.success) return this.fail(ProtocolError.malformed(raw, describeIssues(parsed.error)));
      const message = parsed.data;

      switch (message.ctrl) {
        case undefined:
          if (message.action !== undefined) return message.action;
          return this.fail(ProtocolError.missingAction(raw));
        case 'render':
          metrics?.renderRequests.inc({ state: 'episode' });
          await channel.send(message.mode === undefined ? RENDER_HINT : renderer.render(message.mode, this.stepToRender));
          break;
        case 'getstat':
          await channel.send(this.options.lastResult());
          break;
        case 'done':
          await channel.send(DONE_ACK);
          strategy.doneReason = 'done_signal';
          return null;
        default:
          return this.fail(ProtocolError.unknownControl(message.ctrl));
      }
    }
  }

  /** Tells the controller what went wrong, then aborts the episode. */
  private async fail(err: ProtocolError): Promise<never> {
    const reply: ErrorReply = { error: err.code, message: err.message };
    if (this.options.channel.awaitingReply()) {
      try {
        await this.options.channel.send(reply);
      } catch (sendErr) {
        if (!isChannelError(sendErr)) throw sendErr;
        this.log.warn({ err: errorMessage(sendErr) }, 'diagnostic reply not delivered');
      }
    }
    throw err;
  }

  private earlyStop(ctx: TickContext): void {
    const { strategy } = ctx;
    this.log.debug({ brokerMessage: strategy.brokerMessage, reason: strategy.doneReason }, 'runstop');
    if (this.renderAtStop.length > 0) this.options.renderer.render(this.renderAtStop, this.stepToRender);
    strategy.close();
    ctx.runstop();
    this.finished = true;
  }
}
