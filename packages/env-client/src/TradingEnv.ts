import { z } from 'zod';
import { EpisodeStat, ErrorReply, RenderReply, StepReply, type RenderMode, type ResetKwargs, type StepInfo } from '@tradegym/schemas';
import { exchange, type Channel } from '@tradegym/core';

export class EnvError extends Error {
  constructor(message: string, public readonly reply?: unknown, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EnvError';
  }
}

export type StepResult = { state: unknown; reward: number; done: boolean; info: StepInfo[] };

/**
 * Controller side of the gym protocol over a request channel.
 *
 * @example
 * ```typescript
 * const env = new TradingEnv(new HttpRequestChannel({ url: 'http://127.0.0.1:5000/call' }));
 * let step = await env.reset();
 * while (!step.done) step = await env.step('hold');
 * console.log(await env.getStat());
 * await env.close();
 * ```
 */
export class TradingEnv {
  private inEpisode = false;

  constructor(private readonly channel: Channel) {}

  get episodeRunning(): boolean {
    return this.inEpisode;
  }

  /** Ends a running episode, starts a new one and returns its first observation. */
  async reset(kwargs: ResetKwargs = {}): Promise<StepResult> {
    if (this.inEpisode) await this.done();
    const ack = await this.call({ ctrl: 'reset', kwargs });
    if (typeof ack !== 'string') throw new EnvError('reset rejected', ack);
    this.inEpisode = true;
    return this.step('hold');
  }

  async step(action: string): Promise<StepResult> {
    if (!this.inEpisode) throw new EnvError('no episode running; call reset() first');
    let reply: unknown;
    try {
      reply = await this.call({ action });
    } catch (err) {
      // The server never carries on an episode after a failed step.
      this.inEpisode = false;
      throw err;
    }
    const parsed = StepReply.safeParse(reply);
    if (!parsed.success) {
      this.inEpisode = false;
      throw new EnvError('unexpected step reply', reply, { cause: parsed.error });
    }
    const [state, reward, done, info] = parsed.data;
    if (done) this.inEpisode = false;
    return { state, reward, done, info };
  }

  async render(mode: RenderMode): Promise<RenderReply> {
    return this.expect(RenderReply, await this.call({ ctrl: 'render', mode }));
  }

  async getStat(): Promise<EpisodeStat> {
    return this.expect(EpisodeStat, await this.call({ ctrl: 'getstat' }));
  }

  /** Forces the running episode to end. No-op outside an episode. */
  async done(): Promise<void> {
    if (!this.inEpisode) return;
    await this.call({ ctrl: 'done' });
    this.inEpisode = false;
  }

  /** Stops the server session and releases the channel. */
  async close(): Promise<void> {
    try {
      if (this.inEpisode) await this.done();
      await this.call({ ctrl: 'stop' });
    } finally {
      await this.channel.close();
    }
  }

  private async call(message: Record<string, unknown>): Promise<unknown> {
    const outcome = await exchange(this.channel, message);
    if (outcome.status !== 'ok') throw new EnvError(`exchange failed with status <${outcome.status}>`, undefined, { cause: outcome.error });
    const error = ErrorReply.safeParse(outcome.message);
    if (error.success) throw new EnvError(`${error.data.error}: ${error.data.message}`, outcome.message);
    return outcome.message;
  }

  private expect<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, reply: unknown): T {
    const parsed = schema.safeParse(reply);
    if (!parsed.success) throw new EnvError('unexpected reply', reply, { cause: parsed.error });
    return parsed.data;
  }
}
