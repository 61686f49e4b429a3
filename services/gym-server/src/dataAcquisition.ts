import type { Logger } from 'pino';
import { DataReply, ErrorReply, PingReply, type DescribeStats, type SampleConfig } from '@tradegym/schemas';
import { DataError, SampleError, errorMessage, exchange, isProtocolError, type Channel } from '@tradegym/core';
import { OhlcvTrialSample, type RandomSource } from '@tradegym/datafeed';
import type { GymMetrics } from './metrics';

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export type DataAcquisitionOptions = {
  channel: Channel;
  log: Logger;
  /** Total backoff allowed while the provider reports not ready. */
  waitBudgetMs: number;
  /** Each pause is drawn uniformly from [0, backoffMaxMs). */
  backoffMaxMs: number;
  sleep?: Sleep;
  random?: RandomSource;
  metrics?: GymMetrics;
};

export type Acquired = {
  trial: OhlcvTrialSample;
  trialStat: DescribeStats;
  datasetStat: DescribeStats;
};

export type Readiness =
  | { state: 'ready'; reply: Extract<DataReply, { status: 'ready' }>; elapsedMs: number }
  | { state: 'not_ready'; message?: string }
  | { state: 'rejected'; error: string; message: string }
  | { state: 'unreachable'; status: string; cause?: unknown };

export class DataAcquisition {
  private readonly log: Logger;
  private readonly sleep: Sleep;
  private readonly random: RandomSource;
  private stopped = false;

  constructor(private readonly options: DataAcquisitionOptions) {
    this.log = options.log.child({ component: 'data' });
    this.sleep = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;
  }

  async ping(): Promise<PingReply> {
    const outcome = await exchange(this.options.channel, { ctrl: 'ping' });
    if (outcome.status !== 'ok') {
      this.log.error({ status: outcome.status, err: outcome.error }, 'data provider unreachable');
      throw DataError.unreachable(outcome.status, outcome.error);
    }
    const reply = PingReply.safeParse(outcome.message);
    if (!reply.success) throw DataError.unreachable('malformed_reply', reply.error);
    this.log.debug({ reply: reply.data }, 'data provider answered ping');
    return reply.data;
  }

  /** One `get_data` round trip, classified. */
  async request(config: SampleConfig): Promise<Readiness> {
    const outcome = await exchange(this.options.channel, { ctrl: 'get_data', kwargs: config });
    if (outcome.status !== 'ok') return { state: 'unreachable', status: outcome.status, cause: outcome.error };
    const rejected = ErrorReply.safeParse(outcome.message);
    if (rejected.success) return { state: 'rejected', ...rejected.data };
    const reply = DataReply.safeParse(outcome.message);
    if (!reply.success) return { state: 'unreachable', status: 'malformed_reply', cause: reply.error };
    if (reply.data.status === 'not_ready') return { state: 'not_ready', message: reply.data.message };
    return { state: 'ready', reply: reply.data, elapsedMs: outcome.elapsedMs };
  }

  /**
   * Polls the provider until it hands out a trial. Not-ready replies are retried with
   * jittered backoff until the wait budget is spent, then the provider is told to stop.
   */
  async acquire(config: SampleConfig): Promise<Acquired> {
    const { waitBudgetMs, backoffMaxMs, metrics } = this.options;
    let waited = 0;
    for (;;) {
      const result = await this.request(config);
      metrics?.dataAttempts.inc({ outcome: result.state });

      if (result.state === 'unreachable') {
        this.log.error({ status: result.status, err: result.cause }, 'data provider unreachable');
        throw DataError.unreachable(result.status, result.cause);
      }

      if (result.state === 'rejected') {
        this.log.warn({ error: result.error, reason: result.message }, 'data provider rejected the request');
        throw SampleError.providerRejected(result.error, result.message);
      }

      if (result.state === 'ready') {
        this.log.debug({ elapsedMs: result.elapsedMs }, 'data provider responded with data');
        const trial = OhlcvTrialSample.fromWire(result.reply.sample, this.random);
        const trialStat = trial.describe();
        trial.reset();
        return { trial, trialStat, datasetStat: result.reply.stat };
      }

      if (waited > waitBudgetMs) {
        await this.stop();
        throw DataError.timeout(waited, waitBudgetMs);
      }
      const pause = this.random() * backoffMaxMs;
      await this.sleep(pause);
      waited += pause;
      this.log.warn({ leftMs: Math.max(0, waitBudgetMs - waited), reason: result.message }, 'dataset not ready, waiting');
    }
  }

  /** Best-effort `stop` to the provider; sent at most once. */
  async stop(): Promise<void> {
    if (this.stopped || this.options.channel.isClosed()) return;
    this.stopped = true;
    try {
      const outcome = await exchange(this.options.channel, { ctrl: 'stop' });
      if (outcome.status === 'ok') this.log.info({ reply: outcome.message }, 'data provider stopped');
      else this.log.warn({ status: outcome.status }, 'stop not delivered to data provider');
    } catch (err) {
      if (!isProtocolError(err)) throw err;
      this.log.warn({ err: errorMessage(err) }, 'stop not sent: data channel is mid-exchange');
    }
  }
}
