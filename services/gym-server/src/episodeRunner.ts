import type { Logger } from 'pino';
import { SampleConfig, type DescribeStats, type EpisodeResult, type EpisodeStat, type ErrorReply } from '@tradegym/schemas';
import { SampleError, isSampleError, type Channel } from '@tradegym/core';
import type { OhlcvEpisodeSample, OhlcvTrialSample } from '@tradegym/datafeed';
import type { IRenderer, ISimEngine, ObserverSpec } from '@tradegym/interfaces';
import type { DataAcquisition } from './dataAcquisition';
import type { GymMetrics } from './metrics';
import { StepExchange, type InfoMode } from './stepExchange';

export type EpisodeConfigs = { trial: SampleConfig; episode: SampleConfig };

export type EpisodeRunnerOptions = {
  template: ISimEngine;
  channel: Channel;
  data: DataAcquisition;
  renderer: IRenderer;
  log: Logger;
  auxObservers: readonly ObserverSpec[];
  skipFrame: number;
  infoMode: InfoMode;
  metrics?: GymMetrics;
};

function reclaimMemory(): void {
  // Exposed only under --expose-gc.
  const gc: unknown = Reflect.get(globalThis, 'gc');
  if (typeof gc === 'function') gc();
}

/** Runs one episode on a fresh copy of the engine template. Owns the cached trial. */
export class EpisodeRunner {
  private readonly log: Logger;
  private trial: OhlcvTrialSample | null = null;
  private trialStat: DescribeStats = {};
  private datasetStat: DescribeStats = {};

  constructor(private readonly options: EpisodeRunnerOptions) {
    this.log = options.log.child({ component: 'episode' });
  }

  get cachedTrial(): OhlcvTrialSample | null {
    return this.trial;
  }

  /**
   * Resolves with the episode's result, or with null when no episode sample could be drawn:
   * the controller's first episode request is then answered with the failure.
   */
  async run(configs: EpisodeConfigs, episodeNumber: number, lastResult: () => EpisodeStat): Promise<EpisodeResult | null> {
    const { template, channel, renderer, metrics } = this.options;
    const started = Date.now();

    const engine = template.clone();
    for (const spec of this.options.auxObservers) {
      if (!engine.addObserver(spec)) this.log.debug({ observer: spec.name }, 'observer already attached');
    }
    engine.addHook(new StepExchange({
      channel,
      log: this.log,
      renderer,
      skipFrame: this.options.skipFrame,
      infoMode: this.options.infoMode,
      lastResult,
      metrics
    }));

    let sampled: { trial: OhlcvTrialSample; episode: OhlcvEpisodeSample };
    try {
      sampled = await this.sample(configs);
    } catch (err) {
      if (!isSampleError(err)) throw err;
      await this.abandon(err);
      return null;
    }
    const { trial, episode } = sampled;

    engine.setStrategyParams({
      trial_stat: this.trialStat,
      trial_metadata: trial.metadata,
      dataset_stat: this.datasetStat,
      episode_stat: episode.describe(),
      metadata: episode.metadata
    });
    engine.addData(episode.toFeed());

    const run = await engine.run();
    renderer.captureEpisode(run);

    const runtimeMs = Date.now() - started;
    metrics?.episodeDuration.observe(runtimeMs / 1000);
    this.log.info({ episode: episodeNumber, runtimeMs, length: run.length, reason: run.stopReason }, 'episode finished');
    reclaimMemory();
    return {
      episode: episodeNumber,
      runtime_ms: runtimeMs,
      length: run.length,
      done: true,
      stop_reason: run.stopReason,
      analyzers: run.analyses
    };
  }

  private async sample(configs: EpisodeConfigs): Promise<{ trial: OhlcvTrialSample; episode: OhlcvEpisodeSample }> {
    let trial = this.trial;
    if (configs.trial.get_new || trial === null) {
      this.log.debug({ config: configs.trial }, 'requesting new trial');
      const acquired = await this.options.data.acquire(configs.trial);
      trial = acquired.trial;
      this.trial = trial;
      this.trialStat = acquired.trialStat;
      this.datasetStat = acquired.datasetStat;
      this.log.info({ trial: trial.name }, 'got new trial');
    } else {
      this.log.debug({ trial: trial.name }, 'reusing trial');
    }
    try {
      return { trial, episode: trial.sample(configs.episode) };
    } catch (err) {
      if (!(err instanceof RangeError)) throw err;
      throw SampleError.samplingFailed(err);
    }
  }

  private async abandon(err: SampleError): Promise<void> {
    const { channel } = this.options;
    this.log.warn({ code: err.code, err: err.message }, 'episode not started');
    const pending = await channel.receive();
    this.log.debug({ message: pending }, 'answering with the setup failure');
    const reply: ErrorReply = { error: err.code, message: err.message };
    await channel.send(reply);
  }
}

/** Fills absent or partial `trial_config` / `episode_config` with defaults. */
export function parseEpisodeConfigs(kwargs: Record<string, unknown> | undefined, log: Logger): EpisodeConfigs {
  const read = (key: 'trial_config' | 'episode_config'): SampleConfig => {
    const raw = kwargs?.[key];
    if (raw === undefined) log.debug({ key }, 'reset kwarg not found, using defaults');
    return SampleConfig.parse(raw ?? {});
  };
  return { trial: read('trial_config'), episode: read('episode_config') };
}
