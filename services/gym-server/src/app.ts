import type { Logger } from 'pino';
import { HttpReplyChannel, HttpRequestChannel, type Channel } from '@tradegym/core';
import { DEFAULT_ANALYZERS, SimEngine, SummaryRenderer, auxObservers } from '@tradegym/sim-engine';
import type { GymServerConfig } from './config';
import { GymServer, type GymServerOptions } from './GymServer';
import type { GymMetrics } from './metrics';

/** Engine template every episode is cloned from. */
export function buildEngine(config: GymServerConfig): SimEngine {
  const engine = new SimEngine({
    params: {
      state_window: config.STATE_WINDOW,
      drawdown_call: config.DRAWDOWN_CALL,
      target_call: config.TARGET_CALL,
      order_size: config.ORDER_SIZE
    },
    startCash: config.START_CASH,
    commission: config.COMMISSION
  });
  for (const analyzer of DEFAULT_ANALYZERS) engine.addAnalyzer(analyzer);
  return engine;
}

export type Channels = { channel: Channel; dataChannel: Channel };

export function buildGymServer(
  config: GymServerConfig,
  log: Logger,
  channels: Channels,
  extra: Pick<GymServerOptions, 'metrics' | 'sleep' | 'random'> = {}
): GymServer {
  const renderer = new SummaryRenderer({ enabled: config.RENDER_ENABLED });
  return new GymServer({
    ...channels,
    ...extra,
    engine: buildEngine(config),
    renderer,
    log,
    auxObservers: auxObservers(renderer.enabled),
    skipFrame: config.SKIP_FRAME,
    infoMode: config.INFO_MODE,
    waitForDataMs: config.WAIT_FOR_DATA_MS,
    backoffMaxMs: config.BACKOFF_MAX_MS
  });
}

export function httpChannels(config: GymServerConfig, log: Logger, metrics: GymMetrics): { channel: HttpReplyChannel; dataChannel: HttpRequestChannel } {
  const timeoutMs = config.CONNECT_TIMEOUT_MS;
  return {
    channel: new HttpReplyChannel({
      name: 'controller',
      port: config.PORT,
      host: config.HOST,
      timeouts: { sendTimeoutMs: timeoutMs },
      registry: metrics.registry,
      log
    }),
    dataChannel: new HttpRequestChannel({
      name: 'data',
      url: config.DATA_SERVER_URL,
      timeouts: { sendTimeoutMs: timeoutMs, receiveTimeoutMs: timeoutMs }
    })
  };
}
