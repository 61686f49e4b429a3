import { describe, it, expect } from 'vitest';
import pino from 'pino';
import { HttpReplyChannel, HttpRequestChannel } from '@tradegym/core';
import { OhlcvDataset, generateOhlcv } from '@tradegym/datafeed';
import { TradingEnv } from '@tradegym/env-client';
import { DataServer } from '@tradegym/data-server';
import { buildGymServer } from './app';
import { GymServerConfig } from './config';
import { createMetrics } from './metrics';

const log = pino({ level: 'silent' });

describe('gym over HTTP', () => {
  it('plays an episode against a live data server', async () => {
    const rows = generateOhlcv({ start: '2024-01-01T00:00:00Z', bars: 50, interval: '5m', random: () => 0.5 });
    const dataset = new OhlcvDataset({ name: 'e2e', rows, trialLength: 20, episodeLength: 6, trainFraction: 0.5 });
    const dataRep = new HttpReplyChannel({ name: 'data', port: 0 });
    const dataAddress = await dataRep.listen();
    const dataRun = new DataServer({ channel: dataRep, dataset, log }).run();

    const config = GymServerConfig.parse({ LOG_LEVEL: 'silent', PORT: '0', DATA_SERVER_URL: `http://127.0.0.1:${dataAddress.port}/call` });
    const metrics = createMetrics();
    const channel = new HttpReplyChannel({ name: 'controller', port: 0, registry: metrics.registry });
    const address = await channel.listen();
    const dataChannel = new HttpRequestChannel({ name: 'data', url: config.DATA_SERVER_URL });
    const gymRun = buildGymServer(config, log, { channel, dataChannel }, { metrics }).run();

    const env = new TradingEnv(new HttpRequestChannel({ url: `http://127.0.0.1:${address.port}/call` }));
    let step = await env.reset({ episode_config: { sample_type: 1 } });
    let steps = 0;
    while (!step.done) {
      step = await env.step(steps === 0 ? 'buy' : 'hold');
      steps += 1;
    }
    expect(steps).toBe(5);
    expect(step.info[0]).toMatchObject({ step: 5, position: 1 });
    expect(await env.getStat()).toMatchObject({ episode: 0, length: 6, stop_reason: 'data_exhausted' });

    const scrape = await fetch(`http://127.0.0.1:${address.port}/metrics`);
    expect(await scrape.text()).toContain('gym_episodes_total 1');

    await env.close();
    await gymRun;
    await dataRun;
  });
});
