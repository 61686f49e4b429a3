import pino from 'pino';
import client from 'prom-client';
import { HttpReplyChannel } from '@tradegym/core';
import { OhlcvDataset, generateOhlcv } from '@tradegym/datafeed';
import { loadConfig } from './config';
import { DataServer } from './DataServer';

const config = loadConfig();
const log = pino({ name: '@tradegym/data-server', level: config.LOG_LEVEL });

const registry = new client.Registry();
client.collectDefaultMetrics({ register: registry });
const requests = new client.Counter({ name: 'data_server_requests_total', help: 'Requests by control key', labelNames: ['ctrl'] as const, registers: [registry] });

async function main() {
  const rows = generateOhlcv({ start: config.DATASET_START, bars: config.DATASET_BARS, interval: config.DATASET_INTERVAL });
  const dataset = new OhlcvDataset({
    name: `synthetic-${config.DATASET_INTERVAL}`,
    rows,
    trialLength: config.TRIAL_LENGTH,
    episodeLength: config.EPISODE_LENGTH,
    trainFraction: config.TRAIN_FRACTION
  });
  const channel = new HttpReplyChannel({ name: 'data', port: config.PORT, host: config.HOST, registry, log });
  const address = await channel.listen();
  log.info({ pid: process.pid, port: address.port, bars: dataset.size }, 'data server listening');
  await new DataServer({ channel, dataset, log, readyAt: Date.now() + config.READY_DELAY_MS, requests }).run();
}

main().catch((err) => {
  log.fatal({ err }, 'data server terminated');
  process.exit(1);
});
