import pino from 'pino';
import { buildGymServer, httpChannels } from './app';
import { loadConfig } from './config';
import { createMetrics } from './metrics';

const config = loadConfig();
const log = pino({ name: '@tradegym/gym-server', level: config.LOG_LEVEL }).child({ task: config.TASK_ID });

async function main() {
  const metrics = createMetrics({ defaults: true });
  const channels = httpChannels(config, log, metrics);
  const address = await channels.channel.listen();
  log.info({ pid: process.pid, port: address.port, data: config.DATA_SERVER_URL }, 'gym server listening');
  await buildGymServer(config, log, channels, { metrics }).run();
}

main().catch((err) => {
  log.fatal({ err }, 'gym server terminated');
  process.exit(1);
});
