import client, { type Registry } from 'prom-client';

export type MetricsOptions = { registry?: Registry; defaults?: boolean };

export function createMetrics({ registry = new client.Registry(), defaults = false }: MetricsOptions = {}) {
  if (defaults) client.collectDefaultMetrics({ register: registry });
  return {
    registry,
    controlMessages: new client.Counter({ name: 'gym_control_messages_total', help: 'Control messages received', labelNames: ['ctrl'] as const, registers: [registry] }),
    episodes: new client.Counter({ name: 'gym_episodes_total', help: 'Completed episodes', registers: [registry] }),
    stepExchanges: new client.Counter({ name: 'gym_step_exchanges_total', help: 'Step tuples sent to the controller', registers: [registry] }),
    renderRequests: new client.Counter({ name: 'gym_render_requests_total', help: 'Render requests answered', labelNames: ['state'] as const, registers: [registry] }),
    dataAttempts: new client.Counter({ name: 'gym_data_attempts_total', help: 'Data provider requests by outcome', labelNames: ['outcome'] as const, registers: [registry] }),
    episodeDuration: new client.Histogram({
      name: 'gym_episode_duration_seconds',
      help: 'Wall-clock episode duration',
      buckets: [0.1, 0.5, 1, 5, 15, 60, 300],
      registers: [registry]
    })
  };
}

export type GymMetrics = ReturnType<typeof createMetrics>;
