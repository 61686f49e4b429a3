import pino from "pino";
import { z } from "zod";
import { HttpRequestChannel } from "@tradegym/core";
import { TradingEnv } from "@tradegym/env-client";
import { RandomAgent } from "./RandomAgent";

const Env = z.object({
  GYM_URL: z.string().url().default("http://127.0.0.1:5000/call"),
  EPISODES: z.coerce.number().int().positive().default(3),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info")
});

const config = Env.parse(process.env);
const log = pino({ name: "@tradegym/random-agent", level: config.LOG_LEVEL });

async function main() {
  const env = new TradingEnv(new HttpRequestChannel({ url: config.GYM_URL, timeouts: { receiveTimeoutMs: 600_000 } }));
  const agent = new RandomAgent(env, { log });
  try {
    for (let i = 0; i < config.EPISODES; i++) await agent.runEpisode();
  } finally {
    await env.close();
  }
}

main().catch((err) => {
  log.fatal({ err }, "random agent failed");
  process.exit(1);
});
