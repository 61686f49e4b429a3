import { describe, it, expect } from "vitest";
import pino from "pino";
import { MemoryChannel } from "@tradegym/core";
import { TradingEnv } from "@tradegym/env-client";
import { RandomAgent } from "./RandomAgent";

const log = pino({ level: "silent" });
const stat = { episode: 0, runtime_ms: 5, length: 3, done: true, stop_reason: "data_exhausted", analyzers: {} };

async function serve(channel: MemoryChannel, replies: unknown[]): Promise<unknown[]> {
  const seen: unknown[] = [];
  for (const reply of replies) {
    seen.push(await channel.receive());
    await channel.send(reply);
  }
  return seen;
}

describe("RandomAgent", () => {
  it("steps until done and collects the episode stat", async () => {
    const [req, rep] = MemoryChannel.createPair();
    const server = serve(rep, [
      "Preparing new episode with kwargs: {}",
      [[0], 0, false, [{ step: 0 }]],
      [[0], 0.5, false, [{ step: 1 }]],
      [[0], 0.25, true, [{ step: 2 }]],
      stat
    ]);
    const agent = new RandomAgent(new TradingEnv(req), { log, random: () => 0 });
    const summary = await agent.runEpisode();
    expect(summary).toEqual({ steps: 2, totalReward: 0.75, stat });
    expect(await server).toEqual([
      { ctrl: "reset", kwargs: {} },
      { action: "hold" },
      { action: "buy" },
      { action: "buy" },
      { ctrl: "getstat" }
    ]);
  });

  it("forces done after the step limit", async () => {
    const [req, rep] = MemoryChannel.createPair();
    const server = serve(rep, [
      "Preparing new episode with kwargs: {}",
      [[0], 0, false, [{}]],
      [[0], 0, false, [{}]],
      "Done signal received.",
      {}
    ]);
    const agent = new RandomAgent(new TradingEnv(req), { log, random: () => 0.99, maxSteps: 1 });
    const summary = await agent.runEpisode();
    expect(summary.steps).toBe(1);
    expect(summary.stat).toEqual({});
    const seen = await server;
    expect(seen[2]).toEqual({ action: "hold" });
    expect(seen[3]).toEqual({ ctrl: "done" });
  });

  it("picks uniformly over its action set", () => {
    const env = new TradingEnv(MemoryChannel.createPair()[0]);
    const pick = (u: number) => new RandomAgent(env, { log, random: () => u }).pick();
    expect([0, 0.3, 0.6, 0.9].map(pick)).toEqual(["buy", "sell", "close", "hold"]);
  });
});
