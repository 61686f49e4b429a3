import type { Logger } from "pino";
import type { EpisodeStat, ResetKwargs } from "@tradegym/schemas";
import type { TradingEnv } from "@tradegym/env-client";

export type RandomAgentOptions = {
  log: Logger;
  actions?: readonly string[];
  random?: () => number;
  /** Safety stop for servers that never report done. */
  maxSteps?: number;
};

export type EpisodeSummary = { steps: number; totalReward: number; stat: EpisodeStat };

export class RandomAgent {
  private readonly actions: readonly string[];
  private readonly random: () => number;
  private readonly log: Logger;

  constructor(private readonly env: TradingEnv, private readonly options: RandomAgentOptions) {
    this.actions = options.actions ?? ["buy", "sell", "close", "hold"];
    this.random = options.random ?? Math.random;
    this.log = options.log.child({ component: "random-agent" });
  }

  pick(): string {
    return this.actions[Math.min(Math.floor(this.random() * this.actions.length), this.actions.length - 1)];
  }

  async runEpisode(kwargs: ResetKwargs = {}): Promise<EpisodeSummary> {
    let step = await this.env.reset(kwargs);
    let steps = 0;
    let totalReward = step.reward;
    const maxSteps = this.options.maxSteps ?? Infinity;
    while (!step.done && steps < maxSteps) {
      step = await this.env.step(this.pick());
      steps += 1;
      totalReward += step.reward;
    }
    if (!step.done) await this.env.done();
    const stat = await this.env.getStat();
    this.log.info({ steps, totalReward, stat }, "episode complete");
    return { steps, totalReward, stat };
  }
}
