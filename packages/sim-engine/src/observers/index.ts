import type { Observer, ObserverContext, ObserverSpec } from "@tradegym/interfaces";
import { DrawdownTracker } from "../drawdown";

class LineObserver implements Observer {
  private readonly data: Record<string, number[]>;

  constructor(private readonly names: readonly string[], private readonly read: (ctx: ObserverContext) => number[]) {
    this.data = Object.fromEntries(names.map((n) => [n, []]));
  }

  next(ctx: ObserverContext): void {
    const values = this.read(ctx);
    this.names.forEach((n, i) => this.data[n].push(values[i]));
  }

  lines(): Record<string, number[]> {
    return this.data;
  }
}

export const DrawdownObserver: ObserverSpec = {
  name: "drawdown",
  create() {
    const dd = new DrawdownTracker();
    return new LineObserver(["drawdown", "maxdrawdown"], (ctx) => {
      dd.update(ctx.value);
      return [dd.drawdown, dd.maxDrawdown];
    });
  }
};

/** Portfolio value change relative to the starting value. */
export const NormPnLObserver: ObserverSpec = {
  name: "norm_pnl",
  create: () => new LineObserver(["pnl"], (ctx) => [(ctx.value - ctx.startValue) / ctx.startValue])
};

export const PositionObserver: ObserverSpec = {
  name: "position",
  create: () => new LineObserver(["position"], (ctx) => [ctx.position])
};

export const RewardObserver: ObserverSpec = {
  name: "reward",
  create: () => new LineObserver(["reward"], (ctx) => [ctx.reward])
};

/** Observers every episode gets; the plotting ones only matter when rendering is on. */
export function auxObservers(renderEnabled: boolean): ObserverSpec[] {
  return renderEnabled ? [DrawdownObserver, NormPnLObserver, PositionObserver, RewardObserver] : [DrawdownObserver];
}
