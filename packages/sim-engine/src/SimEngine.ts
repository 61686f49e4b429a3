import type {
  Analyzer,
  AnalyzerSpec,
  EngineRun,
  ISimEngine,
  IStrategy,
  Observer,
  ObserverContext,
  ObserverSpec,
  StrategyParams,
  TickHook
} from "@tradegym/interfaces";
import type { OhlcvRow } from "@tradegym/schemas";
import type { IBroker } from "./brokers/IBroker";
import { SimBroker } from "./brokers/SimBroker";
import { DefaultStrategy, type StrategyFactory } from "./strategy/DefaultStrategy";

export type SimEngineOptions = {
  params: StrategyParams;
  startCash: number;
  commission: number;
  strategy?: StrategyFactory;
};

/**
 * Bar-by-bar backtest loop. Each tick marks the broker, runs the strategy, feeds observers
 * and analyzers, then awaits every hook in attachment order.
 *
 * An engine instance runs once; keep a template and `clone()` it per episode. Hooks and
 * data belong to a run and are not carried over by `clone()`.
 */
export class SimEngine implements ISimEngine {
  private _params: StrategyParams;
  private observers: ObserverSpec[] = [];
  private analyzers: AnalyzerSpec[] = [];
  private hooks: TickHook[] = [];
  private feed: OhlcvRow[] = [];
  private ran = false;
  private stopRequested = false;

  constructor(private readonly options: SimEngineOptions) {
    this._params = structuredClone(options.params);
  }

  get params(): Readonly<StrategyParams> {
    return this._params;
  }

  clone(): SimEngine {
    const copy = new SimEngine({ ...this.options, params: this._params });
    copy.observers = [...this.observers];
    copy.analyzers = [...this.analyzers];
    return copy;
  }

  observerNames(): string[] {
    return this.observers.map((o) => o.name);
  }

  hasObserver(name: string): boolean {
    return this.observers.some((o) => o.name === name);
  }

  addObserver(spec: ObserverSpec): boolean {
    if (this.hasObserver(spec.name)) return false;
    this.observers.push(spec);
    return true;
  }

  analyzerNames(): string[] {
    return this.analyzers.map((a) => a.name);
  }

  addAnalyzer(spec: AnalyzerSpec): void {
    if (this.analyzers.some((a) => a.name === spec.name)) throw new Error(`analyzer <${spec.name}> already attached`);
    this.analyzers.push(spec);
  }

  addHook(hook: TickHook): void {
    this.hooks.push(hook);
  }

  setStrategyParams(patch: Partial<StrategyParams>): void {
    this._params = { ...this._params, ...structuredClone(patch) };
  }

  addData(feed: OhlcvRow[]): void {
    this.feed = this.feed.concat(feed);
  }

  runstop(): void {
    this.stopRequested = true;
  }

  async run(): Promise<EngineRun> {
    if (this.ran) throw new Error("engine already ran; clone the template for a new run");
    if (this.feed.length === 0) throw new Error("no data feed added");
    this.ran = true;

    const bars = this.feed;
    const broker = new SimBroker({ startCash: this.options.startCash, commission: this.options.commission });
    const strategy = (this.options.strategy ?? DefaultStrategy.factory)({ params: this._params, broker, bars });
    const observers = this.observers.map((s): [string, Observer] => [s.name, s.create()]);
    const analyzers = this.analyzers.map((s): [string, Analyzer] => [s.name, s.create()]);
    const runstop = () => this.runstop();

    let length = 0;
    for (let i = 0; i < bars.length && !this.stopRequested; i++) {
      broker.mark(bars[i]);
      strategy.next(i);
      const ctx = this.context(i, bars[i], broker, strategy);
      for (const [, o] of observers) o.next(ctx);
      for (const [, a] of analyzers) a.next(ctx);
      for (const hook of this.hooks) await hook.onTick({ iteration: i, strategy, runstop });
      length = i + 1;
    }

    const final = this.context(length - 1, bars[Math.max(0, length - 1)], broker, strategy);
    for (const [, a] of analyzers) a.stop?.(final);
    return {
      length,
      stopped: this.stopRequested,
      stopReason: strategy.doneReason,
      finalValue: broker.value,
      analyses: Object.fromEntries(analyzers.map(([name, a]) => [name, a.getAnalysis()])),
      lines: Object.fromEntries(observers.map(([name, o]) => [name, o.lines()]))
    };
  }

  private context(iteration: number, bar: OhlcvRow, broker: IBroker, strategy: IStrategy): ObserverContext {
    return {
      iteration,
      bar,
      startValue: broker.startCash,
      value: broker.value,
      cash: broker.cash,
      position: broker.position,
      reward: strategy.lastReward,
      closedTrades: broker.closedTrades()
    };
  }
}
