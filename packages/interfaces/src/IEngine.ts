import type { OhlcvRow } from "@tradegym/schemas";
import type { IStrategy, StrategyParams } from "./IStrategy";

export interface TickContext {
  readonly iteration: number;
  readonly strategy: IStrategy;
  /** Halt the run once the current tick finishes. */
  runstop(): void;
}

/** Called by the engine once per tick, after observers and analyzers. */
export interface TickHook {
  readonly name: string;
  onTick(ctx: TickContext): Promise<void>;
}

export interface ClosedTrade {
  side: "long" | "short";
  qty: number;
  entryPrice: number;
  exitPrice: number;
  pnl: number;
  openedAt: string;
  closedAt: string;
}

export interface ObserverContext {
  iteration: number;
  bar: OhlcvRow;
  startValue: number;
  value: number;
  cash: number;
  position: number;
  reward: number;
  closedTrades: readonly ClosedTrade[];
}

export interface Observer {
  next(ctx: ObserverContext): void;
  lines(): Record<string, number[]>;
}

export interface ObserverSpec {
  readonly name: string;
  create(): Observer;
}

export interface Analyzer {
  next(ctx: ObserverContext): void;
  /** Called once after the last tick with the final portfolio state. */
  stop?(ctx: ObserverContext): void;
  getAnalysis(): unknown;
}

export interface AnalyzerSpec {
  readonly name: string;
  create(): Analyzer;
}

export interface EngineRun {
  length: number;
  stopped: boolean;
  stopReason: string;
  finalValue: number;
  analyses: Record<string, unknown>;
  lines: Record<string, Record<string, number[]>>;
}

export interface ISimEngine {
  /** Independent copy: parameter and attachment changes never reach the original. */
  clone(): ISimEngine;
  observerNames(): string[];
  hasObserver(name: string): boolean;
  /** No-op returning false when an observer of that name is already attached. */
  addObserver(spec: ObserverSpec): boolean;
  analyzerNames(): string[];
  addAnalyzer(spec: AnalyzerSpec): void;
  addHook(hook: TickHook): void;
  readonly params: Readonly<StrategyParams>;
  setStrategyParams(patch: Partial<StrategyParams>): void;
  addData(feed: OhlcvRow[]): void;
  run(): Promise<EngineRun>;
  runstop(): void;
}
