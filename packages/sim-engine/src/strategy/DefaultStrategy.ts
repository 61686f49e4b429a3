import { BaseStrategy, type IStrategy, type RawState, type StrategyParams } from "@tradegym/interfaces";
import type { OhlcvRow, StepInfo } from "@tradegym/schemas";
import type { ExecReport, IBroker } from "../brokers/IBroker";
import { DrawdownTracker } from "../drawdown";

export interface StrategyEnv {
  params: StrategyParams;
  broker: IBroker;
  bars: readonly OhlcvRow[];
}

export type StrategyFactory = (env: StrategyEnv) => IStrategy;

export type StrategyState = {
  /** Close window relative to the current close. */
  prices: number[];
  position: number;
  unrealized_pnl: number;
};

export const ACTIONS = ["buy", "sell", "close", "hold"] as const;
export type Action = typeof ACTIONS[number];

function isAction(token: string): token is Action {
  return (ACTIONS as readonly string[]).includes(token);
}

function describeReport(report: ExecReport): string {
  if (report.status === "rejected") return `${report.side.toUpperCase()} rejected: ${report.reason ?? "unknown"}`;
  const qty = report.fills.reduce((a, f) => a + f.qty, 0);
  return `${report.side.toUpperCase()} ${qty} @ ${report.avgPrice.toFixed(4)}`;
}

/**
 * Market-order strategy driven by the agent's last action token. Orders placed on bar N
 * fill at bar N's close.
 */
export class DefaultStrategy extends BaseStrategy {
  private readonly broker: IBroker;
  private readonly bars: readonly OhlcvRow[];
  private readonly drawdown = new DrawdownTracker();
  private rewardBase: number;

  constructor(env: StrategyEnv, id = "default") {
    super(id, env.params);
    this.broker = env.broker;
    this.bars = env.bars;
    this.rewardBase = env.broker.startCash;
  }

  static factory: StrategyFactory = (env) => new DefaultStrategy(env);

  protected onBar(): void {
    const action = this.action;
    if (!isAction(action)) {
      this.brokerMessage = `unknown action <${action}>, holding`;
    } else if (action === "buy" || action === "sell") {
      this.brokerMessage = describeReport(this.broker.submit({ side: action, qty: this.params.order_size }));
    } else if (action === "close") {
      const report = this.broker.closePosition();
      this.brokerMessage = report ? describeReport(report) : "nothing to close";
    }
    this.drawdown.update(this.broker.value);
  }

  private bar(): OhlcvRow {
    return this.bars[Math.min(this.iteration, this.bars.length - 1)];
  }

  getDone(): boolean {
    const gain = (100 * (this.broker.value - this.broker.startCash)) / this.broker.startCash;
    if (this.iteration >= this.bars.length - 1) this.doneReason = "data_exhausted";
    else if (this.drawdown.drawdown > this.params.drawdown_call) this.doneReason = "drawdown_call";
    else if (gain > this.params.target_call) this.doneReason = "target_call";
    else return false;
    return true;
  }

  getInfo(): StepInfo {
    return {
      step: this.iteration,
      time: this.bar().ts,
      action: this.lastAction,
      broker_message: this.brokerMessage,
      broker_cash: this.broker.cash,
      broker_value: this.broker.value,
      position: this.broker.position,
      drawdown: this.drawdown.drawdown,
      max_drawdown: this.drawdown.maxDrawdown
    };
  }

  getRawState(): RawState {
    const window = this.params.state_window;
    const end = Math.min(this.iteration, this.bars.length - 1) + 1;
    const rows = this.bars.slice(Math.max(0, end - window), end).map((b) => [b.open, b.high, b.low, b.close]);
    while (rows.length < window) rows.unshift([...rows[0]]);
    return rows;
  }

  getState(): StrategyState {
    const raw = this.getRawState();
    const last = raw[raw.length - 1][3];
    return {
      prices: raw.map((r) => (last === 0 ? 0 : r[3] / last - 1)),
      position: this.broker.position,
      unrealized_pnl: this.broker.unrealizedPnl()
    };
  }

  getReward(): number {
    const value = this.broker.value;
    this.lastReward = (value - this.rewardBase) / this.broker.startCash;
    this.rewardBase = value;
    return this.lastReward;
  }

  close(): void {
    const report = this.broker.closePosition();
    if (report) this.brokerMessage = describeReport(report);
  }
}
