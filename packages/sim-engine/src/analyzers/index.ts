import type { Analyzer, AnalyzerSpec, ClosedTrade, ObserverContext } from "@tradegym/interfaces";
import { DrawdownTracker } from "../drawdown";

export type TradeAnalysis = { total: number; won: number; lost: number; pnl_net: number; best: number; worst: number };
export type ReturnsAnalysis = { total_return: number; avg_return: number; bars: number };
export type DrawdownAnalysis = { max_drawdown: number; max_moneydown: number; max_len: number };

function summarizeTrades(trades: readonly ClosedTrade[]): TradeAnalysis {
  const pnls = trades.map((t) => t.pnl);
  return {
    total: trades.length,
    won: pnls.filter((p) => p > 0).length,
    lost: pnls.filter((p) => p <= 0).length,
    pnl_net: pnls.reduce((a, p) => a + p, 0),
    best: pnls.length ? Math.max(...pnls) : 0,
    worst: pnls.length ? Math.min(...pnls) : 0
  };
}

export const TradeAnalyzer: AnalyzerSpec = {
  name: "trades",
  create(): Analyzer {
    let trades: readonly ClosedTrade[] = [];
    return {
      next: (ctx) => { trades = ctx.closedTrades; },
      stop: (ctx) => { trades = ctx.closedTrades; },
      getAnalysis: () => summarizeTrades(trades)
    };
  }
};

export const ReturnsAnalyzer: AnalyzerSpec = {
  name: "returns",
  create(): Analyzer {
    let start = 0;
    let last = 0;
    let prev: number | null = null;
    const rets: number[] = [];
    const track = (ctx: ObserverContext) => {
      start = ctx.startValue;
      last = ctx.value;
    };
    return {
      next(ctx) {
        track(ctx);
        if (prev !== null && prev !== 0) rets.push(ctx.value / prev - 1);
        prev = ctx.value;
      },
      stop: track,
      getAnalysis: (): ReturnsAnalysis => ({
        total_return: start === 0 ? 0 : last / start - 1,
        avg_return: rets.length ? rets.reduce((a, r) => a + r, 0) / rets.length : 0,
        bars: rets.length + (prev === null ? 0 : 1)
      })
    };
  }
};

export const DrawdownAnalyzer: AnalyzerSpec = {
  name: "drawdown",
  create(): Analyzer {
    const dd = new DrawdownTracker();
    return {
      next: (ctx) => dd.update(ctx.value),
      getAnalysis: (): DrawdownAnalysis => ({ max_drawdown: dd.maxDrawdown, max_moneydown: dd.maxMoneydown, max_len: dd.maxLen })
    };
  }
};

export const DEFAULT_ANALYZERS: readonly AnalyzerSpec[] = [TradeAnalyzer, ReturnsAnalyzer, DrawdownAnalyzer];
