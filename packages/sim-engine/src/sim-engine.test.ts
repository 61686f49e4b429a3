import { describe, it, expect } from "vitest";
import type { OhlcvRow } from "@tradegym/schemas";
import type { StrategyParams, TickHook } from "@tradegym/interfaces";
import { SimBroker } from "./brokers/SimBroker";
import { DefaultStrategy } from "./strategy/DefaultStrategy";
import { SimEngine } from "./SimEngine";
import { DrawdownObserver, NormPnLObserver, auxObservers } from "./observers";
import { DEFAULT_ANALYZERS } from "./analyzers";
import { SummaryRenderer } from "./render/SummaryRenderer";

function bars(closes: number[]): OhlcvRow[] {
  return closes.map((close, i) => ({
    ts: new Date(Date.UTC(2024, 0, 1, i)).toISOString(),
    open: close, high: close + 1, low: close - 1, close, volume: 1
  }));
}

const params: StrategyParams = { state_window: 3, drawdown_call: 50, target_call: 50, order_size: 1 };

describe("SimBroker", () => {
  it("fills at the close with commission and books the round trip", () => {
    const [a, b] = bars([100, 110]);
    const broker = new SimBroker({ startCash: 1000, commission: 0.01 });
    broker.mark(a);
    expect(broker.submit({ side: "buy", qty: 1 }).status).toBe("filled");
    expect(broker.cash).toBeCloseTo(899);
    expect(broker.value).toBeCloseTo(999);
    broker.mark(b);
    expect(broker.unrealizedPnl()).toBeCloseTo(10);
    broker.submit({ side: "sell", qty: 1 });
    expect(broker.cash).toBeCloseTo(1007.9);
    expect(broker.position).toBe(0);
    const [trade] = broker.closedTrades();
    expect(trade).toMatchObject({ side: "long", qty: 1, entryPrice: 100, exitPrice: 110 });
    expect(trade.pnl).toBeCloseTo(7.9);
  });

  it("rejects a buy it cannot pay for", () => {
    const broker = new SimBroker({ startCash: 50, commission: 0 });
    broker.mark(bars([100])[0]);
    const report = broker.submit({ side: "buy", qty: 1 });
    expect(report.status).toBe("rejected");
    expect(report.reason).toBe("insufficient cash");
    expect(broker.cash).toBe(50);
  });

  it("closes and reopens on a flip", () => {
    const [a, b, c] = bars([100, 90, 80]);
    const broker = new SimBroker({ startCash: 1000, commission: 0 });
    broker.mark(a);
    broker.submit({ side: "buy", qty: 1 });
    broker.mark(b);
    broker.submit({ side: "sell", qty: 2 });
    expect(broker.position).toBe(-1);
    expect(broker.avgPrice).toBe(90);
    broker.mark(c);
    broker.closePosition();
    expect(broker.closedTrades().map((t) => [t.side, t.pnl])).toEqual([["long", -10], ["short", 10]]);
    expect(broker.closePosition()).toBeNull();
  });

  it("needs a marked bar before orders", () => {
    expect(() => new SimBroker({ startCash: 1, commission: 0 }).submit({ side: "buy", qty: 1 })).toThrow(/mark/);
  });
});

describe("DefaultStrategy", () => {
  function setup(closes: number[], p: StrategyParams = params, startCash = 1000) {
    const data = bars(closes);
    const broker = new SimBroker({ startCash, commission: 0 });
    const strategy = new DefaultStrategy({ params: p, broker, bars: data });
    const tick = (i: number, action: string) => {
      strategy.action = action;
      broker.mark(data[i]);
      strategy.next(i);
    };
    return { broker, strategy, tick };
  }

  it("pads the raw window with the first bar", () => {
    const { strategy, tick } = setup([100, 101]);
    tick(0, "hold");
    expect(strategy.getRawState()).toEqual([[100, 101, 99, 100], [100, 101, 99, 100], [100, 101, 99, 100]]);
  });

  it("treats unknown actions as hold", () => {
    const { broker, strategy, tick } = setup([100, 101]);
    tick(0, "jump");
    expect(strategy.brokerMessage).toBe("unknown action <jump>, holding");
    expect(broker.position).toBe(0);
  });

  it("rewards the value change since the last call", () => {
    const { strategy, tick } = setup([100, 101, 102, 103]);
    tick(0, "hold");
    tick(1, "hold");
    tick(2, "buy");
    expect(strategy.brokerMessage).toBe("BUY 1 @ 102.0000");
    expect(strategy.getReward()).toBe(0);
    tick(3, "hold");
    expect(strategy.getReward()).toBeCloseTo(0.001);
    expect(strategy.getInfo()).toMatchObject({ step: 3, position: 1, broker_value: 1001 });
    expect(strategy.getState()).toEqual({
      prices: [101 / 103 - 1, 102 / 103 - 1, 0],
      position: 1,
      unrealized_pnl: 1
    });
  });

  it("is done past the drawdown limit", () => {
    const { strategy, tick } = setup([100, 100, 50, 50], { ...params, drawdown_call: 5, order_size: 10 });
    tick(0, "hold");
    tick(1, "buy");
    expect(strategy.getDone()).toBe(false);
    tick(2, "hold");
    expect(strategy.getDone()).toBe(true);
    expect(strategy.doneReason).toBe("drawdown_call");
  });

  it("is done on the last bar", () => {
    const { strategy, tick } = setup([100, 100]);
    tick(0, "hold");
    expect(strategy.getDone()).toBe(false);
    tick(1, "hold");
    expect(strategy.getDone()).toBe(true);
    expect(strategy.doneReason).toBe("data_exhausted");
  });
});

describe("SimEngine", () => {
  function engine() {
    const e = new SimEngine({ params, startCash: 1000, commission: 0 });
    for (const a of DEFAULT_ANALYZERS) e.addAnalyzer(a);
    e.addObserver(DrawdownObserver);
    return e;
  }

  it("runs every bar through the hook and collects analyses", async () => {
    const e = engine();
    const seen: number[] = [];
    const script: Record<number, string> = { 0: "buy", 2: "close" };
    const hook: TickHook = {
      name: "script",
      async onTick({ iteration, strategy }) {
        seen.push(iteration);
        strategy.getDone();
        strategy.action = script[iteration] ?? "hold";
      }
    };
    e.addHook(hook);
    e.addData(bars([100, 101, 102, 103, 104]));
    const run = await e.run();
    expect(seen).toEqual([0, 1, 2, 3, 4]);
    expect(run.length).toBe(5);
    expect(run.stopped).toBe(false);
    expect(run.stopReason).toBe("data_exhausted");
    expect(run.finalValue).toBeCloseTo(1002);
    expect(run.analyses.trades).toEqual({ total: 1, won: 1, lost: 0, pnl_net: 2, best: 2, worst: 2 });
    expect(run.analyses.drawdown).toEqual({ max_drawdown: 0, max_moneydown: 0, max_len: 0 });
    expect(run.analyses.returns).toMatchObject({ total_return: expect.closeTo(0.002, 10) });
    expect(run.lines.drawdown.drawdown).toHaveLength(5);
  });

  it("halts after the tick that calls runstop", async () => {
    const e = engine();
    e.addHook({ name: "stopper", async onTick(ctx) { if (ctx.iteration === 1) ctx.runstop(); } });
    e.addData(bars([100, 101, 102]));
    const run = await e.run();
    expect(run.length).toBe(2);
    expect(run.stopped).toBe(true);
  });

  it("runs once per instance", async () => {
    const e = engine();
    e.addData(bars([100]));
    await e.run();
    await expect(e.run()).rejects.toThrow(/already ran/);
  });

  it("refuses to run without data", async () => {
    await expect(engine().run()).rejects.toThrow(/no data/);
  });

  it("clones are independent of the template", () => {
    const template = engine();
    const copy = template.clone();
    copy.setStrategyParams({ state_window: 7 });
    copy.addObserver(NormPnLObserver);
    expect(template.params.state_window).toBe(3);
    expect(copy.params.state_window).toBe(7);
    expect(template.observerNames()).toEqual(["drawdown"]);
    expect(copy.observerNames()).toEqual(["drawdown", "norm_pnl"]);
    expect(copy.analyzerNames()).toEqual(["trades", "returns", "drawdown"]);
  });

  it("attaches observers once by name", () => {
    const e = engine();
    expect(e.addObserver(DrawdownObserver)).toBe(false);
    for (const spec of auxObservers(true)) e.addObserver(spec);
    expect(e.observerNames()).toEqual(["drawdown", "norm_pnl", "position", "reward"]);
    expect(auxObservers(false).map((s) => s.name)).toEqual(["drawdown"]);
  });

  it("rejects duplicate analyzers", () => {
    expect(() => engine().addAnalyzer(DEFAULT_ANALYZERS[0])).toThrow(/already attached/);
  });
});

describe("SummaryRenderer", () => {
  const step = { raw: [[1, 2, 0.5, 1.5]], state: { prices: [0] }, reward: 0, done: false, info: [{ step: 3 }] };

  it("renders the price window for humans", () => {
    const r = new SummaryRenderer();
    expect(r.render("human", step).human).toEqual({
      mode: "human",
      title: "price window [open high low close]",
      lines: ["1 2 0.5000 1.5000", "reward: 0 done: false", "step: 3"]
    });
  });

  it("answers several modes at once and keeps the last render", () => {
    const r = new SummaryRenderer();
    r.render("agent", step);
    const reply = r.render(["agent", "human"]);
    expect(reply.agent.lines).toEqual(['{"prices":[0]}', "reward: 0"]);
    expect(reply.human.title).toBe("nothing to render for <human> yet");
  });

  it("reports unsupported and disabled modes", () => {
    expect(new SummaryRenderer().render("plot").plot.title).toBe("unsupported mode <plot>");
    expect(new SummaryRenderer({ enabled: false }).render("human", step).human).toEqual({ mode: "human", title: "rendering disabled", lines: [] });
  });

  it("summarises a captured episode", () => {
    const r = new SummaryRenderer();
    r.captureEpisode({ length: 5, stopped: true, stopReason: "done", finalValue: 1002, analyses: { trades: { total: 1 } }, lines: { position: { position: [0, 1] } } });
    expect(r.render("episode").episode).toEqual({
      mode: "episode",
      title: "episode of 5 bars",
      lines: ["final_value: 1002", "stop_reason: done", 'trades: {"total":1}', "position.position: last=1"]
    });
    r.initialize();
    expect(r.render("episode").episode.title).toBe("nothing to render for <episode> yet");
  });
});
