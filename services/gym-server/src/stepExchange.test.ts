import { describe, it, expect } from 'vitest';
import pino from 'pino';
import { MemoryChannel, ProtocolError } from '@tradegym/core';
import { BaseStrategy, type RawState, type TickContext } from '@tradegym/interfaces';
import type { StepInfo } from '@tradegym/schemas';
import { SummaryRenderer } from '@tradegym/sim-engine';
import { DONE_ACK, RENDER_HINT, StepExchange, type InfoMode } from './stepExchange';

const log = pino({ level: 'silent' });

class ScriptedStrategy extends BaseStrategy {
  closed = false;

  constructor(private readonly doneAt = Infinity) {
    super('scripted', { state_window: 1, drawdown_call: 10, target_call: 10, order_size: 1 });
  }

  protected onBar(): void {}
  getDone(): boolean { return this.iteration >= this.doneAt; }
  getInfo(): StepInfo { return { step: this.iteration }; }
  getRawState(): RawState { return [[this.iteration]]; }
  getState(): unknown { return { t: this.iteration }; }
  getReward(): number { return this.iteration / 10; }
  close(): void { this.closed = true; }
}

function setup(options: { skipFrame?: number; infoMode?: InfoMode; doneAt?: number } = {}) {
  const [req, rep] = MemoryChannel.createPair();
  const strategy = new ScriptedStrategy(options.doneAt);
  const hook = new StepExchange({
    channel: rep,
    log,
    renderer: new SummaryRenderer(),
    skipFrame: options.skipFrame ?? 1,
    infoMode: options.infoMode ?? 'last',
    lastResult: () => ({})
  });
  let stops = 0;
  const tick = (iteration: number) => {
    strategy.next(iteration);
    const ctx: TickContext = { iteration, strategy, runstop: () => { stops += 1; } };
    return hook.onTick(ctx);
  };
  const run = async (ticks: number) => {
    for (let i = 0; i < ticks && !hook.isFinished; i++) await tick(i);
  };
  const call = async (message: unknown) => {
    await req.send(message);
    return req.receive();
  };
  return { req, rep, strategy, hook, run, call, stops: () => stops };
}

describe('StepExchange', () => {
  it('talks on every skip-frame tick and batches info in between', async () => {
    const { strategy, run, call } = setup({ skipFrame: 3, infoMode: 'all' });
    const ticking = run(6);
    expect(await call({ action: 'buy' })).toEqual([{ t: 0 }, 0, false, [{ step: 0 }]]);
    expect(await call({ action: 'sell' })).toEqual([{ t: 3 }, 0.3, false, [{ step: 1 }, { step: 2 }, { step: 3 }]]);
    await ticking;
    expect(strategy.lastAction).toBe('sell');
    expect(strategy.action).toBe('hold');
  });

  it('sends only the latest info record in last mode', async () => {
    const { run, call } = setup({ skipFrame: 2 });
    const ticking = run(3);
    await call({ action: 'hold' });
    expect(await call({ action: 'hold' })).toEqual([{ t: 2 }, 0.2, false, [{ step: 2 }]]);
    await ticking;
  });

  it('answers render and getstat without consuming the turn', async () => {
    const { run, call, strategy } = setup();
    const ticking = run(2);
    await call({ action: 'hold' });
    const render = await call({ ctrl: 'render', mode: 'human' });
    expect(render).toMatchObject({ human: { title: 'price window [open high low close]', lines: ['0', 'reward: 0 done: false', 'step: 0'] } });
    expect(await call({ ctrl: 'render' })).toBe(RENDER_HINT);
    expect(await call({ ctrl: 'getstat' })).toEqual({});
    expect(await call({ action: 'buy' })).toEqual([{ t: 1 }, 0.1, false, [{ step: 1 }]]);
    await ticking;
    expect(strategy.lastAction).toBe('buy');
  });

  it('ends the episode on done', async () => {
    const { run, call, strategy, hook, stops } = setup();
    const ticking = run(5);
    await call({ action: 'hold' });
    expect(await call({ ctrl: 'done' })).toBe(DONE_ACK);
    await ticking;
    expect(hook.isFinished).toBe(true);
    expect(stops()).toBe(1);
    expect(strategy.closed).toBe(true);
    expect(strategy.doneReason).toBe('done_signal');
  });

  it('always talks on the terminal tick', async () => {
    const { run, call, stops } = setup({ skipFrame: 5, doneAt: 2 });
    const ticking = run(10);
    await call({ action: 'hold' });
    expect(await call({ action: 'hold' })).toEqual([{ t: 2 }, 0.2, true, [{ step: 2 }]]);
    await ticking;
    expect(stops()).toBe(1);
  });

  it('replies with a diagnostic and fails on a missing action', async () => {
    const { run, call } = setup();
    const ticking = run(1);
    expect(await call({ foo: 1 })).toMatchObject({ error: 'missing_action' });
    await expect(ticking).rejects.toBeInstanceOf(ProtocolError);
  });

  it('reports schema issues instead of a missing action', async () => {
    const { run, call } = setup();
    const ticking = run(1);
    expect(await call({ action: 5 })).toEqual({ error: 'malformed_message', message: 'malformed message: action: Expected string, received number' });
    await expect(ticking).rejects.toMatchObject({ name: 'ProtocolError', code: 'malformed_message' });
  });

  it('names the bad field of a malformed render request', async () => {
    const { run, call } = setup();
    const ticking = run(1);
    const reply = await call({ ctrl: 'render', mode: '' });
    expect(reply).toMatchObject({ error: 'malformed_message', message: expect.stringMatching(/^malformed message: mode: /) });
    await expect(ticking).rejects.toMatchObject({ code: 'malformed_message' });
  });

  it('rejects other controls within an episode', async () => {
    const { run, call } = setup();
    const ticking = run(1);
    expect(await call({ ctrl: 'reset' })).toMatchObject({ error: 'unknown_control' });
    await expect(ticking).rejects.toMatchObject({ code: 'unknown_control' });
  });

  it('validates the skip frame', () => {
    const [, rep] = MemoryChannel.createPair();
    expect(() => new StepExchange({ channel: rep, log, renderer: new SummaryRenderer(), skipFrame: 0, infoMode: 'last', lastResult: () => ({}) })).toThrow(RangeError);
  });
});
