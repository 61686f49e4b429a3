import { describe, it, expect, vi } from 'vitest';
import pino from 'pino';
import { MemoryChannel, exchange } from '@tradegym/core';
import { OhlcvDataset, generateOhlcv } from '@tradegym/datafeed';
import { EnvError, TradingEnv } from '@tradegym/env-client';
import { DataServer } from '@tradegym/data-server';
import { buildGymServer } from './app';
import { GymServerConfig } from './config';
import { CONTROL_HINT, FAREWELL } from './GymServer';

const log = pino({ level: 'silent' });

function harness(env: Record<string, string> = {}, data: { readyAt?: number; now?: () => number } = {}) {
  const config = GymServerConfig.parse({ LOG_LEVEL: 'silent', STATE_WINDOW: '2', ...env });
  const [dataReq, dataRep] = MemoryChannel.createPair({ names: ['data-req', 'data-rep'] });
  const [ctlReq, ctlRep] = MemoryChannel.createPair({ names: ['controller-req', 'controller-rep'] });
  // Flat prices: no drawdown or target stop, so episodes run to their last bar.
  const rows = generateOhlcv({ start: '2024-01-01T00:00:00Z', bars: 60, interval: '1m', random: () => 0.5 });
  const dataset = new OhlcvDataset({ name: 'flat', rows, trialLength: 40, episodeLength: 5, trainFraction: 0.5, random: () => 0 });
  const dataServer = new DataServer({ channel: dataRep, dataset, log, ...data });
  const dispatch = vi.spyOn(dataServer, 'dispatch');
  const server = buildGymServer(config, log, { channel: ctlRep, dataChannel: dataReq }, { sleep: async () => undefined, random: () => 0.5 });
  const serverRun = server.run();
  const dataRun = dataServer.run();
  const dataRequests = () => dispatch.mock.calls.map(([m]) => m);
  return { server, serverRun, dataRun, ctlReq, env: new TradingEnv(ctlReq), dataRequests };
}

describe('GymServer control mode', () => {
  it('answers control requests in place and exits on stop', async () => {
    const { server, serverRun, dataRun, ctlReq, env } = harness();
    expect(await env.getStat()).toEqual({});
    expect(await env.render('human')).toEqual({ human: { mode: 'human', title: 'nothing to render for <human> yet', lines: [] } });
    expect(await exchange(ctlReq, { ctrl: 'bogus' })).toMatchObject({ status: 'ok', message: CONTROL_HINT });
    expect(await exchange(ctlReq, { ctrl: 'render' })).toMatchObject({ message: CONTROL_HINT });
    const noCtrl = await exchange(ctlReq, { action: 'buy' });
    expect(noCtrl.status === 'ok' && noCtrl.message).toBe('No <ctrl> key received: {"action":"buy"}\nHint: forgot to call reset()?');
    expect(await exchange(ctlReq, { ctrl: 'render', mode: 7 })).toMatchObject({ message: { error: 'malformed_message' } });
    expect(server.state).toBe('control');

    expect(await exchange(ctlReq, { ctrl: 'stop' })).toMatchObject({ message: FAREWELL });
    await serverRun;
    await dataRun;
    expect(server.state).toBe('terminated');
  });

  it('keeps control mode on invalid reset kwargs', async () => {
    const { server, ctlReq, env, serverRun } = harness();
    const reply = await exchange(ctlReq, { ctrl: 'reset', kwargs: { trial_config: { sample_type: 9 } } });
    expect(reply).toMatchObject({ message: { error: 'invalid_kwargs' } });
    expect(server.state).toBe('control');
    await env.close();
    await serverRun;
  });
});

describe('GymServer episodes', () => {
  it('runs an episode to its last bar and reports it', async () => {
    const { server, serverRun, env, dataRequests } = harness();
    let step = await env.reset();
    expect(server.state).toBe('episode');
    expect(step.info).toEqual([expect.objectContaining({ step: 0, action: 'hold' })]);
    let steps = 0;
    while (!step.done) {
      step = await env.step('hold');
      steps += 1;
    }
    expect(steps).toBe(4);
    const stat = await env.getStat();
    expect(stat).toMatchObject({ episode: 0, length: 5, done: true, stop_reason: 'data_exhausted' });
    expect(Object.keys('analyzers' in stat ? stat.analyzers : {})).toEqual(['trades', 'returns', 'drawdown']);
    expect(server.episodes).toBe(1);
    expect(server.state).toBe('control');

    await env.reset({ trial_config: { get_new: false } });
    await env.done();
    expect(await env.getStat()).toMatchObject({ episode: 1, length: 2, stop_reason: 'done_signal' });
    expect(dataRequests().filter((m) => typeof m === 'object' && m !== null && 'ctrl' in m && m.ctrl === 'get_data')).toHaveLength(1);

    await env.close();
    await serverRun;
  });

  it('fetches a trial on reuse when none is cached', async () => {
    const { serverRun, env, dataRequests } = harness();
    await env.reset({ trial_config: { get_new: false } });
    expect(dataRequests().map((m) => (typeof m === 'object' && m !== null && 'ctrl' in m ? m.ctrl : null))).toEqual(['ping', 'get_data']);
    await env.close();
    await serverRun;
  });

  it('serves render and getstat between steps without advancing', async () => {
    const { serverRun, env } = harness();
    await env.reset();
    const render = await env.render(['human', 'agent']);
    expect(Object.keys(render)).toEqual(['human', 'agent']);
    expect(await env.getStat()).toEqual({});
    const step = await env.step('hold');
    expect(step.info[0]).toMatchObject({ step: 1 });
    await env.close();
    await serverRun;
  });

  it('sends a communicated tuple once per skip-frame stride', async () => {
    const { serverRun, env } = harness({ SKIP_FRAME: '2', INFO_MODE: 'all' });
    const first = await env.reset();
    expect(first.info.map((i) => i.step)).toEqual([0]);
    const second = await env.step('hold');
    expect(second.info.map((i) => i.step)).toEqual([1, 2]);
    await env.close();
    await serverRun;
  });

  it('returns to control mode when the provider cannot sample the requested trial', async () => {
    const { server, serverRun, env, dataRequests } = harness();
    const err = await env.reset({ trial_config: { timestamp: Date.parse('2030-01-01T00:00:00Z') } }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(EnvError);
    expect(err).toHaveProperty('message', 'provider_rejected: data provider rejected the request: sampling_failed: no row at or after 2030-01-01T00:00:00.000Z in the sampling region');
    expect(env.episodeRunning).toBe(false);
    expect(await env.getStat()).toEqual({});
    expect(server.state).toBe('control');

    const step = await env.reset();
    expect(step.done).toBe(false);
    await env.done();
    expect(server.episodes).toBe(1);
    expect(dataRequests()).toHaveLength(3);
    await env.close();
    await serverRun;
  });

  it('returns to control mode when no episode fits the cached trial', async () => {
    const { server, serverRun, env, dataRequests } = harness();
    const err = await env.reset({ episode_config: { timestamp: Date.parse('2024-01-01T00:30:00Z') } }).catch((e: unknown) => e);
    expect(err).toHaveProperty('message', 'sampling_failed: episode sampling failed: no row at or after 2024-01-01T00:30:00.000Z in the sampling region');
    expect(await env.getStat()).toEqual({});

    await env.reset({ trial_config: { get_new: false }, episode_config: { sample_type: 1 } });
    await env.done();
    expect(await env.getStat()).toMatchObject({ episode: 0, length: 2, stop_reason: 'done_signal' });
    expect(server.episodes).toBe(1);
    expect(dataRequests().filter((m) => typeof m === 'object' && m !== null && 'ctrl' in m && m.ctrl === 'get_data')).toHaveLength(1);
    await env.close();
    await serverRun;
  });

  it('produces the same steps whether or not render and getstat are interleaved', async () => {
    const actions = ['buy', 'hold', 'sell', 'hold'];
    const play = async (interleave: boolean) => {
      const { serverRun, env } = harness();
      const steps = [await env.reset()];
      for (const action of actions) {
        if (interleave) {
          await env.render(['human', 'agent']);
          await env.getStat();
          await env.render('human');
        }
        steps.push(await env.step(action));
      }
      await env.close();
      await serverRun;
      return steps;
    };
    const plain = await play(false);
    const interleaved = await play(true);
    expect(plain).toHaveLength(5);
    expect(plain[4].done).toBe(true);
    expect(interleaved).toEqual(plain);
  });

  it('dies on a missing action', async () => {
    const { server, serverRun, dataRun, ctlReq, env } = harness();
    await env.reset();
    expect(await exchange(ctlReq, { foo: 1 })).toMatchObject({ message: { error: 'missing_action' } });
    await expect(serverRun).rejects.toMatchObject({ name: 'ProtocolError', code: 'missing_action' });
    await dataRun;
    expect(server.state).toBe('terminated');
  });

  it('dies when the dataset never becomes ready', async () => {
    const { serverRun, dataRun, env } = harness({ WAIT_FOR_DATA_MS: '3', BACKOFF_MAX_MS: '2' }, { readyAt: 1, now: () => 0 });
    await expect(env.reset()).rejects.toThrow(/^exchange failed with status <(send|receive)_failed_other>$/);
    await expect(serverRun).rejects.toMatchObject({ name: 'DataError', code: 'timeout' });
    await dataRun;
  });
});
