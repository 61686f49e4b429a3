#!/usr/bin/env node
import { z } from 'zod';
import { HttpRequestChannel, exchange } from '@tradegym/core';

const Args = z.tuple([
  z.string().optional(), // ctrl
  z.string().optional() // json fields merged into the message
]);

async function main() {
  const [, , ...rest] = process.argv;
  const [ctrl, json] = Args.parse(rest);
  if (!ctrl) {
    console.error('Usage: npm run cli -w @tradegym/gym-server -- <ctrl> [json-fields]');
    process.exit(2);
  }
  const fields: unknown = json ? JSON.parse(json) : {};
  const extra = z.record(z.unknown()).parse(fields);
  const channel = new HttpRequestChannel({ url: process.env.GYM_URL || 'http://127.0.0.1:5000/call' });
  const outcome = await exchange(channel, { ...extra, ctrl });
  await channel.close();
  if (outcome.status !== 'ok') {
    console.error('Error:', outcome.status, outcome.error.message);
    process.exit(1);
  }
  console.log(JSON.stringify(outcome.message, null, 2));
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
