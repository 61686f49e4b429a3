import http from 'http';
import type { AddressInfo } from 'net';
import type { Registry } from 'prom-client';
import type { Logger } from 'pino';
import { ChannelError, errorMessage } from '../errors';
import { BaseChannel, UNBOUNDED, abortError, type ChannelTimeouts } from './channel';
import { Mailbox } from './mailbox';

type Incoming = { message: unknown; res: http.ServerResponse };

export type HttpReplyOptions = {
  name?: string;
  port: number;
  host?: string;
  path?: string;
  timeouts?: Partial<ChannelTimeouts>;
  /** Served on GET /metrics when given. */
  registry?: Registry;
  log?: Logger;
};

function writeJson(res: http.ServerResponse, status: number, body: unknown) {
  res.writeHead(status, { 'content-type': 'application/json' });
  res.end(JSON.stringify(body));
}

/**
 * Reply end bound to an HTTP server. Every `POST <path>` is one request; its response is
 * held open until `send()` answers it. Concurrent requests from several clients queue FIFO.
 */
export class HttpReplyChannel extends BaseChannel {
  private readonly server: http.Server;
  private readonly inbox: Mailbox<Incoming>;
  private readonly options: HttpReplyOptions;
  private current: http.ServerResponse | null = null;

  constructor(options: HttpReplyOptions) {
    const name = options.name ?? `http-rep:${options.port}`;
    super(name, 'reply', { receiveTimeoutMs: UNBOUNDED, sendTimeoutMs: 60_000, ...options.timeouts });
    this.options = options;
    this.inbox = new Mailbox<Incoming>(name);
    this.server = http.createServer((req, res) => { void this.handle(req, res); });
  }

  listen(): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(this.options.port, this.options.host ?? '127.0.0.1', () => {
        this.server.off('error', reject);
        const address = this.server.address();
        if (address === null || typeof address === 'string') {
          reject(ChannelError.transport(this.name, 'server did not bind to a TCP address'));
          return;
        }
        this.options.log?.info({ port: address.port, host: address.address }, 'channel listening');
        resolve(address);
      });
    });
  }

  private async handle(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    try {
      if (req.method === 'GET' && req.url === '/health') { writeJson(res, 200, { status: 'ok' }); return; }
      if (req.method === 'GET' && req.url === '/metrics' && this.options.registry) {
        const metrics = await this.options.registry.metrics();
        res.writeHead(200, { 'content-type': this.options.registry.contentType });
        res.end(metrics);
        return;
      }
      if (req.method === 'POST' && req.url === (this.options.path ?? '/call')) {
        const chunks: Buffer[] = [];
        for await (const c of req) chunks.push(Buffer.isBuffer(c) ? c : Buffer.from(String(c)));
        let message: unknown;
        try {
          message = JSON.parse(Buffer.concat(chunks).toString('utf8'));
        } catch (err) {
          writeJson(res, 400, { error: 'invalid_json', message: errorMessage(err) });
          return;
        }
        if (this.closed) { writeJson(res, 503, { error: 'channel_closed' }); return; }
        this.inbox.push({ message, res });
        return;
      }
      writeJson(res, 404, { error: 'not_found' });
    } catch (err) {
      this.options.log?.error({ err }, 'unhandled error');
      if (!res.headersSent) writeJson(res, 500, { error: 'internal_error', message: errorMessage(err) });
    }
  }

  protected async collect(signal: AbortSignal): Promise<unknown> {
    const incoming = await this.inbox.take(signal);
    this.current = incoming.res;
    return incoming.message;
  }

  protected transmit(message: unknown, signal: AbortSignal): Promise<void> {
    const res = this.current;
    this.current = null;
    if (!res) return Promise.reject(ChannelError.transport(this.name, 'no request awaiting a reply'));
    if (res.destroyed) return Promise.reject(ChannelError.transport(this.name, 'requester disconnected before the reply'));
    const body = JSON.stringify(message ?? null);
    return new Promise<void>((resolve, reject) => {
      const onAbort = () => { res.destroy(); reject(abortError()); };
      signal.addEventListener('abort', onAbort, { once: true });
      res.once('error', (err) => {
        signal.removeEventListener('abort', onAbort);
        reject(ChannelError.transport(this.name, 'reply failed', err));
      });
      res.writeHead(200, { 'content-type': 'application/json' });
      res.end(body, () => {
        signal.removeEventListener('abort', onAbort);
        resolve();
      });
    });
  }

  protected async shutdown(): Promise<void> {
    this.inbox.close('channel closed');
    for (const pending of this.inbox.drain()) writeJson(pending.res, 503, { error: 'channel_closed' });
    if (this.current && !this.current.headersSent) writeJson(this.current, 503, { error: 'channel_closed' });
    this.current = null;
    if (!this.server.listening) return;
    await new Promise<void>((resolve, reject) => {
      this.server.close((err) => (err ? reject(err) : resolve()));
      this.server.closeIdleConnections();
    });
  }
}

export type HttpRequestOptions = {
  name?: string;
  url: string;
  timeouts?: Partial<ChannelTimeouts>;
  headers?: Record<string, string>;
};

type ReplyResult = { ok: true; value: unknown } | { ok: false; error: ChannelError };

/**
 * Request end talking to an {@link HttpReplyChannel}. `send()` completes once the request
 * body is flushed; `receive()` waits for the response body.
 */
export class HttpRequestChannel extends BaseChannel {
  private readonly agent = new http.Agent({ keepAlive: true, maxSockets: 1 });
  private readonly url: URL;
  private readonly headers: Record<string, string>;
  private inflight: { req: http.ClientRequest; reply: Promise<ReplyResult> } | null = null;

  constructor(options: HttpRequestOptions) {
    super(options.name ?? `http-req:${options.url}`, 'request', { receiveTimeoutMs: 60_000, sendTimeoutMs: 60_000, ...options.timeouts });
    this.url = new URL(options.url);
    this.headers = options.headers ?? {};
  }

  protected transmit(message: unknown, signal: AbortSignal): Promise<void> {
    const body = JSON.stringify(message ?? null);
    let settle: (result: ReplyResult) => void = () => undefined;
    const reply = new Promise<ReplyResult>((resolve) => { settle = resolve; });
    return new Promise<void>((resolve, reject) => {
      let flushed = false;
      const req = http.request(this.url, {
        method: 'POST',
        agent: this.agent,
        headers: { 'content-type': 'application/json', 'content-length': Buffer.byteLength(body), ...this.headers }
      });
      const onAbort = () => { req.destroy(abortError()); };
      signal.addEventListener('abort', onAbort, { once: true });
      this.inflight = { req, reply };
      req.on('response', (res) => {
        const chunks: Buffer[] = [];
        res.on('data', (c: Buffer) => chunks.push(c));
        res.on('error', (err) => settle({ ok: false, error: ChannelError.transport(this.name, 'reply stream failed', err) }));
        res.on('end', () => {
          const text = Buffer.concat(chunks).toString('utf8');
          const status = res.statusCode ?? 0;
          if (status < 200 || status >= 300) {
            settle({ ok: false, error: ChannelError.transport(this.name, `HTTP ${status}: ${text}`) });
            return;
          }
          try {
            settle({ ok: true, value: JSON.parse(text) });
          } catch (err) {
            settle({ ok: false, error: ChannelError.transport(this.name, 'reply is not JSON', err) });
          }
        });
      });
      req.on('error', (err) => {
        settle({ ok: false, error: ChannelError.transport(this.name, `request failed: ${err.message}`, err) });
        if (flushed) return;
        signal.removeEventListener('abort', onAbort);
        this.inflight = null;
        reject(signal.aborted ? abortError() : ChannelError.transport(this.name, `request failed: ${err.message}`, err));
      });
      req.end(body, () => {
        flushed = true;
        signal.removeEventListener('abort', onAbort);
        resolve();
      });
    });
  }

  protected collect(signal: AbortSignal): Promise<unknown> {
    const inflight = this.inflight;
    if (!inflight) return Promise.reject(ChannelError.transport(this.name, 'no request in flight'));
    return new Promise<unknown>((resolve, reject) => {
      const onAbort = () => {
        this.inflight = null;
        inflight.req.destroy();
        reject(abortError());
      };
      signal.addEventListener('abort', onAbort, { once: true });
      void inflight.reply.then((result) => {
        signal.removeEventListener('abort', onAbort);
        if (signal.aborted) return;
        this.inflight = null;
        if (result.ok) resolve(result.value);
        else reject(result.error);
      });
    });
  }

  protected async shutdown(): Promise<void> {
    this.inflight?.req.destroy();
    this.inflight = null;
    this.agent.destroy();
  }
}
