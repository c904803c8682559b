import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import http from 'http';
import type { AddressInfo } from 'net';
import { mkdirSync, rmSync, existsSync } from 'fs';
import { join } from 'path';
import os from 'os';
import { ProxyServer } from '../../src/proxy/server.js';
import { defaultConfig, type ProxyConfig } from '../../src/config/proxy-config.js';
import { EventLog } from '../../src/logging/event-log.js';
import { FilterLogger } from '../../src/logging/filter-logger.js';
import { MINIMAL_ENV_STUB } from '../../src/filter/section-extractor.js';

interface ReceivedRequest {
  method: string;
  url: string;
  headers: http.IncomingHttpHeaders;
  body: string;
}

// In-process stand-in for the Ollama HTTP API
function startFakeOllama(received: ReceivedRequest[]): Promise<http.Server> {
  const server = http.createServer((req, res) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => {
      received.push({
        method: req.method ?? '',
        url: req.url ?? '',
        headers: req.headers,
        body: Buffer.concat(chunks).toString('utf8'),
      });

      if (req.url === '/api/tags') {
        res.writeHead(200, { 'Content-Type': 'application/json' });
        res.end(JSON.stringify({ models: [{ name: 'llama3.2:1b' }] }));
      } else if (req.url === '/v1/chat/completions') {
        res.writeHead(200, { 'Content-Type': 'application/json' });
        res.end(JSON.stringify({ id: 'cmpl-1', choices: [{ message: { role: 'assistant', content: 'ok' } }] }));
      } else if (req.url === '/stream') {
        res.writeHead(200, { 'Content-Type': 'text/event-stream' });
        res.write('data: 1\n\n');
        res.write('data: 2\n\n');
        res.end('data: [DONE]\n\n');
      } else {
        res.writeHead(404, { 'Content-Type': 'application/json' });
        res.end(JSON.stringify({ error: 'model not found' }));
      }
    });
  });

  return new Promise((resolve) => {
    server.listen(0, '127.0.0.1', () => resolve(server));
  });
}

function portOf(server: http.Server): number {
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('server is not listening on a TCP port');
  }
  return address.port;
}

function closeServer(server: http.Server): Promise<void> {
  return new Promise((resolve) => {
    server.close(() => resolve());
    server.closeAllConnections();
  });
}

function makeConfig(upstreamUrl: string, logsPath: string): ProxyConfig {
  const base = defaultConfig();
  return {
    ...base,
    upstream: { ...base.upstream, url: upstreamUrl, timeoutMs: 5000 },
    proxy: { ...base.proxy, host: '127.0.0.1', port: 0 },
    logging: { ...base.logging, console: false, logsPath },
  };
}

describe('ProxyServer', () => {
  let tempDir: string;
  let received: ReceivedRequest[];
  let upstream: http.Server;
  let proxy: ProxyServer;
  let eventLog: EventLog;
  let baseUrl: string;

  async function startProxy(upstreamUrl: string): Promise<void> {
    const config = makeConfig(upstreamUrl, tempDir);
    eventLog = new EventLog(tempDir);
    proxy = new ProxyServer({ config, logger: new FilterLogger({ console: false, eventLog }) });
    const address: AddressInfo = await proxy.start();
    baseUrl = `http://127.0.0.1:${address.port}`;
  }

  beforeEach(async () => {
    tempDir = join(os.tmpdir(), `context-filter-proxy-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(tempDir, { recursive: true });
    received = [];
    upstream = await startFakeOllama(received);
    await startProxy(`http://127.0.0.1:${portOf(upstream)}`);
  });

  afterEach(async () => {
    await proxy.stop();
    await closeServer(upstream);
    if (tempDir && existsSync(tempDir)) {
      rmSync(tempDir, { recursive: true, force: true });
    }
  });

  it('filters system prompts for allow-listed models', async () => {
    const body = {
      model: 'llama3.2:1b',
      stream: false,
      messages: [
        { role: 'system', content: 'Be brief.\n<project>\nsrc/\n</project>' },
        { role: 'user', content: 'What is 2+2?' },
      ],
    };

    const response = await fetch(`${baseUrl}/v1/chat/completions`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      id: 'cmpl-1',
      choices: [{ message: { role: 'assistant', content: 'ok' } }],
    });

    expect(received).toHaveLength(1);
    const forwarded = JSON.parse(received[0].body);
    expect(forwarded.stream).toBe(false);
    expect(forwarded.messages[0].content).toBe(`Be brief.\n${MINIMAL_ENV_STUB}`);
    expect(forwarded.messages[1]).toEqual({ role: 'user', content: 'What is 2+2?' });
    expect(received[0].headers['content-length']).toBe(String(Buffer.byteLength(received[0].body)));

    const types = eventLog.readRecent().map(entry => entry.type);
    expect(types).toEqual([
      'filter_start',
      'original_prompt',
      'section_removed',
      'filtered_prompt',
      'filter_summary',
    ]);
  });

  it('forwards other models byte for byte', async () => {
    const raw = '{"model": "qwen2.5:7b",   "messages": [{"role": "system", "content": "<project>x</project>"}]}';

    const response = await fetch(`${baseUrl}/v1/chat/completions`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: raw,
    });

    expect(response.status).toBe(200);
    expect(received[0].body).toBe(raw);

    const entries = eventLog.readRecent();
    expect(entries).toHaveLength(1);
    expect(entries[0].type).toBe('passthrough');
    expect(entries[0].data).toEqual({ model: 'qwen2.5:7b', reason: 'not in allow-list' });
  });

  it('forwards bodies it cannot filter unmodified', async () => {
    await fetch(`${baseUrl}/v1/chat/completions`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: 'not json',
    });
    await fetch(`${baseUrl}/v1/chat/completions`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"messages": []}',
    });

    expect(received.map(request => request.body)).toEqual(['not json', '{"messages": []}']);
    expect(eventLog.readRecent().map(entry => entry.type)).toEqual(['proxy_warning', 'proxy_warning']);
  });

  it('relays other endpoints untouched', async () => {
    const response = await fetch(`${baseUrl}/api/tags?verbose=1`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ models: [{ name: 'llama3.2:1b' }] });
    expect(received[0].method).toBe('GET');
    expect(received[0].url).toBe('/api/tags?verbose=1');
  });

  it('relays upstream error statuses and bodies', async () => {
    const response = await fetch(`${baseUrl}/v1/models/missing`);

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: 'model not found' });
  });

  it('relays streamed responses in full', async () => {
    const response = await fetch(`${baseUrl}/stream`);

    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toBe('text/event-stream');
    expect(await response.text()).toBe('data: 1\n\ndata: 2\n\ndata: [DONE]\n\n');
  });

  it('answers CORS preflight requests itself', async () => {
    const response = await fetch(`${baseUrl}/v1/chat/completions`, { method: 'OPTIONS' });

    expect(response.status).toBe(200);
    expect(response.headers.get('access-control-allow-origin')).toBe('*');
    expect(response.headers.get('access-control-allow-methods')).toBe('GET,POST,OPTIONS');
    expect(received).toHaveLength(0);
  });

  it('reports health with the allow-list', async () => {
    const response = await fetch(`${baseUrl}/_filter/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      status: 'ok',
      upstream: { reachable: true, models: ['llama3.2:1b'] },
      filterModels: ['llama3.2:1b', 'llama3.2-1b', 'qwen2.5:1.5b', 'qwen2.5-1.5b'],
    });
  });

  it('returns 502 when Ollama is unreachable', async () => {
    const probe = await startFakeOllama([]);
    const deadPort = portOf(probe);
    await closeServer(probe);

    await proxy.stop();
    await startProxy(`http://127.0.0.1:${deadPort}`);

    const response = await fetch(`${baseUrl}/api/tags`);

    expect(response.status).toBe(502);
    expect(await response.json()).toMatchObject({
      error: expect.stringMatching(/^Failed to reach Ollama at http:\/\/127\.0\.0\.1:\d+/),
    });
  });
});
