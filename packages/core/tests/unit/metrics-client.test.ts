/**
 * Tests for the axios metrics client against an in-process HTTP server
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { createServer, type Server } from 'node:http';
import {
  AxiosMetricsClient,
  MetricsTransportError,
  metricsUrl,
} from '../../src/adapters/metrics-client.js';

describe('AxiosMetricsClient', () => {
  let server: Server;
  let port: number;
  const requests: string[] = [];
  let nextStatus = 200;

  beforeAll(async () => {
    server = createServer((req, res) => {
      requests.push(`${req.method} ${req.url}`);
      if (nextStatus !== 200) {
        res.writeHead(nextStatus).end('unavailable');
        return;
      }
      res.writeHead(200, { 'content-type': 'application/json' });
      res.end('{"metrics":{"backend.backend_state":{"value":1}}}');
    });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    port = typeof address === 'object' && address !== null ? address.port : 0;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  it('builds the metrics URL', () => {
    expect(metricsUrl('10.0.0.5', 8002)).toBe('http://10.0.0.5:8002/metrics');
  });

  it('returns the raw body without parsing it', async () => {
    const client = new AxiosMetricsClient({ timeoutMs: 2000 });

    const response = await client.fetchMetrics('127.0.0.1', port);

    expect(response).toEqual({
      status: 200,
      body: '{"metrics":{"backend.backend_state":{"value":1}}}',
    });
    expect(requests).toContain('GET /metrics');
  });

  it('returns error statuses instead of throwing', async () => {
    const client = new AxiosMetricsClient({ timeoutMs: 2000 });
    nextStatus = 503;

    try {
      expect(await client.fetchMetrics('127.0.0.1', port)).toEqual({ status: 503, body: 'unavailable' });
    } finally {
      nextStatus = 200;
    }
  });

  it('wraps a refused connection as a transport error', async () => {
    const closed = createServer();
    await new Promise<void>((resolve) => closed.listen(0, '127.0.0.1', resolve));
    const address = closed.address();
    const closedPort = typeof address === 'object' && address !== null ? address.port : 0;
    await new Promise<void>((resolve) => closed.close(() => resolve()));

    const client = new AxiosMetricsClient({ timeoutMs: 2000 });
    const error = await client.fetchMetrics('127.0.0.1', closedPort).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(MetricsTransportError);
    if (!(error instanceof MetricsTransportError)) return;
    expect(error.code).toBe('ECONNREFUSED');
    expect(error.isTimeout).toBe(false);
  });
});
