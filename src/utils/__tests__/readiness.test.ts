import { describe, it, expect, afterEach } from 'vitest';
import { createServer, type Server } from 'http';
import { once } from 'events';
import { waitForUpstream } from '../readiness.js';

async function listen(server: Server): Promise<number> {
  server.listen(0, '127.0.0.1');
  await once(server, 'listening');
  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('server has no port');
  }
  return address.port;
}

describe('waitForUpstream', () => {
  let server: Server | null = null;

  afterEach(async () => {
    if (server) {
      server.closeAllConnections();
      await new Promise<void>((resolve) => server?.close(() => resolve()));
      server = null;
    }
  });

  it('should report ready as soon as anything answers', async () => {
    server = createServer((_req, res) => {
      res.writeHead(404);
      res.end();
    });
    const port = await listen(server);

    await expect(waitForUpstream(`http://127.0.0.1:${port}/`, { timeoutMs: 2000 })).resolves.toEqual({ ready: true });
  });

  it('should give up after the timeout with the last transport error', async () => {
    const probe = createServer();
    const port = await listen(probe);
    await new Promise<void>((resolve) => probe.close(() => resolve()));

    const started = Date.now();
    const result = await waitForUpstream(`http://127.0.0.1:${port}/`, { timeoutMs: 300, intervalMs: 50 });

    expect(result.ready).toBe(false);
    expect(result.lastError).toMatch(/^fetch failed/);
    expect(Date.now() - started).toBeLessThan(2000);
  });

  it('should wait for a server that starts late', async () => {
    const probe = createServer();
    const port = await listen(probe);
    await new Promise<void>((resolve) => probe.close(() => resolve()));

    const pending = waitForUpstream(`http://127.0.0.1:${port}/`, { timeoutMs: 3000, intervalMs: 50 });

    await new Promise((resolve) => setTimeout(resolve, 200));
    server = createServer((_req, res) => res.end());
    server.listen(port, '127.0.0.1');

    await expect(pending).resolves.toEqual({ ready: true });
  });

  it('should stop polling once the signal aborts', async () => {
    const probe = createServer();
    const port = await listen(probe);
    await new Promise<void>((resolve) => probe.close(() => resolve()));
    const controller = new AbortController();

    const started = Date.now();
    const pending = waitForUpstream(`http://127.0.0.1:${port}/`, {
      timeoutMs: 10000,
      intervalMs: 50,
      signal: controller.signal,
    });
    setTimeout(() => controller.abort(), 100);

    const result = await pending;
    expect(result.ready).toBe(false);
    expect(Date.now() - started).toBeLessThan(2000);
  });
});
