import * as http from 'http';
import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import { createProxyRouter, type ProxyContext } from './routes.js';

/**
 * Local HTTP front end for the tunnel
 */
export class ProxyServer {
  private httpServer: http.Server | null = null;
  private currentPort = 0;

  constructor(private readonly context: ProxyContext) {}

  /**
   * Start listening
   * @returns the bound port (useful when port is 0)
   */
  async start(port: number, host = '0.0.0.0'): Promise<number> {
    if (this.httpServer) {
      return this.currentPort;
    }

    const app = express();
    app.disable('x-powered-by');
    app.use(createProxyRouter(this.context));

    app.use((_req: Request, res: Response) => {
      res.status(404).json({ detail: 'Not Found' });
    });

    app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
      const detail = err instanceof Error ? err.message : String(err);
      console.error(`[http] Unhandled error: ${detail}`);
      if (res.headersSent) {
        res.destroy();
        return;
      }
      res.status(500).json({ detail });
    });

    const server = http.createServer(app);

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, host, () => {
        server.off('error', reject);
        resolve();
      });
    });

    server.on('error', (err) => {
      console.error(`[http] Server error: ${err.message}`);
    });

    const address = server.address();
    this.currentPort = address && typeof address !== 'string' ? address.port : port;
    this.httpServer = server;

    console.error(`[http] Data proxy listening. Access data at http://localhost:${this.currentPort}/data/`);
    return this.currentPort;
  }

  /**
   * Stop accepting requests and abort in-flight responses
   */
  async stop(): Promise<void> {
    const server = this.httpServer;
    if (!server) {
      return;
    }
    this.httpServer = null;

    const closed = new Promise<void>((resolve) => {
      server.close(() => resolve());
    });
    server.closeAllConnections();
    await closed;

    console.error('[http] Data proxy stopped');
  }

  isRunning(): boolean {
    return this.httpServer !== null && this.httpServer.listening;
  }

  getPort(): number {
    return this.currentPort;
  }
}
