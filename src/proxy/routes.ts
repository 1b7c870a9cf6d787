import { Router } from 'express';
import type { Request, Response } from 'express';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { ProxyUpstreamError, describeError } from '../utils/errors.js';
import type { SSHTunnelConfig } from '../types/ssh.js';

/**
 * Read-only state every handler needs, built once at startup
 */
export interface ProxyContext {
  connection: SSHTunnelConfig;
  usingSSHConfig: boolean;

  /** Base URL of the tunnel's local end, e.g. http://127.0.0.1:8000 */
  upstreamBaseUrl: string;
}

type UpstreamResponse = Awaited<ReturnType<typeof fetch>>;

const DATA_PREFIX = '/data/';

/**
 * Headers that describe the upstream framing. The body is re-chunked and
 * arrives already decoded, so these would be wrong downstream.
 */
const DROPPED_HEADERS = new Set([
  'content-length',
  'content-encoding',
  'transfer-encoding',
  'connection',
  'keep-alive',
]);

function sendError(res: Response, status: number, detail: string): void {
  res.status(status).json({ detail });
}

/**
 * Copy upstream headers onto the response, minus framing headers
 */
export function forwardHeaders(upstream: Headers, res: Response): void {
  upstream.forEach((value, key) => {
    if (!DROPPED_HEADERS.has(key.toLowerCase())) {
      res.setHeader(key, value);
    }
  });
}

async function fetchUpstream(url: string, signal: AbortSignal): Promise<UpstreamResponse> {
  try {
    return await fetch(url, { signal });
  } catch (error) {
    throw new ProxyUpstreamError(describeError(error), { cause: error });
  }
}

function createDataHandler(context: ProxyContext) {
  return async (req: Request, res: Response): Promise<void> => {
    // Forward the path still percent-encoded, as the caller sent it
    const relativePath = req.path.substring(DATA_PREFIX.length);
    const url = `${context.upstreamBaseUrl}/${relativePath}`;

    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) {
        controller.abort();
      }
    });

    let upstream: UpstreamResponse;
    try {
      upstream = await fetchUpstream(url, controller.signal);
    } catch (error) {
      if (controller.signal.aborted) {
        return;
      }
      const detail = error instanceof Error ? error.message : String(error);
      console.error(`[proxy] Error proxying ${relativePath}: ${detail}`);
      sendError(res, 500, detail);
      return;
    }

    if (upstream.status === 404) {
      await upstream.body?.cancel();
      sendError(res, 404, 'File not found');
      return;
    }

    res.status(upstream.status);
    forwardHeaders(upstream.headers, res);

    if (!upstream.body) {
      res.end();
      return;
    }

    try {
      await pipeline(Readable.fromWeb(upstream.body), res);
    } catch (error) {
      if (controller.signal.aborted) {
        console.error(`[proxy] Client disconnected during ${relativePath}`);
        return;
      }
      console.error(`[proxy] Stream of ${relativePath} failed: ${describeError(error)}`);
      if (!res.headersSent) {
        sendError(res, 500, describeError(error));
      } else {
        res.destroy();
      }
    }
  };
}

/**
 * Routes for the data proxy: streamed file access and a health report
 */
export function createProxyRouter(context: ProxyContext): Router {
  const router = Router();

  router.get(/^\/data\/.*/, createDataHandler(context));

  // Reports configured state; the tunnel itself is not probed
  router.get('/health', (_req, res) => {
    res.json({
      status: 'OK',
      connection: {
        hostname: context.connection.host,
        username: context.connection.username,
        using_ssh_config: context.usingSSHConfig,
      },
    });
  });

  return router;
}
