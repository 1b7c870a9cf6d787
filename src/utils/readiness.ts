import { describeError } from './errors.js';

const DEFAULT_INTERVAL_MS = 250;

export interface ReadinessOptions {
  /** Total time to keep probing */
  timeoutMs: number;

  /** Delay between attempts */
  intervalMs?: number;

  /** Gives up early when aborted */
  signal?: AbortSignal;
}

export interface ReadinessResult {
  ready: boolean;

  /** Transport error from the last failed attempt */
  lastError?: string;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Poll an HTTP endpoint until it answers. Any response counts, including
 * error statuses; only transport failures mean "not up yet".
 */
export async function waitForUpstream(url: string, options: ReadinessOptions): Promise<ReadinessResult> {
  const intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;
  const deadline = Date.now() + options.timeoutMs;
  let lastError: string | undefined;

  const { signal } = options;

  while (Date.now() < deadline && !signal?.aborted) {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), Math.max(1, deadline - Date.now()));
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await fetch(url, { method: 'HEAD', signal: controller.signal });
      await response.body?.cancel();
      return { ready: true };
    } catch (error) {
      lastError = describeError(error);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }

    const remaining = deadline - Date.now();
    if (remaining <= 0 || signal?.aborted) {
      break;
    }
    await sleep(Math.min(intervalMs, remaining));
  }

  return { ready: false, lastError };
}
