import { once } from 'events';
import { loadSettings, type Settings } from './config/env.js';
import { DataProxyService } from './service/manager.js';

/**
 * Abort when the process receives SIGINT or SIGTERM. The handlers only
 * flip the signal; teardown happens in main.
 */
export function shutdownSignal(): AbortSignal {
  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    console.error(`[main] Received ${signal}`);
    controller.abort();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
  return controller.signal;
}

/**
 * Run the service until the signal aborts. Resolves to the process exit code.
 */
export async function main(
  argv: readonly string[] = process.argv.slice(2),
  signal: AbortSignal = shutdownSignal()
): Promise<number> {
  let settings: Settings;
  try {
    settings = loadSettings(argv);
  } catch (error) {
    console.error(`[main] ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }

  const service = new DataProxyService(settings);
  const stopRequested: Promise<unknown> = signal.aborted ? Promise.resolve() : once(signal, 'abort');
  // a signal during startup interrupts start() as well
  const stopped = stopRequested.then(() => service.stop());

  try {
    await service.start();
  } catch {
    if (!signal.aborted) {
      // start() has already logged and released everything
      return 1;
    }
    await stopped;
    console.error('[main] Startup interrupted');
    return 0;
  }

  await stopped;
  return 0;
}
