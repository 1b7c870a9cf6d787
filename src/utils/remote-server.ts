import { RemoteCommandError } from './errors.js';
import type { RemoteExecutor } from '../types/ssh.js';

export interface RemoteServerOptions {
  /** Directory on the remote host to serve */
  dataPath: string;

  /** Remote port the file server binds to */
  remotePort: number;
}

/**
 * Quote a value for a POSIX shell
 */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Extended regex for the command line of a file server on exactly this port.
 * The bracket keeps it from matching the command line that runs pkill.
 */
export function buildKillPattern(remotePort: number): string {
  return `[h]ttp\\.server ${remotePort}( |$)`;
}

/**
 * Kill any file server already bound to the port
 */
export function buildKillCommand(remotePort: number): string {
  return `pkill -f ${shellQuote(buildKillPattern(remotePort))}`;
}

/**
 * Start a detached file server that outlives the SSH session
 */
export function buildLaunchCommand(options: RemoteServerOptions): string {
  return `cd ${shellQuote(options.dataPath)} && nohup python3 -m http.server ${options.remotePort} --bind 127.0.0.1 > /dev/null 2>&1 &`;
}

async function killStaleServer(executor: RemoteExecutor, remotePort: number): Promise<void> {
  const command = buildKillCommand(remotePort);
  const result = await executor.exec(command);

  switch (result.exitCode) {
    case 0:
      console.error(`[remote-server] Stopped a stale file server on port ${remotePort}`);
      return;
    case 1:
      console.error(`[remote-server] No stale file server on port ${remotePort}`);
      return;
    default: {
      const detail = result.stderr.trim() || `exit code ${result.exitCode}`;
      throw new RemoteCommandError(`Could not stop stale file server (${detail})`, command);
    }
  }
}

async function launchServer(executor: RemoteExecutor, options: RemoteServerOptions): Promise<void> {
  const command = buildLaunchCommand(options);
  const result = await executor.exec(command);

  if (result.exitCode !== 0) {
    const detail = result.stderr.trim() || `exit code ${result.exitCode}`;
    throw new RemoteCommandError(`Could not launch file server in ${options.dataPath} (${detail})`, command);
  }

  console.error(`[remote-server] Launched file server for ${options.dataPath} on remote port ${options.remotePort}`);
}

function logRemoteFailure(step: string, error: unknown): void {
  if (error instanceof RemoteCommandError) {
    console.error(`[remote-server] Warning: ${step} failed: ${error.message} [${error.command}]`);
    return;
  }
  console.error(`[remote-server] Warning: ${step} failed: ${error instanceof Error ? error.message : String(error)}`);
}

/**
 * Make sure exactly one remote file server serves dataPath on remotePort.
 * Both steps are best effort: failures are logged, never thrown.
 */
export async function ensureRemoteServer(
  executor: RemoteExecutor,
  options: RemoteServerOptions
): Promise<void> {
  try {
    await killStaleServer(executor, options.remotePort);
  } catch (error) {
    logRemoteFailure('stale server cleanup', error);
  }

  try {
    await launchServer(executor, options);
  } catch (error) {
    logRemoteFailure('file server launch', error);
  }
}
