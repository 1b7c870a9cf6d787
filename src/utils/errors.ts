/**
 * Error taxonomy for the data proxy.
 *
 * Startup errors (config, tunnel) are fatal to the process. Remote command
 * errors are logged and ignored. Upstream errors only fail the request that
 * hit them.
 */
export type ProxyErrorCode =
  | 'CONFIG_ERROR'
  | 'TUNNEL_ERROR'
  | 'REMOTE_COMMAND_ERROR'
  | 'UPSTREAM_ERROR'
  | 'STARTUP_ABORTED';

export class ProxyError extends Error {
  readonly code: ProxyErrorCode;

  constructor(code: ProxyErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigError extends ProxyError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG_ERROR', message, options);
  }
}

export class TunnelError extends ProxyError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TUNNEL_ERROR', message, options);
  }
}

export class RemoteCommandError extends ProxyError {
  readonly command: string;

  constructor(message: string, command: string, options?: { cause?: unknown }) {
    super('REMOTE_COMMAND_ERROR', message, options);
    this.command = command;
  }
}

export class ProxyUpstreamError extends ProxyError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('UPSTREAM_ERROR', message, options);
  }
}

/**
 * Raised by a start() that was interrupted by stop()
 */
export class StartupAbortedError extends ProxyError {
  constructor() {
    super('STARTUP_ABORTED', 'Startup was interrupted by a stop request');
  }
}

/**
 * Flatten an unknown thrown value into a message, appending the cause when
 * the error wraps one (fetch reports the socket error that way).
 */
export function describeError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  const cause: unknown = error.cause;
  if (cause instanceof Error && cause.message) {
    return `${error.message}: ${cause.message}`;
  }
  return error.message;
}
