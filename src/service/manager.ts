import { SSHTunnel } from '../utils/ssh-tunnel.js';
import { ensureRemoteServer } from '../utils/remote-server.js';
import { waitForUpstream } from '../utils/readiness.js';
import { formatSSHTarget } from '../utils/ssh-config-parser.js';
import { resolveSSHConfig, type Settings } from '../config/env.js';
import { ProxyServer } from '../proxy/server.js';
import { StartupAbortedError } from '../utils/errors.js';
import type { ResolvedSSHConfig } from '../types/ssh.js';

export type ServiceState = 'unstarted' | 'starting' | 'running' | 'stopping' | 'stopped' | 'failed';

/**
 * Owns the tunnel, the remote file server and the local HTTP proxy for one
 * process. Resources are acquired in order by start() and released in
 * reverse by stop().
 */
export class DataProxyService {
  private state: ServiceState = 'unstarted';
  private resolved: ResolvedSSHConfig | null = null;
  private tunnel: SSHTunnel | null = null;
  private proxyServer: ProxyServer | null = null;
  private listenPort: number | null = null;
  private startup: Promise<void> | null = null;
  private readonly abortController = new AbortController();

  constructor(private readonly settings: Settings) {}

  /**
   * Resolve config, open the tunnel, start the remote file server, then accept requests
   */
  start(): Promise<void> {
    if (this.state !== 'unstarted') {
      return Promise.reject(new Error(`Cannot start data proxy service in state "${this.state}"`));
    }
    this.state = 'starting';
    this.startup = this.runStartup();
    return this.startup;
  }

  /**
   * Release everything start() acquired. Safe to call repeatedly and before start().
   * During startup it interrupts start() and waits for it to unwind.
   */
  async stop(): Promise<void> {
    if (this.state === 'unstarted' || this.state === 'stopped' || this.state === 'stopping') {
      return;
    }

    const interrupting = this.state === 'starting';
    this.state = 'stopping';

    if (interrupting) {
      console.error('[service] Stop requested during startup');
      this.abortController.abort();
      // closing the tunnel unblocks a pending handshake or remote command
      await this.release();
      await Promise.allSettled([this.startup]);
    } else {
      console.error('[service] Shutting down gracefully...');
      await this.release();
    }

    this.state = 'stopped';
  }

  private async runStartup(): Promise<void> {
    const { signal } = this.abortController;

    try {
      const resolved = resolveSSHConfig(this.settings);
      this.resolved = resolved;
      console.error(`[service] Connecting using SSH config: ${formatSSHTarget(resolved.config)}`);

      const tunnel = new SSHTunnel();
      this.tunnel = tunnel;
      const tunnelInfo = await tunnel.establish(resolved.config, {
        targetHost: '127.0.0.1',
        targetPort: this.settings.remotePort,
        localPort: this.settings.localPort,
        readyTimeout: this.settings.sshTimeoutMs,
      });
      if (signal.aborted) {
        await tunnel.close();
        throw new StartupAbortedError();
      }

      await ensureRemoteServer(tunnel, {
        dataPath: this.settings.dataPath,
        remotePort: this.settings.remotePort,
      });
      if (signal.aborted) {
        throw new StartupAbortedError();
      }

      const upstreamBaseUrl = `http://${tunnelInfo.bindAddress}:${tunnelInfo.localPort}`;

      if (this.settings.readinessTimeoutMs > 0) {
        const readiness = await waitForUpstream(`${upstreamBaseUrl}/`, {
          timeoutMs: this.settings.readinessTimeoutMs,
          signal,
        });
        if (signal.aborted) {
          throw new StartupAbortedError();
        }
        if (readiness.ready) {
          console.error('[service] Remote file server is ready');
        } else {
          console.error(
            `[service] Warning: remote file server not answering after ${this.settings.readinessTimeoutMs}ms` +
              (readiness.lastError ? ` (${readiness.lastError})` : '') +
              '; continuing'
          );
        }
      }

      const proxyServer = new ProxyServer({
        connection: resolved.config,
        usingSSHConfig: resolved.source === 'ssh-config',
        upstreamBaseUrl,
      });
      this.proxyServer = proxyServer;
      const listenPort = await proxyServer.start(this.settings.listenPort, this.settings.listenHost);
      if (signal.aborted) {
        await proxyServer.stop();
        throw new StartupAbortedError();
      }
      this.listenPort = listenPort;

      this.state = 'running';
      console.error('[service] Data proxy service started');
    } catch (error) {
      console.error(`[service] Failed to start data proxy service: ${error instanceof Error ? error.message : String(error)}`);
      await this.release();
      if (!signal.aborted) {
        this.state = 'failed';
      }
      throw error;
    }
  }

  getState(): ServiceState {
    return this.state;
  }

  /**
   * Port the HTTP proxy is bound to, once running
   */
  getListenPort(): number | null {
    return this.listenPort;
  }

  getResolvedConfig(): ResolvedSSHConfig | null {
    return this.resolved;
  }

  private async release(): Promise<void> {
    if (this.proxyServer) {
      const proxyServer = this.proxyServer;
      this.proxyServer = null;
      await proxyServer.stop();
    }

    if (this.tunnel) {
      const tunnel = this.tunnel;
      this.tunnel = null;
      await tunnel.close();
    }

    this.listenPort = null;
  }
}
