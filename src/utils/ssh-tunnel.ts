import { Client, ConnectConfig, type ClientChannel } from 'ssh2';
import { readFileSync } from 'fs';
import { Server, Socket, createServer } from 'net';
import { RemoteCommandError, TunnelError } from './errors.js';
import type {
  RemoteExecResult,
  RemoteExecutor,
  SSHTunnelConfig,
  SSHTunnelInfo,
  SSHTunnelOptions,
  TunnelStatus,
} from '../types/ssh.js';

const LOOPBACK = '127.0.0.1';
const DEFAULT_READY_TIMEOUT_MS = 20000;

/**
 * SSH tunnel that forwards a loopback port to a port on the remote host.
 * The same session also runs remote commands.
 */
export class SSHTunnel implements RemoteExecutor {
  private sshClient: Client | null = null;
  private localServer: Server | null = null;
  private tunnelInfo: SSHTunnelInfo | null = null;
  private status: TunnelStatus = 'unstarted';
  private readyTimeout = DEFAULT_READY_TIMEOUT_MS;
  private readonly sockets = new Set<Socket>();
  private readonly pendingCommands = new Set<() => void>();

  /**
   * Establish an SSH tunnel
   * @param config SSH connection configuration
   * @param options Tunnel options including target host and port
   * @returns Promise resolving to tunnel information including local port
   */
  async establish(
    config: SSHTunnelConfig,
    options: SSHTunnelOptions
  ): Promise<SSHTunnelInfo> {
    if (this.status === 'active') {
      throw new TunnelError('SSH tunnel is already established');
    }

    this.readyTimeout = options.readyTimeout ?? DEFAULT_READY_TIMEOUT_MS;

    try {
      const client = await this.connect(config);
      const info = await this.listen(client, options);

      this.tunnelInfo = info;
      this.status = 'active';
      console.error(`[ssh-tunnel] Established: ${info.bindAddress}:${info.localPort} -> ${info.targetHost}:${info.targetPort}`);
      return info;
    } catch (error) {
      await this.cleanup();
      this.status = 'failed';
      if (error instanceof TunnelError) {
        throw error;
      }
      throw new TunnelError(`SSH tunnel failed: ${error instanceof Error ? error.message : String(error)}`, { cause: error });
    }
  }

  /**
   * Run a command on the remote host over the tunnel's SSH session
   */
  exec(command: string): Promise<RemoteExecResult> {
    const client = this.sshClient;
    if (!client || this.status !== 'active') {
      return Promise.reject(new RemoteCommandError('SSH session is not active', command));
    }

    return new Promise((resolve, reject) => {
      let stdout = '';
      let stderr = '';
      let exitCode: number | null = null;
      let settled = false;
      let channel: ClientChannel | null = null;

      const finish = (error: RemoteCommandError | null) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        this.pendingCommands.delete(abandon);
        if (error) {
          reject(error);
        } else {
          resolve({ exitCode, stdout, stderr });
        }
      };

      const timer = setTimeout(() => {
        finish(new RemoteCommandError(`Remote command timed out after ${this.readyTimeout}ms`, command));
        channel?.close();
      }, this.readyTimeout);

      const abandon = () => {
        finish(new RemoteCommandError('SSH session closed before the command finished', command));
        channel?.close();
      };
      this.pendingCommands.add(abandon);

      client.exec(command, (err, stream) => {
        if (err) {
          finish(new RemoteCommandError(`Exec failed: ${err.message}`, command, { cause: err }));
          return;
        }
        if (settled) {
          stream.close();
          return;
        }
        channel = stream;

        stream.on('exit', (code: number | null) => {
          exitCode = typeof code === 'number' ? code : null;
        });

        stream.on('close', () => {
          finish(null);
        });

        stream.on('data', (data: Buffer) => {
          stdout += data.toString();
        });

        stream.stderr.on('data', (data: Buffer) => {
          stderr += data.toString();
        });

        stream.on('error', (streamErr: Error) => {
          finish(new RemoteCommandError(`Stream error: ${streamErr.message}`, command, { cause: streamErr }));
        });
      });
    });
  }

  /**
   * Close the SSH tunnel and clean up resources.
   * Safe to call more than once, or before establish().
   */
  async close(): Promise<void> {
    if (!this.sshClient && !this.localServer) {
      return;
    }

    await this.cleanup();
    this.status = 'stopped';
    console.error('[ssh-tunnel] Closed');
  }

  /**
   * Get current tunnel information
   */
  getTunnelInfo(): SSHTunnelInfo | null {
    return this.tunnelInfo;
  }

  getStatus(): TunnelStatus {
    return this.status;
  }

  /**
   * Check if tunnel is connected
   */
  getIsConnected(): boolean {
    return this.status === 'active';
  }

  private connect(config: SSHTunnelConfig): Promise<Client> {
    // Build SSH connection config
    const sshConfig: ConnectConfig = {
      host: config.host,
      port: config.port || 22,
      username: config.username,
      readyTimeout: this.readyTimeout,
    };

    // Key based authentication only: a key file, else a running agent
    if (config.privateKey) {
      try {
        sshConfig.privateKey = readFileSync(config.privateKey);
      } catch (error) {
        return Promise.reject(new TunnelError(
          `Failed to read private key file: ${error instanceof Error ? error.message : String(error)}`,
          { cause: error }
        ));
      }
    } else if (process.env.SSH_AUTH_SOCK) {
      sshConfig.agent = process.env.SSH_AUTH_SOCK;
    } else {
      return Promise.reject(new TunnelError('Either a private key or a running SSH agent is required for SSH authentication'));
    }

    const client = new Client();
    this.sshClient = client;

    return new Promise((resolve, reject) => {
      let ready = false;

      client.on('error', (err) => {
        if (!ready) {
          reject(new TunnelError(`SSH connection error: ${err.message}`, { cause: err }));
          return;
        }
        console.error(`[ssh-tunnel] SSH session error: ${err.message}`);
      });

      client.on('close', () => {
        if (!ready) {
          reject(new TunnelError('SSH connection closed before it was ready'));
          return;
        }
        if (this.sshClient === client) {
          console.error('[ssh-tunnel] SSH session closed by remote');
          this.status = 'failed';
        }
      });

      client.on('ready', () => {
        ready = true;
        console.error(`[ssh-tunnel] SSH connection established to ${config.host}`);
        resolve(client);
      });

      client.connect(sshConfig);
    });
  }

  private listen(client: Client, options: SSHTunnelOptions): Promise<SSHTunnelInfo> {
    return new Promise((resolve, reject) => {
      const server = createServer((localSocket) => {
        this.forward(client, localSocket, options);
      });
      this.localServer = server;

      // Handle local server errors
      server.once('error', (err) => {
        reject(new TunnelError(`Local server error: ${err.message}`, { cause: err }));
      });

      // Listen on local port
      server.listen(options.localPort || 0, LOOPBACK, () => {
        const address = server.address();
        if (!address || typeof address === 'string') {
          reject(new TunnelError('Failed to get local server address'));
          return;
        }

        server.on('error', (err) => {
          console.error(`[ssh-tunnel] Local server error: ${err.message}`);
        });

        resolve({
          localPort: address.port,
          bindAddress: LOOPBACK,
          targetHost: options.targetHost,
          targetPort: options.targetPort,
        });
      });
    });
  }

  private forward(client: Client, localSocket: Socket, options: SSHTunnelOptions): void {
    this.sockets.add(localSocket);
    localSocket.once('close', () => {
      this.sockets.delete(localSocket);
    });
    localSocket.on('error', (err) => {
      console.error(`[ssh-tunnel] Local socket error: ${err.message}`);
    });

    const timer = setTimeout(() => {
      console.error(`[ssh-tunnel] Channel open timed out after ${this.readyTimeout}ms`);
      localSocket.destroy();
    }, this.readyTimeout);

    client.forwardOut(
      LOOPBACK,
      0,
      options.targetHost,
      options.targetPort,
      (err, stream) => {
        clearTimeout(timer);
        if (err) {
          console.error(`[ssh-tunnel] SSH forward error: ${err.message}`);
          localSocket.destroy();
          return;
        }
        if (localSocket.destroyed) {
          stream.destroy();
          return;
        }

        // Pipe data between local socket and SSH stream
        localSocket.pipe(stream).pipe(localSocket);

        stream.on('error', (streamErr: Error) => {
          console.error(`[ssh-tunnel] SSH stream error: ${streamErr.message}`);
          localSocket.destroy();
        });

        localSocket.once('close', () => {
          stream.destroy();
        });
      }
    );
  }

  /**
   * Release forwarded sockets, the SSH session and the listening socket, in that order
   */
  private async cleanup(): Promise<void> {
    for (const socket of this.sockets) {
      socket.destroy();
    }
    this.sockets.clear();

    for (const abandon of this.pendingCommands) {
      abandon();
    }

    if (this.sshClient) {
      const client = this.sshClient;
      this.sshClient = null;
      // a session still handshaking may never answer a polite disconnect
      if (this.status === 'active') {
        client.end();
      } else {
        client.destroy();
      }
    }

    if (this.localServer) {
      const server = this.localServer;
      this.localServer = null;
      if (server.listening) {
        await new Promise<void>((resolve) => {
          server.close(() => resolve());
        });
      }
    }

    this.tunnelInfo = null;
  }
}
