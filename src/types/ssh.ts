/**
 * SSH Tunnel Configuration Types
 */

export interface SSHTunnelConfig {
  /** SSH server hostname */
  host: string;
  
  /** SSH server port (default: 22) */
  port?: number;
  
  /** SSH username */
  username: string;
  
  /** Path to SSH private key file */
  privateKey?: string;
}

/** Where a resolved SSH configuration came from */
export type SSHConfigSource = 'ssh-config' | 'explicit';

export interface ResolvedSSHConfig {
  config: SSHTunnelConfig;
  source: SSHConfigSource;
}

export interface SSHTunnelOptions {
  /** Target host (as seen from SSH server) */
  targetHost: string;
  
  /** Target port */
  targetPort: number;
  
  /** Local port to bind the tunnel (0 for dynamic allocation) */
  localPort?: number;

  /** Milliseconds allowed for handshake, authentication and channel open */
  readyTimeout?: number;
}

export type TunnelStatus = 'unstarted' | 'active' | 'stopped' | 'failed';

export interface SSHTunnelInfo {
  /** Local port where the tunnel is listening */
  localPort: number;

  /** Loopback address the local port is bound to */
  bindAddress: string;
  
  /** Original target host */
  targetHost: string;
  
  /** Original target port */
  targetPort: number;
}

export interface RemoteExecResult {
  /** Exit code, or null when the remote process was killed by a signal */
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

/**
 * Anything that can run a command on the remote host
 */
export interface RemoteExecutor {
  exec(command: string): Promise<RemoteExecResult>;
}
