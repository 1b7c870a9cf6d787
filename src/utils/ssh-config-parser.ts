import { readFileSync, existsSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import SSHConfig from 'ssh-config';
import type { SSHTunnelConfig } from '../types/ssh.js';

/**
 * Default SSH key paths to check if no IdentityFile is specified
 */
const DEFAULT_SSH_KEYS = [
  '~/.ssh/id_rsa',
  '~/.ssh/id_ed25519',
  '~/.ssh/id_ecdsa',
  '~/.ssh/id_dsa'
];

/**
 * Default location of the per-user SSH client configuration
 */
export const DEFAULT_SSH_CONFIG_PATH = '~/.ssh/config';

/**
 * Settings found for a host alias. Only the host is guaranteed; the caller
 * decides what to do about a missing user.
 */
export type SSHHostEntry = Omit<SSHTunnelConfig, 'username'> & { username?: string };

/**
 * Expand tilde (~) in file paths to home directory
 */
export function expandTilde(filePath: string): string {
  if (filePath === '~') {
    return homedir();
  }
  if (filePath.startsWith('~/')) {
    return join(homedir(), filePath.substring(2));
  }
  return filePath;
}

/**
 * Check if a file exists
 */
function fileExists(filePath: string): boolean {
  try {
    return existsSync(expandTilde(filePath));
  } catch {
    return false;
  }
}

/**
 * ssh-config yields arrays for directives that may repeat
 */
function firstValue(value: string | string[] | undefined): string | undefined {
  if (Array.isArray(value)) {
    return value[0];
  }
  return value;
}

/**
 * Find the first existing SSH key from default locations
 */
export function findDefaultSSHKey(candidates: readonly string[] = DEFAULT_SSH_KEYS): string | undefined {
  for (const keyPath of candidates) {
    if (fileExists(keyPath)) {
      return expandTilde(keyPath);
    }
  }
  return undefined;
}

/**
 * Parse SSH config file and extract configuration for a specific host
 * @param hostAlias The host alias to look up in the SSH config
 * @param configPath Path to SSH config file
 * @returns Settings for the alias, or null if the config file does not exist
 */
export function parseSSHConfig(
  hostAlias: string,
  configPath: string
): SSHHostEntry | null {
  const sshConfigPath = expandTilde(configPath);

  // Check if SSH config file exists
  if (!existsSync(sshConfigPath)) {
    return null;
  }

  // Read and parse SSH config file
  const configContent = readFileSync(sshConfigPath, 'utf8');
  const config = SSHConfig.parse(configContent);

  // Find configuration for the specified host
  const hostConfig = config.compute(hostAlias);

  // If no HostName specified, use the host alias itself
  const entry: SSHHostEntry = {
    host: firstValue(hostConfig.HostName) || hostAlias,
  };

  const port = firstValue(hostConfig.Port);
  if (port) {
    const parsed = parseInt(port, 10);
    if (!Number.isNaN(parsed)) {
      entry.port = parsed;
    }
  }

  const user = firstValue(hostConfig.User);
  if (user) {
    entry.username = user;
  }

  // SSH config can have multiple IdentityFile entries, take the first one
  const identityFile = firstValue(hostConfig.IdentityFile);
  if (identityFile) {
    const expandedPath = expandTilde(identityFile);
    if (fileExists(expandedPath)) {
      entry.privateKey = expandedPath;
    }
  }

  if (hostConfig.ProxyJump || hostConfig.ProxyCommand) {
    console.error(`[ssh-config] Warning: ProxyJump/ProxyCommand for "${hostAlias}" is not supported and will be ignored`);
  }

  return entry;
}

/**
 * Render a connection target for log lines
 */
export function formatSSHTarget(config: SSHTunnelConfig): string {
  const target = `${config.username}@${config.host}:${config.port ?? 22}`;
  return config.privateKey ? `${target} key=${config.privateKey}` : target;
}
