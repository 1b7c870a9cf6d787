import { parseArgs, type ParseArgsConfig } from 'util';
import { z } from 'zod';
import {
  DEFAULT_SSH_CONFIG_PATH,
  expandTilde,
  findDefaultSSHKey,
  parseSSHConfig,
} from '../utils/ssh-config-parser.js';
import { ConfigError } from '../utils/errors.js';
import type { ResolvedSSHConfig, SSHTunnelConfig } from '../types/ssh.js';

const ENV_PREFIX = 'PROXY_';

const port = z.coerce.number().int().min(0).max(65535);
const timeout = z.coerce.number().int().min(0);

const settingsSchema = z.object({
  sshHostAlias: z.string().min(1).optional(),
  sshHost: z.string().min(1).optional(),
  sshUsername: z.string().min(1).optional(),
  sshKeyPath: z.string().min(1).optional(),
  sshPort: port.min(1).default(22),
  sshConfigPath: z.string().min(1).default(DEFAULT_SSH_CONFIG_PATH),
  dataPath: z.string({ required_error: 'required (--data-path or PROXY_DATA_PATH)' }).min(1),
  localPort: port.default(8000),
  remotePort: port.min(1).default(8001),
  listenPort: port.default(5001),
  listenHost: z.string().min(1).default('0.0.0.0'),
  sshTimeoutMs: timeout.min(1).default(20000),
  readinessTimeoutMs: timeout.default(5000),
});

export type Settings = z.infer<typeof settingsSchema>;

type SettingKey = keyof Settings;

/**
 * Command line flags, including the legacy spelling of the listen port
 */
const ARG_KEYS: Record<string, SettingKey> = {
  'ssh-host-alias': 'sshHostAlias',
  'ssh-host': 'sshHost',
  'ssh-username': 'sshUsername',
  'ssh-key-path': 'sshKeyPath',
  'ssh-port': 'sshPort',
  'ssh-config': 'sshConfigPath',
  'data-path': 'dataPath',
  'local-port': 'localPort',
  'remote-port': 'remotePort',
  'port': 'listenPort',
  'fastapi-port': 'listenPort',
  'host': 'listenHost',
  'ssh-timeout': 'sshTimeoutMs',
  'readiness-timeout': 'readinessTimeoutMs',
};

/**
 * Environment variables (without the PROXY_ prefix). Earlier entries win.
 */
const ENV_KEYS: Array<[string, SettingKey]> = [
  ['SSH_HOST_ALIAS', 'sshHostAlias'],
  ['SSH_HOST', 'sshHost'],
  ['SSH_USERNAME', 'sshUsername'],
  ['SSH_KEY_PATH', 'sshKeyPath'],
  ['SSH_PORT', 'sshPort'],
  ['SSH_CONFIG_PATH', 'sshConfigPath'],
  ['DATA_PATH', 'dataPath'],
  ['LOCAL_PORT', 'localPort'],
  ['REMOTE_PORT', 'remotePort'],
  ['LISTEN_PORT', 'listenPort'],
  ['FASTAPI_PORT', 'listenPort'],
  ['LISTEN_HOST', 'listenHost'],
  ['SSH_TIMEOUT_MS', 'sshTimeoutMs'],
  ['READINESS_TIMEOUT_MS', 'readinessTimeoutMs'],
];

const ARG_OPTIONS: NonNullable<ParseArgsConfig['options']> = {};
for (const name of Object.keys(ARG_KEYS)) {
  ARG_OPTIONS[name] = { type: 'string' };
}

/**
 * Parse command line arguments of the form --name=value or --name value
 * @throws ConfigError on unknown options, positionals or missing values
 */
export function parseCommandLineArgs(argv: readonly string[]): Partial<Record<SettingKey, string>> {
  let values: Record<string, unknown>;
  try {
    ({ values } = parseArgs({
      args: [...argv],
      options: ARG_OPTIONS,
      allowPositionals: false,
      strict: true,
    }));
  } catch (error) {
    throw new ConfigError(error instanceof Error ? error.message : String(error), { cause: error });
  }

  const result: Partial<Record<SettingKey, string>> = {};
  for (const [name, value] of Object.entries(values)) {
    const key = ARG_KEYS[name];
    if (key && typeof value === 'string') {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Read PROXY_-prefixed environment variables
 */
function readEnvironment(env: NodeJS.ProcessEnv): Partial<Record<SettingKey, string>> {
  const result: Partial<Record<SettingKey, string>> = {};
  for (const [name, key] of ENV_KEYS) {
    const value = env[ENV_PREFIX + name];
    if (value !== undefined && value !== '' && result[key] === undefined) {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Load settings from command line arguments and the environment.
 * Arguments take precedence over PROXY_* variables.
 * @throws ConfigError when a value is invalid or the SSH target is ambiguous
 */
export function loadSettings(
  argv: readonly string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): Settings {
  const raw = { ...readEnvironment(env), ...parseCommandLineArgs(argv) };
  const result = settingsSchema.safeParse(raw);

  if (!result.success) {
    const errors = result.error.errors.map(e => `  ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new ConfigError(`Invalid configuration:\n${errors}`);
  }

  const settings = result.data;

  if (settings.sshHostAlias && settings.sshHost) {
    throw new ConfigError('Use either --ssh-host-alias or --ssh-host, not both');
  }
  if (!settings.sshHostAlias && !settings.sshHost) {
    throw new ConfigError('One of --ssh-host-alias or --ssh-host is required');
  }
  if (settings.sshHost && !settings.sshUsername) {
    throw new ConfigError('--ssh-username is required when using --ssh-host');
  }

  return settings;
}

/**
 * Resolve the SSH connection from either a host alias or explicit parameters.
 * @throws ConfigError when no host or username can be determined
 */
export function resolveSSHConfig(
  settings: Pick<Settings, 'sshHostAlias' | 'sshHost' | 'sshUsername' | 'sshKeyPath' | 'sshPort' | 'sshConfigPath'>
): ResolvedSSHConfig {
  if (settings.sshHostAlias) {
    const alias = settings.sshHostAlias;
    console.error(`[config] Using SSH config alias: ${alias}`);

    let entry = parseSSHConfig(alias, settings.sshConfigPath);
    if (!entry) {
      console.error(`[config] Warning: no SSH config file found at ${settings.sshConfigPath}`);
      entry = { host: alias };
    }

    if (!entry.username) {
      throw new ConfigError(`SSH config for "${alias}" does not specify a User`);
    }

    const config: SSHTunnelConfig = {
      host: entry.host,
      port: entry.port ?? 22,
      username: entry.username,
    };
    const privateKey = entry.privateKey ?? findDefaultSSHKey();
    if (privateKey) {
      config.privateKey = privateKey;
    }

    return { config, source: 'ssh-config' };
  }

  console.error('[config] Using direct SSH parameters');

  if (!settings.sshHost || !settings.sshUsername) {
    throw new ConfigError('SSH tunnel configuration requires both a host and a username');
  }

  const config: SSHTunnelConfig = {
    host: settings.sshHost,
    port: settings.sshPort,
    username: settings.sshUsername,
  };
  const privateKey = settings.sshKeyPath ? expandTilde(settings.sshKeyPath) : findDefaultSSHKey();
  if (privateKey) {
    config.privateKey = privateKey;
  }

  return { config, source: 'explicit' };
}
