import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, writeFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadSettings, parseCommandLineArgs, resolveSSHConfig } from '../env.js';
import { ConfigError } from '../../utils/errors.js';

describe('parseCommandLineArgs', () => {
  it('should accept both --name=value and --name value', () => {
    expect(parseCommandLineArgs(['--ssh-host-alias=databox', '--data-path', '/srv/data'])).toEqual({
      sshHostAlias: 'databox',
      dataPath: '/srv/data',
    });
  });

  it('should map --fastapi-port to the listen port', () => {
    expect(parseCommandLineArgs(['--fastapi-port', '5001'])).toEqual({ listenPort: '5001' });
  });

  it('should reject unknown options', () => {
    expect(() => parseCommandLineArgs(['--verbose=1'])).toThrow(ConfigError);
    expect(() => parseCommandLineArgs(['--verbose=1'])).toThrow(/'--verbose'/);
  });

  it('should reject an option without a value', () => {
    expect(() => parseCommandLineArgs(['--data-path', '--local-port', '9000'])).toThrow(ConfigError);
    expect(() => parseCommandLineArgs(['--data-path'])).toThrow(/--data-path <value>' argument missing/);
  });

  it('should reject positional arguments', () => {
    expect(() => parseCommandLineArgs(['databox'])).toThrow(ConfigError);
  });

  it('should let a repeated option win with its last value', () => {
    expect(parseCommandLineArgs(['--local-port', '9000', '--local-port=9100'])).toEqual({ localPort: '9100' });
  });
});

describe('loadSettings', () => {
  it('should apply defaults', () => {
    const settings = loadSettings(['--ssh-host-alias', 'databox', '--data-path', '/srv/data'], {});

    expect(settings).toEqual({
      sshHostAlias: 'databox',
      sshPort: 22,
      sshConfigPath: '~/.ssh/config',
      dataPath: '/srv/data',
      localPort: 8000,
      remotePort: 8001,
      listenPort: 5001,
      listenHost: '0.0.0.0',
      sshTimeoutMs: 20000,
      readinessTimeoutMs: 5000,
    });
  });

  it('should read PROXY_ environment variables', () => {
    const settings = loadSettings([], {
      PROXY_SSH_HOST: 'data.example.com',
      PROXY_SSH_USERNAME: 'analyst',
      PROXY_DATA_PATH: '/srv/data',
      PROXY_LOCAL_PORT: '9000',
      PROXY_REMOTE_PORT: '9001',
      PROXY_FASTAPI_PORT: '7000',
    });

    expect(settings).toMatchObject({
      sshHost: 'data.example.com',
      sshUsername: 'analyst',
      localPort: 9000,
      remotePort: 9001,
      listenPort: 7000,
    });
  });

  it('should prefer PROXY_LISTEN_PORT over PROXY_FASTAPI_PORT', () => {
    const settings = loadSettings(['--ssh-host-alias', 'databox', '--data-path', '/srv/data'], {
      PROXY_LISTEN_PORT: '7001',
      PROXY_FASTAPI_PORT: '7000',
    });

    expect(settings.listenPort).toBe(7001);
  });

  it('should let arguments override the environment', () => {
    const settings = loadSettings(['--local-port', '9100'], {
      PROXY_SSH_HOST_ALIAS: 'databox',
      PROXY_DATA_PATH: '/srv/data',
      PROXY_LOCAL_PORT: '9000',
    });

    expect(settings.localPort).toBe(9100);
  });

  it('should require a data path', () => {
    expect(() => loadSettings(['--ssh-host-alias', 'databox'], {})).toThrow(
      'Invalid configuration:\n  dataPath: required (--data-path or PROXY_DATA_PATH)'
    );
  });

  it('should reject ports out of range', () => {
    expect(() =>
      loadSettings(['--ssh-host-alias', 'databox', '--data-path', '/srv/data', '--remote-port', '70000'], {})
    ).toThrow(/remotePort/);
    expect(() =>
      loadSettings(['--ssh-host-alias', 'databox', '--data-path', '/srv/data', '--local-port', 'abc'], {})
    ).toThrow(ConfigError);
  });

  it('should reject an alias together with a host', () => {
    expect(() =>
      loadSettings(['--ssh-host-alias', 'databox', '--ssh-host', 'data.example.com', '--data-path', '/srv/data'], {})
    ).toThrow('Use either --ssh-host-alias or --ssh-host, not both');
  });

  it('should require an SSH target', () => {
    expect(() => loadSettings(['--data-path', '/srv/data'], {})).toThrow(
      'One of --ssh-host-alias or --ssh-host is required'
    );
  });

  it('should require a username with an explicit host', () => {
    expect(() => loadSettings(['--ssh-host', 'data.example.com', '--data-path', '/srv/data'], {})).toThrow(
      '--ssh-username is required when using --ssh-host'
    );
  });
});

describe('resolveSSHConfig', () => {
  let tempDir: string;
  let configPath: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'data-proxy-env-test-'));
    configPath = join(tempDir, 'config');
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true });
  });

  it('should resolve an alias from the SSH config file', () => {
    const keyPath = join(tempDir, 'id_ed25519');
    writeFileSync(keyPath, 'fake-key');
    writeFileSync(configPath, `
Host databox
  HostName 10.20.30.40
  User analyst
  Port 2222
  IdentityFile ${keyPath}
`);

    const resolved = resolveSSHConfig({ sshHostAlias: 'databox', sshConfigPath: configPath, sshPort: 22 });

    expect(resolved).toEqual({
      config: { host: '10.20.30.40', port: 2222, username: 'analyst', privateKey: keyPath },
      source: 'ssh-config',
    });
  });

  it('should default the port to 22 for an alias', () => {
    writeFileSync(configPath, `
Host databox
  User analyst
`);

    const resolved = resolveSSHConfig({ sshHostAlias: 'databox', sshConfigPath: configPath, sshPort: 22 });

    expect(resolved.source).toBe('ssh-config');
    expect(resolved.config).toMatchObject({ host: 'databox', port: 22, username: 'analyst' });
  });

  it('should fail with ConfigError when the alias has no user', () => {
    writeFileSync(configPath, `
Host databox
  HostName 10.20.30.40
`);

    expect(() => resolveSSHConfig({ sshHostAlias: 'databox', sshConfigPath: configPath, sshPort: 22 })).toThrow(
      'SSH config for "databox" does not specify a User'
    );
  });

  it('should fail without a user when the config file is missing', () => {
    expect(() =>
      resolveSSHConfig({ sshHostAlias: 'databox', sshConfigPath: join(tempDir, 'absent'), sshPort: 22 })
    ).toThrow(ConfigError);
  });

  it('should use explicit parameters directly', () => {
    const resolved = resolveSSHConfig({
      sshHost: 'data.example.com',
      sshUsername: 'analyst',
      sshKeyPath: '/keys/id_rsa',
      sshPort: 2200,
      sshConfigPath: configPath,
    });

    expect(resolved).toEqual({
      config: { host: 'data.example.com', port: 2200, username: 'analyst', privateKey: '/keys/id_rsa' },
      source: 'explicit',
    });
  });

  it('should fail with ConfigError without host and username', () => {
    expect(() => resolveSSHConfig({ sshHost: 'data.example.com', sshConfigPath: configPath, sshPort: 22 })).toThrow(
      ConfigError
    );
  });
});
