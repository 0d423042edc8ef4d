import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { DEFAULT_CONFIG, loadConfig, readConfigFile, resolveConfig } from '../../../src/config/loader.js';
import { RunnerErrorCode } from '../../../src/shared/errors.js';

describe('resolveConfig', () => {
  it('returns the defaults when no layer sets anything', () => {
    expect(resolveConfig([])).toEqual(DEFAULT_CONFIG);
  });

  it('lets later layers win and skips unset keys', () => {
    const config = resolveConfig([
      { rspec_cmd: 'bin/rspec', port: 4000 },
      { port: '5000', hostname: undefined },
      { transport: 'stdio' },
    ]);
    expect(config).toEqual({
      rspec_cmd: 'bin/rspec',
      transport: 'stdio',
      hostname: '127.0.0.1',
      port: 5000,
      log_level: 'info',
    });
  });

  it('rejects a blank runner command', () => {
    expect(() => resolveConfig([{ rspec_cmd: '   ' }])).toThrow('rspec_cmd: rspec_cmd cannot be empty');
  });

  it('rejects an out-of-range port', () => {
    expect(() => resolveConfig([{ port: '70000' }])).toThrow(
      expect.objectContaining({ code: RunnerErrorCode.INVALID_CONFIG })
    );
  });

  it('rejects a blank or null port instead of reading it as 0', () => {
    expect(() => resolveConfig([{ port: '' }])).toThrow(/^Invalid configuration: port: /);
    expect(() => resolveConfig([{ port: '  ' }])).toThrow(/^Invalid configuration: port: /);
    expect(() => resolveConfig([{ port: null }])).toThrow(/^Invalid configuration: port: /);
  });

  it('rejects a non-numeric port', () => {
    expect(() => resolveConfig([{ port: '80a' }])).toThrow(/^Invalid configuration: port: /);
  });

  it('rejects an unknown log level', () => {
    expect(() => resolveConfig([{ log_level: 'verbose' }])).toThrow(
      expect.objectContaining({
        code: RunnerErrorCode.INVALID_CONFIG,
        message: expect.stringMatching(/^Invalid configuration: log_level: /),
      })
    );
  });

  it('rejects an unknown transport', () => {
    expect(() => resolveConfig([{ transport: 'websocket' }])).toThrow(/^Invalid configuration: transport: /);
  });
});

describe('config file', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'rspec-mcp-test-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('returns null for a missing file', async () => {
    await expect(readConfigFile(path.join(tmpDir, 'absent.yaml'))).resolves.toBeNull();
  });

  it('returns an empty layer for an empty file', async () => {
    const file = path.join(tmpDir, 'config.yaml');
    await fs.writeFile(file, '');
    await expect(readConfigFile(file)).resolves.toEqual({});
  });

  it('rejects unknown keys', async () => {
    const file = path.join(tmpDir, 'config.yaml');
    await fs.writeFile(file, 'rspec_command: bin/rspec\n');
    await expect(readConfigFile(file)).rejects.toMatchObject({ code: RunnerErrorCode.INVALID_CONFIG });
  });

  it('rejects malformed YAML', async () => {
    const file = path.join(tmpDir, 'config.yaml');
    await fs.writeFile(file, 'port: [1, 2\n');
    await expect(readConfigFile(file)).rejects.toMatchObject({ code: RunnerErrorCode.INVALID_CONFIG });
  });

  it('rejects a port key with no value', async () => {
    const file = path.join(tmpDir, 'config.yaml');
    await fs.writeFile(file, 'port:\n');
    await expect(readConfigFile(file)).rejects.toMatchObject({
      code: RunnerErrorCode.INVALID_CONFIG,
      message: expect.stringMatching(/^Invalid config file .*: port: /),
    });
  });

  it('layers defaults < file < cli', async () => {
    const file = path.join(tmpDir, 'config.yaml');
    await fs.writeFile(file, 'rspec_cmd: bin/rspec --fail-fast\nport: 4000\nhostname: 0.0.0.0\nlog_level: warn\n');

    const result = await loadConfig({
      configPath: file,
      cli: { port: '5000', log_level: 'error' },
    });

    expect(result).toEqual({
      configPath: file,
      fileFound: true,
      config: {
        rspec_cmd: 'bin/rspec --fail-fast',
        transport: 'sse',
        hostname: '0.0.0.0',
        port: 5000,
        log_level: 'error',
      },
    });
  });

  it('falls back to the defaults when the file is missing', async () => {
    const result = await loadConfig({ configPath: path.join(tmpDir, 'absent.yaml') });
    expect(result.configPath).toBe(path.join(tmpDir, 'absent.yaml'));
    expect(result.fileFound).toBe(false);
    expect(result.config).toEqual(DEFAULT_CONFIG);
  });
});
