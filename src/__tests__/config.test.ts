import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DEFAULT_SESSION_CONFIG, engineSettingsFrom, loadSessionConfig, parseCli } from '../core/config';
import { ConfigError } from '../core/errors';

describe('parseCli', () => {
  it('reads transport, port, platform and config path', () => {
    expect(parseCli(['--transport', 'http', '--port', '8080', '--platform', 'win32', '--config', 'alt.json'])).toEqual({
      transport: 'http',
      port: 8080,
      platform: 'win32',
      config: 'alt.json'
    });
  });

  it('rejects unknown values', () => {
    expect(() => parseCli(['--transport', 'sse'])).toThrow(ConfigError);
    expect(() => parseCli(['--port', '70000'])).toThrow(ConfigError);
  });
});

describe('loadSessionConfig', () => {
  let dir: string;

  function writeSession(content: unknown): void {
    fs.mkdirSync(path.join(dir, 'config'), { recursive: true });
    fs.writeFileSync(path.join(dir, 'config', 'session.json'), JSON.stringify(content));
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'stepwise-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('falls back to defaults without a file', () => {
    const config = loadSessionConfig({ env: {}, cwd: dir });
    expect(config.transportMode).toBe('stdio');
    expect(config.port).toBe(3000);
    expect(config.stepParts).toBe(DEFAULT_SESSION_CONFIG.stepParts);
    expect(config.desktopPath).toBe(path.resolve(dir, 'config/desktop.json'));
  });

  it('ranks CLI over environment over file', () => {
    writeSession({ port: 4000, platform: 'win32', logLevel: 'warn' });

    expect(loadSessionConfig({ env: {}, cwd: dir }).port).toBe(4000);
    expect(loadSessionConfig({ env: { STEPWISE_PORT: '5000' }, cwd: dir }).port).toBe(5000);
    expect(loadSessionConfig({ cli: { port: 6000 }, env: { STEPWISE_PORT: '5000' }, cwd: dir }).port).toBe(6000);

    const config = loadSessionConfig({ env: { STEPWISE_PLATFORM: 'virtual', STEPWISE_LOG_LEVEL: 'debug' }, cwd: dir });
    expect(config.platform).toBe('virtual');
    expect(config.logLevel).toBe('debug');
  });

  it('reads the file named by --config', () => {
    fs.writeFileSync(path.join(dir, 'alt.json'), JSON.stringify({ transportMode: 'http' }));
    expect(loadSessionConfig({ cli: { config: 'alt.json' }, env: {}, cwd: dir }).transportMode).toBe('http');
  });

  it('lower-cases app override keys and merges pointer timings', () => {
    writeSession({ appOverrides: { Terminal: { minW: 480 } }, pointer: { tickMs: 16 } });
    const config = loadSessionConfig({ env: {}, cwd: dir });

    expect(config.appOverrides).toEqual({ terminal: { minW: 480 } });
    expect(config.pointer).toEqual({ tickMs: 16, watchdogMs: 3000, staleAfterMs: 10000 });
    expect(engineSettingsFrom(config).appOverrides).toBe(config.appOverrides);
  });

  it('rejects a file with unknown keys', () => {
    writeSession({ elevationPreApproved: true });
    expect(() => loadSessionConfig({ env: {}, cwd: dir })).toThrow(ConfigError);
  });

  it('rejects a file that is not JSON', () => {
    fs.mkdirSync(path.join(dir, 'config'), { recursive: true });
    fs.writeFileSync(path.join(dir, 'config', 'session.json'), '{ port: ');
    expect(() => loadSessionConfig({ env: {}, cwd: dir })).toThrow('Invalid configuration');
  });

  it('rejects bad environment values', () => {
    expect(() => loadSessionConfig({ env: { STEPWISE_LOG_LEVEL: 'loud' }, cwd: dir })).toThrow(ConfigError);
    expect(() => loadSessionConfig({ env: { STEPWISE_PORT: 'abc' }, cwd: dir })).toThrow(ConfigError);
  });
});
