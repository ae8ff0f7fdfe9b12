import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { validateConfig, isValidConfig, isCompleteConfig } from '../../src/config/schema.js';
import { DEFAULT_PORT, getDefaultConfig } from '../../src/config/defaults.js';
import { loadConfig, loadEnvConfig, loadScoringEngine } from '../../src/config/loader.js';
import { ConfigurationError } from '../../src/errors.js';
import { DEFAULT_TABLE_PATH, TempDir } from '../helpers/test-utils.js';

describe('Config Schema Validation', () => {
  it('should validate a valid config', () => {
    const config = {
      port: 8080,
      host: '0.0.0.0',
      logLevel: 'debug' as const,
      includeChart: false,
      senderEmail: 'reports@example.com',
      sendgridApiKey: 'test-secret',
    };

    expect(validateConfig(config)).toEqual([]);
    expect(isValidConfig(config)).toBe(true);
  });

  it('should reject a port out of range', () => {
    expect(validateConfig({ port: 70000 })).toEqual([{ path: 'port', message: 'Must be an integer between 0 and 65535' }]);
    expect(validateConfig({ port: 80.5 })).toEqual([{ path: 'port', message: 'Must be an integer between 0 and 65535' }]);
  });

  it('should reject invalid logLevel', () => {
    expect(validateConfig({ logLevel: 'trace' })).toEqual([
      { path: 'logLevel', message: 'Must be one of: debug, info, warn, error, silent' },
    ]);
  });

  it('should reject empty paths and non-boolean flags', () => {
    expect(validateConfig({ dataDir: ' ', includeChart: 'yes' })).toEqual([
      { path: 'dataDir', message: 'Must be a non-empty string' },
      { path: 'includeChart', message: 'Must be a boolean' },
    ]);
  });

  it('should accept null email settings and reject malformed ones', () => {
    expect(validateConfig({ senderEmail: null, sendgridApiKey: null })).toEqual([]);
    expect(validateConfig({ senderEmail: 'reports', sendgridApiKey: '' })).toEqual([
      { path: 'senderEmail', message: 'Must be an email address or null' },
      { path: 'sendgridApiKey', message: 'Must be a non-empty string or null' },
    ]);
  });

  it('should detect unknown keys', () => {
    expect(validateConfig({ colour: 'green' })).toEqual([{ path: 'colour', message: 'Unknown configuration key' }]);
  });

  it('should reject non-object config', () => {
    expect(validateConfig('not an object')).toEqual([{ path: 'root', message: 'Config must be an object' }]);
  });

  it('should tell partial configs from complete ones', () => {
    expect(isValidConfig({})).toBe(true);
    expect(isCompleteConfig({})).toBe(false);
    expect(isCompleteConfig(getDefaultConfig())).toBe(true);
  });
});

describe('Default Config', () => {
  it('should return valid defaults', () => {
    const defaults = getDefaultConfig();

    expect(validateConfig(defaults)).toEqual([]);
    expect(defaults.port).toBe(DEFAULT_PORT);
    expect(defaults.port).toBe(5000);
    expect(defaults.scoringTable).toBe(DEFAULT_TABLE_PATH);
    expect(defaults.senderEmail).toBeNull();
  });
});

describe('Config Loader', () => {
  let tmp: TempDir;

  beforeEach(() => {
    tmp = TempDir.create();
  });

  afterEach(() => {
    tmp.destroy();
  });

  it('should load defaults when no config exists', async () => {
    const config = await loadConfig({ cwd: tmp.dir, env: {} });

    expect(config).toEqual(getDefaultConfig());
  });

  it('should load from environment variables', async () => {
    const config = await loadConfig({
      cwd: tmp.dir,
      env: {
        HEALTHSCORE_PORT: '8081',
        HEALTHSCORE_LOG_LEVEL: 'debug',
        HEALTHSCORE_INCLUDE_CHART: 'no',
        HEALTHSCORE_DATA_DIR: 'var',
      },
    });

    expect(config.port).toBe(8081);
    expect(config.logLevel).toBe('debug');
    expect(config.includeChart).toBe(false);
    expect(config.dataDir).toBe(tmp.path('var'));
  });

  it('should fall back to the SendGrid variable names', () => {
    expect(loadEnvConfig({ SENDGRID_API_KEY: 'test-secret', SENDGRID_FROM_EMAIL: 'reports@example.com' })).toEqual({
      senderEmail: 'reports@example.com',
      sendgridApiKey: 'test-secret',
    });
    expect(loadEnvConfig({ SENDGRID_API_KEY: 'test-secret', HEALTHSCORE_SENDGRID_API_KEY: 'own-secret' })).toEqual({
      sendgridApiKey: 'own-secret',
    });
  });

  it('should load from healthscore.config.json', async () => {
    tmp.writeJson('healthscore.config.json', { port: 8080, logLevel: 'warn' });

    const config = await loadConfig({ cwd: tmp.dir, env: {} });

    expect(config.port).toBe(8080);
    expect(config.logLevel).toBe('warn');
  });

  it('should load from .healthscorerc', async () => {
    tmp.writeJson('.healthscorerc', { includeChart: false });

    expect((await loadConfig({ cwd: tmp.dir, env: {} })).includeChart).toBe(false);
  });

  it('should load from package.json#healthscore', async () => {
    tmp.writeJson('package.json', { name: 'test-pkg', healthscore: { json: true } });

    expect((await loadConfig({ cwd: tmp.dir, env: {} })).json).toBe(true);
  });

  it('should respect precedence: CLI > env > file > defaults', async () => {
    tmp.writeJson('.healthscorerc.json', { port: 8000, logLevel: 'warn', host: '0.0.0.0' });

    const config = await loadConfig({
      cwd: tmp.dir,
      env: { HEALTHSCORE_PORT: '8001', HEALTHSCORE_LOG_LEVEL: 'debug' },
      cliFlags: { port: 8002 },
    });

    expect(config.port).toBe(8002);
    expect(config.logLevel).toBe('debug');
    expect(config.host).toBe('0.0.0.0');
    expect(config.includeChart).toBe(true);
  });

  it('should load from explicit config path', async () => {
    tmp.writeJson('custom/settings.json', { scoringTable: 'tables/v2.json' });

    const config = await loadConfig({ cwd: tmp.dir, env: {}, configPath: 'custom/settings.json' });

    expect(config.scoringTable).toBe(tmp.path('tables', 'v2.json'));
  });

  it('should throw on invalid config', async () => {
    tmp.writeJson('healthscore.config.json', { colour: 'green' });

    await expect(loadConfig({ cwd: tmp.dir, env: {} })).rejects.toThrow(
      'Invalid configuration: colour: Unknown configuration key'
    );
  });

  it('should report invalid values from the environment', async () => {
    await expect(loadConfig({ cwd: tmp.dir, env: { HEALTHSCORE_JSON: 'maybe' } })).rejects.toThrow(
      'Invalid configuration: json: Must be a boolean'
    );
  });

  it('should refuse a config file that is not JSON', async () => {
    const file = tmp.writeFile('healthscore.config.json', 'port = 8080');

    await expect(loadConfig({ cwd: tmp.dir, env: {} })).rejects.toThrow(`${file} is not valid JSON`);
  });

  it('should refuse a package.json section that is not an object', async () => {
    tmp.writeJson('package.json', { healthscore: 'on' });

    await expect(loadConfig({ cwd: tmp.dir, env: {} })).rejects.toThrow(
      'Invalid configuration: package.json#healthscore: Must be an object'
    );
  });
});

describe('Scoring Table Loading', () => {
  let tmp: TempDir;

  beforeEach(() => {
    tmp = TempDir.create();
  });

  afterEach(() => {
    tmp.destroy();
  });

  it('should load the bundled table', async () => {
    expect((await loadScoringEngine(DEFAULT_TABLE_PATH)).version).toBe('hs-2026.1');
  });

  it('should stop on a missing table', async () => {
    await expect(loadScoringEngine(tmp.path('missing.json'))).rejects.toThrow(ConfigurationError);
  });

  it('should stop on an invalid table', async () => {
    const file = tmp.writeJson('table.json', { version: 'x', categories: [] });

    await expect(loadScoringEngine(file)).rejects.toThrow(
      'Invalid scoring table: categories: Must list at least one category'
    );
  });
});
