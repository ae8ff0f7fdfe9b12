import * as fs from 'node:fs';
import * as path from 'node:path';
import { ConfigurationError, errorMessage } from '../errors.js';
import { createScoringEngine, type ScoringEngine } from '../scoring/engine.js';
import type { LoggerLike } from '../observability/logger.js';
import { getDefaultConfig } from './defaults.js';
import { isCompleteConfig, validateConfig, type HealthScoreConfig, type PartialConfig } from './schema.js';

// Search order: CLI flags > env vars > config file > defaults
export interface LoadConfigOptions {
  cliFlags?: PartialConfig | Record<string, unknown>; // checked with the merged result
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export const CONFIG_FILES = ['healthscore.config.json', '.healthscorerc', '.healthscorerc.json'] as const;

export async function loadConfig(options: LoadConfigOptions = {}): Promise<HealthScoreConfig> {
  const cwd = options.cwd ?? process.cwd();
  const defaults = getDefaultConfig();
  const envConfig = loadEnvConfig(options.env ?? process.env);
  const fileConfig = await loadFileConfig(options.configPath, cwd);

  // Merge in precedence order
  const merged: Record<string, unknown> = {
    ...defaults,
    ...fileConfig,
    ...envConfig,
    ...options.cliFlags,
  };

  // Validate final config
  if (!isCompleteConfig(merged)) {
    throw new ConfigurationError('Invalid configuration', validateConfig(merged));
  }

  return {
    ...merged,
    dataDir: path.resolve(cwd, merged.dataDir),
    scoringTable: path.resolve(cwd, merged.scoringTable),
  };
}

function parseBoolean(value: string): boolean | string {
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes'].includes(normalized)) return true;
  if (['false', '0', 'no'].includes(normalized)) return false;
  return value; // left as-is so validation reports it
}

// Load from environment variables. Values stay loosely typed until the merged
// config is validated.
export function loadEnvConfig(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  if (env['HEALTHSCORE_PORT']) {
    config['port'] = Number(env['HEALTHSCORE_PORT']);
  }
  if (env['HEALTHSCORE_HOST']) {
    config['host'] = env['HEALTHSCORE_HOST'];
  }
  if (env['HEALTHSCORE_DATA_DIR']) {
    config['dataDir'] = env['HEALTHSCORE_DATA_DIR'];
  }
  if (env['HEALTHSCORE_SCORING_TABLE']) {
    config['scoringTable'] = env['HEALTHSCORE_SCORING_TABLE'];
  }
  if (env['HEALTHSCORE_LOG_LEVEL']) {
    config['logLevel'] = env['HEALTHSCORE_LOG_LEVEL'];
  }
  if (env['HEALTHSCORE_JSON']) {
    config['json'] = parseBoolean(env['HEALTHSCORE_JSON']);
  }
  if (env['HEALTHSCORE_INCLUDE_CHART']) {
    config['includeChart'] = parseBoolean(env['HEALTHSCORE_INCLUDE_CHART']);
  }

  // SendGrid's own variable names are honoured as fallbacks
  const sender = env['HEALTHSCORE_SENDER_EMAIL'] ?? env['SENDGRID_FROM_EMAIL'];
  if (sender) {
    config['senderEmail'] = sender;
  }
  const apiKey = env['HEALTHSCORE_SENDGRID_API_KEY'] ?? env['SENDGRID_API_KEY'];
  if (apiKey) {
    config['sendgridApiKey'] = apiKey;
  }

  return config;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Load from config file
// Search: healthscore.config.json, .healthscorerc, .healthscorerc.json, package.json#healthscore
async function loadFileConfig(configPath: string | undefined, cwd: string): Promise<Record<string, unknown>> {
  // If explicit path provided, use it
  if (configPath) {
    return loadConfigFile(path.resolve(cwd, configPath));
  }

  for (const candidate of CONFIG_FILES) {
    const fullPath = path.join(cwd, candidate);
    if (fs.existsSync(fullPath)) {
      return loadConfigFile(fullPath);
    }
  }

  const pkgPath = path.join(cwd, 'package.json');
  if (fs.existsSync(pkgPath)) {
    const pkg = await readJson(pkgPath);
    const section = isRecord(pkg) ? pkg['healthscore'] : undefined;
    if (section !== undefined) {
      if (!isRecord(section)) {
        throw new ConfigurationError('Invalid configuration', [{ path: 'package.json#healthscore', message: 'Must be an object' }]);
      }
      return section;
    }
  }

  return {};
}

async function readJson(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.promises.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read ${filePath}: ${errorMessage(error)}`);
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`${filePath} is not valid JSON: ${errorMessage(error)}`);
  }
}

async function loadConfigFile(filePath: string): Promise<Record<string, unknown>> {
  const content = await readJson(filePath);
  if (!isRecord(content)) {
    throw new ConfigurationError('Invalid configuration', [{ path: filePath, message: 'Config must be an object' }]);
  }
  return content;
}

/**
 * Read and validate the scoring table the config points at. Any problem
 * stops startup with a ConfigurationError.
 */
export async function loadScoringEngine(tablePath: string, logger?: LoggerLike): Promise<ScoringEngine> {
  const raw = await readJson(tablePath);
  return createScoringEngine(raw, logger ? { logger } : {});
}
