import type { ConfigurationIssue } from '../errors.js';
import { isLogLevel, LOG_LEVELS, type LogLevel } from '../observability/logger.js';

export interface HealthScoreConfig {
  port: number;
  host: string;
  dataDir: string; // payloads/ and output/ live here
  scoringTable: string; // path to the scoring table JSON
  logLevel: LogLevel;
  json: boolean;
  includeChart: boolean;
  senderEmail: string | null;
  sendgridApiKey: string | null;
}

export type PartialConfig = Partial<HealthScoreConfig>;

export type ValidationError = ConfigurationIssue;

const KNOWN_KEYS: readonly (keyof HealthScoreConfig)[] = [
  'port',
  'host',
  'dataDir',
  'scoringTable',
  'logLevel',
  'json',
  'includeChart',
  'senderEmail',
  'sendgridApiKey',
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim() !== '';
}

// Validate and return errors (empty array if valid)
export function validateConfig(config: unknown): ValidationError[] {
  const errors: ValidationError[] = [];

  if (!isRecord(config)) {
    errors.push({ path: 'root', message: 'Config must be an object' });
    return errors;
  }

  if ('port' in config) {
    const port = config['port'];
    if (typeof port !== 'number' || !Number.isInteger(port) || port < 0 || port > 65535) {
      errors.push({ path: 'port', message: 'Must be an integer between 0 and 65535' });
    }
  }

  for (const key of ['host', 'dataDir', 'scoringTable'] as const) {
    if (key in config && !isNonEmptyString(config[key])) {
      errors.push({ path: key, message: 'Must be a non-empty string' });
    }
  }

  if ('logLevel' in config && !isLogLevel(config['logLevel'])) {
    errors.push({ path: 'logLevel', message: `Must be one of: ${LOG_LEVELS.join(', ')}` });
  }

  for (const key of ['json', 'includeChart'] as const) {
    if (key in config && typeof config[key] !== 'boolean') {
      errors.push({ path: key, message: 'Must be a boolean' });
    }
  }

  if ('senderEmail' in config) {
    const sender = config['senderEmail'];
    if (sender !== null && (typeof sender !== 'string' || !/^[^\s@]+@[^\s@]+$/.test(sender))) {
      errors.push({ path: 'senderEmail', message: 'Must be an email address or null' });
    }
  }

  if ('sendgridApiKey' in config) {
    const key = config['sendgridApiKey'];
    if (key !== null && !isNonEmptyString(key)) {
      errors.push({ path: 'sendgridApiKey', message: 'Must be a non-empty string or null' });
    }
  }

  // Check for unknown keys
  const known: readonly string[] = KNOWN_KEYS;
  for (const key of Object.keys(config)) {
    if (!known.includes(key)) {
      errors.push({ path: key, message: 'Unknown configuration key' });
    }
  }

  return errors;
}

// Type guards
export function isValidConfig(config: unknown): config is PartialConfig {
  return validateConfig(config).length === 0;
}

export function isCompleteConfig(config: unknown): config is HealthScoreConfig {
  return isRecord(config) && KNOWN_KEYS.every(key => key in config) && isValidConfig(config);
}
