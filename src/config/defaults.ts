import type { HealthScoreConfig } from './schema.js';
import { getDataRoot, getDefaultScoringTablePath } from '../utils/paths.js';

export const DEFAULT_PORT = 5000;

export function getDefaultConfig(): HealthScoreConfig {
  return {
    port: DEFAULT_PORT,
    host: '127.0.0.1',
    dataDir: getDataRoot(),
    scoringTable: getDefaultScoringTablePath(),
    logLevel: 'info',
    json: false,
    includeChart: true,
    senderEmail: null,
    sendgridApiKey: null,
  };
}
