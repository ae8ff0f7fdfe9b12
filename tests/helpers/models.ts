import type { ScoreModel } from '../../src/scoring/model.js';
import { exampleEngine, samplePayload } from './test-utils.js';

export const SAMPLE_KEY = 'jane-doe_20260301T093000Z';

/**
 * 80 / 30 / 50 across sleep, exercise and diet; overall 56.
 */
export function sampleModel(): ScoreModel {
  return exampleEngine().computeScore(samplePayload, 'Webhook_a.json');
}

export function modelWith(overrides: Partial<ScoreModel>): ScoreModel {
  return { ...sampleModel(), ...overrides };
}
