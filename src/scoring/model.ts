import type { ScoringTable } from './table.js';
import { clampScore, round1, SCORE_MAX, SCORE_MIN } from './transforms.js';

export interface CategoryScore {
  readonly id: string;
  readonly label: string;
  readonly score: number;
  readonly weight: number;
  readonly answered: number; // fields that produced a value
  readonly expected: number; // fields configured for the category
  readonly defaulted: boolean; // true when the neutral value was used
}

export interface ScoreMetadata {
  readonly subjectId: string | null;
  readonly subjectName: string | null;
  readonly email: string | null;
  readonly submittedAt: string | null; // ISO timestamp from the payload
  readonly source: string | null; // stored file name or other reference
  readonly payloadDigest: string; // sha256 of the canonical payload JSON
}

/**
 * Scores derived from one assessment. Created once by the scoring engine,
 * deep-frozen, and only read afterwards.
 */
export interface ScoreModel {
  readonly version: string;
  readonly overallScore: number;
  readonly categoryScores: Readonly<Record<string, number>>;
  readonly categories: readonly CategoryScore[];
  readonly metadata: ScoreMetadata;
}

/**
 * Weighted aggregate of category scores. Categories missing from
 * `categoryScores` contribute 0.
 */
export function computeOverallScore(
  categoryScores: Readonly<Record<string, number>>,
  table: Pick<ScoringTable, 'categories'>
): number {
  let total = 0;
  for (const category of table.categories) {
    total += clampScore(categoryScores[category.id] ?? 0) * category.weight;
  }
  return round1(clampScore(total));
}

function inBounds(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= SCORE_MIN && value <= SCORE_MAX;
}

/**
 * Internal-consistency check used by the renderers. Returns a list of
 * problems; empty when the model is renderable.
 */
export function checkScoreModel(model: ScoreModel): string[] {
  const problems: string[] = [];

  if (!inBounds(model.overallScore)) {
    problems.push(`overallScore out of range: ${String(model.overallScore)}`);
  }

  const ids = Object.keys(model.categoryScores);
  if (ids.length === 0) {
    problems.push('categoryScores is empty');
  }
  for (const id of ids) {
    if (!inBounds(model.categoryScores[id])) {
      problems.push(`categoryScores.${id} out of range: ${String(model.categoryScores[id])}`);
    }
  }

  if (model.categories.length !== ids.length) {
    problems.push('categories and categoryScores disagree on the category set');
  } else {
    model.categories.forEach((category, index) => {
      if (ids[index] !== category.id) {
        problems.push(`category order mismatch at position ${index}: ${category.id}`);
      }
    });
  }

  return problems;
}

export interface ScoreSummary {
  overallScore: number;
  categoryScores: Record<string, number>;
}
