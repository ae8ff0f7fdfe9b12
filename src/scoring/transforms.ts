import type { FieldTransform } from './table.js';
import type { AnswerValue } from './payload.js';

export const SCORE_MIN = 0;
export const SCORE_MAX = 100;

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function clampScore(value: number): number {
  if (!Number.isFinite(value)) return SCORE_MIN;
  return clamp(value, SCORE_MIN, SCORE_MAX);
}

export function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

function toNumber(value: AnswerValue): number | null {
  if (typeof value === 'number') return value;
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed === '') return null;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function toBoolean(value: AnswerValue): boolean | null {
  if (typeof value === 'boolean') return value;
  const normalized = String(value).trim().toLowerCase();
  if (normalized === 'true' || normalized === 'yes' || normalized === '1') return true;
  if (normalized === 'false' || normalized === 'no' || normalized === '0') return false;
  return null;
}

function matchLookup(answers: Record<string, number>, value: AnswerValue): number | null {
  const label = String(value);
  const exact = answers[label];
  if (exact !== undefined) return exact;

  const needle = label.trim().toLowerCase();
  if (needle === '') return null;
  for (const [key, points] of Object.entries(answers)) {
    if (key.toLowerCase() === needle) return points;
  }

  // Answer wording drifts between form revisions; accept containment either way
  for (const [key, points] of Object.entries(answers)) {
    const candidate = key.toLowerCase();
    if (candidate.includes(needle) || needle.includes(candidate)) {
      return points;
    }
  }
  return null;
}

/**
 * Apply a field transform. Returns a score in [0, 100], or null when the
 * answer cannot be interpreted by this transform.
 */
export function applyTransform(transform: FieldTransform, value: AnswerValue): number | null {
  switch (transform.type) {
    case 'linear': {
      const n = toNumber(value);
      if (n === null) return null;
      const bounded = clamp(n, transform.min, transform.max);
      return ((bounded - transform.min) / (transform.max - transform.min)) * SCORE_MAX;
    }
    case 'lookup': {
      const points = matchLookup(transform.answers, value);
      if (points === null) return null;
      return (clamp(points, 0, transform.scale) / transform.scale) * SCORE_MAX;
    }
    case 'boolean': {
      const flag = toBoolean(value);
      if (flag === null) return null;
      return flag ? transform.whenTrue : transform.whenFalse;
    }
  }
}
