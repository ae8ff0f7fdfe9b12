import { ConfigurationError, type ConfigurationIssue } from '../errors.js';

/**
 * Maps one raw answer onto the 0-100 scale.
 *
 * - `linear`: numbers in [min, max] map linearly; values outside are clamped.
 * - `lookup`: categorical labels score `points / scale * 100`.
 * - `boolean`: yes/no answers score one of two fixed values.
 */
export type FieldTransform =
  | { type: 'linear'; min: number; max: number }
  | { type: 'lookup'; scale: number; answers: Record<string, number> }
  | { type: 'boolean'; whenTrue: number; whenFalse: number };

export interface FieldMapping {
  ref: string; // answer ref, flat payload key or dotted payload path
  description?: string;
  transform: FieldTransform;
}

export interface CategoryDefinition {
  id: string;
  label: string;
  weight: number;
  neutral: number; // score used when no field of the category is answered
  fields: FieldMapping[];
}

export interface MetadataMapping {
  subject: string[];
  name: string[];
  email: string[];
  submittedAt: string[];
}

/**
 * Versioned scoring configuration. Any change to categories, weights or
 * transforms needs a new version so stored scores stay comparable.
 */
export interface ScoringTable {
  version: string;
  categories: CategoryDefinition[];
  metadata: MetadataMapping;
}

export const WEIGHT_TOLERANCE = 1e-6;

const CATEGORY_ID_PATTERN = /^[a-z][a-z0-9_]*$/;

const EMPTY_METADATA: MetadataMapping = {
  subject: [],
  name: [],
  email: [],
  submittedAt: [],
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim() !== '';
}

function validateTransform(raw: unknown, path: string, issues: ConfigurationIssue[]): FieldTransform | null {
  if (!isRecord(raw)) {
    issues.push({ path, message: 'Transform must be an object' });
    return null;
  }

  switch (raw['type']) {
    case 'linear': {
      const min = raw['min'];
      const max = raw['max'];
      if (!isFiniteNumber(min) || !isFiniteNumber(max)) {
        issues.push({ path, message: 'Linear transform needs numeric min and max' });
        return null;
      }
      if (max <= min) {
        issues.push({ path, message: 'Linear transform max must be greater than min' });
        return null;
      }
      return { type: 'linear', min, max };
    }

    case 'lookup': {
      const scale = raw['scale'];
      const answers = raw['answers'];
      if (!isFiniteNumber(scale) || scale <= 0) {
        issues.push({ path, message: 'Lookup transform scale must be a positive number' });
        return null;
      }
      if (!isRecord(answers) || Object.keys(answers).length === 0) {
        issues.push({ path, message: 'Lookup transform needs at least one answer' });
        return null;
      }
      const table: Record<string, number> = {};
      for (const [label, points] of Object.entries(answers)) {
        if (!isFiniteNumber(points)) {
          issues.push({ path: `${path}.answers.${label}`, message: 'Must be a number' });
          continue;
        }
        table[label] = points;
      }
      return { type: 'lookup', scale, answers: table };
    }

    case 'boolean': {
      const whenTrue = raw['whenTrue'];
      const whenFalse = raw['whenFalse'];
      if (!isFiniteNumber(whenTrue) || !isFiniteNumber(whenFalse)) {
        issues.push({ path, message: 'Boolean transform needs numeric whenTrue and whenFalse' });
        return null;
      }
      if (whenTrue < 0 || whenTrue > 100 || whenFalse < 0 || whenFalse > 100) {
        issues.push({ path, message: 'Boolean transform values must be between 0 and 100' });
        return null;
      }
      return { type: 'boolean', whenTrue, whenFalse };
    }

    default:
      issues.push({ path, message: 'Transform type must be one of: linear, lookup, boolean' });
      return null;
  }
}

function validateCategory(raw: unknown, path: string, issues: ConfigurationIssue[]): CategoryDefinition | null {
  if (!isRecord(raw)) {
    issues.push({ path, message: 'Category must be an object' });
    return null;
  }

  const before = issues.length;
  const id = raw['id'];
  const label = raw['label'];
  const weight = raw['weight'];
  const neutral = raw['neutral'] ?? 0;
  const rawFields = raw['fields'];

  if (typeof id !== 'string' || !CATEGORY_ID_PATTERN.test(id)) {
    issues.push({ path: `${path}.id`, message: 'Must match /^[a-z][a-z0-9_]*$/' });
  }
  if (!isNonEmptyString(label)) {
    issues.push({ path: `${path}.label`, message: 'Must be a non-empty string' });
  }
  if (!isFiniteNumber(weight) || weight < 0) {
    issues.push({ path: `${path}.weight`, message: 'Must be a non-negative number' });
  }
  if (!isFiniteNumber(neutral) || neutral < 0 || neutral > 100) {
    issues.push({ path: `${path}.neutral`, message: 'Must be a number between 0 and 100' });
  }

  const fields: FieldMapping[] = [];
  if (!Array.isArray(rawFields) || rawFields.length === 0) {
    issues.push({ path: `${path}.fields`, message: 'Must list at least one field' });
  } else {
    rawFields.forEach((rawField: unknown, index) => {
      const fieldPath = `${path}.fields[${index}]`;
      if (!isRecord(rawField) || !isNonEmptyString(rawField['ref'])) {
        issues.push({ path: `${fieldPath}.ref`, message: 'Must be a non-empty string' });
        return;
      }
      const transform = validateTransform(rawField['transform'], `${fieldPath}.transform`, issues);
      if (!transform) return;
      const description = rawField['description'];
      fields.push({
        ref: rawField['ref'],
        ...(typeof description === 'string' ? { description } : {}),
        transform,
      });
    });
  }

  if (issues.length > before) return null;
  if (typeof id !== 'string' || !isNonEmptyString(label) || !isFiniteNumber(weight) || !isFiniteNumber(neutral)) {
    return null;
  }

  return { id, label, weight, neutral, fields };
}

function validateMetadata(raw: unknown, issues: ConfigurationIssue[]): MetadataMapping {
  if (raw === undefined) return EMPTY_METADATA;
  if (!isRecord(raw)) {
    issues.push({ path: 'metadata', message: 'Must be an object' });
    return EMPTY_METADATA;
  }

  const refs = (key: keyof MetadataMapping): string[] => {
    const value = raw[key];
    if (value === undefined) return [];
    const list: unknown[] = Array.isArray(value) ? value : [];
    const strings = list.filter(isNonEmptyString);
    if (!Array.isArray(value) || strings.length !== list.length) {
      issues.push({ path: `metadata.${key}`, message: 'Must be an array of non-empty strings' });
      return [];
    }
    return strings;
  };

  return {
    subject: refs('subject'),
    name: refs('name'),
    email: refs('email'),
    submittedAt: refs('submittedAt'),
  };
}

/**
 * Validate a raw scoring table. Returns the typed table and every issue found;
 * the table is only usable when `issues` is empty.
 */
export function validateScoringTable(raw: unknown): { table: ScoringTable | null; issues: ConfigurationIssue[] } {
  const issues: ConfigurationIssue[] = [];

  if (!isRecord(raw)) {
    issues.push({ path: 'root', message: 'Scoring table must be an object' });
    return { table: null, issues };
  }

  const version = raw['version'];
  if (!isNonEmptyString(version)) {
    issues.push({ path: 'version', message: 'Must be a non-empty string' });
  }

  const rawCategories = raw['categories'];
  const categories: CategoryDefinition[] = [];
  if (!Array.isArray(rawCategories) || rawCategories.length === 0) {
    issues.push({ path: 'categories', message: 'Must list at least one category' });
  } else {
    rawCategories.forEach((rawCategory: unknown, index) => {
      const category = validateCategory(rawCategory, `categories[${index}]`, issues);
      if (category) categories.push(category);
    });
  }

  const seen = new Set<string>();
  for (const category of categories) {
    if (seen.has(category.id)) {
      issues.push({ path: `categories.${category.id}`, message: 'Duplicate category id' });
    }
    seen.add(category.id);
  }

  if (categories.length > 0 && Array.isArray(rawCategories) && categories.length === rawCategories.length) {
    const total = categories.reduce((sum, c) => sum + c.weight, 0);
    if (Math.abs(total - 1) > WEIGHT_TOLERANCE) {
      issues.push({ path: 'categories', message: `Weights must sum to 1 (got ${total})` });
    }
  }

  const metadata = validateMetadata(raw['metadata'], issues);

  if (issues.length > 0 || !isNonEmptyString(version)) {
    return { table: null, issues };
  }

  return { table: { version, categories, metadata }, issues };
}

/**
 * Validate and freeze a scoring table, failing fast on any issue.
 */
export function parseScoringTable(raw: unknown): ScoringTable {
  const { table, issues } = validateScoringTable(raw);
  if (!table) {
    throw new ConfigurationError('Invalid scoring table', issues);
  }
  return deepFreeze(table);
}

export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}
