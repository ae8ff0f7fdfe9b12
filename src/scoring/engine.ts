import { createHash } from 'node:crypto';
import { InvalidPayloadError } from '../errors.js';
import { silentLogger, type LoggerLike } from '../observability/logger.js';
import type { CategoryScore, ScoreMetadata, ScoreModel } from './model.js';
import { computeOverallScore } from './model.js';
import {
  buildAnswerIndex,
  extractField,
  firstPresent,
  isJsonObject,
  type AnswerIndex,
} from './payload.js';
import { deepFreeze, parseScoringTable, type CategoryDefinition, type ScoringTable } from './table.js';
import { applyTransform, clampScore, round1 } from './transforms.js';

export interface ScoreOptions {
  source?: string; // stored file name or request id, carried into metadata
  logger?: LoggerLike;
}

/**
 * Stable JSON: object keys sorted at every level, so two payloads that differ
 * only in key order hash the same.
 */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  if (isJsonObject(value)) {
    const entries = Object.keys(value)
      .sort()
      .filter(key => value[key] !== undefined)
      .map(key => `${JSON.stringify(key)}:${canonicalJson(value[key])}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

export function payloadDigest(payload: unknown): string {
  return createHash('sha256').update(canonicalJson(payload)).digest('hex');
}

function scoreCategory(index: AnswerIndex, category: CategoryDefinition, logger: LoggerLike): CategoryScore {
  const values: number[] = [];

  for (const field of category.fields) {
    const lookup = extractField(index, field.ref);
    if (!lookup.present) continue;

    const score = applyTransform(field.transform, lookup.value);
    if (score === null) {
      logger.debug('Answer not recognised by transform', {
        category: category.id,
        ref: field.ref,
        transform: field.transform.type,
      });
      continue;
    }
    values.push(score);
  }

  const defaulted = values.length === 0;
  const raw = defaulted ? category.neutral : values.reduce((sum, v) => sum + v, 0) / values.length;

  return {
    id: category.id,
    label: category.label,
    score: round1(clampScore(raw)),
    weight: category.weight,
    answered: values.length,
    expected: category.fields.length,
    defaulted,
  };
}

function extractMetadata(index: AnswerIndex, table: ScoringTable, source: string | undefined): ScoreMetadata {
  const text = (refs: readonly string[]): string | null => {
    const value = firstPresent(index, refs);
    return value === undefined ? null : String(value).trim();
  };

  const email = text(table.metadata.email);
  const submitted = text(table.metadata.submittedAt);
  const submittedDate = submitted === null ? null : new Date(submitted);

  return {
    subjectId: text(table.metadata.subject),
    subjectName: text(table.metadata.name),
    email: email !== null && email.includes('@') ? email : null,
    submittedAt: submittedDate && !Number.isNaN(submittedDate.getTime()) ? submittedDate.toISOString() : null,
    source: source ?? null,
    payloadDigest: payloadDigest(index.payload),
  };
}

/**
 * Score an assessment payload against a validated table. Pure: no I/O, no
 * clock, same input gives an identical model.
 */
export function computeScore(payload: unknown, table: ScoringTable, options: ScoreOptions = {}): ScoreModel {
  const logger = options.logger ?? silentLogger;

  if (!isJsonObject(payload)) {
    throw new InvalidPayloadError('Assessment payload must be a JSON object');
  }

  const index = buildAnswerIndex(payload);
  const categories = table.categories.map(category => scoreCategory(index, category, logger));

  if (categories.every(category => category.answered === 0)) {
    throw new InvalidPayloadError('No recognizable category data in payload');
  }

  const categoryScores: Record<string, number> = {};
  for (const category of categories) {
    categoryScores[category.id] = category.score;
  }

  return deepFreeze({
    version: table.version,
    overallScore: computeOverallScore(categoryScores, table),
    categoryScores,
    categories,
    metadata: extractMetadata(index, table, options.source),
  });
}

export class ScoringEngine {
  readonly table: ScoringTable;
  private readonly logger: LoggerLike;

  constructor(table: ScoringTable, logger: LoggerLike = silentLogger) {
    this.table = table;
    this.logger = logger;
  }

  get version(): string {
    return this.table.version;
  }

  computeScore(payload: unknown, source?: string): ScoreModel {
    const model = computeScore(payload, this.table, {
      logger: this.logger,
      ...(source !== undefined ? { source } : {}),
    });
    const defaulted = model.categories.filter(c => c.defaulted).map(c => c.id);
    this.logger.debug('Scored assessment', {
      version: model.version,
      overallScore: model.overallScore,
      defaulted,
    });
    return model;
  }
}

/**
 * Build an engine from a raw (unvalidated) table. Throws ConfigurationError
 * when the table is unusable, so a bad table stops the process at startup.
 */
export function createScoringEngine(rawTable: unknown, options: { logger?: LoggerLike } = {}): ScoringEngine {
  const table = parseScoringTable(rawTable);
  return new ScoringEngine(table, options.logger);
}
