import { describe, it, expect } from 'vitest';
import { computeScore, createScoringEngine, payloadDigest } from '../../src/scoring/engine.js';
import { computeOverallScore } from '../../src/scoring/model.js';
import { parseScoringTable } from '../../src/scoring/table.js';
import { ConfigurationError, InvalidPayloadError } from '../../src/errors.js';
import { exampleEngine, exampleTable, memoryLogger, parseLines, samplePayload } from '../helpers/test-utils.js';

describe('Scoring Engine', () => {
  describe('weighted example', () => {
    it('should map sleep/exercise/diet to 80/30/50 and an overall score of 56', () => {
      const model = exampleEngine().computeScore({ sleep: 8, exercise: 3, diet: 5 });

      expect(model.categoryScores).toEqual({ sleep: 80, exercise: 30, diet: 50 });
      expect(model.overallScore).toBe(56);
      expect(model.version).toBe('test-1');
    });

    it('should keep categories in table order', () => {
      const model = exampleEngine().computeScore({ diet: 5, exercise: 3, sleep: 8 });

      expect(Object.keys(model.categoryScores)).toEqual(['sleep', 'exercise', 'diet']);
      expect(model.categories.map(c => c.id)).toEqual(['sleep', 'exercise', 'diet']);
    });

    it('should agree with computeOverallScore on the category scores', () => {
      const table = parseScoringTable(exampleTable());
      const model = computeScore({ sleep: 6.5, exercise: 9, diet: 2 }, table);

      expect(computeOverallScore(model.categoryScores, table)).toBe(model.overallScore);
    });
  });

  describe('invalid payloads', () => {
    it('should reject an empty object', () => {
      expect(() => exampleEngine().computeScore({})).toThrow(InvalidPayloadError);
      expect(() => exampleEngine().computeScore({})).toThrow('No recognizable category data in payload');
    });

    it('should reject payloads that are not JSON objects', () => {
      for (const payload of [null, [], 'sleep', 42]) {
        expect(() => exampleEngine().computeScore(payload)).toThrow('Assessment payload must be a JSON object');
      }
    });

    it('should reject a payload whose only keys are unknown', () => {
      expect(() => exampleEngine().computeScore({ mood: 'great', steps: 10000 })).toThrow(InvalidPayloadError);
    });
  });

  describe('missing and unusable answers', () => {
    it('should score a missing category with its neutral value', () => {
      const model = exampleEngine().computeScore({ sleep: 8, diet: 5 });

      expect(model.categoryScores).toEqual({ sleep: 80, exercise: 50, diet: 50 });
      expect(model.categories[1]).toEqual({
        id: 'exercise',
        label: 'Exercise',
        score: 50,
        weight: 0.3,
        answered: 0,
        expected: 1,
        defaulted: true,
      });
      expect(model.overallScore).toBe(62);
    });

    it('should treat zero as an answer, not as missing', () => {
      const model = exampleEngine().computeScore({ sleep: 0, exercise: 3, diet: 5 });

      expect(model.categoryScores['sleep']).toBe(0);
      expect(model.categories[0]?.defaulted).toBe(false);
    });

    it('should fall back to neutral and log when an answer cannot be transformed', () => {
      const { logger, lines } = memoryLogger();
      const table = parseScoringTable(exampleTable());
      const model = computeScore({ sleep: 'plenty', diet: 5 }, table, { logger });

      expect(model.categoryScores['sleep']).toBe(50);
      expect(model.categories[0]?.defaulted).toBe(true);
      const entries = parseLines(lines);
      expect(entries).toHaveLength(1);
      expect(entries[0]).toMatchObject({
        level: 'debug',
        msg: 'Answer not recognised by transform',
        category: 'sleep',
        ref: 'sleep',
        transform: 'linear',
      });
    });
  });

  describe('bounds', () => {
    it('should clamp out-of-range answers and accept numeric strings', () => {
      const model = exampleEngine().computeScore({ sleep: 14, exercise: -3, diet: '7.5' });

      expect(model.categoryScores).toEqual({ sleep: 100, exercise: 0, diet: 75 });
      expect(model.overallScore).toBe(62.5);
    });

    it('should round category scores to one decimal', () => {
      const model = exampleEngine().computeScore({ sleep: 6.66, exercise: 3.333, diet: 1 });

      expect(model.categoryScores).toEqual({ sleep: 66.6, exercise: 33.3, diet: 10 });
    });
  });

  describe('determinism', () => {
    it('should produce equal models for equal payloads', () => {
      const engine = exampleEngine();
      const first = engine.computeScore(samplePayload, 'Webhook_a.json');
      const second = engine.computeScore({ ...samplePayload }, 'Webhook_a.json');

      expect(second).toEqual(first);
    });

    it('should hash payloads independently of key order', () => {
      expect(payloadDigest({ a: 1, b: { c: 2, d: 3 } })).toBe(payloadDigest({ b: { d: 3, c: 2 }, a: 1 }));
      expect(payloadDigest({ a: 1 })).not.toBe(payloadDigest({ a: 2 }));
    });

    it('should return a frozen model', () => {
      const model = exampleEngine().computeScore(samplePayload);

      expect(Object.isFrozen(model)).toBe(true);
      expect(Object.isFrozen(model.categoryScores)).toBe(true);
      expect(Object.isFrozen(model.categories[0])).toBe(true);
      expect(Object.isFrozen(model.metadata)).toBe(true);
    });
  });

  describe('metadata', () => {
    it('should carry subject, timestamp and source for traceability', () => {
      const model = exampleEngine().computeScore(samplePayload, 'Webhook_a.json');

      expect(model.metadata).toEqual({
        subjectId: 'Jane Doe',
        subjectName: 'Jane Doe',
        email: null,
        submittedAt: '2026-03-01T09:30:00.000Z',
        source: 'Webhook_a.json',
        payloadDigest: payloadDigest(samplePayload),
      });
    });

    it('should drop an email without an @ and an unparsable timestamp', () => {
      const model = exampleEngine().computeScore({ sleep: 5, email: 'nobody', submittedAt: 'yesterday' });

      expect(model.metadata.email).toBeNull();
      expect(model.metadata.submittedAt).toBeNull();
    });

    it('should not let metadata change the scores', () => {
      const engine = exampleEngine();
      const plain = engine.computeScore({ sleep: 8, exercise: 3, diet: 5 });
      const tagged = engine.computeScore({ ...samplePayload, email: 'jane@example.com' });

      expect(tagged.categoryScores).toEqual(plain.categoryScores);
      expect(tagged.overallScore).toBe(plain.overallScore);
    });
  });

  describe('createScoringEngine', () => {
    it('should fail fast on an invalid table', () => {
      const table = exampleTable();
      const broken = { ...table, version: '' };

      expect(() => createScoringEngine(broken)).toThrow(ConfigurationError);
      expect(() => createScoringEngine(broken)).toThrow('Invalid scoring table: version: Must be a non-empty string');
    });

    it('should expose the table version', () => {
      expect(createScoringEngine(exampleTable({ version: 'v9' })).version).toBe('v9');
    });
  });
});
