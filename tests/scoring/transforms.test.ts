import { describe, it, expect } from 'vitest';
import { applyTransform, clampScore, round1 } from '../../src/scoring/transforms.js';
import type { FieldTransform } from '../../src/scoring/table.js';

const linear: FieldTransform = { type: 'linear', min: 0, max: 10 };
const agreement: FieldTransform = {
  type: 'lookup',
  scale: 5,
  answers: { 'Strongly agree': 5, Agree: 4, Neutral: 3, Disagree: 2, 'Strongly disagree': 1 },
};
const yesNo: FieldTransform = { type: 'boolean', whenTrue: 100, whenFalse: 20 };

describe('Field Transforms', () => {
  describe('linear', () => {
    it('should map the range onto 0-100', () => {
      expect(applyTransform(linear, 0)).toBe(0);
      expect(applyTransform(linear, 5)).toBe(50);
      expect(applyTransform(linear, 10)).toBe(100);
    });

    it('should respect a non-zero minimum', () => {
      expect(applyTransform({ type: 'linear', min: 1, max: 5 }, 3)).toBe(50);
    });

    it('should clamp values outside the range', () => {
      expect(applyTransform(linear, 12)).toBe(100);
      expect(applyTransform(linear, -4)).toBe(0);
    });

    it('should parse numeric strings and reject other text', () => {
      expect(applyTransform(linear, ' 4 ')).toBe(40);
      expect(applyTransform(linear, 'four')).toBeNull();
      expect(applyTransform(linear, true)).toBeNull();
    });
  });

  describe('lookup', () => {
    it('should score exact labels against the scale', () => {
      expect(applyTransform(agreement, 'Strongly agree')).toBe(100);
      expect(applyTransform(agreement, 'Agree')).toBe(80);
      expect(applyTransform(agreement, 'Strongly disagree')).toBe(20);
    });

    it('should prefer a case-insensitive exact label over a containing one', () => {
      expect(applyTransform(agreement, 'agree')).toBe(80);
      expect(applyTransform(agreement, 'NEUTRAL')).toBe(60);
    });

    it('should accept labels that contain or are contained by a known answer', () => {
      expect(applyTransform(agreement, 'Neutral (no opinion)')).toBe(60);
    });

    it('should return null for unknown or blank labels', () => {
      expect(applyTransform(agreement, 'Maybe')).toBeNull();
      expect(applyTransform(agreement, '  ')).toBeNull();
    });

    it('should clamp points to the scale', () => {
      expect(applyTransform({ type: 'lookup', scale: 5, answers: { Always: 7 } }, 'Always')).toBe(100);
    });
  });

  describe('boolean', () => {
    it('should accept booleans and yes/no style strings', () => {
      expect(applyTransform(yesNo, true)).toBe(100);
      expect(applyTransform(yesNo, 'No')).toBe(20);
      expect(applyTransform(yesNo, 1)).toBe(100);
      expect(applyTransform(yesNo, 'sometimes')).toBeNull();
    });
  });

  describe('helpers', () => {
    it('should clamp scores into 0-100 and map non-finite values to 0', () => {
      expect(clampScore(140)).toBe(100);
      expect(clampScore(-1)).toBe(0);
      expect(clampScore(Number.NaN)).toBe(0);
    });

    it('should round to one decimal', () => {
      expect(round1(56.04)).toBe(56);
      expect(round1(56.06)).toBe(56.1);
    });
  });
});
