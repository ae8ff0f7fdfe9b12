import { describe, it, expect } from 'vitest';
import { deriveReportKey, isReportKey, slugifySubject } from '../../src/scoring/key.js';

const digest = 'abcdef0123456789abcdef0123456789abcdef0123456789abcdef0123456789';

describe('Report Keys', () => {
  describe('slugifySubject', () => {
    it('should lowercase and hyphenate subject names', () => {
      expect(slugifySubject('Jane Doe')).toBe('jane-doe');
      expect(slugifySubject('  Dr. Jane  O\'Neil ')).toBe('dr-jane-o-neil');
    });

    it('should strip accents', () => {
      expect(slugifySubject('José Álvarez')).toBe('jose-alvarez');
    });

    it('should fall back to anon', () => {
      expect(slugifySubject(null)).toBe('anon');
      expect(slugifySubject('!!!')).toBe('anon');
    });

    it('should cap the length without a trailing hyphen', () => {
      const slug = slugifySubject(`${'a'.repeat(47)} tail`);

      expect(slug).toBe('a'.repeat(47));
    });
  });

  describe('deriveReportKey', () => {
    it('should combine subject and compact UTC timestamp', () => {
      const key = deriveReportKey({
        subjectId: 'Jane Doe',
        submittedAt: '2026-03-01T09:30:00.000Z',
        payloadDigest: digest,
      });

      expect(key).toBe('jane-doe_20260301T093000Z');
      expect(isReportKey(key)).toBe(true);
    });

    it('should use the payload digest when there is no timestamp', () => {
      expect(deriveReportKey({ subjectId: null, submittedAt: null, payloadDigest: digest })).toBe('anon_abcdef012345');
    });

    it('should be stable for the same metadata', () => {
      const metadata = { subjectId: 'tok123', submittedAt: '2026-02-14T18:05:00.000Z', payloadDigest: digest };

      expect(deriveReportKey(metadata)).toBe(deriveReportKey({ ...metadata }));
    });
  });

  describe('isReportKey', () => {
    it('should reject path-like values', () => {
      expect(isReportKey('../etc_passwd')).toBe(false);
      expect(isReportKey('jane-doe')).toBe(false);
    });
  });
});
