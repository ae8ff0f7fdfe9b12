import type { ScoreMetadata } from './model.js';

const MAX_SUBJECT_LENGTH = 48;
const DIGEST_LENGTH = 12;

export function slugifySubject(subject: string | null): string {
  if (subject === null) return 'anon';
  const slug = subject
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, MAX_SUBJECT_LENGTH)
    .replace(/-+$/, '');
  return slug === '' ? 'anon' : slug;
}

// 2026-03-01T09:30:00.000Z -> 20260301T093000Z
function compactTimestamp(iso: string | null): string | null {
  if (iso === null) return null;
  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) return null;
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z').replace(/[-:]/g, '');
}

/**
 * Derive the artifact key for a scored assessment: `<subject>_<timestamp>`.
 *
 * The same stored payload always maps to the same key, so reprocessing
 * overwrites earlier artifacts. Without a usable timestamp the payload
 * digest takes its place.
 */
export function deriveReportKey(metadata: Pick<ScoreMetadata, 'subjectId' | 'submittedAt' | 'payloadDigest'>): string {
  const subject = slugifySubject(metadata.subjectId);
  const stamp = compactTimestamp(metadata.submittedAt) ?? metadata.payloadDigest.slice(0, DIGEST_LENGTH);
  return `${subject}_${stamp}`;
}

const KEY_PATTERN = /^[a-z0-9-]+_[A-Za-z0-9]+$/;

export function isReportKey(value: string): boolean {
  return KEY_PATTERN.test(value);
}
