import { formatScore } from '../chart/svg.js';
import type { ScoreModel } from '../scoring/model.js';

export type ReportSection =
  | { kind: 'header'; title: string; lines: string[] }
  | { kind: 'summary'; heading: string; lines: string[] }
  | { kind: 'chart'; heading: string }
  | { kind: 'categories'; heading: string; columns: [string, string]; rows: Array<[string, string]>; total: [string, string] }
  | { kind: 'footer'; text: string };

export type SectionKind = ReportSection['kind'];

export interface ReportLayout {
  title: string;
  sections: ReportSection[];
}

export const REPORT_TITLE = 'Your Health Score Report';

// 2026-03-01T09:30:00.000Z -> 2026-03-01 09:30:00 UTC
export function formatTimestamp(iso: string | null): string {
  if (iso === null) return 'not recorded';
  return `${iso.slice(0, 10)} ${iso.slice(11, 19)} UTC`;
}

/**
 * Decide what the report says, independent of how it is drawn.
 */
export function buildReportLayout(model: ScoreModel, options: { hasChart: boolean }): ReportLayout {
  const { metadata } = model;

  const headerLines = [`User: ${metadata.subjectName ?? 'User'}`];
  if (metadata.subjectId !== null) headerLines.push(`Subject ID: ${metadata.subjectId}`);
  headerLines.push(`Date: ${formatTimestamp(metadata.submittedAt)}`);
  if (metadata.source !== null) headerLines.push(`Source: ${metadata.source}`);
  headerLines.push(`Scoring version: ${model.version}`);

  const summaryLines = [`Overall Score: ${formatScore(model.overallScore)} / 100`];
  const defaulted = model.categories.filter(c => c.defaulted).map(c => c.label);
  if (defaulted.length > 0) {
    summaryLines.push(`No answers for: ${defaulted.join(', ')} (scored with default values)`);
  }

  const sections: ReportSection[] = [
    { kind: 'header', title: REPORT_TITLE, lines: headerLines },
    { kind: 'summary', heading: 'Summary', lines: summaryLines },
  ];

  if (options.hasChart) {
    sections.push({ kind: 'chart', heading: 'Health Score Chart' });
  }

  sections.push(
    {
      kind: 'categories',
      heading: 'Detailed Health Scores',
      columns: ['Health Pillar', 'Score'],
      rows: model.categories.map((c): [string, string] => [c.label, formatScore(model.categoryScores[c.id] ?? c.score)]),
      total: ['Overall Score', formatScore(model.overallScore)],
    },
    { kind: 'footer', text: 'This report was generated automatically from your assessment answers.' }
  );

  return { title: REPORT_TITLE, sections };
}

export function sectionKinds(layout: ReportLayout): SectionKind[] {
  return layout.sections.map(s => s.kind);
}
