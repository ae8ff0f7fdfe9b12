import { escapeXml, formatScore } from '../chart/svg.js';
import type { ScoreModel } from '../scoring/model.js';

export interface ReportEmailContent {
  subject: string;
  text: string;
  html: string;
}

export interface ReportEmailOptions {
  chartBytes?: Uint8Array;
  now?: Date;
}

/**
 * Subject, plain-text body and a short HTML body that mirrors the PDF. The
 * HTML stays small so mail clients do not clip it.
 */
export function buildReportEmail(model: ScoreModel, options: ReportEmailOptions = {}): ReportEmailContent {
  const now = options.now ?? new Date();
  const name = model.metadata.subjectName ?? 'User';
  const day = now.toISOString().slice(0, 10);

  const text = [
    `Hello ${name},`,
    '',
    'Thank you for using our Health Score service. Your health score report is attached.',
    '',
    `Overall score: ${formatScore(model.overallScore)} / 100`,
    '',
    'Best regards,',
    'The Health Score Team',
  ].join('\n');

  const chart = options.chartBytes
    ? `<div><img src="data:image/png;base64,${Buffer.from(options.chartBytes).toString('base64')}" style="max-width: 500px; width: 100%; height: auto;" alt="Health Score Chart" /></div>`
    : '';

  const rows = model.categories
    .map(c => `<p>${escapeXml(c.label)}: <strong>${formatScore(model.categoryScores[c.id] ?? c.score)}</strong></p>`)
    .join('\n');

  const html = [
    '<h2>Your Health Score Report</h2>',
    `<p>User: ${escapeXml(name)}</p>`,
    `<p>Date: ${day}</p>`,
    chart,
    '<h3>Health Scores</h3>',
    rows,
    `<p>Overall Score: <strong>${formatScore(model.overallScore)}</strong></p>`,
    '<p>This report was generated automatically. Please do not reply to this email.</p>',
  ]
    .filter(part => part !== '')
    .join('\n');

  return {
    subject: `Your Health Score Report - ${day}`,
    text,
    html,
  };
}
