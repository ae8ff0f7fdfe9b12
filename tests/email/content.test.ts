import { describe, it, expect } from 'vitest';
import { buildReportEmail } from '../../src/email/content.js';
import { isEmailAddress } from '../../src/email/sender.js';
import { sampleModel } from '../helpers/models.js';

const now = new Date('2026-03-02T12:00:00Z');

describe('Report Email Content', () => {
  it('should date the subject with the send day', () => {
    expect(buildReportEmail(sampleModel(), { now }).subject).toBe('Your Health Score Report - 2026-03-02');
  });

  it('should greet the subject in the plain-text body', () => {
    expect(buildReportEmail(sampleModel(), { now }).text).toBe([
      'Hello Jane Doe,',
      '',
      'Thank you for using our Health Score service. Your health score report is attached.',
      '',
      'Overall score: 56 / 100',
      '',
      'Best regards,',
      'The Health Score Team',
    ].join('\n'));
  });

  it('should list every category in the HTML body', () => {
    const { html } = buildReportEmail(sampleModel(), { now });

    expect(html).toBe([
      '<h2>Your Health Score Report</h2>',
      '<p>User: Jane Doe</p>',
      '<p>Date: 2026-03-02</p>',
      '<h3>Health Scores</h3>',
      '<p>Sleep: <strong>80</strong></p>',
      '<p>Exercise: <strong>30</strong></p>',
      '<p>Diet: <strong>50</strong></p>',
      '<p>Overall Score: <strong>56</strong></p>',
      '<p>This report was generated automatically. Please do not reply to this email.</p>',
    ].join('\n'));
  });

  it('should inline the chart as a data URI when given', () => {
    const { html } = buildReportEmail(sampleModel(), { now, chartBytes: Uint8Array.of(1, 2, 3) });

    expect(html).toContain('<img src="data:image/png;base64,AQID"');
  });

  describe('isEmailAddress', () => {
    it('should accept plain addresses and reject malformed ones', () => {
      expect(isEmailAddress('jane@example.com')).toBe(true);
      expect(isEmailAddress('jane@example')).toBe(false);
      expect(isEmailAddress('jane doe@example.com')).toBe(false);
      expect(isEmailAddress('@example.com')).toBe(false);
    });
  });
});
