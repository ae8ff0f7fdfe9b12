import { PDFDict, PDFDocument, PDFName } from 'pdf-lib';
import type { ScoreSummary } from '../scoring/model.js';

export interface ReportInspection extends ScoreSummary {
  title: string | null;
  author: string | null;
  pageCount: number;
  imageCount: number;
}

const SUBJECT_PATTERN = /^Overall score: (\d+(?:\.\d+)?)$/;

/**
 * Parse the score summary a report carries in its document metadata.
 */
export function parseSummaryMetadata(subject: string | undefined, keywords: string | undefined): ScoreSummary {
  const match = SUBJECT_PATTERN.exec(subject ?? '');
  if (!match?.[1]) {
    throw new Error('Report has no overall score in its metadata');
  }

  const categoryScores: Record<string, number> = {};
  for (const pair of (keywords ?? '').split(/\s+/)) {
    const [id, value] = pair.split('=');
    if (!id || value === undefined) continue;
    const score = Number(value);
    if (Number.isFinite(score)) {
      categoryScores[id] = score;
    }
  }

  return { overallScore: Number(match[1]), categoryScores };
}

export async function inspectReport(bytes: Uint8Array): Promise<ReportInspection> {
  const doc = await PDFDocument.load(bytes, { updateMetadata: false });

  let imageCount = 0;
  for (const page of doc.getPages()) {
    const xobjects = page.node.Resources()?.lookupMaybe(PDFName.of('XObject'), PDFDict);
    imageCount += xobjects ? xobjects.keys().length : 0;
  }

  return {
    ...parseSummaryMetadata(doc.getSubject(), doc.getKeywords()),
    title: doc.getTitle() ?? null,
    author: doc.getAuthor() ?? null,
    pageCount: doc.getPageCount(),
    imageCount,
  };
}

export async function readReportSummary(bytes: Uint8Array): Promise<ScoreSummary> {
  const { overallScore, categoryScores } = await inspectReport(bytes);
  return { overallScore, categoryScores };
}
