import * as path from 'node:path';
import { PDFDocument, StandardFonts, rgb, type PDFFont, type PDFImage, type PDFPage, type Color } from 'pdf-lib';
import { formatScore } from '../chart/svg.js';
import { errorMessage, RenderError } from '../errors.js';
import { publishAtomic } from '../fs/atomic.js';
import { silentLogger, type LoggerLike } from '../observability/logger.js';
import { deriveReportKey } from '../scoring/key.js';
import { checkScoreModel, type ScoreModel } from '../scoring/model.js';
import { buildReportLayout, sectionKinds, type ReportSection, type SectionKind } from './layout.js';
import { encodable, fitToColumn, wrapText } from './text.js';

// A4 in points
const PAGE_WIDTH = 595.28;
const PAGE_HEIGHT = 841.89;
const MARGIN = 50;
const CONTENT_WIDTH = PAGE_WIDTH - MARGIN * 2;
const CHART_SIZE = 360;
const TABLE_COLUMNS = [288, 72] as const; // 4in + 1in
const ROW_HEIGHT = 22;
const CELL_PADDING = 6;

const BLACK = rgb(0, 0, 0);
const GREY = rgb(0.4, 0.4, 0.4);
const LIGHT_GREEN = rgb(0.565, 0.933, 0.565);

export const PRODUCER = 'healthscore-reports';

export interface ChartImage {
  bytes: Uint8Array; // PNG
}

export interface PdfResult {
  path: string;
  bytes: Uint8Array;
  pageCount: number;
  sections: SectionKind[];
}

export interface RenderPdfOptions {
  key?: string;
  logger?: LoggerLike;
}

export type PdfRenderer = (
  model: ScoreModel,
  chart: ChartImage | undefined,
  outputDir: string,
  options?: RenderPdfOptions
) => Promise<PdfResult>;

interface Fonts {
  regular: PDFFont;
  bold: PDFFont;
}

/**
 * Top-down cursor over A4 pages; starts a new page when a block does not fit.
 */
class PageWriter {
  private page: PDFPage;
  private y: number;

  constructor(private readonly doc: PDFDocument, readonly fonts: Fonts) {
    this.page = doc.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
    this.y = PAGE_HEIGHT - MARGIN;
  }

  ensureSpace(height: number): void {
    if (this.y - height < MARGIN) {
      this.page = this.doc.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
      this.y = PAGE_HEIGHT - MARGIN;
    }
  }

  gap(points: number): void {
    this.y -= points;
  }

  text(text: string, options: { size: number; bold?: boolean; color?: Color; align?: 'left' | 'center' }): void {
    const font = options.bold ? this.fonts.bold : this.fonts.regular;
    const lines = wrapText(font, encodable(font, text), options.size, CONTENT_WIDTH);

    for (const line of lines) {
      const lineHeight = options.size * 1.3;
      this.ensureSpace(lineHeight);
      this.y -= options.size;
      const width = font.widthOfTextAtSize(line, options.size);
      const x = options.align === 'center' ? (PAGE_WIDTH - width) / 2 : MARGIN;
      this.page.drawText(line, { x, y: this.y, size: options.size, font, color: options.color ?? BLACK });
      this.y -= lineHeight - options.size;
    }
  }

  image(image: PDFImage, size: number): void {
    const scaled = image.scaleToFit(size, size);
    this.ensureSpace(scaled.height);
    this.y -= scaled.height;
    this.page.drawImage(image, {
      x: (PAGE_WIDTH - scaled.width) / 2,
      y: this.y,
      width: scaled.width,
      height: scaled.height,
    });
  }

  row(cells: readonly [string, string], options: { header?: boolean; bold?: boolean }): void {
    const font = options.header || options.bold ? this.fonts.bold : this.fonts.regular;
    const size = options.header ? 12 : 11;
    const lineHeight = size * 1.25;
    const columns = cells.map((cell, i) => {
      const width = TABLE_COLUMNS[i] ?? TABLE_COLUMNS[0];
      return { width, lines: fitToColumn(font, encodable(font, cell), size, width - CELL_PADDING * 2) };
    });
    const lineCount = Math.max(...columns.map(c => c.lines.length));
    const rowHeight = Math.max(ROW_HEIGHT, lineCount * lineHeight + 8);

    this.ensureSpace(rowHeight);
    const top = this.y;
    let x = MARGIN;

    columns.forEach(({ width, lines }, i) => {
      this.page.drawRectangle({
        x,
        y: top - rowHeight,
        width,
        height: rowHeight,
        borderColor: BLACK,
        borderWidth: 1,
        ...(options.header ? { color: LIGHT_GREEN } : {}),
      });

      const centered = options.header || i > 0;
      let baseline = top - (rowHeight - lines.length * lineHeight) / 2 - size;
      for (const line of lines) {
        const textWidth = font.widthOfTextAtSize(line, size);
        const textX = centered ? x + (width - textWidth) / 2 : x + CELL_PADDING;
        this.page.drawText(line, { x: textX, y: baseline, size, font, color: BLACK });
        baseline -= lineHeight;
      }
      x += width;
    });

    this.y = top - rowHeight;
  }

  footer(text: string): void {
    const font = this.fonts.regular;
    const line = encodable(font, text);
    this.page.drawText(line, { x: MARGIN, y: MARGIN / 2, size: 9, font, color: GREY });
  }
}

function drawSection(writer: PageWriter, section: ReportSection, chart: PDFImage | undefined): void {
  switch (section.kind) {
    case 'header':
      writer.text(section.title, { size: 24, bold: true, align: 'center' });
      writer.gap(18);
      for (const line of section.lines) {
        writer.text(line, { size: 13, align: 'center' });
      }
      writer.gap(24);
      break;

    case 'summary':
      writer.text(section.heading, { size: 16, bold: true });
      writer.gap(6);
      section.lines.forEach((line, i) => writer.text(line, { size: i === 0 ? 14 : 11, bold: i === 0 }));
      writer.gap(20);
      break;

    case 'chart':
      if (chart) {
        writer.text(section.heading, { size: 16, bold: true });
        writer.gap(8);
        writer.image(chart, CHART_SIZE);
        writer.gap(20);
      }
      break;

    case 'categories':
      writer.ensureSpace(16 * 1.3 + 8 + ROW_HEIGHT * 2);
      writer.text(section.heading, { size: 16, bold: true });
      writer.gap(8);
      writer.row(section.columns, { header: true });
      for (const row of section.rows) {
        writer.row(row, {});
      }
      writer.row(section.total, { bold: true });
      writer.gap(20);
      break;

    case 'footer':
      writer.footer(section.text);
      break;
  }
}

function reportDate(model: ScoreModel): Date {
  return model.metadata.submittedAt === null ? new Date(0) : new Date(model.metadata.submittedAt);
}

/**
 * Build the report document in memory. Metadata only depends on the model, so
 * repeated renders carry the same title, dates and score summary.
 */
export async function buildPdfDocument(model: ScoreModel, chart?: ChartImage): Promise<{ bytes: Uint8Array; pageCount: number; sections: SectionKind[] }> {
  const problems = checkScoreModel(model);
  if (problems.length > 0) {
    throw new RenderError('pdf', `Malformed score model: ${problems.join('; ')}`);
  }

  try {
    const doc = await PDFDocument.create({ updateMetadata: false });
    const fonts: Fonts = {
      regular: await doc.embedFont(StandardFonts.Helvetica),
      bold: await doc.embedFont(StandardFonts.HelveticaBold),
    };

    let image: PDFImage | undefined;
    if (chart) {
      try {
        image = await doc.embedPng(chart.bytes);
      } catch (error) {
        throw new RenderError('pdf', `Chart image is not a readable PNG: ${errorMessage(error)}`, { cause: error });
      }
    }

    const layout = buildReportLayout(model, { hasChart: image !== undefined });
    const writer = new PageWriter(doc, fonts);
    for (const section of layout.sections) {
      drawSection(writer, section, image);
    }

    const name = model.metadata.subjectName ?? 'User';
    const date = reportDate(model);
    doc.setTitle(`${layout.title} - ${name}`);
    doc.setAuthor(name);
    doc.setSubject(`Overall score: ${formatScore(model.overallScore)}`);
    doc.setKeywords(model.categories.map(c => `${c.id}=${formatScore(model.categoryScores[c.id] ?? c.score)}`));
    doc.setProducer(PRODUCER);
    doc.setCreator(`${PRODUCER} (${model.version})`);
    doc.setCreationDate(date);
    doc.setModificationDate(date);

    const bytes = await doc.save();
    return { bytes, pageCount: doc.getPageCount(), sections: sectionKinds(layout) };
  } catch (error) {
    if (error instanceof RenderError) throw error;
    throw new RenderError('pdf', `Failed to build PDF: ${errorMessage(error)}`, { cause: error });
  }
}

/**
 * Render the PDF report and publish it to `<outputDir>/<key>.pdf`. The chart
 * is optional; without it the document simply has no chart section.
 */
export const renderPdf: PdfRenderer = async (model, chart, outputDir, options = {}) => {
  const logger = options.logger ?? silentLogger;
  const { bytes, pageCount, sections } = await buildPdfDocument(model, chart);

  const key = options.key ?? deriveReportKey(model.metadata);
  const pdfPath = path.join(outputDir, `${key}.pdf`);

  try {
    await publishAtomic(pdfPath, bytes);
  } catch (error) {
    throw new RenderError('pdf', `Failed to write PDF to ${pdfPath}: ${errorMessage(error)}`, { cause: error });
  }

  logger.debug('PDF written', { path: pdfPath, bytes: bytes.length, pageCount, sections });

  return { path: pdfPath, bytes, pageCount, sections };
};
