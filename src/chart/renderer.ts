import * as path from 'node:path';
import sharp from 'sharp';
import { errorMessage, RenderError } from '../errors.js';
import { publishAtomic } from '../fs/atomic.js';
import { silentLogger, type LoggerLike } from '../observability/logger.js';
import { deriveReportKey } from '../scoring/key.js';
import { checkScoreModel, type ScoreModel } from '../scoring/model.js';
import { buildChartSvg, CHART_HEIGHT, CHART_WIDTH } from './svg.js';

export interface ChartResult {
  path: string;
  bytes: Buffer;
  width: number;
  height: number;
}

export interface RenderChartOptions {
  key?: string; // file stem, defaults to the key derived from the model metadata
  logger?: LoggerLike;
}

export type ChartRenderer = (model: ScoreModel, outputDir: string, options?: RenderChartOptions) => Promise<ChartResult>;

/**
 * Rasterize the radar chart SVG to PNG bytes without touching the disk.
 */
export async function rasterizeChart(model: ScoreModel): Promise<Buffer> {
  const svg = buildChartSvg(model);
  try {
    return await sharp(Buffer.from(svg, 'utf-8'), { density: 72 })
      .resize(CHART_WIDTH, CHART_HEIGHT, { fit: 'fill' })
      .flatten({ background: '#ffffff' })
      .png({ compressionLevel: 9, adaptiveFiltering: false })
      .toBuffer();
  } catch (error) {
    throw new RenderError('chart', `Failed to rasterize chart: ${errorMessage(error)}`, { cause: error });
  }
}

/**
 * Render the chart for a score model and publish it to `<outputDir>/<key>.png`.
 */
export const renderChart: ChartRenderer = async (model, outputDir, options = {}) => {
  const logger = options.logger ?? silentLogger;

  if (Object.keys(model.categoryScores).length === 0) {
    throw new RenderError('chart', 'Nothing to plot: categoryScores is empty');
  }
  const problems = checkScoreModel(model);
  if (problems.length > 0) {
    throw new RenderError('chart', `Malformed score model: ${problems.join('; ')}`);
  }

  const key = options.key ?? deriveReportKey(model.metadata);
  const chartPath = path.join(outputDir, `${key}.png`);
  const bytes = await rasterizeChart(model);

  try {
    await publishAtomic(chartPath, bytes);
  } catch (error) {
    throw new RenderError('chart', `Failed to write chart to ${chartPath}: ${errorMessage(error)}`, { cause: error });
  }

  logger.debug('Chart written', { path: chartPath, bytes: bytes.length });

  return { path: chartPath, bytes, width: CHART_WIDTH, height: CHART_HEIGHT };
};
