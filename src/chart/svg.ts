import type { ScoreModel } from '../scoring/model.js';

export const CHART_WIDTH = 1000;
export const CHART_HEIGHT = 1000;

const CENTER_X = CHART_WIDTH / 2;
const CENTER_Y = 560;
const RADIUS = 320;
const RING_STEP = 10;
const MARKER_SIZE = 14;
const LABEL_LINE_CHARS = 16;
const LABEL_LINE_HEIGHT = 30;
const ACCENT = '#1aaf6c';
const GRID = '#9e9e9e';
const FONT = "DejaVu Sans, Helvetica, Arial, sans-serif";

export interface RadarPoint {
  id: string;
  label: string;
  value: number;
  angle: number; // radians, 0 = 12 o'clock, clockwise
  x: number;
  y: number;
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

export function formatScore(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(1);
}

function fmt(n: number): string {
  // Avoid "-0.00" so identical geometry always serialises identically
  const fixed = n.toFixed(2);
  return fixed === '-0.00' ? '0.00' : fixed;
}

function polar(angle: number, radius: number): { x: number; y: number } {
  return {
    x: CENTER_X + radius * Math.sin(angle),
    y: CENTER_Y - radius * Math.cos(angle),
  };
}

export function wrapLabel(label: string, maxChars = LABEL_LINE_CHARS): string[] {
  const lines: string[] = [];
  let current = '';
  for (const word of label.split(/\s+/).filter(w => w !== '')) {
    if (current !== '' && current.length + 1 + word.length > maxChars) {
      lines.push(current);
      current = word;
    } else {
      current = current === '' ? word : `${current} ${word}`;
    }
  }
  if (current !== '') lines.push(current);
  return lines;
}

function anchorFor(angle: number): 'start' | 'middle' | 'end' {
  const horizontal = Math.sin(angle);
  if (horizontal > 0.2) return 'start';
  if (horizontal < -0.2) return 'end';
  return 'middle';
}

/**
 * Spoke positions in canonical category order, first spoke at the top.
 */
export function radarPoints(model: ScoreModel): RadarPoint[] {
  const count = model.categories.length;
  return model.categories.map((category, i) => {
    const angle = (i / count) * 2 * Math.PI;
    const value = model.categoryScores[category.id] ?? category.score;
    const { x, y } = polar(angle, (value / 100) * RADIUS);
    return { id: category.id, label: category.label, value, angle, x, y };
  });
}

function ringPolygon(count: number, level: number): string {
  const points: string[] = [];
  for (let i = 0; i < count; i++) {
    const { x, y } = polar((i / count) * 2 * Math.PI, (level / 100) * RADIUS);
    points.push(`${fmt(x)},${fmt(y)}`);
  }
  return points.join(' ');
}

/**
 * Radar chart of the category scores with the overall score as headline.
 * Pure string building: the same model always yields the same document.
 */
export function buildChartSvg(model: ScoreModel): string {
  const points = radarPoints(model);
  const count = points.length;
  const parts: string[] = [];

  parts.push(
    `<svg xmlns="http://www.w3.org/2000/svg" width="${CHART_WIDTH}" height="${CHART_HEIGHT}" viewBox="0 0 ${CHART_WIDTH} ${CHART_HEIGHT}">`,
    `<rect x="0" y="0" width="${CHART_WIDTH}" height="${CHART_HEIGHT}" fill="#ffffff"/>`,
    `<text x="${CENTER_X}" y="70" font-family="${FONT}" font-size="40" text-anchor="middle" fill="#222222">Your Health Score</text>`,
    `<text x="${CENTER_X}" y="125" font-family="${FONT}" font-size="52" font-weight="bold" text-anchor="middle" fill="${ACCENT}" data-role="overall">${escapeXml(formatScore(model.overallScore))}</text>`
  );

  // Grid rings every 10 points
  parts.push('<g data-role="grid">');
  for (let level = RING_STEP; level <= 100; level += RING_STEP) {
    if (count >= 3) {
      parts.push(`<polygon points="${ringPolygon(count, level)}" fill="none" stroke="${GRID}" stroke-width="1" stroke-dasharray="6 4" stroke-opacity="0.6"/>`);
    } else {
      parts.push(`<circle cx="${CENTER_X}" cy="${CENTER_Y}" r="${fmt((level / 100) * RADIUS)}" fill="none" stroke="${GRID}" stroke-width="1" stroke-dasharray="6 4" stroke-opacity="0.6"/>`);
    }
    if (level % 20 === 0) {
      const { y } = polar(0, (level / 100) * RADIUS);
      parts.push(`<text x="${fmt(CENTER_X + 8)}" y="${fmt(y - 4)}" font-family="${FONT}" font-size="16" fill="${GRID}">${level}</text>`);
    }
  }
  for (const point of points) {
    const end = polar(point.angle, RADIUS);
    parts.push(`<line x1="${CENTER_X}" y1="${CENTER_Y}" x2="${fmt(end.x)}" y2="${fmt(end.y)}" stroke="${GRID}" stroke-width="1" stroke-dasharray="6 4" stroke-opacity="0.6"/>`);
  }
  parts.push('</g>');

  // Data polygon
  const polygon = points.map(p => `${fmt(p.x)},${fmt(p.y)}`).join(' ');
  parts.push(
    `<polygon data-role="scores" points="${polygon}" fill="${ACCENT}" fill-opacity="0.25" stroke="${ACCENT}" stroke-width="4" stroke-linejoin="round"/>`
  );

  for (const point of points) {
    const half = MARKER_SIZE / 2;
    parts.push(`<rect x="${fmt(point.x - half)}" y="${fmt(point.y - half)}" width="${MARKER_SIZE}" height="${MARKER_SIZE}" fill="${ACCENT}" stroke="#ffffff" stroke-width="2"/>`);

    const labelPos = polar(point.angle, (point.value / 100) * RADIUS + 30);
    parts.push(
      `<text data-role="value" data-category="${escapeXml(point.id)}" x="${fmt(labelPos.x)}" y="${fmt(labelPos.y + 8)}" font-family="${FONT}" font-size="24" font-weight="bold" text-anchor="${anchorFor(point.angle)}" fill="#222222">${Math.round(point.value)}</text>`
    );

    const namePos = polar(point.angle, RADIUS + 56);
    const lines = wrapLabel(point.label);
    // Labels below the centre grow downwards, the rest grow upwards
    const firstY = Math.cos(point.angle) < -0.2
      ? namePos.y + 8
      : namePos.y + 8 - (lines.length - 1) * LABEL_LINE_HEIGHT;
    const spans = lines
      .map((line, i) => `<tspan x="${fmt(namePos.x)}" y="${fmt(firstY + i * LABEL_LINE_HEIGHT)}">${escapeXml(line)}</tspan>`)
      .join('');
    parts.push(
      `<text data-role="category" data-category="${escapeXml(point.id)}" font-family="${FONT}" font-size="26" text-anchor="${anchorFor(point.angle)}" fill="#333333">${spans}</text>`
    );
  }

  parts.push('</svg>');
  return parts.join('\n');
}
