import { formatCompact } from '../../shared/format';

export interface ChartPoint {
  readonly timestamp: Date;
  readonly value: number;
}

export interface LineChartOptions {
  readonly title: string;
  readonly width?: number;
  readonly height?: number;
}

const PAD = { top: 40, right: 24, bottom: 36, left: 72 } as const;

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/** Polyline coordinates for the points scaled into the plot area. */
export function plotPoints(
  values: readonly number[],
  width: number,
  height: number,
): string {
  const n = values.length;
  if (!n) return '';

  const min = Math.min(...values);
  const max = Math.max(...values);
  const range = Math.max(1e-12, max - min);
  const plotW = width - PAD.left - PAD.right;
  const plotH = height - PAD.top - PAD.bottom;
  const step = plotW / Math.max(1, n - 1);

  return values
    .map((v, i) => {
      const x = PAD.left + i * step;
      // flat series sit on the vertical middle
      const y = max === min ? PAD.top + plotH / 2 : PAD.top + plotH * (1 - (v - min) / range);
      return `${x.toFixed(2)},${y.toFixed(2)}`;
    })
    .join(' ');
}

function day(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function buildLineChartSvg(points: readonly ChartPoint[], options: LineChartOptions): string {
  const width = options.width ?? 640;
  const height = options.height ?? 320;
  const values = points.map((p) => p.value);
  const min = Math.min(...values);
  const max = Math.max(...values);
  const up = values[values.length - 1] >= values[0];
  const stroke = up ? '#16a34a' : '#dc2626';
  const bottom = height - PAD.bottom;

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
    `<rect width="100%" height="100%" fill="#ffffff"/>`,
    `<text x="${PAD.left}" y="24" font-family="sans-serif" font-size="16" fill="#111827">${escapeXml(options.title)}</text>`,
    `<line x1="${PAD.left}" y1="${PAD.top}" x2="${PAD.left}" y2="${bottom}" stroke="#9ca3af"/>`,
    `<line x1="${PAD.left}" y1="${bottom}" x2="${width - PAD.right}" y2="${bottom}" stroke="#9ca3af"/>`,
    `<text x="${PAD.left - 8}" y="${PAD.top + 4}" text-anchor="end" font-family="sans-serif" font-size="11" fill="#4b5563">${escapeXml(formatCompact(max))}</text>`,
    `<text x="${PAD.left - 8}" y="${bottom}" text-anchor="end" font-family="sans-serif" font-size="11" fill="#4b5563">${escapeXml(formatCompact(min))}</text>`,
    `<text x="${PAD.left}" y="${height - 12}" font-family="sans-serif" font-size="11" fill="#4b5563">${day(points[0].timestamp)}</text>`,
    `<text x="${width - PAD.right}" y="${height - 12}" text-anchor="end" font-family="sans-serif" font-size="11" fill="#4b5563">${day(points[points.length - 1].timestamp)}</text>`,
    `<polyline fill="none" stroke="${stroke}" stroke-width="2" stroke-linejoin="round" stroke-linecap="round" points="${plotPoints(values, width, height)}"/>`,
    `</svg>`,
  ].join('\n');
}
