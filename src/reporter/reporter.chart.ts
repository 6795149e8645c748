import fs from 'fs-extra';

/**
 * Minimal SVG line-chart rendering for position → value mappings.
 *
 * The chart is a single `<polyline>` over the plot area with x = position and
 * y = value, the y axis starting at 0. Markup is built as a string so the
 * renderer has no DOM or canvas requirement and its output can be asserted
 * directly in tests.
 */

/** Layout and labelling of a rendered chart. */
export interface ChartOptions {
  /** Total SVG width in px. Default: 640. */
  width?: number;
  /** Total SVG height in px. Default: 400. */
  height?: number;
  /** Blank border around the plot area in px. Default: 40. */
  margin?: number;
  /** Text placed in the SVG `<title>` and above the plot. */
  title?: string;
  /** Line colour. Default: '#1f77b4'. */
  stroke?: string;
}

const DEFAULT_CHART: Required<Omit<ChartOptions, 'title'>> = {
  width: 640,
  height: 400,
  margin: 40,
  stroke: '#1f77b4',
};

/** Format a coordinate with at most two decimals and no trailing zeros. */
function fmt(n: number): string {
  return String(Number(n.toFixed(2)));
}

/** Escape the characters that would otherwise open markup in SVG or HTML text. */
export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/**
 * Project each (position, value) pair into SVG pixel coordinates, sorted by
 * position. A single position sits in the horizontal centre; an all-zero
 * mapping lies on the x axis.
 *
 * @example
 * chartPoints(new Map([[0, 0], [10, 1]])); // [[40, 360], [600, 40]]
 */
export function chartPoints(
  mapping: ReadonlyMap<number, number>,
  options: ChartOptions = {}
): Array<[number, number]> {
  const { width, height, margin } = { ...DEFAULT_CHART, ...options };
  const plotWidth = width - 2 * margin;
  const plotHeight = height - 2 * margin;
  const entries = [...mapping].sort((a, b) => a[0] - b[0]);
  if (!entries.length) return [];

  const minX = entries[0][0];
  const maxX = entries[entries.length - 1][0];
  const maxY = Math.max(0, ...entries.map(([, y]) => y));

  return entries.map(([x, y]): [number, number] => [
    maxX === minX
      ? margin + plotWidth / 2
      : margin + ((x - minX) / (maxX - minX)) * plotWidth,
    maxY === 0 ? height - margin : height - margin - (y / maxY) * plotHeight,
  ]);
}

/**
 * Render `mapping` as a standalone SVG document: axes, the value curve,
 * labels for the lowest and highest position and one for the peak value.
 * An empty mapping renders axes only.
 */
export function renderChartSVG(
  mapping: ReadonlyMap<number, number>,
  options: ChartOptions = {}
): string {
  const { width, height, margin, stroke } = { ...DEFAULT_CHART, ...options };
  const bottom = height - margin;
  const right = width - margin;
  const lines: string[] = [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
  ];
  if (options.title) {
    const title = escapeXml(options.title);
    lines.push(`  <title>${title}</title>`);
    lines.push(
      `  <text x="${fmt(width / 2)}" y="${fmt(margin / 2)}" text-anchor="middle" font-size="14">${title}</text>`
    );
  }
  lines.push(
    `  <line class="axis-x" x1="${margin}" y1="${bottom}" x2="${right}" y2="${bottom}" stroke="#333"/>`,
    `  <line class="axis-y" x1="${margin}" y1="${margin}" x2="${margin}" y2="${bottom}" stroke="#333"/>`
  );

  const points = chartPoints(mapping, options);
  if (points.length) {
    const keys = [...mapping.keys()];
    const minX = Math.min(...keys);
    const maxX = Math.max(...keys);
    const maxY = Math.max(0, ...mapping.values());
    lines.push(
      `  <polyline fill="none" stroke="${escapeXml(stroke)}" stroke-width="2" points="${points
        .map(([x, y]) => `${fmt(x)},${fmt(y)}`)
        .join(' ')}"/>`,
      `  <text class="tick-x-min" x="${margin}" y="${bottom + 16}" text-anchor="middle" font-size="11">${minX}</text>`,
      `  <text class="tick-x-max" x="${right}" y="${bottom + 16}" text-anchor="middle" font-size="11">${maxX}</text>`,
      `  <text class="tick-y-max" x="${margin - 4}" y="${margin}" text-anchor="end" font-size="11">${Number(
        maxY.toPrecision(3)
      )}</text>`
    );
  }
  lines.push('</svg>');
  return lines.join('\n') + '\n';
}

/**
 * Render and write the chart to `file` (parent directories are created).
 */
export async function renderChart(
  mapping: ReadonlyMap<number, number>,
  file: string,
  options: ChartOptions = {}
): Promise<void> {
  await fs.outputFile(file, renderChartSVG(mapping, options), 'utf8');
}
