import fs from 'fs-extra';
import path from 'path';
import { normalize } from './reporter/reporter.normalize';
import { smooth } from './reporter/reporter.smooth';
import { histogramStats, type HistogramStats } from './reporter/reporter.stats';
import { persistHistogram } from './reporter/reporter.csv';
import { renderChartSVG, type ChartOptions } from './reporter/reporter.chart';
import { renderReportHTML } from './reporter/reporter.html';
import { DEFAULT_SMOOTHING_RADIUS } from './simulator/simulator.constants';
import type { Density, SimulationResult } from './simulator/simulator.types';

/** Where and how a {@link Reporter} writes its artifacts. */
export interface ReporterOptions {
  /** Directory receiving the CSV, SVG and HTML files (created when missing). */
  outDir: string;
  /** File name stem shared by the three artifacts. Default: 'distribution'. */
  basename?: string;
  /** Neighbours either side averaged before charting. Default: 3. */
  smoothingRadius?: number;
  /** Chart layout overrides. */
  chart?: ChartOptions;
}

/** Paths and derived data produced by {@link Reporter.report}. */
export interface ReportOutput {
  csvPath: string;
  svgPath: string;
  htmlPath: string;
  density: Density;
  smoothed: Density;
  stats: HistogramStats;
}

/**
 * Post-processing for a simulation result: normalize, smooth, then persist
 * the raw histogram as CSV and render the smoothed density as an SVG chart
 * and an HTML summary page.
 *
 * @example
 * const reporter = new Reporter({ outDir: 'out/coin' });
 * const { htmlPath } = await reporter.report(simulator.simulate());
 */
export default class Reporter {
  readonly outDir: string;
  readonly basename: string;
  readonly smoothingRadius: number;
  readonly chart: ChartOptions;

  constructor(options: ReporterOptions) {
    this.outDir = options.outDir;
    this.basename = options.basename ?? 'distribution';
    this.smoothingRadius = options.smoothingRadius ?? DEFAULT_SMOOTHING_RADIUS;
    this.chart = { ...options.chart };
    if (!Number.isSafeInteger(this.smoothingRadius) || this.smoothingRadius < 0)
      throw new RangeError(
        `smoothingRadius must be a non-negative integer (got ${this.smoothingRadius})`
      );
  }

  /** Counts → density summing to 1. */
  normalize(histogram: ReadonlyMap<number, number>): Density {
    return normalize(histogram);
  }

  /** Neighbour-average `density` with this reporter's radius unless overridden. */
  smooth(
    density: ReadonlyMap<number, number>,
    radius: number = this.smoothingRadius
  ): Density {
    return smooth(density, radius);
  }

  /**
   * Write `<basename>.csv`, `<basename>.svg` and `<basename>.html` into
   * `outDir`.
   *
   * The CSV only needs the raw histogram and is written first; an empty
   * histogram then rejects with `EmptyHistogramError` before any chart or page
   * is produced.
   */
  async report(result: SimulationResult): Promise<ReportOutput> {
    const csvPath = path.join(this.outDir, `${this.basename}.csv`);
    const svgPath = path.join(this.outDir, `${this.basename}.svg`);
    const htmlPath = path.join(this.outDir, `${this.basename}.html`);

    await fs.ensureDir(this.outDir);
    await persistHistogram(result.histogram, csvPath);

    const density = this.normalize(result.histogram);
    const smoothed = this.smooth(density);
    const stats = histogramStats(result.histogram);

    const title = `${result.tableName ?? 'Population'} walk: ${result.unitNumber} units × ${result.trialCount} trials`;
    const svg = renderChartSVG(smoothed, { title, ...this.chart });
    const html = await renderReportHTML({
      title,
      result,
      stats,
      svg,
      smoothingRadius: this.smoothingRadius,
    });

    await Promise.all([
      fs.outputFile(svgPath, svg, 'utf8'),
      fs.outputFile(htmlPath, html, 'utf8'),
    ]);

    return { csvPath, svgPath, htmlPath, density, smoothed, stats };
  }
}

