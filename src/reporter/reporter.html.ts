import { marked } from 'marked';
import type { SimulationResult } from '../simulator/simulator.types';
import type { HistogramStats } from './reporter.stats';
import { escapeXml } from './reporter.chart';

/** Everything the HTML report shows. */
export interface ReportSummary {
  title: string;
  result: SimulationResult;
  stats: HistogramStats;
  /** Inline SVG chart (output of `renderChartSVG`). */
  svg: string;
  /** Smoothing radius applied before charting. */
  smoothingRadius: number;
}

/** Format a statistic for the summary tables: up to four decimals, trimmed. */
function num(value: number): string {
  return String(Number(value.toFixed(4)));
}

/**
 * Build the Markdown body of the report: run parameters and final-position
 * statistics as two tables. Caller-supplied text (title, table name) is
 * escaped since `marked` passes raw HTML through.
 */
export function buildReportMarkdown(summary: ReportSummary): string {
  const { result, stats } = summary;
  return [
    `# ${escapeXml(summary.title)}`,
    '',
    '| Parameter | Value |',
    '| --- | --- |',
    `| Shift table | ${result.tableName === undefined ? 'custom' : escapeXml(result.tableName)} |`,
    `| Units | ${result.unitNumber} |`,
    `| Trials | ${result.trialCount} |`,
    `| Start position | ${result.start} |`,
    `| Duration | ${num(result.durationMs)} ms |`,
    '',
    '## Final positions',
    '',
    '| Statistic | Value |',
    '| --- | --- |',
    `| Mean | ${num(stats.mean)} |`,
    `| Standard deviation | ${num(stats.std)} |`,
    `| Mode | ${stats.mode} |`,
    `| Range | ${stats.min} to ${stats.max} |`,
    '',
    `## Smoothed density (radius ${summary.smoothingRadius})`,
    '',
  ].join('\n');
}

/**
 * Render the full HTML report page: the Markdown summary converted with
 * `marked`, followed by the inline chart.
 */
export async function renderReportHTML(summary: ReportSummary): Promise<string> {
  const body = await marked.parse(buildReportMarkdown(summary));
  return `<!doctype html>
<html lang="en">
<head>
<meta charset="utf-8" />
<title>${escapeXml(summary.title)}</title>
<style>
body { font-family: system-ui, sans-serif; max-width: 720px; margin: 2rem auto; }
table { border-collapse: collapse; margin-bottom: 1rem; }
td, th { border: 1px solid #ccc; padding: 0.25rem 0.75rem; text-align: left; }
</style>
</head>
<body>
${body}
<figure class="chart">
${summary.svg}</figure>
</body>
</html>
`;
}
