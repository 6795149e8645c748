import fs from 'fs-extra';

/**
 * CSV persistence for histograms.
 *
 * Format: one `<position>,<count>` line per entry, newline-terminated, no
 * header row, in the histogram's iteration order.
 */

/**
 * @example
 * formatHistogramCSV(new Map([[49, 2], [51, 1]])); // '49,2\n51,1\n'
 */
export function formatHistogramCSV(
  histogram: ReadonlyMap<number, number>
): string {
  let csv = '';
  for (const [position, count] of histogram) csv += `${position},${count}\n`;
  return csv;
}

/**
 * Write `histogram` as CSV to `file`, creating parent directories as needed.
 */
export async function persistHistogram(
  histogram: ReadonlyMap<number, number>,
  file: string
): Promise<void> {
  await fs.outputFile(file, formatHistogramCSV(histogram), 'utf8');
}
