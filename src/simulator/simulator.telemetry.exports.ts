/**
 * Telemetry export helpers.
 *
 * Serialize the per-trial telemetry buffer of a simulator into common
 * data-export formats (JSONL and CSV). The functions operate against `this`
 * so they can be attached to instances.
 */
import { DEFAULT_TELEMETRY_EXPORT_ENTRIES } from './simulator.constants';
import type { SimulatorLike, TelemetryEntry } from './simulator.types';

/**
 * Serialize the telemetry buffer to JSON Lines: one JSON object per line.
 *
 * @example
 * const jsonl = simulator.exportTelemetryJSONL();
 * jsonl.split('\n').map((line) => JSON.parse(line));
 */
export function exportTelemetryJSONL(this: SimulatorLike): string {
  return this._telemetry.map((entry) => JSON.stringify(entry)).join('\n');
}

/** Column order for CSV exports; matches {@link TelemetryEntry}. */
const TELEMETRY_HEADERS: readonly (keyof TelemetryEntry)[] = [
  'trial',
  'mean',
  'min',
  'max',
];

/**
 * Export the most recent telemetry entries as CSV (header row + one row per
 * entry). Returns an empty string when nothing was recorded.
 *
 * @param maxEntries Maximum number of most recent entries to include.
 */
export function exportTelemetryCSV(
  this: SimulatorLike,
  maxEntries = DEFAULT_TELEMETRY_EXPORT_ENTRIES
): string {
  if (maxEntries <= 0) return '';
  const recent = this._telemetry.slice(-maxEntries);
  if (!recent.length) return '';

  const lines: string[] = [TELEMETRY_HEADERS.join(',')];
  for (const entry of recent) {
    lines.push(
      TELEMETRY_HEADERS.map((header) => JSON.stringify(entry[header])).join(',')
    );
  }
  return lines.join('\n');
}
