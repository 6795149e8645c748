/**
 * Public entry point.
 *
 * @example
 * import { Simulator, Reporter, dieTable } from 'shiftwalk';
 * const result = new Simulator({ shiftTable: dieTable(), seed: 1 }).simulate();
 * await new Reporter({ outDir: 'out' }).report(result);
 */
export { config } from './config';
export type { ShiftwalkConfig } from './config';
export {
  EmptyHistogramError,
  InvalidShiftTableError,
  LookupFailure,
} from './errors';
export { ShiftTable, midpoint } from './shift/shiftTable';
export type { ShiftEntry, ShiftPair, ShiftTableJSON } from './shift/shiftTable';
export { coinTable, dieTable } from './shift/presets';
export { loadShiftTable, parseShiftTable } from './shift/loader';
export { default as Simulator } from './simulator';
export { runPopulation } from './simulator/simulator.run';
export type { TrialObserver } from './simulator/simulator.run';
export { tallyPositions, totalCount } from './simulator/simulator.histogram';
export type {
  Density,
  Histogram,
  RandomSource,
  SimulationResult,
  SimulatorOptions,
  TelemetryEntry,
  TelemetryOptions,
} from './simulator/simulator.types';
export type { RNGState } from './simulator/simulator.rng';
export { default as Reporter } from './reporter';
export type { ReportOutput, ReporterOptions } from './reporter';
export { normalize } from './reporter/reporter.normalize';
export { smooth } from './reporter/reporter.smooth';
export { histogramStats, valueVariance } from './reporter/reporter.stats';
export type { HistogramStats } from './reporter/reporter.stats';
export { formatHistogramCSV, persistHistogram } from './reporter/reporter.csv';
export { renderChart, renderChartSVG } from './reporter/reporter.chart';
export type { ChartOptions } from './reporter/reporter.chart';
export { renderReportHTML } from './reporter/reporter.html';
export { warnOnce } from './utils/warnings';
