/*
 * Runs the population walk for every shift table under tables/ and writes a
 * CSV / SVG / HTML report per table into out/<table-name>/.
 * Usage: npm run simulate
 */
import fg from 'fast-glob';
import path from 'path';
import fs from 'fs-extra';
import { loadShiftTable } from '../src/shift/loader';
import Simulator from '../src/simulator';
import Reporter from '../src/reporter';
import { config } from '../src/config';

const TABLES_DIR = path.resolve('tables');
const OUT_DIR = path.resolve('out');

// Batch size of the reference run: 10k units walking 50 trials each
const UNIT_NUMBER = 10000;
const TRIAL_COUNT = 50;

async function main() {
  config.warnings = true;
  const tableFiles = await fg(['*.json'], { cwd: TABLES_DIR, absolute: true });
  if (!tableFiles.length) {
    console.error(`[simulate] No shift tables found in ${TABLES_DIR}`);
    process.exitCode = 1;
    return;
  }
  await fs.ensureDir(OUT_DIR);

  let failures = 0;
  for (const file of tableFiles.sort()) {
    const table = await loadShiftTable(file);
    const name = table.name ?? path.basename(file, '.json');
    const simulator = new Simulator({
      unitNumber: UNIT_NUMBER,
      trialCount: TRIAL_COUNT,
      shiftTable: table,
    });
    const result = simulator.simulate();
    console.log(
      `[simulate] ${name}: ${result.unitNumber} units × ${result.trialCount} trials in ${result.durationMs.toFixed(1)} ms (${result.histogram.size} positions)`
    );

    const reportStart = performance.now();
    try {
      const report = await new Reporter({
        outDir: path.join(OUT_DIR, name),
      }).report(result);
      console.log(
        `[simulate] ${name}: report written to ${path.relative(process.cwd(), report.htmlPath)} in ${(performance.now() - reportStart).toFixed(1)} ms`
      );
    } catch (e) {
      failures++;
      console.error(`[simulate] ${name}: report failed`, e);
    }
  }
  if (failures) process.exitCode = 1;
  console.log('[simulate] Complete.');
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
