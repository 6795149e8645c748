import seedrandom from 'seedrandom';

/**
 * Seeded pseudo‑random generation for the simulator.
 *
 * `seedrandom` provides the ARC4-based generator with an exportable state
 * word, which is what makes snapshot / replay possible. Not cryptographically
 * secure; do not use for anything beyond simulation.
 */

/** Generator returned by `seedrandom` (callable, with `.state()`). */
export type SeededGenerator = seedrandom.StatefulPRNG<seedrandom.State.Arc4>;

/** Generator state captured by {@link SeededGenerator.state}. */
export type RNGState = seedrandom.State.Arc4;

/**
 * Create a state-tracking generator.
 *
 * @param seed Any string or number; omitted → autoseeded from local entropy.
 * @example
 * const a = createSeededGenerator(42);
 * const b = createSeededGenerator(42);
 * a() === b(); // true
 */
export function createSeededGenerator(seed?: string | number): SeededGenerator {
  return seedrandom(seed === undefined ? undefined : String(seed), {
    state: true,
  });
}

/**
 * Rebuild a generator that continues exactly where `state` was captured.
 *
 * @example
 * const gen = createSeededGenerator('replay');
 * const snap = gen.state();
 * const first = gen();
 * restoreSeededGenerator(snap)() === first; // true
 */
export function restoreSeededGenerator(state: RNGState): SeededGenerator {
  return seedrandom('', { state });
}
