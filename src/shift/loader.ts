import fs from 'fs-extra';
import path from 'path';
import { InvalidShiftTableError } from '../errors';
import { ShiftTable, type ShiftPair } from './shiftTable';

/**
 * JSON loading for shift tables.
 *
 * Two file shapes are accepted:
 *   { "name": "coin", "entries": [[0.5, -1], [1, 1]] }   // explicit pairs
 *   { "0.5": -1, "1": 1 }                                  // threshold record
 *
 * The explicit form is what {@link ShiftTable.toJSON} writes back.
 */

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toPair(value: unknown, index: number, source: string): ShiftPair {
  if (
    Array.isArray(value) &&
    value.length === 2 &&
    typeof value[0] === 'number' &&
    typeof value[1] === 'number'
  )
    return [value[0], value[1]];
  throw new InvalidShiftTableError(
    `${source}: entry ${index} must be a [threshold, step] pair of numbers`
  );
}

/**
 * Validate already-parsed JSON and build a {@link ShiftTable}.
 *
 * @param json Parsed file contents.
 * @param source Label used in error messages (usually the file path).
 * @param fallbackName Name used when the JSON does not carry one.
 */
export function parseShiftTable(
  json: unknown,
  source = 'shift table',
  fallbackName?: string
): ShiftTable {
  if (!isRecord(json))
    throw new InvalidShiftTableError(`${source}: expected a JSON object`);

  try {
    if ('entries' in json) {
      const entries: unknown = json.entries;
      if (!Array.isArray(entries))
        throw new InvalidShiftTableError(`${source}: "entries" must be an array`);
      if (json.name !== undefined && typeof json.name !== 'string')
        throw new InvalidShiftTableError(`${source}: "name" must be a string`);
      const name = typeof json.name === 'string' ? json.name : fallbackName;
      return ShiftTable.fromEntries(
        entries.map((entry: unknown, i: number) => toPair(entry, i, source)),
        name
      );
    }

    const record: Record<string, number> = {};
    for (const [key, step] of Object.entries(json)) {
      if (typeof step !== 'number')
        throw new InvalidShiftTableError(
          `${source}: step for threshold "${key}" must be a number`
        );
      record[key] = step;
    }
    return ShiftTable.fromRecord(record, fallbackName);
  } catch (err) {
    if (err instanceof InvalidShiftTableError && !err.message.startsWith(source))
      throw new InvalidShiftTableError(`${source}: ${err.message}`);
    throw err;
  }
}

/**
 * Read and validate a shift table JSON file. The table is named after the
 * file (without extension) unless the JSON carries a `name`.
 *
 * @throws InvalidShiftTableError when the file is not JSON or not a valid table.
 */
export async function loadShiftTable(file: string): Promise<ShiftTable> {
  let json: unknown;
  try {
    json = await fs.readJson(file);
  } catch (err) {
    // fs-extra already prefixes parse errors with the file path
    if (err instanceof Error && err.name === 'SyntaxError')
      throw new InvalidShiftTableError(
        err.message.startsWith(file) ? err.message : `${file}: ${err.message}`
      );
    throw err;
  }
  return parseShiftTable(json, file, path.basename(file, path.extname(file)));
}
