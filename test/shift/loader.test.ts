import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { loadShiftTable, parseShiftTable } from '../../src/shift/loader';
import { coinTable, dieTable } from '../../src/shift/presets';
import { InvalidShiftTableError } from '../../src/errors';

const TABLES_DIR = path.resolve(__dirname, '../../tables');

describe('parseShiftTable', () => {
  it('accepts the explicit entries form', () => {
    // Arrange
    const json = { name: 'coin', entries: [[1, 1], [0.5, -1]] };
    // Act
    const table = parseShiftTable(json);
    // Assert
    expect(table.name).toBe('coin');
    expect(table.entries).toEqual(coinTable().entries);
  });

  it('accepts the threshold record form and uses the fallback name', () => {
    // Act
    const table = parseShiftTable({ '0.5': -1, '1': 1 }, 'inline', 'fallback');
    // Assert
    expect(table.name).toBe('fallback');
    expect(table.lookup(0.25)).toBe(-1);
  });

  it('prefers the name carried by the JSON over the fallback', () => {
    // Act
    const table = parseShiftTable({ name: 'own', entries: [[1, 2]] }, 'x', 'file');
    // Assert
    expect(table.name).toBe('own');
  });

  it.each([
    [null, 'src: expected a JSON object'],
    [[[1, 1]], 'src: expected a JSON object'],
    [{ entries: 'nope' }, 'src: "entries" must be an array'],
    [{ name: 3, entries: [[1, 1]] }, 'src: "name" must be a string'],
    [{ entries: [[1, 1], [0.5]] }, 'src: entry 1 must be a [threshold, step] pair of numbers'],
    [{ '0.5': 'left', '1': 1 }, 'src: step for threshold "0.5" must be a number'],
    [{ entries: [[1.5, 1]] }, 'src: Threshold 1.5 is outside the interval (0, 1]'],
    [{ entries: [] }, 'src: A shift table needs at least one entry'],
  ])('rejects %j', (json, message) => {
    // Act
    const act = () => parseShiftTable(json, 'src');
    // Assert
    expect(act).toThrow(InvalidShiftTableError);
    expect(act).toThrow(message);
  });
});

describe('loadShiftTable', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'shiftwalk-tables-'));
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('loads the bundled coin table', async () => {
    // Act
    const table = await loadShiftTable(path.join(TABLES_DIR, 'coin.json'));
    // Assert
    expect(table.toJSON()).toEqual(coinTable().toJSON());
  });

  it('loads the bundled die table', async () => {
    // Act
    const table = await loadShiftTable(path.join(TABLES_DIR, 'die.json'));
    // Assert
    expect(table.toJSON()).toEqual(dieTable().toJSON());
  });

  it('names a record-form table after its file', async () => {
    // Act
    const table = await loadShiftTable(path.join(TABLES_DIR, 'drift.json'));
    // Assert
    expect(table.name).toBe('drift');
    expect(table.entries.map((e) => e.step)).toEqual([-1, 0, 1]);
  });

  it('names the offending file in validation errors', async () => {
    // Arrange
    const file = path.join(dir, 'broken.json');
    await fs.writeJson(file, { entries: [[0.5, -1], [0.5, 1]] });
    // Act
    const pending = loadShiftTable(file);
    // Assert
    await expect(pending).rejects.toThrow(`${file}: Duplicate threshold 0.5`);
  });

  it('rejects a file that is not JSON with InvalidShiftTableError', async () => {
    // Arrange
    const file = path.join(dir, 'garbage.json');
    await fs.outputFile(file, '{ not json');
    // Act
    const pending = loadShiftTable(file);
    // Assert
    await expect(pending).rejects.toBeInstanceOf(InvalidShiftTableError);
    await expect(loadShiftTable(file)).rejects.toThrow(`${file}: `);
  });

  it('passes through a missing file error', async () => {
    // Act
    const pending = loadShiftTable(path.join(dir, 'absent.json'));
    // Assert
    await expect(pending).rejects.toMatchObject({ code: 'ENOENT' });
  });
});
