import { coinTable, dieTable } from '../../src/shift/presets';

describe('presets', () => {
  it('coinTable splits the interval at 0.5', () => {
    // Act
    const coin = coinTable();
    // Assert
    expect(coin.name).toBe('coin');
    expect(coin.toJSON().entries).toEqual([
      [0.5, -1],
      [1, 1],
    ]);
  });

  it('dieTable gives each of six steps a sixth of the interval', () => {
    // Act
    const die = dieTable();
    // Assert
    expect(die.name).toBe('die');
    for (const step of [-3, -2, -1, 1, 2, 3])
      expect(die.probabilityOf(step)).toBeCloseTo(1 / 6, 12);
    expect(die.probabilityOf(0)).toBe(0);
  });

  it('returns a fresh table on every call', () => {
    // Act
    const first = coinTable();
    const second = coinTable();
    // Assert
    expect(first).not.toBe(second);
    expect(first.entries).toEqual(second.entries);
  });
});
