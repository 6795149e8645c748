import { ShiftTable, midpoint } from '../../src/shift/shiftTable';
import { coinTable, dieTable } from '../../src/shift/presets';
import { InvalidShiftTableError, LookupFailure } from '../../src/errors';

describe('ShiftTable', () => {
  describe('lookup', () => {
    describe('when the table covers the unit interval', () => {
      it('returns the step of the first threshold above x', () => {
        // Arrange
        const coin = coinTable();
        // Act
        const below = coin.lookup(0.3);
        const above = coin.lookup(0.7);
        // Assert
        expect([below, above]).toEqual([-1, 1]);
      });

      it('sends a draw equal to a threshold to the next slice', () => {
        // Arrange
        const coin = coinTable();
        // Act
        const step = coin.lookup(0.5);
        // Assert
        expect(step).toBe(1);
      });

      it('resolves both ends of the unit interval', () => {
        // Arrange
        const coin = coinTable();
        // Act
        const low = coin.lookup(0);
        const high = coin.lookup(1);
        // Assert
        expect([low, high]).toEqual([-1, 1]);
      });

      it('never fails across a grid of draws on the die table', () => {
        // Arrange
        const die = dieTable();
        const steps = [-3, -2, -1, 1, 2, 3];
        // Act
        const resolved: number[] = [];
        const expected: number[] = [];
        for (let k = 0; k <= 100; k++) {
          const x = k / 100;
          resolved.push(die.lookup(x));
          expected.push(steps[Math.min(Math.floor(x * 6), 5)]);
        }
        // Assert
        expect(resolved).toEqual(expected);
      });
    });

    describe('when the table stops short of 1', () => {
      it('fails with LookupFailure above the last threshold', () => {
        // Arrange
        const partial = ShiftTable.fromEntries([
          [0.5, -1],
          [0.9, 1],
        ]);
        // Act
        const act = () => partial.lookup(0.95);
        // Assert
        expect(act).toThrow(LookupFailure);
      });

      it('carries the draw and the coverage on the error', () => {
        // Arrange
        const partial = ShiftTable.fromEntries([
          [0.5, -1],
          [0.9, 1],
        ]);
        // Act
        let caught: unknown;
        try {
          partial.lookup(0.95);
        } catch (err) {
          caught = err;
        }
        // Assert
        expect(caught).toBeInstanceOf(LookupFailure);
        expect(caught).toMatchObject({
          name: 'LookupFailure',
          x: 0.95,
          coverage: 0.9,
          message: 'No shift threshold exceeds x=0.95 (table covers up to 0.9)',
        });
      });

      it('fails on the last threshold itself and on 1', () => {
        // Arrange
        const partial = ShiftTable.fromEntries([[0.9, 1]]);
        // Act & Assert
        expect(() => partial.lookup(0.9)).toThrow(LookupFailure);
        expect(() => partial.lookup(1)).toThrow(LookupFailure);
      });
    });

    describe('when x is outside the unit interval', () => {
      it.each([-0.1, Number.NaN, 1.5])('rejects %p', (x) => {
        // Arrange
        const coin = coinTable();
        // Act & Assert
        expect(() => coin.lookup(x)).toThrow(LookupFailure);
      });
    });
  });

  describe('construction', () => {
    it('sorts entries by ascending threshold', () => {
      // Arrange
      const pairs = [
        [1, 1],
        [0.5, -1],
      ] as const;
      // Act
      const table = ShiftTable.fromEntries(pairs);
      // Assert
      expect(table.entries).toEqual([
        { threshold: 0.5, step: -1 },
        { threshold: 1, step: 1 },
      ]);
      expect(table.lookup(0.3)).toBe(-1);
    });

    it('builds the same table from a threshold record', () => {
      // Arrange
      const record = { '0.5': -1, '1': 1 };
      // Act
      const table = ShiftTable.fromRecord(record);
      // Assert
      expect(table.entries).toEqual(coinTable().entries);
    });

    it('freezes the table and its entries', () => {
      // Arrange
      const table = coinTable();
      // Act & Assert
      expect(Object.isFrozen(table)).toBe(true);
      expect(Object.isFrozen(table.entries)).toBe(true);
      expect(Object.isFrozen(table.entries[0])).toBe(true);
    });

    it('rejects an empty table', () => {
      expect(() => new ShiftTable([])).toThrow(InvalidShiftTableError);
    });

    it.each([0, -0.2, 1.5, Number.NaN, Number.POSITIVE_INFINITY])(
      'rejects threshold %p',
      (threshold) => {
        expect(() => ShiftTable.fromEntries([[threshold, 1]])).toThrow(
          InvalidShiftTableError
        );
      }
    );

    it('rejects duplicate thresholds', () => {
      // Act
      const act = () =>
        ShiftTable.fromEntries([
          [0.5, -1],
          [0.5, 1],
          [1, 2],
        ]);
      // Assert
      expect(act).toThrow('Duplicate threshold 0.5');
    });

    it('rejects non-integer steps', () => {
      expect(() => ShiftTable.fromEntries([[1, 0.5]])).toThrow(
        'Step 0.5 at threshold 1 is not an integer'
      );
    });

    it('rejects record keys that are not numbers', () => {
      expect(() => ShiftTable.fromRecord({ half: -1, '1': 1 })).toThrow(
        'Threshold key "half" is not a number'
      );
      expect(() => ShiftTable.fromRecord({ '': 1 })).toThrow(
        InvalidShiftTableError
      );
    });
  });

  describe('uniform', () => {
    it('reproduces the six-faced table thresholds', () => {
      // Act
      const table = ShiftTable.uniform([-3, -2, -1, 1, 2, 3]);
      // Assert
      expect(table.entries.map((e) => e.threshold)).toEqual([
        1 / 6,
        2 / 6,
        3 / 6,
        4 / 6,
        5 / 6,
        1,
      ]);
      expect(table.entries.map((e) => e.step)).toEqual([-3, -2, -1, 1, 2, 3]);
    });

    it('rejects an empty step list', () => {
      expect(() => ShiftTable.uniform([])).toThrow(InvalidShiftTableError);
    });
  });

  describe('accessors', () => {
    it('reports size, coverage and step bounds', () => {
      // Arrange
      const die = dieTable();
      // Act & Assert
      expect(die.size).toBe(6);
      expect(die.coverage).toBe(1);
      expect(die.covers()).toBe(true);
      expect(die.maxStep).toBe(3);
      expect(die.minStep).toBe(-3);
    });

    it('reports a coverage gap', () => {
      // Arrange
      const partial = ShiftTable.fromEntries([[0.9, 1]]);
      // Act & Assert
      expect(partial.coverage).toBe(0.9);
      expect(partial.covers()).toBe(false);
    });

    it('sums slice widths per step', () => {
      // Arrange
      const table = ShiftTable.fromEntries([
        [0.25, -1],
        [0.5, 1],
        [0.75, -1],
        [1, 1],
      ]);
      // Act & Assert
      expect(table.probabilityOf(-1)).toBe(0.5);
      expect(table.probabilityOf(1)).toBe(0.5);
      expect(table.probabilityOf(7)).toBe(0);
    });

    it('computes the expected step', () => {
      // Arrange
      const drift = ShiftTable.fromRecord({ '0.2': -1, '0.5': 0, '1': 1 });
      // Act & Assert
      expect(coinTable().expectedStep()).toBe(0);
      expect(dieTable().expectedStep()).toBeCloseTo(0, 12);
      expect(drift.expectedStep()).toBeCloseTo(0.3, 12);
    });

    it('serializes to the JSON table format', () => {
      expect(coinTable().toJSON()).toEqual({
        name: 'coin',
        entries: [
          [0.5, -1],
          [1, 1],
        ],
      });
      expect(ShiftTable.fromEntries([[1, 2]]).toJSON()).toEqual({
        entries: [[1, 2]],
      });
    });
  });
});

describe('midpoint', () => {
  it('centres 100 coin trials at 50', () => {
    expect(midpoint(100, coinTable())).toBe(50);
  });

  it('rounds exact halves to the even neighbour', () => {
    expect(midpoint(5, coinTable())).toBe(2);
    expect(midpoint(7, coinTable())).toBe(4);
    expect(midpoint(1, coinTable())).toBe(0);
  });

  it('scales with the largest step', () => {
    expect(midpoint(50, dieTable())).toBe(75);
  });

  it('is zero without trials', () => {
    expect(midpoint(0, dieTable())).toBe(0);
  });

  it('follows a negative largest step', () => {
    // Arrange
    const leftward = ShiftTable.fromEntries([[1, -2]]);
    // Act & Assert
    expect(midpoint(3, leftward)).toBe(-3);
  });
});
