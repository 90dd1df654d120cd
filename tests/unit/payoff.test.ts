import { describe, it, expect } from 'vitest';
import {
  NegatablePayoffScale,
  checkNegation,
  isNegatable,
  maxPayoff,
  minPayoff,
  numericScale,
  ordinalScale,
} from '../../src/core/payoff';
import { InvalidConfigError } from '../../src/core/errors';

describe('numericScale', () => {
  it('should default to the infinities', () => {
    const scale = numericScale();
    expect(scale.min).toBe(-Infinity);
    expect(scale.max).toBe(Infinity);
  });

  it('should order numbers', () => {
    const scale = numericScale();
    expect(scale.compare(1, 2)).toBe(-1);
    expect(scale.compare(2, 2)).toBe(0);
    expect(scale.compare(3, 2)).toBe(1);
  });

  it('should negate without producing negative zero', () => {
    const scale = numericScale();
    expect(scale.negate(4)).toBe(-4);
    expect(Object.is(scale.negate(0), 0)).toBe(true);
    expect(scale.negate(-Infinity)).toBe(Infinity);
  });

  it('should reject inverted or NaN bounds', () => {
    expect(() => numericScale({ min: 5, max: 1 })).toThrow(InvalidConfigError);
    expect(() => numericScale({ min: NaN })).toThrow('Invalid numeric payoff bounds: [NaN, Infinity]');
  });
});

describe('ordinalScale', () => {
  const scale = ordinalScale(['lose', 'behind', 'even', 'ahead', 'win']);

  it('should take its bounds from the ends of the list', () => {
    expect(scale.min).toBe('lose');
    expect(scale.max).toBe('win');
  });

  it('should order levels by position', () => {
    expect(scale.compare('behind', 'ahead')).toBeLessThan(0);
    expect(scale.compare('win', 'even')).toBeGreaterThan(0);
    expect(scale.compare('even', 'even')).toBe(0);
  });

  it('should mirror levels around the middle', () => {
    expect(scale.negate('win')).toBe('lose');
    expect(scale.negate('behind')).toBe('ahead');
    expect(scale.negate('even')).toBe('even');
  });

  it('should reject an empty list', () => {
    expect(() => ordinalScale([])).toThrow('An ordinal payoff scale needs at least one level');
  });

  it('should reject duplicate levels', () => {
    expect(() => ordinalScale(['low', 'high', 'low'])).toThrow('Duplicate payoff level: "low"');
  });

  it('should reject a level it does not know', () => {
    const loose = ordinalScale<string>(['low', 'high']);
    expect(() => loose.compare('low', 'middle')).toThrow(
      'Unknown payoff level: "middle". Valid levels: low, high'
    );
  });
});

describe('maxPayoff and minPayoff', () => {
  const scale = numericScale();

  it('should pick the larger and the smaller value', () => {
    expect(maxPayoff(scale, 2, 5)).toBe(5);
    expect(minPayoff(scale, 2, 5)).toBe(2);
  });

  it('should return the first argument on a tie', () => {
    const levels = ordinalScale(['a', 'b']);
    const tied = { min: 0, max: 1, compare: () => 0 };
    expect(maxPayoff(tied, 0, 1)).toBe(0);
    expect(minPayoff(tied, 1, 0)).toBe(1);
    expect(maxPayoff(levels, 'b', 'b')).toBe('b');
  });
});

describe('isNegatable', () => {
  it('should tell scales with negation apart', () => {
    expect(isNegatable(numericScale())).toBe(true);
    expect(isNegatable({ min: 0, max: 1, compare: (a: number, b: number) => a - b })).toBe(false);
  });
});

describe('checkNegation', () => {
  it('should accept the numeric scale', () => {
    expect(checkNegation(numericScale(), [-3, 0, 2, Infinity])).toEqual([]);
  });

  it('should accept an ordinal scale', () => {
    const scale = ordinalScale(['lose', 'draw', 'win']);
    expect(checkNegation(scale, ['lose', 'draw', 'win'])).toEqual([]);
  });

  it('should report a negation that is not its own inverse', () => {
    const halving: NegatablePayoffScale<number> = {
      ...numericScale(),
      negate: value => -value / 2,
    };
    expect(checkNegation(halving, [4])).toEqual([{ value: 4, law: 'involution' }]);
  });

  it('should report a negation that keeps the order', () => {
    const identity: NegatablePayoffScale<number> = {
      ...numericScale(),
      negate: value => value,
    };
    expect(checkNegation(identity, [1, 2])).toEqual([
      { value: 1, other: 2, law: 'order-reversal' },
      { value: 2, other: 1, law: 'order-reversal' },
    ]);
  });
});
