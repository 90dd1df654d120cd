/**
 * Payoff scales.
 *
 * A scale gives the engine everything it needs to know about payoff values:
 * how to order them and which values bound them. Negamax additionally needs
 * an order-reversing negation.
 */
import { InvalidConfigError } from './errors';

export interface PayoffScale<P> {
  readonly min: P;
  readonly max: P;
  /** Negative when a < b, zero when equal, positive when a > b. */
  compare(a: P, b: P): number;
}

export interface NegatablePayoffScale<P> extends PayoffScale<P> {
  /** Must satisfy negate(negate(x)) == x and reverse the order. */
  negate(value: P): P;
}

export function isNegatable<P>(scale: PayoffScale<P>): scale is NegatablePayoffScale<P> {
  return 'negate' in scale && typeof scale.negate === 'function';
}

export function maxPayoff<P>(scale: PayoffScale<P>, a: P, b: P): P {
  return scale.compare(a, b) >= 0 ? a : b;
}

export function minPayoff<P>(scale: PayoffScale<P>, a: P, b: P): P {
  return scale.compare(a, b) <= 0 ? a : b;
}

/**
 * Plain numbers. The default bounds are the infinities, whose negations are
 * representable, so negamax cannot overflow on this scale.
 */
export function numericScale(
  bounds: { min?: number; max?: number } = {}
): NegatablePayoffScale<number> {
  const min = bounds.min ?? -Infinity;
  const max = bounds.max ?? Infinity;
  if (Number.isNaN(min) || Number.isNaN(max) || min > max) {
    throw new InvalidConfigError(`Invalid numeric payoff bounds: [${min}, ${max}]`);
  }

  return {
    min,
    max,
    compare: (a, b) => (a < b ? -1 : a > b ? 1 : 0),
    // -0 would compare equal but trip Object.is based assertions
    negate: (value) => (value === 0 ? 0 : -value),
  };
}

/**
 * Qualitative scale given as levels from worst to best, e.g.
 * ['lose', 'behind', 'even', 'ahead', 'win']. Negation mirrors a level
 * around the middle of the list.
 */
export function ordinalScale<L extends string>(levels: readonly L[]): NegatablePayoffScale<L> {
  if (levels.length === 0) {
    throw new InvalidConfigError('An ordinal payoff scale needs at least one level');
  }
  const rank = new Map<L, number>();
  levels.forEach((level, i) => {
    if (rank.has(level)) {
      throw new InvalidConfigError(`Duplicate payoff level: "${level}"`);
    }
    rank.set(level, i);
  });

  const rankOf = (level: L): number => {
    const r = rank.get(level);
    if (r === undefined) {
      throw new InvalidConfigError(
        `Unknown payoff level: "${level}". Valid levels: ${levels.join(', ')}`
      );
    }
    return r;
  };

  return {
    min: levels[0],
    max: levels[levels.length - 1],
    compare: (a, b) => rankOf(a) - rankOf(b),
    negate: (level) => levels[levels.length - 1 - rankOf(level)],
  };
}

export interface NegationFailure<P> {
  readonly value: P;
  readonly other?: P;
  readonly law: 'involution' | 'order-reversal';
}

/**
 * Checks negate(negate(x)) == x for every sample and that negation reverses
 * the order of every pair of samples.
 */
export function checkNegation<P>(
  scale: NegatablePayoffScale<P>,
  samples: readonly P[]
): NegationFailure<P>[] {
  const failures: NegationFailure<P>[] = [];

  for (const value of samples) {
    if (scale.compare(scale.negate(scale.negate(value)), value) !== 0) {
      failures.push({ value, law: 'involution' });
    }
  }

  for (const a of samples) {
    for (const b of samples) {
      const before = Math.sign(scale.compare(a, b));
      const after = Math.sign(scale.compare(scale.negate(a), scale.negate(b)));
      if (before !== -after) {
        failures.push({ value: a, other: b, law: 'order-reversal' });
      }
    }
  }

  return failures;
}
