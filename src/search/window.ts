/**
 * Alpha-beta search window.
 *
 * An interval [lo, hi] of payoffs that can still change the decision at the
 * root. Narrowing returns null instead of an inverted window; that null is
 * the cutoff signal.
 */
import { NegatablePayoffScale, PayoffScale, maxPayoff, minPayoff } from '../core/payoff';

export class SearchWindow<P> {
  private constructor(
    private readonly scale: PayoffScale<P>,
    readonly lo: P,
    readonly hi: P
  ) {}

  /**
   * Builds a window without checking lo <= hi.
   */
  static new<P>(scale: PayoffScale<P>, lo: P, hi: P): SearchWindow<P> {
    return new SearchWindow(scale, lo, hi);
  }

  /**
   * Builds a window, or returns null when lo > hi.
   */
  static tryNew<P>(scale: PayoffScale<P>, lo: P, hi: P): SearchWindow<P> | null {
    return scale.compare(lo, hi) <= 0 ? new SearchWindow(scale, lo, hi) : null;
  }

  static full<P>(scale: PayoffScale<P>): SearchWindow<P> {
    return new SearchWindow(scale, scale.min, scale.max);
  }

  isValid(): boolean {
    return this.scale.compare(this.lo, this.hi) <= 0;
  }

  contains(value: P): boolean {
    return this.scale.compare(this.lo, value) <= 0 && this.scale.compare(value, this.hi) <= 0;
  }

  /**
   * Maximizing side found `value`: lo = max(lo, value).
   */
  raiseLower(value: P): SearchWindow<P> | null {
    return SearchWindow.tryNew(this.scale, maxPayoff(this.scale, this.lo, value), this.hi);
  }

  /**
   * Minimizing side found `value`: hi = min(hi, value).
   */
  lowerUpper(value: P): SearchWindow<P> | null {
    return SearchWindow.tryNew(this.scale, this.lo, minPayoff(this.scale, this.hi, value));
  }

  /**
   * The same window seen from the other actor: [-hi, -lo].
   */
  negated(scale: NegatablePayoffScale<P>): SearchWindow<P> {
    return new SearchWindow(scale, scale.negate(this.hi), scale.negate(this.lo));
  }

  toString(): string {
    return `[${String(this.lo)}, ${String(this.hi)}]`;
  }
}
