import { NSECONDS_PER_SECOND } from '../constants/constants.js';
import { FormatError } from './error.js';

import type { IRational } from './types.js';

/**
 * Anything that can be understood as a framerate.
 *
 * `25` → 25/1, `'30000/1001'`, `'29.97'` → 2997/100, or an `IRational`.
 */
export type RationalLike = number | string | IRational;

const FRACTION_RE = /^\s*(\d+)\s*\/\s*(\d+)\s*$/;
const DECIMAL_RE = /^\s*(\d+)(?:\.(\d+))?\s*$/;

function gcd(a: number, b: number): number {
  while (b !== 0) {
    [a, b] = [b, a % b];
  }
  return a;
}

/**
 * Reduced, non-negative fraction.
 *
 * Caps may carry `0/1`, the variable framerate; {@link Rational.parse}
 * only yields positive rates, which are the ones timing can be computed from.
 *
 * @example
 * ```typescript
 * const fps = Rational.parse('60/2');
 * fps.toString();       // '30/1'
 * fps.frameDuration();  // 33333333n
 * ```
 */
export class Rational implements IRational {
  readonly num: number;
  readonly den: number;

  constructor(num: number, den = 1) {
    if (!Number.isSafeInteger(num) || !Number.isSafeInteger(den) || num < 0 || den <= 0) {
      throw new FormatError(`Invalid rational ${num}/${den}: expected a non-negative numerator and a positive denominator`);
    }
    const divisor = gcd(num, den);
    this.num = num / divisor;
    this.den = den / divisor;
  }

  /**
   * Parse a framerate value.
   *
   * @param value - Integer, decimal, `"num/den"` string or rational object
   *
   * @returns Reduced rational
   *
   * @throws {FormatError} If the value is malformed, zero or negative
   */
  static parse(value: RationalLike): Rational {
    const rational = Rational.parseAny(value);
    if (rational.isZero) {
      throw new FormatError(`Framerate must be positive, got ${rational.toString()}`);
    }
    return rational;
  }

  /**
   * Parse a caps fraction such as `30000/1001` or `0/1`.
   *
   * @throws {FormatError} If the text is not `num/den` or the denominator is zero
   */
  static parseFraction(text: string): Rational {
    const fraction = FRACTION_RE.exec(text);
    if (!fraction) {
      throw new FormatError(`Cannot parse fraction from '${text}'`);
    }
    return new Rational(Number(fraction[1]), Number(fraction[2]));
  }

  private static parseAny(value: RationalLike): Rational {
    if (typeof value === 'object') {
      return new Rational(value.num, value.den);
    }

    const text = typeof value === 'number' ? String(value) : value;
    if (FRACTION_RE.test(text)) {
      return Rational.parseFraction(text);
    }

    const decimal = DECIMAL_RE.exec(text);
    if (decimal) {
      const fractionDigits = decimal[2] ?? '';
      return new Rational(Number(decimal[1] + fractionDigits), 10 ** fractionDigits.length);
    }

    throw new FormatError(`Cannot parse rational from '${text}'`);
  }

  /**
   * Whether this is `0/1`, the variable framerate.
   */
  get isZero(): boolean {
    return this.num === 0;
  }

  /**
   * Duration of one frame in nanoseconds, rounded down.
   *
   * @throws {FormatError} If the rate is zero
   */
  frameDuration(): bigint {
    this.requireRate();
    return (NSECONDS_PER_SECOND * BigInt(this.den)) / BigInt(this.num);
  }

  /**
   * Presentation time of frame `index` in nanoseconds, rounded down.
   *
   * Computed from the index, never by summing `frameDuration()`.
   */
  timestampOf(index: bigint): bigint {
    this.requireRate();
    return (index * NSECONDS_PER_SECOND * BigInt(this.den)) / BigInt(this.num);
  }

  equals(other: IRational): boolean {
    return this.num * other.den === other.num * this.den;
  }

  toString(): string {
    return `${this.num}/${this.den}`;
  }

  private requireRate(): void {
    if (this.isZero) {
      throw new FormatError('A variable framerate (0/1) has no frame duration');
    }
  }
}
