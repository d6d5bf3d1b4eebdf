import assert from 'node:assert';
import { describe, it } from 'node:test';

import { FormatError } from '../src/lib/error.js';
import { Rational } from '../src/lib/rational.js';

describe('Rational', () => {
  describe('parse', () => {
    it('should parse integers as n/1', () => {
      const rate = Rational.parse(25);
      assert.strictEqual(rate.num, 25);
      assert.strictEqual(rate.den, 1);
    });

    it('should parse and reduce fraction strings', () => {
      assert.strictEqual(Rational.parse('60/2').toString(), '30/1');
      assert.strictEqual(Rational.parse(' 30000 / 1001 ').toString(), '30000/1001');
    });

    it('should parse integer and decimal strings', () => {
      assert.strictEqual(Rational.parse('25').toString(), '25/1');
      assert.strictEqual(Rational.parse('29.97').toString(), '2997/100');
      assert.strictEqual(Rational.parse('12.5').toString(), '25/2');
    });

    it('should accept rational objects', () => {
      assert.strictEqual(Rational.parse({ num: 50, den: 2 }).toString(), '25/1');
    });

    it('should reject malformed, zero and negative values', () => {
      for (const value of ['abc', '10/', '/3', '1/0', '0/1', '-5', '', 0, -1]) {
        assert.throws(() => Rational.parse(value), FormatError, `value ${String(value)}`);
      }
      assert.throws(() => Rational.parse({ num: 0, den: 1 }), FormatError);
    });
  });

  describe('parseFraction', () => {
    it('should accept the variable rate 0/1', () => {
      const rate = Rational.parseFraction('0/1');
      assert.strictEqual(rate.isZero, true);
      assert.strictEqual(rate.toString(), '0/1');
      assert.strictEqual(Rational.parseFraction('0/25').toString(), '0/1');
      assert.strictEqual(Rational.parseFraction('60/2').isZero, false);
    });

    it('should reject zero denominators and anything but num/den', () => {
      for (const text of ['1/0', '0/0', '25', '29.97', '-1/2']) {
        assert.throws(() => Rational.parseFraction(text), FormatError, text);
      }
    });

    it('should refuse timing for the variable rate', () => {
      const rate = Rational.parseFraction('0/1');
      assert.throws(() => rate.frameDuration(), FormatError);
      assert.throws(() => rate.timestampOf(1n), FormatError);
    });
  });

  describe('timing', () => {
    it('should compute frame durations in nanoseconds, rounded down', () => {
      assert.strictEqual(new Rational(10).frameDuration(), 100_000_000n);
      assert.strictEqual(new Rational(30).frameDuration(), 33_333_333n);
      assert.strictEqual(new Rational(30000, 1001).frameDuration(), 33_366_666n);
    });

    it('should compute timestamps from the frame index without drift', () => {
      const rate = new Rational(30);
      assert.strictEqual(rate.timestampOf(0n), 0n);
      assert.strictEqual(rate.timestampOf(1n), 33_333_333n);
      assert.strictEqual(rate.timestampOf(3n), 100_000_000n);
      assert.strictEqual(rate.timestampOf(30n), 1_000_000_000n);
    });
  });

  it('should compare by value', () => {
    assert.ok(new Rational(60, 2).equals(new Rational(30, 1)));
    assert.ok(!new Rational(30, 1).equals({ num: 25, den: 1 }));
  });
});
