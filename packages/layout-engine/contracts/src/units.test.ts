import { describe, it, expect, expectTypeOf } from 'vitest';
import {
  Size,
  addSize,
  addSize2D,
  formatFixed,
  formatPlainNumber,
  cm,
  formatSize,
  formatSize2D,
  inches,
  mm,
  point2D,
  pt,
  size2DEquals,
  toCm,
  toInches,
  toMm,
  toPt,
  ZERO_SIZE_2D,
} from './units.js';
import { LayoutActionError } from './errors.js';

describe('length constructors', () => {
  it('stores points unchanged', () => {
    expect(toPt(pt(12.5))).toBe(12.5);
  });

  it('converts inches to points', () => {
    expect(toPt(inches(1))).toBe(72);
    expect(toInches(pt(36))).toBe(0.5);
  });

  it('converts metric lengths to points', () => {
    expect(toPt(mm(1))).toBeCloseTo(2.83465, 10);
    expect(toPt(cm(1))).toBeCloseTo(28.3465, 10);
    expect(toMm(cm(2))).toBeCloseTo(20, 10);
    expect(toCm(mm(15))).toBeCloseTo(1.5, 10);
  });

  it.each([Number.NaN, Number.POSITIVE_INFINITY, Number.NEGATIVE_INFINITY])('rejects %s', (value) => {
    expect(() => pt(value)).toThrow(LayoutActionError);
    expect(() => mm(value)).toThrow(/Lengths must be finite/);
  });

  it('reports INVALID_LENGTH with the offending value', () => {
    try {
      inches(Number.NaN);
      expect.unreachable('inches(NaN) should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(LayoutActionError);
      expect(error).toMatchObject({ code: 'INVALID_LENGTH', details: { value: Number.NaN, unit: 'in' } });
    }
  });
});

describe('Size2D helpers', () => {
  it('adds component-wise', () => {
    expect(addSize2D(point2D(10, 20), point2D(1.5, -2))).toEqual(point2D(11.5, 18));
  });

  it('treats the zero pair as the additive identity', () => {
    expect(size2DEquals(addSize2D(ZERO_SIZE_2D, point2D(3, 4)), point2D(3, 4))).toBe(true);
  });

  it('compares both axes', () => {
    expect(size2DEquals(point2D(1, 2), point2D(1, 3))).toBe(false);
  });
});

describe('formatSize', () => {
  it('renders whole and fractional points naturally', () => {
    expect(formatSize(pt(12))).toBe('12pt');
    expect(formatSize(pt(12.5))).toBe('12.5pt');
  });

  it('renders pairs in brackets', () => {
    expect(formatSize2D(point2D(10, 20.25))).toBe('[10pt, 20.25pt]');
  });
});

describe('Size', () => {
  it('is not satisfied by a structural literal', () => {
    expectTypeOf({ points: Number.POSITIVE_INFINITY }).not.toMatchTypeOf<Size>();
    expectTypeOf(pt(1)).toEqualTypeOf<Size>();
  });

  it('rejects lengths that overflow during conversion', () => {
    expect(() => mm(1e308)).toThrow(LayoutActionError);
  });

  it('rejects sums that overflow', () => {
    let caught: unknown;
    try {
      addSize(pt(Number.MAX_VALUE), pt(Number.MAX_VALUE));
    } catch (error) {
      caught = error;
    }
    expect(caught).toMatchObject({ code: 'INVALID_LENGTH', details: { value: Number.POSITIVE_INFINITY, unit: 'pt' } });
  });
});

describe('number formatting', () => {
  it('writes exponent forms out in full', () => {
    expect(formatPlainNumber(12.5)).toBe('12.5');
    expect(formatPlainNumber(1e-7)).toBe('0.0000001');
    expect(formatPlainNumber(-1.25e-8)).toBe('-0.0000000125');
    expect(formatPlainNumber(1e21)).toBe('1000000000000000000000');
    expect(formatPlainNumber(1.5e21)).toBe('1500000000000000000000');
  });

  it('keeps the requested decimals for large values', () => {
    expect(formatFixed(3.5, 4)).toBe('3.5000');
    expect(formatFixed(1e21, 4)).toBe('1000000000000000000000.0000');
  });

  it('uses full digits in the display form', () => {
    expect(formatSize(pt(1e-7))).toBe('0.0000001pt');
  });
});
