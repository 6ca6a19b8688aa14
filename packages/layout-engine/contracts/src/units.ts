import { LayoutActionError } from './errors.js';

export const POINTS_PER_INCH = 72;
export const POINTS_PER_MM = 2.83465;
export const POINTS_PER_CM = 28.3465;

/**
 * A length, stored in typographic points.
 *
 * Only the unit constructors and `addSize` create sizes, and each of them rejects a
 * non-finite result with `INVALID_LENGTH`. A structural `{ points }` literal is not a `Size`.
 */
export class Size {
  private declare readonly brand: 'Size';
  readonly points: number;

  private constructor(points: number) {
    this.points = points;
  }

  /** @internal Validated construction shared by the unit helpers. */
  static fromPoints(points: number, value: number, unit: string): Size {
    if (!Number.isFinite(points)) {
      throw new LayoutActionError('INVALID_LENGTH', `Invalid length: ${String(value)}${unit}. Lengths must be finite.`, {
        value,
        unit,
      });
    }
    return new Size(points);
  }
}

/** A two-dimensional length pair (position or extent). */
export type Size2D = {
  readonly x: Size;
  readonly y: Size;
};

export const pt = (points: number): Size => Size.fromPoints(points, points, 'pt');

export const mm = (value: number): Size => Size.fromPoints(value * POINTS_PER_MM, value, 'mm');

export const cm = (value: number): Size => Size.fromPoints(value * POINTS_PER_CM, value, 'cm');

export const inches = (value: number): Size => Size.fromPoints(value * POINTS_PER_INCH, value, 'in');

export const toPt = (size: Size): number => size.points;
export const toMm = (size: Size): number => size.points / POINTS_PER_MM;
export const toCm = (size: Size): number => size.points / POINTS_PER_CM;
export const toInches = (size: Size): number => size.points / POINTS_PER_INCH;

export const ZERO_SIZE: Size = pt(0);
export const ZERO_SIZE_2D: Size2D = { x: ZERO_SIZE, y: ZERO_SIZE };

export const size2D = (x: Size, y: Size): Size2D => ({ x, y });

/** Shorthand for a point-valued pair, e.g. `point2D(10, 20)`. */
export const point2D = (x: number, y: number): Size2D => ({ x: pt(x), y: pt(y) });

/** Throws `INVALID_LENGTH` when the sum overflows. */
export const addSize = (a: Size, b: Size): Size => {
  const points = a.points + b.points;
  return Size.fromPoints(points, points, 'pt');
};

export const addSize2D = (a: Size2D, b: Size2D): Size2D => ({
  x: addSize(a.x, b.x),
  y: addSize(a.y, b.y),
});

export const sizeEquals = (a: Size, b: Size): boolean => a.points === b.points;

export const size2DEquals = (a: Size2D, b: Size2D): boolean => sizeEquals(a.x, b.x) && sizeEquals(a.y, b.y);

const EXPONENT_FORM = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/;

/**
 * Shortest round-trip rendering of a finite number, written out in full digits.
 *
 * @example
 * ```typescript
 * formatPlainNumber(12.5); // '12.5'
 * formatPlainNumber(1e-7); // '0.0000001'
 * formatPlainNumber(1e21); // '1000000000000000000000'
 * ```
 */
export const formatPlainNumber = (value: number): string => {
  const text = String(value);
  const match = EXPONENT_FORM.exec(text);
  if (!match) return text;

  const [, sign, lead, fraction = '', exponent] = match;
  const digits = lead + fraction;
  const pointIndex = 1 + Number(exponent);
  if (pointIndex <= 0) {
    return `${sign}0.${'0'.repeat(-pointIndex)}${digits}`;
  }
  if (pointIndex >= digits.length) {
    return `${sign}${digits}${'0'.repeat(pointIndex - digits.length)}`;
  }
  return `${sign}${digits.slice(0, pointIndex)}.${digits.slice(pointIndex)}`;
};

/**
 * Fixed-point rendering with exactly `decimals` fraction digits, never in exponent form.
 * `toFixed` only switches to exponents from 1e21 on, where every double is an integer.
 */
export const formatFixed = (value: number, decimals: number): string => {
  if (Math.abs(value) < 1e21) return value.toFixed(decimals);
  return `${formatPlainNumber(value)}.${'0'.repeat(decimals)}`;
};

/** Human-readable length, e.g. `12pt` or `12.5pt`. */
export const formatSize = (size: Size): string => `${formatPlainNumber(size.points)}pt`;

/** Human-readable pair, e.g. `[10pt, 20pt]`. */
export const formatSize2D = (size: Size2D): string => `[${formatSize(size.x)}, ${formatSize(size.y)}]`;
