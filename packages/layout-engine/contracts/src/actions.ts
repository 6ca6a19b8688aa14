import { LayoutActionError } from './errors.js';
import { sizeEquals, type Size, type Size2D } from './units.js';

/** Move the cursor to an absolute position. */
export type MoveAbsoluteAction = {
  readonly kind: 'moveAbsolute';
  readonly position: Size2D;
};

/** Select a font by its index in the font table, at the given size. */
export type SetFontAction = {
  readonly kind: 'setFont';
  readonly index: number;
  readonly size: Size;
};

/** Write text starting at the current position with the active font. */
export type WriteTextAction = {
  readonly kind: 'writeText';
  readonly text: string;
};

/**
 * Outline a box for debugging purposes.
 * Never changes cursor or font state.
 */
export type DebugBoxAction = {
  readonly kind: 'debugBox';
  readonly position: Size2D;
  readonly size: Size2D;
};

/**
 * A layouting action.
 *
 * `moveAbsolute` and `setFont` configure state, `debugBox` is a diagnostic overlay and
 * every other kind produces content.
 */
export type LayoutAction = MoveAbsoluteAction | SetFontAction | WriteTextAction | DebugBoxAction;

export type LayoutActionKind = LayoutAction['kind'];

/** The (index, size) pair a `setFont` action selects. */
export type FontSelection = {
  readonly index: number;
  readonly size: Size;
};

export const moveAbsolute = (position: Size2D): MoveAbsoluteAction => ({ kind: 'moveAbsolute', position });

export const setFont = (index: number, size: Size): SetFontAction => {
  if (!Number.isSafeInteger(index) || index < 0) {
    throw new LayoutActionError(
      'INVALID_FONT_INDEX',
      `Invalid font index: ${String(index)}. Font index must be a non-negative integer.`,
      { index },
    );
  }
  return { kind: 'setFont', index, size };
};

export const writeText = (text: string): WriteTextAction => ({ kind: 'writeText', text });

export const debugBox = (position: Size2D, size: Size2D): DebugBoxAction => ({ kind: 'debugBox', position, size });

export const fontEquals = (a: FontSelection, b: FontSelection): boolean =>
  a.index === b.index && sizeEquals(a.size, b.size);
