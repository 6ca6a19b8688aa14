/**
 * Shared contracts for the layout action pipeline: length units, layout actions and
 * the layout values that carry them.
 */

export {
  POINTS_PER_INCH,
  POINTS_PER_MM,
  POINTS_PER_CM,
  pt,
  mm,
  cm,
  inches,
  toPt,
  toMm,
  toCm,
  toInches,
  ZERO_SIZE,
  ZERO_SIZE_2D,
  size2D,
  point2D,
  addSize,
  addSize2D,
  sizeEquals,
  size2DEquals,
  formatSize,
  formatSize2D,
  formatPlainNumber,
  formatFixed,
  Size,
  type Size2D,
} from './units.js';

export {
  moveAbsolute,
  setFont,
  writeText,
  debugBox,
  fontEquals,
  type MoveAbsoluteAction,
  type SetFontAction,
  type WriteTextAction,
  type DebugBoxAction,
  type LayoutAction,
  type LayoutActionKind,
  type FontSelection,
} from './actions.js';

export type { Layout, MultiLayout } from './layout.js';

export { LayoutActionError, isLayoutActionError, type LayoutActionErrorCode } from './errors.js';
