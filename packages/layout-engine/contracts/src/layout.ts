import type { LayoutAction } from './actions.js';
import type { Size2D } from './units.js';

/**
 * A finished box of layouted content.
 *
 * Actions are addressed relative to the box's own top-left corner; a parent re-anchors
 * them when the layout is composed into its action buffer.
 */
export type Layout = {
  /** Bounding size of the box. */
  dimensions: Size2D;
  /** Actions in the layout's local coordinate frame, in emission order. */
  actions: readonly LayoutAction[];
  /** Whether a debug outline of the box is emitted when it is composed. */
  debugRender: boolean;
};

/** A sequence of layouts, typically one per page. */
export type MultiLayout = readonly Layout[];
