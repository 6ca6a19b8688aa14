import {
  LayoutActionError,
  formatFixed,
  formatPlainNumber,
  formatSize,
  formatSize2D,
  toPt,
  type Layout,
  type LayoutAction,
  type MultiLayout,
  type Size,
} from '@quire/contracts';
import type { TextSink } from './sinks.js';

const POSITION_DECIMALS = 4;

const fixedPt = (size: Size): string => formatFixed(toPt(size), POSITION_DECIMALS);

/**
 * Encodes an action into its compact, easy-to-parse form.
 *
 * @example
 * ```typescript
 * encodeAction(moveAbsolute(point2D(3.5, 4))); // 'm 3.5000 4.0000'
 * encodeAction(setFont(1, pt(12))); // 'f 1 12'
 * ```
 */
export function encodeAction(action: LayoutAction): string {
  switch (action.kind) {
    case 'moveAbsolute':
      return `m ${fixedPt(action.position.x)} ${fixedPt(action.position.y)}`;
    case 'setFont':
      return `f ${action.index} ${formatPlainNumber(toPt(action.size))}`;
    case 'writeText':
      return `w ${action.text}`;
    case 'debugBox':
      return `b ${fixedPt(action.position.x)} ${fixedPt(action.position.y)} ${fixedPt(action.size.x)} ${fixedPt(action.size.y)}`;
    default: {
      const unhandled: never = action;
      return unhandled;
    }
  }
}

/** Verbose rendering for logs and test failures; not meant to be parsed back. */
export function describeAction(action: LayoutAction): string {
  switch (action.kind) {
    case 'moveAbsolute':
      return `move ${formatSize(action.position.x)} ${formatSize(action.position.y)}`;
    case 'setFont':
      return `font ${action.index} ${formatSize(action.size)}`;
    case 'writeText':
      return `write "${action.text}"`;
    case 'debugBox':
      return `box ${formatSize2D(action.position)} ${formatSize2D(action.size)}`;
    default: {
      const unhandled: never = action;
      return unhandled;
    }
  }
}

const writeChunk = (sink: TextSink, chunk: string): void => {
  try {
    sink.write(chunk);
  } catch (error) {
    throw new LayoutActionError(
      'SINK_WRITE_FAILED',
      `Failed to write serialized output: ${error instanceof Error ? error.message : String(error)}`,
      { length: chunk.length },
      error,
    );
  }
};

/**
 * Writes the compact form of one action to the sink, without a delimiter.
 * The action is fully encoded before the sink sees any of it.
 */
export function serializeAction(action: LayoutAction, sink: TextSink): void {
  writeChunk(sink, encodeAction(action));
}

/** Writes each action's compact form followed by a newline. */
export function serializeActions(actions: Iterable<LayoutAction>, sink: TextSink): void {
  for (const action of actions) {
    writeChunk(sink, `${encodeAction(action)}\n`);
  }
}

/**
 * Writes a layout as its dimensions, its action count and one action per line.
 *
 * @example
 * ```text
 * 595.0000 842.0000
 * 2
 * m 10.0000 10.0000
 * w hi
 * ```
 */
export function serializeLayout(layout: Layout, sink: TextSink): void {
  writeChunk(sink, `${fixedPt(layout.dimensions.x)} ${fixedPt(layout.dimensions.y)}\n${layout.actions.length}\n`);
  serializeActions(layout.actions, sink);
}

/** Writes the number of layouts followed by each serialized layout. */
export function serializeMultiLayout(layouts: MultiLayout, sink: TextSink): void {
  writeChunk(sink, `${layouts.length}\n`);
  for (const layout of layouts) {
    serializeLayout(layout, sink);
  }
}
