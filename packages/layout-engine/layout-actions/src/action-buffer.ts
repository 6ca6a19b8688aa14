import {
  LayoutActionError,
  ZERO_SIZE_2D,
  addSize2D,
  debugBox,
  fontEquals,
  formatSize2D,
  moveAbsolute,
  type Layout,
  type LayoutAction,
  type SetFontAction,
  type Size2D,
} from '@quire/contracts';
import { actionLog } from './debug.js';
import { createStickySlot } from './sticky-slot.js';

export type ActionBufferOptions = {
  /** Coordinate-frame translation in effect before the first `compose`. Defaults to zero. */
  origin?: Size2D;
  /** Called synchronously with every action as it is committed. */
  onCommit?: (action: LayoutAction) => void;
};

/**
 * Accumulates layout actions into an optimized, order-preserving sequence.
 *
 * Configuration actions are cached and only committed when content is written:
 * consecutive moves collapse into the last one, and a font change is dropped when the
 * selected font is already active. Debug boxes are committed immediately and leave the
 * cached state alone.
 *
 * The buffer also translates positions into a frame with a different origin. `compose`
 * adds a finished layout at a position, re-anchoring every move inside it. The origin
 * is a single value, not a stack: it stays bound until the next `compose`.
 *
 * @example
 * ```typescript
 * const buffer = createActionBuffer();
 * buffer.append(moveAbsolute(point2D(10, 10)));
 * buffer.append(setFont(0, pt(12)));
 * buffer.append(writeText('hi'));
 * buffer.finalize(); // [move 10pt 10pt, font 0 12pt, write "hi"]
 * ```
 */
export function createActionBuffer(options: ActionBufferOptions = {}) {
  const committed: LayoutAction[] = [];
  let origin: Size2D = options.origin ?? ZERO_SIZE_2D;
  let finalized = false;

  // Flush order is fixed: position first, then font.
  const position = createStickySlot<Size2D>();
  const font = createStickySlot<SetFontAction>({
    equals: fontEquals,
    onDiscard: (value) => actionLog('discarded font already active', value.index),
  });

  const ensureLive = (operation: string): void => {
    if (finalized) {
      throw new LayoutActionError('BUFFER_FINALIZED', `ActionBuffer.${operation}: buffer was already finalized`, {
        operation,
      });
    }
  };

  const commit = (action: LayoutAction): void => {
    committed.push(action);
    actionLog('commit', action.kind);
    options.onCommit?.(action);
  };

  const flushPosition = (): void => {
    position.flush((target) => commit(moveAbsolute(target)));
  };

  const flushFont = (): void => {
    font.flush(commit);
  };

  const append = (action: LayoutAction): void => {
    ensureLive('append');

    switch (action.kind) {
      case 'moveAbsolute':
        position.set(addSize2D(origin, action.position));
        return;
      case 'setFont':
        font.set(action);
        return;
      case 'debugBox':
        commit(debugBox(addSize2D(origin, action.position), action.size));
        return;
      case 'writeText':
        flushPosition();
        flushFont();
        commit(action);
        return;
      default: {
        const unhandled: never = action;
        return unhandled;
      }
    }
  };

  const appendMany = (actions: Iterable<LayoutAction>): void => {
    ensureLive('appendMany');
    for (const action of actions) {
      append(action);
    }
  };

  const compose = (at: Size2D, layout: Layout): void => {
    ensureLive('compose');
    // A move still cached here belongs to the previous frame.
    flushPosition();

    origin = at;
    position.set(at);
    actionLog('compose at', formatSize2D(at));

    if (layout.debugRender) {
      commit(debugBox(at, layout.dimensions));
    }

    appendMany(layout.actions);
  };

  const isEmpty = (): boolean => {
    ensureLive('isEmpty');
    return committed.length === 0;
  };

  const finalize = (): LayoutAction[] => {
    ensureLive('finalize');
    finalized = true;
    return committed;
  };

  return {
    get origin(): Size2D {
      return origin;
    },
    append,
    appendMany,
    compose,
    isEmpty,
    finalize,
  } as const;
}

export type ActionBuffer = ReturnType<typeof createActionBuffer>;
