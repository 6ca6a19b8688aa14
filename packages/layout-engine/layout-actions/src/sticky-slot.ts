/**
 * Deferred state for one kind of state-changing instruction.
 *
 * A slot holds the latest requested value (`pending`) and the value last written to the
 * committed stream (`committed`). Setting a new pending value overwrites the previous one;
 * only `flush` moves it into the stream.
 */
export type StickySlot<T> = {
  readonly pending: T | undefined;
  readonly committed: T | undefined;
  set(value: T): void;
  /**
   * Commits the pending value through `emit` and clears it.
   * Returns false when nothing was emitted (no pending value, or a deduplicated one).
   */
  flush(emit: (value: T) => void): boolean;
};

export type StickySlotOptions<T> = {
  /**
   * When provided, a pending value equal to the committed one is discarded instead of
   * emitted. Slots without an equality always emit.
   */
  equals?: (a: T, b: T) => boolean;
  onDiscard?: (value: T) => void;
};

export function createStickySlot<T>(options: StickySlotOptions<T> = {}): StickySlot<T> {
  let pending: T | undefined;
  let committed: T | undefined;

  return {
    get pending() {
      return pending;
    },
    get committed() {
      return committed;
    },
    set(value: T): void {
      pending = value;
    },
    flush(emit: (value: T) => void): boolean {
      if (pending === undefined) return false;
      const value = pending;
      pending = undefined;

      if (options.equals && committed !== undefined && options.equals(value, committed)) {
        options.onDiscard?.(value);
        return false;
      }

      // Recorded before emitting so a throwing emitter cannot leave the stream and the slot out of step.
      committed = value;
      emit(value);
      return true;
    },
  };
}
