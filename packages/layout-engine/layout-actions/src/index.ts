export { createActionBuffer, type ActionBuffer, type ActionBufferOptions } from './action-buffer.js';
export { createStickySlot, type StickySlot, type StickySlotOptions } from './sticky-slot.js';
export {
  encodeAction,
  describeAction,
  serializeAction,
  serializeActions,
  serializeLayout,
  serializeMultiLayout,
} from './serialize.js';
export { createStringSink, type TextSink, type StringSink } from './sinks.js';
export { actionLog, isActionsDebugEnabled } from './debug.js';
