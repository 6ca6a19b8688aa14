const actionsDebugEnabled =
  typeof process !== 'undefined' && typeof process.env !== 'undefined' && Boolean(process.env.QUIRE_DEBUG_ACTIONS);

export const isActionsDebugEnabled = (): boolean => actionsDebugEnabled;

/** Debug output for the action buffer, enabled by the `QUIRE_DEBUG_ACTIONS` environment flag. */
export const actionLog = (...args: unknown[]): void => {
  if (!actionsDebugEnabled) return;

  console.log('[ActionBuffer]', ...args);
};
