export type Logger = (...args: unknown[]) => void;

function debugEnabled(): boolean {
  const flag = process.env['TICKBOX_DEBUG'];
  return flag != null && flag !== '' && flag !== '0' && flag !== 'false';
}

/**
 * Scoped diagnostic logger, e.g. `[STORAGE]: uploaded 3/...`.
 * Writes to stderr so command output stays clean; silent unless TICKBOX_DEBUG is set.
 */
export function createLogger(scope: string, enabled: boolean = debugEnabled()): Logger {
  if (!enabled) return () => {};
  return (...args) => console.error(`[${scope}]:`, ...args);
}
