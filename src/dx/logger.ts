let enabled = false;
let quiet = false;

// Keep this extremely low overhead when disabled.
export function isDebugEnabled(): boolean {
  return enabled || process.env.FORGEKIT_DEBUG === '1';
}

/**
 * Enable/disable debug logging programmatically.
 *
 * The CLI flips this on when the project config sets `debug: true`.
 */
export function setDebugEnabled(v: boolean) {
  enabled = v;
}

/** Silence progress lines (tests, library callers). Errors still print. */
export function setQuiet(v: boolean) {
  quiet = v;
}

export function isQuiet(): boolean {
  return quiet;
}

export function logDebug(...args: unknown[]) {
  if (!isDebugEnabled()) return;
  // eslint-disable-next-line no-console
  console.log('[forgekit]', ...args);
}

export function logWarn(...args: unknown[]) {
  if (!isDebugEnabled()) return;
  // eslint-disable-next-line no-console
  console.warn('[forgekit]', ...args);
}

/** User-facing progress line, one per unit of work. */
export function logProgress(message: string) {
  if (quiet) return;
  // eslint-disable-next-line no-console
  console.log(message);
}

export function logError(message: string) {
  // eslint-disable-next-line no-console
  console.error(message);
}
