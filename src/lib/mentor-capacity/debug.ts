/**
 * Per-row tracing for the auto-close run.
 * Set DEBUG_AUTOCLOSE=true to enable.
 */

export function isDebugEnabled(): boolean {
  return process.env.DEBUG_AUTOCLOSE === "true";
}

export function debugLog(...args: unknown[]): void {
  if (isDebugEnabled()) {
    console.log(...args);
  }
}
