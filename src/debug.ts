/**
 * @fileoverview Debug Logging Utilities
 *
 * Provides opt-in debug logging gated by an environment flag. When debug
 * mode is enabled (`<PREFIX>_DEBUG_MODE=true`, or `debug: true` in the
 * runtime config), all debug calls forward to the console. When disabled,
 * they are dropped.
 *
 * The prefix is configurable via {@link _setDebugPrefix} (set by
 * {@link runtime.ts#createSyncRuntime}) so several hosts sharing one
 * environment can be toggled independently.
 *
 * @example
 * // Enable debug mode for one run:
 * //   SATCHEL_DEBUG_MODE=true npm run share -- --inbox ./inbox --url https://example.com
 *
 * // Or programmatically:
 * import { setDebugMode } from 'satchel-sync';
 * setDebugMode(true);
 */

// =============================================================================
// Internal State
// =============================================================================

/** Explicit override; `null` means "read the environment". */
let debugEnabled: boolean | null = null;

/** Configurable prefix for the environment flag (default: `'satchel'`). */
let debugPrefix = 'satchel';

// =============================================================================
// Internal Helpers
// =============================================================================

/**
 * Set the prefix used for the debug environment flag.
 *
 * @internal
 */
export function _setDebugPrefix(prefix: string) {
  debugPrefix = prefix;
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Check whether debug mode is currently enabled.
 *
 * An explicit {@link setDebugMode} call wins; otherwise reads
 * `process.env.<PREFIX>_DEBUG_MODE`.
 */
export function isDebugMode(): boolean {
  if (debugEnabled !== null) return debugEnabled;
  return process.env[`${debugPrefix.toUpperCase()}_DEBUG_MODE`] === 'true';
}

/**
 * Enable or disable debug mode at runtime. Pass `null` to fall back to
 * the environment flag again.
 */
export function setDebugMode(enabled: boolean | null) {
  debugEnabled = enabled;
}

export function debugLog(...args: unknown[]) {
  if (isDebugMode()) console.log(...args);
}

export function debugWarn(...args: unknown[]) {
  if (isDebugMode()) console.warn(...args);
}

export function debugError(...args: unknown[]) {
  if (isDebugMode()) console.error(...args);
}

/**
 * Unified debug logging function with configurable severity level.
 *
 * @example
 * debug('log', '[SYNC] Starting drain...');
 * debug('error', '[SYNC] Drain failed:', error);
 */
export function debug(level: 'log' | 'warn' | 'error', ...args: unknown[]): void {
  if (!isDebugMode()) return;
  switch (level) {
    case 'log':
      console.log(...args);
      break;
    case 'warn':
      console.warn(...args);
      break;
    case 'error':
      console.error(...args);
      break;
  }
}
