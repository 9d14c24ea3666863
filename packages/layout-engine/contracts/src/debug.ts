/**
 * Opt-in console logging for layout and editing internals.
 *
 * Set `TEXTFLOW_DEBUG=1` (or `*`) to enable every scope, or a comma-separated
 * list such as `TEXTFLOW_DEBUG=layout,edit-buffer` to enable a subset.
 * Logging is read once per logger, so tests toggle it before creating one.
 */

export type DebugLogger = {
  readonly enabled: boolean;
  (message: string, payload?: Record<string, unknown>): void;
};

const readDebugEnv = (): string | undefined =>
  typeof process !== 'undefined' && typeof process.env !== 'undefined' ? process.env.TEXTFLOW_DEBUG : undefined;

export function isDebugScopeEnabled(scope: string, env: string | undefined = readDebugEnv()): boolean {
  if (!env) return false;
  const scopes = env
    .split(',')
    .map((entry) => entry.trim())
    .filter(Boolean);
  return scopes.includes('1') || scopes.includes('*') || scopes.includes(scope);
}

export function createDebugLogger(scope: string): DebugLogger {
  const enabled = isDebugScopeEnabled(scope);
  const log = (message: string, payload?: Record<string, unknown>): void => {
    if (!enabled) return;
    if (!payload) {
      console.log(`[${scope}] ${message}`);
      return;
    }
    try {
      console.log(`[${scope}] ${message}`, JSON.stringify(payload));
    } catch {
      console.log(`[${scope}] ${message}`, payload);
    }
  };
  return Object.assign(log, { enabled });
}
