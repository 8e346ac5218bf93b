const ENV_KEY = 'SHIFT_TRADE_DEBUG';
const CHANNEL = '[shift-trade]';

function readPreference(): boolean {
  const value = process.env[ENV_KEY]?.trim();
  if (!value) {
    return false;
  }
  return value !== 'false' && value !== '0';
}

let enabled = readPreference();

export function setDebugLogging(next: boolean): void {
  enabled = next;
}

type DebugPayload = unknown | (() => unknown);

function isThunk(payload: DebugPayload | undefined): payload is () => unknown {
  return typeof payload === 'function';
}

// Thunks run only when the line is actually printed.
function resolvePayload(payload: DebugPayload | undefined): unknown {
  if (!isThunk(payload)) {
    return payload;
  }
  try {
    return payload();
  } catch (error) {
    return { error: error instanceof Error ? error.message : error };
  }
}

export function debugLog(topic: string, payload?: DebugPayload): void {
  if (enabled) {
    console.info(`${CHANNEL} ${topic}`, resolvePayload(payload));
  }
}

/** Brackets `fn` with `▶ topic` / `◀ topic` lines when debug logging is on. */
export function withDebugGroup<T>(topic: string, payload: DebugPayload, fn: () => T): T {
  if (!enabled) {
    return fn();
  }
  debugLog(`▶ ${topic}`, payload);
  try {
    return fn();
  } finally {
    debugLog(`◀ ${topic}`);
  }
}

// Skipped sources and events are always reported, debug mode or not.
export function logWarning(topic: string, payload?: DebugPayload): void {
  console.warn(`${CHANNEL} ${topic}`, resolvePayload(payload));
}
