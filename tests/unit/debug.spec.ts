import { describe, expect, it, afterEach, vi } from 'vitest';

const ENV_KEY = 'SHIFT_TRADE_DEBUG';

afterEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
});

async function importDebugModule(envValue?: string) {
  vi.resetModules();
  vi.stubEnv(ENV_KEY, envValue ?? '');
  return import('@utils/debug');
}

describe('debug utilities', () => {
  it('stays quiet by default', async () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const mod = await importDebugModule();

    mod.debugLog('topic', 'payload');

    expect(infoSpy).not.toHaveBeenCalled();
  });

  it('reads the preference from the environment', async () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const mod = await importDebugModule('1');

    mod.debugLog('topic', 'payload');

    expect(infoSpy).toHaveBeenCalledWith('[shift-trade] topic', 'payload');
  });

  it('treats "false" and "0" as disabled', async () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const disabled = await importDebugModule('false');
    disabled.debugLog('topic');
    const zero = await importDebugModule('0');
    zero.debugLog('topic');

    expect(infoSpy).not.toHaveBeenCalled();
  });

  it('logs lazy payloads when debug is enabled', async () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const mod = await importDebugModule();

    const payload = vi.fn(() => 'computed');
    mod.debugLog('skipped', payload);
    expect(payload).not.toHaveBeenCalled();

    mod.setDebugLogging(true);
    mod.debugLog('topic', payload);

    expect(infoSpy).toHaveBeenCalledWith('[shift-trade] topic', 'computed');
  });

  it('handles payload callbacks that throw', async () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const mod = await importDebugModule();

    mod.setDebugLogging(true);
    mod.debugLog('problem', () => {
      throw new Error('boom');
    });

    expect(infoSpy).toHaveBeenCalledWith('[shift-trade] problem', { error: 'boom' });
  });

  it('wraps functions with debug groups when enabled', async () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const mod = await importDebugModule();

    mod.setDebugLogging(true);
    const fn = vi.fn(() => 'result');
    const outcome = mod.withDebugGroup('task', { id: 42 }, fn);

    expect(outcome).toBe('result');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(infoSpy).toHaveBeenCalledTimes(2);
    expect(infoSpy).toHaveBeenNthCalledWith(1, '[shift-trade] ▶ task', { id: 42 });
    expect(infoSpy).toHaveBeenNthCalledWith(2, '[shift-trade] ◀ task', undefined);
  });

  it('closes the group when the wrapped function throws', async () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const mod = await importDebugModule('true');

    expect(() =>
      mod.withDebugGroup('task', () => ({ step: 1 }), () => {
        throw new Error('boom');
      }),
    ).toThrow('boom');
    expect(infoSpy).toHaveBeenNthCalledWith(1, '[shift-trade] ▶ task', { step: 1 });
    expect(infoSpy).toHaveBeenNthCalledWith(2, '[shift-trade] ◀ task', undefined);
  });

  it('executes wrapped function immediately when debug disabled', async () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const mod = await importDebugModule('false');

    const fn = vi.fn(() => 7);
    const result = mod.withDebugGroup('task', () => 'payload', fn);

    expect(result).toBe(7);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(infoSpy).not.toHaveBeenCalled();
  });

  it('always reports warnings', async () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const mod = await importDebugModule('false');

    mod.logWarning('calendarFeed.skip-source', () => ({ owner: 'Cara' }));

    expect(warnSpy).toHaveBeenCalledWith('[shift-trade] calendarFeed.skip-source', {
      owner: 'Cara',
    });
  });
});
