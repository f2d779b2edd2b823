import { describe, it, expect, vi, afterEach } from 'vitest';
import { withTimeout } from '../utils/timeout.js';
import { AgentTimeoutError } from '../utils/errors.js';

function waitForAbort(signal: AbortSignal): Promise<unknown> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve(signal.reason);
      return;
    }
    signal.addEventListener('abort', () => resolve(signal.reason), { once: true });
  });
}

describe('withTimeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves with the task value inside the deadline', async () => {
    const value = await withTimeout(async () => 5, {
      timeoutMs: 100,
      onTimeout: () => new AgentTimeoutError('slow', 100),
    });
    expect(value).toBe(5);
  });

  it('rejects with the timeout error and aborts the task', async () => {
    let taskSignal: AbortSignal | undefined;
    const pending = withTimeout((signal) => {
      taskSignal = signal;
      return waitForAbort(signal);
    }, {
      timeoutMs: 20,
      onTimeout: () => new AgentTimeoutError('slow', 20),
    });

    await expect(pending).rejects.toThrow("Agent 'slow' did not respond within 20ms");
    expect(taskSignal?.aborted).toBe(true);
    expect(taskSignal?.reason).toBeInstanceOf(AgentTimeoutError);
  });

  it('passes rejections from the task through', async () => {
    const pending = withTimeout(async () => {
      throw new TypeError('bad input');
    }, {
      timeoutMs: 100,
      onTimeout: () => new AgentTimeoutError('x', 100),
    });
    await expect(pending).rejects.toBeInstanceOf(TypeError);
  });

  it('forwards an abort from the parent signal', async () => {
    const parent = new AbortController();
    let reason: unknown;
    const pending = withTimeout(async (signal) => {
      reason = await waitForAbort(signal);
    }, {
      timeoutMs: 1000,
      signal: parent.signal,
      onTimeout: () => new AgentTimeoutError('x', 1000),
    });
    parent.abort('cancelled');
    await expect(pending).rejects.toThrow('Aborted: cancelled');
    expect(reason).toBe('cancelled');
  });

  it('rejects on a parent abort even when the task ignores its signal', async () => {
    vi.useFakeTimers();
    const parent = new AbortController();
    const pending = withTimeout(() => new Promise<never>(() => undefined), {
      timeoutMs: 60_000,
      signal: parent.signal,
      onTimeout: () => new AgentTimeoutError('x', 60_000),
      onAbort: () => new Error('host cancelled'),
    });
    parent.abort();
    await expect(pending).rejects.toThrow('host cancelled');
    expect(vi.getTimerCount()).toBe(0);
  });

  it('rejects at once when the parent is already aborted', async () => {
    const parent = new AbortController();
    parent.abort(new Error('gone'));
    const pending = withTimeout(() => new Promise<never>(() => undefined), {
      timeoutMs: 60_000,
      signal: parent.signal,
      onTimeout: () => new AgentTimeoutError('x', 60_000),
    });
    await expect(pending).rejects.toThrow('gone');
  });

  it('clears its timer once the task settles', async () => {
    vi.useFakeTimers();
    await withTimeout(async () => 1, {
      timeoutMs: 1000,
      onTimeout: () => new AgentTimeoutError('x', 1000),
    });
    expect(vi.getTimerCount()).toBe(0);
  });
});
