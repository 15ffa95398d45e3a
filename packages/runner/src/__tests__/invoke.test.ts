import { describe, it, expect, vi } from 'vitest';
import { InvocationError } from '@skillbench/core';
import { backoffDelay, invokeWithRetry } from '../invoke.js';

const fast = { timeoutMs: 1_000, maxRetries: 2, retryBaseDelayMs: 0 };

function hang(signal: AbortSignal): Promise<string> {
  return new Promise((_, reject) => {
    signal.addEventListener('abort', () => reject(new Error('cancelled')));
  });
}

describe('invokeWithRetry', () => {
  it('returns the first successful output', async () => {
    const call = vi.fn(async () => 'review');
    await expect(invokeWithRetry(call, fast)).resolves.toEqual({ output: 'review', attempts: 1 });
    expect(call).toHaveBeenCalledTimes(1);
  });

  it('retries backend failures', async () => {
    const call = vi
      .fn<(signal: AbortSignal) => Promise<string>>()
      .mockRejectedValueOnce(new Error('502'))
      .mockRejectedValueOnce(new Error('503'))
      .mockResolvedValue('ok');

    await expect(invokeWithRetry(call, fast)).resolves.toEqual({ output: 'ok', attempts: 3 });
  });

  it('gives up after maxRetries', async () => {
    const call = vi.fn(async (): Promise<string> => {
      throw new Error('backend down');
    });

    const err = await invokeWithRetry(call, fast).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(InvocationError);
    expect(err).toMatchObject({ reason: 'backend', attempts: 3, message: 'backend down', code: 'E_INVOCATION' });
    expect(call).toHaveBeenCalledTimes(3);
  });

  it('times out a call that never answers', async () => {
    let seen: AbortSignal | undefined;
    const call = vi.fn((signal: AbortSignal) => {
      seen = signal;
      return hang(signal);
    });

    const err = await invokeWithRetry(call, { ...fast, timeoutMs: 20, maxRetries: 0 }).catch((e: unknown) => e);
    expect(err).toMatchObject({ reason: 'timeout', attempts: 1, message: 'Model call timed out after 20ms' });
    expect(seen?.aborted).toBe(true);
  });

  it('does not call the model once the run is aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const call = vi.fn(async () => 'never');

    await expect(invokeWithRetry(call, { ...fast, signal: controller.signal })).rejects.toMatchObject({
      reason: 'aborted',
    });
    expect(call).not.toHaveBeenCalled();
  });

  it('does not retry when the run is aborted mid-call', async () => {
    const controller = new AbortController();
    const call = vi.fn(hang);
    setTimeout(() => controller.abort(), 10);

    await expect(
      invokeWithRetry(call, { ...fast, maxRetries: 3, signal: controller.signal }),
    ).rejects.toMatchObject({ reason: 'aborted' });
    expect(call).toHaveBeenCalledTimes(1);
  });
});

describe('backoffDelay', () => {
  it('doubles per retry with ±10% jitter', () => {
    expect(backoffDelay(0, 1_000, () => 0.5)).toBe(1_000);
    expect(backoffDelay(1, 1_000, () => 1)).toBe(2_200);
    expect(backoffDelay(2, 1_000, () => 0)).toBe(3_600);
  });
});
