import { InvocationError, errorMessage, silentLogger } from '@skillbench/core';
import type { Logger } from '@skillbench/core';

export interface InvokeOptions {
  timeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  signal?: AbortSignal;
  logger?: Logger;
  label?: string;
  random?: () => number;
}

export interface InvokeOutcome {
  output: string;
  attempts: number;
}

export function backoffDelay(retry: number, baseMs: number, random: () => number = Math.random): number {
  return Math.round(baseMs * Math.pow(2, retry) * (0.9 + random() * 0.2));
}

function abortedError(attempts: number): InvocationError {
  return new InvocationError('Run aborted', 'aborted', attempts);
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortedError(0));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortedError(0));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

async function attemptOnce(
  call: (signal: AbortSignal) => Promise<string>,
  timeoutMs: number,
  attempt: number,
  runSignal?: AbortSignal,
): Promise<string> {
  if (runSignal?.aborted) throw abortedError(attempt);

  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const onRunAbort = () => controller.abort();
  runSignal?.addEventListener('abort', onRunAbort, { once: true });

  try {
    return await new Promise<string>((resolve, reject) => {
      controller.signal.addEventListener(
        'abort',
        () =>
          reject(
            timedOut
              ? new InvocationError(`Model call timed out after ${timeoutMs}ms`, 'timeout', attempt)
              : abortedError(attempt),
          ),
        { once: true },
      );
      call(controller.signal).then(resolve, reject);
    });
  } catch (err) {
    if (err instanceof InvocationError) throw err;
    throw new InvocationError(errorMessage(err), 'backend', attempt, { cause: err });
  } finally {
    clearTimeout(timer);
    runSignal?.removeEventListener('abort', onRunAbort);
  }
}

/**
 * Calls the model with a per-attempt timeout, retrying backend failures and
 * timeouts with exponential backoff. An aborted run is never retried.
 */
export async function invokeWithRetry(
  call: (signal: AbortSignal) => Promise<string>,
  options: InvokeOptions,
): Promise<InvokeOutcome> {
  const logger = options.logger ?? silentLogger;
  const label = options.label ?? 'invoke';

  for (let attempt = 1; ; attempt++) {
    try {
      const output = await attemptOnce(call, options.timeoutMs, attempt, options.signal);
      return { output, attempts: attempt };
    } catch (err) {
      const failure =
        err instanceof InvocationError ? err : new InvocationError(errorMessage(err), 'backend', attempt, { cause: err });

      if (failure.reason === 'aborted' || attempt > options.maxRetries) {
        if (failure.reason !== 'aborted') {
          logger.warn(`${label}: giving up after ${attempt} attempt(s): ${failure.message}`);
        }
        throw failure;
      }

      const delay = backoffDelay(attempt - 1, options.retryBaseDelayMs, options.random);
      logger.debug(`${label}: attempt ${attempt} failed (${failure.message}), retrying in ${delay}ms`);
      try {
        await sleep(delay, options.signal);
      } catch {
        throw abortedError(attempt);
      }
    }
  }
}
