/**
 * Cancellable status polling.
 *
 * @module wait
 */

import { WaitAbortedError, WaitTimeoutError } from '../errors/index.js';

/**
 * Options for {@link waitForStatus}.
 */
export interface WaitOptions<S extends string = string> {
  /** Delay between status checks in milliseconds */
  intervalMs: number;
  /** Maximum number of status checks */
  maxAttempts: number;
  /** Delay before the first status check (default: 0) */
  initialDelayMs?: number;
  /** Cancels the wait, including any sleep or status check in progress */
  signal?: AbortSignal;
  /** Called with every observed status */
  onStatus?: (status: S, attempt: number) => void;
}

/**
 * Result of a wait that reached its target.
 */
export interface WaitOutcome<S extends string = string> {
  status: S;
  /** Number of status checks performed, including the final one */
  attempts: number;
  elapsedMs: number;
}

/**
 * Polls `probe` until it returns `target`.
 *
 * The probe is called at most `maxAttempts` times with `intervalMs` between
 * calls; there is no sleep after the last call. The probe receives `signal`
 * to cancel its request. Errors thrown by the probe propagate unchanged
 * unless the wait was aborted.
 *
 * @throws {WaitTimeoutError} If `maxAttempts` checks never observed `target`
 * @throws {WaitAbortedError} If `signal` is aborted
 *
 * @example
 * ```typescript
 * const outcome = await waitForStatus(
 *   () => clusters.describeClusterStatus('dwh-cluster'),
 *   'available',
 *   { intervalMs: 10_000, maxAttempts: 10, signal: controller.signal }
 * );
 * ```
 */
export async function waitForStatus<S extends string>(
  probe: (signal?: AbortSignal) => Promise<S>,
  target: S,
  options: WaitOptions<S>
): Promise<WaitOutcome<S>> {
  const { intervalMs, maxAttempts, initialDelayMs = 0, signal, onStatus } = options;
  const startTime = Date.now();
  let attempts = 0;
  let lastStatus: S | undefined;

  if (signal?.aborted) {
    throw new WaitAbortedError(target, attempts);
  }

  if (initialDelayMs > 0 && (await sleep(initialDelayMs, signal)) === 'aborted') {
    throw new WaitAbortedError(target, attempts);
  }

  while (attempts < maxAttempts) {
    try {
      lastStatus = await probe(signal);
    } catch (error) {
      if (signal?.aborted) {
        throw new WaitAbortedError(target, attempts);
      }
      throw error;
    }
    attempts++;
    onStatus?.(lastStatus, attempts);

    if (lastStatus === target) {
      return { status: lastStatus, attempts, elapsedMs: Date.now() - startTime };
    }

    if (signal?.aborted) {
      throw new WaitAbortedError(target, attempts);
    }

    if (attempts < maxAttempts && (await sleep(intervalMs, signal)) === 'aborted') {
      throw new WaitAbortedError(target, attempts);
    }
  }

  throw new WaitTimeoutError(target, lastStatus ?? 'none', attempts);
}

/**
 * Sleeps for `ms` milliseconds, waking early if `signal` is aborted.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<'elapsed' | 'aborted'> {
  if (signal?.aborted) {
    return Promise.resolve('aborted');
  }

  return new Promise((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve('aborted');
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve('elapsed');
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
