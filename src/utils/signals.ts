import { AbortError } from '../error/abortError.js';
import { isTimeoutError, TimeoutError } from '../error/timeoutError.js';
import { TransportError } from '../error/transportError.js';

/**
 * An {@link AbortSignal} together with the cleanup of whatever drives it
 * (a pending timer, listeners on source signals).
 */
export interface LinkedSignal {
  signal: AbortSignal;
  /** Clears timers and listeners; the signal keeps its current state. */
  release: () => void;
}

/**
 * Creates an {@link AbortSignal} that will automatically abort with a
 * {@link TimeoutError} after the specified timeout.
 *
 * When `timeoutMs` is `false` or `0`, no timeout signal is created.
 *
 * @param timeoutMs - Timeout in milliseconds, or `false` to disable.
 * @returns The linked signal, or `null`.
 */
export function createTimeoutSignal(timeoutMs?: number | false): LinkedSignal | null {
  if (!timeoutMs) {
    return null;
  }

  const controller = new AbortController();
  const timer = setTimeout(
    () => controller.abort(new TimeoutError(`error request timed out after ${timeoutMs}ms`, timeoutMs)),
    timeoutMs,
  );

  return {
    signal: controller.signal,
    release: () => clearTimeout(timer),
  };
}

/**
 * Merges multiple {@link AbortSignal} instances into a single signal.
 *
 * Behavior:
 * - If no signals are provided, returns `null`.
 * - If a single signal is provided, it is returned as-is.
 * - If multiple signals are provided, a new `AbortController` is created
 *   and will abort when any of the source signals abort.
 * - Preserves the abort `reason` when available, otherwise
 *   aborts with an {@link AbortError}.
 *
 * @param signals - List of signals to merge (nullable/undefined allowed).
 * @returns A single linked signal or `null` if all inputs are nullish.
 */
export function mergeSignals(signals: Array<AbortSignal | null | undefined>): LinkedSignal | null {
  const active = signals.filter((s): s is AbortSignal => s !== null && s !== undefined);

  if (active.length === 0) {
    return null;
  }

  if (active.length === 1) {
    return { signal: active[0], release: () => {} };
  }

  const controller = new AbortController();
  const listeners: Array<() => void> = [];
  const release = () => {
    for (const remove of listeners.splice(0)) {
      remove();
    }
  };
  const abortFrom = (source: AbortSignal) => {
    controller.abort(source.reason ?? new AbortError('error signal triggered with unknown reason'));
    release();
  };

  for (const signal of active) {
    if (signal.aborted) {
      abortFrom(signal);
      break;
    }

    const abort = () => abortFrom(signal);
    signal.addEventListener('abort', abort, { once: true });
    listeners.push(() => signal.removeEventListener('abort', abort));
  }

  return { signal: controller.signal, release };
}

/**
 * Maps the reason of an aborted signal to a {@link TransportError}:
 * a {@link TimeoutError} reason becomes `timeout`, anything else `cancelled`.
 */
export function abortedTransportError(signal: AbortSignal, context: string): TransportError {
  if (isTimeoutError(signal.reason)) {
    return new TransportError(`error ${context} timed out`, 'timeout', { cause: signal.reason });
  }

  return new TransportError(`error ${context} cancelled`, 'cancelled', { cause: signal.reason });
}
