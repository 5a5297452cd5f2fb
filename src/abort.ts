/**
 * Interrupt propagation
 *
 * Design notes:
 * 1. The caller of AgentLoop.run() owns an AbortController; aborting it is the interrupt
 * 2. abortable() wraps the provider and tool calls so the wait ends as soon as the signal fires
 * 3. Tools receive the same signal through ToolContext to stop their own work
 * 4. throwIfAborted() is checked at turn and tool boundaries
 * Both raise InterruptError, which the loop turns into USER_INTERRUPT.
 */

import { InterruptError } from "./errors.js";

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) throw new InterruptError();
}

/**
 * Wrap a Promise to make it interruptible by abort
 *
 * - When signal fires, rejects the promise, interrupting the wait
 * - The underlying work is not cancelled; its late result is dropped
 */
export function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) {
    return Promise.reject(new InterruptError());
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      signal.removeEventListener("abort", onAbort);
      reject(new InterruptError());
    };
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}
