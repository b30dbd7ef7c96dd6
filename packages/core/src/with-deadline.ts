/**
 * Deadline + error classification for backend calls.
 */

import { BackendCallError, BackendTimeoutError, getErrorMessage, isDbnavError } from "@dbnav/errors";
import type { DataSourceCallOptions } from "./types.js";

/**
 * Run one backend call under a deadline.
 *
 * The call receives `{ timeoutMs, signal }`. The server bounds the call by
 * `timeoutMs`; the local timer covers calls that never settle and aborts
 * `signal` before rejecting, so the call can release what it holds.
 *
 * @param context - Names the call in error messages, e.g. "list databases"
 * @throws BackendTimeoutError when the deadline passes first
 * @throws BackendCallError wrapping any other failure; dbnav errors pass through
 */
export function withDeadline<T>(
  context: string,
  timeoutMs: number,
  call: (options: DataSourceCallOptions) => Promise<T>,
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const controller = new AbortController();
    const timer = globalThis.setTimeout(() => {
      const error = new BackendTimeoutError(context, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);

    let pending: Promise<T>;
    try {
      pending = call({ timeoutMs, signal: controller.signal });
    } catch (error) {
      pending = Promise.reject(error);
    }

    pending.then(
      (value) => {
        globalThis.clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        globalThis.clearTimeout(timer);
        if (isDbnavError(error)) {
          reject(error);
          return;
        }
        reject(
          new BackendCallError(
            context,
            getErrorMessage(error),
            error instanceof Error ? error : undefined,
          ),
        );
      },
    );
  });
}
