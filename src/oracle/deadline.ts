import { OracleError } from "../core/errors.js";

export type TimeoutSignal = {
  signal: AbortSignal;
  cancel: () => void;
  didTimeout: () => boolean;
};

export const createTimeoutSignal = (timeoutMs: number, parentSignal?: AbortSignal): TimeoutSignal => {
  let timedOut = false;
  const controller = new AbortController();
  let timeout: ReturnType<typeof setTimeout> | null = null;
  let parentListenerAttached = false;
  const onParentAbort = (): void => {
    controller.abort();
    cleanup();
  };
  const cleanup = (): void => {
    if (timeout) {
      clearTimeout(timeout);
      timeout = null;
    }
    if (parentSignal && parentListenerAttached) {
      parentSignal.removeEventListener("abort", onParentAbort);
      parentListenerAttached = false;
    }
  };

  timeout = setTimeout(() => {
    timedOut = true;
    controller.abort();
    cleanup();
  }, timeoutMs);

  if (parentSignal) {
    if (parentSignal.aborted) {
      controller.abort();
      cleanup();
    } else {
      parentSignal.addEventListener("abort", onParentAbort, { once: true });
      parentListenerAttached = true;
    }
  }

  return {
    signal: controller.signal,
    cancel: cleanup,
    didTimeout: () => timedOut
  };
};

/**
 * Run an oracle call under a deadline. The call receives an abort signal that
 * fires at the deadline; the returned promise rejects with a timed-out
 * {@link OracleError} at the deadline even if the call ignores the signal.
 */
export const withDeadline = async <T>(
  label: string,
  timeoutMs: number,
  call: (signal: AbortSignal) => Promise<T>,
  parentSignal?: AbortSignal
): Promise<T> => {
  const timeout = createTimeoutSignal(timeoutMs, parentSignal);
  if (timeout.signal.aborted) {
    timeout.cancel();
    throw new OracleError(`${label} aborted`, { code: "aborted" });
  }
  const expired = new Promise<never>((_, reject) => {
    timeout.signal.addEventListener(
      "abort",
      () => {
        reject(
          timeout.didTimeout()
            ? new OracleError(`${label} exceeded ${timeoutMs}ms deadline`, { timedOut: true })
            : new OracleError(`${label} aborted`, { code: "aborted" })
        );
      },
      { once: true }
    );
  });
  // The losing side of the race must not surface as an unhandled rejection.
  expired.catch(() => undefined);

  try {
    return await Promise.race([call(timeout.signal), expired]);
  } catch (error) {
    if (timeout.didTimeout() && !(error instanceof OracleError && error.timedOut)) {
      throw new OracleError(`${label} exceeded ${timeoutMs}ms deadline`, { timedOut: true });
    }
    throw error;
  } finally {
    timeout.cancel();
  }
};
