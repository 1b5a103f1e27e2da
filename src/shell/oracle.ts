import {
  OracleTimeoutError,
  OracleUnavailableError,
  OracleUnparseableError,
  RepoCiteError,
  RequestCancelledError,
} from "../core/errors.js";
import { computeBackoffDelay } from "../core/retry.js";

export async function withTimeout<T>(
  label: string,
  timeoutMs: number,
  fn: () => Promise<T>,
  onTimeout: (label: string, timeoutMs: number) => Error = (l, ms) => new OracleTimeoutError(l, ms),
): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  try {
    return await Promise.race([
      fn(),
      new Promise<T>((_, reject) => {
        timeoutId = setTimeout(() => reject(onTimeout(label, timeoutMs)), timeoutMs);
      }),
    ]);
  } finally {
    if (timeoutId !== undefined) clearTimeout(timeoutId);
  }
}

export interface OracleCallOptions {
  timeoutMs: number;
  /** Extra attempts after the first. */
  retries: number;
  retryBaseMs: number;
  signal?: AbortSignal;
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (attempt: number, error: RepoCiteError) => void;
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * One bounded call to the reasoning engine. Each attempt gets its own abort
 * controller, aborted on timeout or when the caller's signal fires. Timeouts,
 * transport errors and unparseable replies are retried with exponential
 * backoff; the last error is thrown once attempts run out.
 */
export async function callOracle<T>(
  label: string,
  invoke: (signal: AbortSignal) => Promise<string>,
  parse: (reply: string) => T | null,
  options: OracleCallOptions,
): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;
  let lastError: RepoCiteError = new OracleUnavailableError(label, "no attempt made");

  for (let attempt = 0; attempt <= options.retries; attempt++) {
    if (options.signal?.aborted) throw new RequestCancelledError(label);
    if (attempt > 0) {
      options.onRetry?.(attempt, lastError);
      await sleep(computeBackoffDelay(attempt, options.retryBaseMs));
      if (options.signal?.aborted) throw new RequestCancelledError(label);
    }

    const controller = new AbortController();
    const forwardAbort = (): void => controller.abort();
    options.signal?.addEventListener("abort", forwardAbort, { once: true });
    try {
      const reply = await withTimeout(label, options.timeoutMs, () => invoke(controller.signal));
      const parsed = parse(reply);
      if (parsed !== null) return parsed;
      lastError = new OracleUnparseableError(label, reply);
    } catch (err) {
      if (options.signal?.aborted) throw new RequestCancelledError(label);
      lastError = err instanceof OracleTimeoutError ? err : new OracleUnavailableError(label, err);
      controller.abort();
    } finally {
      options.signal?.removeEventListener("abort", forwardAbort);
    }
  }

  throw lastError;
}
