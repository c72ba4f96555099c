import { sleep as defaultSleep, type Sleeper } from "./sleep";

/**
 * States of one retry cycle. `attempting` is the only non-terminal state;
 * an outcome is always one of the two terminal ones.
 */
export type RetryState = "attempting" | "succeeded" | "given_up";

export type GiveUpReason = "exhausted_retries" | "canceled" | "not_retryable";

export type RetryOutcome<T> =
  | { state: Extract<RetryState, "succeeded">; value: T; attempts: number }
  | { state: Extract<RetryState, "given_up">; reason: GiveUpReason; attempts: number; error?: unknown };

export type RetryOptions = {
  retries: number;          // max attempts after initial try (e.g. 5 means up to 6 total tries)
  delayMs: number;          // fixed pause between attempts
  shouldRetry?: (err: unknown) => boolean;
  onRetry?: (ctx: { attempt: number; maxAttempts: number; delayMs: number; error: unknown }) => void;
  onGiveUp?: (ctx: { attempt: number; maxAttempts: number; reason: GiveUpReason; error?: unknown }) => void;
  sleep?: Sleeper;
  signal?: AbortSignal;
};

/**
 * Runs `fn` until it resolves or the attempt budget is spent.
 * Failures end in a `given_up` outcome instead of being thrown.
 */
export const retry = async <T>(
  fn: (attempt: number) => Promise<T>,
  opts: RetryOptions
): Promise<RetryOutcome<T>> => {
  const { retries, delayMs, shouldRetry = () => true, onRetry, onGiveUp, sleep = defaultSleep, signal } = opts;

  const maxAttempts = retries + 1;
  let attempts = 0;

  const giveUp = (reason: GiveUpReason, error?: unknown): RetryOutcome<T> => {
    onGiveUp?.({ attempt: attempts, maxAttempts, reason, error });
    return error === undefined
      ? { state: "given_up", reason, attempts }
      : { state: "given_up", reason, attempts, error };
  };

  while (true) {
    if (signal?.aborted) return giveUp("canceled");

    try {
      const value = await fn(attempts + 1);
      attempts += 1;
      return { state: "succeeded", value, attempts };
    } catch (err) {
      attempts += 1;
      if (signal?.aborted) return giveUp("canceled", err);
      if (!shouldRetry(err)) return giveUp("not_retryable", err);
      if (attempts > retries) return giveUp("exhausted_retries", err);

      onRetry?.({ attempt: attempts, maxAttempts, delayMs, error: err });
      await sleep(delayMs, signal);
    }
  }
};
