import { HarnessError, describeError, isPermanent } from "./errors.js";
import { log } from "./log.js";

export type PollPolicy = {
  intervalMs: number;
  maxAttempts: number;
};

export type PollOptions = PollPolicy & {
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
};

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Runs `attempt` until it resolves, on a constant interval with no jitter.
 * Permanent harness errors stop the loop at once; any other failure is retried
 * until `maxAttempts` attempts have run, then reported as `retry_exhausted`.
 */
export const pollUntil = async <T>(
  label: string,
  attempt: (attemptNumber: number) => Promise<T>,
  options: PollOptions
): Promise<T> => {
  const wait = options.sleep ?? sleep;
  const now = options.now ?? Date.now;
  const started = now();
  let lastError: unknown;
  for (let attemptNumber = 1; attemptNumber <= options.maxAttempts; attemptNumber += 1) {
    try {
      return await attempt(attemptNumber);
    } catch (error) {
      if (isPermanent(error)) {
        throw error;
      }
      lastError = error;
      log.warn("poll.attempt_failed", {
        label,
        attempt: attemptNumber,
        maxAttempts: options.maxAttempts,
        error: describeError(error)
      });
    }
    if (attemptNumber < options.maxAttempts) {
      await wait(options.intervalMs);
    }
  }
  const elapsedMs = now() - started;
  log.error("poll.exhausted", { label, attempts: options.maxAttempts, elapsedMs });
  throw new HarnessError(
    "retry_exhausted",
    `${label}: gave up after ${options.maxAttempts} attempts in ${elapsedMs}ms: ${describeError(lastError)}`,
    { cause: lastError }
  );
};
