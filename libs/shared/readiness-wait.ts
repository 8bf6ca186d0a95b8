import type { Sleep } from './time';
import { sleep as realSleep } from './time';

export type ReadinessWaitResult =
  | Readonly<{ status: 'ready'; attempts: number }>
  | Readonly<{ status: 'timed_out'; attempts: number; lastError: unknown }>;

export type ReadinessWaitOptions = Readonly<{
  probe: () => Promise<void>;
  maxAttempts: number;
  intervalMs: number;
  sleep?: Sleep;
  onAttemptFailed?: (params: { attempt: number; maxAttempts: number; error: unknown }) => void;
}>;

/**
 * Calls `probe` until it resolves, at most `maxAttempts` times with a fixed `intervalMs`
 * pause between attempts. Never throws for probe failures; the caller decides what a
 * timeout means.
 */
export async function waitUntilReady(options: ReadinessWaitOptions): Promise<ReadinessWaitResult> {
  if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
    throw new Error(`maxAttempts must be a positive integer, got ${options.maxAttempts}`);
  }

  const pause = options.sleep ?? realSleep;
  let lastError: unknown;

  for (let attempt = 1; attempt <= options.maxAttempts; attempt += 1) {
    try {
      await options.probe();
      return { status: 'ready', attempts: attempt };
    } catch (error: unknown) {
      lastError = error;
      options.onAttemptFailed?.({ attempt, maxAttempts: options.maxAttempts, error });
    }

    if (attempt < options.maxAttempts) {
      await pause(options.intervalMs);
    }
  }

  return { status: 'timed_out', attempts: options.maxAttempts, lastError };
}
