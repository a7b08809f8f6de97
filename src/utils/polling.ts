/**
 * Polling engine shared by the lifecycle, query and replication waits.
 *
 * A poll is fetch -> evaluate -> sleep. The first fetch happens immediately and no
 * sleep follows the final fetch. Without a PollControl the loop is unbounded; callers
 * bound it with an AbortSignal or a timeout.
 */

import { setTimeout as delay } from 'timers/promises';
import { PollingCancelledError, PollingDeadlineExceededError } from '../types/FeatureStoreErrors';

export interface PollingClock {
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
  now(): number;
  /** [0, 1); only consulted when jitter is configured. */
  random(): number;
}

export const systemClock: PollingClock = {
  sleep: async (ms, signal) => {
    await delay(ms, undefined, { signal });
  },
  now: () => Date.now(),
  random: () => Math.random(),
};

export interface PollSchedule {
  intervalSeconds: number;
  /** 1 (default) keeps the interval fixed. */
  backoffMultiplier?: number;
  maxIntervalSeconds?: number;
  /** Fraction of the interval added or removed at random, 0..1. Default 0. */
  jitterRatio?: number;
}

/** Everything in a schedule except the base interval; applied on top of each wait's own interval. */
export type PollBackoff = Omit<PollSchedule, 'intervalSeconds'>;

export interface PollControl {
  signal?: AbortSignal;
  timeoutSeconds?: number;
}

export interface PollResult<T> {
  value: T;
  polls: number;
}

/** Interval to wait after the given (1-based) poll number. */
export function intervalForPoll(schedule: PollSchedule, poll: number, random: () => number): number {
  const multiplier = schedule.backoffMultiplier ?? 1;
  let seconds = schedule.intervalSeconds * Math.pow(multiplier, poll - 1);
  if (schedule.maxIntervalSeconds !== undefined) {
    seconds = Math.min(seconds, schedule.maxIntervalSeconds);
  }
  const jitter = schedule.jitterRatio ?? 0;
  if (jitter > 0) {
    seconds = seconds * (1 + jitter * (2 * random() - 1));
  }
  return Math.max(0, Math.round(seconds * 1000));
}

export function pollUntil<T, U extends T>(
  operation: string,
  fetch: () => Promise<T>,
  isDone: (value: T) => value is U,
  schedule: PollSchedule,
  control?: PollControl,
  clock?: PollingClock
): Promise<PollResult<U>>;
export function pollUntil<T>(
  operation: string,
  fetch: () => Promise<T>,
  isDone: (value: T) => boolean,
  schedule: PollSchedule,
  control?: PollControl,
  clock?: PollingClock
): Promise<PollResult<T>>;
export async function pollUntil<T>(
  operation: string,
  fetch: () => Promise<T>,
  isDone: (value: T) => boolean,
  schedule: PollSchedule,
  control: PollControl = {},
  clock: PollingClock = systemClock
): Promise<PollResult<T>> {
  const { signal, timeoutSeconds } = control;
  const startedAt = clock.now();
  let polls = 0;

  for (;;) {
    if (signal?.aborted) {
      throw new PollingCancelledError(operation, polls);
    }

    const value = await fetch();
    polls += 1;
    if (isDone(value)) {
      return { value, polls };
    }

    const waitMs = intervalForPoll(schedule, polls, clock.random);
    if (timeoutSeconds !== undefined) {
      const elapsedMs = clock.now() - startedAt;
      if (elapsedMs + waitMs > timeoutSeconds * 1000) {
        throw new PollingDeadlineExceededError(operation, timeoutSeconds, polls);
      }
    }

    try {
      await clock.sleep(waitMs, signal);
    } catch (error) {
      if (signal?.aborted) {
        throw new PollingCancelledError(operation, polls);
      }
      throw error;
    }
  }
}
