import type { Logger } from 'pino';
import { delay, type Sleep } from './delay';

export type RetrySchedule = {
  /** Waits used in order after the first failures. */
  backoffMs: readonly number[];
  /** Wait used for every retry once `backoffMs` is exhausted. */
  steadyMs: number;
};

export const DEFAULT_RETRY_SCHEDULE: RetrySchedule = {
  backoffMs: [1, 3, 5, 10, 15, 30, 45, 60].map((seconds) => seconds * 1000),
  steadyMs: 60_000
};

// There is no "gave up" outcome: an operation either succeeds or the signal aborts.
export type RetryOutcome<T> =
  | { status: 'ok'; value: T; attempts: number }
  | { status: 'cancelled'; attempts: number };

export type RetryExecutorOptions = {
  signal: AbortSignal;
  logger: Logger;
  schedule?: RetrySchedule;
  sleep?: Sleep;
};

export function retryDelayMs(schedule: RetrySchedule, failures: number): number {
  return schedule.backoffMs[failures - 1] ?? schedule.steadyMs;
}

export class RetryExecutor {
  private readonly signal: AbortSignal;
  private readonly logger: Logger;
  private readonly schedule: RetrySchedule;
  private readonly sleep: Sleep;

  constructor(options: RetryExecutorOptions) {
    this.signal = options.signal;
    this.logger = options.logger;
    this.schedule = options.schedule ?? DEFAULT_RETRY_SCHEDULE;
    this.sleep = options.sleep ?? delay;
  }

  async execute<T>(operation: () => Promise<T>, label: string): Promise<RetryOutcome<T>> {
    let attempts = 0;

    while (true) {
      attempts += 1;
      try {
        const value = await operation();
        if (attempts > this.schedule.backoffMs.length + 1) {
          this.logger.info({ name: label, attempts }, 'operation recovered');
        }
        return { status: 'ok', value, attempts };
      } catch (error) {
        const waitMs = retryDelayMs(this.schedule, attempts);
        this.logger.warn({ name: label, attempt: attempts, nextInMs: waitMs, err: error }, 'operation failed, retrying');

        const completed = await this.sleep(waitMs, this.signal);
        if (!completed) {
          this.logger.info({ name: label, attempts }, 'retry cancelled');
          return { status: 'cancelled', attempts };
        }
      }
    }
  }
}
