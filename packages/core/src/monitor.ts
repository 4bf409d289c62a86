import { rm } from 'node:fs/promises';
import type { Logger } from 'pino';
import { delay, type Sleep } from './delay';
import type { SessionMachine } from './session';
import type { StreamSnapshot, StreamSource } from './types';

export const DEFAULT_SIMULATE_END_PATH = 'simulate_end';

export type MonitorOptions = {
  channel: string;
  checkIntervalMs: number;
  source: Pick<StreamSource, 'getStreamSnapshot'>;
  machine: Pick<SessionMachine, 'isLive' | 'step'>;
  signal: AbortSignal;
  logger: Logger;
  simulateEndPath?: string;
  sleep?: Sleep;
};

/** Removes the debug sentinel; resolves whether it was there. */
export async function consumeSentinel(path: string): Promise<boolean> {
  try {
    await rm(path);
    return true;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

async function sentinelPresent(path: string, logger: Logger): Promise<boolean> {
  try {
    return await consumeSentinel(path);
  } catch (error) {
    logger.warn({ err: error, path }, 'simulate_end trigger could not be removed');
    return false;
  }
}

export async function pollOnce(options: MonitorOptions): Promise<void> {
  const { channel, logger, machine, source, signal } = options;

  let snapshot: StreamSnapshot | null;
  if ((await sentinelPresent(options.simulateEndPath ?? DEFAULT_SIMULATE_END_PATH, logger)) && machine.isLive) {
    logger.info('simulate_end trigger detected');
    snapshot = null;
  } else {
    try {
      snapshot = await source.getStreamSnapshot(channel);
    } catch (error) {
      if (!signal.aborted) {
        logger.error({ err: error }, 'stream status check failed');
      }
      return;
    }
  }

  await machine.step(snapshot);
}

export async function runMonitor(options: MonitorOptions): Promise<void> {
  const { channel, checkIntervalMs, logger, signal } = options;
  const sleep = options.sleep ?? delay;

  logger.info({ channel, checkIntervalMs }, 'monitor started');
  while (!signal.aborted) {
    await pollOnce(options);
    if (!(await sleep(checkIntervalMs, signal))) {
      break;
    }
  }
  logger.info('monitor stopped');
}
