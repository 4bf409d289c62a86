import type { Logger } from 'pino';
import { formatDuration, formatEndMessage, formatStartMessage, formatUpdateMessage } from './format';
import type { Localization } from './locale';
import { averageViewers, peakViewers, viewerTrend } from './metrics';
import type { RetryExecutor } from './retry';
import { streamUrl, thumbnailUrl } from './twitch';
import type { ClipInfo, Notifier, StreamSession, StreamSnapshot, StreamSource } from './types';

export type MonitorState = { kind: 'offline' } | { kind: 'live'; session: StreamSession };

export type RefreshReason = 'scheduled' | 'game-changed';

export type Transition =
  | { kind: 'idle' }
  | { kind: 'start'; snapshot: StreamSnapshot }
  | { kind: 'track'; session: StreamSession; snapshot: StreamSnapshot }
  | { kind: 'refresh'; session: StreamSession; snapshot: StreamSnapshot; reason: RefreshReason }
  | { kind: 'end'; session: StreamSession };

function assertNever(value: never): never {
  throw new Error(`Unhandled state: ${JSON.stringify(value)}`);
}

/**
 * Number of polls between periodic refreshes. Uneven intervals round down, so
 * the effective cadence can be shorter than configured; never less than one poll.
 */
export function checksPerUpdate(updateIntervalMinutes: number, checkIntervalSeconds: number): number {
  return Math.max(1, Math.floor((updateIntervalMinutes * 60) / checkIntervalSeconds));
}

/**
 * Decides what a poll should do. The live branch accounts for the sample the
 * poll is about to record, so the refresh fires on the poll that brings the
 * counter up to `threshold`.
 */
export function planTransition(state: MonitorState, snapshot: StreamSnapshot | null, threshold: number): Transition {
  switch (state.kind) {
    case 'offline':
      return snapshot ? { kind: 'start', snapshot } : { kind: 'idle' };
    case 'live': {
      const { session } = state;
      if (!snapshot) {
        return { kind: 'end', session };
      }
      if (session.game !== '' && snapshot.game !== session.game) {
        return { kind: 'refresh', session, snapshot, reason: 'game-changed' };
      }
      if (session.updateCounter + 1 >= threshold) {
        return { kind: 'refresh', session, snapshot, reason: 'scheduled' };
      }
      return { kind: 'track', session, snapshot };
    }
    default:
      return assertNever(state);
  }
}

export type SessionMachineOptions = {
  channel: string;
  checksPerUpdate: number;
  locale: Localization;
  source: StreamSource;
  notifier: Notifier;
  retry: RetryExecutor;
  logger: Logger;
  now?: () => Date;
};

export class SessionMachine {
  private state: MonitorState = { kind: 'offline' };
  private readonly now: () => Date;

  constructor(private readonly options: SessionMachineOptions) {
    this.now = options.now ?? (() => new Date());
  }

  get current(): MonitorState {
    return this.state;
  }

  get isLive(): boolean {
    return this.state.kind === 'live';
  }

  async step(snapshot: StreamSnapshot | null): Promise<Transition['kind']> {
    const transition = planTransition(this.state, snapshot, this.options.checksPerUpdate);

    switch (transition.kind) {
      case 'idle':
        break;
      case 'start':
        await this.start(transition.snapshot);
        break;
      case 'track':
        this.record(transition.session, transition.snapshot);
        break;
      case 'refresh':
        this.record(transition.session, transition.snapshot);
        await this.refresh(transition.session, transition.snapshot, transition.reason);
        break;
      case 'end':
        await this.end(transition.session);
        break;
      default:
        assertNever(transition);
    }

    return transition.kind;
  }

  private async start(snapshot: StreamSnapshot): Promise<void> {
    const { channel, locale, logger, notifier, retry, source } = this.options;
    logger.info({ channel, viewers: snapshot.viewers, game: snapshot.game }, 'stream started');

    let broadcasterId: string;
    try {
      broadcasterId = await source.getBroadcasterId(channel);
    } catch (error) {
      logger.error({ err: error, channel }, 'failed to get broadcaster ID');
      return;
    }

    const detectedAt = this.now();
    const caption = formatStartMessage(snapshot, locale);
    const outcome = await retry.execute(
      () =>
        notifier.createNotification({
          imageUrl: thumbnailUrl(channel, this.now()),
          caption,
          link: { url: snapshot.url, label: locale.buttonText }
        }),
      'send start notification'
    );

    if (outcome.status === 'cancelled') {
      return;
    }

    logger.info({ handle: outcome.value }, 'start notification sent');
    this.state = {
      kind: 'live',
      session: {
        handle: outcome.value,
        startedAt: this.now(),
        broadcasterId,
        viewerHistory: [{ timestamp: detectedAt, count: snapshot.viewers }],
        game: snapshot.game,
        title: snapshot.title,
        tags: [...snapshot.tags],
        updateCounter: 0
      }
    };
  }

  private record(session: StreamSession, snapshot: StreamSnapshot): void {
    session.viewerHistory.push({ timestamp: this.now(), count: snapshot.viewers });
    session.updateCounter += 1;
  }

  private async refresh(session: StreamSession, snapshot: StreamSnapshot, reason: RefreshReason): Promise<void> {
    const { channel, locale, logger, notifier, retry } = this.options;
    if (reason === 'game-changed') {
      logger.info({ from: session.game, to: snapshot.game }, 'game changed');
    }
    logger.info({ viewers: snapshot.viewers, uptime: snapshot.uptime }, 'updating stream info');

    const clips = await this.recentClips(session);
    const caption = formatUpdateMessage(
      {
        snapshot,
        averageViewers: averageViewers(session.viewerHistory),
        trend: viewerTrend(session.viewerHistory),
        clips
      },
      locale
    );

    const outcome = await retry.execute(
      () =>
        notifier.updateNotification(session.handle, {
          imageUrl: thumbnailUrl(channel, this.now()),
          caption,
          link: { url: snapshot.url, label: locale.buttonText }
        }),
      'update stream info'
    );
    if (outcome.status === 'ok') {
      logger.info('stream info updated');
    }

    session.updateCounter = 0;
    session.game = snapshot.game;
    session.title = snapshot.title;
    session.tags = [...snapshot.tags];
  }

  private async end(session: StreamSession): Promise<void> {
    const { channel, locale, logger, notifier, retry } = this.options;
    logger.info({ channel }, 'stream ended');

    const duration = formatDuration(this.now().getTime() - session.startedAt.getTime(), locale);
    const average = averageViewers(session.viewerHistory);
    const peak = peakViewers(session.viewerHistory);
    logger.info({ duration, avgViewers: average, maxViewers: peak }, 'stream stats');

    const clips = await this.recentClips(session);
    const caption = formatEndMessage(
      {
        channel,
        duration,
        averageViewers: average,
        peakViewers: peak,
        game: session.game,
        title: session.title,
        tags: session.tags,
        clips
      },
      locale
    );

    const outcome = await retry.execute(
      () =>
        notifier.finalizeNotification(session.handle, {
          caption,
          link: { url: streamUrl(channel), label: locale.buttonText }
        }),
      'send end notification'
    );
    if (outcome.status === 'ok') {
      logger.info('end notification sent');
    }

    this.state = { kind: 'offline' };
  }

  private async recentClips(session: StreamSession): Promise<ClipInfo[]> {
    try {
      return await this.options.source.getRecentClips(session.broadcasterId, session.startedAt);
    } catch (error) {
      this.options.logger.warn({ err: error }, 'failed to fetch clips');
      return [];
    }
  }
}
