import pino from 'pino';
import { beforeEach, describe, expect, it, type Mock, vi } from 'vitest';

import { getLocalization } from '../locale';
import { RetryExecutor } from '../retry';
import { checksPerUpdate, type MonitorState, planTransition, SessionMachine } from '../session';
import type { Notifier, StreamSession, StreamSnapshot, StreamSource } from '../types';

const logger = pino({ level: 'silent' });
const en = getLocalization('en');
const START = new Date('2026-01-01T20:00:00.000Z');

const snapshot = (overrides: Partial<StreamSnapshot> = {}): StreamSnapshot => ({
  channel: 'somechannel',
  url: 'https://twitch.tv/somechannel',
  title: 'Speedrun',
  game: 'Just Chatting',
  viewers: 100,
  uptime: '1 h 30 m',
  tags: ['english'],
  ...overrides
});

const session = (overrides: Partial<StreamSession> = {}): StreamSession => ({
  handle: 77,
  startedAt: START,
  broadcasterId: '1234',
  viewerHistory: [{ timestamp: START, count: 100 }],
  game: 'Just Chatting',
  title: 'Speedrun',
  tags: ['english'],
  updateCounter: 0,
  ...overrides
});

const live = (overrides: Partial<StreamSession> = {}): MonitorState => ({ kind: 'live', session: session(overrides) });

describe('checksPerUpdate', () => {
  it('divides the update interval by the check interval, rounding down', () => {
    expect(checksPerUpdate(5, 60)).toBe(5);
    expect(checksPerUpdate(5, 70)).toBe(4);
  });

  it('never goes below one poll', () => {
    expect(checksPerUpdate(1, 120)).toBe(1);
  });
});

describe('planTransition', () => {
  it('does nothing while offline without a stream', () => {
    expect(planTransition({ kind: 'offline' }, null, 5)).toEqual({ kind: 'idle' });
  });

  it('starts a session when the channel goes live', () => {
    const snap = snapshot();
    expect(planTransition({ kind: 'offline' }, snap, 5)).toEqual({ kind: 'start', snapshot: snap });
  });

  it('ends the session when the stream disappears', () => {
    expect(planTransition(live(), null, 5)).toMatchObject({ kind: 'end' });
  });

  it('tracks viewers until the refresh threshold is reached', () => {
    expect(planTransition(live({ updateCounter: 3 }), snapshot(), 5)).toMatchObject({ kind: 'track' });
    expect(planTransition(live({ updateCounter: 4 }), snapshot(), 5)).toMatchObject({
      kind: 'refresh',
      reason: 'scheduled'
    });
  });

  it('refreshes early when the game changes', () => {
    expect(planTransition(live(), snapshot({ game: 'Chess' }), 5)).toMatchObject({
      kind: 'refresh',
      reason: 'game-changed'
    });
  });

  it('does not treat a first game after an empty one as a change', () => {
    expect(planTransition(live({ game: '' }), snapshot({ game: 'Chess' }), 5)).toMatchObject({ kind: 'track' });
  });

  it('refreshes on every poll with a threshold of one', () => {
    expect(planTransition(live(), snapshot(), 1)).toMatchObject({ kind: 'refresh', reason: 'scheduled' });
  });
});

describe('SessionMachine', () => {
  let clock: Date;
  let source: {
    getStreamSnapshot: Mock<StreamSource['getStreamSnapshot']>;
    getBroadcasterId: Mock<StreamSource['getBroadcasterId']>;
    getRecentClips: Mock<StreamSource['getRecentClips']>;
  };
  let notifier: {
    createNotification: Mock<Notifier['createNotification']>;
    updateNotification: Mock<Notifier['updateNotification']>;
    finalizeNotification: Mock<Notifier['finalizeNotification']>;
  };

  const createMachine = (options: { threshold?: number; retrySucceeds?: boolean } = {}) => {
    const controller = new AbortController();
    const retry = new RetryExecutor({
      signal: controller.signal,
      logger,
      sleep: async () => options.retrySucceeds ?? true
    });
    return new SessionMachine({
      channel: 'somechannel',
      checksPerUpdate: options.threshold ?? 5,
      locale: en,
      source,
      notifier,
      retry,
      logger,
      now: () => clock
    });
  };

  const liveSession = (machine: SessionMachine): StreamSession => {
    const state = machine.current;
    if (state.kind !== 'live') {
      throw new Error('expected a live session');
    }
    return state.session;
  };

  beforeEach(() => {
    clock = START;
    source = {
      getStreamSnapshot: vi.fn<StreamSource['getStreamSnapshot']>().mockResolvedValue(null),
      getBroadcasterId: vi.fn<StreamSource['getBroadcasterId']>().mockResolvedValue('1234'),
      getRecentClips: vi.fn<StreamSource['getRecentClips']>().mockResolvedValue([])
    };
    notifier = {
      createNotification: vi.fn<Notifier['createNotification']>().mockResolvedValue(77),
      updateNotification: vi.fn<Notifier['updateNotification']>().mockResolvedValue(undefined),
      finalizeNotification: vi.fn<Notifier['finalizeNotification']>().mockResolvedValue(undefined)
    };
  });

  it('creates the notification and seeds the session when the stream starts', async () => {
    const machine = createMachine();

    await expect(machine.step(snapshot({ viewers: 120 }))).resolves.toBe('start');

    expect(source.getBroadcasterId).toHaveBeenCalledWith('somechannel');
    expect(notifier.createNotification).toHaveBeenCalledWith({
      imageUrl: 'https://static-cdn.jtvnw.net/previews-ttv/live_user_somechannel-1920x1080.jpg?t=1767297600',
      caption: '<b>somechannel</b> • LIVE • Just Chatting\n\n<i>Speedrun</i>\n\n#english',
      link: { url: 'https://twitch.tv/somechannel', label: 'Watch' }
    });
    expect(liveSession(machine)).toEqual({
      handle: 77,
      startedAt: START,
      broadcasterId: '1234',
      viewerHistory: [{ timestamp: START, count: 120 }],
      game: 'Just Chatting',
      title: 'Speedrun',
      tags: ['english'],
      updateCounter: 0
    });
  });

  it('stays offline when the broadcaster lookup fails', async () => {
    source.getBroadcasterId.mockRejectedValueOnce(new Error('helix down'));
    const machine = createMachine();

    await machine.step(snapshot());

    expect(machine.current).toEqual({ kind: 'offline' });
    expect(notifier.createNotification).not.toHaveBeenCalled();
  });

  it('creates no session when the start delivery is cancelled', async () => {
    notifier.createNotification.mockRejectedValue(new Error('telegram down'));
    const machine = createMachine({ retrySucceeds: false });

    await machine.step(snapshot());

    expect(notifier.createNotification).toHaveBeenCalledTimes(1);
    expect(machine.current).toEqual({ kind: 'offline' });
  });

  it('records a sample on every live poll without editing the message', async () => {
    const machine = createMachine();
    await machine.step(snapshot({ viewers: 120 }));

    await expect(machine.step(snapshot({ viewers: 130 }))).resolves.toBe('track');

    const current = liveSession(machine);
    expect(current.viewerHistory.map((point) => point.count)).toEqual([120, 130]);
    expect(current.updateCounter).toBe(1);
    expect(notifier.updateNotification).not.toHaveBeenCalled();
  });

  it('edits the message once the refresh threshold is reached', async () => {
    source.getRecentClips.mockResolvedValue([{ url: 'https://clips.twitch.tv/Abc', title: 'Nice' }]);
    const machine = createMachine({ threshold: 3 });
    await machine.step(snapshot({ viewers: 100 }));
    await machine.step(snapshot({ viewers: 110 }));
    await machine.step(snapshot({ viewers: 120 }));

    await expect(machine.step(snapshot({ viewers: 130, title: 'New title' }))).resolves.toBe('refresh');

    expect(source.getRecentClips).toHaveBeenCalledWith('1234', START);
    expect(notifier.updateNotification).toHaveBeenCalledTimes(1);
    expect(notifier.updateNotification).toHaveBeenCalledWith(77, {
      imageUrl: 'https://static-cdn.jtvnw.net/previews-ttv/live_user_somechannel-1920x1080.jpg?t=1767297600',
      caption: [
        '<b>somechannel</b> • LIVE • Just Chatting',
        '<i>New title</i>',
        '1 h 30 m · 130 viewers, 115 avg · growing',
        '<a href="https://clips.twitch.tv/Abc">Nice</a>',
        '#english'
      ].join('\n\n'),
      link: { url: 'https://twitch.tv/somechannel', label: 'Watch' }
    });

    const current = liveSession(machine);
    expect(current.updateCounter).toBe(0);
    expect(current.title).toBe('New title');
    expect(current.viewerHistory).toHaveLength(4);
  });

  it('edits the message right away when the game changes', async () => {
    const machine = createMachine();
    await machine.step(snapshot());

    await expect(machine.step(snapshot({ game: 'Chess', tags: ['chess'] }))).resolves.toBe('refresh');

    expect(notifier.updateNotification).toHaveBeenCalledTimes(1);
    const current = liveSession(machine);
    expect(current.game).toBe('Chess');
    expect(current.tags).toEqual(['chess']);
    expect(current.updateCounter).toBe(0);
  });

  it('refreshes without clips when the clip lookup fails', async () => {
    source.getRecentClips.mockRejectedValue(new Error('helix down'));
    const machine = createMachine({ threshold: 1 });
    await machine.step(snapshot({ viewers: 100 }));

    await machine.step(snapshot({ viewers: 100 }));

    expect(notifier.updateNotification).toHaveBeenCalledWith(
      77,
      expect.objectContaining({
        caption: '<b>somechannel</b> • LIVE • Just Chatting\n\n<i>Speedrun</i>\n\n1 h 30 m · 100 viewers\n\n#english'
      })
    );
  });

  it('resets the counter even when the refresh delivery is cancelled', async () => {
    const machine = createMachine({ threshold: 1, retrySucceeds: false });
    await machine.step(snapshot());
    notifier.updateNotification.mockRejectedValue(new Error('telegram down'));

    await machine.step(snapshot({ title: 'Other' }));

    const current = liveSession(machine);
    expect(current.updateCounter).toBe(0);
    expect(current.title).toBe('Other');
  });

  it('finalizes the message with session stats when the stream ends', async () => {
    const machine = createMachine();
    await machine.step(snapshot({ viewers: 100 }));
    await machine.step(snapshot({ viewers: 300 }));
    clock = new Date(START.getTime() + (2 * 60 + 5) * 60_000);

    await expect(machine.step(null)).resolves.toBe('end');

    expect(notifier.finalizeNotification).toHaveBeenCalledWith(77, {
      caption: '<b>somechannel</b> • OFFLINE • Just Chatting\n\n<i>Speedrun</i>\n\n2 h 5 m · 200 avg, 300 peak\n\n#english',
      link: { url: 'https://twitch.tv/somechannel', label: 'Watch' }
    });
    expect(machine.current).toEqual({ kind: 'offline' });
  });

  it('clears the session even when the end delivery is cancelled', async () => {
    const machine = createMachine({ retrySucceeds: false });
    await machine.step(snapshot());
    notifier.finalizeNotification.mockRejectedValue(new Error('telegram down'));

    await machine.step(null);

    expect(machine.current).toEqual({ kind: 'offline' });
  });

  it('starts the next session with a fresh history', async () => {
    notifier.createNotification.mockResolvedValueOnce(77).mockResolvedValueOnce(78);
    const machine = createMachine();
    await machine.step(snapshot({ viewers: 100 }));
    await machine.step(snapshot({ viewers: 200 }));
    await machine.step(null);

    await machine.step(snapshot({ viewers: 50 }));

    const current = liveSession(machine);
    expect(current.handle).toBe(78);
    expect(current.viewerHistory.map((point) => point.count)).toEqual([50]);
  });
});
