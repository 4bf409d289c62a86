import Fastify, { type FastifyInstance } from 'fastify';
import { averageViewers, type MonitorState, peakViewers, type ViewerTrend, viewerTrend } from '@herald/core';

export type StatusView =
  | { state: 'offline' }
  | {
      state: 'live';
      startedAt: string;
      game: string;
      title: string;
      currentViewers: number;
      averageViewers: number;
      peakViewers: number;
      trend: ViewerTrend;
      samples: number;
      updateCounter: number;
    };

export function describeState(state: MonitorState): StatusView {
  if (state.kind === 'offline') {
    return { state: 'offline' };
  }

  const { session } = state;
  const history = session.viewerHistory;
  return {
    state: 'live',
    startedAt: session.startedAt.toISOString(),
    game: session.game,
    title: session.title,
    currentViewers: history[history.length - 1]?.count ?? 0,
    averageViewers: averageViewers(history),
    peakViewers: peakViewers(history),
    trend: viewerTrend(history),
    samples: history.length,
    updateCounter: session.updateCounter
  };
}

export function buildStatusServer(getState: () => MonitorState): FastifyInstance {
  const server = Fastify();

  server.get('/healthz', async () => ({ status: 'ok' }));
  server.get('/status', async () => describeState(getState()));

  return server;
}
