import type { ViewerDataPoint } from './types';

export type ViewerTrend = 'growing' | 'steady' | 'dropping' | 'none';

const TREND_MIN_POINTS = 4;
const TREND_THRESHOLD = 0.07;

const sum = (points: readonly ViewerDataPoint[]) => points.reduce((total, point) => total + point.count, 0);

export function averageViewers(history: readonly ViewerDataPoint[]): number {
  if (history.length === 0) {
    return 0;
  }
  return Math.trunc(sum(history) / history.length);
}

export function peakViewers(history: readonly ViewerDataPoint[]): number {
  if (history.length === 0) {
    return 0;
  }
  return history.reduce((peak, point) => Math.max(peak, point.count), history[0].count);
}

/**
 * Compares the mean of the first half of the history with the mean of the
 * second half. An odd middle sample belongs to the second half.
 */
export function viewerTrend(history: readonly ViewerDataPoint[]): ViewerTrend {
  if (history.length < TREND_MIN_POINTS) {
    return 'none';
  }

  const mid = Math.floor(history.length / 2);
  const early = history.slice(0, mid);
  const late = history.slice(mid);
  const earlyMean = sum(early) / early.length;
  const lateMean = sum(late) / late.length;

  if (earlyMean === 0) {
    return lateMean > 0 ? 'growing' : 'steady';
  }

  const change = (lateMean - earlyMean) / earlyMean;
  if (change > TREND_THRESHOLD) return 'growing';
  if (change < -TREND_THRESHOLD) return 'dropping';
  return 'steady';
}
