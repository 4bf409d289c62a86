import type { Localization } from './locale';
import type { ViewerTrend } from './metrics';
import type { ClipInfo, StreamSnapshot } from './types';

const SEPARATOR = ' · ';

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

// Like toFixed, but an exact half goes to the even digit (1.25 -> "1.2").
export function toFixedHalfEven(value: number, digits: number): string {
  // Only multiples of 2^-(digits + 1) can sit exactly on a half.
  const doubled = value * 2 ** (digits + 1);
  if (!Number.isInteger(doubled) || doubled % 2 === 0) {
    return value.toFixed(digits);
  }
  const scale = 10 ** digits;
  const lower = Math.floor(value * scale);
  const rounded = lower % 2 === 0 ? lower : lower + 1;
  return (rounded / scale).toFixed(digits);
}

export function formatViewers(count: number): string {
  if (count >= 1_000_000) {
    const millions = count / 1_000_000;
    return `${toFixedHalfEven(millions, millions >= 10 ? 0 : 1)}M`;
  }
  if (count >= 10_000) {
    return `${toFixedHalfEven(count / 1000, 0)}K`;
  }
  if (count >= 1000) {
    return `${toFixedHalfEven(count / 1000, 1)}K`;
  }
  return String(count);
}

export function formatDuration(ms: number, locale: Localization): string {
  const totalMinutes = Math.max(0, Math.floor(ms / 60_000));
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  if (hours > 0) {
    return `${hours} ${locale.hours} ${minutes} ${locale.minutes}`;
  }
  return `${minutes} ${locale.minutes}`;
}

export function formatTags(tags: readonly string[]): string {
  return tags
    .filter((tag) => tag.length > 0)
    .map((tag) => `#${escapeHtml(tag)}`)
    .join(' ');
}

export function formatClips(clips: readonly ClipInfo[]): string {
  return clips.map((clip) => `<a href="${escapeHtml(clip.url)}">${escapeHtml(clip.title)}</a>`).join(SEPARATOR);
}

const header = (channel: string, label: string, game: string) => {
  const parts = [`<b>${escapeHtml(channel)}</b>`, label];
  if (game) {
    parts.push(escapeHtml(game));
  }
  return parts.join(' • ');
};

const titleLine = (title: string) => (title ? `<i>${escapeHtml(title)}</i>` : '');

const sections = (...blocks: string[]) => blocks.filter((block) => block.length > 0).join('\n\n');

export function formatStartMessage(snapshot: StreamSnapshot, locale: Localization): string {
  return sections(
    header(snapshot.channel, locale.startedStreaming, snapshot.game),
    titleLine(snapshot.title),
    formatTags(snapshot.tags)
  );
}

export type UpdateMessageInput = {
  snapshot: StreamSnapshot;
  averageViewers: number;
  trend: ViewerTrend;
  clips: readonly ClipInfo[];
};

export function formatUpdateMessage(
  { snapshot, averageViewers, trend, clips }: UpdateMessageInput,
  locale: Localization
): string {
  const stats: string[] = [];
  if (snapshot.uptime) {
    stats.push(snapshot.uptime);
  }
  if (snapshot.viewers > 0) {
    let viewers = `${formatViewers(snapshot.viewers)} ${locale.viewers}`;
    if (averageViewers > 0 && averageViewers !== snapshot.viewers) {
      viewers += `, ${formatViewers(averageViewers)} ${locale.avg}`;
    }
    if (trend !== 'none') {
      viewers += `${SEPARATOR}${locale[trend]}`;
    }
    stats.push(viewers);
  }

  return sections(
    header(snapshot.channel, locale.isLive, snapshot.game),
    titleLine(snapshot.title),
    stats.join(SEPARATOR),
    formatClips(clips),
    formatTags(snapshot.tags)
  );
}

export type EndMessageInput = {
  channel: string;
  duration: string;
  averageViewers: number;
  peakViewers: number;
  game: string;
  title: string;
  tags: readonly string[];
  clips: readonly ClipInfo[];
};

export function formatEndMessage(input: EndMessageInput, locale: Localization): string {
  const stats: string[] = [];
  if (input.duration) {
    stats.push(input.duration);
  }
  if (input.averageViewers > 0) {
    let viewers = `${formatViewers(input.averageViewers)} ${locale.avg}`;
    if (input.peakViewers > input.averageViewers) {
      viewers += `, ${formatViewers(input.peakViewers)} ${locale.peak}`;
    }
    stats.push(viewers);
  }
  if (input.clips.length > 0) {
    stats.push(`${input.clips.length} ${locale.clips}`);
  }

  return sections(
    header(input.channel, locale.streamEnded, input.game),
    titleLine(input.title),
    stats.join(SEPARATOR),
    formatClips(input.clips),
    formatTags(input.tags)
  );
}
