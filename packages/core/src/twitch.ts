import { fetch } from 'undici';
import { z } from 'zod';
import { formatDuration } from './format';
import { requestSignal } from './http';
import type { Localization } from './locale';
import type { AppTokenProvider } from './token';
import type { ClipInfo, StreamSnapshot, StreamSource } from './types';

const HELIX_BASE = 'https://api.twitch.tv/helix';
const CLIP_PAGE_SIZE = '20';

export class HelixError extends Error {
  constructor(public readonly status: number, message: string) {
    super(message);
    this.name = 'HelixError';
  }
}

const helixList = <T extends z.ZodTypeAny>(item: T) => z.object({ data: z.array(item) });

const streamSchema = z.object({
  user_login: z.string(),
  game_name: z.string(),
  title: z.string(),
  viewer_count: z.number(),
  started_at: z.string(),
  tags: z.array(z.string()).nullish()
});

const userSchema = z.object({
  id: z.string(),
  login: z.string(),
  display_name: z.string()
});

const clipSchema = z.object({
  url: z.string(),
  title: z.string(),
  view_count: z.number(),
  created_at: z.string()
});

export type HelixStream = z.infer<typeof streamSchema>;
export type HelixUser = z.infer<typeof userSchema>;

async function helixRequest<T extends z.ZodTypeAny>(
  path: string,
  tokens: AppTokenProvider,
  schema: T,
  query?: Record<string, string | undefined>,
  signal?: AbortSignal
): Promise<z.infer<T>> {
  const url = new URL(`${HELIX_BASE}${path}`);
  if (query) {
    Object.entries(query).forEach(([key, value]) => {
      if (value) url.searchParams.set(key, value);
    });
  }

  let retriedAfterRefresh = false;
  while (true) {
    const accessToken = await tokens.getAccessToken();
    const res = await fetch(url, {
      headers: {
        Authorization: `Bearer ${accessToken}`,
        'Client-Id': tokens.clientId
      },
      signal: requestSignal(signal)
    });

    if (res.status === 401 && !retriedAfterRefresh) {
      tokens.invalidate();
      retriedAfterRefresh = true;
      continue;
    }

    if (res.status === 429) {
      throw new HelixError(res.status, 'rate limited');
    }

    if (!res.ok) {
      const body = await res.text();
      throw new HelixError(res.status, body);
    }

    return schema.parse(await res.json());
  }
}

export async function getStreamByLogin(
  tokens: AppTokenProvider,
  login: string,
  signal?: AbortSignal
): Promise<HelixStream | null> {
  const response = await helixRequest('/streams', tokens, helixList(streamSchema), { user_login: login }, signal);
  return response.data[0] ?? null;
}

export async function getUsersByLogin(
  tokens: AppTokenProvider,
  login: string,
  signal?: AbortSignal
): Promise<HelixUser | null> {
  const response = await helixRequest('/users', tokens, helixList(userSchema), { login }, signal);
  return response.data[0] ?? null;
}

export async function getClipsBetween(
  tokens: AppTokenProvider,
  broadcasterId: string,
  startedAt: Date,
  endedAt: Date,
  signal?: AbortSignal
): Promise<ClipInfo[]> {
  const response = await helixRequest(
    '/clips',
    tokens,
    helixList(clipSchema),
    {
      broadcaster_id: broadcasterId,
      started_at: toRfc3339(startedAt),
      ended_at: toRfc3339(endedAt),
      first: CLIP_PAGE_SIZE
    },
    signal
  );
  return response.data.map((clip) => ({ url: clip.url, title: clip.title }));
}

const toRfc3339 = (date: Date) => date.toISOString().replace(/\.\d{3}Z$/, 'Z');

export const streamUrl = (login: string) => `https://twitch.tv/${login}`;

export function thumbnailUrl(channel: string, at: Date): string {
  const stamp = Math.floor(at.getTime() / 1000);
  return `https://static-cdn.jtvnw.net/previews-ttv/live_user_${channel}-1920x1080.jpg?t=${stamp}`;
}

export type TwitchStreamSourceOptions = {
  tokens: AppTokenProvider;
  locale: Localization;
  now?: () => Date;
  /** Aborts in-flight Helix requests on shutdown. */
  signal?: AbortSignal;
};

export function createTwitchStreamSource({
  tokens,
  locale,
  now = () => new Date(),
  signal
}: TwitchStreamSourceOptions): StreamSource {
  return {
    async getStreamSnapshot(channel) {
      const stream = await getStreamByLogin(tokens, channel, signal);
      if (!stream) {
        return null;
      }

      const snapshot: StreamSnapshot = {
        channel: stream.user_login,
        url: streamUrl(stream.user_login),
        title: stream.title,
        game: stream.game_name,
        viewers: stream.viewer_count,
        uptime: formatDuration(now().getTime() - Date.parse(stream.started_at), locale),
        tags: stream.tags ?? []
      };
      return snapshot;
    },

    async getBroadcasterId(channel) {
      const user = await getUsersByLogin(tokens, channel, signal);
      if (!user) {
        throw new Error(`Broadcaster not found: ${channel}`);
      }
      return user.id;
    },

    async getRecentClips(broadcasterId, since) {
      return getClipsBetween(tokens, broadcasterId, since, now(), signal);
    }
  };
}
