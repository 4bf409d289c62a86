import { fetch } from 'undici';
import { z } from 'zod';
import { requestSignal } from './http';

const TOKEN_URL = 'https://id.twitch.tv/oauth2/token';
// Refresh a little before Twitch actually expires the token.
const EXPIRY_MARGIN_SECONDS = 300;

const appTokenSchema = z.object({
  access_token: z.string(),
  expires_in: z.number(),
  token_type: z.string()
});

type AppTokenRequest = {
  clientId: string;
  clientSecret: string;
  signal?: AbortSignal;
};

export type AppToken = {
  accessToken: string;
  expiresAt: Date;
};

export async function requestAppToken(
  { clientId, clientSecret, signal }: AppTokenRequest,
  now: Date = new Date()
): Promise<AppToken> {
  const url = new URL(TOKEN_URL);
  url.searchParams.set('client_id', clientId);
  url.searchParams.set('client_secret', clientSecret);
  url.searchParams.set('grant_type', 'client_credentials');

  const res = await fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
    signal: requestSignal(signal)
  });

  if (!res.ok) {
    const text = await res.text();
    throw new Error(`App token request failed ${res.status}: ${text}`);
  }

  const data = appTokenSchema.parse(await res.json());
  return {
    accessToken: data.access_token,
    expiresAt: new Date(now.getTime() + (data.expires_in - EXPIRY_MARGIN_SECONDS) * 1000)
  };
}

export type AppTokenProviderOptions = AppTokenRequest & {
  now?: () => Date;
};

/**
 * Owns the cached app access token. Callers that arrive while a token request
 * is in flight wait on that same request instead of starting another one.
 */
export class AppTokenProvider {
  private cached: AppToken | null = null;
  private pending: Promise<AppToken> | null = null;
  private readonly now: () => Date;

  constructor(private readonly options: AppTokenProviderOptions) {
    this.now = options.now ?? (() => new Date());
  }

  get clientId(): string {
    return this.options.clientId;
  }

  async getAccessToken(): Promise<string> {
    if (this.cached && this.cached.expiresAt.getTime() > this.now().getTime()) {
      return this.cached.accessToken;
    }

    if (!this.pending) {
      this.pending = requestAppToken(this.options, this.now())
        .then((token) => {
          this.cached = token;
          return token;
        })
        .finally(() => {
          this.pending = null;
        });
    }

    const token = await this.pending;
    return token.accessToken;
  }

  invalidate(): void {
    this.cached = null;
  }
}
