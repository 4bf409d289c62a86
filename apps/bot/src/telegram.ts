import { fetch, FormData } from 'undici';
import { z } from 'zod';
import {
  type CaptionPayload,
  type NotificationHandle,
  type NotificationLink,
  type NotificationPayload,
  type Notifier,
  requestSignal
} from '@herald/core';

const TELEGRAM_BASE = 'https://api.telegram.org';
const PHOTO_FILENAME = 'thumbnail.jpg';

const telegramResponseSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional()
});

const sentMessageSchema = z.object({
  message_id: z.number()
});

export class TelegramError extends Error {
  constructor(public readonly method: string, public readonly status: number, description: string) {
    super(`Telegram ${method} failed ${status}: ${description}`);
    this.name = 'TelegramError';
  }
}

export type TelegramNotifierOptions = {
  botToken: string;
  chatId: number;
  threadId?: number;
  signal?: AbortSignal;
};

const buildKeyboard = (link: NotificationLink) => ({
  inline_keyboard: [[{ text: link.label, url: link.url }]]
});

// Telegram rejects an edit that would leave the message unchanged.
const isNotModified = (description: string | undefined) =>
  description?.toLowerCase().includes('message is not modified') ?? false;

async function downloadImage(url: string, signal?: AbortSignal): Promise<Blob> {
  const res = await fetch(url, { signal: requestSignal(signal) });
  if (!res.ok) {
    throw new Error(`Image download failed ${res.status}`);
  }
  return new Blob([await res.arrayBuffer()], { type: res.headers.get('content-type') ?? 'image/jpeg' });
}

export class TelegramNotifier implements Notifier {
  constructor(private readonly options: TelegramNotifierOptions) {}

  async createNotification(payload: NotificationPayload): Promise<NotificationHandle> {
    const image = await downloadImage(payload.imageUrl, this.options.signal);

    const form = new FormData();
    form.append('chat_id', String(this.options.chatId));
    if (this.options.threadId !== undefined) {
      form.append('message_thread_id', String(this.options.threadId));
    }
    form.append('caption', payload.caption);
    form.append('parse_mode', 'HTML');
    form.append('reply_markup', JSON.stringify(buildKeyboard(payload.link)));
    form.append('photo', image, PHOTO_FILENAME);

    const result = await this.call('sendPhoto', form);
    return sentMessageSchema.parse(result).message_id;
  }

  async updateNotification(handle: NotificationHandle, payload: NotificationPayload): Promise<void> {
    const image = await downloadImage(payload.imageUrl, this.options.signal);

    const form = new FormData();
    form.append('chat_id', String(this.options.chatId));
    form.append('message_id', String(handle));
    form.append(
      'media',
      JSON.stringify({ type: 'photo', media: 'attach://photo', caption: payload.caption, parse_mode: 'HTML' })
    );
    form.append('reply_markup', JSON.stringify(buildKeyboard(payload.link)));
    form.append('photo', image, PHOTO_FILENAME);

    await this.call('editMessageMedia', form);
  }

  async finalizeNotification(handle: NotificationHandle, payload: CaptionPayload): Promise<void> {
    await this.call(
      'editMessageCaption',
      JSON.stringify({
        chat_id: this.options.chatId,
        message_id: handle,
        caption: payload.caption,
        parse_mode: 'HTML',
        reply_markup: buildKeyboard(payload.link)
      })
    );
  }

  private async call(method: string, body: FormData | string): Promise<unknown> {
    const res = await fetch(`${TELEGRAM_BASE}/bot${this.options.botToken}/${method}`, {
      method: 'POST',
      headers: typeof body === 'string' ? { 'Content-Type': 'application/json' } : undefined,
      body,
      signal: requestSignal(this.options.signal)
    });

    const parsed = telegramResponseSchema.safeParse(await res.json().catch(() => null));
    if (parsed.success && parsed.data.ok) {
      return parsed.data.result;
    }

    const description = parsed.success ? parsed.data.description : undefined;
    if (method !== 'sendPhoto' && isNotModified(description)) {
      return undefined;
    }
    throw new TelegramError(method, res.status, description ?? 'unexpected response');
  }
}
