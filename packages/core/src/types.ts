export type StreamSnapshot = {
  channel: string;
  url: string;
  title: string;
  game: string;
  viewers: number;
  uptime: string;
  tags: string[];
};

export type ViewerDataPoint = {
  readonly timestamp: Date;
  readonly count: number;
};

export type ClipInfo = {
  url: string;
  title: string;
};

// Telegram message_id of the message kept in sync with the session.
export type NotificationHandle = number;

export type StreamSession = {
  readonly handle: NotificationHandle;
  readonly startedAt: Date;
  readonly broadcasterId: string;
  readonly viewerHistory: ViewerDataPoint[];
  game: string;
  title: string;
  tags: string[];
  updateCounter: number;
};

export type NotificationLink = {
  url: string;
  label: string;
};

export type NotificationPayload = {
  imageUrl: string;
  caption: string;
  link: NotificationLink;
};

export type CaptionPayload = Omit<NotificationPayload, 'imageUrl'>;

export type StreamSource = {
  getStreamSnapshot(channel: string): Promise<StreamSnapshot | null>;
  getBroadcasterId(channel: string): Promise<string>;
  getRecentClips(broadcasterId: string, since: Date): Promise<ClipInfo[]>;
};

export type Notifier = {
  createNotification(payload: NotificationPayload): Promise<NotificationHandle>;
  updateNotification(handle: NotificationHandle, payload: NotificationPayload): Promise<void>;
  finalizeNotification(handle: NotificationHandle, payload: CaptionPayload): Promise<void>;
};
