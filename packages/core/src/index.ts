export * from './delay';
export * from './format';
export * from './http';
export * from './locale';
export * from './metrics';
export * from './monitor';
export * from './retry';
export * from './session';
export * from './token';
export * from './types';
export {
  createTwitchStreamSource,
  getClipsBetween,
  getStreamByLogin,
  getUsersByLogin,
  HelixError,
  streamUrl,
  thumbnailUrl
} from './twitch';
export type { HelixStream, HelixUser, TwitchStreamSourceOptions } from './twitch';
