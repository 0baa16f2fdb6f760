import type { Stream } from '../twitch/TwitchApiClient.js';
import type { Notification, NotificationKind } from './types.js';

/** Shown when the stream has no category set. */
export const NO_CATEGORY = 'No category';
/** Shown when the category lookup failed or missed. */
export const UNKNOWN_CATEGORY = 'Unknown category';

export const THUMBNAIL_FILE_NAME = 'thumbnail.jpg';

export const DEFAULT_COLORS: Record<NotificationKind, number> = {
  live: 0x6441a4,
  ended: 0x747f8d,
  gameChanged: 0x3498db,
};

export function channelUrl(login: string): string {
  return `https://twitch.tv/${login}`;
}

/** "2h 5m", "45m 10s", "30s". Negative spans count as zero. */
export function formatDuration(ms: number): string {
  const totalSec = Math.max(0, Math.floor(ms / 1000));
  const hours = Math.floor(totalSec / 3600);
  const minutes = Math.floor((totalSec % 3600) / 60);
  const seconds = totalSec % 60;

  if (hours > 0) return `${hours}h ${minutes}m`;
  if (minutes > 0) return `${minutes}m ${seconds}s`;
  return `${seconds}s`;
}

export function buildLiveNotification(input: {
  login: string;
  stream: Stream;
  gameName: string;
  thumbnail?: Buffer;
  color?: number;
}): Notification {
  const { login, stream, gameName, thumbnail } = input;
  return {
    kind: 'live',
    login,
    title: `${stream.userName || login} is live!`,
    description: stream.title,
    url: channelUrl(login),
    color: input.color ?? DEFAULT_COLORS.live,
    fields: [{ name: 'Playing', value: gameName, inline: true }],
    image: thumbnail ? { name: THUMBNAIL_FILE_NAME, data: thumbnail } : undefined,
    timestamp: stream.startedAt,
  };
}

export function buildEndedNotification(input: {
  login: string;
  stream: Stream;
  gameName: string;
  endedAt: Date;
  color?: number;
}): Notification {
  const { login, stream, gameName, endedAt } = input;
  return {
    kind: 'ended',
    login,
    title: `${stream.userName || login} ended the stream`,
    description: stream.title,
    url: channelUrl(login),
    color: input.color ?? DEFAULT_COLORS.ended,
    fields: [
      { name: 'Last played', value: gameName, inline: true },
      { name: 'Duration', value: formatDuration(endedAt.getTime() - stream.startedAt.getTime()), inline: true },
    ],
    timestamp: endedAt,
  };
}

export function buildGameChangedNotification(input: {
  login: string;
  stream: Stream;
  previousGameName: string;
  gameName: string;
  at: Date;
  color?: number;
}): Notification {
  const { login, stream, previousGameName, gameName, at } = input;
  return {
    kind: 'gameChanged',
    login,
    title: `${stream.userName || login} switched to ${gameName}`,
    description: `${previousGameName} → ${gameName}`,
    url: channelUrl(login),
    color: input.color ?? DEFAULT_COLORS.gameChanged,
    fields: [{ name: 'Title', value: stream.title, inline: false }],
    timestamp: at,
  };
}
