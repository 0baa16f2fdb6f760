import { ConfigError } from '../config.js';
import { logger } from '../logger.js';
import type { TwitchApiClient } from './TwitchApiClient.js';

/**
 * Startup check: every configured login must resolve to a Twitch user.
 * Also proves the credentials work before any watcher starts.
 */
export async function verifyChannels(
  api: Pick<TwitchApiClient, 'getUsersByLogins'>,
  logins: string[],
): Promise<void> {
  const users = await api.getUsersByLogins(logins);
  const known = new Set(users.map((u) => u.login.toLowerCase()));
  const missing = logins.filter((login) => !known.has(login));

  if (missing.length > 0) {
    throw new ConfigError(`Unknown Twitch channel(s): ${missing.join(', ')}`);
  }
  logger.info(`[TwitchApi] Verified ${users.length} channel(s)`, {
    channels: users.map((u) => u.display_name),
  });
}
