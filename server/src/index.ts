import express from 'express';
import { createServer, type Server } from 'node:http';
import { describeConfig, loadConfig, type Config } from './config.js';
import { errorMeta, logger } from './logger.js';
import { createApiRoutes } from './api/routes.js';
import { TwitchApiClient } from './twitch/TwitchApiClient.js';
import { verifyChannels } from './twitch/verifyChannels.js';
import type { ApiError } from './twitch/errors.js';
import { DiscordWebhookNotifier } from './notify/DiscordWebhookNotifier.js';
import { StreamWatcher } from './watch/StreamWatcher.js';
import { WatchScheduler } from './watch/WatchScheduler.js';

function startHttpServer(config: Config, scheduler: WatchScheduler, startedAt: Date): Server {
  const app = express();
  app.use('/api', createApiRoutes({ config, snapshot: () => scheduler.snapshot(), startedAt }));

  const httpServer = createServer(app);
  httpServer.listen(config.server.port, () => {
    logger.info(`Status API listening on http://localhost:${config.server.port}/api`);
  });
  return httpServer;
}

async function main() {
  const startedAt = new Date();

  // ─── Configuration (fatal when invalid) ───
  const config = loadConfig();
  logger.level = config.logLevel;
  logger.info('Starting stream-herald...', describeConfig(config));

  // ─── Twitch API Client ───
  const twitch = new TwitchApiClient({
    clientId: config.twitch.clientId,
    clientSecret: config.twitch.clientSecret,
    accessToken: config.twitch.accessToken,
    timeoutMs: config.http.timeoutMs,
    metadataConcurrency: config.http.metadataConcurrency,
    thumbnailConcurrency: config.http.thumbnailConcurrency,
  });
  await twitch.authenticate();
  await verifyChannels(twitch, config.channels);

  // ─── Discord webhook ───
  const notifier = DiscordWebhookNotifier.fromUrl(config.discord.webhookUrl, {
    username: config.discord.username,
    mentionRoleId: config.discord.mentionRoleId,
  });

  // ─── One watcher per channel ───
  const watchers = config.channels.map(
    (login) =>
      new StreamWatcher({
        login,
        api: twitch,
        sink: notifier,
        thumbnailSize: config.thumbnail,
        colors: config.discord.colors,
        authFailureLimit: config.authFailureLimit,
      }),
  );
  const scheduler = new WatchScheduler(watchers, {
    intervalMs: config.pollIntervalMs,
    workers: config.workers,
  });

  const httpServer = config.server.enabled ? startHttpServer(config, scheduler, startedAt) : null;

  scheduler.start();

  // ─── Graceful Shutdown ───
  let shuttingDown = false;
  const shutdown = async (exitCode: number) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Shutting down...');
    scheduler.stop();
    await scheduler.drain(config.shutdownGraceMs);
    notifier.destroy();
    if (httpServer) {
      await new Promise<void>((resolve) => httpServer.close(() => resolve()));
    }
    process.exit(exitCode);
  };

  scheduler.on('fatal', (login: string, err: ApiError) => {
    logger.error(`Twitch keeps rejecting our credentials (last seen polling ${login}), exiting`, errorMeta(err));
    void shutdown(1);
  });

  process.on('SIGINT', () => void shutdown(0));
  process.on('SIGTERM', () => void shutdown(0));
}

main().catch((err) => {
  logger.error('Fatal error', errorMeta(err));
  process.exit(1);
});
