import { Router } from 'express';
import type { Config } from '../config.js';
import { describeConfig } from '../config.js';
import type { WatcherSnapshot } from '../watch/StreamWatcher.js';

interface RouteContext {
  config: Config;
  snapshot: () => WatcherSnapshot[];
  startedAt: Date;
  now?: () => Date;
}

export interface HealthReport {
  server: 'running';
  watching: number;
  live: number;
  failing: number;
  uptimeSec: number;
}

export function buildHealthReport(channels: WatcherSnapshot[], startedAt: Date, now: Date): HealthReport {
  return {
    server: 'running',
    watching: channels.length,
    live: channels.filter((c) => c.phase === 'LIVE').length,
    failing: channels.filter((c) => c.consecutiveFailures > 0).length,
    uptimeSec: Math.floor((now.getTime() - startedAt.getTime()) / 1000),
  };
}

export function createApiRoutes(ctx: RouteContext): Router {
  const router = Router();
  const now = ctx.now ?? (() => new Date());

  router.get('/status', (_req, res) => {
    res.json({ channels: ctx.snapshot() });
  });

  router.get('/health', (_req, res) => {
    res.json(buildHealthReport(ctx.snapshot(), ctx.startedAt, now()));
  });

  router.get('/config', (_req, res) => {
    res.json(describeConfig(ctx.config));
  });

  return router;
}
