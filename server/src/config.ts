import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { DEFAULT_COLORS } from './notify/format.js';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const envSchema = z
  .object({
    TWITCH_CLIENT_ID: z.string().min(1, 'is required'),
    TWITCH_CLIENT_SECRET: z.string().default(''),
    TWITCH_ACCESS_TOKEN: z.string().default(''),
    DISCORD_WEBHOOK_URL: z.string().url(),
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  })
  .refine((env) => env.TWITCH_CLIENT_SECRET !== '' || env.TWITCH_ACCESS_TOKEN !== '', {
    message: 'either TWITCH_CLIENT_SECRET or TWITCH_ACCESS_TOKEN must be set',
    path: ['TWITCH_CLIENT_SECRET'],
  });

const login = z
  .string()
  .trim()
  .toLowerCase()
  .regex(/^[a-z0-9_]{1,25}$/, 'is not a valid Twitch login');

const color = z.number().int().min(0).max(0xffffff);

const fileSchema = z.object({
  channels: z
    .array(login)
    .min(1, 'must list at least one channel')
    .refine((list) => new Set(list).size === list.length, 'must not contain duplicates'),
  pollIntervalSec: z.number().min(5).default(30),
  workers: z.number().int().positive().default(2),
  http: z
    .object({
      timeoutMs: z.number().int().positive().default(15_000),
      metadataConcurrency: z.number().int().positive().default(4),
      thumbnailConcurrency: z.number().int().positive().default(2),
    })
    .default({}),
  thumbnail: z
    .object({
      width: z.number().int().positive().default(1920),
      height: z.number().int().positive().default(1080),
    })
    .default({}),
  discord: z
    .object({
      username: z.string().min(1).optional(),
      mentionRoleId: z.string().regex(/^\d+$/, 'must be a role snowflake').optional(),
      colors: z
        .object({
          live: color.default(DEFAULT_COLORS.live),
          ended: color.default(DEFAULT_COLORS.ended),
          gameChanged: color.default(DEFAULT_COLORS.gameChanged),
        })
        .default({}),
    })
    .default({}),
  server: z
    .object({
      enabled: z.boolean().default(false),
      port: z.number().int().min(0).max(65535).default(3000),
    })
    .default({}),
  authFailureLimit: z.number().int().positive().default(3),
  shutdownGraceMs: z.number().int().nonnegative().default(10_000),
});

function describeIssues(source: string, error: z.ZodError): string[] {
  return error.issues.map((issue) => `${source}: ${issue.path.join('.') || '(root)'} ${issue.message}`);
}

/** Validate the parsed config file plus environment. Throws ConfigError listing every problem. */
export function parseConfig(fileConfig: unknown, env: Record<string, string | undefined>) {
  const envResult = envSchema.safeParse(env);
  const fileResult = fileSchema.safeParse(fileConfig);

  if (!envResult.success || !fileResult.success) {
    const problems = [
      ...(envResult.success ? [] : describeIssues('env', envResult.error)),
      ...(fileResult.success ? [] : describeIssues('config', fileResult.error)),
    ];
    throw new ConfigError(`Invalid configuration:\n  ${problems.join('\n  ')}`);
  }

  const e = envResult.data;
  const f = fileResult.data;

  return {
    twitch: {
      clientId: e.TWITCH_CLIENT_ID,
      clientSecret: e.TWITCH_CLIENT_SECRET,
      accessToken: e.TWITCH_ACCESS_TOKEN,
    },
    discord: {
      webhookUrl: e.DISCORD_WEBHOOK_URL,
      username: f.discord.username,
      mentionRoleId: f.discord.mentionRoleId,
      colors: f.discord.colors,
    },
    channels: f.channels,
    pollIntervalMs: f.pollIntervalSec * 1000,
    workers: f.workers,
    http: f.http,
    thumbnail: f.thumbnail,
    server: f.server,
    authFailureLimit: f.authFailureLimit,
    shutdownGraceMs: f.shutdownGraceMs,
    logLevel: e.LOG_LEVEL,
  };
}

export type Config = ReturnType<typeof parseConfig>;

/**
 * Load `.env` and `herald.config.json` from the working directory
 * (HERALD_CONFIG overrides the file path).
 */
export function loadConfig(): Config {
  loadDotenv({ path: resolve(process.cwd(), '.env') });

  const configPath = process.env.HERALD_CONFIG ?? resolve(process.cwd(), 'herald.config.json');
  let fileConfig: unknown;
  try {
    fileConfig = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Cannot read ${configPath}: ${err instanceof Error ? err.message : String(err)}`);
  }

  return parseConfig(fileConfig, process.env);
}

/** Config with secrets masked, for logging and the status API. */
export function describeConfig(cfg: Config) {
  return {
    channels: cfg.channels,
    pollIntervalMs: cfg.pollIntervalMs,
    workers: cfg.workers,
    http: { ...cfg.http },
    thumbnail: { ...cfg.thumbnail },
    twitch: {
      clientId: cfg.twitch.clientId,
      auth: cfg.twitch.accessToken ? 'static token' : 'client credentials',
    },
    discord: {
      webhook: '●●●●' + cfg.discord.webhookUrl.slice(-4),
      username: cfg.discord.username ?? null,
      mentionRoleId: cfg.discord.mentionRoleId ?? null,
    },
    server: { ...cfg.server },
  };
}
