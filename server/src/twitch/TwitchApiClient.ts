import { z } from 'zod';
import { logger } from '../logger.js';
import { TaskPool } from '../watch/TaskPool.js';
import { ApiError, InvalidResponseError, TransportError } from './errors.js';

// ─── Twitch Helix API payloads ───

const helixStream = z.object({
  user_login: z.string(),
  user_name: z.string(),
  game_id: z.string(),
  type: z.string(),
  title: z.string(),
  viewer_count: z.number().int().nonnegative(),
  started_at: z.string().datetime({ offset: true }),
  thumbnail_url: z.string(),
});

const helixGame = z.object({
  id: z.string(),
  name: z.string(),
});

const helixUser = z.object({
  id: z.string(),
  login: z.string(),
  display_name: z.string(),
  profile_image_url: z.string(),
});

const streamsResponse = z.object({ data: z.array(helixStream) });
const gamesResponse = z.object({ data: z.array(helixGame) });
const usersResponse = z.object({ data: z.array(helixUser) });

const tokenResponse = z.object({
  access_token: z.string().min(1),
  expires_in: z.number(),
});

export type HelixStream = z.infer<typeof helixStream>;
export type TwitchUser = z.infer<typeof helixUser>;

/** Validate a decoded body; unknown keys are dropped. */
function parsePayload<T>(route: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new InvalidResponseError(
      route,
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'} ${issue.message}`),
    );
  }
  return result.data;
}

// ─── Values handed to the watchers ───

/** One poll result. Superseded by the next poll, never mutated. */
export interface Stream {
  readonly gameId: string;
  readonly title: string;
  /** "live" for a regular broadcast; anything else is not treated as live. */
  readonly type: string;
  /** Template containing {width} and {height}. */
  readonly thumbnailUrl: string;
  readonly startedAt: Date;
  readonly userLogin: string;
  readonly userName: string;
  readonly viewerCount: number;
}

export interface Game {
  readonly id: string;
  readonly name: string;
}

export interface TwitchApiOptions {
  clientId: string;
  clientSecret?: string;
  /** Pre-issued app access token; skips the client-credentials request. */
  accessToken?: string;
  timeoutMs: number;
  metadataConcurrency: number;
  thumbnailConcurrency: number;
  baseUrl?: string;
  authUrl?: string;
}

export function toStream(raw: HelixStream): Stream {
  return Object.freeze({
    gameId: raw.game_id,
    title: raw.title,
    type: raw.type,
    thumbnailUrl: raw.thumbnail_url,
    startedAt: new Date(raw.started_at),
    userLogin: raw.user_login,
    userName: raw.user_name,
    viewerCount: raw.viewer_count,
  });
}

export function renderThumbnailUrl(template: string, width: number, height: number): string {
  return template.replaceAll('{width}', String(width)).replaceAll('{height}', String(height));
}

// ─── Client ───

/**
 * Thin async façade over the Helix endpoints the watchers need.
 * No retries and no caching: callers decide what a failure means.
 */
export class TwitchApiClient {
  private accessToken: string | null;
  private readonly clientId: string;
  private readonly clientSecret: string;
  private readonly timeoutMs: number;
  private readonly baseUrl: string;
  private readonly authUrl: string;
  private readonly metadataPool: TaskPool;
  private readonly thumbnailPool: TaskPool;

  constructor(options: TwitchApiOptions) {
    this.clientId = options.clientId;
    this.clientSecret = options.clientSecret ?? '';
    this.accessToken = options.accessToken || null;
    this.timeoutMs = options.timeoutMs;
    this.baseUrl = options.baseUrl ?? 'https://api.twitch.tv/helix';
    this.authUrl = options.authUrl ?? 'https://id.twitch.tv/oauth2/token';
    this.metadataPool = new TaskPool(options.metadataConcurrency);
    this.thumbnailPool = new TaskPool(options.thumbnailConcurrency);
  }

  isAuthenticated(): boolean {
    return this.accessToken !== null;
  }

  // ─── OAuth: one client_credentials grant at startup ───

  async authenticate(): Promise<void> {
    if (this.accessToken) return;
    if (!this.clientSecret) {
      throw new Error('No Twitch access token or client secret configured (TWITCH_ACCESS_TOKEN / TWITCH_CLIENT_SECRET)');
    }

    const body = new URLSearchParams({
      client_id: this.clientId,
      client_secret: this.clientSecret,
      grant_type: 'client_credentials',
    });

    const raw = await this.send('oauth2/token', this.authUrl, { method: 'POST', body }, (res) => res.json());
    const data = parsePayload('oauth2/token', tokenResponse, raw);
    this.accessToken = data.access_token;
    logger.info('[TwitchApi] App access token acquired', { expiresInSec: data.expires_in });
  }

  // ─── Public queries ───

  /** The channel's current broadcast, or null when it is offline. */
  async getStreamByLogin(login: string): Promise<Stream | null> {
    if (!login) throw new RangeError('login must not be empty');
    const body = await this.metadataPool.run(() => this.helixGet('streams', [['user_login', login]]));
    const raw = parsePayload('streams', streamsResponse, body).data[0];
    return raw ? toStream(raw) : null;
  }

  /** Category by id, or null when Twitch does not know the id. */
  async getGame(gameId: string): Promise<Game | null> {
    if (!gameId) throw new RangeError('gameId must not be empty');
    const body = await this.metadataPool.run(() => this.helixGet('games', [['id', gameId]]));
    const raw = parsePayload('games', gamesResponse, body).data[0];
    return raw ? Object.freeze({ id: raw.id, name: raw.name }) : null;
  }

  /**
   * Resolve logins to user objects, 100 per request (Helix limit).
   * Unknown logins are simply missing from the result.
   */
  async getUsersByLogins(logins: string[]): Promise<TwitchUser[]> {
    const results: TwitchUser[] = [];
    for (let i = 0; i < logins.length; i += 100) {
      const batch = logins.slice(i, i + 100);
      const body = await this.metadataPool.run(() =>
        this.helixGet('users', batch.map((login): [string, string] => ['login', login])),
      );
      results.push(...parsePayload('users', usersResponse, body).data);
    }
    return results;
  }

  /**
   * Download the stream preview at the given size. The whole body is read
   * before resolving. Runs on its own pool so slow image downloads cannot
   * hold up metadata polling.
   */
  async getThumbnail(stream: Stream, width = 1920, height = 1080): Promise<Buffer> {
    const url = renderThumbnailUrl(stream.thumbnailUrl, width, height);
    return this.thumbnailPool.run(() =>
      this.send('thumbnail', url, {}, async (res) => Buffer.from(await res.arrayBuffer())),
    );
  }

  // ─── Plumbing ───

  /** Decoded JSON body; callers validate it against the endpoint's schema. */
  private helixGet(path: string, params: Array<[string, string]>): Promise<unknown> {
    const url = new URL(`${this.baseUrl}/${path}`);
    for (const [k, v] of params) {
      url.searchParams.append(k, v);
    }

    const headers: Record<string, string> = { 'Client-ID': this.clientId };
    if (this.accessToken) headers.Authorization = `Bearer ${this.accessToken}`;

    return this.send(path, url.toString(), { headers }, (res) => res.json());
  }

  private async send<T>(
    route: string,
    url: string,
    init: RequestInit,
    read: (res: Response) => Promise<T>,
  ): Promise<T> {
    let res: Response;
    try {
      res = await fetch(url, { ...init, signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (err) {
      throw new TransportError(route, this.describe(err), { cause: err });
    }

    if (!res.ok) {
      const body = await res.text().catch(() => '');
      throw new ApiError(route, res.status, body || res.statusText);
    }

    try {
      return await read(res);
    } catch (err) {
      throw new TransportError(route, this.describe(err), { cause: err });
    }
  }

  private describe(err: unknown): string {
    if (err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')) {
      return `timed out after ${this.timeoutMs}ms`;
    }
    return err instanceof Error ? err.message : String(err);
  }
}
