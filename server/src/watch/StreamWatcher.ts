import { EventEmitter } from 'node:events';
import { errorMeta, logger } from '../logger.js';
import type { Stream, TwitchApiClient } from '../twitch/TwitchApiClient.js';
import { ApiError } from '../twitch/errors.js';
import {
  buildEndedNotification,
  buildGameChangedNotification,
  buildLiveNotification,
  NO_CATEGORY,
  UNKNOWN_CATEGORY,
} from '../notify/format.js';
import type { Notification, NotificationKind, NotificationSink } from '../notify/types.js';

export type WatchPhase = 'OFFLINE' | 'LIVE';

interface OfflineState {
  phase: 'OFFLINE';
  stream: null;
  startedAt: null;
  gameId: null;
}

interface LiveState {
  phase: 'LIVE';
  stream: Stream;
  /** Identifies the session; a different value means a new broadcast. */
  startedAt: Date;
  gameId: string;
}

export type WatchState = OfflineState | LiveState;

const OFFLINE: OfflineState = Object.freeze({ phase: 'OFFLINE', stream: null, startedAt: null, gameId: null });

export type StreamSource = Pick<TwitchApiClient, 'getStreamByLogin' | 'getGame' | 'getThumbnail'>;

export interface StreamWatcherOptions {
  login: string;
  api: StreamSource;
  sink: NotificationSink;
  thumbnailSize?: { width: number; height: number };
  colors?: Partial<Record<NotificationKind, number>>;
  /** Consecutive 401/403 poll failures before 'fatal' is emitted. */
  authFailureLimit?: number;
  now?: () => Date;
}

export interface WatcherSnapshot {
  login: string;
  phase: WatchPhase;
  title: string | null;
  gameId: string | null;
  startedAt: string | null;
  lastPollAt: string | null;
  lastError: string | null;
  consecutiveFailures: number;
}

export interface LiveEvent {
  login: string;
  stream: Stream;
  gameName: string;
}

export interface EndedEvent {
  login: string;
  stream: Stream;
  gameName: string;
  endedAt: Date;
  durationMs: number;
}

export interface GameChangedEvent {
  login: string;
  stream: Stream;
  previousGameName: string;
  gameName: string;
}

/**
 * Lifecycle state machine for one channel.
 *
 * Each `tick()` polls the channel once and reconciles the result against
 * the remembered state, emitting 'live', 'ended' and 'gameChanged' and
 * posting the matching notification. Ticks on one watcher are chained, so a
 * tick never observes a half-applied previous tick. Poll failures leave the
 * state untouched; the next tick simply tries again.
 *
 * Emits 'fatal' (ApiError) once `authFailureLimit` consecutive polls were
 * rejected for bad credentials.
 */
export class StreamWatcher extends EventEmitter {
  readonly login: string;
  private api: StreamSource;
  private sink: NotificationSink;
  private thumbnailSize: { width: number; height: number };
  private colors: Partial<Record<NotificationKind, number>>;
  private authFailureLimit: number;
  private now: () => Date;

  private state: WatchState = OFFLINE;
  private chain: Promise<void> = Promise.resolve();
  private queued = 0;

  private lastPollAt: Date | null = null;
  private lastError: string | null = null;
  private consecutiveFailures = 0;
  private consecutiveAuthFailures = 0;

  constructor(options: StreamWatcherOptions) {
    super();
    this.login = options.login;
    this.api = options.api;
    this.sink = options.sink;
    this.thumbnailSize = options.thumbnailSize ?? { width: 1920, height: 1080 };
    this.colors = options.colors ?? {};
    this.authFailureLimit = options.authFailureLimit ?? 3;
    this.now = options.now ?? (() => new Date());
  }

  getState(): Readonly<WatchState> {
    return this.state;
  }

  /** True while a tick is running or waiting for the previous one. */
  isBusy(): boolean {
    return this.queued > 0;
  }

  /** Poll once. Resolves after any notifications of this tick were attempted; never rejects. */
  tick(): Promise<void> {
    this.queued++;
    const run = this.chain
      .then(() => this.poll())
      .finally(() => {
        this.queued--;
      });
    this.chain = run;
    return run;
  }

  snapshot(): WatcherSnapshot {
    const { state } = this;
    return {
      login: this.login,
      phase: state.phase,
      title: state.stream?.title ?? null,
      gameId: state.gameId,
      startedAt: state.startedAt?.toISOString() ?? null,
      lastPollAt: this.lastPollAt?.toISOString() ?? null,
      lastError: this.lastError,
      consecutiveFailures: this.consecutiveFailures,
    };
  }

  // ─── Transition algorithm ───

  private async poll(): Promise<void> {
    try {
      await this.reconcile();
    } catch (err) {
      logger.error(`[Watcher] Tick for ${this.login} failed`, errorMeta(err));
    }
  }

  private async reconcile(): Promise<void> {
    let stream: Stream | null;
    try {
      stream = await this.api.getStreamByLogin(this.login);
    } catch (err) {
      this.recordFailure(err);
      return;
    }

    this.lastPollAt = this.now();

    if (stream && stream.type !== 'live') {
      this.consecutiveFailures++;
      this.lastError = `unexpected stream type "${stream.type}"`;
      logger.warn(`[Watcher] ${this.login} reported stream type "${stream.type}", ignoring this poll`);
      return;
    }

    this.consecutiveFailures = 0;
    this.consecutiveAuthFailures = 0;
    this.lastError = null;

    const current = this.state;

    if (!stream) {
      if (current.phase === 'LIVE') await this.endSession(current);
      return;
    }

    if (current.phase === 'OFFLINE') {
      await this.startSession(stream);
      return;
    }

    if (current.startedAt.getTime() !== stream.startedAt.getTime()) {
      // Offline and back within one interval: close the old session first.
      logger.info(`[Watcher] ${this.login} started a new session before the previous one was seen ending`, {
        previousStart: current.startedAt.toISOString(),
        start: stream.startedAt.toISOString(),
      });
      await this.endSession(current);
      await this.startSession(stream);
      return;
    }

    if (current.gameId !== stream.gameId) {
      await this.changeGame(current, stream);
      return;
    }

    this.state = { ...current, stream };
  }

  private async startSession(stream: Stream): Promise<void> {
    this.state = { phase: 'LIVE', stream, startedAt: stream.startedAt, gameId: stream.gameId };

    const [gameName, thumbnail] = await Promise.all([
      this.resolveGameName(stream.gameId),
      this.fetchThumbnail(stream),
    ]);

    logger.info(`[Watcher] ${this.login} went live`, { game: gameName, title: stream.title });
    const event: LiveEvent = { login: this.login, stream, gameName };
    this.emit('live', event);

    await this.deliver(
      buildLiveNotification({ login: this.login, stream, gameName, thumbnail, color: this.colors.live }),
    );
  }

  private async endSession(session: LiveState): Promise<void> {
    this.state = OFFLINE;

    const endedAt = this.now();
    const durationMs = endedAt.getTime() - session.startedAt.getTime();
    const gameName = await this.resolveGameName(session.gameId);

    logger.info(`[Watcher] ${this.login} went offline`, { game: gameName, durationMs });
    const event: EndedEvent = { login: this.login, stream: session.stream, gameName, endedAt, durationMs };
    this.emit('ended', event);

    await this.deliver(
      buildEndedNotification({
        login: this.login,
        stream: session.stream,
        gameName,
        endedAt,
        color: this.colors.ended,
      }),
    );
  }

  private async changeGame(session: LiveState, stream: Stream): Promise<void> {
    this.state = { ...session, stream, gameId: stream.gameId };

    const [previousGameName, gameName] = await Promise.all([
      this.resolveGameName(session.gameId),
      this.resolveGameName(stream.gameId),
    ]);

    logger.info(`[Watcher] ${this.login} switched game`, { from: previousGameName, to: gameName });
    const event: GameChangedEvent = { login: this.login, stream, previousGameName, gameName };
    this.emit('gameChanged', event);

    await this.deliver(
      buildGameChangedNotification({
        login: this.login,
        stream,
        previousGameName,
        gameName,
        at: this.now(),
        color: this.colors.gameChanged,
      }),
    );
  }

  // ─── Best-effort lookups ───

  private async resolveGameName(gameId: string): Promise<string> {
    if (!gameId) return NO_CATEGORY;
    try {
      const game = await this.api.getGame(gameId);
      if (game) return game.name;
      logger.warn(`[Watcher] Unknown game id ${gameId} for ${this.login}`);
    } catch (err) {
      logger.warn(`[Watcher] Game lookup ${gameId} for ${this.login} failed`, errorMeta(err));
    }
    return UNKNOWN_CATEGORY;
  }

  private async fetchThumbnail(stream: Stream): Promise<Buffer | undefined> {
    try {
      return await this.api.getThumbnail(stream, this.thumbnailSize.width, this.thumbnailSize.height);
    } catch (err) {
      logger.warn(`[Watcher] Thumbnail download for ${this.login} failed, posting without image`, errorMeta(err));
      return undefined;
    }
  }

  private async deliver(notification: Notification): Promise<void> {
    try {
      await this.sink.post(notification);
    } catch (err) {
      logger.error(`[Watcher] Could not deliver ${notification.kind} notification for ${this.login}`, errorMeta(err));
    }
  }

  private recordFailure(err: unknown): void {
    this.consecutiveFailures++;
    this.lastError = err instanceof Error ? err.message : String(err);
    logger.warn(`[Watcher] Poll for ${this.login} failed, staying ${this.state.phase}`, errorMeta(err));

    if (err instanceof ApiError && err.isAuthError) {
      this.consecutiveAuthFailures++;
      if (this.consecutiveAuthFailures === this.authFailureLimit) {
        logger.error(`[Watcher] Credentials rejected ${this.consecutiveAuthFailures} times in a row for ${this.login}`);
        this.emit('fatal', err);
      }
    } else {
      this.consecutiveAuthFailures = 0;
    }
  }
}
