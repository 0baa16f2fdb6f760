import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { TwitchApiClient, renderThumbnailUrl, type Stream } from '../src/twitch/TwitchApiClient.js';
import { ApiError, InvalidResponseError, TransportError } from '../src/twitch/errors.js';

const fetchMock = vi.fn();

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function flush(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

function makeClient(overrides: Partial<ConstructorParameters<typeof TwitchApiClient>[0]> = {}) {
  return new TwitchApiClient({
    clientId: 'test-client',
    accessToken: 'test-token',
    timeoutMs: 50,
    metadataConcurrency: 4,
    thumbnailConcurrency: 2,
    ...overrides,
  });
}

const helixStream = {
  id: '1001',
  user_id: '42',
  user_login: 'somechannel',
  user_name: 'SomeChannel',
  game_id: '509658',
  game_name: 'Just Chatting',
  type: 'live',
  title: 'Morning coffee',
  viewer_count: 12,
  started_at: '2024-03-01T18:00:00Z',
  thumbnail_url: 'https://previews.example/live_user_somechannel-{width}x{height}.jpg',
};

describe('TwitchApiClient', () => {
  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('getStreamByLogin', () => {
    it('maps the first result to a Stream', async () => {
      fetchMock.mockResolvedValueOnce(json({ data: [helixStream] }));
      const stream = await makeClient().getStreamByLogin('somechannel');

      expect(stream).toEqual({
        gameId: '509658',
        title: 'Morning coffee',
        type: 'live',
        thumbnailUrl: 'https://previews.example/live_user_somechannel-{width}x{height}.jpg',
        startedAt: new Date('2024-03-01T18:00:00.000Z'),
        userLogin: 'somechannel',
        userName: 'SomeChannel',
        viewerCount: 12,
      });
      expect(Object.isFrozen(stream)).toBe(true);
    });

    it('sends the login and credential headers', async () => {
      fetchMock.mockResolvedValueOnce(json({ data: [] }));
      await makeClient().getStreamByLogin('somechannel');

      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe('https://api.twitch.tv/helix/streams?user_login=somechannel');
      expect(init.headers).toEqual({ 'Client-ID': 'test-client', Authorization: 'Bearer test-token' });
      expect(init.signal).toBeInstanceOf(AbortSignal);
    });

    it('returns null when the channel is offline', async () => {
      fetchMock.mockResolvedValueOnce(json({ data: [] }));
      expect(await makeClient().getStreamByLogin('somechannel')).toBeNull();
    });

    it('rejects an empty login without calling the API', async () => {
      await expect(makeClient().getStreamByLogin('')).rejects.toBeInstanceOf(RangeError);
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('surfaces non-2xx responses as ApiError with status and body', async () => {
      fetchMock.mockResolvedValueOnce(
        new Response('{"error":"Unauthorized","status":401,"message":"Invalid OAuth token"}', { status: 401 }),
      );
      const err = await makeClient().getStreamByLogin('somechannel').catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ApiError);
      expect(err).toMatchObject({
        route: 'streams',
        status: 401,
        body: '{"error":"Unauthorized","status":401,"message":"Invalid OAuth token"}',
        isAuthError: true,
      });
    });

    it('falls back to the status text when the error body is empty', async () => {
      fetchMock.mockResolvedValueOnce(new Response('', { status: 503, statusText: 'Service Unavailable' }));
      const err = await makeClient().getStreamByLogin('somechannel').catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ApiError);
      expect(err).toMatchObject({ status: 503, body: 'Service Unavailable', isAuthError: false });
    });

    it('wraps connection failures in TransportError', async () => {
      fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));
      const err = await makeClient().getStreamByLogin('somechannel').catch((e: unknown) => e);

      expect(err).toBeInstanceOf(TransportError);
      expect((err as TransportError).message).toBe('Twitch API streams unreachable: fetch failed');
    });

    it('rejects a start time that is not an ISO-8601 instant', async () => {
      fetchMock.mockResolvedValueOnce(json({ data: [{ ...helixStream, started_at: 'not-a-date' }] }));
      const err = await makeClient().getStreamByLogin('somechannel').catch((e: unknown) => e);

      expect(err).toBeInstanceOf(InvalidResponseError);
      expect(err).toMatchObject({ route: 'streams' });
      expect((err as InvalidResponseError).message).toContain('data.0.started_at');
    });

    it('rejects a body without a data array', async () => {
      fetchMock.mockResolvedValueOnce(json({ error: 'nope' }));
      const err = await makeClient().getStreamByLogin('somechannel').catch((e: unknown) => e);

      expect(err).toBeInstanceOf(InvalidResponseError);
      expect((err as InvalidResponseError).issues).toEqual(['data Required']);
    });

    it('reports timeouts as TransportError', async () => {
      fetchMock.mockRejectedValueOnce(Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' }));
      const err = await makeClient().getStreamByLogin('somechannel').catch((e: unknown) => e);

      expect(err).toBeInstanceOf(TransportError);
      expect((err as TransportError).message).toBe('Twitch API streams unreachable: timed out after 50ms');
    });
  });

  describe('getGame', () => {
    it('returns the game by id', async () => {
      fetchMock.mockResolvedValueOnce(json({ data: [{ id: '509658', name: 'Just Chatting', box_art_url: '' }] }));
      const game = await makeClient().getGame('509658');

      expect(game).toEqual({ id: '509658', name: 'Just Chatting' });
      expect(fetchMock.mock.calls[0][0]).toBe('https://api.twitch.tv/helix/games?id=509658');
    });

    it('returns null for an unknown id', async () => {
      fetchMock.mockResolvedValueOnce(json({ data: [] }));
      expect(await makeClient().getGame('999')).toBeNull();
    });

    it('rejects a game without a name', async () => {
      fetchMock.mockResolvedValueOnce(json({ data: [{ id: '509658' }] }));
      await expect(makeClient().getGame('509658')).rejects.toBeInstanceOf(InvalidResponseError);
    });

    it('rejects an empty id', async () => {
      await expect(makeClient().getGame('')).rejects.toBeInstanceOf(RangeError);
    });
  });

  describe('getThumbnail', () => {
    const stream: Stream = {
      gameId: '1',
      title: 't',
      type: 'live',
      thumbnailUrl: 'https://previews.example/live_user_somechannel-{width}x{height}.jpg',
      startedAt: new Date('2024-03-01T18:00:00Z'),
      userLogin: 'somechannel',
      userName: 'SomeChannel',
      viewerCount: 0,
    };

    it('substitutes the size and returns the whole body', async () => {
      fetchMock.mockResolvedValueOnce(new Response(new Uint8Array([1, 2, 3])));
      const image = await makeClient().getThumbnail(stream, 640, 360);

      expect(fetchMock.mock.calls[0][0]).toBe('https://previews.example/live_user_somechannel-640x360.jpg');
      expect(Buffer.isBuffer(image)).toBe(true);
      expect([...image]).toEqual([1, 2, 3]);
    });

    it('defaults to 1920x1080', async () => {
      fetchMock.mockResolvedValueOnce(new Response(new Uint8Array([0])));
      await makeClient().getThumbnail(stream);
      expect(fetchMock.mock.calls[0][0]).toBe('https://previews.example/live_user_somechannel-1920x1080.jpg');
    });

    it('is not held up by a saturated metadata pool', async () => {
      const client = makeClient({ metadataConcurrency: 1 });
      fetchMock.mockImplementationOnce(() => new Promise<Response>(() => {}));
      fetchMock.mockResolvedValueOnce(new Response(new Uint8Array([7])));

      void client.getGame('1');
      await flush();
      const image = await client.getThumbnail(stream);

      expect([...image]).toEqual([7]);
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });
  });

  it('renders every placeholder occurrence', () => {
    expect(renderThumbnailUrl('a-{width}x{height}-{width}', 2, 1)).toBe('a-2x1-2');
  });

  it('limits concurrent metadata requests', async () => {
    const client = makeClient({ metadataConcurrency: 1 });
    let releaseFirst: (res: Response) => void = () => {};
    fetchMock.mockImplementationOnce(() => new Promise<Response>((resolve) => (releaseFirst = resolve)));
    fetchMock.mockResolvedValueOnce(json({ data: [] }));

    const first = client.getGame('1');
    const second = client.getGame('2');
    await flush();
    expect(fetchMock).toHaveBeenCalledTimes(1);

    releaseFirst(json({ data: [{ id: '1', name: 'One', box_art_url: '' }] }));
    expect(await first).toEqual({ id: '1', name: 'One' });
    expect(await second).toBeNull();
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('batches user lookups by 100', async () => {
    const logins = Array.from({ length: 150 }, (_, i) => `user${i}`);
    fetchMock.mockResolvedValueOnce(json({ data: [{ id: '1', login: 'user0', display_name: 'User0', profile_image_url: '' }] }));
    fetchMock.mockResolvedValueOnce(json({ data: [] }));

    const users = await makeClient().getUsersByLogins(logins);

    expect(users.map((u) => u.login)).toEqual(['user0']);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(new URL(fetchMock.mock.calls[0][0]).searchParams.getAll('login')).toHaveLength(100);
    expect(new URL(fetchMock.mock.calls[1][0]).searchParams.getAll('login')).toHaveLength(50);
  });

  describe('authenticate', () => {
    it('requests an app token once and uses it afterwards', async () => {
      const client = makeClient({ accessToken: undefined, clientSecret: 'test-secret' });
      fetchMock.mockResolvedValueOnce(json({ access_token: 'app-token', expires_in: 3600 }));
      fetchMock.mockResolvedValueOnce(json({ data: [] }));

      await client.authenticate();
      await client.getGame('1');

      const [tokenUrl, tokenInit] = fetchMock.mock.calls[0];
      expect(tokenUrl).toBe('https://id.twitch.tv/oauth2/token');
      expect(tokenInit.method).toBe('POST');
      expect(tokenInit.body.get('grant_type')).toBe('client_credentials');
      expect(tokenInit.body.get('client_secret')).toBe('test-secret');
      expect(fetchMock.mock.calls[1][1].headers.Authorization).toBe('Bearer app-token');
      expect(client.isAuthenticated()).toBe(true);
    });

    it('does nothing when a token was configured', async () => {
      await makeClient().authenticate();
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('fails without a secret or token', async () => {
      await expect(makeClient({ accessToken: undefined }).authenticate()).rejects.toThrow(/client secret/);
    });

    it('surfaces rejected credentials as ApiError', async () => {
      const client = makeClient({ accessToken: undefined, clientSecret: 'test-secret' });
      fetchMock.mockResolvedValueOnce(new Response('{"status":403,"message":"invalid client secret"}', { status: 403 }));

      const err = await client.authenticate().catch((e: unknown) => e);
      expect(err).toBeInstanceOf(ApiError);
      expect(err).toMatchObject({ route: 'oauth2/token', status: 403 });
    });
  });
});
