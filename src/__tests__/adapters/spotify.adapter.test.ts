import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { SpotifyAdapter } from '../../services/adapters/spotify.adapter';
import type { SpotifyTokens, SpotifyTokenStore } from '../../services/adapters/types';
import {
  AuthExpiredError,
  NoActiveDeviceError,
  SpotifyNotConnectedError,
  StreamingServiceError,
  ValidationError
} from '../../utils/errors';
import { createFakeHttp, type FakeRoute } from '../helpers/fake-http';
import { USER_ID } from '../helpers/fixtures';

const NOW = 1_700_000_000_000;
const HOUR_MS = 60 * 60 * 1000;
const TOKEN_URL = 'POST https://accounts.test/api/token';

const CONFIG = {
  clientId: 'test-client',
  clientSecret: 'test-secret',
  redirectUri: 'http://localhost:3000/api/v1/spotify/callback',
  accountsBaseUrl: 'https://accounts.test',
  apiBaseUrl: 'https://api.test/v1',
  scopes: ['user-read-recently-played', 'user-modify-playback-state'],
  timeoutMs: 10000
};

class MemoryTokenStore implements SpotifyTokenStore {
  readonly tokens = new Map<string, SpotifyTokens>();

  async getTokens(userId: string): Promise<SpotifyTokens | null> {
    return this.tokens.get(userId) ?? null;
  }

  async saveTokens(userId: string, tokens: SpotifyTokens): Promise<void> {
    this.tokens.set(userId, tokens);
  }
}

const apiTrack = (id: string | null, name: string) => ({
  id,
  name,
  artists: [{ name: 'Test Artist' }],
  album: { name: 'Test Album' },
  uri: id ? `spotify:track:${id}` : undefined
});

describe('SpotifyAdapter', () => {
  let store: MemoryTokenStore;

  const adapterWith = (routes: Record<string, FakeRoute>) => {
    const http = createFakeHttp(routes);
    return { adapter: new SpotifyAdapter(CONFIG, store, http.client), requests: http.requests };
  };

  beforeEach(() => {
    vi.spyOn(Date, 'now').mockReturnValue(NOW);
    store = new MemoryTokenStore();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('getAuthorizationUrl', () => {
    it('builds the consent URL with scopes and state', () => {
      const { adapter } = adapterWith({});

      const url = new URL(adapter.getAuthorizationUrl('state-token'));

      expect(url.origin + url.pathname).toBe('https://accounts.test/authorize');
      expect(url.searchParams.get('client_id')).toBe('test-client');
      expect(url.searchParams.get('response_type')).toBe('code');
      expect(url.searchParams.get('redirect_uri')).toBe(CONFIG.redirectUri);
      expect(url.searchParams.get('state')).toBe('state-token');
      expect(url.searchParams.get('scope')).toBe('user-read-recently-played user-modify-playback-state');
    });
  });

  describe('connect', () => {
    it('exchanges the code and stores the tokens', async () => {
      const { adapter, requests } = adapterWith({
        [TOKEN_URL]: {
          status: 200,
          data: { access_token: 'access-1', token_type: 'Bearer', expires_in: 3600, refresh_token: 'refresh-1' }
        }
      });

      const tokens = await adapter.connect(USER_ID, 'auth-code');

      expect(tokens).toEqual({ accessToken: 'access-1', refreshToken: 'refresh-1', expiresAt: new Date(NOW + HOUR_MS) });
      expect(store.tokens.get(USER_ID)).toEqual(tokens);
      const form = new URLSearchParams(String(requests[0]?.data));
      expect(form.get('grant_type')).toBe('authorization_code');
      expect(form.get('code')).toBe('auth-code');
      expect(form.get('redirect_uri')).toBe(CONFIG.redirectUri);
    });

    it('rejects a code Spotify refuses', async () => {
      const { adapter } = adapterWith({ [TOKEN_URL]: { status: 400, data: { error: 'invalid_grant' } } });

      await expect(adapter.connect(USER_ID, 'stale-code')).rejects.toBeInstanceOf(ValidationError);
      expect(store.tokens.size).toBe(0);
    });
  });

  describe('getRecentTracks', () => {
    beforeEach(() => {
      store.tokens.set(USER_ID, { accessToken: 'valid-access', refreshToken: 'refresh-1', expiresAt: new Date(NOW + HOUR_MS) });
    });

    it('maps played tracks and drops entries without an id', async () => {
      const { adapter, requests } = adapterWith({
        'GET /me/player/recently-played': {
          status: 200,
          data: {
            items: [
              { track: apiTrack('4uLU6hMCjMI75M1A2tKUQC', 'Blue Hour'), played_at: '2024-05-01T10:00:00.000Z' },
              { track: apiTrack(null, 'Local File'), played_at: '2024-05-01T09:55:00.000Z' }
            ]
          }
        }
      });

      const tracks = await adapter.getRecentTracks(USER_ID, { limit: 20 });

      expect(tracks).toEqual([
        {
          id: '4uLU6hMCjMI75M1A2tKUQC',
          title: 'Blue Hour',
          artists: ['Test Artist'],
          album: 'Test Album',
          uri: 'spotify:track:4uLU6hMCjMI75M1A2tKUQC',
          playedAt: '2024-05-01T10:00:00.000Z'
        }
      ]);
      expect(requests[0]?.headers.Authorization).toBe('Bearer valid-access');
      expect(requests[0]?.params).toEqual({ limit: 20 });
    });

    it('restricts the query to a recent time window', async () => {
      const { adapter, requests } = adapterWith({
        'GET /me/player/recently-played': { status: 200, data: { items: [] } }
      });

      await adapter.getRecentTracks(USER_ID, { limit: 10, sinceMinutes: 30 });

      expect(requests[0]?.params).toEqual({ limit: 10, after: NOW - 30 * 60 * 1000 });
    });

    it('maps a 401 to AuthExpiredError', async () => {
      const { adapter } = adapterWith({ 'GET /me/player/recently-played': { status: 401 } });

      await expect(adapter.getRecentTracks(USER_ID, { limit: 20 })).rejects.toBeInstanceOf(AuthExpiredError);
    });

    it('maps other failures to StreamingServiceError', async () => {
      const { adapter } = adapterWith({ 'GET /me/player/recently-played': { status: 503 } });

      await expect(adapter.getRecentTracks(USER_ID, { limit: 20 })).rejects.toThrow(
        new StreamingServiceError('Failed to fetch recently played tracks: HTTP 503')
      );
    });
  });

  describe('access tokens', () => {
    it('refreshes an expired token and keeps the old refresh token', async () => {
      store.tokens.set(USER_ID, { accessToken: 'old-access', refreshToken: 'refresh-1', expiresAt: new Date(NOW - 1000) });
      const { adapter, requests } = adapterWith({
        [TOKEN_URL]: { status: 200, data: { access_token: 'fresh-access', token_type: 'Bearer', expires_in: 3600 } },
        'GET /me/player/recently-played': { status: 200, data: { items: [] } }
      });

      await adapter.getRecentTracks(USER_ID, { limit: 20 });

      expect(new URLSearchParams(String(requests[0]?.data)).get('grant_type')).toBe('refresh_token');
      expect(new URLSearchParams(String(requests[0]?.data)).get('refresh_token')).toBe('refresh-1');
      expect(requests[1]?.headers.Authorization).toBe('Bearer fresh-access');
      expect(store.tokens.get(USER_ID)).toEqual({
        accessToken: 'fresh-access',
        refreshToken: 'refresh-1',
        expiresAt: new Date(NOW + HOUR_MS)
      });
    });

    it('refreshes a token that is about to expire', async () => {
      store.tokens.set(USER_ID, { accessToken: 'old-access', refreshToken: 'refresh-1', expiresAt: new Date(NOW + 30 * 1000) });
      const { adapter, requests } = adapterWith({
        [TOKEN_URL]: { status: 200, data: { access_token: 'fresh-access', token_type: 'Bearer', expires_in: 3600, refresh_token: 'refresh-2' } },
        'GET /me/player/recently-played': { status: 200, data: { items: [] } }
      });

      await adapter.getRecentTracks(USER_ID, { limit: 20 });

      expect(requests).toHaveLength(2);
      expect(store.tokens.get(USER_ID)?.refreshToken).toBe('refresh-2');
    });

    it('requires a reconnect when an expired token cannot be refreshed', async () => {
      store.tokens.set(USER_ID, { accessToken: 'old-access', expiresAt: new Date(NOW - 1000) });
      const { adapter, requests } = adapterWith({});

      await expect(adapter.getRecentTracks(USER_ID, { limit: 20 })).rejects.toBeInstanceOf(AuthExpiredError);
      expect(requests).toHaveLength(0);
    });

    it('requires a reconnect when Spotify rejects the refresh token', async () => {
      store.tokens.set(USER_ID, { accessToken: 'old-access', refreshToken: 'revoked', expiresAt: new Date(NOW - 1000) });
      const { adapter } = adapterWith({ [TOKEN_URL]: { status: 400, data: { error: 'invalid_grant' } } });

      await expect(adapter.getRecentTracks(USER_ID, { limit: 20 })).rejects.toBeInstanceOf(AuthExpiredError);
    });

    it('reports a user who never connected Spotify', async () => {
      const { adapter } = adapterWith({});

      await expect(adapter.getRecentTracks(USER_ID, { limit: 20 })).rejects.toBeInstanceOf(SpotifyNotConnectedError);
    });
  });

  describe('enqueue', () => {
    beforeEach(() => {
      store.tokens.set(USER_ID, { accessToken: 'valid-access', expiresAt: new Date(NOW + HOUR_MS) });
    });

    it('queues the track uri', async () => {
      const { adapter, requests } = adapterWith({ 'POST /me/player/queue': { status: 204 } });

      await adapter.enqueue(USER_ID, '4uLU6hMCjMI75M1A2tKUQC');

      expect(requests[0]?.params).toEqual({ uri: 'spotify:track:4uLU6hMCjMI75M1A2tKUQC' });
    });

    it('maps a 404 to NoActiveDeviceError', async () => {
      const { adapter } = adapterWith({ 'POST /me/player/queue': { status: 404 } });

      await expect(adapter.enqueue(USER_ID, '4uLU6hMCjMI75M1A2tKUQC')).rejects.toBeInstanceOf(NoActiveDeviceError);
    });

    it('maps a server error to StreamingServiceError', async () => {
      const { adapter } = adapterWith({ 'POST /me/player/queue': { status: 500 } });

      await expect(adapter.enqueue(USER_ID, '4uLU6hMCjMI75M1A2tKUQC')).rejects.toThrow(
        'Failed to add track to queue: HTTP 500'
      );
    });
  });

  describe('searchTrack', () => {
    beforeEach(() => {
      store.tokens.set(USER_ID, { accessToken: 'valid-access', expiresAt: new Date(NOW + HOUR_MS) });
    });

    it('searches by title and artist and returns the first match', async () => {
      const { adapter, requests } = adapterWith({
        'GET /search': { status: 200, data: { tracks: { items: [apiTrack('4uLU6hMCjMI75M1A2tKUQC', 'Blue Hour')] } } }
      });

      const match = await adapter.searchTrack(USER_ID, 'Blue Hour', 'Test Artist');

      expect(match?.id).toBe('4uLU6hMCjMI75M1A2tKUQC');
      expect(requests[0]?.params).toEqual({ q: 'track:Blue Hour artist:Test Artist', type: 'track', limit: 1 });
    });

    it('returns null when nothing matches', async () => {
      const { adapter } = adapterWith({ 'GET /search': { status: 200, data: { tracks: { items: [] } } } });

      await expect(adapter.searchTrack(USER_ID, 'Nowhere', 'Nobody')).resolves.toBeNull();
    });
  });
});
