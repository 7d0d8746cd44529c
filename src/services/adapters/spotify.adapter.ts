import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { SpotifyConfig } from '../../config/env';
import type { TrackReference } from '../../types/track.types';
import {
    AppError,
    AuthExpiredError,
    NoActiveDeviceError,
    SpotifyNotConnectedError,
    StreamingServiceError,
    ValidationError
} from '../../utils/errors';
import { describeHttpFailure, parsePayload } from './http';
import type { RecentTracksOptions, SpotifyTokens, SpotifyTokenStore, StreamingAdapter } from './types';

// Refresh slightly before Spotify does, so a token never expires mid-request
const EXPIRY_SKEW_MS = 60 * 1000;

const tokenResponseSchema = z.object({
    access_token: z.string().min(1),
    token_type: z.string(),
    expires_in: z.number().positive(),
    refresh_token: z.string().optional()
});

const trackSchema = z.object({
    id: z.string().nullable(),
    name: z.string(),
    artists: z.array(z.object({ name: z.string() })),
    album: z.object({ name: z.string() }).optional(),
    uri: z.string().optional()
});

const recentlyPlayedSchema = z.object({
    items: z.array(
        z.object({
            track: trackSchema,
            played_at: z.string().optional()
        })
    )
});

const searchSchema = z.object({
    tracks: z.object({
        items: z.array(trackSchema)
    })
});

type SpotifyApiTrack = z.infer<typeof trackSchema>;

const toTrackReference = (track: SpotifyApiTrack & { id: string }, playedAt?: string): TrackReference => ({
    id: track.id,
    title: track.name,
    artists: track.artists.map((artist) => artist.name),
    album: track.album?.name,
    uri: track.uri,
    ...(playedAt ? { playedAt } : {})
});

// Local files and unavailable tracks come back without an id
const hasId = (track: SpotifyApiTrack): track is SpotifyApiTrack & { id: string } =>
    typeof track.id === 'string' && track.id.length > 0;

/**
 * Spotify Web API client bound to the tokens a user stored through the connect flow.
 */
export class SpotifyAdapter implements StreamingAdapter {
    private readonly client: AxiosInstance;

    constructor(
        private readonly config: SpotifyConfig,
        private readonly tokenStore: SpotifyTokenStore,
        client?: AxiosInstance
    ) {
        this.client = client ?? axios.create({
            baseURL: config.apiBaseUrl,
            timeout: config.timeoutMs
        });
    }

    getAuthorizationUrl(state: string): string {
        const params = new URLSearchParams({
            client_id: this.config.clientId,
            response_type: 'code',
            redirect_uri: this.config.redirectUri,
            state,
            scope: this.config.scopes.join(' ')
        });
        return `${this.config.accountsBaseUrl}/authorize?${params.toString()}`;
    }

    /**
     * Exchanges an authorization code and stores the resulting tokens for the user.
     */
    async connect(userId: string, code: string): Promise<SpotifyTokens> {
        const tokens = await this.requestTokens(
            { grant_type: 'authorization_code', code, redirect_uri: this.config.redirectUri },
            () => new ValidationError('Invalid or expired Spotify authorization code')
        );
        await this.tokenStore.saveTokens(userId, tokens);
        console.log(`✅ [Spotify] Account connected for user ${userId}`);
        return tokens;
    }

    async getRecentTracks(userId: string, options: RecentTracksOptions): Promise<TrackReference[]> {
        const params: Record<string, number> = { limit: options.limit };
        if (options.sinceMinutes) {
            params.after = Date.now() - options.sinceMinutes * 60 * 1000;
        }

        const payload = await this.request(userId, 'fetch recently played tracks', (headers) =>
            this.client.get('/me/player/recently-played', { headers, params })
        );

        const parsed = parsePayload(recentlyPlayedSchema, payload);
        if (!parsed.ok) {
            throw new StreamingServiceError(`Malformed recently played response: ${parsed.reason}`);
        }

        return parsed.value.items.flatMap((item) =>
            hasId(item.track) ? [toTrackReference(item.track, item.played_at)] : []
        );
    }

    async enqueue(userId: string, trackId: string): Promise<void> {
        await this.request(
            userId,
            'add track to queue',
            (headers) =>
                this.client.post('/me/player/queue', null, {
                    headers,
                    params: { uri: `spotify:track:${trackId}` }
                }),
            // Spotify answers 404 when no device is active
            (status) => (status === 404 ? new NoActiveDeviceError() : null)
        );
    }

    async searchTrack(userId: string, title: string, artist: string): Promise<TrackReference | null> {
        const payload = await this.request(userId, 'search track', (headers) =>
            this.client.get('/search', {
                headers,
                params: { q: `track:${title} artist:${artist}`, type: 'track', limit: 1 }
            })
        );

        const parsed = parsePayload(searchSchema, payload);
        if (!parsed.ok) {
            throw new StreamingServiceError(`Malformed search response: ${parsed.reason}`);
        }

        const match = parsed.value.tracks.items.find(hasId);
        return match ? toTrackReference(match) : null;
    }

    private async request(
        userId: string,
        action: string,
        send: (headers: Record<string, string>) => Promise<{ data: unknown }>,
        classify?: (status: number | undefined) => AppError | null
    ): Promise<unknown> {
        const accessToken = await this.getAccessToken(userId);
        try {
            const response = await send({ Authorization: `Bearer ${accessToken}` });
            return response.data;
        } catch (error) {
            const failure = describeHttpFailure(error);
            const classified = classify?.(failure.status);
            if (classified) {
                throw classified;
            }
            if (failure.status === 401) {
                throw new AuthExpiredError();
            }
            throw new StreamingServiceError(`Failed to ${action}: ${failure.message}`, error);
        }
    }

    private async getAccessToken(userId: string): Promise<string> {
        const tokens = await this.tokenStore.getTokens(userId);
        if (!tokens) {
            throw new SpotifyNotConnectedError();
        }

        if (tokens.expiresAt.getTime() - EXPIRY_SKEW_MS > Date.now()) {
            return tokens.accessToken;
        }

        if (!tokens.refreshToken) {
            throw new AuthExpiredError();
        }

        console.log(`🔄 [Spotify] Refreshing access token for user ${userId}`);
        const refreshed = await this.requestTokens(
            { grant_type: 'refresh_token', refresh_token: tokens.refreshToken },
            () => new AuthExpiredError()
        );
        // Spotify only sometimes rotates the refresh token
        const next: SpotifyTokens = {
            ...refreshed,
            refreshToken: refreshed.refreshToken ?? tokens.refreshToken
        };
        await this.tokenStore.saveTokens(userId, next);
        return next.accessToken;
    }

    private async requestTokens(
        grant: Record<string, string>,
        onRejected: () => AppError
    ): Promise<SpotifyTokens> {
        const body = new URLSearchParams({
            ...grant,
            client_id: this.config.clientId,
            client_secret: this.config.clientSecret
        });

        let payload: unknown;
        try {
            const response = await this.client.post(`${this.config.accountsBaseUrl}/api/token`, body, {
                headers: { 'Content-Type': 'application/x-www-form-urlencoded' }
            });
            payload = response.data;
        } catch (error) {
            const failure = describeHttpFailure(error);
            if (failure.status === 400 || failure.status === 401) {
                throw onRejected();
            }
            throw new StreamingServiceError(`Spotify token request failed: ${failure.message}`, error);
        }

        const parsed = parsePayload(tokenResponseSchema, payload);
        if (!parsed.ok) {
            throw new StreamingServiceError(`Malformed Spotify token response: ${parsed.reason}`);
        }

        return {
            accessToken: parsed.value.access_token,
            refreshToken: parsed.value.refresh_token,
            expiresAt: new Date(Date.now() + parsed.value.expires_in * 1000)
        };
    }
}
