import type { MoodVector } from '../../types/mood.types';
import type { RecommendedTrack, TrackReference } from '../../types/track.types';

export interface RecentTracksOptions {
    limit: number;
    /** Only tracks played within the last N minutes. */
    sinceMinutes?: number;
}

/**
 * Streaming provider boundary.
 * Throws AuthExpiredError when the stored token cannot be used and the user has to reconnect.
 */
export interface StreamingAdapter {
    getRecentTracks(userId: string, options: RecentTracksOptions): Promise<TrackReference[]>;
    /** Throws NoActiveDeviceError when the user has no device to queue on. */
    enqueue(userId: string, trackId: string): Promise<void>;
    searchTrack(userId: string, title: string, artist: string): Promise<TrackReference | null>;
}

/**
 * Throws LyricsNotFoundError when the provider has nothing for the track,
 * LyricsServiceError for any other failure.
 */
export interface LyricsAdapter {
    getLyrics(track: TrackReference): Promise<string>;
}

/** Throws PredictionServiceError. */
export interface PredictionAdapter {
    predictMood(lyrics: string, track: TrackReference): Promise<MoodVector>;
}

/** Throws RecommendationServiceError. */
export interface RecommendationAdapter {
    recommend(mood: MoodVector, limit: number): Promise<RecommendedTrack[]>;
}

export interface SpotifyTokens {
    accessToken: string;
    refreshToken?: string;
    expiresAt: Date;
}

export interface SpotifyTokenStore {
    getTokens(userId: string): Promise<SpotifyTokens | null>;
    saveTokens(userId: string, tokens: SpotifyTokens): Promise<void>;
}
