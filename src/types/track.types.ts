import type { MoodVector } from './mood.types';

/**
 * A track as reported by the streaming provider.
 */
export interface TrackReference {
    id: string;
    title: string;
    artists: string[];
    album?: string;
    uri?: string;
    playedAt?: string;
}

/**
 * A recommendation item as returned by the AI service.
 */
export interface RecommendedTrack {
    title: string;
    artist: string;
    trackId?: string;
    mood?: MoodVector;
}

export interface TrackMoodResult {
    track: TrackReference;
    mood: MoodVector;
}

export interface SkippedTrack {
    track: TrackReference;
    reason: string;
}

export interface SongQuery {
    title: string;
    artist: string;
}
