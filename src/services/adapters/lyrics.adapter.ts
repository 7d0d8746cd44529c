import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { LyricsConfig } from '../../config/env';
import type { TrackReference } from '../../types/track.types';
import { LyricsNotFoundError, LyricsServiceError } from '../../utils/errors';
import { describeHttpFailure, parsePayload } from './http';
import type { LyricsAdapter } from './types';

const lyricsResponseSchema = z.object({
    lyrics: z.string().optional(),
    error: z.string().optional()
});

/**
 * lyrics.ovh client: GET /{artist}/{title}.
 */
export class LyricsOvhAdapter implements LyricsAdapter {
    private readonly client: AxiosInstance;

    constructor(config: LyricsConfig, client?: AxiosInstance) {
        this.client = client ?? axios.create({
            baseURL: config.baseUrl,
            timeout: config.timeoutMs
        });
    }

    async getLyrics(track: TrackReference): Promise<string> {
        // The provider matches on a single artist name
        const artist = track.artists[0] ?? '';
        if (!artist || !track.title) {
            throw new LyricsNotFoundError(track.title, artist || 'unknown artist');
        }

        let payload: unknown;
        try {
            const response = await this.client.get(
                `/${encodeURIComponent(artist)}/${encodeURIComponent(track.title)}`
            );
            payload = response.data;
        } catch (error) {
            const failure = describeHttpFailure(error);
            if (failure.status === 404) {
                throw new LyricsNotFoundError(track.title, artist);
            }
            throw new LyricsServiceError(`Lyrics lookup failed for "${track.title}": ${failure.message}`, error);
        }

        const parsed = parsePayload(lyricsResponseSchema, payload);
        if (!parsed.ok) {
            throw new LyricsServiceError(`Malformed lyrics response for "${track.title}": ${parsed.reason}`);
        }

        const lyrics = parsed.value.lyrics?.trim();
        if (!lyrics) {
            throw new LyricsNotFoundError(track.title, artist);
        }
        return lyrics;
    }
}
