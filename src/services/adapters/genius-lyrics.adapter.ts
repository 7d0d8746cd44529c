import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { GeniusConfig } from '../../config/env';
import type { TrackReference } from '../../types/track.types';
import { LyricsNotFoundError, LyricsServiceError } from '../../utils/errors';
import { describeHttpFailure, parsePayload } from './http';
import type { LyricsAdapter } from './types';

const searchResponseSchema = z.object({
    response: z.object({
        hits: z.array(
            z.object({
                result: z.object({
                    title: z.string(),
                    url: z.string().url(),
                    primary_artist: z.object({ name: z.string() })
                })
            })
        )
    })
});

type SearchHit = z.infer<typeof searchResponseSchema>['response']['hits'][number];

const LYRICS_CONTAINER = /<div[^>]*data-lyrics-container="true"[^>]*>([\s\S]*?)<\/div>/g;
const SECTION_HEADER = /^\[[^\]]*\]$/;
const ENTITIES: Record<string, string> = {
    '&quot;': '"',
    '&amp;': '&',
    '&lt;': '<',
    '&gt;': '>',
    '&#x27;': "'",
    '&#39;': "'"
};

/**
 * Plain lyrics from a Genius song page, with section headers such as "[Chorus]" removed.
 */
export const extractLyrics = (html: string): string =>
    [...html.matchAll(LYRICS_CONTAINER)]
        .map((match) => match[1] ?? '')
        .join('\n')
        .replace(/<br\s*\/?>/gi, '\n')
        .replace(/<[^>]+>/g, '')
        .replace(/&(?:quot|amp|lt|gt|#x27|#39);/g, (entity) => ENTITIES[entity] ?? entity)
        .split('\n')
        .map((line) => line.trim())
        .filter((line) => !SECTION_HEADER.test(line))
        .join('\n')
        .replace(/\n{3,}/g, '\n\n')
        .trim();

/**
 * Genius client: the search API finds the song, the song page carries the lyrics.
 */
export class GeniusLyricsAdapter implements LyricsAdapter {
    private readonly client: AxiosInstance;

    constructor(
        private readonly accessToken: string,
        config: Omit<GeniusConfig, 'accessToken'>,
        client?: AxiosInstance
    ) {
        this.client = client ?? axios.create({
            baseURL: config.apiBaseUrl,
            timeout: config.timeoutMs
        });
    }

    async getLyrics(track: TrackReference): Promise<string> {
        const artist = track.artists[0] ?? '';
        if (!artist || !track.title) {
            throw new LyricsNotFoundError(track.title, artist || 'unknown artist');
        }

        const hit = await this.search(track.title, artist);
        if (!hit) {
            throw new LyricsNotFoundError(track.title, artist);
        }

        let page: unknown;
        try {
            // The token is only for the API, not for the public song page
            const response = await this.client.get(hit.result.url, { responseType: 'text' });
            page = response.data;
        } catch (error) {
            const failure = describeHttpFailure(error);
            if (failure.status === 404) {
                throw new LyricsNotFoundError(track.title, artist);
            }
            throw new LyricsServiceError(`Genius page fetch failed for "${track.title}": ${failure.message}`, error);
        }

        const parsed = parsePayload(z.string(), page);
        if (!parsed.ok) {
            throw new LyricsServiceError(`Malformed Genius page for "${track.title}": ${parsed.reason}`);
        }

        const lyrics = extractLyrics(parsed.value);
        if (!lyrics) {
            throw new LyricsNotFoundError(track.title, artist);
        }
        return lyrics;
    }

    private async search(title: string, artist: string): Promise<SearchHit | undefined> {
        let payload: unknown;
        try {
            const response = await this.client.get('/search', {
                headers: { Authorization: `Bearer ${this.accessToken}` },
                params: { q: `${title} ${artist}` }
            });
            payload = response.data;
        } catch (error) {
            const failure = describeHttpFailure(error);
            throw new LyricsServiceError(`Genius search failed for "${title}": ${failure.message}`, error);
        }

        const parsed = parsePayload(searchResponseSchema, payload);
        if (!parsed.ok) {
            throw new LyricsServiceError(`Malformed Genius search response: ${parsed.reason}`);
        }

        const hits = parsed.value.response.hits;
        const wanted = artist.toLowerCase();
        return hits.find((hit) => hit.result.primary_artist.name.toLowerCase() === wanted) ?? hits[0];
    }
}
