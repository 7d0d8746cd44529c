import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { MoodAIConfig } from '../../config/env';
import type { MoodVector } from '../../types/mood.types';
import type { RecommendedTrack, TrackReference } from '../../types/track.types';
import { PredictionServiceError, RecommendationServiceError } from '../../utils/errors';
import { moodVectorSchema } from '../../utils/mood-vector';
import { describeHttpFailure, parsePayload } from './http';
import type { PredictionAdapter, RecommendationAdapter } from './types';

const recommendationSchema = z.array(
    z.object({
        title: z.string().min(1),
        artist: z.string().min(1),
        track_id: z.string().optional(),
        prediction: moodVectorSchema.optional()
    })
);

/**
 * Client for the AI service that scores lyrics and looks up the closest songs to a mood.
 *
 * - `POST /` with `{ lyrics, artist, title }` returns `{ happy, sad, angry, relaxed }`
 * - `POST /closest` with a mood vector returns `[{ artist, title, prediction }]`
 */
export class MoodAIAdapter implements PredictionAdapter, RecommendationAdapter {
    private readonly client: AxiosInstance;

    constructor(config: MoodAIConfig, client?: AxiosInstance) {
        this.client = client ?? axios.create({
            baseURL: config.baseUrl,
            timeout: config.timeoutMs,
            headers: config.apiKey ? { 'X-API-Key': config.apiKey } : undefined
        });
    }

    async predictMood(lyrics: string, track: TrackReference): Promise<MoodVector> {
        let payload: unknown;
        try {
            const response = await this.client.post('/', {
                lyrics,
                artist: track.artists.join(', '),
                title: track.title
            });
            payload = response.data;
        } catch (error) {
            const failure = describeHttpFailure(error);
            throw new PredictionServiceError(`Mood prediction failed for "${track.title}": ${failure.message}`, error);
        }

        // Out-of-range or missing scores are rejected, never clamped
        const parsed = parsePayload(moodVectorSchema, payload);
        if (!parsed.ok) {
            throw new PredictionServiceError(`Invalid mood prediction for "${track.title}": ${parsed.reason}`);
        }
        return parsed.value;
    }

    async recommend(mood: MoodVector, limit: number): Promise<RecommendedTrack[]> {
        let payload: unknown;
        try {
            const response = await this.client.post('/closest', mood, { params: { limit } });
            payload = response.data;
        } catch (error) {
            const failure = describeHttpFailure(error);
            throw new RecommendationServiceError(`Recommendation query failed: ${failure.message}`, error);
        }

        const parsed = parsePayload(recommendationSchema, payload);
        if (!parsed.ok) {
            throw new RecommendationServiceError(`Invalid recommendation response: ${parsed.reason}`);
        }

        return parsed.value.map((item) => ({
            title: item.title,
            artist: item.artist,
            ...(item.track_id ? { trackId: item.track_id } : {}),
            ...(item.prediction ? { mood: item.prediction } : {})
        }));
    }
}
