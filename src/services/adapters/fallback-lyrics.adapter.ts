import type { TrackReference } from '../../types/track.types';
import { LyricsNotFoundError, NotFoundError, UpstreamServiceError } from '../../utils/errors';
import type { LyricsAdapter } from './types';

/**
 * Asks each provider in turn. A miss or a provider failure moves on to the next one;
 * when every provider fails, the last failure is reported.
 */
export class FallbackLyricsAdapter implements LyricsAdapter {
    constructor(private readonly providers: readonly LyricsAdapter[]) {}

    async getLyrics(track: TrackReference): Promise<string> {
        let lastError: NotFoundError | UpstreamServiceError = new LyricsNotFoundError(
            track.title,
            track.artists[0] || 'unknown artist'
        );

        for (const provider of this.providers) {
            try {
                return await provider.getLyrics(track);
            } catch (error) {
                if (!(error instanceof NotFoundError || error instanceof UpstreamServiceError)) {
                    throw error;
                }
                lastError = error;
            }
        }

        throw lastError;
    }
}
