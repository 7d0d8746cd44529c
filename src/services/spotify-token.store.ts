import { User } from '../models/user.model';
import { NotFoundError } from '../utils/errors';
import type { SpotifyTokens, SpotifyTokenStore } from './adapters/types';

/**
 * Spotify credentials live on the user document.
 */
export class MongoSpotifyTokenStore implements SpotifyTokenStore {
  async getTokens(userId: string): Promise<SpotifyTokens | null> {
    const user = await User.findById(userId).select('spotify');
    if (!user) {
      throw new NotFoundError('User not found');
    }

    const { accessToken, refreshToken, tokenExpiresAt } = user.spotify ?? {};
    if (!accessToken) {
      return null;
    }

    return {
      accessToken,
      refreshToken: refreshToken || undefined,
      // No recorded expiry: treat as expired so the refresh path runs
      expiresAt: tokenExpiresAt ?? new Date(0)
    };
  }

  async saveTokens(userId: string, tokens: SpotifyTokens): Promise<void> {
    const update: Record<string, string | Date> = {
      'spotify.accessToken': tokens.accessToken,
      'spotify.tokenExpiresAt': tokens.expiresAt
    };
    if (tokens.refreshToken) {
      update['spotify.refreshToken'] = tokens.refreshToken;
    }

    const result = await User.updateOne({ _id: userId }, { $set: update });

    if (result.matchedCount === 0) {
      throw new NotFoundError('User not found');
    }
  }
}
