import { config } from '../config/env';
import { FallbackLyricsAdapter } from './adapters/fallback-lyrics.adapter';
import { GeniusLyricsAdapter } from './adapters/genius-lyrics.adapter';
import { LyricsOvhAdapter } from './adapters/lyrics.adapter';
import { MoodAIAdapter } from './adapters/mood-ai.adapter';
import { SpotifyAdapter } from './adapters/spotify.adapter';
import type { LyricsAdapter } from './adapters/types';
import { MongoMoodRecordStore } from './mood-record.store';
import { MoodService } from './mood.service';
import { RecommendationService } from './recommendation.service';
import { MongoSpotifyTokenStore } from './spotify-token.store';

/**
 * Process-wide service instances, wired from the environment configuration.
 */
const moodRecordStore = new MongoMoodRecordStore();
const moodAI = new MoodAIAdapter(config.ai);

// lyrics.ovh first, Genius only when a token is configured
const lyricsProviders: LyricsAdapter[] = [new LyricsOvhAdapter(config.lyrics)];
if (config.genius.accessToken) {
  lyricsProviders.push(new GeniusLyricsAdapter(config.genius.accessToken, config.genius));
}

export const spotifyAdapter = new SpotifyAdapter(config.spotify, new MongoSpotifyTokenStore());

export const moodService = new MoodService(moodRecordStore);

export const recommendationService = new RecommendationService(
  {
    streaming: spotifyAdapter,
    lyrics: new FallbackLyricsAdapter(lyricsProviders),
    prediction: moodAI,
    recommender: moodAI,
    moodRecords: moodRecordStore
  },
  config.analysis
);
