import pLimit from 'p-limit';
import type { AnalysisConfig } from '../config/env';
import type { MoodRecordData, MoodVector } from '../types/mood.types';
import type {
  RecommendedTrack,
  SkippedTrack,
  SongQuery,
  TrackMoodResult,
  TrackReference
} from '../types/track.types';
import {
  NoAnalyzableTracksError,
  NoMoodDataError,
  NoTracksAvailableError,
  NotFoundError,
  UpstreamServiceError
} from '../utils/errors';
import type {
  LyricsAdapter,
  PredictionAdapter,
  RecommendationAdapter,
  StreamingAdapter
} from './adapters/types';
import { MoodAggregator } from './mood-aggregator.service';
import type { MoodRecordStore } from './mood-record.store';
import { toMoodVector } from '../utils/mood-vector';

export interface RecommendationDependencies {
  streaming: StreamingAdapter;
  lyrics: LyricsAdapter;
  prediction: PredictionAdapter;
  recommender: RecommendationAdapter;
  moodRecords: MoodRecordStore;
}

export type RecommendationOptions = Pick<
  AnalysisConfig,
  'recentTrackLimit' | 'currentMoodHistorySize' | 'concurrency'
>;

export interface MoodAnalysis {
  record: MoodRecordData;
  analyzed: TrackMoodResult[];
  skipped: SkippedTrack[];
}

type TrackOutcome =
  | { ok: true; result: TrackMoodResult }
  | { ok: false; skipped: SkippedTrack };

export const DEFAULT_RECOMMENDATION_LIMIT = 5;

/**
 * Drives the listening-history analysis and the mood based recommendation flow.
 */
export class RecommendationService {
  constructor(
    private readonly deps: RecommendationDependencies,
    private readonly options: RecommendationOptions
  ) {}

  /**
   * Fetch recent tracks, score each track's lyrics, and store the mean as a new mood record.
   *
   * A track whose lyrics or prediction fail is skipped; the batch only fails when
   * no track produced a mood.
   */
  async analyzeRecentTracks(userId: string, limit: number = this.options.recentTrackLimit): Promise<MoodAnalysis> {
    const tracks = await this.deps.streaming.getRecentTracks(userId, { limit });
    if (tracks.length === 0) {
      throw new NoTracksAvailableError();
    }

    const limiter = pLimit(this.options.concurrency);
    const outcomes = await Promise.all(
      tracks.map((track) => limiter(() => this.analyzeTrack(track)))
    );

    const analyzed: TrackMoodResult[] = [];
    const skipped: SkippedTrack[] = [];
    for (const outcome of outcomes) {
      if (outcome.ok) {
        analyzed.push(outcome.result);
      } else {
        skipped.push(outcome.skipped);
      }
    }

    if (analyzed.length === 0) {
      console.warn(`⚠️ [Recommendations] None of ${tracks.length} tracks could be analyzed for user ${userId}`);
      throw new NoAnalyzableTracksError(tracks.length);
    }

    const mood = MoodAggregator.aggregate(analyzed.map((result) => result.mood));
    const record = await this.deps.moodRecords.create({
      userId,
      ...mood,
      note: `Generated from ${analyzed.length} recently played track(s)`,
      source: 'listening-history',
      tracksAnalyzed: analyzed.length
    });

    console.log(
      `✅ [Recommendations] Mood stored for user ${userId}: ${analyzed.length}/${tracks.length} tracks analyzed`
    );

    return { record, analyzed, skipped };
  }

  /**
   * Mean of the user's most recent mood records.
   */
  async getCurrentMood(userId: string): Promise<MoodVector> {
    const records = await this.deps.moodRecords.findRecent(userId, this.options.currentMoodHistorySize);
    if (records.length === 0) {
      throw new NoMoodDataError();
    }
    return MoodAggregator.aggregate(records.map(toMoodVector));
  }

  /**
   * Songs closest to the given mood, or to the user's current mood when none is given.
   * The list comes back in the order the AI service ranked it.
   */
  async getRecommendations(
    userId: string,
    moodOverride?: MoodVector,
    limit: number = DEFAULT_RECOMMENDATION_LIMIT
  ): Promise<RecommendedTrack[]> {
    const mood = moodOverride ?? (await this.getCurrentMood(userId));
    return this.deps.recommender.recommend(mood, limit);
  }

  async queueTrack(userId: string, trackId: string): Promise<void> {
    await this.deps.streaming.enqueue(userId, trackId);
    console.log(`🎵 [Recommendations] Track ${trackId} queued for user ${userId}`);
  }

  /**
   * Queue a recommendation that only carries a title and an artist.
   */
  async queueSong(userId: string, song: SongQuery): Promise<TrackReference> {
    const track = await this.deps.streaming.searchTrack(userId, song.title, song.artist);
    if (!track) {
      throw new NotFoundError(`Song '${song.title}' by '${song.artist}' not found on Spotify.`);
    }
    await this.queueTrack(userId, track.id);
    return track;
  }

  private async analyzeTrack(track: TrackReference): Promise<TrackOutcome> {
    try {
      const lyrics = await this.deps.lyrics.getLyrics(track);
      const mood = await this.deps.prediction.predictMood(lyrics, track);
      return { ok: true, result: { track, mood } };
    } catch (error) {
      // Missing lyrics and upstream failures only cost this track
      if (error instanceof NotFoundError || error instanceof UpstreamServiceError) {
        console.warn(`⚠️ [Recommendations] Skipping "${track.title}": ${error.message}`);
        return { ok: false, skipped: { track, reason: error.kind } };
      }
      throw error;
    }
  }
}
