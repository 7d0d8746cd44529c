import { Response, NextFunction } from 'express';
import { matchedData } from 'express-validator';
import { type AuthRequest, requireUserId } from '../middleware/auth.middleware';
import { recommendationService } from '../services/container';
import type { MoodVector } from '../types/mood.types';
import { assertValid } from '../utils/validation';

export class RecommendationController {
  /**
   * GET /recommendations/analyze-recent-tracks?limit=20
   * Runs the listening-history analysis and stores the resulting mood.
   */
  static async analyzeRecentTracks(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const userId = requireUserId(req);
      assertValid(req);
      const { limit } = matchedData(req);

      const analysis = await recommendationService.analyzeRecentTracks(
        userId,
        typeof limit === 'number' ? limit : undefined
      );

      res.status(200).json({
        success: true,
        data: {
          record: analysis.record,
          tracksAnalyzed: analysis.analyzed.length,
          tracksSkipped: analysis.skipped.length,
          analyzed: analysis.analyzed,
          skipped: analysis.skipped
        }
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /recommendations/get-recommendations?limit=5[&use_current_mood=][&happy=&sad=&angry=&relaxed=]
   */
  static async getRecommendations(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const userId = requireUserId(req);
      assertValid(req);
      const { limit, use_current_mood: useCurrentMood, happy, sad, angry, relaxed } = matchedData(req);

      // Validation guarantees the four scores come together or not at all;
      // an explicit use_current_mood=true wins over them
      const override: MoodVector | undefined =
        useCurrentMood !== true && typeof happy === 'number' ? { happy, sad, angry, relaxed } : undefined;

      const recommendations = await recommendationService.getRecommendations(
        userId,
        override,
        typeof limit === 'number' ? limit : undefined
      );

      res.status(200).json({
        success: true,
        data: recommendations
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /recommendations/queue-song { track_id } (or ?track_id=)
   */
  static async queueSong(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const userId = requireUserId(req);
      assertValid(req);
      const { track_id: trackId } = matchedData(req);

      await recommendationService.queueTrack(userId, trackId);

      res.status(200).json({
        success: true,
        message: 'Track added to queue successfully',
        data: { trackId }
      });
    } catch (error) {
      next(error);
    }
  }
}
