import { Response, NextFunction } from 'express';
import { matchedData } from 'express-validator';
import { config } from '../config/env';
import { type AuthRequest, requireUserId } from '../middleware/auth.middleware';
import { moodService, recommendationService } from '../services/container';
import { assertValid } from '../utils/validation';

export class MoodController {
  /**
   * POST /mood/record
   */
  static async recordMood(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const userId = requireUserId(req);
      assertValid(req);
      const { happy, sad, angry, relaxed, note } = matchedData(req);

      const record = await moodService.recordMood(userId, { happy, sad, angry, relaxed, note });

      res.status(201).json({
        success: true,
        data: record
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /mood/statistics?days=7
   */
  static async getStatistics(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const userId = requireUserId(req);
      assertValid(req);
      const { days } = matchedData(req);

      const statistics = await moodService.getStatistics(
        userId,
        typeof days === 'number' ? days : config.analysis.statisticsDefaultDays
      );

      res.status(200).json({
        success: true,
        data: statistics
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /mood/current
   */
  static async getCurrentMood(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const userId = requireUserId(req);
      const mood = await recommendationService.getCurrentMood(userId);

      res.status(200).json({
        success: true,
        data: mood
      });
    } catch (error) {
      next(error);
    }
  }
}
