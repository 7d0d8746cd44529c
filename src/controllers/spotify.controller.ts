import { Request, Response, NextFunction } from 'express';
import { matchedData } from 'express-validator';
import { config } from '../config/env';
import { type AuthRequest, requireUserId } from '../middleware/auth.middleware';
import { AuthService } from '../services/auth.service';
import { recommendationService, spotifyAdapter } from '../services/container';
import { assertValid } from '../utils/validation';

export class SpotifyController {
  /**
   * GET /spotify/auth
   */
  static async getAuthUrl(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const userId = requireUserId(req);
      const state = AuthService.generateSpotifyState(userId);

      res.status(200).json({
        success: true,
        data: {
          authUrl: spotifyAdapter.getAuthorizationUrl(state),
          state
        }
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /spotify/callback?code=&state=
   * Reached through the browser redirect, so it carries no bearer token.
   */
  static async callback(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      assertValid(req);
      const { code, state } = matchedData(req);

      const userId = AuthService.verifySpotifyState(state);
      const tokens = await spotifyAdapter.connect(userId, code);

      if (config.frontendUrl) {
        res.redirect(`${config.frontendUrl}/main/home`);
        return;
      }

      res.status(200).json({
        success: true,
        message: 'Spotify account connected',
        data: {
          connected: true,
          tokenExpiresAt: tokens.expiresAt
        }
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /spotify/recent-tracks?limit=20&time_limit_minutes=30
   */
  static async getRecentTracks(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const userId = requireUserId(req);
      assertValid(req);
      const { limit, time_limit_minutes: sinceMinutes } = matchedData(req);

      const tracks = await spotifyAdapter.getRecentTracks(userId, {
        limit: typeof limit === 'number' ? limit : config.analysis.recentTrackLimit,
        sinceMinutes: typeof sinceMinutes === 'number' ? sinceMinutes : undefined
      });

      res.status(200).json({
        success: true,
        data: tracks
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /spotify/queue-song { title, artist }
   */
  static async queueSong(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const userId = requireUserId(req);
      assertValid(req);
      const { title, artist } = matchedData(req);

      const track = await recommendationService.queueSong(userId, { title, artist });

      res.status(200).json({
        success: true,
        message: `Added "${track.title}" to queue`,
        data: { track }
      });
    } catch (error) {
      next(error);
    }
  }
}
