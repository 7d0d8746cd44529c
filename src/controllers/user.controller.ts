import { Response, NextFunction } from 'express';
import { matchedData } from 'express-validator';
import { UserService } from '../services/user.service';
import { type AuthRequest, requireUserId } from '../middleware/auth.middleware';
import { assertValid } from '../utils/validation';

export class UserController {
  static async getCurrentProfile(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const userId = requireUserId(req);
      const profile = await UserService.getProfile(userId);

      res.status(200).json({
        success: true,
        data: profile
      });
    } catch (error) {
      next(error);
    }
  }

  static async updateProfile(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const userId = requireUserId(req);
      assertValid(req);
      const { email, password } = matchedData(req);

      const profile = await UserService.updateProfile(userId, { email, password });

      res.status(200).json({
        success: true,
        message: 'Profile updated successfully',
        data: profile
      });
    } catch (error) {
      next(error);
    }
  }
}
