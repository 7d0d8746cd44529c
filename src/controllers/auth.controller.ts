import { Request, Response, NextFunction } from 'express';
import { matchedData } from 'express-validator';
import { AuthService } from '../services/auth.service';
import { assertValid } from '../utils/validation';

export class AuthController {
  static async register(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      assertValid(req);
      const { email, password } = matchedData(req);

      const result = await AuthService.register({ email, password });

      res.status(201).json({
        success: true,
        message: 'User registered successfully',
        data: result
      });
    } catch (error) {
      next(error);
    }
  }

  static async login(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      assertValid(req);
      const { email, password } = matchedData(req);

      const result = await AuthService.login({ email, password });

      res.status(200).json({
        success: true,
        message: 'Login successful',
        data: result
      });
    } catch (error) {
      next(error);
    }
  }
}
