import { Request, Response, NextFunction } from 'express';
import { User } from '../models/user.model';
import { AuthService } from '../services/auth.service';
import { AuthenticationError } from '../utils/errors';

export interface AuthRequest extends Request {
  user?: {
    id: string;
    email: string;
  };
}

export const authMiddleware = async (
  req: AuthRequest,
  res: Response,
  next: NextFunction
): Promise<void> => {
  try {
    const header = req.headers.authorization;
    const token = header?.startsWith('Bearer ') ? header.slice('Bearer '.length).trim() : undefined;

    if (!token) {
      throw new AuthenticationError('Authentication required');
    }

    const userId = AuthService.verifyAccessToken(token);
    const user = await User.findById(userId);

    if (!user || !user.isActive) {
      throw new AuthenticationError('User not found');
    }

    req.user = {
      id: user._id.toString(),
      email: user.email
    };

    next();
  } catch (error) {
    next(error instanceof AuthenticationError ? error : new AuthenticationError('Invalid or expired token'));
  }
};

/**
 * Narrows an authenticated request to its user id.
 */
export const requireUserId = (req: AuthRequest): string => {
  const userId = req.user?.id;
  if (!userId) {
    throw new AuthenticationError('Unauthorized');
  }
  return userId;
};
