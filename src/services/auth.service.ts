import jwt from 'jsonwebtoken';
import { config } from '../config/env';
import { User } from '../models/user.model';
import type {
  JwtPayload,
  LoginData,
  LoginResponse,
  RegisterData,
  RegisterResponse,
  SpotifyStatePayload
} from '../types/auth.types';
import { AuthenticationError, ConflictError, ValidationError } from '../utils/errors';

const SPOTIFY_STATE_EXPIRES_IN = '10m';

export class AuthService {
  static async register(data: RegisterData): Promise<RegisterResponse> {
    const existingUser = await User.findOne({ email: data.email });
    if (existingUser) {
      throw new ConflictError('The user with this email already exists.');
    }

    const user = new User({
      email: data.email,
      password: data.password
    });
    await user.save();

    console.log(`👤 [Auth] Registered user ${user._id.toString()}`);

    return {
      user: {
        id: user._id.toString(),
        email: user.email
      },
      accessToken: this.generateAccessToken(user._id.toString()),
      tokenType: 'bearer'
    };
  }

  static async login(data: LoginData): Promise<LoginResponse> {
    // Find user by email and include password
    const user = await User.findOne({ email: data.email }).select('+password');

    if (!user || !user.isActive) {
      throw new AuthenticationError('Incorrect email or password');
    }

    const isPasswordValid = await user.comparePassword(data.password);
    if (!isPasswordValid) {
      throw new AuthenticationError('Incorrect email or password');
    }

    return {
      accessToken: this.generateAccessToken(user._id.toString()),
      tokenType: 'bearer',
      expiresIn: config.jwtExpiresIn
    };
  }

  static generateAccessToken(userId: string): string {
    const payload: JwtPayload = { userId };
    return jwt.sign(payload, config.jwtSecret, {
      expiresIn: config.jwtExpiresIn
    } as jwt.SignOptions);
  }

  /**
   * Returns the user id carried by a bearer token.
   */
  static verifyAccessToken(token: string): string {
    try {
      const decoded = jwt.verify(token, config.jwtSecret);
      // A Spotify state is signed with the same secret but is not a session
      if (typeof decoded === 'string' || typeof decoded.userId !== 'string' || decoded.purpose !== undefined) {
        throw new AuthenticationError();
      }
      return decoded.userId;
    } catch (error) {
      if (error instanceof AuthenticationError) {
        throw error;
      }
      throw new AuthenticationError('Invalid or expired token');
    }
  }

  /**
   * OAuth `state` for the Spotify connect flow. The callback is unauthenticated,
   * so the state itself identifies the user.
   */
  static generateSpotifyState(userId: string): string {
    const payload: SpotifyStatePayload = { userId, purpose: 'spotify-connect' };
    return jwt.sign(payload, config.jwtSecret, { expiresIn: SPOTIFY_STATE_EXPIRES_IN });
  }

  static verifySpotifyState(state: string): string {
    try {
      const decoded = jwt.verify(state, config.jwtSecret);
      if (
        typeof decoded !== 'string' &&
        decoded.purpose === 'spotify-connect' &&
        typeof decoded.userId === 'string'
      ) {
        return decoded.userId;
      }
    } catch (error) {
      console.warn('⚠️ [Auth] Rejected Spotify state:', error instanceof Error ? error.message : error);
    }
    throw new ValidationError('Invalid or expired state parameter.');
  }
}
