import { User, type IUser } from '../models/user.model';
import type { UpdateProfileData, UserProfile } from '../types/auth.types';
import { ConflictError, NotFoundError } from '../utils/errors';

export class UserService {
  static toProfile(user: IUser): UserProfile {
    return {
      id: user._id.toString(),
      email: user.email,
      isActive: user.isActive,
      createdAt: user.createdAt,
      spotify: {
        connected: Boolean(user.spotify?.accessToken),
        tokenExpiresAt: user.spotify?.tokenExpiresAt ?? null
      }
    };
  }

  static async getProfile(userId: string): Promise<UserProfile> {
    const user = await User.findById(userId);
    if (!user) {
      throw new NotFoundError('User not found');
    }
    return this.toProfile(user);
  }

  static async updateProfile(userId: string, data: UpdateProfileData): Promise<UserProfile> {
    const user = await User.findById(userId).select('+password');
    if (!user) {
      throw new NotFoundError('User not found');
    }

    if (data.email && data.email !== user.email) {
      const taken = await User.exists({ email: data.email, _id: { $ne: user._id } });
      if (taken) {
        throw new ConflictError('The user with this email already exists.');
      }
      user.email = data.email;
    }

    if (data.password) {
      // Hashed by the pre-save hook
      user.password = data.password;
    }

    await user.save();
    return this.toProfile(user);
  }
}
