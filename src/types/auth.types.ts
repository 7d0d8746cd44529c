/**
 * Shared authentication types
 */

export interface RegisterData {
    email: string;
    password: string;
}

export interface LoginData {
    email: string;
    password: string;
}

export interface RegisterResponse {
    user: {
        id: string;
        email: string;
    };
    accessToken: string;
    tokenType: 'bearer';
}

export interface LoginResponse {
    accessToken: string;
    tokenType: 'bearer';
    expiresIn: string;
}

export interface JwtPayload {
    userId: string;
}

export interface SpotifyStatePayload {
    userId: string;
    purpose: 'spotify-connect';
}

export interface UserProfile {
    id: string;
    email: string;
    isActive: boolean;
    createdAt: Date;
    spotify: {
        connected: boolean;
        tokenExpiresAt: Date | null;
    };
}

export interface UpdateProfileData {
    email?: string;
    password?: string;
}
