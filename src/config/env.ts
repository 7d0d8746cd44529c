import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

type Env = Record<string, string | undefined>;

const parseNumber = (value: string | undefined, fallback: number): number => {
    const parsed = parseInt(value || '', 10);
    return Number.isNaN(parsed) ? fallback : parsed;
};

const parsePositive = (value: string | undefined, fallback: number): number => {
    const parsed = parseNumber(value, fallback);
    return parsed > 0 ? parsed : fallback;
};

const parseBounded = (value: string | undefined, fallback: number, max: number): number =>
    Math.min(parsePositive(value, fallback), max);

// Spotify's recently-played endpoint rejects a larger page
export const SPOTIFY_RECENT_TRACKS_MAX = 50;

/**
 * Accepts a comma separated list; blank entries are dropped.
 */
export const parseOrigins = (value: string | undefined): string[] => {
    if (value === undefined) {
        return ['http://localhost:4200'];
    }
    return value
        .split(',')
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0);
};

export interface SpotifyConfig {
    clientId: string;
    clientSecret: string;
    redirectUri: string;
    accountsBaseUrl: string;
    apiBaseUrl: string;
    scopes: string[];
    timeoutMs: number;
}

export interface LyricsConfig {
    baseUrl: string;
    timeoutMs: number;
}

/** Second lyrics source, used only when an access token is configured. */
export interface GeniusConfig {
    accessToken?: string;
    apiBaseUrl: string;
    timeoutMs: number;
}

export interface MoodAIConfig {
    baseUrl: string;
    apiKey?: string;
    timeoutMs: number;
}

export interface AnalysisConfig {
    recentTrackLimit: number;
    currentMoodHistorySize: number;
    concurrency: number;
    statisticsDefaultDays: number;
}

export interface Config {
    port: number;
    nodeEnv: string;
    apiPrefix: string;
    mongodbUri: string;
    jwtSecret: string;
    jwtExpiresIn: string;
    corsOrigins: string[];
    frontendUrl?: string;
    spotify: SpotifyConfig;
    lyrics: LyricsConfig;
    genius: GeniusConfig;
    ai: MoodAIConfig;
    analysis: AnalysisConfig;
}

/**
 * Centralized environment configuration.
 * Everything outside this module receives its settings from the returned struct.
 */
export const loadConfig = (env: Env = process.env): Config => ({
    // Server
    port: parseNumber(env.PORT, 3000),
    nodeEnv: env.NODE_ENV || 'development',
    apiPrefix: env.API_PREFIX || '/api/v1',

    // Database
    mongodbUri: env.MONGODB_URI || 'mongodb://localhost:27017/moodtrack',

    // JWT
    jwtSecret: env.JWT_SECRET || 'your-secret-key-change-in-production',
    jwtExpiresIn: env.JWT_EXPIRES_IN || '7d',

    corsOrigins: parseOrigins(env.BACKEND_CORS_ORIGINS),
    frontendUrl: env.FRONTEND_URL || undefined,

    // External APIs
    spotify: {
        clientId: env.SPOTIFY_CLIENT_ID || '',
        clientSecret: env.SPOTIFY_CLIENT_SECRET || '',
        redirectUri: env.SPOTIFY_REDIRECT_URI || '',
        accountsBaseUrl: 'https://accounts.spotify.com',
        apiBaseUrl: 'https://api.spotify.com/v1',
        scopes: ['user-read-recently-played', 'user-modify-playback-state'],
        timeoutMs: parsePositive(env.SPOTIFY_TIMEOUT_MS, 10000)
    },
    lyrics: {
        baseUrl: env.LYRICS_API_URL || 'https://api.lyrics.ovh/v1',
        timeoutMs: parsePositive(env.LYRICS_TIMEOUT_MS, 5000)
    },
    genius: {
        accessToken: env.GENIUS_ACCESS_TOKEN || undefined,
        apiBaseUrl: 'https://api.genius.com',
        timeoutMs: parsePositive(env.GENIUS_TIMEOUT_MS, 15000)
    },
    ai: {
        baseUrl: env.AI_API_URL || 'http://localhost:5000',
        apiKey: env.AI_API_KEY || undefined,
        timeoutMs: parsePositive(env.AI_TIMEOUT_MS, 15000)
    },

    // Mood analysis tuning
    analysis: {
        recentTrackLimit: parseBounded(env.RECENT_TRACK_LIMIT, 20, SPOTIFY_RECENT_TRACKS_MAX),
        currentMoodHistorySize: parsePositive(env.CURRENT_MOOD_HISTORY_SIZE, 10),
        concurrency: parsePositive(env.ANALYSIS_CONCURRENCY, 5),
        statisticsDefaultDays: parsePositive(env.STATISTICS_DEFAULT_DAYS, 7)
    }
});

export const config = loadConfig();
