/**
 * Shared mood types
 */

export const MOOD_DIMENSIONS = ['happy', 'sad', 'angry', 'relaxed'] as const;

export type MoodDimension = (typeof MOOD_DIMENSIONS)[number];

/** Four probability-like scores, each in [0, 1]. */
export type MoodVector = Record<MoodDimension, number>;

export type MoodSource = 'manual' | 'listening-history';

export interface MoodRecordData extends MoodVector {
    id: string;
    userId: string;
    note: string | null;
    source: MoodSource;
    tracksAnalyzed: number | null;
    recordedAt: Date;
}

export interface NewMoodRecord extends MoodVector {
    userId: string;
    note?: string | null;
    source: MoodSource;
    tracksAnalyzed?: number | null;
    recordedAt?: Date;
}

export interface MoodEntryInput extends MoodVector {
    note?: string;
}

export interface MoodWindow {
    start: Date;
    end: Date;
}

export interface MoodStatistics {
    startDate: Date;
    endDate: Date;
    count: number;
    average: MoodVector;
    min: MoodVector | null;
    max: MoodVector | null;
    records: MoodRecordData[];
}
