import { MoodRecord, type IMoodRecord } from '../models/mood-record.model';
import type { MoodRecordData, MoodWindow, NewMoodRecord } from '../types/mood.types';
import { PersistenceError, ValidationError } from '../utils/errors';
import { describeIssues, moodVectorSchema } from '../utils/mood-vector';

/**
 * Persistence boundary for mood records: an append-only log per user.
 */
export interface MoodRecordStore {
  create(record: NewMoodRecord): Promise<MoodRecordData>;
  /** Newest first. */
  findRecent(userId: string, limit: number): Promise<MoodRecordData[]>;
  /** Records with `recordedAt` inside the window, newest first. */
  findInWindow(userId: string, window: MoodWindow): Promise<MoodRecordData[]>;
}

/**
 * Rejects a vector with a missing or out-of-range score before it reaches storage.
 */
export const assertStorableMood = (record: NewMoodRecord): void => {
  const parsed = moodVectorSchema.safeParse(record);
  if (!parsed.success) {
    throw new ValidationError(`Invalid mood scores: ${describeIssues(parsed.error)}`);
  }
};

const toRecordData = (doc: IMoodRecord): MoodRecordData => ({
  id: doc._id.toString(),
  userId: doc.userId.toString(),
  happy: doc.happy,
  sad: doc.sad,
  angry: doc.angry,
  relaxed: doc.relaxed,
  note: doc.note ?? null,
  source: doc.source,
  tracksAnalyzed: doc.tracksAnalyzed ?? null,
  recordedAt: doc.recordedAt
});

export class MongoMoodRecordStore implements MoodRecordStore {
  async create(record: NewMoodRecord): Promise<MoodRecordData> {
    assertStorableMood(record);

    try {
      const doc = await MoodRecord.create({
        userId: record.userId,
        happy: record.happy,
        sad: record.sad,
        angry: record.angry,
        relaxed: record.relaxed,
        note: record.note ?? undefined,
        source: record.source,
        tracksAnalyzed: record.tracksAnalyzed ?? undefined,
        recordedAt: record.recordedAt ?? new Date()
      });
      return toRecordData(doc);
    } catch (error) {
      console.error(`❌ [MoodRecords] Failed to store mood record for user ${record.userId}:`, error);
      throw new PersistenceError('Failed to store mood record', error);
    }
  }

  async findRecent(userId: string, limit: number): Promise<MoodRecordData[]> {
    const docs = await MoodRecord.find({ userId })
      .sort({ recordedAt: -1 })
      .limit(limit);
    return docs.map(toRecordData);
  }

  async findInWindow(userId: string, window: MoodWindow): Promise<MoodRecordData[]> {
    const docs = await MoodRecord.find({
      userId,
      recordedAt: { $gte: window.start, $lte: window.end }
    }).sort({ recordedAt: -1 });
    return docs.map(toRecordData);
  }
}
