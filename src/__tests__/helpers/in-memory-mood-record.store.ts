import type { MoodRecordData, MoodWindow, NewMoodRecord } from '../../types/mood.types';
import { assertStorableMood, type MoodRecordStore } from '../../services/mood-record.store';

export class InMemoryMoodRecordStore implements MoodRecordStore {
  readonly records: MoodRecordData[] = [];
  private nextId = 1;

  async create(record: NewMoodRecord): Promise<MoodRecordData> {
    assertStorableMood(record);
    const stored: MoodRecordData = {
      id: `record-${this.nextId++}`,
      userId: record.userId,
      happy: record.happy,
      sad: record.sad,
      angry: record.angry,
      relaxed: record.relaxed,
      note: record.note ?? null,
      source: record.source,
      tracksAnalyzed: record.tracksAnalyzed ?? null,
      recordedAt: record.recordedAt ?? new Date()
    };
    this.records.push(stored);
    return stored;
  }

  async findRecent(userId: string, limit: number): Promise<MoodRecordData[]> {
    return this.forUser(userId).slice(0, limit);
  }

  async findInWindow(userId: string, window: MoodWindow): Promise<MoodRecordData[]> {
    return this.forUser(userId).filter(
      (record) => record.recordedAt >= window.start && record.recordedAt <= window.end
    );
  }

  private forUser(userId: string): MoodRecordData[] {
    return this.records
      .filter((record) => record.userId === userId)
      .sort((a, b) => b.recordedAt.getTime() - a.recordedAt.getTime());
  }
}
