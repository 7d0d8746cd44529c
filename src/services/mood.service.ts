import type { MoodEntryInput, MoodRecordData, MoodStatistics, MoodWindow } from '../types/mood.types';
import { MoodAggregator } from './mood-aggregator.service';
import type { MoodRecordStore } from './mood-record.store';

const DAY_MS = 24 * 60 * 60 * 1000;

export class MoodService {
  constructor(
    private readonly moodRecords: MoodRecordStore,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Store a mood the user entered by hand.
   */
  async recordMood(userId: string, input: MoodEntryInput): Promise<MoodRecordData> {
    return this.moodRecords.create({
      userId,
      happy: input.happy,
      sad: input.sad,
      angry: input.angry,
      relaxed: input.relaxed,
      note: input.note?.trim() || null,
      source: 'manual'
    });
  }

  /**
   * Mood statistics over the trailing `days` days.
   */
  async getStatistics(userId: string, days: number): Promise<MoodStatistics> {
    const end = this.now();
    const window: MoodWindow = {
      start: new Date(end.getTime() - days * DAY_MS),
      end
    };

    const records = await this.moodRecords.findInWindow(userId, window);
    return MoodAggregator.summarize(records, window);
  }
}
