import { MOOD_DIMENSIONS, type MoodRecordData, type MoodStatistics, type MoodVector, type MoodWindow } from '../types/mood.types';
import { EmptyInputError } from '../utils/errors';
import { toMoodVector, zeroMood } from '../utils/mood-vector';

export class MoodAggregator {
  /**
   * Element-wise mean of the given vectors.
   * Callers decide whether an empty batch means "no data" or an error.
   */
  static aggregate(vectors: readonly MoodVector[]): MoodVector {
    if (vectors.length === 0) {
      throw new EmptyInputError();
    }

    const sums = zeroMood();
    for (const vector of vectors) {
      for (const dimension of MOOD_DIMENSIONS) {
        sums[dimension] += vector[dimension];
      }
    }

    const mean = zeroMood();
    for (const dimension of MOOD_DIMENSIONS) {
      mean[dimension] = sums[dimension] / vectors.length;
    }
    return mean;
  }

  /**
   * Per-dimension mean, min and max over the records inside the window (inclusive).
   * An empty window yields zero averages and null extremes.
   */
  static summarize(records: readonly MoodRecordData[], window: MoodWindow): MoodStatistics {
    const start = window.start.getTime();
    const end = window.end.getTime();

    const inWindow = records
      .filter((record) => {
        const at = record.recordedAt.getTime();
        return at >= start && at <= end;
      })
      .sort((a, b) => b.recordedAt.getTime() - a.recordedAt.getTime());

    if (inWindow.length === 0) {
      return {
        startDate: window.start,
        endDate: window.end,
        count: 0,
        average: zeroMood(),
        min: null,
        max: null,
        records: []
      };
    }

    const vectors = inWindow.map(toMoodVector);
    const min = { ...vectors[0] };
    const max = { ...vectors[0] };
    for (const vector of vectors) {
      for (const dimension of MOOD_DIMENSIONS) {
        min[dimension] = Math.min(min[dimension], vector[dimension]);
        max[dimension] = Math.max(max[dimension], vector[dimension]);
      }
    }

    return {
      startDate: window.start,
      endDate: window.end,
      count: inWindow.length,
      average: this.aggregate(vectors),
      min,
      max,
      records: inWindow
    };
  }
}
