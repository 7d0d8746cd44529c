import { z } from 'zod';
import { MOOD_DIMENSIONS, type MoodVector } from '../types/mood.types';

const score = z.number().min(0).max(1);

export const moodVectorSchema: z.ZodType<MoodVector> = z.object({
  happy: score,
  sad: score,
  angry: score,
  relaxed: score
});

export const zeroMood = (): MoodVector => ({ happy: 0, sad: 0, angry: 0, relaxed: 0 });

/**
 * Copies the four mood scores out of anything shaped like a mood vector
 * (a stored record, a prediction), dropping every other field.
 */
export const toMoodVector = (source: MoodVector): MoodVector => {
  const vector = zeroMood();
  for (const dimension of MOOD_DIMENSIONS) {
    vector[dimension] = source[dimension];
  }
  return vector;
};

/** Human readable list of the schema violations, for error messages and logs. */
export const describeIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => `${issue.path.join('.') || 'value'}: ${issue.message}`)
    .join('; ');
