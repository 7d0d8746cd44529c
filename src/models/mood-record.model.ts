import mongoose, { Document, Schema } from 'mongoose';
import type { MoodSource } from '../types/mood.types';

export interface IMoodRecord extends Document<mongoose.Types.ObjectId> {
  userId: mongoose.Types.ObjectId;
  happy: number;
  sad: number;
  angry: number;
  relaxed: number;
  note?: string;
  source: MoodSource;
  tracksAnalyzed?: number;
  recordedAt: Date;
}

const score = {
  type: Number,
  required: true,
  min: 0,
  max: 1
};

// Append-only: records are inserted and read, never updated.
const moodRecordSchema = new Schema<IMoodRecord>({
  userId: {
    type: Schema.Types.ObjectId,
    ref: 'User',
    required: true
  },
  happy: score,
  sad: score,
  angry: score,
  relaxed: score,
  note: {
    type: String,
    trim: true,
    maxlength: 255
  },
  source: {
    type: String,
    enum: ['manual', 'listening-history'],
    required: true
  },
  tracksAnalyzed: {
    type: Number,
    min: 0
  },
  recordedAt: {
    type: Date,
    required: true,
    default: Date.now
  }
});

// Timeline queries: one user's records, newest first
moodRecordSchema.index({ userId: 1, recordedAt: -1 });

export const MoodRecord = mongoose.model<IMoodRecord>('MoodRecord', moodRecordSchema);
