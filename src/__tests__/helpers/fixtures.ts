import type { MoodVector } from '../../types/mood.types';
import type { TrackReference } from '../../types/track.types';

export const USER_ID = '64b7f0c2a1b2c3d4e5f60718';

export const track = (id: string, title: string, artist: string = 'Test Artist'): TrackReference => ({
  id,
  title,
  artists: [artist]
});

export const mood = (happy: number, sad: number, angry: number, relaxed: number): MoodVector => ({
  happy,
  sad,
  angry,
  relaxed
});
