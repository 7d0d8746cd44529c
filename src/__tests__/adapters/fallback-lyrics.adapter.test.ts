import { describe, it, expect, vi } from 'vitest';
import { FallbackLyricsAdapter } from '../../services/adapters/fallback-lyrics.adapter';
import type { LyricsAdapter } from '../../services/adapters/types';
import { LyricsNotFoundError, LyricsServiceError } from '../../utils/errors';
import { track } from '../helpers/fixtures';

const provider = () => ({
  getLyrics: vi.fn<Parameters<LyricsAdapter['getLyrics']>, ReturnType<LyricsAdapter['getLyrics']>>()
});

describe('FallbackLyricsAdapter', () => {
  const song = track('t1', 'Blue Hour');

  it('asks the next provider after a miss', async () => {
    const first = provider();
    const second = provider();
    first.getLyrics.mockRejectedValue(new LyricsNotFoundError('Blue Hour', 'Test Artist'));
    second.getLyrics.mockResolvedValue('Blue hour');

    await expect(new FallbackLyricsAdapter([first, second]).getLyrics(song)).resolves.toBe('Blue hour');
    expect(second.getLyrics).toHaveBeenCalledWith(song);
  });

  it('asks the next provider after a provider failure', async () => {
    const first = provider();
    const second = provider();
    first.getLyrics.mockRejectedValue(new LyricsServiceError('Lyrics lookup failed for "Blue Hour": HTTP 503'));
    second.getLyrics.mockResolvedValue('Blue hour');

    await expect(new FallbackLyricsAdapter([first, second]).getLyrics(song)).resolves.toBe('Blue hour');
  });

  it('stops at the first provider that has lyrics', async () => {
    const first = provider();
    const second = provider();
    first.getLyrics.mockResolvedValue('Morning light');

    await expect(new FallbackLyricsAdapter([first, second]).getLyrics(song)).resolves.toBe('Morning light');
    expect(second.getLyrics).not.toHaveBeenCalled();
  });

  it('reports the last failure when every provider fails', async () => {
    const first = provider();
    const second = provider();
    first.getLyrics.mockRejectedValue(new LyricsServiceError('Lyrics lookup failed for "Blue Hour": HTTP 503'));
    second.getLyrics.mockRejectedValue(new LyricsNotFoundError('Blue Hour', 'Test Artist'));

    await expect(new FallbackLyricsAdapter([first, second]).getLyrics(song)).rejects.toBeInstanceOf(
      LyricsNotFoundError
    );
  });

  it('does not hide unexpected errors', async () => {
    const first = provider();
    const second = provider();
    first.getLyrics.mockRejectedValue(new TypeError('unexpected'));

    await expect(new FallbackLyricsAdapter([first, second]).getLyrics(song)).rejects.toBeInstanceOf(TypeError);
    expect(second.getLyrics).not.toHaveBeenCalled();
  });
});
