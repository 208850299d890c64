import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { select } from '@inquirer/prompts';
import type { AlbumRef, MatchCandidate, PromptRequest } from './types.js';
import { InquirerPrompt, UnattendedPrompt } from './prompts.js';
import { makeRecord, makeStats } from './test-helpers.js';

vi.mock('@inquirer/prompts', () => ({ select: vi.fn() }));

const ONE: AlbumRef = { releaseId: 'rel-1', artist: 'Artist', title: 'One' };
const TWO: AlbumRef = { releaseId: 'rel-2', artist: 'Artist', title: 'Two' };

function contender(key: number, albums: AlbumRef[] = []): MatchCandidate {
  return { key, similarity: 0.96, owned: false, albums, record: makeRecord(key) };
}

function request(contenders: MatchCandidate[]): PromptRequest {
  return {
    path: '/music/new.mp3',
    stats: makeStats(),
    qualityScore: 100,
    contenders,
    stickyAlbum: null,
  };
}

function promptError(name: string): Error {
  const error = new Error('prompt ended');
  error.name = name;
  return error;
}

describe('InquirerPrompt', () => {
  const mockedSelect = vi.mocked(select);

  beforeEach(() => {
    mockedSelect.mockReset();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should keep the new file against the top contender', async () => {
    mockedSelect.mockResolvedValueOnce('new');

    const decision = await new InquirerPrompt().ask(request([contender(1, [ONE]), contender(2)]));

    expect(decision).toEqual({ choice: 'new', candidateKey: 1, album: ONE });
  });

  it('should keep the stored copy the operator picked', async () => {
    mockedSelect.mockResolvedValueOnce('existing:2');

    const decision = await new InquirerPrompt().ask(request([contender(1), contender(2)]));

    expect(decision).toEqual({ choice: 'existing', candidateKey: 2, album: undefined });
  });

  it('should ask which album to remember when there are several', async () => {
    mockedSelect.mockResolvedValueOnce('distinct').mockResolvedValueOnce('rel-2');

    const decision = await new InquirerPrompt().ask(request([contender(1, [ONE, TWO])]));

    expect(decision).toEqual({ choice: 'distinct', candidateKey: 1, album: TWO });
    expect(mockedSelect).toHaveBeenCalledTimes(2);
  });

  it('should return null when skipped', async () => {
    mockedSelect.mockResolvedValueOnce('skip');

    expect(await new InquirerPrompt().ask(request([contender(1)]))).toBeNull();
  });

  it('should report quitting', async () => {
    const onQuit = vi.fn();
    mockedSelect.mockResolvedValueOnce('quit');

    expect(await new InquirerPrompt({ onQuit }).ask(request([contender(1)]))).toBeNull();
    expect(onQuit).toHaveBeenCalledTimes(1);
  });

  it('should give up quietly when the prompt times out', async () => {
    const onQuit = vi.fn();
    mockedSelect.mockRejectedValueOnce(promptError('AbortPromptError'));

    const decision = await new InquirerPrompt({ timeoutMs: 1000, onQuit }).ask(
      request([contender(1)])
    );

    expect(decision).toBeNull();
    expect(onQuit).not.toHaveBeenCalled();
    expect(mockedSelect.mock.calls[0][1]?.signal).toBeInstanceOf(AbortSignal);
  });

  it('should treat Ctrl+C as quitting', async () => {
    const onQuit = vi.fn();
    mockedSelect.mockRejectedValueOnce(promptError('ExitPromptError'));

    expect(await new InquirerPrompt({ onQuit }).ask(request([contender(1)]))).toBeNull();
    expect(onQuit).toHaveBeenCalledTimes(1);
  });

  describe('with a player', () => {
    const player = { play: vi.fn(async (_path: string) => true), stop: vi.fn() };

    beforeEach(() => {
      player.play.mockClear();
      player.stop.mockClear();
    });

    it('should play the new file and ask again', async () => {
      mockedSelect.mockResolvedValueOnce('play:new').mockResolvedValueOnce('new');

      const decision = await new InquirerPrompt({ player }).ask(request([contender(1)]));

      expect(player.play).toHaveBeenCalledWith('/music/new.mp3');
      expect(mockedSelect).toHaveBeenCalledTimes(2);
      expect(decision).toEqual({ choice: 'new', candidateKey: 1, album: undefined });
      expect(player.stop).toHaveBeenCalledTimes(1);
    });

    it('should play a stored copy and stop when skipped', async () => {
      mockedSelect.mockResolvedValueOnce('play:2').mockResolvedValueOnce('skip');

      const decision = await new InquirerPrompt({ player }).ask(
        request([contender(1), contender(2)])
      );

      expect(player.play).toHaveBeenCalledWith('/music/2.mp3');
      expect(decision).toBeNull();
      expect(player.stop).toHaveBeenCalledTimes(1);
    });

    it('should say so when nothing can play', async () => {
      player.play.mockResolvedValueOnce(false);
      mockedSelect.mockResolvedValueOnce('play:new').mockResolvedValueOnce('skip');

      await new InquirerPrompt({ player }).ask(request([contender(1)]));

      expect(console.log).toHaveBeenCalledWith(
        expect.stringContaining('No supported audio player found')
      );
    });

    it('should stop playback when the prompt fails', async () => {
      mockedSelect.mockResolvedValueOnce('play:new').mockRejectedValueOnce(new Error('closed'));

      await expect(new InquirerPrompt({ player }).ask(request([contender(1)]))).rejects.toThrow(
        'closed'
      );
      expect(player.stop).toHaveBeenCalledTimes(1);
    });
  });

  it('should pass other prompt failures on', async () => {
    mockedSelect.mockRejectedValueOnce(new Error('stdin is not a TTY'));

    await expect(new InquirerPrompt().ask(request([contender(1)]))).rejects.toThrow(
      'stdin is not a TTY'
    );
  });
});

describe('UnattendedPrompt', () => {
  it('should never decide', async () => {
    expect(await new UnattendedPrompt().ask()).toBeNull();
  });
});
