import { select } from '@inquirer/prompts';
import chalk from 'chalk';
import type { AlbumRef, MatchCandidate, OperatorDecision, PromptRequest } from './types.js';
import type { Previewer } from './player.js';
import { describeError } from './errors.js';
import { describeStats, formatDuration, formatFileSize } from './metadata.js';

/** Asks a human to settle an ambiguous match. `null` leaves it unresolved. */
export interface OperatorPrompt {
  ask(request: PromptRequest): Promise<OperatorDecision | null>;
}

export interface InquirerPromptOptions {
  timeoutMs?: number | null;
  onQuit?: () => void;
  /** Adds "play" choices to the prompt when set. */
  player?: Previewer;
}

function promptErrorName(error: unknown): string | null {
  return error instanceof Error ? error.name : null;
}

function describeAlbum(album: AlbumRef): string {
  const title = album.title ?? album.releaseId;
  return album.artist ? `${album.artist} - ${title}` : title;
}

function displayContender(candidate: MatchCandidate, position: number): void {
  const { record } = candidate;
  const similarity = `${(candidate.similarity * 100).toFixed(1)}%`;
  const prefix = candidate.owned ? chalk.green('★') : ' ';

  console.log(`${prefix} ${chalk.cyan(`[${position}]`)} ${chalk.white(record.path)}`);

  const details = [`match ${similarity}`, formatDuration(record.duration)];

  if (record.format) {
    details.push(record.format);
  }

  if (record.bitrate) {
    details.push(`${record.bitrate}kbps`);
  }

  if (record.fileSize !== null) {
    details.push(formatFileSize(record.fileSize));
  }

  if (record.isDuplicate) {
    details.push(chalk.yellow('ghost'));
  }

  console.log(chalk.gray(`     ${details.join(' | ')}`));

  if (candidate.albums.length > 0) {
    console.log(chalk.gray(`     Albums: ${candidate.albums.map(describeAlbum).join('; ')}`));
  }
}

export class InquirerPrompt implements OperatorPrompt {
  constructor(private readonly options: InquirerPromptOptions = {}) {}

  async ask(request: PromptRequest): Promise<OperatorDecision | null> {
    try {
      return await this.resolve(request);
    } finally {
      this.options.player?.stop();
    }
  }

  private async resolve(request: PromptRequest): Promise<OperatorDecision | null> {
    const { contenders } = request;
    const [first] = contenders;

    if (!first) {
      return null;
    }

    console.log(chalk.yellow(`\n${'─'.repeat(60)}`));
    console.log(chalk.yellow(`Possible duplicate: ${request.path}`));
    console.log(chalk.gray(`     ${describeStats(request.stats)}`));

    if (request.stickyAlbum) {
      console.log(chalk.gray(`     Current album: ${describeAlbum(request.stickyAlbum)}`));
    }

    console.log();
    contenders.forEach((candidate, i) => displayContender(candidate, i + 1));
    console.log();

    const choices: Array<{ name: string; value: string }> = [
      { name: `Keep the new file (replaces [1])`, value: 'new' },
    ];

    contenders.forEach((candidate, i) => {
      choices.push({
        name: `Keep existing [${i + 1}] - ${candidate.record.path.split('/').slice(-2).join('/')}`,
        value: `existing:${candidate.key}`,
      });
    });

    choices.push({ name: chalk.yellow('Not duplicates - keep both'), value: 'distinct' });

    if (this.options.player) {
      choices.push({ name: chalk.blue('▶ Play the new file'), value: 'play:new' });
      contenders.forEach((candidate, i) => {
        choices.push({ name: chalk.blue(`▶ Play [${i + 1}]`), value: `play:${candidate.key}` });
      });
    }

    choices.push(
      { name: chalk.gray('Skip for now'), value: 'skip' },
      { name: chalk.red('Quit'), value: 'quit' }
    );

    let answer = await this.select('What would you like to do?', choices);

    while (answer?.startsWith('play:')) {
      const target =
        answer === 'play:new'
          ? request.path
          : contenders.find((c) => `play:${c.key}` === answer)?.record.path;

      if (target) {
        await this.preview(target);
      }

      answer = await this.select('What would you like to do?', choices);
    }

    if (answer === null || answer === 'skip') {
      return null;
    }

    if (answer === 'quit') {
      this.options.onQuit?.();
      return null;
    }

    if (answer === 'new' || answer === 'distinct') {
      return { choice: answer, candidateKey: first.key, album: await this.pickAlbum(first) };
    }

    const chosen = contenders.find((c) => `existing:${c.key}` === answer) ?? first;

    return { choice: 'existing', candidateKey: chosen.key, album: await this.pickAlbum(chosen) };
  }

  private async preview(filePath: string): Promise<void> {
    const { player } = this.options;

    if (!player) {
      return;
    }

    try {
      if (!(await player.play(filePath))) {
        console.log(chalk.yellow('No supported audio player found (tried afplay, ffplay, mpv, cvlc)'));
      }
    } catch (error) {
      console.log(chalk.yellow(`Could not play ${filePath}: ${describeError(error)}`));
    }
  }

  private async pickAlbum(candidate: MatchCandidate): Promise<AlbumRef | undefined> {
    if (candidate.albums.length <= 1) {
      return candidate.albums[0];
    }

    const choices = candidate.albums.map((album) => ({
      name: describeAlbum(album),
      value: album.releaseId,
    }));
    choices.push({ name: chalk.gray("Don't remember an album"), value: '' });

    const answer = await this.select('Which album are you working through?', choices);

    return candidate.albums.find((album) => album.releaseId === answer);
  }

  private async select(
    message: string,
    choices: Array<{ name: string; value: string }>
  ): Promise<string | null> {
    const { timeoutMs } = this.options;
    const context = timeoutMs ? { signal: AbortSignal.timeout(timeoutMs) } : {};

    try {
      return await select({ message, choices, pageSize: 15 }, context);
    } catch (error) {
      const name = promptErrorName(error);

      // Ctrl+C ends the run; a timeout only skips this file
      if (name === 'ExitPromptError') {
        this.options.onQuit?.();
        return null;
      }

      if (name === 'AbortPromptError') {
        return null;
      }

      throw error;
    }
  }
}

/** Leaves every ambiguous match for a later, attended run. */
export class UnattendedPrompt implements OperatorPrompt {
  async ask(): Promise<OperatorDecision | null> {
    return null;
  }
}
