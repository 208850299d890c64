import { spawn } from 'node:child_process';
import type { EventEmitter } from 'node:events';

export interface PlayerProcess extends Pick<EventEmitter, 'once' | 'on'> {
  kill(): boolean;
}

export type PlayerCommand = [command: string, args: string[]];

export type Launcher = (command: string, args: string[]) => PlayerProcess;

/** Plays a track while the operator decides. */
export interface Previewer {
  /** Resolves false when no player could be started. */
  play(filePath: string): Promise<boolean>;
  stop(): void;
}

/** Command-line players to try, in order. */
export function playerCommands(
  filePath: string,
  platform: NodeJS.Platform = process.platform
): PlayerCommand[] {
  const commands: PlayerCommand[] = [];

  if (platform === 'darwin') {
    commands.push(['afplay', [filePath]]);
  }

  commands.push(
    ['ffplay', ['-nodisp', '-autoexit', '-hide_banner', '-loglevel', 'quiet', filePath]],
    ['mpv', ['--no-video', '--quiet', filePath]],
    ['cvlc', ['--play-and-exit', '--quiet', filePath]]
  );

  return commands;
}

const launchQuietly: Launcher = (command, args) => spawn(command, args, { stdio: 'ignore' });

function start(launch: Launcher, command: string, args: string[]): Promise<PlayerProcess | null> {
  return new Promise((resolve, reject) => {
    const child = launch(command, args);

    child.once('spawn', () => resolve(child));
    child.once('error', (error: NodeJS.ErrnoException) => {
      // not installed; the caller moves on to the next player
      if (error.code === 'ENOENT') {
        resolve(null);
      } else {
        reject(error);
      }
    });
  });
}

export class AudioPlayer implements Previewer {
  private current: PlayerProcess | null = null;

  constructor(
    private readonly launch: Launcher = launchQuietly,
    private readonly platform: NodeJS.Platform = process.platform
  ) {}

  async play(filePath: string): Promise<boolean> {
    this.stop();

    for (const [command, args] of playerCommands(filePath, this.platform)) {
      const child = await start(this.launch, command, args);

      if (child) {
        this.current = child;
        child.on('exit', () => {
          if (this.current === child) {
            this.current = null;
          }
        });
        return true;
      }
    }

    return false;
  }

  stop(): void {
    this.current?.kill();
    this.current = null;
  }
}
