#!/usr/bin/env node
import { join, resolve } from 'node:path';
import chalk from 'chalk';
import ora from 'ora';
import cliProgress from 'cli-progress';
import type { Config } from './types.js';
import { removeEmptyDirectories } from './cleanup.js';
import { loadConfig } from './config.js';
import { createEngineContext } from './context.js';
import { describeError } from './errors.js';
import { FpcalcFingerprinter } from './fingerprinter.js';
import { Logger } from './logger.js';
import { EmbeddedTagResolver, musicMetadataStats, probeFile } from './metadata.js';
import { LibraryOrganizer } from './organizer.js';
import { AudioPlayer } from './player.js';
import { InquirerPrompt, UnattendedPrompt } from './prompts.js';
import { exportLibraryCsv, printLibraryReport, printScanSummary } from './report.js';
import { pruneGhosts } from './retention.js';
import { ScanController } from './scan-controller.js';
import { discoverAudioFiles } from './scanner.js';
import { LibraryStore } from './store.js';

const COMMANDS = ['scan', 'report', 'export', 'prune'] as const;

type Command = (typeof COMMANDS)[number];

interface CliOptions {
  command: Command;
  configPath: string;
  outputPath: string | null;
  dryRun: boolean;
  unattended: boolean;
  debug: boolean;
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = {
    command: 'scan',
    configPath: join(process.cwd(), 'config.json'),
    outputPath: null,
    dryRun: false,
    unattended: false,
    debug: false,
  };
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--config') {
      const value = argv[++i];

      if (!value) {
        throw new Error('--config needs a file path');
      }

      options.configPath = resolve(value);
    } else if (arg === '--dry-run') {
      options.dryRun = true;
    } else if (arg === '--unattended') {
      options.unattended = true;
    } else if (arg === '--debug') {
      options.debug = true;
    } else if (arg.startsWith('--')) {
      throw new Error(`Unknown option: ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  const [command, output] = positional;

  if (command !== undefined) {
    if (!isCommand(command)) {
      throw new Error(`Unknown command: ${command} (expected one of ${COMMANDS.join(', ')})`);
    }

    options.command = command;
  }

  options.outputPath = output === undefined ? null : resolve(output);

  return options;
}

function applyOverrides(config: Config, options: CliOptions): Config {
  return {
    ...config,
    dryRun: config.dryRun || options.dryRun,
    prompt: options.unattended ? { ...config.prompt, mode: 'skip' } : config.prompt,
  };
}

async function runScan(config: Config, store: LibraryStore, logger: Logger): Promise<void> {
  console.log(chalk.cyan('\n🔍 Audio Dedupe\n'));
  console.log(chalk.gray(`Scan paths: ${config.scanPaths.join(', ')}`));
  console.log(chalk.gray(`Extensions: ${config.supportedExtensions.join(', ')}`));

  if (config.dryRun) {
    console.log(chalk.yellow('Dry run: files will not be moved'));
  }

  console.log();

  const spinner = ora('Discovering audio files...').start();
  let discovered = 0;
  let files: string[];

  try {
    const result = await discoverAudioFiles(config.scanPaths, {
      extensions: config.supportedExtensions,
      excludePatterns: config.excludePatterns,
      duplicatesDir: config.duplicatesDir,
      onFile: () => {
        discovered++;
        spinner.text = `Discovering audio files... (${discovered} found)`;
      },
    });

    files = result.files;
    spinner.succeed(`Found ${files.length} audio files (${result.method})`);

    for (const missing of result.missing) {
      logger.warn(`Scan path does not exist: ${missing}`);
    }
  } catch (error) {
    spinner.fail('Failed to discover files');
    throw error;
  }

  if (files.length === 0) {
    console.log(chalk.green('Nothing to scan.'));
    return;
  }

  const context = createEngineContext(config.matching, store, logger);
  const quit = new AbortController();
  const prompt =
    config.prompt.mode === 'skip'
      ? new UnattendedPrompt()
      : new InquirerPrompt({
          timeoutMs: config.prompt.timeoutMs,
          onQuit: () => quit.abort(),
          player: new AudioPlayer(),
        });

  const controller = new ScanController(context, {
    fingerprinter: new FpcalcFingerprinter(config.fpcalcPath),
    stats: musicMetadataStats,
    probe: probeFile,
    metadata: new EmbeddedTagResolver(),
    prompt,
    effects: new LibraryOrganizer({
      libraryRoot: config.libraryRoot,
      duplicatesDir: config.duplicatesDir,
      loserPolicy: config.loserPolicy,
      dryRun: config.dryRun,
      isPathClaimed: (path, exceptKey) => store.isPathTaken(path, exceptKey),
    }),
  });

  const progressBar = new cliProgress.SingleBar({
    format: 'Scanning |{bar}| {percentage}% | {value}/{total} files | {eta}s remaining',
    barCompleteChar: '█',
    barIncompleteChar: '░',
  });
  let processed = 0;

  progressBar.start(files.length, 0);

  const summary = await controller.scan(files, {
    signal: quit.signal,
    dryRun: config.dryRun,
    onFile: () => {
      processed++;
      progressBar.update(processed);
    },
    onPrompt: (phase) => {
      if (phase === 'start') {
        progressBar.stop();
      } else {
        progressBar.start(files.length, processed);
      }
    },
  });

  progressBar.stop();
  printScanSummary(summary);

  if (config.dryRun) {
    console.log(chalk.yellow('Dry run: nothing was moved and no decisions were saved'));
    return;
  }

  const pruned = pruneGhosts(store, context.index, config.retention.maxGhosts);

  if (pruned > 0) {
    logger.info(`Pruned ${pruned} old duplicate records`);
  }

  if (config.cleanupEmptyDirs) {
    const keep = [config.duplicatesDir, ...(config.libraryRoot ? [config.libraryRoot] : [])];
    let removed = 0;

    for (const scanPath of config.scanPaths) {
      removed += (await removeEmptyDirectories(scanPath, keep)).length;
    }

    if (removed > 0) {
      logger.info(`Removed ${removed} empty folders`);
    }
  }
}

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));
  const config = applyOverrides(await loadConfig(options.configPath), options);
  const logger = new Logger({ debug: options.debug, file: config.logFile });
  const store = new LibraryStore(config.databasePath);

  logger.debug(`Using database ${config.databasePath}`);

  try {
    switch (options.command) {
      case 'scan':
        await runScan(config, store, logger);
        break;

      case 'report':
        printLibraryReport(store.stats());
        break;

      case 'export': {
        const outputPath = options.outputPath ?? join(process.cwd(), 'data', 'library.csv');
        const count = await exportLibraryCsv(store, outputPath);
        logger.success(`Exported ${count} records to ${outputPath}`);
        break;
      }

      case 'prune': {
        const context = createEngineContext(config.matching, store, logger);
        const pruned = pruneGhosts(store, context.index, config.retention.maxGhosts);

        if (config.retention.maxGhosts === null) {
          logger.info('No retention limit configured (retention.maxGhosts); nothing pruned');
        } else {
          logger.success(`Pruned ${pruned} duplicate records`);
        }
        break;
      }
    }
  } finally {
    store.close();
  }
}

main().catch((error: unknown) => {
  console.error(chalk.red(`\n${describeError(error)}`));
  process.exitCode = 1;
});
