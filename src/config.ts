import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { z } from 'zod';
import type { Config } from './types.js';
import { ConfigError } from './errors.js';

export const DEFAULT_CONFIG: Config = {
  scanPaths: [join(homedir(), 'Music')],
  excludePatterns: ['.git', 'node_modules', '.Trash'],
  supportedExtensions: ['mp3', 'flac', 'm4a', 'mp4', 'wav', 'aiff', 'aif', 'wma', 'ogg', 'opus'],
  databasePath: 'data/library.db',
  libraryRoot: null,
  duplicatesDir: 'data/duplicates',
  loserPolicy: 'archive',
  dryRun: false,
  cleanupEmptyDirs: true,
  logFile: 'data/audio-dedupe.log',
  fpcalcPath: 'fpcalc',
  matching: {
    blockSize: 16,
    blockCount: 16,
    minSimilarity: 0.85,
    askThreshold: 0.95,
    autoThreshold: 0.98,
    tieBreak: 'prefer-new',
  },
  prompt: {
    mode: 'interactive',
    timeoutMs: null,
  },
  retention: {
    maxGhosts: null,
  },
};

const ratio = z.number().min(0).max(1);

const matchingSchema = z
  .object({
    blockSize: z.number().int().min(1),
    blockCount: z.number().int().min(1),
    minSimilarity: ratio,
    askThreshold: ratio,
    autoThreshold: ratio,
    tieBreak: z.enum(['prefer-new', 'prefer-existing']),
  })
  .refine((m) => m.minSimilarity <= m.askThreshold, {
    message: 'minSimilarity must not exceed askThreshold',
    path: ['minSimilarity'],
  })
  .refine((m) => m.askThreshold < m.autoThreshold, {
    message: 'askThreshold must be lower than autoThreshold',
    path: ['askThreshold'],
  });

const configSchema = z.object({
  scanPaths: z.array(z.string().min(1)).min(1),
  excludePatterns: z.array(z.string()),
  supportedExtensions: z.array(z.string().min(1)).min(1),
  databasePath: z.string().min(1),
  libraryRoot: z.string().min(1).nullable(),
  duplicatesDir: z.string().min(1),
  loserPolicy: z.enum(['archive', 'trash']),
  dryRun: z.boolean(),
  cleanupEmptyDirs: z.boolean(),
  logFile: z.string().min(1).nullable(),
  fpcalcPath: z.string().min(1),
  matching: matchingSchema,
  prompt: z.object({
    mode: z.enum(['interactive', 'skip']),
    timeoutMs: z.number().int().positive().nullable(),
  }),
  retention: z.object({
    maxGhosts: z.number().int().min(0).nullable(),
  }),
});

const userConfigSchema = z
  .object({
    matching: z.record(z.unknown()).optional(),
    prompt: z.record(z.unknown()).optional(),
    retention: z.record(z.unknown()).optional(),
  })
  .passthrough();

export function expandPath(path: string): string {
  if (path === '~' || path.startsWith('~/')) {
    return path.replace('~', homedir());
  }

  return path;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/** Merges user settings over the defaults (one level deep) and validates the result. */
export function buildConfig(userConfig: unknown, baseDir: string = process.cwd()): Config {
  const user = userConfigSchema.safeParse(userConfig ?? {});

  if (!user.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(user.error)}`);
  }

  const merged = {
    ...DEFAULT_CONFIG,
    ...user.data,
    matching: { ...DEFAULT_CONFIG.matching, ...user.data.matching },
    prompt: { ...DEFAULT_CONFIG.prompt, ...user.data.prompt },
    retention: { ...DEFAULT_CONFIG.retention, ...user.data.retention },
  };

  const parsed = configSchema.safeParse(merged);

  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }

  const config = parsed.data;
  const toAbsolute = (path: string) => resolve(baseDir, expandPath(path));

  return {
    ...config,
    scanPaths: config.scanPaths.map(toAbsolute),
    databasePath: config.databasePath === ':memory:' ? config.databasePath : toAbsolute(config.databasePath),
    libraryRoot: config.libraryRoot === null ? null : toAbsolute(config.libraryRoot),
    duplicatesDir: toAbsolute(config.duplicatesDir),
    logFile: config.logFile === null ? null : toAbsolute(config.logFile),
    supportedExtensions: config.supportedExtensions.map((ext) => ext.replace(/^\./, '').toLowerCase()),
  };
}

export async function loadConfig(configPath: string): Promise<Config> {
  let data: string;

  try {
    data = await readFile(configPath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return buildConfig({});
    }

    throw new ConfigError(`Could not read ${configPath}`, { cause: error });
  }

  let json: unknown;

  try {
    json = JSON.parse(data);
  } catch (error) {
    throw new ConfigError(`${configPath} is not valid JSON`, { cause: error });
  }

  return buildConfig(json);
}
