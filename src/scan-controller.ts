import type {
  AudioStats,
  FileOutcome,
  FileProbe,
  FingerprintResult,
  MatchCandidate,
  ScanStatus,
  ScanSummary,
  TrackRecord,
  TrackTags,
} from './types.js';
import type { EngineContext } from './context.js';
import type { Fingerprinter } from './fingerprinter.js';
import type { MetadataResolver, StatsExtractor } from './metadata.js';
import type { FileEffects } from './organizer.js';
import type { OperatorPrompt } from './prompts.js';
import type { Resolution, Verdict } from './decider.js';
import { applyOperatorDecision, decide, describeVerdict, toResolution } from './decider.js';
import {
  AmbiguityUnresolved,
  InputError,
  StoreTransactionFailure,
  describeError,
} from './errors.js';
import { qualityScore } from './quality.js';

export interface Collaborators {
  fingerprinter: Fingerprinter;
  stats: StatsExtractor;
  probe: (filePath: string) => Promise<FileProbe | null>;
  metadata: MetadataResolver;
  prompt: OperatorPrompt;
  effects: FileEffects;
}

export interface ScanOptions {
  signal?: AbortSignal;
  /** Decide everything, then roll the store back so a later real run starts fresh. */
  dryRun?: boolean;
  onFile?: (outcome: FileOutcome, position: number) => void;
  /** Called around each operator prompt, e.g. to pause a progress bar. */
  onPrompt?: (phase: 'start' | 'end') => void;
}

type Admission =
  | { kind: 'unchanged'; record: TrackRecord }
  | {
      kind: 'admitted';
      probe: FileProbe;
      stats: AudioStats;
      fingerprint: FingerprintResult;
      score: number;
      existing: TrackRecord | null;
    };

type Admitted = Extract<Admission, { kind: 'admitted' }>;

const STATUS_BY_RESOLUTION: Record<Resolution['kind'], ScanStatus> = {
  unique: 'unique',
  win: 'replaced',
  lose: 'duplicate',
  distinct: 'distinct',
};

export function emptyCounts(): Record<ScanStatus, number> {
  return {
    unchanged: 0,
    skipped: 0,
    unique: 0,
    replaced: 0,
    duplicate: 0,
    distinct: 0,
    unresolved: 0,
    failed: 0,
  };
}

/**
 * Runs each discovered file through probe, fingerprint, match, decide and
 * file effects, then commits the outcome in a single transaction. One bad
 * file never stops the scan.
 */
export class ScanController {
  private onPrompt?: ScanOptions['onPrompt'];

  constructor(
    private readonly context: EngineContext,
    private readonly collaborators: Collaborators
  ) {}

  async scan(filePaths: string[], options: ScanOptions = {}): Promise<ScanSummary> {
    if (options.dryRun) {
      return this.context.store.rehearse(() => this.run(filePaths, options));
    }

    return this.run(filePaths, options);
  }

  private async run(filePaths: string[], options: ScanOptions): Promise<ScanSummary> {
    const startedAt = new Date().toISOString();
    const counts = emptyCounts();
    const outcomes: FileOutcome[] = [];
    this.onPrompt = options.onPrompt;

    for (const [position, filePath] of filePaths.entries()) {
      if (options.signal?.aborted) {
        this.context.logger.warn(`Scan stopped after ${outcomes.length} of ${filePaths.length} files`);
        break;
      }

      let outcome: FileOutcome;

      try {
        outcome = await this.processFile(filePath);
      } catch (error) {
        this.context.logger.error(`Unexpected failure on ${filePath}: ${describeError(error)}`, error);
        outcome = this.outcome(filePath, 'failed', { warnings: [describeError(error)] });
      }

      counts[outcome.status]++;
      outcomes.push(outcome);
      options.onFile?.(outcome, position);
    }

    return {
      startedAt,
      finishedAt: new Date().toISOString(),
      total: filePaths.length,
      counts,
      outcomes,
    };
  }

  async processFile(filePath: string): Promise<FileOutcome> {
    const { logger } = this.context;
    let admission: Admission;

    try {
      admission = await this.admit(filePath);
    } catch (error) {
      if (!(error instanceof InputError)) {
        throw error;
      }

      const cause = error.cause === undefined ? '' : ` (${describeError(error.cause)})`;
      logger.warn(`${error.message}${cause}`);
      return this.outcome(filePath, 'skipped', { warnings: [error.message] });
    }

    if (admission.kind === 'unchanged') {
      logger.debug(`Unchanged since last scan: ${filePath}`);
      return this.outcome(filePath, 'unchanged', {
        finalPath: admission.record.path,
        recordKey: admission.record.id,
      });
    }

    let verdict = this.match(filePath, admission);

    if (verdict.state === 'AMBIGUOUS_PROMPT') {
      const answered = await this.askOperator(filePath, admission, verdict);

      if (!answered) {
        return this.outcome(filePath, 'unresolved', {
          similarity: verdict.opponent?.similarity ?? null,
          warnings: verdict.warnings,
        });
      }

      verdict = answered;
    }

    const resolution: Resolution = toResolution(verdict) ?? { kind: 'unique' };
    logger.debug(`${filePath}: ${describeVerdict(verdict)}`);

    return this.apply(filePath, admission, verdict, resolution);
  }

  private async admit(filePath: string): Promise<Admission> {
    const { store } = this.context;
    const { probe: probeFile, stats, fingerprinter } = this.collaborators;

    const probe = await probeFile(filePath);

    if (!probe) {
      throw new InputError(filePath, 'File is unreadable');
    }

    if (probe.size === 0) {
      throw new InputError(filePath, 'File is empty');
    }

    const existing = store.getRecordByPath(filePath);

    if (existing && existing.modTime === probe.mtimeMs) {
      return { kind: 'unchanged', record: existing };
    }

    const audio = await stats.extract(filePath);

    if (!audio) {
      throw new InputError(filePath, 'Could not read audio properties');
    }

    let fingerprint: FingerprintResult;

    try {
      fingerprint = await fingerprinter.fingerprint(filePath);
    } catch (error) {
      throw new InputError(filePath, 'Fingerprinting failed', { cause: error });
    }

    if (!fingerprint.fingerprint) {
      throw new InputError(filePath, 'Fingerprint is empty');
    }

    return {
      kind: 'admitted',
      probe,
      stats: audio,
      fingerprint,
      score: qualityScore(audio),
      existing,
    };
  }

  private match(filePath: string, admission: Admitted): Verdict {
    const { store, resolver, selection, matching, logger } = this.context;
    const warnings: string[] = [];
    let candidates: MatchCandidate[] = [];

    try {
      // a rescanned file must not match itself or anything it was declared distinct from
      const excludeKeys = admission.existing
        ? [admission.existing.id, ...store.distinctPeers(admission.existing.id)]
        : [];

      candidates = resolver.resolve(admission.fingerprint.fingerprint, {
        excludeKeys,
        albumId: selection.current?.releaseId ?? null,
      });
    } catch (error) {
      const warning = `Match lookup failed, treating as unique: ${describeError(error)}`;
      logger.warn(`${warning} (${filePath})`);
      warnings.push(warning);
    }

    return decide({
      candidates,
      newScore: admission.score,
      thresholds: { ask: matching.askThreshold, auto: matching.autoThreshold },
      tieBreak: matching.tieBreak,
      stickyAlbum: selection.current,
      newAlbum: admission.stats.album ?? null,
      warnings,
    });
  }

  private async askOperator(
    filePath: string,
    admission: Admitted,
    verdict: Verdict
  ): Promise<Verdict | null> {
    const { selection, logger } = this.context;
    let reason = 'skipped by operator';

    this.onPrompt?.('start');

    try {
      const decision = await this.collaborators.prompt.ask({
        path: filePath,
        stats: admission.stats,
        qualityScore: admission.score,
        contenders: verdict.contenders,
        stickyAlbum: selection.current,
      });

      if (decision) {
        if (decision.album) {
          selection.remember(decision.album);
        }

        return applyOperatorDecision(verdict, decision);
      }
    } catch (error) {
      reason = describeError(error);
    } finally {
      this.onPrompt?.('end');
    }

    logger.info(new AmbiguityUnresolved(filePath, reason).message);
    return null;
  }

  private async apply(
    filePath: string,
    admission: Admitted,
    verdict: Verdict,
    resolution: Resolution
  ): Promise<FileOutcome> {
    const { store, index, logger } = this.context;
    const { effects, probe } = this.collaborators;
    const warnings = [...verdict.warnings];
    const opponent = resolution.kind === 'unique' ? null : resolution.opponent;

    let finalPath = filePath;
    let opponentPath: string | null = null;
    let tags: TrackTags | null = null;

    if (resolution.kind === 'lose') {
      finalPath = await this.attempt(() => effects.archiveLoser(filePath), filePath, warnings);
    } else {
      tags = await this.lookupTags(filePath, warnings);

      // the loser moves out first so the winner can take its place in the tree
      if (resolution.kind === 'win') {
        const loserPath = resolution.opponent.record.path;
        opponentPath = await this.attempt(() => effects.archiveLoser(loserPath), loserPath, warnings);
      }

      const replacing = resolution.kind === 'win' ? resolution.opponent.key : undefined;
      finalPath = await this.attempt(
        () => effects.fileWinner(filePath, tags, replacing),
        filePath,
        warnings
      );
    }

    const finalProbe = await probe(finalPath);
    const modTime = finalProbe?.mtimeMs ?? admission.probe.mtimeMs;
    const { existing } = admission;

    let record: TrackRecord;

    try {
      record = store.transaction(() => {
        if (resolution.kind === 'win' && opponentPath !== null) {
          store.markDuplicate(resolution.opponent.key, true, opponentPath);
        }

        if (resolution.kind === 'distinct') {
          store.markDuplicate(resolution.opponent.key, false);
        }

        if (existing && existing.path !== finalPath) {
          store.updatePath(existing.id, finalPath);
        }

        const saved = store.upsertRecord({
          path: finalPath,
          fingerprint: admission.fingerprint.fingerprint,
          duration: admission.fingerprint.duration,
          qualityScore: admission.score,
          stats: admission.stats,
          modTime,
          isDuplicate: resolution.kind === 'lose',
        });

        index.admit(saved.id, saved.fingerprint);

        if (tags?.album) {
          store.linkAlbum(saved.id, tags.album);
        }

        if (resolution.kind === 'distinct') {
          store.addDistinctPair(saved.id, resolution.opponent.key);
        }

        return saved;
      });
    } catch (error) {
      const failure = new StoreTransactionFailure(filePath, verdict.state, { cause: error });
      logger.error(`${failure.message}: ${describeError(error)}`, error);
      return this.outcome(filePath, 'failed', {
        finalPath,
        similarity: opponent?.similarity ?? null,
        warnings: [...warnings, failure.message],
      });
    }

    const status = STATUS_BY_RESOLUTION[resolution.kind];
    this.logOutcome(status, filePath, finalPath, opponent?.record.path ?? null);

    return this.outcome(filePath, status, {
      finalPath,
      recordKey: record.id,
      similarity: opponent?.similarity ?? null,
      warnings,
    });
  }

  private async lookupTags(filePath: string, warnings: string[]): Promise<TrackTags | null> {
    try {
      return await this.collaborators.metadata.resolve(filePath);
    } catch (error) {
      const warning = `Metadata lookup failed: ${describeError(error)}`;
      this.context.logger.warn(`${warning} (${filePath})`);
      warnings.push(warning);
      return null;
    }
  }

  /** Runs a file effect; on failure the file stays where it was. */
  private async attempt(
    effect: () => Promise<string>,
    fallback: string,
    warnings: string[]
  ): Promise<string> {
    try {
      return await effect();
    } catch (error) {
      const warning = `Could not move ${fallback}: ${describeError(error)}`;
      this.context.logger.warn(warning);
      warnings.push(warning);
      return fallback;
    }
  }

  private logOutcome(
    status: ScanStatus,
    filePath: string,
    finalPath: string,
    opponentPath: string | null
  ): void {
    const { logger } = this.context;

    switch (status) {
      case 'unique':
        logger.debug(`New track: ${finalPath}`);
        break;
      case 'replaced':
        logger.info(`Replaced ${opponentPath ?? 'existing copy'} with ${finalPath}`);
        break;
      case 'duplicate':
        logger.info(`Duplicate of ${opponentPath ?? 'existing copy'}: ${filePath}`);
        break;
      case 'distinct':
        logger.info(`Kept alongside ${opponentPath ?? 'existing copy'}: ${finalPath}`);
        break;
    }
  }

  private outcome(
    filePath: string,
    status: ScanStatus,
    details: Partial<Omit<FileOutcome, 'path' | 'status'>> = {}
  ): FileOutcome {
    return {
      path: filePath,
      status,
      finalPath: details.finalPath ?? null,
      recordKey: details.recordKey ?? null,
      similarity: details.similarity ?? null,
      warnings: details.warnings ?? [],
    };
  }
}
