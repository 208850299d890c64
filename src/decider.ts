import type {
  AlbumRef,
  MatchCandidate,
  OperatorDecision,
  TieBreak,
} from './types.js';
import { incomingWins } from './quality.js';

export type DecisionState =
  | 'UNIQUE'
  | 'AUTO_WIN'
  | 'AUTO_LOSE'
  | 'AMBIGUOUS_PROMPT'
  | 'DISTINCT_CONFIRMED';

export type DecidedBy = 'none' | 'threshold' | 'sticky' | 'operator';

export interface Thresholds {
  ask: number;
  auto: number;
}

export interface DecisionInput {
  candidates: MatchCandidate[];
  newScore: number;
  thresholds: Thresholds;
  tieBreak: TieBreak;
  stickyAlbum: AlbumRef | null;
  /** Album the new file is tagged with, if any. */
  newAlbum?: AlbumRef | null;
  warnings?: string[];
}

export interface Verdict {
  state: DecisionState;
  decidedBy: DecidedBy;
  opponent: MatchCandidate | null;
  contenders: MatchCandidate[];
  warnings: string[];
}

export type Resolution =
  | { kind: 'unique' }
  | { kind: 'win'; opponent: MatchCandidate }
  | { kind: 'lose'; opponent: MatchCandidate }
  | { kind: 'distinct'; opponent: MatchCandidate };

function storedScore(candidate: MatchCandidate, warnings: string[]): number {
  const score = candidate.record.qualityScore;

  if (Number.isFinite(score)) {
    return score;
  }

  warnings.push(`record #${candidate.key} has no usable quality score; treating it as 0`);
  return 0;
}

function compareQuality(
  input: DecisionInput,
  opponent: MatchCandidate,
  decidedBy: DecidedBy,
  contenders: MatchCandidate[],
  warnings: string[]
): Verdict {
  const wins = incomingWins(input.newScore, storedScore(opponent, warnings), input.tieBreak);

  return {
    state: wins ? 'AUTO_WIN' : 'AUTO_LOSE',
    decidedBy,
    opponent,
    contenders,
    warnings,
  };
}

/**
 * A stored copy that is only on other albums than the new file is a
 * different release of the song, not a duplicate. Either side without
 * album information is in scope.
 */
function inAlbumScope(candidate: MatchCandidate, newAlbum: AlbumRef | null): boolean {
  if (!newAlbum || candidate.albums.length === 0) {
    return true;
  }

  return candidate.albums.some((album) => album.releaseId === newAlbum.releaseId);
}

/**
 * Classifies the ranked matches of a new file.
 *
 * Only a single high-confidence match, or a single match on the album the
 * operator last picked, is settled automatically. Several near matches
 * always go to the operator.
 *
 * Ghosts (records already flagged duplicate) are never contenders: a file
 * that only matches ghosts stands on its own, so the last live copy of a
 * song is never archived against an archived one.
 */
export function decide(input: DecisionInput): Verdict {
  const warnings = [...(input.warnings ?? [])];
  const newAlbum = input.newAlbum ?? null;
  const usable = input.candidates.filter((candidate) => {
    if (Number.isFinite(candidate.similarity)) {
      return true;
    }

    warnings.push(`ignoring record #${candidate.key}: similarity is not a number`);
    return false;
  });

  const contenders = usable.filter(
    (c) =>
      c.similarity >= input.thresholds.ask &&
      !c.record.isDuplicate &&
      inAlbumScope(c, newAlbum)
  );

  if (contenders.length === 0) {
    return { state: 'UNIQUE', decidedBy: 'none', opponent: null, contenders: [], warnings };
  }

  const confident = contenders.filter((c) => c.similarity >= input.thresholds.auto);

  if (confident.length === 1 && contenders.length === 1) {
    return compareQuality(input, confident[0], 'threshold', contenders, warnings);
  }

  const sticky = input.stickyAlbum;

  if (sticky) {
    const onStickyAlbum = contenders.filter((c) =>
      c.albums.some((album) => album.releaseId === sticky.releaseId)
    );

    if (onStickyAlbum.length === 1) {
      return compareQuality(input, onStickyAlbum[0], 'sticky', contenders, warnings);
    }
  }

  return {
    state: 'AMBIGUOUS_PROMPT',
    decidedBy: 'none',
    opponent: contenders[0],
    contenders,
    warnings,
  };
}

/** Folds an operator answer into a prompted verdict. */
export function applyOperatorDecision(verdict: Verdict, decision: OperatorDecision): Verdict {
  const chosen =
    verdict.contenders.find((c) => c.key === decision.candidateKey) ??
    verdict.opponent ??
    verdict.contenders[0] ??
    null;

  if (!chosen) {
    return { ...verdict, state: 'UNIQUE', decidedBy: 'operator', opponent: null };
  }

  const state: DecisionState =
    decision.choice === 'new'
      ? 'AUTO_WIN'
      : decision.choice === 'existing'
        ? 'AUTO_LOSE'
        : 'DISTINCT_CONFIRMED';

  return { ...verdict, state, decidedBy: 'operator', opponent: chosen };
}

export function toResolution(verdict: Verdict): Resolution | null {
  const { opponent } = verdict;

  switch (verdict.state) {
    case 'UNIQUE':
      return { kind: 'unique' };
    case 'AUTO_WIN':
      return opponent ? { kind: 'win', opponent } : { kind: 'unique' };
    case 'AUTO_LOSE':
      return opponent ? { kind: 'lose', opponent } : { kind: 'unique' };
    case 'DISTINCT_CONFIRMED':
      return opponent ? { kind: 'distinct', opponent } : { kind: 'unique' };
    case 'AMBIGUOUS_PROMPT':
      return null;
  }
}

export function describeVerdict(verdict: Verdict): string {
  const similarity = verdict.opponent
    ? ` vs #${verdict.opponent.key} at ${(verdict.opponent.similarity * 100).toFixed(1)}%`
    : '';

  return `${verdict.state}${similarity} (${verdict.decidedBy})`;
}
