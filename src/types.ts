export type LoserPolicy = 'archive' | 'trash';

export type TieBreak = 'prefer-new' | 'prefer-existing';

export type PromptMode = 'interactive' | 'skip';

export interface MatchingConfig {
  blockSize: number;
  blockCount: number;
  minSimilarity: number;
  askThreshold: number;
  autoThreshold: number;
  tieBreak: TieBreak;
}

export interface PromptConfig {
  mode: PromptMode;
  timeoutMs: number | null;
}

export interface RetentionConfig {
  maxGhosts: number | null;
}

export interface Config {
  scanPaths: string[];
  excludePatterns: string[];
  supportedExtensions: string[];
  databasePath: string;
  libraryRoot: string | null;
  duplicatesDir: string;
  loserPolicy: LoserPolicy;
  dryRun: boolean;
  /** Remove folders under the scan paths that a scan left empty. */
  cleanupEmptyDirs: boolean;
  logFile: string | null;
  fpcalcPath: string;
  matching: MatchingConfig;
  prompt: PromptConfig;
  retention: RetentionConfig;
}

export interface QualityInput {
  format: string | null;
  bitDepth: number | null;
  sampleRate: number | null;
  bitrate: number | null;
}

export interface AudioStats extends QualityInput {
  format: string;
  fileSize: number;
  modTime: number;
  /** Album from the embedded tags; scopes duplicate matching. */
  album?: AlbumRef | null;
}

export interface FileProbe {
  size: number;
  mtimeMs: number;
}

export interface FingerprintResult {
  duration: number;
  fingerprint: string;
}

export interface AlbumRef {
  releaseId: string;
  artist: string | null;
  title: string | null;
}

export interface TrackRecord {
  id: number;
  path: string;
  fingerprint: string;
  duration: number | null;
  qualityScore: number;
  format: string | null;
  bitrate: number | null;
  sampleRate: number | null;
  bitDepth: number | null;
  fileSize: number | null;
  modTime: number | null;
  isDuplicate: boolean;
  updatedAt: string;
}

export interface TrackRecordInput {
  path: string;
  fingerprint: string;
  duration: number | null;
  qualityScore: number;
  stats: AudioStats;
  modTime: number;
  isDuplicate: boolean;
}

export interface TrackTags {
  title: string | null;
  artist: string | null;
  albumArtist: string | null;
  album: AlbumRef | null;
  trackNumber: number | null;
  discNumber: number | null;
}

export interface MatchCandidate {
  key: number;
  similarity: number;
  owned: boolean;
  record: TrackRecord;
  albums: AlbumRef[];
}

export type OperatorChoice = 'new' | 'existing' | 'distinct';

export interface OperatorDecision {
  choice: OperatorChoice;
  candidateKey?: number;
  album?: AlbumRef;
}

export interface PromptRequest {
  path: string;
  stats: AudioStats;
  qualityScore: number;
  contenders: MatchCandidate[];
  stickyAlbum: AlbumRef | null;
}

export type ScanStatus =
  | 'unchanged'
  | 'skipped'
  | 'unique'
  | 'replaced'
  | 'duplicate'
  | 'distinct'
  | 'unresolved'
  | 'failed';

export interface FileOutcome {
  path: string;
  status: ScanStatus;
  finalPath: string | null;
  recordKey: number | null;
  similarity: number | null;
  warnings: string[];
}

export interface ScanSummary {
  startedAt: string;
  finishedAt: string;
  total: number;
  counts: Record<ScanStatus, number>;
  outcomes: FileOutcome[];
}
