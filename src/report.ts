import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import chalk from 'chalk';
import { stringify } from 'csv-stringify/sync';
import type { ScanSummary } from './types.js';
import type { ExportRow, LibraryStats, LibraryStore } from './store.js';
import { formatFileSize } from './metadata.js';

export const EXPORT_COLUMNS = [
  'path',
  'quality_score',
  'format',
  'bitrate',
  'sample_rate',
  'bit_depth',
  'file_size',
  'mtime',
  'is_duplicate',
  'release_ids',
  'fingerprint',
] as const;

type ExportColumn = (typeof EXPORT_COLUMNS)[number];

function toCsvRecord(row: ExportRow): Record<ExportColumn, string | number | null> {
  return {
    path: row.path,
    quality_score: row.qualityScore,
    format: row.format,
    bitrate: row.bitrate,
    sample_rate: row.sampleRate,
    bit_depth: row.bitDepth,
    file_size: row.fileSize,
    mtime: row.modTime === null ? null : new Date(row.modTime).toISOString(),
    is_duplicate: row.isDuplicate ? 1 : 0,
    release_ids: row.releaseIds.join(';'),
    fingerprint: row.fingerprint,
  };
}

export function renderLibraryCsv(rows: ExportRow[]): string {
  return stringify(rows.map(toCsvRecord), {
    header: true,
    columns: [...EXPORT_COLUMNS],
  });
}

/** Writes every record to `outputPath`; returns how many rows were written. */
export async function exportLibraryCsv(store: LibraryStore, outputPath: string): Promise<number> {
  const rows = store.listForExport();

  await mkdir(dirname(outputPath), { recursive: true });
  await writeFile(outputPath, renderLibraryCsv(rows));

  return rows.length;
}

export function printLibraryReport(stats: LibraryStats): void {
  console.log(chalk.cyan('\n' + '═'.repeat(60)));
  console.log(chalk.cyan('  LIBRARY REPORT'));
  console.log(chalk.cyan('═'.repeat(60)));

  console.log(
    `\n  Unique tracks: ${chalk.green(stats.uniqueTracks.toString())} (${formatFileSize(stats.uniqueBytes)})`
  );
  console.log(
    `  Duplicates: ${chalk.yellow(stats.duplicateTracks.toString())} (${formatFileSize(stats.duplicateBytes)} reclaimable)`
  );

  if (stats.formats.length > 0) {
    console.log('\n  Formats:');

    for (const { format, count } of stats.formats) {
      console.log(`    - ${format}: ${count}`);
    }
  }

  console.log(chalk.cyan('\n' + '─'.repeat(60)));
}

export function printScanSummary(summary: ScanSummary): void {
  const { counts } = summary;

  console.log(chalk.green(`\n✓ Scan complete!`));
  console.log(chalk.gray(`  Files seen: ${summary.total}`));
  console.log(chalk.gray(`  New tracks: ${counts.unique}`));
  console.log(chalk.gray(`  Upgraded: ${counts.replaced}`));
  console.log(chalk.gray(`  Duplicates: ${counts.duplicate}`));
  console.log(chalk.gray(`  Kept as different songs: ${counts.distinct}`));
  console.log(chalk.gray(`  Unchanged: ${counts.unchanged}`));

  if (counts.unresolved > 0) {
    console.log(chalk.yellow(`  Left for review: ${counts.unresolved}`));
  }

  if (counts.skipped + counts.failed > 0) {
    console.log(chalk.red(`  Skipped: ${counts.skipped}, failed: ${counts.failed}`));
  }
}
