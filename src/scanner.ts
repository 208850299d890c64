import { readdir, stat } from 'node:fs/promises';
import { join, extname, resolve, sep } from 'node:path';
import { spawn } from 'node:child_process';

export interface DiscoveryOptions {
  extensions: string[];
  excludePatterns: string[];
  /** Never descended into, wherever it sits. */
  duplicatesDir: string;
  onFile?: (path: string) => void;
}

export interface DiscoveryResult {
  files: string[];
  method: 'ripgrep' | 'walk';
  /** Scan roots that do not exist. */
  missing: string[];
}

async function rootExists(scanPath: string): Promise<boolean> {
  try {
    await stat(scanPath);
    return true;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return false;
    }

    throw error;
  }
}

function isInside(filePath: string, dir: string): boolean {
  return resolve(filePath).startsWith(resolve(dir) + sep);
}

/**
 * Recursive readdir walk. Directories whose name matches an exclude
 * pattern are skipped along with everything below them.
 */
export async function walkAudioFiles(
  dir: string,
  extensions: Set<string>,
  excluded: Set<string>,
  onFile: (path: string) => void
): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true });

  for (const entry of entries) {
    if (excluded.has(entry.name)) {
      continue;
    }

    const fullPath = join(dir, entry.name);

    if (entry.isDirectory()) {
      await walkAudioFiles(fullPath, extensions, excluded, onFile);
      continue;
    }

    if (entry.isFile() && extensions.has(extname(entry.name).slice(1).toLowerCase())) {
      onFile(fullPath);
    }
  }
}

function scanPathWithRipgrep(
  scanPath: string,
  extensions: string[],
  excludePatterns: string[],
  onFile: (path: string) => void
): Promise<void> {
  return new Promise((resolvePromise, reject) => {
    const args = ['--files', '--no-ignore', '--hidden'];

    for (const ext of extensions) {
      args.push('--iglob', `*.${ext}`);
    }

    for (const pattern of excludePatterns) {
      args.push('-g', `!${pattern}`);
    }

    args.push(scanPath);

    const rg = spawn('rg', args);
    let buffer = '';
    let stderr = '';

    rg.stdout.on('data', (data: Buffer) => {
      buffer += data.toString();
      const lines = buffer.split('\n');
      buffer = lines.pop() ?? '';

      for (const line of lines) {
        const trimmed = line.trim();

        if (trimmed) {
          onFile(trimmed);
        }
      }
    });

    rg.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    rg.on('close', (code) => {
      if (buffer.trim()) {
        onFile(buffer.trim());
      }

      // 1 means no matches; 2 also covers unreadable or missing paths
      const tolerable = stderr.includes('Permission denied') || stderr.includes('No such file');

      if (code === 0 || code === 1 || (code === 2 && tolerable)) {
        resolvePromise();
      } else {
        reject(new Error(`ripgrep exited with code ${code}: ${stderr.trim()}`));
      }
    });

    rg.on('error', reject);
  });
}

/**
 * Lists every audio file under the scan roots, sorted for a stable
 * processing order. Uses ripgrep when installed, else walks the tree.
 */
export async function discoverAudioFiles(
  scanPaths: string[],
  options: DiscoveryOptions
): Promise<DiscoveryResult> {
  const found = new Set<string>();
  const missing: string[] = [];
  const collect = (filePath: string) => {
    const absolute = resolve(filePath);

    if (isInside(absolute, options.duplicatesDir) || found.has(absolute)) {
      return;
    }

    found.add(absolute);
    options.onFile?.(absolute);
  };

  let method: DiscoveryResult['method'] = 'ripgrep';

  for (const scanPath of scanPaths) {
    if (!(await rootExists(scanPath))) {
      missing.push(scanPath);
      continue;
    }

    if (method === 'ripgrep') {
      try {
        await scanPathWithRipgrep(scanPath, options.extensions, options.excludePatterns, collect);
        continue;
      } catch (error) {
        if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
          throw error;
        }

        method = 'walk';
      }
    }

    await walkAudioFiles(
      scanPath,
      new Set(options.extensions),
      new Set(options.excludePatterns),
      collect
    );
  }

  return { files: Array.from(found).sort(), method, missing };
}
