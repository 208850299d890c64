import { spawn } from 'node:child_process';
import { z } from 'zod';
import type { FingerprintResult } from './types.js';

export interface Fingerprinter {
  fingerprint(filePath: string): Promise<FingerprintResult>;
}

const fpcalcOutput = z.object({
  duration: z.number(),
  fingerprint: z.string(),
});

export function parseFpcalcOutput(stdout: string): FingerprintResult {
  const parsed = fpcalcOutput.safeParse(JSON.parse(stdout));

  if (!parsed.success) {
    throw new Error(`Unexpected fpcalc output: ${parsed.error.issues[0]?.message ?? 'unknown shape'}`);
  }

  return parsed.data;
}

/** Chromaprint's `fpcalc` command line tool. */
export class FpcalcFingerprinter implements Fingerprinter {
  constructor(private readonly binary: string = 'fpcalc') {}

  fingerprint(filePath: string): Promise<FingerprintResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(this.binary, ['-json', filePath]);
      let stdout = '';
      let stderr = '';

      child.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('close', (code) => {
        if (code !== 0) {
          reject(new Error(`fpcalc exited with code ${code}: ${stderr.trim() || 'no output'}`));
          return;
        }

        try {
          resolve(parseFpcalcOutput(stdout));
        } catch (error) {
          reject(error);
        }
      });

      child.on('error', (err) => {
        if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
          reject(new Error(`${this.binary} is not installed. Install Chromaprint (fpcalc) and try again.`));
        } else {
          reject(err);
        }
      });
    });
  }
}
