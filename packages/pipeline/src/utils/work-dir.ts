import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

/**
 * Run `fn` with a fresh temporary directory that is removed afterwards,
 * whether `fn` resolves or throws.
 */
export async function withWorkDir<T>(
  prefix: string,
  fn: (workDir: string) => Promise<T>,
): Promise<T> {
  const workDir = mkdtempSync(join(tmpdir(), `pagemill-${prefix}-`));
  try {
    return await fn(workDir);
  } finally {
    rmSync(workDir, { recursive: true, force: true });
  }
}
