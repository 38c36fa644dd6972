import type { SpawnOptions } from 'node:child_process';

import { spawn } from 'node:child_process';

/**
 * Result of a spawn operation
 */
export interface SpawnResult {
  stdout: string;
  stderr: string;
  code: number;
}

/**
 * Extended spawn options with output capture control
 */
export interface SpawnAsyncOptions extends SpawnOptions {
  /**
   * Whether to capture stdout (default: true)
   */
  captureStdout?: boolean;

  /**
   * Whether to capture stderr (default: true)
   */
  captureStderr?: boolean;

  /**
   * Kill the process with SIGKILL after this many milliseconds.
   * The promise then resolves with code 124 and a timeout note in stderr.
   */
  timeoutMs?: number;
}

/** Exit code reported for processes killed by `timeoutMs` (same as coreutils `timeout`) */
export const SPAWN_TIMEOUT_EXIT_CODE = 124;

/**
 * Execute a command asynchronously and return the result.
 *
 * Every external tool the pipeline depends on (ImageMagick, Poppler,
 * OCRmyPDF) is called through here so tests can mock a single function.
 *
 * @example
 * ```typescript
 * const result = await spawnAsync('pdfinfo', ['/tmp/book.pdf']);
 * if (result.code !== 0) {
 *   throw new Error(result.stderr);
 * }
 * ```
 */
export function spawnAsync(
  command: string,
  args: string[],
  options: SpawnAsyncOptions = {},
): Promise<SpawnResult> {
  const {
    captureStdout = true,
    captureStderr = true,
    timeoutMs,
    ...spawnOptions
  } = options;

  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, spawnOptions);

    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let timer: NodeJS.Timeout | undefined;

    if (timeoutMs !== undefined) {
      timer = setTimeout(() => {
        timedOut = true;
        proc.kill('SIGKILL');
      }, timeoutMs);
    }

    if (captureStdout && proc.stdout) {
      proc.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });
    }

    if (captureStderr && proc.stderr) {
      proc.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });
    }

    proc.on('close', (code) => {
      if (timer) {
        clearTimeout(timer);
      }
      if (timedOut) {
        resolve({
          stdout,
          stderr: `${stderr}${stderr ? '\n' : ''}${command} timed out after ${timeoutMs}ms`,
          code: SPAWN_TIMEOUT_EXIT_CODE,
        });
        return;
      }
      resolve({ stdout, stderr, code: code ?? 0 });
    });

    proc.on('error', (error) => {
      if (timer) {
        clearTimeout(timer);
      }
      reject(error);
    });
  });
}
