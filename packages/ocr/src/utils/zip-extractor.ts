import { createWriteStream, mkdirSync } from 'node:fs';
import { dirname, isAbsolute, join, relative } from 'node:path';
import * as yauzl from 'yauzl';

/**
 * Extract a ZIP archive into `targetDir`.
 *
 * Entries whose path would land outside `targetDir` are rejected.
 *
 * @returns relative paths of the extracted files, in archive order
 */
export function extractZip(
  zipPath: string,
  targetDir: string,
): Promise<string[]> {
  return new Promise((resolve, reject) => {
    yauzl.open(zipPath, { lazyEntries: true }, (err, zipfile) => {
      if (err || !zipfile) {
        reject(err || new Error('[extractZip] Failed to open zip file'));
        return;
      }

      const files: string[] = [];
      const fail = (error: Error) => {
        zipfile.close();
        reject(error);
      };

      zipfile.on('entry', (entry: yauzl.Entry) => {
        const entryPath = join(targetDir, entry.fileName);
        const rel = relative(targetDir, entryPath);
        if (rel.startsWith('..') || isAbsolute(rel)) {
          fail(
            new Error(
              `[extractZip] Entry escapes target directory: ${entry.fileName}`,
            ),
          );
          return;
        }

        if (entry.fileName.endsWith('/')) {
          mkdirSync(entryPath, { recursive: true });
          zipfile.readEntry();
          return;
        }

        zipfile.openReadStream(entry, (streamErr, readStream) => {
          if (streamErr || !readStream) {
            fail(streamErr || new Error('[extractZip] Failed to open read stream'));
            return;
          }

          mkdirSync(dirname(entryPath), { recursive: true });
          const writeStream = createWriteStream(entryPath);
          writeStream.on('finish', () => {
            files.push(rel);
            zipfile.readEntry();
          });
          writeStream.on('error', fail);
          readStream.on('error', fail);
          readStream.pipe(writeStream);
        });
      });

      zipfile.on('end', () => resolve(files));
      zipfile.on('error', reject);

      zipfile.readEntry();
    });
  });
}
