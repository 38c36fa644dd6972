import type { Server } from 'node:http';

import { createReadStream, statSync } from 'node:fs';
import { createServer } from 'node:http';
import { basename, extname } from 'node:path';

const CONTENT_TYPES: Record<string, string> = {
  '.pdf': 'application/pdf',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
};

/**
 * Loopback HTTP server exposing a single file.
 *
 * docling-serve only converts sources it can fetch by URL, so page PDFs are
 * published here for the duration of one conversion.
 */
export class LocalFileServer {
  private server: Server | null = null;

  /**
   * Serve `filePath` for the duration of `fn`, passing it the file URL.
   */
  static async withFile<T>(
    filePath: string,
    fn: (url: string) => Promise<T>,
  ): Promise<T> {
    const fileServer = new LocalFileServer();
    const url = await fileServer.start(filePath);
    try {
      return await fn(url);
    } finally {
      await fileServer.stop();
    }
  }

  /**
   * Start serving a file on a random loopback port.
   *
   * @returns URL of the file
   */
  async start(filePath: string): Promise<string> {
    const filename = encodeURIComponent(basename(filePath));
    const { size } = statSync(filePath);
    const contentType =
      CONTENT_TYPES[extname(filePath).toLowerCase()] ??
      'application/octet-stream';

    return new Promise((resolve, reject) => {
      const server = createServer((req, res) => {
        if (req.url !== `/${filename}`) {
          res.writeHead(404);
          res.end('Not Found');
          return;
        }
        res.writeHead(200, {
          'Content-Type': contentType,
          'Content-Length': size,
        });
        if (req.method === 'HEAD') {
          res.end();
          return;
        }
        createReadStream(filePath).pipe(res);
      });
      this.server = server;

      server.on('error', reject);

      server.listen(0, '127.0.0.1', () => {
        const address = server.address();
        if (typeof address === 'object' && address !== null) {
          resolve(`http://127.0.0.1:${address.port}/${filename}`);
        } else {
          reject(new Error('[LocalFileServer] Failed to get server address'));
        }
      });
    });
  }

  stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      server.close(() => resolve());
    });
  }
}
