import type { Stats } from 'node:fs';
import type { IncomingMessage, Server, ServerResponse } from 'node:http';

import { createReadStream, statSync } from 'node:fs';
import { createServer } from 'node:http';
import { beforeEach, describe, expect, test, vi } from 'vitest';

import { LocalFileServer } from './local-file-server';

vi.mock('node:fs', () => ({
  createReadStream: vi.fn(),
  statSync: vi.fn(),
}));

vi.mock('node:http', () => ({
  createServer: vi.fn(),
}));

type Handler = (req: IncomingMessage, res: ServerResponse) => void;

function mockResponse() {
  return { writeHead: vi.fn(), end: vi.fn() };
}

describe('LocalFileServer', () => {
  let mockServer: {
    listen: ReturnType<typeof vi.fn>;
    close: ReturnType<typeof vi.fn>;
    address: ReturnType<typeof vi.fn>;
    on: ReturnType<typeof vi.fn>;
  };
  let requestHandler: Handler;

  function request(url: string, method = 'GET') {
    const res = mockResponse();
    requestHandler(
      { url, method } as unknown as IncomingMessage,
      res as unknown as ServerResponse,
    );
    return res;
  }

  beforeEach(() => {
    vi.clearAllMocks();

    mockServer = {
      listen: vi.fn((_port: number, _host: string, callback: () => void) => {
        callback();
        return mockServer;
      }),
      close: vi.fn((callback: () => void) => callback()),
      address: vi.fn(() => ({
        port: 40123,
        family: 'IPv4',
        address: '127.0.0.1',
      })),
      on: vi.fn(),
    };

    vi.mocked(createServer).mockImplementation(((handler: Handler) => {
      requestHandler = handler;
      return mockServer as unknown as Server;
    }) as unknown as typeof createServer);
    vi.mocked(statSync).mockReturnValue({ size: 2048 } as unknown as Stats);
  });

  test('serves the file on a loopback port', async () => {
    const server = new LocalFileServer();

    const url = await server.start('/tmp/work/page-3.pdf');

    expect(url).toBe('http://127.0.0.1:40123/page-3.pdf');
    expect(mockServer.listen).toHaveBeenCalledWith(
      0,
      '127.0.0.1',
      expect.any(Function),
    );
  });

  test('encodes file names in the URL', async () => {
    const url = await new LocalFileServer().start('/tmp/work/my page.pdf');

    expect(url).toBe('http://127.0.0.1:40123/my%20page.pdf');
  });

  test('streams the file with its content type', async () => {
    const pipe = vi.fn();
    vi.mocked(createReadStream).mockReturnValue({
      pipe,
    } as unknown as ReturnType<typeof createReadStream>);
    await new LocalFileServer().start('/tmp/work/page-3.pdf');

    const res = request('/page-3.pdf');

    expect(res.writeHead).toHaveBeenCalledWith(200, {
      'Content-Type': 'application/pdf',
      'Content-Length': 2048,
    });
    expect(createReadStream).toHaveBeenCalledWith('/tmp/work/page-3.pdf');
    expect(pipe).toHaveBeenCalledWith(res);
  });

  test('answers HEAD without a body', async () => {
    await new LocalFileServer().start('/tmp/work/scan.png');

    const res = request('/scan.png', 'HEAD');

    expect(res.writeHead).toHaveBeenCalledWith(200, {
      'Content-Type': 'image/png',
      'Content-Length': 2048,
    });
    expect(res.end).toHaveBeenCalledWith();
    expect(createReadStream).not.toHaveBeenCalled();
  });

  test('returns 404 for other paths', async () => {
    await new LocalFileServer().start('/tmp/work/page-3.pdf');

    const res = request('/etc/passwd');

    expect(res.writeHead).toHaveBeenCalledWith(404);
    expect(res.end).toHaveBeenCalledWith('Not Found');
  });

  test('rejects when the address is unavailable', async () => {
    mockServer.address.mockReturnValue('pipe');

    await expect(
      new LocalFileServer().start('/tmp/work/page-3.pdf'),
    ).rejects.toThrow('[LocalFileServer] Failed to get server address');
  });

  test('stop closes the server once', async () => {
    const server = new LocalFileServer();
    await server.start('/tmp/work/page-3.pdf');

    await server.stop();
    await server.stop();

    expect(mockServer.close).toHaveBeenCalledTimes(1);
  });

  test('withFile stops the server after the callback fails', async () => {
    await expect(
      LocalFileServer.withFile('/tmp/work/page-3.pdf', async (url) => {
        throw new Error(`boom ${url}`);
      }),
    ).rejects.toThrow('boom http://127.0.0.1:40123/page-3.pdf');

    expect(mockServer.close).toHaveBeenCalledTimes(1);
  });

  test('withFile returns the callback result', async () => {
    const result = await LocalFileServer.withFile(
      '/tmp/work/page-3.pdf',
      async (url) => url.length,
    );

    expect(result).toBe('http://127.0.0.1:40123/page-3.pdf'.length);
  });
});
