import { createServer, type IncomingHttpHeaders } from 'http';
import { URL } from 'url';

export interface MockServerOptions {
  text?: string;
  language?: string;
  contentType?: 'json' | 'text';
}

export interface RecordedRequest {
  method: string;
  path: string;
  headers: IncomingHttpHeaders;
  body: Buffer;
}

export const startMockTranscriptionServer = async (options: MockServerOptions = {}) => {
  const text = options.text ?? 'Hello world from mock';
  const requests: RecordedRequest[] = [];

  const server = createServer((req, res) => {
    if (!req.url) {
      res.statusCode = 400;
      res.end();
      return;
    }
    const url = new URL(req.url, 'http://localhost');
    const known = url.pathname === '/transcriptions' || url.pathname === '/v1/audio/transcriptions';
    if (!known || req.method !== 'POST') {
      res.statusCode = 404;
      res.end();
      return;
    }
    if (url.searchParams.get('error') === 'fail') {
      res.statusCode = 500;
      res.end('mock failure');
      return;
    }
    let body = Buffer.alloc(0);
    req.on('data', (chunk: Buffer) => {
      body = Buffer.concat([body, chunk]);
    });
    req.on('end', () => {
      requests.push({ method: req.method ?? '', path: url.pathname, headers: req.headers, body });
      if (options.contentType === 'text') {
        res.setHeader('Content-Type', 'text/plain');
        res.end(` ${text}\n`);
        return;
      }
      res.setHeader('Content-Type', 'application/json');
      res.end(JSON.stringify({ text: ` ${text} `, language: options.language }));
    });
  });

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('Unable to start mock server');
  }
  const baseUrl = `http://127.0.0.1:${address.port}`;

  const close = async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  };

  return { baseUrl, requests, close };
};
