/**
 * Unit tests for the fetch-backed HTTP client, against an in-process server
 */

import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import * as http from 'http';
import { FetchHttpClient, readToEnd } from './http.js';
import { TransportError } from '../errors/index.js';
import { waitFor } from '../__tests__/utils.js';

interface Received {
  url?: string;
  userAgent?: string;
}

function listen(server: http.Server): Promise<number> {
  return new Promise((resolve) => {
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      resolve(typeof address === 'object' && address ? address.port : 0);
    });
  });
}

function close(server: http.Server): Promise<void> {
  server.closeAllConnections();
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

describe('FetchHttpClient', () => {
  const received: Received[] = [];
  let streamClosed = false;
  let server: http.Server;
  let baseUrl: string;

  beforeAll(async () => {
    server = http.createServer((req, res) => {
      received.push({ url: req.url, userAgent: req.headers['user-agent'] });

      switch (req.url) {
        case '/moved':
          res.writeHead(302, { Location: '/docs' });
          res.end();
          return;

        case '/docs':
          // Several writes so the body arrives in more than one piece
          res.writeHead(200, { 'Content-Type': 'text/html' });
          res.write('<p>first</p>');
          res.write('<p>second</p>');
          res.end('<p>third</p>');
          return;

        case '/endless':
          res.writeHead(200, { 'Content-Type': 'text/html' });
          res.write('<p>start</p>');
          res.on('close', () => {
            streamClosed = true;
          });
          return;

        default:
          res.writeHead(404);
          res.end('not found');
      }
    });
    baseUrl = `http://127.0.0.1:${await listen(server)}`;
  });

  afterAll(async () => {
    await close(server);
  });

  it('should follow redirects and read the whole body', async () => {
    const client = new FetchHttpClient('cratedoc-test/1.0');

    const response = await client.get(`${baseUrl}/moved`, undefined, true);
    const body = await readToEnd(response.body);

    expect(response.status).toBe(200);
    expect(body.toString('utf-8')).toBe('<p>first</p><p>second</p><p>third</p>');
    expect(received.slice(-2)).toEqual([
      { url: '/moved', userAgent: 'cratedoc-test/1.0' },
      { url: '/docs', userAgent: 'cratedoc-test/1.0' },
    ]);
  });

  it('should hand back the redirect itself when not following', async () => {
    const response = await new FetchHttpClient().get(`${baseUrl}/moved`, undefined, false);
    await readToEnd(response.body);

    expect(response.status).toBe(302);
  });

  it('should pass client error statuses through', async () => {
    const response = await new FetchHttpClient().get(`${baseUrl}/absent`, undefined, true);

    expect(response.status).toBe(404);
    expect((await readToEnd(response.body)).toString('utf-8')).toBe('not found');
  });

  it('should cancel the response when the reader stops early', async () => {
    const response = await new FetchHttpClient().get(`${baseUrl}/endless`, undefined, true);

    for await (const chunk of response.body) {
      expect(Buffer.from(chunk).toString('utf-8')).toBe('<p>start</p>');
      break;
    }

    await waitFor(() => streamClosed);
    expect(streamClosed).toBe(true);
  });

  it('should report a refused connection as a transport error', async () => {
    const closed = http.createServer();
    const port = await listen(closed);
    await close(closed);

    const request = new FetchHttpClient().get(`http://127.0.0.1:${port}/`, undefined, true);

    await expect(request).rejects.toThrow(TransportError);
    await expect(request).rejects.toThrow(`request to http://127.0.0.1:${port}/ failed`);
  });
});
