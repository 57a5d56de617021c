/**
 * HTTP collaborator backed by the global fetch
 */

import { TransportError, toError } from '../errors/index.js';
import type { HttpBody, HttpClient, HttpResponse } from '../types/docs.js';

const USER_AGENT = 'cratedoc/0.1';

export class FetchHttpClient implements HttpClient {
  constructor(private readonly userAgent: string = USER_AGENT) {}

  async get(url: string, body: HttpBody, followRedirects: boolean): Promise<HttpResponse> {
    let response: Response;
    try {
      response = await fetch(url, {
        method: 'GET',
        // fetch rejects a GET with a body; an empty one is sent as none
        body: body ? body : undefined,
        redirect: followRedirects ? 'follow' : 'manual',
        headers: {
          'User-Agent': this.userAgent,
        },
      });
    } catch (error) {
      throw new TransportError(`request to ${url} failed: ${toError(error).message}`, { url }, toError(error));
    }

    return {
      status: response.status,
      body: readBody(response),
    };
  }
}

async function* readBody(response: Response): AsyncGenerator<Uint8Array> {
  if (!response.body) {
    return;
  }

  const reader = response.body.getReader();
  // True only while suspended at `yield`, i.e. when the consumer stops early
  let abandoned = false;
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) return;
      abandoned = true;
      yield value;
      abandoned = false;
    }
  } finally {
    if (abandoned) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}

/**
 * Drain a response body into one buffer
 */
export async function readToEnd(body: AsyncIterable<Uint8Array>): Promise<Buffer> {
  const chunks: Uint8Array[] = [];
  for await (const chunk of body) {
    chunks.push(chunk);
  }
  return Buffer.concat(chunks);
}
