import http from 'node:http';
import https from 'node:https';
import got, { HTTPError } from 'got';
import { isJsonObject } from './json';

export interface JsonRequestOptions {
  headers?: Record<string, string>;
}

export interface JsonClient {
  getJson(url: string, options?: JsonRequestOptions): Promise<unknown>;
  close(): void;
}

export interface HttpClientOptions {
  timeoutMs: number;
}

export class HttpStatusError extends Error {
  constructor(
    readonly statusCode: number,
    message: string,
    readonly url: string
  ) {
    super(message);
    this.name = 'HttpStatusError';
  }
}

function parseBody(body: unknown): unknown {
  if (Buffer.isBuffer(body)) {
    return parseBody(body.toString('utf8'));
  }

  if (typeof body === 'string') {
    try {
      return JSON.parse(body);
    } catch {
      return body;
    }
  }

  return body;
}

export function describeErrorBody(body: unknown, fallback: string): string {
  const parsed = parseBody(body);

  if (isJsonObject(parsed)) {
    for (const key of ['message', 'error', 'detail']) {
      const value = parsed[key];
      if (typeof value === 'string' && value.trim().length > 0) {
        return value.trim();
      }
    }
  }

  if (typeof parsed === 'string' && parsed.trim().length > 0 && parsed.length <= 200) {
    return parsed.trim();
  }

  return fallback;
}

function toHttpStatusError(error: HTTPError, url: string): HttpStatusError {
  const { statusCode, statusMessage } = error.response;
  const fallback = statusMessage && statusMessage.length > 0 ? statusMessage : error.message;
  return new HttpStatusError(statusCode, describeErrorBody(error.response.body, fallback), url);
}

export function createHttpClient(options: HttpClientOptions): JsonClient {
  const agent = {
    http: new http.Agent({ keepAlive: true }),
    https: new https.Agent({ keepAlive: true })
  };

  const instance = got.extend({
    responseType: 'json',
    timeout: { request: options.timeoutMs },
    retry: { limit: 0 },
    agent,
    headers: {
      accept: 'application/json'
    }
  });

  return {
    async getJson(url: string, requestOptions: JsonRequestOptions = {}): Promise<unknown> {
      try {
        const extra = requestOptions.headers ? { headers: requestOptions.headers } : {};
        return await instance.get(url, extra).json<unknown>();
      } catch (error) {
        if (error instanceof HTTPError) {
          throw toHttpStatusError(error, url);
        }
        throw error;
      }
    },
    close(): void {
      agent.http.destroy();
      agent.https.destroy();
    }
  };
}
