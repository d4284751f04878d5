import http from 'node:http';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { HttpStatusError, createHttpClient, describeErrorBody } from '../src/http';

let server: http.Server;
let baseUrl = '';

beforeAll(async () => {
  server = http.createServer((req, res) => {
    res.setHeader('content-type', 'application/json');
    if (req.url === '/ok') {
      res.end(JSON.stringify({ items: [1, 2] }));
      return;
    }
    if (req.url === '/headers') {
      res.end(JSON.stringify({ key: req.headers['tron-pro-api-key'] ?? null }));
      return;
    }
    res.statusCode = 404;
    res.end(JSON.stringify({ message: 'Address not found' }));
  });

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Test server has no TCP address');
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve) => server.close(() => resolve()));
});

describe('createHttpClient', () => {
  it('returns the decoded JSON body', async () => {
    const client = createHttpClient({ timeoutMs: 5_000 });
    try {
      await expect(client.getJson(`${baseUrl}/ok`)).resolves.toEqual({ items: [1, 2] });
    } finally {
      client.close();
    }
  });

  it('sends per-request headers', async () => {
    const client = createHttpClient({ timeoutMs: 5_000 });
    try {
      await expect(
        client.getJson(`${baseUrl}/headers`, { headers: { 'TRON-PRO-API-KEY': 'test-key' } })
      ).resolves.toEqual({ key: 'test-key' });
    } finally {
      client.close();
    }
  });

  it('maps non-2xx responses to HttpStatusError', async () => {
    const client = createHttpClient({ timeoutMs: 5_000 });
    try {
      const error = await client.getJson(`${baseUrl}/missing`).catch((reason: unknown) => reason);
      expect(error).toBeInstanceOf(HttpStatusError);
      expect(error).toMatchObject({ statusCode: 404, message: 'Address not found', url: `${baseUrl}/missing` });
    } finally {
      client.close();
    }
  });
});

describe('describeErrorBody', () => {
  it('prefers message fields and falls back otherwise', () => {
    expect(describeErrorBody({ error: 'rate limited' }, 'Bad Request')).toBe('rate limited');
    expect(describeErrorBody(Buffer.from('{"detail":"bad token"}'), 'Bad Request')).toBe('bad token');
    expect(describeErrorBody('upstream down', 'Bad Gateway')).toBe('upstream down');
    expect(describeErrorBody({ code: 7 }, 'Bad Request')).toBe('Bad Request');
  });
});
