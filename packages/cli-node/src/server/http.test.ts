/**
 * Tests for the HTTP API, served on an ephemeral local port
 */

import * as http from 'node:http';
import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import { defineCapability, InMemoryCapabilityStore } from '../modules/index.js';
import { createServer } from './http.js';

const API_KEY = 'test-secret';

const store = new InMemoryCapabilityStore([
  defineCapability({ name: 'note-taking', purpose: 'Write things down', behaviors: [{ name: 'jot' }] }),
  defineCapability({ name: 'memory-management', prerequisites: ['note-taking@^1.0.0'], behaviors: [{ name: 'recall' }] }),
]);

describe('HTTP API', () => {
  let server: http.Server;
  let port: number;
  let baseUrl: string;

  beforeAll(async () => {
    server = createServer({ store, apiKey: API_KEY });
    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server is not listening on a TCP port');
    }
    port = address.port;
    baseUrl = `http://127.0.0.1:${port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
  });

  function post(path: string, body: string, key: string | null = API_KEY) {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (key) headers.Authorization = `Bearer ${key}`;
    return fetch(`${baseUrl}${path}`, { method: 'POST', headers, body });
  }

  it('should report health', async () => {
    const response = await fetch(`${baseUrl}/health`);
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: 'healthy', version: '0.1.0' });
  });

  it('should list templates and capabilities', async () => {
    expect(await (await fetch(`${baseUrl}/templates`)).json()).toMatchObject({ count: 6 });

    expect(await (await fetch(`${baseUrl}/capabilities`)).json()).toEqual({
      count: 2,
      capabilities: [
        {
          name: 'memory-management',
          version: '1.0.0',
          prerequisites: ['note-taking@^1.0.0'],
          behaviors: ['recall'],
          contracts: [],
        },
        {
          name: 'note-taking',
          version: '1.0.0',
          purpose: 'Write things down',
          prerequisites: [],
          behaviors: ['jot'],
          contracts: [],
        },
      ],
    });
  });

  it('should return one capability or 404', async () => {
    const found = await fetch(`${baseUrl}/capabilities/note-taking`);
    expect(found.status).toBe(200);
    expect(await found.json()).toMatchObject({ name: 'note-taking', purpose: 'Write things down' });

    const missing = await fetch(`${baseUrl}/capabilities/telepathy`);
    expect(missing.status).toBe(404);
    expect(await missing.json()).toEqual({ error: "Capability 'telepathy' not found" });
  });

  it('should require the API key for POST routes', async () => {
    const response = await post('/validate', JSON.stringify({ manifest: {} }), null);
    expect(response.status).toBe(401);
  });

  it('should validate a manifest object', async () => {
    const response = await post('/validate', JSON.stringify({
      manifest: { base_template: 'advisor', capabilities: [{ name: 'memory-management' }] },
    }));

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      status: 'pass',
      capabilities: [{ name: 'note-taking' }, { name: 'memory-management' }],
    });
  });

  it('should compose manifest text', async () => {
    const response = await post('/compose', JSON.stringify({
      manifest: 'base_template: worker\ncapabilities:\n  - name: note-taking\n',
    }));

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ ok: true, agent: { name: 'worker' } });
  });

  it('should answer 422 for a failing composition', async () => {
    const response = await post('/compose', JSON.stringify({
      manifest: { base_template: 'advisor', capabilities: [{ name: 'memory-management' }] },
      strict_prerequisites: true,
    }));

    expect(response.status).toBe(422);
    expect(await response.json()).toMatchObject({
      ok: false,
      result: { errors: [{ code: 'COMP-003' }] },
    });
  });

  it('should reject malformed bodies', async () => {
    const invalidJson = await post('/compose', '{');
    expect(invalidJson.status).toBe(400);
    expect(await invalidJson.json()).toEqual({ error: 'Invalid JSON body' });

    const missing = await post('/compose', JSON.stringify({}));
    expect(await missing.json()).toEqual({ error: 'Missing required field: manifest' });

    const badFlag = await post('/compose', JSON.stringify({ manifest: {}, strict_prerequisites: 'yes' }));
    expect(await badFlag.json()).toEqual({ error: 'strict_prerequisites must be a boolean' });
  });

  /** GET with a Host header fetch would refuse to send */
  function getWithHost(path: string, host: string): Promise<{ status: number; body: unknown }> {
    return new Promise((resolve, reject) => {
      const request = http.request({ hostname: '127.0.0.1', port, path, headers: { Host: host } }, response => {
        let text = '';
        response.setEncoding('utf-8');
        response.on('data', chunk => {
          text += chunk;
        });
        response.on('end', () => resolve({ status: response.statusCode ?? 0, body: JSON.parse(text) }));
      });
      request.on('error', reject);
      request.end();
    });
  }

  it('should answer 400 for a Host header that makes no URL', async () => {
    const response = await getWithHost('/health', 'bad host[');

    expect(response).toEqual({ status: 400, body: { error: 'Invalid request URL' } });
  });

  it('should answer 400 for a malformed percent escape', async () => {
    const response = await fetch(`${baseUrl}/capabilities/%E0%A4%A`);

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'Malformed URL encoding: URI malformed' });
  });

  it('should answer 404 for unknown routes', async () => {
    const response = await fetch(`${baseUrl}/nowhere`);
    expect(response.status).toBe(404);
  });
});
