import { afterEach, describe, it, expect, vi } from 'vitest';
import { createDefaultHttpClient } from './fetch-http-client.js';

describe('createDefaultHttpClient', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should issue a GET with headers and signal', async () => {
    const fetchStub = vi.fn(() => Promise.resolve(new Response('<ok/>', { status: 200 })));
    vi.stubGlobal('fetch', fetchStub);
    const controller = new AbortController();

    const response = await createDefaultHttpClient().get('https://svc.example.test/record', {
      headers: { Accept: 'application/xml' },
      signal: controller.signal,
    });

    expect(response.status).toBe(200);
    expect(new TextDecoder().decode(await response.arrayBuffer())).toBe('<ok/>');
    expect(fetchStub).toHaveBeenCalledWith('https://svc.example.test/record', {
      method: 'GET',
      redirect: 'manual',
      headers: { Accept: 'application/xml' },
      signal: controller.signal,
    });
  });
});
