import { describe, expect, it, vi } from 'vitest';

import { FetchPoster } from '../../src/infrastructure/rpc/HttpPoster.js';

describe('FetchPoster', () => {
  it('posts the body with the given headers and a timeout signal', async () => {
    const fetch = vi.fn(async (_input: string, _init: RequestInit) => new Response('{"ok":true}', { status: 201 }));
    const poster = new FetchPoster({ timeoutMs: 1_000, fetch });

    const result = await poster.post('http://zabbix.test/api_jsonrpc.php', '{"a":1}', { 'Content-Type': 'application/json-rpc' });

    expect(result).toEqual({ status: 201, body: '{"ok":true}' });
    expect(fetch).toHaveBeenCalledWith(
      'http://zabbix.test/api_jsonrpc.php',
      expect.objectContaining({ method: 'POST', body: '{"a":1}', headers: { 'Content-Type': 'application/json-rpc' } })
    );
    expect(fetch.mock.calls[0]?.[1].signal).toBeInstanceOf(AbortSignal);
  });

  it('hands back error statuses instead of throwing', async () => {
    const poster = new FetchPoster({ fetch: async () => new Response('Bad Gateway', { status: 502 }) });

    await expect(poster.post('http://zabbix.test', '{}', {})).resolves.toEqual({ status: 502, body: 'Bad Gateway' });
  });

  it('lets a rejected fetch through', async () => {
    const poster = new FetchPoster({
      fetch: async () => {
        throw new TypeError('fetch failed');
      }
    });

    await expect(poster.post('http://zabbix.test', '{}', {})).rejects.toThrow('fetch failed');
  });
});
