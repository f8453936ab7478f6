import { describe, it, expect, vi, afterEach } from 'vitest';
import * as https from 'https';
import axios, { AxiosHeaders } from 'axios';
import { AxiosHttpClient } from '../src/http/http-client';

function response(status: number, data: string) {
  return { status, statusText: '', data, headers: {}, config: { headers: new AxiosHeaders() } };
}

describe('AxiosHttpClient', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns status and body, passing headers and timeout through', async () => {
    const get = vi.spyOn(axios, 'get').mockResolvedValue(response(200, '<p>ok</p>'));

    const result = await new AxiosHttpClient().get('https://careers.example.com/jobs', {
      headers: { 'User-Agent': 'test-agent/1.0' },
      verifyTls: true,
      timeoutMs: 5000,
    });

    expect(result).toEqual({ status: 200, body: '<p>ok</p>' });
    const [url, config] = get.mock.calls[0];
    expect(url).toBe('https://careers.example.com/jobs');
    expect(config?.timeout).toBe(5000);
    expect(config?.headers).toMatchObject({ 'User-Agent': 'test-agent/1.0' });
    expect(config?.httpsAgent).toBeUndefined();
  });

  it('uses an agent that skips certificate checks when verification is off', async () => {
    const get = vi.spyOn(axios, 'get').mockResolvedValue(response(404, 'missing'));

    const result = await new AxiosHttpClient().get('https://careers.example.com/jobs/9', {
      headers: {},
      verifyTls: false,
      timeoutMs: 5000,
    });

    expect(result).toEqual({ status: 404, body: 'missing' });
    const agent: unknown = get.mock.calls[0][1]?.httpsAgent;
    expect(agent).toBeInstanceOf(https.Agent);
    expect(agent instanceof https.Agent && agent.options.rejectUnauthorized).toBe(false);
  });
});
