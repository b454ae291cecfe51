/**
 * Update webhook tests
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { createApp } from '../../../src/app.js';
import { DynDnsService } from '../../../src/services/DynDnsService.js';
import { createFakeCcpApi, TEST_CREDENTIALS, type FakeCcpApi } from '../../helpers/fakeCcpApi.js';
import { createTempDir, type TempDir } from '../../helpers/tempFiles.js';

describe('update webhook', () => {
  let dir: TempDir;
  let api: FakeCcpApi;
  let app: Express;
  let subdomainsFile: string;

  beforeEach(() => {
    dir = createTempDir();
    subdomainsFile = dir.writeJson('subdomains.json', {
      domainname: 'example.com',
      hosts: [{ key: 'key-home', hostname: 'home' }],
    });
    api = createFakeCcpApi({
      records: [{ hostname: 'home', type: 'A', destination: '192.0.2.1' }],
    });
    app = createApp({ subdomainsFile, runner: new DynDnsService(TEST_CREDENTIALS, { fetch: api.fetch }) });
  });

  afterEach(() => {
    dir.remove();
  });

  it('should answer health checks', async () => {
    const response = await request(app).get('/health');

    expect(response.status).toBe(200);
    expect(response.body.status).toBe('ok');
  });

  it('should refuse unknown keys without calling the API', async () => {
    const response = await request(app).get('/key-unknown?ipv4=198.51.100.7');

    expect(response.status).toBe(403);
    expect(response.body).toEqual({ success: false, error: { code: 'FORBIDDEN', message: 'Forbidden' } });
    expect(api.fetch).not.toHaveBeenCalled();
  });

  it('should require at least one address', async () => {
    const response = await request(app).get('/key-home');

    expect(response.status).toBe(400);
    expect(response.body.error).toEqual({ code: 'VALIDATION_ERROR', message: 'Provide an ipv4 or ipv6 or both.' });
    expect(api.fetch).not.toHaveBeenCalled();
  });

  it('should reject a TTL that is not a number', async () => {
    const response = await request(app).get('/key-home?ipv4=198.51.100.7&ttl=soon');

    expect(response.status).toBe(400);
    expect(response.body.error.code).toBe('VALIDATION_ERROR');
  });

  it('should update the A record and return the report', async () => {
    const response = await request(app).get('/key-home?ipv4=198.51.100.7');

    expect(response.status).toBe(200);
    expect(response.headers['content-type']).toBe('text/plain; charset=utf-8');
    expect(response.text.split('\n')[0]).toBe('working on domain:\texample.com');
    expect(api.state.records.map((r) => [r.hostname, r.type, r.destination])).toEqual([
      ['home', 'A', '198.51.100.7'],
    ]);
    expect(api.state.sessions.size).toBe(0);
  });

  it('should keep both addresses of a dual-stack host', async () => {
    const response = await request(app).get('/key-home?ipv4=198.51.100.7&ipv6=2001:db8::7&ttl=300');

    expect(response.status).toBe(200);
    expect(api.state.records.map((r) => [r.type, r.destination])).toEqual([
      ['A', '198.51.100.7'],
      ['AAAA', '2001:db8::7'],
    ]);
    expect(api.state.zone.ttl).toBe('300');
  });

  it('should report remote failures as 502', async () => {
    api.failAction('infoDnsZone', 'Domain not found.');

    const response = await request(app).get('/key-home?ipv6=2001:db8::7');

    expect(response.status).toBe(502);
    expect(response.body.error).toEqual({ code: 'API_ERROR', message: 'Domain not found.' });
  });

  it('should report unexpected failures as 500', async () => {
    const failing = createApp({
      subdomainsFile,
      runner: { sync: vi.fn().mockRejectedValue(new Error('boom')) },
    });

    const response = await request(failing).get('/key-home?ipv4=198.51.100.7');

    expect(response.status).toBe(500);
    expect(response.body.error.code).toBe('INTERNAL_ERROR');
  });

  it('should report a broken subdomains file as a configuration error', async () => {
    const broken = createApp({
      subdomainsFile: dir.write('broken.json', '{'),
      runner: new DynDnsService(TEST_CREDENTIALS, { fetch: api.fetch }),
    });

    const response = await request(broken).get('/key-home?ipv4=198.51.100.7');

    expect(response.status).toBe(500);
    expect(response.body.error.code).toBe('CONFIGURATION_ERROR');
  });

  it('should answer 404 for other paths', async () => {
    const response = await request(app).get('/key-home/extra');

    expect(response.status).toBe(404);
    expect(response.body.error.code).toBe('NOT_FOUND');
  });
});
