import request from 'supertest';
import { describe, expect, it, vi } from 'vitest';
import type { AppConfig } from '../../shared/config';
import { createApp } from '../app';
import type { Logger } from '../obs/logger';
import { FetchError, type Fetcher } from '../retrieval/fetcher';

const config: AppConfig = {
  environment: 'test',
  server: { port: 8000, allowedOrigins: ['http://localhost:5173'] },
  unfurl: {
    timeoutMs: 10_000,
    maxContentLength: 5_242_880,
    userAgent: 'TestBot/1.0',
    blockPrivateHosts: true,
  },
  observability: { logLevel: 'error' },
};

const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

const buildApp = (fetcher: Fetcher) => createApp({ config, logger, fetcher });

const examplePage = (): Fetcher => ({
  fetchHtml: async () => '<html><head><meta property="og:title" content="Example"></head></html>',
});

describe('HTTP app', () => {
  it('unfurls a URL', async () => {
    const res = await request(buildApp(examplePage())).post('/unfurl').send({ url: 'https://site.test/page' });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ success: true, data: { url: 'https://site.test/page', title: 'Example' } });
  });

  it('serves the same handler under /api', async () => {
    const res = await request(buildApp(examplePage())).post('/api/unfurl').send({ url: ' https://site.test/page ' });

    expect(res.status).toBe(200);
    expect(res.body.data).toEqual({ url: 'https://site.test/page', title: 'Example' });
  });

  it('answers fetch failures with an error string', async () => {
    const fetcher: Fetcher = {
      fetchHtml: async (url) => {
        throw new FetchError(url, { kind: 'not_html', contentType: 'application/json' });
      },
    };

    const res = await request(buildApp(fetcher)).post('/unfurl').send({ url: 'https://site.test/api' });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      success: false,
      code: 'not_html',
      error: 'Not HTML content: application/json (https://site.test/api)',
    });
  });

  it('rejects a missing url', async () => {
    const res = await request(buildApp(examplePage())).post('/unfurl').send({});

    expect(res.status).toBe(422);
    expect(res.body).toEqual({ success: false, error: 'url is required' });
  });

  it('rejects URLs that are not absolute http(s)', async () => {
    const app = buildApp(examplePage());

    const ftp = await request(app).post('/unfurl').send({ url: 'ftp://site.test/file' });
    const relative = await request(app).post('/unfurl').send({ url: '/just/a/path' });

    expect(ftp.status).toBe(422);
    expect(ftp.body.error).toBe('url must be an absolute http(s) URL');
    expect(relative.status).toBe(422);
    expect(relative.body.error).toBe('url must be an absolute http(s) URL');
  });

  it('rejects malformed JSON', async () => {
    const res = await request(buildApp(examplePage()))
      .post('/unfurl')
      .set('Content-Type', 'application/json')
      .send('{"url":');

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ success: false, error: 'Invalid JSON body' });
  });

  it('reports health and public config', async () => {
    const app = buildApp(examplePage());

    const health = await request(app).get('/health');
    const info = await request(app).get('/');
    const publicConfig = await request(app).get('/api/config');

    expect(health.body).toEqual({ status: 'healthy' });
    expect(info.body).toEqual({ name: 'Link Previewer API', version: '1.0.0' });
    expect(publicConfig.body).toEqual({ unfurl: { timeoutMs: 10_000, maxContentLength: 5_242_880 } });
  });

  it('allows configured origins only', async () => {
    const app = buildApp(examplePage());

    const allowed = await request(app).get('/health').set('Origin', 'http://localhost:5173');
    const other = await request(app).get('/health').set('Origin', 'https://elsewhere.test');

    expect(allowed.headers['access-control-allow-origin']).toBe('http://localhost:5173');
    expect(other.headers['access-control-allow-origin']).toBeUndefined();
  });
});
