import { describe, expect, it } from 'vitest';
import { COUNTRY_HEADER, createStreamableHttpApp } from './streamable-http.js';
import { createMcpServer } from './server.js';
import { loadConfig } from './config.js';
import { StoreDirectoryFinder } from './food-pipeline/stores/index.js';
import { FakeFoodDatabase } from './test-helpers.js';

function app() {
  return createStreamableHttpApp(() =>
    createMcpServer({
      config: loadConfig({}),
      database: new FakeFoodDatabase(),
      decoder: { decode: () => [] },
      storeFinder: new StoreDirectoryFinder({ defaults: [], regions: [] }),
    })
  );
}

describe('createStreamableHttpApp', () => {
  it('answers health checks', async () => {
    const res = await app().request('/health');
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'OK', server: 'nutriscan-mcp', version: '1.0.0' });
  });

  it('describes the endpoint on GET /mcp', async () => {
    const res = await app().request('/mcp');
    expect(res.status).toBe(200);
    expect(res.headers.get('Allow')).toBe('POST, GET');
    const body = await res.json();
    expect(body.endpoint).toBe('/mcp');
    expect(body.countryHeader).toBe(COUNTRY_HEADER);
  });

  it('refuses event streams on GET /mcp', async () => {
    const res = await app().request('/mcp', { headers: { Accept: 'text/event-stream' } });
    expect(res.status).toBe(405);
    expect(res.headers.get('Allow')).toBe('POST');
  });
});
