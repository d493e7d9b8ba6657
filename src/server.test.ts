import sharp from 'sharp';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema, type CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { describe, expect, it } from 'vitest';
import { loadConfig } from './config.js';
import { runWithCountry } from './request-context.js';
import { createMcpServer, handleToolCall, type ServerDependencies } from './server.js';
import { emptySession, type DetectedSymbol, type ScanSession } from './food-pipeline/index.js';
import type { StoreFinderBackend, StoreQuery, StoreSuggestion } from './food-pipeline/stores/index.js';
import { FakeFoodDatabase, makeProduct } from './test-helpers.js';

const candyBar = makeProduct({
  code: '5000000000011',
  name: 'Caramel Crunch Bar',
  brand: 'Sweet Co',
  categories: ['en:snack-bars'],
  countries: ['en:united-states', 'en:france'],
  nutrients: {
    'sugars_100g': 30,
    'fat_100g': 20,
    'saturated-fat_100g': 10,
    'sodium_100g': 1,
    'proteins_100g': 1,
    'fiber_100g': 0,
  },
});

const oatBar = makeProduct({
  code: '5000000000028',
  name: 'Oat Bar',
  brand: 'Field Foods',
  servingSize: '40 g',
  categories: ['en:snack-bars'],
  nutrients: {
    'sugars_100g': 1,
    'fat_100g': 1,
    'saturated-fat_100g': 0.5,
    'sodium_100g': 0.1,
    'proteins_100g': 8,
    'fiber_100g': 5,
  },
  stores: 'Corner Grocer',
});

class RecordingStoreFinder implements StoreFinderBackend {
  readonly name = 'recording';
  readonly queries: StoreQuery[] = [];
  constructor(private readonly reply: () => Promise<StoreSuggestion[]>) {}
  findStores(query: StoreQuery): Promise<StoreSuggestion[]> {
    this.queries.push(query);
    return this.reply();
  }
}

function setup(env: Record<string, string> = {}, reply: () => Promise<StoreSuggestion[]> = async () => []) {
  const database = new FakeFoodDatabase([candyBar, oatBar]);
  database.searchResults = [oatBar];
  const storeFinder = new RecordingStoreFinder(reply);
  const symbol: DetectedSymbol = {
    format: 'EAN_13',
    rect: { x: 0, y: 0, width: 1, height: 1 },
    data: new TextEncoder().encode(candyBar.code),
  };
  const deps: ServerDependencies = {
    config: loadConfig(env),
    database,
    decoder: { decode: () => [symbol] },
    storeFinder,
  };
  return { deps, database, storeFinder };
}

async function lookedUp(deps: ServerDependencies): Promise<ScanSession> {
  const { session } = await handleToolCall('product_lookup', { barcode: candyBar.code }, deps, emptySession());
  return session ?? emptySession();
}

function textOf(result: CallToolResult): string {
  const [first] = result.content;
  return first?.type === 'text' ? first.text : '';
}

describe('handleToolCall', () => {
  it('evaluates a barcode and remembers it', async () => {
    const { deps } = setup();

    const { result, session } = await handleToolCall('product_lookup', { barcode: candyBar.code }, deps, emptySession());

    expect(result.isError).toBeUndefined();
    expect(JSON.parse(textOf(result))).toEqual({
      barcode: '5000000000011',
      product: 'Caramel Crunch Bar',
      brand: 'Sweet Co',
      servingSize: '30 g',
      healthScore: '1.00/100',
      band: 'poor',
      nutritionFacts: [
        'Total Fat: 20.00g',
        '  Saturated Fat: 10.00g',
        'Sodium: 1000.00mg',
        '  Dietary Fiber: 0.00g',
        '  Sugars: 30.00g',
        'Protein: 1.00g',
      ],
      alternativesSearched: true,
      alternatives: [
        {
          rank: 1,
          barcode: '5000000000028',
          name: 'Oat Bar',
          brand: 'Field Foods',
          healthScore: '91.10/100',
          servingSize: '40 g',
          nutritionFacts: [
            'Total Fat: 1.00g',
            '  Saturated Fat: 0.50g',
            'Sodium: 100.00mg',
            '  Dietary Fiber: 5.00g',
            '  Sugars: 1.00g',
            'Protein: 8.00g',
          ],
          stores: 'Corner Grocer',
        },
      ],
    });
    expect(session?.lastReport?.product.code).toBe(candyBar.code);
  });

  it('can skip the alternative search', async () => {
    const { deps, database } = setup();
    const { result } = await handleToolCall(
      'product_lookup',
      { barcode: candyBar.code, include_alternatives: false },
      deps,
      emptySession()
    );
    expect(JSON.parse(textOf(result)).alternativesSearched).toBe(false);
    expect(database.searches).toEqual([]);
  });

  it('reports validation errors and unknown products', async () => {
    const { deps } = setup();
    const missing = await handleToolCall('product_lookup', {}, deps, emptySession());
    expect(missing.result).toEqual({ content: [{ type: 'text', text: 'Error: barcode: Required' }], isError: true });

    const unknown = await handleToolCall('product_lookup', { barcode: '123' }, deps, emptySession());
    expect(textOf(unknown.result)).toBe('No product found for barcode "123".');
    expect(unknown.session).toBeUndefined();
  });

  it('scans an image given as a data URL', async () => {
    const { deps } = setup();
    const png = await sharp({ create: { width: 8, height: 8, channels: 3, background: { r: 255, g: 255, b: 255 } } })
      .png()
      .toBuffer();

    const { result, session } = await handleToolCall(
      'scan_barcode_image',
      { image_base64: `data:image/png;base64,${png.toString('base64')}` },
      deps,
      emptySession()
    );

    expect(JSON.parse(textOf(result)).barcode).toBe(candyBar.code);
    expect(session?.lastReport?.barcode).toBe(candyBar.code);
  });

  it('asks for an image when none is given', async () => {
    const { deps } = setup();
    const { result } = await handleToolCall('scan_barcode_image', {}, deps, emptySession());
    expect(textOf(result)).toBe('Error: Provide either "image_base64" or "image_path".');
    expect(result.isError).toBe(true);
  });

  it('finds alternatives for the last scanned product in the request country', async () => {
    const { deps, database } = setup();
    const session = await lookedUp(deps);
    database.searches = [];

    const { result } = await runWithCountry(' United-States ', () =>
      handleToolCall('find_alternatives', {}, deps, session)
    );

    expect(database.searches[0].country).toBe('united-states');
    const body = JSON.parse(textOf(result));
    expect(body.product).toBe('Caramel Crunch Bar');
    expect(body.country).toBe('united-states');
    expect(body.alternatives.map((alt: { name: string }) => alt.name)).toEqual(['Oat Bar']);
  });

  it('reports when no alternative qualifies in the market', async () => {
    const { deps } = setup();
    const { result } = await runWithCountry('france', () =>
      handleToolCall('find_alternatives', { barcode: candyBar.code }, deps, emptySession())
    );
    expect(textOf(result)).toBe('No healthier alternatives found for "Caramel Crunch Bar" in france.');
  });

  it('accepts a prefixed country tag from the request', async () => {
    const { deps, database } = setup();
    const { result } = await runWithCountry('en:united-states', () =>
      handleToolCall('find_alternatives', { barcode: candyBar.code }, deps, emptySession())
    );
    expect(database.searches[0].country).toBe('united-states');
    expect(JSON.parse(textOf(result)).alternatives.map((alt: { name: string }) => alt.name)).toEqual(['Oat Bar']);
  });

  it('needs a barcode or a previous scan for alternatives', async () => {
    const { deps } = setup();
    const { result } = await handleToolCall('find_alternatives', {}, deps, emptySession());
    expect(textOf(result)).toBe('Error: Provide "barcode" or scan a product first.');
  });

  it('scores a nutriment mapping', async () => {
    const { deps } = setup();
    const { result } = await handleToolCall(
      'score_nutriments',
      { nutriments: { 'sugars_100g': 2, 'proteins_100g': '3', 'salt_100g': 9 } },
      deps,
      emptySession()
    );
    expect(JSON.parse(textOf(result))).toEqual({
      healthScore: '52.00',
      band: 'fair',
      nutritionFacts: ['  Sugars: 2.00g', 'Protein: 3.00g'],
    });
  });

  it('uses the session product name for store searches', async () => {
    const { deps, storeFinder } = setup({}, async () => [{ name: 'Green Grocer' }]);
    const session = await lookedUp(deps);

    const { result } = await handleToolCall('find_stores', { postal_code: '10001' }, deps, session);

    expect(storeFinder.queries).toEqual([
      { productName: 'Caramel Crunch Bar', postalCode: '10001', latitude: undefined, longitude: undefined },
    ]);
    expect(JSON.parse(textOf(result))).toEqual({
      backend: 'recording',
      productName: 'Caramel Crunch Bar',
      stores: [{ name: 'Green Grocer' }],
    });
  });

  it('separates store timeouts, failures and empty answers', async () => {
    const slow = setup({ STORE_SEARCH_TIMEOUT_MS: '20' }, () => new Promise<StoreSuggestion[]>(() => {}));
    const timedOut = await handleToolCall('find_stores', {}, slow.deps, emptySession());
    expect(timedOut.result).toEqual({
      content: [{ type: 'text', text: 'The store search is taking too long. Please try again.' }],
      isError: true,
    });

    const broken = setup({}, async () => {
      throw new Error('quota exceeded');
    });
    const failed = await handleToolCall('find_stores', {}, broken.deps, emptySession());
    expect(textOf(failed.result)).toBe('Error: Store search failed: quota exceeded');

    const empty = await handleToolCall('find_stores', {}, setup().deps, emptySession());
    expect(textOf(empty.result)).toBe('No store recommendations available at the moment. Try again later.');
  });

  it('rejects unknown tools', async () => {
    const { deps } = setup();
    const { result } = await handleToolCall('nope', {}, deps, emptySession());
    expect(textOf(result)).toBe(
      'Error: Unknown tool requested: nope. Available tools: scan_barcode_image, product_lookup, find_alternatives, score_nutriments, find_stores.'
    );
  });
});

describe('createMcpServer', () => {
  it('serves tools to a client and keeps the scan session between calls', async () => {
    const { deps, storeFinder } = setup({}, async () => [{ name: 'Green Grocer' }]);
    const server = createMcpServer(deps);
    const client = new Client({ name: 'test-client', version: '0.0.0' });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);

    const { tools } = await client.listTools();
    expect(tools.map((tool) => tool.name)).toEqual([
      'scan_barcode_image',
      'product_lookup',
      'find_alternatives',
      'score_nutriments',
      'find_stores',
    ]);

    await client.callTool({ name: 'product_lookup', arguments: { barcode: candyBar.code } });
    const stores = CallToolResultSchema.parse(await client.callTool({ name: 'find_stores', arguments: {} }));

    expect(storeFinder.queries[0].productName).toBe('Caramel Crunch Bar');
    expect(JSON.parse(textOf(stores)).stores).toEqual([{ name: 'Green Grocer' }]);

    await client.close();
  });

  it('keeps a scan recorded while a slower call is still running', async () => {
    const { deps } = setup({}, () => new Promise<StoreSuggestion[]>((resolve) => setTimeout(() => resolve([{ name: 'Green Grocer' }]), 50)));
    const server = createMcpServer(deps);
    const client = new Client({ name: 'test-client', version: '0.0.0' });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);

    const slowStores = client.callTool({ name: 'find_stores', arguments: { product_name: 'Cola' } });
    await client.callTool({ name: 'product_lookup', arguments: { barcode: candyBar.code } });
    await slowStores;

    const alternatives = CallToolResultSchema.parse(await client.callTool({ name: 'find_alternatives', arguments: {} }));
    expect(JSON.parse(textOf(alternatives)).product).toBe('Caramel Crunch Bar');

    await client.close();
  });

  it('returns no session from calls that do not evaluate a product', async () => {
    const { deps } = setup({}, async () => [{ name: 'Green Grocer' }]);
    const session = await lookedUp(deps);

    const stores = await handleToolCall('find_stores', {}, deps, session);
    const score = await handleToolCall('score_nutriments', { nutriments: {} }, deps, session);

    expect(stores.session).toBeUndefined();
    expect(score.session).toBeUndefined();
  });
});
