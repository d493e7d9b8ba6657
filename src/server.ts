/**
 * MCP server: tool definitions, prompts and the tool-call handler.
 */

import { readFile } from 'node:fs/promises';
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ListPromptsRequestSchema,
  GetPromptRequestSchema,
  type Tool,
  type CallToolResult,
  type CallToolRequest,
  type PromptMessage
} from "@modelcontextprotocol/sdk/types.js";
import { z } from 'zod';

import { SERVER_NAME, SERVER_VERSION, type AppConfig } from './config.js';
import { getRequestCountry } from './request-context.js';
import {
  calculateHealthScore,
  describeError,
  emptySession,
  evaluateBarcode,
  evaluateImage,
  findHealthierAlternatives,
  formatNumber,
  formatNutritionFacts,
  lookupProduct,
  renderNutritionFacts,
  scoreBand,
  toNutrientProfile,
  withReport,
  type AlternativeCandidate,
  type FoodDatabase,
  type ScanReport,
  type ScanSession,
  type SymbolDecoder,
} from './food-pipeline/index.js';
import { findStores, type StoreFinderBackend } from './food-pipeline/stores/index.js';

export interface ServerDependencies {
  config: AppConfig;
  database: FoodDatabase;
  decoder: SymbolDecoder;
  storeFinder: StoreFinderBackend;
}

export interface ToolCallOutcome {
  result: CallToolResult;
  /** Present only when the call recorded a new report. */
  session?: ScanSession;
}

/**
 * Instructions sent to the client when the MCP is loaded.
 */
const NUTRISCAN_INSTRUCTIONS = `## Your role
You are a nutrition assistant. You help the user understand packaged food products by scanning barcodes, reading nutrition facts from Open Food Facts, explaining the product's health score, and suggesting healthier alternatives and stores that carry them.

## Tools
1. **scan_barcode_image**: decode a barcode from a photo (\`image_base64\` or \`image_path\`) and evaluate the product.
2. **product_lookup**: evaluate a product by \`barcode\` (EAN/UPC). Returns nutrition facts per 100 g, a health score from 1 to 100 and, for scores below the threshold, up to 3 healthier alternatives.
3. **find_alternatives**: search healthier alternatives for a \`barcode\` (or the last scanned product) regardless of its score.
4. **score_nutriments**: score a nutriment mapping using Open Food Facts field names (e.g. \`sugars_100g\`).
5. **find_stores**: suggest stores carrying healthier alternatives, by product name, postal code or coordinates.

## How to read the score
Scores start at 50. Sugars, saturated fat, sodium and fat lower it; protein, fiber, vitamin D, calcium, iron and potassium raise it. Below 50 is poor, below 70 fair, 70 and above good. Explain which nutrients drove the score in plain terms.`;

const NUTRISCAN_PROMPTS: Record<string, { title: string; description: string; messages: PromptMessage[] }> = {
  nutriscan_scan_workflow: {
    title: "Scan a product and suggest better options",
    description: "Walk through a scan: decode, evaluate, compare alternatives, suggest stores.",
    messages: [
      {
        role: "user",
        content: { type: "text", text: "I just scanned a snack at the store. Tell me how healthy it is and what I could buy instead." }
      },
      {
        role: "assistant",
        content: {
          type: "text",
          text: `I'll evaluate the product first with \`product_lookup\` (or \`scan_barcode_image\` if you send a photo). That gives the nutrition facts per 100 g and a health score.

If the score is below 70 the result already includes up to 3 healthier alternatives from the same category, sold in your market, that beat it on score and on most of sugars, fat, saturated fat, sodium, protein and fiber. I'll compare them with your product nutrient by nutrient.

If you want to know where to buy them, tell me your postal code or location and I'll call \`find_stores\`.`
        }
      }
    ]
  }
};

const TOOLS: Tool[] = [
  {
    name: 'scan_barcode_image',
    description: 'Decode a product barcode from an image (JPEG/PNG/WebP) and evaluate the product: nutrition facts, health score and healthier alternatives. Provide "image_base64" (optionally a data URL) or "image_path" (a file readable by the server).',
    inputSchema: {
      type: 'object',
      properties: {
        image_base64: { type: 'string', description: 'Base64-encoded image, or a data: URL' },
        image_path: { type: 'string', description: 'Path to an image file on the server' }
      }
    }
  },
  {
    name: 'product_lookup',
    description: 'Look up a product by EAN/UPC barcode on Open Food Facts. Returns nutrition facts per 100 g, a health score (1-100) and, when the score is below the threshold, up to 3 healthier alternatives.',
    inputSchema: {
      type: 'object',
      properties: {
        barcode: { type: 'string', description: 'EAN/UPC barcode (e.g. "3017620422003")' },
        include_alternatives: { type: 'boolean', description: 'Search alternatives for low scores (default: true)' }
      },
      required: ['barcode']
    }
  },
  {
    name: 'find_alternatives',
    description: 'Find up to 3 healthier alternatives in the same category and market, regardless of the product score. Uses the last scanned product when "barcode" is omitted.',
    inputSchema: {
      type: 'object',
      properties: {
        barcode: { type: 'string', description: 'EAN/UPC barcode (optional after a scan)' }
      }
    }
  },
  {
    name: 'score_nutriments',
    description: 'Compute the health score of a nutriment mapping keyed by Open Food Facts per-100g field names (sugars_100g, fat_100g, saturated-fat_100g, sodium_100g, proteins_100g, fiber_100g, vitamin-d_100g, calcium_100g, iron_100g, potassium_100g).',
    inputSchema: {
      type: 'object',
      properties: {
        nutriments: { type: 'object', description: 'Nutrient values per 100 g, e.g. { "sugars_100g": 12.5, "proteins_100g": 3 }' }
      },
      required: ['nutriments']
    }
  },
  {
    name: 'find_stores',
    description: 'Suggest stores that carry healthier alternatives. Depending on the server configuration this uses a store directory (postal_code), a generative model (product_name) or a map search (latitude/longitude). Uses the last scanned product name when product_name is omitted.',
    inputSchema: {
      type: 'object',
      properties: {
        product_name: { type: 'string', description: 'Product to find alternatives for' },
        postal_code: { type: 'string', description: 'Postal code (directory backend)' },
        latitude: { type: 'number', description: 'Latitude (map-search backend)' },
        longitude: { type: 'number', description: 'Longitude (map-search backend)' }
      }
    }
  }
];

const ScanImageArgs = z.object({
  image_base64: z.string().trim().min(1).optional(),
  image_path: z.string().trim().min(1).optional(),
});

const ProductLookupArgs = z.object({
  barcode: z.string().trim().min(1, '"barcode" is required.'),
  include_alternatives: z.boolean().default(true),
});

const FindAlternativesArgs = z.object({
  barcode: z.string().trim().min(1).optional(),
});

const ScoreNutrimentsArgs = z.object({
  nutriments: z.record(z.unknown()),
});

const FindStoresArgs = z.object({
  product_name: z.string().trim().min(1).optional(),
  postal_code: z.string().trim().min(1).optional(),
  latitude: z.number().min(-90).max(90).optional(),
  longitude: z.number().min(-180).max(180).optional(),
});

function textResult(text: string, isError = false): CallToolResult {
  return isError ? { content: [{ type: 'text', text }], isError: true } : { content: [{ type: 'text', text }] };
}

function jsonResult(value: unknown): CallToolResult {
  return textResult(JSON.stringify(value, null, 2));
}

function errorResult(message: string): CallToolResult {
  return textResult(`Error: ${message}`, true);
}

function validationMessage(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function presentAlternative(alt: AlternativeCandidate, rank: number) {
  return {
    rank,
    barcode: alt.code,
    name: alt.name,
    brand: alt.brand,
    healthScore: `${formatNumber(alt.healthScore)}/100`,
    servingSize: alt.servingSize,
    nutritionFacts: renderNutritionFacts(formatNutritionFacts(alt.nutrients, { skipZero: true })),
    ...(alt.stores ? { stores: alt.stores } : {}),
    ...(alt.purchasePlaces ? { purchasePlaces: alt.purchasePlaces } : {}),
  };
}

/** JSON shape returned to clients for a scan. */
export function presentReport(report: ScanReport) {
  return {
    barcode: report.barcode,
    product: report.product.name,
    brand: report.product.brand,
    servingSize: report.product.servingSize,
    healthScore: report.formattedScore,
    band: report.band,
    nutritionFacts: renderNutritionFacts(report.nutritionFacts),
    alternativesSearched: report.alternativesSearched,
    alternatives: report.alternatives.map((alt, i) => presentAlternative(alt, i + 1)),
  };
}

function decodeBase64Image(value: string): Buffer {
  const payload = value.replace(/^data:[^;,]+;base64,/, '');
  return Buffer.from(payload, 'base64');
}

/**
 * Run one tool call against the given session. Never throws: failures come
 * back as an error result. Only calls that evaluate a product return a session.
 */
export async function handleToolCall(
  toolName: string,
  args: Record<string, unknown>,
  deps: ServerDependencies,
  session: ScanSession
): Promise<ToolCallOutcome> {
  const { config, database, decoder, storeFinder } = deps;
  const country = getRequestCountry() ?? config.targetCountry;
  const evaluation = {
    country,
    scoreThreshold: config.alternativesScoreThreshold,
    pageSize: config.alternativesPageSize,
    scanMode: config.scanMode,
  };
  const unchanged = (result: CallToolResult): ToolCallOutcome => ({ result });

  try {
    if (toolName === 'scan_barcode_image') {
      const parsed = ScanImageArgs.safeParse(args);
      if (!parsed.success) return unchanged(errorResult(validationMessage(parsed.error)));

      const { image_base64, image_path } = parsed.data;
      let image: Buffer;
      if (image_base64 != null) {
        image = decodeBase64Image(image_base64);
      } else if (image_path != null) {
        image = await readFile(image_path);
      } else {
        return unchanged(errorResult('Provide either "image_base64" or "image_path".'));
      }
      const outcome = await evaluateImage(image, { database, decoder }, evaluation);
      if (outcome.status === 'no-barcode') {
        return unchanged(textResult('No barcode detected. Try a sharper, well-lit photo with the whole barcode in frame.'));
      }
      if (outcome.status === 'not-found') {
        return unchanged(textResult(`Barcode ${outcome.barcode} decoded, but the product was not found in Open Food Facts.`));
      }
      return { result: jsonResult(presentReport(outcome.report)), session: withReport(session, outcome.report) };
    }

    if (toolName === 'product_lookup') {
      const parsed = ProductLookupArgs.safeParse(args);
      if (!parsed.success) return unchanged(errorResult(validationMessage(parsed.error)));

      const report = await evaluateBarcode(parsed.data.barcode, database, {
        ...evaluation,
        scoreThreshold: parsed.data.include_alternatives ? evaluation.scoreThreshold : 0,
      });
      if (!report) {
        return unchanged(textResult(`No product found for barcode "${parsed.data.barcode}".`));
      }
      return { result: jsonResult(presentReport(report)), session: withReport(session, report) };
    }

    if (toolName === 'find_alternatives') {
      const parsed = FindAlternativesArgs.safeParse(args);
      if (!parsed.success) return unchanged(errorResult(validationMessage(parsed.error)));

      const barcode = parsed.data.barcode;
      const product = barcode != null ? await lookupProduct(barcode, database) : session.lastReport?.product;
      if (!product) {
        return unchanged(
          barcode != null
            ? textResult(`No product found for barcode "${barcode}".`)
            : errorResult('Provide "barcode" or scan a product first.')
        );
      }
      const score = calculateHealthScore(product.nutrients);
      const alternatives = await findHealthierAlternatives(product, score, database, evaluation);
      if (alternatives.length === 0) {
        return unchanged(textResult(`No healthier alternatives found for "${product.name}" in ${country}.`));
      }
      return unchanged(
        jsonResult({
          product: product.name,
          healthScore: `${formatNumber(score)}/100`,
          country,
          alternatives: alternatives.map((alt, i) => presentAlternative(alt, i + 1)),
        })
      );
    }

    if (toolName === 'score_nutriments') {
      const parsed = ScoreNutrimentsArgs.safeParse(args);
      if (!parsed.success) return unchanged(errorResult(validationMessage(parsed.error)));

      const nutrients = toNutrientProfile(parsed.data.nutriments);
      const score = calculateHealthScore(nutrients);
      return unchanged(
        jsonResult({
          healthScore: formatNumber(score),
          band: scoreBand(score),
          nutritionFacts: renderNutritionFacts(formatNutritionFacts(nutrients)),
        })
      );
    }

    if (toolName === 'find_stores') {
      const parsed = FindStoresArgs.safeParse(args);
      if (!parsed.success) return unchanged(errorResult(validationMessage(parsed.error)));

      const productName = parsed.data.product_name ?? session.lastReport?.product.name;
      const outcome = await findStores(
        storeFinder,
        {
          productName,
          postalCode: parsed.data.postal_code,
          latitude: parsed.data.latitude,
          longitude: parsed.data.longitude,
        },
        { deadlineMs: config.storeSearchTimeoutMs }
      );
      if (outcome.status === 'timeout') {
        return unchanged(textResult('The store search is taking too long. Please try again.', true));
      }
      if (outcome.status === 'error') {
        return unchanged(errorResult(`Store search failed: ${outcome.message}`));
      }
      if (outcome.stores.length === 0) {
        return unchanged(textResult('No store recommendations available at the moment. Try again later.'));
      }
      return unchanged(jsonResult({ backend: outcome.backend, productName, stores: outcome.stores }));
    }
  } catch (err) {
    console.error(`[mcp] Error during execution of tool '${toolName}':`, describeError(err));
    return unchanged(errorResult(describeError(err)));
  }

  console.error(`[mcp] Unknown tool requested: ${toolName}`);
  return unchanged(
    errorResult(`Unknown tool requested: ${toolName}. Available tools: ${TOOLS.map((t) => t.name).join(', ')}.`)
  );
}

/**
 * Creates a new MCP Server instance (one per connection), each with its own scan session.
 * Required because the SDK allows only one transport per Server; Streamable HTTP has multiple sessions.
 */
export function createMcpServer(deps: ServerDependencies): Server {
  const s = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    {
      capabilities: { tools: {}, prompts: {} },
      instructions: NUTRISCAN_INSTRUCTIONS
    }
  );
  let session = emptySession();

  s.setRequestHandler(ListPromptsRequestSchema, async () => {
    const prompts = Object.entries(NUTRISCAN_PROMPTS).map(([name, p]) => ({
      name,
      description: p.description,
      title: p.title
    }));
    return { prompts };
  });

  s.setRequestHandler(GetPromptRequestSchema, async (request) => {
    const name = request.params.name;
    const prompt = NUTRISCAN_PROMPTS[name];
    if (!prompt) {
      return {
        description: `Unknown prompt: ${name}. Available: ${Object.keys(NUTRISCAN_PROMPTS).join(', ')}.`,
        messages: []
      };
    }
    return { description: prompt.description, messages: prompt.messages };
  });

  s.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: TOOLS };
  });

  s.setRequestHandler(CallToolRequestSchema, async (request: CallToolRequest): Promise<CallToolResult> => {
    const { name: toolName, arguments: toolArgs } = request.params;
    const outcome = await handleToolCall(toolName, toolArgs ?? {}, deps, session);
    if (outcome.session) session = outcome.session;
    return outcome.result;
  });

  return s;
}
