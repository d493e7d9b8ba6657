/**
 * Server configuration, read from the environment.
 *
 * The entry point loads `.env` through dotenv before calling `loadConfig`;
 * everything else receives the parsed `AppConfig` explicitly.
 */

import { z } from 'zod';

export const SERVER_NAME = "nutriscan-mcp";
export const SERVER_VERSION = "1.0.0";

const EnvSchema = z.object({
  OFF_BASE_URL: z.string().url().default('https://world.openfoodfacts.org'),
  OFF_USER_AGENT: z.string().min(1).default('NutriScan/1.0 (nutriscan-mcp)'),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  TARGET_COUNTRY: z.string().min(1).default('united-states'),
  ALTERNATIVES_PAGE_SIZE: z.coerce.number().int().min(1).max(1000).default(100),
  ALTERNATIVES_SCORE_THRESHOLD: z.coerce.number().min(1).max(100).default(70),
  SCAN_MODE: z.enum(['preprocessed', 'raw']).default('preprocessed'),
  STORE_FINDER: z.enum(['directory', 'generative', 'map-search']).default('directory'),
  STORE_SEARCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  GEMINI_API_KEY: z.string().optional(),
  GEMINI_MODEL: z.string().min(1).default('gemini-1.5-flash'),
  OVERPASS_URL: z.string().url().default('https://overpass-api.de/api/interpreter'),
  MAP_SEARCH_RADIUS_M: z.coerce.number().int().positive().default(5000),
  STORE_DIRECTORY_PATH: z.string().optional(),
  PORT: z.coerce.number().int().positive().default(3031),
  MCP_TRANSPORT: z.enum(['http', 'stdio']).default('http'),
});

export type ScanMode = z.infer<typeof EnvSchema>['SCAN_MODE'];
export type StoreFinderKind = z.infer<typeof EnvSchema>['STORE_FINDER'];

export interface AppConfig {
  offBaseUrl: string;
  offUserAgent: string;
  httpTimeoutMs: number;
  targetCountry: string;
  alternativesPageSize: number;
  alternativesScoreThreshold: number;
  scanMode: ScanMode;
  storeFinder: StoreFinderKind;
  storeSearchTimeoutMs: number;
  geminiApiKey?: string;
  geminiModel: string;
  overpassUrl: string;
  mapSearchRadiusM: number;
  storeDirectoryPath?: string;
  port: number;
  transport: 'http' | 'stdio';
}

/**
 * Parse and validate the environment. Empty strings count as unset so a
 * blank line in `.env` falls back to the default.
 *
 * @throws ZodError when a variable is present but invalid
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );
  const e = EnvSchema.parse(present);
  return {
    offBaseUrl: e.OFF_BASE_URL.replace(/\/$/, ''),
    offUserAgent: e.OFF_USER_AGENT,
    httpTimeoutMs: e.HTTP_TIMEOUT_MS,
    targetCountry: e.TARGET_COUNTRY.trim().toLowerCase().replace(/^en:/, ''),
    alternativesPageSize: e.ALTERNATIVES_PAGE_SIZE,
    alternativesScoreThreshold: e.ALTERNATIVES_SCORE_THRESHOLD,
    scanMode: e.SCAN_MODE,
    storeFinder: e.STORE_FINDER,
    storeSearchTimeoutMs: e.STORE_SEARCH_TIMEOUT_MS,
    geminiApiKey: e.GEMINI_API_KEY,
    geminiModel: e.GEMINI_MODEL,
    overpassUrl: e.OVERPASS_URL,
    mapSearchRadiusM: e.MAP_SEARCH_RADIUS_M,
    storeDirectoryPath: e.STORE_DIRECTORY_PATH,
    port: e.PORT,
    transport: e.MCP_TRANSPORT,
  };
}
