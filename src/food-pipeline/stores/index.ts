/**
 * Store finder backends and the factory that picks one from configuration.
 */

import type { AppConfig } from "../../config.js";
import { GenerativeStoreFinder } from "./generative-store-finder.js";
import { MapSearchStoreFinder } from "./map-search-store-finder.js";
import { StoreDirectoryFinder } from "./store-directory.js";
import type { StoreFinderBackend } from "./types.js";

export type { StoreFinderBackend, StoreQuery, StoreSearchOutcome, StoreSuggestion } from "./types.js";
export { findStores, DEFAULT_STORE_DEADLINE_MS } from "./find-stores.js";
export { StoreDirectoryFinder, loadStoreDirectory, normalizePostalCode } from "./store-directory.js";
export { GenerativeStoreFinder, buildStorePrompt, parseStoreSuggestions } from "./generative-store-finder.js";
export { MapSearchStoreFinder, buildOverpassQuery, haversineKm } from "./map-search-store-finder.js";

export function createStoreFinder(config: AppConfig): StoreFinderBackend {
  switch (config.storeFinder) {
    case 'generative':
      if (!config.geminiApiKey) {
        throw new Error('STORE_FINDER=generative requires GEMINI_API_KEY');
      }
      return new GenerativeStoreFinder({
        apiKey: config.geminiApiKey,
        model: config.geminiModel,
        timeoutMs: config.httpTimeoutMs,
      });
    case 'map-search':
      return new MapSearchStoreFinder({
        url: config.overpassUrl,
        radiusM: config.mapSearchRadiusM,
        timeoutMs: config.httpTimeoutMs,
      });
    case 'directory':
      return new StoreDirectoryFinder(config.storeDirectoryPath);
  }
}
