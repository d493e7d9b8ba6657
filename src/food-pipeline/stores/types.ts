/**
 * Store suggestion types shared by every store-finder backend.
 */

export interface StoreQuery {
  /** Product the user wants alternatives for. */
  productName?: string;
  postalCode?: string;
  latitude?: number;
  longitude?: number;
}

export interface StoreSuggestion {
  name: string;
  description?: string;
  address?: string;
  healthyAlternatives?: string;
  specialFeatures?: string;
  distanceKm?: number;
}

/** One way of suggesting stores. Backends must stop work when `signal` aborts. */
export interface StoreFinderBackend {
  readonly name: string;
  findStores(query: StoreQuery, signal: AbortSignal): Promise<StoreSuggestion[]>;
}

export type StoreSearchOutcome =
  | { status: 'ok'; backend: string; stores: StoreSuggestion[] }
  | { status: 'timeout'; backend: string; deadlineMs: number }
  | { status: 'error'; backend: string; message: string };
