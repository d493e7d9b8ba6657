/**
 * Nearby stores from OpenStreetMap through the Overpass API.
 */

import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import type { StoreFinderBackend, StoreQuery, StoreSuggestion } from "./types.js";

const SHOP_TYPES = ['health_food', 'organic', 'supermarket', 'greengrocer'];
const MAX_RESULTS = 10;
const EARTH_RADIUS_KM = 6371;

const OverpassResponseSchema = z.object({
  elements: z
    .array(
      z.object({
        lat: z.number().optional(),
        lon: z.number().optional(),
        center: z.object({ lat: z.number(), lon: z.number() }).optional(),
        tags: z.record(z.string()).default({}),
      })
    )
    .default([]),
});

type OverpassElement = z.infer<typeof OverpassResponseSchema>['elements'][number];

export interface MapSearchStoreFinderOptions {
  url: string;
  radiusM: number;
  timeoutMs: number;
}

/** Great-circle distance in kilometres. */
export function haversineKm(lat1: number, lon1: number, lat2: number, lon2: number): number {
  const rad = (deg: number) => (deg * Math.PI) / 180;
  const dLat = rad(lat2 - lat1);
  const dLon = rad(lon2 - lon1);
  const a = Math.sin(dLat / 2) ** 2 + Math.cos(rad(lat1)) * Math.cos(rad(lat2)) * Math.sin(dLon / 2) ** 2;
  return 2 * EARTH_RADIUS_KM * Math.asin(Math.sqrt(a));
}

export function buildOverpassQuery(latitude: number, longitude: number, radiusM: number): string {
  const filter = `["shop"~"^(${SHOP_TYPES.join('|')})$"](around:${radiusM},${latitude},${longitude})`;
  return `[out:json][timeout:10];(node${filter};way${filter};);out center ${MAX_RESULTS * 3};`;
}

function formatAddress(tags: Record<string, string>): string | undefined {
  const street = [tags['addr:housenumber'], tags['addr:street']].filter(Boolean).join(' ');
  const parts = [street, tags['addr:city']].filter(Boolean);
  return parts.length > 0 ? parts.join(', ') : undefined;
}

function toSuggestion(element: OverpassElement, latitude: number, longitude: number): StoreSuggestion | null {
  const name = element.tags.name?.trim();
  const lat = element.lat ?? element.center?.lat;
  const lon = element.lon ?? element.center?.lon;
  if (!name || lat == null || lon == null) return null;

  const shop = element.tags.shop?.replace(/_/g, ' ');
  return {
    name,
    address: formatAddress(element.tags),
    description: shop ? `${shop} store` : undefined,
    specialFeatures: element.tags.organic === 'only' ? 'organic only' : undefined,
    distanceKm: Math.round(haversineKm(latitude, longitude, lat, lon) * 100) / 100,
  };
}

export class MapSearchStoreFinder implements StoreFinderBackend {
  readonly name = 'map-search';
  private readonly http: AxiosInstance;

  constructor(private readonly options: MapSearchStoreFinderOptions, http?: AxiosInstance) {
    this.http = http ?? axios.create({ timeout: options.timeoutMs });
  }

  async findStores(query: StoreQuery, signal: AbortSignal): Promise<StoreSuggestion[]> {
    const { latitude, longitude } = query;
    if (latitude == null || longitude == null) {
      throw new Error('Map search needs latitude and longitude');
    }

    const resp = await this.http.post<unknown>(
      this.options.url,
      new URLSearchParams({ data: buildOverpassQuery(latitude, longitude, this.options.radiusM) }).toString(),
      { headers: { 'Content-Type': 'application/x-www-form-urlencoded' }, signal }
    );

    const { elements } = OverpassResponseSchema.parse(resp.data);
    const stores: StoreSuggestion[] = [];
    const seen = new Set<string>();
    for (const element of elements) {
      const store = toSuggestion(element, latitude, longitude);
      if (!store || seen.has(store.name)) continue;
      seen.add(store.name);
      stores.push(store);
    }
    return stores.sort((a, b) => (a.distanceKm ?? 0) - (b.distanceKm ?? 0)).slice(0, MAX_RESULTS);
  }
}
