/**
 * Open Food Facts client.
 *
 * Uses the REST API directly (no SDK needed): the v0 product endpoint for
 * barcode lookups and `cgi/search.pl` for category searches. Responses are
 * validated with zod; individual product fields are parsed leniently so one
 * odd field does not discard the product.
 *
 * @see https://wiki.openfoodfacts.org/API
 */

import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import { describeError, FoodDatabaseError } from "./errors.js";
import { NUTRIENT_KEYS, type NutrientProfile, type Product } from "./types.js";

export interface CategorySearch {
  category: string;
  /** Country tag without language prefix, e.g. "united-states". */
  country: string;
  pageSize: number;
}

/** Read-only access to a product database. Implementations throw on transport or format errors. */
export interface FoodDatabase {
  getProduct(barcode: string): Promise<Product | null>;
  searchByCategory(search: CategorySearch): Promise<Product[]>;
}

export interface OpenFoodFactsOptions {
  baseUrl: string;
  userAgent: string;
  timeoutMs: number;
}

const optionalText = z.string().optional().catch(undefined);
const tagList = z.array(z.string()).catch([]);

const RawProductSchema = z.object({
  code: z.union([z.string(), z.number()]).optional().catch(undefined),
  product_name: optionalText,
  brands: optionalText,
  serving_size: optionalText,
  stores: optionalText,
  purchase_places: optionalText,
  categories_tags: tagList,
  countries_tags: tagList,
  nutriments: z.record(z.unknown()).catch({}),
});

type RawProduct = z.infer<typeof RawProductSchema>;

const ProductResponseSchema = z.object({
  status: z.union([z.number(), z.string()]).optional(),
  product: RawProductSchema.optional(),
});

const SearchResponseSchema = z.object({
  products: z.array(RawProductSchema).default([]),
});

const DECIMAL = /^(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/** A finite, non-negative number or plain decimal string; anything else is unknown. */
export function parseNutrientValue(value: unknown): number | null {
  let n: number;
  if (typeof value === 'number') {
    n = value;
  } else if (typeof value === 'string' && DECIMAL.test(value.trim())) {
    n = Number(value.trim());
  } else {
    return null;
  }
  return Number.isFinite(n) && n >= 0 ? n : null;
}

export function toNutrientProfile(nutriments: Record<string, unknown>): NutrientProfile {
  const profile: NutrientProfile = {};
  for (const key of NUTRIENT_KEYS) {
    const value = parseNutrientValue(nutriments[key]);
    if (value != null) profile[key] = value;
  }
  return profile;
}

function nonBlank(text: string | undefined): string | undefined {
  const trimmed = text?.trim();
  return trimmed ? trimmed : undefined;
}

export function toProduct(raw: RawProduct): Product {
  return {
    code: raw.code != null ? String(raw.code) : '',
    name: nonBlank(raw.product_name) ?? 'Unknown',
    brand: nonBlank(raw.brands) ?? 'Unknown Brand',
    servingSize: nonBlank(raw.serving_size) ?? 'Not specified',
    countries: raw.countries_tags,
    categories: raw.categories_tags,
    nutrients: toNutrientProfile(raw.nutriments),
    stores: nonBlank(raw.stores),
    purchasePlaces: nonBlank(raw.purchase_places),
  };
}

function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, what: string): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new FoodDatabaseError(`Unexpected ${what} response: ${result.error.issues[0]?.message ?? 'invalid'}`, {
      cause: result.error,
    });
  }
  return result.data;
}

export class OpenFoodFactsClient implements FoodDatabase {
  private readonly baseUrl: string;
  private readonly http: AxiosInstance;

  constructor(options: OpenFoodFactsOptions, http?: AxiosInstance) {
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.http =
      http ??
      axios.create({
        headers: { 'User-Agent': options.userAgent, Accept: 'application/json' },
        timeout: options.timeoutMs,
      });
  }

  async getProduct(barcode: string): Promise<Product | null> {
    let data: unknown;
    try {
      const resp = await this.http.get<unknown>(
        `${this.baseUrl}/api/v0/product/${encodeURIComponent(barcode)}.json`
      );
      data = resp.data;
    } catch (err) {
      if (axios.isAxiosError(err) && err.response?.status === 404) return null;
      throw err;
    }

    const parsed = parseOrThrow(ProductResponseSchema, data, 'product');
    if (Number(parsed.status) !== 1 || !parsed.product) return null;

    const product = toProduct(parsed.product);
    return { ...product, code: product.code || barcode };
  }

  async searchByCategory(search: CategorySearch): Promise<Product[]> {
    const resp = await this.http.get<unknown>(`${this.baseUrl}/cgi/search.pl`, {
      params: {
        action: 'process',
        tagtype_0: 'categories',
        tag_contains_0: 'contains',
        tag_0: search.category,
        tagtype_1: 'countries',
        tag_contains_1: 'contains',
        tag_1: search.country,
        sort_by: 'nutrition_grades',
        page_size: search.pageSize,
        json: 1,
      },
    });
    const parsed = parseOrThrow(SearchResponseSchema, resp.data, 'search');
    return parsed.products.map(toProduct);
  }
}

/**
 * Look up a product by barcode. Unknown barcodes and failed requests both
 * yield null; failures are logged.
 */
export async function lookupProduct(barcode: string, database: FoodDatabase): Promise<Product | null> {
  try {
    return await database.getProduct(barcode);
  } catch (err) {
    console.error(`[off] Error fetching barcode '${barcode}':`, describeError(err));
    return null;
  }
}
