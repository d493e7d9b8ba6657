// Shared fakes for tests: products, an in-memory food database, stubbed axios instances.

import axios, { AxiosError, type AxiosInstance, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import type { CategorySearch, FoodDatabase } from './food-pipeline/open-food-facts.js';
import type { Product } from './food-pipeline/types.js';

export function makeProduct(overrides: Partial<Product> = {}): Product {
  return {
    code: '0000000000000',
    name: 'Test Product',
    brand: 'Test Brand',
    servingSize: '30 g',
    countries: ['en:united-states'],
    categories: ['en:snacks'],
    nutrients: {},
    ...overrides,
  };
}

export class FakeFoodDatabase implements FoodDatabase {
  readonly products = new Map<string, Product>();
  searchResults: Product[] = [];
  searches: CategorySearch[] = [];
  failLookup = false;
  failSearch = false;

  constructor(products: Product[] = []) {
    for (const product of products) this.products.set(product.code, product);
  }

  async getProduct(barcode: string): Promise<Product | null> {
    if (this.failLookup) throw new Error('lookup unavailable');
    return this.products.get(barcode) ?? null;
  }

  async searchByCategory(search: CategorySearch): Promise<Product[]> {
    this.searches.push(search);
    if (this.failSearch) throw new Error('search unavailable');
    return this.searchResults;
  }
}

export interface StubReply {
  status?: number;
  data: unknown;
}

/** Axios instance whose adapter answers from `handler` instead of the network. */
export function stubHttp(handler: (config: InternalAxiosRequestConfig) => StubReply): {
  http: AxiosInstance;
  calls: InternalAxiosRequestConfig[];
} {
  const calls: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
      calls.push(config);
      const reply = handler(config);
      const status = reply.status ?? 200;
      const response: AxiosResponse = { data: reply.data, status, statusText: String(status), headers: {}, config };
      if (status >= 400) {
        throw new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_RESPONSE, config, null, response);
      }
      return response;
    },
  });
  return { http, calls };
}
