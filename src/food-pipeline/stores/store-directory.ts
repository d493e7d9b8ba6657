/**
 * Static store directory keyed by postal-code prefix.
 *
 * The longest matching prefix wins; queries without a postal code, or with one
 * no entry matches, get the directory's default list.
 */

import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import type { StoreFinderBackend, StoreQuery, StoreSuggestion } from "./types.js";

const StoreSchema = z.object({
  name: z.string().min(1),
  address: z.string().optional(),
  description: z.string().optional(),
  healthyAlternatives: z.string().optional(),
  specialFeatures: z.string().optional(),
});

const DirectorySchema = z.object({
  defaults: z.array(StoreSchema).default([]),
  regions: z
    .array(
      z.object({
        postalPrefix: z.string().min(1),
        stores: z.array(StoreSchema),
      })
    )
    .default([]),
});

export type StoreDirectory = z.infer<typeof DirectorySchema>;

export const DEFAULT_DIRECTORY_PATH = fileURLToPath(new URL('../../../data/store-directory.json', import.meta.url));

export function normalizePostalCode(postalCode: string): string {
  return postalCode.replace(/[\s-]/g, '').toUpperCase();
}

export async function loadStoreDirectory(path: string = DEFAULT_DIRECTORY_PATH): Promise<StoreDirectory> {
  const raw: unknown = JSON.parse(await readFile(path, 'utf8'));
  return DirectorySchema.parse(raw);
}

export class StoreDirectoryFinder implements StoreFinderBackend {
  readonly name = 'directory';
  private readonly path: string;
  private directory: Promise<StoreDirectory> | undefined;

  constructor(source: StoreDirectory | string = DEFAULT_DIRECTORY_PATH) {
    if (typeof source === 'string') {
      this.path = source;
    } else {
      this.path = DEFAULT_DIRECTORY_PATH;
      this.directory = Promise.resolve(source);
    }
  }

  private load(): Promise<StoreDirectory> {
    // Retry on the next call if the file could not be read.
    this.directory ??= loadStoreDirectory(this.path).catch((err: unknown) => {
      this.directory = undefined;
      throw err;
    });
    return this.directory;
  }

  async findStores(query: StoreQuery, signal: AbortSignal): Promise<StoreSuggestion[]> {
    signal.throwIfAborted();
    const directory = await this.load();
    signal.throwIfAborted();

    const postal = query.postalCode ? normalizePostalCode(query.postalCode) : '';
    let best: StoreDirectory['regions'][number] | undefined;
    for (const region of directory.regions) {
      const prefix = normalizePostalCode(region.postalPrefix);
      if (postal.startsWith(prefix) && prefix.length > (best ? normalizePostalCode(best.postalPrefix).length : 0)) {
        best = region;
      }
    }
    return (best?.stores ?? directory.defaults).map((store) => ({ ...store }));
  }
}
