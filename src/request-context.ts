/**
 * Request-scoped context for multi-user MCP clients.
 * When the client sends X-Scan-Country we run the request in this context so
 * alternative searches use that market instead of TARGET_COUNTRY.
 */
import { AsyncLocalStorage } from 'async_hooks';

interface ScanRequestContext {
  country?: string;
}

const storage = new AsyncLocalStorage<ScanRequestContext>();

/** Lowercased country tag without a language prefix: "en:France" becomes "france". */
export function normalizeCountry(country: string | undefined): string | undefined {
  return country?.trim().toLowerCase().replace(/^en:/, '').trim() || undefined;
}

export function runWithCountry<T>(country: string | undefined, fn: () => T): T {
  return storage.run({ country: normalizeCountry(country) }, fn);
}

export function getRequestCountry(): string | undefined {
  return storage.getStore()?.country;
}
