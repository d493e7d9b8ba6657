/**
 * Store suggestions from a generative text model (Google Gemini).
 *
 * The model is asked for a JSON array of stores; the first `[` ... last `]`
 * span of the reply is parsed and validated.
 */

import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import type { StoreFinderBackend, StoreQuery, StoreSuggestion } from "./types.js";

const GEMINI_BASE_URL = "https://generativelanguage.googleapis.com/v1beta";

const textOrList = z
  .union([z.string(), z.array(z.string())])
  .optional()
  .transform((value) => (Array.isArray(value) ? value.join(', ') : value));

const SuggestedStoreSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  healthy_alternatives: textOrList,
  special_features: textOrList,
});

const GenerateContentResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).default([]),
          })
          .optional(),
      })
    )
    .default([]),
});

export interface GenerativeStoreFinderOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
  baseUrl?: string;
}

export function buildStorePrompt(productName: string): string {
  return `Suggest 5 common stores that typically carry healthier alternatives to ${productName}.
Focus on:
- Health food stores
- Organic grocery stores
- Natural food markets
- Specialty health stores

For each store provide:
- Store name
- Brief description of why this store is a good option
- Types of healthy alternatives they typically carry
- Any special features (e.g., organic section, bulk foods, etc.)

Format the response as a JSON array with these keys for each store:
- name
- description
- healthy_alternatives
- special_features

Keep descriptions concise but informative.`;
}

/**
 * Extract the store list from a model reply.
 * @throws Error when the reply holds no JSON array of stores
 */
export function parseStoreSuggestions(reply: string): StoreSuggestion[] {
  const start = reply.indexOf('[');
  const end = reply.lastIndexOf(']');
  if (start < 0 || end < start) {
    throw new Error('Model reply contains no JSON array');
  }
  const parsed = z.array(SuggestedStoreSchema).parse(JSON.parse(reply.slice(start, end + 1)));
  return parsed.map((store) => ({
    name: store.name,
    description: store.description,
    healthyAlternatives: store.healthy_alternatives,
    specialFeatures: store.special_features,
  }));
}

export class GenerativeStoreFinder implements StoreFinderBackend {
  readonly name = 'generative';
  private readonly http: AxiosInstance;

  constructor(private readonly options: GenerativeStoreFinderOptions, http?: AxiosInstance) {
    this.http = http ?? axios.create({ timeout: options.timeoutMs });
  }

  async findStores(query: StoreQuery, signal: AbortSignal): Promise<StoreSuggestion[]> {
    const productName = query.productName?.trim();
    if (!productName) {
      throw new Error('A product name is required for generated store suggestions');
    }

    const baseUrl = (this.options.baseUrl ?? GEMINI_BASE_URL).replace(/\/$/, '');
    const resp = await this.http.post<unknown>(
      `${baseUrl}/models/${encodeURIComponent(this.options.model)}:generateContent`,
      { contents: [{ parts: [{ text: buildStorePrompt(productName) }] }] },
      {
        params: { key: this.options.apiKey },
        headers: { 'Content-Type': 'application/json' },
        signal,
      }
    );

    const body = GenerateContentResponseSchema.parse(resp.data);
    const text = (body.candidates[0]?.content?.parts ?? []).map((part) => part.text ?? '').join('');
    return parseStoreSuggestions(text);
  }
}
