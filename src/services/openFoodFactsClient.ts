// src/services/openFoodFactsClient.ts
// Open Food Facts text search and barcode lookup. Every failure (timeout,
// non-2xx, malformed body, nothing usable) comes back as "no result".

import axios, { AxiosInstance } from "axios";
import { z } from "zod";
import type { FoodCandidate } from "../domain/types";
import type { Env } from "../env";
import { logger } from "../lib/logger";

export interface FoodLookup {
  search(query: string): Promise<FoodCandidate[]>;
  lookupBarcode(barcode: string): Promise<FoodCandidate | null>;
}

export interface OpenFoodFactsOptions {
  searchUrl: string;
  productUrl: string;
  timeoutMs: number;
  pageSize: number;
  http?: AxiosInstance;
}

const productSchema = z.object({
  product_name: z.string().optional().nullable(),
  product_name_en: z.string().optional().nullable(),
  brands: z.string().optional().nullable(),
  nutriments: z.record(z.unknown()).optional().nullable(),
});
type OffProduct = z.infer<typeof productSchema>;

const searchResponseSchema = z.object({
  products: z.array(z.unknown()).optional().default([]),
});

const productResponseSchema = z.object({
  status: z.union([z.number(), z.string()]).optional(),
  product: z.unknown().optional(),
});

const barcodeSchema = z.string().regex(/^\d{8,14}$/, "Barcode must be 8 to 14 digits");

function toNumber(value: unknown): number {
  const n = typeof value === "number" ? value : typeof value === "string" ? parseFloat(value) : NaN;
  return Number.isFinite(n) ? n : 0;
}

/**
 * Maps an Open Food Facts product to a candidate. Products without a name or
 * without an energy value are unusable and map to null; other missing
 * nutrients count as 0.
 */
export function toFoodCandidate(product: OffProduct): FoodCandidate | null {
  const name = product.product_name_en || product.product_name;
  const nutriments = product.nutriments ?? {};
  const energy = nutriments["energy-kcal_100g"];
  if (!name || energy === undefined || energy === null) return null;

  return {
    name,
    brand: product.brands || null,
    caloriesPer100g: toNumber(energy),
    proteinPer100g: toNumber(nutriments["proteins_100g"]),
    carbsPer100g: toNumber(nutriments["carbohydrates_100g"]),
    fatsPer100g: toNumber(nutriments["fat_100g"]),
    // reported in g/100 g
    sodiumPer100g: toNumber(nutriments["sodium_100g"]) * 1000,
    sugarPer100g: toNumber(nutriments["sugars_100g"]),
    fiberPer100g: toNumber(nutriments["fiber_100g"]),
  };
}

function parseProduct(raw: unknown): FoodCandidate | null {
  const parsed = productSchema.safeParse(raw);
  return parsed.success ? toFoodCandidate(parsed.data) : null;
}

export class OpenFoodFactsClient implements FoodLookup {
  private readonly http: AxiosInstance;

  constructor(private readonly options: OpenFoodFactsOptions) {
    this.http =
      options.http ??
      axios.create({
        timeout: options.timeoutMs,
        headers: { Accept: "application/json", "User-Agent": "nutri-journal/1.0" },
      });
  }

  async search(query: string): Promise<FoodCandidate[]> {
    const term = query.trim();
    if (!term) return [];

    try {
      const response = await this.http.get<unknown>(this.options.searchUrl, {
        timeout: this.options.timeoutMs,
        params: {
          search_terms: term,
          search_simple: 1,
          action: "process",
          json: 1,
          page_size: this.options.pageSize,
        },
      });

      const body = searchResponseSchema.safeParse(response.data);
      if (!body.success) {
        logger.warn({ query: term }, "[food-api] malformed search response");
        return [];
      }

      const candidates = body.data.products
        .map(parseProduct)
        .filter((c): c is FoodCandidate => c !== null);
      logger.debug({ query: term, found: body.data.products.length, usable: candidates.length }, "[food-api] search");
      return candidates;
    } catch (err) {
      logger.warn({ err, query: term }, "[food-api] search failed");
      return [];
    }
  }

  async lookupBarcode(barcode: string): Promise<FoodCandidate | null> {
    const code = barcodeSchema.safeParse(barcode.trim());
    if (!code.success) return null;

    try {
      const url = `${this.options.productUrl.replace(/\/+$/, "")}/${encodeURIComponent(code.data)}.json`;
      const response = await this.http.get<unknown>(url, { timeout: this.options.timeoutMs });

      const body = productResponseSchema.safeParse(response.data);
      if (!body.success || Number(body.data.status) !== 1 || body.data.product === undefined) {
        logger.info({ barcode: code.data }, "[food-api] barcode not found");
        return null;
      }
      return parseProduct(body.data.product);
    } catch (err) {
      logger.warn({ err, barcode: code.data }, "[food-api] barcode lookup failed");
      return null;
    }
  }
}

export function createFoodLookup(env: Env, http?: AxiosInstance): FoodLookup {
  return new OpenFoodFactsClient({
    searchUrl: env.FOOD_API_SEARCH_URL,
    productUrl: env.FOOD_API_PRODUCT_URL,
    timeoutMs: env.FOOD_API_TIMEOUT_MS,
    pageSize: env.FOOD_API_PAGE_SIZE,
    http,
  });
}
