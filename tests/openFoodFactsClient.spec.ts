// tests/openFoodFactsClient.spec.ts
// Food lookup against an in-process axios adapter

import axios, { AxiosError, AxiosResponse, InternalAxiosRequestConfig } from "axios";
import { logger } from "../src/lib/logger";
import { OpenFoodFactsClient } from "../src/services/openFoodFactsClient";

const SEARCH_URL = "https://food.test/cgi/search.pl";
const PRODUCT_URL = "https://food.test/api/v2/product/";

type Reply = (config: InternalAxiosRequestConfig) => Promise<AxiosResponse>;

function client(reply: Reply) {
  const requests: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    adapter: (config) => {
      requests.push(config);
      return reply(config);
    },
  });
  const lookup = new OpenFoodFactsClient({
    searchUrl: SEARCH_URL,
    productUrl: PRODUCT_URL,
    timeoutMs: 50,
    pageSize: 5,
    http,
  });
  return { lookup, requests };
}

function ok(data: unknown): Reply {
  return async (config) => ({ data, status: 200, statusText: "OK", headers: {}, config });
}

function fail(code: string): Reply {
  return async (config) => {
    throw new AxiosError("request failed", code, config);
  };
}

const yogurt = {
  product_name: "Greek Yogurt",
  brands: "Acme",
  nutriments: {
    "energy-kcal_100g": 97,
    proteins_100g: 9,
    carbohydrates_100g: 3.6,
    fat_100g: 5,
    sodium_100g: 0.036,
    sugars_100g: 3.6,
    fiber_100g: 0,
  },
};

describe("OpenFoodFactsClient.search", () => {
  it("sends the search parameters", async () => {
    const { lookup, requests } = client(ok({ products: [] }));
    await lookup.search("  greek yogurt ");

    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe(SEARCH_URL);
    expect(requests[0].params).toEqual({
      search_terms: "greek yogurt",
      search_simple: 1,
      action: "process",
      json: 1,
      page_size: 5,
    });
  });

  it("maps usable products and skips the rest", async () => {
    const { lookup } = client(
      ok({
        products: [
          yogurt,
          { product_name: "No energy", nutriments: {} },
          { brands: "Nameless", nutriments: { "energy-kcal_100g": 10 } },
          { product_name_en: "Oat Milk", product_name: "Haferdrink", nutriments: { "energy-kcal_100g": "46", proteins_100g: "1" } },
        ],
      })
    );

    const results = await lookup.search("milk");
    expect(results.map((r) => r.name)).toEqual(["Greek Yogurt", "Oat Milk"]);
    expect(results[0].brand).toBe("Acme");
    expect(results[0].sodiumPer100g).toBeCloseTo(36);
    expect(results[1]).toEqual({
      name: "Oat Milk",
      brand: null,
      caloriesPer100g: 46,
      proteinPer100g: 1,
      carbsPer100g: 0,
      fatsPer100g: 0,
      sodiumPer100g: 0,
      sugarPer100g: 0,
      fiberPer100g: 0,
    });
  });

  it("returns nothing for a blank query without calling out", async () => {
    const { lookup, requests } = client(ok({ products: [yogurt] }));
    expect(await lookup.search("   ")).toEqual([]);
    expect(requests).toHaveLength(0);
  });

  it("returns nothing on a network failure", async () => {
    const { lookup } = client(fail("ECONNABORTED"));
    expect(await lookup.search("yogurt")).toEqual([]);
  });

  it("logs the failure as an error object", async () => {
    const warn = jest.spyOn(logger, "warn");
    try {
      const { lookup } = client(fail("ECONNRESET"));
      await lookup.search("yogurt");

      expect(warn).toHaveBeenCalledTimes(1);
      const [fields, message] = warn.mock.calls[0];
      expect(message).toBe("[food-api] search failed");
      expect(fields).toEqual({ err: expect.any(AxiosError), query: "yogurt" });
      expect(fields).not.toHaveProperty("msg");
    } finally {
      warn.mockRestore();
    }
  });

  it("returns nothing for a malformed body", async () => {
    const { lookup } = client(ok({ products: "nope" }));
    expect(await lookup.search("yogurt")).toEqual([]);
  });
});

describe("OpenFoodFactsClient.lookupBarcode", () => {
  it("fetches the product document for the code", async () => {
    const { lookup, requests } = client(ok({ status: 1, product: yogurt }));
    const result = await lookup.lookupBarcode("0123456789012");

    expect(requests[0].url).toBe("https://food.test/api/v2/product/0123456789012.json");
    expect(result?.name).toBe("Greek Yogurt");
    expect(result?.caloriesPer100g).toBe(97);
  });

  it("returns null when the product is unknown", async () => {
    const { lookup } = client(ok({ status: 0, status_verbose: "product not found" }));
    expect(await lookup.lookupBarcode("0123456789012")).toBeNull();
  });

  it("returns null for a server error", async () => {
    const { lookup } = client(fail("ERR_BAD_RESPONSE"));
    expect(await lookup.lookupBarcode("0123456789012")).toBeNull();
  });

  it("logs a barcode failure with its error", async () => {
    const warn = jest.spyOn(logger, "warn");
    try {
      const { lookup } = client(fail("ETIMEDOUT"));
      await lookup.lookupBarcode("0123456789012");

      expect(warn).toHaveBeenCalledWith(
        { err: expect.any(AxiosError), barcode: "0123456789012" },
        "[food-api] barcode lookup failed"
      );
    } finally {
      warn.mockRestore();
    }
  });

  it("does not look up something that is not a barcode", async () => {
    const { lookup, requests } = client(ok({ status: 1, product: yogurt }));
    expect(await lookup.lookupBarcode("abc")).toBeNull();
    expect(requests).toHaveLength(0);
  });
});
