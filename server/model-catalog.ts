/**
 * Model catalog — discovers the selectable models for each provider.
 *
 *   Google Gemini: GET /v1beta/models?key=…  keep generateContent-capable
 *                  "gemini" / "text-" models, sort by display name.
 *   OpenAI:        models.list() via the SDK, keep "gpt" / "text-davinci",
 *                  sort by id descending.
 *
 * The default model is a well-known id when present, else the first entry.
 * Failures, including a listing that outlives CATALOG_TIMEOUT_MS, become an
 * error catalog for that provider only.
 */

import OpenAI from "openai";
import { z } from "zod";
import {
  providerLabels,
  type AIProvider,
  type ModelCatalog,
  type ModelCatalogMap,
  type ModelDescriptor,
} from "@shared/schema";
import { DEFAULT_BASE_URLS, type ProviderBaseUrls } from "./config";
import type { ProviderCredentialStore } from "./credentials";
import { extractUpstreamMessage } from "./llm-response";

export type FetchFn = typeof fetch;

export const PREFERRED_DEFAULT_MODELS: Record<AIProvider, string> = {
  google: "gemini-1.5-pro-latest",
  openai: "gpt-3.5-turbo",
};

const GEMINI_PAGE_SIZE = 200;
export const CATALOG_TIMEOUT_MS = 10_000;

const geminiModelListSchema = z.object({
  models: z.array(
    z.object({
      name: z.string().default(""),
      displayName: z.string().optional(),
      supportedGenerationMethods: z.array(z.string()).optional(),
    }).passthrough(),
  ).default([]),
}).passthrough();

/** Non-2xx answer from a model-listing endpoint */
class CatalogHttpError extends Error {
  constructor(readonly status: number, readonly detail: string) {
    super(`${status} - ${detail}`);
    this.name = "CatalogHttpError";
  }
}

export function errorCatalog(error: string): ModelCatalog {
  return { models: [], defaultModelId: "", error };
}

function byCodePoint(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function pickDefault(provider: AIProvider, models: ModelDescriptor[]): string {
  const preferred = PREFERRED_DEFAULT_MODELS[provider];
  return models.find((m) => m.id === preferred)?.id ?? models[0]?.id ?? "";
}

// ---------------------------------------------------------------------------
// Fetcher
// ---------------------------------------------------------------------------

export interface ModelCatalogFetcherOptions {
  fetch?: FetchFn;
  baseUrls?: ProviderBaseUrls;
  timeoutMs?: number;
}

export class ModelCatalogFetcher {
  private readonly fetchFn: FetchFn;
  private readonly baseUrls: ProviderBaseUrls;
  private readonly timeoutMs: number;

  constructor(opts: ModelCatalogFetcherOptions = {}) {
    this.fetchFn = opts.fetch ?? globalThis.fetch;
    this.baseUrls = opts.baseUrls ?? DEFAULT_BASE_URLS;
    this.timeoutMs = opts.timeoutMs ?? CATALOG_TIMEOUT_MS;
  }

  async fetch(provider: AIProvider, apiKey: string): Promise<ModelCatalog> {
    const label = providerLabels[provider];
    if (!apiKey) {
      return errorCatalog(`${label} API Key not configured.`);
    }

    try {
      const models = await this.listModels(provider, apiKey);
      const defaultModelId = pickDefault(provider, models);
      console.log(`[models] Discovered ${models.length} ${label} models. Default: ${defaultModelId || "N/A"}`);
      return { models, defaultModelId };
    } catch (err) {
      const catalog = errorCatalog(`Error fetching ${label} models: ${describeCatalogError(err)}`);
      console.warn(`[models] ${catalog.error}`);
      return catalog;
    }
  }

  private listModels(provider: AIProvider, apiKey: string): Promise<ModelDescriptor[]> {
    switch (provider) {
      case "google":
        return this.listGeminiModels(apiKey);
      case "openai":
        return this.listOpenAIModels(apiKey);
    }
  }

  private async listGeminiModels(apiKey: string): Promise<ModelDescriptor[]> {
    const res = await this.fetchFn(
      `${this.baseUrls.google}/v1beta/models?key=${encodeURIComponent(apiKey)}&pageSize=${GEMINI_PAGE_SIZE}`,
      { signal: AbortSignal.timeout(this.timeoutMs) },
    );
    const text = await res.text();

    if (!res.ok) {
      let payload: unknown = text;
      try {
        payload = JSON.parse(text);
      } catch {
        // plain-text error body: report it as-is
      }
      throw new CatalogHttpError(res.status, extractUpstreamMessage(payload) ?? text);
    }

    const parsed = geminiModelListSchema.safeParse(JSON.parse(text));
    if (!parsed.success) {
      throw new Error("Unexpected model list response");
    }

    return parsed.data.models
      .filter((m) => m.supportedGenerationMethods?.includes("generateContent"))
      .map((m) => {
        const id = m.name.replace(/^models\//, "");
        return { id, displayName: m.displayName ?? id };
      })
      .filter((m) => m.id.includes("gemini") || m.id.startsWith("text-"))
      .sort((a, b) => byCodePoint(a.displayName, b.displayName));
  }

  private async listOpenAIModels(apiKey: string): Promise<ModelDescriptor[]> {
    const client = new OpenAI({
      apiKey,
      baseURL: `${this.baseUrls.openai}/v1`,
      fetch: this.fetchFn,
      maxRetries: 0,
      timeout: this.timeoutMs,
    });
    const page = await client.models.list();

    return page.data
      .map((m) => m.id)
      .filter((id) => id.includes("gpt") || id.includes("text-davinci"))
      .sort((a, b) => byCodePoint(b, a))
      .map((id) => ({ id, displayName: id }));
  }
}

function isTimeout(err: unknown): boolean {
  if (err instanceof OpenAI.APIConnectionTimeoutError) return true;
  const name = typeof err === "object" && err !== null && "name" in err ? err.name : undefined;
  return name === "TimeoutError" || name === "AbortError";
}

function describeCatalogError(err: unknown): string {
  if (err instanceof CatalogHttpError) return err.message;
  if (isTimeout(err)) return "request timed out";
  if (err instanceof OpenAI.APIError && err.status !== undefined) {
    const detail = extractUpstreamMessage({ error: err.error }) ?? stripStatusPrefix(err.message, err.status);
    return `${err.status} - ${detail}`;
  }
  return err instanceof Error ? err.message : String(err);
}

function stripStatusPrefix(message: string, status: number): string {
  const prefix = `${status} `;
  return message.startsWith(prefix) ? message.slice(prefix.length) : message;
}

// ---------------------------------------------------------------------------
// Cache — one catalog per provider for the server session
// ---------------------------------------------------------------------------

export class ModelCatalogCache {
  private readonly entries = new Map<AIProvider, Promise<ModelCatalog>>();

  constructor(
    private readonly fetcher: ModelCatalogFetcher,
    private readonly credentials: ProviderCredentialStore,
  ) {}

  /**
   * Cached catalog for the provider. Concurrent callers share one fetch;
   * error catalogs are handed back but not kept.
   */
  get(provider: AIProvider): Promise<ModelCatalog> {
    const cached = this.entries.get(provider);
    if (cached) return cached;

    const pending: Promise<ModelCatalog> = this.fetcher
      .fetch(provider, this.credentials.apiKeyFor(provider))
      .catch((err: unknown) =>
        errorCatalog(`Error fetching ${providerLabels[provider]} models: ${describeCatalogError(err)}`),
      )
      .then((catalog) => {
        if (catalog.error && this.entries.get(provider) === pending) {
          this.entries.delete(provider);
        }
        return catalog;
      });
    this.entries.set(provider, pending);
    return pending;
  }

  /** Catalogs for every provider, fetched concurrently. */
  async getAll(): Promise<ModelCatalogMap> {
    const [google, openai] = await Promise.all([this.get("google"), this.get("openai")]);
    return { google, openai };
  }

  invalidate(provider?: AIProvider): void {
    if (provider) {
      this.entries.delete(provider);
    } else {
      this.entries.clear();
    }
  }

  refresh(): Promise<ModelCatalogMap> {
    this.invalidate();
    return this.getAll();
  }
}
