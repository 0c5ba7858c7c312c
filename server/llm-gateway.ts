/**
 * AI Gateway — the single entry point for model calls.
 *
 *   credential lookup → translate → one POST (30 s timeout) → normalize
 *
 * Every call yields an AICallResult; nothing thrown by the translator, the
 * network or the normalizer escapes `call()`. Each call is recorded in the
 * call log as metadata only (sizes, timing, status), never the text itself.
 */

import { randomUUID } from "crypto";
import {
  parseProvider,
  providerLabels,
  type AICallFailure,
  type AICallRequest,
  type AICallResult,
  type CallLogEntry,
} from "@shared/schema";
import { DEFAULT_BASE_URLS, type ProviderBaseUrls } from "./config";
import type { ProviderCredentialStore } from "./credentials";
import { translateRequest } from "./llm-request";
import { normalizeCallError, normalizeResponse } from "./llm-response";
import type { FetchFn } from "./model-catalog";
import type { IStorage } from "./storage";

export const AI_REQUEST_TIMEOUT_MS = 30_000;

// Rough chars-per-token ratio for estimation (varies by language/model)
const CHARS_PER_TOKEN = 4;

function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

export interface AIGatewayOptions {
  credentials: ProviderCredentialStore;
  storage: IStorage;
  fetch?: FetchFn;
  baseUrls?: ProviderBaseUrls;
  timeoutMs?: number;
}

export class AIGateway {
  private readonly credentials: ProviderCredentialStore;
  private readonly storage: IStorage;
  private readonly fetchFn: FetchFn;
  private readonly baseUrls: ProviderBaseUrls;
  private readonly timeoutMs: number;

  constructor(opts: AIGatewayOptions) {
    this.credentials = opts.credentials;
    this.storage = opts.storage;
    this.fetchFn = opts.fetch ?? globalThis.fetch;
    this.baseUrls = opts.baseUrls ?? DEFAULT_BASE_URLS;
    this.timeoutMs = opts.timeoutMs ?? AI_REQUEST_TIMEOUT_MS;
  }

  async call(req: AICallRequest): Promise<AICallResult> {
    const callId = randomUUID();
    const startTime = Date.now();

    let result: AICallResult;
    try {
      result = await this.dispatch(req);
    } catch (err) {
      result = normalizeCallError(err);
    }

    const durationMs = Date.now() - startTime;
    console.log(
      `[ai-gateway] ${callId} ${req.provider}/${req.model} ${result.kind === "success" ? "ok" : `error (${result.reason})`} in ${durationMs}ms`,
    );
    this.record(callId, req, result, durationMs);
    return result;
  }

  private async dispatch(req: AICallRequest): Promise<AICallResult> {
    const provider = parseProvider(req.provider);
    if (!provider) {
      return { kind: "failure", reason: "invalid_provider", error: "Invalid AI provider." };
    }

    const credential = this.credentials.resolve(provider);
    if ("missing" in credential) {
      return {
        kind: "failure",
        reason: "missing_credential",
        error: `${providerLabels[provider]} API Key not configured on server.`,
      };
    }

    const outbound = translateRequest({ ...req, provider }, credential.apiKey, this.baseUrls);

    // The timeout covers both the response headers and reading the body
    const signal = AbortSignal.timeout(this.timeoutMs);
    const response = await this.fetchFn(outbound.url, {
      method: "POST",
      headers: outbound.headers,
      body: JSON.stringify(outbound.body),
      signal,
    });
    const rawBody = await response.text();

    return normalizeResponse(provider, response.status, rawBody);
  }

  private record(callId: string, req: AICallRequest, result: AICallResult, durationMs: number): void {
    const promptText = (req.systemMessage ?? "") + req.prompt;
    const responseText = result.kind === "success" ? result.result : "";
    const failure: AICallFailure | null = result.kind === "failure" ? result : null;

    const entry: CallLogEntry = {
      callId,
      provider: parseProvider(req.provider) ?? req.provider,
      model: req.model,
      status: failure ? "error" : "success",
      reason: failure?.reason ?? null,
      errorMessage: failure?.error ?? null,
      promptCharacters: promptText.length,
      promptTokensEstimate: estimateTokens(promptText),
      responseCharacters: responseText.length,
      responseTokensEstimate: estimateTokens(responseText),
      temperature: req.temperature,
      maxTokens: req.maxTokens,
      durationMs,
      createdAt: new Date().toISOString(),
    };

    // Log asynchronously — don't block the response
    this.storage.insertCallLog(entry).catch((logErr: unknown) => {
      console.error("[ai-gateway] Failed to insert call log:", logErr instanceof Error ? logErr.message : logErr);
    });
  }
}
