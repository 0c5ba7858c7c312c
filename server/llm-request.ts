/**
 * Request translation — canonical call request → provider HTTP request.
 *
 * Pure: no I/O. One branch per provider; the gateway sends whatever this
 * returns as a single POST.
 *
 *   Google Gemini: key in the query string, system message folded into the
 *                  user text, JSON mode only on gemini-1.5 models.
 *   OpenAI:        bearer auth, system message as its own leading message,
 *                  JSON mode on every model.
 */

import type OpenAI from "openai";
import type { AICallRequest, AIProvider } from "@shared/schema";
import { DEFAULT_BASE_URLS, type ProviderBaseUrls } from "./config";

export const JSON_INSTRUCTION = "\n\nRespond strictly in JSON format.";

/** A call request whose provider has already been validated. */
export type ProviderCallRequest = Omit<AICallRequest, "provider"> & { provider: AIProvider };

export interface ProviderHttpRequest {
  url: string;
  headers: Record<string, string>;
  body: GeminiGenerateBody | OpenAI.Chat.ChatCompletionCreateParamsNonStreaming;
}

// ---------------------------------------------------------------------------
// Gemini request body
// ---------------------------------------------------------------------------

export interface GeminiGenerateBody {
  contents: Array<{ role: "user"; parts: Array<{ text: string }> }>;
  generationConfig: {
    temperature: number;
    maxOutputTokens: number;
    responseMimeType?: "application/json";
  };
  tools?: Array<{ googleSearchRetrieval: Record<string, never> }>;
}

function mentionsJson(...texts: Array<string | undefined>): boolean {
  return texts.some((text) => (text ?? "").toLowerCase().includes("json"));
}

function buildGeminiRequest(
  req: ProviderCallRequest,
  apiKey: string,
  baseUrl: string,
): ProviderHttpRequest {
  let text = req.systemMessage
    ? `${req.systemMessage}\n\nUser Query: ${req.prompt}`
    : req.prompt;

  const generationConfig: GeminiGenerateBody["generationConfig"] = {
    temperature: req.temperature,
    maxOutputTokens: req.maxTokens,
  };

  if (req.requestJsonOutput && req.model.includes("gemini-1.5")) {
    generationConfig.responseMimeType = "application/json";
    if (!mentionsJson(text, req.systemMessage)) {
      text += JSON_INSTRUCTION;
    }
  }

  const body: GeminiGenerateBody = {
    contents: [{ role: "user", parts: [{ text }] }],
    generationConfig,
  };
  if (req.enableWebSearch) {
    body.tools = [{ googleSearchRetrieval: {} }];
  }

  return {
    url: `${baseUrl}/v1beta/models/${encodeURIComponent(req.model)}:generateContent?key=${encodeURIComponent(apiKey)}`,
    headers: { "Content-Type": "application/json" },
    body,
  };
}

// ---------------------------------------------------------------------------
// OpenAI request body
// ---------------------------------------------------------------------------

function buildOpenAIRequest(
  req: ProviderCallRequest,
  apiKey: string,
  baseUrl: string,
): ProviderHttpRequest {
  // The user message carries the original prompt; the system message is never merged in
  let userContent = req.prompt;
  if (req.requestJsonOutput && !mentionsJson(req.prompt, req.systemMessage)) {
    userContent += JSON_INSTRUCTION;
  }

  const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
  if (req.systemMessage) {
    messages.push({ role: "system", content: req.systemMessage });
  }
  messages.push({ role: "user", content: userContent });

  const body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
    model: req.model,
    messages,
    temperature: req.temperature,
    max_tokens: req.maxTokens,
  };
  if (req.requestJsonOutput) {
    body.response_format = { type: "json_object" };
  }

  return {
    url: `${baseUrl}/v1/chat/completions`,
    headers: {
      "Content-Type": "application/json",
      Authorization: `Bearer ${apiKey}`,
    },
    body,
  };
}

// ---------------------------------------------------------------------------
// Dispatch
// ---------------------------------------------------------------------------

export function translateRequest(
  req: ProviderCallRequest,
  apiKey: string,
  baseUrls: ProviderBaseUrls = DEFAULT_BASE_URLS,
): ProviderHttpRequest {
  switch (req.provider) {
    case "google":
      return buildGeminiRequest(req, apiKey, baseUrls.google);
    case "openai":
      return buildOpenAIRequest(req, apiKey, baseUrls.openai);
  }
}
