/**
 * Response normalization — provider HTTP response → AICallResult.
 *
 * Never throws. Missing fields along the text path default to "" instead of
 * surfacing a parse error; provider-specific shapes stop here.
 */

import { z } from "zod";
import type { AICallFailure, AICallResult, AIProvider } from "@shared/schema";

export const TIMEOUT_MESSAGE = "Request to AI provider timed out.";
export const SAFETY_BLOCK_MESSAGE = "Content blocked by API due to safety ratings.";

// Lenient shapes: unknown fields kept
const upstreamErrorSchema = z.object({
  error: z.object({ message: z.string() }).passthrough(),
}).passthrough();

// Only the first candidate / choice is read, one level at a time, so a stray
// field elsewhere in the payload cannot hide the text.
const geminiEnvelopeSchema = z.object({ candidates: z.array(z.unknown()) }).passthrough();
const geminiCandidateSchema = z.object({
  finishReason: z.unknown().optional(),
  safetyRatings: z.unknown().optional(),
  content: z.unknown().optional(),
}).passthrough();
const geminiContentSchema = z.object({ parts: z.array(z.unknown()) }).passthrough();
const geminiPartSchema = z.object({ text: z.string() }).passthrough();

const openaiEnvelopeSchema = z.object({ choices: z.array(z.unknown()) }).passthrough();
const openaiChoiceSchema = z.object({ message: z.unknown().optional() }).passthrough();
const openaiMessageSchema = z.object({ content: z.string() }).passthrough();

function pick<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T | undefined {
  const parsed = schema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

function failure(reason: AICallFailure["reason"], error: string, details?: unknown): AICallFailure {
  return details === undefined ? { kind: "failure", reason, error } : { kind: "failure", reason, error, details };
}

function parseJson(rawBody: string): { ok: true; value: unknown } | { ok: false; message: string } {
  try {
    return { ok: true, value: JSON.parse(rawBody) };
  } catch (err) {
    return { ok: false, message: err instanceof Error ? err.message : String(err) };
  }
}

/** Conventional `error.message` from an upstream error payload, if there is one. */
export function extractUpstreamMessage(payload: unknown): string | undefined {
  const parsed = upstreamErrorSchema.safeParse(payload);
  return parsed.success ? parsed.data.error.message : undefined;
}

function extractGeminiResult(payload: unknown): AICallResult {
  const candidate = pick(geminiCandidateSchema, pick(geminiEnvelopeSchema, payload)?.candidates[0]);
  if (candidate?.finishReason === "SAFETY") {
    return failure("safety_block", SAFETY_BLOCK_MESSAGE, candidate.safetyRatings);
  }
  const part = pick(geminiPartSchema, pick(geminiContentSchema, candidate?.content)?.parts[0]);
  return { kind: "success", result: part?.text ?? "" };
}

function extractOpenAIResult(payload: unknown): AICallResult {
  const choice = pick(openaiChoiceSchema, pick(openaiEnvelopeSchema, payload)?.choices[0]);
  const message = pick(openaiMessageSchema, choice?.message);
  return { kind: "success", result: message?.content ?? "" };
}

export function normalizeResponse(
  provider: AIProvider,
  httpStatus: number,
  rawBody: string,
): AICallResult {
  const json = parseJson(rawBody);

  if (httpStatus < 200 || httpStatus >= 300) {
    const payload = json.ok ? json.value : rawBody;
    const message = extractUpstreamMessage(payload) ?? rawBody;
    return failure("upstream_http", `API Error (${httpStatus}): ${message}`, payload);
  }

  if (!json.ok) {
    return failure("malformed_response", `Error calling AI provider: ${json.message}`);
  }

  switch (provider) {
    case "google":
      return extractGeminiResult(json.value);
    case "openai":
      return extractOpenAIResult(json.value);
  }
}

/** Converts an exception thrown around the outbound call into a result. */
export function normalizeCallError(err: unknown): AICallFailure {
  // fetch rejects with the signal's DOMException once AbortSignal.timeout fires
  const name = typeof err === "object" && err !== null && "name" in err ? err.name : undefined;
  if (name === "TimeoutError" || name === "AbortError") {
    return failure("timeout", TIMEOUT_MESSAGE);
  }
  const description = err instanceof Error ? err.message : String(err);
  return failure("network", `Error calling AI provider: ${description}`);
}
