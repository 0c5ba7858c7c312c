import { z } from "zod";

// Providers the gateway can talk to. Every provider branch in the server
// switches over this list exhaustively.
export const aiProviders = ["google", "openai"] as const;

export type AIProvider = typeof aiProviders[number];

export const providerLabels: Record<AIProvider, string> = {
  google: "Google Gemini",
  openai: "OpenAI",
};

/** Case-insensitive match against the known providers; null when unknown. */
export function parseProvider(value: string): AIProvider | null {
  const normalized = value.trim().toLowerCase();
  return aiProviders.find((p) => p === normalized) ?? null;
}

// ── Model catalog ──

export interface ModelDescriptor {
  id: string;
  displayName: string;
}

/**
 * Filtered, sorted model list for one provider.
 * When `error` is set, `models` is empty and `defaultModelId` is "".
 */
export interface ModelCatalog {
  models: ModelDescriptor[];
  defaultModelId: string;
  error?: string;
}

export type ModelCatalogMap = Record<AIProvider, ModelCatalog>;

// ── Call request (wire format is snake_case) ──

export const aiCallRequestSchema = z
  .object({
    // Left as a free string so unknown providers get a gateway result, not a 400
    provider: z.string(),
    model: z.string().min(1, "No AI model selected."),
    prompt: z.string(),
    system_message: z.string().nullable().optional(),
    temperature: z.number(),
    max_tokens: z.number().int(),
    enable_web_search: z.boolean(),
    request_json_output: z.boolean(),
  })
  .transform((body) => ({
    provider: body.provider,
    model: body.model,
    prompt: body.prompt,
    systemMessage: body.system_message ?? undefined,
    temperature: body.temperature,
    maxTokens: body.max_tokens,
    enableWebSearch: body.enable_web_search,
    requestJsonOutput: body.request_json_output,
  }));

export type AICallRequestBody = z.input<typeof aiCallRequestSchema>;

/** Canonical, provider-agnostic request. `provider` is not yet validated. */
export type AICallRequest = z.output<typeof aiCallRequestSchema>;

// ── Call result ──

export const failureReasons = [
  "missing_credential",
  "invalid_provider",
  "upstream_http",
  "safety_block",
  "timeout",
  "malformed_response",
  "network",
] as const;

export type FailureReason = typeof failureReasons[number];

export interface AICallSuccess {
  kind: "success";
  result: string;
}

export interface AICallFailure {
  kind: "failure";
  reason: FailureReason;
  error: string;
  details?: unknown;
}

export type AICallResult = AICallSuccess | AICallFailure;

/** JSON body returned by POST /call-ai */
export type AICallResponseBody =
  | { result: string }
  | { error: string; details?: unknown };

export function toResponseBody(result: AICallResult): AICallResponseBody {
  if (result.kind === "success") return { result: result.result };
  return result.details === undefined
    ? { error: result.error }
    : { error: result.error, details: result.details };
}

// ── Call log ──

export interface CallLogEntry {
  callId: string;
  provider: string;
  model: string;
  status: "success" | "error";
  reason: FailureReason | null;
  errorMessage: string | null;
  promptCharacters: number;
  promptTokensEstimate: number;
  responseCharacters: number;
  responseTokensEstimate: number;
  temperature: number;
  maxTokens: number;
  durationMs: number;
  createdAt: string;
}

export const callLogQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});
