/**
 * Server configuration — parsed once from the environment at startup.
 *
 * Provider keys are optional: a missing key only disables that provider.
 */

import { z } from "zod";

export interface ProviderBaseUrls {
  google: string;
  openai: string;
}

export const DEFAULT_BASE_URLS: ProviderBaseUrls = {
  google: "https://generativelanguage.googleapis.com",
  openai: "https://api.openai.com",
};

const optionalSecret = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const envSchema = z.object({
  GOOGLE_API_KEY: optionalSecret,
  OPENAI_API_KEY: optionalSecret,
  GOOGLE_API_BASE_URL: z.string().url().default(DEFAULT_BASE_URLS.google),
  OPENAI_API_BASE_URL: z.string().url().default(DEFAULT_BASE_URLS.openai),
  PORT: z.coerce.number().int().positive().default(5000),
});

export interface ServerConfig {
  port: number;
  apiKeys: {
    google?: string;
    openai?: string;
  };
  baseUrls: ProviderBaseUrls;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<ServerConfig> {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.errors
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid server configuration: ${issues}`);
  }

  const values = parsed.data;
  return Object.freeze({
    port: values.PORT,
    apiKeys: Object.freeze({
      google: values.GOOGLE_API_KEY,
      openai: values.OPENAI_API_KEY,
    }),
    baseUrls: Object.freeze({
      google: values.GOOGLE_API_BASE_URL.replace(/\/+$/, ""),
      openai: values.OPENAI_API_BASE_URL.replace(/\/+$/, ""),
    }),
  });
}
