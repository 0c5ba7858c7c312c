import { aiProviders, providerLabels, type AIProvider } from "@shared/schema";
import type { ServerConfig } from "./config";

export type CredentialLookup = { apiKey: string } | { missing: true };

/**
 * Read-only view over the provider keys loaded at startup.
 * A missing key is reported, never thrown.
 */
export class ProviderCredentialStore {
  private readonly keys: ReadonlyMap<AIProvider, string>;

  constructor(apiKeys: ServerConfig["apiKeys"]) {
    const keys = new Map<AIProvider, string>();
    for (const provider of aiProviders) {
      const key = apiKeys[provider];
      if (key) keys.set(provider, key);
    }
    this.keys = keys;
  }

  resolve(provider: AIProvider): CredentialLookup {
    const apiKey = this.keys.get(provider);
    return apiKey ? { apiKey } : { missing: true };
  }

  /** Key for the provider, or "" when none is configured. */
  apiKeyFor(provider: AIProvider): string {
    const lookup = this.resolve(provider);
    return "apiKey" in lookup ? lookup.apiKey : "";
  }

  logStatus(): void {
    console.log("[credentials] Key detection:");
    for (const provider of aiProviders) {
      console.log(`  ${providerLabels[provider]}: ${this.keys.has(provider) ? "SET" : "NOT SET"}`);
    }
  }
}
