import "dotenv/config";
import { createApp, log } from "./app";
import { loadConfig } from "./config";
import { ProviderCredentialStore } from "./credentials";
import { AIGateway } from "./llm-gateway";
import { ModelCatalogCache, ModelCatalogFetcher } from "./model-catalog";
import { registerRoutes } from "./routes";
import { MemStorage } from "./storage";

async function main(): Promise<void> {
  const config = loadConfig();

  const credentials = new ProviderCredentialStore(config.apiKeys);
  credentials.logStatus();

  const storage = new MemStorage();
  const gateway = new AIGateway({ credentials, storage, baseUrls: config.baseUrls });
  const catalogs = new ModelCatalogCache(new ModelCatalogFetcher({ baseUrls: config.baseUrls }), credentials);

  const app = createApp();
  const server = await registerRoutes(app, { gateway, catalogs, storage });

  // Warm the catalog cache; failures only affect the provider concerned
  void catalogs.getAll();

  server.listen(config.port, "0.0.0.0", () => {
    log(`serving on port ${config.port}`);
  });
}

main().catch((err: unknown) => {
  console.error("[server] Failed to start:", err instanceof Error ? err.message : err);
  process.exit(1);
});
