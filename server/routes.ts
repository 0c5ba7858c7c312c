import type { Express, NextFunction, Request, Response } from "express";
import { createServer, type Server } from "http";
import { aiCallRequestSchema, callLogQuerySchema, toResponseBody } from "@shared/schema";
import { buildLandingPage } from "./landing";
import type { AIGateway } from "./llm-gateway";
import type { ModelCatalogCache } from "./model-catalog";
import type { IStorage } from "./storage";

export interface RouteDeps {
  gateway: AIGateway;
  catalogs: ModelCatalogCache;
  storage: IStorage;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function errorStatus(err: unknown): number {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return 500;
}

function wrapAsync(handler: AsyncHandler) {
  return (req: Request, res: Response) => {
    handler(req, res).catch((err: unknown) => {
      const status = errorStatus(err);
      const message = err instanceof Error ? err.message : "Unknown error";
      console.error(`[express] ${req.method} ${req.path} failed:`, message);
      if (!res.headersSent) {
        res.status(status).json({ error: message });
      }
    });
  };
}

export async function registerRoutes(app: Express, deps: RouteDeps): Promise<Server> {
  const { gateway, catalogs, storage } = deps;

  // ── Landing page: model catalogs embedded for the presentation layer ──
  app.get("/", wrapAsync(async (_req, res) => {
    const html = await buildLandingPage(await catalogs.getAll());
    res.status(200).set({ "Content-Type": "text/html" }).send(html);
  }));

  // ── Model catalogs ──
  app.get("/api/models", wrapAsync(async (_req, res) => {
    res.json(await catalogs.getAll());
  }));

  app.post("/api/models/refresh", wrapAsync(async (_req, res) => {
    res.json(await catalogs.refresh());
  }));

  // ── Model call ──
  app.post("/call-ai", wrapAsync(async (req, res) => {
    const parsed = aiCallRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: "Invalid request", details: parsed.error.errors });
      return;
    }

    const result = await gateway.call(parsed.data);
    res.json(toResponseBody(result));
  }));

  // ── Call history ──
  app.get("/api/call-logs", wrapAsync(async (req, res) => {
    const parsed = callLogQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ error: "Invalid query", details: parsed.error.errors });
      return;
    }

    const [logs, total] = await Promise.all([
      storage.listCallLogs(parsed.data),
      storage.countCallLogs(),
    ]);
    res.json({ logs, total });
  }));

  // Body-parser and other middleware errors answer JSON like the routes do
  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    const status = errorStatus(err);
    const message = err instanceof Error ? err.message : "Unknown error";
    if (status >= 500) console.error(`[express] ${req.method} ${req.path} failed:`, message);
    res.status(status).json({ error: message });
  });

  const httpServer = createServer(app);
  return httpServer;
}
