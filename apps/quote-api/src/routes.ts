import { Router } from "express";
import type { ApiInfo, HealthResponse } from "@quote-api/types";
import { QuoteCatalog } from "./catalog";
import { StatsProvider } from "./stats";

export interface RouteDeps {
  catalog: QuoteCatalog;
  stats: StatsProvider;
}

export const API_INFO: ApiInfo = {
  message: "Quote API",
  endpoints: {
    randomQuote: "/quote/random",
    quotesByTag: "/quotes/tag/{tag}",
    allQuotes: "/quotes",
    stats: "/stats",
  },
};

export function createRouter({ catalog, stats }: RouteDeps): Router {
  const router = Router();
  const bootedAt = Date.now();

  router.get("/", (_req, res) => {
    res.json(API_INFO);
  });

  router.get("/health", (_req, res) => {
    const ts = Date.now();
    res.json({ ok: true, pid: process.pid, ts, uptimeMs: ts - bootedAt } satisfies HealthResponse);
  });

  router.get("/quote/random", (_req, res) => {
    res.json(catalog.random());
  });

  // Throws TagNotFoundError on a miss; the error handler turns it into a 404
  router.get("/quotes/tag/:tag", (req, res) => {
    res.json(catalog.byTag(req.params.tag));
  });

  router.get("/quotes", (_req, res) => {
    res.json(catalog.all());
  });

  router.get("/stats", (_req, res) => {
    res.json(stats());
  });

  return router;
}
