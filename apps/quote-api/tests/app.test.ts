import { describe, it, expect, beforeAll, afterAll, vi } from "vitest";
import { createApp } from "../src/app";
import { QuoteCatalog, loadDefaultCatalog } from "../src/catalog";
import { loadConfig } from "../src/config";
import { API_INFO } from "../src/routes";
import { createStatsProvider } from "../src/stats";
import { TestClient, createTestClient } from "./helpers/testClient";
import { captureLogger, sampleQuotes, sequence, silentLogger } from "./helpers/fixtures";

const MB = 1024 * 1024;
const noLimit = { rateLimit: { windowMs: 60_000, max: 0 } };

describe("Quote API over HTTP", () => {
  let client: TestClient;

  beforeAll(async () => {
    const app = createApp({
      catalog: loadDefaultCatalog({ random: sequence(0.3) }),
      logger: silentLogger,
      config: noLimit,
      stats: createStatsProvider(() => 64 * MB + 123),
    });
    client = createTestClient(app);
    await client.start();
  });

  afterAll(async () => {
    await client.stop();
  });

  it("GET / describes the endpoints", async () => {
    const res = await client.get("/");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      message: "Quote API",
      endpoints: {
        randomQuote: "/quote/random",
        quotesByTag: "/quotes/tag/{tag}",
        allQuotes: "/quotes",
        stats: "/stats",
      },
    });
    expect(API_INFO.message).toBe("Quote API");
  });

  it("GET /quote/random returns a single quote object", async () => {
    const res = await client.get("/quote/random");
    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toMatch(/^application\/json/);
    expect(await res.json()).toEqual({
      text: "First, solve the problem. Then, write the code.",
      author: "John Johnson",
      tags: ["programming", "problem-solving"],
    });
  });

  it("GET /quotes returns the whole catalog in seed order", async () => {
    const res = await client.get("/quotes");
    expect(res.status).toBe(200);

    const body: unknown = await res.json();
    expect(Array.isArray(body)).toBe(true);
    expect(body).toHaveLength(10);
    expect(body).toEqual(loadDefaultCatalog().all());
  });

  it("GET /quotes/tag/:tag filters case-insensitively", async () => {
    const upper = await client.get("/quotes/tag/PROGRAMMING");
    const lower = await client.get("/quotes/tag/programming");

    expect(upper.status).toBe(200);
    expect(lower.status).toBe(200);

    const upperBody: unknown = await upper.json();
    expect(upperBody).toHaveLength(6);
    expect(upperBody).toEqual(await lower.json());
  });

  it("GET /quotes/tag/:tag answers 404 with the tag as sent", async () => {
    const res = await client.get("/quotes/tag/nonexistent-tag-xyz");
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "No quotes found with tag 'nonexistent-tag-xyz'" });
  });

  it("decodes the tag before echoing it", async () => {
    const res = await client.get("/quotes/tag/Clean%20Code");
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "No quotes found with tag 'Clean Code'" });
  });

  it("rejects a tag with broken percent-encoding", async () => {
    const res = await client.get("/quotes/tag/%E0");
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Bad request" });
  });

  it("GET /stats reports the working set", async () => {
    const res = await client.get("/stats");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ processInfo: { workingSet: "64 MB" } });
  });

  it("GET /health answers with the process id", async () => {
    const res = await client.get("/health");
    expect(res.status).toBe(200);

    expect(await res.json()).toMatchObject({
      ok: true,
      pid: process.pid,
      ts: expect.any(Number),
      uptimeMs: expect.any(Number),
    });
  });

  it("does not serve quotes by id", async () => {
    const res = await client.get("/quote/3");
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Not found" });
  });

  it("sets security headers", async () => {
    const res = await client.get("/");
    expect(res.headers.get("x-powered-by")).toBeNull();
    expect(res.headers.get("x-content-type-options")).toBe("nosniff");
  });
});

describe("request logging", () => {
  it("logs one line per finished request", async () => {
    const { logger, entries } = captureLogger();
    const client = createTestClient(createApp({ catalog: new QuoteCatalog(sampleQuotes), logger, config: noLimit }));
    await client.start();

    try {
      await client.get("/quotes/tag/TESTING");
      await client.get("/quotes/tag/missing");

      await vi.waitFor(() => expect(entries).toHaveLength(2));
      expect(entries[0]).toMatchObject({
        level: 30,
        method: "GET",
        path: "/quotes/tag/TESTING",
        status: 200,
        ms: expect.any(Number),
        pid: process.pid,
      });
      expect(entries[1]).toMatchObject({ level: 30, path: "/quotes/tag/missing", status: 404 });
    } finally {
      await client.stop();
    }
  });
});

describe("error handling", () => {
  it("answers 500 when a handler fails unexpectedly", async () => {
    const { logger, entries } = captureLogger();
    const app = createApp({
      catalog: new QuoteCatalog(sampleQuotes),
      logger,
      config: noLimit,
      stats: () => {
        throw new Error("memory probe failed");
      },
    });
    const client = createTestClient(app);
    await client.start();

    try {
      const res = await client.get("/stats");
      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({ error: "Internal server error" });

      await vi.waitFor(() => expect(entries.some((e) => e.level === 50)).toBe(true));
      expect(entries.find((e) => e.level === 50)).toMatchObject({
        msg: "Unhandled error",
        path: "/stats",
        err: { type: "Error", message: "memory probe failed" },
      });
    } finally {
      await client.stop();
    }
  });
});

describe("rate limiting", () => {
  it("is off with the default configuration", async () => {
    const client = createTestClient(
      createApp({ catalog: loadDefaultCatalog(), logger: silentLogger, config: loadConfig({}) }),
    );
    await client.start();

    try {
      for (let i = 0; i < 25; i++) {
        const res = await client.get("/quote/random");
        expect(res.status).toBe(200);
        expect(res.headers.get("ratelimit-limit")).toBeNull();
        await res.arrayBuffer();
      }
    } finally {
      await client.stop();
    }
  });

  it("answers 429 once the window is used up", async () => {
    const app = createApp({
      catalog: new QuoteCatalog(sampleQuotes),
      logger: silentLogger,
      config: { rateLimit: { windowMs: 60_000, max: 2 } },
    });
    const client = createTestClient(app);
    await client.start();

    try {
      const first = await client.get("/quotes");
      expect(first.status).toBe(200);
      expect(first.headers.get("ratelimit-limit")).toBe("2");

      expect((await client.get("/quotes")).status).toBe(200);

      const third = await client.get("/quotes");
      expect(third.status).toBe(429);
      expect(await third.json()).toEqual({ error: "Too many requests" });
    } finally {
      await client.stop();
    }
  });
});
