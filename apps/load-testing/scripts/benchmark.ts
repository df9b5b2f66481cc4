/**
 * ─────────────────────────────────────────────────────────
 * AUTOCANNON — throughput and latency of the quote endpoints
 *
 * Start the server first (npm run dev, or npm start after a build), then:
 *   npm run bench
 *   ENDPOINT=tag CONNECTIONS=100 npm run bench
 *
 * ENDPOINT: all | random | list | tag | stats | mixed
 *
 * The server must run without a rate limit (RATE_LIMIT_MAX unset or 0),
 * otherwise most responses are 429s. The run aborts if it sees one.
 * ─────────────────────────────────────────────────────────
 */

import autocannon from "autocannon";
import { Expectation, RunStats, Verdict, judge } from "./verdict";

// ─── Config ───────────────────────────────────────────────
const BASE_URL    = process.env.BASE_URL    || "http://localhost:3000";
const CONNECTIONS = parseInt(process.env.CONNECTIONS || "50");
const DURATION    = parseInt(process.env.DURATION    || "10"); // seconds per scenario
const ENDPOINT    = process.env.ENDPOINT              || "all";
const MAX_P99_MS  = parseInt(process.env.MAX_P99_MS  || "50");

interface Scenario extends Omit<Expectation, "maxP99Ms"> {
  key: string;
  requests: autocannon.Request[];
}

// Every fifth tag lookup in the mixed run is a miss
const MIXED_TAGS = ["programming", "humor", "motivation", "PROGRAMMING", "no-such-tag"];

function mixedRequests(): autocannon.Request[] {
  const requests: autocannon.Request[] = [];
  for (let i = 0; i < 60; i++) requests.push({ method: "GET", path: "/quote/random" });
  for (let i = 0; i < 30; i++) requests.push({ method: "GET", path: `/quotes/tag/${MIXED_TAGS[i % MIXED_TAGS.length]}` });
  for (let i = 0; i < 10; i++) requests.push({ method: "GET", path: "/quotes" });

  for (let i = requests.length - 1; i > 0; i--) {
    const j = Math.floor(Math.random() * (i + 1));
    [requests[i], requests[j]] = [requests[j], requests[i]];
  }
  return requests;
}

const SCENARIOS: Scenario[] = [
  { key: "random", label: "GET /quote/random",           requests: [{ method: "GET", path: "/quote/random" }],           expectedNon2xx: 0 },
  { key: "list",   label: "GET /quotes",                 requests: [{ method: "GET", path: "/quotes" }],                 expectedNon2xx: 0 },
  { key: "tag",    label: "GET /quotes/tag/programming", requests: [{ method: "GET", path: "/quotes/tag/programming" }], expectedNon2xx: 0 },
  { key: "stats",  label: "GET /stats",                  requests: [{ method: "GET", path: "/stats" }],                  expectedNon2xx: 0 },
  { key: "mixed",  label: "Mixed (60% random, 30% tag, 10% list)", requests: mixedRequests(),                            expectedNon2xx: 6 / 100 },
];

// A limited server answers with RateLimit-* headers; benchmarking it would only measure 429s
async function assertNotRateLimited(): Promise<void> {
  const res = await fetch(`${BASE_URL}/`);
  if (!res.ok) throw new Error(`GET / answered ${res.status}; is the quote API running at ${BASE_URL}?`);
  if (res.headers.has("ratelimit-limit")) {
    throw new Error(`Server is rate limited (limit ${res.headers.get("ratelimit-limit")}); restart it with RATE_LIMIT_MAX=0`);
  }
}

function run(scenario: Scenario): Promise<autocannon.Result> {
  return new Promise((resolve, reject) => {
    const instance = autocannon(
      {
        url: BASE_URL,
        connections: CONNECTIONS,
        duration: DURATION,
        timeout: 10,
        requests: scenario.requests,
      },
      (err, result) => (err ? reject(err) : resolve(result)),
    );
    autocannon.track(instance, { renderProgressBar: true, renderResultsTable: false });
  });
}

function summarize(result: autocannon.Result): RunStats {
  return {
    total: result.requests.total,
    meanRps: result.requests.mean,
    p50: result.latency.p50,
    p99: result.latency.p99,
    non2xx: result.non2xx,
    errors: result.errors,
    timeouts: result.timeouts,
  };
}

async function main() {
  const selected = SCENARIOS.filter((s) => ENDPOINT === "all" || ENDPOINT === s.key);
  if (selected.length === 0) throw new Error(`Unknown ENDPOINT "${ENDPOINT}"`);

  console.log(`\n🔥 Quote API benchmark → ${BASE_URL}`);
  console.log(`   ${CONNECTIONS} connections, ${DURATION}s per scenario, p99 budget ${MAX_P99_MS}ms\n`);

  await assertNotRateLimited();

  const verdicts: Verdict[] = [];
  for (const scenario of selected) {
    console.log(`\n🧪 ${scenario.label}`);
    verdicts.push(judge({ ...scenario, maxP99Ms: MAX_P99_MS }, summarize(await run(scenario))));
  }

  console.log();
  console.table(verdicts);

  const failed = verdicts.filter((v) => !v.pass);
  if (failed.length > 0) {
    console.log(`\n❌ ${failed.length} scenario(s) failed: ${failed.map((v) => v.scenario).join(", ")}\n`);
    process.exitCode = 1;
  } else {
    console.log("\n✅ All scenarios passed\n");
  }
}

main().catch((err) => {
  console.error("\n❌ Benchmark failed:", err);
  process.exit(1);
});
