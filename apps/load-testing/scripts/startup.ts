/**
 * ─────────────────────────────────────────────────────────
 * STARTUP — how long until the service answers its first request
 *
 * Spawns the server RUNS times and polls GET / until it returns 200.
 * Measures the compiled build by default; point SERVER_ENTRY at another
 * entry file to compare.
 *
 *   npm run build && npm run bench:startup
 *   RUNS=20 npm run bench:startup
 * ─────────────────────────────────────────────────────────
 */

import { ChildProcess, spawn } from "child_process";
import path from "path";

const RUNS         = parseInt(process.env.RUNS || "10");
const PORT         = parseInt(process.env.PORT || "3999");
const TIMEOUT_MS   = parseInt(process.env.TIMEOUT_MS || "10000");
const SERVER_ENTRY = process.env.SERVER_ENTRY
  || path.resolve(__dirname, "../../../dist/apps/quote-api/src/server.js");

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

async function waitForReady(url: string, deadline: number): Promise<void> {
  let lastError: unknown;
  while (Date.now() < deadline) {
    try {
      const res = await fetch(url);
      if (res.ok) return;
      lastError = new Error(`status ${res.status}`);
    } catch (err) {
      lastError = err; // ECONNREFUSED until the socket is up
    }
    await sleep(5);
  }
  throw new Error(`Server did not answer ${url} within ${TIMEOUT_MS}ms`, { cause: lastError });
}

function stop(child: ChildProcess): Promise<void> {
  return new Promise((resolve) => {
    if (child.exitCode !== null) return resolve();
    child.once("exit", () => resolve());
    child.kill("SIGTERM");
  });
}

async function measureOnce(): Promise<number> {
  const start = Date.now();
  const child = spawn(process.execPath, [SERVER_ENTRY], {
    env: { ...process.env, PORT: String(PORT), NODE_ENV: "production", LOG_LEVEL: "silent", RATE_LIMIT_MAX: "0" },
    stdio: "ignore",
  });

  try {
    await waitForReady(`http://127.0.0.1:${PORT}/`, start + TIMEOUT_MS);
    return Date.now() - start;
  } finally {
    await stop(child);
  }
}

async function main() {
  console.log(`\n⏱  Startup benchmark: ${RUNS} runs of ${SERVER_ENTRY}\n`);

  const samples: number[] = [];
  for (let i = 1; i <= RUNS; i++) {
    const ms = await measureOnce();
    samples.push(ms);
    console.log(`  run ${String(i).padStart(2)}: ${ms}ms`);
  }

  const sorted = [...samples].sort((a, b) => a - b);
  const median = sorted[Math.floor(sorted.length / 2)];

  console.log(`\n  min    = ${sorted[0]}ms`);
  console.log(`  median = ${median}ms`);
  console.log(`  max    = ${sorted[sorted.length - 1]}ms\n`);
}

main().catch((err) => {
  console.error("\n❌ Startup benchmark failed:", err);
  process.exit(1);
});
