import { Writable } from "stream";
import pino, { Logger } from "pino";
import type { Quote } from "@quote-api/types";

export const silentLogger = pino({ level: "silent" });

// Returns the given values in turn, then starts over.
export function sequence(...values: number[]): () => number {
  let i = 0;
  return () => values[i++ % values.length];
}

export const sampleQuotes: Quote[] = [
  { text: "Test early.", author: "Ada Example", tags: ["testing", "advice"] },
  { text: "Ship small.", author: "Bo Sample", tags: ["shipping"] },
  { text: "Read the logs.", author: "Cy Placeholder", tags: ["testing", "ops", "testing"] },
  { text: "No tags here.", author: "Di Dummy", tags: [] },
];

export type LogEntry = Record<string, unknown>;

// A pino logger whose JSON lines are parsed into `entries`.
export function captureLogger(level = "info"): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      for (const line of chunk.toString("utf8").split("\n")) {
        if (line.trim() !== "") entries.push(JSON.parse(line));
      }
      callback();
    },
  });
  return { logger: pino({ level }, stream), entries };
}
