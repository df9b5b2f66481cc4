import type { StatsResponse } from "@quote-api/types";

// Resident set size: what the OS currently holds in RAM for this process.
export const workingSetBytes = (): number => process.memoryUsage().rss;

export const formatMegabytes = (bytes: number): string =>
  `${Math.floor(bytes / 1024 / 1024)} MB`;

export type StatsProvider = () => StatsResponse;

// Read fresh on every call; two calls may disagree.
export function createStatsProvider(readMemory: () => number = workingSetBytes): StatsProvider {
  return () => ({
    processInfo: {
      workingSet: formatMegabytes(readMemory()),
    },
  });
}
