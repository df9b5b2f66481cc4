export interface Quote {
  readonly text: string;
  readonly author: string;
  readonly tags: readonly string[];
}

export interface Endpoints {
  randomQuote: string;
  quotesByTag: string;
  allQuotes: string;
  stats: string;
}

export interface ApiInfo {
  message: string;
  endpoints: Endpoints;
}

export interface ErrorResponse {
  error: string;
}

export interface ProcessInfo {
  workingSet: string;
}

export interface StatsResponse {
  processInfo: ProcessInfo;
}

export interface HealthResponse {
  ok: true;
  pid: number;
  ts: number;
  uptimeMs: number;
}
