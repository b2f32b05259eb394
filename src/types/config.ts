export interface StalenessPolicy {
  maxAgeMs: number;
  minBytes: number;
}

export interface AppConfig {
  dataDirectory: string;
  problemDatabaseUrl: string;
  categoryIndexUrl: string;
  categoryDataUrl: string; // contains a {name} placeholder
  retryCount: number;
  reportIntervalMs: number;
  requestTimeoutMs: number;
  problemMaxAgeMs: number;
  categoryIndexMaxAgeMs: number;
  minCacheBytes: number;
}
