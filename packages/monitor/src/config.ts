import type { MonitorConfig } from "./types";

export interface CliOptions {
  appId: string;
  apiKey: string;
  indexName: string;
  expectedRecords: number;
  delaySeconds: number;
  deltaThreshold: number;
  allLogs: boolean;
  json: boolean;
}

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number, min = 0): number {
  const raw = env[name];

  if (!raw) {
    return fallback;
  }

  const parsed = Number.parseInt(raw, 10);
  if (Number.isNaN(parsed) || parsed < min) {
    throw new Error(`Invalid integer for ${name}: ${raw}`);
  }

  return parsed;
}

export function loadConfig(cli: CliOptions, env: Env = process.env): MonitorConfig {
  const apiBaseUrl = env.SEARCH_API_BASE_URL?.trim();

  return {
    appId: cli.appId,
    apiKey: cli.apiKey,
    indexName: cli.indexName,
    expectedRecords: cli.expectedRecords,
    delaySeconds: cli.delaySeconds,
    deltaThreshold: cli.deltaThreshold,
    mode: cli.allLogs ? "logs" : "changes",
    outputFormat: cli.json ? "json" : "text",
    apiBaseUrl: apiBaseUrl ? apiBaseUrl : null,
    apiTimeoutMs: readInt(env, "API_TIMEOUT_MS", 10000, 1),
    apiMaxRetries: readInt(env, "API_MAX_RETRIES", 3),
    apiRetryBaseMs: readInt(env, "API_RETRY_BASE_MS", 200),
    apiRetryMaxMs: readInt(env, "API_RETRY_MAX_MS", 5000),
    logsPageSize: Math.min(1000, readInt(env, "LOGS_PAGE_SIZE", 1000, 1)),
    statusLogIntervalMs: readInt(env, "STATUS_LOG_INTERVAL_MS", 300_000, 1),
    logLevel: env.LOG_LEVEL ?? "info"
  };
}

// Never includes the API key.
export function describeConfig(config: MonitorConfig): string {
  return `index=${config.indexName}, appId=${config.appId}, mode=${config.mode}, expectedRecords=${config.expectedRecords}, delay=${config.delaySeconds}s, delta=${config.deltaThreshold}, host=${config.apiBaseUrl ?? "default"}`;
}
