export type RecordAction = "add" | "update" | "delete" | "clear";

export type LogEntryKind = RecordAction | "batch" | "other";

export interface BatchOperation {
  action: RecordAction | "other";
  objectId: string | null;
}

export interface LogEntry {
  timestamp: string;
  kind: LogEntryKind;
  objectIds: string[];
  operations: BatchOperation[];
  method: string;
  path: string;
}

export type MonitorMode = "changes" | "logs";

export type OutputFormat = "text" | "json";

export interface MonitorConfig {
  appId: string;
  apiKey: string;
  indexName: string;
  expectedRecords: number;
  delaySeconds: number;
  deltaThreshold: number;
  mode: MonitorMode;
  outputFormat: OutputFormat;
  apiBaseUrl: string | null;
  apiTimeoutMs: number;
  apiMaxRetries: number;
  apiRetryBaseMs: number;
  apiRetryMaxMs: number;
  logsPageSize: number;
  statusLogIntervalMs: number;
  logLevel: string;
}
