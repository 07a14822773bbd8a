import type { CountChange } from "../monitor/changeDetection";
import type { BatchOperation, LogEntry, OutputFormat } from "../types";

export interface ChangeReporter {
  reportChange: (change: CountChange, entries: LogEntry[]) => void;
  reportLogs: (entries: LogEntry[]) => void;
}

export interface ChangeReporterOptions {
  indexName: string;
  format: OutputFormat;
  write?: (line: string) => void;
}

export function formatSignedDelta(delta: number): string {
  return delta > 0 ? `+${delta}` : String(delta);
}

export function formatChangeSummary(indexName: string, change: CountChange): string {
  return `index ${indexName}: records ${change.previous} -> ${change.current} (delta ${formatSignedDelta(change.delta)})`;
}

function formatIds(objectIds: string[]): string {
  return objectIds.length > 0 ? objectIds.join(", ") : "(no object ids)";
}

function formatBatch(operations: BatchOperation[]): string {
  if (operations.length === 0) {
    return "(no object ids)";
  }

  const grouped = new Map<string, string[]>();
  for (const operation of operations) {
    const ids = grouped.get(operation.action) ?? [];
    if (operation.objectId !== null) {
      ids.push(operation.objectId);
    }
    grouped.set(operation.action, ids);
  }

  return [...grouped.entries()]
    .map(([action, ids]) => `${action}=${ids.length > 0 ? ids.join(",") : "-"}`)
    .join(" ");
}

export function formatLogEntry(entry: LogEntry): string {
  if (entry.kind === "other") {
    return `${entry.timestamp} other ${entry.method} ${entry.path}`;
  }

  const detail = entry.kind === "batch" ? formatBatch(entry.operations) : formatIds(entry.objectIds);

  return `${entry.timestamp} ${entry.kind} ${detail}`;
}

function toJsonLogLine(entry: LogEntry): string {
  return JSON.stringify({
    type: "log",
    timestamp: entry.timestamp,
    kind: entry.kind,
    objectIds: entry.objectIds,
    operations: entry.operations,
    method: entry.method,
    path: entry.path
  });
}

export function createChangeReporter(options: ChangeReporterOptions): ChangeReporter {
  const write = options.write ?? console.log;
  const formatEntry = options.format === "json" ? toJsonLogLine : formatLogEntry;

  return {
    reportChange(change: CountChange, entries: LogEntry[]): void {
      if (options.format === "json") {
        write(
          JSON.stringify({
            type: "change",
            index: options.indexName,
            previous: change.previous,
            current: change.current,
            delta: change.delta
          })
        );
      } else {
        write(formatChangeSummary(options.indexName, change));
      }

      for (const entry of entries) {
        write(formatEntry(entry));
      }
    },

    reportLogs(entries: LogEntry[]): void {
      for (const entry of entries) {
        write(formatEntry(entry));
      }
    }
  };
}
