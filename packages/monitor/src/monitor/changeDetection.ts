import type { LogEntry } from "../types";

export interface CountChange {
  previous: number;
  current: number;
  delta: number;
  reportable: boolean;
}

export function evaluateChange(
  previous: number,
  current: number,
  deltaThreshold: number
): CountChange {
  const delta = current - previous;

  return {
    previous,
    current,
    delta,
    reportable: Math.abs(delta) >= deltaThreshold
  };
}

export interface FreshLogs {
  entries: LogEntry[];
  watermark: string | null;
}

/**
 * Keeps entries strictly newer than the watermark, oldest first, and returns
 * the advanced watermark. The service lists logs newest first.
 */
export function selectNewLogs(entries: LogEntry[], watermark: string | null): FreshLogs {
  const fresh = entries
    .filter((entry) => watermark === null || entry.timestamp > watermark)
    .sort((left, right) => left.timestamp.localeCompare(right.timestamp));

  const newest = fresh.length > 0 ? fresh[fresh.length - 1].timestamp : watermark;

  return {
    entries: fresh,
    watermark: newest
  };
}
