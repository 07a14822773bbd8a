export interface StatusLoggerOptions {
  intervalMs: number;
  now?: () => number;
  log?: (message: string) => void;
}

export interface StatusLogger {
  onPoll: (records: number | null) => void;
  onReport: () => void;
  onFailure: () => void;
  flush: () => void;
}

export function createStatusLogger(options: StatusLoggerOptions): StatusLogger {
  const now = options.now ?? Date.now;
  const log = options.log ?? console.error;
  const intervalMs = Math.max(1, options.intervalMs);

  const startedAtMs = now();
  let lastLoggedAtMs = startedAtMs;
  let polls = 0;
  let reports = 0;
  let failures = 0;
  let latestRecords: number | null = null;

  const maybeLog = (force: boolean): void => {
    const currentMs = now();

    if (!force && currentMs - lastLoggedAtMs < intervalMs) {
      return;
    }

    const uptimeMinutes = (currentMs - startedAtMs) / 60_000;

    log(
      `monitor status (polls=${polls}, reports=${reports}, failures=${failures}, records=${latestRecords ?? "unknown"}, uptime=${uptimeMinutes.toFixed(1)}m)`
    );

    lastLoggedAtMs = currentMs;
  };

  return {
    onPoll(records: number | null): void {
      polls += 1;
      if (records !== null) {
        latestRecords = records;
      }
      maybeLog(false);
    },
    onReport(): void {
      reports += 1;
    },
    onFailure(): void {
      failures += 1;
      maybeLog(false);
    },
    flush(): void {
      maybeLog(true);
    }
  };
}
