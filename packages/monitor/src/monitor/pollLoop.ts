import type { IndexClient } from "../api/searchClient";
import { describeError, isFatalError } from "../api/errors";
import type { ChangeReporter } from "../report/changeReporter";
import type { LogEntry, MonitorConfig } from "../types";
import { sleepFor, type SleepLike } from "../util/sleep";
import { evaluateChange, selectNewLogs } from "./changeDetection";
import type { StatusLogger } from "./statusLogger";

export type MonitorOptions = Pick<
  MonitorConfig,
  "indexName" | "expectedRecords" | "delaySeconds" | "deltaThreshold" | "mode" | "logLevel"
>;

export interface MonitorDependencies {
  client: IndexClient;
  reporter: ChangeReporter;
  statusLogger?: StatusLogger;
  sleep?: SleepLike;
  log?: (message: string) => void;
}

export interface MonitorState {
  snapshot: number | null;
  watermark: string | null;
}

export interface IndexMonitor {
  state: () => MonitorState;
  runCycle: (signal?: AbortSignal) => Promise<void>;
  run: (signal?: AbortSignal) => Promise<void>;
}

export function createIndexMonitor(
  options: MonitorOptions,
  dependencies: MonitorDependencies
): IndexMonitor {
  const { client, reporter, statusLogger } = dependencies;
  const sleep = dependencies.sleep ?? sleepFor;
  const log = dependencies.log ?? console.error;
  const debug = (message: string): void => {
    if (options.logLevel === "debug") {
      log(message);
    }
  };

  // expectedRecords=0 means the first successful poll sets the baseline
  let snapshot: number | null = options.expectedRecords > 0 ? options.expectedRecords : null;
  let watermark: string | null = null;

  const recoverFrom = (error: unknown, operation: string, signal?: AbortSignal): void => {
    if (signal?.aborted || isFatalError(error)) {
      throw error;
    }

    statusLogger?.onFailure();
    log(
      `warning: ${operation} failed, will retry next cycle (snapshot=${snapshot ?? "none"}, error=${describeError(error)})`
    );
  };

  // null when the fetch failed and was logged
  const fetchNewLogs = async (signal?: AbortSignal): Promise<LogEntry[] | null> => {
    let entries: LogEntry[];

    try {
      entries = await client.fetchLogs(signal);
    } catch (error) {
      recoverFrom(error, "log fetch", signal);
      return null;
    }

    const fresh = selectNewLogs(entries, watermark);
    watermark = fresh.watermark;
    debug(`logs fetched (received=${entries.length}, new=${fresh.entries.length}, watermark=${watermark ?? "none"})`);

    return fresh.entries;
  };

  const printAllLogs = async (signal?: AbortSignal): Promise<void> => {
    const entries = await fetchNewLogs(signal);
    if (entries === null) {
      return;
    }

    statusLogger?.onPoll(null);

    if (entries.length > 0) {
      reporter.reportLogs(entries);
      statusLogger?.onReport();
    }
  };

  const checkRecordCount = async (signal?: AbortSignal): Promise<void> => {
    let current: number;

    try {
      current = await client.countRecords(signal);
    } catch (error) {
      recoverFrom(error, "record count query", signal);
      return;
    }

    statusLogger?.onPoll(current);

    if (snapshot === null) {
      snapshot = current;
      log(`baseline established (index=${options.indexName}, records=${current})`);
      return;
    }

    const change = evaluateChange(snapshot, current, options.deltaThreshold);

    if (!change.reportable) {
      debug(`record count polled (previous=${change.previous}, current=${change.current}, delta=${change.delta})`);
      snapshot = current;
      return;
    }

    log(
      `record count changed by at least ${options.deltaThreshold}, fetching logs (previous=${change.previous}, current=${change.current})`
    );

    const entries = await fetchNewLogs(signal);
    reporter.reportChange(change, entries ?? []);
    statusLogger?.onReport();
    snapshot = current;
  };

  const runCycle = async (signal?: AbortSignal): Promise<void> => {
    if (options.mode === "logs") {
      await printAllLogs(signal);
      return;
    }

    await checkRecordCount(signal);
  };

  return {
    state(): MonitorState {
      return { snapshot, watermark };
    },

    runCycle,

    async run(signal?: AbortSignal): Promise<void> {
      if (options.mode === "logs") {
        log(`printing new indexing logs (index=${options.indexName}, delay=${options.delaySeconds}s)`);
      } else {
        log(
          `monitoring record count changes (index=${options.indexName}, expectedRecords=${snapshot ?? "from first poll"}, delta=${options.deltaThreshold}, delay=${options.delaySeconds}s)`
        );
      }

      try {
        while (true) {
          await runCycle(signal);
          await sleep(options.delaySeconds * 1000, signal);
        }
      } catch (error) {
        if (signal?.aborted) {
          return;
        }

        throw error;
      } finally {
        statusLogger?.flush();
      }
    }
  };
}
