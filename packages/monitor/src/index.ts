#!/usr/bin/env node
import { describeError } from "./api/errors";
import { createSearchClient } from "./api/searchClient";
import { parseCliArgs } from "./cli";
import { describeConfig, loadConfig } from "./config";
import { createIndexMonitor } from "./monitor/pollLoop";
import { createStatusLogger } from "./monitor/statusLogger";
import { createChangeReporter } from "./report/changeReporter";

async function main(): Promise<void> {
  const config = loadConfig(parseCliArgs(process.argv));
  const controller = new AbortController();

  const shutdown = (signal: NodeJS.Signals): void => {
    if (controller.signal.aborted) {
      return;
    }

    console.error(`received ${signal}, shutting down`);
    controller.abort();
  };

  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  if (config.logLevel === "debug") {
    console.error(`monitor configuration (${describeConfig(config)})`);
  }

  const monitor = createIndexMonitor(config, {
    client: createSearchClient(config),
    reporter: createChangeReporter({
      indexName: config.indexName,
      format: config.outputFormat
    }),
    statusLogger: createStatusLogger({ intervalMs: config.statusLogIntervalMs })
  });

  await monitor.run(controller.signal);
}

main().catch((error: unknown) => {
  console.error(`search-index-monitor failed: ${describeError(error)}`);
  process.exit(1);
});
