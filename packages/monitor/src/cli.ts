import { Command, InvalidArgumentError } from "commander";

import type { CliOptions } from "./config";

export const VERSION = "1.0.0";

type ParsedOptions = {
  expectedRecords: number;
  delay: number;
  delta: number;
  allLogs: boolean;
  json: boolean;
};

export function parseInteger(min: number): (value: string) => number {
  return (value: string): number => {
    const trimmed = value.trim();

    if (!/^-?\d+$/.test(trimmed)) {
      throw new InvalidArgumentError("Not an integer.");
    }

    const parsed = Number.parseInt(trimmed, 10);
    if (parsed < min) {
      throw new InvalidArgumentError(`Must be at least ${min}.`);
    }

    return parsed;
  };
}

function requireText(value: string): string {
  if (value.trim().length === 0) {
    throw new InvalidArgumentError("Must not be empty.");
  }

  return value;
}

export function buildProgram(): Command {
  return new Command()
    .name("search-index-monitor")
    .description(
      "Watch the record count of a search index and print the indexing logs behind large changes"
    )
    .version(VERSION)
    .argument("<APP_ID>", "application ID", requireText)
    .argument("<KEY>", "API key with search and logs permissions", requireText)
    .argument("<INDEX_NAME>", "name of the index to monitor", requireText)
    .option(
      "-e, --expected-records <int>",
      "starting record count (0 reads it from the index)",
      parseInteger(0),
      0
    )
    .option("-d, --delay <seconds>", "seconds between polls", parseInteger(1), 30)
    .option(
      "--delta <int>",
      "minimum change in record count that triggers a report",
      parseInteger(1),
      1000
    )
    .option("-a, --all-logs", "print every new indexing log instead of watching the count", false)
    .option("--json", "print reports as JSON lines", false);
}

export function toCliOptions(program: Command): CliOptions {
  const [appId, apiKey, indexName] = program.processedArgs.map(String);
  const options = program.opts<ParsedOptions>();

  return {
    appId,
    apiKey,
    indexName,
    expectedRecords: options.expectedRecords,
    delaySeconds: options.delay,
    deltaThreshold: options.delta,
    allLogs: options.allLogs,
    json: options.json
  };
}

export function parseCliArgs(
  argv: string[],
  program: Command = buildProgram(),
  from: "node" | "user" = "node"
): CliOptions {
  program.parse(argv, { from });
  return toCliOptions(program);
}
