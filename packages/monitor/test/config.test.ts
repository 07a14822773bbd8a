import { describe, expect, it } from "vitest";

import { describeConfig, loadConfig, type CliOptions } from "../src/config";

const cli: CliOptions = {
  appId: "TESTAPP",
  apiKey: "test-secret",
  indexName: "products",
  expectedRecords: 0,
  delaySeconds: 30,
  deltaThreshold: 1000,
  allLogs: false,
  json: false
};

describe("loadConfig", () => {
  it("uses defaults for the tuning knobs", () => {
    const config = loadConfig(cli, {});

    expect(config.mode).toBe("changes");
    expect(config.outputFormat).toBe("text");
    expect(config.apiBaseUrl).toBeNull();
    expect(config.apiTimeoutMs).toBe(10000);
    expect(config.apiMaxRetries).toBe(3);
    expect(config.logsPageSize).toBe(1000);
    expect(config.statusLogIntervalMs).toBe(300_000);
    expect(config.logLevel).toBe("info");
  });

  it("maps flags to mode and output format", () => {
    const config = loadConfig({ ...cli, allLogs: true, json: true }, {});

    expect(config.mode).toBe("logs");
    expect(config.outputFormat).toBe("json");
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig(cli, {
      SEARCH_API_BASE_URL: " http://localhost:3100 ",
      API_MAX_RETRIES: "0",
      LOGS_PAGE_SIZE: "5000",
      LOG_LEVEL: "debug"
    });

    expect(config.apiBaseUrl).toBe("http://localhost:3100");
    expect(config.apiMaxRetries).toBe(0);
    expect(config.logsPageSize).toBe(1000);
    expect(config.logLevel).toBe("debug");
  });

  it("rejects malformed integers", () => {
    expect(() => loadConfig(cli, { API_TIMEOUT_MS: "soon" })).toThrow(
      "Invalid integer for API_TIMEOUT_MS: soon"
    );
    expect(() => loadConfig(cli, { API_TIMEOUT_MS: "0" })).toThrow(
      "Invalid integer for API_TIMEOUT_MS: 0"
    );
  });
});

describe("describeConfig", () => {
  it("never includes the API key", () => {
    const description = describeConfig(loadConfig(cli, {}));

    expect(description).toBe(
      "index=products, appId=TESTAPP, mode=changes, expectedRecords=0, delay=30s, delta=1000, host=default"
    );
  });
});
