import type { LogEntry, MonitorConfig } from "../types";
import { sleepFor, type SleepLike } from "../util/sleep";
import {
  AuthenticationError,
  IndexNotFoundError,
  RemoteRequestError,
  RequestTimeoutError,
  TransientServiceError,
  describeError
} from "./errors";
import { parseLogsResponse, parseRecordCount } from "./responseParser";
import { classifyFailedStatus, computeBackoffMs, parseRetryAfterMs } from "./retryPolicy";

export interface IndexClient {
  countRecords: (signal?: AbortSignal) => Promise<number>;
  fetchLogs: (signal?: AbortSignal) => Promise<LogEntry[]>;
}

type FetchLike = typeof fetch;

export interface SearchClientDependencies {
  fetchImpl?: FetchLike;
  sleep?: SleepLike;
  now?: () => number;
  random?: () => number;
}

export type SearchClientConfig = Pick<
  MonitorConfig,
  | "appId"
  | "apiKey"
  | "indexName"
  | "apiBaseUrl"
  | "apiTimeoutMs"
  | "apiMaxRetries"
  | "apiRetryBaseMs"
  | "apiRetryMaxMs"
  | "logsPageSize"
>;

const COUNT_QUERY_PARAMS = "hitsPerPage=0&attributesToRetrieve=%5B%5D&analytics=false";
const MAX_LOGS_PAGE_SIZE = 1000;

function normalizeBaseUrl(apiBaseUrl: string): string {
  return apiBaseUrl.endsWith("/") ? apiBaseUrl : `${apiBaseUrl}/`;
}

export function resolveHosts(config: Pick<MonitorConfig, "appId" | "apiBaseUrl">): string[] {
  if (config.apiBaseUrl) {
    return [normalizeBaseUrl(config.apiBaseUrl)];
  }

  return [
    `https://${config.appId}-dsn.algolia.net/`,
    `https://${config.appId}-1.algolianet.com/`,
    `https://${config.appId}-2.algolianet.com/`,
    `https://${config.appId}-3.algolianet.com/`
  ];
}

export function buildQueryUrl(host: string, indexName: string): URL {
  return new URL(`1/indexes/${encodeURIComponent(indexName)}/query`, host);
}

export function buildLogsUrl(host: string, indexName: string, length: number): URL {
  const url = new URL("1/logs", host);
  url.searchParams.set("indexName", indexName);
  url.searchParams.set("type", "build");
  url.searchParams.set("offset", "0");
  url.searchParams.set("length", String(Math.min(MAX_LOGS_PAGE_SIZE, Math.max(1, length))));

  return url;
}

function isNetworkError(error: unknown): boolean {
  if (error instanceof RequestTimeoutError) {
    return true;
  }

  return error instanceof TypeError;
}

async function fetchWithTimeout(
  fetchImpl: FetchLike,
  requestUrl: URL,
  requestInit: RequestInit,
  timeoutMs: number,
  signal?: AbortSignal
): Promise<Response> {
  signal?.throwIfAborted();

  const controller = new AbortController();
  let timedOut = false;
  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const onAbort = (): void => {
    controller.abort(signal?.reason);
  };
  signal?.addEventListener("abort", onAbort, { once: true });

  try {
    return await fetchImpl(requestUrl, {
      ...requestInit,
      signal: controller.signal
    });
  } catch (error) {
    if (timedOut) {
      throw new RequestTimeoutError(timeoutMs);
    }

    throw error;
  } finally {
    clearTimeout(timeoutId);
    signal?.removeEventListener("abort", onAbort);
  }
}

export function createSearchClient(
  config: SearchClientConfig,
  dependencies: SearchClientDependencies = {}
): IndexClient {
  const fetchImpl = dependencies.fetchImpl ?? fetch;
  const sleep = dependencies.sleep ?? sleepFor;
  const now = dependencies.now ?? Date.now;
  const random = dependencies.random ?? Math.random;
  const hosts = resolveHosts(config);
  const maxAttempts = Math.max(1, config.apiMaxRetries + 1);
  const headers = {
    Accept: "application/json",
    "Content-Type": "application/json",
    "X-Algolia-Application-Id": config.appId,
    "X-Algolia-API-Key": config.apiKey
  };

  const execute = async (
    buildUrl: (host: string) => URL,
    requestInit: RequestInit,
    signal?: AbortSignal
  ): Promise<unknown> => {
    let attempt = 1;

    while (true) {
      const host = hosts[(attempt - 1) % hosts.length];
      const backoffMs = computeBackoffMs(
        attempt,
        config.apiRetryBaseMs,
        config.apiRetryMaxMs,
        random
      );

      const retryAfterNetworkError = async (error: unknown): Promise<void> => {
        if (attempt >= maxAttempts) {
          throw new TransientServiceError(
            `Search API unreachable after ${attempt} attempts (${describeError(error)})`
          );
        }

        attempt += 1;
        await sleep(backoffMs, signal);
      };

      let response: Response;

      try {
        response = await fetchWithTimeout(
          fetchImpl,
          buildUrl(host),
          { ...requestInit, headers },
          config.apiTimeoutMs,
          signal
        );
      } catch (error) {
        if (signal?.aborted || !isNetworkError(error)) {
          throw error;
        }

        await retryAfterNetworkError(error);
        continue;
      }

      if (response.ok) {
        try {
          return (await response.json()) as unknown;
        } catch (error) {
          throw new TransientServiceError(
            `Search API returned a malformed body (${describeError(error)})`,
            response.status
          );
        }
      }

      let body: string;

      try {
        body = await response.text();
      } catch (error) {
        // the connection dropped mid-body
        if (signal?.aborted) {
          throw error;
        }

        await retryAfterNetworkError(error);
        continue;
      }

      switch (classifyFailedStatus(response.status)) {
        case "unauthorized":
          throw new AuthenticationError(response.status, body);
        case "not-found":
          throw new IndexNotFoundError(config.indexName, body);
        case "rejected":
          throw new RemoteRequestError(response.status, body);
        case "retry":
          break;
      }

      if (attempt >= maxAttempts) {
        throw new TransientServiceError(
          `Search API request failed with status ${response.status} after ${attempt} attempts`,
          response.status
        );
      }

      const retryAfterMs =
        response.status === 429
          ? parseRetryAfterMs(response.headers.get("Retry-After"), now())
          : null;

      attempt += 1;
      await sleep(Math.max(retryAfterMs ?? 0, backoffMs), signal);
    }
  };

  return {
    async countRecords(signal?: AbortSignal): Promise<number> {
      const payload = await execute(
        (host) => buildQueryUrl(host, config.indexName),
        {
          method: "POST",
          body: JSON.stringify({ params: COUNT_QUERY_PARAMS })
        },
        signal
      );

      try {
        return parseRecordCount(payload);
      } catch (error) {
        throw new TransientServiceError(describeError(error));
      }
    },

    async fetchLogs(signal?: AbortSignal): Promise<LogEntry[]> {
      const payload = await execute(
        (host) => buildLogsUrl(host, config.indexName, config.logsPageSize),
        { method: "GET" },
        signal
      );

      try {
        return parseLogsResponse(payload, config.indexName);
      } catch (error) {
        throw new TransientServiceError(describeError(error));
      }
    }
  };
}
