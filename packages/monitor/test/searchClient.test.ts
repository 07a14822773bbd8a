import { afterEach, describe, expect, it, vi } from "vitest";

import {
  AuthenticationError,
  IndexNotFoundError,
  RemoteRequestError,
  TransientServiceError
} from "../src/api/errors";
import {
  buildLogsUrl,
  buildQueryUrl,
  createSearchClient,
  resolveHosts,
  type SearchClientConfig
} from "../src/api/searchClient";

const baseConfig: SearchClientConfig = {
  appId: "TESTAPP",
  apiKey: "test-key",
  indexName: "products",
  apiBaseUrl: null,
  apiTimeoutMs: 100,
  apiMaxRetries: 2,
  apiRetryBaseMs: 100,
  apiRetryMaxMs: 1000,
  logsPageSize: 1000
};

function jsonResponse(payload: unknown): Response {
  return new Response(JSON.stringify(payload), {
    status: 200,
    headers: { "content-type": "application/json" }
  });
}

function abortError(): Error {
  const error = new Error("The operation was aborted.");
  error.name = "AbortError";
  return error;
}

// A failed response whose body stream breaks while it is being read.
function brokenBodyResponse(status: number): Response {
  return {
    ok: false,
    status,
    headers: new Headers(),
    text: async () => {
      throw new TypeError("terminated");
    }
  } as unknown as Response;
}

afterEach(() => {
  vi.useRealTimers();
});

describe("resolveHosts", () => {
  it("falls back across the service's read hosts", () => {
    expect(resolveHosts(baseConfig)).toEqual([
      "https://TESTAPP-dsn.algolia.net/",
      "https://TESTAPP-1.algolianet.com/",
      "https://TESTAPP-2.algolianet.com/",
      "https://TESTAPP-3.algolianet.com/"
    ]);
  });

  it("uses only the override when one is configured", () => {
    expect(resolveHosts({ ...baseConfig, apiBaseUrl: "http://localhost:3100" })).toEqual([
      "http://localhost:3100/"
    ]);
  });
});

describe("request URLs", () => {
  it("encodes the index name in the query path", () => {
    expect(buildQueryUrl("https://host.test/", "my index").toString()).toBe(
      "https://host.test/1/indexes/my%20index/query"
    );
  });

  it("asks for build logs and caps the page length", () => {
    expect(buildLogsUrl("https://host.test/", "products", 5000).toString()).toBe(
      "https://host.test/1/logs?indexName=products&type=build&offset=0&length=1000"
    );
  });
});

describe("createSearchClient", () => {
  it("queries the record count with credentials in headers", async () => {
    const fetchMock = vi.fn(async () => jsonResponse({ hits: [], nbHits: 321 })) as unknown as typeof fetch;

    const client = createSearchClient(baseConfig, { fetchImpl: fetchMock });
    const count = await client.countRecords();

    expect(count).toBe(321);
    expect(fetchMock).toHaveBeenCalledOnce();

    const [requestUrl, requestInit] = vi.mocked(fetchMock).mock.calls[0] as [URL, RequestInit];
    const headers = requestInit.headers as Record<string, string>;

    expect(requestUrl.toString()).toBe("https://TESTAPP-dsn.algolia.net/1/indexes/products/query");
    expect(requestInit.method).toBe("POST");
    expect(headers["X-Algolia-Application-Id"]).toBe("TESTAPP");
    expect(headers["X-Algolia-API-Key"]).toBe("test-key");
    expect(JSON.parse(String(requestInit.body))).toEqual({
      params: "hitsPerPage=0&attributesToRetrieve=%5B%5D&analytics=false"
    });
  });

  it("fetches and parses build logs", async () => {
    const fetchMock = vi.fn(async () =>
      jsonResponse({
        logs: [
          {
            timestamp: "2026-03-01T10:00:00Z",
            method: "DELETE",
            url: "/1/indexes/products/sku-1"
          }
        ]
      })
    ) as unknown as typeof fetch;

    const client = createSearchClient(baseConfig, { fetchImpl: fetchMock });
    const entries = await client.fetchLogs();

    const [requestUrl, requestInit] = vi.mocked(fetchMock).mock.calls[0] as [URL, RequestInit];
    expect(requestUrl.toString()).toBe(
      "https://TESTAPP-dsn.algolia.net/1/logs?indexName=products&type=build&offset=0&length=1000"
    );
    expect(requestInit.method).toBe("GET");
    expect(entries).toHaveLength(1);
    expect(entries[0].kind).toBe("delete");
    expect(entries[0].objectIds).toEqual(["sku-1"]);
  });

  it("fails fast on rejected credentials", async () => {
    const fetchMock = vi.fn(
      async () => new Response('{"message":"Invalid Application-ID or API key"}', { status: 403 })
    ) as unknown as typeof fetch;
    const sleepMock = vi.fn(async () => undefined);
    const client = createSearchClient(baseConfig, { fetchImpl: fetchMock, sleep: sleepMock });

    await expect(client.countRecords()).rejects.toBeInstanceOf(AuthenticationError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(sleepMock).not.toHaveBeenCalled();
  });

  it("reports a missing index as not found", async () => {
    const fetchMock = vi.fn(
      async () => new Response('{"message":"Index does not exist"}', { status: 404 })
    ) as unknown as typeof fetch;
    const client = createSearchClient(baseConfig, { fetchImpl: fetchMock });

    const failure = client.countRecords();

    await expect(failure).rejects.toBeInstanceOf(IndexNotFoundError);
    await expect(failure).rejects.toThrow('Index "products" does not exist (status 404)');
  });

  it("does not retry other client errors", async () => {
    const fetchMock = vi.fn(async () => new Response("bad request", { status: 400 })) as unknown as typeof fetch;
    const client = createSearchClient(baseConfig, { fetchImpl: fetchMock });

    await expect(client.fetchLogs()).rejects.toBeInstanceOf(RemoteRequestError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("retries a server error on the next host", async () => {
    const sleepMock = vi.fn(async () => undefined);
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(new Response("unavailable", { status: 503 }))
      .mockResolvedValueOnce(jsonResponse({ nbHits: 10 })) as unknown as typeof fetch;

    const client = createSearchClient(baseConfig, {
      fetchImpl: fetchMock,
      sleep: sleepMock,
      random: () => 0
    });

    await expect(client.countRecords()).resolves.toBe(10);

    const secondUrl = vi.mocked(fetchMock).mock.calls[1][0];
    expect(String(secondUrl)).toBe("https://TESTAPP-1.algolianet.com/1/indexes/products/query");
    expect(sleepMock).toHaveBeenCalledWith(100, undefined);
  });

  it("waits for Retry-After when throttled", async () => {
    const sleepMock = vi.fn(async () => undefined);
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(
        new Response("slow down", { status: 429, headers: { "Retry-After": "2" } })
      )
      .mockResolvedValueOnce(jsonResponse({ nbHits: 10 })) as unknown as typeof fetch;

    const client = createSearchClient(baseConfig, {
      fetchImpl: fetchMock,
      sleep: sleepMock,
      random: () => 0
    });

    await client.countRecords();

    expect(sleepMock).toHaveBeenCalledWith(2000, undefined);
  });

  it("gives up with a transient error once retries are exhausted", async () => {
    const sleepMock = vi.fn(async () => undefined);
    const fetchMock = vi.fn(async () => new Response("down", { status: 500 })) as unknown as typeof fetch;

    const client = createSearchClient(baseConfig, {
      fetchImpl: fetchMock,
      sleep: sleepMock,
      random: () => 0
    });

    const failure = client.countRecords();

    await expect(failure).rejects.toBeInstanceOf(TransientServiceError);
    await expect(failure).rejects.toThrow("Search API request failed with status 500 after 3 attempts");
    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(sleepMock.mock.calls).toEqual([
      [100, undefined],
      [200, undefined]
    ]);
  });

  it("treats network failures as transient", async () => {
    const fetchMock = vi.fn(async () => {
      throw new TypeError("fetch failed");
    }) as unknown as typeof fetch;

    const client = createSearchClient(baseConfig, {
      fetchImpl: fetchMock,
      sleep: vi.fn(async () => undefined),
      random: () => 0
    });

    await expect(client.countRecords()).rejects.toThrow(
      "Search API unreachable after 3 attempts (TypeError: fetch failed)"
    );
  });

  it("times out a request that never answers", async () => {
    vi.useFakeTimers();

    const fetchMock = vi.fn((_: URL, init?: RequestInit) => {
      const signal = init?.signal as AbortSignal;

      return new Promise<Response>((_resolve, reject) => {
        signal.addEventListener("abort", () => {
          reject(abortError());
        });
      });
    }) as unknown as typeof fetch;

    const client = createSearchClient(
      { ...baseConfig, apiTimeoutMs: 50, apiMaxRetries: 0 },
      { fetchImpl: fetchMock }
    );

    const assertion = expect(client.countRecords()).rejects.toThrow(
      "Search API unreachable after 1 attempts (RequestTimeoutError: Search API request timed out after 50ms)"
    );

    await vi.advanceTimersByTimeAsync(50);
    await assertion;
  });

  it("passes a caller abort through without retrying", async () => {
    const fetchMock = vi.fn((_: URL, init?: RequestInit) => {
      const signal = init?.signal as AbortSignal;

      return new Promise<Response>((_resolve, reject) => {
        signal.addEventListener("abort", () => {
          reject(abortError());
        });
      });
    }) as unknown as typeof fetch;
    const sleepMock = vi.fn(async () => undefined);

    const client = createSearchClient(baseConfig, { fetchImpl: fetchMock, sleep: sleepMock });
    const controller = new AbortController();

    const failure = client.countRecords(controller.signal);
    controller.abort();
    const error = await failure.catch((caught: unknown) => caught);

    expect(error instanceof Error && error.name).toBe("AbortError");
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(sleepMock).not.toHaveBeenCalled();
  });

  it("retries when the connection drops while reading an error body", async () => {
    const sleepMock = vi.fn(async () => undefined);
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(brokenBodyResponse(503))
      .mockResolvedValueOnce(jsonResponse({ nbHits: 10 })) as unknown as typeof fetch;

    const client = createSearchClient(baseConfig, {
      fetchImpl: fetchMock,
      sleep: sleepMock,
      random: () => 0
    });

    await expect(client.countRecords()).resolves.toBe(10);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(sleepMock.mock.calls).toEqual([[100, undefined]]);
  });

  it("gives up with a transient error when every error body is cut off", async () => {
    const fetchMock = vi.fn(async () => brokenBodyResponse(503)) as unknown as typeof fetch;

    const client = createSearchClient(baseConfig, {
      fetchImpl: fetchMock,
      sleep: vi.fn(async () => undefined),
      random: () => 0
    });

    const failure = client.countRecords();

    await expect(failure).rejects.toBeInstanceOf(TransientServiceError);
    await expect(failure).rejects.toThrow(
      "Search API unreachable after 3 attempts (TypeError: terminated)"
    );
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it("treats an unreadable body as transient", async () => {
    const fetchMock = vi.fn(async () => new Response("<html>", { status: 200 })) as unknown as typeof fetch;
    const client = createSearchClient(baseConfig, { fetchImpl: fetchMock });

    await expect(client.countRecords()).rejects.toBeInstanceOf(TransientServiceError);
  });
});
