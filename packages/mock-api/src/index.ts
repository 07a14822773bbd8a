import { createServer, type IncomingMessage, type ServerResponse } from "node:http";

import { applyChurn, buildMockIndex, listLogs } from "./mockData";

const port = Number.parseInt(process.env.PORT ?? "3100", 10);
const apiKey = process.env.MOCK_API_KEY ?? "mock-api-key";
const indexName = process.env.MOCK_INDEX_NAME ?? "products";
const totalRecords = Number.parseInt(process.env.MOCK_TOTAL_RECORDS ?? "5000", 10);
const churnIntervalMs = Number.parseInt(process.env.MOCK_CHURN_INTERVAL_MS ?? "20000", 10);
const churnSize = Number.parseInt(process.env.MOCK_CHURN_SIZE ?? "1500", 10);

const mockIndex = buildMockIndex(indexName, totalRecords);
let churnStep = 0;

function writeJson(
  response: ServerResponse,
  statusCode: number,
  payload: unknown
): void {
  response.statusCode = statusCode;
  response.setHeader("Content-Type", "application/json");
  response.end(JSON.stringify(payload));
}

function isAuthorized(request: IncomingMessage): boolean {
  return request.headers["x-algolia-api-key"] === apiKey;
}

const server = createServer((request, response) => {
  if (!request.url) {
    writeJson(response, 400, { message: "Missing URL", status: 400 });
    return;
  }

  const url = new URL(request.url, `http://localhost:${port}`);

  if (url.pathname === "/health") {
    writeJson(response, 200, { status: "ok" });
    return;
  }

  if (!isAuthorized(request)) {
    writeJson(response, 403, { message: "Invalid Application-ID or API key", status: 403 });
    return;
  }

  const queryMatch = /^\/1\/indexes\/([^/]+)\/query$/.exec(url.pathname);
  if (queryMatch && request.method === "POST") {
    // the monitor only reads nbHits, so the request body is drained unread
    request.resume();

    if (decodeURIComponent(queryMatch[1]) !== mockIndex.name) {
      writeJson(response, 404, { message: "Index does not exist", status: 404 });
      return;
    }

    writeJson(response, 200, { hits: [], nbHits: mockIndex.objectIds.size, page: 0 });
    return;
  }

  if (url.pathname === "/1/logs" && request.method === "GET") {
    const offset = Number.parseInt(url.searchParams.get("offset") ?? "0", 10);
    const length = Number.parseInt(url.searchParams.get("length") ?? "10", 10);
    writeJson(response, 200, { logs: listLogs(mockIndex, offset, length) });
    return;
  }

  writeJson(response, 404, { message: "Not Found", status: 404 });
});

const churnTimer = setInterval(() => {
  applyChurn(mockIndex, churnStep, churnSize, Date.now());
  churnStep += 1;
  console.log(`mock churn applied (step=${churnStep}, records=${mockIndex.objectIds.size})`);
}, churnIntervalMs);

server.listen(port, "0.0.0.0", () => {
  console.log(
    `mock search api listening on port ${port} (index=${mockIndex.name}, records=${mockIndex.objectIds.size})`
  );
});

process.once("SIGTERM", () => {
  clearInterval(churnTimer);
  server.close();
});
