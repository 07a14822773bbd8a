import type { BatchOperation, LogEntry, LogEntryKind, RecordAction } from "../types";

interface RecordLike {
  [key: string]: unknown;
}

function isRecordLike(value: unknown): value is RecordLike {
  return typeof value === "object" && value !== null;
}

const RESERVED_INDEX_PATHS = new Set([
  "batch",
  "browse",
  "clear",
  "deleteByQuery",
  "objects",
  "operation",
  "query",
  "rules",
  "settings",
  "synonyms",
  "task"
]);

const BATCH_ACTIONS = new Map<string, RecordAction>([
  ["addObject", "add"],
  ["updateObject", "update"],
  ["partialUpdateObject", "update"],
  ["partialUpdateObjectNoCreate", "update"],
  ["deleteObject", "delete"],
  ["clear", "clear"]
]);

export function parseRecordCount(payload: unknown): number {
  if (!isRecordLike(payload)) {
    throw new Error("Invalid query response: expected object");
  }

  const nbHits = payload.nbHits;
  if (typeof nbHits !== "number" || !Number.isInteger(nbHits) || nbHits < 0) {
    throw new Error("Invalid query response: nbHits must be a non-negative integer");
  }

  return nbHits;
}

function parseJsonObject(raw: unknown): RecordLike | null {
  if (isRecordLike(raw)) {
    return raw;
  }

  if (typeof raw !== "string" || raw.length === 0) {
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(raw);
    return isRecordLike(parsed) ? parsed : null;
  } catch {
    // bodies above the service's size limit are logged truncated
    return null;
  }
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

export function splitRequestPath(url: string): string[] {
  const [pathname] = url.split("?", 1);
  return pathname
    .split("/")
    .filter((segment) => segment.length > 0)
    .map(decodeSegment);
}

function toObjectId(value: unknown): string | null {
  if (typeof value === "string" && value.length > 0) {
    return value;
  }

  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }

  return null;
}

function parseBatchOperations(body: RecordLike | null, indexName: string): BatchOperation[] {
  const requests = body?.requests;
  if (!Array.isArray(requests)) {
    return [];
  }

  const operations: BatchOperation[] = [];

  for (const request of requests) {
    if (!isRecordLike(request)) {
      continue;
    }

    // multi-index batches carry their target per request
    if (typeof request.indexName === "string" && request.indexName !== indexName) {
      continue;
    }

    const action =
      typeof request.action === "string" ? BATCH_ACTIONS.get(request.action) ?? "other" : "other";
    const requestBody = isRecordLike(request.body) ? request.body : null;

    operations.push({
      action,
      objectId: toObjectId(requestBody?.objectID ?? request.objectID)
    });
  }

  return operations;
}

interface Classification {
  kind: LogEntryKind;
  objectIds: string[];
  operations: BatchOperation[];
}

function classifyRequest(
  method: string,
  segments: string[],
  rawItem: RecordLike,
  indexName: string
): Classification {
  const none: Classification = { kind: "other", objectIds: [], operations: [] };

  if (segments[0] !== "1" || segments[1] !== "indexes" || segments.length < 3) {
    return none;
  }

  const rest = segments.slice(3);
  const [first, second] = rest;

  if (rest.length === 0) {
    if (method === "POST") {
      const body = parseJsonObject(rawItem.query_body);
      const answer = parseJsonObject(rawItem.answer);
      const objectId = toObjectId(body?.objectID ?? answer?.objectID);
      return { kind: "add", objectIds: objectId ? [objectId] : [], operations: [] };
    }

    if (method === "DELETE") {
      return { kind: "clear", objectIds: [], operations: [] };
    }

    return none;
  }

  if (rest.length === 1 && method === "POST") {
    if (first === "batch") {
      const operations = parseBatchOperations(parseJsonObject(rawItem.query_body), indexName);
      const objectIds = operations
        .map((operation) => operation.objectId)
        .filter((objectId): objectId is string => objectId !== null);
      return { kind: "batch", objectIds, operations };
    }

    if (first === "clear") {
      return { kind: "clear", objectIds: [], operations: [] };
    }

    if (first === "deleteByQuery") {
      return { kind: "delete", objectIds: [], operations: [] };
    }

    return none;
  }

  if (rest.length === 1 && !RESERVED_INDEX_PATHS.has(first)) {
    if (method === "PUT") {
      return { kind: "update", objectIds: [first], operations: [] };
    }

    if (method === "DELETE") {
      return { kind: "delete", objectIds: [first], operations: [] };
    }
  }

  if (rest.length === 2 && second === "partial" && method === "POST") {
    return { kind: "update", objectIds: [first], operations: [] };
  }

  return none;
}

function toIsoTimestamp(value: unknown): string | null {
  if (typeof value !== "string" || value.trim().length === 0) {
    return null;
  }

  const parsed = Date.parse(value.trim());
  if (Number.isNaN(parsed)) {
    return null;
  }

  return new Date(parsed).toISOString();
}

export function parseLogEntry(value: unknown, indexName: string): LogEntry | null {
  if (!isRecordLike(value)) {
    return null;
  }

  const timestamp = toIsoTimestamp(value.timestamp);
  if (timestamp === null) {
    return null;
  }

  const method = typeof value.method === "string" ? value.method.toUpperCase() : "";
  const path = typeof value.url === "string" ? value.url : "";
  const classification = classifyRequest(method, splitRequestPath(path), value, indexName);

  return {
    timestamp,
    method,
    path,
    ...classification
  };
}

export function parseLogsResponse(payload: unknown, indexName: string): LogEntry[] {
  if (!isRecordLike(payload)) {
    throw new Error("Invalid logs response: expected object");
  }

  const logs = payload.logs;
  if (!Array.isArray(logs)) {
    return [];
  }

  const entries: LogEntry[] = [];
  for (const item of logs) {
    const entry = parseLogEntry(item, indexName);
    if (entry) {
      entries.push(entry);
    }
  }

  return entries;
}
