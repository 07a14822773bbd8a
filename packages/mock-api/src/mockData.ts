export const MAX_RETAINED_LOGS = 1000;

export interface MockLog {
  timestamp: string;
  method: string;
  url: string;
  answer_code: string;
  query_body: string;
  answer: string;
  index: string;
}

export interface MockIndex {
  name: string;
  objectIds: Set<string>;
  logs: MockLog[];
  nextObjectNumber: number;
}

function toObjectId(value: number): string {
  return `obj-${value.toString().padStart(7, "0")}`;
}

export function buildMockIndex(name: string, total: number): MockIndex {
  const objectIds = new Set<string>();

  for (let index = 0; index < total; index += 1) {
    objectIds.add(toObjectId(index));
  }

  return {
    name,
    objectIds,
    logs: [],
    nextObjectNumber: total
  };
}

/**
 * Applies one scripted batch: even steps add `size` records, odd steps delete
 * the `size` oldest ones. The batch is logged the way the service logs it.
 */
export function applyChurn(index: MockIndex, step: number, size: number, nowMs: number): void {
  const requests: Array<{ action: string; body: { objectID: string } }> = [];

  if (step % 2 === 0) {
    for (let count = 0; count < size; count += 1) {
      const objectId = toObjectId(index.nextObjectNumber);
      index.nextObjectNumber += 1;
      index.objectIds.add(objectId);
      requests.push({ action: "addObject", body: { objectID: objectId } });
    }
  } else {
    for (const objectId of [...index.objectIds].slice(0, size)) {
      index.objectIds.delete(objectId);
      requests.push({ action: "deleteObject", body: { objectID: objectId } });
    }
  }

  index.logs.unshift({
    timestamp: new Date(nowMs).toISOString(),
    method: "POST",
    url: `/1/indexes/${encodeURIComponent(index.name)}/batch`,
    answer_code: "200",
    query_body: JSON.stringify({ requests }),
    answer: JSON.stringify({ taskID: step + 1 }),
    index: index.name
  });

  if (index.logs.length > MAX_RETAINED_LOGS) {
    index.logs.length = MAX_RETAINED_LOGS;
  }
}

export function listLogs(index: MockIndex, offset: number, length: number): MockLog[] {
  const start = Math.max(0, offset);
  return index.logs.slice(start, start + Math.max(1, length));
}
