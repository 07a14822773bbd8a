import { setTimeout as delay } from "node:timers/promises";

export type SleepLike = (ms: number, signal?: AbortSignal) => Promise<void>;

// Rejects with an AbortError as soon as the signal fires.
export async function sleepFor(ms: number, signal?: AbortSignal): Promise<void> {
  await delay(ms, undefined, { signal });
}
