/**
 * Store search with a deadline.
 *
 * The backend call is raced against a timer; on expiry the backend's signal is
 * aborted and the outcome is reported as a timeout, separately from errors.
 */

import { describeError } from "../errors.js";
import type { StoreFinderBackend, StoreQuery, StoreSearchOutcome } from "./types.js";

export const DEFAULT_STORE_DEADLINE_MS = 10_000;

const TIMED_OUT = Symbol('timed-out');

export async function findStores(
  backend: StoreFinderBackend,
  query: StoreQuery,
  options: { deadlineMs?: number } = {}
): Promise<StoreSearchOutcome> {
  const deadlineMs = options.deadlineMs ?? DEFAULT_STORE_DEADLINE_MS;
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<typeof TIMED_OUT>((resolve) => {
    timer = setTimeout(() => {
      resolve(TIMED_OUT);
      controller.abort();
    }, deadlineMs);
  });

  try {
    const result = await Promise.race([backend.findStores(query, controller.signal), deadline]);
    if (result === TIMED_OUT) {
      console.error(`[stores] ${backend.name} search exceeded ${deadlineMs}ms`);
      return { status: 'timeout', backend: backend.name, deadlineMs };
    }
    return { status: 'ok', backend: backend.name, stores: result };
  } catch (err) {
    if (controller.signal.aborted) {
      return { status: 'timeout', backend: backend.name, deadlineMs };
    }
    const message = describeError(err);
    console.error(`[stores] ${backend.name} search failed:`, message);
    return { status: 'error', backend: backend.name, message };
  } finally {
    clearTimeout(timer);
  }
}
