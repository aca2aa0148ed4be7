import type { SqliteStore } from "../db/sqliteStore.js";
import type { TraceFn } from "../recap/primitives.js";

/** Trace sink for one run: each payload is stamped with `ts` and appended as an event. */
export function createRunTracer(store: SqliteStore, runId: string): TraceFn {
  return (eventType, payload) => {
    store.appendEvent(runId, eventType, { ts: store.now(), ...payload });
  };
}
