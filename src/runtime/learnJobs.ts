import { z } from "zod";
import { MEMORY_ROLES, MEMORY_STATUSES, MEMORY_TYPES } from "../config/appConfig.js";
import type { RbDeltaRecord, RbJobRecord } from "../db/records.js";
import type { SqliteStore } from "../db/sqliteStore.js";
import { NotFoundError, ValidationError } from "../errors.js";
import { logScoped } from "../jobLogger.js";
import {
  memoryToIndexRecord,
  memoryToRecord,
  type MemoryItem,
  type MemoryStore,
} from "../memory/memoryStore.js";

export const MemorySnapshotSchema = z.object({
  mem_id: z.string().min(1),
  status: z.enum(MEMORY_STATUSES),
  role: z.enum(MEMORY_ROLES),
  type: z.enum(MEMORY_TYPES),
  content: z.string(),
  source_run_id: z.string().nullable(),
  created_at: z.number(),
  updated_at: z.number(),
  schema_version: z.number().int(),
  extra: z.record(z.unknown()),
});

export type MemorySnapshot = z.infer<typeof MemorySnapshotSchema>;

/** One recorded mutation of a learn delta. */
export const DeltaOpSchema = z.discriminatedUnion("op", [
  z.object({ op: z.literal("add"), mem_id: z.string().min(1), after: MemorySnapshotSchema }).passthrough(),
  z
    .object({
      op: z.literal("update"),
      mem_id: z.string().min(1),
      before: MemorySnapshotSchema,
      after: MemorySnapshotSchema,
    })
    .passthrough(),
  z
    .object({
      op: z.literal("archive"),
      mem_id: z.string().min(1),
      before: MemorySnapshotSchema,
      after: MemorySnapshotSchema,
    })
    .passthrough(),
]);

export type DeltaOp = z.infer<typeof DeltaOpSchema>;

export function syncMemIndex(store: SqliteStore, item: MemoryItem) {
  store.upsertMemIndex(memoryToIndexRecord(item));
}

/**
 * Queues a learn job for a run. An already queued job is returned as is; when
 * one is running, a single extra job is queued so the newest feedback is
 * learned after it finishes.
 */
export function enqueueLearnJob(store: SqliteStore, runId: string): RbJobRecord {
  const id = runId.trim();
  if (!id) throw new ValidationError("run_id is required.");

  const outcome = store.transaction(() => {
    const queued = store.getLatestRbJobForRun(id, { kind: "learn", statuses: ["queued"] });
    if (queued) return { job: queued, created: false, reason: "enqueue", supersedes: null };

    const running = store.getLatestRbJobForRun(id, { kind: "learn", statuses: ["running"] });
    const reason = running ? "latest_compensation" : "enqueue";
    const supersedes = running?.rb_job_id ?? null;
    const job = store.createRbJob(id, "learn", {
      enqueue_reason: reason,
      supersedes_rb_job_id: supersedes ?? "",
    });
    return { job, created: true, reason, supersedes };
  });

  if (outcome.created) {
    store.appendEvent(id, "rb_learn_queued", {
      rb_job_id: outcome.job.rb_job_id,
      kind: "learn",
      status: outcome.job.status,
      reason: outcome.reason,
      supersedes_rb_job_id: outcome.supersedes,
    });
  }
  return outcome.job;
}

/** Writes `snapshot` back, keeping the item's original creation time. */
export function restoreSnapshot(
  store: SqliteStore,
  memory: MemoryStore,
  snapshot: MemorySnapshot,
  options: { actor: string; reason: string },
): MemoryItem {
  const before = memory.get(snapshot.mem_id);
  const restored = memory.upsert({
    mem_id: snapshot.mem_id,
    status: snapshot.status,
    role: snapshot.role,
    type: snapshot.type,
    content: snapshot.content,
    source_run_id: snapshot.source_run_id,
    schema_version: snapshot.schema_version,
    extra: snapshot.extra,
    now_ts: snapshot.updated_at,
    preserve_created_at: true,
  });
  store.appendMemEditLog({
    mem_id: restored.mem_id,
    actor: options.actor,
    reason: options.reason,
    before: before ? memoryToRecord(before) : {},
    after: memoryToRecord(restored),
  });
  syncMemIndex(store, restored);
  return restored;
}

const ROLLBACK_ACTOR = "rb_rollback";

function pickDelta(store: SqliteStore, runId: string, deltaId: string | null | undefined): RbDeltaRecord {
  if (deltaId) {
    const delta = store.getRbDelta(deltaId);
    if (!delta) throw new NotFoundError("Delta not found.");
    if (delta.run_id !== runId) {
      throw new ValidationError("Delta does not belong to run.", { delta_id: deltaId, run_id: runId });
    }
    return delta;
  }
  const newest = store.listRbDeltasForRun(runId, "applied")[0];
  if (!newest) throw new ValidationError("No applied delta to roll back.", { run_id: runId });
  return newest;
}

/**
 * Undoes one delta by replaying its ops in reverse: an added item is
 * archived, an updated or archived item gets its `before` snapshot back.
 * Without `deltaId` the newest applied delta of the run is used. Returns the
 * delta id; a delta already rolled back is left alone.
 */
export function rollbackDelta(
  store: SqliteStore,
  memory: MemoryStore,
  params: { runId: string; deltaId?: string | null; reason?: string | null },
): string {
  const runId = params.runId.trim();
  if (!runId) throw new ValidationError("run_id is required.");

  const delta = pickDelta(store, runId, params.deltaId);
  if (delta.status === "rolled_back") return delta.delta_id;

  const ops = delta.ops.flatMap((raw, index) => {
    const parsed = DeltaOpSchema.safeParse(raw);
    if (parsed.success) return [parsed.data];
    logScoped("learn", `delta ${delta.delta_id} op ${index} skipped: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    return [];
  });

  store.appendEvent(runId, "rb_rollback_started", {
    delta_id: delta.delta_id,
    reason: params.reason || null,
    n_ops: delta.ops.length,
  });

  const reason = `rollback_delta:${delta.delta_id}`;
  for (const op of [...ops].reverse()) {
    if (op.op === "add") {
      const before = memory.get(op.mem_id);
      if (!before) continue;
      const after = memory.archive(op.mem_id);
      store.appendMemEditLog({
        mem_id: op.mem_id,
        actor: ROLLBACK_ACTOR,
        reason,
        before: memoryToRecord(before),
        after: memoryToRecord(after),
      });
      syncMemIndex(store, after);
      continue;
    }
    restoreSnapshot(store, memory, op.before, { actor: ROLLBACK_ACTOR, reason });
  }

  store.markRbDeltaRolledBack(delta.delta_id, params.reason || null);
  store.appendEvent(runId, "rb_rollback_completed", { delta_id: delta.delta_id, status: "rolled_back" });
  return delta.delta_id;
}
