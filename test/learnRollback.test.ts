import assert from "node:assert/strict"
import { test } from "node:test"
import { SqliteStore } from "../src/db/sqliteStore.js"
import { NotFoundError, ValidationError } from "../src/errors.js"
import { memoryToRecord, SqliteMemoryStore } from "../src/memory/memoryStore.js"
import { enqueueLearnJob, rollbackDelta } from "../src/runtime/learnJobs.js"

function setup() {
    const store = new SqliteStore(":memory:")
    const memory = new SqliteMemoryStore({ dbPath: ":memory:" })
    const batch = store.createBatch({ user_request: "x", n_runs: 2, recipes_per_run: 1, config: {} })
    const run = store.createRun(batch.batch_id, 1)
    const other = store.createRun(batch.batch_id, 2)
    return {
        store,
        memory,
        runId: run.run_id,
        otherRunId: other.run_id,
        close() {
            memory.close()
            store.close()
        },
    }
}

test("enqueue returns the queued job instead of adding another", () => {
    const ctx = setup()
    try {
        const first = enqueueLearnJob(ctx.store, ctx.runId)
        const second = enqueueLearnJob(ctx.store, ` ${ctx.runId} `)
        assert.equal(second.rb_job_id, first.rb_job_id)
        assert.equal(first.extra.enqueue_reason, "enqueue")
        assert.equal(ctx.store.listRbJobsForRun(ctx.runId).length, 1)
        assert.deepEqual(ctx.store.countEventTypesForRun(ctx.runId), { rb_learn_queued: 1 })
        assert.throws(() => enqueueLearnJob(ctx.store, "  "), ValidationError)
        assert.throws(() => enqueueLearnJob(ctx.store, "run_missing"), NotFoundError)
    } finally {
        ctx.close()
    }
})

test("enqueue while a job runs queues exactly one follow-up", () => {
    const ctx = setup()
    try {
        const first = enqueueLearnJob(ctx.store, ctx.runId)
        assert.equal(ctx.store.claimNextQueuedRbJob()?.rb_job_id, first.rb_job_id)

        const followUp = enqueueLearnJob(ctx.store, ctx.runId)
        assert.notEqual(followUp.rb_job_id, first.rb_job_id)
        assert.deepEqual(followUp.extra, {
            enqueue_reason: "latest_compensation",
            supersedes_rb_job_id: first.rb_job_id,
        })
        assert.equal(enqueueLearnJob(ctx.store, ctx.runId).rb_job_id, followUp.rb_job_id)

        const queued = ctx.store.getLatestEvent(ctx.runId, "rb_learn_queued")
        assert.deepEqual(queued?.payload, {
            rb_job_id: followUp.rb_job_id,
            kind: "learn",
            status: "queued",
            reason: "latest_compensation",
            supersedes_rb_job_id: first.rb_job_id,
        })
    } finally {
        ctx.close()
    }
})

test("rolling back an add archives the item", () => {
    const ctx = setup()
    try {
        const added = ctx.memory.upsert({ status: "active", role: "global", type: "bank_item", content: "lesson", source_run_id: ctx.runId })
        const delta = ctx.store.createRbDelta(ctx.runId, [{ op: "add", mem_id: added.mem_id, after: memoryToRecord(added) }])

        assert.equal(rollbackDelta(ctx.store, ctx.memory, { runId: ctx.runId }), delta.delta_id)

        assert.equal(ctx.memory.get(added.mem_id)?.status, "archived")
        assert.equal(ctx.store.getRbDelta(delta.delta_id)?.status, "rolled_back")
        const edits = ctx.store.listMemEditLog(added.mem_id)
        assert.equal(edits.length, 1)
        assert.equal(edits[0]?.actor, "rb_rollback")
        assert.equal(edits[0]?.reason, `rollback_delta:${delta.delta_id}`)
        assert.equal(edits[0]?.after.status, "archived")
        assert.equal(ctx.store.listMemIndexPage({ limit: 10, statuses: ["archived"] }).items[0]?.mem_id, added.mem_id)
    } finally {
        ctx.close()
    }
})

test("rollback restores the exact before snapshot over later edits", () => {
    const ctx = setup()
    try {
        const original = ctx.memory.upsert({
            status: "active",
            role: "tio2_expert",
            type: "bank_item",
            content: "calcine at 400 C",
            source_run_id: null,
            extra: { tags: ["thermal"] },
            now_ts: 10,
        })
        const merged = ctx.memory.upsert({ ...original, content: "calcine at 400 C for 2 h", now_ts: 20 })
        const added = ctx.memory.upsert({ status: "active", role: "global", type: "bank_item", content: "new", source_run_id: ctx.runId, now_ts: 20 })
        const delta = ctx.store.createRbDelta(ctx.runId, [
            { op: "update", mem_id: original.mem_id, before: memoryToRecord(original), after: memoryToRecord(merged) },
            { op: "add", mem_id: added.mem_id, after: memoryToRecord(added) },
        ])

        ctx.memory.upsert({ ...merged, content: "edited by hand", now_ts: 30 })

        rollbackDelta(ctx.store, ctx.memory, { runId: ctx.runId, deltaId: delta.delta_id, reason: "bad lesson" })

        assert.deepEqual(ctx.memory.get(original.mem_id), original)
        assert.equal(ctx.memory.get(added.mem_id)?.status, "archived")

        const rolled = ctx.store.getRbDelta(delta.delta_id)
        assert.equal(rolled?.rolled_back_reason, "bad lesson")
        assert.deepEqual(ctx.store.getLatestEvent(ctx.runId, "rb_rollback_started")?.payload, {
            delta_id: delta.delta_id,
            reason: "bad lesson",
            n_ops: 2,
        })
        assert.deepEqual(ctx.store.getLatestEvent(ctx.runId, "rb_rollback_completed")?.payload, {
            delta_id: delta.delta_id,
            status: "rolled_back",
        })

        const restoreEdit = ctx.store.listMemEditLog(original.mem_id)[0]
        assert.equal(restoreEdit?.before.content, "edited by hand")
        assert.equal(restoreEdit?.after.content, "calcine at 400 C")
    } finally {
        ctx.close()
    }
})

test("a rolled back delta is left alone", () => {
    const ctx = setup()
    try {
        const added = ctx.memory.upsert({ status: "active", role: "global", type: "bank_item", content: "lesson", source_run_id: null })
        const delta = ctx.store.createRbDelta(ctx.runId, [{ op: "add", mem_id: added.mem_id, after: memoryToRecord(added) }])
        rollbackDelta(ctx.store, ctx.memory, { runId: ctx.runId })

        ctx.memory.upsert({ ...added, status: "active" })
        assert.equal(rollbackDelta(ctx.store, ctx.memory, { runId: ctx.runId, deltaId: delta.delta_id }), delta.delta_id)
        assert.equal(ctx.memory.get(added.mem_id)?.status, "active")
        assert.deepEqual(ctx.store.countEventTypesForRun(ctx.runId), { rb_rollback_completed: 1, rb_rollback_started: 1 })
    } finally {
        ctx.close()
    }
})

test("rollback rejects missing, foreign and absent deltas", () => {
    const ctx = setup()
    try {
        assert.throws(() => rollbackDelta(ctx.store, ctx.memory, { runId: ctx.runId }), {
            name: "ValidationError",
            message: "No applied delta to roll back.",
        })
        assert.throws(
            () => rollbackDelta(ctx.store, ctx.memory, { runId: ctx.runId, deltaId: "delta_missing" }),
            NotFoundError,
        )
        const foreign = ctx.store.createRbDelta(ctx.otherRunId, [])
        assert.throws(() => rollbackDelta(ctx.store, ctx.memory, { runId: ctx.runId, deltaId: foreign.delta_id }), {
            message: "Delta does not belong to run.",
        })
    } finally {
        ctx.close()
    }
})
