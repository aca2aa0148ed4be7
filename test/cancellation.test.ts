import assert from "node:assert/strict"
import { test } from "node:test"
import { SqliteStore } from "../src/db/sqliteStore.js"
import { CancellationSignal } from "../src/errors.js"
import { CancellationToken, NEVER_CANCELLED, RunCancellation } from "../src/runtime/cancellation.js"

function seed(store: SqliteStore) {
    const batch = store.createBatch({ user_request: "x", n_runs: 1, recipes_per_run: 1, config: {} })
    const run = store.createRun(batch.batch_id, 1)
    return { batchId: batch.batch_id, runId: run.run_id }
}

function reasonOf(fn: () => void): string | null {
    try {
        fn()
        return null
    } catch (error) {
        if (error instanceof CancellationSignal) return error.reason
        throw error
    }
}

test("check passes while nothing is requested", () => {
    const store = new SqliteStore(":memory:")
    try {
        const { batchId, runId } = seed(store)
        const cancellation = new RunCancellation(store, runId, batchId)
        assert.equal(reasonOf(() => cancellation.check()), null)
        assert.equal(cancellation.pendingReason(), null)
    } finally {
        store.close()
    }
})

test("a run request stops the run and is acknowledged", () => {
    const store = new SqliteStore(":memory:")
    try {
        const { batchId, runId } = seed(store)
        const cancellation = new RunCancellation(store, runId, batchId)
        store.requestCancel("run", runId, "user")

        assert.equal(reasonOf(() => cancellation.check()), "cancel_requested")
        assert.equal(cancellation.token.reason, "cancel_requested")
        assert.equal(store.acknowledgeCancel("run", runId), 0)
        assert.equal(reasonOf(() => cancellation.check()), "cancel_requested")
    } finally {
        store.close()
    }
})

test("a batch request wins over a run request", () => {
    const store = new SqliteStore(":memory:")
    try {
        const { batchId, runId } = seed(store)
        store.requestCancel("run", runId)
        store.requestCancel("batch", batchId)

        const cancellation = new RunCancellation(store, runId, batchId)
        assert.equal(reasonOf(() => cancellation.check()), "batch_cancel_requested")
        assert.equal(store.acknowledgeCancel("batch", batchId), 0)
        assert.equal(store.acknowledgeCancel("run", runId), 0)
    } finally {
        store.close()
    }
})

test("the in-process token is checked first and keeps its first reason", () => {
    const store = new SqliteStore(":memory:")
    try {
        const { batchId, runId } = seed(store)
        const token = new CancellationToken()
        token.cancel("worker_stopping")
        token.cancel("later")
        store.requestCancel("batch", batchId)

        const cancellation = new RunCancellation(store, runId, batchId, token)
        assert.equal(reasonOf(() => cancellation.check()), "worker_stopping")
        assert.equal(token.isCancelled, true)
    } finally {
        store.close()
    }
})

test("the never-cancelled checkpoint does nothing", () => {
    assert.equal(reasonOf(() => NEVER_CANCELLED.check()), null)
})
