import assert from "node:assert/strict"
import { test } from "node:test"
import { loadAppConfig } from "../src/config/appConfig.js"
import type { BatchStatus } from "../src/db/records.js"
import { SqliteStore } from "../src/db/sqliteStore.js"
import { ConfigurationError } from "../src/errors.js"
import { SqliteMemoryStore } from "../src/memory/memoryStore.js"
import { enqueueLearnJob } from "../src/runtime/learnJobs.js"
import { RunWorker, type CollaboratorFactories, type WorkerReporter, type WorkUnit } from "../src/runtime/runWorker.js"
import type { JsonObject } from "../src/util/json.js"
import { chunk, FakeKnowledge, reply, ScriptedChat } from "./fakes.js"

const config = loadAppConfig()

class RecordingReporter implements WorkerReporter {
    readonly claimed: WorkUnit[] = []
    readonly finished: Array<[string, string]> = []
    readonly failures: Array<[string, string]> = []
    idle = 0

    onClaim(unit: WorkUnit) {
        this.claimed.push(unit)
    }

    onComplete(unit: WorkUnit, status: string) {
        this.finished.push([unit.kind, status])
    }

    onFailure(unit: WorkUnit, error: Error) {
        this.failures.push([unit.id, error.message])
    }

    onIdle() {
        this.idle += 1
    }
}

class LockedBatchStore extends SqliteStore {
    refreshBatchStatus(): BatchStatus | null {
        throw new Error("database is locked")
    }
}

function setup(snapshot: JsonObject, factories: Partial<CollaboratorFactories> = {}, learnDryRun = false) {
    const store = new SqliteStore(":memory:")
    const memory = new SqliteMemoryStore({ dbPath: ":memory:" })
    const batch = store.createBatch({ user_request: "Design a Cu-Ag catalyst", n_runs: 1, recipes_per_run: 1, config: snapshot })
    const run = store.createRun(batch.batch_id, 1)
    const reporter = new RecordingReporter()
    const worker = new RunWorker({
        store,
        config,
        reporter,
        stopWhenIdle: true,
        learnDryRun,
        factories: { memory: () => memory, ...factories },
    })
    return {
        store,
        memory,
        worker,
        reporter,
        batchId: batch.batch_id,
        runId: run.run_id,
        close() {
            worker.close()
            memory.close()
            store.close()
        },
    }
}

function payloadOf(store: SqliteStore, runId: string, eventType: string): JsonObject {
    const payload = { ...store.getLatestEvent(runId, eventType)?.payload }
    delete payload.ts
    return payload
}

test("a dry run completes with placeholder recipes citing synthetic evidence", async () => {
    const ctx = setup({ dry_run: true, temperature: 0.2 })
    try {
        await ctx.worker.start()

        assert.equal(ctx.store.getRun(ctx.runId)?.status, "completed")
        assert.equal(ctx.store.getBatch(ctx.batchId)?.status, "completed")
        assert.deepEqual(ctx.reporter.finished, [["run", "completed"]])
        assert.equal(ctx.reporter.idle, 1)
        assert.deepEqual(ctx.store.countEventTypesForRun(ctx.runId), {
            final_output: 1,
            kb_query: 2,
            llm_request: 1,
            llm_response: 1,
            recap_info: 1,
            run_started: 1,
        })

        const output = payloadOf(ctx.store, ctx.runId, "final_output")
        assert.deepEqual(output.citations, {
            C1: "kb:dry_run/kb_principles/synthetic_1",
            C2: "kb:dry_run/kb_modulation/synthetic_2",
        })
        assert.deepEqual(output.memory_ids, [])
        assert.deepEqual(payloadOf(ctx.store, ctx.runId, "run_started"), {
            mode: "dry_run",
            user_request: "Design a Cu-Ag catalyst",
            run_index: 1,
            n_runs: 1,
            recipes_per_run: 1,
            temperature: 0.2,
        })
    } finally {
        ctx.close()
    }
})

test("a normal run plans with the injected collaborators", async () => {
    const chat = new ScriptedChat([
        reply({
            think: "Search.",
            subtasks: [{ type: "kb_search", kb_name: "kb_principles", query: "Cu Ag" }, { type: "generate_recipes" }],
        }),
        reply({ think: "Enough.", subtasks: [{ type: "generate_recipes" }] }),
        { content: "Ready." },
        reply({
            recipes: [
                {
                    M1: "Cu",
                    M2: "Ag",
                    atomic_ratio: "3:1",
                    small_molecule_modifier: "ethylenediamine",
                    rationale: "Amines help [C1].",
                },
            ],
        }),
    ])
    const knowledge = new FakeKnowledge({ kb_principles: [chunk("kb_principles", "c1", "Amines help.")] })
    const ctx = setup(
        { dry_run: false },
        {
            chat: () => chat,
            knowledge: () => knowledge,
            memory: () => {
                throw new Error("disk full")
            },
        },
    )
    try {
        await ctx.worker.start()

        assert.equal(ctx.store.getRun(ctx.runId)?.status, "completed")
        assert.deepEqual(payloadOf(ctx.store, ctx.runId, "memory_unavailable"), { error: "disk full" })
        assert.deepEqual(payloadOf(ctx.store, ctx.runId, "final_output").citations, { C1: "kb:kb_principles__c1" })
        assert.equal(payloadOf(ctx.store, ctx.runId, "run_started").temperature, 0.7)
        assert.equal(chat.remaining, 0)
    } finally {
        ctx.close()
    }
})

test("a pending batch cancel stops the run before it starts", async () => {
    const ctx = setup({ dry_run: true })
    try {
        ctx.store.requestCancel("batch", ctx.batchId, "user")
        await ctx.worker.start()

        const run = ctx.store.getRun(ctx.runId)
        assert.equal(run?.status, "canceled")
        assert.equal(run?.error, "batch_cancel_requested")
        assert.equal(ctx.store.getBatch(ctx.batchId)?.status, "canceled")
        assert.deepEqual(payloadOf(ctx.store, ctx.runId, "run_canceled"), { reason: "batch_cancel_requested" })
        assert.equal(ctx.store.acknowledgeCancel("batch", ctx.batchId), 0)
        assert.deepEqual(ctx.reporter.finished, [["run", "canceled"]])
    } finally {
        ctx.close()
    }
})

test("a run cancel requested while the model is planning stops before the next action", async () => {
    const knowledge = new FakeKnowledge({ kb_principles: [chunk("kb_principles", "c1", "Amines help.")] })
    const chat = new ScriptedChat([
        reply({
            think: "Search.",
            subtasks: [{ type: "kb_search", kb_name: "kb_principles", query: "Cu Ag" }, { type: "generate_recipes" }],
        }),
        () => {
            ctx.store.requestCancel("run", ctx.runId, "user")
            return reply({
                think: "Search again.",
                subtasks: [{ type: "kb_search", kb_name: "kb_principles", query: "amines" }, { type: "generate_recipes" }],
            })
        },
    ])
    const ctx = setup({ dry_run: false }, { chat: () => chat, knowledge: () => knowledge })
    try {
        await ctx.worker.start()

        const run = ctx.store.getRun(ctx.runId)
        assert.equal(run?.status, "canceled")
        assert.equal(run?.error, "cancel_requested")
        assert.deepEqual(payloadOf(ctx.store, ctx.runId, "run_canceled"), { reason: "cancel_requested" })
        assert.equal(ctx.store.acknowledgeCancel("run", ctx.runId), 0)
        assert.equal(ctx.store.getBatch(ctx.batchId)?.status, "canceled")
        assert.equal(knowledge.queries.length, 1)
        assert.equal(chat.calls.length, 2)
        assert.equal(chat.remaining, 0)
        assert.equal(ctx.store.countEventTypesForRun(ctx.runId).kb_query, 1)
        assert.deepEqual(ctx.reporter.finished, [["run", "canceled"]])
    } finally {
        ctx.close()
    }
})

test("a store error while recording a failure does not stop the loop", async () => {
    const store = new LockedBatchStore(":memory:")
    const memory = new SqliteMemoryStore({ dbPath: ":memory:" })
    const batch = store.createBatch({ user_request: "x", n_runs: 2, recipes_per_run: 1, config: { dry_run: true } })
    const first = store.createRun(batch.batch_id, 1)
    const second = store.createRun(batch.batch_id, 2)
    const reporter = new RecordingReporter()
    const worker = new RunWorker({ store, config, reporter, stopWhenIdle: true, factories: { memory: () => memory } })
    try {
        await worker.start()

        for (const run of [first, second]) {
            const stored = store.getRun(run.run_id)
            assert.equal(stored?.status, "failed")
            assert.equal(stored?.error, "worker_unhandled_exception: database is locked")
            assert.equal(payloadOf(store, run.run_id, "run_failed").error, "worker_unhandled_exception: database is locked")
        }
        assert.deepEqual(reporter.failures, [
            [first.run_id, "database is locked"],
            [second.run_id, "database is locked"],
        ])
        assert.deepEqual(reporter.finished, [])
        assert.equal(reporter.idle, 1)
    } finally {
        worker.close()
        memory.close()
        store.close()
    }
})

test("missing runtime configuration fails the run with the missing keys", async () => {
    const ctx = setup(
        { dry_run: false },
        {
            chat: () => {
                throw new ConfigurationError("OPENAI_API_KEY is not set.", { key: "OPENAI_API_KEY" })
            },
            knowledge: () => {
                throw new ConfigurationError("KB_BASE_URL is not set.", { key: "KB_BASE_URL" })
            },
        },
    )
    try {
        await ctx.worker.start()

        const run = ctx.store.getRun(ctx.runId)
        assert.equal(run?.status, "failed")
        assert.equal(run?.error, "Missing required runtime configuration for normal runs. Missing: OPENAI_API_KEY, KB_BASE_URL")
        assert.deepEqual(payloadOf(ctx.store, ctx.runId, "run_failed").missing, ["OPENAI_API_KEY", "KB_BASE_URL"])
        assert.equal(ctx.store.getBatch(ctx.batchId)?.status, "failed")
    } finally {
        ctx.close()
    }
})

test("learn jobs run after queued runs and record their delta", async () => {
    const ctx = setup({ dry_run: true }, {}, true)
    try {
        assert.equal(await ctx.worker.runOnce(), true)
        ctx.store.upsertFeedback({ run_id: ctx.runId, score: 4, pros: "clear", cons: "", other: "" })
        const job = enqueueLearnJob(ctx.store, ctx.runId)

        assert.equal(await ctx.worker.runOnce(), true)
        assert.equal(await ctx.worker.runOnce(), false)

        assert.equal(ctx.store.getRbJob(job.rb_job_id)?.status, "completed")
        const [delta] = ctx.store.listRbDeltasForRun(ctx.runId)
        assert.deepEqual(payloadOf(ctx.store, ctx.runId, "rb_job_completed"), {
            rb_job_id: job.rb_job_id,
            kind: "learn",
            delta_id: delta?.delta_id,
        })
        assert.deepEqual(ctx.reporter.claimed, [
            { kind: "run", id: ctx.runId },
            { kind: "learn_job", id: job.rb_job_id, runId: ctx.runId },
        ])
    } finally {
        ctx.close()
    }
})

test("a learn job without feedback fails", async () => {
    const ctx = setup({ dry_run: true }, {}, true)
    try {
        const job = enqueueLearnJob(ctx.store, ctx.runId)
        ctx.store.updateRunStatus(ctx.runId, "completed")

        await ctx.worker.start()

        const stored = ctx.store.getRbJob(job.rb_job_id)
        assert.equal(stored?.status, "failed")
        assert.equal(stored?.error, "rb_learn_failed: Feedback not found (required for learn).")
        assert.equal(payloadOf(ctx.store, ctx.runId, "rb_learn_failed").error, "Feedback not found (required for learn).")
        assert.deepEqual(ctx.reporter.finished, [["learn_job", "failed"]])
    } finally {
        ctx.close()
    }
})

test("start fails runs left running by a previous process", async () => {
    const ctx = setup({ dry_run: true })
    try {
        assert.equal(ctx.store.claimNextQueuedRun()?.run_id, ctx.runId)

        await ctx.worker.start()

        const run = ctx.store.getRun(ctx.runId)
        assert.equal(run?.status, "failed")
        assert.equal(run?.error, "server_restarted")
        assert.equal(ctx.store.getBatch(ctx.batchId)?.status, "failed")
        assert.deepEqual(ctx.reporter.claimed, [])
        assert.equal(ctx.reporter.idle, 1)
    } finally {
        ctx.close()
    }
})
