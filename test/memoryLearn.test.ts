import assert from "node:assert/strict"
import { test } from "node:test"
import { loadAppConfig, type AppConfig } from "../src/config/appConfig.js"
import { SqliteStore } from "../src/db/sqliteStore.js"
import { LearnError } from "../src/errors.js"
import type { ChatMessage } from "../src/llm/chatClient.js"
import { SqliteMemoryStore } from "../src/memory/memoryStore.js"
import {
    DerefBudget,
    dryRunProposals,
    learnForRun,
    safeLearnForRun,
    sanitizeEventPayload,
    truncateStrings,
    type LearnDeps,
} from "../src/runtime/memoryLearn.js"
import { isRecord } from "../src/util/json.js"
import { reply, ScriptedChat, toolCall } from "./fakes.js"

const baseConfig = loadAppConfig()

function setup(options: { feedback?: boolean; config?: AppConfig } = {}) {
    const store = new SqliteStore(":memory:")
    const memory = new SqliteMemoryStore({ dbPath: ":memory:", embeddingDim: 32 })
    const batch = store.createBatch({ user_request: "x", n_runs: 1, recipes_per_run: 1, config: {} })
    const runId = store.createRun(batch.batch_id, 1).run_id
    if (options.feedback ?? true) {
        store.upsertFeedback({ run_id: runId, score: 8, pros: "good yield", cons: "", other: "" })
    }
    const deps = (chat: ScriptedChat | null, dryRun = false): LearnDeps => ({
        store,
        memory,
        config: options.config ?? baseConfig,
        chat,
        dryRun,
    })
    return {
        store,
        memory,
        runId,
        deps,
        close() {
            memory.close()
            store.close()
        },
    }
}

function toolResult(message: ChatMessage | undefined): Record<string, unknown> {
    assert.equal(message?.role, "tool")
    const parsed: unknown = JSON.parse(message?.content ?? "null")
    assert.ok(isRecord(parsed))
    return parsed
}

function errorCode(result: Record<string, unknown>): unknown {
    return isRecord(result.error) ? result.error.code : undefined
}

test("budget blocks once calls or characters run out", () => {
    const budget = new DerefBudget(2, 1, 100, 10, 50)
    assert.equal(budget.canOpenFull(), true)
    budget.consume(true, 20)
    assert.equal(budget.canOpenFull(), false)
    assert.equal(budget.canOpenAny(), true)
    budget.consume(false, 90)
    assert.equal(budget.canOpenAny(), false)
    assert.deepEqual(budget.usage(), {
        used_calls_total: 2,
        used_full_calls: 1,
        used_chars_total: 110,
        max_calls_total: 2,
        max_full_calls: 1,
        max_chars_total: 100,
    })
})

test("payload sanitizing truncates nested strings and drops planner thoughts", () => {
    assert.deepEqual(truncateStrings({ a: "abcdef", b: ["abcdef", 3] }, 3), { a: "ab…", b: ["ab…", 3] })
    assert.deepEqual(sanitizeEventPayload("recap_info", { think: "secret", task_name: "t" }, 100), { task_name: "t" })
    assert.deepEqual(sanitizeEventPayload("kb_query", { think: "kept" }, 100), { think: "kept" })
})

test("dry-run learn records one delta with two additions", async () => {
    const ctx = setup()
    try {
        const job = ctx.store.createRbJob(ctx.runId)
        const deltaId = await learnForRun(ctx.deps(null, true), ctx.runId, job.rb_job_id)

        const delta = ctx.store.getRbDelta(deltaId)
        assert.equal(delta?.status, "applied")
        assert.deepEqual(delta?.extra, { rb_job_id: job.rb_job_id, strategy_version: "v1", dry_run: true })
        assert.deepEqual(
            delta?.ops.map((op) => (isRecord(op) ? op.op : null)),
            ["add", "add"],
        )

        const items = ctx.memory.list({ limit: 10 })
        assert.deepEqual(
            items.map((item) => item.content).sort(),
            dryRunProposals(ctx.runId).map((proposal) => proposal.content).sort(),
        )
        for (const item of items) {
            assert.equal(item.status, "active")
            assert.equal(item.source_run_id, ctx.runId)
            assert.equal(item.extra.dry_run, true)
            assert.equal(item.extra.strategy_version, "v1")
            assert.equal(ctx.store.listMemEditLog(item.mem_id)[0]?.reason, `learn_add:${job.rb_job_id}`)
        }
        assert.equal(ctx.store.listMemIndexPage({ limit: 10 }).items.length, 2)

        const completed = ctx.store.getLatestEvent(ctx.runId, "rb_learn_completed")?.payload
        assert.equal(completed?.delta_id, deltaId)
        assert.equal(completed?.n_ops, 2)
        assert.equal(completed?.dry_run, true)

        const snapshot = ctx.store.getLatestEvent(ctx.runId, "rb_learn_snapshot")?.payload
        assert.deepEqual(snapshot?.policy, {
            facts_only: true,
            forbidden_trace_event_types: ["llm_request", "llm_response", "rb_llm_request", "rb_llm_response"],
        })
    } finally {
        ctx.close()
    }
})

test("learning again rolls the previous delta back first", async () => {
    const ctx = setup()
    try {
        const first = await learnForRun(ctx.deps(null, true), ctx.runId, ctx.store.createRbJob(ctx.runId).rb_job_id)
        const second = await learnForRun(ctx.deps(null, true), ctx.runId, ctx.store.createRbJob(ctx.runId).rb_job_id)

        assert.notEqual(second, first)
        const previous = ctx.store.getRbDelta(first)
        assert.equal(previous?.status, "rolled_back")
        assert.equal(previous?.rolled_back_reason, "auto_rollback_before_relearn")
        assert.deepEqual(
            ctx.store.listRbDeltasForRun(ctx.runId, "applied").map((delta) => delta.delta_id),
            [second],
        )
        assert.equal(ctx.memory.list({ limit: 10, filters: { status: ["active"] } }).length, 2)
        assert.equal(ctx.memory.list({ limit: 10, filters: { status: ["archived"] } }).length, 2)
    } finally {
        ctx.close()
    }
})

test("the extractor opens facts through the deref tools", async () => {
    const ctx = setup()
    try {
        const llmEventId = ctx.store.appendEvent(ctx.runId, "llm_response", { content: "model reply" })
        ctx.store.appendEvent(ctx.runId, "kb_query", {
            kb_namespace: "kb_modulation",
            results: [
                {
                    alias: "C1",
                    ref: "kb:kb_modulation__c1",
                    source: "c1.pdf",
                    content: "amine linkers raise CO2 uptake",
                    kb_namespace: "kb_modulation",
                    chunk_id: "c1",
                },
            ],
        })
        const chat = new ScriptedChat([
            {
                toolCalls: [
                    toolCall("t1", "rb_open_feedback", { mode: "full" }),
                    toolCall("t2", "rb_open_event", { event_id: llmEventId }),
                    toolCall("t3", "rb_open_evidence", { alias: "[C1]" }),
                ],
            },
            reply({
                items: [
                    { role: "mof_expert", content: "Amine linkers raise CO2 uptake [C1]" },
                    { role: "chemist", content: "dropped" },
                ],
            }),
        ])
        const job = ctx.store.createRbJob(ctx.runId)
        const deltaId = await learnForRun(ctx.deps(chat), ctx.runId, job.rb_job_id)

        assert.equal(chat.calls.length, 2)
        const firstOptions = chat.calls[0]?.options
        assert.equal(firstOptions?.temperature, 0.2)
        assert.equal(firstOptions?.responseFormat?.json_schema.name, "rb_extract_items")
        assert.deepEqual(
            firstOptions?.tools?.map((tool) => tool.function.name),
            ["rb_list_events", "rb_open_event", "rb_open_memory", "rb_open_evidence", "rb_open_feedback", "rb_open_run_output"],
        )

        const messages = chat.calls[1]?.messages ?? []
        assert.equal(messages.length, 6)
        const feedback = toolResult(messages[3])
        assert.equal(feedback.ok, true)
        assert.equal(feedback.mode, "full")
        assert.equal(errorCode(toolResult(messages[4])), "forbidden_event_type")
        const evidence = toolResult(messages[5]).evidence
        assert.ok(isRecord(evidence))
        assert.equal(evidence.alias, "C1")
        assert.equal(evidence.content, "amine linkers raise CO2 uptake")

        assert.equal(ctx.store.countEventTypesForRun(ctx.runId).rb_source_opened, 3)

        const [item] = ctx.memory.list({ limit: 10 })
        assert.equal(item?.role, "mof_expert")
        assert.equal(item?.type, "bank_item")
        assert.equal(item?.content, "Amine linkers raise CO2 uptake [C1]")
        assert.deepEqual(item?.extra, { source_run_id: ctx.runId, strategy_version: "v1" })
        assert.equal(ctx.store.getRbDelta(deltaId)?.ops.length, 1)
    } finally {
        ctx.close()
    }
})

test("opens beyond the call budget are refused", async () => {
    const config: AppConfig = {
        ...baseConfig,
        memory: { ...baseConfig.memory, learn_deref_max_calls_total: 1 },
    }
    const ctx = setup({ config })
    try {
        const chat = new ScriptedChat([
            {
                toolCalls: [
                    toolCall("t1", "rb_open_run_output"),
                    toolCall("t2", "rb_open_memory", { mem_id: "mem:00000000-0000-4000-8000-000000000000" }),
                ],
            },
            reply({ items: [] }),
        ])
        const deltaId = await learnForRun(ctx.deps(chat), ctx.runId, ctx.store.createRbJob(ctx.runId).rb_job_id)

        const messages = chat.calls[1]?.messages ?? []
        assert.equal(toolResult(messages[3]).ok, true)
        assert.equal(errorCode(toolResult(messages[4])), "budget_exceeded")

        const opened = ctx.store.getLatestEvent(ctx.runId, "rb_source_opened")?.payload
        assert.equal(opened?.source_type, "memory")
        assert.equal(opened?.mode_used, "blocked")
        assert.equal(opened?.error_code, "budget_exceeded")
        assert.deepEqual(ctx.store.getRbDelta(deltaId)?.ops, [])
    } finally {
        ctx.close()
    }
})

test("near-duplicate proposals are merged by the model", async () => {
    const ctx = setup()
    try {
        const existing = ctx.memory.upsert({
            status: "active",
            role: "global",
            type: "bank_item",
            content: "Keep Cu below 2 wt%.",
            source_run_id: null,
            extra: { tags: ["loading"] },
        })
        const chat = new ScriptedChat([
            reply({ items: [{ role: "global", type: "bank_item", content: "Keep Cu below 2 wt%." }] }),
            reply({ content: "Keep Cu below 2 wt% on TiO2.", extra: { merged: true } }),
        ])
        const job = ctx.store.createRbJob(ctx.runId)
        const deltaId = await learnForRun(ctx.deps(chat), ctx.runId, job.rb_job_id)

        assert.equal(chat.calls[1]?.options.responseFormat?.json_schema.name, "rb_merge_result")
        assert.equal(chat.calls[1]?.options.temperature, 0)

        const merged = ctx.memory.get(existing.mem_id)
        assert.equal(merged?.content, "Keep Cu below 2 wt% on TiO2.")
        assert.deepEqual(merged?.extra, { tags: ["loading"], merged: true })
        assert.equal(merged?.created_at, existing.created_at)
        assert.equal(ctx.memory.list({ limit: 10 }).length, 1)

        const [op] = ctx.store.getRbDelta(deltaId)?.ops ?? []
        assert.ok(isRecord(op))
        assert.equal(op.op, "update")
        assert.equal(op.merge_used, true)
        assert.equal(ctx.store.listMemEditLog(existing.mem_id)[0]?.reason, `learn_merge:${job.rb_job_id}`)
    } finally {
        ctx.close()
    }
})

test("a rejected response format is retried without it", async () => {
    const ctx = setup()
    try {
        const chat = new ScriptedChat([new Error("response_format unsupported"), reply({ items: [] })])
        await learnForRun(ctx.deps(chat), ctx.runId, ctx.store.createRbJob(ctx.runId).rb_job_id)

        assert.equal(chat.calls.length, 2)
        assert.equal(chat.calls[1]?.options.responseFormat, undefined)
        const responses = ctx.store.listEventsPage({
            run_id: ctx.runId,
            limit: 10,
            event_types: ["rb_llm_response"],
            include_payload: true,
        }).items
        assert.equal(responses.length, 2)
        assert.equal(
            responses[0]?.payload?.error,
            "llm_call_failed_with_response_format: response_format unsupported",
        )
    } finally {
        ctx.close()
    }
})

test("an extractor that never stops calling tools fails the learn", async () => {
    const ctx = setup()
    try {
        const chat = new ScriptedChat(
            Array.from({ length: 12 }, (_, index) => ({ toolCalls: [toolCall(`t${index}`, "rb_list_events")] })),
        )
        const job = ctx.store.createRbJob(ctx.runId)
        await assert.rejects(learnForRun(ctx.deps(chat), ctx.runId, job.rb_job_id), {
            name: "LearnError",
            message: "Learn extractor exceeded maximum tool-calling turns.",
        })
        assert.equal(chat.calls.length, 12)
        assert.equal(ctx.store.listRbDeltasForRun(ctx.runId).length, 0)
    } finally {
        ctx.close()
    }
})

test("learn preconditions surface as rb_learn_failed events", async () => {
    const ctx = setup({ feedback: false })
    try {
        const job = ctx.store.createRbJob(ctx.runId)
        assert.deepEqual(await safeLearnForRun(ctx.deps(null, true), ctx.runId, job.rb_job_id), {
            ok: false,
            error: "Feedback not found (required for learn).",
        })
        const failed = ctx.store.getLatestEvent(ctx.runId, "rb_learn_failed")?.payload
        assert.equal(failed?.rb_job_id, job.rb_job_id)
        assert.equal(failed?.error, "Feedback not found (required for learn).")

        ctx.store.upsertFeedback({ run_id: ctx.runId, score: 2, pros: "", cons: "low yield", other: "" })
        await assert.rejects(learnForRun(ctx.deps(null), ctx.runId, job.rb_job_id), (error: unknown) => {
            return (
                error instanceof LearnError &&
                error.message === "LLM is required for learn (set RECAP_LEARN_DRY_RUN=1 for dry-run mode)."
            )
        })
        await assert.rejects(learnForRun(ctx.deps(null, true), "run_missing", job.rb_job_id), {
            message: "Run not found.",
        })
    } finally {
        ctx.close()
    }
})
