import express, { type NextFunction, type Request, type Response } from "express"
import type { Server } from "node:http"
import { WebSocketServer, type WebSocket } from "ws"
import { z } from "zod"
import { MEMORY_ROLES, MEMORY_STATUSES, MEMORY_TYPES, type AppConfig } from "../config/appConfig.js"
import { decodeCursor, encodeCursor, type Page, type PageCursor } from "../db/records.js"
import type { SqliteStore } from "../db/sqliteStore.js"
import {
    ConfigurationError,
    DependencyUnavailableError,
    IdempotencyConflictError,
    LearnError,
    MemoryStoreError,
    NotFoundError,
    StoreError,
    ValidationError,
    errorMessage,
} from "../errors.js"
import { logScoped } from "../jobLogger.js"
import { memoryToRecord, type MemoryStore } from "../memory/memoryStore.js"
import { createBatchIdempotent, parseCreateBatchRequest } from "../runtime/batchService.js"
import { enqueueLearnJob, rollbackDelta, syncMemIndex } from "../runtime/learnJobs.js"
import type { JsonObject } from "../util/json.js"

export interface ApiDeps {
    store: SqliteStore
    config: AppConfig
    /** Memory routes answer 503 when this throws. */
    memory: () => MemoryStore
}

const API_ACTOR = "api"

function parseInput<Output, Input>(schema: z.ZodType<Output, z.ZodTypeDef, Input>, input: unknown): Output {
    const parsed = schema.safeParse(input ?? {})
    if (!parsed.success) {
        const issue = parsed.error.issues[0]
        const field = issue?.path.join(".") || "body"
        throw new ValidationError(`${field}: ${issue?.message ?? "invalid input"}`, { field })
    }
    return parsed.data
}

const csv = z
    .string()
    .optional()
    .transform((value) =>
        value
            ? value
                  .split(",")
                  .map((item) => item.trim())
                  .filter(Boolean)
            : undefined,
    )

const flag = z
    .enum(["true", "false", "1", "0"])
    .optional()
    .transform((value) => value === "true" || value === "1")

const PageQuerySchema = z.object({
    limit: z.coerce.number().int().min(1).max(500).default(50),
    cursor: z.string().optional(),
    status: csv,
})

const RunsQuerySchema = PageQuerySchema.extend({ batch_id: z.string().optional() })

const EventsQuerySchema = PageQuerySchema.extend({
    event_type: csv,
    include_payload: flag,
    since: z.coerce.number().optional(),
})

const EvidenceQuerySchema = PageQuerySchema.extend({ include_content: flag })

const MemoriesQuerySchema = PageQuerySchema.extend({ role: csv, type: csv, include_content: flag })

const CancelBodySchema = z.object({ reason: z.string().trim().optional() })

const FeedbackBodySchema = z.object({
    score: z.number().min(0).max(10).nullable().default(null),
    pros: z.string().default(""),
    cons: z.string().default(""),
    other: z.string().default(""),
    extra: z.record(z.unknown()).default({}),
})

const MemoryCreateSchema = z.object({
    role: z.enum(MEMORY_ROLES).default("global"),
    type: z.enum(MEMORY_TYPES).default("manual_note"),
    content: z.string().trim().min(1, "content must not be empty"),
    extra: z.record(z.unknown()).default({}),
})

const MemoryPatchSchema = z.object({
    role: z.enum(MEMORY_ROLES).optional(),
    type: z.enum(MEMORY_TYPES).optional(),
    status: z.enum(MEMORY_STATUSES).optional(),
    content: z.string().trim().min(1, "content must not be empty").optional(),
    extra: z.record(z.unknown()).optional(),
})

const MemorySearchSchema = z.object({
    query: z.string().trim().min(1, "query must not be empty"),
    top_k: z.number().int().min(1).max(50).default(8),
    role: z.array(z.enum(MEMORY_ROLES)).optional(),
    status: z.array(z.enum(MEMORY_STATUSES)).default(["active"]),
    type: z.array(z.enum(MEMORY_TYPES)).optional(),
})

const RollbackBodySchema = z.object({
    delta_id: z.string().trim().optional(),
    reason: z.string().trim().optional(),
})

function cursorFrom(raw: string | undefined): PageCursor | null {
    if (!raw) return null
    const cursor = decodeCursor(raw)
    if (!cursor) throw new ValidationError("Invalid cursor.", { cursor: raw })
    return cursor
}

/** Pages go out with an opaque cursor string. */
function pageJson<T>(page: Page<T>): { items: T[]; has_more: boolean; next_cursor: string | null } {
    return { ...page, next_cursor: page.next_cursor ? encodeCursor(page.next_cursor) : null }
}

/** Maps the error taxonomy onto `{error: {code, message, details?}}`. */
export function toErrorResponse(error: unknown): { status: number; body: JsonObject } {
    const body = (code: string, message: string, details?: JsonObject): JsonObject => ({
        error: details ? { code, message, details } : { code, message },
    })
    if (error instanceof ValidationError) {
        return { status: 400, body: body("validation_error", error.message, error.details) }
    }
    if (error instanceof MemoryStoreError) return { status: 400, body: body("invalid_memory", error.message) }
    if (error instanceof NotFoundError) return { status: 404, body: body("not_found", error.message) }
    if (error instanceof IdempotencyConflictError) {
        return { status: 409, body: body("idempotency_conflict", error.message) }
    }
    if (error instanceof LearnError) return { status: 409, body: body("learn_precondition_failed", error.message) }
    if (error instanceof DependencyUnavailableError) {
        return { status: 503, body: body("dependency_unavailable", error.message, { missing: error.missing }) }
    }
    if (error instanceof ConfigurationError) {
        return {
            status: 503,
            body: body("dependency_unavailable", error.message, error.key ? { missing: [error.key] } : undefined),
        }
    }
    if (error instanceof StoreError) return { status: 500, body: body("store_error", error.message) }
    return { status: 500, body: body("internal_error", errorMessage(error)) }
}

export function createApiApp(deps: ApiDeps): express.Express {
    const { store, config } = deps
    const app = express()

    app.use((req, res, next) => {
        res.setHeader("Access-Control-Allow-Origin", "*")
        res.setHeader("Access-Control-Allow-Methods", "GET,POST,PUT,PATCH,OPTIONS")
        res.setHeader("Access-Control-Allow-Headers", "Content-Type, Idempotency-Key")
        if (req.method === "OPTIONS") {
            res.sendStatus(200)
            return
        }
        next()
    })
    app.use(express.json({ limit: "1mb" }))

    const requireBatch = (batchId: string) => {
        const batch = store.getBatch(batchId)
        if (!batch) throw new NotFoundError("Batch not found.")
        return batch
    }
    const requireRun = (runId: string) => {
        const run = store.getRun(runId)
        if (!run) throw new NotFoundError("Run not found.")
        return run
    }
    const openMemory = (): MemoryStore => {
        try {
            return deps.memory()
        } catch (error) {
            throw new DependencyUnavailableError(`Memory store unavailable: ${errorMessage(error)}`, ["memory_store"])
        }
    }
    const requireMemory = (memory: MemoryStore, memId: string) => {
        const item = memory.get(memId)
        if (!item) throw new NotFoundError("Memory not found.")
        return item
    }

    app.get("/api/v1/health", (_req, res) => {
        res.json({
            ok: true,
            batches: store.countByStatus("batches"),
            runs: store.countByStatus("runs"),
            rb_jobs: store.countByStatus("rb_jobs"),
        })
    })

    // --- batches

    app.post("/api/v1/batches", (req, res) => {
        const request = parseCreateBatchRequest(req.body, config)
        const responseJson = createBatchIdempotent(store, {
            key: req.header("Idempotency-Key") ?? null,
            request,
            config,
        })
        res.status(201).type("application/json").send(responseJson)
    })

    app.get("/api/v1/batches", (req, res) => {
        const query = parseInput(PageQuerySchema, req.query)
        res.json(pageJson(store.listBatchesPage({ limit: query.limit, cursor: cursorFrom(query.cursor), statuses: query.status })))
    })

    app.get("/api/v1/batches/:id", (req, res) => {
        const batch = requireBatch(req.params.id)
        res.json({ batch, runs: store.listRunsForBatch(batch.batch_id) })
    })

    app.post("/api/v1/batches/:id/cancel", (req, res) => {
        const batch = requireBatch(req.params.id)
        const body = parseInput(CancelBodySchema, req.body)
        const cancelId = store.requestCancel("batch", batch.batch_id, body.reason || null)
        res.status(202).json({ cancel_id: cancelId, status: "requested" })
    })

    // --- runs

    app.get("/api/v1/runs", (req, res) => {
        const query = parseInput(RunsQuerySchema, req.query)
        res.json(
            pageJson(
                store.listRunsPage({
                    limit: query.limit,
                    cursor: cursorFrom(query.cursor),
                    statuses: query.status,
                    batch_id: query.batch_id ?? null,
                }),
            ),
        )
    })

    app.get("/api/v1/runs/:id", (req, res) => {
        res.json({ run: requireRun(req.params.id) })
    })

    app.post("/api/v1/runs/:id/cancel", (req, res) => {
        const run = requireRun(req.params.id)
        const body = parseInput(CancelBodySchema, req.body)
        const cancelId = store.requestCancel("run", run.run_id, body.reason || null)
        res.status(202).json({ cancel_id: cancelId, status: "requested" })
    })

    app.get("/api/v1/runs/:id/output", (req, res) => {
        const run = requireRun(req.params.id)
        const event = store.getLatestEvent(run.run_id, "final_output")
        if (!event) throw new NotFoundError("Run output not found.")
        const payload = event.payload ?? {}
        res.json({
            run_id: run.run_id,
            status: run.status,
            recipes_json: payload.recipes_json ?? null,
            citations: payload.citations ?? {},
            memory_ids: payload.memory_ids ?? [],
        })
    })

    app.get("/api/v1/runs/:id/evidence", (req, res) => {
        const run = requireRun(req.params.id)
        const query = parseInput(EvidenceQuerySchema, req.query)
        res.json(
            pageJson(
                store.listEvidencePage({
                    run_id: run.run_id,
                    limit: query.limit,
                    cursor: cursorFrom(query.cursor),
                    include_content: query.include_content,
                }),
            ),
        )
    })

    app.get("/api/v1/runs/:id/evidence/:alias", (req, res) => {
        const run = requireRun(req.params.id)
        const item = store.getEvidenceItem(run.run_id, req.params.alias)
        if (!item) throw new NotFoundError("Evidence not found.")
        res.json(item)
    })

    app.get("/api/v1/runs/:id/events", (req, res) => {
        const run = requireRun(req.params.id)
        const query = parseInput(EventsQuerySchema, req.query)
        res.json(
            pageJson(
                store.listEventsPage({
                    run_id: run.run_id,
                    limit: query.limit,
                    cursor: cursorFrom(query.cursor),
                    event_types: query.event_type,
                    include_payload: query.include_payload,
                    since: query.since ?? null,
                }),
            ),
        )
    })

    // --- feedback and learn

    app.put("/api/v1/runs/:id/feedback", (req, res) => {
        const run = requireRun(req.params.id)
        const body = parseInput(FeedbackBodySchema, req.body)
        const feedback = store.upsertFeedback({ run_id: run.run_id, ...body })
        const job = enqueueLearnJob(store, run.run_id)
        res.json({ feedback, rb_job: job })
    })

    app.get("/api/v1/runs/:id/feedback", (req, res) => {
        const run = requireRun(req.params.id)
        const feedback = store.getFeedbackForRun(run.run_id)
        if (!feedback) throw new NotFoundError("Feedback not found.")
        res.json({ feedback, rb_job: store.getLatestRbJobForRun(run.run_id, { kind: "learn" }) })
    })

    app.post("/api/v1/runs/:id/learn", (req, res) => {
        const run = requireRun(req.params.id)
        if (!store.getFeedbackForRun(run.run_id)) throw new LearnError("Feedback not found (required for learn).")
        res.status(202).json({ rb_job: enqueueLearnJob(store, run.run_id) })
    })

    app.post("/api/v1/runs/:id/rollback", (req, res) => {
        const run = requireRun(req.params.id)
        const body = parseInput(RollbackBodySchema, req.body)
        const deltaId = rollbackDelta(store, openMemory(), {
            runId: run.run_id,
            deltaId: body.delta_id || null,
            reason: body.reason || "api_rollback",
        })
        res.json({ delta_id: deltaId, status: "rolled_back" })
    })

    app.get("/api/v1/runs/:id/deltas", (req, res) => {
        const run = requireRun(req.params.id)
        res.json({
            deltas: store.listRbDeltasForRun(run.run_id),
            rb_jobs: store.listRbJobsForRun(run.run_id),
        })
    })

    // --- memories

    app.get("/api/v1/memories", (req, res) => {
        const query = parseInput(MemoriesQuerySchema, req.query)
        const page = store.listMemIndexPage({
            limit: Math.min(query.limit, config.memory.mem_list_max_limit),
            cursor: cursorFrom(query.cursor),
            roles: query.role,
            statuses: query.status,
            types: query.type,
        })
        if (!query.include_content) {
            res.json(pageJson(page))
            return
        }
        const items = openMemory().getMany(page.items.map((item) => item.mem_id))
        res.json({ ...pageJson(page), items: items.map(memoryToRecord) })
    })

    app.post("/api/v1/memories/search", (req, res) => {
        const body = parseInput(MemorySearchSchema, req.body)
        const results = openMemory().query(body.query, body.top_k, {
            role: body.role,
            status: body.status,
            type: body.type,
        })
        res.json({ items: results.map((result) => ({ ...memoryToRecord(result.item), distance: result.distance })) })
    })

    app.get("/api/v1/memories/:id", (req, res) => {
        res.json(memoryToRecord(requireMemory(openMemory(), req.params.id)))
    })

    app.post("/api/v1/memories", (req, res) => {
        const body = parseInput(MemoryCreateSchema, req.body)
        const memory = openMemory()
        const created = memory.upsert({
            status: "active",
            role: body.role,
            type: body.type,
            content: body.content,
            source_run_id: null,
            extra: body.extra,
        })
        syncMemIndex(store, created)
        store.appendMemEditLog({
            mem_id: created.mem_id,
            actor: API_ACTOR,
            reason: "manual_create",
            before: {},
            after: memoryToRecord(created),
        })
        res.status(201).json(memoryToRecord(created))
    })

    app.patch("/api/v1/memories/:id", (req, res) => {
        const body = parseInput(MemoryPatchSchema, req.body)
        const memory = openMemory()
        const before = requireMemory(memory, req.params.id)
        const after = memory.upsert({
            mem_id: before.mem_id,
            status: body.status ?? before.status,
            role: body.role ?? before.role,
            type: body.type ?? before.type,
            content: body.content ?? before.content,
            source_run_id: before.source_run_id,
            schema_version: before.schema_version,
            extra: body.extra ?? before.extra,
            preserve_created_at: true,
        })
        syncMemIndex(store, after)
        store.appendMemEditLog({
            mem_id: after.mem_id,
            actor: API_ACTOR,
            reason: "manual_update",
            before: memoryToRecord(before),
            after: memoryToRecord(after),
        })
        res.json(memoryToRecord(after))
    })

    app.post("/api/v1/memories/:id/archive", (req, res) => {
        const memory = openMemory()
        const before = requireMemory(memory, req.params.id)
        const after = memory.archive(before.mem_id)
        syncMemIndex(store, after)
        if (before.status !== after.status) {
            store.appendMemEditLog({
                mem_id: after.mem_id,
                actor: API_ACTOR,
                reason: "manual_archive",
                before: memoryToRecord(before),
                after: memoryToRecord(after),
            })
        }
        res.json(memoryToRecord(after))
    })

    app.get("/api/v1/memories/:id/edits", (req, res) => {
        const query = parseInput(PageQuerySchema, req.query)
        res.json({ items: store.listMemEditLog(req.params.id, query.limit) })
    })

    app.use((_req, res) => {
        res.status(404).json({ error: { code: "not_found", message: "Route not found." } })
    })

    app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
        const { status, body } = toErrorResponse(error)
        if (status >= 500) logScoped("api", `${req.method} ${req.path} failed`, error)
        res.status(status).json(body)
    })

    return app
}

const SubscribeMessageSchema = z.object({
    type: z.enum(["subscribe", "unsubscribe"]),
    run_id: z.string().trim().min(1),
})

export interface RunStatusSocket {
    wss: WebSocketServer
    close(): void
}

function buildRunStatusPayload(store: SqliteStore, runId: string): string {
    const run = store.getRun(runId)
    const [lastEvent] = run ? store.listLatestEvents({ run_id: runId, limit: 1 }) : []
    return JSON.stringify({
        type: "run_status",
        run_id: runId,
        run,
        last_event: lastEvent ?? null,
    })
}

/**
 * Pushes `run_status` snapshots on `/ws`. A client sends
 * `{"type": "subscribe", "run_id": "..."}` and gets the current snapshot, then
 * a new one whenever the run's status or latest event changes.
 */
export function attachRunStatusSocket(
    server: Server,
    store: SqliteStore,
    options: { intervalMs?: number } = {},
): RunStatusSocket {
    const wss = new WebSocketServer({ server, path: "/ws" })
    const subscriptions = new Map<WebSocket, Set<string>>()
    const lastPayloads = new Map<string, string>()

    const send = (socket: WebSocket, data: string) => {
        if (socket.readyState === socket.OPEN) socket.send(data)
    }

    wss.on("connection", (socket) => {
        subscriptions.set(socket, new Set())
        socket.on("close", () => subscriptions.delete(socket))
        socket.on("message", (data) => {
            let message: unknown
            try {
                message = JSON.parse(data.toString())
            } catch (error) {
                send(socket, JSON.stringify({ type: "error", message: `Invalid JSON: ${errorMessage(error)}` }))
                return
            }
            const parsed = SubscribeMessageSchema.safeParse(message)
            if (!parsed.success) {
                send(socket, JSON.stringify({ type: "error", message: "Expected {type: subscribe|unsubscribe, run_id}." }))
                return
            }
            const runIds = subscriptions.get(socket) ?? new Set<string>()
            subscriptions.set(socket, runIds)
            if (parsed.data.type === "unsubscribe") {
                runIds.delete(parsed.data.run_id)
                return
            }
            runIds.add(parsed.data.run_id)
            send(socket, buildRunStatusPayload(store, parsed.data.run_id))
        })
    })

    const timer = setInterval(() => {
        const watched = new Set<string>()
        for (const runIds of subscriptions.values()) for (const runId of runIds) watched.add(runId)

        for (const runId of watched) {
            let payload: string
            try {
                payload = buildRunStatusPayload(store, runId)
            } catch (error) {
                logScoped("ws", `run_status poll for ${runId} failed`, error)
                continue
            }
            if (payload === lastPayloads.get(runId)) continue
            lastPayloads.set(runId, payload)
            for (const [socket, runIds] of subscriptions) {
                if (runIds.has(runId)) send(socket, payload)
            }
        }
        for (const runId of lastPayloads.keys()) {
            if (!watched.has(runId)) lastPayloads.delete(runId)
        }
    }, options.intervalMs ?? 1000)

    return {
        wss,
        close() {
            clearInterval(timer)
            wss.close()
        },
    }
}
