import path from "node:path"
import { randomUUID } from "node:crypto"
import { mkdirSync } from "node:fs"
import Database from "better-sqlite3"
import { NotFoundError, StoreError } from "../errors.js"
import { envString } from "../loadEnv.js"
import {
    compactJson,
    isRecord,
    parseJsonArray,
    parseJsonObject,
    readString,
    type JsonObject,
} from "../util/json.js"
import { migrate } from "./migrations.js"
import {
    TERMINAL_STATUSES,
    type BatchRecord,
    type BatchStatus,
    type CancelTargetType,
    type EventRecord,
    type EvidenceRecord,
    type FeedbackRecord,
    type MemEditRecord,
    type MemIndexRecord,
    type Page,
    type PageCursor,
    type RbDeltaRecord,
    type RbDeltaStatus,
    type RbJobRecord,
    type RbJobStatus,
    type RunRecord,
    type RunStatus,
} from "./records.js"

export type TransactionMode = "deferred" | "immediate" | "exclusive"

type BatchRow = Omit<BatchRecord, "config_snapshot"> & { config_json: string }
type EventRow = Omit<EventRecord, "payload"> & { payload_json?: string }
type FeedbackRow = Omit<FeedbackRecord, "extra"> & { extra_json: string }
type RbJobRow = Omit<RbJobRecord, "extra"> & { extra_json: string }
type RbDeltaRow = Omit<RbDeltaRecord, "ops" | "extra"> & { ops_json: string; extra_json: string }
type MemEditRow = Omit<MemEditRecord, "before" | "after" | "extra"> & {
    before_json: string
    after_json: string
    extra_json: string
}

const BATCH_COLUMNS =
    "batch_id, created_at, started_at, ended_at, user_request, n_runs, recipes_per_run, status, config_json, error"
const RUN_COLUMNS = "run_id, batch_id, run_index, created_at, started_at, ended_at, status, error"
const RB_JOB_COLUMNS =
    "rb_job_id, run_id, kind, created_at, started_at, ended_at, status, error, extra_json"
const RB_DELTA_COLUMNS =
    "delta_id, run_id, created_at, status, rolled_back_at, rolled_back_reason, ops_json, schema_version, extra_json"

const ALIAS_PATTERN = /^([A-Z]+)(\d+)$/

export function resolveDbPath(): string {
    return path.resolve(envString("RECAP_DB_PATH", path.join("data", "recap.db")))
}

export function newId(prefix: string): string {
    return `${prefix}_${randomUUID().replaceAll("-", "")}`
}

function placeholders(values: readonly unknown[]): string {
    return values.map(() => "?").join(", ")
}

function aliasOrder(alias: string): number {
    const match = ALIAS_PATTERN.exec(alias)
    return match ? Number(match[2]) : Number.MAX_SAFE_INTEGER
}

function compareAliases(a: string, b: string): number {
    return aliasOrder(a) - aliasOrder(b) || a.localeCompare(b)
}

function toPage<T>(rows: T[], limit: number, cursorOf: (row: T) => PageCursor): Page<T> {
    const has_more = rows.length > limit
    const items = has_more ? rows.slice(0, limit) : rows
    const last = items[items.length - 1]
    return {
        items,
        has_more,
        next_cursor: has_more && last ? cursorOf(last) : null,
    }
}

function toBatch(row: BatchRow): BatchRecord {
    const { config_json, ...rest } = row
    return { ...rest, config_snapshot: parseJsonObject(config_json) }
}

function toEvent(row: EventRow): EventRecord {
    const { payload_json, ...rest } = row
    return payload_json === undefined ? rest : { ...rest, payload: parseJsonObject(payload_json) }
}

function toRbJob(row: RbJobRow): RbJobRecord {
    const { extra_json, ...rest } = row
    return { ...rest, extra: parseJsonObject(extra_json) }
}

function toRbDelta(row: RbDeltaRow): RbDeltaRecord {
    const { ops_json, extra_json, ...rest } = row
    return { ...rest, ops: parseJsonArray(ops_json), extra: parseJsonObject(extra_json) }
}

export interface EventQuery {
    run_id: string
    limit: number
    event_types?: string[]
    include_payload?: boolean
    since?: number | null
    until?: number | null
}

/**
 * Durable store for batches, runs, trace events and memory-bank bookkeeping.
 * One connection per process; writes that must be atomic go through
 * `transaction`, which maps onto better-sqlite3's BEGIN variants.
 */
export class SqliteStore {
    readonly db: Database.Database
    readonly dbPath: string
    private lastTimestamp = 0

    constructor(dbPath: string = resolveDbPath()) {
        this.dbPath = dbPath === ":memory:" ? dbPath : path.resolve(dbPath)
        if (this.dbPath !== ":memory:") {
            mkdirSync(path.dirname(this.dbPath), { recursive: true })
        }
        this.db = new Database(this.dbPath)
        this.db.pragma("journal_mode = WAL")
        this.db.pragma("foreign_keys = ON")
        this.db.pragma("synchronous = NORMAL")
        migrate(this.db)
    }

    close() {
        this.db.close()
    }

    /** Epoch seconds, strictly increasing within this process. */
    now(): number {
        const wall = Date.now() / 1000
        this.lastTimestamp = wall > this.lastTimestamp ? wall : this.lastTimestamp + 1e-6
        return this.lastTimestamp
    }

    transaction<T>(fn: () => T, mode: TransactionMode = "immediate"): T {
        const tx = this.db.transaction(fn)
        return tx[mode]()
    }

    // --- idempotency

    getIdempotency(key: string): { request_hash: string; response_json: string } | null {
        const row = this.db
            .prepare<[string], { request_hash: string; response_json: string }>(
                "SELECT request_hash, response_json FROM idempotency_keys WHERE key = ?",
            )
            .get(key)
        return row ?? null
    }

    putIdempotency(key: string, requestHash: string, responseJson: string) {
        this.db
            .prepare(
                `INSERT INTO idempotency_keys(key, created_at, request_hash, response_json)
                 VALUES(@key, @created_at, @request_hash, @response_json)
                 ON CONFLICT(key) DO NOTHING`,
            )
            .run({
                key,
                created_at: this.now(),
                request_hash: requestHash,
                response_json: responseJson,
            })
    }

    // --- batches and runs

    createBatch(params: {
        user_request: string
        n_runs: number
        recipes_per_run: number
        config: JsonObject
    }): BatchRecord {
        const record: BatchRecord = {
            batch_id: newId("batch"),
            created_at: this.now(),
            started_at: null,
            ended_at: null,
            status: "queued",
            user_request: params.user_request,
            n_runs: params.n_runs,
            recipes_per_run: params.recipes_per_run,
            config_snapshot: params.config,
            error: null,
        }
        this.db
            .prepare(
                `INSERT INTO batches(batch_id, created_at, user_request, n_runs, recipes_per_run, status, config_json)
                 VALUES(@batch_id, @created_at, @user_request, @n_runs, @recipes_per_run, @status, @config_json)`,
            )
            .run({
                batch_id: record.batch_id,
                created_at: record.created_at,
                user_request: record.user_request,
                n_runs: record.n_runs,
                recipes_per_run: record.recipes_per_run,
                status: record.status,
                config_json: compactJson(record.config_snapshot),
            })
        return record
    }

    createRun(batchId: string, runIndex: number): RunRecord {
        const record: RunRecord = {
            run_id: newId("run"),
            batch_id: batchId,
            run_index: runIndex,
            created_at: this.now(),
            started_at: null,
            ended_at: null,
            status: "queued",
            error: null,
        }
        this.db
            .prepare(
                `INSERT INTO runs(run_id, batch_id, run_index, created_at, status)
                 VALUES(@run_id, @batch_id, @run_index, @created_at, @status)`,
            )
            .run({
                run_id: record.run_id,
                batch_id: record.batch_id,
                run_index: record.run_index,
                created_at: record.created_at,
                status: record.status,
            })
        return record
    }

    getBatch(batchId: string): BatchRecord | null {
        const row = this.db
            .prepare<[string], BatchRow>(`SELECT ${BATCH_COLUMNS} FROM batches WHERE batch_id = ?`)
            .get(batchId)
        return row ? toBatch(row) : null
    }

    getRun(runId: string): RunRecord | null {
        const row = this.db
            .prepare<[string], RunRecord>(`SELECT ${RUN_COLUMNS} FROM runs WHERE run_id = ?`)
            .get(runId)
        return row ?? null
    }

    listRunsForBatch(batchId: string): RunRecord[] {
        return this.db
            .prepare<[string], RunRecord>(
                `SELECT ${RUN_COLUMNS} FROM runs WHERE batch_id = ? ORDER BY run_index`,
            )
            .all(batchId)
    }

    listBatchesPage(params: {
        limit: number
        cursor?: PageCursor | null
        statuses?: string[]
    }): Page<BatchRecord> {
        const where = ["1=1"]
        const args: unknown[] = []
        if (params.statuses?.length) {
            where.push(`status IN (${placeholders(params.statuses)})`)
            args.push(...params.statuses)
        }
        if (params.cursor) {
            where.push("(created_at < ? OR (created_at = ? AND batch_id < ?))")
            args.push(params.cursor.created_at, params.cursor.created_at, params.cursor.id)
        }
        const rows = this.db
            .prepare<unknown[], BatchRow>(
                `SELECT ${BATCH_COLUMNS} FROM batches WHERE ${where.join(" AND ")}
                 ORDER BY created_at DESC, batch_id DESC LIMIT ?`,
            )
            .all(...args, params.limit + 1)
        return toPage(rows.map(toBatch), params.limit, (batch) => ({
            created_at: batch.created_at,
            id: batch.batch_id,
        }))
    }

    listRunsPage(params: {
        limit: number
        cursor?: PageCursor | null
        statuses?: string[]
        batch_id?: string | null
    }): Page<RunRecord> {
        const where = ["1=1"]
        const args: unknown[] = []
        if (params.batch_id) {
            where.push("batch_id = ?")
            args.push(params.batch_id)
        }
        if (params.statuses?.length) {
            where.push(`status IN (${placeholders(params.statuses)})`)
            args.push(...params.statuses)
        }
        if (params.cursor) {
            where.push("(created_at < ? OR (created_at = ? AND run_id < ?))")
            args.push(params.cursor.created_at, params.cursor.created_at, params.cursor.id)
        }
        const rows = this.db
            .prepare<unknown[], RunRecord>(
                `SELECT ${RUN_COLUMNS} FROM runs WHERE ${where.join(" AND ")}
                 ORDER BY created_at DESC, run_id DESC LIMIT ?`,
            )
            .all(...args, params.limit + 1)
        return toPage(rows, params.limit, (run) => ({ created_at: run.created_at, id: run.run_id }))
    }

    countByStatus(table: "batches" | "runs" | "rb_jobs"): Record<string, number> {
        const rows = this.db
            .prepare<[], { status: string; n: number }>(
                `SELECT status, COUNT(*) AS n FROM ${table} GROUP BY status ORDER BY status`,
            )
            .all()
        return Object.fromEntries(rows.map((row) => [row.status, row.n]))
    }

    updateBatchStatus(batchId: string, status: BatchStatus, error: string | null = null) {
        const ts = this.now()
        this.db
            .prepare(
                `UPDATE batches SET
                   status = @status,
                   started_at = COALESCE(started_at, @started_at),
                   ended_at = COALESCE(ended_at, @ended_at),
                   error = COALESCE(@error, error)
                 WHERE batch_id = @batch_id`,
            )
            .run({
                batch_id: batchId,
                status,
                started_at: status === "running" ? ts : null,
                ended_at: TERMINAL_STATUSES.has(status) ? ts : null,
                error,
            })
    }

    updateRunStatus(runId: string, status: RunStatus, error: string | null = null) {
        const ts = this.now()
        this.db
            .prepare(
                `UPDATE runs SET
                   status = @status,
                   started_at = COALESCE(started_at, @started_at),
                   ended_at = COALESCE(ended_at, @ended_at),
                   error = COALESCE(@error, error)
                 WHERE run_id = @run_id`,
            )
            .run({
                run_id: runId,
                status,
                started_at: status === "running" ? ts : null,
                ended_at: TERMINAL_STATUSES.has(status) ? ts : null,
                error,
            })
    }

    /**
     * Derives the batch status from its runs once all of them are terminal:
     * any failed wins, then any canceled, else completed.
     */
    refreshBatchStatus(batchId: string): BatchStatus | null {
        const batch = this.getBatch(batchId)
        if (!batch) return null
        const runs = this.listRunsForBatch(batchId)
        if (runs.length === 0 || runs.some((run) => !TERMINAL_STATUSES.has(run.status))) {
            return batch.status
        }
        const status: BatchStatus = runs.some((run) => run.status === "failed")
            ? "failed"
            : runs.some((run) => run.status === "canceled")
              ? "canceled"
              : "completed"
        this.updateBatchStatus(batchId, status)
        return status
    }

    // --- scheduling

    claimNextQueuedRun(): RunRecord | null {
        return this.transaction(() => {
            const next = this.db
                .prepare<[], { run_id: string; batch_id: string }>(
                    `SELECT run_id, batch_id FROM runs WHERE status = 'queued'
                     ORDER BY created_at ASC, run_id ASC LIMIT 1`,
                )
                .get()
            if (!next) return null

            const ts = this.now()
            const updated = this.db
                .prepare(
                    `UPDATE runs SET status = 'running', started_at = COALESCE(started_at, @ts)
                     WHERE run_id = @run_id AND status = 'queued'`,
                )
                .run({ ts, run_id: next.run_id })
            if (updated.changes !== 1) return null

            this.db
                .prepare(
                    `UPDATE batches SET status = 'running', started_at = COALESCE(started_at, @ts)
                     WHERE batch_id = @batch_id AND status = 'queued'`,
                )
                .run({ ts, batch_id: next.batch_id })
            return this.getRun(next.run_id)
        })
    }

    claimNextQueuedRbJob(): RbJobRecord | null {
        return this.transaction(() => {
            const next = this.db
                .prepare<[], { rb_job_id: string }>(
                    `SELECT rb_job_id FROM rb_jobs WHERE status = 'queued'
                     ORDER BY created_at ASC, rb_job_id ASC LIMIT 1`,
                )
                .get()
            if (!next) return null

            const updated = this.db
                .prepare(
                    `UPDATE rb_jobs SET status = 'running', started_at = COALESCE(started_at, @ts)
                     WHERE rb_job_id = @rb_job_id AND status = 'queued'`,
                )
                .run({ ts: this.now(), rb_job_id: next.rb_job_id })
            if (updated.changes !== 1) return null
            return this.getRbJob(next.rb_job_id)
        })
    }

    /**
     * Force-fails runs left `running` by a previous process and records a
     * `run_failed` event for each. Returns the number of runs touched.
     */
    reconcileRunningRuns(reason = "server_restarted"): number {
        return this.transaction(() => {
            const stuck = this.db
                .prepare<[], { run_id: string; batch_id: string }>(
                    "SELECT run_id, batch_id FROM runs WHERE status = 'running' ORDER BY created_at, run_id",
                )
                .all()
            for (const run of stuck) {
                const ts = this.now()
                this.db
                    .prepare(
                        `UPDATE runs SET status = 'failed',
                           ended_at = COALESCE(ended_at, @ts),
                           error = COALESCE(error, @reason)
                         WHERE run_id = @run_id AND status = 'running'`,
                    )
                    .run({ ts, reason, run_id: run.run_id })
                this.appendEvent(run.run_id, "run_failed", { error: reason })
            }
            for (const batchId of new Set(stuck.map((run) => run.batch_id))) {
                this.refreshBatchStatus(batchId)
            }
            return stuck.length
        })
    }

    reconcileRunningRbJobs(reason = "server_restarted"): number {
        return this.transaction(() => {
            const stuck = this.db
                .prepare<[], { rb_job_id: string; run_id: string; kind: string }>(
                    "SELECT rb_job_id, run_id, kind FROM rb_jobs WHERE status = 'running' ORDER BY created_at, rb_job_id",
                )
                .all()
            for (const job of stuck) {
                this.updateRbJobStatus(job.rb_job_id, "failed", reason)
                this.appendEvent(job.run_id, "rb_job_failed", {
                    rb_job_id: job.rb_job_id,
                    kind: job.kind,
                    error: reason,
                })
            }
            return stuck.length
        })
    }

    // --- events

    appendEvent(runId: string, eventType: string, payload: JsonObject): string {
        const eventId = newId("evt")
        this.db
            .prepare(
                `INSERT INTO events(event_id, run_id, created_at, event_type, payload_json)
                 VALUES(@event_id, @run_id, @created_at, @event_type, @payload_json)`,
            )
            .run({
                event_id: eventId,
                run_id: runId,
                created_at: this.now(),
                event_type: eventType,
                payload_json: compactJson(payload),
            })
        return eventId
    }

    getEvent(runId: string, eventId: string): EventRecord | null {
        const row = this.db
            .prepare<[string, string], EventRow>(
                `SELECT event_id, run_id, created_at, event_type, payload_json
                 FROM events WHERE run_id = ? AND event_id = ?`,
            )
            .get(runId, eventId)
        return row ? toEvent(row) : null
    }

    getLatestEvent(runId: string, eventType: string): EventRecord | null {
        const row = this.db
            .prepare<[string, string], EventRow>(
                `SELECT event_id, run_id, created_at, event_type, payload_json
                 FROM events WHERE run_id = ? AND event_type = ?
                 ORDER BY created_at DESC, event_id DESC LIMIT 1`,
            )
            .get(runId, eventType)
        return row ? toEvent(row) : null
    }

    countEventTypesForRun(runId: string, until: number | null = null): Record<string, number> {
        const args: unknown[] = [runId]
        let sql = "SELECT event_type, COUNT(*) AS n FROM events WHERE run_id = ?"
        if (until !== null) {
            sql += " AND created_at <= ?"
            args.push(until)
        }
        const rows = this.db
            .prepare<unknown[], { event_type: string; n: number }>(
                `${sql} GROUP BY event_type ORDER BY event_type`,
            )
            .all(...args)
        return Object.fromEntries(rows.map((row) => [row.event_type, row.n]))
    }

    private eventFilter(query: EventQuery): { where: string[]; args: unknown[]; columns: string } {
        const where = ["run_id = ?"]
        const args: unknown[] = [query.run_id]
        if (query.event_types?.length) {
            where.push(`event_type IN (${placeholders(query.event_types)})`)
            args.push(...query.event_types)
        }
        if (query.since !== undefined && query.since !== null) {
            where.push("created_at >= ?")
            args.push(query.since)
        }
        if (query.until !== undefined && query.until !== null) {
            where.push("created_at <= ?")
            args.push(query.until)
        }
        const columns = query.include_payload
            ? "event_id, run_id, created_at, event_type, payload_json"
            : "event_id, run_id, created_at, event_type"
        return { where, args, columns }
    }

    /** Oldest first; the cursor points at the last event already seen. */
    listEventsPage(query: EventQuery & { cursor?: PageCursor | null }): Page<EventRecord> {
        const { where, args, columns } = this.eventFilter(query)
        if (query.cursor) {
            where.push("(created_at > ? OR (created_at = ? AND event_id > ?))")
            args.push(query.cursor.created_at, query.cursor.created_at, query.cursor.id)
        }
        const rows = this.db
            .prepare<unknown[], EventRow>(
                `SELECT ${columns} FROM events WHERE ${where.join(" AND ")}
                 ORDER BY created_at ASC, event_id ASC LIMIT ?`,
            )
            .all(...args, query.limit + 1)
        return toPage(rows.map(toEvent), query.limit, (event) => ({
            created_at: event.created_at,
            id: event.event_id,
        }))
    }

    /** Newest first. */
    listLatestEvents(query: EventQuery): EventRecord[] {
        const { where, args, columns } = this.eventFilter(query)
        return this.db
            .prepare<unknown[], EventRow>(
                `SELECT ${columns} FROM events WHERE ${where.join(" AND ")}
                 ORDER BY created_at DESC, event_id DESC LIMIT ?`,
            )
            .all(...args, query.limit)
            .map(toEvent)
    }

    // --- evidence (aggregated from kb_query events)

    collectRunEvidence(runId: string): Map<string, EvidenceRecord> {
        const rows = this.db
            .prepare<[string], { created_at: number; payload_json: string }>(
                `SELECT created_at, payload_json FROM events
                 WHERE run_id = ? AND event_type = 'kb_query'
                 ORDER BY created_at ASC, event_id ASC`,
            )
            .all(runId)

        const evidence = new Map<string, EvidenceRecord>()
        for (const row of rows) {
            const payload = parseJsonObject(row.payload_json)
            const results = payload.results
            if (!Array.isArray(results)) continue
            for (const item of results) {
                if (!isRecord(item)) continue
                let alias = readString(item, "alias").trim()
                if (alias.startsWith("[") && alias.endsWith("]")) alias = alias.slice(1, -1).trim()
                if (!alias || evidence.has(alias)) continue
                const chunkId = readString(item, "chunk_id").trim()
                evidence.set(alias, {
                    alias,
                    ref: readString(item, "ref").trim(),
                    source: readString(item, "source").trim(),
                    content: readString(item, "content"),
                    kb_namespace:
                        readString(item, "kb_namespace").trim() ||
                        readString(payload, "kb_namespace").trim(),
                    chunk_id: chunkId || null,
                    created_at: row.created_at,
                })
            }
        }
        return evidence
    }

    /** Evidence in alias order (C1, C2, ..., C10); cursor id is the last alias seen. */
    listEvidencePage(params: {
        run_id: string
        limit: number
        cursor?: PageCursor | null
        include_content?: boolean
    }): Page<EvidenceRecord | Omit<EvidenceRecord, "content">> {
        let items = [...this.collectRunEvidence(params.run_id).values()].sort((a, b) =>
            compareAliases(a.alias, b.alias),
        )
        const cursor = params.cursor
        if (cursor) items = items.filter((item) => compareAliases(item.alias, cursor.id) > 0)
        const page = toPage(items.slice(0, params.limit + 1), params.limit, (item) => ({
            created_at: item.created_at,
            id: item.alias,
        }))
        if (params.include_content) return page
        return {
            ...page,
            items: page.items.map(({ content: _content, ...rest }) => rest),
        }
    }

    getEvidenceItem(runId: string, alias: string): EvidenceRecord | null {
        const key = alias.trim()
        if (!key) return null
        return this.collectRunEvidence(runId).get(key) ?? null
    }

    // --- cancellation

    requestCancel(targetType: CancelTargetType, targetId: string, reason: string | null = null): string {
        const cancelId = newId("cancel")
        this.db
            .prepare(
                `INSERT INTO cancel_requests(cancel_id, created_at, target_type, target_id, status, reason)
                 VALUES(@cancel_id, @created_at, @target_type, @target_id, 'requested', @reason)`,
            )
            .run({
                cancel_id: cancelId,
                created_at: this.now(),
                target_type: targetType,
                target_id: targetId,
                reason,
            })
        return cancelId
    }

    isCancelRequested(targetType: CancelTargetType, targetId: string): boolean {
        const row = this.db
            .prepare<[string, string], { found: number }>(
                `SELECT 1 AS found FROM cancel_requests
                 WHERE target_type = ? AND target_id = ? AND status IN ('requested', 'acknowledged')
                 LIMIT 1`,
            )
            .get(targetType, targetId)
        return row !== undefined
    }

    /** Moves `requested` to `acknowledged`; repeated calls change nothing. */
    acknowledgeCancel(targetType: CancelTargetType, targetId: string): number {
        return this.db
            .prepare(
                `UPDATE cancel_requests SET status = 'acknowledged'
                 WHERE target_type = @target_type AND target_id = @target_id AND status = 'requested'`,
            )
            .run({ target_type: targetType, target_id: targetId }).changes
    }

    // --- feedback

    upsertFeedback(params: {
        run_id: string
        score: number | null
        pros: string
        cons: string
        other: string
        extra?: JsonObject
    }): FeedbackRecord {
        if (!this.getRun(params.run_id)) throw new NotFoundError("Run not found.")
        return this.transaction(() => {
            const ts = this.now()
            const existing = this.db
                .prepare<[string], { feedback_id: string; created_at: number }>(
                    "SELECT feedback_id, created_at FROM feedback WHERE run_id = ?",
                )
                .get(params.run_id)
            const record: FeedbackRecord = {
                feedback_id: existing?.feedback_id ?? newId("fb"),
                run_id: params.run_id,
                created_at: existing?.created_at ?? ts,
                updated_at: ts,
                score: params.score,
                pros: params.pros,
                cons: params.cons,
                other: params.other,
                schema_version: 1,
                extra: params.extra ?? {},
            }
            this.db
                .prepare(
                    `INSERT INTO feedback(feedback_id, run_id, created_at, updated_at, score, pros, cons, other, schema_version, extra_json)
                     VALUES(@feedback_id, @run_id, @created_at, @updated_at, @score, @pros, @cons, @other, @schema_version, @extra_json)
                     ON CONFLICT(run_id) DO UPDATE SET
                       updated_at = excluded.updated_at,
                       score = excluded.score,
                       pros = excluded.pros,
                       cons = excluded.cons,
                       other = excluded.other,
                       schema_version = excluded.schema_version,
                       extra_json = excluded.extra_json`,
                )
                .run({
                    feedback_id: record.feedback_id,
                    run_id: record.run_id,
                    created_at: record.created_at,
                    updated_at: record.updated_at,
                    score: record.score,
                    pros: record.pros,
                    cons: record.cons,
                    other: record.other,
                    schema_version: record.schema_version,
                    extra_json: compactJson(record.extra),
                })
            return record
        })
    }

    getFeedbackForRun(runId: string): FeedbackRecord | null {
        const row = this.db
            .prepare<[string], FeedbackRow>(
                `SELECT feedback_id, run_id, created_at, updated_at, score, pros, cons, other, schema_version, extra_json
                 FROM feedback WHERE run_id = ?`,
            )
            .get(runId)
        if (!row) return null
        const { extra_json, ...rest } = row
        return { ...rest, extra: parseJsonObject(extra_json) }
    }

    // --- learn jobs

    createRbJob(runId: string, kind = "learn", extra: JsonObject = {}): RbJobRecord {
        if (!this.getRun(runId)) throw new NotFoundError("Run not found.")
        const record: RbJobRecord = {
            rb_job_id: newId("rbjob"),
            run_id: runId,
            kind: kind.trim() || "learn",
            created_at: this.now(),
            started_at: null,
            ended_at: null,
            status: "queued",
            error: null,
            extra,
        }
        this.db
            .prepare(
                `INSERT INTO rb_jobs(rb_job_id, run_id, kind, created_at, status, extra_json)
                 VALUES(@rb_job_id, @run_id, @kind, @created_at, @status, @extra_json)`,
            )
            .run({
                rb_job_id: record.rb_job_id,
                run_id: record.run_id,
                kind: record.kind,
                created_at: record.created_at,
                status: record.status,
                extra_json: compactJson(extra),
            })
        return record
    }

    getRbJob(rbJobId: string): RbJobRecord | null {
        const row = this.db
            .prepare<[string], RbJobRow>(`SELECT ${RB_JOB_COLUMNS} FROM rb_jobs WHERE rb_job_id = ?`)
            .get(rbJobId)
        return row ? toRbJob(row) : null
    }

    listRbJobsForRun(
        runId: string,
        options: { kind?: string; statuses?: RbJobStatus[]; limit?: number } = {},
    ): RbJobRecord[] {
        const where = ["run_id = ?"]
        const args: unknown[] = [runId]
        if (options.kind !== undefined) {
            where.push("kind = ?")
            args.push(options.kind)
        }
        if (options.statuses?.length) {
            where.push(`status IN (${placeholders(options.statuses)})`)
            args.push(...options.statuses)
        }
        return this.db
            .prepare<unknown[], RbJobRow>(
                `SELECT ${RB_JOB_COLUMNS} FROM rb_jobs WHERE ${where.join(" AND ")}
                 ORDER BY created_at DESC, rb_job_id DESC LIMIT ?`,
            )
            .all(...args, options.limit ?? 50)
            .map(toRbJob)
    }

    getLatestRbJobForRun(
        runId: string,
        options: { kind?: string; statuses?: RbJobStatus[] } = {},
    ): RbJobRecord | null {
        return this.listRbJobsForRun(runId, { ...options, limit: 1 })[0] ?? null
    }

    updateRbJobStatus(rbJobId: string, status: RbJobStatus, error: string | null = null) {
        const ts = this.now()
        this.db
            .prepare(
                `UPDATE rb_jobs SET
                   status = @status,
                   started_at = COALESCE(started_at, @started_at),
                   ended_at = COALESCE(ended_at, @ended_at),
                   error = COALESCE(@error, error)
                 WHERE rb_job_id = @rb_job_id`,
            )
            .run({
                rb_job_id: rbJobId,
                status,
                started_at: status === "running" ? ts : null,
                ended_at: TERMINAL_STATUSES.has(status) ? ts : null,
                error,
            })
    }

    // --- deltas

    createRbDelta(runId: string, ops: unknown[], extra: JsonObject = {}): RbDeltaRecord {
        if (!this.getRun(runId)) throw new NotFoundError("Run not found.")
        const record: RbDeltaRecord = {
            delta_id: newId("delta"),
            run_id: runId,
            created_at: this.now(),
            status: "applied",
            rolled_back_at: null,
            rolled_back_reason: null,
            ops,
            schema_version: 1,
            extra,
        }
        this.db
            .prepare(
                `INSERT INTO rb_deltas(delta_id, run_id, created_at, status, ops_json, schema_version, extra_json)
                 VALUES(@delta_id, @run_id, @created_at, @status, @ops_json, @schema_version, @extra_json)`,
            )
            .run({
                delta_id: record.delta_id,
                run_id: record.run_id,
                created_at: record.created_at,
                status: record.status,
                ops_json: compactJson(ops),
                schema_version: record.schema_version,
                extra_json: compactJson(extra),
            })
        return record
    }

    getRbDelta(deltaId: string): RbDeltaRecord | null {
        const row = this.db
            .prepare<[string], RbDeltaRow>(`SELECT ${RB_DELTA_COLUMNS} FROM rb_deltas WHERE delta_id = ?`)
            .get(deltaId)
        return row ? toRbDelta(row) : null
    }

    /** Newest first. */
    listRbDeltasForRun(runId: string, status?: RbDeltaStatus): RbDeltaRecord[] {
        const args: unknown[] = [runId]
        let filter = ""
        if (status) {
            filter = " AND status = ?"
            args.push(status)
        }
        return this.db
            .prepare<unknown[], RbDeltaRow>(
                `SELECT ${RB_DELTA_COLUMNS} FROM rb_deltas WHERE run_id = ?${filter}
                 ORDER BY created_at DESC, delta_id DESC`,
            )
            .all(...args)
            .map(toRbDelta)
    }

    markRbDeltaRolledBack(deltaId: string, reason: string | null = null) {
        const updated = this.db
            .prepare(
                `UPDATE rb_deltas SET
                   status = 'rolled_back',
                   rolled_back_at = COALESCE(rolled_back_at, @ts),
                   rolled_back_reason = COALESCE(rolled_back_reason, @reason)
                 WHERE delta_id = @delta_id`,
            )
            .run({ ts: this.now(), reason: reason || null, delta_id: deltaId })
        if (updated.changes === 0) throw new StoreError(`Delta not found: ${deltaId}`)
    }

    // --- memory edit log and index

    appendMemEditLog(params: {
        mem_id: string
        actor: string
        reason: string | null
        before: JsonObject
        after: JsonObject
        extra?: JsonObject
    }): string {
        const editId = newId("edit")
        this.db
            .prepare(
                `INSERT INTO mem_edit_log(edit_id, mem_id, created_at, actor, reason, before_json, after_json, extra_json)
                 VALUES(@edit_id, @mem_id, @created_at, @actor, @reason, @before_json, @after_json, @extra_json)`,
            )
            .run({
                edit_id: editId,
                mem_id: params.mem_id,
                created_at: this.now(),
                actor: params.actor.trim() || "unknown",
                reason: params.reason || null,
                before_json: compactJson(params.before),
                after_json: compactJson(params.after),
                extra_json: compactJson(params.extra ?? {}),
            })
        return editId
    }

    /** Newest first. */
    listMemEditLog(memId: string, limit = 50): MemEditRecord[] {
        return this.db
            .prepare<[string, number], MemEditRow>(
                `SELECT edit_id, mem_id, created_at, actor, reason, before_json, after_json, extra_json
                 FROM mem_edit_log WHERE mem_id = ?
                 ORDER BY created_at DESC, edit_id DESC LIMIT ?`,
            )
            .all(memId, limit)
            .map(({ before_json, after_json, extra_json, ...rest }) => ({
                ...rest,
                before: parseJsonObject(before_json),
                after: parseJsonObject(after_json),
                extra: parseJsonObject(extra_json),
            }))
    }

    upsertMemIndex(item: MemIndexRecord) {
        this.db
            .prepare(
                `INSERT INTO mem_index(mem_id, created_at, updated_at, status, role, type, source_run_id, schema_version)
                 VALUES(@mem_id, @created_at, @updated_at, @status, @role, @type, @source_run_id, @schema_version)
                 ON CONFLICT(mem_id) DO UPDATE SET
                   created_at = excluded.created_at,
                   updated_at = excluded.updated_at,
                   status = excluded.status,
                   role = excluded.role,
                   type = excluded.type,
                   source_run_id = excluded.source_run_id,
                   schema_version = excluded.schema_version`,
            )
            .run({ ...item, source_run_id: item.source_run_id || null })
    }

    /** Newest first by creation time. */
    listMemIndexPage(params: {
        limit: number
        cursor?: PageCursor | null
        roles?: string[]
        statuses?: string[]
        types?: string[]
    }): Page<MemIndexRecord> {
        const where = ["1=1"]
        const args: unknown[] = []
        const filters: Array<[string, string[] | undefined]> = [
            ["role", params.roles],
            ["status", params.statuses],
            ["type", params.types],
        ]
        for (const [column, values] of filters) {
            if (!values?.length) continue
            where.push(`${column} IN (${placeholders(values)})`)
            args.push(...values)
        }
        if (params.cursor) {
            where.push("(created_at < ? OR (created_at = ? AND mem_id < ?))")
            args.push(params.cursor.created_at, params.cursor.created_at, params.cursor.id)
        }
        const rows = this.db
            .prepare<unknown[], MemIndexRecord>(
                `SELECT mem_id, created_at, updated_at, status, role, type, source_run_id, schema_version
                 FROM mem_index WHERE ${where.join(" AND ")}
                 ORDER BY created_at DESC, mem_id DESC LIMIT ?`,
            )
            .all(...args, params.limit + 1)
        return toPage(rows, params.limit, (row) => ({ created_at: row.created_at, id: row.mem_id }))
    }
}
