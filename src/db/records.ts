import type { JsonObject } from "../util/json.js"

export const RUN_STATUSES = ["queued", "running", "completed", "failed", "canceled"] as const
export type RunStatus = (typeof RUN_STATUSES)[number]
export type BatchStatus = RunStatus

export const TERMINAL_STATUSES: ReadonlySet<string> = new Set(["completed", "failed", "canceled"])

export type RbJobStatus = "queued" | "running" | "completed" | "failed"
export type RbDeltaStatus = "applied" | "rolled_back"
export type CancelTargetType = "batch" | "run"

export interface BatchRecord {
    batch_id: string
    created_at: number
    started_at: number | null
    ended_at: number | null
    status: BatchStatus
    user_request: string
    n_runs: number
    recipes_per_run: number
    /** Immutable snapshot of the request and runtime settings. */
    config_snapshot: JsonObject
    error: string | null
}

export interface RunRecord {
    run_id: string
    batch_id: string
    run_index: number
    created_at: number
    started_at: number | null
    ended_at: number | null
    status: RunStatus
    error: string | null
}

export interface EventRecord {
    event_id: string
    run_id: string
    created_at: number
    event_type: string
    payload?: JsonObject
}

export interface EvidenceRecord {
    alias: string
    ref: string
    source: string
    content: string
    kb_namespace: string
    chunk_id: string | null
    created_at: number
}

export interface FeedbackRecord {
    feedback_id: string
    run_id: string
    created_at: number
    updated_at: number
    score: number | null
    pros: string
    cons: string
    other: string
    schema_version: number
    extra: JsonObject
}

export interface RbJobRecord {
    rb_job_id: string
    run_id: string
    kind: string
    created_at: number
    started_at: number | null
    ended_at: number | null
    status: RbJobStatus
    error: string | null
    extra: JsonObject
}

export interface RbDeltaRecord {
    delta_id: string
    run_id: string
    created_at: number
    status: RbDeltaStatus
    rolled_back_at: number | null
    rolled_back_reason: string | null
    ops: unknown[]
    schema_version: number
    extra: JsonObject
}

export interface MemEditRecord {
    edit_id: string
    mem_id: string
    created_at: number
    actor: string
    reason: string | null
    before: JsonObject
    after: JsonObject
    extra: JsonObject
}

export interface MemIndexRecord {
    mem_id: string
    created_at: number
    updated_at: number
    status: string
    role: string
    type: string
    source_run_id: string | null
    schema_version: number
}

export interface PageCursor {
    created_at: number
    id: string
}

export interface Page<T> {
    items: T[]
    has_more: boolean
    next_cursor: PageCursor | null
}

export function encodeCursor(cursor: PageCursor): string {
    return Buffer.from(JSON.stringify([cursor.created_at, cursor.id]), "utf8").toString("base64url")
}

export function decodeCursor(raw: string): PageCursor | null {
    try {
        const parsed: unknown = JSON.parse(Buffer.from(raw, "base64url").toString("utf8"))
        if (
            Array.isArray(parsed) &&
            parsed.length === 2 &&
            typeof parsed[0] === "number" &&
            typeof parsed[1] === "string"
        ) {
            return { created_at: parsed[0], id: parsed[1] }
        }
        return null
    } catch {
        return null
    }
}

export function isRunStatus(value: string): value is RunStatus {
    return RUN_STATUSES.some((status) => status === value)
}
