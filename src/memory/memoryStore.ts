import path from "node:path"
import { createHash, randomUUID } from "node:crypto"
import { mkdirSync } from "node:fs"
import Database from "better-sqlite3"
import {
    MEMORY_ROLES,
    MEMORY_STATUSES,
    MEMORY_TYPES,
    type MemoryRole,
    type MemoryStatus,
    type MemoryType,
} from "../config/appConfig.js"
import type { MemIndexRecord } from "../db/records.js"
import { MemoryStoreError } from "../errors.js"
import { envString } from "../loadEnv.js"
import { compactJson, parseJsonObject, type JsonObject } from "../util/json.js"

export interface MemoryItem {
    mem_id: string
    status: MemoryStatus
    role: MemoryRole
    type: MemoryType
    content: string
    source_run_id: string | null
    created_at: number
    updated_at: number
    schema_version: number
    extra: JsonObject
}

export interface MemoryFilters {
    role?: readonly string[]
    status?: readonly string[]
    type?: readonly string[]
}

export interface MemoryQueryResult {
    item: MemoryItem
    /** Cosine distance, 0 for identical embeddings. */
    distance: number
}

export interface MemoryUpsertInput {
    mem_id?: string | null
    status: string
    role: string
    type: string
    content: string
    source_run_id: string | null
    schema_version?: number
    extra?: JsonObject
    /** Becomes `updated_at` (and `created_at` for new items). Defaults to now. */
    now_ts?: number
    /** Keep `created_at` of an existing item. Defaults to true. */
    preserve_created_at?: boolean
}

/**
 * Long-term memory. Items are never deleted; retiring one sets its status to
 * `archived`.
 */
export interface MemoryStore {
    upsert(input: MemoryUpsertInput): MemoryItem
    get(memId: string): MemoryItem | null
    /** Same order as `memIds`; unknown ids are skipped. */
    getMany(memIds: readonly string[]): MemoryItem[]
    /** Nearest items first. An empty query returns nothing. */
    query(text: string, limit: number, filters?: MemoryFilters): MemoryQueryResult[]
    archive(memId: string, nowTs?: number): MemoryItem
    /** Newest first by creation time. */
    list(params: { limit: number; offset?: number; filters?: MemoryFilters }): MemoryItem[]
}

type MemoryRow = Omit<MemoryItem, "extra"> & { extra_json: string }

const MEMORY_COLUMNS =
    "mem_id, status, role, type, content, source_run_id, created_at, updated_at, schema_version, extra_json"

export function resolveMemoryDbPath(): string {
    return path.resolve(envString("RECAP_MEMORY_DB_PATH", path.join("data", "memory.db")))
}

function pick<T extends string>(allowed: readonly T[], value: string, label: string): T {
    const trimmed = value.trim()
    const found = allowed.find((candidate) => candidate === trimmed)
    if (found === undefined) throw new MemoryStoreError(`Invalid memory ${label}: '${trimmed}'`)
    return found
}

export function parseMemoryRole(value: string): MemoryRole {
    return pick(MEMORY_ROLES, value, "role")
}

export function parseMemoryStatus(value: string): MemoryStatus {
    return pick(MEMORY_STATUSES, value, "status")
}

export function parseMemoryType(value: string): MemoryType {
    return pick(MEMORY_TYPES, value, "type")
}

/**
 * Deterministic stand-in for a learned embedding: a SHA-256 chain seeded by
 * the text, each byte mapped onto [-1, 1].
 */
export function hashEmbedding(text: string, dim: number): number[] {
    const size = Math.max(8, Math.trunc(dim))
    let seed = createHash("sha256").update(text, "utf8").digest()
    const bytes: number[] = []
    while (bytes.length < size) {
        seed = createHash("sha256").update(seed).digest()
        bytes.push(...seed)
    }
    return bytes.slice(0, size).map((byte) => (byte / 255) * 2 - 1)
}

export function cosineDistance(a: readonly number[], b: readonly number[]): number {
    let dot = 0
    let normA = 0
    let normB = 0
    const length = Math.min(a.length, b.length)
    for (let i = 0; i < length; i += 1) {
        const x = a[i] ?? 0
        const y = b[i] ?? 0
        dot += x * y
        normA += x * x
        normB += y * y
    }
    if (normA === 0 || normB === 0) return 1
    return 1 - dot / (Math.sqrt(normA) * Math.sqrt(normB))
}

/** Snapshot used in edit logs and delta ops. */
export function memoryToRecord(item: MemoryItem): JsonObject {
    return {
        mem_id: item.mem_id,
        status: item.status,
        role: item.role,
        type: item.type,
        content: item.content,
        source_run_id: item.source_run_id,
        created_at: item.created_at,
        updated_at: item.updated_at,
        schema_version: item.schema_version,
        extra: item.extra,
    }
}

export function memoryToIndexRecord(item: MemoryItem): MemIndexRecord {
    return {
        mem_id: item.mem_id,
        created_at: item.created_at,
        updated_at: item.updated_at,
        status: item.status,
        role: item.role,
        type: item.type,
        source_run_id: item.source_run_id,
        schema_version: item.schema_version,
    }
}

function toItem(row: MemoryRow): MemoryItem {
    const { extra_json, ...rest } = row
    return {
        ...rest,
        status: parseMemoryStatus(rest.status),
        role: parseMemoryRole(rest.role),
        type: parseMemoryType(rest.type),
        extra: parseJsonObject(extra_json),
    }
}

function filterClause(filters: MemoryFilters | undefined): { where: string; args: unknown[] } {
    const where = ["1=1"]
    const args: unknown[] = []
    const columns: Array<[string, readonly string[] | undefined]> = [
        ["role", filters?.role],
        ["status", filters?.status],
        ["type", filters?.type],
    ]
    for (const [column, values] of columns) {
        if (!values?.length) continue
        where.push(`${column} IN (${values.map(() => "?").join(", ")})`)
        args.push(...values)
    }
    return { where: where.join(" AND "), args }
}

/**
 * SQLite-backed memory store. Similarity is brute-force cosine over hash
 * embeddings computed from item content.
 */
export class SqliteMemoryStore implements MemoryStore {
    readonly db: Database.Database
    readonly embeddingDim: number
    private lastTimestamp = 0

    constructor(options: { dbPath?: string; embeddingDim?: number } = {}) {
        const dbPath = options.dbPath ?? resolveMemoryDbPath()
        if (dbPath !== ":memory:") mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true })
        this.db = new Database(dbPath)
        this.db.pragma("journal_mode = WAL")
        this.embeddingDim = Math.max(8, options.embeddingDim ?? 32)
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS memories (
              mem_id TEXT PRIMARY KEY,
              status TEXT NOT NULL,
              role TEXT NOT NULL,
              type TEXT NOT NULL,
              content TEXT NOT NULL,
              source_run_id TEXT,
              created_at REAL NOT NULL,
              updated_at REAL NOT NULL,
              schema_version INTEGER NOT NULL DEFAULT 1,
              extra_json TEXT NOT NULL DEFAULT '{}'
            );
            CREATE INDEX IF NOT EXISTS idx_memories_created ON memories(created_at, mem_id);
        `)
    }

    close() {
        this.db.close()
    }

    private now(): number {
        const wall = Date.now() / 1000
        this.lastTimestamp = wall > this.lastTimestamp ? wall : this.lastTimestamp + 1e-6
        return this.lastTimestamp
    }

    get(memId: string): MemoryItem | null {
        const id = memId.trim()
        if (!id) return null
        const row = this.db
            .prepare<[string], MemoryRow>(`SELECT ${MEMORY_COLUMNS} FROM memories WHERE mem_id = ?`)
            .get(id)
        return row ? toItem(row) : null
    }

    getMany(memIds: readonly string[]): MemoryItem[] {
        const wanted = memIds.map((id) => id.trim()).filter(Boolean)
        if (wanted.length === 0) return []
        const rows = this.db
            .prepare<string[], MemoryRow>(
                `SELECT ${MEMORY_COLUMNS} FROM memories WHERE mem_id IN (${wanted.map(() => "?").join(", ")})`,
            )
            .all(...wanted)
        const byId = new Map(rows.map((row) => [row.mem_id, toItem(row)]))
        return wanted.flatMap((id) => {
            const item = byId.get(id)
            return item ? [item] : []
        })
    }

    list(params: { limit: number; offset?: number; filters?: MemoryFilters }): MemoryItem[] {
        const { where, args } = filterClause(params.filters)
        return this.db
            .prepare<unknown[], MemoryRow>(
                `SELECT ${MEMORY_COLUMNS} FROM memories WHERE ${where}
                 ORDER BY created_at DESC, mem_id DESC LIMIT ? OFFSET ?`,
            )
            .all(...args, params.limit, params.offset ?? 0)
            .map(toItem)
    }

    query(text: string, limit: number, filters?: MemoryFilters): MemoryQueryResult[] {
        const queryText = text.trim()
        if (!queryText || limit < 1) return []
        const target = hashEmbedding(queryText, this.embeddingDim)
        const { where, args } = filterClause(filters)
        const rows = this.db
            .prepare<unknown[], MemoryRow>(`SELECT ${MEMORY_COLUMNS} FROM memories WHERE ${where}`)
            .all(...args)
        return rows
            .map((row) => {
                const item = toItem(row)
                return {
                    item,
                    distance: cosineDistance(target, hashEmbedding(item.content, this.embeddingDim)),
                }
            })
            .sort((a, b) => a.distance - b.distance || a.item.mem_id.localeCompare(b.item.mem_id))
            .slice(0, limit)
    }

    upsert(input: MemoryUpsertInput): MemoryItem {
        const now = input.now_ts ?? this.now()
        const memId = input.mem_id?.trim() || randomUUID()
        const existing = this.get(memId)
        const preserve = input.preserve_created_at ?? true

        const item: MemoryItem = {
            mem_id: memId,
            status: parseMemoryStatus(input.status),
            role: parseMemoryRole(input.role),
            type: parseMemoryType(input.type),
            content: input.content.trim(),
            source_run_id: input.source_run_id?.trim() || null,
            created_at: preserve && existing ? existing.created_at : now,
            updated_at: now,
            schema_version: input.schema_version ?? 1,
            extra: input.extra ?? {},
        }
        if (!item.content) throw new MemoryStoreError("content cannot be empty.")

        this.db
            .prepare(
                `INSERT INTO memories(${MEMORY_COLUMNS})
                 VALUES(@mem_id, @status, @role, @type, @content, @source_run_id, @created_at, @updated_at, @schema_version, @extra_json)
                 ON CONFLICT(mem_id) DO UPDATE SET
                   status = excluded.status,
                   role = excluded.role,
                   type = excluded.type,
                   content = excluded.content,
                   source_run_id = excluded.source_run_id,
                   created_at = excluded.created_at,
                   updated_at = excluded.updated_at,
                   schema_version = excluded.schema_version,
                   extra_json = excluded.extra_json`,
            )
            .run({
                mem_id: item.mem_id,
                status: item.status,
                role: item.role,
                type: item.type,
                content: item.content,
                source_run_id: item.source_run_id,
                created_at: item.created_at,
                updated_at: item.updated_at,
                schema_version: item.schema_version,
                extra_json: compactJson(item.extra),
            })
        return item
    }

    archive(memId: string, nowTs?: number): MemoryItem {
        const existing = this.get(memId)
        if (!existing) throw new MemoryStoreError("Memory not found.")
        if (existing.status === "archived") return existing
        return this.upsert({
            ...existing,
            status: "archived",
            now_ts: nowTs,
            preserve_created_at: true,
        })
    }
}
