import type { AppConfig, KbMode, KbName, MemoryRole, MemoryStatus, MemoryType } from "../config/appConfig.js"
import { formatSnippet, normalizeAlias, normalizeMemId } from "../evidence/citationTokens.js"
import type { AliasedChunk, EvidenceRegistry } from "../evidence/evidenceRegistry.js"
import type { KnowledgeSearch } from "../knowledge/knowledgeSearch.js"
import type { MemoryItem, MemoryStore } from "../memory/memoryStore.js"
import type { JsonObject } from "../util/json.js"

/** Appends one trace event for the current run. */
export type TraceFn = (eventType: string, payload: JsonObject) => void

export interface PrimitiveContext {
    config: AppConfig
    registry: EvidenceRegistry
    memory: MemoryStore | null
    trace: TraceFn
    /** Role of the node issuing the action. */
    agent: string
    /** Set while the final generation step runs its tool loop. */
    phase?: "generate_recipes"
}

const MEM_SEARCH_SHOWN = 8

function traceFields(ctx: PrimitiveContext): JsonObject {
    return ctx.phase ? { agent: ctx.agent, context: ctx.phase } : { agent: ctx.agent }
}

export function clampLimit(requested: number | undefined, fallback: number, max: number): number {
    const limit = requested ?? fallback
    return Math.min(Math.max(limit, 1), max)
}

function chunkTrace(chunk: AliasedChunk): JsonObject {
    return {
        alias: chunk.alias,
        ref: chunk.ref,
        source: chunk.source,
        kb_namespace: chunk.kb_namespace,
        chunk_id: chunk.chunk_id,
    }
}

function memoryTrace(item: MemoryItem): JsonObject {
    return {
        mem_id: item.mem_id,
        role: item.role,
        type: item.type,
        status: item.status,
        source_run_id: item.source_run_id,
    }
}

export function formatKbObservation(params: {
    kbName: string
    query: string
    mode: string
    topK: number
    chunks: readonly AliasedChunk[]
}): string {
    const lines = [
        `KB search results: kb=${params.kbName} mode=${params.mode} top_k=${params.topK}`,
        `Query: "${params.query}"`,
        "",
    ]
    if (params.chunks.length === 0) {
        lines.push("(no results)")
        return lines.join("\n").trim()
    }
    for (const chunk of params.chunks) {
        lines.push(`[${chunk.alias}] source=${chunk.source}`, chunk.content, "")
    }
    return lines.join("\n").trim()
}

export async function kbSearch(
    ctx: PrimitiveContext,
    knowledge: KnowledgeSearch,
    params: { kbName: KbName; query: string; topK?: number; mode?: KbMode },
): Promise<string> {
    const topK = params.topK ?? ctx.config.kb.default_top_k
    const mode = params.mode ?? ctx.config.kb.default_mode
    const found = await knowledge.search(params.kbName, params.query, { mode, topK })
    const chunks = ctx.registry.registerChunks(found)
    ctx.registry.lastKbSearchAliases = chunks.map((chunk) => chunk.alias)

    ctx.trace("kb_query", {
        ...traceFields(ctx),
        kb_namespace: params.kbName,
        query: params.query,
        mode,
        top_k: topK,
        results: chunks.map((chunk) => ({ ...chunkTrace(chunk), content: chunk.content })),
    })
    return formatKbObservation({ kbName: params.kbName, query: params.query, mode, topK, chunks })
}

export interface OpenLimit {
    opened: Set<string>
    max: number
}

export function kbGet(ctx: PrimitiveContext, rawAlias: string, limit?: OpenLimit): string {
    const alias = normalizeAlias(rawAlias)
    const chunk = ctx.registry.chunk(alias)
    if (!chunk) {
        return [
            `ERROR: Unknown citation alias: '${alias}'.`,
            ctx.phase
                ? "You can only kb_get an alias that exists in the run evidence registry."
                : "You can only kb_get an alias that was returned by a prior kb_search in this run.",
        ].join("\n")
    }
    if (limit && !limit.opened.has(alias) && limit.opened.size >= limit.max) {
        return [
            `ERROR: kb_get limit reached for ${ctx.phase ?? "this step"}.`,
            `Already opened ${limit.opened.size}/${limit.max} full chunks; use the evidence you already opened or narrow your needs.`,
        ].join("\n")
    }

    limit?.opened.add(alias)
    ctx.registry.focusOnAliases([chunk.alias])
    ctx.trace("kb_get", { ...traceFields(ctx), ...chunkTrace(chunk) })
    return `KB get (from run evidence registry):\n[${chunk.alias}] source=${chunk.source}\n${chunk.content}`.trim()
}

export function kbList(ctx: PrimitiveContext, requested?: number): string {
    const { kb_list_default_limit, kb_list_max_limit } = ctx.config.evidence
    const limit = clampLimit(requested, kb_list_default_limit, kb_list_max_limit)
    const total = ctx.registry.chunks.length
    const shown = ctx.registry.chunks.slice(0, limit)

    const lines = [`KB evidence registry: ${total} chunks total.`]
    if (total === 0) {
        lines.push("(empty; run kb_search first)")
    } else {
        lines.push(`Showing ${shown.length}/${total} (limit=${limit}).`, "")
        for (const chunk of shown) lines.push(`[${chunk.alias}] source=${chunk.source}`)
    }
    ctx.trace("kb_list", {
        ...traceFields(ctx),
        total,
        limit,
        shown_aliases: shown.map((chunk) => chunk.alias),
    })
    return lines.join("\n").trim()
}

export interface MemSearchParams {
    query: string
    topK?: number
    role?: MemoryRole
    status?: MemoryStatus
    memType?: MemoryType
}

/**
 * With an explicit role, searches that role only. Otherwise merges the
 * caller's role (`k_role` items) with global memories (`k_global` items);
 * `topK` overrides both counts.
 */
export function memSearch(ctx: PrimitiveContext, params: MemSearchParams): string {
    const memory = ctx.memory
    if (!memory) {
        return "ERROR: memory store is not configured.\nmem_search is unavailable in this run."
    }

    const status = params.status ?? "active"
    const type = params.memType ? [params.memType] : undefined
    const { k_role, k_global } = ctx.config.memory
    const results = params.role
        ? memory.query(params.query, params.topK ?? 5, { role: [params.role], status: [status], type })
        : [
              ...memory.query(params.query, params.topK ?? k_role, { role: [ctx.agent], status: [status], type }),
              ...memory.query(params.query, params.topK ?? k_global, { role: ["global"], status: [status], type }),
          ]

    const memIds = ctx.registry.registerMemories(results.map((result) => result.item))
    ctx.registry.lastMemSearchIds = memIds
    const items = memIds.flatMap((memId) => {
        const item = ctx.registry.memory(memId)
        return item ? [item] : []
    })

    const lines = [`MEM search results: ${memIds.length} items.`]
    for (const item of items.slice(0, MEM_SEARCH_SHOWN)) {
        lines.push(
            `mem:${item.mem_id} role=${item.role} type=${item.type} status=${item.status} :: ${formatSnippet(item.content, 200)}`,
        )
    }
    if (memIds.length > MEM_SEARCH_SHOWN) {
        lines.push("Use mem_list to view more, mem_get to open full content by mem_id.")
    }

    ctx.trace("mem_search", {
        ...traceFields(ctx),
        query: params.query,
        top_k: params.topK ?? null,
        role: params.role ?? null,
        status,
        mem_type: params.memType ?? null,
        results: items.map(memoryTrace),
    })
    return lines.join("\n").trim()
}

export function memGet(ctx: PrimitiveContext, rawMemId: string, limit?: OpenLimit): string {
    const memId = normalizeMemId(rawMemId)
    const item = ctx.registry.memory(memId)
    if (!item) {
        return [
            `ERROR: Unknown mem_id: '${memId}'.`,
            ctx.phase
                ? "You can only mem_get a mem_id that exists in the run memory registry (run mem_search first)."
                : "You can only mem_get a mem_id that was returned by a prior mem_search in this run.",
        ].join("\n")
    }
    if (limit && !limit.opened.has(memId) && limit.opened.size >= limit.max) {
        return [
            `ERROR: mem_get limit reached for ${ctx.phase ?? "this step"}.`,
            `Already opened ${limit.opened.size}/${limit.max} full memories; use the memories you already opened or narrow your needs.`,
        ].join("\n")
    }

    limit?.opened.add(memId)
    ctx.registry.focusOnMemories([item.mem_id])
    ctx.trace("mem_get", { ...traceFields(ctx), ...memoryTrace(item) })
    return [
        "MEM get (from run memory registry):",
        `mem:${item.mem_id} role=${item.role} type=${item.type} status=${item.status}`,
        item.content,
    ]
        .join("\n")
        .trim()
}

export function memList(ctx: PrimitiveContext, requested?: number): string {
    const { mem_list_default_limit, mem_list_max_limit } = ctx.config.memory
    const limit = clampLimit(requested, mem_list_default_limit, mem_list_max_limit)
    const total = ctx.registry.memories.length
    const shown = ctx.registry.memories.slice(0, limit)

    const lines = [`Run memory registry: ${total} memories total.`]
    if (total === 0) {
        lines.push("(empty; run mem_search first)")
    } else {
        lines.push(`Showing ${shown.length}/${total} (limit=${limit}).`, "")
        for (const item of shown) {
            lines.push(`mem:${item.mem_id} role=${item.role} type=${item.type} :: ${formatSnippet(item.content, 140)}`)
        }
    }
    ctx.trace("mem_list", {
        ...traceFields(ctx),
        total,
        limit,
        shown_mem_ids: shown.map((item) => item.mem_id),
    })
    return lines.join("\n").trim()
}
