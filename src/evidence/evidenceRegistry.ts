import type { KnowledgeChunk } from "../knowledge/knowledgeSearch.js"
import type { MemoryItem } from "../memory/memoryStore.js"

export interface AliasedChunk extends KnowledgeChunk {
    alias: string
}

class OrderedSet {
    private readonly seen = new Set<string>()
    readonly values: string[] = []

    add(value: string): boolean {
        const trimmed = value.trim()
        if (!trimmed || this.seen.has(trimmed)) return false
        this.seen.add(trimmed)
        this.values.push(trimmed)
        return true
    }
}

/**
 * Run-scoped evidence. Aliases are assigned on the first sighting of a ref
 * and never reassigned; nothing is ever removed.
 */
export class EvidenceRegistry {
    private nextIndex = 1
    private readonly refToAlias = new Map<string, string>()
    private readonly aliasToChunk = new Map<string, AliasedChunk>()
    private readonly memById = new Map<string, MemoryItem>()
    private readonly focusAliases = new OrderedSet()
    private readonly focusMemIds = new OrderedSet()

    /** Unique chunks in first-seen order. */
    readonly chunks: AliasedChunk[] = []
    /** Unique memories in first-seen order. */
    readonly memories: MemoryItem[] = []
    lastKbSearchAliases: string[] = []
    lastMemSearchIds: string[] = []

    constructor(readonly aliasPrefix = "C") {}

    /**
     * Aliases `found` and returns the chunks deduplicated by alias, in result
     * order.
     */
    registerChunks(found: readonly KnowledgeChunk[]): AliasedChunk[] {
        const out: AliasedChunk[] = []
        const inResult = new Set<string>()
        for (const chunk of found) {
            let alias = this.refToAlias.get(chunk.ref)
            if (alias === undefined) {
                alias = `${this.aliasPrefix}${this.nextIndex}`
                this.nextIndex += 1
                this.refToAlias.set(chunk.ref, alias)
                const stored: AliasedChunk = { ...chunk, alias }
                this.aliasToChunk.set(alias, stored)
                this.chunks.push(stored)
            }
            const stored = this.aliasToChunk.get(alias)
            if (!stored || inResult.has(alias)) continue
            inResult.add(alias)
            out.push(stored)
        }
        return out
    }

    /** Adds unseen memories and returns the ids of `found`, deduplicated. */
    registerMemories(found: readonly MemoryItem[]): string[] {
        const ids = new OrderedSet()
        for (const item of found) {
            if (!ids.add(item.mem_id)) continue
            if (!this.memById.has(item.mem_id)) {
                this.memById.set(item.mem_id, item)
                this.memories.push(item)
            }
        }
        return ids.values
    }

    chunk(alias: string): AliasedChunk | undefined {
        return this.aliasToChunk.get(alias)
    }

    memory(memId: string): MemoryItem | undefined {
        return this.memById.get(memId)
    }

    aliasFor(ref: string): string | undefined {
        return this.refToAlias.get(ref)
    }

    /** alias → canonical ref for every alias in the registry. */
    aliasMap(): Record<string, string> {
        return Object.fromEntries(this.chunks.map((chunk) => [chunk.alias, chunk.ref]))
    }

    focusOnAliases(aliases: readonly string[]) {
        for (const alias of aliases) this.focusAliases.add(alias)
    }

    focusOnMemories(memIds: readonly string[]) {
        for (const memId of memIds) this.focusMemIds.add(memId)
    }

    get focusedAliases(): readonly string[] {
        return this.focusAliases.values
    }

    get focusedMemIds(): readonly string[] {
        return this.focusMemIds.values
    }

    /** Focused aliases, then the latest search, then everything else. */
    rankedAliases(): string[] {
        const ordered = new OrderedSet()
        for (const alias of [...this.focusAliases.values, ...this.lastKbSearchAliases]) {
            if (this.aliasToChunk.has(alias)) ordered.add(alias)
        }
        for (const chunk of this.chunks) ordered.add(chunk.alias)
        return ordered.values
    }

    rankedMemIds(): string[] {
        const ordered = new OrderedSet()
        for (const memId of [...this.focusMemIds.values, ...this.lastMemSearchIds]) {
            if (this.memById.has(memId)) ordered.add(memId)
        }
        for (const item of this.memories) ordered.add(item.mem_id)
        return ordered.values
    }
}
