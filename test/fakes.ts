import type { KbName } from "../src/config/appConfig.js"
import type { ChatClient, ChatMessage, ChatOptions, ChatResult, ToolCall } from "../src/llm/chatClient.js"
import type { KnowledgeChunk, KnowledgeSearch, KnowledgeSearchOptions } from "../src/knowledge/knowledgeSearch.js"

/** A function reply runs when the call arrives, for side effects mid-run. */
export type ScriptedReply = Partial<ChatResult> | Error | (() => Partial<ChatResult>)

/** Chat client that answers from a fixed script and records every call. */
export class ScriptedChat implements ChatClient {
    readonly model = "fake-model"
    readonly calls: Array<{ messages: ChatMessage[]; options: ChatOptions }> = []

    constructor(
        private readonly replies: ScriptedReply[],
        readonly enableThinking = false,
    ) {}

    get remaining(): number {
        return this.replies.length
    }

    async chat(messages: ChatMessage[], options: ChatOptions): Promise<ChatResult> {
        this.calls.push({ messages: [...messages], options })
        const next = this.replies.shift()
        if (next === undefined) throw new Error("scripted chat has no replies left")
        if (next instanceof Error) throw next
        const result = typeof next === "function" ? next() : next
        return { content: "", toolCalls: [], reasoningContent: null, raw: {}, ...result }
    }
}

export function toolCall(id: string, name: string, args: Record<string, unknown> = {}): ToolCall {
    return { id, type: "function", function: { name, arguments: JSON.stringify(args) } }
}

export function reply(document: Record<string, unknown>): Partial<ChatResult> {
    return { content: JSON.stringify(document) }
}

/** In-process knowledge base keyed by namespace. */
export class FakeKnowledge implements KnowledgeSearch {
    readonly queries: Array<{ namespace: KbName; query: string; options: KnowledgeSearchOptions }> = []

    constructor(private readonly chunks: Partial<Record<KbName, KnowledgeChunk[]>>) {}

    async search(namespace: KbName, query: string, options: KnowledgeSearchOptions): Promise<KnowledgeChunk[]> {
        this.queries.push({ namespace, query, options })
        return (this.chunks[namespace] ?? []).slice(0, options.topK)
    }
}

export function chunk(namespace: string, chunkId: string, content: string): KnowledgeChunk {
    return {
        ref: `kb:${namespace}__${chunkId}`,
        content,
        source: `${chunkId}.pdf`,
        kb_namespace: namespace,
        chunk_id: chunkId,
    }
}
