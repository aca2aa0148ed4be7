import { z } from "zod"
import { extractCitationAliases, extractMemoryIds, formatSnippet } from "../evidence/citationTokens.js"
import { JsonExtractionError, PlanningError } from "../errors.js"
import type { ChatMessage, ToolCall, ToolDefinition } from "../llm/chatClient.js"
import { parseJsonObject, type JsonObject } from "../util/json.js"
import { extractFirstJsonObject } from "./jsonExtract.js"
import {
    clampLimit,
    kbGet,
    kbList,
    memGet,
    memList,
    memSearch,
    type OpenLimit,
    type PrimitiveContext,
} from "./primitives.js"
import { renderTemplate } from "./promptTemplate.js"
import type { RecapContext, RecapOutput, RunSession } from "./runSession.js"
import { RecipeSchema, recipesResponseFormat } from "./subtaskSchema.js"

export const MAX_GENERATE_TURNS = 20
const MAX_FORMAT_ERRORS = 3

const FINAL_ANSWER_REQUEST = "Now return the final answer as a single JSON object ONLY. No extra text."

function tool(name: string, description: string, properties: JsonObject, required: string[] = []): ToolDefinition {
    const parameters: JsonObject = { type: "object", properties }
    if (required.length > 0) parameters.required = required
    return { type: "function", function: { name, description, parameters } }
}

export const GENERATE_TOOLS: ToolDefinition[] = [
    tool(
        "kb_get",
        "Fetch the full original chunk text for a citation alias (e.g. C12) from the run evidence registry.",
        { alias: { type: "string" } },
        ["alias"],
    ),
    tool(
        "kb_list",
        "List available citation aliases (and sources) currently stored in the run evidence registry.",
        { limit: { type: "integer" } },
    ),
    tool(
        "mem_search",
        "Search long-term memories and add results to the run memory registry.",
        { query: { type: "string" }, top_k: { type: "integer" } },
        ["query"],
    ),
    tool(
        "mem_get",
        "Fetch the full memory content for a mem_id from the run memory registry.",
        { mem_id: { type: "string" } },
        ["mem_id"],
    ),
    tool(
        "mem_list",
        "List available mem_ids currently stored in the run memory registry.",
        { limit: { type: "integer" } },
    ),
]

const ToolArgumentsSchema = z.object({
    alias: z.string().catch(""),
    mem_id: z.string().catch(""),
    query: z.string().catch(""),
    limit: z.number().int().optional().catch(undefined),
    top_k: z.number().int().optional().catch(undefined),
})

function indexLimit(defaultLimit: number, maxLimit: number): number {
    return Math.min(Math.max(defaultLimit, 1), maxLimit)
}

/** Compact alias index: focused aliases first, then the last search, then the rest. */
export function buildEvidenceIndex(session: RunSession): string {
    const registry = session.registry
    const { kb_list_default_limit, kb_list_max_limit } = session.config.evidence
    const total = registry.chunks.length
    const shown = registry.rankedAliases().slice(0, indexLimit(kb_list_default_limit, kb_list_max_limit))

    const lines = [
        `Total chunks in run registry: ${total}. Showing ${shown.length}/${total} aliases.`,
        "Use kb_list to view more, kb_get to open full text by alias.",
    ]
    if (total === 0) lines.push("(empty; run kb_search first)")
    lines.push("")
    for (const alias of shown) {
        const chunk = registry.chunk(alias)
        if (chunk) lines.push(`[${chunk.alias}] source=${chunk.source}`)
    }
    return lines.join("\n").trim()
}

export function buildMemoryIndex(session: RunSession): string {
    const registry = session.registry
    const { mem_list_default_limit, mem_list_max_limit } = session.config.memory
    const total = registry.memories.length
    const shown = registry.rankedMemIds().slice(0, indexLimit(mem_list_default_limit, mem_list_max_limit))

    const lines = [
        `Total memories in run registry: ${total}. Showing ${shown.length}/${total} mem_ids.`,
        "Use mem_list to view more, mem_get to open full content by mem_id.",
    ]
    if (total === 0) lines.push("(empty; run mem_search first)")
    lines.push("")
    for (const memId of shown) {
        const item = registry.memory(memId)
        if (!item) continue
        lines.push(
            `mem:${item.mem_id} role=${item.role} type=${item.type} status=${item.status} :: ${formatSnippet(item.content, 160)}`,
        )
    }
    return lines.join("\n").trim()
}

/** Result of checking one candidate final answer. */
export type FinalAnswerCheck =
    | { ok: true; output: RecapOutput }
    | { ok: false; correction: string }

/**
 * Checks, in order: recipe count, recipe fields, a citation in every
 * rationale, any citation at all, known aliases, known memory ids, active
 * memory ids.
 */
export function checkFinalAnswer(session: RunSession, parsed: JsonObject): FinalAnswerCheck {
    const expected = session.recipesPerRun
    const recipes = parsed.recipes
    if (!Array.isArray(recipes) || recipes.length !== expected) {
        return {
            ok: false,
            correction: `ERROR: Invalid recipe count. Expected exactly ${expected}.\nFix the JSON so it contains exactly the required number of recipes.`,
        }
    }

    const fields = z.array(RecipeSchema).safeParse(recipes)
    if (!fields.success) {
        const issue = fields.error.issues[0]
        return {
            ok: false,
            correction: [
                "ERROR: Invalid recipe fields.",
                "Every recipe needs non-empty strings M1, M2, atomic_ratio, small_molecule_modifier and rationale.",
                `Problem at recipes.${issue?.path.join(".") ?? ""}: ${issue?.message ?? "invalid value"}`,
            ].join("\n"),
        }
    }

    const uncited = fields.data.filter(
        (recipe) =>
            extractCitationAliases(recipe.rationale).length === 0 && extractMemoryIds(recipe.rationale).length === 0,
    )
    if (uncited.length > 0) {
        return {
            ok: false,
            correction: [
                "ERROR: Each recipe rationale must include at least one inline citation.",
                "Use either:",
                "- a KB alias like [C2], OR",
                "- a memory id like mem:123e4567-e89b-12d3-a456-426614174000",
                "Fix the recipes so every rationale includes citations inline.",
            ].join("\n"),
        }
    }

    const dump = JSON.stringify(parsed)
    const aliases = extractCitationAliases(dump)
    const memIds = extractMemoryIds(dump)
    if (aliases.length === 0 && memIds.length === 0) {
        return {
            ok: false,
            correction:
                "ERROR: No citations found in final output.\nAdd at least one valid KB alias like [C2] or memory id like mem:<uuid>.",
        }
    }

    const registry = session.registry
    const unknownAlias = aliases.find((alias) => !registry.chunk(alias))
    if (unknownAlias !== undefined) {
        return {
            ok: false,
            correction: `ERROR: Unknown citation alias in output: '${unknownAlias}'.\nOnly cite aliases that exist in the run evidence registry (see index / kb_list).`,
        }
    }

    const unknownMem = memIds.filter((memId) => !registry.memory(memId))
    if (unknownMem.length > 0) {
        return {
            ok: false,
            correction: [
                "ERROR: Unknown mem:<id> cited in output.",
                "You may only cite mem:<id> values that exist in the run memory registry (use mem_search first).",
                `Unknown: ${JSON.stringify(unknownMem)}`,
            ].join("\n"),
        }
    }
    const archivedMem = memIds.filter((memId) => registry.memory(memId)?.status !== "active")
    if (archivedMem.length > 0) {
        return {
            ok: false,
            correction: [
                "ERROR: Archived mem:<id> cited in output.",
                "Do not cite archived memories. Use mem_search to find active alternatives.",
                `Archived: ${JSON.stringify(archivedMem)}`,
            ].join("\n"),
        }
    }

    const citations: Record<string, string> = {}
    for (const alias of aliases) {
        const chunk = registry.chunk(alias)
        if (chunk) citations[alias] = chunk.ref
    }
    return { ok: true, output: { recipesJson: parsed, citations, memoryIds: memIds } }
}

function runTool(ctx: PrimitiveContext, call: ToolCall, limits: { kb: OpenLimit; mem: OpenLimit }): string {
    const args = ToolArgumentsSchema.parse(parseJsonObject(call.function.arguments))
    switch (call.function.name.trim()) {
        case "kb_get":
            return kbGet(ctx, args.alias, limits.kb)
        case "kb_list":
            return kbList(ctx, args.limit)
        case "mem_search":
            return memSearch(ctx, {
                query: args.query.trim(),
                topK: args.top_k !== undefined && args.top_k > 0 ? args.top_k : undefined,
            })
        case "mem_get":
            return memGet(ctx, args.mem_id, limits.mem)
        case "mem_list":
            return memList(ctx, args.limit)
        default:
            return `ERROR: Unknown tool name: '${call.function.name}'`
    }
}

/**
 * Final generation step. The model sees compact indexes and may open
 * evidence through tools; once it stops calling tools the answer is requested
 * under the strict recipes schema and checked. Corrections go to a local copy
 * of the conversation, never to the committed history.
 */
export async function generateRecipes(ctx: RecapContext, session: RunSession): Promise<RecapOutput> {
    const { config } = ctx
    const registry = session.registry
    if (registry.chunks.length === 0 && registry.memories.length === 0) {
        throw new PlanningError(
            "generate_recipes requires prior evidence: run kb_search (literature) and/or mem_search (memories) first.",
        )
    }

    const prompt = renderTemplate(config.prompts.generate_recipes_prompt_template, {
        user_request: session.userRequest,
        recipes_per_run: session.recipesPerRun,
        kb_evidence_index: buildEvidenceIndex(session),
        mem_evidence_index: buildMemoryIndex(session),
    })
    const conversation: ChatMessage[] = [...session.history, { role: "user", content: prompt }]
    const primitives: PrimitiveContext = {
        config,
        registry,
        memory: ctx.memory,
        trace: ctx.trace,
        agent: "orchestrator",
        phase: "generate_recipes",
    }
    const limits = {
        kb: { opened: new Set<string>(), max: config.evidence.max_full_chunks_in_generate_recipes },
        mem: { opened: new Set<string>(), max: config.memory.max_full_memories_in_generate_recipes },
    }
    const taskName = session.tree.currentNode.taskName
    const responseFormat = ctx.chat.enableThinking ? undefined : recipesResponseFormat(session.recipesPerRun)
    let formatErrors = 0

    for (let turn = 1; turn <= MAX_GENERATE_TURNS; turn += 1) {
        ctx.cancellation.check()
        session.consumeStep()

        const messages: ChatMessage[] = [{ role: "system", content: session.systemPrompt }, ...conversation]
        ctx.trace("llm_request", {
            agent: "orchestrator",
            recap_state: "generate_recipes",
            task_name: taskName,
            model: ctx.chat.model,
            enable_thinking: ctx.chat.enableThinking,
            temperature: ctx.temperature,
            turn,
            steps: session.steps,
            messages,
        })
        const reply = await ctx.chat.chat(messages, { temperature: ctx.temperature, tools: GENERATE_TOOLS })
        ctx.trace("llm_response", {
            agent: "orchestrator",
            recap_state: "generate_recipes",
            task_name: taskName,
            turn,
            steps: session.steps,
            content: reply.content,
            reasoning_content: reply.reasoningContent,
            raw: reply.raw,
            tool_calls: reply.toolCalls,
        })

        if (reply.toolCalls.length > 0) {
            conversation.push({ role: "assistant", content: reply.content, tool_calls: reply.toolCalls })
            for (const [index, call] of reply.toolCalls.entries()) {
                conversation.push({
                    role: "tool",
                    tool_call_id: call.id || `tool_call_${turn}_${index}`,
                    content: runTool(primitives, call, limits),
                })
            }
            continue
        }

        session.consumeStep()
        const finalMessages: ChatMessage[] = [
            ...messages,
            { role: "user", content: FINAL_ANSWER_REQUEST },
        ]
        ctx.trace("llm_request", {
            agent: "orchestrator",
            recap_state: "generate_recipes.final",
            task_name: taskName,
            model: ctx.chat.model,
            enable_thinking: ctx.chat.enableThinking,
            temperature: ctx.temperature,
            turn,
            steps: session.steps,
            messages: finalMessages,
            response_format: responseFormat ?? null,
        })
        const final = await ctx.chat.chat(finalMessages, { temperature: ctx.temperature, responseFormat })
        ctx.trace("llm_response", {
            agent: "orchestrator",
            recap_state: "generate_recipes.final",
            task_name: taskName,
            turn,
            steps: session.steps,
            content: final.content,
            reasoning_content: final.reasoningContent,
            raw: final.raw,
        })

        let parsed: JsonObject
        try {
            parsed = extractFirstJsonObject(final.content)
        } catch (error) {
            if (!(error instanceof JsonExtractionError)) throw error
            formatErrors += 1
            if (formatErrors >= MAX_FORMAT_ERRORS) {
                throw new PlanningError(
                    `generate_recipes final output is not valid JSON after retries: ${error.message}`,
                )
            }
            conversation.push({
                role: "user",
                content: `FORMAT ERROR: ${error.message}\n\nReturn ONLY a single valid JSON object matching the required schema. No extra text.`,
            })
            continue
        }

        const check = checkFinalAnswer(session, parsed)
        if (!check.ok) {
            conversation.push({ role: "user", content: check.correction })
            continue
        }

        const { output } = check
        ctx.trace("citations_resolved", {
            agent: "orchestrator",
            aliases: Object.keys(output.citations),
            resolved: output.citations,
        })
        ctx.trace("memories_resolved", {
            agent: "orchestrator",
            mem_ids: output.memoryIds,
            resolved: output.memoryIds.map((memId) => {
                const item = registry.memory(memId)
                return {
                    mem_id: memId,
                    role: item?.role ?? null,
                    type: item?.type ?? null,
                    source_run_id: item?.source_run_id ?? null,
                }
            }),
        })
        return output
    }

    throw new PlanningError("generate_recipes exceeded maximum turns without producing a valid final output.")
}
