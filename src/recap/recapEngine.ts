import { roleInstruction } from "../config/appConfig.js"
import { extractCitationAliases, extractMemoryIds } from "../evidence/citationTokens.js"
import { JsonExtractionError, PlanningError, SubtaskParseError } from "../errors.js"
import type { ChatMessage } from "../llm/chatClient.js"
import { generateRecipes } from "./generateRecipes.js"
import { kbGet, kbList, kbSearch, memGet, memList, memSearch, type PrimitiveContext } from "./primitives.js"
import { renderTemplate } from "./promptTemplate.js"
import { RunSession, type RecapContext, type RecapOutput } from "./runSession.js"
import { RECAP_RESPONSE_FORMAT, parseRecapResponse, type RecapResponse, type Subtask } from "./subtaskSchema.js"

const MAX_FORMAT_ATTEMPTS = 3

const EMPTY_RESULT_CORRECTION = [
    "ERROR: Task ended with empty subtasks but without a `result`.",
    "When subtasks=[], you MUST include a non-empty `result` summarizing the deliverable (and key conclusions / constraints / citations if applicable).",
].join("\n")

const MISPLACED_GENERATE_CORRECTION = [
    "ERROR: generate_recipes can only be called by the orchestrator at the root task.",
    "If you are an expert node (MOF/TIO2) or a nested subtask, return to the parent by finishing your task with subtasks=[] and a `result`, then let the root orchestrator call generate_recipes.",
].join("\n")

function formatErrorCorrection(error: Error): string {
    return [
        "FORMAT ERROR: Your previous output was not valid planning JSON.",
        error.message,
        "",
        "Return ONLY a single valid JSON object with keys:",
        "- think: string",
        "- subtasks: array of objects (structured subtasks)",
        "- result: string or JSON (REQUIRED when subtasks=[])",
        "No extra text.",
    ].join("\n")
}

export function describeRemaining(remaining: readonly Subtask[]): string {
    return remaining.length === 0 ? "No remaining subtasks." : JSON.stringify(remaining, null, 2)
}

function buildPrompt(ctx: RecapContext, session: RunSession): string {
    const node = session.tree.currentNode
    const base = {
        task_name: node.taskName,
        role: node.role,
        role_instruction: roleInstruction(ctx.config, node.role),
        user_request: session.userRequest,
        recipes_per_run: session.recipesPerRun,
    }
    const prompts = ctx.config.prompts
    switch (session.state) {
        case "DOWN":
            return renderTemplate(prompts.down_prompt_template, base)
        case "ACTION_TAKEN":
            return renderTemplate(prompts.action_taken_prompt_template, {
                ...base,
                obs: session.latestObs,
                remaining_subtask_str: describeRemaining(session.remainingSubtasks),
            })
        case "UP":
            return renderTemplate(prompts.up_prompt_template, {
                ...base,
                done_task_name: session.doneTaskName,
                done_task_result: session.doneTaskResult,
                previous_stage_task_name: session.previousStageTaskName,
                previous_stage_think: session.previousStageThink,
                remaining_subtask_str: describeRemaining(session.remainingSubtasks),
            })
    }
}

async function requestPlan(ctx: RecapContext, session: RunSession, prompt: string): Promise<{ response: RecapResponse; content: string }> {
    const node = session.tree.currentNode
    const baseMessages: ChatMessage[] = [
        { role: "system", content: session.systemPrompt },
        ...session.history,
        { role: "user", content: prompt },
    ]
    let correction: string | null = null
    let lastError = ""

    for (let attempt = 1; attempt <= MAX_FORMAT_ATTEMPTS; attempt += 1) {
        ctx.cancellation.check()
        session.consumeStep()

        // The correction rides along for this call only and never enters history.
        const messages: ChatMessage[] = correction
            ? [...baseMessages, { role: "user", content: correction }]
            : baseMessages
        ctx.trace("llm_request", {
            agent: node.role,
            recap_state: session.state,
            task_name: node.taskName,
            model: ctx.chat.model,
            enable_thinking: ctx.chat.enableThinking,
            temperature: ctx.temperature,
            attempt,
            steps: session.steps,
            messages,
        })
        const reply = await ctx.chat.chat(messages, {
            temperature: ctx.temperature,
            responseFormat: ctx.chat.enableThinking ? undefined : RECAP_RESPONSE_FORMAT,
        })
        ctx.trace("llm_response", {
            agent: node.role,
            recap_state: session.state,
            task_name: node.taskName,
            attempt,
            steps: session.steps,
            content: reply.content,
            reasoning_content: reply.reasoningContent,
            raw: reply.raw,
        })

        try {
            return { response: parseRecapResponse(reply.content), content: reply.content }
        } catch (error) {
            if (!(error instanceof JsonExtractionError) && !(error instanceof SubtaskParseError)) throw error
            lastError = error.message
            correction = formatErrorCorrection(error)
        }
    }
    throw new PlanningError(`Failed to obtain valid planning JSON after retries. Last error: ${lastError}`)
}

async function runPrimitive(ctx: RecapContext, session: RunSession, subtask: Subtask): Promise<string> {
    const primitives: PrimitiveContext = {
        config: ctx.config,
        registry: session.registry,
        memory: ctx.memory,
        trace: ctx.trace,
        agent: session.tree.currentNode.role,
    }
    switch (subtask.type) {
        case "kb_search":
            return kbSearch(primitives, ctx.knowledge, {
                kbName: subtask.kb_name,
                query: subtask.query,
                topK: subtask.top_k,
                mode: subtask.mode,
            })
        case "kb_get":
            return kbGet(primitives, subtask.alias)
        case "kb_list":
            return kbList(primitives, subtask.limit)
        case "mem_search":
            return memSearch(primitives, {
                query: subtask.query,
                topK: subtask.top_k,
                role: subtask.role,
                status: subtask.status,
                memType: subtask.mem_type,
            })
        case "mem_get":
            return memGet(primitives, subtask.mem_id)
        case "mem_list":
            return memList(primitives, subtask.limit)
        case "task":
        case "generate_recipes":
            throw new PlanningError(`Subtask '${subtask.type}' is not a primitive action.`)
    }
}

/**
 * Recursive planning loop for one run. Each iteration asks the current node
 * for a plan and executes only its first subtask: descend into a task, run a
 * primitive, or (root orchestrator only) produce the final recipes.
 */
export async function runRecap(ctx: RecapContext, userRequest: string): Promise<RecapOutput> {
    const session = new RunSession(ctx.config, userRequest, ctx.recipesPerRun)
    const { tree, registry } = session

    for (;;) {
        ctx.cancellation.check()
        const prompt = buildPrompt(ctx, session)
        const { response, content } = await requestPlan(ctx, session, prompt)
        session.commitExchange(prompt, content)

        registry.focusOnAliases(extractCitationAliases(`${response.think}\n${response.result}`))
        registry.focusOnMemories(extractMemoryIds(`${response.think}\n${response.result}`))
        tree.recordResponse(response)

        const node = tree.currentNode
        ctx.trace("recap_info", {
            agent: node.role,
            recap_state: session.state,
            task_name: node.taskName,
            think: response.think,
            subtasks: response.subtasks,
            result: response.result,
            depth: tree.depth(),
            steps: session.steps,
        })

        const [next, ...rest] = response.subtasks
        if (next === undefined) {
            if (tree.isRoot()) throw new PlanningError("Root task ended without generate_recipes.")
            if (!response.result) {
                session.actionTaken(EMPTY_RESULT_CORRECTION, [])
                continue
            }
            session.doneTaskName = node.taskName
            session.doneTaskResult = response.result
            tree.ascend()
            const parentPlan = tree.latestResponse()
            session.previousStageTaskName = tree.currentNode.taskName
            session.previousStageThink = parentPlan?.think ?? ""
            session.remainingSubtasks = parentPlan?.subtasks.slice(1) ?? []
            session.state = "UP"
            continue
        }

        if (next.type === "generate_recipes") {
            if (!tree.isRoot() || node.role !== "orchestrator") {
                session.actionTaken(MISPLACED_GENERATE_CORRECTION, rest)
                continue
            }
            return generateRecipes(ctx, session)
        }

        if (next.type === "task") {
            const maxDepth = ctx.config.recap.max_depth
            if (tree.depth() + 1 > maxDepth) throw new PlanningError(`Exceeded recap.max_depth=${maxDepth}`)
            tree.descend(next.task, next.role)
            session.state = "DOWN"
            continue
        }

        ctx.cancellation.check()
        const observation = await runPrimitive(ctx, session, next)
        tree.recordObservation(observation)
        session.actionTaken(observation, rest)
    }
}
