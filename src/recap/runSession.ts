import { buildSystemPrompt, type AppConfig } from "../config/appConfig.js"
import { EvidenceRegistry } from "../evidence/evidenceRegistry.js"
import { PlanningError } from "../errors.js"
import type { ChatClient, ChatMessage } from "../llm/chatClient.js"
import type { KnowledgeSearch } from "../knowledge/knowledgeSearch.js"
import type { MemoryStore } from "../memory/memoryStore.js"
import type { CancellationCheck } from "../runtime/cancellation.js"
import type { JsonObject } from "../util/json.js"
import type { TraceFn } from "./primitives.js"
import { RecapTree } from "./recapTree.js"
import type { Subtask } from "./subtaskSchema.js"

export type RecapState = "DOWN" | "ACTION_TAKEN" | "UP"

/** Collaborators and per-run settings handed to the engine. */
export interface RecapContext {
    config: AppConfig
    chat: ChatClient
    knowledge: KnowledgeSearch
    /** Absent when the memory store could not be opened; mem_* actions then report an error. */
    memory: MemoryStore | null
    cancellation: CancellationCheck
    trace: TraceFn
    recipesPerRun: number
    temperature: number
}

export interface RecapOutput {
    recipesJson: JsonObject
    /** alias → canonical ref for every alias cited in the output. */
    citations: Record<string, string>
    memoryIds: string[]
}

export const ROOT_TASK = "Generate catalyst recipe recommendations."

/**
 * Keeps the first message (the user request) and the newest `2 * maxRounds`
 * messages after it. `maxRounds <= 0` keeps everything.
 */
export function trimHistory(history: ChatMessage[], maxRounds: number): ChatMessage[] {
    if (maxRounds <= 0 || history.length <= 1) return history
    const [pinned, ...tail] = history
    const limit = maxRounds * 2
    if (!pinned || tail.length <= limit) return history
    return [pinned, ...tail.slice(-limit)]
}

/**
 * Mutable state of one planning run: the task tree, the evidence registry,
 * the committed conversation and the step counters.
 */
export class RunSession {
    readonly tree: RecapTree
    readonly registry: EvidenceRegistry
    readonly systemPrompt: string

    state: RecapState = "DOWN"
    steps = 0
    /** Committed conversation; the system prompt is added per call. */
    history: ChatMessage[]

    latestObs = ""
    remainingSubtasks: Subtask[] = []
    doneTaskName = ""
    doneTaskResult = ""
    previousStageTaskName = ""
    previousStageThink = ""

    constructor(
        readonly config: AppConfig,
        readonly userRequest: string,
        readonly recipesPerRun: number,
    ) {
        this.tree = new RecapTree(ROOT_TASK, "orchestrator")
        this.registry = new EvidenceRegistry(config.citations.alias_prefix)
        this.systemPrompt = buildSystemPrompt(config)
        this.history = [
            {
                role: "user",
                content: [
                    "User request:",
                    userRequest,
                    "",
                    `recipes_per_run=${recipesPerRun}`,
                    "You must retrieve evidence before generate_recipes (kb_search for literature and/or mem_search for memories).",
                ].join("\n"),
            },
        ]
    }

    /** Counts one chat call against `recap.max_steps`. */
    consumeStep() {
        const maxSteps = this.config.recap.max_steps
        if (this.steps >= maxSteps) throw new PlanningError(`Exceeded recap.max_steps=${maxSteps}`)
        this.steps += 1
    }

    commitExchange(prompt: string, reply: string) {
        this.history.push({ role: "user", content: prompt }, { role: "assistant", content: reply })
        this.history = trimHistory(this.history, this.config.recap.max_rounds)
    }

    /** Continue the current task after observing `observation`. */
    actionTaken(observation: string, remaining: Subtask[]) {
        this.latestObs = observation
        this.remainingSubtasks = remaining
        this.state = "ACTION_TAKEN"
    }
}
