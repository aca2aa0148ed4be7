import assert from "node:assert/strict"
import { test } from "node:test"
import { loadAppConfig, type AppConfig } from "../src/config/appConfig.js"
import { CancellationSignal, PlanningError } from "../src/errors.js"
import type { ChatMessage } from "../src/llm/chatClient.js"
import type { KnowledgeSearch } from "../src/knowledge/knowledgeSearch.js"
import { describeRemaining, runRecap } from "../src/recap/recapEngine.js"
import { trimHistory, type RecapContext } from "../src/recap/runSession.js"
import { NEVER_CANCELLED, type CancellationCheck } from "../src/runtime/cancellation.js"
import type { JsonObject } from "../src/util/json.js"
import { chunk, FakeKnowledge, reply, ScriptedChat } from "./fakes.js"

const baseConfig = loadAppConfig()

function withRecap(overrides: Partial<AppConfig["recap"]>): AppConfig {
    return { ...baseConfig, recap: { ...baseConfig.recap, ...overrides } }
}

function recapContext(
    chat: ScriptedChat,
    options: { knowledge?: KnowledgeSearch; config?: AppConfig; cancellation?: CancellationCheck } = {},
) {
    const events: Array<{ type: string; payload: JsonObject }> = []
    const ctx: RecapContext = {
        config: options.config ?? baseConfig,
        chat,
        knowledge: options.knowledge ?? new FakeKnowledge({}),
        memory: null,
        cancellation: options.cancellation ?? NEVER_CANCELLED,
        trace: (type, payload) => {
            events.push({ type, payload })
        },
        recipesPerRun: 1,
        temperature: 0.7,
    }
    return { ctx, events }
}

function lastMessage(chat: ScriptedChat, call: number): string {
    const messages = chat.calls[call]?.messages ?? []
    return messages[messages.length - 1]?.content ?? ""
}

/** Passes every checkpoint until the `failAt`th, which raises the signal. */
class CancelAtCheck implements CancellationCheck {
    checks = 0

    constructor(private readonly failAt: number) {}

    check() {
        this.checks += 1
        if (this.checks >= this.failAt) throw new CancellationSignal("cancel_requested")
    }
}

const SEARCH_PLAN = reply({
    think: "Search principles.",
    subtasks: [{ type: "kb_search", kb_name: "kb_principles", query: "Cu Ag" }, { type: "generate_recipes" }],
})

const RECIPE = {
    M1: "Cu",
    M2: "Ag",
    atomic_ratio: "3:1",
    small_molecule_modifier: "ethylenediamine",
    rationale: "Amine groups stabilise CO intermediates [C1].",
}

test("history trimming pins the first message", () => {
    const history: ChatMessage[] = Array.from({ length: 9 }, (_, index) => ({ role: "user", content: `m${index}` }))
    assert.deepEqual(
        trimHistory(history, 2).map((message) => message.content),
        ["m0", "m5", "m6", "m7", "m8"],
    )
    assert.equal(trimHistory(history, 0).length, 9)
    assert.equal(trimHistory(history, 4).length, 9)
})

test("remaining subtasks are described for prompts", () => {
    assert.equal(describeRemaining([]), "No remaining subtasks.")
    assert.equal(describeRemaining([{ type: "generate_recipes" }]), '[\n  {\n    "type": "generate_recipes"\n  }\n]')
})

test("search then generate produces cited recipes", async () => {
    const knowledge = new FakeKnowledge({
        kb_principles: [chunk("kb_principles", "c1", "Amine groups stabilise CO intermediates.")],
    })
    const chat = new ScriptedChat([
        reply({
            think: "Find literature first.",
            subtasks: [{ type: "kb_search", kb_name: "kb_principles", query: "Cu Ag CO2" }, { type: "generate_recipes" }],
        }),
        reply({ think: "Evidence [C1] is enough.", subtasks: [{ type: "generate_recipes" }] }),
        { content: "Ready." },
        reply({ recipes: [RECIPE] }),
    ])
    const { ctx, events } = recapContext(chat, { knowledge })

    const output = await runRecap(ctx, "Design a Cu-Ag catalyst")

    assert.deepEqual(output, {
        recipesJson: { recipes: [RECIPE] },
        citations: { C1: "kb:kb_principles__c1" },
        memoryIds: [],
    })
    assert.deepEqual(knowledge.queries, [
        { namespace: "kb_principles", query: "Cu Ag CO2", options: { mode: "mix", topK: 5 } },
    ])

    assert.equal(chat.calls.length, 4)
    assert.equal(chat.calls[0]?.options.responseFormat?.json_schema.name, "recap_response")
    assert.equal(chat.calls[0]?.messages[0]?.role, "system")
    assert.match(lastMessage(chat, 1), /^Current task: Generate catalyst recipe recommendations\.\nRole: orchestrator/)
    assert.match(lastMessage(chat, 1), /\[C1\] source=c1\.pdf/)
    assert.equal(chat.calls[2]?.options.tools?.length, 5)
    assert.equal(chat.calls[3]?.options.responseFormat?.json_schema.name, "generate_recipes_output")
    assert.equal(lastMessage(chat, 3), "Now return the final answer as a single JSON object ONLY. No extra text.")

    const types = events.map((event) => event.type)
    assert.deepEqual(types.filter((type) => type !== "llm_request" && type !== "llm_response"), [
        "recap_info",
        "kb_query",
        "recap_info",
        "citations_resolved",
        "memories_resolved",
    ])
    const resolved = events.find((event) => event.type === "citations_resolved")
    assert.deepEqual(resolved?.payload, {
        agent: "orchestrator",
        aliases: ["C1"],
        resolved: { C1: "kb:kb_principles__c1" },
    })
})

test("a malformed plan is retried with a one-off correction", async () => {
    const chat = new ScriptedChat([
        { content: "I will think about it." },
        reply({ think: "done", subtasks: [], result: "nothing" }),
    ])
    const { ctx } = recapContext(chat)

    await assert.rejects(runRecap(ctx, "x"), {
        name: "PlanningError",
        message: "Root task ended without generate_recipes.",
    })
    assert.equal(chat.calls.length, 2)
    assert.match(lastMessage(chat, 1), /^FORMAT ERROR: Your previous output was not valid planning JSON\.\nNo JSON object found in response\./)
    assert.equal(chat.calls[1]?.messages.length, (chat.calls[0]?.messages.length ?? 0) + 1)
})

test("three malformed plans fail the run", async () => {
    const chat = new ScriptedChat([{ content: "a" }, { content: "b" }, reply({ subtasks: "later" })])
    const { ctx } = recapContext(chat)

    await assert.rejects(runRecap(ctx, "x"), {
        message: "Failed to obtain valid planning JSON after retries. Last error: Invalid 'subtasks': expected array, got string",
    })
})

test("experts finish with a result and the parent resumes", async () => {
    const chat = new ScriptedChat([
        reply({
            think: "Delegate.",
            subtasks: [{ type: "task", task: "Assess MOF linkers", role: "mof_expert" }, { type: "generate_recipes" }],
        }),
        reply({ think: "", subtasks: [] }),
        reply({ think: "", subtasks: [{ type: "generate_recipes" }] }),
        reply({ think: "", subtasks: [], result: "Amine linkers help." }),
        reply({ think: "", subtasks: [{ type: "generate_recipes" }] }),
    ])
    const { ctx } = recapContext(chat)

    await assert.rejects(runRecap(ctx, "x"), {
        message:
            "generate_recipes requires prior evidence: run kb_search (literature) and/or mem_search (memories) first.",
    })
    assert.equal(chat.calls.length, 5)
    assert.match(lastMessage(chat, 1), /^Current task: Assess MOF linkers\nRole: mof_expert/)
    assert.match(lastMessage(chat, 2), /ERROR: Task ended with empty subtasks but without a `result`\./)
    assert.match(lastMessage(chat, 3), /ERROR: generate_recipes can only be called by the orchestrator at the root task\./)
    const resumed = lastMessage(chat, 4)
    assert.match(resumed, /^Resumed task: Generate catalyst recipe recommendations\./)
    assert.match(resumed, /Finished subtask: Assess MOF linkers\nSubtask result:\nAmine linkers help\./)
    assert.match(resumed, /"type": "generate_recipes"/)
})

test("descending past max_depth fails", async () => {
    const chat = new ScriptedChat([
        reply({ think: "", subtasks: [{ type: "task", task: "A", role: "mof_expert" }] }),
        reply({ think: "", subtasks: [{ type: "task", task: "B", role: "tio2_expert" }] }),
    ])
    const { ctx } = recapContext(chat, { config: withRecap({ max_depth: 1 }) })

    await assert.rejects(runRecap(ctx, "x"), (error: unknown) => {
        return error instanceof PlanningError && error.message === "Exceeded recap.max_depth=1"
    })
})

test("every chat call counts against max_steps", async () => {
    const chat = new ScriptedChat([{ content: "not json" }])
    const { ctx } = recapContext(chat, { config: withRecap({ max_steps: 1 }) })

    await assert.rejects(runRecap(ctx, "x"), { message: "Exceeded recap.max_steps=1" })
    assert.equal(chat.calls.length, 1)
})

test("a cancellation checkpoint stops the loop before the model is called", async () => {
    const chat = new ScriptedChat([])
    const { ctx } = recapContext(chat, {
        cancellation: {
            check() {
                throw new CancellationSignal("cancel_requested")
            },
        },
    })

    await assert.rejects(runRecap(ctx, "x"), CancellationSignal)
    assert.equal(chat.calls.length, 0)
})

test("a cancel after the plan arrives skips the planned search", async () => {
    const chat = new ScriptedChat([SEARCH_PLAN])
    const knowledge = new FakeKnowledge({ kb_principles: [chunk("kb_principles", "c1", "Amines help.")] })
    const cancellation = new CancelAtCheck(3)
    const { ctx, events } = recapContext(chat, { knowledge, cancellation })

    await assert.rejects(runRecap(ctx, "x"), { name: "CancellationSignal", reason: "cancel_requested" })
    assert.equal(cancellation.checks, 3)
    assert.equal(chat.calls.length, 1)
    assert.equal(knowledge.queries.length, 0)
    assert.deepEqual(
        events.map((event) => event.type),
        ["llm_request", "llm_response", "recap_info"],
    )
})

test("a cancel after a search stops before the next model call", async () => {
    const chat = new ScriptedChat([SEARCH_PLAN, reply({ think: "Enough.", subtasks: [{ type: "generate_recipes" }] })])
    const knowledge = new FakeKnowledge({ kb_principles: [chunk("kb_principles", "c1", "Amines help.")] })
    const cancellation = new CancelAtCheck(5)
    const { ctx, events } = recapContext(chat, { knowledge, cancellation })

    await assert.rejects(runRecap(ctx, "x"), CancellationSignal)
    assert.equal(chat.calls.length, 1)
    assert.equal(chat.remaining, 1)
    assert.deepEqual(
        knowledge.queries.map((query) => [query.namespace, query.query]),
        [["kb_principles", "Cu Ag"]],
    )
    assert.equal(events.filter((event) => event.type === "kb_query").length, 1)
    assert.equal(events[events.length - 1]?.type, "kb_query")
})
