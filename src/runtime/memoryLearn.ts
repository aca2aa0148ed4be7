import { z } from "zod";
import { MEMORY_ROLES, MEMORY_TYPES, buildSystemPrompt, type AppConfig } from "../config/appConfig.js";
import type { EventRecord, PageCursor } from "../db/records.js";
import type { SqliteStore } from "../db/sqliteStore.js";
import { JsonExtractionError, LearnError, errorMessage, errorTrace } from "../errors.js";
import { logScoped } from "../jobLogger.js";
import type {
  ChatClient,
  ChatMessage,
  ChatOptions,
  ChatResult,
  JsonSchemaFormat,
  ToolDefinition,
} from "../llm/chatClient.js";
import { memoryToRecord, type MemoryItem, type MemoryStore } from "../memory/memoryStore.js";
import { extractFirstJsonObject } from "../recap/jsonExtract.js";
import type { TraceFn } from "../recap/primitives.js";
import { renderTemplate } from "../recap/promptTemplate.js";
import { isRecord, parseJsonObject, readString, truncate, type JsonObject } from "../util/json.js";
import { rollbackDelta, syncMemIndex, type DeltaOp } from "./learnJobs.js";
import { createRunTracer } from "./runTracer.js";

const MAX_EXTRACT_TURNS = 12;
const RETRIEVE_LIMIT = 10;
const CONTEXT_LIMIT = 8;
const EXTRACT_TEMPERATURE = 0.2;
const LEARN_ACTOR = "rb_learn";

/** Model chatter is never shown to the extractor; only factual records are. */
const FORBIDDEN_EVENT_TYPES = new Set(["llm_request", "llm_response", "rb_llm_request", "rb_llm_response"]);

const DEFAULT_LIST_EVENT_TYPES = [
  "final_output",
  "run_failed",
  "recap_info",
  "kb_query",
  "kb_get",
  "kb_list",
  "mem_search",
  "mem_get",
  "mem_list",
  "citations_resolved",
  "memories_resolved",
];

function isForbiddenEventType(eventType: string): boolean {
  return FORBIDDEN_EVENT_TYPES.has(eventType) || eventType.startsWith("llm_") || eventType.startsWith("rb_llm_");
}

export interface LearnDeps {
  store: SqliteStore;
  memory: MemoryStore;
  config: AppConfig;
  /** Required unless `dryRun` is set. */
  chat: ChatClient | null;
  /** Use synthetic proposals instead of asking the model. */
  dryRun: boolean;
}

/** Fixed view of the run a learn job reads from; later events are out of bounds. */
export interface LearnSnapshot {
  snapshot_version: number;
  run_id: string;
  rb_job_id: string;
  trace_cutoff_ts: number;
  feedback_id: string;
  feedback_updated_at: number;
  final_output_event_id: string | null;
}

function snapshotJson(snapshot: LearnSnapshot): JsonObject {
  return {
    snapshot_version: snapshot.snapshot_version,
    trace_cutoff_ts: snapshot.trace_cutoff_ts,
    feedback_id: snapshot.feedback_id,
    feedback_updated_at: snapshot.feedback_updated_at,
    final_output_event_id: snapshot.final_output_event_id,
  };
}

export class DerefBudget {
  usedCallsTotal = 0;
  usedFullCalls = 0;
  usedCharsTotal = 0;

  constructor(
    readonly maxCallsTotal: number,
    readonly maxFullCalls: number,
    readonly maxCharsTotal: number,
    readonly excerptChars: number,
    readonly fullChars: number,
  ) {}

  static fromConfig(config: AppConfig): DerefBudget {
    const memory = config.memory;
    return new DerefBudget(
      memory.learn_deref_max_calls_total,
      memory.learn_deref_max_full_calls,
      memory.learn_deref_max_chars_total,
      memory.learn_deref_excerpt_chars,
      memory.learn_deref_full_chars,
    );
  }

  consume(full: boolean, chars: number) {
    this.usedCallsTotal += 1;
    if (full) this.usedFullCalls += 1;
    this.usedCharsTotal += Math.max(0, chars);
  }

  canOpenAny(): boolean {
    return this.usedCallsTotal < this.maxCallsTotal && this.usedCharsTotal < this.maxCharsTotal;
  }

  canOpenFull(): boolean {
    return this.usedFullCalls < this.maxFullCalls && this.canOpenAny();
  }

  usage(): JsonObject {
    return {
      used_calls_total: this.usedCallsTotal,
      used_full_calls: this.usedFullCalls,
      used_chars_total: this.usedCharsTotal,
      max_calls_total: this.maxCallsTotal,
      max_full_calls: this.maxFullCalls,
      max_chars_total: this.maxCharsTotal,
    };
  }
}

export function truncateStrings(value: unknown, maxLength: number): unknown {
  if (typeof value === "string") return truncate(value, maxLength);
  if (Array.isArray(value)) return value.map((item) => truncateStrings(item, maxLength));
  if (isRecord(value)) {
    return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, truncateStrings(item, maxLength)]));
  }
  return value;
}

function truncateRecord(value: JsonObject, maxLength: number): JsonObject {
  const truncated = truncateStrings(value, maxLength);
  return isRecord(truncated) ? truncated : {};
}

/** `recap_info` loses its `think`; every other payload is kept with long strings cut. */
export function sanitizeEventPayload(eventType: string, payload: JsonObject, maxLength: number): JsonObject {
  if (eventType === "recap_info") {
    const { think: _think, ...facts } = payload;
    return truncateRecord(facts, maxLength);
  }
  return truncateRecord(payload, maxLength);
}

// --- dereference tools

const modeProperty = { type: "string", enum: ["excerpt", "full"] };
const reasonProperty = { type: "string", description: "Why this source is needed." };

function derefTool(name: string, description: string, properties: JsonObject, required: string[] = []): ToolDefinition {
  const parameters: JsonObject = {
    type: "object",
    properties: { ...properties, reason: reasonProperty },
  };
  if (required.length > 0) parameters.required = required;
  return { type: "function", function: { name, description, parameters } };
}

export const DEREF_TOOLS: ToolDefinition[] = [
  derefTool(
    "rb_list_events",
    "List factual trace events of the run (ids, types and one-line summaries). Model request/response logs are not available.",
    { event_types: { type: "array", items: { type: "string" } }, limit: { type: "integer" } },
  ),
  derefTool(
    "rb_open_event",
    "Open one trace event by event_id. Planning `think` text is removed; long strings are cut to the mode's size.",
    { event_id: { type: "string" }, mode: modeProperty },
    ["event_id"],
  ),
  derefTool(
    "rb_open_memory",
    "Open a memory bank item by mem_id (original content).",
    { mem_id: { type: "string" }, mode: modeProperty },
    ["mem_id"],
  ),
  derefTool(
    "rb_open_evidence",
    "Open a literature chunk retrieved during the run, by citation alias (e.g. C3) or by ref. Provide exactly one.",
    { alias: { type: "string" }, ref: { type: "string" }, mode: modeProperty },
  ),
  derefTool("rb_open_feedback", "Open the experiment feedback JSON (factual record).", { mode: modeProperty }),
  derefTool("rb_open_run_output", "Open the run final_output JSON (factual record).", { mode: modeProperty }),
];

const DerefArgsSchema = z.object({
  event_id: z.string().trim().catch(""),
  mem_id: z.string().trim().catch(""),
  alias: z.string().trim().catch(""),
  ref: z.string().trim().catch(""),
  mode: z.string().trim().toLowerCase().catch(""),
  reason: z.string().trim().catch(""),
  limit: z.number().int().optional().catch(undefined),
  event_types: z.array(z.string()).optional().catch(undefined),
});

type DerefArgs = z.infer<typeof DerefArgsSchema>;

interface DerefContext {
  store: SqliteStore;
  memory: MemoryStore;
  config: AppConfig;
  snapshot: LearnSnapshot;
  budget: DerefBudget;
  feedback: JsonObject;
  runOutput: JsonObject;
  trace: TraceFn;
}

type SourceType = "trace_events" | "event" | "memory" | "evidence" | "feedback" | "run_output";
type OpenMode = "excerpt" | "full" | "blocked";

function toolError(code: string, message: string, details?: JsonObject): JsonObject {
  const error: JsonObject = { code, message };
  if (details) error.details = details;
  return { ok: false, error };
}

function recordSourceOpened(
  ctx: DerefContext,
  params: {
    sourceType: SourceType;
    sourceId: string;
    modeRequested: string;
    modeUsed: OpenMode;
    truncated: boolean;
    returnedChars: number;
    reason: string;
    errorCode?: string;
  },
) {
  ctx.trace("rb_source_opened", {
    rb_job_id: ctx.snapshot.rb_job_id,
    ...snapshotJson(ctx.snapshot),
    source_type: params.sourceType,
    source_id: params.sourceId,
    mode_requested: params.modeRequested,
    mode_used: params.modeUsed,
    truncated: params.truncated,
    returned_chars: params.returnedChars,
    error_code: params.errorCode ?? null,
    reason: params.reason || null,
    budget: ctx.budget.usage(),
  });
}

function resolveMode(ctx: DerefContext, requestedRaw: string): { mode: OpenMode; maxChars: number; degraded: boolean } {
  const requested = requestedRaw === "full" ? "full" : "excerpt";
  if (!ctx.budget.canOpenAny()) return { mode: "blocked", maxChars: 0, degraded: false };
  if (requested === "full" && !ctx.budget.canOpenFull()) {
    return { mode: "excerpt", maxChars: ctx.budget.excerptChars, degraded: true };
  }
  return {
    mode: requested,
    maxChars: requested === "full" ? ctx.budget.fullChars : ctx.budget.excerptChars,
    degraded: false,
  };
}

interface OpenOutcome {
  out: JsonObject;
  truncated?: boolean;
  errorCode?: string;
}

/** Budget check, open, accounting and the `rb_source_opened` record shared by the open tools. */
function openSource(
  ctx: DerefContext,
  args: DerefArgs,
  sourceType: SourceType,
  sourceId: string,
  open: (maxChars: number, mode: OpenMode, degraded: boolean) => OpenOutcome,
): JsonObject {
  const modeRequested = args.mode || "excerpt";
  const { mode, maxChars, degraded } = resolveMode(ctx, args.mode);
  if (mode === "blocked") {
    const out = toolError("budget_exceeded", `Cannot open ${sourceType.replace("_", " ")}: dereference budget exhausted.`);
    recordSourceOpened(ctx, {
      sourceType,
      sourceId,
      modeRequested,
      modeUsed: "blocked",
      truncated: false,
      returnedChars: JSON.stringify(out).length,
      reason: args.reason,
      errorCode: "budget_exceeded",
    });
    return out;
  }

  const outcome = open(maxChars, mode, degraded);
  const returnedChars = JSON.stringify(outcome.out).length;
  ctx.budget.consume(mode === "full" && outcome.errorCode === undefined, returnedChars);
  recordSourceOpened(ctx, {
    sourceType,
    sourceId,
    modeRequested,
    modeUsed: mode,
    truncated: outcome.truncated ?? false,
    returnedChars,
    reason: args.reason,
    errorCode: outcome.errorCode,
  });
  return outcome.out;
}

function summarizeEvent(eventType: string, payload: JsonObject): string {
  const agent = readString(payload, "agent");
  switch (eventType) {
    case "kb_query":
      return `agent=${agent} kb=${readString(payload, "kb_namespace")} query=${truncate(readString(payload, "query"), 160)}`;
    case "recap_info":
      return `agent=${agent} state=${readString(payload, "recap_state")} task=${readString(payload, "task_name")}`;
    case "mem_search":
      return `agent=${agent} query=${truncate(readString(payload, "query"), 160)}`;
    case "final_output": {
      const recipesJson = payload.recipes_json;
      const recipes = isRecord(recipesJson) && Array.isArray(recipesJson.recipes) ? recipesJson.recipes.length : 0;
      return `recipes=${recipes}`;
    }
    case "run_failed":
      return `error=${truncate(readString(payload, "error"), 160)}`;
    default:
      return "";
  }
}

function listEvents(ctx: DerefContext, args: DerefArgs): JsonObject {
  if (!ctx.budget.canOpenAny()) {
    const out = toolError("budget_exceeded", "Cannot list events: dereference budget exhausted.", {
      budget: { max_calls_total: ctx.budget.maxCallsTotal },
    });
    recordSourceOpened(ctx, {
      sourceType: "trace_events",
      sourceId: "list",
      modeRequested: "excerpt",
      modeUsed: "blocked",
      truncated: false,
      returnedChars: JSON.stringify(out).length,
      reason: args.reason,
      errorCode: "budget_exceeded",
    });
    return out;
  }

  const requested = (args.event_types ?? []).map((type) => type.trim()).filter(Boolean);
  const effective = requested.length > 0 ? requested : DEFAULT_LIST_EVENT_TYPES;
  const blocked = effective.filter(isForbiddenEventType);
  const allowed = effective.filter((type) => !isForbiddenEventType(type));

  const { learn_deref_list_events_default_limit, learn_deref_list_events_max_limit } = ctx.config.memory;
  const limit = Math.min(
    Math.max(args.limit ?? learn_deref_list_events_default_limit, 1),
    learn_deref_list_events_max_limit,
  );
  const rows: EventRecord[] =
    allowed.length > 0
      ? ctx.store.listLatestEvents({
          run_id: ctx.snapshot.run_id,
          limit,
          event_types: allowed,
          include_payload: true,
          until: ctx.snapshot.trace_cutoff_ts,
        })
      : [];

  const out: JsonObject = {
    ok: true,
    snapshot: {
      trace_cutoff_ts: ctx.snapshot.trace_cutoff_ts,
      feedback_id: ctx.snapshot.feedback_id,
      feedback_updated_at: ctx.snapshot.feedback_updated_at,
    },
    blocked_event_types: blocked,
    items: rows.map((row) => ({
      event_id: row.event_id,
      created_at: row.created_at,
      event_type: row.event_type,
      summary: summarizeEvent(row.event_type, row.payload ?? {}),
    })),
  };
  const returnedChars = JSON.stringify(out).length;
  ctx.budget.consume(false, returnedChars);
  recordSourceOpened(ctx, {
    sourceType: "trace_events",
    sourceId: "list",
    modeRequested: "excerpt",
    modeUsed: "excerpt",
    truncated: false,
    returnedChars,
    reason: args.reason,
  });
  return out;
}

function invalidArgument(ctx: DerefContext, message: string): JsonObject {
  const out = toolError("invalid_argument", message);
  ctx.budget.consume(false, JSON.stringify(out).length);
  return out;
}

function openEvent(ctx: DerefContext, args: DerefArgs): JsonObject {
  const eventId = args.event_id;
  if (!eventId) return invalidArgument(ctx, "event_id is required.");

  return openSource(ctx, args, "event", eventId, (maxChars, mode, degraded) => {
    const row = ctx.store.getEvent(ctx.snapshot.run_id, eventId);
    if (!row) return { out: toolError("not_found", "Event not found."), errorCode: "not_found" };
    if (row.created_at > ctx.snapshot.trace_cutoff_ts) {
      return {
        out: toolError(
          "snapshot_out_of_bounds",
          "Event is outside the learn snapshot cutoff (newer than trace_cutoff_ts).",
          { event_created_at: row.created_at, trace_cutoff_ts: ctx.snapshot.trace_cutoff_ts },
        ),
        errorCode: "snapshot_out_of_bounds",
      };
    }
    if (isForbiddenEventType(row.event_type)) {
      return {
        out: toolError(
          "forbidden_event_type",
          `Access to event_type='${row.event_type}' is forbidden during learn (facts-only policy).`,
          { event_type: row.event_type },
        ),
        errorCode: "forbidden_event_type",
      };
    }
    return {
      out: {
        ok: true,
        event: {
          event_id: eventId,
          run_id: ctx.snapshot.run_id,
          created_at: row.created_at,
          event_type: row.event_type,
          payload: sanitizeEventPayload(row.event_type, row.payload ?? {}, maxChars),
          mode,
          degraded_from_full: degraded,
        },
      },
    };
  });
}

function openMemory(ctx: DerefContext, args: DerefArgs): JsonObject {
  const memId = args.mem_id.replace(/^mem:/, "");
  if (!memId) return invalidArgument(ctx, "mem_id is required.");

  return openSource(ctx, args, "memory", memId, (maxChars, mode, degraded) => {
    const item = ctx.memory.get(memId);
    if (!item) return { out: toolError("not_found", "Memory not found."), errorCode: "not_found" };
    const truncated = item.content.length > maxChars;
    return {
      truncated,
      out: {
        ok: true,
        memory: {
          mem_id: item.mem_id,
          status: item.status,
          role: item.role,
          type: item.type,
          source_run_id: item.source_run_id,
          created_at: item.created_at,
          updated_at: item.updated_at,
          schema_version: item.schema_version,
          content: truncate(item.content, maxChars),
          mode,
          truncated,
          degraded_from_full: degraded,
        },
      },
    };
  });
}

function stripBrackets(alias: string): string {
  const trimmed = alias.trim();
  return trimmed.startsWith("[") && trimmed.endsWith("]") && trimmed.length >= 3 ? trimmed.slice(1, -1).trim() : trimmed;
}

/** First `kb_query` result before the cutoff matching `alias` or `ref`. */
export function findRunEvidence(
  store: SqliteStore,
  runId: string,
  cutoff: number,
  target: { alias?: string; ref?: string },
): JsonObject | null {
  const wantAlias = stripBrackets(target.alias ?? "");
  const wantRef = (target.ref ?? "").trim();
  let cursor: PageCursor | null = null;
  for (;;) {
    const page = store.listEventsPage({
      run_id: runId,
      limit: 200,
      cursor,
      event_types: ["kb_query"],
      include_payload: true,
      until: cutoff,
    });
    for (const event of page.items) {
      const results = event.payload?.results;
      if (!Array.isArray(results)) continue;
      for (const result of results) {
        if (!isRecord(result)) continue;
        if (wantAlias && stripBrackets(readString(result, "alias")) === wantAlias) return result;
        const ref = readString(result, "ref").trim();
        if (wantRef && ref && ref === wantRef) return result;
      }
    }
    if (!page.has_more || !page.next_cursor) return null;
    cursor = page.next_cursor;
  }
}

function openEvidence(ctx: DerefContext, args: DerefArgs): JsonObject {
  const { alias, ref } = args;
  if (Boolean(alias) === Boolean(ref)) return invalidArgument(ctx, "Provide exactly one of {alias, ref}.");

  return openSource(ctx, args, "evidence", alias || ref, (maxChars, mode, degraded) => {
    const found = findRunEvidence(ctx.store, ctx.snapshot.run_id, ctx.snapshot.trace_cutoff_ts, { alias, ref });
    if (!found) {
      return { out: toolError("not_found", "Evidence not found in run trace (kb_query)."), errorCode: "not_found" };
    }
    const content = readString(found, "content");
    const truncated = content.length > maxChars;
    return {
      truncated,
      out: {
        ok: true,
        evidence: {
          alias: stripBrackets(readString(found, "alias")),
          ref: readString(found, "ref"),
          source: readString(found, "source"),
          kb_namespace: readString(found, "kb_namespace"),
          chunk_id: readString(found, "chunk_id") || null,
          content: truncate(content, maxChars),
          mode,
          truncated,
          degraded_from_full: degraded,
        },
      },
    };
  });
}

function openRecord(ctx: DerefContext, args: DerefArgs, sourceType: "feedback" | "run_output"): JsonObject {
  const sourceId =
    sourceType === "feedback" ? ctx.snapshot.feedback_id : (ctx.snapshot.final_output_event_id ?? "");
  const record = sourceType === "feedback" ? ctx.feedback : ctx.runOutput;
  return openSource(ctx, args, sourceType, sourceId, (maxChars, mode, degraded) => ({
    out: { ok: true, [sourceType]: truncateRecord(record, maxChars), mode, degraded_from_full: degraded },
  }));
}

function executeDerefTool(ctx: DerefContext, name: string, rawArguments: string): JsonObject {
  const args = DerefArgsSchema.parse(parseJsonObject(rawArguments));
  switch (name) {
    case "rb_list_events":
      return listEvents(ctx, args);
    case "rb_open_event":
      return openEvent(ctx, args);
    case "rb_open_memory":
      return openMemory(ctx, args);
    case "rb_open_evidence":
      return openEvidence(ctx, args);
    case "rb_open_feedback":
      return openRecord(ctx, args, "feedback");
    case "rb_open_run_output":
      return openRecord(ctx, args, "run_output");
    default:
      return toolError("unknown_tool", `Unknown tool: ${name}`);
  }
}

// --- digest and prompts

function latestPayload(store: SqliteStore, runId: string, eventType: string, until: number): JsonObject | null {
  const [row] = store.listLatestEvents({ run_id: runId, limit: 1, event_types: [eventType], include_payload: true, until });
  return row?.payload ?? null;
}

function shrinkKbQuery(payload: JsonObject): JsonObject {
  const results = Array.isArray(payload.results) ? payload.results : [];
  return {
    ts: payload.ts ?? null,
    agent: payload.agent ?? null,
    kb_namespace: payload.kb_namespace ?? null,
    mode: payload.mode ?? null,
    top_k: payload.top_k ?? null,
    query: truncate(readString(payload, "query"), 320),
    results: results
      .slice(0, 12)
      .filter(isRecord)
      .map((result) => ({
        alias: readString(result, "alias"),
        ref: readString(result, "ref"),
        source: readString(result, "source"),
        kb_namespace: readString(result, "kb_namespace"),
        chunk_id: readString(result, "chunk_id") || null,
      })),
  };
}

/** Tool usage and resolved citations only: no prompts, no model replies, no chunk text. */
export function buildTraceDigest(store: SqliteStore, snapshot: LearnSnapshot): JsonObject {
  const runId = snapshot.run_id;
  const until = snapshot.trace_cutoff_ts;
  return {
    snapshot: snapshotJson(snapshot),
    event_counts: store.countEventTypesForRun(runId, until),
    latest_mem_search: latestPayload(store, runId, "mem_search", until),
    latest_memories_resolved: latestPayload(store, runId, "memories_resolved", until),
    latest_citations_resolved: latestPayload(store, runId, "citations_resolved", until),
    recent_kb_queries: store
      .listLatestEvents({ run_id: runId, limit: 3, event_types: ["kb_query"], include_payload: true, until })
      .map((row) => shrinkKbQuery(row.payload ?? {})),
    latest_run_failed: latestPayload(store, runId, "run_failed", until),
  };
}

export function formatExistingMemories(config: AppConfig, items: readonly MemoryItem[]): string {
  return items
    .map((item) =>
      renderTemplate(config.memory.context_template, {
        mem_id: item.mem_id,
        status: item.status,
        role: item.role,
        type: item.type,
        source_run_id: item.source_run_id ?? "",
        content: item.content,
      }).trim(),
    )
    .filter(Boolean)
    .join("\n\n")
    .trim();
}

const EXTRACT_RESPONSE_FORMAT: JsonSchemaFormat = {
  type: "json_schema",
  json_schema: {
    name: "rb_extract_items",
    strict: true,
    schema: {
      type: "object",
      additionalProperties: false,
      properties: {
        items: {
          type: "array",
          items: {
            type: "object",
            additionalProperties: false,
            properties: {
              role: { type: "string", enum: [...MEMORY_ROLES] },
              type: { type: "string", enum: [...MEMORY_TYPES] },
              content: { type: "string", minLength: 1 },
              extra: { type: "object" },
            },
            required: ["role", "type", "content"],
          },
        },
      },
      required: ["items"],
    },
  },
};

const MERGE_RESPONSE_FORMAT: JsonSchemaFormat = {
  type: "json_schema",
  json_schema: {
    name: "rb_merge_result",
    strict: true,
    schema: {
      type: "object",
      additionalProperties: false,
      properties: {
        content: { type: "string", minLength: 1 },
        extra: { type: "object" },
      },
      required: ["content"],
    },
  },
};

const ProposalSchema = z.object({
  role: z.preprocess((value) => (typeof value === "string" && value.trim() ? value.trim() : "global"), z.enum(MEMORY_ROLES)),
  type: z.preprocess((value) => (typeof value === "string" && value.trim() ? value.trim() : "bank_item"), z.enum(MEMORY_TYPES)),
  content: z.string().trim().min(1),
  extra: z.record(z.unknown()).catch({}),
});

export type Proposal = z.infer<typeof ProposalSchema>;

export function dryRunProposals(runId: string): Proposal[] {
  return [
    {
      role: "global",
      type: "bank_item",
      content: `DRY RUN: synthetic memory bank item.\nPurpose: validate memory browse, learn and rollback.\nsource_run_id=${runId}`,
      extra: { dry_run: true, confidence: 0, tags: ["dry_run"] },
    },
    {
      role: "orchestrator",
      type: "bank_item",
      content: "DRY RUN: synthetic orchestrator memory.\nDo not use for science.",
      extra: { dry_run: true, confidence: 0, tags: ["dry_run"] },
    },
  ];
}

/**
 * Asks with the strict response format first; providers that reject a format
 * next to tools get the plain request after the failure is traced.
 */
async function chatWithFormatFallback(
  chat: ChatClient,
  messages: ChatMessage[],
  options: ChatOptions,
  onFormatError: (error: unknown) => void,
): Promise<ChatResult> {
  if (!options.responseFormat) return chat.chat(messages, options);
  try {
    return await chat.chat(messages, options);
  } catch (error) {
    onFormatError(error);
    return chat.chat(messages, { ...options, responseFormat: undefined });
  }
}

async function extractProposals(
  deps: LearnDeps & { chat: ChatClient },
  ctx: DerefContext,
  prompt: string,
): Promise<Proposal[]> {
  const { chat } = deps;
  const system = buildSystemPrompt(deps.config);
  const messages: ChatMessage[] = [
    { role: "system", content: system },
    { role: "user", content: prompt },
  ];
  const rbJobId = ctx.snapshot.rb_job_id;

  for (let turn = 0; ; turn += 1) {
    ctx.trace("rb_llm_request", {
      rb_job_id: rbJobId,
      purpose: "extract",
      turn,
      model: chat.model,
      temperature: EXTRACT_TEMPERATURE,
      response_schema: "rb_extract_items",
      snapshot: snapshotJson(ctx.snapshot),
      budget: ctx.budget.usage(),
      system: turn === 0 ? system : null,
      prompt: turn === 0 ? prompt : null,
      n_messages: messages.length,
    });
    const reply = await chatWithFormatFallback(
      chat,
      messages,
      {
        temperature: EXTRACT_TEMPERATURE,
        tools: DEREF_TOOLS,
        responseFormat: chat.enableThinking ? undefined : EXTRACT_RESPONSE_FORMAT,
      },
      (error) =>
        ctx.trace("rb_llm_response", {
          rb_job_id: rbJobId,
          purpose: "extract",
          turn,
          error: `llm_call_failed_with_response_format: ${errorMessage(error)}`,
        }),
    );
    ctx.trace("rb_llm_response", {
      rb_job_id: rbJobId,
      purpose: "extract",
      turn,
      content: reply.content,
      raw: reply.raw,
      tool_calls: reply.toolCalls,
    });

    if (reply.toolCalls.length === 0) {
      let document: JsonObject;
      try {
        document = extractFirstJsonObject(reply.content);
      } catch (error) {
        if (error instanceof JsonExtractionError) {
          throw new LearnError(`Learn extract output is not valid JSON: ${error.message}`);
        }
        throw error;
      }
      const items = Array.isArray(document.items) ? document.items : [];
      return items.flatMap((item, index) => {
        const parsed = ProposalSchema.safeParse(item);
        if (parsed.success) return [parsed.data];
        logScoped("learn", `proposal ${index} skipped: ${parsed.error.issues[0]?.message ?? "invalid"}`);
        return [];
      });
    }

    messages.push({ role: "assistant", content: reply.content, tool_calls: reply.toolCalls });
    for (const call of reply.toolCalls) {
      const result = executeDerefTool(ctx, call.function.name.trim(), call.function.arguments);
      messages.push({ role: "tool", tool_call_id: call.id || "tool_call", content: JSON.stringify(result) });
    }
    if (turn + 1 >= MAX_EXTRACT_TURNS) {
      throw new LearnError("Learn extractor exceeded maximum tool-calling turns.");
    }
  }
}

async function mergeWithModel(
  chat: ChatClient,
  config: AppConfig,
  trace: TraceFn,
  rbJobId: string,
  existing: MemoryItem,
  proposal: Proposal,
): Promise<{ content: string; extra: JsonObject } | null> {
  const prompt = renderTemplate(config.memory.merge_prompt_template, {
    existing_item_json: JSON.stringify(memoryToRecord(existing), null, 2),
    new_item_json: JSON.stringify(proposal, null, 2),
  }).trim();
  const system = buildSystemPrompt(config);
  trace("rb_llm_request", {
    rb_job_id: rbJobId,
    purpose: "merge",
    mem_id: existing.mem_id,
    model: chat.model,
    temperature: 0,
    response_schema: "rb_merge_result",
    system,
    prompt,
  });
  const reply = await chatWithFormatFallback(
    chat,
    [
      { role: "system", content: system },
      { role: "user", content: prompt },
    ],
    { temperature: 0, responseFormat: chat.enableThinking ? undefined : MERGE_RESPONSE_FORMAT },
    (error) =>
      trace("rb_llm_response", {
        rb_job_id: rbJobId,
        purpose: "merge",
        mem_id: existing.mem_id,
        error: `llm_call_failed_with_response_format: ${errorMessage(error)}`,
      }),
  );
  trace("rb_llm_response", {
    rb_job_id: rbJobId,
    purpose: "merge",
    mem_id: existing.mem_id,
    content: reply.content,
    raw: reply.raw,
    tool_calls: reply.toolCalls,
  });

  let document: JsonObject;
  try {
    document = extractFirstJsonObject(reply.content);
  } catch (error) {
    if (error instanceof JsonExtractionError) {
      logScoped("learn", `merge reply for ${existing.mem_id} ignored`, error);
      return null;
    }
    throw error;
  }
  const content = readString(document, "content").trim();
  if (!content || content === "NOT_DUPLICATE") return null;
  return { content, extra: isRecord(document.extra) ? document.extra : {} };
}

/** Applies one proposal: merge into a near-duplicate active item, or add a new one. */
async function consolidate(
  deps: LearnDeps,
  trace: TraceFn,
  runId: string,
  rbJobId: string,
  proposal: Proposal,
): Promise<DeltaOp> {
  const { store, memory, config } = deps;
  const threshold = config.memory.near_duplicate_threshold;
  const [nearest] = memory.query(proposal.content, 3, {
    status: ["active"],
    role: [proposal.role],
    type: [proposal.type],
  });
  const similarity = nearest ? 1 - nearest.distance : null;
  const nearDuplicate: JsonObject | null = nearest
    ? {
        candidate_mem_id: nearest.item.mem_id,
        distance: nearest.distance,
        similarity,
        threshold,
        assumption: "similarity ~= 1 - distance",
      }
    : null;

  if (nearest && similarity !== null && similarity >= threshold) {
    const existing = nearest.item;
    const merged =
      !deps.dryRun && deps.chat
        ? await mergeWithModel(deps.chat, config, trace, rbJobId, existing, proposal)
        : null;

    let content: string;
    let extra: JsonObject;
    if (merged) {
      content = merged.content;
      extra = { ...existing.extra, ...merged.extra };
    } else {
      content = existing.content.trim().length >= proposal.content.length ? existing.content : proposal.content;
      const mergedFrom = Array.isArray(existing.extra.merged_from) ? existing.extra.merged_from : [];
      extra = {
        ...existing.extra,
        merged_from: [...mergedFrom, { source_run_id: runId, proposal: proposal.content }],
      };
    }

    const after = memory.upsert({
      mem_id: existing.mem_id,
      status: existing.status,
      role: existing.role,
      type: existing.type,
      content,
      source_run_id: existing.source_run_id,
      schema_version: existing.schema_version,
      extra,
      preserve_created_at: true,
    });
    syncMemIndex(store, after);
    store.appendMemEditLog({
      mem_id: after.mem_id,
      actor: LEARN_ACTOR,
      reason: `learn_merge:${rbJobId}`,
      before: memoryToRecord(existing),
      after: memoryToRecord(after),
      extra: { near_duplicate: nearDuplicate, merge_used: merged !== null },
    });
    return {
      op: "update",
      mem_id: after.mem_id,
      before: memoryToSnapshot(existing),
      after: memoryToSnapshot(after),
      near_duplicate: nearDuplicate,
      merge_used: merged !== null,
    };
  }

  const after = memory.upsert({
    status: "active",
    role: proposal.role,
    type: proposal.type,
    content: proposal.content,
    source_run_id: runId,
    schema_version: 1,
    extra: { ...proposal.extra, source_run_id: runId, strategy_version: config.memory.strategy_version },
  });
  syncMemIndex(store, after);
  store.appendMemEditLog({
    mem_id: after.mem_id,
    actor: LEARN_ACTOR,
    reason: `learn_add:${rbJobId}`,
    before: {},
    after: memoryToRecord(after),
    extra: { near_duplicate_checked: nearDuplicate },
  });
  return { op: "add", mem_id: after.mem_id, after: memoryToSnapshot(after), near_duplicate_checked: nearDuplicate };
}

function memoryToSnapshot(item: MemoryItem) {
  return { ...item, extra: { ...item.extra } };
}

/**
 * One learn pass for a run, recorded as exactly one delta (possibly empty).
 * Deltas still applied for the run are rolled back first so repeated learns
 * replace each other instead of compounding. Returns the new delta id.
 */
export async function learnForRun(deps: LearnDeps, runId: string, rbJobId: string): Promise<string> {
  const { store, memory, config } = deps;
  const id = runId.trim();
  if (!id) throw new LearnError("run_id is required.");
  if (!store.getRun(id)) throw new LearnError("Run not found.");

  const trace = createRunTracer(store, id);
  const cutoff = store.now();
  const feedbackRecord = store.getFeedbackForRun(id);
  if (!feedbackRecord) throw new LearnError("Feedback not found (required for learn).");
  const feedback: JsonObject = { feedback: { ...feedbackRecord } };

  const outputEvent = store.getLatestEvent(id, "final_output");
  const runOutput = outputEvent?.payload ?? {};
  const snapshot: LearnSnapshot = {
    snapshot_version: 1,
    run_id: id,
    rb_job_id: rbJobId,
    trace_cutoff_ts: cutoff,
    feedback_id: feedbackRecord.feedback_id,
    feedback_updated_at: feedbackRecord.updated_at,
    final_output_event_id: outputEvent?.event_id ?? null,
  };
  const budget = DerefBudget.fromConfig(config);

  trace("rb_learn_snapshot", {
    rb_job_id: rbJobId,
    snapshot: snapshotJson(snapshot),
    budget: {
      max_calls_total: budget.maxCallsTotal,
      max_full_calls: budget.maxFullCalls,
      max_chars_total: budget.maxCharsTotal,
      excerpt_chars: budget.excerptChars,
      full_chars: budget.fullChars,
    },
    policy: { facts_only: true, forbidden_trace_event_types: [...FORBIDDEN_EVENT_TYPES].sort() },
  });

  for (const delta of store.listRbDeltasForRun(id, "applied")) {
    rollbackDelta(store, memory, { runId: id, deltaId: delta.delta_id, reason: "auto_rollback_before_relearn" });
  }

  const seed = JSON.stringify({
    run_id: id,
    run_output: runOutput.recipes_json ?? {},
    feedback: feedback.feedback,
  });
  const retrieved = memory.query(seed, RETRIEVE_LIMIT, { status: ["active"] }).map((result) => result.item);

  let proposals: Proposal[];
  if (deps.dryRun) {
    proposals = dryRunProposals(id);
  } else {
    const chat = deps.chat;
    if (!chat) throw new LearnError("LLM is required for learn (set RECAP_LEARN_DRY_RUN=1 for dry-run mode).");
    const prompt = renderTemplate(config.memory.extract_prompt_template, {
      run_id: id,
      run_output_json: JSON.stringify(runOutput, null, 2),
      feedback_json: JSON.stringify(feedback, null, 2),
      existing_memories_context: formatExistingMemories(config, retrieved.slice(0, CONTEXT_LIMIT)),
      run_trace_digest_json: JSON.stringify(buildTraceDigest(store, snapshot), null, 2),
    }).trim();
    const ctx: DerefContext = { store, memory, config, snapshot, budget, feedback, runOutput, trace };
    proposals = await extractProposals({ ...deps, chat }, ctx, prompt);
  }

  const ops: DeltaOp[] = [];
  for (const proposal of proposals) {
    ops.push(await consolidate(deps, trace, id, rbJobId, proposal));
  }

  const delta = store.createRbDelta(id, ops, {
    rb_job_id: rbJobId,
    strategy_version: config.memory.strategy_version,
    dry_run: deps.dryRun,
  });
  trace("rb_learn_completed", { rb_job_id: rbJobId, delta_id: delta.delta_id, n_ops: ops.length, dry_run: deps.dryRun });
  return delta.delta_id;
}

export type LearnOutcome = { ok: true; deltaId: string } | { ok: false; error: string };

/** Like `learnForRun`, but a failure becomes an `rb_learn_failed` event and an error outcome. */
export async function safeLearnForRun(deps: LearnDeps, runId: string, rbJobId: string): Promise<LearnOutcome> {
  try {
    return { ok: true, deltaId: await learnForRun(deps, runId, rbJobId) };
  } catch (error) {
    const message = errorMessage(error);
    deps.store.appendEvent(runId, "rb_learn_failed", {
      rb_job_id: rbJobId,
      error: message,
      traceback: errorTrace(error),
    });
    logScoped("learn", `learn for ${runId} failed`, error);
    return { ok: false, error: message };
  }
}
