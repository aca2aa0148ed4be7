import { z } from "zod"
import {
    KB_MODES,
    KB_NAMES,
    MEMORY_ROLES,
    MEMORY_STATUSES,
    MEMORY_TYPES,
    ROLES,
} from "../config/appConfig.js"
import { normalizeAlias, normalizeMemId } from "../evidence/citationTokens.js"
import { SubtaskParseError } from "../errors.js"
import type { JsonSchemaFormat } from "../llm/chatClient.js"
import { isRecord } from "../util/json.js"
import { extractFirstJsonObject } from "./jsonExtract.js"

export const SUBTASK_TYPES = [
    "task",
    "kb_search",
    "kb_get",
    "kb_list",
    "mem_search",
    "mem_get",
    "mem_list",
    "generate_recipes",
] as const

export type SubtaskType = (typeof SUBTASK_TYPES)[number]

function quoteList(values: readonly string[]): string {
    return `[${[...values].sort().map((value) => `'${value}'`).join(", ")}]`
}

function describeType(value: unknown): string {
    if (value === null) return "null"
    if (Array.isArray(value)) return "array"
    return typeof value
}

const trimmedOrUndefined = (value: unknown) => {
    if (value === null || value === undefined) return undefined
    if (typeof value === "string") return value.trim() || undefined
    return value
}

const toIntegerInput = (value: unknown) => {
    if (value === null || value === undefined) return undefined
    if (typeof value === "string") return value.trim() ? Number(value) : undefined
    return value
}

function requiredText(message: string, normalize: (raw: string) => string = (raw) => raw.trim()) {
    return z.preprocess(
        (value) => (typeof value === "string" ? normalize(value) : value),
        z.string({ required_error: message, invalid_type_error: message }).min(1, message),
    )
}

function optionalEnum<T extends string>(values: readonly [T, ...T[]], field: string) {
    return z.preprocess(
        trimmedOrUndefined,
        z
            .enum(values, {
                errorMap: (_issue, ctx) => ({
                    message: `Invalid ${field}: must be one of ${quoteList(values)}, got '${String(ctx.data)}'`,
                }),
            })
            .optional(),
    )
}

function optionalInt(field: string, min?: number) {
    const bounded = z
        .number({ invalid_type_error: `Invalid ${field}: expected an integer` })
        .int(`Invalid ${field}: expected an integer`)
        .refine(
            (value) => min === undefined || value >= min,
            (value) => ({ message: `Invalid ${field}: must be >=${min ?? 0}, got ${value}` }),
        )
    return z.preprocess(toIntegerInput, bounded.optional())
}

const TaskSubtaskSchema = z.object({
    type: z.literal("task"),
    task: requiredText("Invalid task subtask: missing non-empty 'task'"),
    role: z.preprocess(
        trimmedOrUndefined,
        z
            .enum(ROLES, {
                errorMap: (_issue, ctx) => ({
                    message: `Invalid task subtask: role must be one of ${quoteList(ROLES)}, got '${String(ctx.data)}'`,
                }),
            })
            .default("orchestrator"),
    ),
})

const KbSearchSubtaskSchema = z.object({
    type: z.literal("kb_search"),
    kb_name: z.preprocess(
        (value) => (typeof value === "string" ? value.trim() : value ?? ""),
        z.enum(KB_NAMES, {
            errorMap: (_issue, ctx) => ({
                message: `Invalid kb_search: kb_name must be one of ${quoteList(KB_NAMES)}, got '${String(ctx.data)}'`,
            }),
        }),
    ),
    query: requiredText("Invalid kb_search: missing non-empty 'query'"),
    top_k: optionalInt("kb_search.top_k", 1),
    mode: optionalEnum(KB_MODES, "kb_search.mode"),
})

const KbGetSubtaskSchema = z.object({
    type: z.literal("kb_get"),
    alias: requiredText("Invalid kb_get: missing non-empty 'alias'", normalizeAlias),
})

const KbListSubtaskSchema = z.object({
    type: z.literal("kb_list"),
    limit: optionalInt("kb_list.limit"),
})

const MemSearchSubtaskSchema = z.object({
    type: z.literal("mem_search"),
    query: requiredText("Invalid mem_search: missing non-empty 'query'"),
    top_k: optionalInt("mem_search.top_k", 1),
    role: optionalEnum(MEMORY_ROLES, "mem_search.role"),
    status: optionalEnum(MEMORY_STATUSES, "mem_search.status"),
    mem_type: optionalEnum(MEMORY_TYPES, "mem_search.mem_type"),
})

const MemGetSubtaskSchema = z.object({
    type: z.literal("mem_get"),
    mem_id: requiredText("Invalid mem_get: missing non-empty 'mem_id'", normalizeMemId),
})

const MemListSubtaskSchema = z.object({
    type: z.literal("mem_list"),
    limit: optionalInt("mem_list.limit"),
})

const GenerateRecipesSubtaskSchema = z.object({
    type: z.literal("generate_recipes"),
})

export const SubtaskSchema = z.discriminatedUnion("type", [
    TaskSubtaskSchema,
    KbSearchSubtaskSchema,
    KbGetSubtaskSchema,
    KbListSubtaskSchema,
    MemSearchSubtaskSchema,
    MemGetSubtaskSchema,
    MemListSubtaskSchema,
    GenerateRecipesSubtaskSchema,
])

export type Subtask = z.infer<typeof SubtaskSchema>
export type TaskSubtask = z.infer<typeof TaskSubtaskSchema>
export type KbSearchSubtask = z.infer<typeof KbSearchSubtaskSchema>
export type KbGetSubtask = z.infer<typeof KbGetSubtaskSchema>
export type KbListSubtask = z.infer<typeof KbListSubtaskSchema>
export type MemSearchSubtask = z.infer<typeof MemSearchSubtaskSchema>
export type MemGetSubtask = z.infer<typeof MemGetSubtaskSchema>
export type MemListSubtask = z.infer<typeof MemListSubtaskSchema>

function isSubtaskType(value: string): value is SubtaskType {
    return SUBTASK_TYPES.some((type) => type === value)
}

export function parseSubtask(item: unknown): Subtask {
    if (!isRecord(item)) {
        throw new SubtaskParseError(`Invalid subtask: expected object, got ${describeType(item)}`)
    }
    const type = typeof item.type === "string" ? item.type.trim() : ""
    if (!type) throw new SubtaskParseError("Invalid subtask: missing 'type'")
    if (!isSubtaskType(type)) {
        throw new SubtaskParseError(
            `Invalid subtask.type: must be one of ['${SUBTASK_TYPES.join("','")}'], got '${type}'`,
        )
    }

    const parsed = SubtaskSchema.safeParse({ ...item, type })
    if (!parsed.success) {
        throw new SubtaskParseError(parsed.error.issues[0]?.message ?? `Invalid ${type} subtask`)
    }
    return parsed.data
}

export interface RecapResponse {
    think: string
    subtasks: Subtask[]
    /** Empty when the model gave none; objects and arrays are pretty-printed. */
    result: string
}

function textField(value: unknown): string {
    if (value === null || value === undefined) return ""
    if (typeof value === "string") return value.trim()
    if (typeof value === "object") return JSON.stringify(value, null, 2)
    return String(value).trim()
}

/** Throws `JsonExtractionError` or `SubtaskParseError`; both mean "ask again". */
export function parseRecapResponse(text: string): RecapResponse {
    const document = extractFirstJsonObject(text)
    const rawSubtasks = document.subtasks ?? []
    if (!Array.isArray(rawSubtasks)) {
        throw new SubtaskParseError(`Invalid 'subtasks': expected array, got ${describeType(rawSubtasks)}`)
    }
    return {
        think: textField(document.think),
        subtasks: rawSubtasks.map(parseSubtask),
        result: textField(document.result),
    }
}

function variantSchema(
    type: SubtaskType,
    properties: Record<string, unknown>,
    required: string[] = [],
): Record<string, unknown> {
    return {
        type: "object",
        additionalProperties: false,
        properties: { type: { const: type }, ...properties },
        required: ["type", ...required],
    }
}

const sortedEnum = (values: readonly string[]) => ({ type: "string", enum: [...values].sort() })

export const RECAP_RESPONSE_FORMAT: JsonSchemaFormat = {
    type: "json_schema",
    json_schema: {
        name: "recap_response",
        strict: true,
        schema: {
            type: "object",
            additionalProperties: false,
            properties: {
                think: { type: "string" },
                subtasks: {
                    type: "array",
                    items: {
                        oneOf: [
                            variantSchema("task", { role: sortedEnum(ROLES), task: { type: "string" } }, ["task"]),
                            variantSchema(
                                "kb_search",
                                {
                                    kb_name: sortedEnum(KB_NAMES),
                                    query: { type: "string" },
                                    top_k: { type: "integer", minimum: 1 },
                                    mode: sortedEnum(KB_MODES),
                                },
                                ["kb_name", "query"],
                            ),
                            variantSchema("kb_get", { alias: { type: "string" } }, ["alias"]),
                            variantSchema("kb_list", { limit: { type: "integer", minimum: 1 } }),
                            variantSchema(
                                "mem_search",
                                {
                                    query: { type: "string" },
                                    top_k: { type: "integer", minimum: 1 },
                                    role: sortedEnum(MEMORY_ROLES),
                                    status: sortedEnum(MEMORY_STATUSES),
                                    mem_type: sortedEnum(MEMORY_TYPES),
                                },
                                ["query"],
                            ),
                            variantSchema("mem_get", { mem_id: { type: "string" } }, ["mem_id"]),
                            variantSchema("mem_list", { limit: { type: "integer", minimum: 1 } }),
                            variantSchema("generate_recipes", {}),
                        ],
                    },
                },
                result: { anyOf: [{ type: "string" }, { type: "object" }, { type: "array" }] },
            },
            required: ["think", "subtasks"],
        },
    },
}

export const RECIPE_FIELDS = ["M1", "M2", "atomic_ratio", "small_molecule_modifier", "rationale"] as const

export const RecipeSchema = z.object({
    M1: z.string().trim().min(1),
    M2: z.string().trim().min(1),
    atomic_ratio: z.string().trim().min(1),
    small_molecule_modifier: z.string().trim().min(1),
    rationale: z.string().trim().min(1),
})

export type Recipe = z.infer<typeof RecipeSchema>

/** Strict schema for the final answer: exactly `recipesPerRun` recipes. */
export function recipesResponseFormat(recipesPerRun: number): JsonSchemaFormat {
    const n = Math.max(1, Math.trunc(recipesPerRun))
    const fieldSchema = { type: "string", minLength: 1 }
    return {
        type: "json_schema",
        json_schema: {
            name: "generate_recipes_output",
            strict: true,
            schema: {
                type: "object",
                additionalProperties: false,
                properties: {
                    recipes: {
                        type: "array",
                        minItems: n,
                        maxItems: n,
                        items: {
                            type: "object",
                            additionalProperties: false,
                            properties: Object.fromEntries(RECIPE_FIELDS.map((field) => [field, fieldSchema])),
                            required: [...RECIPE_FIELDS],
                        },
                    },
                    overall_notes: { type: "string" },
                },
                required: ["recipes"],
            },
        },
    }
}
