import fs from "node:fs"
import path from "node:path"
import { z } from "zod"
import { ConfigurationError } from "../errors.js"
import { PACKAGE_ROOT, envInt, envString } from "../loadEnv.js"

export const ROLES = ["orchestrator", "mof_expert", "tio2_expert"] as const
export const KB_NAMES = ["kb_principles", "kb_modulation"] as const
export const KB_MODES = ["mix", "local", "global", "hybrid", "naive"] as const
export const MEMORY_ROLES = ["global", ...ROLES] as const
export const MEMORY_STATUSES = ["active", "archived"] as const
export const MEMORY_TYPES = ["bank_item", "manual_note"] as const

export type Role = (typeof ROLES)[number]
export type KbName = (typeof KB_NAMES)[number]
export type KbMode = (typeof KB_MODES)[number]
export type MemoryRole = (typeof MEMORY_ROLES)[number]
export type MemoryStatus = (typeof MEMORY_STATUSES)[number]
export type MemoryType = (typeof MEMORY_TYPES)[number]

const positiveInt = z.number().int().min(1)
const nonEmpty = z.string().min(1)

const RawConfigSchema = z.object({
    limits: z.object({
        n_runs_max: positiveInt,
        recipes_per_run_max: positiveInt,
    }),
    recap: z.object({
        max_rounds: z.number().int().min(0),
        max_depth: positiveInt,
        max_steps: positiveInt,
    }),
    kb: z.object({
        default_mode: z.enum(KB_MODES),
        default_top_k: positiveInt,
    }),
    citations: z.object({
        alias_prefix: z.string().regex(/^[A-Z]+$/, "must be uppercase letters A-Z"),
    }),
    evidence: z.object({
        max_full_chunks_in_generate_recipes: positiveInt,
        kb_list_default_limit: positiveInt,
        kb_list_max_limit: positiveInt,
    }),
    memory: z.object({
        hash_embedding_dim: z.number().int(),
        k_role: z.number().int().min(0),
        k_global: z.number().int().min(0),
        max_full_memories_in_generate_recipes: positiveInt,
        mem_list_default_limit: positiveInt,
        mem_list_max_limit: positiveInt,
        near_duplicate_threshold: z.number().min(-1).max(1),
        strategy_version: nonEmpty,
        context_template: nonEmpty,
        extract_prompt_template: nonEmpty,
        merge_prompt_template: nonEmpty,
        learn_deref_max_calls_total: positiveInt,
        learn_deref_max_full_calls: z.number().int().min(0),
        learn_deref_max_chars_total: positiveInt,
        learn_deref_excerpt_chars: positiveInt,
        learn_deref_full_chars: positiveInt,
        learn_deref_list_events_default_limit: positiveInt,
        learn_deref_list_events_max_limit: positiveInt,
    }),
    roles: z.object({
        orchestrator: nonEmpty,
        mof_expert: nonEmpty,
        tio2_expert: nonEmpty,
    }),
    priors: z.object({
        system_description_path: nonEmpty,
        microenvironment_tio2_path: nonEmpty,
        microenvironment_mof_path: nonEmpty,
    }),
    prompts: z.object({
        system_base: nonEmpty,
        down_prompt_template: nonEmpty,
        action_taken_prompt_template: nonEmpty,
        up_prompt_template: nonEmpty,
        generate_recipes_prompt_template: nonEmpty,
    }),
})

type RawConfig = z.infer<typeof RawConfigSchema>

export interface PriorsConfig {
    system_description_path: string
    microenvironment_tio2_path: string
    microenvironment_mof_path: string
    system_description_md: string
    microenvironment_tio2_md: string
    microenvironment_mof_md: string
}

export type AppConfig = Omit<RawConfig, "priors"> & {
    priors: PriorsConfig
    /** Absolute path the config was read from. */
    source_path: string
}

export function defaultConfigPath(): string {
    const fromEnv = envString("RECAP_CONFIG_PATH")
    if (fromEnv) return path.resolve(fromEnv)
    const candidates = [
        path.join(PACKAGE_ROOT, "config", "default.json"),
        path.join(PACKAGE_ROOT, "..", "config", "default.json"),
    ]
    return candidates.find((candidate) => fs.existsSync(candidate)) ?? candidates[0]
}

function resolvePriorPath(raw: string, key: string, configDir: string): string {
    if (path.isAbsolute(raw)) {
        if (!fs.existsSync(raw)) {
            throw new ConfigurationError(`Prior file not found for ${key}: ${raw}`, { key })
        }
        return raw
    }
    const candidates = [configDir, path.dirname(configDir), process.cwd()].map((base) =>
        path.resolve(base, raw),
    )
    const found = candidates.find((candidate) => fs.existsSync(candidate))
    if (!found) {
        throw new ConfigurationError(`Prior file not found for ${key}: ${candidates[0]}`, { key })
    }
    return found
}

function formatIssues(error: z.ZodError): { message: string; key?: string } {
    const first = error.issues[0]
    const key = first?.path.join(".")
    const message = error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ")
    return { message, key }
}

export function parseAppConfig(raw: unknown, sourcePath: string): AppConfig {
    const parsed = RawConfigSchema.safeParse(raw)
    if (!parsed.success) {
        const { message, key } = formatIssues(parsed.error)
        throw new ConfigurationError(`Invalid config ${sourcePath}: ${message}`, { key })
    }

    const config = parsed.data
    if (config.evidence.kb_list_default_limit > config.evidence.kb_list_max_limit) {
        throw new ConfigurationError(
            "evidence.kb_list_default_limit must not exceed evidence.kb_list_max_limit",
            { key: "evidence.kb_list_default_limit" },
        )
    }

    const configDir = path.dirname(sourcePath)
    const priorKeys = [
        "system_description_path",
        "microenvironment_tio2_path",
        "microenvironment_mof_path",
    ] as const
    const resolved = Object.fromEntries(
        priorKeys.map((key) => [key, resolvePriorPath(config.priors[key], `priors.${key}`, configDir)]),
    )
    const readPrior = (key: (typeof priorKeys)[number]) => {
        const file = resolved[key] ?? ""
        return { file, text: fs.readFileSync(file, "utf8") }
    }
    const description = readPrior("system_description_path")
    const tio2 = readPrior("microenvironment_tio2_path")
    const mof = readPrior("microenvironment_mof_path")

    const embeddingDim = envInt("RECAP_HASH_EMBEDDING_DIM", config.memory.hash_embedding_dim)

    return {
        ...config,
        memory: { ...config.memory, hash_embedding_dim: Math.max(8, embeddingDim) },
        priors: {
            system_description_path: description.file,
            microenvironment_tio2_path: tio2.file,
            microenvironment_mof_path: mof.file,
            system_description_md: description.text,
            microenvironment_tio2_md: tio2.text,
            microenvironment_mof_md: mof.text,
        },
        source_path: sourcePath,
    }
}

export function loadAppConfig(configPath?: string): AppConfig {
    const resolvedPath = path.resolve(configPath ?? defaultConfigPath())
    if (!fs.existsSync(resolvedPath)) {
        throw new ConfigurationError(`Config file not found: ${resolvedPath}`)
    }

    let raw: unknown
    try {
        raw = JSON.parse(fs.readFileSync(resolvedPath, "utf8"))
    } catch (error) {
        const detail = error instanceof Error ? error.message : String(error)
        throw new ConfigurationError(`Config file is not valid JSON (${resolvedPath}): ${detail}`)
    }
    return parseAppConfig(raw, resolvedPath)
}

export function roleInstruction(config: AppConfig, role: Role): string {
    return config.roles[role]
}

/** System prompt shared by planning, generation and learn calls. */
export function buildSystemPrompt(config: AppConfig): string {
    return [
        config.prompts.system_base.trim(),
        config.priors.system_description_md.trim(),
        config.priors.microenvironment_tio2_md.trim(),
        config.priors.microenvironment_mof_md.trim(),
    ]
        .join("\n\n")
        .trim()
}
