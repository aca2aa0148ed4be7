#!/usr/bin/env node
import { loadAppConfig } from "./config/appConfig.js"
import { SqliteStore } from "./db/sqliteStore.js"
import { errorMessage } from "./errors.js"
import { loadEnv } from "./loadEnv.js"
import { createBatchIdempotent, parseCreateBatchRequest } from "./runtime/batchService.js"
import { isRecord } from "./util/json.js"

type ParsedArgs =
    | {
          command: "submit"
          userRequest: string
          nRuns?: number
          recipesPerRun?: number
          temperature?: number
          dryRun: boolean
          idempotencyKey?: string
      }
    | { command: "cancel"; targetId: string; reason?: string }
    | { command: "status"; targetId: string }

function usage(error?: string) {
    const lines = [
        error ? `Error: ${error}` : null,
        "Usage:",
        '  recipe-recap submit [--runs <n>] [--recipes <n>] [--temperature <t>] [--dry-run] [--idempotency-key <key>] "<request>"',
        "  recipe-recap cancel <batch_id|run_id> [--reason <text>]",
        "  recipe-recap status <batch_id|run_id>",
        "",
        "Options:",
        "  --runs <n>               Number of runs in the batch (default 1)",
        "  --recipes <n>            Recipes per run (default 3)",
        "  --temperature <t>        Sampling temperature, 0..2 (default 0.7)",
        "  --dry-run                Simulate runs without calling the model or the knowledge base",
        "  --idempotency-key <key>  Replays the first response for repeated submits",
        "",
        "Example:",
        '  recipe-recap submit --runs 2 --recipes 3 "Design a Cu-based catalyst for CO2 reduction"',
    ].filter(Boolean)

    console.error(lines.join("\n"))
}

function parseNumber(raw: string, label: string): number {
    const value = Number(raw)
    if (!Number.isFinite(value)) throw new Error(`${label} must be a number`)
    return value
}

function parseArgs(argv: string[]): ParsedArgs {
    const [command, ...rest] = argv
    const positional: string[] = []
    const options = new Map<string, string>()
    let dryRun = false

    const takeValue = (arr: string[], idx: number, label: string): [string, number] => {
        const next = arr[idx + 1]
        if (!next) {
            throw new Error(`Missing value for ${label}`)
        }
        return [next, idx + 1]
    }

    for (let i = 0; i < rest.length; i += 1) {
        const arg = rest[i] ?? ""

        if (arg === "--dry-run") {
            dryRun = true
            continue
        }

        if (arg.startsWith("--") && arg.includes("=")) {
            const [name, value] = arg.split("=", 2)
            options.set(name ?? arg, value ?? "")
            continue
        }

        if (arg.startsWith("--")) {
            const [value, nextIndex] = takeValue(rest, i, arg)
            options.set(arg, value)
            i = nextIndex
            continue
        }

        positional.push(arg)
    }

    const numberOption = (name: string) => {
        const raw = options.get(name)
        return raw === undefined ? undefined : parseNumber(raw, name)
    }

    switch (command) {
        case "submit":
            return {
                command,
                userRequest: positional.join(" ").trim(),
                nRuns: numberOption("--runs"),
                recipesPerRun: numberOption("--recipes"),
                temperature: numberOption("--temperature"),
                dryRun,
                idempotencyKey: options.get("--idempotency-key"),
            }
        case "cancel":
        case "status": {
            const targetId = positional[0]
            if (!targetId) throw new Error(`${command} needs a batch_id or run_id`)
            return command === "cancel"
                ? { command, targetId, reason: options.get("--reason") }
                : { command, targetId }
        }
        default:
            throw new Error(command ? `Unknown command: ${command}` : "Command is required.")
    }
}

function run(store: SqliteStore, parsed: ParsedArgs) {
    switch (parsed.command) {
        case "submit": {
            const config = loadAppConfig()
            const body: Record<string, unknown> = { user_request: parsed.userRequest, dry_run: parsed.dryRun }
            if (parsed.nRuns !== undefined) body.n_runs = parsed.nRuns
            if (parsed.recipesPerRun !== undefined) body.recipes_per_run = parsed.recipesPerRun
            if (parsed.temperature !== undefined) body.temperature = parsed.temperature
            const request = parseCreateBatchRequest(body, config)
            const response: unknown = JSON.parse(
                createBatchIdempotent(store, { key: parsed.idempotencyKey ?? null, request, config }),
            )
            if (!isRecord(response) || !isRecord(response.batch) || !Array.isArray(response.runs)) {
                throw new Error("Unexpected create response.")
            }
            console.log(`batch ${String(response.batch.batch_id)}`)
            for (const item of response.runs) {
                if (isRecord(item)) console.log(`  run ${String(item.run_id)} (#${String(item.run_index)})`)
            }
            return
        }
        case "cancel": {
            const targetType = store.getBatch(parsed.targetId) ? "batch" : store.getRun(parsed.targetId) ? "run" : null
            if (!targetType) throw new Error(`No batch or run with id ${parsed.targetId}`)
            const cancelId = store.requestCancel(targetType, parsed.targetId, parsed.reason ?? "cli_cancel")
            console.log(`cancel requested for ${targetType} ${parsed.targetId} (${cancelId})`)
            return
        }
        case "status": {
            const batch = store.getBatch(parsed.targetId)
            if (batch) {
                console.log(`batch ${batch.batch_id}: ${batch.status}${batch.error ? ` (${batch.error})` : ""}`)
                for (const item of store.listRunsForBatch(batch.batch_id)) {
                    console.log(`  run ${item.run_id} (#${item.run_index}): ${item.status}${item.error ? ` (${item.error})` : ""}`)
                }
                return
            }
            const single = store.getRun(parsed.targetId)
            if (!single) throw new Error(`No batch or run with id ${parsed.targetId}`)
            console.log(`run ${single.run_id} (#${single.run_index}): ${single.status}${single.error ? ` (${single.error})` : ""}`)
            return
        }
    }
}

export async function main() {
    loadEnv()

    let parsed: ParsedArgs
    try {
        parsed = parseArgs(process.argv.slice(2))
    } catch (error) {
        usage(errorMessage(error))
        process.exitCode = 1
        return
    }

    if (parsed.command === "submit" && !parsed.userRequest) {
        usage("Request text is required.")
        process.exitCode = 1
        return
    }

    const store = new SqliteStore()
    try {
        run(store, parsed)
    } catch (error) {
        console.error(`[recipe-recap] ${parsed.command} failed: ${errorMessage(error)}`)
        process.exitCode = 1
    } finally {
        store.close()
    }
}

main().catch((error) => {
    console.error("recipe-recap failed:", error)
    process.exit(1)
})
