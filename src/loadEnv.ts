import fs from "node:fs"
import path from "node:path"
import { fileURLToPath } from "node:url"
import { ConfigurationError } from "./errors.js"

let loaded = false

export const PACKAGE_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..")

/**
 * Load `.env` from the package root once. Variables already present in
 * `process.env` win over the file.
 */
export function loadEnv(envFilePath?: string) {
    if (loaded) return
    loaded = true

    const resolvedPath = envFilePath ?? path.join(PACKAGE_ROOT, ".env")
    if (!fs.existsSync(resolvedPath)) return

    try {
        const parsed = parseEnvFile(fs.readFileSync(resolvedPath, "utf8"))
        for (const [key, value] of parsed) {
            if (process.env[key] === undefined) {
                process.env[key] = value
            }
        }
    } catch (error) {
        console.warn(`[env] Failed to load ${resolvedPath}:`, error)
    }
}

export function parseEnvFile(content: string): Map<string, string> {
    const out = new Map<string, string>()
    for (const line of content.split(/\r?\n/)) {
        const trimmed = line.trim()
        if (trimmed === "" || trimmed.startsWith("#")) continue

        const cleaned = trimmed.startsWith("export ") ? trimmed.slice(7).trim() : trimmed
        const eqIndex = cleaned.indexOf("=")
        if (eqIndex <= 0) continue

        const key = cleaned.slice(0, eqIndex).trim()
        if (!key) continue
        out.set(key, unquote(cleaned.slice(eqIndex + 1).trim()))
    }
    return out
}

function unquote(raw: string): string {
    const quote = raw[0]
    if ((quote === '"' || quote === "'") && raw.length >= 2 && raw.endsWith(quote)) {
        const inner = raw.slice(1, -1)
        return quote === '"' ? inner.replace(/\\n/g, "\n").replace(/\\t/g, "\t") : inner
    }
    const hashIndex = raw.indexOf(" #")
    return hashIndex === -1 ? raw : raw.slice(0, hashIndex).trimEnd()
}

/** First non-empty value among `names`, else `fallback`. */
export function envString(names: string | string[], fallback = ""): string {
    for (const name of Array.isArray(names) ? names : [names]) {
        const value = process.env[name]?.trim()
        if (value) return value
    }
    return fallback
}

export function envFlag(name: string, fallback = false): boolean {
    const raw = process.env[name]?.trim().toLowerCase()
    if (!raw) return fallback
    if (["1", "true", "yes", "on"].includes(raw)) return true
    if (["0", "false", "no", "off"].includes(raw)) return false
    return fallback
}

export function envInt(name: string, fallback: number): number {
    const raw = process.env[name]?.trim()
    if (!raw) return fallback
    const value = Number(raw)
    if (!Number.isInteger(value)) {
        throw new ConfigurationError(`${name} must be an integer, got ${JSON.stringify(raw)}`, { key: name })
    }
    return value
}
