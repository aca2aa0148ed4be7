export type JsonObject = Record<string, unknown>

export function isRecord(value: unknown): value is JsonObject {
    return typeof value === "object" && value !== null && !Array.isArray(value)
}

export function compactJson(value: unknown): string {
    return JSON.stringify(value) ?? "null"
}

/** JSON with object keys sorted at every level; used for request hashing. */
export function canonicalJson(value: unknown): string {
    return JSON.stringify(sortKeys(value)) ?? "null"
}

function sortKeys(value: unknown): unknown {
    if (Array.isArray(value)) return value.map(sortKeys)
    if (isRecord(value)) {
        const out: JsonObject = {}
        for (const key of Object.keys(value).sort()) {
            out[key] = sortKeys(value[key])
        }
        return out
    }
    return value
}

export function parseJsonObject(text: string | null | undefined): JsonObject {
    if (!text) return {}
    try {
        const parsed: unknown = JSON.parse(text)
        return isRecord(parsed) ? parsed : {}
    } catch {
        return {}
    }
}

export function parseJsonArray(text: string | null | undefined): unknown[] {
    if (!text) return []
    try {
        const parsed: unknown = JSON.parse(text)
        return Array.isArray(parsed) ? parsed : []
    } catch {
        return []
    }
}

export function readString(record: JsonObject, key: string, fallback = ""): string {
    const value = record[key]
    return typeof value === "string" ? value : fallback
}

export function readNumber(record: JsonObject, key: string): number | null {
    const value = record[key]
    return typeof value === "number" && Number.isFinite(value) ? value : null
}

export function readBoolean(record: JsonObject, key: string, fallback = false): boolean {
    const value = record[key]
    return typeof value === "boolean" ? value : fallback
}

export function truncate(text: string, maxLength: number): string {
    if (text.length <= maxLength) return text
    return `${text.slice(0, Math.max(0, maxLength - 1))}…`
}
