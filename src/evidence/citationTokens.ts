// Alias tokens look like [C1], [C12], [KB3]: uppercase prefix, numeric suffix.
const ALIAS_TOKEN = /\[([A-Z]+\d+)\]/g
const MEM_TOKEN =
    /\bmem:([0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12})\b/g

function uniqueMatches(pattern: RegExp, text: string): string[] {
    const seen = new Set<string>()
    const ordered: string[] = []
    for (const match of text.matchAll(pattern)) {
        const value = match[1]
        if (!value || seen.has(value)) continue
        seen.add(value)
        ordered.push(value)
    }
    return ordered
}

/** `[C1]`-style aliases in first-seen order, deduplicated. */
export function extractCitationAliases(text: string | null | undefined): string[] {
    return uniqueMatches(ALIAS_TOKEN, text ?? "")
}

/** `mem:<uuid>` ids (without the prefix) in first-seen order, deduplicated. */
export function extractMemoryIds(text: string | null | undefined): string[] {
    return uniqueMatches(MEM_TOKEN, text ?? "")
}

export function normalizeAlias(raw: string): string {
    const trimmed = raw.trim()
    if (trimmed.startsWith("[") && trimmed.endsWith("]")) return trimmed.slice(1, -1).trim()
    return trimmed
}

export function normalizeMemId(raw: string): string {
    const trimmed = raw.trim()
    return trimmed.startsWith("mem:") ? trimmed.slice(4).trim() : trimmed
}

export function formatSnippet(text: string, maxLength: number): string {
    const flat = text.replaceAll("\n", " ").trim()
    return flat.length > maxLength ? `${flat.slice(0, maxLength)}…` : flat
}
