import { JsonExtractionError } from "../errors.js"
import { isRecord, type JsonObject } from "../util/json.js"

/**
 * Parses the text between the first `{` and the last `}` of a model reply.
 * Prose around the object is tolerated; anything else is an error.
 */
export function extractFirstJsonObject(text: string): JsonObject {
    const start = text.indexOf("{")
    const end = text.lastIndexOf("}")
    if (start === -1 || end === -1 || end <= start) {
        throw new JsonExtractionError("No JSON object found in response.")
    }

    let parsed: unknown
    try {
        parsed = JSON.parse(text.slice(start, end + 1).trim())
    } catch (error) {
        const detail = error instanceof Error ? error.message : String(error)
        throw new JsonExtractionError(`Invalid JSON: ${detail}`)
    }
    if (!isRecord(parsed)) throw new JsonExtractionError("Top-level JSON value is not an object.")
    return parsed
}
