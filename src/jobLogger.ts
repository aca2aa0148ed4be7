import path from "node:path"
import { mkdir, appendFile } from "node:fs/promises"

let jobLogPath: string | null = null
let jobLogReady: Promise<void> | null = null
let jobLogVerbose = false

export function setJobLogPath(filePath: string | null, options?: { verbose?: boolean }) {
    jobLogPath = filePath ? path.resolve(filePath) : null
    jobLogReady = null
    jobLogVerbose = Boolean(options?.verbose)
}

export function getJobLogPath(): string | null {
    return jobLogPath
}

export function isJobLogVerbose(): boolean {
    return jobLogVerbose
}

export async function appendJobLog(line: string) {
    const target = jobLogPath
    if (!target) return
    jobLogReady ??= mkdir(path.dirname(target), { recursive: true }).then(() => undefined)
    await jobLogReady
    const stamped = `[${new Date().toISOString()}] ${line}`
    await appendFile(target, stamped.endsWith("\n") ? stamped : `${stamped}\n`)
}

/**
 * Fire-and-forget diagnostic line, e.g. `logScoped("db", "claim failed", err)`.
 * Write failures go to stderr.
 */
export function logScoped(scope: string, message: string, error?: unknown) {
    const suffix =
        error === undefined ? "" : `: ${error instanceof Error ? error.message : String(error)}`
    appendJobLog(`[${scope}] ${message}${suffix}`).catch((writeError: unknown) => {
        console.warn(`[${scope}] failed to write job log:`, writeError)
    })
}

/** Like `logScoped`, but only when verbose logging was requested. */
export function logVerbose(scope: string, message: string) {
    if (!jobLogVerbose) return
    logScoped(scope, message)
}
