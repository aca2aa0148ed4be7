import { attachRunStatusSocket, createApiApp } from "./api/apiServer.js"
import { loadAppConfig } from "./config/appConfig.js"
import { SqliteStore } from "./db/sqliteStore.js"
import { setJobLogPath } from "./jobLogger.js"
import { envFlag, envInt, envString, loadEnv } from "./loadEnv.js"
import { SqliteMemoryStore } from "./memory/memoryStore.js"

export async function main() {
    loadEnv()
    setJobLogPath(envString("RECAP_JOB_LOG", "") || null, { verbose: envFlag("RECAP_JOB_LOG_VERBOSE") })

    const config = loadAppConfig()
    const store = new SqliteStore()
    let memory: SqliteMemoryStore | null = null
    const openMemory = () => {
        memory ??= new SqliteMemoryStore({ embeddingDim: config.memory.hash_embedding_dim })
        return memory
    }

    const port = envInt("API_PORT", 4180)
    const app = createApiApp({ store, config, memory: openMemory })
    const server = app.listen(port, () => {
        console.log(`[api] Listening on http://localhost:${port}`)
        console.log(`[api] DB path ${store.dbPath}`)
    })
    const socket = attachRunStatusSocket(server, store)

    const shutdown = () => {
        socket.close()
        server.close(() => {
            memory?.close()
            store.close()
        })
    }
    process.once("SIGINT", shutdown)
    process.once("SIGTERM", shutdown)
}

main().catch((error) => {
    console.error("API server failed:", error)
    process.exit(1)
})
