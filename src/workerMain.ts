import { loadAppConfig } from "./config/appConfig.js";
import { SqliteStore } from "./db/sqliteStore.js";
import { setJobLogPath } from "./jobLogger.js";
import { envFlag, envInt, envString, loadEnv } from "./loadEnv.js";
import { ConsoleWorkerReporter, RunWorker } from "./runtime/runWorker.js";

export async function main() {
  loadEnv();
  setJobLogPath(envString("RECAP_JOB_LOG", "") || null, { verbose: envFlag("RECAP_JOB_LOG_VERBOSE") });

  const config = loadAppConfig();
  const store = new SqliteStore();
  const learnDryRun = envFlag("RECAP_LEARN_DRY_RUN");
  const worker = new RunWorker({
    store,
    config,
    reporter: new ConsoleWorkerReporter(),
    pollIntervalMs: envInt("RECAP_POLL_INTERVAL_MS", 500),
    learnDryRun,
  });

  const shutdown = (signal: string) => {
    console.log(`[worker] ${signal} received, stopping after the current unit...`);
    worker.stop();
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  console.log(`[worker] DB path ${store.dbPath}`);
  console.log(`[worker] Config ${config.source_path}${learnDryRun ? " (learn dry-run)" : ""}`);
  try {
    await worker.start();
  } finally {
    worker.close();
    store.close();
  }
}

main().catch((error) => {
  console.error("Worker failed:", error);
  process.exit(1);
});
