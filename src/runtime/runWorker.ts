import fs from "node:fs/promises";
import path from "node:path";
import type { AppConfig } from "../config/appConfig.js";
import type { BatchRecord, RbJobRecord, RunRecord } from "../db/records.js";
import type { SqliteStore } from "../db/sqliteStore.js";
import {
  CancellationSignal,
  ConfigurationError,
  DependencyUnavailableError,
  errorMessage,
  errorTrace,
} from "../errors.js";
import { logScoped } from "../jobLogger.js";
import { HttpKnowledgeSearch, type KnowledgeSearch } from "../knowledge/knowledgeSearch.js";
import { OpenAiChatClient, type ChatClient } from "../llm/chatClient.js";
import { envString } from "../loadEnv.js";
import { SqliteMemoryStore, type MemoryStore } from "../memory/memoryStore.js";
import { runRecap } from "../recap/recapEngine.js";
import type { RecapOutput } from "../recap/runSession.js";
import { readBoolean, readNumber, readString, type JsonObject } from "../util/json.js";
import { RunCancellation } from "./cancellation.js";
import { simulateDryRun } from "./dryRunSimulation.js";
import { safeLearnForRun } from "./memoryLearn.js";
import { createRunTracer } from "./runTracer.js";

export type WorkUnit = { kind: "run"; id: string } | { kind: "learn_job"; id: string; runId: string };

export interface WorkerReporter {
  onClaim?(unit: WorkUnit): Promise<void> | void;
  onComplete?(unit: WorkUnit, status: string): Promise<void> | void;
  onFailure?(unit: WorkUnit, error: Error): Promise<void> | void;
  onIdle?(): Promise<void> | void;
}

/**
 * Builds the collaborators of a normal run from the batch's config snapshot.
 * Factories throw `ConfigurationError` (with `key`) when something required
 * is not configured.
 */
export interface CollaboratorFactories {
  chat(snapshot: JsonObject): ChatClient;
  knowledge(snapshot: JsonObject): KnowledgeSearch;
  memory(): MemoryStore;
}

export interface RunWorkerOptions {
  store: SqliteStore;
  config: AppConfig;
  /**
   * Replaces the default OpenAI, HTTP knowledge and SQLite memory collaborators.
   */
  factories?: Partial<CollaboratorFactories>;
  /**
   * Optional reporter for lifecycle events.
   */
  reporter?: WorkerReporter;
  /**
   * Sleep between polls when nothing is queued (ms).
   */
  pollIntervalMs?: number;
  /**
   * If true, return from `start()` once the queues are empty instead of polling forever.
   */
  stopWhenIdle?: boolean;
  /**
   * Learn jobs use synthetic proposals instead of the model.
   */
  learnDryRun?: boolean;
}

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

function optionalString(snapshot: JsonObject, key: string): string | undefined {
  return readString(snapshot, key).trim() || undefined;
}

function defaultFactories(config: AppConfig): CollaboratorFactories {
  return {
    chat: (snapshot) =>
      new OpenAiChatClient({
        model: optionalString(snapshot, "llm_model"),
        baseUrl: optionalString(snapshot, "openai_api_base"),
      }),
    knowledge: (snapshot) => new HttpKnowledgeSearch({ baseUrl: optionalString(snapshot, "kb_base_url") }),
    memory: () => new SqliteMemoryStore({ embeddingDim: config.memory.hash_embedding_dim }),
  };
}

/**
 * Single worker loop: each cycle claims one queued run, else one queued learn
 * job, else sleeps. Units are processed one at a time; `stop()` takes effect
 * between claims.
 */
export class RunWorker {
  private readonly store: SqliteStore;
  private readonly config: AppConfig;
  private readonly factories: CollaboratorFactories;
  private readonly reporter: WorkerReporter;
  private readonly pollIntervalMs: number;
  private readonly stopWhenIdle: boolean;
  private readonly learnDryRun: boolean;
  private readonly ownsMemory: boolean;
  private memoryStore: MemoryStore | null = null;
  private stopped = false;

  constructor(options: RunWorkerOptions) {
    this.store = options.store;
    this.config = options.config;
    this.factories = { ...defaultFactories(options.config), ...options.factories };
    this.reporter = options.reporter ?? new ConsoleWorkerReporter();
    this.pollIntervalMs = options.pollIntervalMs ?? 500;
    this.stopWhenIdle = options.stopWhenIdle ?? false;
    this.learnDryRun = options.learnDryRun ?? false;
    this.ownsMemory = options.factories?.memory === undefined;
  }

  /** Fails units a previous process left running, then loops until stopped. */
  async start() {
    this.stopped = false;
    const runs = this.store.reconcileRunningRuns("server_restarted");
    const jobs = this.store.reconcileRunningRbJobs("server_restarted");
    if (runs + jobs > 0) logScoped("worker", `reconciled ${runs} run(s) and ${jobs} learn job(s)`);

    while (!this.stopped) {
      const processed = await this.runOnce();
      if (processed) continue;

      await this.reporter.onIdle?.();
      if (this.stopWhenIdle) break;
      await sleep(this.pollIntervalMs);
    }
  }

  /** The unit in progress finishes first. */
  stop() {
    this.stopped = true;
  }

  /** Processes at most one unit. Returns false when both queues are empty. */
  async runOnce(): Promise<boolean> {
    const run = this.store.claimNextQueuedRun();
    if (run) {
      await this.processRun(run);
      return true;
    }
    const job = this.store.claimNextQueuedRbJob();
    if (job) {
      await this.processLearnJob(job);
      return true;
    }
    return false;
  }

  private async processRun(run: RunRecord) {
    const unit: WorkUnit = { kind: "run", id: run.run_id };
    await this.reporter.onClaim?.(unit);
    try {
      const status = await this.executeRun(run);
      await this.reporter.onComplete?.(unit, status);
    } catch (error) {
      const message = `worker_unhandled_exception: ${errorMessage(error)}`;
      this.recordFailure(`run ${run.run_id}`, () => {
        this.store.appendEvent(run.run_id, "run_failed", { error: message, traceback: errorTrace(error) });
        this.store.updateRunStatus(run.run_id, "failed", message);
        this.store.refreshBatchStatus(run.batch_id);
      });
      await this.reporter.onFailure?.(unit, error instanceof Error ? error : new Error(String(error)));
    }
  }

  private async processLearnJob(job: RbJobRecord) {
    const unit: WorkUnit = { kind: "learn_job", id: job.rb_job_id, runId: job.run_id };
    await this.reporter.onClaim?.(unit);
    try {
      const status = await this.executeLearnJob(job);
      await this.reporter.onComplete?.(unit, status);
    } catch (error) {
      const message = `worker_unhandled_exception: ${errorMessage(error)}`;
      this.recordFailure(`learn job ${job.rb_job_id}`, () => {
        this.store.appendEvent(job.run_id, "rb_job_failed", { rb_job_id: job.rb_job_id, kind: job.kind, error: message });
        this.store.updateRbJobStatus(job.rb_job_id, "failed", message);
      });
      await this.reporter.onFailure?.(unit, error instanceof Error ? error : new Error(String(error)));
    }
  }

  /** Store errors while recording a failure are logged so the loop keeps claiming. */
  private recordFailure(label: string, write: () => void) {
    try {
      write();
    } catch (storeError) {
      logScoped("worker", `failed to record failure for ${label}`, storeError);
    }
  }

  /** Opens the memory store once; later calls reuse it. */
  private openMemory(): MemoryStore {
    this.memoryStore ??= this.factories.memory();
    return this.memoryStore;
  }

  /** Closes the memory store if the worker opened it itself. */
  close() {
    if (this.ownsMemory && this.memoryStore instanceof SqliteMemoryStore) this.memoryStore.close();
    this.memoryStore = null;
  }

  /** Runs one claimed run to a terminal status and returns that status. */
  async executeRun(run: RunRecord): Promise<string> {
    const { store } = this;
    const trace = createRunTracer(store, run.run_id);
    const batch = store.getBatch(run.batch_id);
    if (!batch) {
      trace("run_failed", { error: "Missing run/batch record in DB." });
      store.updateRunStatus(run.run_id, "failed", "Missing run/batch record in DB.");
      return "failed";
    }

    const cancellation = new RunCancellation(store, run.run_id, batch.batch_id);
    let status: "completed" | "failed" | "canceled";
    try {
      cancellation.check();
      const output = await this.produceOutput(run, batch, cancellation);
      trace("final_output", {
        recipes_json: output.recipesJson,
        citations: output.citations,
        memory_ids: output.memoryIds,
      });
      store.updateRunStatus(run.run_id, "completed");
      status = "completed";
    } catch (error) {
      if (error instanceof CancellationSignal) {
        trace("run_canceled", { reason: error.reason });
        store.updateRunStatus(run.run_id, "canceled", error.reason);
        status = "canceled";
      } else {
        const payload: JsonObject = { error: errorMessage(error), traceback: errorTrace(error) };
        if (error instanceof DependencyUnavailableError) payload.missing = error.missing;
        trace("run_failed", payload);
        store.updateRunStatus(run.run_id, "failed", errorMessage(error));
        status = "failed";
      }
    }
    store.refreshBatchStatus(batch.batch_id);
    return status;
  }

  private async produceOutput(run: RunRecord, batch: BatchRecord, cancellation: RunCancellation): Promise<RecapOutput> {
    const snapshot = batch.config_snapshot;
    const dryRun = readBoolean(snapshot, "dry_run");
    const temperature = readNumber(snapshot, "temperature") ?? 0.7;
    const trace = createRunTracer(this.store, run.run_id);
    trace("run_started", {
      mode: dryRun ? "dry_run" : "normal",
      user_request: batch.user_request,
      run_index: run.run_index,
      n_runs: batch.n_runs,
      recipes_per_run: batch.recipes_per_run,
      temperature,
    });

    if (dryRun) {
      return simulateDryRun({
        trace,
        userRequest: batch.user_request,
        recipesPerRun: batch.recipes_per_run,
        temperature,
        aliasPrefix: this.config.citations.alias_prefix,
      });
    }

    const { chat, knowledge } = this.buildCollaborators(snapshot);
    let memory: MemoryStore | null = null;
    try {
      memory = this.openMemory();
    } catch (error) {
      trace("memory_unavailable", { error: errorMessage(error) });
    }

    return runRecap(
      {
        config: this.config,
        chat,
        knowledge,
        memory,
        cancellation,
        trace,
        recipesPerRun: batch.recipes_per_run,
        temperature,
      },
      batch.user_request,
    );
  }

  private buildCollaborators(snapshot: JsonObject): { chat: ChatClient; knowledge: KnowledgeSearch } {
    const missing: string[] = [];
    const attempt = <T>(build: () => T): T | null => {
      try {
        return build();
      } catch (error) {
        if (!(error instanceof ConfigurationError)) throw error;
        missing.push(error.key ?? error.message);
        return null;
      }
    };
    const chat = attempt(() => this.factories.chat(snapshot));
    const knowledge = attempt(() => this.factories.knowledge(snapshot));
    if (!chat || !knowledge) {
      throw new DependencyUnavailableError("Missing required runtime configuration for normal runs.", missing);
    }
    return { chat, knowledge };
  }

  /** Runs one claimed learn job and returns its terminal status. */
  async executeLearnJob(job: RbJobRecord): Promise<string> {
    const { store } = this;
    const trace = createRunTracer(store, job.run_id);
    trace("rb_job_started", { rb_job_id: job.rb_job_id, kind: job.kind });

    const fail = (error: string, extra: JsonObject = {}) => {
      trace("rb_job_failed", { rb_job_id: job.rb_job_id, kind: job.kind, error, ...extra });
      store.updateRbJobStatus(job.rb_job_id, "failed", error);
      return "failed";
    };

    if (job.kind !== "learn") return fail(`Unknown rb job kind: ${job.kind}`);

    let memory: MemoryStore;
    try {
      memory = this.openMemory();
    } catch (error) {
      return fail(`Memory store unavailable: ${errorMessage(error)}`, { missing: ["memory_store"] });
    }

    let chat: ChatClient | null = null;
    if (!this.learnDryRun) {
      try {
        chat = this.factories.chat({});
      } catch (error) {
        if (!(error instanceof ConfigurationError)) throw error;
        logScoped("worker", "learn job without chat client", error);
      }
    }

    const outcome = await safeLearnForRun(
      { store, memory, config: this.config, chat, dryRun: this.learnDryRun },
      job.run_id,
      job.rb_job_id,
    );
    if (!outcome.ok) return fail(`rb_learn_failed: ${outcome.error}`);

    trace("rb_job_completed", { rb_job_id: job.rb_job_id, kind: job.kind, delta_id: outcome.deltaId });
    store.updateRbJobStatus(job.rb_job_id, "completed");
    return "completed";
  }
}

export class ConsoleWorkerReporter implements WorkerReporter {
  private readonly logFilePath: string | null;

  constructor(options: { logFilePath?: string | null } = {}) {
    this.logFilePath =
      options.logFilePath === undefined
        ? path.resolve(process.cwd(), envString("RECAP_WORKER_LOG", "worker.log"))
        : options.logFilePath;
  }

  private label(unit: WorkUnit) {
    return unit.kind === "run" ? `run:${unit.id}` : `learn_job:${unit.id} (run ${unit.runId})`;
  }

  private async emit(message: string, { toFile = true }: { toFile?: boolean } = {}) {
    console.log(message);

    if (!toFile || !this.logFilePath) return;

    const timestamp = new Date().toISOString();
    try {
      await fs.appendFile(this.logFilePath, `[${timestamp}] ${message}\n`);
    } catch (error) {
      console.warn("[worker] Failed to write worker log:", error);
    }
  }

  async onClaim(unit: WorkUnit) {
    await this.emit(`[worker] Claimed ${this.label(unit)}`);
  }

  async onComplete(unit: WorkUnit, status: string) {
    const marker = status === "completed" ? "✅" : "❌";
    await this.emit(`[worker] ${marker} ${this.label(unit)} finished: ${status}`);
  }

  async onFailure(unit: WorkUnit, error: Error) {
    const details = error.stack || error.message;
    await this.emit(`[worker] ❌ ${this.label(unit)} crashed:\n${details}`);
  }

  async onIdle() {
    await this.emit("[worker] Nothing queued, sleeping...", { toFile: false });
  }
}
