import { createHash } from "node:crypto";
import { z } from "zod";
import type { AppConfig } from "../config/appConfig.js";
import type { SqliteStore } from "../db/sqliteStore.js";
import { DependencyUnavailableError, IdempotencyConflictError, ValidationError } from "../errors.js";
import { envString } from "../loadEnv.js";
import { canonicalJson, compactJson, type JsonObject } from "../util/json.js";

export const CreateBatchRequestSchema = z.object({
  user_request: z.string().default(""),
  n_runs: z.number().int().default(1),
  recipes_per_run: z.number().int().default(3),
  temperature: z.number().default(0.7),
  dry_run: z.boolean().default(false),
  overrides: z.record(z.unknown()).default({}),
});

export type CreateBatchRequest = z.infer<typeof CreateBatchRequestSchema>;

export function parseCreateBatchRequest(body: unknown, config: AppConfig): CreateBatchRequest {
  const parsed = CreateBatchRequestSchema.safeParse(body ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join(".") || "body";
    throw new ValidationError(`${field}: ${issue?.message ?? "invalid request body"}`, { field });
  }

  const request = { ...parsed.data, user_request: parsed.data.user_request.trim() };
  const { n_runs_max, recipes_per_run_max } = config.limits;
  if (!request.user_request) {
    throw new ValidationError("user_request must not be empty.", { user_request: "" });
  }
  if (request.n_runs < 1 || request.n_runs > n_runs_max) {
    throw new ValidationError(`n_runs must be in [1..${n_runs_max}].`, { n_runs: request.n_runs });
  }
  if (request.recipes_per_run < 1 || request.recipes_per_run > recipes_per_run_max) {
    throw new ValidationError(`recipes_per_run must be in [1..${recipes_per_run_max}].`, {
      recipes_per_run: request.recipes_per_run,
    });
  }
  if (!Number.isFinite(request.temperature) || request.temperature < 0 || request.temperature > 2) {
    throw new ValidationError("temperature must be in [0..2].", { temperature: request.temperature });
  }
  return request;
}

function overrideString(overrides: JsonObject, key: string, fallback: string): string {
  const value = overrides[key];
  return typeof value === "string" && value.trim() ? value.trim() : fallback;
}

/** Settings frozen into the batch so a run can be replayed later. Never holds secrets. */
export function buildConfigSnapshot(request: CreateBatchRequest, config: AppConfig): JsonObject {
  const overrides = request.overrides;
  return {
    config_path: config.source_path,
    n_runs: request.n_runs,
    recipes_per_run: request.recipes_per_run,
    temperature: request.temperature,
    dry_run: request.dry_run,
    llm_model: overrideString(overrides, "llm_model", envString(["LLM_MODEL", "OPENAI_MODEL"])),
    openai_api_base: overrideString(
      overrides,
      "openai_api_base",
      envString(["OPENAI_BASE_URL", "OPENAI_API_BASE"]),
    ),
    kb_base_url: overrideString(overrides, "kb_base_url", envString("KB_BASE_URL")),
    overrides,
  };
}

/** Environment a normal (non dry-run) batch cannot start without. */
export function missingRuntimeDependencies(snapshot: JsonObject): string[] {
  const missing: string[] = [];
  if (!envString("OPENAI_API_KEY")) missing.push("OPENAI_API_KEY");
  const kbBaseUrl = snapshot.kb_base_url;
  if (typeof kbBaseUrl !== "string" || !kbBaseUrl.trim()) missing.push("KB_BASE_URL");
  return missing;
}

export function requestHash(request: CreateBatchRequest): string {
  return createHash("sha256").update(canonicalJson(request), "utf8").digest("hex");
}

/**
 * Creates a batch and its runs in one IMMEDIATE transaction and returns the
 * response as a JSON string. With a key, the first response is stored and
 * replayed verbatim for the same body; a different body is a conflict.
 * Runtime dependencies are only checked before a new batch is inserted.
 */
export function createBatchIdempotent(
  store: SqliteStore,
  params: { key?: string | null; request: CreateBatchRequest; config: AppConfig },
): string {
  const { request, config } = params;
  const key = params.key?.trim() || null;
  const snapshot = buildConfigSnapshot(request, config);

  const hash = requestHash(request);
  return store.transaction(() => {
    if (key) {
      const existing = store.getIdempotency(key);
      if (existing) {
        if (existing.request_hash !== hash) throw new IdempotencyConflictError();
        return existing.response_json;
      }
    }

    // A stored response replays even when the runtime configuration is gone.
    if (!request.dry_run) {
      const missing = missingRuntimeDependencies(snapshot);
      if (missing.length > 0) {
        throw new DependencyUnavailableError("Missing required runtime configuration for normal runs.", missing);
      }
    }

    const batch = store.createBatch({
      user_request: request.user_request,
      n_runs: request.n_runs,
      recipes_per_run: request.recipes_per_run,
      config: snapshot,
    });
    const runs = Array.from({ length: request.n_runs }, (_, index) =>
      store.createRun(batch.batch_id, index + 1),
    );
    const responseJson = compactJson({ batch, runs });
    if (key) store.putIdempotency(key, hash, responseJson);
    return responseJson;
  });
}
