import type { KbName } from "../config/appConfig.js";
import type { AliasedChunk } from "../evidence/evidenceRegistry.js";
import type { TraceFn } from "../recap/primitives.js";
import type { RecapOutput } from "../recap/runSession.js";
import type { JsonObject } from "../util/json.js";

interface ChunkTemplate {
  kbNamespace: KbName;
  title: string;
  content: string;
}

const CHUNK_TEMPLATES: ChunkTemplate[] = [
  {
    kbNamespace: "kb_principles",
    title: "Synthetic principle chunk",
    content:
      "DRY RUN: synthetic evidence chunk.\nPurpose: validate evidence listing and citation linking.\n\nClaim stub: this chunk is not real literature.",
  },
  {
    kbNamespace: "kb_modulation",
    title: "Synthetic modulation chunk",
    content:
      "DRY RUN: synthetic evidence chunk.\nPurpose: validate evidence listing and citation linking.\n\nClaim stub: this chunk is not real literature.",
  },
  {
    kbNamespace: "kb_principles",
    title: "Synthetic extra chunk",
    content: "DRY RUN: synthetic evidence chunk.\nPurpose: validate multi-citation behavior.\n\nNote: content intentionally short.",
  },
];

const METAL_PAIRS: Array<[string, string]> = [
  ["Cu", "Mo"],
  ["Ni", "Fe"],
  ["Ag", "Cu"],
];
const RATIOS = ["1:1", "2:1", "1:2"];

const DRY_RUN_TASK = "dry_run_simulation";
const DRY_RUN_QUERY = "DRY RUN synthetic query";

export function syntheticChunks(aliasPrefix: string, count: number): AliasedChunk[] {
  const n = Math.max(1, Math.trunc(count));
  const chunks: AliasedChunk[] = [];
  for (let i = 0; i < n; i += 1) {
    const template = CHUNK_TEMPLATES[i % CHUNK_TEMPLATES.length] ?? CHUNK_TEMPLATES[0];
    if (!template) break;
    const index = i + 1;
    chunks.push({
      alias: `${aliasPrefix}${index}`,
      ref: `kb:dry_run/${template.kbNamespace}/synthetic_${index}`,
      source: `DRY_RUN::${template.title}::${index}`,
      content: template.content,
      kb_namespace: template.kbNamespace,
      chunk_id: `dry_run_chunk_${index}`,
    });
  }
  return chunks;
}

/**
 * Placeholder recipes. A single recipe cites every alias; otherwise recipe
 * `i` cites alias `i mod count`, so each alias is cited when there are at
 * least as many recipes as chunks.
 */
export function placeholderOutput(recipesPerRun: number, evidence: readonly AliasedChunk[]): RecapOutput {
  const n = Math.max(1, Math.trunc(recipesPerRun));
  const aliases = evidence.map((chunk) => chunk.alias);
  const recipes: JsonObject[] = [];
  for (let i = 0; i < n; i += 1) {
    const [m1, m2] = METAL_PAIRS[i % METAL_PAIRS.length] ?? ["Cu", "Mo"];
    const cite = n === 1 ? aliases.map((alias) => `[${alias}]`).join(" ") : `[${aliases[i % aliases.length] ?? ""}]`;
    recipes.push({
      M1: m1,
      M2: m2,
      atomic_ratio: RATIOS[i % RATIOS.length] ?? "1:1",
      small_molecule_modifier: "benzoic acid (-COOH)",
      rationale: `DRY RUN PLACEHOLDER: synthetic output for pipeline testing. No KB or LLM calls were made. ${cite}`,
    });
  }
  return {
    recipesJson: {
      recipes,
      overall_notes: "DRY RUN PLACEHOLDER: synthetic run for testing only.",
    },
    citations: Object.fromEntries(evidence.map((chunk) => [chunk.alias, chunk.ref])),
    memoryIds: [],
  };
}

/**
 * Writes a representative trace without calling any collaborator and returns
 * the placeholder output. The caller records `final_output`.
 */
export function simulateDryRun(params: {
  trace: TraceFn;
  userRequest: string;
  recipesPerRun: number;
  temperature: number;
  aliasPrefix: string;
}): RecapOutput {
  const chunks = syntheticChunks(params.aliasPrefix, Math.max(2, params.recipesPerRun));
  const { trace } = params;

  trace("recap_info", {
    agent: "orchestrator",
    recap_state: "dry_run",
    task_name: DRY_RUN_TASK,
    think: "DRY RUN: synthetic trace (no LLM or KB calls).",
    subtasks: [
      { type: "kb_search", kb_name: "kb_principles", query: DRY_RUN_QUERY, top_k: chunks.length, mode: "mix" },
      { type: "generate_recipes" },
    ],
    result: "",
    depth: 0,
    steps: 1,
  });
  trace("llm_request", {
    agent: "orchestrator",
    recap_state: "dry_run",
    task_name: DRY_RUN_TASK,
    model: "dry_run",
    temperature: params.temperature,
    attempt: 1,
    steps: 1,
    messages: [
      { role: "system", content: "DRY RUN: synthetic request." },
      { role: "user", content: params.userRequest.trim().slice(0, 240) },
    ],
  });
  trace("llm_response", {
    agent: "orchestrator",
    recap_state: "dry_run",
    task_name: DRY_RUN_TASK,
    attempt: 1,
    steps: 1,
    content: "DRY RUN: synthetic response.",
    raw: { note: "synthetic" },
  });

  const byNamespace = new Map<string, AliasedChunk[]>();
  for (const chunk of chunks) {
    const group = byNamespace.get(chunk.kb_namespace) ?? [];
    group.push(chunk);
    byNamespace.set(chunk.kb_namespace, group);
  }
  for (const [namespace, group] of byNamespace) {
    trace("kb_query", {
      agent: "orchestrator",
      kb_namespace: namespace,
      query: DRY_RUN_QUERY,
      mode: "mix",
      top_k: group.length,
      results: group.map((chunk) => ({ ...chunk })),
    });
  }

  return placeholderOutput(params.recipesPerRun, chunks);
}
