import { z } from "zod";
import type { KbMode, KbName } from "../config/appConfig.js";
import { ConfigurationError } from "../errors.js";
import { logVerbose } from "../jobLogger.js";
import { envString } from "../loadEnv.js";

export interface KnowledgeChunk {
  /** Canonical, content-addressed reference: `kb:<namespace>__<chunk_id>`. */
  ref: string;
  content: string;
  source: string;
  kb_namespace: string;
  chunk_id: string | null;
}

export interface KnowledgeSearchOptions {
  mode: KbMode;
  topK: number;
}

export interface KnowledgeSearch {
  search(namespace: KbName, query: string, options: KnowledgeSearchOptions): Promise<KnowledgeChunk[]>;
}

export function makeKbRef(namespace: string, chunkId: string): string {
  return `kb:${namespace.trim()}__${chunkId.trim()}`;
}

const QueryDataResponseSchema = z.object({
  data: z
    .object({
      chunks: z
        .array(
          z.object({
            content: z.string().nullish(),
            file_path: z.string().nullish(),
            chunk_id: z.string().nullish(),
          }),
        )
        .default([]),
    })
    .default({ chunks: [] }),
});

export interface HttpKnowledgeSearchOptions {
  baseUrl?: string;
  apiKey?: string;
  namespacePrefix?: string;
}

/**
 * Client for a retrieval server exposing `POST /query/data`. Each knowledge
 * base is addressed as a workspace through the `LIGHTRAG-WORKSPACE` header.
 */
export class HttpKnowledgeSearch implements KnowledgeSearch {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly namespacePrefix: string;

  constructor(options: HttpKnowledgeSearchOptions = {}) {
    const baseUrl = options.baseUrl ?? envString("KB_BASE_URL");
    if (!baseUrl) {
      throw new ConfigurationError("Missing KB_BASE_URL.", { key: "KB_BASE_URL" });
    }
    this.baseUrl = baseUrl.replace(/\/+$/, "");
    this.apiKey = options.apiKey ?? envString("KB_API_KEY");
    this.namespacePrefix = options.namespacePrefix ?? envString("KB_NAMESPACE_PREFIX");
  }

  async search(namespace: KbName, query: string, options: KnowledgeSearchOptions): Promise<KnowledgeChunk[]> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      "LIGHTRAG-WORKSPACE": `${this.namespacePrefix}${namespace}`,
    };
    if (this.apiKey) headers.Authorization = `Bearer ${this.apiKey}`;

    logVerbose("kb", `query ${namespace} mode=${options.mode} top_k=${options.topK}`);
    const response = await fetch(`${this.baseUrl}/query/data`, {
      method: "POST",
      headers,
      body: JSON.stringify({
        query,
        mode: options.mode,
        top_k: options.topK,
        chunk_top_k: options.topK,
      }),
    });
    if (!response.ok) {
      throw new Error(`Knowledge service responded with status ${response.status} for ${namespace}`);
    }

    const parsed = QueryDataResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Knowledge service returned an unexpected payload: ${parsed.error.message}`);
    }

    const chunks: KnowledgeChunk[] = [];
    for (const chunk of parsed.data.data.chunks) {
      const content = (chunk.content ?? "").trim();
      const chunkId = (chunk.chunk_id ?? "").trim();
      // A chunk without an id cannot be cited.
      if (!content || !chunkId) continue;
      chunks.push({
        ref: makeKbRef(namespace, chunkId),
        content,
        source: (chunk.file_path ?? "").trim() || "unknown_source",
        kb_namespace: namespace,
        chunk_id: chunkId,
      });
    }
    return chunks;
  }
}
