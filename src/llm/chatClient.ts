import OpenAI from "openai";
import type {
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from "openai/resources/chat/completions";
import { ConfigurationError } from "../errors.js";
import { logVerbose } from "../jobLogger.js";
import { envFlag, envString } from "../loadEnv.js";
import { isRecord, parseJsonObject, type JsonObject } from "../util/json.js";

export interface ToolCall {
  id: string;
  type: "function";
  function: { name: string; arguments: string };
}

export type ChatMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string }
  | { role: "assistant"; content: string; tool_calls?: ToolCall[] }
  | { role: "tool"; content: string; tool_call_id: string };

export interface ToolDefinition {
  type: "function";
  function: { name: string; description: string; parameters: JsonObject };
}

export interface JsonSchemaFormat {
  type: "json_schema";
  json_schema: { name: string; strict: boolean; schema: JsonObject };
}

export interface ChatOptions {
  temperature: number;
  responseFormat?: JsonSchemaFormat;
  tools?: ToolDefinition[];
}

export interface ChatResult {
  content: string;
  toolCalls: ToolCall[];
  reasoningContent: string | null;
  raw: JsonObject;
}

/**
 * Chat-completion collaborator. Implementations must support schema-constrained
 * output and function calling.
 */
export interface ChatClient {
  readonly model: string;
  /** When set, callers drop `responseFormat` and rely on prompt instructions. */
  readonly enableThinking: boolean;
  chat(messages: ChatMessage[], options: ChatOptions): Promise<ChatResult>;
}

export interface OpenAiChatClientOptions {
  apiKey?: string;
  baseUrl?: string;
  model?: string;
  enableThinking?: boolean;
  timeoutMs?: number;
}

function toMessageParam(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "user":
      return { role: "user", content: message.content };
    case "assistant":
      return message.tool_calls?.length
        ? { role: "assistant", content: message.content, tool_calls: message.tool_calls }
        : { role: "assistant", content: message.content };
    case "tool":
      return { role: "tool", content: message.content, tool_call_id: message.tool_call_id };
  }
}

function toToolParam(tool: ToolDefinition): ChatCompletionTool {
  return {
    type: "function",
    function: {
      name: tool.function.name,
      description: tool.function.description,
      parameters: tool.function.parameters,
    },
  };
}

export class OpenAiChatClient implements ChatClient {
  readonly model: string;
  readonly enableThinking: boolean;
  private readonly client: OpenAI;

  constructor(options: OpenAiChatClientOptions = {}) {
    const apiKey = options.apiKey ?? envString("OPENAI_API_KEY");
    if (!apiKey) {
      throw new ConfigurationError("Missing OPENAI_API_KEY.", { key: "OPENAI_API_KEY" });
    }
    this.model = options.model || envString(["LLM_MODEL", "OPENAI_MODEL"], "gpt-4o-mini");
    this.enableThinking = options.enableThinking ?? envFlag("LLM_ENABLE_THINKING", false);
    this.client = new OpenAI({
      apiKey,
      baseURL: options.baseUrl || envString(["OPENAI_BASE_URL", "OPENAI_API_BASE"]) || undefined,
      timeout: options.timeoutMs,
    });
  }

  async chat(messages: ChatMessage[], options: ChatOptions): Promise<ChatResult> {
    const params: ChatCompletionCreateParamsNonStreaming & { enable_thinking?: boolean } = {
      model: this.model,
      messages: messages.map(toMessageParam),
      temperature: options.temperature,
    };
    if (options.responseFormat && !this.enableThinking) {
      params.response_format = options.responseFormat;
    }
    if (options.tools?.length) {
      params.tools = options.tools.map(toToolParam);
      params.tool_choice = "auto";
    }
    if (this.enableThinking) params.enable_thinking = true;

    logVerbose("llm", `chat model=${this.model} messages=${messages.length}`);
    const completion = await this.client.chat.completions.create(params);
    const message = completion.choices[0]?.message;
    const extraReasoning = isRecord(message) ? message.reasoning_content : undefined;

    return {
      content: (message?.content ?? "").trim(),
      toolCalls: (message?.tool_calls ?? []).map((call) => ({
        id: call.id,
        type: "function",
        function: { name: call.function.name, arguments: call.function.arguments },
      })),
      reasoningContent:
        typeof extraReasoning === "string" && extraReasoning.trim() ? extraReasoning.trim() : null,
      raw: parseJsonObject(JSON.stringify(completion)),
    };
  }
}
