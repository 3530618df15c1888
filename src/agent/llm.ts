import OpenAI from "openai";
import { TransientError } from "../utils/errors.js";
import type { ToolCall, ToolSchema } from "../tools/types.js";

export type ChatMessage =
  | { readonly role: "user"; readonly content: string }
  | { readonly role: "assistant"; readonly content: string; readonly toolCalls?: readonly ToolCall[] }
  | { readonly role: "tool"; readonly toolCallId: string; readonly name: string; readonly content: string };

export interface ChatRequest {
  readonly system: string;
  readonly messages: readonly ChatMessage[];
  readonly tools: readonly ToolSchema[];
}

export type ChatResponse =
  | { readonly kind: "text"; readonly text: string }
  | { readonly kind: "tool_calls"; readonly calls: ToolCall[]; readonly text: string };

/** One request, one response; the agent loop owns retries and timeouts. */
export interface LlmClient {
  chat(request: ChatRequest, signal?: AbortSignal): Promise<ChatResponse>;
}

export interface OpenAIChatOptions {
  readonly model: string;
  readonly temperature?: number;
  readonly apiKey?: string;
  readonly baseUrl?: string;
  readonly maxTokens?: number;
  readonly client?: Pick<OpenAI, "chat">;
}

function toOpenAIMessage(message: ChatMessage): OpenAI.ChatCompletionMessageParam {
  switch (message.role) {
    case "user":
      return { role: "user", content: message.content };
    case "tool":
      return { role: "tool", tool_call_id: message.toolCallId, content: message.content };
    case "assistant":
      if (!message.toolCalls || message.toolCalls.length === 0) {
        return { role: "assistant", content: message.content };
      }
      return {
        role: "assistant",
        content: message.content || null,
        tool_calls: message.toolCalls.map((call) => ({
          id: call.id,
          type: "function",
          function: { name: call.name, arguments: JSON.stringify(call.arguments ?? {}) },
        })),
      };
  }
}

export function parseToolArguments(raw: string): { arguments: unknown; parseError?: string } {
  if (!raw.trim()) return { arguments: {} };
  try {
    return { arguments: JSON.parse(raw) };
  } catch (err) {
    return { arguments: {}, parseError: err instanceof Error ? err.message : String(err) };
  }
}

export class OpenAIChatClient implements LlmClient {
  private readonly client: Pick<OpenAI, "chat">;

  constructor(private readonly opts: OpenAIChatOptions) {
    this.client =
      opts.client ??
      new OpenAI({
        apiKey: opts.apiKey,
        ...(opts.baseUrl ? { baseURL: opts.baseUrl } : {}),
        maxRetries: 0,
      });
  }

  async chat(request: ChatRequest, signal?: AbortSignal): Promise<ChatResponse> {
    const messages: OpenAI.ChatCompletionMessageParam[] = [
      { role: "system", content: request.system },
      ...request.messages.map(toOpenAIMessage),
    ];
    const tools: OpenAI.ChatCompletionTool[] = request.tools.map((tool) => ({
      type: "function",
      function: { name: tool.name, description: tool.description, parameters: tool.parameters },
    }));

    let response: OpenAI.ChatCompletion;
    try {
      response = await this.client.chat.completions.create(
        {
          model: this.opts.model,
          messages,
          ...(tools.length > 0 ? { tools } : {}),
          ...(this.opts.temperature !== undefined ? { temperature: this.opts.temperature } : {}),
          max_tokens: this.opts.maxTokens ?? 2048,
        },
        signal ? { signal } : undefined,
      );
    } catch (err) {
      if (err instanceof OpenAI.APIError && err.status !== undefined && err.status < 500 && err.status !== 429) {
        throw err;
      }
      throw new TransientError("Chat completion failed", err);
    }

    const message = response.choices[0]?.message;
    if (!message) throw new TransientError("Chat completion returned no choices");

    const calls: ToolCall[] = (message.tool_calls ?? [])
      .filter((tc) => tc.type === "function")
      .map((tc) => ({ id: tc.id, name: tc.function.name, ...parseToolArguments(tc.function.arguments) }));

    if (calls.length > 0) {
      return { kind: "tool_calls", calls, text: message.content ?? "" };
    }
    return { kind: "text", text: message.content ?? "" };
  }
}
