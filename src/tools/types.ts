import type { z } from "zod";
import type { Logger } from "../logging/logger.js";
import type { ConversationKind } from "../memory/types.js";

export type ToolResult =
  | { readonly success: true; readonly data: unknown }
  | { readonly success: false; readonly error: string };

export function ok(data: unknown): ToolResult {
  return { success: true, data };
}

export function fail(error: string): ToolResult {
  return { success: false, error };
}

export interface ToolContext {
  readonly conversationId: string;
  readonly channelId: string;
  readonly participantId: string;
  readonly conversationKind: ConversationKind;
  readonly logger: Logger;
  readonly signal?: AbortSignal;
}

export type ToolParameters = z.AnyZodObject;

export interface ToolDefinition<S extends ToolParameters = ToolParameters> {
  readonly name: string;
  readonly description: string;
  readonly parameters: S;
  /** Overrides the executor's default timeout. */
  readonly timeoutMs?: number;
  /**
   * Safe to run again after a timeout. Tools that write stay false: a
   * timed-out write may still land.
   */
  readonly idempotent?: boolean;
  /** `ctx.signal` aborts when this try times out or the request ends. */
  execute(args: z.infer<S>, ctx: ToolContext): Promise<ToolResult>;
}

/** Function-calling schema handed to the model. */
export interface ToolSchema {
  readonly name: string;
  readonly description: string;
  readonly parameters: Record<string, unknown>;
}

export interface ToolCall {
  /** Model-assigned id, echoed back with the result. */
  readonly id: string;
  readonly name: string;
  readonly arguments: unknown;
  /** Set when the model's argument text could not be parsed. */
  readonly parseError?: string;
}

export interface ToolOutcome {
  readonly call: ToolCall;
  readonly result: ToolResult;
  readonly durationMs: number;
  /** Executor attempts; 0 when the call never reached the executor. */
  readonly attempts: number;
}

export function defineTool<S extends ToolParameters>(def: ToolDefinition<S>): ToolDefinition<S> {
  return def;
}

export function renderResult(result: ToolResult): string {
  if (!result.success) return `Error: ${result.error}`;
  return typeof result.data === "string" ? result.data : JSON.stringify(result.data);
}
