import { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import type { FieldIssue } from "../utils/errors.js";
import type { ToolDefinition, ToolParameters, ToolSchema } from "./types.js";

const TOOL_NAME = /^[a-z][a-z0-9_]{0,63}$/;

export type ArgumentCheck =
  | { readonly ok: true; readonly args: Record<string, unknown> }
  | { readonly ok: false; readonly issues: FieldIssue[] };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function toJsonSchema(parameters: ToolParameters): Record<string, unknown> {
  const converted: unknown = JSON.parse(
    JSON.stringify(zodToJsonSchema(parameters, { target: "openAi", $refStrategy: "none" })),
  );
  if (!isRecord(converted)) return { type: "object", properties: {} };
  const { $schema: _ignored, ...schema } = converted;
  return schema;
}

/**
 * Catalog of invocable tools keyed by name. Definitions are checked when
 * registered and never change afterwards.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, ToolDefinition>();
  private readonly schemas = new Map<string, ToolSchema>();

  register<S extends ToolParameters>(tool: ToolDefinition<S>): void {
    if (!TOOL_NAME.test(tool.name)) {
      throw new Error(`Invalid tool name "${tool.name}": use lowercase letters, digits and underscores`);
    }
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool already registered: ${tool.name}`);
    }
    if (!tool.description.trim()) {
      throw new Error(`Tool ${tool.name} needs a description`);
    }
    if (!(tool.parameters instanceof z.ZodObject)) {
      throw new Error(`Tool ${tool.name} must declare its parameters as an object schema`);
    }

    const frozen: ToolDefinition = Object.freeze({ ...tool });
    this.tools.set(tool.name, frozen);
    this.schemas.set(
      tool.name,
      Object.freeze({
        name: tool.name,
        description: tool.description,
        parameters: toJsonSchema(tool.parameters),
      }),
    );
  }

  registerAll(tools: readonly ToolDefinition[]): void {
    for (const tool of tools) this.register(tool);
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  list(): ToolDefinition[] {
    return [...this.tools.values()];
  }

  toolSchemas(): ToolSchema[] {
    return [...this.schemas.values()];
  }

  /** Checks `args` against the tool's schema; unknown tools are a caller error. */
  validate(tool: ToolDefinition, args: unknown): ArgumentCheck {
    const parsed = tool.parameters.safeParse(args ?? {});
    if (parsed.success) return { ok: true, args: parsed.data };
    return {
      ok: false,
      issues: parsed.error.issues.map((issue) => ({
        field: issue.path.length > 0 ? issue.path.join(".") : "arguments",
        message: issue.message,
      })),
    };
  }
}
