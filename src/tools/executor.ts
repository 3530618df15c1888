import type { Logger } from "../logging/logger.js";
import { errorMessage, isRetryable, TimeoutError, ToolValidationError } from "../utils/errors.js";
import { retry } from "../utils/retry.js";
import { withTimeout } from "../utils/timeout.js";
import type { ToolAuditLog } from "./audit.js";
import type { ToolRegistry } from "./registry.js";
import {
  fail,
  type ToolCall,
  type ToolContext,
  type ToolDefinition,
  type ToolOutcome,
  type ToolResult,
} from "./types.js";

interface ToolExecutorDeps {
  registry: ToolRegistry;
  logger: Logger;
  timeoutMs: number;
  maxAttempts: number;
  audit?: ToolAuditLog;
  retryBaseDelayMs?: number;
}

/**
 * Validates and runs tool calls. Every call ends in a ToolResult: unknown
 * tools, bad arguments, thrown errors and timeouts all become failures.
 */
export class ToolExecutor {
  private readonly registry: ToolRegistry;
  private readonly logger: Logger;
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly audit: ToolAuditLog | undefined;
  private readonly retryBaseDelayMs: number;

  constructor(deps: ToolExecutorDeps) {
    this.registry = deps.registry;
    this.logger = deps.logger.child({ component: "tool-executor" });
    this.timeoutMs = deps.timeoutMs;
    this.maxAttempts = deps.maxAttempts;
    this.audit = deps.audit;
    this.retryBaseDelayMs = deps.retryBaseDelayMs ?? 200;
  }

  /**
   * Runs the calls of one round concurrently. Outcomes come back in the
   * order the calls finished.
   */
  async executeRound(calls: readonly ToolCall[], ctx: ToolContext): Promise<ToolOutcome[]> {
    const completed: ToolOutcome[] = [];
    await Promise.all(
      calls.map(async (call) => {
        completed.push(await this.execute(call, ctx));
      }),
    );
    return completed;
  }

  async execute(call: ToolCall, ctx: ToolContext): Promise<ToolOutcome> {
    const started = Date.now();
    const finish = (result: ToolResult, attempts: number): ToolOutcome => {
      const outcome: ToolOutcome = { call, result, durationMs: Date.now() - started, attempts };
      this.recordAudit(outcome, ctx);
      return outcome;
    };

    const tool = this.registry.get(call.name);
    if (!tool) {
      return finish(fail(`Unknown tool: ${call.name}`), 0);
    }

    if (call.parseError !== undefined) {
      return finish(fail(`Arguments for ${call.name} were not valid JSON: ${call.parseError}`), 0);
    }

    const check = this.registry.validate(tool, call.arguments);
    if (!check.ok) {
      const err = new ToolValidationError(call.name, check.issues);
      this.logger.info({ tool: call.name, issues: check.issues }, "Tool call rejected");
      return finish(fail(err.message), 0);
    }

    let attempts = 0;
    try {
      const result = await retry(
        () => {
          attempts++;
          return this.attempt(tool, check.args, ctx);
        },
        {
          maxAttempts: this.maxAttempts,
          baseDelayMs: this.retryBaseDelayMs,
          // A timed-out call may still land; only idempotent tools run again.
          shouldRetry: (err) => isRetryable(err) && (tool.idempotent === true || !(err instanceof TimeoutError)),
          ...(ctx.signal ? { signal: ctx.signal } : {}),
        },
      );
      this.logger.debug({ tool: call.name, success: result.success, attempts }, "Tool executed");
      return finish(result, attempts);
    } catch (err) {
      this.logger.warn({ err, tool: call.name, attempts }, "Tool execution failed");
      return finish(fail(errorMessage(err)), attempts);
    }
  }

  /** One try with its own signal, aborted when the try times out or fails. */
  private async attempt(tool: ToolDefinition, args: Record<string, unknown>, ctx: ToolContext): Promise<ToolResult> {
    const controller = new AbortController();
    const forward = (): void => controller.abort(ctx.signal?.reason);
    if (ctx.signal?.aborted) forward();
    else ctx.signal?.addEventListener("abort", forward, { once: true });

    try {
      return await withTimeout(
        tool.execute(args, { ...ctx, signal: controller.signal }),
        tool.timeoutMs ?? this.timeoutMs,
        `tool ${tool.name}`,
        ctx.signal,
      );
    } catch (err) {
      controller.abort(err);
      throw err;
    } finally {
      ctx.signal?.removeEventListener("abort", forward);
    }
  }

  private recordAudit(outcome: ToolOutcome, ctx: ToolContext): void {
    if (!this.audit) return;
    try {
      this.audit.record({
        conversationId: ctx.conversationId,
        tool: outcome.call.name,
        args: outcome.call.arguments,
        success: outcome.result.success,
        error: outcome.result.success ? null : outcome.result.error,
        durationMs: outcome.durationMs,
      });
    } catch (err) {
      this.logger.warn({ err, tool: outcome.call.name }, "Tool audit write failed");
    }
  }
}
