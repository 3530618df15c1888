import { z } from "zod";

const loggingSchema = z.object({
  level: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal"])
    .default("info"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

const llmSchema = z.object({
  model: z.string().min(1).default("gpt-4o-mini"),
  embeddingModel: z.string().min(1).default("text-embedding-3-small"),
  apiKey: z.string().optional(),
  baseUrl: z.string().url().optional(),
  timeoutMs: z.number().int().positive().default(60_000),
  maxAttempts: z.number().int().min(1).max(10).default(3),
  temperature: z.number().min(0).max(2).default(0.7),
});

const memorySchema = z.object({
  dir: z.string().optional(),
  sessionTurns: z.number().int().positive().default(50),
  recentTurns: z.number().int().positive().default(10),
  dailyLogDays: z.number().int().min(0).default(3),
  longTermBudget: z.number().int().min(0).default(1000),
  profileBudget: z.number().int().min(0).default(1000),
});

const contextSchema = z.object({
  budgetTokens: z.number().int().positive().default(4000),
  sessionFloor: z.number().min(0).max(1).default(0.4),
  assembleTimeoutMs: z.number().int().positive().default(5000),
  ragTopK: z.number().int().positive().default(5),
});

const ragSchema = z.object({
  enabled: z.boolean().default(true),
  messagesPerChannel: z.number().int().positive().default(200),
  minMessageLength: z.number().int().min(0).default(10),
  indexIntervalMs: z.number().int().positive().default(6 * 60 * 60 * 1000),
  embedTimeoutMs: z.number().int().positive().default(15_000),
});

const agentSchema = z.object({
  maxRounds: z.number().int().positive().default(8),
  deadlineMs: z.number().int().positive().default(120_000),
  toolTimeoutMs: z.number().int().positive().default(30_000),
  toolMaxAttempts: z.number().int().min(1).default(2),
});

const schedulerSchema = z.object({
  enabled: z.boolean().default(true),
  tickIntervalMs: z.number().int().positive().default(30_000),
  maxAttempts: z.number().int().min(1).default(3),
  timezone: z.string().optional(),
});

export const cairnConfigSchema = z.object({
  logging: loggingSchema.default({}),
  llm: llmSchema.default({}),
  memory: memorySchema.default({}),
  context: contextSchema.default({}),
  rag: ragSchema.default({}),
  agent: agentSchema.default({}),
  scheduler: schedulerSchema.default({}),
});

export function parseConfig(raw: unknown): z.infer<typeof cairnConfigSchema> {
  return cairnConfigSchema.parse(raw);
}
