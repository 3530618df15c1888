import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { z } from "zod";
import type { CairnConfig } from "./types.js";
import { getConfigPath } from "./paths.js";
import { parseConfig } from "./schema.js";

const ENV_PATTERN = /\$\{env:([A-Z_][A-Z0-9_]*)\}/g;

export function substituteEnv(raw: string): string {
  return raw.replace(ENV_PATTERN, (match, varName: string) => {
    const value = process.env[varName];
    if (value === undefined) {
      throw new Error(`Missing environment variable: ${varName} (referenced as ${match})`);
    }
    return value;
  });
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

// Fields the file itself sets; schema defaults must not hide them.
const explicitSchema = z.object({
  logging: z.object({ level: z.unknown() }).partial().optional(),
  llm: z.object({ apiKey: z.unknown(), model: z.unknown(), embeddingModel: z.unknown() }).partial().optional(),
});

// Plain environment variables fill whatever the file leaves unset.
export function applyEnvDefaults(config: CairnConfig, raw: unknown = {}): CairnConfig {
  const env = process.env;
  const parsed = explicitSchema.safeParse(raw);
  const set: z.infer<typeof explicitSchema> = parsed.success ? parsed.data : {};
  const fromFile = (value: unknown): boolean => value !== undefined;

  return {
    ...config,
    logging: {
      ...config.logging,
      level: fromFile(set.logging?.level)
        ? config.logging.level
        : (parseLevel(env["LOG_LEVEL"]) ?? config.logging.level),
    },
    llm: {
      ...config.llm,
      apiKey: fromFile(set.llm?.apiKey) ? config.llm.apiKey : (env["OPENAI_API_KEY"] ?? config.llm.apiKey),
      model: fromFile(set.llm?.model) ? config.llm.model : (env["OPENAI_MODEL"] ?? config.llm.model),
      embeddingModel: fromFile(set.llm?.embeddingModel)
        ? config.llm.embeddingModel
        : (env["OPENAI_EMBEDDING_MODEL"] ?? config.llm.embeddingModel),
    },
  };
}

export function resolveConfig(raw: unknown): CairnConfig {
  return applyEnvDefaults(parseConfig(raw), raw);
}

const LEVELS = ["trace", "debug", "info", "warn", "error", "fatal"] as const;
type Level = (typeof LEVELS)[number];

function parseLevel(raw: string | undefined): Level | undefined {
  const value = raw?.toLowerCase();
  return LEVELS.find((level) => level === value);
}

export function loadConfig(path?: string): CairnConfig {
  const configPath = resolve(path ?? getConfigPath());

  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) {
      return resolveConfig({});
    }
    throw err;
  }

  const substituted = substituteEnv(content);
  const raw: unknown = JSON.parse(substituted);
  return resolveConfig(raw);
}
