import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { loadConfig, substituteEnv } from "../../src/config/loader.js";
import { parseConfig } from "../../src/config/schema.js";

describe("config loader", () => {
  const ENV_KEYS = ["LOG_LEVEL", "OPENAI_MODEL", "OPENAI_EMBEDDING_MODEL", "OPENAI_API_KEY"];
  const saved = new Map<string, string | undefined>();
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "cairn-config-"));
    for (const key of ENV_KEYS) {
      saved.set(key, process.env[key]);
      delete process.env[key];
    }
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    for (const [key, value] of saved) {
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
    rmSync(tempDir, { recursive: true, force: true });
  });

  it("returns defaults when the file is missing", () => {
    const config = loadConfig(join(tempDir, "absent.json"));
    expect(config.agent.maxRounds).toBe(8);
    expect(config.rag.messagesPerChannel).toBe(200);
    expect(config.rag.minMessageLength).toBe(10);
    expect(config.rag.indexIntervalMs).toBe(21_600_000);
    expect(config.memory.sessionTurns).toBe(50);
    expect(config.context.sessionFloor).toBe(0.4);
    expect(config.logging.level).toBe("info");
    expect(config.llm.apiKey).toBeUndefined();
  });

  it("loads a config file and keeps defaults for the rest", () => {
    const path = join(tempDir, "cairn.config.json");
    writeFileSync(path, JSON.stringify({ agent: { maxRounds: 3 }, logging: { level: "debug" } }));
    const config = loadConfig(path);
    expect(config.agent.maxRounds).toBe(3);
    expect(config.agent.deadlineMs).toBe(120_000);
    expect(config.logging.level).toBe("debug");
  });

  it("substitutes ${env:VAR} references", () => {
    vi.stubEnv("CAIRN_TEST_KEY", "test-secret");
    const path = join(tempDir, "cairn.config.json");
    writeFileSync(path, '{ "llm": { "apiKey": "${env:CAIRN_TEST_KEY}" } }');
    expect(loadConfig(path).llm.apiKey).toBe("test-secret");
  });

  it("throws for a missing referenced variable", () => {
    expect(() => substituteEnv("${env:CAIRN_DEFINITELY_UNSET}")).toThrow(
      "Missing environment variable: CAIRN_DEFINITELY_UNSET (referenced as ${env:CAIRN_DEFINITELY_UNSET})",
    );
  });

  it("fills the api key and models from the environment", () => {
    vi.stubEnv("OPENAI_API_KEY", "test-secret");
    vi.stubEnv("OPENAI_MODEL", "test-model");
    vi.stubEnv("LOG_LEVEL", "WARN");
    const config = loadConfig(join(tempDir, "absent.json"));
    expect(config.llm.apiKey).toBe("test-secret");
    expect(config.llm.model).toBe("test-model");
    expect(config.logging.level).toBe("warn");
  });

  it("prefers a key from the file over the environment", () => {
    vi.stubEnv("OPENAI_API_KEY", "env-key");
    const path = join(tempDir, "cairn.config.json");
    writeFileSync(path, JSON.stringify({ llm: { apiKey: "file-key" } }));
    expect(loadConfig(path).llm.apiKey).toBe("file-key");
  });

  it("keeps models and log level set in the file over the environment", () => {
    vi.stubEnv("OPENAI_MODEL", "env-model");
    vi.stubEnv("OPENAI_EMBEDDING_MODEL", "env-embedding");
    vi.stubEnv("LOG_LEVEL", "error");
    const path = join(tempDir, "cairn.config.json");
    writeFileSync(
      path,
      JSON.stringify({ llm: { model: "file-model", embeddingModel: "file-embedding" }, logging: { level: "debug" } }),
    );
    const config = loadConfig(path);
    expect(config.llm.model).toBe("file-model");
    expect(config.llm.embeddingModel).toBe("file-embedding");
    expect(config.logging.level).toBe("debug");
  });

  it("fills only the fields the file leaves unset", () => {
    vi.stubEnv("OPENAI_EMBEDDING_MODEL", "env-embedding");
    const path = join(tempDir, "cairn.config.json");
    writeFileSync(path, JSON.stringify({ llm: { model: "file-model" } }));
    const config = loadConfig(path);
    expect(config.llm.model).toBe("file-model");
    expect(config.llm.embeddingModel).toBe("env-embedding");
  });

  it("strips keys the memory section does not define", () => {
    expect(parseConfig({ memory: { recallBudget: 10 } }).memory).toEqual({
      sessionTurns: 50,
      recentTurns: 10,
      dailyLogDays: 3,
      longTermBudget: 1000,
      profileBudget: 1000,
    });
  });

  it("ignores an unknown LOG_LEVEL", () => {
    vi.stubEnv("LOG_LEVEL", "loud");
    expect(loadConfig(join(tempDir, "absent.json")).logging.level).toBe("info");
  });

  it("rejects invalid values", () => {
    expect(() => parseConfig({ context: { sessionFloor: 2 } })).toThrow();
    expect(() => parseConfig({ agent: { maxRounds: 0 } })).toThrow();
  });

  it("rejects malformed JSON", () => {
    const path = join(tempDir, "cairn.config.json");
    writeFileSync(path, "{ not json");
    expect(() => loadConfig(path)).toThrow();
  });
});
