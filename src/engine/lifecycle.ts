import { AgentCore } from "../agent/core.js";
import { OpenAIChatClient, type LlmClient } from "../agent/llm.js";
import { loadConfig } from "../config/loader.js";
import { ensureDir, getDatabasePath, getMemoryDir, getStateDir } from "../config/paths.js";
import type { CairnConfig } from "../config/types.js";
import { ContextAssembler } from "../context/assembler.js";
import { createLogger, type Logger } from "../logging/logger.js";
import { MemoryStore } from "../memory/store.js";
import { CachedEmbeddingProvider, OpenAIEmbeddingProvider } from "../rag/embeddings.js";
import { IndexingService } from "../rag/indexing-service.js";
import { RetrievalIndex } from "../rag/retrieval-index.js";
import type { EmbeddingProvider } from "../rag/types.js";
import { VectorStore } from "../rag/vector-store.js";
import { createTaskRunner } from "../scheduler/actions.js";
import { SchedulerService } from "../scheduler/service.js";
import { TaskStore } from "../scheduler/store.js";
import { StorageDB } from "../storage/db.js";
import { ToolAuditLog } from "../tools/audit.js";
import { historyTools } from "../tools/builtin/history-tools.js";
import { memoryTools } from "../tools/builtin/memory-tools.js";
import { schedulerTools } from "../tools/builtin/scheduler-tools.js";
import { ToolExecutor } from "../tools/executor.js";
import { ToolRegistry } from "../tools/registry.js";
import type { HistorySource, OutboundSink } from "../transport/types.js";
import { CairnError } from "../utils/errors.js";

export interface EngineOptions {
  config?: CairnConfig;
  configPath?: string;
  stateDir?: string;
  /** `:memory:` keeps the database out of the state directory. */
  databasePath?: string;
  logger?: Logger;
  llm?: LlmClient;
  embedder?: EmbeddingProvider;
  sink: OutboundSink;
  history?: HistorySource;
}

export interface EngineContext {
  config: CairnConfig;
  logger: Logger;
  storage: StorageDB;
  memory: MemoryStore;
  retrieval: RetrievalIndex | undefined;
  registry: ToolRegistry;
  executor: ToolExecutor;
  assembler: ContextAssembler;
  agent: AgentCore;
  tasks: TaskStore;
  scheduler: SchedulerService;
  indexing: IndexingService | undefined;
  /** Starts the background loops enabled in config. */
  start(): void;
  stop(): Promise<void>;
}

function requireApiKey(config: CairnConfig): string {
  if (!config.llm.apiKey) {
    throw new CairnError("CONFIG", "No API key: set OPENAI_API_KEY or llm.apiKey in the config file");
  }
  return config.llm.apiKey;
}

export async function createEngine(opts: EngineOptions): Promise<EngineContext> {
  // 1. Config and logging
  const config = opts.config ?? loadConfig(opts.configPath);
  const logger = opts.logger ?? createLogger(config.logging);

  // 2. State directory and database
  const stateDir = ensureDir(opts.stateDir ?? getStateDir());
  const storage = new StorageDB(opts.databasePath ?? getDatabasePath(stateDir));

  // 3. Memory
  const memory = new MemoryStore({
    dir: ensureDir(config.memory.dir ?? getMemoryDir(stateDir)),
    sessionTurns: config.memory.sessionTurns,
    recentTurns: config.memory.recentTurns,
    dailyLogDays: config.memory.dailyLogDays,
    longTermBudget: config.memory.longTermBudget,
    profileBudget: config.memory.profileBudget,
    logger,
  });
  await memory.profile.ensureDefaults();

  // 4. Retrieval
  let retrieval: RetrievalIndex | undefined;
  if (config.rag.enabled) {
    const embedder =
      opts.embedder ??
      new OpenAIEmbeddingProvider({
        model: config.llm.embeddingModel,
        apiKey: requireApiKey(config),
        ...(config.llm.baseUrl ? { baseUrl: config.llm.baseUrl } : {}),
      });
    retrieval = new RetrievalIndex(
      new VectorStore(storage, config.rag.messagesPerChannel),
      new CachedEmbeddingProvider(embedder, storage, logger),
      {
        messagesPerChannel: config.rag.messagesPerChannel,
        minMessageLength: config.rag.minMessageLength,
        embedTimeoutMs: config.rag.embedTimeoutMs,
        embedMaxAttempts: config.llm.maxAttempts,
      },
      logger,
    );
  }

  // 5. Tools
  const tasks = new TaskStore(storage);
  const registry = new ToolRegistry();
  registry.registerAll(memoryTools(memory));
  registry.registerAll(
    schedulerTools(tasks, config.scheduler.timezone ? { timezone: config.scheduler.timezone } : {}),
  );
  if (retrieval) registry.registerAll(historyTools(retrieval, config.context.ragTopK));

  const executor = new ToolExecutor({
    registry,
    logger,
    timeoutMs: config.agent.toolTimeoutMs,
    maxAttempts: config.agent.toolMaxAttempts,
    audit: new ToolAuditLog(storage),
  });

  // 6. Reasoning
  const llm =
    opts.llm ??
    new OpenAIChatClient({
      model: config.llm.model,
      temperature: config.llm.temperature,
      apiKey: requireApiKey(config),
      ...(config.llm.baseUrl ? { baseUrl: config.llm.baseUrl } : {}),
    });

  const assembler = new ContextAssembler({
    memory,
    ...(retrieval ? { retrieval } : {}),
    logger,
    options: {
      budgetTokens: config.context.budgetTokens,
      sessionFloor: config.context.sessionFloor,
      timeoutMs: config.context.assembleTimeoutMs,
      ragTopK: config.context.ragTopK,
    },
  });

  const agent = new AgentCore({
    assembler,
    memory,
    registry,
    executor,
    llm,
    logger,
    options: {
      maxRounds: config.agent.maxRounds,
      deadlineMs: config.agent.deadlineMs,
      llmTimeoutMs: config.llm.timeoutMs,
      llmMaxAttempts: config.llm.maxAttempts,
    },
  });

  // 7. Background loops
  const scheduler = new SchedulerService({
    store: tasks,
    runner: createTaskRunner({ sink: opts.sink, executor, logger, agent }),
    logger,
    tickIntervalMs: config.scheduler.tickIntervalMs,
    maxAttempts: config.scheduler.maxAttempts,
  });

  const indexing =
    retrieval && opts.history
      ? new IndexingService({
          index: retrieval,
          source: opts.history,
          logger,
          intervalMs: config.rag.indexIntervalMs,
          messagesPerChannel: config.rag.messagesPerChannel,
        })
      : undefined;

  logger.info(
    { stateDir, tools: registry.list().length, rag: retrieval !== undefined },
    "Engine ready",
  );

  return {
    config,
    logger,
    storage,
    memory,
    retrieval,
    registry,
    executor,
    assembler,
    agent,
    tasks,
    scheduler,
    indexing,
    start() {
      if (config.scheduler.enabled) scheduler.start();
      indexing?.start();
    },
    async stop() {
      scheduler.stop();
      indexing?.stop();
      await scheduler.drain();
      storage.close();
      logger.info("Engine stopped");
    },
  };
}
