import type { z } from "zod";
import type { cairnConfigSchema } from "./schema.js";

export type CairnConfig = z.infer<typeof cairnConfigSchema>;
export type LoggingConfig = CairnConfig["logging"];
export type LlmConfig = CairnConfig["llm"];
export type MemoryConfig = CairnConfig["memory"];
export type ContextConfig = CairnConfig["context"];
export type RagConfig = CairnConfig["rag"];
export type AgentConfig = CairnConfig["agent"];
export type SchedulerConfig = CairnConfig["scheduler"];
