import type { Logger } from "../logging/logger.js";
import type { HistorySource } from "../transport/types.js";
import type { RetrievalIndex } from "./retrieval-index.js";
import type { IndexReport } from "./types.js";

interface IndexingServiceDeps {
  index: RetrievalIndex;
  source: HistorySource;
  logger: Logger;
  intervalMs: number;
  messagesPerChannel: number;
}

export interface CycleResult {
  readonly reports: IndexReport[];
  readonly failed: string[];
}

/**
 * Re-indexes channel history on its own interval, apart from query handling.
 * A channel that fails is logged and picked up again on the next cycle.
 */
export class IndexingService {
  private readonly index: RetrievalIndex;
  private readonly source: HistorySource;
  private readonly logger: Logger;
  private readonly intervalMs: number;
  private readonly messagesPerChannel: number;

  private timer: ReturnType<typeof setInterval> | null = null;
  private running: Promise<CycleResult> | null = null;

  constructor(deps: IndexingServiceDeps) {
    this.index = deps.index;
    this.source = deps.source;
    this.logger = deps.logger.child({ component: "indexing" });
    this.intervalMs = deps.intervalMs;
    this.messagesPerChannel = deps.messagesPerChannel;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.runCycle().catch((err: unknown) => {
        this.logger.error({ err }, "Indexing cycle error");
      });
    }, this.intervalMs);
    this.timer.unref();
    this.logger.info({ intervalMs: this.intervalMs }, "Indexing service started");
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.logger.info("Indexing service stopped");
  }

  /** Runs one cycle; a call while a cycle is in flight joins that cycle. */
  runCycle(): Promise<CycleResult> {
    if (!this.running) {
      this.running = this.cycle().finally(() => {
        this.running = null;
      });
    }
    return this.running;
  }

  private async cycle(): Promise<CycleResult> {
    const reports: IndexReport[] = [];
    const failed: string[] = [];
    const channels = await this.source.listChannels();

    for (const channel of channels) {
      try {
        const history = await this.source.fetchHistory(channel, this.messagesPerChannel);
        reports.push(await this.index.index(channel, history));
      } catch (err) {
        failed.push(channel);
        this.logger.warn({ err, channel }, "Channel indexing failed, will retry next cycle");
      }
    }

    this.logger.info({ channels: channels.length, failed: failed.length }, "Indexing cycle complete");
    return { reports, failed };
  }
}
