import type Database from "better-sqlite3";
import type { StorageDB } from "../storage/db.js";

export interface ToolAuditEntry {
  readonly id: number;
  readonly timestamp: number;
  readonly conversationId: string | null;
  readonly tool: string;
  readonly args: string | null;
  readonly success: boolean;
  readonly error: string | null;
  readonly durationMs: number | null;
}

export interface RecordToolAudit {
  conversationId?: string | null;
  tool: string;
  args?: unknown;
  success: boolean;
  error?: string | null;
  durationMs?: number | null;
}

interface AuditRow {
  id: number;
  timestamp: number;
  conversation_id: string | null;
  tool: string;
  args: string | null;
  success: number;
  error: string | null;
  duration_ms: number | null;
}

function toEntry(row: AuditRow): ToolAuditEntry {
  return {
    id: row.id,
    timestamp: row.timestamp,
    conversationId: row.conversation_id,
    tool: row.tool,
    args: row.args,
    success: row.success === 1,
    error: row.error,
    durationMs: row.duration_ms,
  };
}

export class ToolAuditLog {
  private readonly db: Database.Database;

  constructor(storage: StorageDB) {
    this.db = storage.raw();
  }

  record(params: RecordToolAudit): void {
    this.db
      .prepare(
        `INSERT INTO tool_audit (timestamp, conversation_id, tool, args, success, error, duration_ms)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        Date.now(),
        params.conversationId ?? null,
        params.tool,
        params.args === undefined ? null : JSON.stringify(params.args),
        params.success ? 1 : 0,
        params.error ?? null,
        params.durationMs ?? null,
      );
  }

  recent(opts?: { tool?: string; limit?: number }): ToolAuditEntry[] {
    const limit = opts?.limit ?? 50;
    const rows = opts?.tool
      ? this.db
          .prepare<[string, number], AuditRow>(
            "SELECT * FROM tool_audit WHERE tool = ? ORDER BY id DESC LIMIT ?",
          )
          .all(opts.tool, limit)
      : this.db
          .prepare<[number], AuditRow>("SELECT * FROM tool_audit ORDER BY id DESC LIMIT ?")
          .all(limit);
    return rows.map(toEntry);
  }
}
