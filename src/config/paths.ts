import { mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

export function getStateDir(): string {
  return process.env["CAIRN_STATE_DIR"] ?? join(homedir(), ".cairn");
}

export function getConfigPath(): string {
  return process.env["CAIRN_CONFIG_PATH"] ?? "cairn.config.json";
}

export function getDatabasePath(stateDir = getStateDir()): string {
  return join(stateDir, "cairn.db");
}

export function getMemoryDir(stateDir = getStateDir()): string {
  return join(stateDir, "memory");
}

export function ensureDir(dirPath: string): string {
  mkdirSync(dirPath, { recursive: true });
  return dirPath;
}
