import { mkdirSync } from "node:fs";
import { resolve } from "node:path";

export function getDataDir(configured?: string): string {
  return resolve(configured ?? process.env["DATA_DIR"] ?? "data");
}

export function getConfigPath(): string {
  return process.env["TRIGGERBOT_CONFIG_PATH"] ?? "triggerbot.config.json";
}

export function ensureDir(dirPath: string): string {
  mkdirSync(dirPath, { recursive: true });
  return dirPath;
}
