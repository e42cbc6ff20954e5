import { readFile, rename, writeFile } from "node:fs/promises";
import * as lockfile from "proper-lockfile";
import type { z } from "zod";

export class PersistenceError extends Error {
  constructor(
    message: string,
    readonly filePath: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "PersistenceError";
  }
}

export async function withFileLock<T>(
  filePath: string,
  fn: () => T | Promise<T>,
): Promise<T> {
  let release: (() => Promise<void>) | undefined;
  try {
    release = await lockfile.lock(filePath, {
      retries: { retries: 3, minTimeout: 100 },
      realpath: false,
    });
    return await fn();
  } finally {
    await release?.();
  }
}

/**
 * Reads and validates a JSON file. Resolves to null when the file does not
 * exist; every other failure (I/O, bad JSON, schema mismatch) rejects with a
 * PersistenceError.
 */
export async function readJsonFile<S extends z.ZodTypeAny>(
  filePath: string,
  schema: S,
): Promise<z.output<S> | null> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return null;
    throw new PersistenceError(`Cannot read ${filePath}`, filePath, { cause: err });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new PersistenceError(`Invalid JSON in ${filePath}`, filePath, { cause: err });
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new PersistenceError(
      `Unexpected data in ${filePath}: ${result.error.issues[0]?.message ?? "invalid"}`,
      filePath,
      { cause: result.error },
    );
  }
  return result.data;
}

/** Write to a sibling temp file, then rename over the target. */
export async function writeJsonFileAtomic(
  filePath: string,
  data: unknown,
): Promise<void> {
  const tmp = `${filePath}.tmp`;
  try {
    await writeFile(tmp, JSON.stringify(data, null, 2) + "\n", "utf-8");
    await rename(tmp, filePath);
  } catch (err) {
    throw new PersistenceError(`Cannot write ${filePath}`, filePath, { cause: err });
  }
}
