import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { z } from "zod";
import {
  PersistenceError,
  readJsonFile,
  withFileLock,
  writeJsonFileAtomic,
} from "../../src/utils/json-file.js";

const schema = z.array(z.object({ name: z.string() }));

describe("withFileLock", () => {
  let tempDir: string;
  let filePath: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "triggerbot-lock-"));
    filePath = join(tempDir, "test.json");
    writeFileSync(filePath, "[]");
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it("executes function and returns result", async () => {
    expect(await withFileLock(filePath, () => 42)).toBe(42);
  });

  it("releases lock even on error", async () => {
    await expect(
      withFileLock(filePath, () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    expect(await withFileLock(filePath, () => "after-error")).toBe("after-error");
  });

  it("serializes concurrent access", async () => {
    const order: number[] = [];

    const p1 = withFileLock(filePath, async () => {
      await new Promise((r) => setTimeout(r, 50));
      order.push(1);
    });
    const p2 = withFileLock(filePath, async () => {
      order.push(2);
    });

    await Promise.all([p1, p2]);
    expect(order).toEqual([1, 2]);
  });
});

describe("readJsonFile", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "triggerbot-json-"));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it("returns null for a missing file", async () => {
    expect(await readJsonFile(join(tempDir, "absent.json"), schema)).toBeNull();
  });

  it("returns validated data", async () => {
    const path = join(tempDir, "ok.json");
    writeFileSync(path, '[{"name":"gm"}]');
    expect(await readJsonFile(path, schema)).toEqual([{ name: "gm" }]);
  });

  it("rejects malformed JSON with a PersistenceError", async () => {
    const path = join(tempDir, "bad.json");
    writeFileSync(path, "[{");
    const err = await readJsonFile(path, schema).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(PersistenceError);
    expect(err).toMatchObject({ message: `Invalid JSON in ${path}`, filePath: path });
  });

  it("rejects data that does not match the schema", async () => {
    const path = join(tempDir, "shape.json");
    writeFileSync(path, '{"name":"gm"}');
    await expect(readJsonFile(path, schema)).rejects.toThrow(`Unexpected data in ${path}`);
  });

  it("wraps read failures", async () => {
    const path = join(tempDir, "dir.json");
    mkdirSync(path);
    await expect(readJsonFile(path, schema)).rejects.toThrow(`Cannot read ${path}`);
  });
});

describe("writeJsonFileAtomic", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "triggerbot-write-"));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it("writes pretty JSON and leaves no temp file", async () => {
    const path = join(tempDir, "out.json");
    await writeJsonFileAtomic(path, [{ name: "gm" }]);

    expect(readFileSync(path, "utf-8")).toBe('[\n  {\n    "name": "gm"\n  }\n]\n');
    expect(existsSync(`${path}.tmp`)).toBe(false);
  });

  it("keeps the previous contents when the write fails", async () => {
    const path = join(tempDir, "out.json");
    writeFileSync(path, "[]");
    mkdirSync(`${path}.tmp`);

    await expect(writeJsonFileAtomic(path, [{ name: "gm" }])).rejects.toBeInstanceOf(
      PersistenceError,
    );
    expect(readFileSync(path, "utf-8")).toBe("[]");
  });
});
