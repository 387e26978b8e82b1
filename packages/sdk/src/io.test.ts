import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, readdir, mkdir, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { atomicWrite, readTextFile, removeFile, ensureDirectory, listFiles, errnoCode } from "./io.js";
import { StorageFailureError } from "./errors.js";

describe("io operations", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "seqindex-io-"));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe("atomicWrite and readTextFile", () => {
    it("should write and read file successfully", async () => {
      const filePath = join(testDir, "test.json");

      await atomicWrite(filePath, '{"id": 1}');

      expect(await readTextFile(filePath)).toBe('{"id": 1}');
    });

    it("should not leave temp files after successful write", async () => {
      await atomicWrite(join(testDir, "a.json"), "{}");

      expect(await readdir(testDir)).toEqual(["a.json"]);
    });

    it("should overwrite existing file", async () => {
      const filePath = join(testDir, "a.json");
      await atomicWrite(filePath, "first");
      await atomicWrite(filePath, "second");

      expect(await readTextFile(filePath)).toBe("second");
    });

    it("should create parent directories automatically", async () => {
      const filePath = join(testDir, "sequences", "nested", "1.json");
      await atomicWrite(filePath, "{}");

      expect(await readTextFile(filePath)).toBe("{}");
    });

    it("should return null for a missing file", async () => {
      expect(await readTextFile(join(testDir, "missing.json"))).toBeNull();
    });

    it("should throw StorageFailureError when reading a directory", async () => {
      await expect(readTextFile(testDir)).rejects.toMatchObject({ code: "STORAGE_FAILURE", operation: "read" });
    });

    it("should throw StorageFailureError when the target is a directory", async () => {
      const target = join(testDir, "taken");
      await mkdir(target);

      await expect(atomicWrite(target, "{}")).rejects.toThrow(StorageFailureError);
      expect((await readdir(testDir)).filter((name) => name.endsWith(".tmp"))).toEqual([]);
    });
  });

  describe("removeFile", () => {
    it("should remove an existing file", async () => {
      const filePath = join(testDir, "a.json");
      await writeFile(filePath, "{}");

      expect(await removeFile(filePath)).toBe(true);
      expect(await readTextFile(filePath)).toBeNull();
    });

    it("should be idempotent", async () => {
      expect(await removeFile(join(testDir, "missing.json"))).toBe(false);
    });

    it("should throw StorageFailureError when removing a directory", async () => {
      await expect(removeFile(testDir)).rejects.toMatchObject({ operation: "remove" });
    });
  });

  describe("ensureDirectory", () => {
    it("should create nested directories", async () => {
      const dir = join(testDir, "a", "b");
      await ensureDirectory(dir);
      await ensureDirectory(dir);

      expect(await readdir(join(testDir, "a"))).toEqual(["b"]);
    });

    it("should reject an empty path", async () => {
      await expect(ensureDirectory("")).rejects.toThrow(StorageFailureError);
    });
  });

  describe("listFiles", () => {
    it("should return sorted file names filtered by extension", async () => {
      await writeFile(join(testDir, "2.json"), "{}");
      await writeFile(join(testDir, "10.json"), "{}");
      await writeFile(join(testDir, "notes.txt"), "");
      await writeFile(join(testDir, ".1.json.tmp"), "");
      await mkdir(join(testDir, "sub.json"));

      expect(await listFiles(testDir, ".json")).toEqual(["10.json", "2.json"]);
      expect(await listFiles(testDir, "txt")).toEqual(["notes.txt"]);
    });

    it("should return an empty array for a missing directory", async () => {
      expect(await listFiles(join(testDir, "missing"))).toEqual([]);
    });
  });

  describe("errnoCode", () => {
    it("should extract string codes only", () => {
      expect(errnoCode(Object.assign(new Error("x"), { code: "ENOENT" }))).toBe("ENOENT");
      expect(errnoCode({ code: 42 })).toBeUndefined();
      expect(errnoCode("ENOENT")).toBeUndefined();
    });
  });
});
