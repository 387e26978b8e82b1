/**
 * Atomic file I/O operations for crash-safe writes
 *
 * Invariants:
 * - Writes are atomic: never observe partial file contents
 * - Temp files always reside in the same directory as target (same filesystem for atomic rename)
 * - Temp files are removed on failure paths
 * - Reads are UTF-8 only; a missing file reads as null
 * - Removes are idempotent
 *
 * Pattern: write → fsync → rename → fsync directory
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import { dirname, basename, join } from "node:path";
import { StorageFailureError } from "./errors.js";
import { logger } from "./observability/logs.js";

/**
 * Feature flag to control directory fsync (can be disabled on problematic platforms)
 */
const ENABLE_DIR_FSYNC = true;

/**
 * Extract the errno code from an unknown thrown value
 */
export function errnoCode(err: unknown): string | undefined {
  if (err && typeof err === "object" && "code" in err) {
    const code = err.code;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

/**
 * Ensure a directory exists, creating it and parent directories as needed
 * @param dirPath - Directory path to create
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  if (!dirPath) {
    throw new StorageFailureError("mkdir", String(dirPath), {
      cause: new TypeError("Directory path must be a non-empty string"),
    });
  }

  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (err) {
    throw new StorageFailureError("mkdir", dirPath, { cause: err });
  }
}

/**
 * Atomically write content to a file using write-rename-sync pattern
 * @param filePath - Target file path
 * @param content - Content to write (UTF-8 string)
 */
export async function atomicWrite(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath);
  const base = basename(filePath);
  const tmp = join(dir, `.${base}.${randomUUID()}.tmp`);

  await ensureDirectory(dir);

  let fileHandle: fs.FileHandle | null = null;

  try {
    fileHandle = await fs.open(tmp, "w", 0o600);
    await fileHandle.writeFile(content, "utf-8");

    // Prefer datasync, fall back to full sync where it is not supported
    try {
      await fileHandle.datasync();
    } catch (err) {
      const code = errnoCode(err);
      if (code === "ENOTSUP" || code === "ENOSYS" || code === "EINVAL") {
        await fileHandle.sync();
      } else {
        throw err;
      }
    }

    await fileHandle.close();
    fileHandle = null;

    try {
      await fs.rename(tmp, filePath);
    } catch (err) {
      // Windows: antivirus or indexers can hold the target briefly
      const code = errnoCode(err);
      if ((code === "EPERM" || code === "EACCES" || code === "EBUSY") && process.platform === "win32") {
        await new Promise((resolve) => setTimeout(resolve, 10));
        await fs.rename(tmp, filePath);
      } else {
        throw err;
      }
    }

    if (ENABLE_DIR_FSYNC) {
      await syncDirectory(dir);
    }
  } catch (err) {
    if (fileHandle) {
      await fileHandle.close().catch((closeErr: unknown) => {
        logger.debug("io.close.failed", { target: tmp, details: { error: String(closeErr) } });
      });
    }

    await fs.unlink(tmp).catch((unlinkErr: unknown) => {
      if (errnoCode(unlinkErr) !== "ENOENT") {
        logger.debug("io.cleanup.failed", { target: tmp, details: { error: String(unlinkErr) } });
      }
    });

    throw new StorageFailureError("write", filePath, { cause: err });
  }
}

/**
 * Best-effort fsync of a directory after a rename
 */
async function syncDirectory(dir: string): Promise<void> {
  try {
    const dirHandle = await fs.open(dir, "r");
    try {
      await dirHandle.sync();
    } finally {
      await dirHandle.close();
    }
  } catch (err) {
    // EINVAL / ENOTSUP / EBADF: directory fsync unsupported on this platform
    const code = errnoCode(err);
    if (code !== "EINVAL" && code !== "ENOTSUP" && code !== "EBADF") {
      logger.debug("io.dirsync.failed", { target: dir, details: { error: String(err) } });
    }
  }
}

/**
 * Read a UTF-8 text file
 * @param filePath - File path to read
 * @returns File contents, or null if the file does not exist
 * @throws StorageFailureError for other read failures
 */
export async function readTextFile(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      return null;
    }
    throw new StorageFailureError("read", filePath, { cause: err });
  }
}

/**
 * Remove a file (idempotent - no error if file doesn't exist)
 * @param filePath - File path to remove
 * @returns true when a file was removed
 */
export async function removeFile(filePath: string): Promise<boolean> {
  try {
    await fs.unlink(filePath);
    return true;
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      return false;
    }
    throw new StorageFailureError("remove", filePath, { cause: err });
  }
}

/**
 * List files in a directory, optionally filtering by extension
 * @param dirPath - Directory path to list
 * @param extension - Optional file extension to filter by (e.g., ".json")
 * @returns Sorted array of filenames (not full paths)
 */
export async function listFiles(dirPath: string, extension?: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });

    // Files only; symlinks are never followed
    let files = entries
      .filter((entry) => entry.isFile() && !entry.isSymbolicLink())
      .map((entry) => entry.name);

    if (extension) {
      const ext = extension.startsWith(".") ? extension : `.${extension}`;
      files = files.filter((name) => name.endsWith(ext) && !name.startsWith("."));
    }

    return files.sort();
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      return [];
    }

    throw new StorageFailureError("list", dirPath, { cause: err });
  }
}
