import path from "node:path";
import type { Stats } from "node:fs";
import { appendFile, copyFile, mkdir, readdir, readFile, rm, stat, writeFile } from "node:fs/promises";
import { FileOperationError } from "../errors/io.errors.js";

const isMissingError = (err: unknown): boolean =>
  err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR");

async function withFileOperation<T>(operation: string, target: string, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (err) {
    if (err instanceof FileOperationError) throw err;
    throw new FileOperationError(operation, target, err);
  }
}

export async function statOrNull(target: string): Promise<Stats | null> {
  try {
    return await stat(target);
  } catch (err) {
    if (isMissingError(err)) return null;
    throw new FileOperationError("stat", target, err);
  }
}

export async function pathExists(target: string): Promise<boolean> {
  return (await statOrNull(target)) !== null;
}

export async function isDirectory(target: string): Promise<boolean> {
  const stats = await statOrNull(target);
  return Boolean(stats?.isDirectory());
}

export async function listDirectories(target: string): Promise<string[]> {
  if (!(await isDirectory(target))) return [];
  const entries = await withFileOperation("list", target, () => readdir(target, { withFileTypes: true }));
  return entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort();
}

export async function readTextFile(target: string): Promise<string> {
  return withFileOperation("read", target, () => readFile(target, "utf-8"));
}

export async function safeWrite(
  content: string,
  target: string,
  options: { append?: boolean } = {}
): Promise<void> {
  await withFileOperation("write", target, async () => {
    await mkdir(path.dirname(target), { recursive: true });
    if (options.append) {
      await appendFile(target, content, "utf-8");
    } else {
      await writeFile(target, content, "utf-8");
    }
  });
}

export async function ensureDir(target: string): Promise<void> {
  await withFileOperation("create directory", target, async () => {
    await mkdir(target, { recursive: true });
  });
}

/** Recursive delete; a missing path is a no-op. */
export async function removeTree(target: string): Promise<void> {
  await withFileOperation("delete", target, () => rm(target, { recursive: true, force: true }));
}

export async function copyFileSafe(source: string, destination: string): Promise<void> {
  await withFileOperation("copy", source, async () => {
    await mkdir(path.dirname(destination), { recursive: true });
    await copyFile(source, destination);
  });
}
