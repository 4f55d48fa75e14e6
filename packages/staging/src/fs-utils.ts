import { randomUUID } from "node:crypto";
import { promises as fs, type Dirent, type Stats } from "node:fs";
import path from "node:path";

export async function ensureDir(target: string): Promise<void> {
  await fs.mkdir(target, { recursive: true });
}

export async function removeFile(target: string): Promise<void> {
  await fs.rm(target, { force: true });
}

// Writes beside the target and renames over it, so readers never observe a partial file.
export async function writeFileAtomic(target: string, data: Uint8Array | string): Promise<void> {
  await ensureDir(path.dirname(target));
  const temporary = `${target}.${randomUUID()}.tmp`;
  try {
    await fs.writeFile(temporary, data);
    await fs.rename(temporary, target);
  } catch (error: unknown) {
    await removeFile(temporary);
    throw error;
  }
}

export async function statIfExists(target: string): Promise<Stats | undefined> {
  try {
    return await fs.stat(target);
  } catch (error: unknown) {
    if (isErrnoCode(error, "ENOENT")) {
      return undefined;
    }
    throw error;
  }
}

export async function listFilesRecursive(baseDir: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(baseDir, { withFileTypes: true });
  } catch (error: unknown) {
    if (isErrnoCode(error, "ENOENT")) {
      return [];
    }
    throw error;
  }

  const files: string[] = [];
  for (const entry of entries) {
    const fullPath = path.join(baseDir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFilesRecursive(fullPath)));
    } else if (entry.isFile()) {
      files.push(fullPath);
    }
  }
  return files;
}

export function isErrnoCode(error: unknown, code: string): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === code;
}
