import { promises as fs } from "node:fs";
import path from "node:path";

import { StagingError, toStagingError } from "./errors";
import { isErrnoCode, listFilesRecursive, removeFile, statIfExists, writeFileAtomic } from "./fs-utils";
import { isValidKey } from "./keys";
import { createSubsystemLogger, type Logger, type SubsystemLogger } from "./logger";
import type { StagedObjectInfo, StagedObjectMetadata, StagingStore } from "./types";

const METADATA_SUFFIX = ".meta.json";

export interface FileSystemStagingStoreOptions {
  directory: string;
  logger?: Logger;
}

export class FileSystemStagingStore implements StagingStore {
  readonly directory: string;

  private readonly log: SubsystemLogger;

  constructor(options: FileSystemStagingStoreOptions) {
    this.directory = path.resolve(options.directory);
    this.log = createSubsystemLogger("staging", options.logger);
  }

  async put(key: string, body: Uint8Array, metadata: StagedObjectMetadata = {}): Promise<void> {
    const objectPath = this.resolve("put", key);
    try {
      await writeFileAtomic(objectPath, body);
      await writeFileAtomic(`${objectPath}${METADATA_SUFFIX}`, JSON.stringify(metadata, null, 2));
    } catch (error: unknown) {
      throw toStagingError("put", key, error);
    }
    this.log.debug(`stored ${key} (${body.byteLength} bytes)`);
  }

  async get(key: string): Promise<Uint8Array> {
    const objectPath = this.resolve("get", key);
    try {
      return new Uint8Array(await fs.readFile(objectPath));
    } catch (error: unknown) {
      if (isErrnoCode(error, "ENOENT")) {
        throw new StagingError("get", key, `Staged object ${key} does not exist`, { cause: error });
      }
      throw toStagingError("get", key, error);
    }
  }

  async delete(key: string): Promise<void> {
    const objectPath = this.resolve("delete", key);
    try {
      await removeFile(objectPath);
      await removeFile(`${objectPath}${METADATA_SUFFIX}`);
    } catch (error: unknown) {
      throw toStagingError("delete", key, error);
    }
    this.log.debug(`deleted ${key}`);
  }

  async list(): Promise<StagedObjectInfo[]> {
    try {
      const files = await listFilesRecursive(this.directory);
      const objects = files.filter(
        (file) => !file.endsWith(METADATA_SUFFIX) && !file.endsWith(".tmp")
      );
      const entries: StagedObjectInfo[] = [];
      for (const file of objects) {
        // A concurrent delete may remove the object after it was listed.
        const stats = await statIfExists(file);
        if (stats) {
          entries.push({
            key: path.relative(this.directory, file).split(path.sep).join("/"),
            size: stats.size,
            storedAt: stats.mtime.toISOString()
          });
        }
      }
      return entries.sort((a, b) => a.key.localeCompare(b.key));
    } catch (error: unknown) {
      throw toStagingError("list", undefined, error);
    }
  }

  private resolve(operation: "put" | "get" | "delete", key: string): string {
    if (!isValidKey(key)) {
      throw new StagingError(operation, key, `Invalid staging key: ${JSON.stringify(key)}`);
    }
    return path.join(this.directory, ...key.split("/"));
  }
}
