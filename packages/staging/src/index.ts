import { createSubsystemLogger, type Logger } from "./logger";
import type { StagingStore } from "./types";

export interface PurgeOptions {
  ttlMs: number;
  now?: Date;
  logger?: Logger;
}

// Deletes objects older than the TTL, such as those left by runs that were cut short.
export async function purgeExpiredObjects(
  store: StagingStore,
  options: PurgeOptions
): Promise<string[]> {
  const log = createSubsystemLogger("staging", options.logger);
  const removed: string[] = [];
  if (options.ttlMs <= 0) {
    return removed;
  }

  const now = (options.now ?? new Date()).getTime();
  const objects = await store.list();

  for (const object of objects) {
    const age = now - Date.parse(object.storedAt);
    if (age > options.ttlMs) {
      await store.delete(object.key);
      log.info(`removed expired object ${object.key}`);
      removed.push(object.key);
    }
  }

  return removed;
}

export { FileSystemStagingStore } from "./fs-store";
export type { FileSystemStagingStoreOptions } from "./fs-store";
export { MemoryStagingStore } from "./memory-store";
export type { MemoryStagingStoreOptions } from "./memory-store";
export { StagingError, toStagingError } from "./errors";
export { stagingKey, isValidKey } from "./keys";
export { createSubsystemLogger, normalizeLogger, silentLogger } from "./logger";
export type { Logger, SubsystemLogger } from "./logger";
export type {
  StagedObject,
  StagedObjectInfo,
  StagedObjectMetadata,
  StagingOperation,
  StagingStore
} from "./types";
