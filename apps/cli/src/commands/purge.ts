import { DEFAULT_STAGING_DIRECTORY } from "../../../../packages/core/src/index";
import {
  FileSystemStagingStore,
  purgeExpiredObjects,
  type Logger
} from "../../../../packages/staging/src/index";

export const DEFAULT_PURGE_TTL_MS = 24 * 60 * 60 * 1000;

export interface CliPurgeOptions {
  ttl?: number;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  now?: Date;
  print?: (line: string) => void;
}

export async function handlePurge(options: CliPurgeOptions = {}): Promise<string[]> {
  const print = options.print ?? ((line: string) => console.log(line));
  const env = options.env ?? process.env;
  const directory = env.STAGING_DIR?.trim() || DEFAULT_STAGING_DIRECTORY;
  const ttlMs = options.ttl ?? DEFAULT_PURGE_TTL_MS;
  if (!Number.isFinite(ttlMs) || ttlMs <= 0) {
    throw new Error(`Invalid --ttl value: ${options.ttl}`);
  }

  const store = new FileSystemStagingStore({ directory, logger: options.logger });
  const removed = await purgeExpiredObjects(store, { ttlMs, now: options.now, logger: options.logger });

  print(removed.length ? `Removed ${removed.length} expired object(s) from ${store.directory}:` : "Nothing to purge.");
  for (const key of removed) {
    print(`- ${key}`);
  }
  return removed;
}
