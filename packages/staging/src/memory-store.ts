import { StagingError } from "./errors";
import { isValidKey } from "./keys";
import type { StagedObject, StagedObjectInfo, StagedObjectMetadata, StagingStore } from "./types";

export interface MemoryStagingStoreOptions {
  now?: () => Date;
}

export class MemoryStagingStore implements StagingStore {
  private readonly objects = new Map<string, StagedObject>();

  private readonly now: () => Date;

  constructor(options: MemoryStagingStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  async put(key: string, body: Uint8Array, metadata: StagedObjectMetadata = {}): Promise<void> {
    assertKey("put", key);
    this.objects.set(key, {
      key,
      body: body.slice(),
      size: body.byteLength,
      storedAt: this.now().toISOString(),
      metadata: { ...metadata }
    });
  }

  async get(key: string): Promise<Uint8Array> {
    assertKey("get", key);
    const object = this.objects.get(key);
    if (!object) {
      throw new StagingError("get", key, `Staged object ${key} does not exist`);
    }
    return object.body.slice();
  }

  async delete(key: string): Promise<void> {
    assertKey("delete", key);
    this.objects.delete(key);
  }

  async list(): Promise<StagedObjectInfo[]> {
    return Array.from(this.objects.values())
      .map(({ key, size, storedAt }) => ({ key, size, storedAt }))
      .sort((a, b) => a.key.localeCompare(b.key));
  }
}

function assertKey(operation: "put" | "get" | "delete", key: string): void {
  if (!isValidKey(key)) {
    throw new StagingError(operation, key, `Invalid staging key: ${JSON.stringify(key)}`);
  }
}
