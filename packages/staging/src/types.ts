export type StagedObjectMetadata = Record<string, string>;

export interface StagedObjectInfo {
  key: string;
  size: number;
  storedAt: string;
}

export interface StagedObject extends StagedObjectInfo {
  body: Uint8Array;
  metadata: StagedObjectMetadata;
}

export interface StagingStore {
  put(key: string, body: Uint8Array, metadata?: StagedObjectMetadata): Promise<void>;
  get(key: string): Promise<Uint8Array>;
  // Missing keys are not an error.
  delete(key: string): Promise<void>;
  list(): Promise<StagedObjectInfo[]>;
}

export type StagingOperation = "put" | "get" | "delete" | "list";
