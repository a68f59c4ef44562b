// Storage collaborator. Backends only ever receive and return hub-shaped JSON.

export interface StorageBackend {
  save(key: string, uid: string, hubJson: string): Promise<void>;
  load(key: string, uid: string): Promise<string | null>;
  delete(key: string, uid: string): Promise<boolean>;
  list(key: string): Promise<string[]>;
}

/** In-process backend for `spokehub serve` and tests. */
export class MemoryStorageBackend implements StorageBackend {
  private readonly records = new Map<string, Map<string, string>>();

  async save(key: string, uid: string, hubJson: string): Promise<void> {
    let byUid = this.records.get(key);
    if (!byUid) {
      byUid = new Map();
      this.records.set(key, byUid);
    }
    byUid.set(uid, hubJson);
  }

  async load(key: string, uid: string): Promise<string | null> {
    return this.records.get(key)?.get(uid) ?? null;
  }

  async delete(key: string, uid: string): Promise<boolean> {
    return this.records.get(key)?.delete(uid) ?? false;
  }

  async list(key: string): Promise<string[]> {
    return [...(this.records.get(key)?.values() ?? [])];
  }
}
