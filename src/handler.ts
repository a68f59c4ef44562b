// Hub-only CRUD collaborator. It never sees a spoke value.

import { randomUUID } from "node:crypto";
import { readEnvelope } from "./envelope.js";
import type { VersionedEnvelope } from "./model.js";
import type { StorageBackend } from "./storage.js";

/** `key` is `<group>/<kind>`. */
export interface ResourceHandler {
  create(key: string, hub: VersionedEnvelope): Promise<VersionedEnvelope>;
  get(key: string, uid: string): Promise<VersionedEnvelope | null>;
  list(key: string): Promise<VersionedEnvelope[]>;
  update(key: string, uid: string, hub: VersionedEnvelope): Promise<VersionedEnvelope | null>;
  delete(key: string, uid: string): Promise<boolean>;
}

export interface HubResourceHandlerOptions {
  now?: () => Date;
  newUid?: () => string;
}

export class HubResourceHandler implements ResourceHandler {
  private readonly now: () => Date;
  private readonly newUid: () => string;

  constructor(
    private readonly storage: StorageBackend,
    options: HubResourceHandlerOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.newUid = options.newUid ?? randomUUID;
  }

  async create(key: string, hub: VersionedEnvelope): Promise<VersionedEnvelope> {
    const timestamp = this.now().toISOString();
    const record: VersionedEnvelope = {
      ...hub,
      metadata: { ...hub.metadata, uid: this.newUid(), createdAt: timestamp, updatedAt: timestamp },
    };
    await this.storage.save(key, record.metadata.uid, JSON.stringify(record));
    return record;
  }

  async get(key: string, uid: string): Promise<VersionedEnvelope | null> {
    const raw = await this.storage.load(key, uid);
    return raw === null ? null : parseStored(key, uid, raw);
  }

  async list(key: string): Promise<VersionedEnvelope[]> {
    const rows = await this.storage.list(key);
    return rows.map((raw) => parseStored(key, "(list)", raw));
  }

  async update(key: string, uid: string, hub: VersionedEnvelope): Promise<VersionedEnvelope | null> {
    const existing = await this.get(key, uid);
    if (!existing) return null;
    const record: VersionedEnvelope = {
      ...hub,
      metadata: {
        ...hub.metadata,
        uid,
        name: hub.metadata.name || existing.metadata.name,
        createdAt: existing.metadata.createdAt ?? this.now().toISOString(),
        updatedAt: this.now().toISOString(),
      },
    };
    await this.storage.save(key, uid, JSON.stringify(record));
    return record;
  }

  async delete(key: string, uid: string): Promise<boolean> {
    return this.storage.delete(key, uid);
  }
}

function parseStored(key: string, uid: string, raw: string): VersionedEnvelope {
  const result = readEnvelope(JSON.parse(raw));
  if (typeof result === "string") {
    throw new Error(`Stored ${key} ${uid} is not a valid hub record: ${result}`);
  }
  return result;
}
