// Wire envelope helpers shared by the decoder and the converters.

import type { JsonObject, ResourceMetadata, VersionedEnvelope } from "./model.js";
import { isPlainObject, jsonTypeOf } from "./type-shape.js";

/**
 * Read metadata from an untyped value. Returns an error string on the first
 * field of the wrong type.
 */
export function readMetadata(value: unknown): ResourceMetadata | string {
  if (value === undefined) return { name: "", uid: "" };
  if (!isPlainObject(value)) return `metadata: expected object, got ${jsonTypeOf(value)}`;

  const metadata: ResourceMetadata = { name: "", uid: "" };
  for (const key of ["name", "uid", "createdAt", "updatedAt"] as const) {
    const raw = value[key];
    if (raw === undefined) continue;
    if (typeof raw !== "string") return `metadata.${key}: expected string, got ${jsonTypeOf(raw)}`;
    metadata[key] = raw;
  }
  for (const key of ["labels", "annotations"] as const) {
    const raw = value[key];
    if (raw === undefined) continue;
    if (!isPlainObject(raw)) return `metadata.${key}: expected object, got ${jsonTypeOf(raw)}`;
    const entries: Record<string, string> = {};
    for (const [k, v] of Object.entries(raw)) {
      if (typeof v !== "string") return `metadata.${key}.${k}: expected string, got ${jsonTypeOf(v)}`;
      entries[k] = v;
    }
    metadata[key] = entries;
  }
  return metadata;
}

/** Narrow an untyped value to an envelope; returns an error string when it is not one. */
export function readEnvelope(value: unknown): VersionedEnvelope | string {
  if (!isPlainObject(value)) return `expected object, got ${jsonTypeOf(value)}`;
  const { apiVersion, kind, spec, status } = value;
  if (typeof apiVersion !== "string") return "apiVersion: expected string";
  if (typeof kind !== "string") return "kind: expected string";
  const metadata = readMetadata(value["metadata"]);
  if (typeof metadata === "string") return metadata;
  const specObject: JsonObject | undefined = spec === undefined ? {} : isPlainObject(spec) ? spec : undefined;
  if (!specObject) return `spec: expected object, got ${jsonTypeOf(spec)}`;
  const statusObject: JsonObject | undefined =
    status === undefined ? {} : isPlainObject(status) ? status : undefined;
  if (!statusObject) return `status: expected object, got ${jsonTypeOf(status)}`;
  return { apiVersion, kind, metadata, spec: specObject, status: statusObject };
}
