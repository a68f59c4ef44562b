// spokehub data model: configuration, catalog and envelope shapes

// --- Type Catalog ---

export interface FieldMeta {
  name: string;
  declaredType: string;    // normalized, see normalizeTypeNode()
  wireTag: string;         // "" when the property carries no @json tag
  required: boolean;
}

export interface TypeInfo {
  name: string;
  owningPackage: string;
  fields: FieldMeta[];
}

// --- apis.yaml ---

export interface FieldRename {
  from: string;            // spoke field
  to: string;              // hub field
}

export interface VersionMapping {
  renames: FieldRename[];
}

export interface APIResource {
  kind: string;
  mappings: Record<string, VersionMapping>; // keyed by spoke version
}

export interface ExposedType {
  kind: string;
  version?: string;        // defaults to the group's storage version
  specFrom: string;        // qualified: "<package path>.<TypeName>"
  statusFrom?: string;
}

export interface ImportedPackage {
  path: string;
  expose: ExposedType[];
}

export interface APIImport {
  module: string;
  tag: string;
  packages: ImportedPackage[];
}

export interface APIGroup {
  name: string;
  storageVersion: string;
  versions: string[];
  preferredVersion?: string;
  resources: APIResource[];
  imports: APIImport[];
}

export interface ApisConfig {
  groups: APIGroup[];
}

// --- Wire envelope ---

export interface ResourceMetadata {
  name: string;
  uid: string;
  labels?: Record<string, string>;
  annotations?: Record<string, string>;
  createdAt?: string;
  updatedAt?: string;
}

export type JsonObject = Record<string, unknown>;

export interface VersionedEnvelope<Spec = JsonObject, Status = JsonObject> {
  apiVersion: string;      // "<group>/<version>"
  kind: string;
  metadata: ResourceMetadata;
  spec: Spec;
  status: Status;
}

/**
 * A pure conversion pair between one spoke version and the hub.
 * Both directions throw RuntimeConversionError on malformed input.
 */
export interface Converter<Hub, Spoke> {
  convertTo(spoke: Spoke): Hub;
  convertFrom(hub: Hub): Spoke;
}

export type Stability = "alpha" | "beta" | "stable";

/** Freeze a loaded value and everything it holds. */
export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
