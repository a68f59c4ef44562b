// apis.yaml parser: raw YAML maps into ApisConfig

import { readFileSync } from "node:fs";
import yaml from "js-yaml";
import { ConfigError } from "./errors.js";
import type {
  APIGroup,
  APIImport,
  APIResource,
  ApisConfig,
  ExposedType,
  FieldRename,
  ImportedPackage,
  VersionMapping,
} from "./model.js";

// --- Raw YAML type helpers ---

type RawMap = Record<string, unknown>;

function isRawMap(value: unknown): value is RawMap {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asMapArray(value: unknown): RawMap[] {
  if (!Array.isArray(value)) return [];
  return value.filter(isRawMap);
}

function asStringArray(value: unknown): string[] {
  if (!value) return [];
  if (Array.isArray(value)) return value.map(String);
  return [String(value)];
}

function asString(value: unknown): string {
  return value === null || value === undefined ? "" : String(value);
}

function asOptionalString(value: unknown): string | undefined {
  return value === null || value === undefined ? undefined : String(value);
}

// --- Sections ---

function parseRename(raw: RawMap): FieldRename {
  return { from: asString(raw["from"]), to: asString(raw["to"]) };
}

// `mappings` is keyed by version; each value is { renames: [...] }.
function parseMappings(value: unknown): Record<string, VersionMapping> {
  const mappings: Record<string, VersionMapping> = {};
  if (!isRawMap(value)) return mappings;
  for (const [version, raw] of Object.entries(value)) {
    const renames = isRawMap(raw) ? asMapArray(raw["renames"]) : [];
    mappings[String(version)] = { renames: renames.map(parseRename) };
  }
  return mappings;
}

function parseResource(raw: RawMap): APIResource {
  return {
    kind: asString(raw["kind"]),
    mappings: parseMappings(raw["mappings"]),
  };
}

function parseExposed(raw: RawMap): ExposedType {
  const exposed: ExposedType = {
    kind: asString(raw["kind"]),
    specFrom: asString(raw["specFrom"]),
  };
  const version = asOptionalString(raw["version"]);
  if (version !== undefined) exposed.version = version;
  const statusFrom = asOptionalString(raw["statusFrom"]);
  if (statusFrom !== undefined) exposed.statusFrom = statusFrom;
  return exposed;
}

function parsePackage(raw: RawMap): ImportedPackage {
  return {
    path: asString(raw["path"]),
    expose: asMapArray(raw["expose"]).map(parseExposed),
  };
}

function parseImport(raw: RawMap): APIImport {
  return {
    module: asString(raw["module"]),
    tag: asString(raw["tag"]),
    packages: asMapArray(raw["packages"]).map(parsePackage),
  };
}

function parseGroup(raw: RawMap): APIGroup {
  const group: APIGroup = {
    name: asString(raw["name"]),
    storageVersion: asString(raw["storageVersion"]),
    versions: asStringArray(raw["versions"]),
    resources: asMapArray(raw["resources"]).map(parseResource),
    imports: asMapArray(raw["imports"]).map(parseImport),
  };
  const preferred = asOptionalString(raw["preferredVersion"]);
  if (preferred !== undefined) group.preferredVersion = preferred;
  return group;
}

// --- Public API ---

/** Parse a plain object (js-yaml output) into an ApisConfig. Does not validate. */
export function parseConfig(data: RawMap): ApisConfig {
  return { groups: asMapArray(data["groups"]).map(parseGroup) };
}

/**
 * Parse an apis.yaml file from disk.
 *
 * Uses js-yaml's default safe schema; no arbitrary type instantiation.
 */
export function parseConfigFile(filePath: string): ApisConfig {
  const raw = readFileSync(filePath, "utf-8");
  let data: unknown;
  try {
    data = yaml.load(raw, { schema: yaml.DEFAULT_SCHEMA, filename: filePath });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Invalid YAML in ${filePath}: ${reason}`);
  }
  if (!isRawMap(data)) {
    throw new ConfigError(`Invalid YAML structure in: ${filePath}`);
  }
  return parseConfig(data);
}

export interface QualifiedType {
  packagePath: string;
  typeName: string;
}

/** Split "pkg/path.TypeName" at the last dot. Returns null when malformed. */
export function parseQualifiedType(qualified: string): QualifiedType | null {
  const dot = qualified.lastIndexOf(".");
  if (dot <= 0 || dot === qualified.length - 1) return null;
  const typeName = qualified.slice(dot + 1);
  if (!/^[A-Za-z_$][\w$]*$/.test(typeName)) return null;
  return { packagePath: qualified.slice(0, dot), typeName };
}
