// apis.yaml validator: fails on the first violation, collects warnings

import { ConfigError } from "./errors.js";
import type { APIGroup, ApisConfig } from "./model.js";
import { parseQualifiedType } from "./parser.js";

const VERSION_FORMAT = /^v[0-9]+(?:alpha[0-9]+|beta[0-9]+)?$/;

function fail(index: number, group: APIGroup, message: string): never {
  const label = group.name ? `'${group.name}'` : "(unnamed)";
  throw new ConfigError(`groups[${index}] ${label}: ${message}`, index, group.name);
}

function checkCore(group: APIGroup, index: number): void {
  if (!group.name) fail(index, group, "missing required field 'name'");
  if (!group.storageVersion) fail(index, group, "missing required field 'storageVersion'");
  if (group.versions.length === 0) fail(index, group, "'versions' must list at least one version");
  if (!group.versions.includes(group.storageVersion)) {
    fail(
      index,
      group,
      `storageVersion '${group.storageVersion}' must be in versions list [${group.versions.join(", ")}]`
    );
  }
}

function checkDetails(group: APIGroup, index: number): void {
  const versions = new Set<string>();
  for (const v of group.versions) {
    if (versions.has(v)) fail(index, group, `duplicate version '${v}'`);
    versions.add(v);
  }

  if (group.preferredVersion !== undefined && !versions.has(group.preferredVersion)) {
    fail(index, group, `preferredVersion '${group.preferredVersion}' must be in versions list`);
  }

  const kinds = new Set<string>();
  for (const resource of group.resources) {
    if (!resource.kind) fail(index, group, "a resource is missing required field 'kind'");
    if (kinds.has(resource.kind)) fail(index, group, `duplicate resource kind '${resource.kind}'`);
    kinds.add(resource.kind);

    for (const [version, mapping] of Object.entries(resource.mappings)) {
      const ctx = `resource '${resource.kind}' mappings[${version}]`;
      if (!versions.has(version)) fail(index, group, `${ctx}: unknown version '${version}'`);
      for (const rename of mapping.renames) {
        if (!rename.from || !rename.to) {
          fail(index, group, `${ctx}: renames need both 'from' and 'to'`);
        }
      }
    }
  }

  for (const imp of group.imports) {
    if (!imp.module) fail(index, group, "an import is missing required field 'module'");
    if (!imp.tag) fail(index, group, `import '${imp.module}' is missing required field 'tag'`);
    for (const pkg of imp.packages) {
      for (const exposed of pkg.expose) {
        const ctx = `import '${imp.module}' expose '${exposed.kind}'`;
        if (!kinds.has(exposed.kind)) fail(index, group, `${ctx}: kind is not a declared resource`);
        const version = exposed.version ?? group.storageVersion;
        if (!versions.has(version)) fail(index, group, `${ctx}: unknown version '${version}'`);
        if (!parseQualifiedType(exposed.specFrom)) {
          fail(index, group, `${ctx}: specFrom '${exposed.specFrom}' is not a qualified type`);
        }
        if (exposed.statusFrom !== undefined && !parseQualifiedType(exposed.statusFrom)) {
          fail(index, group, `${ctx}: statusFrom '${exposed.statusFrom}' is not a qualified type`);
        }
      }
    }
  }
}

/**
 * Validate a parsed apis.yaml. Throws ConfigError on the first violation;
 * returns non-fatal warnings.
 */
export function validateConfig(config: ApisConfig): string[] {
  const warnings: string[] = [];

  if (config.groups.length === 0) {
    throw new ConfigError("apis.yaml must declare at least one group");
  }

  const names = new Set<string>();
  config.groups.forEach((group, index) => {
    checkCore(group, index);
    if (names.has(group.name)) fail(index, group, "duplicate group name");
    names.add(group.name);
    checkDetails(group, index);

    for (const v of group.versions) {
      if (!VERSION_FORMAT.test(v)) {
        warnings.push(
          `Group '${group.name}': version '${v}' does not follow v<N>[alpha<N>|beta<N>]`
        );
      }
    }
    if (group.resources.length === 0) {
      warnings.push(`Group '${group.name}' has no resources`);
    }
  });

  return warnings;
}

export function isValidVersion(version: string): boolean {
  return VERSION_FORMAT.test(version);
}
