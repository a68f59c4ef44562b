// Schema Version Registry: read-only lookups over a validated apis.yaml.
//
// Construct once at startup and pass it to the generator and the negotiator.

import {
  deepFreeze,
  type APIGroup,
  type APIResource,
  type ApisConfig,
  type ExposedType,
  type FieldRename,
  type Stability,
} from "./model.js";
import { validateConfig } from "./validator.js";

export interface ResolvedExposure extends ExposedType {
  module: string;
  tag: string;
  packagePath: string;     // "<module>/<package path>"
}

export class SchemaRegistry {
  private readonly groups: Map<string, APIGroup>;
  readonly warnings: readonly string[];

  constructor(config: ApisConfig) {
    this.warnings = validateConfig(config);
    // Groups are frozen; callers can read but never reshape them.
    this.groups = new Map(config.groups.map((g) => [g.name, deepFreeze(structuredClone(g))]));
  }

  listGroups(): APIGroup[] {
    return [...this.groups.values()];
  }

  getGroup(name: string): APIGroup | undefined {
    return this.groups.get(name);
  }

  /** Look up a group and, when `version` is given, require it to be registered. */
  resolve(groupName: string, version?: string): APIGroup | undefined {
    const group = this.groups.get(groupName);
    if (!group) return undefined;
    if (version !== undefined && version !== "" && !group.versions.includes(version)) {
      return undefined;
    }
    return group;
  }

  isVersionSupported(groupName: string, version: string): boolean {
    return this.groups.get(groupName)?.versions.includes(version) ?? false;
  }

  getStorageVersion(groupName: string): string {
    return this.requireGroup(groupName).storageVersion;
  }

  /** The configured preferred version, else the storage (hub) version. */
  getPreferredVersion(groupName: string): string {
    const group = this.requireGroup(groupName);
    return group.preferredVersion ?? group.storageVersion;
  }

  getResource(groupName: string, kind: string): APIResource | undefined {
    return this.groups.get(groupName)?.resources.find((r) => r.kind === kind);
  }

  /** Map a URL plural ("devices") to a declared resource. */
  findResourceByPlural(groupName: string, plural: string): APIResource | undefined {
    const wanted = plural.toLowerCase();
    return this.groups
      .get(groupName)
      ?.resources.find((r) => pluralize(r.kind) === wanted || r.kind.toLowerCase() === wanted);
  }

  renamesFor(groupName: string, kind: string, version: string): FieldRename[] {
    return this.getResource(groupName, kind)?.mappings[version]?.renames ?? [];
  }

  /** The import that supplies `kind`'s types for `version`, if any. */
  importsFor(groupName: string, kind: string, version: string): ResolvedExposure | undefined {
    const group = this.groups.get(groupName);
    if (!group) return undefined;
    for (const imp of group.imports) {
      for (const pkg of imp.packages) {
        for (const exposed of pkg.expose) {
          if (exposed.kind !== kind) continue;
          if ((exposed.version ?? group.storageVersion) !== version) continue;
          return {
            ...exposed,
            module: imp.module,
            tag: imp.tag,
            packagePath: pkg.path ? `${imp.module}/${pkg.path}` : imp.module,
          };
        }
      }
    }
    return undefined;
  }

  private requireGroup(name: string): APIGroup {
    const group = this.groups.get(name);
    if (!group) throw new Error(`group ${name} not found`);
    return group;
  }
}

// --- Version helpers ---

const VERSION_PARTS = /^v([0-9]+)(?:(alpha|beta)([0-9]+))?$/;

export function stabilityLevel(version: string): Stability {
  if (version.includes("alpha")) return "alpha";
  if (version.includes("beta")) return "beta";
  return "stable";
}

const STABILITY_RANK: Record<Stability, number> = { alpha: 0, beta: 1, stable: 2 };

/**
 * Kubernetes-style ordering: stable > beta > alpha, then higher major,
 * then higher minor. Non-conforming versions sort first, lexically.
 * Returns a negative number when `a` sorts before `b`.
 */
export function compareVersions(a: string, b: string): number {
  const ma = VERSION_PARTS.exec(a);
  const mb = VERSION_PARTS.exec(b);
  if (!ma || !mb) {
    if (ma) return 1;
    if (mb) return -1;
    return a < b ? -1 : a > b ? 1 : 0;
  }
  const rank = STABILITY_RANK[stabilityLevel(a)] - STABILITY_RANK[stabilityLevel(b)];
  if (rank !== 0) return rank;
  const major = Number(ma[1]) - Number(mb[1]);
  if (major !== 0) return major;
  return Number(ma[3] ?? 0) - Number(mb[3] ?? 0);
}

export function formatApiVersion(group: string, version: string): string {
  return `${group}/${version}`;
}

/** "infra.example.io/v1" -> { group, version }; a bare "v1" has an empty group. */
export function parseApiVersion(apiVersion: string): { group: string; version: string } {
  const slash = apiVersion.lastIndexOf("/");
  if (slash === -1) return { group: "", version: apiVersion };
  return { group: apiVersion.slice(0, slash), version: apiVersion.slice(slash + 1) };
}

export function pluralize(kind: string): string {
  const lower = kind.toLowerCase();
  if (/(s|x|z|ch|sh)$/.test(lower)) return `${lower}es`;
  if (/[^aeiou]y$/.test(lower)) return `${lower.slice(0, -1)}ies`;
  return `${lower}s`;
}
