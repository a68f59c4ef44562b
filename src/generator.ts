// Conversion Generator: per (group, version, kind) hub<->spoke field mapping plans.
//
// Matching, for every destination field and in both directions:
//   1. explicit rename for the spoke version
//   2. wire-tag equality
//   3. field-name equality
//   4. no match: zero value when required, omitted otherwise
// Matched fields with incompatible declared types abort generation.

import { CatalogLookupError, ConversionGenerationError } from "./errors.js";
import type { TypeCatalog } from "./catalog.js";
import { silentLogger, type Logger } from "./logger.js";
import type { FieldMeta, FieldRename, TypeInfo } from "./model.js";
import { parseQualifiedType } from "./parser.js";
import { formatApiVersion, type SchemaRegistry } from "./registry.js";
import { describeType, zeroValueOf, type TypeShape } from "./type-shape.js";

// --- Plan shapes (plain JSON, written to conversions.json) ---

export type MatchKind = "rename" | "tag" | "name";

export interface FieldMapping {
  target: string;          // destination JSON key
  source?: string;         // source JSON key; absent when nothing matched
  matchedBy?: MatchKind;
  type: string;            // destination declared type
  required: boolean;
  zero?: unknown;          // filled in when the source value is missing and the field is required
  nested?: ObjectMapping;  // set when the innermost destination type is a mapped struct
}

export interface ObjectMapping {
  sourceType: string;
  targetType: string;
  fields: FieldMapping[];
}

export interface SectionPlan {
  to: ObjectMapping;       // spoke -> hub
  from: ObjectMapping;     // hub -> spoke
}

export interface ShapeField {
  key: string;
  type: string;
  required: boolean;
  ref?: string;            // key into SpokeShape.types for the innermost struct
}

export interface SpokeShape {
  spec: string;
  status: string;
  types: Record<string, ShapeField[]>;
}

export interface ConversionPlan {
  group: string;
  version: string;
  hubVersion: string;
  kind: string;
  spec: SectionPlan;
  status: SectionPlan;
  spokeShape: SpokeShape;
  lossy: string[];         // spoke paths that do not survive storage
}

export interface GenerateOptions {
  /** Package holding a version's local types. Default: `apis/<group>/<version>`. */
  localPackage?: (group: string, version: string) => string;
  /** Treat a required hub field with no spoke counterpart as an error. */
  rejectUnmatchedRequired?: boolean;
  logger?: Logger;
}

export function defaultLocalPackage(group: string, version: string): string {
  return `apis/${group}/${version}`;
}

// --- Helpers ---

const wireKey = (field: FieldMeta): string => field.wireTag || field.name;

type Section = "spec" | "status";

interface ParsedRename {
  section?: Section;
  from: string;
  to: string;
}

function splitSection(path: string): { section?: Section; field: string } {
  for (const section of ["spec", "status"] as const) {
    if (path.startsWith(`${section}.`)) return { section, field: path.slice(section.length + 1) };
  }
  return { field: path };
}

function findField(fields: FieldMeta[], nameOrKey: string): FieldMeta | undefined {
  return fields.find((f) => f.name === nameOrKey) ?? fields.find((f) => wireKey(f) === nameOrKey);
}

function innermostReference(shape: TypeShape): string | null {
  switch (shape.kind) {
    case "reference":
      return shape.name;
    case "array":
      return innermostReference(shape.element);
    case "record":
      return innermostReference(shape.value);
    case "nullable":
      return innermostReference(shape.inner);
    default:
      return null;
  }
}

// --- Generator ---

class PlanBuilder {
  private readonly stack: string[] = [];

  constructor(
    private readonly catalog: TypeCatalog,
    private readonly group: string,
    private readonly version: string,
    private readonly kind: string,
    private readonly options: GenerateOptions
  ) {}

  fail(message: string): never {
    throw new ConversionGenerationError(message, this.group, this.version, this.kind);
  }

  resolveLocal(pkg: string, name: string): TypeInfo | null {
    if (name.includes(".") || !this.catalog.hasType(pkg, name)) return null;
    return this.catalog.getTypeInfo(pkg, name);
  }

  /**
   * Build the mapping that fills `dst` from `src`. `renames` are pairs of
   * (destination field, source field) already resolved for this direction.
   */
  objectMapping(
    src: TypeInfo,
    dst: TypeInfo,
    renames: Map<string, string>,
    direction: "to" | "from",
    path: string
  ): ObjectMapping {
    const frame = `${src.owningPackage}.${src.name}->${dst.owningPackage}.${dst.name}`;
    if (this.stack.includes(frame)) {
      this.fail(`recursive type ${dst.name} at ${path} cannot be mapped`);
    }
    this.stack.push(frame);

    const fields: FieldMapping[] = [];
    for (const target of dst.fields) {
      const fieldPath = `${path}.${wireKey(target)}`;
      let source: FieldMeta | undefined;
      let matchedBy: MatchKind | undefined;

      const renamed = renames.get(target.name);
      if (renamed !== undefined) {
        source = findField(src.fields, renamed);
        matchedBy = "rename";
      }
      if (!source && target.wireTag) {
        source = src.fields.find((f) => f.wireTag !== "" && f.wireTag === target.wireTag);
        if (source) matchedBy = "tag";
      }
      if (!source) {
        source = src.fields.find((f) => f.name === target.name);
        if (source) matchedBy = "name";
      }

      const mapping: FieldMapping = {
        target: wireKey(target),
        type: target.declaredType,
        required: target.required,
      };

      if (source && matchedBy) {
        mapping.source = wireKey(source);
        mapping.matchedBy = matchedBy;
        const nested = this.checkCompatible(source, src, target, dst, fieldPath, direction);
        if (nested) mapping.nested = nested;
      } else if (
        direction === "to" &&
        target.required &&
        this.options.rejectUnmatchedRequired
      ) {
        this.fail(`required hub field ${fieldPath} has no counterpart in ${this.version}`);
      }

      if (target.required) {
        const zero = this.zeroFor(target.declaredType, dst.owningPackage, new Set());
        if (zero !== undefined) mapping.zero = zero;
      }
      fields.push(mapping);
    }

    this.stack.pop();
    return { sourceType: src.name, targetType: dst.name, fields };
  }

  private checkCompatible(
    source: FieldMeta,
    src: TypeInfo,
    target: FieldMeta,
    dst: TypeInfo,
    path: string,
    direction: "to" | "from"
  ): ObjectMapping | undefined {
    const found: { nested?: ObjectMapping } = {};

    const compare = (s: TypeShape, d: TypeShape): boolean => {
      // Opaque types degrade checking; values are checked on decode.
      if (s.kind === "opaque" || d.kind === "opaque") return true;
      if (s.kind === "nullable") return compare(s.inner, d);
      if (d.kind === "nullable") return compare(s, d.inner);
      if (s.kind === "array" && d.kind === "array") return compare(s.element, d.element);
      if (s.kind === "record" && d.kind === "record") {
        return s.key === d.key && compare(s.value, d.value);
      }
      if (s.kind === "primitive" && d.kind === "primitive") return s.name === d.name;
      if (s.kind === "reference" && d.kind === "reference") {
        const srcRef = this.resolveLocal(src.owningPackage, s.name);
        const dstRef = this.resolveLocal(dst.owningPackage, d.name);
        if (srcRef && dstRef) {
          found.nested = this.objectMapping(srcRef, dstRef, new Map(), direction, path);
          return true;
        }
        return s.name === d.name;
      }
      return false;
    };

    if (!compare(describeType(source.declaredType), describeType(target.declaredType))) {
      this.fail(
        `incompatible types at ${path}: ${source.declaredType} (${src.name}.${source.name}) ` +
          `cannot be converted to ${target.declaredType} (${dst.name}.${target.name})`
      );
    }
    return found.nested;
  }

  zeroFor(type: string, pkg: string, seen: Set<string>): unknown {
    const shape = describeType(type);
    if (shape.kind !== "reference") return zeroValueOf(shape);
    const ref = this.resolveLocal(pkg, shape.name);
    const key = `${pkg}.${shape.name}`;
    if (!ref || seen.has(key)) return undefined;
    seen.add(key);
    const zero: Record<string, unknown> = {};
    for (const field of ref.fields) {
      if (!field.required) continue;
      const value = this.zeroFor(field.declaredType, pkg, seen);
      if (value !== undefined) zero[wireKey(field)] = value;
    }
    seen.delete(key);
    return zero;
  }
}

function parseRenames(renames: FieldRename[]): ParsedRename[] {
  return renames.map((r) => {
    const from = splitSection(r.from);
    const to = splitSection(r.to);
    const section = from.section ?? to.section;
    const parsed: ParsedRename = { from: from.field, to: to.field };
    if (section) parsed.section = section;
    return parsed;
  });
}

/**
 * Resolve renames for one section. Returns hub-field -> spoke-field (for the
 * `to` direction) and spoke-field -> hub-field (for `from`), keyed by field name.
 */
function sectionRenames(
  builder: PlanBuilder,
  renames: ParsedRename[],
  raw: FieldRename[],
  section: Section,
  spoke: TypeInfo,
  hub: TypeInfo,
  used: boolean[]
): { to: Map<string, string>; from: Map<string, string> } {
  const to = new Map<string, string>();
  const from = new Map<string, string>();
  renames.forEach((rename, i) => {
    if (rename.section && rename.section !== section) return;
    const spokeField = findField(spoke.fields, rename.from);
    const hubField = findField(hub.fields, rename.to);
    if (rename.section && (!spokeField || !hubField)) {
      const missing = !spokeField ? `${spoke.name}.${rename.from}` : `${hub.name}.${rename.to}`;
      builder.fail(`rename ${raw[i]?.from} -> ${raw[i]?.to}: no field ${missing}`);
    }
    if (!spokeField || !hubField) return;
    to.set(hubField.name, spokeField.name);
    from.set(spokeField.name, hubField.name);
    used[i] = true;
  });
  return { to, from };
}

function lookupKindTypes(
  registry: SchemaRegistry,
  catalog: TypeCatalog,
  group: string,
  version: string,
  kind: string,
  localPackage: (group: string, version: string) => string
): { spec: TypeInfo; status: TypeInfo } {
  const local = localPackage(group, version);
  const exposure = registry.importsFor(group, kind, version);
  if (!exposure) {
    return {
      spec: catalog.getTypeInfo(local, `${kind}Spec`),
      status: catalog.getTypeInfo(local, `${kind}Status`),
    };
  }

  const pinned = catalog.getModuleVersion(exposure.module);
  if (pinned !== exposure.tag) {
    throw new CatalogLookupError(
      `module ${exposure.module} must be pinned at ${exposure.tag} (catalog has ${pinned ?? "none"})`,
      exposure.module
    );
  }
  const lookup = (qualified: string): TypeInfo => {
    const q = parseQualifiedType(qualified);
    if (!q) {
      throw new CatalogLookupError(`'${qualified}' is not a qualified type`, exposure.packagePath);
    }
    return catalog.getTypeInfo(q.packagePath, q.typeName);
  };
  return {
    spec: lookup(exposure.specFrom),
    status: exposure.statusFrom
      ? lookup(exposure.statusFrom)
      : catalog.getTypeInfo(local, `${kind}Status`),
  };
}

function buildSpokeShape(catalog: TypeCatalog, spec: TypeInfo, status: TypeInfo): SpokeShape {
  const types: Record<string, ShapeField[]> = {};
  const visit = (info: TypeInfo): string => {
    const key = `${info.owningPackage}.${info.name}`;
    if (types[key]) return key;
    const fields: ShapeField[] = [];
    types[key] = fields;
    for (const field of info.fields) {
      const shapeField: ShapeField = {
        key: wireKey(field),
        type: field.declaredType,
        required: field.required,
      };
      const refName = innermostReference(describeType(field.declaredType));
      if (refName && !refName.includes(".") && catalog.hasType(info.owningPackage, refName)) {
        shapeField.ref = visit(catalog.getTypeInfo(info.owningPackage, refName));
      }
      fields.push(shapeField);
    }
    return key;
  };
  return { spec: visit(spec), status: visit(status), types };
}

function unconsumed(fields: ShapeField[], to: ObjectMapping, shape: SpokeShape, path: string): string[] {
  const lossy: string[] = [];
  for (const field of fields) {
    const mapped = to.fields.find((f) => f.source === field.key);
    const fieldPath = `${path}.${field.key}`;
    if (!mapped) {
      lossy.push(fieldPath);
      continue;
    }
    const nested = field.ref ? shape.types[field.ref] : undefined;
    if (mapped.nested && nested) lossy.push(...unconsumed(nested, mapped.nested, shape, fieldPath));
  }
  return lossy;
}

/** Build the plan for one spoke version of one kind. */
export function planConversion(
  registry: SchemaRegistry,
  catalog: TypeCatalog,
  groupName: string,
  version: string,
  kind: string,
  options: GenerateOptions = {}
): ConversionPlan {
  const group = registry.resolve(groupName, version);
  if (!group) {
    throw new ConversionGenerationError("version is not registered", groupName, version, kind);
  }
  if (!registry.getResource(groupName, kind)) {
    throw new ConversionGenerationError("kind is not a declared resource", groupName, version, kind);
  }

  const localPackage = options.localPackage ?? defaultLocalPackage;
  const hubVersion = group.storageVersion;
  const spoke = lookupKindTypes(registry, catalog, groupName, version, kind, localPackage);
  const hub = lookupKindTypes(registry, catalog, groupName, hubVersion, kind, localPackage);

  const builder = new PlanBuilder(catalog, groupName, version, kind, options);
  const raw = registry.renamesFor(groupName, kind, version);
  const renames = parseRenames(raw);
  const used = renames.map(() => false);

  const section = (name: Section): SectionPlan => {
    const r = sectionRenames(builder, renames, raw, name, spoke[name], hub[name], used);
    return {
      to: builder.objectMapping(spoke[name], hub[name], r.to, "to", name),
      from: builder.objectMapping(hub[name], spoke[name], r.from, "from", name),
    };
  };
  const spec = section("spec");
  const status = section("status");

  used.forEach((ok, i) => {
    if (!ok) builder.fail(`rename ${raw[i]?.from} -> ${raw[i]?.to} matches no spoke/hub field pair`);
  });
  const spokeShape = buildSpokeShape(catalog, spoke.spec, spoke.status);

  return {
    group: groupName,
    version,
    hubVersion,
    kind,
    spec,
    status,
    spokeShape,
    lossy: [
      ...unconsumed(spokeShape.types[spokeShape.spec] ?? [], spec.to, spokeShape, "spec"),
      ...unconsumed(spokeShape.types[spokeShape.status] ?? [], status.to, spokeShape, "status"),
    ],
  };
}

/** Plans for every (group, version, kind), the hub version included. */
export function generateConversions(
  registry: SchemaRegistry,
  catalog: TypeCatalog,
  options: GenerateOptions = {}
): ConversionPlan[] {
  const logger = options.logger ?? silentLogger;
  const plans: ConversionPlan[] = [];
  for (const group of registry.listGroups()) {
    for (const resource of group.resources) {
      for (const version of group.versions) {
        const plan = planConversion(registry, catalog, group.name, version, resource.kind, options);
        if (plan.lossy.length > 0) {
          logger.warn(
            `${formatApiVersion(group.name, version)} ${resource.kind}: ` +
              `not stored by hub ${plan.hubVersion}: ${plan.lossy.join(", ")}`
          );
        }
        plans.push(plan);
      }
    }
  }
  return plans;
}

/** Pin every import of every group in the catalog. */
export function pinModules(registry: SchemaRegistry, catalog: TypeCatalog): void {
  for (const group of registry.listGroups()) {
    for (const imp of group.imports) {
      catalog.addModule(imp.module, imp.tag);
    }
  }
}

// --- Reporting ---

function describeMapping(mapping: ObjectMapping, indent: string, lines: string[]): void {
  for (const field of mapping.fields) {
    if (field.source !== undefined) {
      const via = field.matchedBy === "name" ? "" : ` [${field.matchedBy}]`;
      lines.push(`${indent}${field.target} <- ${field.source}${via}`);
      if (field.nested) describeMapping(field.nested, `${indent}  `, lines);
    } else if (field.zero !== undefined) {
      lines.push(`${indent}${field.target} = ${JSON.stringify(field.zero)} (no source field)`);
    } else {
      lines.push(`${indent}${field.target} (omitted, no source field)`);
    }
  }
}

export function describePlan(plan: ConversionPlan): string {
  const lines = [
    `${formatApiVersion(plan.group, plan.version)} ${plan.kind} <-> hub ${plan.hubVersion}`,
  ];
  for (const name of ["spec", "status"] as const) {
    lines.push(`  ${name} (to hub):`);
    describeMapping(plan[name].to, "    ", lines);
    lines.push(`  ${name} (from hub):`);
    describeMapping(plan[name].from, "    ", lines);
  }
  if (plan.lossy.length > 0) lines.push(`  lossy: ${plan.lossy.join(", ")}`);
  return lines.join("\n");
}

export function lossyFields(plan: ConversionPlan): string[] {
  return [...plan.lossy];
}
