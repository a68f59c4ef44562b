// Conversion runtime: pure converters compiled from generated plans.
//
// Compiled converters hold no mutable state and do no I/O; they are shared
// across concurrent requests without locking.

import { readFileSync, writeFileSync } from "node:fs";
import { readEnvelope } from "./envelope.js";
import { RuntimeConversionError } from "./errors.js";
import type { ConversionPlan, FieldMapping, ObjectMapping } from "./generator.js";
import type { Converter, JsonObject, VersionedEnvelope } from "./model.js";
import { formatApiVersion, parseApiVersion } from "./registry.js";
import { describeType, isPlainObject, jsonTypeOf, type TypeShape } from "./type-shape.js";

interface CompiledField {
  target: string;
  source?: string;
  shape: TypeShape;
  zero?: unknown;
  nested?: CompiledMapping;
}

interface CompiledMapping {
  fields: CompiledField[];
}

function compileMapping(mapping: ObjectMapping): CompiledMapping {
  return {
    fields: mapping.fields.map((field: FieldMapping) => {
      const compiled: CompiledField = { target: field.target, shape: describeType(field.type) };
      if (field.source !== undefined) compiled.source = field.source;
      if (field.zero !== undefined) compiled.zero = field.zero;
      if (field.nested) compiled.nested = compileMapping(field.nested);
      return compiled;
    }),
  };
}

function acceptsNull(shape: TypeShape): boolean {
  return (
    shape.kind === "nullable" ||
    shape.kind === "opaque" ||
    (shape.kind === "primitive" && shape.name === "null")
  );
}

function convertValue(
  value: unknown,
  shape: TypeShape,
  nested: CompiledMapping | undefined,
  path: string
): unknown {
  if (!nested) return structuredClone(value);
  switch (shape.kind) {
    case "nullable":
      return value === null ? null : convertValue(value, shape.inner, nested, path);
    case "array":
      if (!Array.isArray(value)) {
        throw new RuntimeConversionError(`expected array, got ${jsonTypeOf(value)}`, path);
      }
      return value.map((v, i) => convertValue(v, shape.element, nested, `${path}[${i}]`));
    case "record": {
      if (!isPlainObject(value)) {
        throw new RuntimeConversionError(`expected object, got ${jsonTypeOf(value)}`, path);
      }
      const out: JsonObject = {};
      for (const [key, entry] of Object.entries(value)) {
        out[key] = convertValue(entry, shape.value, nested, `${path}.${key}`);
      }
      return out;
    }
    case "reference":
      return applyMapping(nested, value, path);
    default:
      return structuredClone(value);
  }
}

function applyMapping(mapping: CompiledMapping, source: unknown, path: string): JsonObject {
  if (!isPlainObject(source)) {
    throw new RuntimeConversionError(`expected object, got ${jsonTypeOf(source)}`, path);
  }
  const out: JsonObject = {};
  for (const field of mapping.fields) {
    const raw =
      field.source !== undefined && Object.hasOwn(source, field.source)
        ? source[field.source]
        : undefined;
    if (raw === undefined || (raw === null && !acceptsNull(field.shape))) {
      if (field.zero !== undefined) out[field.target] = structuredClone(field.zero);
      continue;
    }
    out[field.target] = convertValue(raw, field.shape, field.nested, `${path}.${field.target}`);
  }
  return out;
}

/** Compile a plan into its spoke<->hub converter pair over JSON envelopes. */
export function compileConverter(
  plan: ConversionPlan
): Converter<VersionedEnvelope, VersionedEnvelope> {
  const toSpec = compileMapping(plan.spec.to);
  const toStatus = compileMapping(plan.status.to);
  const fromSpec = compileMapping(plan.spec.from);
  const fromStatus = compileMapping(plan.status.from);
  const hubApiVersion = formatApiVersion(plan.group, plan.hubVersion);
  const spokeApiVersion = formatApiVersion(plan.group, plan.version);

  const convert = (
    input: VersionedEnvelope,
    expectedApiVersion: string,
    apiVersion: string,
    spec: CompiledMapping,
    status: CompiledMapping
  ): VersionedEnvelope => {
    if (input.kind !== plan.kind) {
      throw new RuntimeConversionError(`expected kind ${plan.kind}, got ${input.kind}`, "kind");
    }
    if (input.apiVersion !== expectedApiVersion) {
      throw new RuntimeConversionError(
        `expected apiVersion ${expectedApiVersion}, got ${input.apiVersion}`,
        "apiVersion"
      );
    }
    return {
      apiVersion,
      kind: input.kind,
      metadata: structuredClone(input.metadata),
      spec: applyMapping(spec, input.spec, "spec"),
      status: applyMapping(status, input.status, "status"),
    };
  };

  return {
    convertTo: (spoke) => convert(spoke, spokeApiVersion, hubApiVersion, toSpec, toStatus),
    convertFrom: (hub) => convert(hub, hubApiVersion, spokeApiVersion, fromSpec, fromStatus),
  };
}

export interface EnvelopeGuards<Hub, Spoke> {
  hub: (value: unknown) => value is Hub;
  spoke: (value: unknown) => value is Spoke;
}

/**
 * Wrap a compiled converter with type guards for strongly typed hub and
 * spoke values. Outputs failing their guard are conversion errors.
 */
export function typedConverter<Hub, Spoke>(
  plan: ConversionPlan,
  guards: EnvelopeGuards<Hub, Spoke>
): Converter<Hub, Spoke> {
  const base = compileConverter(plan);
  const envelope = (value: unknown, side: string): VersionedEnvelope => {
    const result = readEnvelope(value);
    if (typeof result === "string") throw new RuntimeConversionError(result, side);
    return result;
  };
  return {
    convertTo(spoke) {
      const hub = base.convertTo(envelope(spoke, "spoke"));
      if (!guards.hub(hub)) {
        throw new RuntimeConversionError(`result does not satisfy the ${plan.hubVersion} type`, "hub");
      }
      return hub;
    },
    convertFrom(hub) {
      const spoke = base.convertFrom(envelope(hub, "hub"));
      if (!guards.spoke(spoke)) {
        throw new RuntimeConversionError(`result does not satisfy the ${plan.version} type`, "spoke");
      }
      return spoke;
    },
  };
}

// --- Registry keyed by (group, version, kind) ---

interface Entry {
  plan: ConversionPlan;
  converter: Converter<VersionedEnvelope, VersionedEnvelope>;
}

const entryKey = (group: string, version: string, kind: string) =>
  `${formatApiVersion(group, version)}:${kind}`;

export class ConversionRegistry {
  private readonly entries = new Map<string, Entry>();

  static fromPlans(plans: ConversionPlan[]): ConversionRegistry {
    const registry = new ConversionRegistry();
    for (const plan of plans) registry.register(plan);
    return registry;
  }

  register(plan: ConversionPlan): void {
    this.entries.set(entryKey(plan.group, plan.version, plan.kind), {
      plan,
      converter: compileConverter(plan),
    });
  }

  has(group: string, version: string, kind: string): boolean {
    return this.entries.has(entryKey(group, version, kind));
  }

  get(group: string, version: string, kind: string): Converter<VersionedEnvelope, VersionedEnvelope> | undefined {
    return this.entries.get(entryKey(group, version, kind))?.converter;
  }

  getPlan(group: string, version: string, kind: string): ConversionPlan | undefined {
    return this.entries.get(entryKey(group, version, kind))?.plan;
  }

  listPlans(): ConversionPlan[] {
    return [...this.entries.values()].map((e) => e.plan);
  }

  /** Convert any registered spoke envelope to its hub form. */
  toHub(envelope: VersionedEnvelope): VersionedEnvelope {
    const { group, version } = parseApiVersion(envelope.apiVersion);
    return this.require(group, version, envelope.kind).convertTo(envelope);
  }

  /** Convert a hub envelope to the requested spoke version. */
  fromHub(hub: VersionedEnvelope, version: string): VersionedEnvelope {
    const { group } = parseApiVersion(hub.apiVersion);
    return this.require(group, version, hub.kind).convertFrom(hub);
  }

  private require(group: string, version: string, kind: string): Converter<VersionedEnvelope, VersionedEnvelope> {
    const converter = this.get(group, version, kind);
    if (!converter) {
      throw new RuntimeConversionError(
        `no converter registered for ${formatApiVersion(group, version)} ${kind}`
      );
    }
    return converter;
  }
}

// --- conversions.json ---

function isMapping(value: unknown): value is ObjectMapping {
  return isPlainObject(value) && Array.isArray(value["fields"]);
}

function isSection(value: unknown): boolean {
  return isPlainObject(value) && isMapping(value["to"]) && isMapping(value["from"]);
}

export function isConversionPlan(value: unknown): value is ConversionPlan {
  if (!isPlainObject(value)) return false;
  return (
    typeof value["group"] === "string" &&
    typeof value["version"] === "string" &&
    typeof value["hubVersion"] === "string" &&
    typeof value["kind"] === "string" &&
    isSection(value["spec"]) &&
    isSection(value["status"]) &&
    isPlainObject(value["spokeShape"]) &&
    Array.isArray(value["lossy"])
  );
}

export function writePlans(filePath: string, plans: ConversionPlan[]): void {
  writeFileSync(filePath, JSON.stringify({ plans }, null, 2) + "\n", "utf-8");
}

export function loadPlans(filePath: string): ConversionPlan[] {
  const data: unknown = JSON.parse(readFileSync(filePath, "utf-8"));
  const plans = isPlainObject(data) ? data["plans"] : undefined;
  if (!Array.isArray(plans)) {
    throw new RuntimeConversionError(`${filePath}: missing "plans" array`);
  }
  return plans.map((plan, i) => {
    if (!isConversionPlan(plan)) {
      throw new RuntimeConversionError(`${filePath}: plans[${i}] is not a conversion plan`);
    }
    return plan;
  });
}
