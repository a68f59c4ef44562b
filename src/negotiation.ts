// Version Negotiation: per-request version resolution, decoding and hub conversion.
//
//   ReceiveRequest -> ResolveVersion -> DecodeAsSpoke -> ConvertToHub
//     -> Dispatch -> ConvertHubToResponseSpoke -> EncodeResponse
//
// Everything past ConvertToHub sees hub-shaped values only.

import type { ConversionRegistry } from "./converter.js";
import { readMetadata } from "./envelope.js";
import {
  RequestAbortedError,
  RequestDecodeError,
  RequestVersionError,
  RuntimeConversionError,
  type VersionSource,
} from "./errors.js";
import type { ConversionPlan, ShapeField, SpokeShape } from "./generator.js";
import { silentLogger, type Logger } from "./logger.js";
import type { JsonObject, VersionedEnvelope } from "./model.js";
import { formatApiVersion, parseApiVersion, type SchemaRegistry } from "./registry.js";
import { checkValue, describeType, isPlainObject, jsonTypeOf } from "./type-shape.js";

// --- ResolveVersion ---

const VERSION_PARAMS = ["api-version", "version", "v"];

/**
 * The version parameter of the first media range carrying one. Within a
 * range `api-version` wins over its aliases `version` and `v`.
 *
 *   "application/json; api-version=infra.example.io/v1beta1" -> "infra.example.io/v1beta1"
 *   "application/json;v=v1beta1"                              -> "v1beta1"
 */
export function parseAcceptVersion(accept: string | null | undefined): string | null {
  if (!accept) return null;
  for (const range of accept.split(",")) {
    const params = new Map<string, string>();
    for (const param of range.split(";").slice(1)) {
      const eq = param.indexOf("=");
      if (eq === -1) continue;
      const name = param.slice(0, eq).trim().toLowerCase();
      const value = param.slice(eq + 1).trim().replace(/^"|"$/g, "");
      if (value && !params.has(name)) params.set(name, value);
    }
    for (const name of VERSION_PARAMS) {
      const value = params.get(name);
      if (value !== undefined) return value;
    }
  }
  return null;
}

export interface VersionRequest {
  body?: unknown;
  accept?: string | null;
}

export interface ResolvedVersion {
  group: string;
  version: string;
  source: VersionSource;
}

/**
 * Pick the version a caller intends: body `apiVersion`, then the Accept
 * `api-version` parameter, then the group's preferred version. An explicit
 * version that is not registered is rejected; there is no fallback.
 */
export function resolveVersion(
  registry: SchemaRegistry,
  groupName: string,
  request: VersionRequest
): ResolvedVersion {
  const supported = registry.getGroup(groupName)?.versions ?? [];

  let requested: string | null = null;
  let source: VersionSource = "default";
  if (isPlainObject(request.body) && request.body["apiVersion"] !== undefined) {
    const apiVersion = request.body["apiVersion"];
    if (typeof apiVersion !== "string") {
      throw new RequestDecodeError(`expected string, got ${jsonTypeOf(apiVersion)}`, "apiVersion");
    }
    requested = apiVersion;
    source = "body";
  }
  if (requested === null) {
    requested = parseAcceptVersion(request.accept);
    if (requested !== null) source = "accept";
  }
  if (requested === null) {
    return { group: groupName, version: registry.getPreferredVersion(groupName), source };
  }

  const { group, version } = parseApiVersion(requested);
  if ((group !== "" && group !== groupName) || !registry.isVersionSupported(groupName, version)) {
    throw new RequestVersionError(requested, supported, source);
  }
  return { group: groupName, version, source };
}

// --- DecodeAsSpoke ---

function checkFields(
  value: JsonObject,
  fields: ShapeField[],
  shape: SpokeShape,
  path: string
): string | null {
  const known = new Map(fields.map((f) => [f.key, f]));
  for (const key of Object.keys(value)) {
    if (!known.has(key)) return `${path}.${key}: unknown field`;
  }
  for (const field of fields) {
    const fieldValue = Object.hasOwn(value, field.key) ? value[field.key] : undefined;
    if (fieldValue === undefined) continue;
    if (fieldValue === null && !field.required) continue;
    const err = checkValue(fieldValue, describeType(field.type), `${path}.${field.key}`, (v, _name, p) => {
      const nested = field.ref ? shape.types[field.ref] : undefined;
      if (!nested) return null;
      if (!isPlainObject(v)) return `${p}: expected object, got ${jsonTypeOf(v)}`;
      return checkFields(v, nested, shape, p);
    });
    if (err) return err;
  }
  return null;
}

/** Materialize a request body as a value of the plan's spoke type. */
export function decodeAsSpoke(body: unknown, plan: ConversionPlan): VersionedEnvelope {
  if (!isPlainObject(body)) {
    throw new RequestDecodeError(`request body must be a JSON object, got ${jsonTypeOf(body)}`);
  }

  const kind = body["kind"] ?? plan.kind;
  if (kind !== plan.kind) {
    throw new RequestDecodeError(`expected ${plan.kind}, got ${JSON.stringify(kind)}`, "kind");
  }

  const metadata = readMetadata(body["metadata"]);
  if (typeof metadata === "string") throw new RequestDecodeError(metadata);

  const shape = plan.spokeShape;
  const sections: Record<"spec" | "status", JsonObject> = { spec: {}, status: {} };
  for (const section of ["spec", "status"] as const) {
    const raw = body[section];
    if (raw === undefined) {
      if (section === "spec") throw new RequestDecodeError("missing required object", "spec");
      continue;
    }
    if (!isPlainObject(raw)) {
      throw new RequestDecodeError(`expected object, got ${jsonTypeOf(raw)}`, section);
    }
    const err = checkFields(raw, shape.types[shape[section]] ?? [], shape, section);
    if (err) throw new RequestDecodeError(err);
    sections[section] = raw;
  }

  return {
    apiVersion: formatApiVersion(plan.group, plan.version),
    kind: plan.kind,
    metadata,
    spec: sections.spec,
    status: sections.status,
  };
}

// --- Pipeline ---

export type NegotiationState =
  | "ReceiveRequest"
  | "ResolveVersion"
  | "DecodeAsSpoke"
  | "ConvertToHub"
  | "Dispatch"
  | "ConvertHubToResponseSpoke"
  | "EncodeResponse";

export interface NegotiationRequest {
  group: string;
  kind: string;
  body?: unknown;          // undefined for reads
  accept?: string | null;
  signal?: AbortSignal;
}

export type DispatchResult = VersionedEnvelope | VersionedEnvelope[] | null;

/** Receives the hub value (undefined for reads) and returns hub values. */
export type Dispatch = (hub: VersionedEnvelope | undefined) => Promise<DispatchResult>;

export interface NegotiatedResponse {
  group: string;
  version: string;
  apiVersion: string;
  source: VersionSource;
  body: DispatchResult;
}

export interface VersionNegotiatorOptions {
  logger?: Logger;
  onState?: (state: NegotiationState) => void;
}

export class VersionNegotiator {
  private readonly logger: Logger;
  private readonly onState: (state: NegotiationState) => void;

  constructor(
    private readonly registry: SchemaRegistry,
    private readonly conversions: ConversionRegistry,
    options: VersionNegotiatorOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
    this.onState = options.onState ?? (() => {});
  }

  async handle(request: NegotiationRequest, dispatch: Dispatch): Promise<NegotiatedResponse> {
    this.onState("ReceiveRequest");

    this.onState("ResolveVersion");
    const resolved = resolveVersion(this.registry, request.group, request);
    const plan = this.conversions.getPlan(request.group, resolved.version, request.kind);
    const converter = this.conversions.get(request.group, resolved.version, request.kind);
    if (!plan || !converter) {
      return this.drift(
        "ResolveVersion",
        new RuntimeConversionError(
          `no converter for ${formatApiVersion(request.group, resolved.version)} ${request.kind}`
        )
      );
    }

    let hub: VersionedEnvelope | undefined;
    if (request.body !== undefined) {
      this.onState("DecodeAsSpoke");
      const spoke = decodeAsSpoke(request.body, plan);

      this.onState("ConvertToHub");
      hub = this.convert("ConvertToHub", () => converter.convertTo(spoke));
    }

    if (request.signal?.aborted) throw new RequestAbortedError();
    this.onState("Dispatch");
    const result = await dispatch(hub);

    this.onState("ConvertHubToResponseSpoke");
    const body = this.convert("ConvertHubToResponseSpoke", () => {
      if (result === null) return null;
      if (Array.isArray(result)) return result.map((r) => converter.convertFrom(r));
      return converter.convertFrom(result);
    });

    this.onState("EncodeResponse");
    return {
      group: request.group,
      version: resolved.version,
      apiVersion: formatApiVersion(request.group, resolved.version),
      source: resolved.source,
      body,
    };
  }

  private convert<T>(state: NegotiationState, run: () => T): T {
    try {
      return run();
    } catch (err) {
      if (err instanceof RuntimeConversionError) return this.drift(state, err);
      throw err;
    }
  }

  private drift(state: NegotiationState, err: RuntimeConversionError): never {
    this.logger.error(`${state}: generated conversion failed (plans and config out of sync?): ${err.message}`);
    throw err;
  }
}
