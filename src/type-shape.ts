// Structured view over normalized declared-type strings.
//
// Grammar produced by the catalog:
//   string | number | boolean | null | unknown
//   Name | ns.Name            (references)
//   T[]  | (T | null)[]       (arrays)
//   Record<K, V>
//   T | null                  (nullable, the pointer analogue)

export const OPAQUE_TYPE = "unknown";

export type PrimitiveName = "string" | "number" | "boolean" | "null";

export type TypeShape =
  | { kind: "primitive"; name: PrimitiveName }
  | { kind: "opaque" }
  | { kind: "reference"; name: string }
  | { kind: "array"; element: TypeShape }
  | { kind: "record"; key: string; value: TypeShape }
  | { kind: "nullable"; inner: TypeShape };

const PRIMITIVES = new Set<string>(["string", "number", "boolean", "null"]);
const REFERENCE = /^[A-Za-z_$][\w$]*(\.[A-Za-z_$][\w$]*)*$/;
const NULLABLE_SUFFIX = " | null";

function isPrimitiveName(name: string): name is PrimitiveName {
  return PRIMITIVES.has(name);
}

function topLevelComma(body: string): number {
  let depth = 0;
  for (let i = 0; i < body.length; i++) {
    const ch = body[i];
    if (ch === "<" || ch === "(") depth++;
    else if (ch === ">" || ch === ")") depth--;
    else if (ch === "," && depth === 0) return i;
  }
  return -1;
}

export function describeType(type: string): TypeShape {
  const t = type.trim();
  if (t.endsWith(NULLABLE_SUFFIX)) {
    return {
      kind: "nullable",
      inner: describeType(t.slice(0, -NULLABLE_SUFFIX.length)),
    };
  }
  if (t.endsWith("[]")) {
    let element = t.slice(0, -2);
    if (element.startsWith("(") && element.endsWith(")")) {
      element = element.slice(1, -1);
    }
    return { kind: "array", element: describeType(element) };
  }
  if (t.startsWith("Record<") && t.endsWith(">")) {
    const body = t.slice("Record<".length, -1);
    const comma = topLevelComma(body);
    if (comma === -1) return { kind: "opaque" };
    return {
      kind: "record",
      key: body.slice(0, comma).trim(),
      value: describeType(body.slice(comma + 1)),
    };
  }
  if (isPrimitiveName(t)) return { kind: "primitive", name: t };
  if (t === OPAQUE_TYPE) return { kind: "opaque" };
  if (REFERENCE.test(t)) return { kind: "reference", name: t };
  return { kind: "opaque" };
}

export function formatType(shape: TypeShape): string {
  switch (shape.kind) {
    case "primitive":
      return shape.name;
    case "opaque":
      return OPAQUE_TYPE;
    case "reference":
      return shape.name;
    case "array": {
      const element = formatType(shape.element);
      return shape.element.kind === "nullable" ? `(${element})[]` : `${element}[]`;
    }
    case "record":
      return `Record<${shape.key}, ${formatType(shape.value)}>`;
    case "nullable":
      return `${formatType(shape.inner)}${NULLABLE_SUFFIX}`;
  }
}

/** Zero value for a declared type; undefined when there is none (references, opaque). */
export function zeroValueOf(shape: TypeShape): unknown {
  switch (shape.kind) {
    case "primitive":
      if (shape.name === "string") return "";
      if (shape.name === "number") return 0;
      if (shape.name === "boolean") return false;
      return null;
    case "array":
      return [];
    case "record":
      return {};
    case "nullable":
      return null;
    default:
      return undefined;
  }
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Check a JSON value against a shape. References are delegated to
 * `checkReference`, which returns an error message or null.
 * Returns a description of the first mismatch, or null.
 */
export function checkValue(
  value: unknown,
  shape: TypeShape,
  path: string,
  checkReference: (value: unknown, name: string, path: string) => string | null = () => null
): string | null {
  switch (shape.kind) {
    case "opaque":
      return null;
    case "primitive":
      if (shape.name === "null") return value === null ? null : `${path}: expected null`;
      return typeof value === shape.name
        ? null
        : `${path}: expected ${shape.name}, got ${jsonTypeOf(value)}`;
    case "nullable":
      return value === null ? null : checkValue(value, shape.inner, path, checkReference);
    case "array": {
      if (!Array.isArray(value)) return `${path}: expected array, got ${jsonTypeOf(value)}`;
      for (let i = 0; i < value.length; i++) {
        const err = checkValue(value[i], shape.element, `${path}[${i}]`, checkReference);
        if (err) return err;
      }
      return null;
    }
    case "record": {
      if (!isPlainObject(value)) return `${path}: expected object, got ${jsonTypeOf(value)}`;
      for (const [key, entry] of Object.entries(value)) {
        const err = checkValue(entry, shape.value, `${path}.${key}`, checkReference);
        if (err) return err;
      }
      return null;
    }
    case "reference":
      return checkReference(value, shape.name, path);
  }
}

export function jsonTypeOf(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}
