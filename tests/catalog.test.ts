import { describe, it, expect } from "vitest";
import { mkdirSync, mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import ts from "typescript";
import { TypeCatalog, extractWireTag, normalizeTypeNode } from "../src/catalog.js";
import { CatalogLookupError } from "../src/errors.js";
import type { Logger } from "../src/logger.js";
import { FIXTURE_TYPES } from "./helpers.js";

function normalize(typeText: string): string {
  const source = ts.createSourceFile("t.ts", `type T = ${typeText};`, ts.ScriptTarget.Latest, true);
  const statement = source.statements[0];
  if (!statement || !ts.isTypeAliasDeclaration(statement)) throw new Error("not a type alias");
  return normalizeTypeNode(statement.type);
}

function recordingLogger(): Logger & { warnings: string[] } {
  const warnings: string[] = [];
  return { warnings, info() {}, warn: (m) => warnings.push(m), error() {} };
}

function tempDir(files: Record<string, string>): string {
  const dir = mkdtempSync(join(tmpdir(), "spokehub-catalog-"));
  for (const [name, content] of Object.entries(files)) {
    const path = join(dir, name);
    mkdirSync(join(path, ".."), { recursive: true });
    writeFileSync(path, content, "utf-8");
  }
  return dir;
}

describe("extractWireTag", () => {
  it("drops options after the comma", () => {
    expect(extractWireTag('`json:"ipAddress,omitempty"`')).toBe("ipAddress");
    expect(extractWireTag('json:"ipAddress,omitempty"')).toBe("ipAddress");
    expect(extractWireTag('"ipAddress,omitempty"')).toBe("ipAddress");
    expect(extractWireTag("ipAddress,omitempty")).toBe("ipAddress");
  });

  it("picks the json key out of several struct tags", () => {
    expect(extractWireTag('`yaml:"ip" json:"ipAddress,omitempty"`')).toBe("ipAddress");
  });

  it("keeps plain names and the exclusion marker", () => {
    expect(extractWireTag("name")).toBe("name");
    expect(extractWireTag('`json:"-"`')).toBe("-");
    expect(extractWireTag("")).toBe("");
  });
});

describe("normalizeTypeNode", () => {
  it("keeps primitives and references", () => {
    expect(normalize("string")).toBe("string");
    expect(normalize("number")).toBe("number");
    expect(normalize("boolean")).toBe("boolean");
    expect(normalize("null")).toBe("null");
    expect(normalize("DeviceCondition")).toBe("DeviceCondition");
    expect(normalize("v1.DeviceSpec")).toBe("v1.DeviceSpec");
  });

  it("normalizes arrays and maps", () => {
    expect(normalize("string[]")).toBe("string[]");
    expect(normalize("Array<number>")).toBe("number[]");
    expect(normalize("(string | null)[]")).toBe("(string | null)[]");
    expect(normalize("Array<string | null>")).toBe("(string | null)[]");
    expect(normalize("Record<string, number>")).toBe("Record<string, number>");
    expect(normalize("{ [key: string]: boolean }")).toBe("Record<string, boolean>");
  });

  it("treats null unions as nullable and drops undefined", () => {
    expect(normalize("string | null")).toBe("string | null");
    expect(normalize("null | DeviceCondition")).toBe("DeviceCondition | null");
    expect(normalize("string | undefined")).toBe("string");
    expect(normalize("string | null | undefined")).toBe("string | null");
  });

  it("degrades unsupported shapes to unknown", () => {
    expect(normalize("string | number")).toBe("unknown");
    expect(normalize('"up" | "down"')).toBe("unknown");
    expect(normalize("Promise<string>")).toBe("unknown");
    expect(normalize("{ a: string; b: number }")).toBe("unknown");
    expect(normalizeTypeNode(undefined)).toBe("unknown");
  });
});

describe("TypeCatalog", () => {
  it("hands out field lists that cannot be changed", () => {
    const catalog = new TypeCatalog();
    catalog.registerType({ name: "Spec", owningPackage: "pkg", fields: [] });

    const extra = { name: "x", declaredType: "string", wireTag: "", required: true };
    expect(() => catalog.getFields("pkg", "Spec").push(extra)).toThrow(TypeError);
    expect(catalog.getFields("pkg", "Spec")).toEqual([]);
  });

  it("loads one package per version directory", () => {
    const catalog = new TypeCatalog();
    catalog.loadFromDirectory(FIXTURE_TYPES, "apis");

    expect(catalog.listPackages()).toEqual([
      "apis/infra.example.io/v1",
      "apis/infra.example.io/v1alpha1",
      "apis/infra.example.io/v1beta1",
      "apis/net.example.io/v1",
      "apis/net.example.io/v1alpha1",
    ]);
    expect(catalog.listTypes("apis/infra.example.io/v1")).toEqual([
      "DeviceCondition",
      "DeviceSpec",
      "DeviceStatus",
    ]);
  });

  it("reads wire tags from @json, without the omitempty option", () => {
    const catalog = new TypeCatalog();
    catalog.loadFromDirectory(FIXTURE_TYPES, "apis");

    expect(catalog.getFields("apis/infra.example.io/v1alpha1", "DeviceSpec")).toEqual([
      { name: "name", declaredType: "string", wireTag: "name", required: true },
      { name: "ipAddress", declaredType: "string", wireTag: "ipAddress", required: true },
      { name: "location", declaredType: "string", wireTag: "location", required: false },
      { name: "deviceType", declaredType: "string", wireTag: "", required: true },
      { name: "description", declaredType: "string", wireTag: "", required: false },
    ]);
  });

  it("records nullable, array and map field types", () => {
    const catalog = new TypeCatalog();
    catalog.loadFromDirectory(FIXTURE_TYPES, "apis");

    const status = catalog.getFields("apis/infra.example.io/v1", "DeviceStatus");
    expect(status.find((f) => f.name === "lastChecked")?.declaredType).toBe("string | null");
    expect(status.find((f) => f.name === "conditions")?.declaredType).toBe("DeviceCondition[]");
    const spec = catalog.getFields("apis/infra.example.io/v1", "DeviceSpec");
    expect(spec.find((f) => f.name === "tags")?.declaredType).toBe("Record<string, string>");
  });

  it("fails lookups for types that were never scanned", () => {
    const catalog = new TypeCatalog();
    expect(() => catalog.getTypeInfo("@acme/device-types/device", "Spec")).toThrow(CatalogLookupError);
    expect(() => catalog.getTypeInfo("@acme/device-types/device", "Spec")).toThrow(
      "type @acme/device-types/device.Spec not found in catalog; declare it via an explicit import in apis.yaml"
    );
  });

  it("flattens interface inheritance within a package", () => {
    const dir = tempDir({
      "types.ts": `
        export interface Base { id: string; name?: string }
        export interface Child extends Base { name: string; extra: number }
      `,
    });
    const catalog = new TypeCatalog();
    catalog.scanLocalPackage(dir, "pkg");

    expect(catalog.getFields("pkg", "Child").map((f) => [f.name, f.required])).toEqual([
      ["id", true],
      ["name", true],
      ["extra", true],
    ]);
  });

  it("reads type literal aliases and classes, and skips excluded fields", () => {
    const dir = tempDir({
      "types.ts": `
        export type Port = { number: number; protocol?: string };
        export class Gateway {
          host: string = "";
          port?: Port;
          /** @json \`json:"-"\` */
          secret?: string;
        }
      `,
    });
    const catalog = new TypeCatalog();
    expect(catalog.scanLocalPackage(dir, "pkg")).toBe(2);

    expect(catalog.getFields("pkg", "Port").map((f) => f.name)).toEqual(["number", "protocol"]);
    expect(catalog.getFields("pkg", "Gateway")).toEqual([
      { name: "host", declaredType: "string", wireTag: "", required: true },
      { name: "port", declaredType: "Port", wireTag: "", required: false },
    ]);
  });

  it("skips files with syntax errors and test files", () => {
    const dir = tempDir({
      "good.ts": "export interface Good { ok: boolean }",
      "bad.ts": "export interface Broken {",
      "good.test.ts": "export interface FromTest { x: string }",
    });
    const logger = recordingLogger();
    const catalog = new TypeCatalog({ logger });

    expect(catalog.scanLocalPackage(dir, "pkg")).toBe(1);
    expect(catalog.listTypes("pkg")).toEqual(["Good"]);
    expect(logger.warnings).toEqual([`skipping ${join(dir, "bad.ts")}: syntax errors`]);
  });

  it("skips declaration files in local packages", () => {
    const dir = tempDir({
      "types.ts": "export interface Local { ok: boolean }",
      "ambient.d.ts": "export interface FromDeclaration { x: string }",
    });
    const catalog = new TypeCatalog();

    expect(catalog.scanLocalPackage(dir, "pkg")).toBe(1);
    catalog.loadFromDirectory(dir, "tree");
    expect(catalog.listTypes("pkg")).toEqual(["Local"]);
    expect(catalog.listTypes("tree")).toEqual(["Local"]);
  });

  it("warns about duplicate type names in one package", () => {
    const dir = tempDir({
      "a.ts": "export interface Spec { a: string }",
      "b.ts": "export interface Spec { b: string }",
    });
    const logger = recordingLogger();
    const catalog = new TypeCatalog({ logger });

    expect(catalog.scanLocalPackage(dir, "pkg")).toBe(1);
    expect(logger.warnings).toEqual(["duplicate type Spec in package pkg; keeping the last one"]);
  });

  describe("pinned modules", () => {
    function moduleTree(version: string): string {
      return tempDir({
        "node_modules/@acme/device-types/package.json": JSON.stringify({ name: "@acme/device-types", version }),
        "node_modules/@acme/device-types/device/types.ts": `
          export interface Spec {
            /** @json ipAddress,omitempty */
            ip: string;
          }
        `,
      });
    }

    it("loads a module whose version matches the pin", () => {
      const base = moduleTree("1.2.0");
      const catalog = new TypeCatalog();
      catalog.addModule("@acme/device-types", "v1.2.0");

      expect(catalog.resolveModules(base)).toBe(1);
      expect(catalog.getFields("@acme/device-types/device", "Spec")).toEqual([
        { name: "ip", declaredType: "string", wireTag: "ipAddress", required: true },
      ]);
      expect(catalog.listModules()).toEqual([{ modulePath: "@acme/device-types", versionTag: "v1.2.0" }]);
    });

    it("rejects a module at a different version", () => {
      const base = moduleTree("1.3.0");
      const catalog = new TypeCatalog();
      catalog.addModule("@acme/device-types", "v1.2.0");

      expect(() => catalog.resolveModules(base)).toThrow(
        `module @acme/device-types is pinned at v1.2.0 but ${join(base, "node_modules", "@acme/device-types")} has version 1.3.0`
      );
    });

    it("reads declaration files shipped by a module", () => {
      const base = tempDir({
        "node_modules/@acme/device-types/package.json": JSON.stringify({ name: "@acme/device-types", version: "1.2.0" }),
        "node_modules/@acme/device-types/index.d.ts": "export interface Spec { ip: string; port?: number }",
      });
      const catalog = new TypeCatalog();
      catalog.addModule("@acme/device-types", "v1.2.0");

      expect(catalog.resolveModules(base)).toBe(1);
      expect(catalog.getFields("@acme/device-types", "Spec")).toEqual([
        { name: "ip", declaredType: "string", wireTag: "", required: true },
        { name: "port", declaredType: "number", wireTag: "", required: false },
      ]);
    });

    it("reports a malformed module manifest as a catalog error", () => {
      const base = tempDir({ "node_modules/@acme/device-types/package.json": "{ not json" });
      const catalog = new TypeCatalog();
      catalog.addModule("@acme/device-types", "v1.2.0");

      expect(() => catalog.resolveModules(base)).toThrow(CatalogLookupError);
      expect(() => catalog.resolveModules(base)).toThrow(
        `module @acme/device-types: cannot read ${join(base, "node_modules", "@acme/device-types", "package.json")}:`
      );
    });

    it("refuses modules that were never pinned", () => {
      const catalog = new TypeCatalog();
      expect(() => catalog.loadModule("@acme/device-types", "/tmp")).toThrow(
        "module @acme/device-types is not pinned; add it to apis.yaml imports"
      );
    });
  });
});
