// Type Catalog: static field metadata for spec/status types.
//
// Types come from local `apis/<group>/<version>/` sources or from external
// modules pinned in apis.yaml. Everything is keyed by (packagePath, typeName);
// nothing is guessed for types that were never scanned or registered.

import { existsSync, readdirSync, readFileSync, statSync } from "node:fs";
import { join, relative, sep } from "node:path";
import ts from "typescript";
import { CatalogLookupError, errorMessage } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import { deepFreeze, type FieldMeta, type TypeInfo } from "./model.js";
import { OPAQUE_TYPE } from "./type-shape.js";

const SKIPPED_DIRS = new Set(["node_modules", "dist", "build", "coverage"]);

// --- Wire tags ---

/**
 * Extract the wire name from a raw tag value.
 *
 *   `json:"ipAddress,omitempty"`  -> ipAddress
 *   "ipAddress,omitempty"         -> ipAddress
 *   ipAddress                     -> ipAddress
 */
export function extractWireTag(raw: string): string {
  let tag = raw.trim().replace(/^`+|`+$/g, "");
  const structTag = /(?:^|\s)json:"([^"]*)"/.exec(tag);
  if (structTag) {
    tag = structTag[1] ?? "";
  }
  tag = tag.trim().replace(/^["']+|["']+$/g, "");
  const comma = tag.indexOf(",");
  return (comma === -1 ? tag : tag.slice(0, comma)).trim();
}

// --- Type normalization ---

function entityNameToString(name: ts.EntityName): string {
  if (ts.isIdentifier(name)) return name.text;
  return `${entityNameToString(name.left)}.${name.right.text}`;
}

function wrapElement(type: string): string {
  return type.endsWith(" | null") ? `(${type})` : type;
}

function isNullType(node: ts.TypeNode): boolean {
  return ts.isLiteralTypeNode(node) && node.literal.kind === ts.SyntaxKind.NullKeyword;
}

/**
 * Normalize a type annotation to the catalog's string form. Shapes outside
 * the supported set degrade to the opaque marker instead of failing.
 */
export function normalizeTypeNode(node: ts.TypeNode | undefined): string {
  if (!node) return OPAQUE_TYPE;

  switch (node.kind) {
    case ts.SyntaxKind.StringKeyword:
      return "string";
    case ts.SyntaxKind.NumberKeyword:
      return "number";
    case ts.SyntaxKind.BooleanKeyword:
      return "boolean";
  }

  if (isNullType(node)) return "null";

  if (ts.isParenthesizedTypeNode(node)) return normalizeTypeNode(node.type);

  if (ts.isArrayTypeNode(node)) {
    return `${wrapElement(normalizeTypeNode(node.elementType))}[]`;
  }

  if (ts.isTypeReferenceNode(node)) {
    const name = entityNameToString(node.typeName);
    const args = node.typeArguments ?? [];
    if (args.length === 0) return name;
    if (name === "Array" && args.length === 1) {
      return `${wrapElement(normalizeTypeNode(args[0]))}[]`;
    }
    if (name === "Record" && args.length === 2) {
      return `Record<${normalizeTypeNode(args[0])}, ${normalizeTypeNode(args[1])}>`;
    }
    return OPAQUE_TYPE;
  }

  if (ts.isTypeLiteralNode(node) && node.members.length === 1) {
    const member = node.members[0];
    if (member && ts.isIndexSignatureDeclaration(member)) {
      const key = member.parameters[0];
      return `Record<${normalizeTypeNode(key?.type)}, ${normalizeTypeNode(member.type)}>`;
    }
    return OPAQUE_TYPE;
  }

  if (ts.isUnionTypeNode(node)) {
    let nullable = false;
    const rest: ts.TypeNode[] = [];
    for (const member of node.types) {
      if (isNullType(member)) nullable = true;
      else if (member.kind !== ts.SyntaxKind.UndefinedKeyword) rest.push(member);
    }
    if (rest.length !== 1) return OPAQUE_TYPE;
    const inner = normalizeTypeNode(rest[0]);
    if (!nullable || inner === OPAQUE_TYPE) return inner;
    return inner.endsWith(" | null") ? inner : `${inner} | null`;
  }

  return OPAQUE_TYPE;
}

// --- Declaration extraction ---

interface RawDeclaration {
  name: string;
  fields: FieldMeta[];
  bases: string[];         // same-package interfaces this one extends
}

function propertyName(name: ts.PropertyName): string | null {
  if (ts.isIdentifier(name) || ts.isStringLiteral(name) || ts.isNumericLiteral(name)) {
    return name.text;
  }
  return null;
}

function wireTagOf(member: ts.Node): string | null {
  for (const tag of ts.getJSDocTags(member)) {
    if (tag.tagName.text !== "json") continue;
    return extractWireTag(ts.getTextOfJSDocComment(tag.comment) ?? "");
  }
  return null;
}

function extractFields(members: ts.NodeArray<ts.TypeElement | ts.ClassElement>): FieldMeta[] {
  const fields: FieldMeta[] = [];
  for (const member of members) {
    if (!ts.isPropertySignature(member) && !ts.isPropertyDeclaration(member)) continue;
    const name = propertyName(member.name);
    if (name === null) continue;
    const wireTag = wireTagOf(member) ?? "";
    if (wireTag === "-") continue;
    fields.push({
      name,
      declaredType: normalizeTypeNode(member.type),
      wireTag,
      required: member.questionToken === undefined,
    });
  }
  return fields;
}

function extractDeclarations(sourceFile: ts.SourceFile): RawDeclaration[] {
  const found: RawDeclaration[] = [];
  for (const statement of sourceFile.statements) {
    if (ts.isInterfaceDeclaration(statement)) {
      const bases = (statement.heritageClauses ?? [])
        .filter((hc) => hc.token === ts.SyntaxKind.ExtendsKeyword)
        .flatMap((hc) => hc.types)
        .map((t) => t.expression)
        .filter(ts.isIdentifier)
        .map((id) => id.text);
      found.push({
        name: statement.name.text,
        fields: extractFields(statement.members),
        bases,
      });
    } else if (ts.isTypeAliasDeclaration(statement) && ts.isTypeLiteralNode(statement.type)) {
      found.push({
        name: statement.name.text,
        fields: extractFields(statement.type.members),
        bases: [],
      });
    } else if (ts.isClassDeclaration(statement) && statement.name) {
      found.push({
        name: statement.name.text,
        fields: extractFields(statement.members),
        bases: [],
      });
    }
  }
  return found;
}

// Declaration files are only read from published modules.
function isScannableFile(fileName: string, declarations = false): boolean {
  if (!fileName.endsWith(".ts") || /\.(test|spec)\.ts$/.test(fileName)) return false;
  return declarations || !fileName.endsWith(".d.ts");
}

function toPackagePath(root: string, relDir: string): string {
  const rel = relDir.split(sep).filter((s) => s !== "" && s !== ".").join("/");
  if (!root) return rel;
  return rel ? `${root}/${rel}` : root;
}

function stripVersionPrefix(tag: string): string {
  return tag.startsWith("v") ? tag.slice(1) : tag;
}

// --- Catalog ---

export interface TypeCatalogOptions {
  logger?: Logger;
}

export class TypeCatalog {
  private readonly modules = new Map<string, string>();
  private readonly packages = new Map<string, Map<string, TypeInfo>>();
  private readonly logger: Logger;

  constructor(options: TypeCatalogOptions = {}) {
    this.logger = options.logger ?? silentLogger;
  }

  /** Pin the version of an external module. Fields are resolved later by loadModule(). */
  addModule(modulePath: string, versionTag: string): void {
    this.modules.set(modulePath, versionTag);
  }

  getModuleVersion(modulePath: string): string | undefined {
    return this.modules.get(modulePath);
  }

  listModules(): Array<{ modulePath: string; versionTag: string }> {
    return [...this.modules].map(([modulePath, versionTag]) => ({ modulePath, versionTag }));
  }

  registerType(info: TypeInfo): void {
    let types = this.packages.get(info.owningPackage);
    if (!types) {
      types = new Map();
      this.packages.set(info.owningPackage, types);
    }
    types.set(info.name, deepFreeze({ ...info, fields: info.fields.map((f) => ({ ...f })) }));
  }

  hasType(packagePath: string, typeName: string): boolean {
    return this.packages.get(packagePath)?.has(typeName) ?? false;
  }

  getTypeInfo(packagePath: string, typeName: string): TypeInfo {
    const info = this.packages.get(packagePath)?.get(typeName);
    if (!info) {
      throw new CatalogLookupError(
        `type ${packagePath}.${typeName} not found in catalog; ` +
          `declare it via an explicit import in apis.yaml`,
        packagePath,
        typeName
      );
    }
    return info;
  }

  getFields(packagePath: string, typeName: string): FieldMeta[] {
    return this.getTypeInfo(packagePath, typeName).fields;
  }

  listTypes(packagePath: string): string[] {
    return [...(this.packages.get(packagePath)?.keys() ?? [])].sort();
  }

  listPackages(): string[] {
    return [...this.packages.keys()].sort();
  }

  /** Scan the .ts files (not .d.ts) directly inside `dir` into `packagePath`. */
  scanLocalPackage(dir: string, packagePath: string): number {
    const files = readdirSync(dir)
      .filter((f) => isScannableFile(f))
      .map((f) => join(dir, f))
      .filter((f) => statSync(f).isFile());
    return this.scanFiles(files, packagePath);
  }

  /**
   * Recursively scan `dir`. Each directory becomes its own package,
   * `packageRoot/<relative dir>`.
   */
  loadFromDirectory(dir: string, packageRoot = ""): number {
    return this.scanTree(dir, packageRoot, false);
  }

  private scanTree(dir: string, packageRoot: string, declarations: boolean): number {
    let total = 0;
    const walk = (current: string): void => {
      const entries = readdirSync(current, { withFileTypes: true });
      const files: string[] = [];
      for (const entry of entries) {
        if (entry.isDirectory()) {
          if (!entry.name.startsWith(".") && !SKIPPED_DIRS.has(entry.name)) {
            walk(join(current, entry.name));
          }
        } else if (entry.isFile() && isScannableFile(entry.name, declarations)) {
          files.push(join(current, entry.name));
        }
      }
      if (files.length > 0) {
        total += this.scanFiles(files, toPackagePath(packageRoot, relative(dir, current)));
      }
    };
    walk(dir);
    return total;
  }

  /** Load a pinned external module's sources from `moduleDir`. */
  loadModule(modulePath: string, moduleDir: string): number {
    const pinned = this.modules.get(modulePath);
    if (pinned === undefined) {
      throw new CatalogLookupError(
        `module ${modulePath} is not pinned; add it to apis.yaml imports`,
        modulePath
      );
    }

    const manifestPath = join(moduleDir, "package.json");
    if (!existsSync(manifestPath)) {
      throw new CatalogLookupError(
        `module ${modulePath}@${pinned} not found at ${moduleDir}`,
        modulePath
      );
    }
    let manifest: unknown;
    try {
      manifest = JSON.parse(readFileSync(manifestPath, "utf-8"));
    } catch (err) {
      throw new CatalogLookupError(
        `module ${modulePath}: cannot read ${manifestPath}: ${errorMessage(err)}`,
        modulePath
      );
    }
    const version =
      typeof manifest === "object" && manifest !== null && "version" in manifest
        ? String(manifest.version)
        : "";
    if (stripVersionPrefix(version) !== stripVersionPrefix(pinned)) {
      throw new CatalogLookupError(
        `module ${modulePath} is pinned at ${pinned} but ${moduleDir} has version ${version || "(none)"}`,
        modulePath
      );
    }

    return this.scanTree(moduleDir, modulePath, true);
  }

  /** Load every pinned module from `baseDir/node_modules`. */
  resolveModules(baseDir: string): number {
    let total = 0;
    for (const modulePath of this.modules.keys()) {
      total += this.loadModule(modulePath, join(baseDir, "node_modules", modulePath));
    }
    return total;
  }

  private scanFiles(files: string[], packagePath: string): number {
    const options: ts.CompilerOptions = { noResolve: true, noLib: true, types: [], allowJs: false };
    // JSDoc tag lookup walks parent pointers.
    const host = ts.createCompilerHost(options, true);
    const program = ts.createProgram({ rootNames: files, options, host });

    const declarations: RawDeclaration[] = [];
    for (const file of files) {
      const sourceFile = program.getSourceFile(file);
      if (!sourceFile) {
        this.logger.warn(`skipping unreadable file ${file}`);
        continue;
      }
      if (program.getSyntacticDiagnostics(sourceFile).length > 0) {
        this.logger.warn(`skipping ${file}: syntax errors`);
        continue;
      }
      declarations.push(...extractDeclarations(sourceFile));
    }

    const byName = new Map<string, RawDeclaration>();
    for (const decl of declarations) {
      if (byName.has(decl.name) || this.hasType(packagePath, decl.name)) {
        this.logger.warn(`duplicate type ${decl.name} in package ${packagePath}; keeping the last one`);
      }
      byName.set(decl.name, decl);
    }

    for (const decl of byName.values()) {
      this.registerType({
        name: decl.name,
        owningPackage: packagePath,
        fields: flattenFields(decl, byName, new Set()),
      });
    }
    return byName.size;
  }
}

// Inherited fields come first; a redeclared field replaces the inherited one.
function flattenFields(
  decl: RawDeclaration,
  byName: Map<string, RawDeclaration>,
  visiting: Set<string>
): FieldMeta[] {
  if (visiting.has(decl.name)) return [];
  visiting.add(decl.name);
  const fields: FieldMeta[] = [];
  for (const baseName of decl.bases) {
    const base = byName.get(baseName);
    if (base) fields.push(...flattenFields(base, byName, visiting));
  }
  for (const field of decl.fields) {
    const existing = fields.findIndex((f) => f.name === field.name);
    if (existing !== -1) fields.splice(existing, 1);
    fields.push(field);
  }
  visiting.delete(decl.name);
  return fields;
}
