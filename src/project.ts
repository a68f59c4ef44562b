// Startup wiring: apis.yaml + type sources -> registry, catalog, conversions.
// Any error here is fatal; nothing is served from a half-loaded project.

import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { TypeCatalog } from "./catalog.js";
import { ConversionRegistry, loadPlans } from "./converter.js";
import { generateConversions, pinModules, type ConversionPlan } from "./generator.js";
import { silentLogger, type Logger } from "./logger.js";
import { parseConfigFile } from "./parser.js";
import { SchemaRegistry } from "./registry.js";

export interface ProjectOptions {
  typesDir?: string;       // default: "apis" beside apis.yaml's working dir
  modulesDir?: string;     // directory holding node_modules for pinned imports
  rejectUnmatchedRequired?: boolean;
  logger?: Logger;
}

export interface LoadedProject {
  registry: SchemaRegistry;
  catalog: TypeCatalog;
}

export function loadProject(configPath: string, options: ProjectOptions = {}): LoadedProject {
  const logger = options.logger ?? silentLogger;
  const registry = new SchemaRegistry(parseConfigFile(resolve(configPath)));
  for (const w of registry.warnings) logger.warn(w);

  const catalog = new TypeCatalog({ logger });
  const typesDir = resolve(options.typesDir ?? "apis");
  if (existsSync(typesDir)) {
    const count = catalog.loadFromDirectory(typesDir, "apis");
    logger.info(`catalog: ${count} types from ${typesDir}`);
  } else {
    logger.warn(`types directory not found: ${typesDir}`);
  }

  pinModules(registry, catalog);
  if (catalog.listModules().length > 0) {
    const count = catalog.resolveModules(resolve(options.modulesDir ?? "."));
    logger.info(`catalog: ${count} types from pinned modules`);
  }

  return { registry, catalog };
}

export function planProject(project: LoadedProject, options: ProjectOptions = {}): ConversionPlan[] {
  const generateOptions = {
    logger: options.logger ?? silentLogger,
    rejectUnmatchedRequired: options.rejectUnmatchedRequired ?? false,
  };
  return generateConversions(project.registry, project.catalog, generateOptions);
}

/** Conversions from a generated conversions.json, or generated on the spot. */
export function loadConversions(
  project: LoadedProject,
  plansPath: string | undefined,
  options: ProjectOptions = {}
): ConversionRegistry {
  const plans = plansPath ? loadPlans(resolve(plansPath)) : planProject(project, options);
  return ConversionRegistry.fromPlans(plans);
}
