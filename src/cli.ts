#!/usr/bin/env node
// spokehub CLI
// Usage: spokehub <validate|plan|generate|serve> [apis.yaml] [options]

import { existsSync } from "node:fs";
import { parseArgs } from "node:util";
import { writePlans } from "./converter.js";
import { errorMessage } from "./errors.js";
import { describePlan } from "./generator.js";
import { createStderrLogger } from "./logger.js";
import { loadConversions, loadProject, planProject, type ProjectOptions } from "./project.js";
import { createVersionedNodeServer } from "./server.js";
import { MemoryStorageBackend } from "./storage.js";

function printUsage(): void {
  process.stderr.write(
    `Usage: spokehub <command> [path/to/apis.yaml] [options]

Commands:
  validate            Load and validate apis.yaml
  plan                Print the field mapping for every group/version/kind
  generate            Write conversion plans to --out
  serve               Serve the API over HTTP with in-memory storage

Options:
  --types <dir>       Local type sources, apis/<group>/<version>/ (default: apis)
  --modules <dir>     Directory whose node_modules holds pinned imports (default: .)
  --out <file>        Output for generate (default: conversions.json)
  --plans <file>      serve: load plans instead of generating them
  --port <number>     serve: HTTP port (default: 8080)
  --strict            Reject required hub fields with no spoke counterpart
  --quiet             Only print errors
  --help, -h          Show this help

Examples:
  spokehub validate                       # check ./apis.yaml
  spokehub plan apis.yaml --types apis
  spokehub generate --out conversions.json
  spokehub serve --plans conversions.json --port 9000
`
  );
}

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    args: process.argv.slice(2),
    options: {
      types: { type: "string", default: "apis" },
      modules: { type: "string", default: "." },
      out: { type: "string", default: "conversions.json" },
      plans: { type: "string" },
      port: { type: "string", default: "8080" },
      strict: { type: "boolean", default: false },
      quiet: { type: "boolean", default: false },
      help: { type: "boolean", default: false, short: "h" },
    },
    allowPositionals: true,
  });

  const command = positionals[0];
  if (values.help || command === undefined) {
    printUsage();
    process.exit(values.help ? 0 : 1);
  }

  const configPath = positionals[1] ?? "apis.yaml";
  if (!existsSync(configPath)) {
    process.stderr.write(`Error: config not found: ${configPath}\n`);
    process.exit(1);
  }

  const logger = createStderrLogger({ quiet: values.quiet });
  const options: ProjectOptions = {
    typesDir: values.types,
    modulesDir: values.modules,
    rejectUnmatchedRequired: values.strict,
    logger,
  };

  switch (command) {
    case "validate": {
      const { registry } = loadProject(configPath, options);
      const groups = registry.listGroups();
      process.stdout.write(
        `${configPath}: ${groups.length} group(s) valid\n` +
          groups.map((g) => `  ${g.name}: hub ${g.storageVersion}, versions ${g.versions.join(", ")}\n`).join("")
      );
      return;
    }
    case "plan": {
      const plans = planProject(loadProject(configPath, options), options);
      process.stdout.write(plans.map(describePlan).join("\n\n") + "\n");
      return;
    }
    case "generate": {
      const plans = planProject(loadProject(configPath, options), options);
      writePlans(values.out, plans);
      logger.info(`wrote ${plans.length} plan(s) to ${values.out}`);
      return;
    }
    case "serve": {
      const project = loadProject(configPath, options);
      const conversions = loadConversions(project, values.plans, options);
      const port = parseInt(values.port, 10);
      const server = createVersionedNodeServer({
        registry: project.registry,
        conversions,
        storage: new MemoryStorageBackend(),
        logger,
      });
      server.listen(port, () => {
        logger.info(`listening on http://localhost:${port}/apis`);
      });
      return;
    }
    default:
      process.stderr.write(`Error: unknown command '${command}'\n`);
      printUsage();
      process.exit(1);
  }
}

main().catch((err) => {
  process.stderr.write(`Error: ${errorMessage(err)}\n`);
  process.exit(1);
});
