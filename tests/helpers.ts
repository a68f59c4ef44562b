import { join } from "node:path";
import { loadProject, type LoadedProject } from "../src/project.js";
import type { ConversionPlan, ObjectMapping } from "../src/generator.js";
import type { ApisConfig } from "../src/model.js";

export const FIXTURES = join(import.meta.dirname, "fixtures");
export const FIXTURE_CONFIG = join(FIXTURES, "apis.yaml");
export const FIXTURE_TYPES = join(FIXTURES, "apis");

export function loadFixtureProject(): LoadedProject {
  return loadProject(FIXTURE_CONFIG, { typesDir: FIXTURE_TYPES });
}

/** One group, one Device resource, hub v1. */
export function deviceConfig(overrides: Partial<ApisConfig["groups"][number]> = {}): ApisConfig {
  return {
    groups: [
      {
        name: "infra.example.io",
        storageVersion: "v1",
        versions: ["v1alpha1", "v1beta1", "v1"],
        resources: [{ kind: "Device", mappings: {} }],
        imports: [],
        ...overrides,
      },
    ],
  };
}

/**
 * v1alpha1 <-> v1 plan whose spec has an optional field named like an
 * Object.prototype member.
 */
export function toStringFieldPlan(): ConversionPlan {
  const spec: ObjectMapping = {
    sourceType: "DeviceSpec",
    targetType: "DeviceSpec",
    fields: [
      { target: "name", source: "name", matchedBy: "name", type: "string", required: true, zero: "" },
      { target: "toString", source: "toString", matchedBy: "name", type: "string", required: false },
    ],
  };
  const status: ObjectMapping = { sourceType: "DeviceStatus", targetType: "DeviceStatus", fields: [] };
  return {
    group: "infra.example.io",
    version: "v1alpha1",
    hubVersion: "v1",
    kind: "Device",
    spec: { to: spec, from: spec },
    status: { to: status, from: status },
    spokeShape: {
      spec: "apis/infra.example.io/v1alpha1.DeviceSpec",
      status: "apis/infra.example.io/v1alpha1.DeviceStatus",
      types: {
        "apis/infra.example.io/v1alpha1.DeviceSpec": [
          { key: "name", type: "string", required: true },
          { key: "toString", type: "string", required: false },
        ],
        "apis/infra.example.io/v1alpha1.DeviceStatus": [],
      },
    },
    lossy: [],
  };
}
