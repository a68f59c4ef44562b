import { describe, it, expect } from "vitest";
import { ConfigError } from "../src/errors.js";
import { isValidVersion, validateConfig } from "../src/validator.js";
import { deviceConfig } from "./helpers.js";

function errorOf(run: () => unknown): ConfigError {
  try {
    run();
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error("expected a ConfigError");
}

describe("validateConfig", () => {
  it("accepts a well-formed config without warnings", () => {
    expect(validateConfig(deviceConfig())).toEqual([]);
  });

  it("rejects a config with zero groups", () => {
    expect(() => validateConfig({ groups: [] })).toThrow("apis.yaml must declare at least one group");
  });

  it("rejects a storageVersion missing from versions and names the group", () => {
    const err = errorOf(() =>
      validateConfig(deviceConfig({ storageVersion: "v2", versions: ["v1alpha1", "v1"] }))
    );
    expect(err.message).toBe(
      "groups[0] 'infra.example.io': storageVersion 'v2' must be in versions list [v1alpha1, v1]"
    );
    expect(err.groupName).toBe("infra.example.io");
    expect(err.groupIndex).toBe(0);
  });

  it("rejects missing required fields", () => {
    expect(() => validateConfig(deviceConfig({ name: "" }))).toThrow(
      "groups[0] (unnamed): missing required field 'name'"
    );
    expect(() => validateConfig(deviceConfig({ storageVersion: "" }))).toThrow(
      "missing required field 'storageVersion'"
    );
    expect(() => validateConfig(deviceConfig({ versions: [] }))).toThrow(
      "'versions' must list at least one version"
    );
  });

  it("rejects duplicate groups and versions", () => {
    const group = deviceConfig().groups[0];
    if (!group) throw new Error("fixture has no group");
    expect(() => validateConfig({ groups: [group, group] })).toThrow(
      "groups[1] 'infra.example.io': duplicate group name"
    );
    expect(() => validateConfig(deviceConfig({ versions: ["v1", "v1"] }))).toThrow("duplicate version 'v1'");
  });

  it("rejects a preferredVersion outside versions", () => {
    expect(() => validateConfig(deviceConfig({ preferredVersion: "v2" }))).toThrow(
      "preferredVersion 'v2' must be in versions list"
    );
  });

  it("rejects duplicate resource kinds", () => {
    const resources = [
      { kind: "Device", mappings: {} },
      { kind: "Device", mappings: {} },
    ];
    expect(() => validateConfig(deviceConfig({ resources }))).toThrow("duplicate resource kind 'Device'");
  });

  it("rejects renames for unknown versions or with a missing side", () => {
    expect(() =>
      validateConfig(
        deviceConfig({
          resources: [{ kind: "Device", mappings: { v9: { renames: [{ from: "a", to: "b" }] } } }],
        })
      )
    ).toThrow("resource 'Device' mappings[v9]: unknown version 'v9'");
    expect(() =>
      validateConfig(
        deviceConfig({
          resources: [{ kind: "Device", mappings: { v1alpha1: { renames: [{ from: "a", to: "" }] } } }],
        })
      )
    ).toThrow("renames need both 'from' and 'to'");
  });

  it("checks imports", () => {
    const expose = (specFrom: string, kind = "Device") => [
      { module: "@acme/types", tag: "v1.0.0", packages: [{ path: "device", expose: [{ kind, specFrom }] }] },
    ];
    expect(() => validateConfig(deviceConfig({ imports: expose("@acme/types/device.Spec", "Router") }))).toThrow(
      "import '@acme/types' expose 'Router': kind is not a declared resource"
    );
    expect(() => validateConfig(deviceConfig({ imports: expose("Spec") }))).toThrow(
      "specFrom 'Spec' is not a qualified type"
    );
    expect(() =>
      validateConfig(deviceConfig({ imports: [{ module: "@acme/types", tag: "", packages: [] }] }))
    ).toThrow("import '@acme/types' is missing required field 'tag'");
    expect(validateConfig(deviceConfig({ imports: expose("@acme/types/device.Spec") }))).toEqual([]);
  });

  it("warns about odd version names and empty groups", () => {
    const warnings = validateConfig(deviceConfig({ storageVersion: "2024-01", versions: ["2024-01"], resources: [] }));
    expect(warnings).toEqual([
      "Group 'infra.example.io': version '2024-01' does not follow v<N>[alpha<N>|beta<N>]",
      "Group 'infra.example.io' has no resources",
    ]);
  });
});

describe("isValidVersion", () => {
  it("accepts Kubernetes-style versions", () => {
    for (const v of ["v1", "v2", "v1alpha1", "v1beta2", "v10beta10"]) {
      expect(isValidVersion(v)).toBe(true);
    }
  });

  it("rejects everything else", () => {
    for (const v of ["1", "v1.0", "v1gamma1", "V1", "v1alpha", ""]) {
      expect(isValidVersion(v)).toBe(false);
    }
  });
});
