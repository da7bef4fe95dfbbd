import { describe, expect, it } from "vitest";
import { DeviceRecord, ProgressState } from "../models/types";
import { createDefaultOptions } from "../utils/config";
import { filterDevices, FilterOptions, isKnownVersion, matchesPattern, patternToRegExp, shouldProcess } from "./DeviceFilter";

const EMPTY: ProgressState = { done: [], failed: [], skipped: [] };

function device(overrides: Partial<DeviceRecord> & { name: string }): DeviceRecord {
  return {
    configFile: `${overrides.name}.yaml`,
    deployedVersion: "2024.6.1",
    currentVersion: "2024.7.0",
    ...overrides
  };
}

function options(overrides: Partial<FilterOptions> = {}): FilterOptions {
  return createDefaultOptions(overrides);
}

describe("matchesPattern", () => {
  it("matches a glob anywhere in the text", () => {
    expect(matchesPattern("ai001-lounge", ["ai*"])).toBe(true);
    expect(matchesPattern("as007-shop", ["ai*"])).toBe(false);
    expect(matchesPattern("kitchen-ai001", ["ai0"])).toBe(true);
  });

  it("is case-insensitive", () => {
    expect(matchesPattern("AI001-Lounge", ["ai*lounge"])).toBe(true);
  });

  it("ignores empty patterns", () => {
    expect(matchesPattern("anything", [""])).toBe(false);
    expect(matchesPattern("anything", [])).toBe(false);
  });

  it("treats regex metacharacters literally", () => {
    expect(matchesPattern("plug.1", ["plug.1"])).toBe(true);
    expect(matchesPattern("plugx1", ["plug.1"])).toBe(false);
    expect(patternToRegExp("a+b").test("a+b")).toBe(true);
  });
});

describe("isKnownVersion", () => {
  it("treats unknown and empty values as missing", () => {
    expect(isKnownVersion(undefined)).toBe(false);
    expect(isKnownVersion("")).toBe(false);
    expect(isKnownVersion("unknown")).toBe(false);
    expect(isKnownVersion("2024.7.0")).toBe(true);
  });
});

describe("shouldProcess", () => {
  it("excludes devices already present in a progress set", () => {
    const progress: ProgressState = { done: ["a"], failed: ["b"], skipped: ["c"] };
    expect(shouldProcess(device({ name: "a" }), options(), progress)).toEqual({
      process: false,
      reason: "already processed (in done list)",
      bucket: "done"
    });
    expect(shouldProcess(device({ name: "b" }), options(), progress).bucket).toBe("failed");
    expect(shouldProcess(device({ name: "c" }), options(), progress).bucket).toBe("skipped");
  });

  it("retries failed devices when retry_failed is set", () => {
    const progress: ProgressState = { done: [], failed: ["b"], skipped: [] };
    expect(shouldProcess(device({ name: "b" }), options({ retry_failed: true }), progress).process).toBe(true);
  });

  it("applies device name include and exclude patterns", () => {
    const include = options({ device_name_patterns: ["ai*"] });
    expect(shouldProcess(device({ name: "as007-shop" }), include, EMPTY).reason).toBe(
      "device name doesn't match include patterns"
    );
    expect(shouldProcess(device({ name: "ai001-lounge" }), include, EMPTY).process).toBe(true);

    const exclude = options({ skip_device_name_patterns: ["*shop"] });
    expect(shouldProcess(device({ name: "as007-shop" }), exclude, EMPTY).reason).toBe("device name matches exclude pattern");
  });

  it("treats an include list of empty patterns as no constraint", () => {
    expect(shouldProcess(device({ name: "x" }), options({ device_name_patterns: [""] }), EMPTY).process).toBe(true);
  });

  it("applies configuration file patterns after device name patterns", () => {
    const subject = device({ name: "plug", configFile: "garage-plug.yaml" });
    expect(shouldProcess(subject, options({ yaml_name_patterns: ["office*"] }), EMPTY).reason).toBe(
      "config file doesn't match include patterns"
    );
    expect(shouldProcess(subject, options({ skip_yaml_name_patterns: ["garage"] }), EMPTY).reason).toBe(
      "config file matches exclude pattern"
    );
  });

  it("gates on the deployed version", () => {
    const subject = device({ name: "x", deployedVersion: undefined });
    expect(shouldProcess(subject, options(), EMPTY).reason).toBe(
      "no deployed version (update_when_no_deployed_version=false)"
    );
    expect(shouldProcess(subject, options({ update_when_no_deployed_version: true }), EMPTY).process).toBe(true);
    expect(shouldProcess(device({ name: "y", deployedVersion: "unknown" }), options(), EMPTY).process).toBe(false);
  });

  it("skips devices already on the current version unless asked", () => {
    const subject = device({ name: "x", deployedVersion: "2024.7.0", currentVersion: "2024.7.0" });
    expect(shouldProcess(subject, options(), EMPTY).reason).toBe("versions match (2024.7.0)");
    expect(shouldProcess(subject, options({ update_when_version_matches: true }), EMPTY).process).toBe(true);
  });

  it("includes devices passing every rule", () => {
    expect(shouldProcess(device({ name: "x" }), options(), EMPTY)).toEqual({ process: true, reason: "eligible" });
  });
});

describe("filterDevices", () => {
  it("splits devices and counts exclusion reasons", () => {
    const devices = [
      device({ name: "a" }),
      device({ name: "b", deployedVersion: undefined }),
      device({ name: "c", deployedVersion: undefined }),
      device({ name: "d" })
    ];
    const outcome = filterDevices(devices, options(), { done: ["d"], failed: [], skipped: [] });

    expect(outcome.eligible.map((entry) => entry.name)).toEqual(["a"]);
    expect(outcome.excluded.map((entry) => entry.device.name)).toEqual(["b", "c", "d"]);
    expect(outcome.reasons.get("no deployed version (update_when_no_deployed_version=false)")).toBe(2);
    expect(outcome.reasons.get("already processed (in done list)")).toBe(1);
  });
});
