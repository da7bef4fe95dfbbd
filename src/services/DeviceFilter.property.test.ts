import { describe, expect, it } from "vitest";
import * as fc from "fast-check";
import { DeviceRecord, ProgressState } from "../models/types";
import { createDefaultOptions } from "../utils/config";
import { matchesPattern, shouldProcess } from "./DeviceFilter";

const nameArb = fc.stringMatching(/^[a-z0-9][a-z0-9-]{0,15}$/);
const versionArb = fc.option(fc.constantFrom("2024.6.1", "2024.7.0", "unknown"), { nil: undefined });

const deviceArb: fc.Arbitrary<DeviceRecord> = fc.record({
  name: nameArb,
  configFile: nameArb.map((name) => `${name}.yaml`),
  deployedVersion: versionArb,
  currentVersion: versionArb
});

const progressArb: fc.Arbitrary<ProgressState> = fc.record({
  done: fc.array(nameArb, { maxLength: 5 }),
  failed: fc.array(nameArb, { maxLength: 5 }),
  skipped: fc.array(nameArb, { maxLength: 5 })
});

const optionsArb = fc
  .record({
    device_name_patterns: fc.array(fc.constantFrom("", "a*", "*-1", "b"), { maxLength: 2 }),
    skip_device_name_patterns: fc.array(fc.constantFrom("", "z*", "x"), { maxLength: 2 }),
    update_when_no_deployed_version: fc.boolean(),
    update_when_version_matches: fc.boolean(),
    retry_failed: fc.boolean()
  })
  .map((overrides) => createDefaultOptions(overrides));

describe("shouldProcess properties", () => {
  it("is deterministic for identical inputs", () => {
    fc.assert(
      fc.property(deviceArb, optionsArb, progressArb, (device, options, progress) => {
        expect(shouldProcess(device, options, progress)).toEqual(shouldProcess(device, options, progress));
      })
    );
  });

  it("never includes a device already in the done set", () => {
    fc.assert(
      fc.property(deviceArb, optionsArb, progressArb, (device, options, progress) => {
        const withDone = { ...progress, done: [...progress.done, device.name] };
        return !shouldProcess(device, options, withDone).process;
      })
    );
  });

  it("does not mutate its inputs", () => {
    fc.assert(
      fc.property(deviceArb, optionsArb, progressArb, (device, options, progress) => {
        const before = JSON.stringify([device, options, progress]);
        shouldProcess(device, options, progress);
        return JSON.stringify([device, options, progress]) === before;
      })
    );
  });
});

describe("matchesPattern properties", () => {
  it("a literal pattern matches any text containing it", () => {
    fc.assert(
      fc.property(nameArb, nameArb, nameArb, (prefix, literal, suffix) => {
        return matchesPattern(`${prefix}${literal}${suffix}`, [literal.toUpperCase()]);
      })
    );
  });

  it("a lone star matches everything", () => {
    fc.assert(fc.property(fc.string(), (text) => matchesPattern(text, ["*"])));
  });
});
