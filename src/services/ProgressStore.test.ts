import { existsSync, mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import * as fc from "fast-check";
import { ProgressBucket } from "../models/types";
import {
  countProgress,
  createEmptyProgress,
  findBucket,
  normalizeProgress,
  ProgressStore,
  recordOutcome,
  RunStateStore
} from "./ProgressStore";

describe("recordOutcome", () => {
  it("moves a retried device from failed to done", () => {
    const next = recordOutcome({ done: ["a"], failed: ["b"], skipped: [] }, "b", "done");
    expect(next).toEqual({ done: ["a", "b"], failed: [], skipped: [] });
  });

  it("keeps the sets disjoint for any sequence of outcomes", () => {
    const bucketArb = fc.constantFrom<ProgressBucket>("done", "failed", "skipped");
    const stepArb = fc.tuple(fc.constantFrom("a", "b", "c", "d"), bucketArb);

    fc.assert(
      fc.property(fc.array(stepArb, { maxLength: 30 }), (steps) => {
        const state = steps.reduce((current, [name, bucket]) => recordOutcome(current, name, bucket), createEmptyProgress());
        const all = [...state.done, ...state.failed, ...state.skipped];
        expect(new Set(all).size).toBe(all.length);
        const latest = new Map(steps);
        for (const [name, bucket] of latest) {
          expect(findBucket(state, name)).toBe(bucket);
        }
      })
    );
  });
});

describe("normalizeProgress", () => {
  it("removes duplicates and resolves names present in several sets", () => {
    expect(normalizeProgress({ done: ["a", "a"], failed: ["a", "b"], skipped: ["b", "c", "c"] })).toEqual({
      done: ["a"],
      failed: ["b"],
      skipped: ["c"]
    });
  });

  it("counts each set", () => {
    expect(countProgress({ done: ["a", "b"], failed: ["c"], skipped: [] })).toEqual({ done: 2, failed: 1, skipped: 0 });
  });
});

describe("ProgressStore", () => {
  let root: string;
  let file: string;

  beforeEach(() => {
    root = mkdtempSync(path.join(tmpdir(), "progress-store-"));
    file = path.join(root, "progress.json");
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("starts empty when no file exists", () => {
    expect(new ProgressStore(file).load()).toEqual({ done: [], failed: [], skipped: [] });
  });

  it("starts empty when the file is corrupt or invalid", () => {
    writeFileSync(file, "{broken");
    expect(new ProgressStore(file).load()).toEqual(createEmptyProgress());

    writeFileSync(file, JSON.stringify({ done: "not-a-list" }));
    expect(new ProgressStore(file).load()).toEqual(createEmptyProgress());
  });

  it("fills missing sets from a partial file", () => {
    writeFileSync(file, JSON.stringify({ done: ["a"] }));
    expect(new ProgressStore(file).load()).toEqual({ done: ["a"], failed: [], skipped: [] });
  });

  it("writes a deduplicated document without leaving temporary files", () => {
    const store = new ProgressStore(file);
    expect(store.save({ done: ["a", "a"], failed: ["b"], skipped: [] })).toBe(true);

    expect(JSON.parse(readFileSync(file, "utf-8"))).toEqual({ done: ["a"], failed: ["b"], skipped: [] });
    expect(readdirSync(root)).toEqual(["progress.json"]);
    expect(store.load()).toEqual({ done: ["a"], failed: ["b"], skipped: [] });
  });

  it("reports a write failure without throwing", () => {
    const blocker = path.join(root, "blocker");
    writeFileSync(blocker, "file, not a directory");
    const store = new ProgressStore(path.join(blocker, "progress.json"));
    expect(store.save(createEmptyProgress())).toBe(false);
  });

  it("clears the stored state", () => {
    const store = new ProgressStore(file);
    store.save({ done: ["a"], failed: [], skipped: [] });
    expect(store.clear()).toEqual(createEmptyProgress());
    expect(store.load()).toEqual(createEmptyProgress());
  });
});

describe("RunStateStore", () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(path.join(tmpdir(), "run-state-"));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("round-trips the trigger markers", () => {
    const store = new RunStateStore(path.join(root, "state.json"));
    expect(store.load()).toEqual({ triggers: { clearLogNowConsumed: false, clearProgressNowConsumed: false } });

    store.save({ lastVersion: "1.2.0", triggers: { clearLogNowConsumed: true, clearProgressNowConsumed: false } });
    expect(store.load()).toEqual({
      lastVersion: "1.2.0",
      lastRunId: undefined,
      lastRunAt: undefined,
      triggers: { clearLogNowConsumed: true, clearProgressNowConsumed: false }
    });
    expect(existsSync(path.join(root, "state.json"))).toBe(true);
  });

  it("records the last run without touching the markers", () => {
    const store = new RunStateStore(path.join(root, "state.json"));
    store.save({ lastVersion: "1.2.0", triggers: { clearLogNowConsumed: true, clearProgressNowConsumed: false } });

    store.recordRun("run-42", "2024-05-01T10:00:00.000Z");

    expect(store.load()).toEqual({
      lastVersion: "1.2.0",
      lastRunId: "run-42",
      lastRunAt: "2024-05-01T10:00:00.000Z",
      triggers: { clearLogNowConsumed: true, clearProgressNowConsumed: false }
    });
  });
});
