import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { evaluateOneShot, Housekeeping, HousekeepingOptions } from "./Housekeeping";
import { ProgressStore, RunStateStore } from "./ProgressStore";

const QUIET: HousekeepingOptions = {
  clear_log_on_start: false,
  clear_log_now: false,
  clear_progress_on_start: false,
  clear_progress_now: false,
  clear_log_on_version_change: false
};

describe("evaluateOneShot", () => {
  it("fires once then waits for the option to be reset", () => {
    expect(evaluateOneShot(true, false)).toEqual({ fire: true, consumed: true });
    expect(evaluateOneShot(true, true)).toEqual({ fire: false, consumed: true });
    expect(evaluateOneShot(false, true)).toEqual({ fire: false, consumed: false });
    expect(evaluateOneShot(false, false)).toEqual({ fire: false, consumed: false });
  });
});

describe("Housekeeping", () => {
  let root: string;
  let logFile: string;
  let progressStore: ProgressStore;
  let stateStore: RunStateStore;

  function housekeeping(updaterVersion = "1.0.0"): Housekeeping {
    return new Housekeeping({ progressStore, stateStore, logFile, updaterVersion });
  }

  beforeEach(() => {
    root = mkdtempSync(path.join(tmpdir(), "housekeeping-"));
    logFile = path.join(root, "update.log");
    progressStore = new ProgressStore(path.join(root, "progress.json"));
    stateStore = new RunStateStore(path.join(root, "state.json"));
    writeFileSync(logFile, "previous run\n");
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("leaves everything alone when no option is set", () => {
    const progress = { done: ["a"], failed: [], skipped: [] };
    const result = housekeeping().run(QUIET, progress);

    expect(result.actions).toEqual([]);
    expect(result.progress).toBe(progress);
    expect(readFileSync(logFile, "utf-8")).toBe("previous run\n");
    expect(stateStore.load().lastVersion).toBe("1.0.0");
  });

  it("clears the log when the updater version changes", () => {
    stateStore.save({ lastVersion: "0.9.0", triggers: { clearLogNowConsumed: false, clearProgressNowConsumed: false } });
    const result = housekeeping("1.0.0").run({ ...QUIET, clear_log_on_version_change: true }, { done: [], failed: [], skipped: [] });

    expect(result.actions).toEqual(["log-cleared-version-change"]);
    expect(readFileSync(logFile, "utf-8")).toBe("");

    writeFileSync(logFile, "second run\n");
    expect(housekeeping("1.0.0").run({ ...QUIET, clear_log_on_version_change: true }, result.progress).actions).toEqual([]);
  });

  it("consumes clear_progress_now once and re-arms it when reset", () => {
    const options = { ...QUIET, clear_progress_now: true };
    progressStore.save({ done: ["a"], failed: ["b"], skipped: [] });

    const first = housekeeping().run(options, progressStore.load());
    expect(first.actions).toEqual(["progress-cleared-now"]);
    expect(first.progress).toEqual({ done: [], failed: [], skipped: [] });
    expect(stateStore.load().triggers.clearProgressNowConsumed).toBe(true);

    progressStore.save({ done: ["c"], failed: [], skipped: [] });
    const second = housekeeping().run(options, progressStore.load());
    expect(second.actions).toEqual([]);
    expect(second.progress).toEqual({ done: ["c"], failed: [], skipped: [] });

    housekeeping().run(QUIET, second.progress);
    expect(stateStore.load().triggers.clearProgressNowConsumed).toBe(false);
    expect(housekeeping().run(options, second.progress).actions).toEqual(["progress-cleared-now"]);
  });

  it("clears log and progress on every start when asked", () => {
    const options = { ...QUIET, clear_log_on_start: true, clear_progress_on_start: true };
    const result = housekeeping().run(options, { done: ["a"], failed: [], skipped: [] });

    expect(result.actions).toEqual(["log-cleared-on-start", "progress-cleared-on-start"]);
    expect(result.progress).toEqual({ done: [], failed: [], skipped: [] });
    expect(readFileSync(logFile, "utf-8")).toBe("");
  });

  it("consumes clear_log_now once", () => {
    const options = { ...QUIET, clear_log_now: true };
    expect(housekeeping().run(options, { done: [], failed: [], skipped: [] }).actions).toEqual(["log-cleared-now"]);
    writeFileSync(logFile, "kept\n");
    expect(housekeeping().run(options, { done: [], failed: [], skipped: [] }).actions).toEqual([]);
    expect(readFileSync(logFile, "utf-8")).toBe("kept\n");
  });
});
