import { describe, expect, it } from "vitest";
import { CommandResult } from "../models/types";
import {
  classifyCompileFailure,
  classifyUploadFailure,
  extractErrorLines,
  hasWarnings,
  isRuntimeFailure,
  parseToolVersion,
  tailLines
} from "./diagnostics";

function failed(overrides: Partial<CommandResult>): CommandResult {
  return { code: 1, stdout: "", stderr: "", elapsedMs: 10, timedOut: false, cancelled: false, ...overrides };
}

describe("classifyCompileFailure", () => {
  it("detects container runtime errors", () => {
    const result = failed({ stderr: "Error response from daemon: page not found" });
    expect(classifyCompileFailure(result, "/config/esphome/plug.yaml").kind).toBe("runtime");
    expect(classifyCompileFailure(failed({ stderr: "Error: No such container: esphome" }), "x").kind).toBe("runtime");
  });

  it("detects a missing configuration", () => {
    const classification = classifyCompileFailure(failed({ stdout: "No such file or directory" }), "/config/esphome/plug.yaml");
    expect(classification).toEqual({
      kind: "config-missing",
      message: "Configuration introuvable dans l'environnement de build: /config/esphome/plug.yaml"
    });
  });

  it("reports the first error line of a build failure", () => {
    const stdout = "INFO Reading configuration\nERROR Unable to find component foo\nERROR second";
    expect(classifyCompileFailure(failed({ stdout }), "x")).toEqual({
      kind: "build-error",
      message: "ERROR Unable to find component foo"
    });
  });

  it("reports timeouts and unknown failures", () => {
    expect(classifyCompileFailure(failed({ code: 124, timedOut: true }), "x").kind).toBe("timeout");
    expect(classifyCompileFailure(failed({ code: 2, stdout: "done" }), "x")).toEqual({
      kind: "unknown",
      message: "Échec de la compilation (code 2)"
    });
  });
});

describe("classifyUploadFailure", () => {
  it("recognises each failure family", () => {
    expect(classifyUploadFailure(failed({ stderr: "Connecting to 10.0.0.7 port 3232... Connection refused" })).kind).toBe(
      "connection-refused"
    );
    expect(classifyUploadFailure(failed({ stderr: "Error: timed out waiting for device" })).kind).toBe("timeout");
    expect(classifyUploadFailure(failed({ stderr: "ERROR Authentication invalid. Is the password correct?" })).kind).toBe(
      "authentication"
    );
    expect(classifyUploadFailure(failed({ stderr: "cannot connect to the Docker daemon" })).kind).toBe("runtime");
  });

  it("falls back to the first error line of stderr", () => {
    expect(classifyUploadFailure(failed({ stderr: "ERROR Bad response" }))).toEqual({
      kind: "unknown",
      message: "ERROR Bad response"
    });
  });
});

describe("text helpers", () => {
  it("extracts at most five error lines", () => {
    const output = Array.from({ length: 8 }, (_, index) => `error ${index}`).join("\n");
    expect(extractErrorLines(output)).toEqual(["error 0", "error 1", "error 2", "error 3", "error 4"]);
  });

  it("keeps the last non-empty lines", () => {
    expect(tailLines("a\n\nb\nc\n", 2)).toEqual(["b", "c"]);
  });

  it("detects warnings and runtime markers", () => {
    expect(hasWarnings("[W][wifi] Warning: weak signal")).toBe(true);
    expect(hasWarnings("all good")).toBe(false);
    expect(isRuntimeFailure("container abc is not running")).toBe(true);
  });

  it("parses the tool version", () => {
    expect(parseToolVersion("INFO something\nVersion: 2024.7.3\n")).toBe("2024.7.3");
    expect(parseToolVersion("no version here")).toBeUndefined();
  });
});
