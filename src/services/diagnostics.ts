import { CommandResult, CompileFailureKind, UploadFailureKind } from "../models/types";

const TAIL_LINES = 20;
const MAX_ERROR_LINES = 5;

const RUNTIME_MARKERS = [
  "page not found",
  "no such container",
  "is not running",
  "cannot connect to the docker daemon"
];

export function combinedOutput(result: Pick<CommandResult, "stdout" | "stderr">): string {
  return [result.stdout, result.stderr].filter((part) => part.length > 0).join("\n");
}

export function isRuntimeFailure(output: string): boolean {
  const lowered = output.toLowerCase();
  return RUNTIME_MARKERS.some((marker) => lowered.includes(marker));
}

export function hasWarnings(output: string): boolean {
  return output.toUpperCase().includes("WARNING");
}

/** Lignes non vides contenant « error », dans leur ordre d'apparition. */
export function extractErrorLines(output: string, limit = MAX_ERROR_LINES): string[] {
  return output
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && line.toLowerCase().includes("error"))
    .slice(0, limit);
}

export function tailLines(output: string, count = TAIL_LINES): string[] {
  const lines = output.split(/\r?\n/).filter((line) => line.trim().length > 0);
  return lines.slice(Math.max(0, lines.length - count));
}

export interface Classification<K extends string> {
  readonly kind: K;
  readonly message: string;
}

export function classifyCompileFailure(result: CommandResult, configPath: string): Classification<CompileFailureKind> {
  if (result.timedOut) {
    return { kind: "timeout", message: "Délai de compilation dépassé" };
  }

  const output = combinedOutput(result);
  if (result.spawnError || isRuntimeFailure(output)) {
    return { kind: "runtime", message: "Erreur du runtime de conteneurs, vérifiez que l'environnement de build tourne" };
  }

  if (output.toLowerCase().includes("no such file")) {
    return { kind: "config-missing", message: `Configuration introuvable dans l'environnement de build: ${configPath}` };
  }

  const [first] = extractErrorLines(output, 1);
  if (first) {
    return { kind: "build-error", message: first };
  }

  return { kind: "unknown", message: `Échec de la compilation (code ${result.code})` };
}

export function classifyUploadFailure(result: CommandResult): Classification<UploadFailureKind> {
  const output = combinedOutput(result);
  const lowered = output.toLowerCase();

  if (result.spawnError || isRuntimeFailure(output)) {
    return { kind: "runtime", message: "Erreur du runtime de conteneurs, vérifiez que l'environnement de build tourne" };
  }
  if (lowered.includes("connection refused")) {
    return { kind: "connection-refused", message: "Connexion refusée (appareil hors ligne ou mauvaise adresse ?)" };
  }
  if (result.timedOut || lowered.includes("timeout") || lowered.includes("timed out")) {
    return { kind: "timeout", message: "Délai d'envoi dépassé (appareil injoignable ?)" };
  }
  if (lowered.includes("authentication") || lowered.includes("password")) {
    return { kind: "authentication", message: "Authentification OTA refusée" };
  }

  const [first] = extractErrorLines(result.stderr, 1);
  return { kind: "unknown", message: first ?? `Échec de l'envoi (code ${result.code})` };
}

/** Extrait la valeur d'une ligne `Version: x.y.z` ; `undefined` si absente. */
export function parseToolVersion(output: string): string | undefined {
  for (const line of output.split(/\r?\n/)) {
    const index = line.indexOf("Version:");
    if (index >= 0) {
      const version = line.slice(index + "Version:".length).trim();
      if (version.length > 0) {
        return version;
      }
    }
  }
  return undefined;
}
