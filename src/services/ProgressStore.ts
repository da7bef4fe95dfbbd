import { existsSync, readFileSync } from "fs";
import { ProgressBucket, ProgressSink, ProgressState, RunCounts, RunState, TriggerMarkers } from "../models/types";
import progressSchema from "../../progress.schema.json";
import { serializeJson, writeFileAtomicSync } from "../utils/atomicFile";
import { describeError } from "../utils/errors";
import { getLogger, UpdaterLogger } from "../utils/logger";
import { compileSchema, tryValidate } from "../utils/validator";

const validateProgress = compileSchema<ProgressState>(progressSchema);

export const PROGRESS_BUCKETS: ReadonlyArray<ProgressBucket> = ["done", "failed", "skipped"];

export function createEmptyProgress(): ProgressState {
  return { done: [], failed: [], skipped: [] };
}

/**
 * Dédoublonne chaque ensemble et garantit qu'un nom n'apparaît que dans un seul
 * (priorité done > failed > skipped pour un fichier édité à la main).
 */
export function normalizeProgress(state: ProgressState): ProgressState {
  const seen = new Set<string>();
  const pick = (names: ReadonlyArray<string>): string[] => {
    const kept: string[] = [];
    for (const name of names) {
      if (!seen.has(name)) {
        seen.add(name);
        kept.push(name);
      }
    }
    return kept;
  };

  const done = pick(state.done);
  const failed = pick(state.failed);
  const skipped = pick(state.skipped);
  return { done, failed, skipped };
}

export function findBucket(state: ProgressState, name: string): ProgressBucket | undefined {
  return PROGRESS_BUCKETS.find((bucket) => state[bucket].includes(name));
}

/** Range `name` dans `bucket` en le retirant des deux autres ensembles. */
export function recordOutcome(state: ProgressState, name: string, bucket: ProgressBucket): ProgressState {
  const without = (names: ReadonlyArray<string>): string[] => names.filter((entry) => entry !== name);
  const next: Record<ProgressBucket, string[]> = {
    done: without(state.done),
    failed: without(state.failed),
    skipped: without(state.skipped)
  };
  next[bucket].push(name);
  return next;
}

export function countProgress(state: ProgressState): RunCounts {
  return {
    done: state.done.length,
    failed: state.failed.length,
    skipped: state.skipped.length
  };
}

export class ProgressStore implements ProgressSink {
  private readonly logger: UpdaterLogger = getLogger("ProgressStore");

  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  load(): ProgressState {
    if (!existsSync(this.filePath)) {
      return createEmptyProgress();
    }

    try {
      const parsed: unknown = JSON.parse(readFileSync(this.filePath, "utf-8"));
      const state = tryValidate(validateProgress, parsed);
      if (!state) {
        this.logger.warn({ file: this.filePath }, "Fichier de progression illisible, on repart de zéro");
        return createEmptyProgress();
      }
      return normalizeProgress(state);
    } catch (error) {
      this.logger.warn({ file: this.filePath, error: describeError(error) }, "Fichier de progression corrompu, on repart de zéro");
      return createEmptyProgress();
    }
  }

  /** Écriture synchrone : un crash ne perd au plus que l'appareil en cours. */
  save(state: ProgressState): boolean {
    try {
      const normalized = normalizeProgress(state);
      writeFileAtomicSync(
        this.filePath,
        serializeJson({ done: normalized.done, failed: normalized.failed, skipped: normalized.skipped })
      );
      return true;
    } catch (error) {
      this.logger.error({ file: this.filePath, error: describeError(error) }, "Échec d'écriture de la progression, poursuite en mémoire");
      return false;
    }
  }

  clear(): ProgressState {
    const empty = createEmptyProgress();
    this.save(empty);
    return empty;
  }
}

const DEFAULT_TRIGGERS: TriggerMarkers = {
  clearLogNowConsumed: false,
  clearProgressNowConsumed: false
};

function readOptionalString(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * État de fonctionnement entre deux exécutions : marqueurs des déclencheurs
 * ponctuels, dernière version de l'outil, dernier identifiant de run.
 */
export class RunStateStore {
  private readonly logger: UpdaterLogger = getLogger("RunStateStore");

  constructor(private readonly filePath: string) {}

  load(): RunState {
    if (!existsSync(this.filePath)) {
      return { triggers: DEFAULT_TRIGGERS };
    }

    try {
      const parsed: unknown = JSON.parse(readFileSync(this.filePath, "utf-8"));
      if (!isRecord(parsed)) {
        return { triggers: DEFAULT_TRIGGERS };
      }
      const triggers = isRecord(parsed.triggers) ? parsed.triggers : {};
      return {
        lastVersion: readOptionalString(parsed, "lastVersion"),
        lastRunId: readOptionalString(parsed, "lastRunId"),
        lastRunAt: readOptionalString(parsed, "lastRunAt"),
        triggers: {
          clearLogNowConsumed: triggers.clearLogNowConsumed === true,
          clearProgressNowConsumed: triggers.clearProgressNowConsumed === true
        }
      };
    } catch (error) {
      this.logger.debug({ file: this.filePath, error: describeError(error) }, "État illisible, valeurs par défaut");
      return { triggers: DEFAULT_TRIGGERS };
    }
  }

  /** Enregistre la fin d'un run sans toucher aux marqueurs ni à la version. */
  recordRun(runId: string, completedAt: string): RunState {
    const state: RunState = { ...this.load(), lastRunId: runId, lastRunAt: completedAt };
    this.save(state);
    return state;
  }

  save(state: RunState): boolean {
    try {
      writeFileAtomicSync(this.filePath, serializeJson(state));
      return true;
    } catch (error) {
      this.logger.warn({ file: this.filePath, error: describeError(error) }, "Échec d'écriture de l'état");
      return false;
    }
  }
}
