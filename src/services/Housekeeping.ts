import { existsSync, truncateSync } from "fs";
import { ProgressState, RunState, TriggerMarkers, UpdateOptions } from "../models/types";
import { describeError } from "../utils/errors";
import { getLogger, UpdaterLogger } from "../utils/logger";
import { ProgressStore, RunStateStore } from "./ProgressStore";

export type HousekeepingOptions = Pick<
  UpdateOptions,
  "clear_log_on_start" | "clear_log_now" | "clear_progress_on_start" | "clear_progress_now" | "clear_log_on_version_change"
>;

export type HousekeepingAction =
  | "log-cleared-on-start"
  | "log-cleared-now"
  | "log-cleared-version-change"
  | "progress-cleared-on-start"
  | "progress-cleared-now";

export interface HousekeepingResult {
  readonly progress: ProgressState;
  readonly state: RunState;
  readonly actions: ReadonlyArray<HousekeepingAction>;
}

export interface OneShotDecision {
  readonly fire: boolean;
  readonly consumed: boolean;
}

/**
 * Déclencheur ponctuel : il ne se déclenche qu'une fois tant que l'option reste
 * active, et se réarme quand elle repasse à `false`.
 */
export function evaluateOneShot(enabled: boolean, consumed: boolean): OneShotDecision {
  if (!enabled) {
    return { fire: false, consumed: false };
  }
  return { fire: !consumed, consumed: true };
}

export interface HousekeepingDependencies {
  readonly progressStore: ProgressStore;
  readonly stateStore: RunStateStore;
  readonly logFile: string;
  readonly updaterVersion: string;
}

export class Housekeeping {
  private readonly logger: UpdaterLogger = getLogger("Housekeeping");

  constructor(private readonly dependencies: HousekeepingDependencies) {}

  run(options: HousekeepingOptions, progress: ProgressState): HousekeepingResult {
    const { progressStore, stateStore, updaterVersion } = this.dependencies;
    const previous = stateStore.load();
    const actions: HousekeepingAction[] = [];
    let current = progress;

    const logNow = evaluateOneShot(options.clear_log_now, previous.triggers.clearLogNowConsumed);
    const logReasons: HousekeepingAction[] = [];
    if (options.clear_log_on_version_change && previous.lastVersion !== updaterVersion) {
      logReasons.push("log-cleared-version-change");
    }
    if (options.clear_log_on_start) {
      logReasons.push("log-cleared-on-start");
    }
    if (logNow.fire) {
      logReasons.push("log-cleared-now");
    }

    // Un seul vidage, avant toute écriture de ce run dans le journal.
    if (logReasons.length > 0 && this.truncateLog()) {
      actions.push(...logReasons);
      if (logReasons.includes("log-cleared-version-change")) {
        this.logger.info(
          { from: previous.lastVersion, to: updaterVersion },
          `Version changée: ${previous.lastVersion ?? "aucune"} → ${updaterVersion}, journal vidé`
        );
      }
      if (logReasons.includes("log-cleared-on-start")) {
        this.logger.verbose("Journal vidé au démarrage (clear_log_on_start)");
      }
      if (logNow.fire) {
        this.logger.info("Journal vidé (déclencheur clear_log_now)");
      }
    }

    if (options.clear_progress_on_start) {
      current = progressStore.clear();
      actions.push("progress-cleared-on-start");
      this.logger.info("Progression remise à zéro (clear_progress_on_start)");
    }

    const progressNow = evaluateOneShot(options.clear_progress_now, previous.triggers.clearProgressNowConsumed);
    if (progressNow.fire) {
      current = progressStore.clear();
      actions.push("progress-cleared-now");
      this.logger.info("Progression remise à zéro (déclencheur clear_progress_now)");
    }

    const triggers: TriggerMarkers = {
      clearLogNowConsumed: logNow.consumed,
      clearProgressNowConsumed: progressNow.consumed
    };
    const state: RunState = { ...previous, lastVersion: updaterVersion, triggers };
    stateStore.save(state);

    return { progress: current, state, actions };
  }

  private truncateLog(): boolean {
    const { logFile } = this.dependencies;
    if (!existsSync(logFile)) {
      return true;
    }
    try {
      truncateSync(logFile, 0);
      return true;
    } catch (error) {
      this.logger.warn({ logFile, error: describeError(error) }, "Impossible de vider le journal");
      return false;
    }
  }
}
