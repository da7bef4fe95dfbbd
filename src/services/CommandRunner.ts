import { spawn } from "child_process";
import { once } from "events";
import { CancellationToken, CommandOptions, CommandResult } from "../models/types";
import { describeError, isFileSystemError } from "../utils/errors";
import { getLogger, UpdaterLogger } from "../utils/logger";
import { killProcessGroup, ProcessGroupKiller } from "./CancellationController";

export const TIMEOUT_EXIT_CODE = 124;
export const SPAWN_FAILURE_EXIT_CODE = 127;

export interface CommandRunnerOptions {
  readonly defaultTimeoutMs?: number;
  /** Délai entre SIGTERM et SIGKILL quand un appel dépasse son délai. */
  readonly killGraceMs?: number;
  readonly killGroup?: ProcessGroupKiller;
}

/**
 * Exécute une commande externe dans son propre groupe de processus et renvoie
 * toujours un résultat : un dépassement de délai devient le code 124, une commande
 * introuvable le code 127.
 */
export class CommandRunner {
  private readonly defaultTimeoutMs: number;
  private readonly killGraceMs: number;
  private readonly killGroup: ProcessGroupKiller;

  constructor(options: CommandRunnerOptions = {}) {
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? 1_800_000;
    this.killGraceMs = options.killGraceMs ?? 5_000;
    this.killGroup = options.killGroup ?? killProcessGroup;
  }

  /** Résolu à chaque appel, le journal pouvant être reconfiguré entre deux commandes. */
  private get logger(): UpdaterLogger {
    return getLogger("CommandRunner");
  }

  async run(
    command: string,
    args: ReadonlyArray<string>,
    cancellation?: CancellationToken,
    options: CommandOptions = {}
  ): Promise<CommandResult> {
    const start = Date.now();
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    this.logger.debug({ command, args, timeoutMs }, "Lancement de la commande");

    const child = spawn(command, [...args], {
      cwd: options.cwd,
      stdio: ["ignore", "pipe", "pipe"],
      detached: true,
      windowsHide: true
    });

    const release = cancellation?.track(child);
    const stdoutChunks: Array<string> = [];
    const stderrChunks: Array<string> = [];

    child.stdout?.setEncoding("utf-8");
    child.stdout?.on("data", (chunk: string) => stdoutChunks.push(chunk));

    child.stderr?.setEncoding("utf-8");
    child.stderr?.on("data", (chunk: string) => stderrChunks.push(chunk));

    let timedOut = false;
    let forceKill: NodeJS.Timeout | undefined;
    const timeout = setTimeout(() => {
      timedOut = true;
      this.logger.warn({ command, timeoutMs }, "Délai dépassé, arrêt du groupe de processus");
      this.signalGroup(child.pid, "SIGTERM");
      forceKill = setTimeout(() => this.signalGroup(child.pid, "SIGKILL"), this.killGraceMs);
    }, timeoutMs);

    try {
      const [exitCode]: ReadonlyArray<unknown> = await once(child, "close");
      const code = typeof exitCode === "number" ? exitCode : null;
      const stdout = stdoutChunks.join("");
      const stderr = stderrChunks.join("");
      const cancelled = cancellation?.isCancellationRequested ?? false;

      return {
        code: timedOut ? TIMEOUT_EXIT_CODE : code ?? 1,
        stdout,
        stderr: timedOut ? `${stderr}\nCommand timed out after ${Math.round(timeoutMs / 1000)}s` : stderr,
        elapsedMs: Date.now() - start,
        timedOut,
        cancelled
      };
    } catch (error) {
      const spawnError = isFileSystemError(error) ? error.code : undefined;
      this.logger.error({ command, error: describeError(error) }, "Impossible de lancer la commande");
      return {
        code: SPAWN_FAILURE_EXIT_CODE,
        stdout: stdoutChunks.join(""),
        stderr: describeError(error),
        elapsedMs: Date.now() - start,
        timedOut: false,
        cancelled: cancellation?.isCancellationRequested ?? false,
        spawnError
      };
    } finally {
      clearTimeout(timeout);
      if (forceKill) {
        clearTimeout(forceKill);
      }
      release?.();
    }
  }

  private signalGroup(pid: number | undefined, signal: NodeJS.Signals): void {
    if (!pid) {
      return;
    }
    try {
      this.killGroup(pid, signal);
    } catch (error) {
      this.logger.debug({ pid, signal, error: describeError(error) }, "Groupe déjà terminé");
    }
  }
}

/** Surface minimale consommée par les services, remplaçable par un faux en test. */
export type CommandExecutor = Pick<CommandRunner, "run">;
