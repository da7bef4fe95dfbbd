import process from "process";
import { setTimeout as delay } from "timers/promises";
import { CancellationToken, TrackedProcess } from "../models/types";
import { describeError } from "../utils/errors";
import { getLogger, UpdaterLogger } from "../utils/logger";

export type ProcessGroupKiller = (pid: number, signal: NodeJS.Signals) => void;

/** Un pid négatif vise tout le groupe : l'outil de build et ses descendants. */
export const killProcessGroup: ProcessGroupKiller = (pid, signal) => {
  process.kill(-pid, signal);
};

/**
 * Annulation coopérative partagée par toute la pile d'appels. Le composant qui lance
 * un processus externe l'enregistre ici le temps de l'appel, pour que l'interruption
 * puisse terminer son groupe de processus.
 */
export class CancellationController implements CancellationToken {
  private readonly abortController = new AbortController();
  private current?: WeakRef<TrackedProcess>;
  private reason?: string;
  private forceKill?: NodeJS.Timeout;

  /** `killGraceMs` : délai entre SIGTERM et SIGKILL pour un groupe qui ne s'arrête pas. */
  constructor(
    private readonly killGroup: ProcessGroupKiller = killProcessGroup,
    private readonly killGraceMs = 5_000
  ) {}

  /** Résolu à chaque appel : ces objets existent avant la configuration du journal. */
  private get logger(): UpdaterLogger {
    return getLogger("Cancellation");
  }

  get isCancellationRequested(): boolean {
    return this.abortController.signal.aborted;
  }

  get signal(): AbortSignal {
    return this.abortController.signal;
  }

  get cancellationReason(): string | undefined {
    return this.reason;
  }

  /** Une seconde demande force l'arrêt immédiat du processus en cours. */
  cancel(reason = "interruption"): void {
    if (this.isCancellationRequested) {
      this.logger.warn({ reason }, "Nouvelle interruption, arrêt forcé");
      this.terminateCurrent("SIGKILL");
      return;
    }

    this.reason = reason;
    this.logger.warn({ reason }, "Interruption demandée");
    this.abortController.abort(reason);
    this.terminate();
  }

  /**
   * Enregistre le processus en cours ; la fonction renvoyée le désenregistre.
   * Si l'annulation est déjà demandée, le groupe est terminé immédiatement.
   */
  track(child: TrackedProcess): () => void {
    const reference = new WeakRef(child);
    this.current = reference;

    if (this.isCancellationRequested) {
      this.terminate();
    }

    return () => {
      if (this.current === reference) {
        this.current = undefined;
        this.clearForceKill();
      }
    };
  }

  hasActiveProcess(): boolean {
    return this.current?.deref() !== undefined;
  }

  /**
   * Attente découpée en tranches d'une seconde ; renvoie `false` si elle a été
   * écourtée par une annulation.
   */
  async sleep(seconds: number, stepMs = 1000): Promise<boolean> {
    let remainingMs = Math.max(0, seconds * 1000);
    while (remainingMs > 0) {
      if (this.isCancellationRequested) {
        return false;
      }
      const slice = Math.min(stepMs, remainingMs);
      await delay(slice);
      remainingMs -= slice;
    }
    return !this.isCancellationRequested;
  }

  private terminate(): void {
    if (!this.terminateCurrent("SIGTERM")) {
      return;
    }
    this.clearForceKill();
    this.forceKill = setTimeout(() => this.terminateCurrent("SIGKILL"), this.killGraceMs);
    this.forceKill.unref();
  }

  private clearForceKill(): void {
    if (this.forceKill) {
      clearTimeout(this.forceKill);
      this.forceKill = undefined;
    }
  }

  /** `true` si un processus était enregistré. */
  private terminateCurrent(signal: NodeJS.Signals): boolean {
    const child = this.current?.deref();
    if (!child?.pid) {
      return false;
    }

    try {
      this.killGroup(child.pid, signal);
      this.logger.info({ pid: child.pid, signal }, "Signal envoyé au groupe du processus en cours");
    } catch (error) {
      // ESRCH : le groupe a déjà disparu entre-temps.
      this.logger.debug({ pid: child.pid, error: describeError(error) }, "Groupe de processus introuvable");
    }
    return true;
  }
}
