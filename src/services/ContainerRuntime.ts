import { CancellationToken, CommandOptions, CommandResult } from "../models/types";
import { FatalPreconditionError } from "../utils/errors";
import { getLogger, UpdaterLogger } from "../utils/logger";
import { CommandExecutor } from "./CommandRunner";
import { combinedOutput } from "./diagnostics";

export interface ContainerRuntimeOptions {
  /** Exécutable du runtime, `docker` par défaut. */
  readonly runtime: string;
  readonly containerName?: string;
  readonly probeTimeoutMs?: number;
}

/**
 * Accès à l'environnement d'exécution nommé dans lequel tournent le compilateur
 * et l'outil d'envoi.
 */
export class ContainerRuntime {
  private readonly logger: UpdaterLogger = getLogger("ContainerRuntime");

  constructor(
    private readonly runner: CommandExecutor,
    private readonly options: ContainerRuntimeOptions
  ) {}

  get name(): string | undefined {
    return this.options.containerName;
  }

  /** Lève une `FatalPreconditionError` si l'environnement n'est pas utilisable. */
  async verify(cancellation?: CancellationToken): Promise<void> {
    const containerName = this.options.containerName;
    if (!containerName) {
      throw new FatalPreconditionError(
        "environment-missing",
        "Aucun environnement de build configuré (option container_name ou variable FLEET_UPDATER_CONTAINER)"
      );
    }

    const result = await this.runner.run(
      this.options.runtime,
      ["ps", "--filter", `name=${containerName}`, "--format", "{{.Names}}"],
      cancellation,
      { timeoutMs: this.options.probeTimeoutMs ?? 30_000 }
    );

    if (result.code !== 0) {
      throw new FatalPreconditionError("runtime-unreachable", `Le runtime ${this.options.runtime} ne répond pas`, {
        code: result.code,
        output: combinedOutput(result).slice(0, 500)
      });
    }

    const running = result.stdout
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0);

    if (!running.includes(containerName)) {
      throw new FatalPreconditionError("environment-not-running", `L'environnement ${containerName} n'est pas démarré`, {
        running
      });
    }

    this.logger.debug({ containerName }, "Environnement de build disponible");
  }

  execArgs(command: string, args: ReadonlyArray<string>): string[] {
    return ["exec", "-i", this.options.containerName ?? "", command, ...args];
  }

  async exec(
    command: string,
    args: ReadonlyArray<string>,
    cancellation?: CancellationToken,
    options?: CommandOptions
  ): Promise<CommandResult> {
    if (!this.options.containerName) {
      return {
        code: 1,
        stdout: "",
        stderr: "no such container: environment name not set",
        elapsedMs: 0,
        timedOut: false,
        cancelled: cancellation?.isCancellationRequested ?? false
      };
    }

    const execArgs = this.execArgs(command, args);
    this.logger.debug({ command: [this.options.runtime, ...execArgs].join(" ") }, "Exécution dans l'environnement");
    return this.runner.run(this.options.runtime, execArgs, cancellation, options);
  }
}
