import path from "path";
import {
  CancellationToken,
  CommandResult,
  CompileResult,
  DeviceRecord,
  FirmwareToolchain,
  OtaTarget,
  UploadResult
} from "../models/types";
import { getLogger, UpdaterLogger } from "../utils/logger";
import { ContainerRuntime } from "./ContainerRuntime";
import {
  classifyCompileFailure,
  classifyUploadFailure,
  combinedOutput,
  extractErrorLines,
  hasWarnings,
  parseToolVersion,
  tailLines
} from "./diagnostics";

export interface ToolchainOptions {
  readonly compilerCommand: string;
  /** Répertoire des configurations tel qu'il est monté dans l'environnement. */
  readonly containerConfigDir: string;
  readonly commandTimeoutMs: number;
  readonly stopOnWarning: boolean;
}

/**
 * Compilation et envoi OTA via l'outil de firmware exécuté dans l'environnement
 * de build. Aucun échec n'est levé : tout est décrit par le résultat.
 */
export class EspToolchain implements FirmwareToolchain {
  private readonly logger: UpdaterLogger = getLogger("Toolchain");

  constructor(
    private readonly runtime: ContainerRuntime,
    private readonly options: ToolchainOptions
  ) {}

  containerPath(configFile: string): string {
    return path.posix.join(this.options.containerConfigDir, configFile);
  }

  async compile(device: DeviceRecord, cancellation: CancellationToken): Promise<CompileResult> {
    const configPath = this.containerPath(device.configFile);
    this.logger.info({ device: device.name }, `Compilation de ${device.configFile}`);

    const result = await this.invoke(["compile", configPath], cancellation);
    const output = combinedOutput(result);
    this.logger.debug({ device: device.name, code: result.code, output }, "Sortie de compilation");

    const base = {
      errorLines: extractErrorLines(output),
      tail: tailLines(output),
      warnings: hasWarnings(output),
      cancelled: result.cancelled,
      elapsedMs: result.elapsedMs
    };

    if (result.cancelled) {
      return { ...base, status: "ERROR", error: "Compilation interrompue" };
    }

    if (result.code !== 0) {
      const { kind, message } = classifyCompileFailure(result, configPath);
      return { ...base, status: result.timedOut ? "TIMEOUT" : "ERROR", kind, error: message };
    }

    if (base.warnings) {
      this.logger.verbose({ device: device.name }, "La compilation a produit des avertissements");
      if (this.options.stopOnWarning) {
        return { ...base, status: "ERROR", kind: "warning", error: "Avertissement de compilation (stop_on_compilation_warning actif)" };
      }
    }

    return { ...base, status: "OK" };
  }

  async upload(device: DeviceRecord, target: OtaTarget, cancellation: CancellationToken): Promise<UploadResult> {
    const configPath = this.containerPath(device.configFile);
    this.logger.info({ device: device.name, target: target.address }, `Envoi OTA vers ${target.address}`);

    const result = await this.invoke(["upload", "--device", target.address, configPath], cancellation);
    const output = combinedOutput(result);
    this.logger.debug({ device: device.name, code: result.code, output }, "Sortie d'envoi");

    const base = {
      errorLines: extractErrorLines(output),
      tail: tailLines(output),
      warnings: false,
      cancelled: result.cancelled,
      elapsedMs: result.elapsedMs
    };

    if (result.cancelled) {
      return { ...base, status: "ERROR", error: "Envoi interrompu" };
    }

    if (result.code !== 0) {
      const { kind, message } = classifyUploadFailure(result);
      return { ...base, status: result.timedOut ? "TIMEOUT" : "ERROR", kind, error: message };
    }

    return { ...base, status: "OK" };
  }

  /** Version de l'outil, ou `undefined` si elle ne peut pas être déterminée. */
  async queryVersion(configFile: string, cancellation?: CancellationToken): Promise<string | undefined> {
    const result = await this.invoke(["version", this.containerPath(configFile)], cancellation);
    if (result.code !== 0) {
      this.logger.debug({ code: result.code }, "Version de l'outil indisponible");
      return undefined;
    }
    return parseToolVersion(result.stdout);
  }

  private invoke(args: ReadonlyArray<string>, cancellation?: CancellationToken): Promise<CommandResult> {
    return this.runtime.exec(this.options.compilerCommand, args, cancellation, {
      timeoutMs: this.options.commandTimeoutMs
    });
  }
}
