import { CancellationToken, CompileResult, DeviceRecord, FirmwareToolchain } from "../models/types";
import { getLogger, UpdaterLogger } from "../utils/logger";
import { formatHeader } from "./RunSummary";

const LISTED_DEVICES = 10;

export interface DiagnosticReport {
  readonly device?: DeviceRecord;
  readonly result?: CompileResult;
}

/** Par nom, nom déclaré, ou préfixe du fichier de configuration. */
export function findDevice(devices: ReadonlyArray<DeviceRecord>, query: string): DeviceRecord | undefined {
  return devices.find(
    (device) => device.name === query || device.declaredName === query || device.configFile.startsWith(query)
  );
}

/** Compilation d'un seul appareil avec toute la sortie de l'outil dans le journal. */
export class DeviceDiagnostic {
  private readonly logger: UpdaterLogger = getLogger("Diagnostic");

  constructor(private readonly toolchain: FirmwareToolchain) {}

  async run(devices: ReadonlyArray<DeviceRecord>, query: string, cancellation: CancellationToken): Promise<DiagnosticReport> {
    formatHeader(`Diagnostic de l'appareil: ${query}`).forEach((line) => this.logger.notice(line));

    const device = findDevice(devices, query);
    if (!device) {
      this.logger.notice(`Appareil '${query}' introuvable`);
      this.logger.notice("Appareils disponibles:");
      devices.slice(0, LISTED_DEVICES).forEach((candidate) => this.logger.notice(`  - ${candidate.name} (${candidate.configFile})`));
      return {};
    }

    this.logger.notice(`Appareil: ${device.name}`);
    this.logger.notice(`Configuration: ${device.configFile}`);

    const result = await this.toolchain.compile(device, cancellation);
    result.tail.forEach((line) => this.logger.debug(line));
    if (result.status === "OK") {
      this.logger.notice(`✓ Compilation réussie${result.warnings ? " (avec avertissements)" : ""}`);
    } else {
      this.logger.notice({ kind: result.kind }, `✗ Échec de la compilation: ${result.error ?? "inconnu"}`);
      result.errorLines.forEach((line) => this.logger.notice(`    - ${line}`));
    }

    return { device, result };
  }
}
