import { DeviceRecord, FirmwareToolchain } from "../models/types";
import { getLogger, UpdaterLogger } from "../utils/logger";
import { CancellationController } from "./CancellationController";
import { DashboardMetadataReader } from "./DashboardMetadata";
import { formatHeader } from "./RunSummary";

const REPAIR_DELAY_SECONDS = 0.5;

export interface RepairReport {
  readonly total: number;
  readonly repaired: number;
  readonly alreadyPresent: number;
  readonly failed: number;
  readonly interrupted: boolean;
}

export interface RepairDependencies {
  readonly toolchain: FirmwareToolchain;
  readonly metadata: DashboardMetadataReader;
  readonly cancellation: CancellationController;
}

/**
 * Compile sans envoi les appareils dont les métadonnées n'ont pas de version,
 * pour que l'outil les régénère. Ne s'arrête jamais sur une erreur.
 */
export class RepairRunner {
  private readonly logger: UpdaterLogger = getLogger("Repair");

  constructor(private readonly dependencies: RepairDependencies) {}

  async run(devices: ReadonlyArray<DeviceRecord>, skipExisting: boolean): Promise<RepairReport> {
    const { toolchain, metadata, cancellation } = this.dependencies;
    formatHeader("Réparation des métadonnées").forEach((line) => this.logger.notice(line));
    this.logger.notice("Aucun envoi OTA ne sera effectué");
    this.logger.info(
      skipExisting
        ? "Les appareils ayant déjà leurs métadonnées sont ignorés"
        : "Tous les appareils sont recompilés, métadonnées existantes ou non"
    );

    let repaired = 0;
    let alreadyPresent = 0;
    let failed = 0;
    let interrupted = false;
    const total = devices.length;

    for (const [index, device] of devices.entries()) {
      if (cancellation.isCancellationRequested) {
        interrupted = true;
        break;
      }

      this.logger.info({ device: device.name }, `[${index + 1}/${total}] Vérification: ${device.name}`);
      const existing = metadata.lookup(device.declaredName, device.name);
      if (skipExisting && existing?.deployedVersion && existing.currentVersion) {
        this.logger.verbose(
          { device: device.name },
          `✓ Métadonnées présentes: déployée=${existing.deployedVersion}, courante=${existing.currentVersion}`
        );
        alreadyPresent += 1;
        continue;
      }

      const result = await toolchain.compile(device, cancellation);
      if (result.cancelled || cancellation.isCancellationRequested) {
        interrupted = true;
        break;
      }

      if (result.status === "OK") {
        const refreshed = metadata.lookup(device.declaredName, device.name);
        if (refreshed?.deployedVersion || refreshed?.currentVersion) {
          this.logger.info(
            { device: device.name },
            `✓ Métadonnées générées: déployée=${refreshed.deployedVersion ?? "inconnue"}, courante=${refreshed.currentVersion ?? "inconnue"}`
          );
          repaired += 1;
        } else {
          this.logger.info({ device: device.name }, "⚠ Compilé mais métadonnées non renseignées");
          failed += 1;
        }
      } else {
        this.logger.info({ device: device.name, tail: result.tail }, `✗ Échec de la compilation: ${result.error ?? "inconnu"}`);
        failed += 1;
      }

      if (index < total - 1 && !(await cancellation.sleep(REPAIR_DELAY_SECONDS))) {
        interrupted = true;
        break;
      }
    }

    formatHeader("Bilan de la réparation").forEach((line) => this.logger.notice(line));
    this.logger.notice(`Appareils: ${total}`);
    this.logger.notice(`Métadonnées réparées: ${repaired}`);
    this.logger.notice(`Déjà présentes: ${alreadyPresent}`);
    this.logger.notice(`Échecs: ${failed}`);

    return { total, repaired, alreadyPresent, failed, interrupted };
  }
}
