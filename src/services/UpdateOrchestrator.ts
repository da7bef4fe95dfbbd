import { BehaviorSubject, Observable } from "rxjs";
import { v4 as uuidv4 } from "uuid";
import {
  ArtifactLocation,
  ArtifactLocator,
  ArtifactStaging,
  CompileFailureKind,
  DeviceOutcome,
  DeviceRecord,
  DeviceState,
  DeviceStatus,
  FirmwareToolchain,
  ProgressBucket,
  ProgressSink,
  ProgressState,
  ReachabilityProbe,
  RunReport,
  UpdateOptions,
  UploadFailureKind
} from "../models/types";
import { describeError } from "../utils/errors";
import { getLogger, UpdaterLogger } from "../utils/logger";
import { resolveTarget } from "./AddressResolver";
import { CancellationController } from "./CancellationController";
import { filterDevices, FilterOptions } from "./DeviceFilter";
import { countProgress, findBucket, recordOutcome } from "./ProgressStore";

export type OrchestratorOptions = FilterOptions &
  Pick<
    UpdateOptions,
    | "dry_run"
    | "delay_between_updates"
    | "skip_offline"
    | "stop_on_compilation_error"
    | "stop_on_upload_error"
    | "link_local_suffix"
    | "stage_firmware"
  >;

export interface OrchestratorDependencies {
  readonly toolchain: FirmwareToolchain;
  readonly locator: ArtifactLocator;
  readonly staging?: ArtifactStaging;
  readonly probe: ReachabilityProbe;
  readonly progressSink: ProgressSink;
  readonly cancellation: CancellationController;
}

type StopReason = "compile" | "upload";

interface DeviceRun {
  readonly outcome: DeviceOutcome;
  readonly stop?: StopReason;
  readonly interrupted?: boolean;
}

function nowIso(): string {
  return new Date().toISOString();
}

/**
 * Fait passer chaque appareil éligible par compilation, localisation du binaire,
 * envoi OTA puis enregistrement, un appareil à la fois.
 */
export class UpdateOrchestrator {
  private readonly statusSubject = new BehaviorSubject<ReadonlyArray<DeviceStatus>>([]);
  private readonly statuses = new Map<string, DeviceStatus>();
  private logger: UpdaterLogger = getLogger("Orchestrator");
  private progress: ProgressState = { done: [], failed: [], skipped: [] };
  private fleet: ReadonlyArray<DeviceRecord> = [];

  constructor(
    private readonly dependencies: OrchestratorDependencies,
    private readonly options: OrchestratorOptions
  ) {}

  observeDevices(): Observable<ReadonlyArray<DeviceStatus>> {
    return this.statusSubject.asObservable();
  }

  getProgress(): ProgressState {
    return this.progress;
  }

  async run(devices: ReadonlyArray<DeviceRecord>, initialProgress: ProgressState): Promise<RunReport> {
    const runId = uuidv4();
    const startedAt = nowIso();
    const { cancellation } = this.dependencies;
    this.logger = getLogger("Orchestrator").child({ runId });
    this.progress = initialProgress;
    this.fleet = devices;
    this.statuses.clear();
    devices.forEach((device) => this.setStatus(device.name, "pending"));

    const filtering = filterDevices(devices, this.options, initialProgress);
    this.logger.info(`Appareils découverts: ${devices.length}`);
    this.logger.info(`Appareils à traiter: ${filtering.eligible.length}`);
    this.logger.info(`Appareils ignorés: ${devices.length - filtering.eligible.length}`);

    let filteredRecorded = false;
    for (const { device, decision } of filtering.excluded) {
      this.setStatus(device.name, "filtered-out", decision.reason);
      this.logger.verbose({ device: device.name }, `✗ ${device.name} - ${decision.reason}`);
      if (!decision.bucket && !findBucket(this.progress, device.name)) {
        this.progress = recordOutcome(this.progress, device.name, "skipped");
        filteredRecorded = true;
      }
    }
    if (filteredRecorded) {
      this.dependencies.progressSink.save(this.progress);
    }

    if (this.options.dry_run && filtering.eligible.length > 0) {
      this.logger.info("Mode simulation : aucune compilation ni aucun envoi ne sera effectué");
    }

    const outcomes: DeviceOutcome[] = [];
    let interrupted = false;
    let stoppedBy: StopReason | undefined;
    const total = filtering.eligible.length;

    try {
      for (const [index, device] of filtering.eligible.entries()) {
        if (cancellation.isCancellationRequested) {
          interrupted = true;
          break;
        }

        this.logger.info({ device: device.name }, `[${index + 1}/${total}] Traitement: ${device.name}`);
        this.logger.verbose(
          { device: device.name },
          `Configuration: ${device.configFile} | versions déployée=${device.deployedVersion ?? "inconnue"} courante=${device.currentVersion ?? "inconnue"}`
        );

        const result = this.options.dry_run ? this.simulate(device) : await this.processDevice(device);
        outcomes.push(result.outcome);

        if (result.interrupted) {
          interrupted = true;
          break;
        }
        if (result.stop) {
          stoppedBy = result.stop;
          this.logger.info(
            result.stop === "compile"
              ? "Arrêt suite à une erreur de compilation (stop_on_compilation_error)"
              : "Arrêt suite à une erreur d'envoi (stop_on_upload_error)"
          );
          break;
        }

        const hasNext = index < total - 1;
        if (hasNext && !this.options.dry_run && this.options.delay_between_updates > 0) {
          this.logger.debug(`Pause de ${this.options.delay_between_updates}s avant l'appareil suivant`);
          const completed = await cancellation.sleep(this.options.delay_between_updates);
          if (!completed) {
            interrupted = true;
            break;
          }
        }
      }
    } catch (error) {
      this.logger.error({ error: describeError(error) }, "Erreur inattendue pendant le traitement");
      this.dependencies.progressSink.save(this.progress);
      throw error;
    }

    if (interrupted) {
      this.logger.warn("Exécution interrompue, progression enregistrée");
    }

    return {
      runId,
      startedAt,
      completedAt: nowIso(),
      dryRun: this.options.dry_run,
      discovered: devices.length,
      eligible: total,
      outcomes,
      skipReasons: filtering.reasons,
      progress: this.progress,
      counts: countProgress(this.progress),
      interrupted,
      stoppedBy
    };
  }

  private simulate(device: DeviceRecord): DeviceRun {
    this.logger.info({ device: device.name }, "→ [SIMULATION] Compilation et envoi non exécutés");
    this.record(device.name, "done");
    this.setStatus(device.name, "done", "dry-run");
    return { outcome: { name: device.name, state: "done", bucket: "done", elapsedMs: 0 } };
  }

  private async processDevice(device: DeviceRecord): Promise<DeviceRun> {
    const { toolchain, cancellation, probe } = this.dependencies;
    const start = Date.now();
    const elapsed = (): number => Date.now() - start;

    this.setStatus(device.name, "compiling");
    const compile = await toolchain.compile(device, cancellation);
    if (compile.cancelled || cancellation.isCancellationRequested) {
      return this.interrupt(device, elapsed());
    }

    if (compile.status !== "OK") {
      return this.compileFailed(device, compile.kind ?? "unknown", compile.error ?? "Échec de la compilation", elapsed(), compile.tail);
    }

    const artifact = await this.locateArtifact(device);
    if (!artifact) {
      return this.compileFailed(device, "artifact-not-found", "Binaire introuvable après compilation", elapsed(), compile.tail);
    }

    if (this.options.stage_firmware && this.dependencies.staging) {
      try {
        await this.dependencies.staging.stage(device, artifact);
      } catch (error) {
        return this.compileFailed(device, "artifact-copy", `Copie du binaire impossible: ${describeError(error)}`, elapsed(), []);
      }
    }

    this.setStatus(device.name, "compiled", artifact.layout);
    this.logger.verbose({ device: device.name, firmware: artifact.path }, "✓ Compilation réussie");

    const target = resolveTarget(device, artifact.buildDerivedName, this.options.link_local_suffix);
    this.setStatus(device.name, "uploading", undefined, target.address);
    this.logger.verbose({ device: device.name, target: target.address, source: target.source }, `Cible OTA: ${target.address}`);

    if (this.options.skip_offline && target.isIpAddress) {
      const reachable = await probe.isReachable(target.address, cancellation);
      if (cancellation.isCancellationRequested) {
        return this.interrupt(device, elapsed());
      }
      if (!reachable) {
        this.logger.info({ device: device.name, target: target.address }, `⊘ ${device.name} hors ligne, ignoré`);
        this.record(device.name, "skipped");
        this.setStatus(device.name, "offline-skipped", "hors ligne", target.address);
        return {
          outcome: { name: device.name, state: "offline-skipped", bucket: "skipped", target: target.address, elapsedMs: elapsed() }
        };
      }
    }

    const upload = await toolchain.upload(device, target, cancellation);
    if (upload.cancelled || cancellation.isCancellationRequested) {
      return this.interrupt(device, elapsed());
    }

    if (upload.status !== "OK") {
      const kind: UploadFailureKind = upload.kind ?? "unknown";
      const error = upload.error ?? "Échec de l'envoi";
      this.logger.info({ device: device.name, kind, tail: upload.tail }, `✗ Échec de l'envoi: ${error}`);
      this.record(device.name, "failed");
      this.setStatus(device.name, "upload-failed", error, target.address);
      return {
        outcome: { name: device.name, state: "upload-failed", bucket: "failed", kind, error, target: target.address, elapsedMs: elapsed() },
        stop: this.options.stop_on_upload_error ? "upload" : undefined
      };
    }

    this.logger.info({ device: device.name, target: target.address }, `✓ ${device.name} mis à jour`);
    this.record(device.name, "done");
    this.setStatus(device.name, "done", undefined, target.address);
    return { outcome: { name: device.name, state: "done", bucket: "done", target: target.address, elapsedMs: elapsed() } };
  }

  /**
   * L'outil nomme le dossier de build d'après le nom déclaré ; le nom de fichier sert de repli.
   * Les dossiers des autres appareils de la flotte sont écartés.
   */
  private async locateArtifact(device: DeviceRecord): Promise<ArtifactLocation | undefined> {
    const { locator } = this.dependencies;
    const own = new Set([device.name, device.declaredName ?? device.name]);
    const foreign = Array.from(new Set(this.fleet.flatMap((other) => [other.name, other.declaredName ?? other.name]))).filter(
      (name) => !own.has(name)
    );

    const stems = device.declaredName && device.declaredName !== device.name ? [device.declaredName, device.name] : [device.name];
    for (const stem of stems) {
      const located = await locator.locate(stem, foreign);
      if (located) {
        return located;
      }
    }
    return undefined;
  }

  private compileFailed(
    device: DeviceRecord,
    kind: CompileFailureKind,
    error: string,
    elapsedMs: number,
    tail: ReadonlyArray<string>
  ): DeviceRun {
    this.logger.info({ device: device.name, kind, tail }, `✗ Échec de la compilation: ${error}`);
    this.record(device.name, "failed");
    this.setStatus(device.name, "compile-failed", error);

    const stops = this.options.stop_on_compilation_error;
    return {
      outcome: { name: device.name, state: "compile-failed", bucket: "failed", kind, error, elapsedMs },
      stop: stops ? "compile" : undefined
    };
  }

  /** Un appareil interrompu n'est pas enregistré : il sera repris au prochain run. */
  private interrupt(device: DeviceRecord, elapsedMs: number): DeviceRun {
    this.setStatus(device.name, "interrupted");
    this.logger.warn({ device: device.name }, `Interruption pendant le traitement de ${device.name}`);
    return { outcome: { name: device.name, state: "interrupted", elapsedMs }, interrupted: true };
  }

  private record(name: string, bucket: ProgressBucket): void {
    this.progress = recordOutcome(this.progress, name, bucket);
    this.dependencies.progressSink.save(this.progress);
  }

  private setStatus(name: string, state: DeviceState, reason?: string, target?: string): void {
    this.statuses.set(name, { name, state, reason, target, updatedAt: nowIso() });
    this.statusSubject.next(Array.from(this.statuses.values()));
  }
}
