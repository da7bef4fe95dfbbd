import process from "process";
import { Observable } from "rxjs";
import { DeviceRecord, DeviceStatus, ProgressState, RunReport, UpdateOptions, WorkspacePaths } from "../models/types";
import { LoadOptionsParams, loadOptions, resolveContainerName, resolveUpdaterVersion } from "../utils/config";
import { configureLogger, getLogger, UpdaterLogger } from "../utils/logger";
import { ArtifactResolver, FirmwareStager } from "./ArtifactResolver";
import { CancellationController } from "./CancellationController";
import { CommandExecutor, CommandRunner } from "./CommandRunner";
import { ContainerRuntime } from "./ContainerRuntime";
import { DashboardMetadataReader } from "./DashboardMetadata";
import { applyToolVersion, DeviceCatalog } from "./DeviceCatalog";
import { DeviceDiagnostic, DiagnosticReport } from "./DeviceDiagnostic";
import { EspToolchain } from "./FirmwareToolchain";
import { Housekeeping } from "./Housekeeping";
import { PingProbe } from "./AddressResolver";
import { ProgressStore, RunStateStore } from "./ProgressStore";
import { RepairReport, RepairRunner } from "./RepairRunner";
import { formatHeader, logRunSummary } from "./RunSummary";
import { UpdateOrchestrator } from "./UpdateOrchestrator";

export type ManagerOutcome =
  | { readonly mode: "update"; readonly report: RunReport }
  | { readonly mode: "repair"; readonly report: RepairReport }
  | { readonly mode: "diagnostic"; readonly report: DiagnosticReport };

export interface UpdateManagerDependencies {
  readonly runner?: CommandExecutor;
  readonly cancellation?: CancellationController;
  readonly env?: NodeJS.ProcessEnv;
}

interface Session {
  readonly options: UpdateOptions;
  readonly paths: WorkspacePaths;
  readonly progressStore: ProgressStore;
  readonly stateStore: RunStateStore;
  readonly runtime: ContainerRuntime;
  readonly metadata: DashboardMetadataReader;
  progress: ProgressState;
}

/**
 * Point d'assemblage : charge les options, prépare l'espace de travail, vérifie
 * l'environnement de build puis lance le mode demandé.
 */
export class UpdateManager {
  private readonly runner: CommandExecutor;
  private readonly cancellation: CancellationController;
  private readonly env: NodeJS.ProcessEnv;
  private logger: UpdaterLogger = getLogger("UpdateManager");
  private session?: Session;
  private orchestrator?: UpdateOrchestrator;

  constructor(dependencies: UpdateManagerDependencies = {}) {
    this.cancellation = dependencies.cancellation ?? new CancellationController();
    this.runner = dependencies.runner ?? new CommandRunner();
    this.env = dependencies.env ?? process.env;
  }

  getCancellation(): CancellationController {
    return this.cancellation;
  }

  observeDevices(): Observable<ReadonlyArray<DeviceStatus>> | undefined {
    return this.orchestrator?.observeDevices();
  }

  async initialize(params: LoadOptionsParams = {}): Promise<UpdateOptions> {
    const { options, paths, created } = await loadOptions({ ...params, env: this.env });

    configureLogger({ logFile: paths.logFile, logFormat: options.log_format, verbosity: options.log_level });
    this.logger = getLogger("UpdateManager");

    const progressStore = new ProgressStore(paths.progressFile);
    const stateStore = new RunStateStore(paths.stateFile);
    const updaterVersion = resolveUpdaterVersion(this.env);
    const housekeeping = new Housekeeping({
      progressStore,
      stateStore,
      logFile: paths.logFile,
      updaterVersion
    });
    const { progress, state } = housekeeping.run(options, progressStore.load());

    formatHeader(`Mise à jour OTA de la flotte v${updaterVersion}`).forEach((line) => this.logger.notice(line));
    this.logger.info(`Niveau de journal: ${options.log_level}`);
    if (created) {
      this.logger.info({ optionsPath: paths.optionsPath }, "Fichier d'options créé avec les valeurs par défaut");
    }
    if (state.lastRunAt) {
      this.logger.verbose({ lastRunId: state.lastRunId }, `Dernier run terminé le ${state.lastRunAt}`);
    }

    this.session = {
      options,
      paths,
      progressStore,
      stateStore,
      runtime: this.createRuntime(options),
      metadata: new DashboardMetadataReader(paths.dashboardFile),
      progress
    };
    return options;
  }

  async run(): Promise<ManagerOutcome> {
    const session = this.requireSession();
    const { options, runtime } = session;

    this.logger.verbose({ container: runtime.name }, `Environnement de build: ${runtime.name ?? "non défini"}`);
    await runtime.verify(this.cancellation);
    this.logger.verbose("✓ Runtime de conteneurs joignable");

    formatHeader("Découverte des appareils").forEach((line) => this.logger.notice(line));
    const devices = await this.discover(session);
    this.logger.info(`${devices.length} appareils découverts`);

    if (options.debug_test_single_device) {
      configureLogger({ verbosity: "debug" });
      const diagnostic = new DeviceDiagnostic(this.createToolchain(options));
      return { mode: "diagnostic", report: await diagnostic.run(devices, options.debug_test_single_device, this.cancellation) };
    }

    if (options.repair_dashboard_metadata) {
      configureLogger({ verbosity: "verbose" });
      const repair = new RepairRunner({ toolchain: this.createToolchain(options), metadata: session.metadata, cancellation: this.cancellation });
      const report = await repair.run(devices, options.repair_skip_existing_metadata);
      configureLogger({ verbosity: options.log_level });
      this.logger.notice("Réparation terminée. Désactivez repair_dashboard_metadata pour reprendre les mises à jour.");
      return { mode: "repair", report };
    }

    return { mode: "update", report: await this.update(session, devices) };
  }

  /** Sauvegarde best-effort, appelée avant toute sortie anticipée. */
  flushProgress(): void {
    if (!this.session) {
      return;
    }
    const current = this.orchestrator?.getProgress() ?? this.session.progress;
    this.session.progressStore.save(current);
  }

  private async discover(session: Session): Promise<DeviceRecord[]> {
    const catalog = new DeviceCatalog(session.paths.devicesDir, session.metadata);
    const devices = await catalog.discoverOrFail();

    // Une seule interrogation de l'outil par run.
    const toolVersion = devices.every((device) => device.currentVersion)
      ? undefined
      : await this.createToolchain(session.options).queryVersion(devices[0].configFile, this.cancellation);
    return applyToolVersion(devices, toolVersion);
  }

  private async update(session: Session, devices: ReadonlyArray<DeviceRecord>): Promise<RunReport> {
    const { options, paths } = session;
    formatHeader("Traitement des appareils").forEach((line) => this.logger.notice(line));

    this.orchestrator = new UpdateOrchestrator(
      {
        toolchain: this.createToolchain(options),
        locator: new ArtifactResolver({ buildRoot: paths.buildRoot, devicesDir: paths.devicesDir }),
        staging: new FirmwareStager(paths.buildsDir),
        probe: new PingProbe(this.runner, { timeoutSeconds: options.ping_timeout_seconds }),
        progressSink: session.progressStore,
        cancellation: this.cancellation
      },
      options
    );

    const report = await this.orchestrator.run(devices, session.progress);
    session.progress = report.progress;
    session.stateStore.recordRun(report.runId, report.completedAt);
    logRunSummary(this.logger, report, { logFile: paths.logFile, progressFile: paths.progressFile });
    return report;
  }

  private createRuntime(options: UpdateOptions): ContainerRuntime {
    return new ContainerRuntime(this.runner, {
      runtime: options.container_runtime,
      containerName: resolveContainerName(options, this.env)
    });
  }

  /** Recréé après chaque changement de verbosité pour suivre le journal courant. */
  private createToolchain(options: UpdateOptions): EspToolchain {
    return new EspToolchain(this.createRuntime(options), {
      compilerCommand: options.compiler_command,
      containerConfigDir: options.container_config_dir,
      commandTimeoutMs: options.command_timeout_seconds * 1000,
      stopOnWarning: options.stop_on_compilation_warning
    });
  }

  private requireSession(): Session {
    if (!this.session) {
      throw new Error("UpdateManager non initialisé : appelez initialize() d'abord");
    }
    return this.session;
  }
}
