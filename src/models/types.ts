/**
 * Types et contrats partagés entre les services et la CLI.
 */

export type Verbosity = "quiet" | "normal" | "verbose" | "debug";

export type LogFormat = "text" | "json";

export interface DeviceRecord {
  /** Nom de base du document de configuration, sans extension. */
  readonly name: string;
  readonly configFile: string;
  readonly declaredName?: string;
  readonly declaredAddress?: string;
  readonly deployedVersion?: string;
  readonly currentVersion?: string;
}

export type ProgressBucket = "done" | "failed" | "skipped";

export interface ProgressState {
  readonly done: ReadonlyArray<string>;
  readonly failed: ReadonlyArray<string>;
  readonly skipped: ReadonlyArray<string>;
}

export interface TriggerMarkers {
  readonly clearLogNowConsumed: boolean;
  readonly clearProgressNowConsumed: boolean;
}

export interface RunState {
  readonly lastVersion?: string;
  readonly lastRunId?: string;
  readonly lastRunAt?: string;
  readonly triggers: TriggerMarkers;
}

export interface UpdateOptions {
  readonly device_name_patterns: ReadonlyArray<string>;
  readonly skip_device_name_patterns: ReadonlyArray<string>;
  readonly yaml_name_patterns: ReadonlyArray<string>;
  readonly skip_yaml_name_patterns: ReadonlyArray<string>;
  readonly update_when_no_deployed_version: boolean;
  readonly update_when_version_matches: boolean;
  readonly retry_failed: boolean;
  readonly dry_run: boolean;
  readonly delay_between_updates: number;
  readonly skip_offline: boolean;
  readonly stop_on_compilation_error: boolean;
  readonly stop_on_compilation_warning: boolean;
  readonly stop_on_upload_error: boolean;
  readonly clear_progress_on_start: boolean;
  readonly clear_progress_now: boolean;
  readonly clear_log_on_start: boolean;
  readonly clear_log_now: boolean;
  readonly clear_log_on_version_change: boolean;
  readonly log_level: Verbosity;
  readonly log_format: LogFormat;
  readonly devices_dir: string;
  readonly container_name: string;
  readonly container_runtime: string;
  readonly container_config_dir: string;
  readonly compiler_command: string;
  readonly command_timeout_seconds: number;
  readonly ping_timeout_seconds: number;
  readonly link_local_suffix: string;
  readonly stage_firmware: boolean;
  readonly repair_dashboard_metadata: boolean;
  readonly repair_skip_existing_metadata: boolean;
  readonly debug_test_single_device: string;
}

export interface WorkspacePaths {
  readonly workspaceDir: string;
  readonly optionsPath: string;
  readonly devicesDir: string;
  readonly buildRoot: string;
  readonly buildsDir: string;
  readonly dashboardFile: string;
  readonly progressFile: string;
  readonly stateFile: string;
  readonly logFile: string;
}

export interface FilterDecision {
  readonly process: boolean;
  readonly reason: string;
  /** Renseigné quand l'exclusion vient d'un ensemble de progression existant. */
  readonly bucket?: ProgressBucket;
}

export interface CommandResult {
  readonly code: number;
  readonly stdout: string;
  readonly stderr: string;
  readonly elapsedMs: number;
  readonly timedOut: boolean;
  readonly cancelled: boolean;
  readonly spawnError?: string;
}

export interface CommandOptions {
  readonly timeoutMs?: number;
  readonly cwd?: string;
}

export type CompileFailureKind =
  | "runtime"
  | "config-missing"
  | "build-error"
  | "warning"
  | "timeout"
  | "artifact-not-found"
  | "artifact-copy"
  | "unknown";

export type UploadFailureKind = "connection-refused" | "timeout" | "authentication" | "runtime" | "unknown";

export interface StepResult<K extends string = string> {
  readonly status: "OK" | "ERROR" | "TIMEOUT";
  readonly kind?: K;
  readonly error?: string;
  readonly errorLines: ReadonlyArray<string>;
  readonly tail: ReadonlyArray<string>;
  readonly warnings: boolean;
  readonly cancelled: boolean;
  readonly elapsedMs: number;
}

export type CompileResult = StepResult<CompileFailureKind>;
export type UploadResult = StepResult<UploadFailureKind>;

export interface ArtifactLocation {
  readonly path: string;
  readonly buildDerivedName: string;
  readonly layout: string;
}

export type TargetSource = "declared" | "build" | "device-name";

export interface OtaTarget {
  readonly address: string;
  readonly source: TargetSource;
  readonly isIpAddress: boolean;
}

export type DeviceState =
  | "pending"
  | "filtered-out"
  | "compiling"
  | "compile-failed"
  | "compiled"
  | "uploading"
  | "upload-failed"
  | "offline-skipped"
  | "done"
  | "interrupted";

export interface DeviceStatus {
  readonly name: string;
  readonly state: DeviceState;
  readonly reason?: string;
  readonly target?: string;
  readonly updatedAt: string;
}

export interface DeviceOutcome {
  readonly name: string;
  readonly state: DeviceState;
  readonly bucket?: ProgressBucket;
  readonly error?: string;
  readonly kind?: CompileFailureKind | UploadFailureKind;
  readonly target?: string;
  readonly elapsedMs: number;
}

export interface RunCounts {
  readonly done: number;
  readonly failed: number;
  readonly skipped: number;
}

export interface RunReport {
  readonly runId: string;
  readonly startedAt: string;
  readonly completedAt: string;
  readonly dryRun: boolean;
  readonly discovered: number;
  readonly eligible: number;
  readonly outcomes: ReadonlyArray<DeviceOutcome>;
  readonly skipReasons: ReadonlyMap<string, number>;
  readonly progress: ProgressState;
  readonly counts: RunCounts;
  readonly interrupted: boolean;
  readonly stoppedBy?: "compile" | "upload";
}

export interface TrackedProcess {
  readonly pid?: number;
}

export interface CancellationToken {
  readonly isCancellationRequested: boolean;
  readonly signal: AbortSignal;
  /** Enregistre le processus externe en cours ; la fonction renvoyée le libère. */
  track(child: TrackedProcess): () => void;
}

export interface FirmwareToolchain {
  compile(device: DeviceRecord, cancellation: CancellationToken): Promise<CompileResult>;
  upload(device: DeviceRecord, target: OtaTarget, cancellation: CancellationToken): Promise<UploadResult>;
}

export interface ArtifactLocator {
  /** `foreign` : noms des autres appareils, dont les répertoires de build sont écartés. */
  locate(deviceStem: string, foreign?: ReadonlyArray<string>): Promise<ArtifactLocation | undefined>;
}

export interface ArtifactStaging {
  stage(device: DeviceRecord, artifact: ArtifactLocation): Promise<string>;
}

export interface ReachabilityProbe {
  isReachable(address: string, cancellation: CancellationToken): Promise<boolean>;
}

export interface ProgressSink {
  save(state: ProgressState): boolean;
}
