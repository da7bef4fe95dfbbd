export * from "./models/types";
export * from "./utils/config";
export * from "./utils/errors";
export { configureLogger, getLogger, parseVerbosity } from "./utils/logger";
export type { LoggerConfiguration, UpdaterLogger } from "./utils/logger";
export * from "./services/AddressResolver";
export * from "./services/ArtifactResolver";
export * from "./services/CancellationController";
export * from "./services/CommandRunner";
export * from "./services/ContainerRuntime";
export * from "./services/DashboardMetadata";
export * from "./services/DeviceCatalog";
export * from "./services/DeviceDiagnostic";
export * from "./services/DeviceFilter";
export * from "./services/diagnostics";
export * from "./services/FirmwareToolchain";
export * from "./services/Housekeeping";
export * from "./services/ProgressStore";
export * from "./services/RepairRunner";
export * from "./services/RunSummary";
export * from "./services/UpdateManager";
export * from "./services/UpdateOrchestrator";
