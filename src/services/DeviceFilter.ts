import { DeviceRecord, FilterDecision, ProgressBucket, ProgressState, UpdateOptions } from "../models/types";

export type FilterOptions = Pick<
  UpdateOptions,
  | "device_name_patterns"
  | "skip_device_name_patterns"
  | "yaml_name_patterns"
  | "skip_yaml_name_patterns"
  | "update_when_no_deployed_version"
  | "update_when_version_matches"
  | "retry_failed"
>;

export interface FilterOutcome {
  readonly eligible: ReadonlyArray<DeviceRecord>;
  readonly excluded: ReadonlyArray<{ readonly device: DeviceRecord; readonly decision: FilterDecision }>;
  readonly reasons: ReadonlyMap<string, number>;
}

const PROGRESS_REASONS: Record<ProgressBucket, string> = {
  done: "already processed (in done list)",
  failed: "previously failed (in failed list)",
  skipped: "previously skipped (in skipped list)"
};

function escapeRegExp(value: string): string {
  return value.replace(/[.+?^${}()|[\]\\]/g, "\\$&");
}

/** `*` couvre n'importe quelle suite de caractères ; le motif peut apparaître n'importe où. */
export function patternToRegExp(pattern: string): RegExp {
  const source = pattern.split("*").map(escapeRegExp).join(".*");
  return new RegExp(source, "i");
}

export function matchesPattern(text: string, patterns: ReadonlyArray<string>): boolean {
  return patterns.some((pattern) => pattern.length > 0 && patternToRegExp(pattern).test(text));
}

function hasConstraint(patterns: ReadonlyArray<string>): boolean {
  return patterns.some((pattern) => pattern.length > 0);
}

/** `"unknown"` et la chaîne vide valent une version inconnue. */
export function isKnownVersion(version: string | undefined): version is string {
  return version !== undefined && version.trim().length > 0 && version.trim().toLowerCase() !== "unknown";
}

function excluded(reason: string, bucket?: ProgressBucket): FilterDecision {
  return { process: false, reason, bucket };
}

export function shouldProcess(device: DeviceRecord, options: FilterOptions, progress: ProgressState): FilterDecision {
  const buckets: ReadonlyArray<ProgressBucket> = options.retry_failed ? ["done", "skipped"] : ["done", "failed", "skipped"];
  for (const bucket of buckets) {
    if (progress[bucket].includes(device.name)) {
      return excluded(PROGRESS_REASONS[bucket], bucket);
    }
  }

  if (hasConstraint(options.device_name_patterns) && !matchesPattern(device.name, options.device_name_patterns)) {
    return excluded("device name doesn't match include patterns");
  }
  if (matchesPattern(device.name, options.skip_device_name_patterns)) {
    return excluded("device name matches exclude pattern");
  }

  if (hasConstraint(options.yaml_name_patterns) && !matchesPattern(device.configFile, options.yaml_name_patterns)) {
    return excluded("config file doesn't match include patterns");
  }
  if (matchesPattern(device.configFile, options.skip_yaml_name_patterns)) {
    return excluded("config file matches exclude pattern");
  }

  const deployed = isKnownVersion(device.deployedVersion) ? device.deployedVersion : undefined;
  const current = isKnownVersion(device.currentVersion) ? device.currentVersion : undefined;

  if (!deployed && !options.update_when_no_deployed_version) {
    return excluded("no deployed version (update_when_no_deployed_version=false)");
  }

  if (deployed && current && deployed === current && !options.update_when_version_matches) {
    return excluded(`versions match (${current})`);
  }

  return { process: true, reason: "eligible" };
}

export function filterDevices(
  devices: ReadonlyArray<DeviceRecord>,
  options: FilterOptions,
  progress: ProgressState
): FilterOutcome {
  const eligible: DeviceRecord[] = [];
  const excludedDevices: Array<{ device: DeviceRecord; decision: FilterDecision }> = [];
  const reasons = new Map<string, number>();

  for (const device of devices) {
    const decision = shouldProcess(device, options, progress);
    if (decision.process) {
      eligible.push(device);
      continue;
    }
    excludedDevices.push({ device, decision });
    reasons.set(decision.reason, (reasons.get(decision.reason) ?? 0) + 1);
  }

  return { eligible, excluded: excludedDevices, reasons };
}
