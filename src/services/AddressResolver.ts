import { isIP } from "net";
import { CancellationToken, DeviceRecord, OtaTarget, ReachabilityProbe } from "../models/types";
import { getLogger, UpdaterLogger } from "../utils/logger";
import { CommandExecutor, SPAWN_FAILURE_EXIT_CODE } from "./CommandRunner";

export const DEFAULT_LINK_LOCAL_SUFFIX = ".local";

export function isIpAddress(value: string): boolean {
  return isIP(value) !== 0;
}

/** Ajoute le suffixe lien-local à un nom qui ne l'a pas déjà. */
export function withLinkLocalSuffix(host: string, suffix = DEFAULT_LINK_LOCAL_SUFFIX): string {
  return host.toLowerCase().endsWith(suffix.toLowerCase()) ? host : `${host}${suffix}`;
}

/**
 * Cible OTA par ordre de priorité : adresse déclarée (IP telle quelle, nom court
 * suffixé), puis nom issu du build, puis nom de l'appareil.
 */
export function resolveTarget(
  device: DeviceRecord,
  buildDerivedName?: string,
  suffix = DEFAULT_LINK_LOCAL_SUFFIX
): OtaTarget {
  const declared = device.declaredAddress?.trim();
  if (declared) {
    if (isIpAddress(declared)) {
      return { address: declared, source: "declared", isIpAddress: true };
    }
    const address = declared.includes(".") ? declared : withLinkLocalSuffix(declared, suffix);
    return { address, source: "declared", isIpAddress: false };
  }

  const fromBuild = buildDerivedName?.trim();
  if (fromBuild) {
    return { address: withLinkLocalSuffix(fromBuild, suffix), source: "build", isIpAddress: false };
  }

  return {
    address: withLinkLocalSuffix(device.declaredName ?? device.name, suffix),
    source: "device-name",
    isIpAddress: false
  };
}

export interface PingProbeOptions {
  readonly timeoutSeconds: number;
  readonly command?: string;
}

/** Un seul écho réseau ; l'absence de l'outil `ping` ne bloque jamais la mise à jour. */
export class PingProbe implements ReachabilityProbe {
  private readonly logger: UpdaterLogger = getLogger("PingProbe");

  constructor(
    private readonly runner: CommandExecutor,
    private readonly options: PingProbeOptions
  ) {}

  async isReachable(address: string, cancellation: CancellationToken): Promise<boolean> {
    const seconds = Math.max(1, Math.round(this.options.timeoutSeconds));
    const result = await this.runner.run(
      this.options.command ?? "ping",
      ["-c", "1", "-W", String(seconds), address],
      cancellation,
      { timeoutMs: (seconds + 3) * 1000 }
    );

    if (result.spawnError || result.code === SPAWN_FAILURE_EXIT_CODE) {
      this.logger.debug({ address, spawnError: result.spawnError }, "Outil de ping indisponible, appareil supposé joignable");
      return true;
    }

    const reachable = result.code === 0;
    this.logger.debug({ address, reachable }, "Résultat du ping");
    return reachable;
  }
}
