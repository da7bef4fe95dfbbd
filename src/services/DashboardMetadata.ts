import { existsSync, readFileSync } from "fs";
import { describeError } from "../utils/errors";
import { getLogger, UpdaterLogger } from "../utils/logger";

export interface DashboardEntry {
  readonly name: string;
  readonly address?: string;
  readonly deployedVersion?: string;
  readonly currentVersion?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/** Convertit le document brut ; les entrées sans nom sont ignorées. */
export function parseDashboard(document: unknown): DashboardEntry[] {
  if (!isRecord(document) || !Array.isArray(document.devices)) {
    return [];
  }

  const entries: DashboardEntry[] = [];
  for (const raw of document.devices) {
    if (!isRecord(raw)) {
      continue;
    }
    const name = readString(raw, "name");
    if (!name) {
      continue;
    }
    entries.push({
      name,
      address: readString(raw, "address") ?? readString(raw, "ip"),
      deployedVersion: readString(raw, "deployed_version"),
      currentVersion: readString(raw, "current_version")
    });
  }
  return entries;
}

/**
 * Lecture du fichier de métadonnées tenu par l'outil de firmware. Relu à chaque
 * appel : une compilation peut l'avoir mis à jour entre-temps.
 */
export class DashboardMetadataReader {
  private readonly logger: UpdaterLogger = getLogger("DashboardMetadata");

  constructor(private readonly filePath: string) {}

  load(): DashboardEntry[] {
    if (!existsSync(this.filePath)) {
      this.logger.debug({ file: this.filePath }, "Fichier de métadonnées absent");
      return [];
    }

    try {
      return parseDashboard(JSON.parse(readFileSync(this.filePath, "utf-8")));
    } catch (error) {
      this.logger.debug({ file: this.filePath, error: describeError(error) }, "Métadonnées illisibles");
      return [];
    }
  }

  /** Première entrée correspondant à l'un des noms, dans l'ordre donné. */
  lookup(...names: ReadonlyArray<string | undefined>): DashboardEntry | undefined {
    const entries = this.load();
    for (const name of names) {
      if (!name) {
        continue;
      }
      const entry = entries.find((candidate) => candidate.name === name);
      if (entry) {
        return entry;
      }
    }
    return undefined;
  }
}
