import { Dirent, existsSync } from "fs";
import { readdir, stat } from "fs/promises";
import path from "path";
import { ArtifactLocation, ArtifactLocator, ArtifactStaging, DeviceRecord } from "../models/types";
import { copyFileAtomic } from "../utils/atomicFile";
import { describeError } from "../utils/errors";
import { getLogger, UpdaterLogger } from "../utils/logger";

const FIRMWARE_FILE = "firmware.bin";
const WILDCARD_MAX_DEPTH = 6;

export const SCORE_PREFIX = 3;
export const SCORE_EXACT = 2;
export const SCORE_SUBSTRING = 1;

/**
 * Pertinence d'un répertoire de build pour un appareil. Le préfixe `<stem>-`,
 * `<stem>_` ou `<stem>.` correspond au nommage de l'outil et passe avant
 * l'égalité stricte ; 0 exclut le candidat.
 */
export function scoreCandidate(candidate: string, deviceStem: string): number {
  const name = candidate.toLowerCase();
  const stem = deviceStem.toLowerCase();
  if (stem.length === 0) {
    return 0;
  }
  if (["-", "_", "."].some((separator) => name.startsWith(`${stem}${separator}`))) {
    return SCORE_PREFIX;
  }
  if (name === stem) {
    return SCORE_EXACT;
  }
  return name.includes(stem) ? SCORE_SUBSTRING : 0;
}

/**
 * Candidats retenus, du meilleur score au moins bon ; à score égal l'ordre d'entrée est conservé.
 * Un répertoire portant le nom d'un autre appareil (`foreign`) n'est jamais retenu.
 */
export function rankCandidates(
  candidates: ReadonlyArray<string>,
  deviceStem: string,
  foreign: ReadonlyArray<string> = []
): string[] {
  const excluded = new Set(foreign.map((name) => name.toLowerCase()));
  excluded.delete(deviceStem.toLowerCase());
  return candidates
    .filter((candidate) => !excluded.has(candidate.toLowerCase()))
    .map((candidate, index) => ({ candidate, index, score: scoreCandidate(candidate, deviceStem) }))
    .filter((entry) => entry.score > 0)
    .sort((left, right) => right.score - left.score || left.index - right.index)
    .map((entry) => entry.candidate);
}

export interface BuildLayout {
  readonly id: string;
  /** Chemin attendu du binaire pour un répertoire candidat. */
  firmwarePath(root: string, candidate: string): string;
}

/** Conventions de sortie, de la plus récente à la plus ancienne. */
export const BUILD_LAYOUTS: ReadonlyArray<BuildLayout> = [
  {
    id: "pio-build",
    firmwarePath: (root, candidate) => path.join(root, candidate, ".pio", "build", candidate, FIRMWARE_FILE)
  },
  {
    id: "pioenvs",
    firmwarePath: (root, candidate) => path.join(root, candidate, ".pioenvs", candidate, FIRMWARE_FILE)
  }
];

export interface ArtifactResolverOptions {
  /** Racine des builds de l'outil (`<devices_dir>/.esphome`). */
  readonly buildRoot: string;
  readonly devicesDir: string;
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch {
    return false;
  }
}

export class ArtifactResolver implements ArtifactLocator {
  private readonly logger: UpdaterLogger = getLogger("ArtifactResolver");

  constructor(private readonly options: ArtifactResolverOptions) {}

  private get buildDir(): string {
    return path.join(this.options.buildRoot, "build");
  }

  async locate(deviceStem: string, foreign: ReadonlyArray<string> = []): Promise<ArtifactLocation | undefined> {
    const candidates = rankCandidates(await this.listBuildDirectories(), deviceStem, foreign);
    this.logger.debug({ deviceStem, candidates }, "Répertoires de build candidats");

    for (const layout of BUILD_LAYOUTS) {
      for (const candidate of candidates) {
        const firmware = layout.firmwarePath(this.buildDir, candidate);
        if (await isFile(firmware)) {
          return this.found(firmware, candidate, layout.id);
        }
      }
    }

    const legacy = path.join(this.options.devicesDir, deviceStem, ".pioenvs", deviceStem, FIRMWARE_FILE);
    if (await isFile(legacy)) {
      return this.found(legacy, deviceStem, "legacy");
    }

    for (const candidate of candidates) {
      const firmware = await this.searchBinary(path.join(this.buildDir, candidate), WILDCARD_MAX_DEPTH);
      if (firmware) {
        return this.found(firmware, candidate, "wildcard");
      }
    }

    this.logger.verbose({ deviceStem }, "Aucun binaire trouvé après compilation");
    return undefined;
  }

  private found(firmware: string, buildDerivedName: string, layout: string): ArtifactLocation {
    this.logger.debug({ firmware, buildDerivedName, layout }, "Binaire localisé");
    return { path: firmware, buildDerivedName, layout };
  }

  private async listBuildDirectories(): Promise<string[]> {
    if (!existsSync(this.buildDir)) {
      return [];
    }
    try {
      const entries = await readdir(this.buildDir, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isDirectory())
        .map((entry) => entry.name)
        .sort();
    } catch (error) {
      this.logger.warn({ dir: this.buildDir, error: describeError(error) }, "Lecture du répertoire de build impossible");
      return [];
    }
  }

  /** Recherche `*.bin` en largeur, `firmware.bin` préféré à profondeur égale. */
  private async searchBinary(root: string, maxDepth: number): Promise<string | undefined> {
    let level = [root];
    for (let depth = 0; depth <= maxDepth && level.length > 0; depth += 1) {
      const next: string[] = [];
      const binaries: string[] = [];
      for (const dir of level) {
        let entries: Dirent[];
        try {
          entries = await readdir(dir, { withFileTypes: true });
        } catch {
          continue;
        }
        for (const entry of entries.sort((left, right) => left.name.localeCompare(right.name))) {
          const fullPath = path.join(dir, entry.name);
          if (entry.isDirectory()) {
            next.push(fullPath);
          } else if (entry.isFile() && entry.name.toLowerCase().endsWith(".bin")) {
            binaries.push(fullPath);
          }
        }
      }
      const preferred = binaries.find((file) => path.basename(file) === FIRMWARE_FILE) ?? binaries[0];
      if (preferred) {
        return preferred;
      }
      level = next;
    }
    return undefined;
  }
}

/** Copie le binaire localisé sous `<devices_dir>/builds/<stem>.bin`. */
export class FirmwareStager implements ArtifactStaging {
  private readonly logger: UpdaterLogger = getLogger("FirmwareStager");

  constructor(private readonly buildsDir: string) {}

  async stage(device: DeviceRecord, artifact: ArtifactLocation): Promise<string> {
    const target = path.join(this.buildsDir, `${device.name}.bin`);
    await copyFileAtomic(artifact.path, target);
    this.logger.verbose({ device: device.name, target }, "Binaire copié");
    return target;
  }
}
