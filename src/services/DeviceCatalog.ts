import { existsSync } from "fs";
import { readdir, readFile } from "fs/promises";
import path from "path";
import { DeviceRecord } from "../models/types";
import { describeError, FatalPreconditionError } from "../utils/errors";
import { getLogger, UpdaterLogger } from "../utils/logger";
import { DashboardMetadataReader } from "./DashboardMetadata";

const CONFIG_EXTENSIONS = [".yaml", ".yml"];
const NAME_PATTERN = /^\s*(?:name|device_name)\s*:\s*(.+?)\s*$/gm;
const ADDRESS_KEYS = ["use_address", "static_ip"];

function cleanValue(raw: string): string | undefined {
  const withoutComment = raw.replace(/\s+#.*$/, "").trim();
  const unquoted = withoutComment.replace(/^["']/, "").replace(/["']$/, "").trim();
  return unquoted.length > 0 ? unquoted : undefined;
}

/** Premier `name:` ou `device_name:` exploitable ; les substitutions `${...}` sont ignorées. */
export function extractDeclaredName(content: string): string | undefined {
  for (const match of content.matchAll(NAME_PATTERN)) {
    const value = cleanValue(match[1]);
    if (value && !value.includes("${")) {
      return value;
    }
  }
  return undefined;
}

export function extractDeclaredAddress(content: string): string | undefined {
  for (const key of ADDRESS_KEYS) {
    const match = new RegExp(`^\\s*${key}\\s*:\\s*(.+?)\\s*$`, "m").exec(content);
    const value = match ? cleanValue(match[1]) : undefined;
    if (value && !value.includes("${")) {
      return value;
    }
  }
  return undefined;
}

export function isConfigurationFile(fileName: string): boolean {
  if (fileName.startsWith(".")) {
    return false;
  }
  return CONFIG_EXTENSIONS.includes(path.extname(fileName).toLowerCase());
}

/** Complète `currentVersion` avec la version de l'outil quand les métadonnées n'en donnent pas. */
export function applyToolVersion(devices: ReadonlyArray<DeviceRecord>, toolVersion: string | undefined): DeviceRecord[] {
  if (!toolVersion) {
    return [...devices];
  }
  return devices.map((device) => (device.currentVersion ? device : { ...device, currentVersion: toolVersion }));
}

/**
 * Inventaire des appareils : un enregistrement par document de configuration,
 * trié par nom.
 */
export class DeviceCatalog {
  private readonly logger: UpdaterLogger = getLogger("DeviceCatalog");

  constructor(
    private readonly devicesDir: string,
    private readonly metadata?: DashboardMetadataReader
  ) {}

  async discover(): Promise<DeviceRecord[]> {
    if (!existsSync(this.devicesDir)) {
      return [];
    }

    const entries = await readdir(this.devicesDir, { withFileTypes: true });
    const files = entries
      .filter((entry) => entry.isFile() && isConfigurationFile(entry.name))
      .map((entry) => entry.name)
      .sort();

    this.logger.verbose({ count: files.length }, `Analyse de ${files.length} documents de configuration`);

    const devices: DeviceRecord[] = [];
    for (const configFile of files) {
      devices.push(await this.describe(configFile));
    }
    return devices.sort((left, right) => (left.name < right.name ? -1 : left.name > right.name ? 1 : 0));
  }

  /** Comme `discover`, mais un inventaire vide est une condition bloquante. */
  async discoverOrFail(): Promise<DeviceRecord[]> {
    if (!existsSync(this.devicesDir)) {
      throw new FatalPreconditionError("devices-dir-missing", `Répertoire des appareils introuvable: ${this.devicesDir}`);
    }

    const devices = await this.discover();
    if (devices.length === 0) {
      throw new FatalPreconditionError("no-configurations", `Aucun document de configuration dans ${this.devicesDir}`);
    }
    return devices;
  }

  private async describe(configFile: string): Promise<DeviceRecord> {
    const name = path.basename(configFile, path.extname(configFile));
    let content = "";
    try {
      content = await readFile(path.join(this.devicesDir, configFile), "utf-8");
    } catch (error) {
      this.logger.debug({ configFile, error: describeError(error) }, "Document illisible, champs déclarés ignorés");
    }

    const declaredName = extractDeclaredName(content);
    const metadata = this.metadata?.lookup(declaredName, name);
    const device: DeviceRecord = {
      name,
      configFile,
      declaredName,
      declaredAddress: extractDeclaredAddress(content) ?? metadata?.address,
      deployedVersion: metadata?.deployedVersion,
      currentVersion: metadata?.currentVersion
    };

    this.logger.debug(
      { device: name, configFile, declaredName, address: device.declaredAddress },
      `Appareil ${name} | déployé: ${device.deployedVersion ?? "inconnu"} | courant: ${device.currentVersion ?? "inconnu"}`
    );
    return device;
  }
}
