import * as fs from "fs/promises";
import path from "path";
import process from "process";
import { UpdateOptions, WorkspacePaths } from "../models/types";
import optionsSchema from "../../update-options.schema.json";
import { assertValid, compileSchema } from "./validator";
import { describeError, isFileSystemError } from "./errors";
import { getLogger } from "./logger";

export const DEFAULT_OPTIONS_FILENAME = "fleet-updater.json";
export const PROGRESS_FILENAME = "fleet-update-progress.json";
export const STATE_FILENAME = "fleet-update-state.json";
export const LOG_FILENAME = "fleet-update.log";

const WORKSPACE_ENV = "FLEET_UPDATER_WORKSPACE";
const OPTIONS_ENV = "FLEET_UPDATER_OPTIONS";
const CONTAINER_ENV = "FLEET_UPDATER_CONTAINER";
const VERSION_ENV = "FLEET_UPDATER_VERSION";

const validateOptions = compileSchema<UpdateOptions>(optionsSchema);

export interface LoadOptionsParams {
  readonly workspaceDir?: string;
  readonly optionsPath?: string;
  readonly createIfMissing?: boolean;
  readonly env?: NodeJS.ProcessEnv;
}

export interface OptionsLoadResult {
  readonly options: UpdateOptions;
  readonly paths: WorkspacePaths;
  readonly created: boolean;
}

export function getWorkspaceDirectory(params?: LoadOptionsParams): string {
  const env = params?.env ?? process.env;
  const provided = params?.workspaceDir ?? env[WORKSPACE_ENV];
  const base = provided && provided.trim().length > 0 ? provided : process.cwd();
  return path.resolve(base);
}

export function getOptionsPath(params?: LoadOptionsParams): string {
  const env = params?.env ?? process.env;
  const explicit = params?.optionsPath ?? env[OPTIONS_ENV];
  if (explicit && explicit.trim().length > 0) {
    return path.resolve(explicit);
  }

  return path.join(getWorkspaceDirectory(params), DEFAULT_OPTIONS_FILENAME);
}

/**
 * Options par défaut telles que le schéma les documente.
 */
export function createDefaultOptions(overrides: Partial<UpdateOptions> = {}): UpdateOptions {
  return assertValid<UpdateOptions>(validateOptions, { ...overrides }, "Options");
}

export function resolveWorkspacePaths(workspaceDir: string, optionsPath: string, options: UpdateOptions): WorkspacePaths {
  const devicesDir = path.resolve(workspaceDir, options.devices_dir);
  const buildRoot = path.join(devicesDir, ".esphome");

  return {
    workspaceDir,
    optionsPath,
    devicesDir,
    buildRoot,
    buildsDir: path.join(devicesDir, "builds"),
    dashboardFile: path.join(buildRoot, "dashboard.json"),
    progressFile: path.join(workspaceDir, PROGRESS_FILENAME),
    stateFile: path.join(workspaceDir, STATE_FILENAME),
    logFile: path.join(workspaceDir, LOG_FILENAME)
  };
}

export function parseOptions(rawContent: string, source: string): UpdateOptions {
  let parsed: unknown;
  try {
    parsed = JSON.parse(rawContent);
  } catch (error) {
    throw new Error(`Le fichier d'options ${source} n'est pas un JSON valide: ${describeError(error)}`);
  }

  return assertValid<UpdateOptions>(validateOptions, parsed, `Options ${source}`);
}

export async function loadOptions(params?: LoadOptionsParams): Promise<OptionsLoadResult> {
  const workspaceDir = getWorkspaceDirectory(params);
  const optionsPath = getOptionsPath({ ...params, workspaceDir });

  let rawContent: string;
  let created = false;

  try {
    rawContent = await fs.readFile(optionsPath, "utf-8");
  } catch (error) {
    const isNotFound = isFileSystemError(error) && error.code === "ENOENT";
    if (!isNotFound || params?.createIfMissing === false) {
      throw error;
    }

    const defaults = createDefaultOptions();
    await saveOptions(defaults, optionsPath);
    rawContent = JSON.stringify(defaults);
    created = true;
    getLogger("Config").info({ optionsPath }, "Fichier d'options généré avec les valeurs par défaut");
  }

  if (rawContent.trim().length === 0) {
    throw new Error(`Fichier d'options vide: ${optionsPath}`);
  }

  const options = parseOptions(rawContent, optionsPath);

  return {
    options,
    paths: resolveWorkspacePaths(workspaceDir, optionsPath, options),
    created
  };
}

export async function saveOptions(options: UpdateOptions, optionsPath: string): Promise<void> {
  assertValid<UpdateOptions>(validateOptions, options, "Options");
  await fs.mkdir(path.dirname(optionsPath), { recursive: true });
  await fs.writeFile(optionsPath, `${JSON.stringify(options, null, 2)}\n`, "utf-8");
}

export function resolveContainerName(options: UpdateOptions, env: NodeJS.ProcessEnv = process.env): string | undefined {
  const candidate = options.container_name.trim() || env[CONTAINER_ENV]?.trim();
  return candidate ? candidate : undefined;
}

export function resolveUpdaterVersion(env: NodeJS.ProcessEnv = process.env): string {
  return env[VERSION_ENV]?.trim() || "unknown";
}
