import path from "path";
import process from "process";
import pino, { DestinationStream, Level, Logger } from "pino";
import pinoPretty from "pino-pretty";
import { LogFormat, Verbosity } from "../models/types";

export type CustomLevel = "notice" | "verbose";
export type UpdaterLogger = Logger<CustomLevel>;
export type ConsoleVerbosity = Verbosity | "silent";

export interface LoggerConfiguration {
  logFile?: string;
  logFormat?: LogFormat;
  verbosity?: ConsoleVerbosity;
}

const APP_NAME = "fleet-ota-updater";
const MESSAGE_KEY = "message";
const LOG_LEVEL_ENV = "FLEET_UPDATER_LOG_LEVEL";

/** `notice` passe même en mode silencieux, `verbose` s'intercale entre info et debug. */
export const CUSTOM_LEVELS: Record<CustomLevel, number> = {
  notice: 35,
  verbose: 25
};

const LEVEL_VALUES: Record<string, number> = {
  ...pino.levels.values,
  ...CUSTOM_LEVELS
};

const CONSOLE_LEVELS: Record<Verbosity, Level | CustomLevel> = {
  quiet: "notice",
  normal: "info",
  verbose: "verbose",
  debug: "debug"
};

const VERBOSITIES: ReadonlyArray<ConsoleVerbosity> = ["quiet", "normal", "verbose", "debug", "silent"];

let currentLogFile: string | undefined;
let currentLogFormat: LogFormat = "text";
let currentVerbosity: ConsoleVerbosity = parseVerbosity(process.env[LOG_LEVEL_ENV]) ?? "normal";
let rootLogger: UpdaterLogger = createRootLogger();

export function parseVerbosity(value: string | undefined): ConsoleVerbosity | undefined {
  const normalized = value?.trim().toLowerCase();
  return VERBOSITIES.find((candidate) => candidate === normalized);
}

function createConsoleStream(): DestinationStream {
  return pinoPretty({
    destination: 1,
    sync: true,
    colorize: false,
    singleLine: true,
    hideObject: true,
    messageKey: MESSAGE_KEY,
    customLevels: CUSTOM_LEVELS,
    translateTime: "SYS:yyyy-mm-dd HH:MM:ss",
    ignore: "pid,hostname,app,scope,runId"
  });
}

function createFileStream(logFile: string, format: LogFormat): DestinationStream {
  if (format === "json") {
    return pino.destination({ dest: logFile, append: true, sync: true, mkdir: true });
  }

  return pinoPretty({
    destination: logFile,
    append: true,
    mkdir: true,
    sync: true,
    colorize: false,
    singleLine: true,
    messageKey: MESSAGE_KEY,
    customLevels: CUSTOM_LEVELS,
    translateTime: "SYS:yyyy-mm-dd HH:MM:ss",
    ignore: "pid,hostname,app"
  });
}

function createRootLogger(): UpdaterLogger {
  const streams: Array<{ level: Level | CustomLevel; stream: DestinationStream }> = [];

  // Le fichier reçoit toujours le flux complet, quelle que soit la verbosité console.
  if (currentLogFile) {
    streams.push({ level: "debug", stream: createFileStream(currentLogFile, currentLogFormat) });
  }

  if (currentVerbosity !== "silent") {
    streams.push({ level: CONSOLE_LEVELS[currentVerbosity], stream: createConsoleStream() });
  }

  return pino<CustomLevel>(
    {
      level: "debug",
      customLevels: CUSTOM_LEVELS,
      useOnlyCustomLevels: false,
      base: {
        app: APP_NAME
      },
      timestamp: pino.stdTimeFunctions.isoTime,
      messageKey: MESSAGE_KEY
    },
    pino.multistream(streams, { levels: LEVEL_VALUES, dedupe: false })
  );
}

export function configureLogger(config: LoggerConfiguration = {}): void {
  let updated = false;

  if (config.logFile && path.resolve(config.logFile) !== currentLogFile) {
    currentLogFile = path.resolve(config.logFile);
    updated = true;
  }

  if (config.logFormat && config.logFormat !== currentLogFormat) {
    currentLogFormat = config.logFormat;
    updated = true;
  }

  // La variable d'environnement garde la main pour pouvoir couper la console (tests, cron).
  const verbosity = parseVerbosity(process.env[LOG_LEVEL_ENV]) ?? config.verbosity;
  if (verbosity && verbosity !== currentVerbosity) {
    currentVerbosity = verbosity;
    updated = true;
  }

  if (updated) {
    rootLogger = createRootLogger();
  }
}

export function getLogger(scope?: string): UpdaterLogger {
  if (scope) {
    return rootLogger.child({ scope });
  }

  return rootLogger;
}
