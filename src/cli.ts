#!/usr/bin/env node
import process from "process";
import { describeError, FatalPreconditionError, SchemaValidationError } from "./utils/errors";
import { getLogger } from "./utils/logger";
import { formatValidationErrors } from "./utils/validator";
import { ManagerOutcome, UpdateManager } from "./services/UpdateManager";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INTERRUPTED = 130;

export interface CliArguments {
  readonly optionsPath?: string;
  readonly workspaceDir?: string;
  readonly help: boolean;
}

const USAGE = "Usage: fleet-ota-updater [--options <fichier.json>] [--workspace <répertoire>]";

export function parseArguments(argv: ReadonlyArray<string>): CliArguments {
  let optionsPath: string | undefined;
  let workspaceDir: string | undefined;
  let help = false;

  for (let index = 0; index < argv.length; index += 1) {
    const argument = argv[index];
    const [flag, inlineValue] = argument.startsWith("--") && argument.includes("=")
      ? [argument.slice(0, argument.indexOf("=")), argument.slice(argument.indexOf("=") + 1)]
      : [argument, undefined];

    const readValue = (): string => {
      if (inlineValue !== undefined) {
        return inlineValue;
      }
      const next = argv[index + 1];
      if (next === undefined || next.startsWith("--")) {
        throw new Error(`Valeur manquante pour ${flag}`);
      }
      index += 1;
      return next;
    };

    switch (flag) {
      case "--options":
        optionsPath = readValue();
        break;
      case "--workspace":
        workspaceDir = readValue();
        break;
      case "-h":
      case "--help":
        help = true;
        break;
      default:
        throw new Error(`Argument inconnu: ${argument}`);
    }
  }

  return { optionsPath, workspaceDir, help };
}

export function exitCodeFor(outcome: ManagerOutcome): number {
  switch (outcome.mode) {
    case "update":
      return outcome.report.interrupted ? EXIT_INTERRUPTED : EXIT_OK;
    case "repair":
      return outcome.report.interrupted ? EXIT_INTERRUPTED : EXIT_OK;
    case "diagnostic":
      return outcome.report.device ? EXIT_OK : EXIT_FAILURE;
  }
}

export async function main(argv: ReadonlyArray<string> = process.argv.slice(2)): Promise<number> {
  let args: CliArguments;
  try {
    args = parseArguments(argv);
  } catch (error) {
    process.stderr.write(`${describeError(error)}\n${USAGE}\n`);
    return EXIT_FAILURE;
  }

  if (args.help) {
    process.stdout.write(`${USAGE}\n`);
    return EXIT_OK;
  }

  const manager = new UpdateManager();
  const cancellation = manager.getCancellation();
  const onSignal = (signal: NodeJS.Signals): void => {
    getLogger("Cli").notice(`Signal ${signal} reçu, arrêt en cours`);
    cancellation.cancel(signal);
    manager.flushProgress();
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  try {
    await manager.initialize({ optionsPath: args.optionsPath, workspaceDir: args.workspaceDir });
    const outcome = await manager.run();
    manager.flushProgress();
    return cancellation.isCancellationRequested ? EXIT_INTERRUPTED : exitCodeFor(outcome);
  } catch (error) {
    manager.flushProgress();
    const logger = getLogger("Cli");
    if (error instanceof FatalPreconditionError) {
      logger.notice({ reason: error.reason, details: error.details }, `ERREUR: ${error.message}`);
    } else if (error instanceof SchemaValidationError) {
      logger.notice(`ERREUR: ${error.message}: ${formatValidationErrors(error.details)}`);
    } else {
      logger.error({ error: describeError(error), stack: error instanceof Error ? error.stack : undefined }, "Erreur fatale");
    }
    return cancellation.isCancellationRequested ? EXIT_INTERRUPTED : EXIT_FAILURE;
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  }
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      process.stderr.write(`${describeError(error)}\n`);
      process.exitCode = EXIT_FAILURE;
    }
  );
}
