import { RunReport } from "../models/types";
import { UpdaterLogger } from "../utils/logger";

const RULE = "=".repeat(70);

export interface SummaryLocations {
  readonly logFile?: string;
  readonly progressFile?: string;
}

export function formatHeader(title: string): string[] {
  return [RULE, title, RULE];
}

/** Raisons d'exclusion, de la plus fréquente à la moins fréquente. */
export function formatSkipReasons(reasons: ReadonlyMap<string, number>): string[] {
  return Array.from(reasons.entries())
    .sort((left, right) => right[1] - left[1])
    .map(([reason, count]) => `  - ${reason}: ${count}`);
}

export function formatSummary(report: RunReport, locations: SummaryLocations = {}): string[] {
  const lines = [
    ...formatHeader("Résumé"),
    `Appareils découverts: ${report.discovered}`,
    `Appareils traités: ${report.outcomes.length}`,
    `Terminés: ${report.counts.done}`,
    `En échec: ${report.counts.failed}`,
    `Ignorés: ${report.counts.skipped}`
  ];

  if (report.counts.failed > 0) {
    lines.push("", "Appareils en échec:", ...report.progress.failed.map((name) => `  - ${name}`));
  }
  if (report.stoppedBy) {
    lines.push("", report.stoppedBy === "compile" ? "Exécution arrêtée sur une erreur de compilation" : "Exécution arrêtée sur une erreur d'envoi");
  }
  if (report.interrupted) {
    lines.push("", "Exécution interrompue, la progression reprendra au prochain lancement");
  }
  if (report.dryRun) {
    lines.push("", "Simulation : aucune modification n'a été effectuée");
  }
  if (locations.logFile || locations.progressFile) {
    lines.push("");
    if (locations.logFile) {
      lines.push(`Journal: ${locations.logFile}`);
    }
    if (locations.progressFile) {
      lines.push(`Progression: ${locations.progressFile}`);
    }
  }
  return lines;
}

export function logRunSummary(logger: UpdaterLogger, report: RunReport, locations?: SummaryLocations): void {
  if (report.skipReasons.size > 0) {
    logger.verbose("Raisons d'exclusion:");
    formatSkipReasons(report.skipReasons).forEach((line) => logger.verbose(line));
  }
  report.outcomes.forEach((outcome) =>
    logger.verbose(`  ${outcome.name}: ${outcome.state}${outcome.error ? ` (${outcome.error})` : ""}`)
  );
  formatSummary(report, locations).forEach((line) => logger.notice(line));
}
