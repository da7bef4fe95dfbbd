import { mkdirSync, renameSync, rmSync, writeFileSync } from "fs";
import { copyFile, mkdir, rename, rm } from "fs/promises";
import path from "path";
import process from "process";

function temporaryPathFor(target: string): string {
  return path.join(path.dirname(target), `.${path.basename(target)}.${process.pid}.tmp`);
}

/**
 * Écrit dans un fichier temporaire voisin puis le renomme par-dessus la cible :
 * un crash en cours d'écriture laisse l'ancienne version intacte.
 */
export function writeFileAtomicSync(target: string, content: string): void {
  const temporary = temporaryPathFor(target);
  mkdirSync(path.dirname(target), { recursive: true });
  try {
    writeFileSync(temporary, content, "utf-8");
    renameSync(temporary, target);
  } catch (error) {
    rmSync(temporary, { force: true });
    throw error;
  }
}

export async function copyFileAtomic(source: string, target: string): Promise<void> {
  const temporary = temporaryPathFor(target);
  await mkdir(path.dirname(target), { recursive: true });
  try {
    await copyFile(source, temporary);
    await rename(temporary, target);
  } catch (error) {
    await rm(temporary, { force: true });
    throw error;
  }
}

export function serializeJson(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}
