/**
 * OA package handling: extract a downloaded .tar.gz and give the article's
 * PDF and NXML their canonical names.
 */

import { readdir, rename, stat } from "node:fs/promises";
import { basename, join } from "node:path";
import { x as extractTar } from "tar";
import type { Logger } from "../logger.js";
import { getNxmlPath, getPdfPath } from "../paths.js";

/** Extract a gzip-compressed tarball into `destDir`. Rejects on a corrupt archive. */
export async function extractPackage(archivePath: string, destDir: string): Promise<void> {
  await extractTar({ file: archivePath, cwd: destDir, strict: true });
}

/**
 * List files under `dir` recursively: each directory's files (sorted by name)
 * before the contents of its subdirectories.
 */
export async function listFilesRecursive(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  const sorted = [...entries].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  const files = sorted.filter((e) => e.isFile()).map((e) => join(dir, e.name));
  for (const sub of sorted.filter((e) => e.isDirectory())) {
    files.push(...(await listFilesRecursive(join(dir, sub.name))));
  }
  return files;
}

async function pathExists(path: string): Promise<boolean> {
  return stat(path).then(
    () => true,
    () => false
  );
}

/** Canonical target for an extracted file, or undefined if it is neither PDF nor XML. */
function canonicalTarget(file: string, saveDir: string, pmcid: string): string | undefined {
  const name = file.toLowerCase();
  if (name.endsWith(".pdf")) return getPdfPath(saveDir, pmcid);
  if (name.endsWith(".nxml") || name.endsWith(".xml")) return getNxmlPath(saveDir, pmcid);
  return undefined;
}

/**
 * Rename the first PDF and the first NXML/XML found under the article
 * directory to `{pmcid}.pdf` and `{pmcid}.nxml`. Existing targets are never
 * overwritten, so later matches stay where they are.
 *
 * @returns Paths of the files that now carry a canonical name
 */
export async function renameExtractedFiles(
  saveDir: string,
  pmcid: string,
  logger: Logger
): Promise<string[]> {
  const renamed: string[] = [];
  for (const file of await listFilesRecursive(join(saveDir, pmcid))) {
    const target = canonicalTarget(file, saveDir, pmcid);
    if (!target || target === file) continue;
    if (await pathExists(target)) continue;

    await rename(file, target);
    renamed.push(target);
    logger.info(`Renamed ${basename(file)} to ${basename(target)}`);
  }
  return renamed;
}
