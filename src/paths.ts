/**
 * Path resolution utilities for downloaded article files.
 */

import { join } from "node:path";

/** Default directory downloads are written under. */
export const DEFAULT_SAVE_DIR = "downloads";

/** Get an article's download directory. */
export function getArticleDir(saveDir: string, pmcid: string): string {
  return join(saveDir, pmcid);
}

/** Get the canonical PDF path for an article. */
export function getPdfPath(saveDir: string, pmcid: string): string {
  return join(saveDir, pmcid, `${pmcid}.pdf`);
}

/** Get the canonical NXML path for an article. */
export function getNxmlPath(saveDir: string, pmcid: string): string {
  return join(saveDir, pmcid, `${pmcid}.nxml`);
}
