/**
 * Article file download orchestrator.
 * Looks an article up in the PMC OA service, downloads its direct PDF/NXML
 * files, and falls back to the OA package when there are none.
 *
 * Best effort: every failure is logged and the call resolves normally, so a
 * batch keeps going past articles that cannot be fetched.
 */

import { mkdir, rm } from "node:fs/promises";
import { basename, join } from "node:path";
import { errorMessage } from "../errors.js";
import type { EutilsOptions } from "../eutils.js";
import { type Logger, consoleLogger } from "../logger.js";
import { DEFAULT_SAVE_DIR, getArticleDir } from "../paths.js";
import type { LinkMap, OaLookupResult, OaRecordInfo } from "../types.js";
import { downloadToFile } from "./downloader.js";
import { parseOaResponse, queryOaService } from "./oa-service.js";
import { extractPackage, renameExtractedFiles } from "./package.js";

/** OA link formats downloaded directly, with the extension they are saved under. */
const DIRECT_FORMATS = [
  { format: "pdf", ext: "pdf" },
  { format: "xml", ext: "nxml" },
] as const;

const PACKAGE_FORMAT = "tgz";

export interface DownloadArticleOptions extends EutilsOptions {
  /** Base directory; files go to `{saveDir}/{pmcid}/`. Default: "downloads" */
  saveDir?: string;
}

export interface BatchDownloadOptions extends DownloadArticleOptions {
  onProgress?: (progress: { completed: number; total: number; pmcid: string }) => void;
}

function describeRecord(pmcid: string, links: LinkMap, record?: OaRecordInfo): string {
  const formats = Object.keys(links).join(", ") || "none";
  const license = record?.license ? `, license ${record.license}` : "";
  return `OA record for ${pmcid}: formats ${formats}${license}`;
}

/** Download the direct PDF and XML links. Returns true if at least one was saved. */
async function downloadDirectFiles(
  links: LinkMap,
  articleDir: string,
  pmcid: string,
  logger: Logger
): Promise<boolean> {
  let saved = false;
  for (const { format, ext } of DIRECT_FORMATS) {
    const href = links[format];
    if (!href) continue;

    const saveName = `${pmcid}.${ext}`;
    logger.info(`Downloading ${format.toUpperCase()} as ${saveName}...`);
    try {
      await downloadToFile(href, join(articleDir, saveName));
      logger.info(`Saved ${saveName}`);
      saved = true;
    } catch (err) {
      logger.error(`Failed to download ${href}: ${errorMessage(err)}`);
    }
  }
  return saved;
}

/**
 * Download and unpack the OA package, then give its PDF and NXML their
 * canonical names. Returns true once the package has been extracted.
 */
async function downloadPackage(
  href: string,
  saveDir: string,
  pmcid: string,
  logger: Logger
): Promise<boolean> {
  const articleDir = getArticleDir(saveDir, pmcid);
  try {
    const archiveName = basename(new URL(href).pathname) || `${pmcid}.tar.gz`;
    const archivePath = join(articleDir, archiveName);

    logger.info(`Downloading OA Package (TGZ): ${archiveName}...`);
    await downloadToFile(href, archivePath);

    logger.info(`Extracting ${archiveName}...`);
    try {
      await extractPackage(archivePath, articleDir);
    } catch (err) {
      logger.error(`Failed to extract tarball: ${errorMessage(err)}`);
      return false;
    }
    await rm(archivePath, { force: true });
  } catch (err) {
    logger.error(`Failed to download package ${href}: ${errorMessage(err)}`);
    return false;
  }

  try {
    await renameExtractedFiles(saveDir, pmcid, logger);
  } catch (err) {
    logger.error(`Failed to rename extracted files for ${pmcid}: ${errorMessage(err)}`);
  }
  return true;
}

/**
 * Download the open-access files of one article into
 * `{saveDir}/{pmcid}/{pmcid}.pdf` and `{saveDir}/{pmcid}/{pmcid}.nxml`.
 *
 * Never rejects; every outcome is reported through the logger.
 */
export async function downloadArticleFiles(
  pmcid: string,
  options?: DownloadArticleOptions
): Promise<void> {
  const logger = options?.logger ?? consoleLogger;
  const saveDir = options?.saveDir ?? DEFAULT_SAVE_DIR;

  let xml: string;
  try {
    xml = await queryOaService(pmcid, options);
  } catch (err) {
    logger.error(`Error querying OA API for ${pmcid}: ${errorMessage(err)}`);
    return;
  }

  let lookup: OaLookupResult;
  try {
    lookup = parseOaResponse(xml);
  } catch (err) {
    logger.error(`Failed to parse OA XML for ${pmcid}: ${errorMessage(err)}`);
    return;
  }

  if (lookup.kind === "error") {
    logger.error(`OA API Error for ${pmcid}: ${lookup.code} - ${lookup.message}`);
    return;
  }

  const { links, record } = lookup;
  logger.info(describeRecord(pmcid, links, record));
  if (record?.retracted === "yes") {
    logger.warn(`${pmcid} is marked as retracted`);
  }

  const articleDir = getArticleDir(saveDir, pmcid);
  try {
    await mkdir(articleDir, { recursive: true });
  } catch (err) {
    logger.error(`Failed to create ${articleDir}: ${errorMessage(err)}`);
    return;
  }

  let downloaded = await downloadDirectFiles(links, articleDir, pmcid, logger);

  const packageHref = links[PACKAGE_FORMAT];
  if (!downloaded && packageHref) {
    downloaded = await downloadPackage(packageHref, saveDir, pmcid, logger);
  }

  if (!downloaded) {
    logger.warn(`No accessible files found for ${pmcid} (might not be Open Access).`);
  }
}

/**
 * Download files for several articles, one after another.
 */
export async function downloadAllArticleFiles(
  pmcids: readonly string[],
  options?: BatchDownloadOptions
): Promise<void> {
  let completed = 0;
  for (const pmcid of pmcids) {
    await downloadArticleFiles(pmcid, options);
    completed++;
    options?.onProgress?.({ completed, total: pmcids.length, pmcid });
  }
}
