/**
 * PMC metadata fetch via E-utilities efetch.
 */

import { errorMessage } from "../errors.js";
import { type EutilsOptions, buildEutilsUrl, ncbiGet, readBody } from "../eutils.js";
import { consoleLogger } from "../logger.js";
import type { ArticleRecord } from "../types.js";
import { parseArticleSet } from "./article-parser.js";

export type MetadataOptions = EutilsOptions;

/**
 * Fetch and parse metadata for a batch of PMC ids with a single request.
 * An empty list resolves to [] without touching the network.
 *
 * @throws TransportError when the request fails or the status is not 2xx
 */
export async function fetchPmcMetadata(
  ids: readonly string[],
  options?: MetadataOptions
): Promise<ArticleRecord[]> {
  if (ids.length === 0) return [];

  const logger = options?.logger ?? consoleLogger;
  const url = buildEutilsUrl(
    "efetch.fcgi",
    { db: "pmc", id: ids.join(","), retmode: "xml" },
    options
  );

  const response = await ncbiGet(url, "efetch");
  const xml = await readBody(response, url, "efetch");

  try {
    return parseArticleSet(xml);
  } catch (err) {
    logger.error(`Failed to parse XML response: ${errorMessage(err)}`);
    return [];
  }
}
