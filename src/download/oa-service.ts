/**
 * PMC Open Access web service client.
 * Looks up the downloadable files (direct PDF/XML or an OA package) for a PMCID.
 *
 * API: https://www.ncbi.nlm.nih.gov/pmc/utils/oa/oa.fcgi?id={pmcid}
 */

import { type EutilsOptions, PMC_OA_URL, buildUrl, ncbiGet, readBody } from "../eutils.js";
import type { LinkMap, OaLookupResult, OaRecordInfo } from "../types.js";
import { extractAllText, findDescendant, findDescendants, parseOrderedXml } from "../xml/ordered-node.js";

/** Rewrite the FTP links the service returns to their HTTPS equivalent. */
export function normalizeLinkUrl(href: string): string {
  return href.startsWith("ftp://") ? `https://${href.slice("ftp://".length)}` : href;
}

/**
 * Parse an OA service response.
 * Links are keyed by format; a later link with the same format replaces an
 * earlier one.
 *
 * @throws Error when the document is not well-formed XML
 */
export function parseOaResponse(xml: string): OaLookupResult {
  const nodes = parseOrderedXml(xml);

  const error = findDescendant(nodes, "error");
  if (error) {
    return {
      kind: "error",
      code: error.attrs.code ?? "",
      message: extractAllText(error.children).trim(),
    };
  }

  const links: LinkMap = {};
  for (const link of findDescendants(nodes, "link")) {
    const format = link.attrs.format;
    const href = link.attrs.href;
    if (format && href) links[format] = normalizeLinkUrl(href);
  }

  const recordNode = findDescendant(nodes, "record");
  if (!recordNode) return { kind: "records", links };

  const record: OaRecordInfo = {};
  const { id, citation, license, retracted } = recordNode.attrs;
  if (id !== undefined) record.id = id;
  if (citation !== undefined) record.citation = citation;
  if (license !== undefined) record.license = license;
  if (retracted !== undefined) record.retracted = retracted;
  return { kind: "records", links, record };
}

/**
 * Query the OA service for one PMCID and return the raw XML.
 *
 * @throws TransportError when the request fails or the status is not 2xx
 */
export async function queryOaService(pmcid: string, options?: EutilsOptions): Promise<string> {
  const url = buildUrl(PMC_OA_URL, { id: pmcid }, options);
  const response = await ncbiGet(url, "OA");
  return readBody(response, url, "OA");
}
