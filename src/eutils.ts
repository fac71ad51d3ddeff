/**
 * Shared plumbing for NCBI requests: endpoint URLs, identification
 * parameters and the GET wrapper that maps failures to TransportError.
 *
 * esearch: https://eutils.ncbi.nlm.nih.gov/entrez/eutils/esearch.fcgi?db=pmc&term={term}&retmode=json
 * efetch:  https://eutils.ncbi.nlm.nih.gov/entrez/eutils/efetch.fcgi?db=pmc&id={ids}&retmode=xml
 * OA:      https://www.ncbi.nlm.nih.gov/pmc/utils/oa/oa.fcgi?id={pmcid}
 */

import { TransportError, errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";

export const EUTILS_BASE_URL = "https://eutils.ncbi.nlm.nih.gov/entrez/eutils/";

export const PMC_OA_URL = "https://www.ncbi.nlm.nih.gov/pmc/utils/oa/oa.fcgi";

export const USER_AGENT = "pmc-fulltext-client/0.1.0";

/**
 * Options accepted by every operation.
 * `apiKey`, `tool` and `email` are NCBI's optional identification parameters.
 */
export interface EutilsOptions {
  apiKey?: string;
  tool?: string;
  email?: string;
  logger?: Logger;
}

type ParamValue = string | number | undefined;

/**
 * Build a request URL. Parameters whose value is undefined are left out, and
 * the identification parameters are appended only when set.
 */
export function buildUrl(
  base: string,
  params: Record<string, ParamValue>,
  options?: EutilsOptions
): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) search.set(key, String(value));
  }
  if (options?.apiKey) search.set("api_key", options.apiKey);
  if (options?.tool) search.set("tool", options.tool);
  if (options?.email) search.set("email", options.email);
  return `${base}?${search.toString()}`;
}

/** Build a URL for an E-utilities endpoint such as "esearch.fcgi". */
export function buildEutilsUrl(
  endpoint: string,
  params: Record<string, ParamValue>,
  options?: EutilsOptions
): string {
  return buildUrl(`${EUTILS_BASE_URL}${endpoint}`, params, options);
}

/**
 * GET a URL once. Rejects with TransportError when the request cannot be made
 * or the status is not 2xx.
 *
 * @param label - Endpoint name used in error messages (e.g. "esearch")
 */
export async function ncbiGet(url: string, label: string): Promise<Response> {
  let response: Response;
  try {
    response = await fetch(url, { headers: { "User-Agent": USER_AGENT } });
  } catch (err) {
    throw new TransportError(`PMC ${label} request failed: ${errorMessage(err)}`, {
      url,
      cause: err,
    });
  }

  if (!response.ok) {
    await response.body?.cancel();
    throw new TransportError(
      `PMC ${label} API error: HTTP ${response.status} ${response.statusText}`,
      { url, status: response.status }
    );
  }

  return response;
}

/**
 * Read a response body as text. A connection that drops mid-body rejects with
 * TransportError, like a failed request.
 */
export async function readBody(response: Response, url: string, label: string): Promise<string> {
  try {
    return await response.text();
  } catch (err) {
    throw new TransportError(`PMC ${label} request failed: ${errorMessage(err)}`, {
      url,
      status: response.status,
      cause: err,
    });
  }
}
