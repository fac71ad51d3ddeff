/**
 * PMC search via E-utilities esearch.
 * Returns the PMC identifiers matching a term within a publication-date range.
 */

import { errorMessage } from "../errors.js";
import { type EutilsOptions, buildEutilsUrl, ncbiGet, readBody } from "../eutils.js";
import { consoleLogger } from "../logger.js";

/** Days covered by the default date range, ending today. */
export const DEFAULT_SEARCH_DAYS = 15;

export const DEFAULT_MAX_RESULTS = 5;

export interface SearchOptions extends EutilsOptions {
  /** Maximum number of ids returned (retmax). Default: 5 */
  maxResults?: number;
  /** Earliest publication date, "YYYY/MM/DD" */
  mindate?: string;
  /** Latest publication date, "YYYY/MM/DD" */
  maxdate?: string;
}

interface EsearchResponse {
  esearchresult?: {
    idlist?: string[];
  };
}

/** Format a date as "YYYY/MM/DD" in local time. */
export function formatEutilsDate(date: Date): string {
  const year = String(date.getFullYear());
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${year}/${month}/${day}`;
}

/**
 * Resolve the date range sent with a search. Only when neither bound is given
 * does the range default to the last {@link DEFAULT_SEARCH_DAYS} days.
 */
export function resolveDateRange(
  mindate: string | undefined,
  maxdate: string | undefined,
  now: Date = new Date()
): { mindate?: string; maxdate?: string } {
  if (mindate !== undefined || maxdate !== undefined) {
    return {
      ...(mindate !== undefined ? { mindate } : {}),
      ...(maxdate !== undefined ? { maxdate } : {}),
    };
  }
  const start = new Date(now);
  start.setDate(start.getDate() - DEFAULT_SEARCH_DAYS);
  return { mindate: formatEutilsDate(start), maxdate: formatEutilsDate(now) };
}

/**
 * Search PMC for a term and return the matching PMC ids, in server order.
 *
 * @throws TransportError when the request fails or the status is not 2xx
 */
export async function searchPmc(term: string, options?: SearchOptions): Promise<string[]> {
  const logger = options?.logger ?? consoleLogger;
  const { mindate, maxdate } = resolveDateRange(options?.mindate, options?.maxdate);

  const url = buildEutilsUrl(
    "esearch.fcgi",
    {
      db: "pmc",
      term,
      retmode: "json",
      retmax: options?.maxResults ?? DEFAULT_MAX_RESULTS,
      datetype: "pdat",
      mindate,
      maxdate,
    },
    options
  );

  const response = await ncbiGet(url, "esearch");
  const body = await readBody(response, url, "esearch");

  let data: EsearchResponse | null;
  try {
    data = JSON.parse(body) as EsearchResponse | null;
  } catch (err) {
    logger.error(`Failed to parse search response: ${errorMessage(err)}`);
    return [];
  }

  logger.info(`Searching from ${mindate ?? ""} to ${maxdate ?? ""}...`);
  const idList = data?.esearchresult?.idlist;
  return Array.isArray(idList) ? idList.map(String) : [];
}
