/**
 * PMCID normalization.
 */

const PMC_PREFIX = "PMC";

/** Prefix a bare numeric id with "PMC"; ids that already carry it pass through. */
export function ensurePmcPrefix(pmcid: string): string {
  return pmcid.startsWith(PMC_PREFIX) ? pmcid : `${PMC_PREFIX}${pmcid}`;
}
