/**
 * PMC client type definitions.
 * Article records returned by the metadata fetch and the link data read from
 * the Open Access web service.
 */

/**
 * Metadata for one article parsed from an efetch JATS document.
 * Missing fields carry fixed placeholders rather than being left out.
 */
export interface ArticleRecord {
  /** Canonical identifier with exactly one "PMC" prefix, or "Unknown" */
  readonly pmcid: string;
  readonly title: string;
  readonly journal: string;
  /** "YYYY-MM-DD"; month and day default to "01" */
  readonly pubDate: string;
  /** "Surname, Given" or "Surname", in document order */
  readonly authors: readonly string[];
  /** The article's `article-type` attribute (e.g. "research-article") */
  readonly pubType: string;
  readonly abstract: string;
  readonly keywords: readonly string[];
  /** Citation text of each reference that has a citation element */
  readonly references: readonly string[];
}

/**
 * Format tag ("pdf", "xml", "tgz", ...) to download URL, for one identifier.
 */
export type LinkMap = Record<string, string>;

/**
 * Attributes of the `<record>` element in an OA service response.
 */
export interface OaRecordInfo {
  id?: string;
  citation?: string;
  license?: string;
  retracted?: string;
}

/**
 * Parsed OA service response.
 */
export type OaLookupResult =
  | { kind: "error"; code: string; message: string }
  | { kind: "records"; links: LinkMap; record?: OaRecordInfo };
