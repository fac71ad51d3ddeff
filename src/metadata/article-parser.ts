/**
 * Parser for efetch `db=pmc` responses.
 *
 * Turns a `<pmc-articleset>` of JATS articles into ArticleRecords. Every field
 * that is missing from the document gets a fixed placeholder instead.
 */

import { ensurePmcPrefix } from "../pmcid.js";
import type { ArticleRecord } from "../types.js";
import {
  type OrderedNode,
  type XmlElement,
  extractAllText,
  findChild,
  findDescendant,
  findDescendants,
  getDirectText,
  parseOrderedXml,
} from "../xml/ordered-node.js";

export const PLACEHOLDERS = {
  title: "No Title",
  pmcid: "Unknown",
  abstract: "No Abstract",
  pubType: "Unknown",
  journal: "Unknown Journal",
  pubDate: "Unknown Date",
} as const;

/** `pub-id-type` values that mark the PMC identifier, in preference order. */
const PMCID_TYPES = ["pmcid", "pmc"];

/** Reference sub-elements holding the citation, in preference order. */
const CITATION_TAGS = ["mixed-citation", "citation", "element-citation"];

function parseTitle(metaChildren: OrderedNode[]): string {
  const titleNode = findDescendant(metaChildren, "article-title");
  return titleNode ? extractAllText(titleNode.children) : PLACEHOLDERS.title;
}

function parsePmcid(metaChildren: OrderedNode[]): string {
  for (const idType of PMCID_TYPES) {
    const idNode = findDescendant(
      metaChildren,
      "article-id",
      (el) => el.attrs["pub-id-type"] === idType
    );
    if (idNode) return ensurePmcPrefix(extractAllText(idNode.children).trim());
  }
  return PLACEHOLDERS.pmcid;
}

function parseAbstract(metaChildren: OrderedNode[]): string {
  const abstractNode = findDescendant(metaChildren, "abstract");
  return abstractNode ? extractAllText(abstractNode.children).trim() : PLACEHOLDERS.abstract;
}

function parseKeywords(metaChildren: OrderedNode[]): string[] {
  const keywords: string[] = [];
  for (const kwd of findDescendants(metaChildren, "kwd")) {
    const text = extractAllText(kwd.children).trim();
    if (text) keywords.push(text);
  }
  return keywords;
}

/**
 * Citation text of a reference: the first of {@link CITATION_TAGS}, in that
 * priority, that is present and has non-blank text.
 */
function parseCitation(ref: XmlElement): string | undefined {
  for (const tag of CITATION_TAGS) {
    const citation = findDescendant(ref.children, tag);
    if (!citation) continue;
    const text = extractAllText(citation.children).trim();
    if (text) return text;
  }
  return undefined;
}

function parseReferences(articleChildren: OrderedNode[]): string[] {
  const references: string[] = [];
  for (const ref of findDescendants(articleChildren, "ref")) {
    const citation = parseCitation(ref);
    if (citation !== undefined) references.push(citation);
  }
  return references;
}

function parseJournal(articleChildren: OrderedNode[]): string {
  const journalNode = findDescendant(articleChildren, "journal-title");
  if (!journalNode) return PLACEHOLDERS.journal;
  return getDirectText(journalNode.children) ?? "";
}

/** "YYYY-MM-DD" from the first pub-date; month and day default to "01". */
function parsePubDate(articleChildren: OrderedNode[]): string {
  const pubDate = findDescendant(articleChildren, "pub-date");
  if (!pubDate) return PLACEHOLDERS.pubDate;

  const part = (tag: string, fallback: string): string => {
    const node = findChild(pubDate.children, tag);
    return node ? (getDirectText(node.children) ?? "") : fallback;
  };

  return `${part("year", "")}-${part("month", "01")}-${part("day", "01")}`;
}

function parseAuthors(metaChildren: OrderedNode[]): string[] {
  const authors: string[] = [];
  const contribs = findDescendants(
    metaChildren,
    "contrib",
    (el) => el.attrs["contrib-type"] === "author"
  );
  for (const contrib of contribs) {
    const surname = findDescendant(contrib.children, "surname");
    if (!surname) continue;
    const surnameText = extractAllText(surname.children);
    const givenNames = findDescendant(contrib.children, "given-names");
    authors.push(
      givenNames ? `${surnameText}, ${extractAllText(givenNames.children)}` : surnameText
    );
  }
  return authors;
}

/**
 * Build an ArticleRecord from one `<article>` element.
 * Returns undefined when the article has no `<article-meta>`.
 */
export function parseArticle(article: XmlElement): ArticleRecord | undefined {
  const meta = findDescendant(article.children, "article-meta");
  if (!meta) return undefined;

  return {
    pmcid: parsePmcid(meta.children),
    title: parseTitle(meta.children),
    journal: parseJournal(article.children),
    pubDate: parsePubDate(article.children),
    authors: parseAuthors(meta.children),
    pubType: article.attrs["article-type"] ?? PLACEHOLDERS.pubType,
    abstract: parseAbstract(meta.children),
    keywords: parseKeywords(meta.children),
    references: parseReferences(article.children),
  };
}

/**
 * Parse an efetch response into article records, one per `<article>` with
 * article metadata, in document order.
 *
 * @throws Error when the document is not well-formed XML
 */
export function parseArticleSet(xml: string): ArticleRecord[] {
  const nodes = parseOrderedXml(xml);
  const records: ArticleRecord[] = [];
  for (const article of findDescendants(nodes, "article")) {
    const record = parseArticle(article);
    if (record) records.push(record);
  }
  return records;
}
