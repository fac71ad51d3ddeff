/**
 * # pmc-fulltext-client
 *
 * Search, metadata and open-access file retrieval for PubMed Central.
 *
 * ## Workflow
 *
 * Three independent operations that compose through PMC identifiers:
 *
 * 1. **Search** — Find PMC ids for a term within a publication-date range.
 * 2. **Metadata** — Fetch and parse title, abstract, authors, keywords and references.
 * 3. **Download** — Save an article's open-access PDF and NXML, unpacking the OA package when needed.
 *
 * ## Quick Example
 *
 * ```typescript
 * import { searchPmc, fetchPmcMetadata, downloadAllArticleFiles } from "pmc-fulltext-client";
 *
 * // Step 1: ids published in the last 15 days
 * const ids = await searchPmc("crispr", { maxResults: 10 });
 *
 * // Step 2: one batched metadata request
 * const records = await fetchPmcMetadata(ids);
 *
 * // Step 3: files land in downloads/PMC…/PMC….pdf and .nxml
 * await downloadAllArticleFiles(records.map((r) => r.pmcid), { saveDir: "downloads" });
 * ```
 *
 * ## Configuration
 *
 * - **apiKey** / **tool** / **email** (optional): NCBI identification parameters, sent with every request.
 * - **logger** (optional): Receives progress and failure lines. Default: the console.
 * - **saveDir**: Base directory for downloads. Default: `"downloads"`.
 *
 * ## Errors
 *
 * Search and metadata reject with {@link TransportError} when a request fails.
 * Downloads never reject; failures are logged and the call resolves.
 *
 * @module pmc-fulltext-client
 */

// === Search ===
export { searchPmc, resolveDateRange, formatEutilsDate } from "./search/esearch.js";
export type { SearchOptions } from "./search/esearch.js";

// === Metadata ===
export { fetchPmcMetadata } from "./metadata/efetch.js";
export type { MetadataOptions } from "./metadata/efetch.js";
export { parseArticleSet, PLACEHOLDERS } from "./metadata/article-parser.js";

// === Download ===
export { downloadArticleFiles, downloadAllArticleFiles } from "./download/orchestrator.js";
export type { BatchDownloadOptions, DownloadArticleOptions } from "./download/orchestrator.js";
export { parseOaResponse, queryOaService } from "./download/oa-service.js";
export { downloadToFile } from "./download/downloader.js";

// === Utilities ===
export { ensurePmcPrefix } from "./pmcid.js";
export { getArticleDir, getNxmlPath, getPdfPath } from "./paths.js";
export { EUTILS_BASE_URL, PMC_OA_URL } from "./eutils.js";
export type { EutilsOptions } from "./eutils.js";
export { TransportError } from "./errors.js";
export { consoleLogger } from "./logger.js";
export type { Logger } from "./logger.js";

// === Types ===
export type { ArticleRecord, LinkMap, OaLookupResult, OaRecordInfo } from "./types.js";
