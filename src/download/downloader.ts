/**
 * Streaming file downloader.
 */

import { createWriteStream } from "node:fs";
import { rm, stat } from "node:fs/promises";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { TransportError, errorMessage } from "../errors.js";
import { USER_AGENT } from "../eutils.js";

/** Buffer size used while streaming a download to disk. */
export const DOWNLOAD_CHUNK_SIZE = 8192;

/**
 * Download a URL to a local file, streaming the body in
 * {@link DOWNLOAD_CHUNK_SIZE}-byte chunks. A single attempt; on failure the
 * partial file is removed and the error is rethrown.
 *
 * @returns Size of the written file in bytes
 */
export async function downloadToFile(url: string, destPath: string): Promise<number> {
  let response: Response;
  try {
    response = await fetch(url, { headers: { "User-Agent": USER_AGENT } });
  } catch (err) {
    throw new TransportError(errorMessage(err), { url, cause: err });
  }

  if (!response.ok) {
    await response.body?.cancel();
    throw new TransportError(`HTTP ${response.status} ${response.statusText}`, {
      url,
      status: response.status,
    });
  }
  if (!response.body) {
    throw new TransportError("Empty response body", { url, status: response.status });
  }

  try {
    await pipeline(
      Readable.fromWeb(response.body, { highWaterMark: DOWNLOAD_CHUNK_SIZE }),
      createWriteStream(destPath, { highWaterMark: DOWNLOAD_CHUNK_SIZE })
    );
  } catch (err) {
    await rm(destPath, { force: true });
    throw err;
  }

  return (await stat(destPath)).size;
}
