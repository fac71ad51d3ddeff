/**
 * Tests for the PMC OA web service client.
 */

import { beforeEach, describe, expect, it, vi } from "vitest";
import { TransportError } from "../errors.js";
import { normalizeLinkUrl, parseOaResponse, queryOaService } from "./oa-service.js";

const mockFetch = vi.fn();
vi.stubGlobal("fetch", mockFetch);

const RECORD_RESPONSE = `<?xml version="1.0" encoding="UTF-8"?>
<OA>
  <responseDate>2024-05-01 10:00:00</responseDate>
  <request id="PMC1234567">https://www.ncbi.nlm.nih.gov/pmc/utils/oa/oa.fcgi?id=PMC1234567</request>
  <records returned-count="1" total-count="1">
    <record id="PMC1234567" citation="Test J. 2024;1:1" license="CC BY" retracted="no">
      <link format="tgz" updated="2024-05-01 10:00:00" href="ftp://ftp.ncbi.nlm.nih.gov/pub/pmc/oa_package/00/01/PMC1234567.tar.gz" />
      <link format="pdf" updated="2024-05-01 10:00:00" href="https://example.org/files/article.pdf" />
    </record>
  </records>
</OA>`;

const ERROR_RESPONSE = `<OA>
  <responseDate>2024-05-01 10:00:00</responseDate>
  <request id="PMC1">https://www.ncbi.nlm.nih.gov/pmc/utils/oa/oa.fcgi?id=PMC1</request>
  <error code="idIsNotOpenAccess">identifier 'PMC1' is not Open Access</error>
</OA>`;

describe("normalizeLinkUrl", () => {
  it("rewrites ftp:// to https://", () => {
    expect(normalizeLinkUrl("ftp://ftp.ncbi.nlm.nih.gov/pub/a.tar.gz")).toBe(
      "https://ftp.ncbi.nlm.nih.gov/pub/a.tar.gz"
    );
  });

  it("leaves other schemes alone", () => {
    expect(normalizeLinkUrl("https://example.org/ftp://x")).toBe("https://example.org/ftp://x");
  });
});

describe("parseOaResponse", () => {
  it("collects links by format with normalized URLs", () => {
    expect(parseOaResponse(RECORD_RESPONSE)).toEqual({
      kind: "records",
      links: {
        tgz: "https://ftp.ncbi.nlm.nih.gov/pub/pmc/oa_package/00/01/PMC1234567.tar.gz",
        pdf: "https://example.org/files/article.pdf",
      },
      record: {
        id: "PMC1234567",
        citation: "Test J. 2024;1:1",
        license: "CC BY",
        retracted: "no",
      },
    });
  });

  it("reports the service error code and message", () => {
    expect(parseOaResponse(ERROR_RESPONSE)).toEqual({
      kind: "error",
      code: "idIsNotOpenAccess",
      message: "identifier 'PMC1' is not Open Access",
    });
  });

  it("lets a later link of the same format win", () => {
    const xml =
      '<OA><records><record id="PMC1"><link format="pdf" href="https://a/1.pdf"/><link format="pdf" href="https://a/2.pdf"/></record></records></OA>';
    const result = parseOaResponse(xml);
    expect(result.kind === "records" && result.links).toEqual({ pdf: "https://a/2.pdf" });
  });

  it("skips links without an href", () => {
    const xml = '<OA><records><record id="PMC1"><link format="pdf"/></record></records></OA>';
    expect(parseOaResponse(xml)).toEqual({ kind: "records", links: {}, record: { id: "PMC1" } });
  });

  it("throws on malformed XML", () => {
    expect(() => parseOaResponse("<OA><records>")).toThrow();
  });
});

describe("queryOaService", () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it("requests the OA endpoint with the id", async () => {
    mockFetch.mockResolvedValueOnce({
      ok: true,
      status: 200,
      statusText: "OK",
      text: () => Promise.resolve(RECORD_RESPONSE),
    });

    await expect(queryOaService("PMC1234567")).resolves.toBe(RECORD_RESPONSE);
    expect(mockFetch.mock.calls[0]?.[0]).toBe(
      "https://www.ncbi.nlm.nih.gov/pmc/utils/oa/oa.fcgi?id=PMC1234567"
    );
  });

  it("rejects with TransportError on HTTP errors", async () => {
    mockFetch.mockResolvedValueOnce({ ok: false, status: 502, statusText: "Bad Gateway" });

    await expect(queryOaService("PMC1")).rejects.toBeInstanceOf(TransportError);
  });

  it("rejects with TransportError when the connection drops mid-body", async () => {
    const stream = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.error(new TypeError("terminated"));
      },
    });
    mockFetch.mockResolvedValueOnce(new Response(stream));

    await expect(queryOaService("PMC1")).rejects.toThrow("PMC OA request failed: terminated");
  });
});
