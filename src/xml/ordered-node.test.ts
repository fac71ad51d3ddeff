/**
 * Tests for the order-preserving XML helpers.
 */

import { describe, expect, it } from "vitest";
import {
  extractAllText,
  findChild,
  findChildren,
  findDescendant,
  findDescendants,
  getDirectText,
  parseOrderedXml,
} from "./ordered-node.js";

describe("parseOrderedXml", () => {
  it("throws on malformed XML", () => {
    expect(() => parseOrderedXml("<root><a></root>")).toThrow();
  });

  it("throws on an empty document", () => {
    expect(() => parseOrderedXml("")).toThrow();
  });

  it("keeps leading zeros in text", () => {
    const nodes = parseOrderedXml("<d><month>03</month></d>");
    const month = findDescendant(nodes, "month");
    expect(month && extractAllText(month.children)).toBe("03");
  });
});

describe("findChild / findChildren", () => {
  const nodes = parseOrderedXml('<r><a id="1"/><b/><a id="2"/></r>');
  const root = findChild(nodes, "r");

  it("finds the first matching child with its attributes", () => {
    expect(root && findChild(root.children, "a")?.attrs).toEqual({ id: "1" });
  });

  it("finds all matching children", () => {
    const ids = root ? findChildren(root.children, "a").map((a) => a.attrs.id) : [];
    expect(ids).toEqual(["1", "2"]);
  });

  it("does not look below direct children", () => {
    expect(findChild(nodes, "a")).toBeUndefined();
  });
});

describe("findDescendant / findDescendants", () => {
  const nodes = parseOrderedXml(
    '<r><x n="1"><x n="2"/></x><y><x n="3" k="v"/></y></r>'
  );

  it("returns descendants in document order, nested matches included", () => {
    expect(findDescendants(nodes, "x").map((x) => x.attrs.n)).toEqual(["1", "2", "3"]);
  });

  it("applies the filter", () => {
    expect(findDescendant(nodes, "x", (x) => x.attrs.k === "v")?.attrs.n).toBe("3");
  });

  it("returns undefined when nothing matches", () => {
    expect(findDescendant(nodes, "z")).toBeUndefined();
  });
});

describe("extractAllText", () => {
  it("joins nested text in order", () => {
    const nodes = parseOrderedXml("<t>Role of <italic>p53</italic> in &amp; cancer</t>");
    const t = findChild(nodes, "t");
    expect(t && extractAllText(t.children)).toBe("Role of p53 in & cancer");
  });
});

describe("getDirectText", () => {
  it("returns the text before the first child element", () => {
    const nodes = parseOrderedXml("<t>Nature<sub>x</sub> tail</t>");
    const t = findChild(nodes, "t");
    expect(t && getDirectText(t.children)).toBe("Nature");
  });

  it("returns undefined when the element starts with a child", () => {
    const nodes = parseOrderedXml("<t><sub>x</sub> tail</t>");
    const t = findChild(nodes, "t");
    expect(t && getDirectText(t.children)).toBeUndefined();
  });
});
