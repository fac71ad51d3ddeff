/**
 * Order-preserving XML tree helpers shared by the efetch and OA parsers.
 *
 * Uses fast-xml-parser with `preserveOrder: true` so text and elements keep
 * their document order, which the text concatenation below depends on.
 */

import { XMLParser } from "fast-xml-parser";

/**
 * A node in the preserveOrder output.
 * Either a text node `{ "#text": string }` or an element node
 * `{ tagName: OrderedNode[], ":@"?: { "@_attr": value } }`.
 */
export type OrderedNode = Record<string, unknown>;

/** An element located in the tree, with its children and attributes unpacked. */
export interface XmlElement {
  tag: string;
  node: OrderedNode;
  children: OrderedNode[];
  attrs: Record<string, string>;
}

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  textNodeName: "#text",
  trimValues: false,
  // Keep "01" as "01": dates and ids are compared as strings.
  parseTagValue: false,
  parseAttributeValue: false,
  preserveOrder: true,
  processEntities: true,
  htmlEntities: true,
});

/**
 * Parse an XML document into ordered nodes.
 * @throws Error when the document is not well-formed
 */
export function parseOrderedXml(xml: string): OrderedNode[] {
  const parsed: unknown = parser.parse(xml, true);
  return Array.isArray(parsed) ? parsed : [];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ─── Navigation Helpers ──────────────────────────────────────────────

/** Get the tag name of an ordered node (the first key that isn't ":@" or "#text"). */
export function getTagName(node: OrderedNode): string | undefined {
  for (const key of Object.keys(node)) {
    if (key !== ":@" && key !== "#text") return key;
  }
  return undefined;
}

/** Get the children array of an element node. */
function getChildren(node: OrderedNode, tag: string): OrderedNode[] {
  const children = node[tag];
  return Array.isArray(children) ? children : [];
}

/** Get all attributes of an element node, without the @_ prefix. */
function getAttrs(node: OrderedNode): Record<string, string> {
  const attrs = node[":@"];
  if (!isRecord(attrs)) return {};
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(attrs)) {
    if (key.startsWith("@_")) {
      result[key.slice(2)] = String(value);
    }
  }
  return result;
}

/** Unpack an element node, or undefined for text nodes. */
function toElement(node: OrderedNode): XmlElement | undefined {
  const tag = getTagName(node);
  if (!tag) return undefined;
  return { tag, node, children: getChildren(node, tag), attrs: getAttrs(node) };
}

/** Get text content from a #text node. */
function getTextContent(node: OrderedNode): string | undefined {
  if ("#text" in node) {
    const val = node["#text"];
    return val != null ? String(val) : undefined;
  }
  return undefined;
}

/** Find the first child element with the given tag name. */
export function findChild(children: OrderedNode[], tagName: string): XmlElement | undefined {
  for (const child of children) {
    if (tagName in child) return toElement(child);
  }
  return undefined;
}

/** Find all child elements with the given tag name. */
export function findChildren(children: OrderedNode[], tagName: string): XmlElement[] {
  const results: XmlElement[] = [];
  for (const child of children) {
    if (!(tagName in child)) continue;
    const element = toElement(child);
    if (element) results.push(element);
  }
  return results;
}

type ElementFilter = (element: XmlElement) => boolean;

/**
 * Find the first element with the given tag among `nodes` and their
 * descendants, in document order.
 */
export function findDescendant(
  nodes: OrderedNode[],
  tagName: string,
  filter?: ElementFilter
): XmlElement | undefined {
  for (const node of nodes) {
    const element = toElement(node);
    if (!element) continue;
    if (element.tag === tagName && (!filter || filter(element))) return element;
    const nested = findDescendant(element.children, tagName, filter);
    if (nested) return nested;
  }
  return undefined;
}

/**
 * Find every element with the given tag among `nodes` and their descendants,
 * in document order. Matches nested inside other matches are included.
 */
export function findDescendants(
  nodes: OrderedNode[],
  tagName: string,
  filter?: ElementFilter
): XmlElement[] {
  const results: XmlElement[] = [];
  const visit = (list: OrderedNode[]): void => {
    for (const node of list) {
      const element = toElement(node);
      if (!element) continue;
      if (element.tag === tagName && (!filter || filter(element))) results.push(element);
      visit(element.children);
    }
  };
  visit(nodes);
  return results;
}

// ─── Text Extraction ─────────────────────────────────────────────────

/** Concatenate every text fragment under the given nodes, in document order. */
export function extractAllText(nodes: OrderedNode[]): string {
  const parts: string[] = [];
  for (const node of nodes) {
    const text = getTextContent(node);
    if (text != null) {
      parts.push(text);
      continue;
    }
    const element = toElement(node);
    if (element) parts.push(extractAllText(element.children));
  }
  return parts.join("");
}

/**
 * Text that appears before an element's first child element, or undefined
 * when there is none.
 */
export function getDirectText(children: OrderedNode[]): string | undefined {
  const parts: string[] = [];
  for (const child of children) {
    const text = getTextContent(child);
    if (text == null) break;
    parts.push(text);
  }
  return parts.length > 0 ? parts.join("") : undefined;
}
