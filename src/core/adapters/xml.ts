import { JSDOM } from "jsdom";
import { SaxesParser } from "saxes";
import { ParseError, UnsupportedElementError } from "../model/errors";
import type { SourceLocation, Vec3 } from "../model/types";

let domParser: DOMParser | null = null;

const getDomParser = () => {
  if (!domParser) domParser = new new JSDOM("").window.DOMParser();
  return domParser;
};

/** Start line of every element, in document order; malformed input fails with the line it broke on. */
function scanElementLines(text: string, file: string): number[] {
  const lines: number[] = [];
  const parser = new SaxesParser();
  parser.on("opentagstart", () => lines.push(parser.line));
  parser.on("error", (err) => {
    throw new ParseError({ file, path: "/", line: parser.line }, `malformed XML: ${err.message}`);
  });
  parser.write(text).close();
  return lines;
}

export type ParsedXml = { doc: Document; reader: XmlReader };

export function parseXmlDocument(text: string, file: string): ParsedXml {
  const lines = scanElementLines(text, file);
  const doc = getDomParser().parseFromString(text, "application/xml");
  const error = doc.getElementsByTagName("parsererror")[0];
  if (error || !doc.documentElement) {
    const detail = error?.textContent?.trim().split("\n")[0] ?? "empty document";
    throw new ParseError({ file, path: "/" }, `malformed XML: ${detail}`);
  }
  const elementLines = new Map<Element, number>();
  Array.from(doc.getElementsByTagName("*")).forEach((el, i) => {
    const line = lines[i];
    if (line !== undefined) elementLines.set(el, line);
  });
  return { doc, reader: new XmlReader(file, elementLines) };
}

export const childElements = (el: Element, tag?: string): Element[] =>
  Array.from(el.children).filter((child) => tag === undefined || child.localName === tag);

export const firstChild = (el: Element, tag: string): Element | null =>
  Array.from(el.children).find((child) => child.localName === tag) ?? null;

export const childText = (el: Element, tag: string): string | null => {
  const child = firstChild(el, tag);
  const text = child?.textContent?.trim();
  return text ? text : null;
};

/** XPath-like location, indexing only where same-named siblings exist. */
export function elementPath(el: Element): string {
  const parts: string[] = [];
  let cur: Element | null = el;
  while (cur) {
    const parent: Element | null = cur.parentElement;
    const name = cur.localName;
    if (parent) {
      const same = childElements(parent, name);
      parts.push(same.length > 1 ? `${name}[${same.indexOf(cur) + 1}]` : name);
    } else {
      parts.push(name);
    }
    cur = parent;
  }
  return `/${parts.reverse().join("/")}`;
}

export const splitNumbers = (value: string) => value.trim().split(/\s+/).filter(Boolean);

/**
 * Reads numbers out of one XML document and turns every problem into a
 * located ParseError; unsupported sub-variants are collected as warnings.
 */
export class XmlReader {
  readonly warnings: UnsupportedElementError[] = [];

  constructor(
    readonly file: string,
    private readonly lines: ReadonlyMap<Element, number> = new Map()
  ) {}

  location(el: Element): SourceLocation {
    return { file: this.file, path: elementPath(el), line: this.lines.get(el) };
  }

  fail(el: Element, reason: string): never {
    throw new ParseError(this.location(el), reason);
  }

  unsupported(el: Element, element: string, reason?: string) {
    this.warnings.push(new UnsupportedElementError(this.location(el), element, reason));
  }

  requireAttr(el: Element, name: string): string {
    const value = el.getAttribute(name);
    if (value === null || value.trim() === "") return this.fail(el, `<${el.localName}> is missing attribute '${name}'`);
    return value.trim();
  }

  requireChild(el: Element, tag: string): Element {
    const child = firstChild(el, tag);
    if (!child) return this.fail(el, `<${el.localName}> is missing required <${tag}>`);
    return child;
  }

  number(el: Element, raw: string | null | undefined, label: string, fallback?: number): number {
    if (raw === null || raw === undefined || raw.trim() === "") {
      if (fallback === undefined) return this.fail(el, `missing value for ${label}`);
      return fallback;
    }
    const n = Number(raw.trim());
    if (!Number.isFinite(n)) return this.fail(el, `${label} is not a number: '${raw.trim()}'`);
    return n;
  }

  numbers(el: Element, raw: string, label: string, count?: number | readonly number[]): number[] {
    const parts = splitNumbers(raw);
    const counts = count === undefined ? null : typeof count === "number" ? [count] : count;
    if (counts && !counts.includes(parts.length)) {
      this.fail(el, `${label} expects ${counts.join(" or ")} values, got ${parts.length}: '${raw.trim()}'`);
    }
    return parts.map((part) => {
      const n = Number(part);
      if (!Number.isFinite(n)) this.fail(el, `${label} is not numeric: '${raw.trim()}'`);
      return n;
    });
  }

  vector(el: Element, raw: string | null | undefined, label: string, fallback?: Vec3): Vec3 {
    if (raw === null || raw === undefined || raw.trim() === "") {
      if (!fallback) return this.fail(el, `missing value for ${label}`);
      return fallback;
    }
    const [x, y, z] = this.numbers(el, raw, label, 3);
    return [x, y, z];
  }
}
