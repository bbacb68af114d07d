import { ParseError, UnsupportedElementError } from "../../model/errors";

export type UsdPathValue = { kind: "path"; path: string };

export type UsdAssetValue = { kind: "asset"; asset: string; primPath?: string };

export type UsdDictionary = { kind: "dict"; entries: Map<string, UsdValue> };

export type UsdValue =
  | null
  | boolean
  | number
  | string
  | UsdPathValue
  | UsdAssetValue
  | UsdDictionary
  | readonly UsdValue[];

export type UsdListOpKind = "explicit" | "prepend" | "append" | "add" | "delete" | "reorder";

export type UsdMetadataEntry = {
  op: UsdListOpKind;
  value: UsdValue;
  line: number;
};

export type UsdPropertySpec = {
  name: string;
  typeName: string;
  isRelationship: boolean;
  op: UsdListOpKind;
  /** Authored default value; `undefined` when only declared. */
  value?: UsdValue;
  line: number;
};

export type UsdSpecifier = "def" | "over" | "class";

export type UsdPrimSpec = {
  specifier: UsdSpecifier;
  typeName: string | null;
  name: string;
  /** Absolute path inside its own layer. */
  path: string;
  line: number;
  metadata: Map<string, UsdMetadataEntry>;
  properties: Map<string, UsdPropertySpec>;
  children: UsdPrimSpec[];
};

export type UsdLayer = {
  file: string;
  metadata: Map<string, UsdMetadataEntry>;
  prims: UsdPrimSpec[];
  warnings: UnsupportedElementError[];
};

type TokenKind = "punct" | "number" | "string" | "ident" | "path" | "asset" | "eof";

type Token = { kind: TokenKind; text: string; line: number };

const PUNCT = new Set(["(", ")", "[", "]", "{", "}", "=", ",", ";", ":"]);

const LIST_OPS = new Set(["prepend", "append", "add", "delete", "reorder"]);

const PROPERTY_QUALIFIERS = new Set(["custom", "uniform", "varying", "config"]);

const NUMBER_RE = /^-?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/;

const isIdentStart = (ch: string) => /[A-Za-z_]/.test(ch);

const isIdentPart = (ch: string) => /[A-Za-z0-9_:.]/.test(ch);

export function tokenizeUsda(text: string, file: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  let line = 1;
  const fail = (reason: string): never => {
    throw new ParseError({ file, path: "/", line }, reason);
  };

  while (i < text.length) {
    const ch = text[i];
    if (ch === "\n") {
      line += 1;
      i += 1;
      continue;
    }
    if (/\s/.test(ch)) {
      i += 1;
      continue;
    }
    if (ch === "#" || (ch === "/" && text[i + 1] === "/")) {
      while (i < text.length && text[i] !== "\n") i += 1;
      continue;
    }
    if (ch === "/" && text[i + 1] === "*") {
      const end = text.indexOf("*/", i + 2);
      if (end < 0) fail("unterminated block comment");
      line += (text.slice(i, end).match(/\n/g) ?? []).length;
      i = end + 2;
      continue;
    }
    if (ch === '"' || ch === "'") {
      const start = line;
      const triple = text.startsWith(ch.repeat(3), i);
      const quote = triple ? ch.repeat(3) : ch;
      let j = i + quote.length;
      let value = "";
      while (!text.startsWith(quote, j)) {
        if (j >= text.length || (!triple && text[j] === "\n")) fail("unterminated string");
        if (text[j] === "\\" && j + 1 < text.length) {
          const next = text[j + 1];
          value += next === "n" ? "\n" : next === "t" ? "\t" : next;
          j += 2;
          continue;
        }
        if (text[j] === "\n") line += 1;
        value += text[j];
        j += 1;
      }
      tokens.push({ kind: "string", text: value, line: start });
      i = j + quote.length;
      continue;
    }
    if (ch === "@") {
      const triple = text.startsWith("@@@", i);
      const quote = triple ? "@@@" : "@";
      const end = text.indexOf(quote, i + quote.length);
      if (end < 0) fail("unterminated asset path");
      tokens.push({ kind: "asset", text: text.slice(i + quote.length, end), line });
      i = end + quote.length;
      continue;
    }
    if (ch === "<") {
      const end = text.indexOf(">", i);
      if (end < 0) fail("unterminated path");
      tokens.push({ kind: "path", text: text.slice(i + 1, end).trim(), line });
      i = end + 1;
      continue;
    }
    const number = NUMBER_RE.exec(text.slice(i, i + 64));
    if (number && (ch !== "-" || /[\d.]/.test(text[i + 1] ?? ""))) {
      tokens.push({ kind: "number", text: number[0], line });
      i += number[0].length;
      continue;
    }
    if (ch === "-" && text.startsWith("-inf", i)) {
      tokens.push({ kind: "number", text: "-inf", line });
      i += 4;
      continue;
    }
    if (isIdentStart(ch)) {
      let j = i + 1;
      while (j < text.length && isIdentPart(text[j])) j += 1;
      // Array type names such as `float3[]` stay one token.
      if (text.startsWith("[]", j)) j += 2;
      tokens.push({ kind: "ident", text: text.slice(i, j), line });
      i = j;
      continue;
    }
    if (PUNCT.has(ch)) {
      tokens.push({ kind: "punct", text: ch, line });
      i += 1;
      continue;
    }
    fail(`unexpected character '${ch}'`);
  }
  tokens.push({ kind: "eof", text: "", line });
  return tokens;
}

/** Recursive-descent reader for the text (`.usda`) layer syntax. */
class UsdaParser {
  private pos = 0;
  readonly warnings: UnsupportedElementError[] = [];

  constructor(
    private readonly tokens: Token[],
    private readonly file: string
  ) {}

  private peek(offset = 0): Token {
    return this.tokens[Math.min(this.pos + offset, this.tokens.length - 1)];
  }

  private next(): Token {
    const token = this.peek();
    if (token.kind !== "eof") this.pos += 1;
    return token;
  }

  private fail(reason: string, token = this.peek(), path = "/"): never {
    throw new ParseError({ file: this.file, path, line: token.line }, reason);
  }

  private isPunct(text: string, offset = 0) {
    const token = this.peek(offset);
    return token.kind === "punct" && token.text === text;
  }

  private expectPunct(text: string) {
    const token = this.next();
    if (token.kind !== "punct" || token.text !== text) {
      this.fail(`expected '${text}', found '${token.text || token.kind}'`, token);
    }
  }

  private expect(kind: TokenKind, what: string): Token {
    const token = this.next();
    if (token.kind !== kind) this.fail(`expected ${what}, found '${token.text || token.kind}'`, token);
    return token;
  }

  private skipSeparators() {
    while (this.isPunct(";") || this.isPunct(",")) this.next();
  }

  parseLayer(): UsdLayer {
    const metadata = this.isPunct("(") ? this.parseMetadataBlock("/") : new Map<string, UsdMetadataEntry>();
    const prims: UsdPrimSpec[] = [];
    while (this.peek().kind !== "eof") {
      prims.push(this.parsePrim(""));
    }
    return { file: this.file, metadata, prims, warnings: this.warnings };
  }

  private parseMetadataBlock(path: string): Map<string, UsdMetadataEntry> {
    const entries = new Map<string, UsdMetadataEntry>();
    this.expectPunct("(");
    while (!this.isPunct(")")) {
      const token = this.peek();
      if (token.kind === "eof") this.fail("unterminated metadata block", token, path);
      if (token.kind === "string") {
        this.next();
        entries.set("doc", { op: "explicit", value: token.text, line: token.line });
        this.skipSeparators();
        continue;
      }
      let op: UsdListOpKind = "explicit";
      if (token.kind === "ident" && LIST_OPS.has(token.text) && this.peek(1).kind === "ident") {
        op = this.listOp(this.next().text);
      }
      const key = this.expect("ident", "metadata key");
      this.expectPunct("=");
      entries.set(key.text, { op, value: this.parseValue(), line: key.line });
      this.skipSeparators();
    }
    this.expectPunct(")");
    return entries;
  }

  private listOp(text: string): UsdListOpKind {
    switch (text) {
      case "prepend":
      case "append":
      case "add":
      case "delete":
      case "reorder":
        return text;
      default:
        return "explicit";
    }
  }

  private parsePrim(parentPath: string): UsdPrimSpec {
    const head = this.expect("ident", "'def', 'over' or 'class'");
    const specifier: UsdSpecifier =
      head.text === "def" || head.text === "over" || head.text === "class"
        ? head.text
        : this.fail(`expected a prim specifier, found '${head.text}'`, head, parentPath || "/");
    const typeName = this.peek().kind === "ident" ? this.next().text : null;
    const name = this.expect("string", "prim name").text;
    const path = `${parentPath}/${name}`;
    const metadata = this.isPunct("(") ? this.parseMetadataBlock(path) : new Map<string, UsdMetadataEntry>();
    const prim: UsdPrimSpec = {
      specifier,
      typeName,
      name,
      path,
      line: head.line,
      metadata,
      properties: new Map(),
      children: [],
    };
    this.expectPunct("{");
    this.parsePrimBody(prim);
    this.expectPunct("}");
    return prim;
  }

  private parsePrimBody(prim: UsdPrimSpec) {
    while (!this.isPunct("}")) {
      const token = this.peek();
      if (token.kind === "eof") this.fail(`unterminated prim '${prim.name}'`, token, prim.path);
      if (token.kind !== "ident") this.fail(`unexpected '${token.text}' in prim body`, token, prim.path);
      if (token.text === "def" || token.text === "over" || token.text === "class") {
        prim.children.push(this.parsePrim(prim.path));
      } else if (token.text === "variantSet") {
        this.skipVariantSet(prim);
      } else if (token.text === "reorder" && ["nameChildren", "properties"].includes(this.peek(1).text)) {
        this.next();
        this.next();
        this.expectPunct("=");
        this.parseValue();
      } else {
        this.parseProperty(prim);
      }
      this.skipSeparators();
    }
  }

  private skipVariantSet(prim: UsdPrimSpec) {
    const token = this.next();
    const name = this.expect("string", "variant set name").text;
    this.warnings.push(
      new UnsupportedElementError(
        { file: this.file, path: prim.path, line: token.line },
        `variantSet '${name}'`,
        `Variant set '${name}' is not composed; its opinions are ignored.`
      )
    );
    this.expectPunct("=");
    this.expectPunct("{");
    const scratch: UsdPrimSpec = { ...prim, properties: new Map(), children: [], metadata: new Map() };
    while (!this.isPunct("}")) {
      this.expect("string", "variant name");
      if (this.isPunct("(")) this.parseMetadataBlock(prim.path);
      this.expectPunct("{");
      this.parsePrimBody(scratch);
      this.expectPunct("}");
      this.skipSeparators();
    }
    this.expectPunct("}");
  }

  private parseProperty(prim: UsdPrimSpec) {
    let op: UsdListOpKind = "explicit";
    if (LIST_OPS.has(this.peek().text) && this.peek(1).kind === "ident") op = this.listOp(this.next().text);
    while (PROPERTY_QUALIFIERS.has(this.peek().text) && this.peek(1).kind === "ident") this.next();

    const typeToken = this.expect("ident", "property type");
    const nameToken = this.expect("ident", "property name");
    const isRelationship = typeToken.text === "rel";
    let name = nameToken.text;
    let suffix: "default" | "timeSamples" | "connect" = "default";
    if (name.endsWith(".timeSamples")) {
      suffix = "timeSamples";
      name = name.slice(0, -".timeSamples".length);
    } else if (name.endsWith(".connect")) {
      suffix = "connect";
      name = name.slice(0, -".connect".length);
    }

    let value: UsdValue | undefined;
    if (this.isPunct("=")) {
      this.next();
      value = this.parseValue();
    }
    if (this.isPunct("(")) this.parseMetadataBlock(`${prim.path}.${name}`);

    const existing = prim.properties.get(name);
    const spec: UsdPropertySpec = existing ?? {
      name,
      typeName: typeToken.text,
      isRelationship,
      op,
      line: nameToken.line,
    };
    if (suffix === "default" && value !== undefined) {
      spec.value = value;
      spec.op = op;
      spec.line = nameToken.line;
    } else if (suffix === "timeSamples" && spec.value === undefined) {
      spec.value = firstTimeSample(value);
      spec.line = nameToken.line;
    }
    prim.properties.set(name, spec);
  }

  private parseValue(): UsdValue {
    const token = this.next();
    switch (token.kind) {
      case "number":
        return token.text === "-inf" ? -Infinity : Number(token.text);
      case "string":
        return token.text;
      case "path":
        return { kind: "path", path: token.text };
      case "asset": {
        if (this.peek().kind === "path") {
          return { kind: "asset", asset: token.text, primPath: this.next().text };
        }
        return { kind: "asset", asset: token.text };
      }
      case "ident":
        if (token.text === "None") return null;
        if (token.text === "true") return true;
        if (token.text === "false") return false;
        if (token.text === "inf") return Infinity;
        if (token.text === "nan") return NaN;
        return token.text;
      case "punct":
        if (token.text === "(") return this.parseSequence(")");
        if (token.text === "[") return this.parseSequence("]");
        if (token.text === "{") return this.parseDictionary();
        break;
    }
    return this.fail(`unexpected '${token.text || token.kind}' where a value was expected`, token);
  }

  private parseSequence(close: string): UsdValue[] {
    const items: UsdValue[] = [];
    while (!this.isPunct(close)) {
      if (this.peek().kind === "eof") this.fail(`missing '${close}'`);
      items.push(this.parseValue());
      if (!this.isPunct(close)) this.expectPunct(",");
    }
    this.next();
    return items;
  }

  private parseDictionary(): UsdDictionary {
    const entries = new Map<string, UsdValue>();
    while (!this.isPunct("}")) {
      const token = this.peek();
      if (token.kind === "eof") this.fail("missing '}'");
      if (token.kind === "number") {
        // time samples: `time: value`
        const time = this.next().text;
        this.expectPunct(":");
        entries.set(time, this.parseValue());
      } else {
        this.expect("ident", "dictionary value type");
        const key = this.next();
        if (key.kind !== "ident" && key.kind !== "string") this.fail("expected dictionary key", key);
        this.expectPunct("=");
        entries.set(key.text, this.parseValue());
      }
      this.skipSeparators();
    }
    this.next();
    return { kind: "dict", entries };
  }
}

function firstTimeSample(value: UsdValue | undefined): UsdValue | undefined {
  if (!isDictionary(value)) return undefined;
  const times = Array.from(value.entries.keys()).sort((a, b) => Number(a) - Number(b));
  return times.length ? value.entries.get(times[0]) : undefined;
}

export const isDictionary = (value: UsdValue | undefined): value is UsdDictionary =>
  typeof value === "object" && value !== null && !Array.isArray(value) && "kind" in value && value.kind === "dict";

export const isPathValue = (value: UsdValue | undefined): value is UsdPathValue =>
  typeof value === "object" && value !== null && !Array.isArray(value) && "kind" in value && value.kind === "path";

export const isAssetValue = (value: UsdValue | undefined): value is UsdAssetValue =>
  typeof value === "object" && value !== null && !Array.isArray(value) && "kind" in value && value.kind === "asset";

export const isList = (value: UsdValue | undefined): value is readonly UsdValue[] => Array.isArray(value);

export const BINARY_USD_MAGIC = "PXR-USDC";

export function parseUsdaLayer(text: string, file: string): UsdLayer {
  if (text.startsWith(BINARY_USD_MAGIC)) {
    throw new ParseError({ file, path: "/" }, "binary USD (crate) layers are not supported; export the layer as .usda");
  }
  if (!/^#usda\s+\d/.test(text)) {
    throw new ParseError({ file, path: "/", line: 1 }, "missing '#usda <version>' header");
  }
  return new UsdaParser(tokenizeUsda(text, file), file).parseLayer();
}
