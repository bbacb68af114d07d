import type { XmlReader } from "../xml";
import { childElements } from "../xml";

export const MAIN_CLASS = "main";

type DefaultClass = {
  parent: string | null;
  /** Attribute defaults per element tag, only what this class itself sets. */
  attrs: Map<string, Map<string, string>>;
};

/**
 * Default classes of one MJCF document. Attribute lookup walks the class
 * chain from the requested class up to `main`; the first class that sets
 * the attribute wins.
 */
export class MjcfDefaults {
  private classes = new Map<string, DefaultClass>();

  constructor(
    private reader: XmlReader,
    root: Element
  ) {
    for (const top of childElements(root, "default")) {
      this.collect(top, null);
    }
  }

  private collect(el: Element, parent: string | null) {
    const name = el.getAttribute("class") ?? (parent === null ? MAIN_CLASS : null);
    if (name === null) {
      this.reader.fail(el, "nested <default> is missing attribute 'class'");
      return;
    }
    const existing = this.classes.get(name);
    if (existing && parent !== null) this.reader.fail(el, `duplicate default class '${name}'`);
    const entry: DefaultClass = existing ?? { parent, attrs: new Map() };
    this.classes.set(name, entry);

    for (const child of childElements(el)) {
      if (child.localName === "default") {
        this.collect(child, name);
        continue;
      }
      const attrs = entry.attrs.get(child.localName) ?? new Map<string, string>();
      for (const attr of Array.from(child.attributes)) attrs.set(attr.name, attr.value);
      entry.attrs.set(child.localName, attrs);
    }
  }

  has(name: string) {
    return name === MAIN_CLASS || this.classes.has(name);
  }

  /** True when `name` is `ancestor` or inherits from it. */
  inherits(name: string, ancestor: string): boolean {
    let current: string | null = name;
    while (current !== null) {
      if (current === ancestor) return true;
      current = this.classes.get(current)?.parent ?? null;
    }
    return false;
  }

  /**
   * Class in effect for an element: its own `class`, else the nearest
   * enclosing `childclass`, else `main`.
   */
  classOf(el: Element): string {
    const own = el.getAttribute("class");
    let name = own;
    for (let cur = el.parentElement; name === null && cur; cur = cur.parentElement) {
      name = cur.getAttribute("childclass");
    }
    const resolved = name ?? MAIN_CLASS;
    if (!this.has(resolved)) return this.reader.fail(el, `unknown default class '${resolved}'`);
    return resolved;
  }

  /** Attribute value from the element, falling back to its class defaults. */
  attr(el: Element, name: string): string | null {
    const own = el.getAttribute(name);
    if (own !== null) return own;
    let current: string | null = this.classOf(el);
    while (current !== null) {
      const entry = this.classes.get(current);
      const value = entry?.attrs.get(el.localName)?.get(name);
      if (value !== undefined) return value;
      current = entry?.parent ?? null;
    }
    return null;
  }
}
