import path from "node:path";
import { ParseError, type UnsupportedElementError } from "../../model/errors";
import type { SourceLocation } from "../../model/types";
import {
  type UsdLayer,
  type UsdMetadataEntry,
  type UsdPrimSpec,
  type UsdValue,
  isAssetValue,
  isList,
  isPathValue,
  parseUsdaLayer,
} from "./usdaParser";

/** Resolves an asset path authored in `anchor` the way layers name each other. */
export function resolveAssetPath(anchor: string, asset: string): string {
  const target = asset.replace(/\\/g, "/");
  if (path.posix.isAbsolute(target)) return path.posix.normalize(target);
  return path.posix.normalize(path.posix.join(path.posix.dirname(anchor.replace(/\\/g, "/")), target));
}

type IndexedLayer = {
  layer: UsdLayer;
  specs: Map<string, UsdPrimSpec>;
};

/** A root layer with its sublayers, strongest first. */
type LayerStack = {
  id: string;
  layers: IndexedLayer[];
};

/** A place opinions come from, and how its paths map back onto the stage. */
type Site = {
  stack: LayerStack;
  path: string;
  toStage: (p: string) => string;
};

export type SiteSpec = { site: Site; layer: UsdLayer; spec: UsdPrimSpec };

export type ListItem = { value: UsdValue; layer: UsdLayer; entry: UsdMetadataEntry; spec: UsdPrimSpec };

export type ResolvedAttribute = { value: UsdValue; location: SourceLocation };

const replacePrefix = (p: string, from: string, to: string) => {
  if (p === from) return to;
  if (p.startsWith(`${from}/`)) return `${to}${p.slice(from.length)}`;
  return p;
};

const itemKey = (value: UsdValue): string => {
  if (isPathValue(value)) return `path:${value.path}`;
  if (isAssetValue(value)) return `asset:${value.asset}${value.primPath ?? ""}`;
  return `value:${String(value)}`;
};

/** Applies list-edit opinions weakest first, so stronger layers edit the result last. */
function composeListOp(entries: readonly { entry: UsdMetadataEntry; items: ListItem[] }[]): ListItem[] {
  let result: ListItem[] = [];
  for (const { entry, items } of [...entries].reverse()) {
    const keys = new Set(items.map((item) => itemKey(item.value)));
    const without = result.filter((item) => !keys.has(itemKey(item.value)));
    switch (entry.op) {
      case "explicit":
        result = items;
        break;
      case "prepend":
        result = [...items, ...without];
        break;
      case "append":
      case "add":
        result = [...without, ...items];
        break;
      case "delete":
        result = without;
        break;
      case "reorder":
        break;
    }
  }
  return result;
}

const asList = (value: UsdValue): readonly UsdValue[] =>
  value === null ? [] : isList(value) ? value : [value];

function indexLayer(layer: UsdLayer): IndexedLayer {
  const specs = new Map<string, UsdPrimSpec>();
  const visit = (spec: UsdPrimSpec) => {
    // A layer may carry several specs for one path; the first is kept.
    if (!specs.has(spec.path)) specs.set(spec.path, spec);
    spec.children.forEach(visit);
  };
  layer.prims.forEach(visit);
  return { layer, specs };
}

/** One composed prim: every opinion about one stage path, strongest first. */
export class UsdPrim {
  readonly children: UsdPrim[] = [];

  constructor(
    readonly stage: UsdStage,
    readonly path: string,
    readonly parent: UsdPrim | null,
    private readonly opinions: SiteSpec[]
  ) {}

  get name() {
    return this.path.slice(this.path.lastIndexOf("/") + 1);
  }

  get typeName(): string | null {
    return this.opinions.find((o) => o.spec.typeName)?.spec.typeName ?? null;
  }

  get isAbstract() {
    return this.opinions[0]?.spec.specifier === "class";
  }

  get location(): SourceLocation {
    const strongest = this.opinions.find((o) => o.spec.specifier === "def") ?? this.opinions[0];
    return { file: strongest.layer.file, path: this.path, line: strongest.spec.line };
  }

  get apiSchemas(): string[] {
    return this.stage.listMetadata(this.opinions, "apiSchemas").flatMap((item) =>
      typeof item.value === "string" ? [item.value] : []
    );
  }

  hasApi(schema: string) {
    return this.apiSchemas.includes(schema);
  }

  /** Strongest authored value of an attribute. */
  attribute(name: string): ResolvedAttribute | undefined {
    for (const { layer, spec } of this.opinions) {
      const prop = spec.properties.get(name);
      if (prop && !prop.isRelationship && prop.value !== undefined) {
        return { value: prop.value, location: { file: layer.file, path: `${this.path}.${name}`, line: prop.line } };
      }
    }
    return undefined;
  }

  /** Targets of the strongest relationship opinion, as stage paths. */
  relationship(name: string): string[] | undefined {
    for (const { site, spec } of this.opinions) {
      const prop = spec.properties.get(name);
      if (!prop || !prop.isRelationship || prop.value === undefined) continue;
      return asList(prop.value).flatMap((value) => {
        if (!isPathValue(value)) return [];
        const absolute = value.path.startsWith("/") ? value.path : path.posix.join(spec.path, value.path);
        return [site.toStage(path.posix.normalize(absolute))];
      });
    }
    return undefined;
  }

  propertyLocation(name: string): SourceLocation {
    for (const { layer, spec } of this.opinions) {
      const prop = spec.properties.get(name);
      if (prop) return { file: layer.file, path: `${this.path}.${name}`, line: prop.line };
    }
    return this.location;
  }

  *descendants(): Generator<UsdPrim> {
    for (const child of this.children) {
      yield child;
      yield* child.descendants();
    }
  }
}

/**
 * Minimal composition of text layers: sublayers, internal and external
 * references, payloads, inherits and `over` opinions. The strongest opinion
 * wins for every attribute and relationship.
 */
export class UsdStage {
  readonly rootPrims: UsdPrim[] = [];
  readonly warnings: UnsupportedElementError[] = [];
  private readonly parsed = new Map<string, IndexedLayer>();
  private readonly stacks = new Map<string, LayerStack>();
  private readonly prims = new Map<string, UsdPrim>();
  private readonly rootStack: LayerStack;

  constructor(
    readonly rootFile: string,
    rootText: string,
    private readonly layerTexts: ReadonlyMap<string, string> = new Map()
  ) {
    this.parsed.set(rootFile, indexLayer(parseUsdaLayer(rootText, rootFile)));
    this.rootStack = this.loadStack(rootFile, [], { file: rootFile, path: "/" });
    const identity = (p: string) => p;
    for (const name of this.childNames(this.rootStack.layers.flatMap((l) => l.layer.prims))) {
      const prim = this.buildPrim(null, `/${name}`, [{ stack: this.rootStack, path: `/${name}`, toStage: identity }]);
      if (prim) this.rootPrims.push(prim);
    }
  }

  /** Layer metadata from the strongest layer of the root stack that authors it. */
  layerMetadata(key: string): UsdValue | undefined {
    for (const { layer } of this.rootStack.layers) {
      const entry = layer.metadata.get(key);
      if (entry) return entry.value;
    }
    return undefined;
  }

  get defaultPrim(): UsdPrim | null {
    const name = this.layerMetadata("defaultPrim");
    if (typeof name === "string") return this.prim(name.startsWith("/") ? name : `/${name}`);
    return this.rootPrims.find((prim) => !prim.isAbstract) ?? null;
  }

  prim(primPath: string): UsdPrim | null {
    return this.prims.get(primPath) ?? null;
  }

  private layer(file: string, from: SourceLocation): IndexedLayer {
    const cached = this.parsed.get(file);
    if (cached) return cached;
    const text = this.layerTexts.get(file);
    if (text === undefined) throw new ParseError(from, `layer '${file}' could not be loaded`);
    const indexed = indexLayer(parseUsdaLayer(text, file));
    this.warnings.push(...indexed.layer.warnings);
    this.parsed.set(file, indexed);
    return indexed;
  }

  private loadStack(file: string, chain: readonly string[], from: SourceLocation): LayerStack {
    const cached = this.stacks.get(file);
    if (cached) return cached;
    if (chain.includes(file)) {
      throw new ParseError(from, `layer composition cycle: ${[...chain, file].join(" -> ")}`);
    }
    const root = this.layer(file, from);
    if (chain.length === 0 && file === this.rootFile) this.warnings.push(...root.layer.warnings);
    const layers = [root];
    const subLayers = root.layer.metadata.get("subLayers");
    if (subLayers) {
      for (const value of asList(subLayers.value)) {
        if (!isAssetValue(value)) continue;
        const subFile = resolveAssetPath(file, value.asset);
        const location = { file, path: "/", line: subLayers.line };
        layers.push(...this.loadStack(subFile, [...chain, file], location).layers);
      }
    }
    const stack = { id: file, layers };
    this.stacks.set(file, stack);
    return stack;
  }

  private specsAt(site: Site): SiteSpec[] {
    return site.stack.layers.flatMap(({ layer, specs }) => {
      const spec = specs.get(site.path);
      return spec ? [{ site, layer, spec }] : [];
    });
  }

  listMetadata(opinions: readonly SiteSpec[], key: string): ListItem[] {
    const entries = opinions.flatMap(({ layer, spec }) => {
      const entry = spec.metadata.get(key);
      if (!entry) return [];
      return [{ entry, items: asList(entry.value).map((value) => ({ value, layer, entry, spec })) }];
    });
    return composeListOp(entries);
  }

  private arcSite(site: Site, item: ListItem, kind: string): Site | null {
    const location = { file: item.layer.file, path: item.spec.path, line: item.entry.line };
    const { value } = item;
    let stack = site.stack;
    let target: string | null = null;
    if (isPathValue(value)) {
      target = value.path;
    } else if (isAssetValue(value)) {
      stack = this.loadStack(resolveAssetPath(item.layer.file, value.asset), [], location);
      target = value.primPath ?? null;
      if (!target) {
        const name = stack.layers[0].layer.metadata.get("defaultPrim")?.value;
        if (typeof name !== "string") {
          throw new ParseError(location, `${kind} to '${value.asset}' names no prim and the layer has no defaultPrim`);
        }
        target = name.startsWith("/") ? name : `/${name}`;
      }
    } else {
      return null;
    }
    const from = target;
    return { stack, path: target, toStage: (p) => site.toStage(replacePrefix(p, from, site.path)) };
  }

  /**
   * The site plus everything its inherits, references and payloads bring in, strongest first.
   * `ancestors` are the sites of every enclosing prim: an arc back onto one of them, or onto
   * a prim above them, would nest the prim inside itself.
   */
  private expandSite(site: Site, chain: ReadonlySet<string>, ancestors: readonly Site[]): Site[] {
    const key = `${site.stack.id}:${site.path}`;
    const opinions = this.specsAt(site);
    if (chain.has(key)) {
      const at = opinions[0];
      throw new ParseError(
        { file: at?.layer.file ?? site.stack.id, path: site.path, line: at?.spec.line },
        `composition arc cycle through '${site.path}'`
      );
    }
    if (!opinions.length) return [site];
    const next = new Set(chain).add(key);
    const expanded: Site[] = [site];
    for (const kind of ["inherits", "references", "payload"]) {
      for (const item of this.listMetadata(opinions, kind)) {
        const arc = this.arcSite(site, item, kind);
        if (!arc) continue;
        const enclosing = ancestors.find(
          (a) => a.stack.id === arc.stack.id && (a.path === arc.path || a.path.startsWith(`${arc.path}/`))
        );
        if (enclosing) {
          throw new ParseError(
            { file: item.layer.file, path: item.spec.path, line: item.entry.line },
            `composition arc cycle: '${item.spec.path}' ${kind} its ancestor '${arc.path}'`
          );
        }
        expanded.push(...this.expandSite(arc, next, ancestors));
      }
    }
    return expanded;
  }

  private childNames(specs: readonly UsdPrimSpec[]): string[] {
    const names: string[] = [];
    for (const spec of specs) {
      if (!names.includes(spec.name)) names.push(spec.name);
    }
    return names;
  }

  private buildPrim(
    parent: UsdPrim | null,
    stagePath: string,
    base: readonly Site[],
    ancestors: readonly Site[] = []
  ): UsdPrim | null {
    const sites = base.flatMap((site) => this.expandSite(site, new Set(), ancestors));
    const opinions = sites.flatMap((site) => this.specsAt(site));
    if (!opinions.length) return null;
    const prim = new UsdPrim(this, stagePath, parent, opinions);
    this.prims.set(stagePath, prim);
    for (const name of this.childNames(opinions.flatMap((o) => o.spec.children))) {
      const childSites = sites.map((site) => ({ ...site, path: `${site.path}/${name}` }));
      const child = this.buildPrim(prim, `${stagePath}/${name}`, childSites, [...ancestors, ...sites]);
      if (child) prim.children.push(child);
    }
    return prim;
  }
}
