import type { CanonicalModel, Joint, Link } from "../model/types";

/** Names in model A mapped onto the names they carry in model B. */
export type Renames = {
  links?: Readonly<Record<string, string>>;
  joints?: Readonly<Record<string, string>>;
};

export type EntityPair<T> = {
  /** A-side name, or `a->b` when a rename paired two different names. */
  id: string;
  a: T;
  b: T;
};

export type Alignment = {
  links: EntityPair<Link>[];
  joints: EntityPair<Joint>[];
  /** Joints paired by name whose parent/child links do not correspond. */
  structural: EntityPair<Joint>[];
  removedLinks: Link[];
  addedLinks: Link[];
  removedJoints: Joint[];
  addedJoints: Joint[];
};

const pairId = (a: string, b: string) => (a === b ? a : `${a}->${b}`);

const lookup = (map: Readonly<Record<string, string>> | undefined, name: string) =>
  map && Object.prototype.hasOwnProperty.call(map, name) ? map[name] : name;

function matchByName<T extends { name: string }>(
  itemsA: readonly T[],
  itemsB: readonly T[],
  renames: Readonly<Record<string, string>> | undefined
) {
  const byName = new Map(itemsB.map((item) => [item.name, item]));
  const used = new Set<string>();
  const pairs: EntityPair<T>[] = [];
  const removed: T[] = [];
  for (const a of itemsA) {
    const target = lookup(renames, a.name);
    const b = byName.get(target);
    if (b && !used.has(target)) {
      used.add(target);
      pairs.push({ id: pairId(a.name, b.name), a, b });
    } else {
      removed.push(a);
    }
  }
  const added = itemsB.filter((item) => !used.has(item.name));
  return { pairs, removed, added };
}

/**
 * Pairs links and joints by exact name, through an explicit rename map when
 * one is given. Nothing is paired by similarity. A joint paired by name is
 * kept out of field comparison when its parent or child does not map onto
 * the corresponding link of the other model.
 */
export function alignModels(a: CanonicalModel, b: CanonicalModel, renames: Renames = {}): Alignment {
  const links = matchByName(a.links, b.links, renames.links);
  const linkMap = new Map(links.pairs.map((pair) => [pair.a.name, pair.b.name]));
  const joints = matchByName(a.joints, b.joints, renames.joints);

  const matched: EntityPair<Joint>[] = [];
  const structural: EntityPair<Joint>[] = [];
  for (const pair of joints.pairs) {
    const sameParent = linkMap.get(pair.a.parentLink) === pair.b.parentLink;
    const sameChild = linkMap.get(pair.a.childLink) === pair.b.childLink;
    (sameParent && sameChild ? matched : structural).push(pair);
  }

  return {
    links: links.pairs,
    joints: matched,
    structural,
    removedLinks: links.removed,
    addedLinks: links.added,
    removedJoints: joints.removed,
    addedJoints: joints.added,
  };
}
