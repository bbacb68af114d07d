import type { DiffEntry, DiffReport, DiffValue, EntityKind, FieldCategory, ModelWarning } from "../model/types";

export type ReportLayout = "status" | "category" | "git";

export type RenderOptions = {
  layout?: ReportLayout;
  color?: boolean;
};

const RED = "\u001b[31m";
const GREEN = "\u001b[32m";
const YELLOW = "\u001b[33m";
const RESET = "\u001b[0m";

const RULE = "═".repeat(45);

const KIND_LABEL: Record<EntityKind, string> = { link: "Link", joint: "Joint" };

const CATEGORY_SECTIONS: [FieldCategory, string][] = [
  ["kinematics", "KINEMATICS"],
  ["inertial", "INERTIAL"],
  ["collision", "COLLISION"],
  ["visual", "VISUAL"],
];

export function formatNumber(n: number) {
  if (!Number.isFinite(n) || Number.isInteger(n)) return String(n);
  return String(Number(n.toPrecision(9)));
}

export function formatValue(value: DiffValue): string {
  if (value === null) return "none";
  if (typeof value === "number") return formatNumber(value);
  if (typeof value === "string") return value;
  return `(${value.map(formatNumber).join(", ")})`;
}

const isPresence = (entry: DiffEntry) => entry.fieldPath === "";

type EntityGroup = { kind: EntityKind; id: string; entries: DiffEntry[] };

/** Groups consecutive entries of one entity; report entries are already sorted. */
function groupByEntity(entries: readonly DiffEntry[]): EntityGroup[] {
  const groups: EntityGroup[] = [];
  for (const entry of entries) {
    const last = groups[groups.length - 1];
    if (last && last.kind === entry.entityKind && last.id === entry.entityId) last.entries.push(entry);
    else groups.push({ kind: entry.entityKind, id: entry.entityId, entries: [entry] });
  }
  return groups;
}

class ReportWriter {
  readonly lines: string[] = [];

  constructor(private color: boolean) {}

  paint(text: string, code: string) {
    return this.color ? `${code}${text}${RESET}` : text;
  }

  push(...lines: string[]) {
    this.lines.push(...lines);
  }

  bars(title: string) {
    this.push(`━━━ ${title} ━━━`, "");
  }

  change(entry: DiffEntry) {
    switch (entry.classification) {
      case "added_in_b":
        return `${this.paint("added", GREEN)} ${formatValue(entry.valueB)}`;
      case "removed_from_b":
        return `${this.paint("removed", RED)} ${formatValue(entry.valueA)}`;
      case "unmatched_structure":
        return `${formatValue(entry.valueA)} → ${formatValue(entry.valueB)} ${this.paint("(unmatched structure)", YELLOW)}`;
      case "mismatch":
        return `${this.paint(formatValue(entry.valueA), RED)} → ${this.paint(formatValue(entry.valueB), GREEN)}`;
    }
  }

  fieldLines(entries: readonly DiffEntry[]) {
    for (const entry of entries) this.push(`  • ${entry.fieldPath}: ${this.change(entry)}`);
  }

  warnings(report: DiffReport) {
    const all: [string, ModelWarning][] = [
      ...report.warnings.a.map((w): [string, ModelWarning] => ["A", w]),
      ...report.warnings.b.map((w): [string, ModelWarning] => ["B", w]),
    ];
    if (!all.length) return;
    this.bars("WARNINGS");
    for (const [side, warning] of all) {
      const { file, line, path } = warning.location;
      const where = `${file}${line !== undefined ? `:${line}` : ""} (${path})`;
      this.push(`${side}: ${this.paint(where, YELLOW)}: ${warning.reason}`);
    }
    this.push("");
  }

  header(report: DiffReport) {
    const { modelA, modelB } = report;
    const a = `${modelA.name} (${modelA.format})`;
    const b = `${modelB.name} (${modelB.format})`;
    this.bars("NAME");
    this.push(modelA.name === modelB.name ? `${a} → ${b}` : `${this.paint(a, RED)} → ${this.paint(b, GREEN)}`, "");
  }
}

function counts(groups: readonly EntityGroup[], kind?: EntityKind) {
  const scoped = kind ? groups.filter((g) => g.kind === kind) : groups;
  const presence = (classification: DiffEntry["classification"]) =>
    scoped.filter((g) => g.entries.some((e) => isPresence(e) && e.classification === classification)).length;
  return {
    removed: presence("removed_from_b"),
    added: presence("added_in_b"),
    modified: scoped.filter((g) => g.entries.some((e) => !isPresence(e))).length,
  };
}

function renderStatus(report: DiffReport, w: ReportWriter) {
  const groups = groupByEntity(report.entries);
  const { removed, added, modified } = counts(groups);
  w.header(report);
  w.push(RULE, `SUMMARY: ${removed} removed, ${added} added, ${modified} modified`, RULE, "");

  for (const [classification, title, code] of [
    ["removed_from_b", "REMOVED", RED],
    ["added_in_b", "ADDED", GREEN],
  ] as const) {
    const hits = groups.filter((g) => g.entries.some((e) => isPresence(e) && e.classification === classification));
    if (!hits.length) continue;
    w.bars(title);
    for (const g of hits) w.push(`${KIND_LABEL[g.kind]}: ${w.paint(g.id, code)}`);
    w.push("");
  }

  const changed = groups.filter((g) => g.entries.some((e) => !isPresence(e)));
  if (changed.length) {
    w.bars("MODIFIED");
    for (const g of changed) {
      w.push(`${KIND_LABEL[g.kind]}: ${g.id}`);
      w.fieldLines(g.entries.filter((e) => !isPresence(e)));
      w.push("");
    }
  }
}

function renderCategory(report: DiffReport, w: ReportWriter) {
  w.header(report);
  for (const [category, title] of CATEGORY_SECTIONS) {
    const groups = groupByEntity(report.entries.filter((e) => e.category === category));
    if (!groups.length) continue;
    w.bars(title);
    for (const g of groups) {
      const presence = g.entries.find(isPresence);
      if (presence) {
        const added = presence.classification === "added_in_b";
        w.push(`${KIND_LABEL[g.kind]}: ${w.paint(g.id, added ? GREEN : RED)} (${added ? "added" : "removed"})`);
        continue;
      }
      w.push(`${KIND_LABEL[g.kind]}: ${g.id}`);
      w.fieldLines(g.entries);
      w.push("");
    }
    if (w.lines[w.lines.length - 1] !== "") w.push("");
  }
}

function renderGit(report: DiffReport, w: ReportWriter) {
  const { modelA, modelB } = report;
  if (modelA.name !== modelB.name) {
    w.push("@@ Name @@", "", w.paint(`-name: ${modelA.name}`, RED), w.paint(`+name: ${modelB.name}`, GREEN), "");
  }
  const groups = groupByEntity(report.entries);
  for (const kind of ["link", "joint"] as const) {
    const c = counts(groups, kind);
    w.push(`@@ ${KIND_LABEL[kind]}s (${c.removed} removed, ${c.added} added, ${c.modified} modified) @@`, "");
    for (const g of groups.filter((group) => group.kind === kind)) {
      const presence = g.entries.find(isPresence);
      if (presence) {
        const added = presence.classification === "added_in_b";
        w.push(w.paint(`${added ? "+" : "-"}${KIND_LABEL[kind]} ${g.id}`, added ? GREEN : RED), "");
        continue;
      }
      w.push(` ${KIND_LABEL[kind]} ${g.id}`);
      for (const e of g.entries) {
        if (e.classification !== "added_in_b") w.push(w.paint(`-  ${e.fieldPath}: ${formatValue(e.valueA)}`, RED));
        if (e.classification !== "removed_from_b") w.push(w.paint(`+  ${e.fieldPath}: ${formatValue(e.valueB)}`, GREEN));
      }
      w.push("");
    }
  }
}

const LAYOUTS: Record<ReportLayout, (report: DiffReport, writer: ReportWriter) => void> = {
  status: renderStatus,
  category: renderCategory,
  git: renderGit,
};

/** Human-readable text for a report. Same report and options, same text. */
export function renderReport(report: DiffReport, options: RenderOptions = {}): string {
  const writer = new ReportWriter(options.color ?? false);
  LAYOUTS[options.layout ?? "status"](report, writer);
  writer.warnings(report);
  return writer.lines.join("\n").trimEnd();
}
