import { isName } from "../expr/lexer";
import type { ExtractedData, ExtractedValue, PlainValue, Scalar } from "../types";

export interface ScalarNode { kind: "scalar"; value: Scalar }
export interface ListNode { kind: "list"; items: Scalar[] }
export interface MapNode { kind: "map"; entries: Map<string, DataNode> }
export interface SequenceNode { kind: "sequence"; items: MapNode[] }

export type DataNode = ScalarNode | ListNode | MapNode | SequenceNode;

export interface PathSegment {
  name: string;
  array: boolean; // segment was written `name[]`
}

export const createTree = (): MapNode => ({ kind: "map", entries: new Map() });

export function parsePath(path: string): PathSegment[] {
  const segments = path.split(".").map((raw) => {
    const array = raw.endsWith("[]");
    return { name: array ? raw.slice(0, -2) : raw, array };
  });
  const bad = segments.find((s) => !isName(s.name));
  if (bad) throw new Error(`invalid path segment '${bad.name}' in '${path}'`);
  return segments;
}

type Replaced = Array<{ path: string; kind: DataNode["kind"] }>;

function childMap(parent: MapNode, name: string, path: string, replaced: Replaced): MapNode {
  const existing = parent.entries.get(name);
  if (existing?.kind === "map") return existing;
  if (existing) replaced.push({ path, kind: existing.kind });
  const created = createTree();
  parent.entries.set(name, created);
  return created;
}

function childSequence(parent: MapNode, name: string, minLength: number, path: string, replaced: Replaced): SequenceNode {
  const existing = parent.entries.get(name);
  if (existing && existing.kind !== "sequence") replaced.push({ path, kind: existing.kind });
  const seq: SequenceNode = existing?.kind === "sequence" ? existing : { kind: "sequence", items: [] };
  parent.entries.set(name, seq);
  while (seq.items.length < minLength) seq.items.push(createTree());
  return seq;
}

function setLeaf(parent: MapNode, name: string, node: ScalarNode | ListNode, path: string, replaced: Replaced): void {
  const existing = parent.entries.get(name);
  if (existing?.kind === "map" || existing?.kind === "sequence") replaced.push({ path, kind: existing.kind });
  parent.entries.set(name, node);
}

export interface WriteOutcome {
  targets: number;
  /** Set when a list was distributed over a sequence of a different length. */
  mismatch?: { sequence: number; values: number };
  /** Nodes of another shape that the write overwrote, with whatever they held. */
  replaced?: Replaced;
}

/**
 * Writes `value` at a dotted path. An `[]` segment makes that level a sequence of records:
 * it grows to the length of an incoming list and later segments address its elements. At
 * the last segment a list is distributed positionally over sequence elements and a scalar is
 * broadcast to all of them.
 *
 * Records are aligned by position only. Every op that writes into the same sequence must
 * produce its rows in the same order, or values from different rows end up in one record.
 */
export function writePath(tree: MapNode, path: string, value: ExtractedValue): WriteOutcome {
  const segments = parsePath(path);
  const last = segments[segments.length - 1];
  const incoming = Array.isArray(value) ? value.length : 0;
  const replaced: Replaced = [];
  const done = (outcome: WriteOutcome): WriteOutcome => {
    // Each sequence element reports the same path; one entry per path is enough.
    const unique = replaced.filter((r, i) => replaced.findIndex((o) => o.path === r.path) === i);
    return unique.length ? { ...outcome, replaced: unique } : outcome;
  };

  let cursor: MapNode[] = [tree];
  let spread = false;
  let prefix = "";
  for (const seg of segments.slice(0, -1)) {
    prefix = prefix ? `${prefix}.${seg.name}` : seg.name;
    if (seg.array) {
      cursor = cursor.flatMap((m) => childSequence(m, seg.name, incoming, prefix, replaced).items);
      spread = true;
      prefix += "[]";
    } else {
      cursor = cursor.map((m) => childMap(m, seg.name, prefix, replaced));
    }
  }
  const leafPath = prefix ? `${prefix}.${last.name}` : last.name;

  if (!spread) {
    const target = cursor[0];
    if (Array.isArray(value)) setLeaf(target, last.name, { kind: "list", items: value.slice() }, leafPath, replaced);
    else if (last.array) setLeaf(target, last.name, { kind: "list", items: [value] }, leafPath, replaced);
    else setLeaf(target, last.name, { kind: "scalar", value }, leafPath, replaced);
    return done({ targets: 1 });
  }

  if (!Array.isArray(value)) {
    for (const m of cursor) setLeaf(m, last.name, { kind: "scalar", value }, leafPath, replaced);
    return done({ targets: cursor.length });
  }

  const n = Math.min(cursor.length, value.length);
  for (let i = 0; i < n; i++) setLeaf(cursor[i], last.name, { kind: "scalar", value: value[i] }, leafPath, replaced);
  const outcome: WriteOutcome = { targets: n };
  if (cursor.length !== value.length) outcome.mismatch = { sequence: cursor.length, values: value.length };
  return done(outcome);
}

export function readPath(tree: MapNode, path: string): DataNode | undefined {
  let node: DataNode | undefined = tree;
  for (const seg of parsePath(path)) {
    if (node?.kind !== "map") return undefined;
    node = node.entries.get(seg.name);
  }
  return node;
}

export interface LeafValues {
  values: Array<Scalar | undefined>;
  missing?: string; // first absent segment before the leaf
}

/**
 * Collects the leaf field across every element reached by the path. Sequences are
 * entered wherever they sit, and a list at the leaf contributes all its items.
 */
export function collectLeafValues(tree: MapNode, path: string): LeafValues {
  const segments = parsePath(path);
  const last = segments[segments.length - 1];
  let nodes: MapNode[] = [tree];

  for (const seg of segments.slice(0, -1)) {
    const next: MapNode[] = [];
    for (const m of nodes) {
      const child = m.entries.get(seg.name);
      if (child?.kind === "map") next.push(child);
      else if (child?.kind === "sequence") next.push(...child.items);
      else return { values: [], missing: seg.name };
    }
    nodes = next;
  }

  const values: Array<Scalar | undefined> = [];
  for (const m of nodes) {
    const leaf = m.entries.get(last.name);
    if (leaf?.kind === "scalar") values.push(leaf.value);
    else if (leaf?.kind === "list") values.push(...leaf.items);
    else values.push(undefined);
  }
  return { values };
}

export function toPlain(node: DataNode): PlainValue {
  switch (node.kind) {
    case "scalar":
      return node.value;
    case "list":
      return node.items.slice();
    case "sequence":
      return node.items.map(toPlain);
    case "map":
      return Object.fromEntries(Array.from(node.entries, ([k, v]) => [k, toPlain(v)]));
  }
}

export function treeToData(tree: MapNode): ExtractedData {
  return Object.fromEntries(Array.from(tree.entries, ([k, v]) => [k, toPlain(v)]));
}
