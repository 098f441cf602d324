/**
 * Directed multigraphs over qualified names, one per relationship kind.
 * Insertion is total: cycles are the Analyzer's business.
 */

import type { RelationKind, Span } from "@syslens/syntax";

import type { ScopeId } from "./model.js";

/** Upper bound on the chain length `isSpecialization` follows. */
export const MAX_SPECIALIZATION_DEPTH = 256;

/** Where a relationship was written. */
export interface EdgeOrigin {
  /** Target reference as written */
  reference: string;
  /** Scope the reference is resolved from */
  scopeId: ScopeId;
  file: string;
  span: Span;
}

export interface RelationshipEdge {
  readonly kind: RelationKind;
  readonly from: string;
  readonly to: string;
  readonly origin: EdgeOrigin | null;
}

export interface GraphStats {
  edges: number;
  nodes: number;
  byKind: Record<RelationKind, number>;
}

type Adjacency = Map<string, RelationshipEdge[]>;

export class RelationshipGraph {
  private readonly all: RelationshipEdge[] = [];
  private readonly selfLoops: RelationshipEdge[] = [];
  private readonly outgoingByKind = new Map<RelationKind, Adjacency>();
  private readonly incomingByKind = new Map<RelationKind, Adjacency>();

  /**
   * Add an edge. A self-edge is kept out of the graph and returns null; it is
   * still listed by `selfReferences` so it can be reported.
   */
  addEdge(kind: RelationKind, from: string, to: string, origin: EdgeOrigin | null = null): RelationshipEdge | null {
    if (from === to) {
      this.selfLoops.push({ kind, from, to, origin });
      return null;
    }

    const edge: RelationshipEdge = { kind, from, to, origin };
    this.all.push(edge);
    append(adjacency(this.outgoingByKind, kind), from, edge);
    append(adjacency(this.incomingByKind, kind), to, edge);
    return edge;
  }

  /** Edges in insertion order, optionally of one kind. */
  edges(kind?: RelationKind): RelationshipEdge[] {
    return kind ? this.all.filter((e) => e.kind === kind) : [...this.all];
  }

  /** Rejected self-edges in insertion order, optionally of one kind. */
  selfReferences(kind?: RelationKind): RelationshipEdge[] {
    return kind ? this.selfLoops.filter((e) => e.kind === kind) : [...this.selfLoops];
  }

  /** Distinct targets of `from` for one kind, in insertion order. */
  targetsOf(kind: RelationKind, from: string): string[] {
    const edges = this.outgoingByKind.get(kind)?.get(from) ?? [];
    return unique(edges.map((e) => e.to));
  }

  /** Distinct sources pointing at `to` for one kind. */
  sourcesOf(kind: RelationKind, to: string): string[] {
    const edges = this.incomingByKind.get(kind)?.get(to) ?? [];
    return unique(edges.map((e) => e.from));
  }

  /** Edges of every kind pointing at `to`. */
  incoming(to: string): RelationshipEdge[] {
    return this.all.filter((e) => e.to === to);
  }

  /** Edges of every kind leaving `from`. */
  outgoing(from: string): RelationshipEdge[] {
    return this.all.filter((e) => e.from === from);
  }

  /** Direct supertypes. */
  specializationsOf(name: string): string[] {
    return this.targetsOf("specialization", name);
  }

  /**
   * Whether `a` specializes `b`, directly or transitively.
   *
   * Depth-first with a visited set and a depth bound, so it terminates on a
   * cyclic graph that has not been validated yet.
   */
  isSpecialization(a: string, b: string): boolean {
    const visited = new Set<string>();

    const visit = (node: string, depth: number): boolean => {
      if (depth > MAX_SPECIALIZATION_DEPTH) return false;
      for (const target of this.specializationsOf(node)) {
        if (target === b) return true;
        if (visited.has(target)) continue;
        visited.add(target);
        if (visit(target, depth + 1)) return true;
      }
      return false;
    };

    return visit(a, 1);
  }

  /** Elements that satisfy `requirement`. */
  satisfactionsOf(requirement: string): string[] {
    return this.sourcesOf("satisfaction", requirement);
  }

  /**
   * One cycle per back-edge found by a depth-first search, each given as the
   * edges along the cycle with the back-edge last.
   */
  findCycles(kind: RelationKind): RelationshipEdge[][] {
    const outgoing = this.outgoingByKind.get(kind);
    if (!outgoing) return [];

    const cycles: RelationshipEdge[][] = [];
    const done = new Set<string>();
    const onStack = new Map<string, number>();
    const path: RelationshipEdge[] = [];

    const visit = (node: string): void => {
      onStack.set(node, path.length);
      for (const edge of outgoing.get(node) ?? []) {
        const start = onStack.get(edge.to);
        if (start !== undefined) {
          cycles.push([...path.slice(start), edge]);
          continue;
        }
        if (done.has(edge.to)) continue;
        path.push(edge);
        visit(edge.to);
        path.pop();
      }
      onStack.delete(node);
      done.add(node);
    };

    for (const node of outgoing.keys()) {
      if (!done.has(node)) visit(node);
    }
    return cycles;
  }

  stats(): GraphStats {
    const byKind: Record<RelationKind, number> = {
      specialization: 0,
      typing: 0,
      subsetting: 0,
      redefinition: 0,
      referenceSubsetting: 0,
      satisfaction: 0,
      performance: 0,
      exhibition: 0,
      inclusion: 0,
    };
    const nodes = new Set<string>();
    for (const edge of this.all) {
      byKind[edge.kind]++;
      nodes.add(edge.from);
      nodes.add(edge.to);
    }
    return { edges: this.all.length, nodes: nodes.size, byKind };
  }
}

function adjacency(byKind: Map<RelationKind, Adjacency>, kind: RelationKind): Adjacency {
  let map = byKind.get(kind);
  if (!map) {
    map = new Map();
    byKind.set(kind, map);
  }
  return map;
}

function append(map: Adjacency, key: string, edge: RelationshipEdge): void {
  const list = map.get(key);
  if (list) {
    list.push(edge);
  } else {
    map.set(key, [edge]);
  }
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}
