import { Err, Ok, map, unwrapOr, type Result } from "@syslens/core";

import type { ModelSymbol, ScopeId, Severity } from "./model.js";
import { RelationshipGraph } from "./RelationshipGraph.js";
import type { LookupOptions, SymbolTable } from "./SymbolTable.js";

export type ResolveErrorKind = "UndefinedSymbol" | "AmbiguousSimpleName" | "AliasCycle";

export interface ResolveError {
  kind: ResolveErrorKind;
  message: string;
  severity: Severity;
  /** Qualified names of the competing symbols for AmbiguousSimpleName */
  candidates: string[];
}

/**
 * Turns a reference written in some scope into a symbol.
 *
 * A `::` reference is first tried as an exact qualified name, then walked
 * segment by segment from its first segment. Aliases are followed to their
 * target with a cycle guard.
 */
export class Resolver {
  constructor(private readonly table: SymbolTable) {}

  resolve(reference: string, scopeId: ScopeId, options: LookupOptions = {}): Result<ModelSymbol, ResolveError> {
    const found = this.resolveRaw(reference, scopeId, options);
    if (!found.ok) return found;
    return this.followAlias(found.value, options);
  }

  /**
   * Rewrite each edge's raw target to the qualified name it resolves to from
   * its origin. Unresolved targets stay as written for the Analyzer.
   */
  linkRelationships(graph: RelationshipGraph): RelationshipGraph {
    const linked = new RelationshipGraph();
    for (const edge of [...graph.edges(), ...graph.selfReferences()]) {
      if (!edge.origin) {
        linked.addEdge(edge.kind, edge.from, edge.to);
        continue;
      }
      const target = map(this.resolve(edge.origin.reference, edge.origin.scopeId), (symbol) => symbol.qualifiedName);
      linked.addEdge(edge.kind, edge.from, unwrapOr(target, edge.to), edge.origin);
    }
    return linked;
  }

  /**
   * A member of `namespace` as seen from `fromScope`: declared members first,
   * then public import bindings. Private members are only visible from within
   * the namespace.
   */
  memberOf(namespace: ModelSymbol, name: string, fromScope: ScopeId, options: LookupOptions = {}): ModelSymbol | undefined {
    if (namespace.bodyScopeId === null) return undefined;

    const declared = this.table.declaredIn(namespace.bodyScopeId, name);
    if (declared) {
      return this.isVisible(declared, fromScope) ? declared : undefined;
    }

    if (options.imports ?? true) {
      const binding = this.table.bindingsOf(namespace.bodyScopeId).get(name);
      if (binding && binding.visibility === "public" && binding.symbolIds.length === 1) {
        return this.table.get(binding.symbolIds[0]);
      }
    }
    return undefined;
  }

  private resolveRaw(reference: string, scopeId: ScopeId, options: LookupOptions): Result<ModelSymbol, ResolveError> {
    const segments = reference.split("::");
    if (segments.length === 1) {
      return this.resolveSimple(reference, scopeId, options);
    }

    const exact = this.table.lookupQualified(reference);
    if (exact && this.isVisible(exact, scopeId)) {
      return Ok(exact);
    }

    const head = this.resolveSimple(segments[0], scopeId, options);
    if (!head.ok) return head;

    let current = head.value;
    for (const segment of segments.slice(1)) {
      const namespace = this.followAlias(current, options);
      if (!namespace.ok) return namespace;

      const member = this.memberOf(namespace.value, segment, scopeId, options);
      if (!member) {
        return Err(undefinedSymbol(reference, `'${namespace.value.qualifiedName}' has no visible member '${segment}'`));
      }
      current = member;
    }
    return Ok(current);
  }

  private resolveSimple(name: string, scopeId: ScopeId, options: LookupOptions): Result<ModelSymbol, ResolveError> {
    const lookup = this.table.lookupSimple(name, scopeId, options);
    switch (lookup.status) {
      case "found":
        return Ok(lookup.symbol);
      case "notFound":
        return Err(undefinedSymbol(name));
      case "ambiguous": {
        const candidates = lookup.candidates.map((s) => s.qualifiedName);
        return Err({
          kind: "AmbiguousSimpleName",
          message: `Ambiguous reference '${name}': ${candidates.join(", ")}`,
          severity: lookup.via === "fallback" ? "warning" : "error",
          candidates,
        });
      }
    }
  }

  private followAlias(symbol: ModelSymbol, options: LookupOptions): Result<ModelSymbol, ResolveError> {
    const seen = new Set<string>();
    let current = symbol;

    while (current.kind === "alias") {
      if (seen.has(current.qualifiedName)) {
        return Err({
          kind: "AliasCycle",
          message: `Alias cycle: ${[...seen, current.qualifiedName].join(" -> ")}`,
          severity: "error",
          candidates: [],
        });
      }
      seen.add(current.qualifiedName);

      const target = this.resolveRaw(current.target, current.scopeId, options);
      if (!target.ok) return target;
      current = target.value;
    }
    return Ok(current);
  }

  private isVisible(symbol: ModelSymbol, fromScope: ScopeId): boolean {
    return symbol.visibility !== "private" || this.table.isWithin(fromScope, symbol.scopeId);
  }
}

function undefinedSymbol(reference: string, detail?: string): ResolveError {
  return {
    kind: "UndefinedSymbol",
    message: detail ? `Undefined symbol '${reference}': ${detail}` : `Undefined symbol '${reference}'`,
    severity: "error",
    candidates: [],
  };
}
