import type { RelationKind } from "@syslens/syntax";

import type { Diagnostic, DiagnosticKind, ModelSymbol } from "./model.js";
import type { RelationshipEdge, RelationshipGraph } from "./RelationshipGraph.js";
import type { Resolver } from "./Resolver.js";
import { REQUIRED_TARGET_ROLE, roleLabel, withArticle } from "./roles.js";
import type { SymbolTable } from "./SymbolTable.js";

const CYCLE_CHECKS: ReadonlyArray<[RelationKind, DiagnosticKind, string]> = [
  ["specialization", "CircularSpecialization", "Circular specialization"],
  ["subsetting", "CircularSubsetting", "Circular subsetting"],
  ["redefinition", "CircularRedefinition", "Circular redefinition"],
];

const RELATION_VERB: Partial<Record<RelationKind, string>> = {
  satisfaction: "satisfy",
  performance: "perform",
  exhibition: "exhibit",
  inclusion: "include",
};

/**
 * Validation passes over a populated, linked model. Each pass is
 * independent and only collects diagnostics.
 */
export class Analyzer {
  constructor(
    private readonly table: SymbolTable,
    private readonly graph: RelationshipGraph,
    private readonly resolver: Resolver
  ) {}

  run(): Diagnostic[] {
    this.extractFlags();
    return [
      ...this.checkDuplicates(),
      ...this.checkCycles(),
      ...this.checkDanglingReferences(),
      ...this.checkRelationshipTargets(),
    ];
  }

  /**
   * Derive isAbstract/isVariation from declaration prefixes. Runs once per
   * table; a second run is a bug.
   */
  extractFlags(): number {
    let count = 0;
    for (const symbol of this.table.allSymbols()) {
      const result = this.table.setDerivedFlags(symbol.id, {
        isAbstract: symbol.modifiers.includes("abstract"),
        isVariation: symbol.modifiers.includes("variation"),
      });
      if (!result.ok) {
        throw new Error(result.error);
      }
      count++;
    }
    return count;
  }

  checkDuplicates(): Diagnostic[] {
    const seen = new Map<string, ModelSymbol>();
    const diagnostics: Diagnostic[] = [];
    for (const symbol of this.table.allSymbols()) {
      const first = seen.get(symbol.qualifiedName);
      if (!first) {
        seen.set(symbol.qualifiedName, symbol);
        continue;
      }
      diagnostics.push({
        kind: "DuplicateDefinition",
        message: `Duplicate definition of '${symbol.qualifiedName}'`,
        severity: "error",
        file: symbol.sourceFile,
        span: symbol.span,
        symbol: symbol.qualifiedName,
      });
    }
    return diagnostics;
  }

  checkCycles(): Diagnostic[] {
    const diagnostics: Diagnostic[] = [];
    for (const [relation, kind, label] of CYCLE_CHECKS) {
      const loops = this.graph.selfReferences(relation).map((edge) => [edge]);
      for (const cycle of [...loops, ...this.graph.findCycles(relation)]) {
        const backEdge = cycle[cycle.length - 1];
        const path = [cycle[0].from, ...cycle.map((e) => e.to)];
        diagnostics.push({
          kind,
          message: `${label}: ${path.join(" -> ")}`,
          severity: "error",
          file: backEdge.origin?.file ?? null,
          span: backEdge.origin?.span ?? null,
          symbol: backEdge.from,
        });
      }
    }
    return diagnostics;
  }

  /**
   * Every edge target must name a declared symbol after linking. Targets that
   * do not are resolved again from their origin to report why.
   */
  checkDanglingReferences(): Diagnostic[] {
    const diagnostics: Diagnostic[] = [];
    for (const edge of this.graph.edges()) {
      if (this.table.lookupQualified(edge.to)) continue;
      const diagnostic = this.danglingDiagnostic(edge);
      if (diagnostic) diagnostics.push(diagnostic);
    }
    return diagnostics;
  }

  /**
   * satisfy/perform/exhibit/include must point at a requirement, action,
   * state and use case respectively.
   */
  checkRelationshipTargets(): Diagnostic[] {
    const diagnostics: Diagnostic[] = [];
    for (const edge of this.graph.edges()) {
      const expected = REQUIRED_TARGET_ROLE[edge.kind];
      if (!expected) continue;

      const target = this.table.lookupQualified(edge.to);
      if (!target || (target.kind !== "definition" && target.kind !== "usage")) continue;
      if (target.semanticRole === expected) continue;

      const verb = RELATION_VERB[edge.kind] ?? edge.kind;
      diagnostics.push({
        kind: "InvalidRelationshipTarget",
        message: `${verb} must target ${withArticle(roleLabel(expected))}, but '${target.qualifiedName}' is ${withArticle(roleLabel(target.semanticRole))}`,
        severity: "error",
        file: edge.origin?.file ?? null,
        span: edge.origin?.span ?? null,
        symbol: edge.from,
      });
    }
    return diagnostics;
  }

  private danglingDiagnostic(edge: RelationshipEdge): Diagnostic | null {
    if (!edge.origin) {
      return {
        kind: "UndefinedSymbol",
        message: `Undefined symbol '${edge.to}'`,
        severity: "error",
        file: null,
        span: null,
        symbol: edge.from,
      };
    }

    const resolved = this.resolver.resolve(edge.origin.reference, edge.origin.scopeId);
    if (resolved.ok) return null;

    return {
      kind: resolved.error.kind,
      message: resolved.error.message,
      severity: resolved.error.severity,
      file: edge.origin.file,
      span: edge.origin.span,
      symbol: edge.from,
    };
  }
}
