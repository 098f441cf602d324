import { tryCatch, type Result } from "@syslens/core";
import { spanContains, type Location, type RelationKind, type Span } from "@syslens/syntax";

import { toView, type Diagnostic, type SymbolKind, type SymbolView } from "./model.js";
import type { RelationshipGraph } from "./RelationshipGraph.js";
import type { Resolver } from "./Resolver.js";
import type { SymbolTable } from "./SymbolTable.js";

/**
 * One committed population cycle. Nothing mutates it after commit.
 */
export interface CommittedModel {
  generation: number;
  table: SymbolTable;
  graph: RelationshipGraph;
  resolver: Resolver;
  diagnostics: ReadonlyMap<string, Diagnostic[]>;
  unattached: Diagnostic[];
  fileCount: number;
}

export type Position = Pick<Location, "line" | "column">;

export interface ReferenceView {
  kind: RelationKind;
  /** Qualified name of the referencing element */
  from: string;
  reference: string;
  file: string;
  span: Span;
}

export interface SearchOptions {
  kinds?: SymbolKind[];
  limit?: number;
}

export interface ModelStats {
  generation: number;
  files: number;
  symbols: number;
  scopes: number;
  importBindings: number;
  edges: number;
  byKind: Record<RelationKind, number>;
  errors: number;
  warnings: number;
}

/**
 * Read-only query façade over one generation of the model.
 */
export class WorkspaceView {
  constructor(private readonly model: CommittedModel) {}

  get generation(): number {
    return this.model.generation;
  }

  lookupQualified(name: string): SymbolView | undefined {
    const symbol = this.model.table.lookupQualified(name);
    return symbol ? toView(symbol) : undefined;
  }

  /**
   * Resolve `name` as if written at `position` in `file`.
   */
  lookupSimple(name: string, file: string, position: Position): SymbolView | undefined {
    const scopeId = this.model.table.scopeAt(file, position);
    const resolved = this.model.resolver.resolve(name, scopeId);
    return resolved.ok ? toView(resolved.value) : undefined;
  }

  specializationsOf(name: string): string[] {
    return this.model.graph.specializationsOf(name);
  }

  isSpecialization(a: string, b: string): boolean {
    return this.model.graph.isSpecialization(a, b);
  }

  satisfactionsOf(requirement: string): string[] {
    return this.model.graph.satisfactionsOf(requirement);
  }

  diagnostics(file: string): Diagnostic[] {
    return [...(this.model.diagnostics.get(file) ?? [])];
  }

  allDiagnostics(): Diagnostic[] {
    return [...[...this.model.diagnostics.values()].flat(), ...this.model.unattached];
  }

  symbolsInFile(file: string): SymbolView[] {
    return this.model.table.symbolsInFile(file).map(toView);
  }

  /** Relationships whose target resolved to `qualifiedName`. */
  referencesTo(qualifiedName: string): ReferenceView[] {
    const references: ReferenceView[] = [];
    for (const edge of this.model.graph.incoming(qualifiedName)) {
      if (!edge.origin) continue;
      references.push({
        kind: edge.kind,
        from: edge.from,
        reference: edge.origin.reference,
        file: edge.origin.file,
        span: edge.origin.span,
      });
    }
    return references;
  }

  /**
   * The symbol a relationship target written at `position` resolves to.
   */
  definitionAt(file: string, position: Position): SymbolView | undefined {
    for (const edge of this.model.graph.edges()) {
      if (!edge.origin || edge.origin.file !== file || !spanContains(edge.origin.span, position)) continue;
      return this.lookupQualified(edge.to);
    }
    return undefined;
  }

  /**
   * Symbols whose qualified name matches `pattern` (case-insensitive regex).
   */
  search(pattern: string, options: SearchOptions = {}): Result<SymbolView[], Error> {
    return tryCatch(() => {
      const regex = new RegExp(pattern, "i");
      const limit = options.limit ?? 50;
      const results: SymbolView[] = [];
      for (const symbol of this.model.table.allSymbols()) {
        if (results.length >= limit) break;
        if (options.kinds && !options.kinds.includes(symbol.kind)) continue;
        if (regex.test(symbol.qualifiedName)) results.push(toView(symbol));
      }
      return results;
    });
  }

  stats(): ModelStats {
    const graph = this.model.graph.stats();
    const all = this.allDiagnostics();
    return {
      generation: this.model.generation,
      files: this.model.fileCount,
      symbols: this.model.table.allSymbols().length,
      scopes: this.model.table.scopeCount,
      importBindings: this.model.table.bindingCount,
      edges: graph.edges,
      byKind: graph.byKind,
      errors: all.filter((d) => d.severity === "error").length,
      warnings: all.filter((d) => d.severity === "warning").length,
    };
  }
}
