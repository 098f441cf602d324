import { SysmlParser, type Span, type SyntaxFile } from "@syslens/syntax";

import type { Diagnostic, ImportDirective } from "../src/core/model.js";
import { ImportResolver, type ImportSummary } from "../src/core/ImportResolver.js";
import { Populator } from "../src/core/Populator.js";
import { RelationshipGraph } from "../src/core/RelationshipGraph.js";
import { Resolver } from "../src/core/Resolver.js";
import { SymbolTable } from "../src/core/SymbolTable.js";

const parser = new SysmlParser();

export function parse(source: string, path = "model.sysml"): SyntaxFile {
  const result = parser.parse(source, path);
  if (!result.ok) {
    throw new Error(result.error.map((e) => e.message).join("; "));
  }
  return result.value;
}

export function span(line: number, column: number, endLine = line, endColumn = column + 1): Span {
  return {
    start: { line, column, offset: 0 },
    end: { line: endLine, column: endColumn, offset: 0 },
  };
}

export interface BuiltModel {
  table: SymbolTable;
  /** Raw graph as populated */
  raw: RelationshipGraph;
  /** Graph after linking */
  graph: RelationshipGraph;
  resolver: Resolver;
  directives: ImportDirective[];
  populateDiagnostics: Diagnostic[];
  imports: ImportSummary;
}

/**
 * Populate, resolve imports and link, without running the Analyzer.
 */
export function buildModel(files: Record<string, string>): BuiltModel {
  const table = new SymbolTable();
  const raw = new RelationshipGraph();
  const populator = new Populator(table, raw);
  const directives: ImportDirective[] = [];
  const populateDiagnostics: Diagnostic[] = [];

  for (const [path, source] of Object.entries(files)) {
    const output = populator.populate(parse(source, path));
    directives.push(...output.directives);
    populateDiagnostics.push(...output.diagnostics);
  }

  const resolver = new Resolver(table);
  const imports = new ImportResolver(table, resolver, { isCancelled: () => false }, 1).resolveAll(directives);
  if (!imports.ok) {
    throw new Error("import resolution cancelled");
  }

  return {
    table,
    raw,
    graph: resolver.linkRelationships(raw),
    resolver,
    directives,
    populateDiagnostics,
    imports: imports.value,
  };
}

/** Body scope of the symbol with the given qualified name. */
export function bodyOf(table: SymbolTable, qualifiedName: string): number {
  const symbol = table.lookupQualified(qualifiedName);
  if (!symbol || symbol.bodyScopeId === null) {
    throw new Error(`no body scope for ${qualifiedName}`);
  }
  return symbol.bodyScopeId;
}
