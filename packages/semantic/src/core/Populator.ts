import type {
  ClassifierNode,
  DefinitionNode,
  FeatureNode,
  PackageNode,
  Prefix,
  RelationshipPart,
  SyntaxElement,
  SyntaxFile,
  UsageNode,
} from "@syslens/syntax";

import type { Diagnostic, Direction, ImportDirective, ModelSymbol, ScopeId, SymbolInput } from "./model.js";
import type { RelationshipGraph } from "./RelationshipGraph.js";
import { roleOf } from "./roles.js";
import { SymbolTable } from "./SymbolTable.js";

export interface PopulateOutput {
  diagnostics: Diagnostic[];
  directives: ImportDirective[];
}

type NamespaceNode = PackageNode | DefinitionNode | UsageNode | ClassifierNode | FeatureNode;

/**
 * Walks one syntax tree and declares its named elements.
 *
 * Relationship targets and values are references, never declarations; they
 * only become raw edges in the graph. Unnamed elements declare nothing and
 * their relationships count as their owner's.
 */
export class Populator {
  constructor(
    private readonly table: SymbolTable,
    private readonly graph: RelationshipGraph
  ) {}

  populate(file: SyntaxFile): PopulateOutput {
    const output: PopulateOutput = { diagnostics: [], directives: [] };
    for (const element of file.members) {
      this.visit(element, SymbolTable.ROOT, file.path, output);
    }
    return output;
  }

  private visit(element: SyntaxElement, scopeId: ScopeId, file: string, output: PopulateOutput): void {
    switch (element.kind) {
      case "package":
      case "definition":
      case "usage":
      case "classifier":
      case "feature":
        this.visitNamespace(element, scopeId, file, output);
        return;
      case "alias":
        this.declare(
          {
            kind: "alias",
            name: element.name.text,
            target: element.target.text,
            scopeId,
            sourceFile: file,
            span: element.span,
            visibility: element.visibility,
            modifiers: [],
          },
          output
        );
        return;
      case "import":
        output.directives.push({
          kind: element.importKind,
          target: element.target.text,
          alias: element.alias?.text ?? null,
          importingScope: scopeId,
          visibility: element.visibility,
          isAll: element.isAll,
          sourceFile: file,
          span: element.span,
        });
        return;
      case "comment":
        return;
    }
  }

  private visitNamespace(element: NamespaceNode, scopeId: ScopeId, file: string, output: PopulateOutput): void {
    const relationships = element.kind === "package" ? [] : element.relationships;

    if (!element.name) {
      const owner = this.table.scope(scopeId)?.ownerName ?? "";
      if (owner !== "") {
        this.addEdges(owner, relationships, scopeId, file);
      }
      // Unnamed packages are transparent; other unnamed bodies are not populated.
      if (element.kind === "package") {
        for (const member of element.members) this.visit(member, scopeId, file, output);
      }
      return;
    }

    const symbol = this.declare(symbolInput(element, element.name.text, scopeId, file), output);
    if (!symbol) {
      // A rejected duplicate adds no edges, but its members still land in the
      // body of the declaration that won, so a reopened package keeps them.
      const body = this.table.declaredIn(scopeId, element.name.text)?.bodyScopeId ?? null;
      if (body !== null) {
        for (const member of element.members) this.visit(member, body, file, output);
      }
      return;
    }
    if (symbol.bodyScopeId === null) {
      return;
    }

    this.addEdges(symbol.qualifiedName, relationships, scopeId, file);
    for (const member of element.members) {
      this.visit(member, symbol.bodyScopeId, file, output);
    }
  }

  private declare(input: SymbolInput, output: PopulateOutput): ModelSymbol | null {
    const declared = this.table.declare(input);
    if (!declared.ok) {
      output.diagnostics.push(declared.error);
      return null;
    }
    return declared.value;
  }

  private addEdges(from: string, relationships: RelationshipPart[], scopeId: ScopeId, file: string): void {
    for (const part of relationships) {
      this.graph.addEdge(part.relation, from, part.target.text, {
        reference: part.target.text,
        scopeId,
        file,
        span: part.target.span,
      });
    }
  }
}

function symbolInput(element: NamespaceNode, name: string, scopeId: ScopeId, file: string): SymbolInput {
  const common = { name, scopeId, sourceFile: file, span: element.span, visibility: element.visibility };

  switch (element.kind) {
    case "package":
      return { ...common, kind: "package", isLibrary: element.isLibrary, modifiers: [] };
    case "classifier":
      return { ...common, kind: "classifier", classifierKind: element.keyword, modifiers: element.prefixes };
    case "feature":
      return { ...common, kind: "feature", direction: directionOf(element.prefixes), modifiers: element.prefixes };
    case "definition":
      return {
        ...common,
        kind: "definition",
        definitionKind: element.keyword,
        semanticRole: roleOf(element.keyword),
        modifiers: element.prefixes,
      };
    case "usage":
      return {
        ...common,
        kind: "usage",
        usageKind: element.keyword,
        semanticRole: roleOf(element.keyword),
        direction: directionOf(element.prefixes),
        modifiers: element.prefixes,
      };
  }
}

function directionOf(prefixes: readonly Prefix[]): Direction | null {
  for (const prefix of prefixes) {
    if (prefix === "in" || prefix === "out" || prefix === "inout") return prefix;
  }
  return null;
}
