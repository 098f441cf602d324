/**
 * Semantic model types.
 *
 * Symbols are owned by the SymbolTable; everything outside the engine sees
 * `SymbolView` copies bound to one workspace generation.
 */

import type {
  ClassifierKeyword,
  DefinitionKeyword,
  ImportKind,
  Prefix,
  Span,
  UsageKeyword,
  Visibility,
} from "@syslens/syntax";

export type ScopeId = number;
export type SymbolId = number;

export type Direction = "in" | "out" | "inout";

/**
 * Conceptual purpose of a definition or usage, independent of its keyword.
 */
export type SemanticRole =
  | "Requirement"
  | "Action"
  | "State"
  | "UseCase"
  | "Component"
  | "Interface"
  | "Port"
  | "Attribute"
  | "Connection"
  | "Constraint"
  | "AnalysisCase"
  | "VerificationCase"
  | "View"
  | "Metadata"
  | "Item"
  | "Flow"
  | "Allocation"
  | "Occurrence"
  | "Calculation"
  | "Enumeration"
  | "Reference";

/** Attached once by the Analyzer. */
export interface DerivedFlags {
  isAbstract: boolean;
  isVariation: boolean;
}

interface SymbolBase {
  id: SymbolId;
  name: string;
  /** Ancestor names joined with `::`; never changes once assigned */
  qualifiedName: string;
  /** Scope the symbol is declared in */
  scopeId: ScopeId;
  /** Scope holding the symbol's members; null for aliases */
  bodyScopeId: ScopeId | null;
  sourceFile: string;
  span: Span;
  visibility: Visibility;
  modifiers: readonly Prefix[];
  flags: DerivedFlags | null;
}

export interface PackageSymbol extends SymbolBase {
  kind: "package";
  isLibrary: boolean;
}

export interface ClassifierSymbol extends SymbolBase {
  kind: "classifier";
  classifierKind: ClassifierKeyword;
}

export interface FeatureSymbol extends SymbolBase {
  kind: "feature";
  direction: Direction | null;
}

export interface DefinitionSymbol extends SymbolBase {
  kind: "definition";
  definitionKind: DefinitionKeyword;
  semanticRole: SemanticRole;
}

export interface UsageSymbol extends SymbolBase {
  kind: "usage";
  usageKind: UsageKeyword;
  semanticRole: SemanticRole;
  direction: Direction | null;
}

export interface AliasSymbol extends SymbolBase {
  kind: "alias";
  /** Reference text, resolved lazily from the alias's own scope */
  target: string;
}

export type ModelSymbol =
  | PackageSymbol
  | ClassifierSymbol
  | FeatureSymbol
  | DefinitionSymbol
  | UsageSymbol
  | AliasSymbol;

export type SymbolKind = ModelSymbol["kind"];

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/**
 * What the populator hands to `SymbolTable.declare`. The table assigns the
 * id, qualified name and body scope.
 */
export type SymbolInput = DistributiveOmit<ModelSymbol, "id" | "qualifiedName" | "bodyScopeId" | "flags">;

export type DiagnosticKind =
  | "DuplicateDefinition"
  | "UndefinedSymbol"
  | "AmbiguousSimpleName"
  | "CircularSpecialization"
  | "CircularSubsetting"
  | "CircularRedefinition"
  | "UnresolvedImport"
  | "AliasCycle"
  | "InvalidRelationshipTarget"
  | "ParseError"
  | "PopulationFailed";

export type Severity = "error" | "warning";

export interface Diagnostic {
  kind: DiagnosticKind;
  message: string;
  severity: Severity;
  file: string | null;
  span: Span | null;
  /** Qualified name of the symbol the diagnostic is about */
  symbol?: string;
}

/**
 * A population cycle abandoned because the workspace moved on. Never
 * published as a diagnostic.
 */
export interface Cancelled {
  kind: "Cancelled";
  generation: number;
}

export interface ImportDirective {
  kind: ImportKind;
  target: string;
  alias: string | null;
  importingScope: ScopeId;
  visibility: Visibility;
  /** `import all` also brings in private members */
  isAll: boolean;
  sourceFile: string;
  span: Span;
}

/**
 * Read-only copy of a symbol handed to callers outside the engine.
 */
export interface SymbolView {
  readonly id: SymbolId;
  readonly kind: SymbolKind;
  readonly name: string;
  readonly qualifiedName: string;
  readonly file: string;
  readonly span: Span;
  readonly visibility: Visibility;
  /** Keyword as written, e.g. `part def`, `attribute`, `classifier` */
  readonly keyword: string;
  readonly semanticRole: SemanticRole | null;
  readonly isAbstract: boolean;
  readonly isVariation: boolean;
  readonly aliasTarget: string | null;
}

export function keywordOf(symbol: ModelSymbol): string {
  switch (symbol.kind) {
    case "package":
      return symbol.isLibrary ? "library package" : "package";
    case "classifier":
      return symbol.classifierKind;
    case "feature":
      return "feature";
    case "definition":
      return `${symbol.definitionKind} def`;
    case "usage":
      return symbol.usageKind;
    case "alias":
      return "alias";
  }
}

export function toView(symbol: ModelSymbol): SymbolView {
  return Object.freeze({
    id: symbol.id,
    kind: symbol.kind,
    name: symbol.name,
    qualifiedName: symbol.qualifiedName,
    file: symbol.sourceFile,
    span: symbol.span,
    visibility: symbol.visibility,
    keyword: keywordOf(symbol),
    semanticRole: symbol.kind === "definition" || symbol.kind === "usage" ? symbol.semanticRole : null,
    isAbstract: symbol.flags?.isAbstract ?? false,
    isVariation: symbol.flags?.isVariation ?? false,
    aliasTarget: symbol.kind === "alias" ? symbol.target : null,
  });
}
