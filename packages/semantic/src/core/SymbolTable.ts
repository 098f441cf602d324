import { Err, Ok, type Result } from "@syslens/core";
import { spanContains, type Location, type Span, type Visibility } from "@syslens/syntax";

import type {
  DerivedFlags,
  Diagnostic,
  ImportDirective,
  ModelSymbol,
  ScopeId,
  SymbolId,
  SymbolInput,
} from "./model.js";

export interface Scope {
  readonly id: ScopeId;
  readonly parent: ScopeId | null;
  readonly children: ScopeId[];
  /** Declared simple names */
  readonly names: Map<string, SymbolId>;
  /** Qualified name of the owning symbol, "" for the root */
  readonly ownerName: string;
  readonly ownerId: SymbolId | null;
  readonly file: string | null;
  readonly span: Span | null;
}

export type ImportPass = 1 | 2 | 3;

export interface ImportBinding {
  readonly name: string;
  /** More than one entry means two namespace imports disagree */
  readonly symbolIds: readonly SymbolId[];
  readonly pass: ImportPass;
  readonly visibility: Visibility;
  readonly directive: ImportDirective;
}

export type BindOutcome = "added" | "shadowed" | "kept" | "candidate";

export type Lookup =
  | { status: "found"; symbol: ModelSymbol; via: "scope" | "import" | "fallback" }
  | { status: "notFound" }
  | { status: "ambiguous"; candidates: ModelSymbol[]; via: "import" | "fallback" };

export interface LookupOptions {
  /** Consult import bindings; off while namespace imports are expanded */
  imports?: boolean;
}

interface MutableBinding {
  name: string;
  symbolIds: SymbolId[];
  pass: ImportPass;
  visibility: Visibility;
  directive: ImportDirective;
}

/**
 * Global registry of symbols with an arena of nested scopes.
 *
 * Scope 0 is the root. Parents and owning scopes are plain indices into the
 * arena. Import bindings live beside the declared names of each scope and
 * never replace them.
 */
export class SymbolTable {
  static readonly ROOT: ScopeId = 0;

  private readonly scopes: Scope[] = [];
  private readonly symbols = new Map<SymbolId, ModelSymbol>();
  private readonly byQualifiedName = new Map<string, SymbolId>();
  private readonly bySimpleName = new Map<string, SymbolId[]>();
  private readonly byFile = new Map<string, SymbolId[]>();
  private readonly bindings = new Map<ScopeId, Map<string, MutableBinding>>();
  private nextId = 0;

  constructor() {
    this.scopes.push({
      id: SymbolTable.ROOT,
      parent: null,
      children: [],
      names: new Map(),
      ownerName: "",
      ownerId: null,
      file: null,
      span: null,
    });
  }

  /**
   * Insert a symbol into its scope and the global qualified-name index.
   *
   * A qualified name already held by a non-alias symbol is a
   * DuplicateDefinition and the first declaration stays. An alias holding the
   * name is replaced.
   */
  declare(input: SymbolInput): Result<ModelSymbol, Diagnostic> {
    const scope = this.scopes[input.scopeId];
    if (!scope) {
      throw new Error(`Unknown scope ${input.scopeId}`);
    }

    const qualifiedName = scope.ownerName === "" ? input.name : `${scope.ownerName}::${input.name}`;
    const existingId = this.byQualifiedName.get(qualifiedName);
    const existing = existingId === undefined ? undefined : this.symbols.get(existingId);

    if (existing && existing.kind !== "alias") {
      return Err({
        kind: "DuplicateDefinition",
        message: `Duplicate definition of '${qualifiedName}' (first declared in ${existing.sourceFile}:${existing.span.start.line})`,
        severity: "error",
        file: input.sourceFile,
        span: input.span,
        symbol: qualifiedName,
      });
    }
    if (existing) {
      this.forget(existing);
    }

    const id = this.nextId++;
    const bodyScopeId =
      input.kind === "alias"
        ? null
        : this.createScope(input.scopeId, qualifiedName, id, input.sourceFile, input.span);
    const symbol: ModelSymbol = { ...input, id, qualifiedName, bodyScopeId, flags: null };

    this.symbols.set(id, symbol);
    this.byQualifiedName.set(qualifiedName, id);
    scope.names.set(symbol.name, id);
    pushTo(this.bySimpleName, symbol.name, id);
    pushTo(this.byFile, symbol.sourceFile, id);

    return Ok(symbol);
  }

  get(id: SymbolId): ModelSymbol | undefined {
    return this.symbols.get(id);
  }

  lookupQualified(name: string): ModelSymbol | undefined {
    const id = this.byQualifiedName.get(name);
    return id === undefined ? undefined : this.symbols.get(id);
  }

  /**
   * Resolve a simple name as seen from `scopeId`: declared names up the scope
   * chain, then import bindings innermost first, then a globally unique name.
   */
  lookupSimple(name: string, scopeId: ScopeId, options: LookupOptions = {}): Lookup {
    const chain = this.ancestors(scopeId);

    for (const id of chain) {
      const declared = this.scopes[id].names.get(name);
      if (declared !== undefined) {
        return this.found(declared, "scope");
      }
    }

    if (options.imports ?? true) {
      for (const id of chain) {
        const binding = this.bindings.get(id)?.get(name);
        if (!binding) continue;
        if (binding.symbolIds.length === 1) {
          return this.found(binding.symbolIds[0], "import");
        }
        return { status: "ambiguous", candidates: this.resolveIds(binding.symbolIds), via: "import" };
      }
    }

    const candidates = this.resolveIds(this.bySimpleName.get(name) ?? []);
    if (candidates.length === 1) {
      return { status: "found", symbol: candidates[0], via: "fallback" };
    }
    if (candidates.length > 1) {
      return { status: "ambiguous", candidates, via: "fallback" };
    }
    return { status: "notFound" };
  }

  /** A name declared directly in `scopeId`, ignoring ancestors and imports. */
  declaredIn(scopeId: ScopeId, name: string): ModelSymbol | undefined {
    const id = this.scopes[scopeId]?.names.get(name);
    return id === undefined ? undefined : this.symbols.get(id);
  }

  membersOf(scopeId: ScopeId): ModelSymbol[] {
    const scope = this.scopes[scopeId];
    return scope ? this.resolveIds([...scope.names.values()]) : [];
  }

  /** Every symbol, in declaration order. */
  allSymbols(): ModelSymbol[] {
    return [...this.symbols.values()];
  }

  symbolsInFile(file: string): ModelSymbol[] {
    return this.resolveIds(this.byFile.get(file) ?? []);
  }

  scope(id: ScopeId): Scope | undefined {
    return this.scopes[id];
  }

  get scopeCount(): number {
    return this.scopes.length;
  }

  /** `scopeId` followed by its ancestors up to the root. */
  ancestors(scopeId: ScopeId): ScopeId[] {
    const chain: ScopeId[] = [];
    let current: ScopeId | null = scopeId;
    while (current !== null) {
      const scope: Scope | undefined = this.scopes[current];
      if (!scope) break;
      chain.push(current);
      current = scope.parent;
    }
    return chain;
  }

  isWithin(scopeId: ScopeId, ancestorId: ScopeId): boolean {
    return this.ancestors(scopeId).includes(ancestorId);
  }

  /**
   * Innermost scope opened in `file` whose span contains the position, or the
   * root when none does.
   */
  scopeAt(file: string, position: Pick<Location, "line" | "column">): ScopeId {
    let best: ScopeId = SymbolTable.ROOT;
    let bestDepth = 0;
    for (const scope of this.scopes) {
      if (scope.file !== file || !scope.span || !spanContains(scope.span, position)) continue;
      const depth = this.ancestors(scope.id).length;
      if (depth > bestDepth) {
        best = scope.id;
        bestDepth = depth;
      }
    }
    return best;
  }

  setDerivedFlags(id: SymbolId, flags: DerivedFlags): Result<ModelSymbol, string> {
    const symbol = this.symbols.get(id);
    if (!symbol) {
      return Err(`Unknown symbol ${id}`);
    }
    if (symbol.flags) {
      return Err(`Flags of '${symbol.qualifiedName}' are already set`);
    }
    symbol.flags = { ...flags };
    return Ok(symbol);
  }

  /**
   * Make `symbol` visible as `name` in `scopeId`.
   *
   * A locally declared name always wins. An existing binding is never
   * replaced; a namespace import of a different symbol under a name another
   * namespace import already bound adds a second candidate.
   */
  bindImport(
    scopeId: ScopeId,
    name: string,
    symbol: ModelSymbol,
    pass: ImportPass,
    directive: ImportDirective
  ): BindOutcome {
    const scope = this.scopes[scopeId];
    if (!scope || scope.names.has(name)) {
      return "shadowed";
    }

    let table = this.bindings.get(scopeId);
    if (!table) {
      table = new Map();
      this.bindings.set(scopeId, table);
    }

    const existing = table.get(name);
    if (!existing) {
      table.set(name, { name, symbolIds: [symbol.id], pass, visibility: directive.visibility, directive });
      return "added";
    }
    if (existing.symbolIds.includes(symbol.id)) {
      return "kept";
    }
    if (pass === 1 && existing.pass === 1) {
      existing.symbolIds.push(symbol.id);
      return "candidate";
    }
    return "kept";
  }

  bindingsOf(scopeId: ScopeId): ReadonlyMap<string, ImportBinding> {
    return this.bindings.get(scopeId) ?? new Map<string, ImportBinding>();
  }

  get bindingCount(): number {
    let count = 0;
    for (const table of this.bindings.values()) count += table.size;
    return count;
  }

  private createScope(parent: ScopeId, ownerName: string, ownerId: SymbolId, file: string, span: Span): ScopeId {
    const id = this.scopes.length;
    this.scopes.push({ id, parent, children: [], names: new Map(), ownerName, ownerId, file, span });
    this.scopes[parent].children.push(id);
    return id;
  }

  private forget(symbol: ModelSymbol): void {
    this.symbols.delete(symbol.id);
    this.byQualifiedName.delete(symbol.qualifiedName);
    this.scopes[symbol.scopeId].names.delete(symbol.name);
    removeFrom(this.bySimpleName, symbol.name, symbol.id);
    removeFrom(this.byFile, symbol.sourceFile, symbol.id);
  }

  private found(id: SymbolId, via: "scope" | "import"): Lookup {
    const symbol = this.symbols.get(id);
    return symbol ? { status: "found", symbol, via } : { status: "notFound" };
  }

  private resolveIds(ids: readonly SymbolId[]): ModelSymbol[] {
    const result: ModelSymbol[] = [];
    for (const id of ids) {
      const symbol = this.symbols.get(id);
      if (symbol) result.push(symbol);
    }
    return result;
  }
}

function pushTo<K, V>(map: Map<K, V[]>, key: K, value: V): void {
  const list = map.get(key);
  if (list) {
    list.push(value);
  } else {
    map.set(key, [value]);
  }
}

function removeFrom<K, V>(map: Map<K, V[]>, key: K, value: V): void {
  const list = map.get(key);
  if (!list) return;
  const remaining = list.filter((v) => v !== value);
  if (remaining.length === 0) {
    map.delete(key);
  } else {
    map.set(key, remaining);
  }
}
