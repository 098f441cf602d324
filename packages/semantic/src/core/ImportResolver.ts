import { Err, Ok, type Result } from "@syslens/core";

import { cancelled, type CancellationToken } from "./cancellation.js";
import type { Cancelled, Diagnostic, ImportDirective, ModelSymbol, ScopeId } from "./model.js";
import type { Resolver } from "./Resolver.js";
import type { SymbolTable } from "./SymbolTable.js";

export interface ImportSummary {
  /** Bindings added across all three passes */
  bound: number;
  diagnostics: Diagnostic[];
}

/**
 * Expands import directives into bindings in three sequential passes over
 * the whole file set: namespace imports, member imports, recursive imports.
 * Each pass sees the complete output of the one before it.
 */
export class ImportResolver {
  private bound = 0;
  private diagnostics: Diagnostic[] = [];

  constructor(
    private readonly table: SymbolTable,
    private readonly resolver: Resolver,
    private readonly token: CancellationToken,
    private readonly generation: number
  ) {}

  resolveAll(directives: readonly ImportDirective[]): Result<ImportSummary, Cancelled> {
    this.bound = 0;
    this.diagnostics = [];

    const passes = [
      () => this.namespacePass(directives.filter((d) => d.kind === "namespace")),
      () => this.memberPass(directives.filter((d) => d.kind === "member")),
      () => this.recursivePass(directives.filter((d) => d.kind === "recursive")),
    ];
    for (const pass of passes) {
      if (!pass()) return Err(cancelled(this.generation));
    }

    return Ok({ bound: this.bound, diagnostics: this.diagnostics });
  }

  /**
   * Pass 1, `Pkg::*`. Targets resolve without consulting imports, so the
   * outcome does not depend on directive order.
   */
  private namespacePass(directives: ImportDirective[]): boolean {
    for (const directive of directives) {
      if (this.token.isCancelled()) return false;

      const namespace = this.resolveNamespace(directive, false);
      if (!namespace) continue;

      for (const member of this.table.membersOf(namespace)) {
        if (member.visibility !== "public" && !directive.isAll) continue;
        this.bind(directive, member.name, member, 1);
      }
    }
    return true;
  }

  /**
   * Pass 2, `Pkg::Member`. The member may be declared in `Pkg` or visible
   * there through a public pass-1 binding.
   */
  private memberPass(directives: ImportDirective[]): boolean {
    for (const directive of directives) {
      if (this.token.isCancelled()) return false;

      const target = this.resolver.resolve(directive.target, directive.importingScope);
      if (!target.ok) {
        this.report(directive, `Cannot resolve import '${directive.target}': ${target.error.message}`);
        continue;
      }

      const segments = directive.target.split("::");
      const name = directive.alias ?? segments[segments.length - 1];
      this.bind(directive, name, target.value, 2);
    }
    return true;
  }

  /**
   * Pass 3, `Pkg::**`. Walks every scope below the target, including
   * namespaces only visible through earlier bindings, each scope once.
   */
  private recursivePass(directives: ImportDirective[]): boolean {
    for (const directive of directives) {
      if (this.token.isCancelled()) return false;

      const root = this.resolveNamespace(directive, true);
      if (root === null) continue;

      const visited = new Set<ScopeId>();
      const queue: ScopeId[] = [root];

      while (queue.length > 0) {
        if (this.token.isCancelled()) return false;

        const scopeId = queue.shift();
        if (scopeId === undefined || visited.has(scopeId)) continue;
        visited.add(scopeId);

        for (const member of this.table.membersOf(scopeId)) {
          if (member.visibility !== "public" && !directive.isAll) continue;
          this.bind(directive, member.name, member, 3);
          if (member.bodyScopeId !== null) queue.push(member.bodyScopeId);
        }

        for (const binding of this.table.bindingsOf(scopeId).values()) {
          if (binding.visibility !== "public" || binding.symbolIds.length !== 1) continue;
          const symbol = this.table.get(binding.symbolIds[0]);
          if (!symbol) continue;
          this.bind(directive, binding.name, symbol, 3);
          if (symbol.bodyScopeId !== null) queue.push(symbol.bodyScopeId);
        }
      }
    }
    return true;
  }

  private resolveNamespace(directive: ImportDirective, useImports: boolean): ScopeId | null {
    const target = this.resolver.resolve(directive.target, directive.importingScope, { imports: useImports });
    if (!target.ok) {
      this.report(directive, `Cannot resolve import '${directive.target}': ${target.error.message}`);
      return null;
    }
    if (target.value.bodyScopeId === null) {
      this.report(directive, `Import target '${target.value.qualifiedName}' is not a namespace`);
      return null;
    }
    return target.value.bodyScopeId;
  }

  private bind(directive: ImportDirective, name: string, symbol: ModelSymbol, pass: 1 | 2 | 3): void {
    if (this.table.bindImport(directive.importingScope, name, symbol, pass, directive) === "added") {
      this.bound++;
    }
  }

  private report(directive: ImportDirective, message: string): void {
    this.diagnostics.push({
      kind: "UnresolvedImport",
      message,
      severity: "error",
      file: directive.sourceFile,
      span: directive.span,
    });
  }
}
