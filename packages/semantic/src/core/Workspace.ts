import { Err, Ok, tryCatch, type Result } from "@syslens/core";
import type { ParseError, SyntaxFile } from "@syslens/syntax";

import { Analyzer } from "./Analyzer.js";
import { cancelled, generationToken, type CancellationCheck } from "./cancellation.js";
import { ImportResolver } from "./ImportResolver.js";
import type { Cancelled, Diagnostic, ImportDirective } from "./model.js";
import { Populator } from "./Populator.js";
import { RelationshipGraph } from "./RelationshipGraph.js";
import { Resolver } from "./Resolver.js";
import { SymbolTable } from "./SymbolTable.js";
import { WorkspaceView, type CommittedModel } from "./WorkspaceView.js";

export type FileState = "Unloaded" | "Parsed" | "Populated" | "Validated";

export type ParseOutcome = Result<SyntaxFile, ParseError[]>;

export interface StagedFile {
  path: string;
  outcome: ParseOutcome;
}

export interface FileInfo {
  readonly path: string;
  readonly state: FileState;
  readonly isStdlib: boolean;
}

export interface PopulateReport {
  generation: number;
  /** Files whose symbols made it into the model */
  populated: string[];
  /** Files that failed to parse or to populate */
  failed: string[];
  /** Diagnostics per file, including files without any */
  diagnostics: Record<string, Diagnostic[]>;
  /** Diagnostics with no file to attach to */
  unattached: Diagnostic[];
  symbols: number;
  edges: number;
}

interface FileEntry {
  path: string;
  outcome: ParseOutcome;
  isStdlib: boolean;
  state: FileState;
}

/**
 * Owns the semantic model and the set of loaded files.
 *
 * Every population cycle bumps the generation and rebuilds the model from
 * scratch; the result is committed only if the cycle was not cancelled, so
 * readers never see a half-built model.
 */
export class Workspace {
  private readonly entries = new Map<string, FileEntry>();
  private stdlibLoaded = false;
  private currentGeneration = 0;
  private model: CommittedModel;

  constructor() {
    const table = new SymbolTable();
    this.model = {
      generation: 0,
      table,
      graph: new RelationshipGraph(),
      resolver: new Resolver(table),
      diagnostics: new Map(),
      unattached: [],
      fileCount: 0,
    };
  }

  get generation(): number {
    return this.currentGeneration;
  }

  /**
   * Stage the standard library. Only the first call has an effect; the files
   * are populated by the next cycle, ahead of every project file.
   */
  loadStdlib(files: readonly StagedFile[]): boolean {
    if (this.stdlibLoaded) {
      return false;
    }
    this.stdlibLoaded = true;
    for (const file of files) {
      this.entries.set(file.path, { path: file.path, outcome: file.outcome, isStdlib: true, state: initialState(file.outcome) });
    }
    return true;
  }

  hasStdlib(): boolean {
    return this.stdlibLoaded;
  }

  /**
   * Record a file's parse outcome without populating. Used to batch many
   * files into one cycle.
   */
  stageFile(path: string, outcome: ParseOutcome): void {
    const isStdlib = this.entries.get(path)?.isStdlib ?? false;
    this.entries.set(path, { path, outcome, isStdlib, state: initialState(outcome) });
  }

  addFile(path: string, outcome: ParseOutcome, cancel?: CancellationCheck): Result<PopulateReport, Cancelled> {
    this.stageFile(path, outcome);
    return this.populateAll(cancel);
  }

  updateFile(path: string, outcome: ParseOutcome, cancel?: CancellationCheck): Result<PopulateReport, Cancelled> {
    this.stageFile(path, outcome);
    return this.populateAll(cancel);
  }

  /**
   * Retract a file. Its symbols and edges disappear with the next model.
   */
  removeFile(path: string, cancel?: CancellationCheck): Result<PopulateReport, Cancelled> {
    this.entries.delete(path);
    return this.populateAll(cancel);
  }

  /**
   * Drop every project file whose path is not in `paths`, without
   * populating. Standard library files stay. Returns the dropped paths.
   */
  retainProjectFiles(paths: ReadonlySet<string>): string[] {
    const dropped = this.orderedEntries()
      .filter((e) => !e.isStdlib && !paths.has(e.path))
      .map((e) => e.path);
    for (const path of dropped) {
      this.entries.delete(path);
    }
    return dropped;
  }

  /**
   * Rebuild the model from every file: stdlib first, then project files,
   * each group in path order. A file that fails is recorded and skipped.
   */
  populateAll(cancel?: CancellationCheck): Result<PopulateReport, Cancelled> {
    const generation = ++this.currentGeneration;
    const token = generationToken(generation, () => this.currentGeneration, cancel);

    const table = new SymbolTable();
    const graph = new RelationshipGraph();
    const populator = new Populator(table, graph);
    const diagnostics = new Map<string, Diagnostic[]>();
    const states = new Map<string, FileState>();
    const directives: ImportDirective[] = [];
    const populated: string[] = [];
    const failed: string[] = [];

    for (const entry of this.orderedEntries()) {
      if (token.isCancelled()) return Err(cancelled(generation));

      const fileDiagnostics: Diagnostic[] = [];
      diagnostics.set(entry.path, fileDiagnostics);

      if (!entry.outcome.ok) {
        fileDiagnostics.push(...parseDiagnostics(entry.path, entry.outcome.error));
        states.set(entry.path, "Unloaded");
        failed.push(entry.path);
        continue;
      }

      const syntax = entry.outcome.value;
      const result = tryCatch(() => populator.populate(syntax));
      if (!result.ok) {
        fileDiagnostics.push({
          kind: "PopulationFailed",
          message: `Population failed: ${result.error.message}`,
          severity: "error",
          file: entry.path,
          span: null,
        });
        states.set(entry.path, "Parsed");
        failed.push(entry.path);
        continue;
      }

      fileDiagnostics.push(...result.value.diagnostics);
      directives.push(...result.value.directives);
      states.set(entry.path, "Populated");
      populated.push(entry.path);
    }

    const resolver = new Resolver(table);
    const imports = new ImportResolver(table, resolver, token, generation).resolveAll(directives);
    if (!imports.ok) return imports;
    if (token.isCancelled()) return Err(cancelled(generation));

    const linked = resolver.linkRelationships(graph);
    const analysis = new Analyzer(table, linked, resolver).run();
    if (token.isCancelled()) return Err(cancelled(generation));

    const unattached: Diagnostic[] = [];
    for (const diagnostic of [...imports.value.diagnostics, ...analysis]) {
      const list = diagnostic.file === null ? undefined : diagnostics.get(diagnostic.file);
      (list ?? unattached).push(diagnostic);
    }

    for (const path of populated) {
      states.set(path, "Validated");
    }
    for (const entry of this.entries.values()) {
      entry.state = states.get(entry.path) ?? entry.state;
    }
    this.model = { generation, table, graph: linked, resolver, diagnostics, unattached, fileCount: this.entries.size };

    return Ok({
      generation,
      populated,
      failed,
      diagnostics: Object.fromEntries(diagnostics),
      unattached,
      symbols: table.allSymbols().length,
      edges: linked.edges().length,
    });
  }

  /**
   * Read-only view of the last committed model.
   */
  snapshot(): WorkspaceView {
    return new WorkspaceView(this.model);
  }

  files(): FileInfo[] {
    return this.orderedEntries().map((e) => ({ path: e.path, state: e.state, isStdlib: e.isStdlib }));
  }

  fileState(path: string): FileState | undefined {
    return this.entries.get(path)?.state;
  }

  private orderedEntries(): FileEntry[] {
    const byPath = (a: FileEntry, b: FileEntry): number => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0);
    const all = [...this.entries.values()];
    return [...all.filter((e) => e.isStdlib).sort(byPath), ...all.filter((e) => !e.isStdlib).sort(byPath)];
  }
}

function initialState(outcome: ParseOutcome): FileState {
  return outcome.ok ? "Parsed" : "Unloaded";
}

function parseDiagnostics(file: string, errors: ParseError[]): Diagnostic[] {
  return errors.map((error): Diagnostic => ({
    kind: "ParseError",
    message: error.message,
    severity: "error",
    file,
    span: error.span,
  }));
}
