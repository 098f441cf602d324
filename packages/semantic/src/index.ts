// Semantic engine
export * from "./core/model.js";
export { SymbolTable } from "./core/SymbolTable.js";
export type { Scope, ImportBinding, ImportPass, BindOutcome, Lookup, LookupOptions } from "./core/SymbolTable.js";
export { RelationshipGraph, MAX_SPECIALIZATION_DEPTH } from "./core/RelationshipGraph.js";
export type { EdgeOrigin, RelationshipEdge, GraphStats } from "./core/RelationshipGraph.js";
export { Resolver } from "./core/Resolver.js";
export type { ResolveError, ResolveErrorKind } from "./core/Resolver.js";
export { ImportResolver } from "./core/ImportResolver.js";
export type { ImportSummary } from "./core/ImportResolver.js";
export { Populator } from "./core/Populator.js";
export type { PopulateOutput } from "./core/Populator.js";
export { Analyzer } from "./core/Analyzer.js";
export { roleOf, roleLabel, REQUIRED_TARGET_ROLE } from "./core/roles.js";
export { generationToken, cancelled } from "./core/cancellation.js";
export type { CancellationToken, CancellationCheck } from "./core/cancellation.js";

// Workspace and queries
export { Workspace } from "./core/Workspace.js";
export type { FileState, FileInfo, ParseOutcome, PopulateReport, StagedFile } from "./core/Workspace.js";
export { WorkspaceView } from "./core/WorkspaceView.js";
export type { CommittedModel, ModelStats, Position, ReferenceView, SearchOptions } from "./core/WorkspaceView.js";
export { RequestGate } from "./core/RequestGate.js";
export type { GenerationSource, Publication, Ticket } from "./core/RequestGate.js";

// Loading
export { CONFIG_FILE, ConfigSchema, DEFAULT_EXCLUDE, DEFAULT_INCLUDE, loadConfig, parseConfig } from "./config.js";
export type { Env, SyslensConfig } from "./config.js";
export { WorkspaceLoader } from "./infrastructure/WorkspaceLoader.js";
export type { LoadSummary, StdlibStatus } from "./infrastructure/WorkspaceLoader.js";

// MCP tools
export { createServices, registerAllTools } from "./tools/index.js";
export type { Services } from "./tools/index.js";
