/**
 * MCP tool registration for the semantic package.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { GlobProjectScanner, NodeFileSystem, SysmlParser, type FileSystem, type SyntaxParser } from "@syslens/syntax";

import { RequestGate } from "../core/RequestGate.js";
import { Workspace } from "../core/Workspace.js";
import { WorkspaceLoader } from "../infrastructure/WorkspaceLoader.js";

import { registerLoad } from "./load.js";
import { registerLookup } from "./lookup.js";
import { registerSpecializations } from "./specializations.js";
import { registerSatisfactions } from "./satisfactions.js";
import { registerDiagnostics } from "./diagnostics.js";
import { registerOutline } from "./outline.js";
import { registerReferences } from "./references.js";
import { registerSearch } from "./search.js";
import { registerDocuments } from "./documents.js";
import { registerStats } from "./stats.js";

export interface Services {
  workspace: Workspace;
  gate: RequestGate;
  loader: WorkspaceLoader;
  parser: SyntaxParser;
  fs: FileSystem;
  /** Root the last load ran against; relative tool paths resolve here */
  rootPath: string;
}

export function createServices(rootPath: string = process.cwd()): Services {
  const workspace = new Workspace();
  const fs = new NodeFileSystem(rootPath);
  const parser = new SysmlParser();
  return {
    workspace,
    gate: new RequestGate(workspace),
    loader: new WorkspaceLoader(fs, new GlobProjectScanner(), parser),
    parser,
    fs,
    rootPath,
  };
}

export function registerAllTools(server: McpServer, services: Services): void {
  registerLoad(server, services);
  registerLookup(server, services);
  registerSpecializations(server, services);
  registerSatisfactions(server, services);
  registerDiagnostics(server, services);
  registerOutline(server, services);
  registerReferences(server, services);
  registerSearch(server, services);
  registerDocuments(server, services);
  registerStats(server, services);
}
