/**
 * model_load - Load every model file below a directory.
 */

import * as z from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { resultToResponse, successResponse } from "@syslens/core";

import type { LoadSummary } from "../infrastructure/WorkspaceLoader.js";
import type { Services } from "./index.js";

const InputSchema = {
  path: z.string().optional().describe("Workspace root (default: current root)"),
};

function formatSummary(summary: LoadSummary): string {
  const { report } = summary;
  const errors = Object.values(report.diagnostics)
    .flat()
    .concat(report.unattached)
    .filter((d) => d.severity === "error").length;

  const lines = [
    `## Loaded ${summary.rootPath}`,
    "",
    `- Generation: ${report.generation}`,
    `- Standard library: ${summary.stdlib} (${summary.stdlibFiles} files)`,
    `- Project files: ${summary.projectFiles}`,
    `- Removed files: ${summary.removedFiles.length}`,
    `- Symbols: ${report.symbols}`,
    `- Relationships: ${report.edges}`,
    `- Errors: ${errors}`,
  ];
  if (summary.parseFailures.length > 0) {
    lines.push("", "### Files that failed to parse", "");
    for (const file of summary.parseFailures) lines.push(`- ${file}`);
  }
  return lines.join("\n");
}

export function registerLoad(server: McpServer, services: Services): void {
  server.registerTool(
    "model_load",
    {
      title: "Load model",
      description: `Load the SysML/KerML model below a directory.

Reads syslens.config.json if present, loads the standard library first, then
every project file matched by the include globs, and builds the semantic model.`,
      inputSchema: InputSchema,
    },
    async (input) => {
      const { path } = z.object(InputSchema).parse(input);
      const root = path ?? services.rootPath;

      const result = await services.loader.load(services.workspace, root);
      if (result.ok) {
        services.rootPath = result.value.rootPath;
        console.error(
          `[semantic] Loaded ${result.value.projectFiles} files from ${result.value.rootPath} (generation ${result.value.report.generation})`
        );
      }

      return resultToResponse(result, (summary) =>
        successResponse(formatSummary(summary), {
          rootPath: summary.rootPath,
          generation: summary.report.generation,
          stdlib: summary.stdlib,
          projectFiles: summary.projectFiles,
          symbols: summary.report.symbols,
          edges: summary.report.edges,
          parseFailures: summary.parseFailures,
          removedFiles: summary.removedFiles,
        })
      );
    }
  );
}
