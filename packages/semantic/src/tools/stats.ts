/**
 * model_stats - Size of the committed model.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { successResponse } from "@syslens/core";

import type { Services } from "./index.js";
import { publicationResponse } from "./shared.js";

export function registerStats(server: McpServer, services: Services): void {
  server.registerTool(
    "model_stats",
    {
      title: "Model statistics",
      description: "Generation, file, symbol, scope, import binding and relationship counts of the current model.",
      inputSchema: {},
    },
    async () => {
      const publication = services.gate.run(null, (view) => view.stats());
      return publicationResponse(publication, (stats) => {
        const relations = Object.entries(stats.byKind)
          .filter(([, count]) => count > 0)
          .map(([kind, count]) => `  - ${kind}: ${count}`);
        const text = [
          "## Model statistics",
          "",
          `- Generation: ${stats.generation}`,
          `- Files: ${stats.files}`,
          `- Symbols: ${stats.symbols}`,
          `- Scopes: ${stats.scopes}`,
          `- Import bindings: ${stats.importBindings}`,
          `- Relationships: ${stats.edges}`,
          ...relations,
          `- Errors: ${stats.errors}`,
          `- Warnings: ${stats.warnings}`,
        ].join("\n");
        return successResponse(text, { ...stats });
      });
    }
  );
}
