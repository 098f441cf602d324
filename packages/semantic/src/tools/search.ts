/**
 * model_search - Search symbols by qualified name pattern.
 */

import * as z from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { resultToResponse, successResponse } from "@syslens/core";

import type { Services } from "./index.js";
import { formatSymbol, notLoaded, publicationResponse } from "./shared.js";

const InputSchema = {
  pattern: z.string().describe("Case-insensitive regex matched against qualified names"),
  kinds: z
    .array(z.enum(["package", "classifier", "feature", "definition", "usage", "alias"]))
    .optional()
    .describe("Filter by symbol kinds"),
  limit: z.number().int().positive().optional().describe("Maximum results (default 50)"),
};

export function registerSearch(server: McpServer, services: Services): void {
  server.registerTool(
    "model_search",
    {
      title: "Search symbols",
      description: "Search declared symbols by a regex over their qualified names, optionally filtered by kind.",
      inputSchema: InputSchema,
    },
    async (input) => {
      const { pattern, kinds, limit } = z.object(InputSchema).parse(input);
      const missing = notLoaded(services.workspace.files().length);
      if (missing) return missing;

      const publication = services.gate.run(null, (view) => view.search(pattern, { kinds, limit }));
      return publicationResponse(publication, (result, generation) =>
        resultToResponse(result, (symbols) => {
          const text =
            symbols.length === 0
              ? `No symbols match /${pattern}/`
              : [`## Found ${symbols.length} symbol(s)`, "", ...symbols.map((s) => `- ${formatSymbol(s)}`)].join("\n");
          return successResponse(text, { generation, symbols: symbols.map((s) => ({ ...s })) });
        })
      );
    }
  );
}
