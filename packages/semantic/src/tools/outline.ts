/**
 * model_outline - Symbols declared in one file.
 */

import * as z from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { errorResponse, successResponse } from "@syslens/core";

import type { Services } from "./index.js";
import { formatSymbol, publicationResponse, resolveFile } from "./shared.js";

const InputSchema = {
  file: z.string().describe("File to outline"),
};

export function registerOutline(server: McpServer, services: Services): void {
  server.registerTool(
    "model_outline",
    {
      title: "File outline",
      description: "List the symbols declared in a file, in declaration order.",
      inputSchema: InputSchema,
    },
    async (input) => {
      const { file } = z.object(InputSchema).parse(input);
      const path = resolveFile(services.rootPath, file);
      if (services.workspace.fileState(path) === undefined) {
        return errorResponse(`File not loaded: ${file}`);
      }

      const publication = services.gate.run(path, (view) => view.symbolsInFile(path));
      return publicationResponse(publication, (symbols, generation) => {
        const text =
          symbols.length === 0
            ? `No symbols declared in ${file}`
            : [`## ${symbols.length} symbol(s) in ${file}`, "", ...symbols.map((s) => `- ${formatSymbol(s)}`)].join("\n");
        return successResponse(text, { generation, file: path, symbols: symbols.map((s) => ({ ...s })) });
      });
    }
  );
}
