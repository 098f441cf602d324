/**
 * model_lookup - Find a symbol by qualified name, by name as seen from a
 * position, or by the reference written at a position.
 */

import * as z from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { errorResponse, successResponse } from "@syslens/core";

import type { SymbolView } from "../core/model.js";
import type { WorkspaceView } from "../core/WorkspaceView.js";
import type { Services } from "./index.js";
import { formatSymbol, notLoaded, publicationResponse, resolveFile } from "./shared.js";

const InputSchema = {
  name: z.string().optional().describe("Qualified name (Pkg::Part) or simple name"),
  file: z.string().optional().describe("File the name is written in"),
  line: z.number().int().positive().optional().describe("1-indexed line"),
  column: z.number().int().positive().optional().describe("1-indexed column"),
};

const LookupInput = z.object(InputSchema);
type LookupInput = z.infer<typeof LookupInput>;

function lookup(view: WorkspaceView, input: LookupInput, file: string | null): SymbolView | undefined {
  const position = input.line !== undefined && input.column !== undefined ? { line: input.line, column: input.column } : null;

  if (input.name !== undefined && file !== null && position) {
    return view.lookupSimple(input.name, file, position);
  }
  if (input.name !== undefined) {
    return view.lookupQualified(input.name);
  }
  if (file !== null && position) {
    return view.definitionAt(file, position);
  }
  return undefined;
}

export function registerLookup(server: McpServer, services: Services): void {
  server.registerTool(
    "model_lookup",
    {
      title: "Look up symbol",
      description: `Find a symbol in the semantic model.

- name only: exact qualified name lookup
- name + file/line/column: resolve the name as written at that position (scopes, imports, aliases)
- file/line/column only: the symbol the relationship target at that position refers to`,
      inputSchema: InputSchema,
    },
    async (input) => {
      const parsed = LookupInput.parse(input);
      const missing = notLoaded(services.workspace.files().length);
      if (missing) return missing;

      if (parsed.name === undefined && (parsed.file === undefined || parsed.line === undefined || parsed.column === undefined)) {
        return errorResponse("Provide a name, a file position, or both");
      }

      const file = parsed.file === undefined ? null : resolveFile(services.rootPath, parsed.file);
      const publication = services.gate.run(file, (view) => lookup(view, parsed, file));

      return publicationResponse(publication, (symbol, generation) => {
        if (!symbol) {
          return errorResponse(`Symbol not found: ${parsed.name ?? `reference at ${parsed.file}:${parsed.line}:${parsed.column}`}`);
        }
        return successResponse(formatSymbol(symbol), { generation, symbol: { ...symbol } });
      });
    }
  );
}
