/**
 * model_references - Relationships that point at a symbol.
 */

import * as z from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { successResponse } from "@syslens/core";

import type { ReferenceView } from "../core/WorkspaceView.js";
import type { Services } from "./index.js";
import { formatLocation, notLoaded, publicationResponse } from "./shared.js";

const InputSchema = {
  name: z.string().describe("Qualified name of the referenced symbol"),
};

function formatReferences(name: string, references: ReferenceView[]): string {
  if (references.length === 0) {
    return `No references to ${name}`;
  }
  const lines = [`## ${references.length} reference(s) to ${name}`, ""];
  for (const ref of references) {
    lines.push(`- ${formatLocation(ref.file, ref.span)} ${ref.from} (${ref.kind} '${ref.reference}')`);
  }
  return lines.join("\n");
}

export function registerReferences(server: McpServer, services: Services): void {
  server.registerTool(
    "model_references",
    {
      title: "Find references",
      description: "Find every typing, specialization, subsetting, redefinition, satisfy, perform, exhibit and include relationship that resolves to a symbol.",
      inputSchema: InputSchema,
    },
    async (input) => {
      const { name } = z.object(InputSchema).parse(input);
      const missing = notLoaded(services.workspace.files().length);
      if (missing) return missing;

      const publication = services.gate.run(null, (view) => view.referencesTo(name));
      return publicationResponse(publication, (references, generation) =>
        successResponse(formatReferences(name, references), {
          generation,
          name,
          references: references.map((r) => ({ ...r })),
        })
      );
    }
  );
}
