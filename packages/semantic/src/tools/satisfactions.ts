/**
 * model_satisfactions - Elements that satisfy a requirement.
 */

import * as z from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { successResponse } from "@syslens/core";

import type { Services } from "./index.js";
import { notLoaded, publicationResponse } from "./shared.js";

const InputSchema = {
  requirement: z.string().describe("Qualified name of the requirement"),
};

export function registerSatisfactions(server: McpServer, services: Services): void {
  server.registerTool(
    "model_satisfactions",
    {
      title: "Satisfactions",
      description: "List the elements with a `satisfy` relationship to a requirement.",
      inputSchema: InputSchema,
    },
    async (input) => {
      const { requirement } = z.object(InputSchema).parse(input);
      const missing = notLoaded(services.workspace.files().length);
      if (missing) return missing;

      const publication = services.gate.run(null, (view) => view.satisfactionsOf(requirement));
      return publicationResponse(publication, (satisfiedBy, generation) => {
        const text =
          satisfiedBy.length === 0
            ? `Nothing satisfies ${requirement}`
            : [`## ${requirement} is satisfied by`, "", ...satisfiedBy.map((s) => `- ${s}`)].join("\n");
        return successResponse(text, { generation, requirement, satisfiedBy });
      });
    }
  );
}
