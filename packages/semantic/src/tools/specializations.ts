/**
 * model_specializations - Supertypes of a symbol, or a subtype check.
 */

import * as z from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { successResponse } from "@syslens/core";

import type { Services } from "./index.js";
import { notLoaded, publicationResponse } from "./shared.js";

const InputSchema = {
  name: z.string().describe("Qualified name of the specializing symbol"),
  supertype: z.string().optional().describe("If given, check whether name specializes it transitively"),
};

export function registerSpecializations(server: McpServer, services: Services): void {
  server.registerTool(
    "model_specializations",
    {
      title: "Specializations",
      description: "List the direct supertypes of a definition, or check whether it specializes another one directly or transitively.",
      inputSchema: InputSchema,
    },
    async (input) => {
      const { name, supertype } = z.object(InputSchema).parse(input);
      const missing = notLoaded(services.workspace.files().length);
      if (missing) return missing;

      if (supertype !== undefined) {
        const publication = services.gate.run(null, (view) => view.isSpecialization(name, supertype));
        return publicationResponse(publication, (holds, generation) =>
          successResponse(
            holds ? `${name} specializes ${supertype}` : `${name} does not specialize ${supertype}`,
            { generation, name, supertype, specializes: holds }
          )
        );
      }

      const publication = services.gate.run(null, (view) => view.specializationsOf(name));
      return publicationResponse(publication, (supertypes, generation) => {
        const text =
          supertypes.length === 0
            ? `${name} has no direct supertypes`
            : [`## ${name} specializes`, "", ...supertypes.map((s) => `- ${s}`)].join("\n");
        return successResponse(text, { generation, name, supertypes });
      });
    }
  );
}
