/**
 * model_diagnostics - Diagnostics for one file or the whole model.
 */

import * as z from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { successResponse } from "@syslens/core";

import type { Diagnostic } from "../core/model.js";
import type { Services } from "./index.js";
import { formatDiagnostic, notLoaded, publicationResponse, resolveFile } from "./shared.js";

const InputSchema = {
  file: z.string().optional().describe("Restrict to one file"),
  severity: z.enum(["error", "warning"]).optional().describe("Only this severity"),
};

function formatDiagnostics(diagnostics: Diagnostic[]): string {
  if (diagnostics.length === 0) {
    return "No diagnostics";
  }
  const errors = diagnostics.filter((d) => d.severity === "error").length;
  const lines = [`## ${errors} error(s), ${diagnostics.length - errors} warning(s)`, ""];
  for (const diagnostic of diagnostics) {
    lines.push(formatDiagnostic(diagnostic));
  }
  return lines.join("\n");
}

export function registerDiagnostics(server: McpServer, services: Services): void {
  server.registerTool(
    "model_diagnostics",
    {
      title: "Diagnostics",
      description: "Parse errors, duplicate definitions, unresolved references and imports, and relationship cycles.",
      inputSchema: InputSchema,
    },
    async (input) => {
      const { file, severity } = z.object(InputSchema).parse(input);
      const missing = notLoaded(services.workspace.files().length);
      if (missing) return missing;

      const path = file === undefined ? null : resolveFile(services.rootPath, file);
      const publication = services.gate.run(path, (view) => {
        const all = path === null ? view.allDiagnostics() : view.diagnostics(path);
        return severity === undefined ? all : all.filter((d) => d.severity === severity);
      });

      return publicationResponse(publication, (diagnostics, generation) =>
        successResponse(formatDiagnostics(diagnostics), {
          generation,
          diagnostics: diagnostics.map((d) => ({ ...d })),
        })
      );
    }
  );
}
