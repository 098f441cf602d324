/**
 * model_open_document, model_change_document, model_close_document - Editor
 * buffer lifecycle. Each mutation runs a population cycle and moves the
 * model to a new generation.
 */

import * as z from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { errorResponse, mapErr, resultToResponse, successResponse, type Result, type ToolResponse } from "@syslens/core";

import type { Cancelled } from "../core/model.js";
import type { ParseOutcome, PopulateReport } from "../core/Workspace.js";
import type { Services } from "./index.js";
import { formatDiagnostic, resolveFile } from "./shared.js";

const OpenSchema = {
  file: z.string().describe("Path of the document"),
  text: z.string().optional().describe("Buffer contents (default: read from disk)"),
};

const ChangeSchema = {
  file: z.string().describe("Path of the document"),
  text: z.string().describe("New buffer contents"),
};

const CloseSchema = {
  file: z.string().describe("Path of the document"),
};

function formatReport(file: string, report: PopulateReport): string {
  const diagnostics = report.diagnostics[file] ?? [];
  const lines = [`## ${file} (generation ${report.generation})`, ""];
  if (diagnostics.length === 0) {
    lines.push("No diagnostics");
  } else {
    for (const diagnostic of diagnostics) lines.push(formatDiagnostic(diagnostic));
  }
  return lines.join("\n");
}

function reportResponse(file: string, result: Result<PopulateReport, Cancelled>): ToolResponse {
  if (!result.ok) {
    return errorResponse(`Population cancelled at generation ${result.error.generation}`);
  }
  const report = result.value;
  return successResponse(formatReport(file, report), {
    file,
    generation: report.generation,
    symbols: report.symbols,
    edges: report.edges,
    diagnostics: (report.diagnostics[file] ?? []).map((d) => ({ ...d })),
  });
}

export function registerDocuments(server: McpServer, services: Services): void {
  const parse = (file: string, text: string | undefined): ParseOutcome =>
    text === undefined ? services.loader.readAndParse(file) : services.parser.parse(text, file);

  server.registerTool(
    "model_open_document",
    {
      title: "Open document",
      description: "Add a document to the model, from the given buffer text or from disk.",
      inputSchema: OpenSchema,
    },
    async (input) => {
      const { file, text } = z.object(OpenSchema).parse(input);
      const path = resolveFile(services.rootPath, file);
      return reportResponse(path, services.workspace.addFile(path, parse(path, text)));
    }
  );

  server.registerTool(
    "model_change_document",
    {
      title: "Change document",
      description: "Replace a document's contents and rebuild the model.",
      inputSchema: ChangeSchema,
    },
    async (input) => {
      const { file, text } = z.object(ChangeSchema).parse(input);
      const path = resolveFile(services.rootPath, file);
      return reportResponse(path, services.workspace.updateFile(path, parse(path, text)));
    }
  );

  server.registerTool(
    "model_close_document",
    {
      title: "Close document",
      description: "Close a document. If it exists on disk its saved contents are loaded again, otherwise it leaves the model.",
      inputSchema: CloseSchema,
    },
    async (input) => {
      const { file } = z.object(CloseSchema).parse(input);
      const path = resolveFile(services.rootPath, file);
      if (services.workspace.fileState(path) === undefined) {
        return errorResponse(`File not loaded: ${file}`);
      }

      if (services.fs.exists(path)) {
        return reportResponse(path, services.workspace.updateFile(path, services.loader.readAndParse(path)));
      }

      const removed = mapErr(services.workspace.removeFile(path), (c) => `Population cancelled at generation ${c.generation}`);
      return resultToResponse(removed, (report) =>
        successResponse(`Removed ${path} (generation ${report.generation})`, { file: path, generation: report.generation })
      );
    }
  );
}
