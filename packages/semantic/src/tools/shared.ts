import path from "node:path";
import { errorResponse, type ToolResponse } from "@syslens/core";
import type { Span } from "@syslens/syntax";

import type { Diagnostic, SymbolView } from "../core/model.js";
import type { Publication } from "../core/RequestGate.js";

/** Resolve a tool's file argument against the loaded workspace root. */
export function resolveFile(rootPath: string, file: string): string {
  return path.resolve(rootPath, file);
}

export function formatLocation(file: string, span: Span): string {
  return `${file}:${span.start.line}:${span.start.column}`;
}

export function formatSymbol(symbol: SymbolView): string {
  const flags = [symbol.isAbstract ? "abstract" : null, symbol.isVariation ? "variation" : null].filter(Boolean);
  const suffix = flags.length > 0 ? ` (${flags.join(", ")})` : "";
  const target = symbol.aliasTarget ? ` for ${symbol.aliasTarget}` : "";
  return `**${symbol.qualifiedName}** ${symbol.keyword}${target}${suffix} - ${formatLocation(symbol.file, symbol.span)}`;
}

export function formatDiagnostic(diagnostic: Diagnostic): string {
  const where = diagnostic.file && diagnostic.span ? `${formatLocation(diagnostic.file, diagnostic.span)} ` : "";
  return `- ${where}[${diagnostic.severity}] ${diagnostic.kind}: ${diagnostic.message}`;
}

/**
 * Turn a gated result into a response. A stale result is an error asking the
 * caller to retry.
 */
export function publicationResponse<T>(
  publication: Publication<T>,
  format: (value: T, generation: number) => ToolResponse
): ToolResponse {
  if (publication.status === "stale") {
    return errorResponse(
      `Model changed while the request ran (generation ${publication.dispatched} -> ${publication.current}); retry`
    );
  }
  return format(publication.value, publication.generation);
}

/** Error response when nothing has been loaded yet, otherwise null. */
export function notLoaded(fileCount: number): ToolResponse | null {
  return fileCount === 0 ? errorResponse("Model not loaded. Call model_load or model_open_document first.") : null;
}
