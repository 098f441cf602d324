export type { Result } from "./result.js";
export { Ok, Err, map, mapErr, andThen, unwrapOr, tryCatch } from "./result.js";

export type { TextContent, ToolResponse } from "./mcp.js";
export { textResponse, errorResponse, successResponse, resultToResponse } from "./mcp.js";

export type { ServerConfig, ServerBootstrapOptions } from "./server.js";
export { bootstrapServer, runServer, McpServer } from "./server.js";
