#!/usr/bin/env node
/**
 * MCP server for the SysML/KerML semantic model.
 */

import { runServer } from "@syslens/core";

import { createServices, registerAllTools, type Services } from "./tools/index.js";

runServer<Services>({
  config: {
    name: "syslens:semantic",
    version: "0.1.0",
  },
  createServices: () => createServices(process.cwd()),
  registerTools: registerAllTools,
  onStartup: async (services) => {
    console.error(`[semantic] Loading model for workspace: ${services.rootPath}`);

    const result = await services.loader.load(services.workspace, services.rootPath);
    if (!result.ok) {
      console.error(`[semantic] Warning: Could not load model: ${result.error.message}`);
      console.error(`[semantic] Call model_load once the workspace is ready.`);
      return;
    }

    const { report } = result.value;
    console.error(
      `[semantic] Loaded: ${report.symbols} symbols, ${report.edges} relationships from ${report.populated.length} files (stdlib: ${result.value.stdlib})`
    );
    if (report.failed.length > 0) {
      console.error(`[semantic] ${report.failed.length} file(s) failed to load`);
    }
  },
});
