import { describe, it, expect, beforeAll, afterAll } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { McpServer } from "@syslens/core";

import { createServices, registerAllTools, type Services } from "../src/tools/index.js";

const SHOP = `package Shop {
    part def Vehicle;
    part def Car :> Vehicle;
    requirement def Range;
    part def Battery {
        satisfy Range;
    }
}`;

describe("MCP tools", () => {
  let root: string;
  let services: Services;
  let server: McpServer;
  let client: Client;

  beforeAll(async () => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "syslens-tools-"));
    fs.writeFileSync(path.join(root, "shop.sysml"), SHOP);

    services = createServices(root);
    server = new McpServer({ name: "syslens-test", version: "0.0.0" });
    registerAllTools(server, services);

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    client = new Client({ name: "syslens-test-client", version: "0.0.0" });
    await server.connect(serverTransport);
    await client.connect(clientTransport);
  });

  afterAll(async () => {
    await client.close();
    await server.close();
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("refuses queries before anything is loaded", async () => {
    const result = await client.callTool({ name: "model_lookup", arguments: { name: "Shop::Car" } });

    expect(result).toMatchObject({ isError: true, structuredContent: { success: false } });
  });

  it("loads the workspace", async () => {
    const result = await client.callTool({ name: "model_load", arguments: {} });

    expect(result).toMatchObject({
      structuredContent: { success: true, generation: 1, projectFiles: 1, symbols: 5, edges: 2, parseFailures: [] },
    });
  });

  it("looks up symbols by qualified name", async () => {
    const result = await client.callTool({ name: "model_lookup", arguments: { name: "Shop::Car" } });

    expect(result).toMatchObject({
      structuredContent: { success: true, symbol: { qualifiedName: "Shop::Car", keyword: "part def" } },
    });
  });

  it("answers specialization and satisfaction questions", async () => {
    const specializations = await client.callTool({ name: "model_specializations", arguments: { name: "Shop::Car" } });
    const check = await client.callTool({
      name: "model_specializations",
      arguments: { name: "Shop::Car", supertype: "Shop::Vehicle" },
    });
    const satisfactions = await client.callTool({ name: "model_satisfactions", arguments: { requirement: "Shop::Range" } });

    expect(specializations).toMatchObject({ structuredContent: { supertypes: ["Shop::Vehicle"] } });
    expect(check).toMatchObject({ structuredContent: { specializes: true } });
    expect(satisfactions).toMatchObject({ structuredContent: { satisfiedBy: ["Shop::Battery"] } });
  });

  it("reports diagnostics of a changed buffer and restores the saved file on close", async () => {
    const changed = await client.callTool({
      name: "model_change_document",
      arguments: { file: "shop.sysml", text: "part def Car :> Missing;" },
    });
    expect(changed).toMatchObject({
      structuredContent: {
        success: true,
        generation: 2,
        diagnostics: [{ kind: "UndefinedSymbol", message: "Undefined symbol 'Missing'" }],
      },
    });

    const closed = await client.callTool({ name: "model_close_document", arguments: { file: "shop.sysml" } });
    expect(closed).toMatchObject({ structuredContent: { generation: 3, diagnostics: [] } });

    const stats = await client.callTool({ name: "model_stats", arguments: {} });
    expect(stats).toMatchObject({ structuredContent: { generation: 3, files: 1, symbols: 5, errors: 0 } });
  });

  it("removes an unsaved document on close", async () => {
    await client.callTool({ name: "model_open_document", arguments: { file: "scratch.sysml", text: "part def Draft;" } });
    const found = await client.callTool({ name: "model_search", arguments: { pattern: "Draft" } });
    expect(found).toMatchObject({ structuredContent: { symbols: [{ qualifiedName: "Draft" }] } });

    await client.callTool({ name: "model_close_document", arguments: { file: "scratch.sysml" } });

    expect(services.workspace.fileState(path.join(root, "scratch.sysml"))).toBeUndefined();
  });
});
