import { describe, it, expect, beforeEach } from "vitest";
import { SysmlParser } from "@syslens/syntax";

import { RequestGate } from "../src/core/RequestGate.js";
import { Workspace } from "../src/core/Workspace.js";

const parser = new SysmlParser();

describe("RequestGate", () => {
  let workspace: Workspace;
  let gate: RequestGate;

  beforeEach(() => {
    workspace = new Workspace();
    gate = new RequestGate(workspace);
    workspace.addFile("a.sysml", parser.parse("part def A;", "a.sysml"));
  });

  it("tags a request with the generation at dispatch", () => {
    expect(gate.dispatch("a.sysml")).toEqual({ file: "a.sysml", generation: 1 });
    expect(gate.dispatch()).toEqual({ file: null, generation: 1 });
  });

  it("publishes a result computed against the current generation", () => {
    const ticket = gate.dispatch("a.sysml");

    expect(gate.publish(ticket, ["A"])).toEqual({ status: "ok", value: ["A"], generation: 1 });
  });

  it("discards a result once an edit moved the workspace on", () => {
    const ticket = gate.dispatch("a.sysml");
    const names = workspace.snapshot().symbolsInFile("a.sysml").map((s) => s.name);

    workspace.updateFile("a.sysml", parser.parse("part def B;", "a.sysml"));

    expect(gate.publish(ticket, names)).toEqual({ status: "stale", dispatched: 1, current: 2 });
  });

  it("discards a result even when the cycle that moved it was cancelled", () => {
    const ticket = gate.dispatch(null);

    workspace.populateAll(() => true);

    expect(gate.publish(ticket, 0)).toEqual({ status: "stale", dispatched: 1, current: 2 });
  });

  it("runs a query against the committed view", () => {
    const publication = gate.run("a.sysml", (view) => view.lookupQualified("A")?.qualifiedName);

    expect(publication).toEqual({ status: "ok", value: "A", generation: 1 });
  });

  it("reports a query as stale while the last cycle was cancelled before committing", () => {
    workspace.populateAll(() => true);

    expect(gate.dispatch("a.sysml")).toEqual({ file: "a.sysml", generation: 1 });
    expect(gate.run("a.sysml", (view) => view.generation)).toEqual({ status: "stale", dispatched: 1, current: 2 });

    workspace.populateAll();

    expect(gate.run("a.sysml", (view) => view.generation)).toEqual({ status: "ok", value: 3, generation: 3 });
  });
});
