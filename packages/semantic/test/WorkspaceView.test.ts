import { describe, it, expect, beforeAll } from "vitest";
import { SysmlParser } from "@syslens/syntax";

import { Workspace } from "../src/core/Workspace.js";
import type { WorkspaceView } from "../src/core/WorkspaceView.js";

const SHOP = `package Shop {
    part def Engine;
    abstract part def Vehicle;
    part def Car :> Vehicle {
        part engine : Engine;
    }
    requirement def Range;
    part def Battery {
        satisfy Range;
    }
}`;

describe("WorkspaceView", () => {
  let view: WorkspaceView;

  beforeAll(() => {
    const workspace = new Workspace();
    const result = workspace.addFile("shop.sysml", new SysmlParser().parse(SHOP, "shop.sysml"));
    expect(result.ok).toBe(true);
    view = workspace.snapshot();
  });

  it("returns frozen symbol views", () => {
    const car = view.lookupQualified("Shop::Car");

    expect(car).toMatchObject({
      kind: "definition",
      name: "Car",
      qualifiedName: "Shop::Car",
      file: "shop.sysml",
      keyword: "part def",
      semanticRole: "Component",
      isAbstract: false,
      aliasTarget: null,
    });
    expect(Object.isFrozen(car)).toBe(true);
    expect(view.lookupQualified("Shop::Vehicle")?.isAbstract).toBe(true);
  });

  it("resolves a simple name as seen from a position", () => {
    expect(view.lookupSimple("Engine", "shop.sysml", { line: 5, column: 10 })?.qualifiedName).toBe("Shop::Engine");
    expect(view.lookupSimple("Engine", "shop.sysml", { line: 20, column: 1 })?.qualifiedName).toBe("Shop::Engine");
    expect(view.lookupSimple("Gearbox", "shop.sysml", { line: 5, column: 10 })).toBeUndefined();
  });

  it("answers specialization and satisfaction queries", () => {
    expect(view.specializationsOf("Shop::Car")).toEqual(["Shop::Vehicle"]);
    expect(view.isSpecialization("Shop::Car", "Shop::Vehicle")).toBe(true);
    expect(view.satisfactionsOf("Shop::Range")).toEqual(["Shop::Battery"]);
  });

  it("lists the references to a symbol with their origin", () => {
    expect(view.referencesTo("Shop::Engine")).toEqual([
      {
        kind: "typing",
        from: "Shop::Car::engine",
        reference: "Engine",
        file: "shop.sysml",
        span: {
          start: { line: 5, column: 23, offset: 119 },
          end: { line: 5, column: 29, offset: 125 },
        },
      },
    ]);
  });

  it("finds the symbol a reference at a position points to", () => {
    expect(view.definitionAt("shop.sysml", { line: 5, column: 25 })?.qualifiedName).toBe("Shop::Engine");
    expect(view.definitionAt("shop.sysml", { line: 4, column: 21 })?.qualifiedName).toBe("Shop::Vehicle");
    expect(view.definitionAt("shop.sysml", { line: 2, column: 5 })).toBeUndefined();
  });

  it("lists the symbols of a file in declaration order", () => {
    expect(view.symbolsInFile("shop.sysml").map((s) => s.name)).toEqual([
      "Shop",
      "Engine",
      "Vehicle",
      "Car",
      "engine",
      "Range",
      "Battery",
    ]);
  });

  it("searches qualified names", () => {
    const result = view.search("^shop::.*e$", { kinds: ["definition"] });

    expect(result.ok && result.value.map((s) => s.qualifiedName)).toEqual(["Shop::Engine", "Shop::Vehicle", "Shop::Range"]);
  });

  it("limits search results", () => {
    const result = view.search("Shop", { limit: 2 });

    expect(result.ok && result.value.map((s) => s.qualifiedName)).toEqual(["Shop", "Shop::Engine"]);
  });

  it("rejects an invalid pattern", () => {
    const result = view.search("(unclosed");

    expect(result.ok).toBe(false);
  });

  it("reports model statistics", () => {
    const stats = view.stats();

    expect(stats).toMatchObject({
      generation: 1,
      files: 1,
      symbols: 7,
      edges: 3,
      errors: 0,
      warnings: 0,
    });
    expect(stats.byKind).toMatchObject({ specialization: 1, typing: 1, satisfaction: 1 });
  });
});
