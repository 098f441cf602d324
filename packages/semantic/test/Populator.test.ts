import { describe, it, expect } from "vitest";

import { SymbolTable } from "../src/core/SymbolTable.js";
import { bodyOf, buildModel } from "./helpers.js";

describe("Populator", () => {
  it("declares named elements under their owners", () => {
    const { table } = buildModel({
      "model.sysml": `
package Vehicles {
    part def Car {
        attribute mass;
        port fuelIn;
    }
}
`,
    });

    expect(table.allSymbols().map((s) => s.qualifiedName)).toEqual([
      "Vehicles",
      "Vehicles::Car",
      "Vehicles::Car::mass",
      "Vehicles::Car::fuelIn",
    ]);
  });

  it("never declares the segments of a reference", () => {
    const { table, raw } = buildModel({
      "shell.sysml": `
part def Shell {
    ref item :>> Shell::edges::vertices;
}
`,
    });

    expect(table.allSymbols().map((s) => s.name)).toEqual(["Shell"]);
    expect(table.lookupQualified("Shell::edges")).toBeUndefined();
    expect(table.lookupQualified("Shell::edges::vertices")).toBeUndefined();
    expect(raw.targetsOf("redefinition", "Shell")).toEqual(["Shell::edges::vertices"]);
  });

  it("treats an unnamed package as transparent", () => {
    const { table } = buildModel({ "anon.sysml": "package { part def Loose; }" });

    expect(table.lookupQualified("Loose")?.scopeId).toBe(SymbolTable.ROOT);
  });

  it("records the declaring scope and target span as the edge origin", () => {
    const { raw, table } = buildModel({
      "car.sysml": `package Shop {
    part def Car :> Vehicle;
}`,
    });

    const [edge] = raw.edges("specialization");
    expect(edge.from).toBe("Shop::Car");
    expect(edge.to).toBe("Vehicle");
    expect(edge.origin?.reference).toBe("Vehicle");
    expect(edge.origin?.scopeId).toBe(bodyOf(table, "Shop"));
    expect(edge.origin?.file).toBe("car.sysml");
    expect(edge.origin?.span.start).toEqual({ line: 2, column: 21, offset: 35 });
  });

  it("derives semantic roles and directions from keywords and prefixes", () => {
    const { table } = buildModel({
      "roles.sysml": `
requirement def MaxSpeed;
use case def Drive;
port def FuelPort {
    in attribute fuel;
}
`,
    });

    const req = table.lookupQualified("MaxSpeed");
    const drive = table.lookupQualified("Drive");
    const fuel = table.lookupQualified("FuelPort::fuel");

    expect(req?.kind === "definition" && req.semanticRole).toBe("Requirement");
    expect(drive?.kind === "definition" && drive.definitionKind).toBe("use case");
    expect(drive?.kind === "definition" && drive.semanticRole).toBe("UseCase");
    expect(fuel?.kind === "usage" && fuel.direction).toBe("in");
  });

  it("attributes relationships of unnamed usages to their owner", () => {
    const { raw, table } = buildModel({
      "sat.sysml": `
requirement def Range;
part def Battery {
    satisfy Range;
}
`,
    });

    expect(raw.satisfactionsOf("Range")).toEqual(["Battery"]);
    expect(table.allSymbols().map((s) => s.name)).toEqual(["Range", "Battery"]);
  });

  it("collects import directives against the importing scope", () => {
    const { directives, table } = buildModel({
      "imports.sysml": `
package App {
    private import Lib::*;
    import Lib::Engine as Motor;
    import all Deep::**;
}
`,
    });

    const app = bodyOf(table, "App");
    expect(directives.map((d) => [d.kind, d.target, d.alias, d.visibility, d.isAll, d.importingScope])).toEqual([
      ["namespace", "Lib", null, "private", false, app],
      ["member", "Lib::Engine", "Motor", "public", false, app],
      ["recursive", "Deep", null, "public", true, app],
    ]);
  });

  it("reports a duplicate and populates its body into the first declaration", () => {
    const { table, graph, populateDiagnostics } = buildModel({
      "a.sysml": "package P { part def A; }",
      "b.sysml": "package P { part def B; } package Q { part x : P::B; }",
    });

    expect(populateDiagnostics.map((d) => [d.kind, d.file, d.symbol])).toEqual([["DuplicateDefinition", "b.sysml", "P"]]);
    expect(table.lookupQualified("P")?.sourceFile).toBe("a.sysml");
    expect(table.lookupQualified("P::A")?.sourceFile).toBe("a.sysml");
    expect(table.lookupQualified("P::B")?.sourceFile).toBe("b.sysml");
    expect(table.lookupQualified("P::B")?.scopeId).toBe(bodyOf(table, "P"));
    expect(graph.targetsOf("typing", "Q::x")).toEqual(["P::B"]);
  });

  it("adds no edges for a rejected duplicate", () => {
    const { raw } = buildModel({
      "a.sysml": "part def Car;",
      "b.sysml": "part def Car :> Vehicle;",
    });

    expect(raw.edges()).toEqual([]);
  });
});
