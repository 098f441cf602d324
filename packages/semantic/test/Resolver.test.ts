import { describe, it, expect } from "vitest";

import { SymbolTable } from "../src/core/SymbolTable.js";
import { bodyOf, buildModel } from "./helpers.js";

const VEHICLES = `
package Vehicles {
    part def Engine;
    private part def Secret;
    package Parts {
        part def Wheel;
    }
    alias Motor for Engine;
    part def Car {
        part engine : Motor;
        part wheel : Parts::Wheel;
    }
}
package Other {
    part def Thing;
}
`;

describe("Resolver", () => {
  const { table, graph, resolver } = buildModel({ "vehicles.sysml": VEHICLES });

  it("resolves an exact qualified name", () => {
    const result = resolver.resolve("Vehicles::Parts::Wheel", SymbolTable.ROOT);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.qualifiedName).toBe("Vehicles::Parts::Wheel");
    }
  });

  it("resolves a partial path from the enclosing scopes", () => {
    const result = resolver.resolve("Parts::Wheel", bodyOf(table, "Vehicles::Car"));

    expect(result.ok && result.value.qualifiedName).toBe("Vehicles::Parts::Wheel");
  });

  it("follows aliases to their target", () => {
    const result = resolver.resolve("Motor", bodyOf(table, "Vehicles::Car"));

    expect(result.ok && result.value.qualifiedName).toBe("Vehicles::Engine");
  });

  it("hides private members from outside their namespace", () => {
    const result = resolver.resolve("Vehicles::Secret", bodyOf(table, "Other"));

    expect(result).toEqual({
      ok: false,
      error: {
        kind: "UndefinedSymbol",
        message: "Undefined symbol 'Vehicles::Secret': 'Vehicles' has no visible member 'Secret'",
        severity: "error",
        candidates: [],
      },
    });
  });

  it("sees private members from inside their namespace", () => {
    const result = resolver.resolve("Vehicles::Secret", bodyOf(table, "Vehicles::Car"));

    expect(result.ok && result.value.qualifiedName).toBe("Vehicles::Secret");
  });

  it("reports undefined simple names", () => {
    const result = resolver.resolve("Gearbox", SymbolTable.ROOT);

    expect(!result.ok && result.error.message).toBe("Undefined symbol 'Gearbox'");
  });

  it("links raw edge targets to qualified names", () => {
    expect(graph.targetsOf("typing", "Vehicles::Car::engine")).toEqual(["Vehicles::Engine"]);
    expect(graph.targetsOf("typing", "Vehicles::Car::wheel")).toEqual(["Vehicles::Parts::Wheel"]);
  });

  it("detects alias cycles", () => {
    const model = buildModel({
      "aliases.sysml": `
alias A for B;
alias B for A;
`,
    });

    const result = model.resolver.resolve("A", SymbolTable.ROOT);

    expect(result).toEqual({
      ok: false,
      error: { kind: "AliasCycle", message: "Alias cycle: A -> B -> A", severity: "error", candidates: [] },
    });
  });

  it("warns about ambiguous names found by the global fallback", () => {
    const model = buildModel({
      "dup.sysml": `
package P1 { part def Dup; }
package P2 { part def Dup; }
`,
    });

    const result = model.resolver.resolve("Dup", SymbolTable.ROOT);

    expect(result).toEqual({
      ok: false,
      error: {
        kind: "AmbiguousSimpleName",
        message: "Ambiguous reference 'Dup': P1::Dup, P2::Dup",
        severity: "warning",
        candidates: ["P1::Dup", "P2::Dup"],
      },
    });
  });

  it("leaves unresolved targets as written when linking", () => {
    const model = buildModel({ "car.sysml": "part def Car :> Vehicle;" });

    expect(model.graph.specializationsOf("Car")).toEqual(["Vehicle"]);
  });

  it("sets aside edges that link back to their own source", () => {
    const model = buildModel({ "self.sysml": "package P { part def A :> A; }" });

    expect(model.raw.edges("specialization").map((e) => [e.from, e.to])).toEqual([["P::A", "A"]]);
    expect(model.graph.edges()).toEqual([]);
    expect(model.graph.selfReferences("specialization").map((e) => [e.from, e.to, e.origin?.reference])).toEqual([
      ["P::A", "P::A", "A"],
    ]);
  });
});
