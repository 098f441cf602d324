import { describe, it, expect } from "vitest";
import {
  SysmlParser,
  type DefinitionNode,
  type SyntaxElement,
  type SyntaxFile,
  type UsageNode,
} from "../src/index.js";

const parser = new SysmlParser();

function parse(source: string, path = "model.sysml"): SyntaxFile {
  const result = parser.parse(source, path);
  if (!result.ok) {
    throw new Error(result.error.map((e) => e.message).join("; "));
  }
  return result.value;
}

function only(elements: SyntaxElement[]): SyntaxElement {
  expect(elements).toHaveLength(1);
  return elements[0];
}

function asDefinition(element: SyntaxElement): DefinitionNode {
  if (element.kind !== "definition") throw new Error(`expected definition, got ${element.kind}`);
  return element;
}

function asUsage(element: SyntaxElement): UsageNode {
  if (element.kind !== "usage") throw new Error(`expected usage, got ${element.kind}`);
  return element;
}

describe("SysmlParser", () => {
  describe("packages and definitions", () => {
    it("parses nested definitions with specialization and typed usages", () => {
      const file = parse(`
package Vehicles {
  part def Vehicle;
  part def Car :> Vehicle {
    attribute mass : Real;
  }
}`);

      const pkg = only(file.members);
      expect(pkg.kind).toBe("package");
      if (pkg.kind !== "package") return;
      expect(pkg.name?.text).toBe("Vehicles");
      expect(pkg.members).toHaveLength(2);

      const car = asDefinition(pkg.members[1]);
      expect(car.keyword).toBe("part");
      expect(car.name?.text).toBe("Car");
      expect(car.relationships.map((r) => [r.relation, r.target.text])).toEqual([["specialization", "Vehicle"]]);

      const mass = asUsage(only(car.members));
      expect(mass.keyword).toBe("attribute");
      expect(mass.name?.text).toBe("mass");
      expect(mass.relationships.map((r) => [r.relation, r.target.text])).toEqual([["typing", "Real"]]);
    });

    it("records spans from the first to the last token", () => {
      const def = asDefinition(only(parse("part def A;").members));
      expect(def.span.start).toEqual({ line: 1, column: 1, offset: 0 });
      expect(def.span.end).toEqual({ line: 1, column: 12, offset: 11 });
    });

    it("reads library flags", () => {
      const pkg = only(parse("standard library package ScalarValues { datatype Real; }").members);
      expect(pkg).toMatchObject({ kind: "package", isLibrary: true, isStandard: true });
      if (pkg.kind !== "package") return;
      expect(only(pkg.members)).toMatchObject({ kind: "classifier", keyword: "datatype", name: { text: "Real" } });
    });

    it("reads multi-word definition keywords", () => {
      const def = asDefinition(only(parse("use case def Drive;").members));
      expect(def.keyword).toBe("use case");
      expect(def.name?.text).toBe("Drive");
    });

    it("collects prefixes", () => {
      const def = asDefinition(only(parse("abstract part def Base;").members));
      expect(def.prefixes).toEqual(["abstract"]);
    });

    it("detects language from the extension", () => {
      expect(parse("classifier A;", "lib/base.kerml").language).toBe("kerml");
      expect(parse("part def A;").language).toBe("sysml");
    });
  });

  describe("usages", () => {
    it("distinguishes subsetting from specialization", () => {
      const usage = asUsage(only(parse("part wheels :> parts;").members));
      expect(usage.relationships.map((r) => r.relation)).toEqual(["subsetting"]);
    });

    it("parses unnamed redefinitions with a value", () => {
      const usage = asUsage(only(parse(":>> mass = 1500;").members));
      expect(usage.keyword).toBe("ref");
      expect(usage.name).toBeNull();
      expect(usage.relationships.map((r) => [r.relation, r.target.text])).toEqual([["redefinition", "mass"]]);
      expect(usage.value?.text).toBe("1500");
    });

    it("treats a qualified redefinition target as a reference, not a name", () => {
      const usage = asUsage(only(parse("ref item :>> Shell::edges::vertices;").members));
      expect(usage.prefixes).toEqual(["ref"]);
      expect(usage.keyword).toBe("item");
      expect(usage.name).toBeNull();
      expect(usage.relationships[0].target.segments).toEqual(["Shell", "edges", "vertices"]);
    });

    it("parses keyword-less typed usages", () => {
      const usage = asUsage(only(parse("x : T;").members));
      expect(usage.name?.text).toBe("x");
      expect(usage.relationships.map((r) => [r.relation, r.target.text])).toEqual([["typing", "T"]]);
    });

    it("skips multiplicity and ordering", () => {
      const usage = asUsage(only(parse("part wheels : Wheel[4] ordered;").members));
      expect(usage.relationships.map((r) => r.target.text)).toEqual(["Wheel"]);
    });

    it("parses comma-separated targets", () => {
      const def = asDefinition(only(parse("part def C :> A, B;").members));
      expect(def.relationships.map((r) => r.target.text)).toEqual(["A", "B"]);
    });

    it("records satisfy as a relationship from the enclosing element", () => {
      const usage = asUsage(only(parse("satisfy Req1 by car;").members));
      expect(usage.keyword).toBe("satisfy");
      expect(usage.name).toBeNull();
      expect(usage.relationships.map((r) => [r.relation, r.target.text])).toEqual([["satisfaction", "Req1"]]);
    });
  });

  describe("imports and aliases", () => {
    it("classifies import kinds", () => {
      const file = parse(`
import ISQ::*;
import A::B::**;
import C::*::**;
private import X::Y as Z;
`);
      expect(
        file.members.map((m) => (m.kind === "import" ? [m.importKind, m.target.text, m.alias?.text ?? null, m.visibility] : null))
      ).toEqual([
        ["namespace", "ISQ", null, "public"],
        ["recursive", "A::B", null, "public"],
        ["recursive", "C", null, "public"],
        ["member", "X::Y", "Z", "private"],
      ]);
    });

    it("parses aliases", () => {
      const alias = only(parse("alias V for Vehicles::Vehicle;").members);
      expect(alias).toMatchObject({ kind: "alias", name: { text: "V" }, target: { text: "Vehicles::Vehicle" } });
    });
  });

  describe("comments and unsupported statements", () => {
    it("attaches doc comment bodies", () => {
      const def = asDefinition(only(parse("part def A { doc /* The vehicle */ }").members));
      expect(only(def.members)).toMatchObject({ kind: "comment", isDoc: true, text: "The vehicle" });
    });

    it("skips statements it does not model", () => {
      const def = asDefinition(only(parse("part def A { connect a to b; part x; }").members));
      expect(asUsage(only(def.members)).name?.text).toBe("x");
    });
  });

  describe("errors", () => {
    it("reports a missing closing brace", () => {
      const result = parser.parse("package P {", "broken.sysml");
      expect(result.ok).toBe(false);
      if (result.ok) return;

      expect(result.error).toHaveLength(1);
      expect(result.error[0].message).toBe("Expected '}' but found end of file");
    });

    it("reports lexer errors", () => {
      const result = parser.parse("part def 'Bad", "broken.sysml");
      expect(result.ok).toBe(false);
      if (result.ok) return;

      expect(result.error[0].message).toBe("Unterminated quoted name");
    });

    it("reports a stray closing brace", () => {
      const result = parser.parse("part def A; }", "broken.sysml");
      expect(result.ok).toBe(false);
      if (result.ok) return;

      expect(result.error[0].message).toBe("Unexpected '}'");
    });
  });
});
