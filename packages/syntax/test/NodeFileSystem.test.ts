import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { NodeFileSystem } from "../src/index.js";

describe("NodeFileSystem", () => {
  let root: string;
  let files: NodeFileSystem;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "syslens-fs-"));
    fs.mkdirSync(path.join(root, "model"));
    fs.writeFileSync(path.join(root, "model", "car.sysml"), "part def Car;");
    files = new NodeFileSystem(root);
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("reads relative paths from the base path and absolute paths as given", () => {
    expect(files.read("model/car.sysml")).toEqual({ ok: true, value: "part def Car;" });
    expect(files.read(path.join(root, "model", "car.sysml"))).toEqual({ ok: true, value: "part def Car;" });
  });

  it("returns an error for a file it cannot read", () => {
    const result = files.read("model/missing.sysml");

    expect(result.ok).toBe(false);
    expect(!result.ok && result.error).toBeInstanceOf(Error);
  });

  it("tells directories from files", () => {
    expect(files.isDirectory("model")).toBe(true);
    expect(files.isDirectory("model/car.sysml")).toBe(false);
    expect(files.isDirectory("absent")).toBe(false);
    expect(files.exists("model/car.sysml")).toBe(true);
    expect(files.exists("absent")).toBe(false);
  });
});
