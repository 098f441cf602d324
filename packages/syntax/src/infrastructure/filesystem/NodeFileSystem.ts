import fs from "node:fs";
import path from "node:path";
import { tryCatch, type Result } from "@syslens/core";

import type { FileSystem } from "../../core/ports/FileSystem.js";

/**
 * Node.js implementation of the FileSystem port.
 */
export class NodeFileSystem implements FileSystem {
  private readonly basePath: string;

  constructor(basePath?: string) {
    this.basePath = basePath ?? process.cwd();
  }

  /** Model files are read as UTF-8 text; relative paths hang off the base path. */
  read(filePath: string): Result<string, Error> {
    return tryCatch(() => fs.readFileSync(path.resolve(this.basePath, filePath), "utf-8"));
  }

  exists(filePath: string): boolean {
    return fs.existsSync(path.resolve(this.basePath, filePath));
  }

  isDirectory(filePath: string): boolean {
    const stat = fs.statSync(path.resolve(this.basePath, filePath), { throwIfNoEntry: false });
    return stat?.isDirectory() ?? false;
  }
}
