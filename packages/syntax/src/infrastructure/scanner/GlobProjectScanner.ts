import { glob } from "glob";
import { type Result, Ok, Err } from "@syslens/core";

import type { ProjectScanner, ScanOptions } from "../../core/ports/ProjectScanner.js";

/**
 * ProjectScanner backed by `glob`. Paths use forward slashes on every platform.
 */
export class GlobProjectScanner implements ProjectScanner {
  async scan(rootPath: string, options: ScanOptions): Promise<Result<string[], Error>> {
    try {
      const files = await glob(options.include, {
        cwd: rootPath,
        nodir: true,
        ignore: options.exclude,
        posix: true,
      });
      return Ok([...new Set(files)].sort());
    } catch (error) {
      return Err(error instanceof Error ? error : new Error(String(error)));
    }
  }
}
