import type { Result } from "@syslens/core";

export interface ScanOptions {
  /** Glob patterns relative to the root, e.g. `**\/*.sysml` */
  include: string[];
  /** Glob patterns to skip */
  exclude: string[];
}

/**
 * Port for discovering model files below a directory.
 */
export interface ProjectScanner {
  /**
   * @returns Paths relative to `rootPath`, sorted
   */
  scan(rootPath: string, options: ScanOptions): Promise<Result<string[], Error>>;
}
