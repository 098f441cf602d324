import type { Result } from "@syslens/core";

/**
 * Port for file system reads.
 */
export interface FileSystem {
  /**
   * Read file contents as string.
   */
  read(filePath: string): Result<string, Error>;

  /**
   * Check if file exists.
   */
  exists(filePath: string): boolean;

  /**
   * Check if path is a directory.
   */
  isDirectory(filePath: string): boolean;
}
