import type { Result } from "@syslens/core";

import type { Language, ParseError, SyntaxFile } from "../model.js";

/**
 * Port for turning source text into an immutable syntax tree.
 *
 * The semantic engine only ever sees the outcome of `parse`; a failed parse is
 * data the workspace records against the file, not an exception.
 */
export interface SyntaxParser {
  /**
   * Parse a whole file.
   *
   * @param source - File contents
   * @param filePath - Path used for language detection and stored on the tree
   */
  parse(source: string, filePath: string): Result<SyntaxFile, ParseError[]>;

  /**
   * Detect language from file path.
   */
  detectLanguage(filePath: string): Language | undefined;
}
