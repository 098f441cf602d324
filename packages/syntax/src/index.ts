// Tree model and helpers
export * from "./core/model.js";
export * from "./core/tree.js";

// Ports
export type { FileSystem } from "./core/ports/FileSystem.js";
export type { SyntaxParser } from "./core/ports/Parser.js";
export type { ProjectScanner, ScanOptions } from "./core/ports/ProjectScanner.js";

// Infrastructure implementations
export { Lexer, tokenize, type Token, type TokenKind } from "./infrastructure/parser/Lexer.js";
export { SysmlParser } from "./infrastructure/parser/SysmlParser.js";
export { NodeFileSystem } from "./infrastructure/filesystem/NodeFileSystem.js";
export { GlobProjectScanner } from "./infrastructure/scanner/GlobProjectScanner.js";
