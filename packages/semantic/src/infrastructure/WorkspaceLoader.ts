import path from "node:path";
import { Err, Ok, map, mapErr, type Result } from "@syslens/core";
import type { FileSystem, ProjectScanner, Span, SyntaxParser } from "@syslens/syntax";

import { loadConfig, type Env, type SyslensConfig } from "../config.js";
import type { ParseOutcome, PopulateReport, StagedFile, Workspace } from "../core/Workspace.js";

export type StdlibStatus = "loaded" | "alreadyLoaded" | "missing" | "none";

export interface LoadSummary {
  rootPath: string;
  config: SyslensConfig;
  stdlib: StdlibStatus;
  stdlibFiles: number;
  projectFiles: number;
  /** Files that could not be read or parsed */
  parseFailures: string[];
  /** Project files of an earlier load that the scan no longer finds */
  removedFiles: string[];
  report: PopulateReport;
}

const FILE_START: Span = {
  start: { line: 1, column: 1, offset: 0 },
  end: { line: 1, column: 1, offset: 0 },
};

/**
 * Fills a workspace from disk: the standard library directory first, then
 * every project file matched by the configured globs, populated in one
 * cycle. Project files an earlier load staged that this scan does not find
 * are retracted in the same cycle. Paths handed to the workspace are
 * absolute.
 */
export class WorkspaceLoader {
  constructor(
    private readonly fs: FileSystem,
    private readonly scanner: ProjectScanner,
    private readonly parser: SyntaxParser
  ) {}

  async load(workspace: Workspace, rootPath: string, env?: Env): Promise<Result<LoadSummary, Error>> {
    const root = path.resolve(rootPath);
    if (!this.fs.isDirectory(root)) {
      return Err(new Error(`Not a directory: ${root}`));
    }

    const config = loadConfig(this.fs, root, env);
    if (!config.ok) return config;

    const stdlib = await this.loadStdlib(workspace, config.value);
    if (!stdlib.ok) return stdlib;

    const scanned = await this.scanner.scan(root, { include: config.value.include, exclude: config.value.exclude });
    if (!scanned.ok) return scanned;

    const stdlibPaths = new Set(workspace.files().filter((f) => f.isStdlib).map((f) => f.path));
    const projectPaths = new Set<string>();
    const parseFailures = stdlib.value.failures;

    for (const relative of scanned.value) {
      const absolute = path.join(root, relative);
      if (stdlibPaths.has(absolute)) continue;
      const outcome = this.readAndParse(absolute);
      if (!outcome.ok) parseFailures.push(absolute);
      workspace.stageFile(absolute, outcome);
      projectPaths.add(absolute);
    }
    const removedFiles = workspace.retainProjectFiles(projectPaths);

    const report = mapErr(workspace.populateAll(), (c) => new Error(`Load cancelled at generation ${c.generation}`));

    return map(report, (populated) => ({
      rootPath: root,
      config: config.value,
      stdlib: stdlib.value.status,
      stdlibFiles: stdlib.value.count,
      projectFiles: projectPaths.size,
      parseFailures,
      removedFiles,
      report: populated,
    }));
  }

  /**
   * Read and parse one file. An unreadable file becomes a parse failure at
   * the start of the file.
   */
  readAndParse(filePath: string): ParseOutcome {
    const source = this.fs.read(filePath);
    if (!source.ok) {
      return Err([{ message: `Cannot read file: ${source.error.message}`, span: FILE_START }]);
    }
    return this.parser.parse(source.value, filePath);
  }

  private async loadStdlib(
    workspace: Workspace,
    config: SyslensConfig
  ): Promise<Result<{ status: StdlibStatus; count: number; failures: string[] }, Error>> {
    if (workspace.hasStdlib()) return Ok({ status: "alreadyLoaded", count: 0, failures: [] });
    if (config.stdlibPath === undefined) return Ok({ status: "none", count: 0, failures: [] });
    if (!this.fs.isDirectory(config.stdlibPath)) return Ok({ status: "missing", count: 0, failures: [] });

    const stdlibRoot = config.stdlibPath;
    const scanned = await this.scanner.scan(stdlibRoot, { include: config.include, exclude: config.exclude });
    if (!scanned.ok) return scanned;

    const failures: string[] = [];
    const files: StagedFile[] = scanned.value.map((relative) => {
      const absolute = path.join(stdlibRoot, relative);
      const outcome = this.readAndParse(absolute);
      if (!outcome.ok) failures.push(absolute);
      return { path: absolute, outcome };
    });
    workspace.loadStdlib(files);

    return Ok({ status: "loaded", count: files.length, failures });
  }
}
