/**
 * Workspace configuration: `syslens.config.json` at the workspace root,
 * overridable from the environment.
 */

import path from "node:path";
import * as z from "zod/v4";
import { Err, Ok, andThen, map, mapErr, tryCatch, type Result } from "@syslens/core";
import type { FileSystem } from "@syslens/syntax";

export const CONFIG_FILE = "syslens.config.json";

export const DEFAULT_INCLUDE = ["**/*.sysml", "**/*.kerml"];
export const DEFAULT_EXCLUDE = ["**/node_modules/**", "**/.git/**"];

export const ConfigSchema = z.object({
  stdlibPath: z.string().min(1).optional().describe("Standard library directory, relative to the root or absolute"),
  include: z.array(z.string()).default(DEFAULT_INCLUDE),
  exclude: z.array(z.string()).default(DEFAULT_EXCLUDE),
});

export type SyslensConfig = z.infer<typeof ConfigSchema>;

export type Env = Record<string, string | undefined>;

/**
 * Validate raw config data. Issues are reported as `path: message` joined
 * with `; `.
 */
export function parseConfig(data: unknown): Result<SyslensConfig, Error> {
  const parsed = ConfigSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${where}: ${issue.message}`;
    });
    return Err(new Error(`Invalid ${CONFIG_FILE}: ${issues.join("; ")}`));
  }
  return Ok(parsed.data);
}

/**
 * Read the config below `rootPath`. A missing file yields the defaults;
 * `SYSLENS_STDLIB_PATH` replaces `stdlibPath`. The returned `stdlibPath` is
 * absolute.
 */
export function loadConfig(fs: FileSystem, rootPath: string, env: Env = process.env): Result<SyslensConfig, Error> {
  const configPath = path.join(rootPath, CONFIG_FILE);

  let raw: Result<unknown, Error> = Ok({});
  if (fs.exists(configPath)) {
    raw = andThen(fs.read(configPath), (text) =>
      mapErr(
        tryCatch((): unknown => JSON.parse(text)),
        (error) => new Error(`Invalid ${CONFIG_FILE}: ${error.message}`)
      )
    );
  }

  return map(andThen(raw, parseConfig), (config) => {
    const stdlibPath = env.SYSLENS_STDLIB_PATH || config.stdlibPath;
    return {
      ...config,
      stdlibPath: stdlibPath === undefined ? undefined : path.resolve(rootPath, stdlibPath),
    };
  });
}
