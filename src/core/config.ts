/**
 * Project configuration (`reqtrace.yaml`).
 *
 * Linked requirements: REQ-CLI-001
 */

import { existsSync, readFileSync, writeFileSync } from 'fs';
import { dirname, isAbsolute, join } from 'path';
import { parse, stringify } from 'yaml';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { DEFAULT_MAX_DEPTH } from '../graph/closure.js';

/**
 * Config file name marking a project root.
 */
export const CONFIG_FILE = 'reqtrace.yaml';

const ConfigSchema = z
  .object({
    database: z.string().min(1).default('reqtrace.db'),
    requirements: z.array(z.string()).default([]),
    traces: z.array(z.string()).default([]),
    coverage: z.array(z.string()).default([]),
    reviews: z.array(z.string()).default([]),
    report: z
      .object({ out: z.string().min(1).default('reqtrace-report.json') })
      .strict()
      .default({}),
    maxDepth: z.number().int().positive().default(DEFAULT_MAX_DEPTH),
  })
  .strict();

export type ProjectConfig = z.infer<typeof ConfigSchema>;

/**
 * Find the project root by walking up from `startDir`.
 */
export function findProjectRoot(startDir: string = process.cwd()): string | null {
  let dir = startDir;
  while (dir !== dirname(dir)) {
    if (existsSync(join(dir, CONFIG_FILE))) {
      return dir;
    }
    dir = dirname(dir);
  }
  return existsSync(join(dir, CONFIG_FILE)) ? dir : null;
}

/**
 * Parse and validate config text. `source` names the file in errors.
 */
export function parseConfig(content: string, source: string = CONFIG_FILE): ProjectConfig {
  let raw: unknown;
  try {
    raw = parse(content) ?? {};
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Could not parse '${source}': ${reason}`, { source });
  }

  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`
    );
    throw new ConfigError(`Invalid configuration in '${source}': ${issues.join('; ')}`, {
      source,
      issues,
    });
  }
  return result.data;
}

export function loadConfig(root: string): ProjectConfig {
  const filePath = join(root, CONFIG_FILE);
  if (!existsSync(filePath)) {
    throw new ConfigError(`No ${CONFIG_FILE} in '${root}'`, { root });
  }
  return parseConfig(readFileSync(filePath, 'utf-8'), filePath);
}

/**
 * Write a default config into `root`. Returns the file path.
 */
export function writeDefaultConfig(root: string, force = false): string {
  const filePath = join(root, CONFIG_FILE);
  if (existsSync(filePath) && !force) {
    throw new ConfigError(`${CONFIG_FILE} already exists in '${root}'`, { root });
  }
  const defaults = ConfigSchema.parse({});
  writeFileSync(filePath, stringify(defaults, { lineWidth: 0 }), 'utf-8');
  return filePath;
}

/**
 * Resolve a config-relative path. `:memory:` is passed through.
 */
export function resolveProjectPath(root: string, path: string): string {
  if (path === ':memory:' || isAbsolute(path)) return path;
  return join(root, path);
}
