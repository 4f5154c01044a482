/**
 * Loading producer records from YAML or JSON files.
 *
 * Linked requirements: REQ-STORE-003
 */

import { existsSync, readFileSync, readdirSync, statSync } from 'fs';
import { join } from 'path';
import { parse } from 'yaml';
import type { z } from 'zod';
import { InputError } from '../core/errors.js';
import {
  CoverageFileSchema,
  RequirementFileSchema,
  ReviewFileSchema,
  TraceFileSchema,
  type CoverageFile,
  type RequirementFile,
  type ReviewFile,
  type TraceFile,
} from './records.js';

const RECORD_EXTENSIONS = ['.yaml', '.yml', '.json'];

/**
 * Parse a YAML or JSON file (JSON is read as YAML) and validate it.
 *
 * @throws InputError naming the file and every validation issue
 */
export function loadRecordFile<S extends z.ZodTypeAny>(filePath: string, schema: S): z.output<S> {
  if (!existsSync(filePath)) {
    throw new InputError(filePath, ['file does not exist']);
  }

  let raw: unknown;
  try {
    raw = parse(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new InputError(filePath, [err instanceof Error ? err.message : String(err)]);
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new InputError(
      filePath,
      result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    );
  }
  return result.data;
}

export function loadRequirementFile(filePath: string): RequirementFile {
  return loadRecordFile(filePath, RequirementFileSchema);
}

export function loadTraceFile(filePath: string): TraceFile {
  return loadRecordFile(filePath, TraceFileSchema);
}

export function loadCoverageFile(filePath: string): CoverageFile {
  return loadRecordFile(filePath, CoverageFileSchema);
}

export function loadReviewFile(filePath: string): ReviewFile {
  return loadRecordFile(filePath, ReviewFileSchema);
}

/**
 * Expand directories into the record files they contain, recursively.
 * Plain file paths are passed through. Result is sorted per directory.
 */
export function expandRecordPaths(paths: readonly string[]): string[] {
  const files: string[] = [];

  function walkDir(currentDir: string) {
    const entries = readdirSync(currentDir, { withFileTypes: true }).sort((a, b) =>
      a.name.localeCompare(b.name)
    );
    for (const entry of entries) {
      const fullPath = join(currentDir, entry.name);
      if (entry.isDirectory()) {
        walkDir(fullPath);
      } else if (RECORD_EXTENSIONS.some((ext) => entry.name.endsWith(ext))) {
        files.push(fullPath);
      }
    }
  }

  for (const path of paths) {
    if (existsSync(path) && statSync(path).isDirectory()) {
      walkDir(path);
    } else {
      files.push(path);
    }
  }

  return files;
}
