/**
 * Tests for project configuration.
 *
 * Linked requirements: REQ-CLI-001
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  CONFIG_FILE,
  findProjectRoot,
  loadConfig,
  parseConfig,
  resolveProjectPath,
  writeDefaultConfig,
} from '../../src/core/config.js';
import { ConfigError } from '../../src/core/errors.js';

describe('parseConfig', () => {
  it('should fill in defaults for an empty file', () => {
    expect(parseConfig('')).toEqual({
      database: 'reqtrace.db',
      requirements: [],
      traces: [],
      coverage: [],
      reviews: [],
      report: { out: 'reqtrace-report.json' },
      maxDepth: 10_000,
    });
  });

  it('should read source lists', () => {
    const config = parseConfig('database: ":memory:"\nrequirements: [reqs]\nmaxDepth: 50\n');

    expect(config.database).toBe(':memory:');
    expect(config.requirements).toEqual(['reqs']);
    expect(config.maxDepth).toBe(50);
  });

  it('should reject unknown keys', () => {
    expect(() => parseConfig('databse: x.db\n')).toThrow(ConfigError);
  });

  it('should reject invalid YAML', () => {
    expect(() => parseConfig('requirements: [unclosed\n', 'broken.yaml')).toThrow(
      /Could not parse 'broken.yaml'/
    );
  });

  it('should reject a non-positive depth bound', () => {
    expect(() => parseConfig('maxDepth: 0\n')).toThrow(/maxDepth/);
  });
});

describe('project files', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'reqtrace-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should find the root from a nested directory', () => {
    writeFileSync(join(dir, CONFIG_FILE), 'traces: []\n');
    const nested = join(dir, 'a', 'b');
    mkdirSync(nested, { recursive: true });

    expect(findProjectRoot(nested)).toBe(dir);
  });

  it('should write a default config once', () => {
    const filePath = writeDefaultConfig(dir);

    expect(readFileSync(filePath, 'utf-8')).toContain('database: reqtrace.db');
    expect(loadConfig(dir).report.out).toBe('reqtrace-report.json');
    expect(() => writeDefaultConfig(dir)).toThrow(ConfigError);
    expect(() => writeDefaultConfig(dir, true)).not.toThrow();
  });

  it('should fail without a config file', () => {
    expect(() => loadConfig(dir)).toThrow(ConfigError);
  });

  it('should resolve project paths', () => {
    expect(resolveProjectPath(dir, 'reqtrace.db')).toBe(join(dir, 'reqtrace.db'));
    expect(resolveProjectPath(dir, ':memory:')).toBe(':memory:');
    expect(resolveProjectPath(dir, '/abs/x.db')).toBe('/abs/x.db');
  });
});
