#!/usr/bin/env node
/**
 * reqtrace CLI - collect traceability facts and report on them.
 *
 * Linked requirements: REQ-CLI-001 through REQ-CLI-005
 */

import { writeFileSync } from 'fs';
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import {
  findProjectRoot,
  loadConfig,
  resolveProjectPath,
  writeDefaultConfig,
  type ProjectConfig,
} from '../core/config.js';
import { ConfigError, ErrorCode, NotFoundError, ReqTraceError } from '../core/errors.js';
import { setLogLevel } from '../core/log.js';
import type { Diagnostic } from '../core/types.js';
import { ancestorsOf } from '../graph/closure.js';
import { FactStore } from '../storage/store.js';
import { expandRecordPaths } from '../storage/files.js';
import { ingestRecordFiles, type IngestResult } from '../storage/ingest.js';
import { isRecordKind, RECORD_KINDS } from '../storage/records.js';
import { collect } from '../reconcile/collect.js';
import { reconcile, type GenerationDiff } from '../reconcile/manager.js';
import { analyzeSnapshot } from '../status/analysis.js';
import { buildReport, renderJsonReport } from '../export/report.js';

interface Project {
  root: string;
  config: ProjectConfig;
  store: FactStore;
}

function parseGeneration(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Generation must be a positive integer.');
  }
  return parsed;
}

/**
 * Run `fn` against the project's fact store, closing it afterwards.
 */
function withProject<T>(fn: (project: Project) => T): T {
  const root = findProjectRoot();
  if (!root) {
    throw new ConfigError('Not in a reqtrace project (no reqtrace.yaml found)');
  }
  const config = loadConfig(root);
  const store = FactStore.open(resolveProjectPath(root, config.database));
  try {
    return fn({ root, config, store });
  } finally {
    store.close();
  }
}

/**
 * Wrap a command action so domain errors print and exit 1.
 */
function guarded<A extends unknown[]>(action: (...args: A) => void): (...args: A) => void {
  return (...args: A) => {
    try {
      action(...args);
    } catch (err) {
      if (!(err instanceof ReqTraceError)) throw err;
      console.error(chalk.red(`${err.code}: ${err.message}`));
      for (const [key, value] of Object.entries(err.details)) {
        if (key === 'issues') continue;
        console.error(chalk.gray(`  ${key}: ${JSON.stringify(value)}`));
      }
      process.exit(1);
    }
  };
}

function printIngest(kind: string, result: IngestResult): void {
  console.log(
    `${chalk.cyan(kind.padEnd(12))} ${chalk.green(`${result.added} added`)}, ${result.confirmed} confirmed` +
      (result.quarantined.length > 0 ? chalk.yellow(`, ${result.quarantined.length} quarantined`) : '')
  );
}

function printDiagnostics(diagnostics: readonly Diagnostic[]): void {
  for (const d of diagnostics) {
    console.log(chalk.yellow(`  ! ${d.message}`));
  }
}

function printDiff(diff: GenerationDiff): void {
  for (const [label, changes] of [
    ['requirements', diff.requirements],
    ['traces', diff.traces],
  ] as const) {
    console.log(
      `${chalk.cyan(label.padEnd(12))} ${chalk.green(`+${changes.added.length}`)} ${chalk.red(`-${changes.removed.length}`)} =${changes.unchanged.length}`
    );
    for (const id of changes.removed) console.log(chalk.red(`  - ${id}`));
  }
}

function flag(value: boolean): string {
  return value ? chalk.green('yes') : chalk.gray('no');
}

const program = new Command();

program
  .name('reqtrace')
  .description('Requirement traceability: collect traces, coverage and reviews, then report')
  .version('0.1.0')
  .option('-v, --verbose', 'Log debug output to stderr')
  .hook('preAction', (command) => {
    if (command.opts<{ verbose?: boolean }>().verbose) setLogLevel('debug');
  });

// Init command
program
  .command('init')
  .description('Create reqtrace.yaml in the current directory')
  .option('-f, --force', 'Overwrite an existing config')
  .action(
    guarded((options: { force?: boolean }) => {
      const filePath = writeDefaultConfig(process.cwd(), options.force ?? false);
      console.log(chalk.green(`Created ${filePath}`));
    })
  );

// Batch command
program
  .command('batch')
  .description('Start a new ingestion batch and print its generation')
  .option('-g, --generation <n>', 'Use this generation instead of the next one', parseGeneration)
  .action(
    guarded((options: { generation?: number }) => {
      withProject(({ store }) => {
        const generation = store.beginBatch(options.generation);
        console.log(generation);
      });
    })
  );

// Ingest command
program
  .command('ingest <kind> <paths...>')
  .description(`Ingest record files of one kind (${RECORD_KINDS.join(', ')})`)
  .option('-g, --generation <n>', 'Batch to stamp requirements and traces with (default: current)', parseGeneration)
  .action(
    guarded((kind: string, paths: string[], options: { generation?: number }) => {
      if (!isRecordKind(kind)) {
        throw new ReqTraceError(
          `Unknown record kind: ${kind}. Must be one of: ${RECORD_KINDS.join(', ')}`,
          ErrorCode.INVALID_INPUT,
          { kind }
        );
      }
      withProject(({ store }) => {
        const current = store.currentGeneration();
        const generation = options.generation ?? (current === 0 ? store.beginBatch() : current);
        const result = ingestRecordFiles(store, kind, expandRecordPaths(paths), generation);
        printIngest(kind, result);
        printDiagnostics(result.quarantined);
      });
    })
  );

// Collect command
program
  .command('collect')
  .description('Ingest every configured source as a new batch, then reconcile')
  .option('--confirm', 'Delete facts the batch did not re-confirm')
  .action(
    guarded((options: { confirm?: boolean }) => {
      withProject(({ root, config, store }) => {
        const result = collect(store, root, config, { confirm: options.confirm });
        console.log(chalk.bold(`Generation ${result.generation}`));
        for (const kind of RECORD_KINDS) printIngest(kind, result.ingested[kind]);
        console.log();
        const { diff, deleted } = result.reconciled;
        printDiff(diff);
        if (!deleted && diff.requirements.removed.length + diff.traces.removed.length > 0) {
          console.log(chalk.gray('Dry run. Re-run with --confirm to delete stale facts.'));
        }
        printDiagnostics(result.reconciled.diagnostics);
      });
    })
  );

// Reconcile command
program
  .command('reconcile')
  .description('Show facts not confirmed by a generation; delete them with --confirm')
  .option('-g, --generation <n>', 'Generation to reconcile against (default: current)', parseGeneration)
  .option('--confirm', 'Delete stale facts')
  .action(
    guarded((options: { generation?: number; confirm?: boolean }) => {
      withProject(({ store }) => {
        const result = reconcile(store, options);
        console.log(chalk.bold(`Generation ${result.diff.generation}`));
        printDiff(result.diff);
        const promoted = result.promoted;
        const total = promoted.traces + promoted.hierarchy + promoted.coverage + promoted.verifications;
        if (total > 0) console.log(chalk.green(`Promoted ${total} quarantined fact(s)`));
        console.log(result.deleted ? chalk.green('Stale facts deleted') : chalk.gray('Dry run, nothing deleted'));
        printDiagnostics(result.diagnostics);
      });
    })
  );

// Report command
program
  .command('report')
  .description('Write the JSON report')
  .option('-o, --out <path>', 'Output file, or - for stdout (default: report.out from config)')
  .option('--check', 'Exit with non-zero status if a deprecated requirement is still traced')
  .action(
    guarded((options: { out?: string; check?: boolean }) => {
      const valid = withProject(({ root, config, store }) => {
        const snapshot = store.snapshot();
        const analysis = analyzeSnapshot(snapshot, { maxDepth: config.maxDepth });
        const json = renderJsonReport(buildReport(snapshot, analysis));

        const out = options.out ?? resolveProjectPath(root, config.report.out);
        if (out === '-') {
          process.stdout.write(json);
        } else {
          writeFileSync(out, json, 'utf-8');
          const o = analysis.overview;
          console.log(chalk.green(`Report written to ${out}`));
          console.log(
            `${o.requirementCount} requirements: ${o.tracedCount} traced, ${o.coveredCount} covered, ${o.passedCount} passed`
          );
        }

        for (const id of analysis.invalid) {
          console.error(chalk.red(`Deprecated requirement is still traced: ${id}`));
        }
        return analysis.invalid.length === 0;
      });

      if (options.check && !valid) {
        process.exit(1);
      }
    })
  );

// Status command
program
  .command('status <id>')
  .description('Show the derived status of one requirement')
  .action(
    guarded((id: string) => {
      withProject(({ config, store }) => {
        const requirement = store.getRequirement(id);
        const analysis = analyzeSnapshot(store.snapshot(), { maxDepth: config.maxDepth });
        const status = analysis.statuses.get(id);
        if (!requirement || !status) {
          throw new NotFoundError('Requirement', id);
        }

        console.log(chalk.cyan(`${requirement.id}${requirement.annotation ? ` [${requirement.annotation}]` : ''}`));
        console.log(chalk.bold(requirement.title));
        console.log(chalk.gray(`Origin: ${requirement.origin} | Generation: ${requirement.generation}`));
        console.log();

        const index = analysis.graph.indexOf.get(id);
        if (index !== undefined) {
          const parents = analysis.graph.parents[index].map((p) => analysis.graph.ids[p]);
          const children = analysis.graph.children[index].map((c) => analysis.graph.ids[c]);
          if (parents.length > 0) console.log(`Parents:   ${parents.join(', ')}`);
          if (children.length > 0) console.log(`Children:  ${children.join(', ')}`);
          const ancestors = ancestorsOf(analysis.graph, id);
          if (ancestors.length > parents.length) console.log(`Ancestors: ${ancestors.join(', ')}`);
        }

        console.log(`Traced:    ${flag(status.traced)} (direct ${flag(status.directlyTraced)}, full ${flag(status.fullyTraced)})`);
        console.log(`Covered:   ${flag(status.covered)} (direct ${flag(status.directlyCovered)}, full ${flag(status.fullyCovered)})`);
        console.log(`Passed:    ${flag(status.passedCovered)}${status.failedCovered ? chalk.red(' (failing coverage)') : ''}`);
        if (status.manual) console.log(`Manual:    ${flag(true)}`);
        if (status.deprecated) {
          console.log(`Deprecated: ${flag(true)}${status.invalid ? chalk.red(' (still traced)') : ''}`);
        }
      });
    })
  );

// Unrelated command
program
  .command('unrelated')
  .description('List quarantined facts whose referent is still unknown')
  .action(
    guarded(() => {
      withProject(({ store }) => {
        const unrelated = store.unrelated();
        const count =
          unrelated.traces.length + unrelated.hierarchy.length + unrelated.coverage.length + unrelated.verifications.length;
        if (count === 0) {
          console.log(chalk.green('No quarantined facts'));
          return;
        }
        console.log(chalk.yellow(`QUARANTINED (${count} facts):\n`));
        for (const t of unrelated.traces) console.log(`  trace        ${t.reqId} @ ${t.filepath}:${t.line}`);
        for (const e of unrelated.hierarchy) console.log(`  hierarchy    ${e.childId} -> ${e.parentId}`);
        for (const c of unrelated.coverage) {
          console.log(`  coverage     ${c.reqId} @ ${c.traceFilepath}:${c.traceLine} by ${c.name}`);
        }
        for (const v of unrelated.verifications) console.log(`  verification ${v.reqId} in ${v.reviewName}`);
      });
    })
  );

// Prune command
program
  .command('prune')
  .description('Delete test runs and reviews that no longer back any fact')
  .action(
    guarded(() => {
      withProject(({ store }) => {
        const result = store.prune();
        console.log(`Pruned ${result.testRuns} test run(s) and ${result.reviews} review(s)`);
      });
    })
  );

// Clear command
program
  .command('clear')
  .description('Delete every collected fact')
  .action(
    guarded(() => {
      withProject(({ store }) => {
        store.clear();
        console.log(chalk.green('Fact store cleared'));
      });
    })
  );

program.parse();
