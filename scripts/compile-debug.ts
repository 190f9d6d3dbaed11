#!/usr/bin/env npx tsx
/**
 * Compile Debug Script
 *
 * Compiles a JSON query against a JSON metrics view and prints the stages.
 * Dialect and row cap come from METRICS_SQL_* environment variables.
 *
 * Usage:
 *   npx tsx scripts/compile-debug.ts scripts/examples/query.json scripts/examples/view.json
 *   npx tsx scripts/compile-debug.ts --plan query.json view.json
 *   METRICS_SQL_DIALECT=druid npx tsx scripts/compile-debug.ts --all query.json view.json
 *
 * Output Modes:
 *   --query   Show the query after the rewrite passes
 *   --plan    Show the plan tree
 *   --sql     Show SQL and arguments (default)
 *   --all     Show all stages
 */

import * as fs from 'fs';
import {
  compilerOptionsFromEnv,
  createCompiler,
  createConsoleLogger,
  isCompileError,
  parseMetricsView,
  parseQuery,
  printPlanTree,
} from '../packages/index.js';

type Mode = 'query' | 'plan' | 'sql' | 'all';

const MODES = new Set<string>(['query', 'plan', 'sql', 'all']);

function parseArgs(argv: string[]): { mode: Mode; files: string[] } {
  let mode: Mode = 'sql';
  const files: string[] = [];
  for (const arg of argv) {
    if (arg.startsWith('--')) {
      const flag = arg.slice(2);
      if (flag === 'query' || flag === 'plan' || flag === 'sql' || flag === 'all') {
        mode = flag;
      } else {
        throw new Error(`Unknown flag ${arg} (expected one of ${[...MODES].map(m => `--${m}`).join(', ')})`);
      }
    } else {
      files.push(arg);
    }
  }
  return { mode, files };
}

function readJson(file: string): unknown {
  return JSON.parse(fs.readFileSync(file, 'utf-8'));
}

async function main(): Promise<void> {
  const { mode, files } = parseArgs(process.argv.slice(2));
  const [queryFile, viewFile] = files;
  if (!queryFile || !viewFile) {
    console.error('Usage: compile-debug.ts [--query|--plan|--sql|--all] <query.json> <view.json>');
    process.exitCode = 1;
    return;
  }

  const compiler = createCompiler({
    ...compilerOptionsFromEnv(),
    logger: createConsoleLogger({ level: 'debug', name: 'compile-debug' }),
  });
  const query = parseQuery(readJson(queryFile));
  const view = parseMetricsView(readJson(viewFile));

  console.log('='.repeat(70));
  console.log(`${view.name} on ${compiler.dialect.name}`);
  console.log('='.repeat(70));

  const result = await compiler.compile(query, view);

  if (mode === 'query' || mode === 'all') {
    console.log('\n--- Rewritten Query ---');
    console.log(JSON.stringify(result.query, null, 2));
  }
  if (mode === 'plan' || mode === 'all') {
    console.log('\n--- Plan Tree ---');
    console.log(printPlanTree(result.plan));
  }
  if (mode === 'sql' || mode === 'all') {
    console.log('\n--- SQL ---');
    console.log(result.sql);
    console.log('\n--- Arguments ---');
    result.args.forEach((arg, i) => {
      console.log(`  ${i + 1}: ${arg instanceof Date ? arg.toISOString() : JSON.stringify(arg)}`);
    });
    if (result.cap !== undefined) {
      console.log(`\nrow cap ${result.cap} in effect (statement asks for ${result.cap + 1} rows)`);
    }
  }
}

main().catch((error: unknown) => {
  if (isCompileError(error)) {
    console.error(`${error.name} [${error.code}]: ${error.message}`);
  } else {
    console.error(error);
  }
  process.exitCode = 1;
});
