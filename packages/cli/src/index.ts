#!/usr/bin/env node

// CLI entry point
// - Command name: `episodic` with subcommands `resolve` and `check`.
// - `resolve` loads a YAML/JSON template, resolves it --count times against one
//   Scenario (so distributions are created once and sampled per episode) and
//   prints the concrete trees as JSON, NDJSON or YAML.
// - `check` resolves once and lists every randomized path with its
//   distribution and output shape.
// Diagnostics and notices go to stderr with an `[episodic]` prefix; errors are
// rendered through ErrorPresenter and exit with the code's exit status.

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  ConfigError,
  ErrorCode,
  ErrorPresenter,
  InternalError,
  Scenario,
  type DiagnosticListener,
  type PlainValue,
  type ScenarioError,
  isScenarioError,
  toYaml,
} from '@episodic/core';
import { renderCLIView, renderDiagnostic } from './render.js';
import {
  type CliOptions,
  type OutputFormat,
  resolveCount,
  resolveNumEnv,
  resolveOutputFormat,
  resolveSeed,
} from './flags.js';

function readTemplate(file: string | undefined): string {
  if (!file) {
    throw new ConfigError({
      message: 'Missing --template <file>',
      context: { setting: 'template' },
    });
  }
  const abs = path.resolve(process.cwd(), file);
  if (!fs.existsSync(abs)) {
    throw new ConfigError({
      message: `Template file not found: ${abs}`,
      errorCode: ErrorCode.TEMPLATE_LOAD_FAILED,
      context: { setting: 'template', value: abs },
    });
  }
  return fs.readFileSync(abs, 'utf8');
}

/**
 * Plain warnings are printed once per node; JSON mode prints every
 * occurrence.
 */
function createDiagnosticPrinter(asJson: boolean): DiagnosticListener {
  const seen = new Set<string>();
  return (diagnostic) => {
    if (asJson) {
      process.stderr.write(
        `[episodic] diagnostic: ${JSON.stringify(diagnostic)}\n`
      );
      return;
    }
    const key = `${diagnostic.code}:${diagnostic.path}`;
    if (seen.has(key)) return;
    seen.add(key);
    process.stderr.write(`${renderDiagnostic(diagnostic)}\n`);
  };
}

function formatItems(items: PlainValue[], format: OutputFormat): string {
  switch (format) {
    case 'ndjson':
      return items.map((item) => `${JSON.stringify(item)}\n`).join('');
    case 'yaml':
      return items.map((item) => toYaml(item)).join('---\n');
    case 'json':
      return `${JSON.stringify(items, null, 2)}\n`;
  }
}

function runResolve(options: CliOptions): void {
  const template = readTemplate(options.template);
  const count = resolveCount(options.count);
  const seed = resolveSeed(options.seed);
  const numEnv = resolveNumEnv(options.numEnv);
  const format = resolveOutputFormat(options.out);

  const scenario = new Scenario({
    template,
    seed,
    numEnv,
    scenarioId: options.scenarioId,
    onDiagnostic: createDiagnosticPrinter(options.printDiagnostics === true),
  });
  if (seed === undefined) {
    process.stderr.write(`[episodic] seed=${scenario.seed}\n`);
  }

  const items: PlainValue[] = [];
  for (let i = 0; i < count; i++) {
    const result = scenario.resolve();
    items.push(
      options.provenance === true
        ? { scenario: result.scenario, provenance: result.provenance }
        : result.scenario
    );
  }

  process.stdout.write(formatItems(items, format));
}

function runCheck(options: CliOptions): void {
  const template = readTemplate(options.template);
  const scenario = new Scenario({
    template,
    seed: resolveSeed(options.seed),
    numEnv: resolveNumEnv(options.numEnv),
    onDiagnostic: createDiagnosticPrinter(false),
  });
  scenario.resolve();

  const types = scenario.distributionTypes();
  const paths = scenario.expressionPaths;
  const lines = paths.map((nodePath) => {
    const shape = scenario.describeDistribution(nodePath)?.shape ?? [];
    return `${nodePath}\t${types[nodePath] ?? '?'}\t${JSON.stringify(shape)}`;
  });
  if (lines.length > 0) {
    process.stdout.write(`${lines.join('\n')}\n`);
  }
  process.stderr.write(
    `[episodic] template ok: ${paths.length} randomized path(s)\n`
  );
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('episodic')
    .description('Resolve randomized scenario templates into concrete episodes')
    .version('0.1.0');

  program
    .command('resolve')
    .description('Resolve a template into one or more concrete scenarios')
    .option('-t, --template <file>', 'Template file (YAML or JSON)')
    .option('-c, --count <number>', 'Number of episodes to resolve', '1')
    .option('--seed <number>', 'Deterministic seed (random when omitted)')
    .option('--num-env <number>', 'Replicate every sample across N environments')
    .option('--scenario-id <id>', "Scenario id: 'name' or 'name:version'")
    .option('--out <format>', 'Output format: json|ndjson|yaml', 'json')
    .option('--provenance', 'Emit { scenario, provenance } per episode', false)
    .option('--print-diagnostics', 'Print diagnostics as JSON to stderr', false)
    .action(async (options: CliOptions) => {
      try {
        runResolve(options);
      } catch (err: unknown) {
        await handleCliError(err);
      }
    });

  program
    .command('check')
    .description('Resolve a template once and list its randomized paths')
    .option('-t, --template <file>', 'Template file (YAML or JSON)')
    .option('--seed <number>', 'Deterministic seed (random when omitted)')
    .option('--num-env <number>', 'Replicate every sample across N environments')
    .action(async (options: CliOptions) => {
      try {
        runCheck(options);
      } catch (err: unknown) {
        await handleCliError(err);
      }
    });

  return program;
}

async function handleCliError(err: unknown): Promise<never> {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: true });

  let error: ScenarioError;
  if (isScenarioError(err)) {
    error = err;
  } else {
    const message = err instanceof Error ? err.message : String(err);
    error = new InternalError(
      message || 'Unexpected error',
      err instanceof Error ? err : undefined
    );
  }

  const view = presenter.formatForCLI(error);
  console.error(renderCLIView(view));

  process.exit(error.getExitCode());
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv).catch(handleCliError);
}

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
