import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, vi, afterEach } from 'vitest';

import {
  ErrorCode,
  Scenario,
  getExitCode,
  toYaml,
} from '@episodic/core';
import { createProgram, main } from './index.js';

const ARENA = [
  'arena:',
  '  size: "${discrete: 5, 10}"',
  '  friction: "uniform: 0.1, 0.9"',
  '  walls: 4',
  '',
].join('\n');

const dirs: string[] = [];

async function createTemplateFixture(content: string): Promise<string> {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'episodic-cli-'));
  dirs.push(dir);
  const templatePath = path.join(dir, 'template.yaml');
  await writeFile(templatePath, content, 'utf8');
  return templatePath;
}

interface Captured {
  stdout: string[];
  stderr: string[];
  errors: string[];
  exitCodes: (string | number | null | undefined)[];
}

function captureOutput(): Captured {
  const captured: Captured = { stdout: [], stderr: [], errors: [], exitCodes: [] };
  vi.spyOn(process.stdout, 'write').mockImplementation(
    (chunk: string | Uint8Array) => {
      captured.stdout.push(String(chunk));
      return true;
    }
  );
  vi.spyOn(process.stderr, 'write').mockImplementation(
    (chunk: string | Uint8Array) => {
      captured.stderr.push(String(chunk));
      return true;
    }
  );
  vi.spyOn(console, 'error').mockImplementation((message?: unknown) => {
    captured.errors.push(String(message));
  });
  vi.spyOn(process, 'exit').mockImplementation(((
    code?: string | number | null
  ) => {
    captured.exitCodes.push(code);
    return undefined;
  }) as never);
  return captured;
}

async function run(args: string[]): Promise<void> {
  await createProgram().parseAsync(args, { from: 'user' });
}

afterEach(async () => {
  vi.restoreAllMocks();
  await Promise.all(
    dirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true }))
  );
});

describe('CLI resolve command', () => {
  it('emits one NDJSON line per episode', async () => {
    const templatePath = await createTemplateFixture(ARENA);
    const out = captureOutput();

    await run([
      'resolve',
      '--template',
      templatePath,
      '--count',
      '3',
      '--seed',
      '7',
      '--out',
      'ndjson',
    ]);

    const reference = new Scenario({ template: ARENA, seed: 7 });
    const expected = Array.from(
      { length: 3 },
      () => `${JSON.stringify(reference.resolve().scenario)}\n`
    ).join('');
    expect(out.stdout.join('')).toBe(expected);
    expect(out.stderr).toEqual([]);
    expect(out.exitCodes).toEqual([]);
  });

  it('prints a JSON array by default', async () => {
    const templatePath = await createTemplateFixture(ARENA);
    const out = captureOutput();

    await run(['resolve', '-t', templatePath, '--seed', '1']);

    const parsed: unknown = JSON.parse(out.stdout.join(''));
    expect(parsed).toEqual([
      {
        arena: {
          size: expect.any(Number),
          friction: expect.any(Number),
          walls: 4,
        },
      },
    ]);
  });

  it('adds provenance on request', async () => {
    const templatePath = await createTemplateFixture(ARENA);
    const out = captureOutput();

    await run(['resolve', '-t', templatePath, '--seed', '1', '--provenance']);

    const reference = new Scenario({ template: ARENA, seed: 1 }).resolve();
    expect(JSON.parse(out.stdout.join(''))).toEqual([
      { scenario: reference.scenario, provenance: reference.provenance },
    ]);
  });

  it('separates YAML documents', async () => {
    const templatePath = await createTemplateFixture(ARENA);
    const out = captureOutput();

    await run(['resolve', '-t', templatePath, '-c', '2', '--seed', '1', '--out', 'yaml']);

    const reference = new Scenario({ template: ARENA, seed: 1 });
    const expected = [reference.resolve(), reference.resolve()].map((result) =>
      toYaml(result.scenario)
    );
    expect(out.stdout.join('').split('---\n')).toEqual(expected);
  });

  it('replicates across environments', async () => {
    const templatePath = await createTemplateFixture('x: "${bernoulli: 1}"\n');
    const out = captureOutput();

    await run(['resolve', '-t', templatePath, '--seed', '1', '--num-env', '3']);

    expect(out.stdout.join('')).toBe(`${JSON.stringify([{ x: [1, 1, 1] }], null, 2)}\n`);
  });

  it('reports the drawn seed when none is given', async () => {
    const templatePath = await createTemplateFixture(ARENA);
    const out = captureOutput();

    await run(['resolve', '-t', templatePath]);

    expect(out.stderr).toHaveLength(1);
    expect(out.stderr[0]).toMatch(/^\[episodic\] seed=\d+\n$/);
  });

  it('warns once per node about ignored arguments', async () => {
    const templatePath = await createTemplateFixture('x: "${bernoulli: 1, 3}"\n');
    const out = captureOutput();

    await run(['resolve', '-t', templatePath, '-c', '2', '--seed', '1']);

    expect(out.stderr).toEqual([
      "[episodic] warning: EXCESS_DISTRIBUTION_ARGS at 'x': bernoulli takes 1 argument(s), got 2; extra arguments ignored\n",
    ]);
  });

  it('prints every diagnostic as JSON on request', async () => {
    const templatePath = await createTemplateFixture('x: "${bernoulli: 1, 3}"\n');
    const out = captureOutput();

    await run([
      'resolve',
      '-t',
      templatePath,
      '-c',
      '2',
      '--seed',
      '1',
      '--print-diagnostics',
    ]);

    const line = `[episodic] diagnostic: ${JSON.stringify({
      code: 'EXCESS_DISTRIBUTION_ARGS',
      path: 'x',
      details: { distribution: 'bernoulli', expected: 1, received: 2 },
    })}\n`;
    expect(out.stderr).toEqual([line, line]);
  });
});

describe('CLI check command', () => {
  it('lists randomized paths with their shapes', async () => {
    const templatePath = await createTemplateFixture(
      'a:\n  b: "${uniform: 0, 1}"\nv: "gaussian_2d: 0, 1"\nn: 3\n'
    );
    const out = captureOutput();

    await run(['check', '-t', templatePath, '--seed', '1']);

    expect(out.stdout.join('')).toBe('a.b\tuniform\t[]\nv\tgaussian_2d\t[2]\n');
    expect(out.stderr).toEqual(['[episodic] template ok: 2 randomized path(s)\n']);
  });

  it('prints nothing on stdout for a template without expressions', async () => {
    const templatePath = await createTemplateFixture('n: 3\n');
    const out = captureOutput();

    await run(['check', '-t', templatePath]);

    expect(out.stdout).toEqual([]);
    expect(out.stderr).toEqual(['[episodic] template ok: 0 randomized path(s)\n']);
  });
});

describe('CLI errors', () => {
  it('exits with the code of an invalid distribution', async () => {
    const templatePath = await createTemplateFixture(
      'x: "${discrete: low=2.5, high=9}"\n'
    );
    const out = captureOutput();

    await run(['resolve', '-t', templatePath, '--seed', '1']);

    expect(out.exitCodes).toEqual([
      getExitCode(ErrorCode.INVALID_DISTRIBUTION_SPEC),
    ]);
    expect(out.errors).toEqual([
      [
        "Error E100: Invalid parameters for discrete at 'x': 'low' must be an integer",
        '  Location: x (discrete)',
        '  | ${discrete: low=2.5, high=9}',
      ].join('\n'),
    ]);
    expect(out.stdout).toEqual([]);
  });

  it('points at the column where a malformed expression stops parsing', async () => {
    const templatePath = await createTemplateFixture('x: "${uniform: 0,}"\n');
    const out = captureOutput();

    await run(['resolve', '-t', templatePath, '--seed', '1']);

    expect(out.exitCodes).toEqual([getExitCode(ErrorCode.EXPRESSION_PARSE_FAILED)]);
    expect(out.errors).toEqual([
      [
        "Error E110: Malformed expression at 'x': Trailing comma at position 13",
        '  Location: x',
        '  | ${uniform: 0,}',
        `  | ${' '.repeat(13)}^`,
      ].join('\n'),
    ]);
  });

  it('suggests a name for an unknown distribution', async () => {
    const templatePath = await createTemplateFixture('x: "${gaussain: 0, 1}"\n');
    const out = captureOutput();

    await run(['resolve', '-t', templatePath, '--seed', '1']);

    expect(out.exitCodes).toEqual([11]);
    expect(out.errors[0]).toContain("Hint: Did you mean 'gaussian'?");
  });

  it('requires a template', async () => {
    const out = captureOutput();

    await main(['node', 'episodic', 'resolve']);

    expect(out.exitCodes).toEqual([30]);
    expect(out.errors).toEqual(['Error E300: Missing --template <file>']);
  });

  it('reports a missing template file', async () => {
    const out = captureOutput();
    const missing = path.join(os.tmpdir(), 'episodic-missing', 'nope.yaml');

    await run(['resolve', '-t', missing]);

    expect(out.exitCodes).toEqual([31]);
    expect(out.errors).toEqual([`Error E310: Template file not found: ${missing}`]);
  });

  it('rejects an unknown output format', async () => {
    const templatePath = await createTemplateFixture(ARENA);
    const out = captureOutput();

    await run(['resolve', '-t', templatePath, '--out', 'xml']);

    expect(out.exitCodes).toEqual([30]);
    expect(out.errors).toEqual([
      "Error E300: Invalid --out value 'xml': expected json|ndjson|yaml",
    ]);
  });
});
