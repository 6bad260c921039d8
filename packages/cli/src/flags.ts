import { ConfigError } from '@episodic/core';

export type OutputFormat = 'json' | 'ndjson' | 'yaml';

const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'ndjson', 'yaml'];

/**
 * CLI options as commander hands them over
 */
export interface CliOptions {
  template?: string;
  count?: string | number;
  seed?: string | number;
  numEnv?: string | number;
  scenarioId?: string;
  out?: string;
  provenance?: boolean;
  printDiagnostics?: boolean;
}

function parseInteger(
  setting: string,
  value: string | number,
  min: number
): number {
  const text = String(value).trim();
  const parsed = /^[+-]?\d+$/.test(text) ? Number(text) : Number.NaN;
  if (!Number.isSafeInteger(parsed) || parsed < min) {
    throw new ConfigError({
      message: `Invalid --${setting} value '${String(value)}': expected an integer >= ${min}`,
      context: { setting, value },
    });
  }
  return parsed;
}

export function resolveCount(count: string | number | undefined): number {
  if (count === undefined) return 1;
  return parseInteger('count', count, 1);
}

export function resolveSeed(
  seed: string | number | undefined
): number | undefined {
  if (seed === undefined) return undefined;
  return parseInteger('seed', seed, 0);
}

export function resolveNumEnv(
  numEnv: string | number | undefined
): number | undefined {
  if (numEnv === undefined) return undefined;
  return parseInteger('num-env', numEnv, 1);
}

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

export function resolveOutputFormat(out: string | undefined): OutputFormat {
  const format = (out ?? 'json').toLowerCase();
  if (!isOutputFormat(format)) {
    throw new ConfigError({
      message: `Invalid --out value '${out ?? ''}': expected ${OUTPUT_FORMATS.join('|')}`,
      context: { setting: 'out', value: out },
    });
  }
  return format;
}
