import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { ErrorPresenter } from '../presenter.js';
import { ErrorCode } from '../codes.js';
import {
  ConfigError,
  ExpressionParseError,
  InvalidDistributionSpecError,
} from '../../types/errors.js';

describe('ErrorPresenter', () => {
  const origEnv = { ...process.env };

  beforeEach(() => {
    process.env.NO_COLOR = '';
    process.env.FORCE_COLOR = '';
  });

  afterEach(() => {
    process.env = { ...origEnv };
  });

  test('CLI view carries title, location, excerpt and first suggestion', () => {
    const err = new InvalidDistributionSpecError({
      message: 'Unknown distribution',
      errorCode: ErrorCode.UNKNOWN_DISTRIBUTION,
      context: {
        path: 'robot.mass',
        distribution: 'unifrom',
        source: '${unifrom: 1, 2}',
      },
    });
    err.suggestions = ["Did you mean 'uniform'?"];

    const cli = new ErrorPresenter('dev', { colors: false }).formatForCLI(err);
    expect(cli).toEqual({
      title: 'Error E101: Unknown distribution',
      code: ErrorCode.UNKNOWN_DISTRIBUTION,
      location: 'Location: robot.mass (unifrom)',
      excerpt: '${unifrom: 1, 2}',
      workaround: "Did you mean 'uniform'?",
      colors: false,
      terminalWidth: 80,
    });
  });

  test('CLI view omits location without a path and truncates long excerpts', () => {
    const source = `\${categorical: [${'a,'.repeat(80)}a]}`;
    const err = new ConfigError({ message: 'Bad', context: { source } });
    const cli = new ErrorPresenter('dev', {}).formatForCLI(err);
    expect(cli.location).toBeUndefined();
    expect(cli.excerpt).toBe(`${source.slice(0, 120)}…`);
  });

  test('CLI view points at the failing column of a malformed expression', () => {
    const err = new ExpressionParseError({
      message: 'Trailing comma at position 13',
      position: 13,
      context: { path: 'x', source: '${uniform: 0,}' },
    });
    const cli = new ErrorPresenter('dev', { colors: false }).formatForCLI(err);
    expect(cli.location).toBe('Location: x');
    expect(cli.excerpt).toBe('${uniform: 0,}');
    expect(cli.caret).toBe(13);

    const long = `\${categorical: [${'a,'.repeat(80)}a,]}`;
    const clipped = new ExpressionParseError({
      message: 'Trailing comma',
      position: long.length - 2,
      context: { source: long },
    });
    expect(new ErrorPresenter('dev').formatForCLI(clipped).caret).toBeUndefined();
  });

  test('CLI view respects NO_COLOR and FORCE_COLOR', () => {
    const err = new ConfigError({ message: 'Invalid' });

    process.env.NO_COLOR = '1';
    let cli = new ErrorPresenter('dev', { colors: true }).formatForCLI(err);
    expect(cli.colors).toBe(false);

    process.env.NO_COLOR = '';
    process.env.FORCE_COLOR = '1';
    cli = new ErrorPresenter('dev', { colors: false }).formatForCLI(err);
    expect(cli.colors).toBe(true);
  });

  test('colors default to on in dev and off in prod', () => {
    const err = new ConfigError({ message: 'Invalid' });
    expect(new ErrorPresenter('dev').formatForCLI(err).colors).toBe(true);
    expect(new ErrorPresenter('prod').formatForCLI(err).colors).toBe(false);
  });

  test('production redacts sensitive fields deeply and omits stack', () => {
    const err = new ConfigError({
      message: 'Invalid options',
      context: {
        value: {
          credentials: { password: 'test-password', nested: [{ token: 't' }] },
          seed: 7,
        },
      },
    });
    const prod = new ErrorPresenter('prod', {
      redactKeys: ['password', 'token'],
    }).formatForProduction(err);

    expect(prod.stack).toBeUndefined();
    expect(prod.context?.value).toEqual({
      credentials: {
        password: '[REDACTED]',
        nested: [{ token: '[REDACTED]' }],
      },
      seed: 7,
    });
  });
});
