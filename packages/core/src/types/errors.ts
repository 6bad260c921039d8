/**
 * Error hierarchy for episodic
 * Structured errors carrying a stable code and the context needed to locate
 * the failing template node.
 */

import {
  ErrorCode,
  type Severity,
  getExitCode as _getExitCode,
} from '../errors/codes.js';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  path?: string; // Dotted/bracketed template path (e.g., 'robot.arms[0].mass')
  distribution?: string; // Distribution name as written in the template
  args?: unknown[]; // Raw positional arguments
  kwargs?: Record<string, unknown>; // Raw keyword arguments
  source?: string; // Raw expression text
  value?: unknown; // Problematic value
  setting?: string; // Configuration setting name
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface UserError {
  message: string;
  code: ErrorCode;
  severity: Severity;
  path?: string;
}

export interface ScenarioErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
}

type SubclassParams = Omit<ScenarioErrorParams, 'errorCode'> & {
  errorCode?: ErrorCode;
};

const SENSITIVE_KEYS = new Set(['password', 'apiKey', 'secret', 'token']);

/**
 * Base error class for all episodic errors
 */
export abstract class ScenarioError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  public suggestions?: string[];

  constructor(params: ScenarioErrorParams) {
    const { message, errorCode, severity = 'error', context, cause } = params;
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack and full context
   * - prod: excludes stack and redacts sensitive keys in context.value
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context:
        env === 'prod' ? this.#redactContext(this.context) : this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  /** Return a minimal, safe structure for external exposure */
  toUserError(): UserError {
    return {
      message: this.message,
      code: this.errorCode,
      severity: this.severity,
      path: this.context?.path,
    };
  }

  /** Resolve the process exit code associated with this error */
  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }

  #redactContext(context?: ErrorContext): ErrorContext | undefined {
    if (!context) return context;

    const redactValue = (val: unknown): unknown => {
      if (Array.isArray(val)) return val.map(redactValue);
      if (val && typeof val === 'object') {
        const out: Record<string, unknown> = {};
        for (const [k, v] of Object.entries(val)) {
          out[k] = SENSITIVE_KEYS.has(k) ? '[REDACTED]' : redactValue(v);
        }
        return out;
      }
      return val;
    };

    const redacted: ErrorContext = { ...context };
    if ('value' in redacted) {
      redacted.value = redactValue(redacted.value);
    }
    return redacted;
  }
}

/**
 * Unknown distribution, bad arity, bad parameter type or shape
 */
export class InvalidDistributionSpecError extends ScenarioError {
  constructor(params: SubclassParams) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.INVALID_DISTRIBUTION_SPEC,
    });
  }

  get path(): string | undefined {
    return this.context?.path;
  }

  get distribution(): string | undefined {
    return this.context?.distribution;
  }
}

/**
 * Malformed expression text inside a template leaf
 */
export class ExpressionParseError extends ScenarioError {
  constructor(params: SubclassParams & { position?: number }) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.EXPRESSION_PARSE_FAILED,
      context: { ...params.context, position: params.position },
    });
  }

  get position(): number | undefined {
    const position = this.context?.position;
    return typeof position === 'number' ? position : undefined;
  }
}

/**
 * Malformed scenario identifier or version string
 */
export class InvalidScenarioIdError extends ScenarioError {
  constructor(params: SubclassParams) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.INVALID_SCENARIO_ID,
    });
  }
}

export type DuplicateLogKeyReason = 'reserved' | 'duplicate';

/**
 * Reserved or already-populated log key
 */
export class DuplicateLogKeyError extends ScenarioError {
  public readonly key: string;
  public readonly reason: DuplicateLogKeyReason;

  constructor(key: string, reason: DuplicateLogKeyReason) {
    super({
      message:
        reason === 'reserved'
          ? `'${key}' is a reserved name and is not allowed`
          : `Cannot log value for key '${key}': a value is already logged`,
      errorCode: ErrorCode.DUPLICATE_LOG_KEY,
      context: { key, reason },
    });
    this.key = key;
    this.reason = reason;
  }
}

/**
 * Configuration and setup errors
 */
export class ConfigError extends ScenarioError {
  constructor(params: SubclassParams) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.CONFIGURATION_ERROR,
    });
  }

  get setting(): string | undefined {
    return this.context?.setting;
  }
}

/**
 * Episode lifecycle misuse (finishing twice, logging after finish)
 */
export class EpisodeStateError extends ScenarioError {
  constructor(message: string, context?: ErrorContext) {
    super({ message, errorCode: ErrorCode.EPISODE_STATE, context });
  }
}

/**
 * A resolution was requested while another one was in progress
 */
export class ScenarioBusyError extends ScenarioError {
  constructor(scenarioId: string) {
    super({
      message: `Scenario ${scenarioId} is already resolving`,
      errorCode: ErrorCode.SCENARIO_BUSY,
      context: { scenarioId },
    });
  }
}

/**
 * Fallback for unexpected failures surfaced through the presenter
 */
export class InternalError extends ScenarioError {
  constructor(message: string, cause?: Error) {
    super({ message, errorCode: ErrorCode.INTERNAL_ERROR, cause });
  }
}

export function isScenarioError(error: unknown): error is ScenarioError {
  return error instanceof ScenarioError;
}
