/**
 * ErrorPresenter - pure presentation layer for ScenarioError instances
 * - No business logic; formats into environment-specific view objects
 */

import type { ErrorCode } from './codes.js';
import type {
  ErrorContext,
  ScenarioError,
  SerializedError,
} from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
  redactKeys?: string[];
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  location?: string;
  excerpt?: string;
  /** Column in `excerpt` where parsing stopped. */
  caret?: number;
  workaround?: string;
  colors: boolean;
  terminalWidth: number;
}

export type ProductionView = SerializedError;

const DEFAULT_REDACT_KEYS = ['password', 'apiKey', 'secret', 'token'];
const EXCERPT_LIMIT = 120;

export class ErrorPresenter {
  constructor(
    private readonly _env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: ScenarioError): CLIErrorView {
    return {
      title: this.#formatTitle(error),
      code: error.errorCode,
      location: this.#formatLocation(error.context),
      excerpt: this.#formatExcerpt(error.context),
      caret: this.#formatCaret(error.context),
      workaround: error.suggestions?.[0],
      colors: this.#shouldUseColors(this.options.colors),
      terminalWidth: this.options.terminalWidth || 80,
    };
  }

  formatForProduction(error: ScenarioError): ProductionView {
    // toJSON('prod') handles the built-in keys; presenter keys are applied on top
    return this.#applyAdditionalRedaction(error.toJSON('prod'));
  }

  #formatTitle(error: ScenarioError): string {
    return `Error ${error.errorCode}: ${error.message}`;
  }

  #formatLocation(ctx?: ErrorContext): string | undefined {
    if (!ctx?.path) return undefined;
    return ctx.distribution
      ? `Location: ${ctx.path} (${ctx.distribution})`
      : `Location: ${ctx.path}`;
  }

  #formatExcerpt(ctx?: ErrorContext): string | undefined {
    const source = ctx?.source;
    if (typeof source !== 'string' || source.length === 0) return undefined;
    return source.length > EXCERPT_LIMIT
      ? `${source.slice(0, EXCERPT_LIMIT)}…`
      : source;
  }

  #formatCaret(ctx?: ErrorContext): number | undefined {
    const position = ctx?.position;
    const source = ctx?.source;
    if (typeof position !== 'number' || typeof source !== 'string') {
      return undefined;
    }
    return position <= Math.min(source.length, EXCERPT_LIMIT) ? position : undefined;
  }

  #shouldUseColors(opt?: boolean): boolean {
    const noColor = process.env.NO_COLOR;
    const force = process.env.FORCE_COLOR;
    if (noColor && noColor !== '0' && noColor !== 'false') return false;
    if (force && force !== '0' && force !== 'false') return true;
    if (typeof opt === 'undefined') return this._env === 'dev';
    return opt;
  }

  #applyAdditionalRedaction(view: SerializedError): SerializedError {
    const keys = new Set(this.options.redactKeys ?? DEFAULT_REDACT_KEYS);
    const redactor = (val: unknown): unknown => {
      if (Array.isArray(val)) return val.map(redactor);
      if (val && typeof val === 'object') {
        const out: Record<string, unknown> = {};
        for (const [k, v] of Object.entries(val)) {
          out[k] = keys.has(k) ? '[REDACTED]' : redactor(v);
        }
        return out;
      }
      return val;
    };
    if (view.context && 'value' in view.context) {
      return {
        ...view,
        context: { ...view.context, value: redactor(view.context.value) },
      };
    }
    return view;
  }
}
