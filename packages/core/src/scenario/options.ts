import { randomUUID } from 'node:crypto';
import AjvModule, { type ErrorObject } from 'ajv';

import type { TemplateSource } from '../template/load.js';
import { ConfigError, InvalidScenarioIdError } from '../types/errors.js';
import { MAX_SEED } from '../util/rng.js';
import type { DiagnosticListener } from './diagnostics.js';

const Ajv = AjvModule.default;

export interface ScenarioOptions {
  /** YAML text or a plain tree; nothing means an empty mapping. */
  template?: TemplateSource;
  /** Integer seed; a random one is drawn when omitted. */
  seed?: number;
  /** Parallel environments every sample is replicated across. */
  numEnv?: number;
  /** `name` or `name:version`. */
  scenarioId?: string;
  onDiagnostic?: DiagnosticListener;
}

export interface ScenarioSettings {
  seed?: number;
  numEnv?: number;
  scenarioId?: string;
}

const SETTINGS_SCHEMA = {
  type: 'object',
  additionalProperties: false,
  properties: {
    seed: { type: 'integer', minimum: 0, maximum: MAX_SEED },
    numEnv: { type: 'integer', minimum: 1 },
    scenarioId: { type: 'string' },
  },
} as const;

const ajv = new Ajv({ allErrors: true, strict: true });
const validateSettings = ajv.compile<ScenarioSettings>(SETTINGS_SCHEMA);

/**
 * Check the scalar settings of `options`; the template is validated when it
 * is built. Undefined entries are treated as absent.
 */
export function validateScenarioSettings(
  options: ScenarioOptions
): ScenarioSettings {
  const candidate: Record<string, unknown> = {};
  for (const key of ['seed', 'numEnv', 'scenarioId'] as const) {
    if (options[key] !== undefined) candidate[key] = options[key];
  }

  if (validateSettings(candidate)) {
    return candidate;
  }

  const [first] = validateSettings.errors ?? [];
  const setting = first ? settingName(first) : undefined;
  throw new ConfigError({
    message: `Invalid scenario options: ${formatErrors(validateSettings.errors)}`,
    context: {
      setting,
      value: setting === undefined ? undefined : candidate[setting],
    },
  });
}

function settingName(error: ErrorObject): string | undefined {
  if (error.instancePath) return error.instancePath.slice(1);
  const extra = error.params['additionalProperty'];
  return typeof extra === 'string' ? extra : undefined;
}

function formatErrors(errors: ErrorObject[] | null | undefined): string {
  if (!errors || errors.length === 0) return 'unknown error';
  return errors
    .map(
      (error) =>
        `${settingName(error) ?? 'options'} ${error.message ?? 'is invalid'}`
    )
    .join('; ');
}

export interface ScenarioIdentity {
  id: string;
  /** Undefined when an id was given without a version. */
  version: number | undefined;
}

const VERSION = /^\d+$/;

/**
 * Split `name[:version]`. Without an id a random UUID at version 1 is used.
 */
export function parseScenarioId(scenarioId?: string): ScenarioIdentity {
  if (scenarioId === undefined) {
    return { id: randomUUID(), version: 1 };
  }

  const parts = scenarioId.split(':');
  const [name = '', version] = parts;
  if (parts.length > 2 || name.trim().length === 0) {
    throw new InvalidScenarioIdError({
      message: `Invalid scenario id '${scenarioId}': expected 'name' or 'name:version'`,
      context: { value: scenarioId },
    });
  }
  if (version === undefined) {
    return { id: name, version: undefined };
  }
  if (!VERSION.test(version)) {
    throw new InvalidScenarioIdError({
      message: `Invalid scenario version '${version}' in '${scenarioId}': expected a non-negative integer`,
      context: { value: scenarioId },
    });
  }
  return { id: name, version: Number.parseInt(version, 10) };
}
