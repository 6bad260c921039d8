import { parseDocument, stringify as stringifyYaml } from 'yaml';

import { ErrorCode } from '../errors/codes.js';
import { ConfigError } from '../types/errors.js';
import type { PlainValue } from '../types/values.js';
import { isPlainObject } from '../types/values.js';

/** YAML text, an already-parsed tree, or nothing (empty mapping). */
export type TemplateSource = string | PlainValue | undefined;

export interface LoadedTemplate {
  /** Parsed tree. Mappings read from text are Maps in document order. */
  tree: unknown;
  /** YAML text of the template as the author wrote it. */
  yaml: string;
}

/**
 * Turn a template source into a tree. Strings are parsed as YAML (JSON
 * being a subset); an empty document yields an empty mapping.
 */
export function loadTemplate(source: TemplateSource): LoadedTemplate {
  if (source === undefined || source === null) {
    return { tree: {}, yaml: toYaml({}) };
  }
  if (typeof source !== 'string') {
    return { tree: assertContainer(source), yaml: toYaml(source) };
  }

  const document = parseDocument(source);
  const [first] = document.errors;
  if (first) {
    throw new ConfigError({
      message: `Template is not valid YAML: ${first.message}`,
      errorCode: ErrorCode.TEMPLATE_LOAD_FAILED,
      cause: first,
    });
  }
  if (document.contents === null) {
    return { tree: {}, yaml: toYaml({}) };
  }
  const tree: unknown = document.toJS({ mapAsMap: true });
  return { tree: assertContainer(tree), yaml: document.toString() };
}

function assertContainer(value: unknown): unknown {
  if (Array.isArray(value) || value instanceof Map || isPlainObject(value)) {
    return value;
  }
  throw new ConfigError({
    message: 'Template root must be a mapping or a sequence',
    errorCode: ErrorCode.TEMPLATE_LOAD_FAILED,
    context: { value },
  });
}

export function toYaml(value: PlainValue): string {
  return stringifyYaml(value);
}
