/**
 * Plain data shapes shared by templates, expressions and samples.
 */

export type ScalarValue = string | number | boolean | null;

/** A YAML/JSON-like tree: mappings, sequences and scalars. */
export type PlainValue =
  | ScalarValue
  | PlainValue[]
  | { [key: string]: PlainValue };

/** Natively typed draw: a scalar or a nested array of them. */
export type SampleValue = ScalarValue | SampleValue[];

/** Literal argument of an expression: scalar or (nested) list. */
export type ExpressionArg = SampleValue;

export function isPlainObject(
  value: unknown
): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}
