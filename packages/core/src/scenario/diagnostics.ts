export const DIAGNOSTIC_CODES = {
  EXCESS_DISTRIBUTION_ARGS: 'EXCESS_DISTRIBUTION_ARGS',
} as const;

export type DiagnosticCode =
  (typeof DIAGNOSTIC_CODES)[keyof typeof DIAGNOSTIC_CODES];

export interface ExcessArgsDetails {
  distribution: string;
  expected: number;
  received: number;
}

/**
 * Non-fatal condition met while resolving a template node.
 */
export interface ResolutionDiagnostic<Details = ExcessArgsDetails> {
  code: DiagnosticCode;
  /** Template path of the node that raised it. */
  path: string;
  details: Details;
}

export type DiagnosticListener = (diagnostic: ResolutionDiagnostic) => void;

export function formatDiagnostic(diagnostic: ResolutionDiagnostic): string {
  const { distribution, expected, received } = diagnostic.details;
  return `${diagnostic.code} at '${diagnostic.path}': ${distribution} takes ${expected} argument(s), got ${received}; extra arguments ignored`;
}
