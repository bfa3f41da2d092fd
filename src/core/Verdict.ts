/**
 * Folds findings of one export call into a Verdict, and renders the Verdict
 * as either an export response (service mode) or an exit code (one-shot).
 *
 * Only metric findings count. Resource findings are advisory and extra
 * attributes never reject anything.
 */

import type { Finding } from './ComplianceCheck.ts';
import type { Verdict } from '../types/schema.ts';
import type { OtlpExportResponse } from '../types/otlp.ts';

export const EXIT_CLEAN = 0;
export const EXIT_VIOLATION = 100;

/** google.rpc.Code.FAILED_PRECONDITION */
export const FAILED_PRECONDITION = 9;

export const MISSING_ATTRIBUTES_MESSAGE = 'missing attributes';

export const EMPTY_VERDICT: Verdict = Object.freeze({ violationCount: 0, implicatedScopes: [] });

export function foldVerdict(findings: readonly Finding[]): Verdict {
  return findings.reduce<Verdict>(
    (acc, f) =>
      f.section === 'metric'
        ? {
            violationCount: acc.violationCount + f.result.missing.length,
            implicatedScopes: [...acc.implicatedScopes, f.scope],
          }
        : acc,
    EMPTY_VERDICT
  );
}

export function exitCodeFor(verdict: Verdict): number {
  return verdict.violationCount > 0 ? EXIT_VIOLATION : EXIT_CLEAN;
}

export type ExportResult =
  | { status: 'ok'; response: OtlpExportResponse }
  | {
      status: 'failed_precondition';
      code: typeof FAILED_PRECONDITION;
      message: string;
      response: Required<OtlpExportResponse>;
    };

export function toExportResult(verdict: Verdict): ExportResult {
  if (verdict.violationCount === 0) {
    return { status: 'ok', response: {} };
  }
  return {
    status: 'failed_precondition',
    code: FAILED_PRECONDITION,
    message: `${MISSING_ATTRIBUTES_MESSAGE}: [${verdict.implicatedScopes.join(' ')}]`,
    response: {
      partialSuccess: {
        rejectedDataPoints: verdict.violationCount,
        errorMessage: MISSING_ATTRIBUTES_MESSAGE,
      },
    },
  };
}
