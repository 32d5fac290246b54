import { describeError, toProviderError } from "@azurekv/adapters-common";

export type DiagnosticSeverity = "error" | "warning";

/**
 * User-visible message returned at an operation boundary.
 */
export interface Diagnostic {
  severity: DiagnosticSeverity;
  summary: string;
  detail: string;
}

export function errorDiagnostic(summary: string, detail: string): Diagnostic {
  return { severity: "error", summary, detail };
}

/**
 * Turn any thrown value into an error diagnostic.
 * @param prefix - Prepended to the error description
 */
export function diagnosticFromError(summary: string, error: unknown, prefix = ""): Diagnostic {
  return errorDiagnostic(summary, prefix + describeError(toProviderError(error)));
}

export function hasError(diagnostics: Diagnostic[]): boolean {
  return diagnostics.some((diagnostic) => diagnostic.severity === "error");
}
