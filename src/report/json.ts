import { BuildscopeError, toErrorMessage } from "../core/index.js";
import type { DiagnosticsReport } from "../diagnostics/index.js";
import type { QualityReport } from "../quality/index.js";

export interface SerializedError {
  code: string;
  message: string;
  severity: string;
}

/** Why a section of a combined report could not be produced. */
export interface ReportFailures {
  diagnostics?: SerializedError;
  quality?: SerializedError;
}

export type SerializedDiagnostics = Omit<DiagnosticsReport, "error"> & { error?: SerializedError };

export function serializeError(error: unknown): SerializedError {
  if (error instanceof BuildscopeError) {
    return { code: error.code, message: error.message, severity: error.severity };
  }
  return { code: "UNEXPECTED_ERROR", message: toErrorMessage(error), severity: "fatal" };
}

export function serializeDiagnostics(report: DiagnosticsReport): SerializedDiagnostics {
  const { error, ...rest } = report;
  if (!error) {
    return rest;
  }
  return { ...rest, error: serializeError(error) };
}

export function hasFailures(failures: ReportFailures | undefined): failures is ReportFailures {
  return failures !== undefined && (failures.diagnostics !== undefined || failures.quality !== undefined);
}

export function renderJson(payload: {
  diagnostics?: DiagnosticsReport;
  quality?: QualityReport;
  failures?: ReportFailures;
}): string {
  return JSON.stringify(
    {
      ...(payload.diagnostics ? { diagnostics: serializeDiagnostics(payload.diagnostics) } : {}),
      ...(payload.quality ? { quality: payload.quality } : {}),
      ...(hasFailures(payload.failures) ? { failures: payload.failures } : {}),
    },
    null,
    2,
  );
}
