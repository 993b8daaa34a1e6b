export type DiagnosticSeverity = "error" | "warning" | "note";

export type DiagnosticPhase = "types" | "generics";

export interface DiagnosticHint {
  message: string;
}

export interface DiagnosticInput {
  code: string;
  message: string;
  severity?: DiagnosticSeverity;
  phase?: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
}

export interface Diagnostic {
  code: string;
  message: string;
  severity: DiagnosticSeverity;
  phase?: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
}
