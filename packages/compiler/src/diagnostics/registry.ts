import type {
  DiagnosticHint,
  DiagnosticPhase,
  DiagnosticSeverity,
} from "./types.js";

type DiagnosticMessage<P> = (params: P) => string;

export type DiagnosticDefinition<P> = {
  code: string;
  message: DiagnosticMessage<P>;
  severity?: DiagnosticSeverity;
  phase?: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
};

const signatureBuilderHint: DiagnosticHint = {
  message:
    "The environment and its signature disagree; rebuild the environment from the signature it is paired with.",
};

type DiagnosticParamsMap = {
  GN0001: { kind: "parameter-count-mismatch"; expected: number; received: number };
  GN0002: { kind: "duplicate-generic-parameter"; param: string };
  GN0003: { kind: "residual-archetype"; type: string };
  GN0004: { kind: "residual-type-parameter"; type: string };
  GN0005: { kind: "missing-generic-parameter"; param: string };
  GN0006: {
    kind: "substitution-count-mismatch";
    expected: number;
    received: number;
  };
  GN0007: { kind: "dependent-type-not-archetype"; type: string; context: string };
  GN0008: { kind: "foreign-substitution-list" };
  GN0009: { kind: "empty-environment" };
  GN0010: { kind: "not-a-generic-parameter"; type: string };
  GN0011: { kind: "not-an-archetype"; type: string };
  GN0012: {
    kind: "conflicting-nested-type";
    archetype: string;
    name: string;
    existing: string;
    incoming: string;
  };
};

export type DiagnosticCode = keyof DiagnosticParamsMap;
export type DiagnosticParams<K extends DiagnosticCode> = DiagnosticParamsMap[K];

export const diagnosticsRegistry: {
  [K in DiagnosticCode]: DiagnosticDefinition<DiagnosticParamsMap[K]>;
} = {
  GN0001: {
    code: "GN0001",
    message: (params) =>
      `incorrect number of parameters: signature declares ${params.expected}, environment binds ${params.received}`,
    severity: "error",
    phase: "generics",
    hints: [signatureBuilderHint],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["GN0001"]>,
  GN0002: {
    code: "GN0002",
    message: (params) =>
      `duplicate generic parameters in environment: '${params.param}' is bound more than once`,
    severity: "error",
    phase: "generics",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["GN0002"]>,
  GN0003: {
    code: "GN0003",
    message: (params) =>
      `not fully substituted: '${params.type}' still contains an archetype`,
    severity: "error",
    phase: "generics",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["GN0003"]>,
  GN0004: {
    code: "GN0004",
    message: (params) =>
      `not fully substituted: '${params.type}' still contains a type parameter`,
    severity: "error",
    phase: "generics",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["GN0004"]>,
  GN0005: {
    code: "GN0005",
    message: (params) => `missing generic parameter '${params.param}'`,
    severity: "error",
    phase: "generics",
    hints: [signatureBuilderHint],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["GN0005"]>,
  GN0006: {
    code: "GN0006",
    message: (params) =>
      `substitution list has ${params.received} entries but the signature has ${params.expected} dependent types`,
    severity: "error",
    phase: "generics",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["GN0006"]>,
  GN0007: {
    code: "GN0007",
    message: (params) =>
      `dependent type '${params.type}' maps to '${params.context}', which is not an archetype`,
    severity: "error",
    phase: "generics",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["GN0007"]>,
  GN0008: {
    code: "GN0008",
    message: () =>
      "substitution list was built for a different generic signature",
    severity: "error",
    phase: "generics",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["GN0008"]>,
  GN0009: {
    code: "GN0009",
    message: () => "cannot build a generic environment without parameters",
    severity: "error",
    phase: "generics",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["GN0009"]>,
  GN0010: {
    code: "GN0010",
    message: (params) => `'${params.type}' is not a generic parameter`,
    severity: "error",
    phase: "generics",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["GN0010"]>,
  GN0011: {
    code: "GN0011",
    message: (params) => `'${params.type}' is not an archetype`,
    severity: "error",
    phase: "generics",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["GN0011"]>,
  GN0012: {
    code: "GN0012",
    message: (params) =>
      `nested type '${params.name}' of '${params.archetype}' is already '${params.existing}', cannot rebind it to '${params.incoming}'`,
    severity: "error",
    phase: "generics",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["GN0012"]>,
};

export const formatDiagnosticMessage = <K extends DiagnosticCode>(
  code: K,
  params: DiagnosticParams<K>,
): string => diagnosticsRegistry[code].message(params);

export const getDiagnosticDefinition = <K extends DiagnosticCode>(code: K) =>
  diagnosticsRegistry[code];

export const diagnosticCodes = (): DiagnosticCode[] =>
  Object.keys(diagnosticsRegistry).filter(isDiagnosticCode);

const isDiagnosticCode = (code: string): code is DiagnosticCode =>
  code in diagnosticsRegistry;
