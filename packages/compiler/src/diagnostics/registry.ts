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

export type WireDirection = "input" | "output";

type WireParams<K extends string> = {
  kind: K;
  direction: WireDirection;
  name: string;
  rootType: string;
  offendingType: string;
};

type DiagnosticParamsMap = {
  WR0001: WireParams<"unsupported-type">;
  WR0002: WireParams<"free-type-variable">;
  WR0003: WireParams<"contains-functions">;
  WR0004: WireParams<"higher-order-functions">;
  WR0005: WireParams<"signal-contains-function"> & {
    signal: "stream" | "varying";
  };
  WR0006: WireParams<"extended-record">;
  WR0007: WireParams<"alias-cycle"> & { alias: string };
  LB0001: { kind: "writable-stream-shape"; name: string; declaredType: string };
  LB0002: { kind: "promise-stream-shape"; name: string; declaredType: string };
  LB0003: { kind: "alias-cycle"; name: string; alias: string };
};

export type DiagnosticCode = keyof DiagnosticParamsMap;

export type DiagnosticParams<K extends DiagnosticCode> = DiagnosticParamsMap[K];

const wireMessage = (
  params: WireParams<string>,
  problem: string,
): string =>
  `the ${params.direction} named '${params.name}' has an invalid type: ${problem} (${params.offendingType})`;

export const diagnosticsRegistry: {
  [K in DiagnosticCode]: DiagnosticDefinition<DiagnosticParamsMap[K]>;
} = {
  WR0001: {
    code: "WR0001",
    message: (params) => wireMessage(params, "it contains an unsupported type"),
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["WR0001"]>,
  WR0002: {
    code: "WR0002",
    message: (params) => wireMessage(params, "it contains a free type variable"),
    severity: "error",
    hints: [
      {
        message:
          "Annotate the declaration with a concrete type so no type variable is left.",
      },
    ],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["WR0002"]>,
  WR0003: {
    code: "WR0003",
    message: (params) => wireMessage(params, "it contains functions"),
    severity: "error",
    hints: [
      {
        message:
          "Inputs carry data only. Send a value and pick the behavior on the managed side.",
      },
    ],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["WR0003"]>,
  WR0004: {
    code: "WR0004",
    message: (params) => wireMessage(params, "it contains higher-order functions"),
    severity: "error",
    hints: [
      {
        message:
          "Outputs accept first-order functions only: no argument or result may itself be a function.",
      },
    ],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["WR0004"]>,
  WR0005: {
    code: "WR0005",
    message: (params) =>
      wireMessage(
        params,
        params.signal === "stream"
          ? "it is a stream that contains a function"
          : "it is a varying value that contains a function",
      ),
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["WR0005"]>,
  WR0006: {
    code: "WR0006",
    message: (params) =>
      wireMessage(params, "it contains extended records with free type variables"),
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["WR0006"]>,
  WR0007: {
    code: "WR0007",
    message: (params) =>
      wireMessage(params, `alias ${params.alias} expands into itself`),
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["WR0007"]>,
  LB0001: {
    code: "LB0001",
    message: (params) =>
      `the loopback named '${params.name}' must be a writable stream, found ${params.declaredType}`,
    severity: "error",
    hints: [
      {
        message:
          "Declare it as { mailbox : Mailbox a, stream : Stream a } with the same type a on both fields.",
      },
    ],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LB0001"]>,
  LB0002: {
    code: "LB0002",
    message: (params) =>
      `the loopback named '${params.name}' runs promises and must be a stream of results, found ${params.declaredType}`,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LB0002"]>,
  LB0003: {
    code: "LB0003",
    message: (params) =>
      `the loopback named '${params.name}' has an invalid type: alias ${params.alias} expands into itself`,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LB0003"]>,
} as const;

export const formatDiagnosticMessage = <K extends DiagnosticCode>(
  code: K,
  params: DiagnosticParams<K>,
): string => diagnosticsRegistry[code].message(params);

export const getDiagnosticDefinition = <K extends DiagnosticCode>(code: K) =>
  diagnosticsRegistry[code];

export const diagnosticCodes = (): DiagnosticCode[] =>
  Object.keys(diagnosticsRegistry) as DiagnosticCode[];
