import { readFlagEnv } from "./env.js";

type TraceCounterSnapshot = Map<string, number>;

type CanonicalizeSummary = {
  moduleId: string;
  success: boolean;
  declarations: number;
  diagnostics: number;
  durationMs: number;
  counters: Readonly<Record<string, number>>;
};

export const TRACE_ENV = "PORTCHECK_TRACE";

const counters = new Map<string, number>();

const roundMs = (value: number): number =>
  Math.round(value * 1000) / 1000;

const toSortedRecord = (
  entries: ReadonlyMap<string, number>,
): Record<string, number> =>
  Object.fromEntries(
    Array.from(entries.entries()).sort(([left], [right]) =>
      left.localeCompare(right),
    ),
  );

export const isTraceEnabled = (): boolean => readFlagEnv(TRACE_ENV);

export const incrementTraceCounter = (name: string, amount = 1): void => {
  if (!isTraceEnabled() || amount === 0) {
    return;
  }
  counters.set(name, (counters.get(name) ?? 0) + amount);
};

export const snapshotTraceCounters = (): TraceCounterSnapshot =>
  isTraceEnabled() ? new Map(counters) : new Map();

export const diffTraceCounters = ({
  before,
  after,
}: {
  before: ReadonlyMap<string, number>;
  after: ReadonlyMap<string, number>;
}): Record<string, number> => {
  const keys = new Set<string>([...before.keys(), ...after.keys()]);
  const delta = new Map<string, number>();
  keys.forEach((key) => {
    const diff = (after.get(key) ?? 0) - (before.get(key) ?? 0);
    if (diff !== 0) {
      delta.set(key, diff);
    }
  });
  return toSortedRecord(delta);
};

export const logCanonicalizeSummary = ({
  moduleId,
  success,
  declarations,
  diagnostics,
  durationMs,
  counters: summaryCounters,
}: CanonicalizeSummary): void => {
  if (!isTraceEnabled()) {
    return;
  }

  const summary = {
    moduleId,
    success,
    declarations,
    diagnostics,
    durationMs: roundMs(durationMs),
    counters: summaryCounters,
  };

  console.error(`[portcheck:canonicalize] ${JSON.stringify(summary)}`);
};
