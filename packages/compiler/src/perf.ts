type GenericsPerfCounterSnapshot = Map<string, number>;

type GenericsPerfSummary = {
  label: string;
  counters: Readonly<Record<string, number>>;
};

const GENERICS_PERF_ENV = "PARAMETRIC_GENERICS_PERF";

export const parsePerfFlag = (raw: string | undefined): boolean => {
  if (!raw) return false;
  const normalized = raw.trim().toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes";
};

const PERF_ENABLED = parsePerfFlag(process.env[GENERICS_PERF_ENV]);

const counters = new Map<string, number>();

const toSortedRecord = (
  entries: ReadonlyMap<string, number>,
): Record<string, number> =>
  Object.fromEntries(
    Array.from(entries.entries()).sort(([left], [right]) =>
      left.localeCompare(right),
    ),
  );

export const isGenericsPerfEnabled = (): boolean => PERF_ENABLED;

export const incrementGenericsPerfCounter = (
  name: string,
  amount = 1,
): void => {
  if (!PERF_ENABLED || amount === 0) {
    return;
  }
  counters.set(name, (counters.get(name) ?? 0) + amount);
};

export const snapshotGenericsPerfCounters = (): GenericsPerfCounterSnapshot =>
  PERF_ENABLED ? new Map(counters) : new Map();

export const diffGenericsPerfCounters = ({
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

export const logGenericsPerfSummary = ({
  label,
  counters,
}: GenericsPerfSummary): void => {
  if (!PERF_ENABLED) {
    return;
  }

  console.error(
    `[parametric:generics:perf] ${JSON.stringify({ label, counters })}`,
  );
};
