const readEnv = (name: string): string | undefined => {
  const processValue = (globalThis as {
    process?: { env?: Record<string, string | undefined> };
  }).process;
  return processValue?.env?.[name];
};

export const readFlagEnv = (name: string): boolean => {
  const raw = readEnv(name);
  if (!raw) return false;
  const normalized = raw.trim().toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes";
};

export const readPositiveIntEnv = (name: string): number | undefined => {
  const raw = readEnv(name)?.trim();
  if (!raw || !/^\d+$/.test(raw)) return undefined;
  const value = Number.parseInt(raw, 10);
  return value > 0 ? value : undefined;
};
