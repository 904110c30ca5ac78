export const nowIso = (): string => new Date().toISOString();

export const toIso = (ms: number): string => new Date(ms).toISOString();

export const isoDate = (value: string | number | Date = new Date()): string =>
  new Date(value).toISOString().slice(0, 10);

/** Last day of the calendar quarter containing `value`, as YYYY-MM-DD (UTC). */
export const quarterEnd = (value: string | number | Date = new Date()): string => {
  const date = new Date(value);
  const lastMonth = Math.floor(date.getUTCMonth() / 3) * 3 + 2;
  return new Date(Date.UTC(date.getUTCFullYear(), lastMonth + 1, 0)).toISOString().slice(0, 10);
};

export const hoursBetween = (fromIso: string, toMs: number): number => {
  const from = new Date(fromIso).getTime();
  if (!Number.isFinite(from)) return Number.POSITIVE_INFINITY;
  return Math.max(0, (toMs - from) / (1000 * 60 * 60));
};

export const sleep = (ms: number): Promise<void> => {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
};
