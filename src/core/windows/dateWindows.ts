export type WindowKind = "day" | "week" | "month";

/**
 * Half-open UTC interval `[start, end)`; both bounds sit on UTC midnight.
 */
export type DateWindow = {
  readonly kind: WindowKind;
  readonly start: Date;
  readonly end: Date;
};

export type RunMode = "refresh" | "backfill";

export const RUN_MODES: readonly RunMode[] = ["refresh", "backfill"];

const DAY_MS = 24 * 60 * 60 * 1000;

export const startOfUtcDay = (date: Date): Date =>
  new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));

export const addUtcDays = (date: Date, days: number): Date => new Date(date.getTime() + days * DAY_MS);

export const dayWindow = (date: Date): DateWindow => {
  const start = startOfUtcDay(date);
  return { kind: "day", start, end: addUtcDays(start, 1) };
};

/** Week running from the Sunday on or before `date` to the following Sunday. */
export const weekWindow = (date: Date): DateWindow => {
  const day = startOfUtcDay(date);
  const start = addUtcDays(day, -day.getUTCDay());
  return { kind: "week", start, end: addUtcDays(start, 7) };
};

export const monthWindow = (date: Date): DateWindow => {
  const start = new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), 1));
  const end = new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth() + 1, 1));
  return { kind: "month", start, end };
};

const windowContaining = (kind: WindowKind, date: Date): DateWindow => {
  switch (kind) {
    case "day":
      return dayWindow(date);
    case "week":
      return weekWindow(date);
    case "month":
      return monthWindow(date);
  }
};

/** The window immediately before `window`, of the same kind. */
export const previousWindow = (window: DateWindow): DateWindow =>
  windowContaining(window.kind, addUtcDays(window.start, -1));


/** Most recent window of `kind` that has fully elapsed at `now`. */
export const latestCompleteWindow = (kind: WindowKind, now: Date): DateWindow =>
  previousWindow(windowContaining(kind, now));

export const lastInclusiveDay = (window: DateWindow): Date => addUtcDays(window.end, -1);

const pad = (value: number, width = 2): string => String(value).padStart(width, "0");

export const formatCompactDate = (date: Date): string =>
  `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;

/**
 * Deterministic output key: `YYYYMMDD` (day), `YYYYMMDD-YYYYMMDD` (week, inclusive days), `YYYYMM` (month).
 */
export const outputKeyFor = (window: DateWindow): string => {
  switch (window.kind) {
    case "day":
      return formatCompactDate(window.start);
    case "week":
      return `${formatCompactDate(window.start)}-${formatCompactDate(lastInclusiveDay(window))}`;
    case "month":
      return `${window.start.getUTCFullYear()}${pad(window.start.getUTCMonth() + 1)}`;
  }
};

/** The request bounds sent on the wire: the window start and its last inclusive millisecond. */
export const wireRange = (window: DateWindow): { dataStartTime: string; dataEndTime: string } => ({
  dataStartTime: window.start.toISOString(),
  dataEndTime: new Date(window.end.getTime() - 1).toISOString()
});

export type RefreshWindowOptions = {
  startDaysAgo: number;
  endDaysAgo: number;
};

export const defaultRefreshWindowOptions: RefreshWindowOptions = {
  startDaysAgo: 8,
  endDaysAgo: 1
};

/**
 * Recent windows for the recurring pass, oldest first.
 * Days cover `now - startDaysAgo ... now - endDaysAgo`; weeks and months yield the latest complete one.
 */
export function* refreshWindows(
  kind: WindowKind,
  now: Date,
  options: RefreshWindowOptions = defaultRefreshWindowOptions
): Generator<DateWindow> {
  if (kind !== "day") {
    yield latestCompleteWindow(kind, now);
    return;
  }

  const today = startOfUtcDay(now);
  for (let daysAgo = options.startDaysAgo; daysAgo >= options.endDaysAgo; daysAgo -= 1) {
    yield dayWindow(addUtcDays(today, -daysAgo));
  }
}

export type BackfillWindowOptions = {
  lookbackDays: number;
  /** Extra complete periods skipped at the recent end while the remote data settles. */
  settlePeriods: number;
};

export const defaultSettlePeriods: Record<WindowKind, number> = {
  day: 0,
  week: 1,
  month: 0
};

/**
 * Historical windows, newest first, stopping once a window would start before `now - lookbackDays`.
 */
export function* backfillWindows(
  kind: WindowKind,
  now: Date,
  options: BackfillWindowOptions
): Generator<DateWindow> {
  const cutoff = addUtcDays(startOfUtcDay(now), -options.lookbackDays);
  let current = latestCompleteWindow(kind, now);
  for (let i = 0; i < options.settlePeriods; i += 1) {
    current = previousWindow(current);
  }

  while (current.start.getTime() >= cutoff.getTime()) {
    yield current;
    current = previousWindow(current);
  }
}

export const windowsFor = (
  mode: RunMode,
  kind: WindowKind,
  now: Date,
  options: { refresh?: RefreshWindowOptions; lookbackDays: number; settlePeriods?: number }
): Generator<DateWindow> =>
  mode === "refresh"
    ? refreshWindows(kind, now, options.refresh)
    : backfillWindows(kind, now, {
        lookbackDays: options.lookbackDays,
        settlePeriods: options.settlePeriods ?? defaultSettlePeriods[kind]
      });
