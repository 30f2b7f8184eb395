import {
  backfillWindows,
  dayWindow,
  latestCompleteWindow,
  monthWindow,
  outputKeyFor,
  refreshWindows,
  weekWindow,
  windowsFor,
  wireRange
} from "../../src/core/windows/dateWindows";

// 2024-09-15 is a Sunday.
const NOW = new Date("2024-09-15T10:30:00.000Z");

const keys = (windows: Iterable<{ kind: "day" | "week" | "month"; start: Date; end: Date }>) =>
  [...windows].map(outputKeyFor);

describe("date windows", () => {
  it("builds half-open UTC day windows", () => {
    const window = dayWindow(NOW);

    expect(window.start.toISOString()).toBe("2024-09-15T00:00:00.000Z");
    expect(window.end.toISOString()).toBe("2024-09-16T00:00:00.000Z");
    expect(outputKeyFor(window)).toBe("20240915");
  });

  it("starts weeks on Sunday", () => {
    const window = weekWindow(new Date("2024-09-18T23:59:00.000Z"));

    expect(window.start.toISOString()).toBe("2024-09-15T00:00:00.000Z");
    expect(window.end.toISOString()).toBe("2024-09-22T00:00:00.000Z");
    expect(outputKeyFor(window)).toBe("20240915-20240921");
  });

  it("rolls month windows over the year boundary", () => {
    const window = monthWindow(new Date("2024-12-10T00:00:00.000Z"));

    expect(window.end.toISOString()).toBe("2025-01-01T00:00:00.000Z");
    expect(outputKeyFor(window)).toBe("202412");
  });

  it("picks the latest fully elapsed window", () => {
    expect(outputKeyFor(latestCompleteWindow("day", NOW))).toBe("20240914");
    expect(outputKeyFor(latestCompleteWindow("week", NOW))).toBe("20240908-20240914");
    expect(outputKeyFor(latestCompleteWindow("month", NOW))).toBe("202408");
  });

  it("sends the window start and its last inclusive millisecond on the wire", () => {
    expect(wireRange(latestCompleteWindow("month", NOW))).toEqual({
      dataStartTime: "2024-08-01T00:00:00.000Z",
      dataEndTime: "2024-08-31T23:59:59.999Z"
    });
  });

  it("refreshes days from eight to one days ago, oldest first", () => {
    expect(keys(refreshWindows("day", NOW))).toEqual([
      "20240907",
      "20240908",
      "20240909",
      "20240910",
      "20240911",
      "20240912",
      "20240913",
      "20240914"
    ]);
  });

  it("refreshes only the latest complete week or month", () => {
    expect(keys(refreshWindows("week", NOW))).toEqual(["20240908-20240914"]);
    expect(keys(refreshWindows("month", NOW))).toEqual(["202408"]);
  });

  it("backfills days newest first down to the lookback cutoff", () => {
    expect(keys(backfillWindows("day", NOW, { lookbackDays: 3, settlePeriods: 0 }))).toEqual([
      "20240914",
      "20240913",
      "20240912"
    ]);
  });

  it("skips settling weeks before backfilling", () => {
    expect(keys(backfillWindows("week", NOW, { lookbackDays: 21, settlePeriods: 1 }))).toEqual([
      "20240901-20240907",
      "20240825-20240831"
    ]);
  });

  it("backfills months from the last complete month", () => {
    expect(keys(windowsFor("backfill", "month", NOW, { lookbackDays: 80 }))).toEqual(["202408", "202407"]);
  });

  it("dispatches refresh with custom day bounds", () => {
    expect(keys(windowsFor("refresh", "day", NOW, { lookbackDays: 730, refresh: { startDaysAgo: 2, endDaysAgo: 1 } })))
      .toEqual(["20240913", "20240914"]);
  });
});
