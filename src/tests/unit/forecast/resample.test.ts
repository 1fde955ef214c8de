import { describe, it, expect } from "@effect/vitest";
import { placeholderIrradiance, resampleSeries, resolveIrradiance } from "../../../forecast/resample.js";

describe("resampleSeries", () => {
  it("should pass values through when lengths match", () => {
    expect(resampleSeries([1, 2, 3], 3)).toEqual([1, 2, 3]);
  });

  it("should replace negative and non-finite values with zero", () => {
    expect(resampleSeries([-1, Number.NaN, 5], 3)).toEqual([0, 0, 5]);
  });

  it("should interpolate a coarser series and hold the last value", () => {
    expect(resampleSeries([0, 4], 4)).toEqual([0, 2, 4, 4]);
  });

  it("should average a finer series block by block", () => {
    expect(resampleSeries([1, 3, 5, 7], 2)).toEqual([2, 6]);
  });

  it("should return zeros for an empty series", () => {
    expect(resampleSeries([], 3)).toEqual([0, 0, 0]);
  });

  it("should always produce the target number of non-negative values", () => {
    const hourly = Array.from({ length: 24 }, (_, hour) => (hour >= 6 && hour < 18 ? 400 : -999));
    const finer = Array.from({ length: 200 }, (_, i) => i % 7);

    for (const [source, target] of [[hourly, 96], [finer, 96], [hourly, 7]] as const) {
      const result = resampleSeries(source, target);

      expect(result).toHaveLength(target);
      expect(result.every((value) => Number.isFinite(value) && value >= 0)).toBe(true);
    }
  });
});

describe("resolveIrradiance", () => {
  const startAt = new Date("2030-01-01T00:00:00.000Z");

  it("should fall back to the placeholder profile without usable points", () => {
    const resolved = resolveIrradiance([{ timestamp: "2030-01-01T00:00:00.000Z", ghiWm2: Number.NaN }], {
      totalSteps: 24,
      startAt,
      timestepMinutes: 60,
    });

    expect(resolved.provenance).toBe("fallback");
    expect(resolved.ghiWm2).toHaveLength(24);
    expect(resolved.ghiWm2[0]).toBe(0);
    expect(resolved.ghiWm2[9]).toBe(637.5);
    expect(resolved.ghiWm2[12]).toBe(850);
  });

  it("should resample usable points in time order", () => {
    const resolved = resolveIrradiance(
      [
        { timestamp: "2030-01-01T01:00:00.000Z", ghiWm2: 200 },
        { timestamp: "2030-01-01T00:00:00.000Z", ghiWm2: 100 },
      ],
      { totalSteps: 4, startAt, timestepMinutes: 30 },
    );

    expect(resolved.provenance).toBe("forecast");
    expect(resolved.ghiWm2).toEqual([100, 150, 200, 200]);
  });

  it("should place points by timestamp rather than by position", () => {
    const resolved = resolveIrradiance(
      [
        { timestamp: "2030-01-01T02:00:00.000Z", ghiWm2: 400 },
        { timestamp: "2030-01-01T03:00:00.000Z", ghiWm2: 200 },
      ],
      { totalSteps: 4, startAt, timestepMinutes: 60 },
    );

    expect(resolved.ghiWm2).toEqual([400, 400, 400, 200]);
  });

  it("should average a finer series within each step", () => {
    const resolved = resolveIrradiance(
      [
        { timestamp: "2030-01-01T00:00:00.000Z", ghiWm2: 100 },
        { timestamp: "2030-01-01T00:15:00.000Z", ghiWm2: 200 },
        { timestamp: "2030-01-01T00:30:00.000Z", ghiWm2: 300 },
        { timestamp: "2030-01-01T00:45:00.000Z", ghiWm2: 400 },
        { timestamp: "2030-01-01T01:00:00.000Z", ghiWm2: 0 },
      ],
      { totalSteps: 2, startAt, timestepMinutes: 60 },
    );

    expect(resolved.ghiWm2).toEqual([250, 0]);
  });

  it("should treat negative readings as missing", () => {
    const resolved = resolveIrradiance(
      [
        { timestamp: "2030-01-01T00:00:00.000Z", ghiWm2: -999 },
        { timestamp: "2030-01-01T01:00:00.000Z", ghiWm2: 100 },
      ],
      { totalSteps: 2, startAt, timestepMinutes: 60 },
    );

    expect(resolved.provenance).toBe("forecast");
    expect(resolved.ghiWm2).toEqual([100, 100]);
  });

  it("should fall back when every reading is a fill value", () => {
    const fill = Array.from({ length: 24 }, (_, hour) => ({
      timestamp: new Date(startAt.getTime() + hour * 3_600_000).toISOString(),
      ghiWm2: -999,
    }));

    const resolved = resolveIrradiance(fill, { totalSteps: 96, startAt, timestepMinutes: 15 });

    expect(resolved.provenance).toBe("fallback");
    expect(Math.max(...resolved.ghiWm2)).toBe(850);
  });

  it("should fall back when no point falls inside the run", () => {
    const resolved = resolveIrradiance(
      [{ timestamp: "2029-12-31T12:00:00.000Z", ghiWm2: 600 }],
      { totalSteps: 24, startAt, timestepMinutes: 60 },
    );

    expect(resolved.provenance).toBe("fallback");
  });

  it("should be zero at night", () => {
    expect(placeholderIrradiance(new Date("2030-06-01T03:00:00.000Z"))).toBe(0);
    expect(placeholderIrradiance(new Date("2030-06-01T21:00:00.000Z"))).toBe(0);
  });
});
