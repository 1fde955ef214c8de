import type { IrradiancePoint } from "../schema.js";
import type { ForecastProvenance } from "./types.js";

const sanitize = (value: number) => (Number.isFinite(value) && value > 0 ? value : 0);

/**
 * Maps a series of any length onto exactly `targetLength` non-negative values.
 *
 * Equal lengths pass through. A shorter (coarser) source is linearly
 * interpolated, holding its last value at the tail; a longer one is averaged
 * block by block.
 */
export const resampleSeries = (values: readonly number[], targetLength: number): number[] => {
  const source = values.map(sanitize);
  const sourceLength = source.length;

  if (targetLength <= 0) {
    return [];
  }
  if (sourceLength === 0) {
    return new Array<number>(targetLength).fill(0);
  }
  if (sourceLength === targetLength) {
    return source;
  }

  if (sourceLength < targetLength) {
    return Array.from({ length: targetLength }, (_, i) => {
      const position = (i * sourceLength) / targetLength;
      const lower = Math.floor(position);
      if (lower >= sourceLength - 1) {
        return source[sourceLength - 1] ?? 0;
      }
      const fraction = position - lower;
      const a = source[lower] ?? 0;
      const b = source[lower + 1] ?? a;
      return a + (b - a) * fraction;
    });
  }

  return Array.from({ length: targetLength }, (_, i) => {
    const from = Math.floor((i * sourceLength) / targetLength);
    const to = Math.max(from + 1, Math.floor(((i + 1) * sourceLength) / targetLength));
    const block = source.slice(from, to);
    return block.reduce((sum, value) => sum + value, 0) / block.length;
  });
};

export const PLACEHOLDER_PEAK_GHI_WM2 = 850;

/** Clear-sky-like bell between 06:00 and 18:00 UTC. Same input, same output. */
export const placeholderIrradiance = (timestamp: Date): number => {
  const hour = timestamp.getUTCHours() + timestamp.getUTCMinutes() / 60;
  if (hour < 6 || hour > 18) {
    return 0;
  }
  const x = (hour - 6) / 12;
  return PLACEHOLDER_PEAK_GHI_WM2 * 4 * x * (1 - x);
};

export const stepTimestamps = (startAt: Date, totalSteps: number, timestepMinutes: number): Date[] =>
  Array.from({ length: totalSteps }, (_, i) => new Date(startAt.getTime() + i * timestepMinutes * 60_000));

export type ResolvedIrradiance = {
  readonly ghiWm2: readonly number[];
  readonly provenance: ForecastProvenance;
};

export type TimedValue = {
  readonly at: number; // epoch ms
  readonly value: number;
};

// Linear in time between the neighbouring points; held flat before the first and after the last.
const valueAt = (series: readonly TimedValue[], at: number): number => {
  const upper = series.findIndex((point) => point.at > at);
  const last = series[series.length - 1];

  if (upper === -1) {
    return last?.value ?? 0;
  }

  const after = series[upper];
  const before = series[upper - 1];
  if (after === undefined || before === undefined) {
    return after?.value ?? 0;
  }

  return before.value + ((after.value - before.value) * (at - before.at)) / (after.at - before.at);
};

/**
 * Places a timestamped series on the step grid. A step holding two or more
 * points (a finer source) takes their mean; every other step is read off the
 * series at the step's start time.
 */
export const alignToSteps = (
  series: readonly TimedValue[],
  stepStarts: readonly Date[],
  timestepMinutes: number,
): number[] => {
  const stepMs = timestepMinutes * 60_000;

  return stepStarts.map((stepStart) => {
    const from = stepStart.getTime();
    const block = series.filter((point) => point.at >= from && point.at < from + stepMs);

    if (block.length > 1) {
      return block.reduce((sum, point) => sum + point.value, 0) / block.length;
    }
    return valueAt(series, from);
  });
};

/**
 * Resolves the forecast onto the run's step grid by timestamp.
 *
 * Only finite, non-negative points between the run start and the run end are
 * usable. Without any, the placeholder profile is used and the provenance is
 * "fallback".
 */
export const resolveIrradiance = (
  points: readonly IrradiancePoint[],
  options: { readonly totalSteps: number; readonly startAt: Date; readonly timestepMinutes: number },
): ResolvedIrradiance => {
  const stepStarts = stepTimestamps(options.startAt, options.totalSteps, options.timestepMinutes);
  const runStart = options.startAt.getTime();
  const runEnd = runStart + options.totalSteps * options.timestepMinutes * 60_000;

  const usable = points
    .map((point) => ({ at: Date.parse(point.timestamp), value: point.ghiWm2 }))
    .filter((point) =>
      Number.isFinite(point.at) && Number.isFinite(point.value) && point.value >= 0
      && point.at >= runStart && point.at <= runEnd
    )
    .sort((a, b) => a.at - b.at);

  if (usable.length === 0) {
    return {
      ghiWm2: stepStarts.map(placeholderIrradiance),
      provenance: "fallback",
    };
  }

  return {
    ghiWm2: alignToSteps(usable, stepStarts, options.timestepMinutes),
    provenance: "forecast",
  };
};
