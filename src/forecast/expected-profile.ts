import { Effect } from "effect";
import type { IrradiancePoint } from "../schema.js";
import { ForecastNotAvailableError, IrradianceForecast, type IrradianceRequest } from "./types.js";

const DAY_MS = 86_400_000;
const HOUR_MS = 3_600_000;

export const EXPECTED_PROFILE = {
  recentWindowDays: 7,
  recentLagDays: 10, // NASA POWER publishes solar data about a week behind
  lastYearHalfWindowDays: 3,
  minPeakWm2: 5,
  minSpreadWm2: 1, // a flat profile is fill data, not weather
} as const;

export type ExpectedProfileSource = "recent_history" | "last_year";

export type ExpectedProfile = {
  readonly source: ExpectedProfileSource;
  readonly hourlyMeanWm2: readonly number[]; // index = UTC hour of day
  readonly points: readonly IrradiancePoint[];
};

export type ExpectedIrradianceRequest = {
  readonly latitude: number;
  readonly longitude: number;
  readonly startAt: Date;
  readonly days: number;
  readonly reference: Date;
};

const utcDay = (date: Date) => Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());

/** Mean GHI per UTC hour of day. Hours without a valid sample are 0. */
export const hourlyMeanProfile = (points: readonly IrradiancePoint[]): number[] => {
  const sums = new Array<number>(24).fill(0);
  const counts = new Array<number>(24).fill(0);

  for (const point of points) {
    const at = Date.parse(point.timestamp);
    if (Number.isNaN(at) || !Number.isFinite(point.ghiWm2) || point.ghiWm2 < 0) {
      continue;
    }
    const hour = new Date(at).getUTCHours();
    sums[hour] = (sums[hour] ?? 0) + point.ghiWm2;
    counts[hour] = (counts[hour] ?? 0) + 1;
  }

  return sums.map((sum, hour) => {
    const count = counts[hour] ?? 0;
    return count > 0 ? sum / count : 0;
  });
};

export const isUsableProfile = (profile: readonly number[]): boolean => {
  if (profile.length !== 24) {
    return false;
  }
  const peak = Math.max(...profile);
  const total = profile.reduce((sum, value) => sum + value, 0);

  return total > 0
    && peak >= EXPECTED_PROFILE.minPeakWm2
    && peak - Math.min(...profile) >= EXPECTED_PROFILE.minSpreadWm2;
};

/** Repeats a 24-hour profile as hourly points over each planning day. */
export const projectProfile = (profile: readonly number[], startAt: Date, days: number): IrradiancePoint[] =>
  Array.from({ length: days * 24 }, (_, i) => ({
    timestamp: new Date(startAt.getTime() + i * HOUR_MS).toISOString(),
    ghiWm2: profile[i % 24] ?? 0,
  }));

export const recentHistoryRequest = (request: ExpectedIrradianceRequest): IrradianceRequest => {
  const end = utcDay(request.reference) - EXPECTED_PROFILE.recentLagDays * DAY_MS;

  return {
    latitude: request.latitude,
    longitude: request.longitude,
    start: new Date(end - (EXPECTED_PROFILE.recentWindowDays - 1) * DAY_MS),
    days: EXPECTED_PROFILE.recentWindowDays,
  };
};

export const lastYearRequest = (request: ExpectedIrradianceRequest): IrradianceRequest => {
  const reference = request.reference;
  const month = reference.getUTCMonth();
  const date = reference.getUTCDate();
  // 29 February maps to 28 February of a common year
  const center = month === 1 && date === 29
    ? Date.UTC(reference.getUTCFullYear() - 1, 1, 28)
    : Date.UTC(reference.getUTCFullYear() - 1, month, date);

  return {
    latitude: request.latitude,
    longitude: request.longitude,
    start: new Date(center - EXPECTED_PROFILE.lastYearHalfWindowDays * DAY_MS),
    days: 2 * EXPECTED_PROFILE.lastYearHalfWindowDays + 1,
  };
};

/**
 * Expected irradiance for the planning days, built from history because the
 * API holds no future data. Tries the most recent published week, then the
 * same days last year. Fails with ForecastNotAvailable when neither yields a
 * usable profile.
 */
export const expectedIrradiance = (
  request: ExpectedIrradianceRequest,
): Effect.Effect<ExpectedProfile, ForecastNotAvailableError, IrradianceForecast> =>
  Effect.gen(function* () {
    const forecast = yield* IrradianceForecast;
    const candidates: readonly { source: ExpectedProfileSource; request: IrradianceRequest }[] = [
      { source: "recent_history", request: recentHistoryRequest(request) },
      { source: "last_year", request: lastYearRequest(request) },
    ];

    for (const candidate of candidates) {
      const points = yield* forecast.getHourlyIrradiance(candidate.request).pipe(
        Effect.catchTag("ForecastNotAvailable", (error) =>
          Effect.logWarning(`Irradiance for ${candidate.source} not available: ${error.message}`).pipe(
            Effect.as<readonly IrradiancePoint[]>([]),
          )
        ),
      );
      const profile = hourlyMeanProfile(points);

      if (isUsableProfile(profile)) {
        yield* Effect.log(
          `Expected irradiance from ${candidate.source}: ${points.length} points, peak ${Math.max(...profile).toFixed(1)} W/m²`,
        );
        return {
          source: candidate.source,
          hourlyMeanWm2: profile,
          points: projectProfile(profile, request.startAt, request.days),
        } satisfies ExpectedProfile;
      }

      yield* Effect.logWarning(`No usable irradiance in ${candidate.source} (${points.length} valid points)`);
    }

    return yield* new ForecastNotAvailableError({
      message: "No usable irradiance in recent history or in the same days last year",
    });
  }).pipe(Effect.withSpan("expectedIrradiance"));
