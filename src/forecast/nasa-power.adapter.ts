import { Duration, Effect, Layer, Schema } from "effect";
import { HttpClient } from "@effect/platform";
import type { IrradiancePoint } from "../schema.js";
import {
  ForecastNotAvailableError,
  IrradianceForecast,
  type IrradianceRequest,
} from "./types.js";

// All-sky surface shortwave downward irradiance; hourly Wh/m² equals mean W/m².
const GHI_PARAMETER = "ALLSKY_SFC_SW_DWN";

const NasaPowerResponseSchema = Schema.Struct({
  properties: Schema.Struct({
    parameter: Schema.Struct({
      [GHI_PARAMETER]: Schema.Record({ key: Schema.String, value: Schema.NullOr(Schema.Number) }),
    }),
  }),
});

export type NasaPowerResponse = Schema.Schema.Type<typeof NasaPowerResponseSchema>;

export type NasaPowerConfig = {
  readonly baseUrl: string;
};

const HOUR_KEY = /^(\d{4})(\d{2})(\d{2})(\d{2})$/;
const TIMEOUT = Duration.seconds(30);

const formatDay = (date: Date) => date.toISOString().slice(0, 10).replaceAll("-", "");

/**
 * Turns the hourly map into chronologically ordered points. Only valid hours
 * are kept: keys that are not YYYYMMDDHH, nulls and negative values (the API
 * fills missing hours with -999) are dropped.
 */
export const parseHourlyIrradiance = (response: NasaPowerResponse): IrradiancePoint[] =>
  Object.entries(response.properties.parameter[GHI_PARAMETER])
    .sort(([a], [b]) => a.localeCompare(b))
    .flatMap(([key, value]) => {
      const match = HOUR_KEY.exec(key);
      if (match === null || value === null || !Number.isFinite(value) || value < 0) {
        return [];
      }
      const [, year, month, day, hour] = match;
      return [{ timestamp: `${year}-${month}-${day}T${hour}:00:00.000Z`, ghiWm2: value }];
    });

export const NasaPowerForecastLayer = (
  config: NasaPowerConfig
): Layer.Layer<IrradianceForecast, never, HttpClient.HttpClient> =>
  Layer.effect(
    IrradianceForecast,
    Effect.gen(function* () {
      const httpClient = yield* HttpClient.HttpClient;

      const getHourlyIrradiance = (request: IrradianceRequest) =>
        Effect.gen(function* () {
          const end = new Date(request.start.getTime() + (Math.max(1, request.days) - 1) * 86_400_000);

          const url = new URL(config.baseUrl);
          url.searchParams.set("parameters", GHI_PARAMETER);
          url.searchParams.set("community", "RE");
          url.searchParams.set("latitude", String(request.latitude));
          url.searchParams.set("longitude", String(request.longitude));
          url.searchParams.set("start", formatDay(request.start));
          url.searchParams.set("end", formatDay(end));
          url.searchParams.set("format", "JSON");
          url.searchParams.set("time-standard", "UTC");

          const response = yield* httpClient.get(url.toString());
          const responseText = yield* response.text;

          if (response.status !== 200) {
            return yield* Effect.fail(
              new ForecastNotAvailableError({
                message: `NASA POWER returned status ${response.status}. Body: ${responseText}`,
              })
            );
          }

          const parsed = yield* Schema.decodeUnknown(Schema.parseJson(NasaPowerResponseSchema))(responseText);
          const points = parseHourlyIrradiance(parsed);

          yield* Effect.logDebug(`NASA POWER returned ${points.length} hourly points`);

          return points;
        }).pipe(
          Effect.timeout(TIMEOUT),
          Effect.catchAll((error) =>
            error instanceof ForecastNotAvailableError
              ? Effect.fail(error)
              : Effect.fail(
                  new ForecastNotAvailableError({
                    message: `Failed to fetch irradiance: ${error instanceof Error ? error.message : String(error)}`,
                    cause: error,
                  })
                )
          ),
          Effect.withSpan("NasaPower.getHourlyIrradiance")
        );

      return IrradianceForecast.of({
        getHourlyIrradiance,
      });
    })
  );
