import { Context, Data, Effect } from "effect";
import type { IrradiancePoint } from "../schema.js";

export type ForecastProvenance = "forecast" | "fallback";

export type IrradianceRequest = {
  readonly latitude: number;
  readonly longitude: number;
  readonly start: Date; // only the UTC date is used
  readonly days: number;
};

export class ForecastNotAvailableError extends Data.TaggedError(
  "ForecastNotAvailable"
)<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class IrradianceForecast extends Context.Tag("IrradianceForecast")<
  IrradianceForecast,
  {
    readonly getHourlyIrradiance: (
      request: IrradianceRequest
    ) => Effect.Effect<readonly IrradiancePoint[], ForecastNotAvailableError>;
  }
>() {}
