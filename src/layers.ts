import { Effect, Layer } from "effect";
import { AppConfig } from "./config.js";
import { NasaPowerForecastLayer } from "./forecast/nasa-power.adapter.js";

export const serviceLayers = Layer.mergeAll(
    Layer.unwrapEffect(
        Effect.map(AppConfig.nasaPower.baseUrl, (baseUrl) => NasaPowerForecastLayer({ baseUrl })),
    ),
);
