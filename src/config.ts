import { Config as EffectConfig } from "effect";


export const AppConfig = {
  nasaPower: {
    baseUrl: EffectConfig.string("NASA_POWER_BASE_URL").pipe(
      EffectConfig.withDefault("https://power.larc.nasa.gov/api/temporal/hourly/point")
    ),
  },

  simulation: {
    days: EffectConfig.integer("SIMULATION_DAYS").pipe(
      EffectConfig.validate({ message: "SIMULATION_DAYS must be at least 1", validation: (days) => days >= 1 }),
      EffectConfig.withDefault(3)
    ),
    controller: EffectConfig.literal("naive", "rule_based", "static_priority", "forecast_heuristic")("CONTROLLER").pipe(
      EffectConfig.withDefault("forecast_heuristic" as const)
    ),
    householdFile: EffectConfig.string("HOUSEHOLD_FILE").pipe(
      EffectConfig.withDefault("household.example.json")
    ),
  },
};
