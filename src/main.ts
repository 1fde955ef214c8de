import { NodeContext, NodeHttpClient, NodeRuntime } from "@effect/platform-node"
import { Console, Effect, Logger, LogLevel } from "effect"
import { AppConfig } from './config.js';
import { expectedIrradiance } from './forecast/expected-profile.js';
import { loadHouseholdFile } from './household/household-file.js';
import type { IrradiancePoint } from './schema.js';
import { compareControllers } from './simulation/batch.js';
import { runDigitalTwin } from './simulation/digital-twin.js';
import { serviceLayers } from "./layers.js";

const isProd = process.env.NODE_ENV == 'production';

// planning starts at the next UTC midnight
const nextUtcMidnight = (now: Date) =>
  new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate() + 1));

const program = Effect.gen(function*() {
  const days = yield* AppConfig.simulation.days;
  const controller = yield* AppConfig.simulation.controller;
  const householdFile = yield* AppConfig.simulation.householdFile;

  const household = yield* loadHouseholdFile(householdFile);

  const now = new Date();
  const startAt = nextUtcMidnight(now);

  const forecast: readonly IrradiancePoint[] = process.argv.includes('--offline')
    ? []
    : yield* expectedIrradiance({
        latitude: household.system.latitude,
        longitude: household.system.longitude,
        startAt,
        days,
        reference: now,
      }).pipe(
        Effect.map((profile) => profile.points),
        Effect.catchTag('ForecastNotAvailable', (err) =>
          Effect.logWarning(`Forecast not available: ${err.message}`).pipe(
            Effect.as<readonly IrradiancePoint[]>([]),
          )
        ),
      );

  const options = {
    config: household.system,
    appliances: household.appliances,
    days,
    startAt,
    forecast,
  };

  if (process.argv.includes('--compare')) {
    const results = yield* compareControllers(options);

    for (const result of results) {
      yield* Effect.log(`${result.controller}: day-ahead risk ${result.matching.riskLevel}, end SOC ${result.endSoc.toFixed(3)}`);
    }

    yield* Console.log(JSON.stringify(
      results.map(({ controller, status, finalKpis, endSoc, matching }) => ({ controller, status, finalKpis, endSoc, matching })),
      null,
      2,
    ));
    return;
  }

  const result = yield* runDigitalTwin({ ...options, controller });

  for (const statement of result.matching.statements) {
    yield* Effect.log(statement);
  }
  yield* Effect.logDebug(`Nominal plan: ${result.matching.nominalPlan.energy24hKwh.toFixed(2)} kWh per day`);

  yield* Console.log(JSON.stringify(result.matching, null, 2));
}).pipe(
  Effect.provide(serviceLayers),
  Effect.provide(NodeContext.layer),
  Effect.provide(NodeHttpClient.layer),
  Logger.withMinimumLogLevel(isProd ? LogLevel.Info : LogLevel.Debug),
);

NodeRuntime.runMain(program);
