import { Effect } from "effect";
import type { InsufficientDataError } from "../errors/insufficient-data.error.js";
import type { InvalidConfigError } from "../errors/invalid-config.error.js";
import { computeDayAheadMatching } from "../matching/day-ahead.js";
import type { MatchingResult } from "../schema.js";
import { makeSimulation, type SimulationOptions, type SimulationOutput } from "./simulation-loop.js";

export type DigitalTwinResult = SimulationOutput & {
  readonly matching: MatchingResult;
};

/** Runs one controller over the whole horizon and matches its first day. */
export const runDigitalTwin = (
  options: SimulationOptions,
): Effect.Effect<DigitalTwinResult, InvalidConfigError | InsufficientDataError> =>
  Effect.gen(function* () {
    const simulation = yield* makeSimulation(options);
    const output = yield* simulation.run();
    const matching = yield* computeDayAheadMatching(
      output.records.slice(0, simulation.stepsPerDay),
      simulation.appliances,
      simulation.config,
    );

    return { ...output, matching };
  });
