import { Effect } from "effect";
import { CONTROLLER_KINDS, type ControllerKind } from "../controller/types.js";
import type { InsufficientDataError } from "../errors/insufficient-data.error.js";
import type { InvalidConfigError } from "../errors/invalid-config.error.js";
import { runDigitalTwin, type DigitalTwinResult } from "./digital-twin.js";
import type { SimulationOptions } from "./simulation-loop.js";

/**
 * Runs the same household under several controllers at once. Runs share
 * only the read-only options; each builds its own battery, tasks and KPIs.
 */
export const compareControllers = (
  options: Omit<SimulationOptions, "controller">,
  kinds: readonly ControllerKind[] = CONTROLLER_KINDS,
): Effect.Effect<DigitalTwinResult[], InvalidConfigError | InsufficientDataError> =>
  Effect.all(
    kinds.map((controller) => runDigitalTwin({ ...options, controller })),
    { concurrency: "unbounded" },
  );
