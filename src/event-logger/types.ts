import type { Effect } from "effect";
import type { ControllerKind } from "../controller/types.js";
import type { ForecastProvenance } from "../forecast/types.js";
import type { KpiSnapshot } from "../schema.js";

export type SimulationEventLogger = {
  onRunStarted: (controller: ControllerKind, totalSteps: number, provenance: ForecastProvenance) => Effect.Effect<void>;
  onForecastFallback: (controller: ControllerKind) => Effect.Effect<void>;
  onBlackout: (stepIndex: number, timestamp: string, shortfallKw: number) => Effect.Effect<void>;
  onDayCompleted: (day: number, kpis: KpiSnapshot) => Effect.Effect<void>;
  onRunCompleted: (controller: ControllerKind, kpis: KpiSnapshot, endSoc: number) => Effect.Effect<void>;
};
