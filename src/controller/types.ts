import type { BatteryState } from "../battery/battery-state-model.js";
import type { CategoryPower, Decision, TaskInstance } from "../schema.js";

export type ControllerKind = "naive" | "rule_based" | "static_priority" | "forecast_heuristic";

export const CONTROLLER_KINDS: readonly ControllerKind[] = [
  "naive",
  "rule_based",
  "static_priority",
  "forecast_heuristic",
];

export type PowerSupply = {
  readonly pvKw: number;
  readonly batteryKw: number; // dischargeable down to socMin
  readonly batteryAboveReserveKw: number; // dischargeable down to reserveSoc
};

export type ForecastContext = {
  readonly pvKw: readonly number[]; // horizonSteps values from the current step on, zero padded
  readonly pvCapacityKw: number;
};

export type ControllerInput = {
  readonly timestamp: string;
  readonly step: number; // step within the day
  readonly state: BatteryState;
  readonly requested: CategoryPower;
  readonly tasks: readonly TaskInstance[];
  readonly supply: PowerSupply;
  readonly forecast: ForecastContext;
};

export type ControllerPolicy = {
  readonly kind: ControllerKind;
  readonly decide: (input: ControllerInput) => Decision;
};
