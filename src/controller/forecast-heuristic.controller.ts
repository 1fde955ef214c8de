import type { ReasonCode, SystemConfig, TaskInstance } from "../schema.js";
import { allocate, buildDecision, type TaskOrder } from "./allocation.js";
import { isOutlookLow } from "./risk.js";
import type { ControllerInput, ControllerPolicy } from "./types.js";

// battery share left to flexible and deferrable loads when the outlook is low
const LOW_OUTLOOK_BATTERY_SHARE = 0.5;

// least slack first, then the heavier task, then id for a stable order
export const urgencyOrder: TaskOrder = (tasks, step) => {
  const slack = (task: TaskInstance) => task.latestEndStep - step - task.remainingSteps;

  return [...tasks].sort(
    (a, b) => slack(a) - slack(b) || b.powerKw - a.powerKw || a.id.localeCompare(b.id),
  );
};

/**
 * Energy the forecast PV surplus over the horizon is expected to put back
 * into the battery.
 */
export const expectedRefillKwh = (input: ControllerInput, config: SystemConfig): number => {
  const dtHours = config.timestepMinutes / 60;

  return input.forecast.pvKw.reduce(
    (sum, pvKw) =>
      sum + Math.min(config.inverterMaxKw, Math.max(0, pvKw - input.requested.critical)) * dtHours * config.chargeEfficiency,
    0,
  );
};

/**
 * Rule-based reserve protection, relaxed when the forecast shows enough
 * solar ahead to refill the reserve band and tightened when it does not.
 */
export class ForecastHeuristicController implements ControllerPolicy {
  public readonly kind = "forecast_heuristic" as const;

  public constructor(private readonly config: SystemConfig) {}

  public decide(input: ControllerInput) {
    const { batteryKw, batteryAboveReserveKw } = input.supply;
    const outlookLow = isOutlookLow(input.forecast);
    const reserveBandKwh = Math.max(0, this.config.reserveSoc - this.config.socMin) * this.config.batteryCapacityKwh;
    const policyReasons: ReasonCode[] = [];

    let nonCriticalCapKw = batteryAboveReserveKw;

    if (!outlookLow && expectedRefillKwh(input, this.config) >= reserveBandKwh) {
      nonCriticalCapKw = batteryKw;
      if (batteryKw > batteryAboveReserveKw) {
        policyReasons.push("EXTRA_DISCHARGE_ALLOWED");
      }
    } else if (outlookLow) {
      nonCriticalCapKw = batteryAboveReserveKw * LOW_OUTLOOK_BATTERY_SHARE;
    }

    const allocation = allocate(
      input,
      { critical: batteryKw, flexible: nonCriticalCapKw, deferrable: nonCriticalCapKw },
      urgencyOrder,
    );

    return buildDecision(input, allocation, {
      socMin: this.config.socMin,
      outlookLow,
      policyReasons,
    });
  }
}
