import { dischargeablePowerKw } from "../battery/battery-state-model.js";
import type { LoadCategory, SystemConfig } from "../schema.js";
import { allocate, buildDecision } from "./allocation.js";
import { isOutlookLow } from "./risk.js";
import type { ControllerInput, ControllerPolicy } from "./types.js";

type NonCritical = Exclude<LoadCategory, "critical">;

export type StaticPriorityOptions = {
  // SOC above which each category may draw from the battery
  readonly thresholds: Readonly<Record<NonCritical, number>>;
  // share of that battery power each category may use
  readonly weights: Readonly<Record<NonCritical, number>>;
};

export const defaultStaticPriorityOptions = (config: SystemConfig): StaticPriorityOptions => ({
  thresholds: {
    flexible: Math.min(config.socMax, config.reserveSoc + 0.05),
    deferrable: Math.min(config.socMax, config.reserveSoc + 0.1),
  },
  weights: {
    flexible: 1,
    deferrable: 0.5,
  },
});

export class StaticPriorityController implements ControllerPolicy {
  public readonly kind = "static_priority" as const;
  private readonly dtHours: number;

  public constructor(
    private readonly config: SystemConfig,
    private readonly options: StaticPriorityOptions = defaultStaticPriorityOptions(config),
  ) {
    for (const weight of Object.values(options.weights)) {
      if (weight < 0 || weight > 1) {
        throw new Error('Static priority weights must be between 0 and 1');
      }
    }
    this.dtHours = config.timestepMinutes / 60;
  }

  public decide(input: ControllerInput) {
    const capFor = (category: NonCritical) =>
      this.options.weights[category]
        * dischargeablePowerKw(input.state, this.options.thresholds[category], this.dtHours, this.config);

    const allocation = allocate(input, {
      critical: input.supply.batteryKw,
      flexible: capFor("flexible"),
      deferrable: capFor("deferrable"),
    });

    return buildDecision(input, allocation, {
      socMin: this.config.socMin,
      outlookLow: isOutlookLow(input.forecast),
    });
  }
}
