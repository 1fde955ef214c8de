import type { SystemConfig } from "../schema.js";
import { allocate, buildDecision } from "./allocation.js";
import { isOutlookLow } from "./risk.js";
import type { ControllerInput, ControllerPolicy } from "./types.js";

/** Serves everything it can from PV and the whole battery, down to socMin. */
export class NaiveController implements ControllerPolicy {
  public readonly kind = "naive" as const;

  public constructor(private readonly config: SystemConfig) {}

  public decide(input: ControllerInput) {
    const { batteryKw } = input.supply;
    const allocation = allocate(input, { critical: batteryKw, flexible: batteryKw, deferrable: batteryKw });

    return buildDecision(input, allocation, {
      socMin: this.config.socMin,
      outlookLow: isOutlookLow(input.forecast),
    });
  }
}
