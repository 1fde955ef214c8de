import type { SystemConfig } from "../schema.js";
import { allocate, buildDecision } from "./allocation.js";
import { isOutlookLow } from "./risk.js";
import type { ControllerInput, ControllerPolicy } from "./types.js";

/**
 * Keeps the battery above `reserveSoc` for flexible and deferrable loads.
 * Critical loads may still discharge down to socMin as a last resort.
 */
export class RuleBasedController implements ControllerPolicy {
  public readonly kind = "rule_based" as const;

  public constructor(private readonly config: SystemConfig) {}

  public decide(input: ControllerInput) {
    const { batteryKw, batteryAboveReserveKw } = input.supply;
    const allocation = allocate(input, {
      critical: batteryKw,
      flexible: batteryAboveReserveKw,
      deferrable: batteryAboveReserveKw,
    });

    return buildDecision(input, allocation, {
      socMin: this.config.socMin,
      outlookLow: isOutlookLow(input.forecast),
    });
  }
}
