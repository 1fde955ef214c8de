import type { SystemConfig } from "../schema.js";
import { ForecastHeuristicController } from "./forecast-heuristic.controller.js";
import { NaiveController } from "./naive.controller.js";
import { RuleBasedController } from "./rule-based.controller.js";
import { StaticPriorityController, type StaticPriorityOptions } from "./static-priority.controller.js";
import type { ControllerKind, ControllerPolicy } from "./types.js";

export type { ControllerInput, ControllerKind, ControllerPolicy, ForecastContext, PowerSupply } from "./types.js";
export { CONTROLLER_KINDS } from "./types.js";
export { allocate, buildDecision, shedForShortfall } from "./allocation.js";
export { assessRisk, horizonAverageKw, isOutlookLow, RISK_THRESHOLDS } from "./risk.js";
export { NaiveController } from "./naive.controller.js";
export { RuleBasedController } from "./rule-based.controller.js";
export { StaticPriorityController, defaultStaticPriorityOptions, type StaticPriorityOptions } from "./static-priority.controller.js";
export { ForecastHeuristicController, expectedRefillKwh, urgencyOrder } from "./forecast-heuristic.controller.js";

export const makeController = (
  kind: ControllerKind,
  config: SystemConfig,
  staticPriority?: StaticPriorityOptions,
): ControllerPolicy => {
  switch (kind) {
    case "naive":
      return new NaiveController(config);
    case "rule_based":
      return new RuleBasedController(config);
    case "static_priority":
      return new StaticPriorityController(config, staticPriority);
    case "forecast_heuristic":
      return new ForecastHeuristicController(config);
  }
};
