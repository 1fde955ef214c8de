import { applianceDurationSteps, applianceStepRange } from "../load/load-demand-model.js";
import type { Appliance, ApplianceAdvisory, MarginType, TimeWindow } from "../schema.js";
import { formatWindowTime, overlapSteps, windowLengthSteps } from "./windows.js";

export type AdvisoryContext = {
  readonly timestepMinutes: number;
  readonly marginType: MarginType;
  readonly criticalFullyProtected: boolean;
  readonly surplusWindows: readonly TimeWindow[];
  readonly deficitWindows: readonly TimeWindow[];
};

const hoursLabel = (steps: number, timestepMinutes: number) => {
  const hours = (steps * timestepMinutes) / 60;
  return `${Number.isInteger(hours) ? hours : hours.toFixed(2)} h`;
};

const criticalAdvisory = (
  appliance: Appliance,
  deficit: TimeWindow | undefined,
  context: AdvisoryContext,
): ApplianceAdvisory => {
  const base = { applianceId: appliance.id, name: appliance.name, category: appliance.category, window: deficit ?? null };
  const when = deficit === undefined ? undefined : formatWindowTime(deficit, context.timestepMinutes);

  if (context.criticalFullyProtected) {
    return {
      ...base,
      status: "safe_to_run",
      reason: when === undefined
        ? `${appliance.name} is covered by solar all day.`
        : `${appliance.name} is covered all day; the battery carries it during ${when}.`,
    };
  }

  return {
    ...base,
    status: "avoid",
    reason: when === undefined
      ? `Keep ${appliance.name} on and add no other load today.`
      : `Keep ${appliance.name} on and add no load during ${when}.`,
  };
};

/**
 * Advice per appliance from where its allowed hours meet the surplus and
 * deficit windows of the day.
 */
export const computeAdvisories = (
  appliances: readonly Appliance[],
  context: AdvisoryContext,
): ApplianceAdvisory[] =>
  appliances.map((appliance): ApplianceAdvisory => {
    const range = applianceStepRange(appliance, context.timestepMinutes);
    const deficit = context.deficitWindows.find((window) => overlapSteps(window, range) > 0);

    if (appliance.category === "critical") {
      return criticalAdvisory(appliance, deficit, context);
    }

    const base = { applianceId: appliance.id, name: appliance.name, category: appliance.category };

    if (deficit === undefined && context.marginType !== "deficit") {
      return {
        ...base,
        status: "safe_to_run",
        window: null,
        reason: `${appliance.name} is covered by solar across its allowed hours.`,
      };
    }

    const durationSteps = applianceDurationSteps(appliance, context.timestepMinutes);
    const overlapping = context.surplusWindows.filter((window) => overlapSteps(window, range) > 0);
    const fitting = overlapping.find((window) => overlapSteps(window, range) >= durationSteps);
    const longest = overlapping.reduce<TimeWindow | undefined>(
      (best, window) => (best === undefined || windowLengthSteps(window) > windowLengthSteps(best) ? window : best),
      undefined,
    );
    const chosen = fitting ?? longest;

    if (chosen !== undefined && (context.marginType !== "deficit" || appliance.category === "flexible")) {
      const when = formatWindowTime(chosen, context.timestepMinutes);
      return {
        ...base,
        status: "run_in_window",
        window: chosen,
        reason: fitting !== undefined
          ? `Run ${appliance.name} between ${when}, when solar covers demand.`
          : `${appliance.name} needs ${hoursLabel(durationSteps, context.timestepMinutes)}; the longest surplus window is ${when}.`,
      };
    }

    return {
      ...base,
      status: "avoid",
      window: deficit ?? null,
      reason: deficit === undefined
        ? `Avoid ${appliance.name} today; no surplus window falls in its allowed hours.`
        : `Avoid ${appliance.name} today; demand exceeds solar during ${formatWindowTime(deficit, context.timestepMinutes)}.`,
    };
  });
