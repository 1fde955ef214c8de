import type { MatchingResult } from "../schema.js";
import { formatWindowTime } from "./windows.js";

const kwh = (value: number) => `${value.toFixed(2)} kWh`;

const verdict = (result: Omit<MatchingResult, "statements">) => {
  switch (result.marginType) {
    case "surplus":
      return `Solar can cover the day's demand with a surplus of ${kwh(result.energyMarginKwh)}.`;
    case "tight":
      return `Solar and demand are closely matched (margin ${result.energyMarginKwh < 0 ? "-" : "+"}${kwh(Math.abs(result.energyMarginKwh))}).`;
    case "deficit":
      return `Solar falls short of demand by ${kwh(Math.abs(result.energyMarginKwh))}.`;
  }
};

// Renders the numeric result as ordered sentences. No decisions are made here.
export const formatStatements = (result: Omit<MatchingResult, "statements">): string[] => {
  const shortfallMinutes = result.criticalShortfallSteps.length * result.timestepMinutes;

  return [
    `Expected demand for ${result.dayStart.slice(0, 10)}: ${kwh(result.totalDemandKwh)}.`,
    `Forecast solar generation: ${kwh(result.totalSolarKwh)}.`,
    verdict(result),
    ...(result.marginType === "deficit"
      ? ["Run flexible and deferrable loads only in surplus windows, or postpone them."]
      : []),
    result.criticalFullyProtected
      ? "Critical loads are fully covered."
      : `Critical loads are not fully covered for ${shortfallMinutes} minutes.`,
    ...result.surplusWindows.map((window) => `Surplus window: ${formatWindowTime(window, result.timestepMinutes)}.`),
    ...result.deficitWindows.map((window) => `Deficit window: ${formatWindowTime(window, result.timestepMinutes)}.`),
  ];
};
