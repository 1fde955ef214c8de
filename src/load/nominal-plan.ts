import type { Appliance, LoadCategory, NominalPlan } from "../schema.js";
import { appliancePowerKw, DEFAULT_RUN_HOURS, emptyCategoryPower, totalPower } from "./load-demand-model.js";

/**
 * Hours a day each appliance is planned to run: critical loads all day,
 * the others their runHours or the category default. Windows do not cap it.
 */
export const nominalRunHours = (appliance: Appliance): number =>
  appliance.category === "critical" ? 24 : appliance.runHours ?? DEFAULT_RUN_HOURS[appliance.category];

/** Planned daily energy straight from the catalog, without simulating. */
export const computeNominalPlan = (appliances: readonly Appliance[]): NominalPlan => {
  const byCategoryKwh: Record<LoadCategory, number> = { ...emptyCategoryPower() };

  for (const appliance of appliances) {
    byCategoryKwh[appliance.category] += appliancePowerKw(appliance) * nominalRunHours(appliance);
  }

  const energy24hKwh = totalPower(byCategoryKwh);

  return {
    byCategoryKwh,
    energy24hKwh,
    energy12hKwh: energy24hKwh / 2,
    averagePowerKw: energy24hKwh / 24,
  };
};
