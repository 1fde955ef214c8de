import type { CategoryPower, KpiSnapshot } from "../schema.js";
import { totalPower } from "../load/load-demand-model.js";

const POWER_EPSILON_KW = 1e-9;

export type KpiStep = {
  readonly dtHours: number;
  readonly requested: CategoryPower;
  readonly served: CategoryPower;
  readonly pvKw: number;
  readonly curtailedKw: number;
  readonly chargeKw: number;
  readonly dischargeKw: number;
};

/**
 * Running survivability and utilisation counters for one run. Each step adds
 * to the totals; nothing is recomputed from history.
 */
export class KpiAccumulator {
  private criticalRequestedKwh = 0;
  private criticalServedKwh = 0;
  private blackoutSteps = 0;
  private pvServedKwh = 0;
  private totalServedKwh = 0;
  private pvAvailableKwh = 0;
  private pvUsedKwh = 0;
  private throughputKwh = 0;
  private curtailedKwh = 0;

  public constructor(private readonly timestepMinutes: number) {}

  public update(step: KpiStep): void {
    const servedKw = totalPower(step.served);

    this.criticalRequestedKwh += step.requested.critical * step.dtHours;
    this.criticalServedKwh += step.served.critical * step.dtHours;
    if (step.served.critical + POWER_EPSILON_KW < step.requested.critical) {
      this.blackoutSteps += 1;
    }

    this.pvServedKwh += Math.min(step.pvKw, servedKw) * step.dtHours;
    this.totalServedKwh += servedKw * step.dtHours;
    this.pvAvailableKwh += step.pvKw * step.dtHours;
    this.pvUsedKwh += Math.max(0, step.pvKw - step.curtailedKw) * step.dtHours;
    this.curtailedKwh += step.curtailedKw * step.dtHours;
    this.throughputKwh += (Math.abs(step.chargeKw) + Math.abs(step.dischargeKw)) * step.dtHours;
  }

  public snapshot(): KpiSnapshot {
    return {
      clsr: this.criticalRequestedKwh > 0 ? this.criticalServedKwh / this.criticalRequestedKwh : 1,
      blackoutMinutes: this.blackoutSteps * this.timestepMinutes,
      sar: this.totalServedKwh > 0 ? this.pvServedKwh / this.totalServedKwh : 0,
      solarUtilization: this.pvAvailableKwh > 0 ? this.pvUsedKwh / this.pvAvailableKwh : 0,
      batteryThroughputKwh: this.throughputKwh,
      curtailedKwh: this.curtailedKwh,
    };
  }
}
